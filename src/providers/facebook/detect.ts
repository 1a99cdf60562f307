const FACEBOOK_HOSTS = ['facebook.com', 'www.facebook.com', 'm.facebook.com', 'web.facebook.com', 'fb.watch', 'www.fb.watch'];

export function isFacebookUrl(url: string): boolean {
  try {
    const urlObj = new URL(url);
    if (urlObj.protocol !== 'https:' && urlObj.protocol !== 'http:') return false;
    return FACEBOOK_HOSTS.includes(urlObj.hostname.toLowerCase());
  } catch {
    return false;
  }
}

export function extractIdFromUrl(originalUrl: string): string | null {
  const reel = originalUrl.match(/facebook\.com\/reel\/(\d+)/);
  if (reel && reel[1]) return reel[1];
  const watch = originalUrl.match(/[?&]v=(\d+)/);
  if (watch && watch[1]) return watch[1];
  const video = originalUrl.match(/\/videos\/(?:[^/]+\/)?(\d+)/);
  if (video && video[1]) return video[1];
  return null;
}

export function normalizeFacebookUrl(originalUrl: string): string {
  const id = extractIdFromUrl(originalUrl);
  if (id) return `https://m.facebook.com/watch/?v=${id}`;
  return originalUrl;
}
