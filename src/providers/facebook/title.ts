const VIEWS_AND_REACTIONS = /^[\d.,]+[KMB]?\s*views\s*[·•]\s*[\d.,]+[KMB]?\s*reactions\s*[|｜]\s*/i;
const VIEWS_ONLY = /^[\d.,]+[KMB]?\s*views\s*[|｜]\s*/i;

/**
 * Strips the counters Facebook prepends to video titles ("1.6M views · 62K reactions | ")
 * and the page name it appends after the last `|`.
 */
export function cleanFacebookTitle(title: string): string {
  if (!title) return title;

  let cleaned = title.replace(VIEWS_AND_REACTIONS, '').replace(VIEWS_ONLY, '');

  const separator = cleaned.includes('|') ? '|' : cleaned.includes('｜') ? '｜' : null;
  if (separator) {
    cleaned = cleaned.slice(0, cleaned.lastIndexOf(separator));
  }

  return cleaned.trim();
}
