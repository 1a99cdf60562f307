import type { Config } from '../core/config';
import { FacebookExtractor } from './facebook/download';
import type { Extractor } from './types';

export { isFacebookUrl } from './facebook/detect';
export type { CookieSource, DownloadResult, ExtractOptions, Extractor, PageVideo, VideoInfo } from './types';

export function createExtractor(config: Config): Extractor {
  return new FacebookExtractor({
    ytdlpPath: config.YTDLP_PATH,
    timeoutMs: config.YTDLP_TIMEOUT_MS,
    cookiesB64: config.FACEBOOK_COOKIES_B64,
    geoBypassCountry: config.GEO_BYPASS_COUNTRY,
    verbose: config.LOG_LEVEL === 'debug' || config.LOG_LEVEL === 'trace',
  });
}
