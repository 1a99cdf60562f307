import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../core/logger';
import type { CookieSource } from './types';

export async function writeCookiesFile(content: string | Buffer, outDir: string, fileName: string): Promise<string | undefined> {
  if (!content || content.length === 0) return undefined;
  try {
    const cookiesPath = path.join(outDir, fileName);
    await fs.writeFile(cookiesPath, content);
    logger.info({ cookiesPath }, 'Cookies written');
    return cookiesPath;
  } catch (e) {
    logger.warn({ error: e }, 'Failed to write cookies');
    return undefined;
  }
}

/**
 * Resolves the cookies file yt-dlp should read: the caller's cookies take precedence
 * over the configured base64 fallback. Returns undefined when neither is usable.
 */
export async function resolveCookiesFile(
  source: CookieSource | undefined,
  fallbackB64: string,
  outDir: string
): Promise<string | undefined> {
  if (source) {
    if ('path' in source) {
      if (await fs.pathExists(source.path)) return source.path;
      logger.warn({ cookiesPath: source.path }, 'Cookies file not found; proceeding without');
      return undefined;
    }
    if (source.content.trim().length > 0) {
      return writeCookiesFile(source.content, outDir, 'cookies.txt');
    }
  }
  if (fallbackB64) {
    return writeCookiesFile(Buffer.from(fallbackB64, 'base64'), outDir, 'cookies.txt');
  }
  return undefined;
}
