import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { run, type CommandRunner, type ExecResult } from '../../core/exec';
import { logger } from '../../core/logger';
import { safeRemove } from '../../core/fs';
import { AppError, DownloadError, ERROR_CODES, type ExtractorFailure } from '../../core/errors';
import { resolveCookiesFile } from '../cookies';
import { findDownloadedFile, readInfoJson, titleFromFileName } from '../utils';
import type { DownloadResult, ExtractOptions, Extractor, PageVideo } from '../types';
import { extractIdFromUrl, normalizeFacebookUrl } from './detect';
import { cleanFacebookTitle } from './title';
import type { FacebookExtractorOptions } from './types';

type Attempt = { target: string; referer?: string; ua?: string; useCookies?: boolean };

const DESKTOP_UA = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
const MOBILE_UA = 'Mozilla/5.0 (Linux; Android 10; SM-G973F) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Mobile Safari/537.36';

export function buildFacebookAttempts(url: string, cookiesPath?: string): Attempt[] {
  const normalizedUrl = normalizeFacebookUrl(url);
  const id = extractIdFromUrl(url);
  const reelMobile = id ? `https://m.facebook.com/reel/${id}` : undefined;

  const attempts: Attempt[] = [];
  const add = (useCookies: boolean) => {
    attempts.push({ target: url, referer: 'https://www.facebook.com/', ua: DESKTOP_UA, useCookies });
    if (normalizedUrl !== url) {
      attempts.push({ target: normalizedUrl, referer: 'https://www.facebook.com/', ua: DESKTOP_UA, useCookies });
    }
    if (reelMobile) {
      attempts.push({ target: reelMobile, referer: 'https://m.facebook.com/', ua: MOBILE_UA, useCookies });
    }
  };

  add(false);
  if (cookiesPath) add(true);
  return attempts;
}

export function mapYtDlpError(stderr: string): ExtractorFailure {
  const errorLower = stderr.toLowerCase();

  if (
    errorLower.includes('this video is only available to logged in users') ||
    errorLower.includes('private') ||
    errorLower.includes('restricted') ||
    errorLower.includes('log in or sign up')
  ) {
    return ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED;
  }

  if (errorLower.includes('http error 4') || errorLower.includes('429') || errorLower.includes('rate limit')) {
    return ERROR_CODES.ERR_FETCH_FAILED;
  }

  if (
    errorLower.includes('unsupported url') ||
    errorLower.includes('no video found') ||
    errorLower.includes('cannot parse data')
  ) {
    return ERROR_CODES.ERR_UNSUPPORTED_URL;
  }

  if (errorLower.includes('geo') || errorLower.includes('blocked')) {
    return ERROR_CODES.ERR_GEO_BLOCKED;
  }

  return ERROR_CODES.ERR_INTERNAL;
}

/** Facebook extraction through yt-dlp, trying desktop, watch and mobile-reel URLs in turn. */
export class FacebookExtractor implements Extractor {
  constructor(
    private readonly options: FacebookExtractorOptions,
    private readonly runner: CommandRunner = run
  ) {}

  private commonArgs(outDir: string): string[] {
    const common = [
      '--no-playlist',
      '--geo-bypass',
      '-f', 'best[ext=mp4]/best',
      '--write-info-json',
      '--no-write-playlist-metafiles',
      '-o', path.join(outDir, '%(title).80B.%(id)s.%(ext)s'),
    ];
    if (this.options.geoBypassCountry) {
      common.push('--geo-bypass-country', this.options.geoBypassCountry);
    }
    if (this.options.verbose) {
      common.unshift('-v');
    }
    return common;
  }

  async download(url: string, outDir: string, options: ExtractOptions = {}): Promise<DownloadResult> {
    logger.info({ url, outDir }, 'Starting Facebook video download');

    const common = this.commonArgs(outDir);
    const cookiesPath = await resolveCookiesFile(options.cookies, this.options.cookiesB64, outDir);
    const attempts = buildFacebookAttempts(url, cookiesPath);

    try {
      let lastResult: ExecResult | null = null;
      for (let i = 0; i < attempts.length; i++) {
        const a = attempts[i];
        if (!a) continue;
        const args: string[] = [...common];
        if (a.referer) args.push('--add-header', `Referer:${a.referer}`);
        if (a.ua) args.push('--user-agent', a.ua);
        if (a.useCookies && cookiesPath) args.push('--cookies', cookiesPath);
        args.push(a.target);

        logger.info(
          { attempt: i + 1, target: a.target, cookies: Boolean(a.useCookies && cookiesPath), ua: a.ua === MOBILE_UA ? 'android' : 'desktop' },
          'yt-dlp attempt'
        );
        const result = await this.runner(this.options.ytdlpPath, args, { timeout: this.options.timeoutMs });
        lastResult = result;
        if (result.code === 0) {
          const filePath = await findDownloadedFile(outDir);
          if (!filePath) {
            throw new DownloadError(ERROR_CODES.ERR_INTERNAL, 'Downloaded file not found', { url: a.target, outDir });
          }
          const videoInfo = await this.describe(filePath, url);
          logger.info({ url: a.target, filePath, title: videoInfo.title }, 'Facebook video downloaded successfully');
          return { filePath, videoInfo };
        }
        logger.warn({ attempt: i + 1, code: result.code }, 'yt-dlp attempt failed');
      }

      const stderr = lastResult?.stderr ?? '';
      logger.error({ url, stderrPreview: stderr.slice(0, 1200) }, 'All yt-dlp attempts failed');
      throw new DownloadError(mapYtDlpError(stderr), 'yt-dlp download failed', {
        url,
        stderr: stderr.slice(0, 2000),
        code: lastResult?.code,
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      logger.error({ error, url, outDir }, 'Unexpected error during Facebook video download');
      throw new DownloadError(ERROR_CODES.ERR_INTERNAL, 'Unexpected error during download', {
        url,
        originalError: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async describe(filePath: string, url: string): Promise<DownloadResult['videoInfo']> {
    const fromName = titleFromFileName(filePath);
    const info = await readInfoJson(filePath);
    const rawTitle = info?.title ?? fromName.title;

    return {
      id: info?.id ?? fromName.id,
      title: cleanFacebookTitle(rawTitle) || fromName.title,
      description: info?.description ?? '',
      url: info?.webpage_url ?? url,
      duration: info?.duration ?? undefined,
      thumbnail: info?.thumbnail ?? undefined,
      uploader: info?.uploader ?? undefined,
    };
  }

  /** Lists the videos of a page or playlist URL without downloading them. */
  async listVideos(pageUrl: string, options: ExtractOptions & { maxVideos?: number } = {}): Promise<PageVideo[]> {
    const args = ['--flat-playlist', '--print', 'url', '--print', 'title', '--no-warnings'];
    if (options.maxVideos) args.push('--playlist-end', String(options.maxVideos));

    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fb-list-'));
    let result: ExecResult;
    try {
      const cookiesPath = await resolveCookiesFile(options.cookies, this.options.cookiesB64, tempDir);
      if (cookiesPath) args.push('--cookies', cookiesPath);
      args.push(pageUrl);
      result = await this.runner(this.options.ytdlpPath, args, { timeout: this.options.timeoutMs });
    } finally {
      await safeRemove(tempDir);
    }

    if (result.code !== 0) {
      throw new DownloadError(mapYtDlpError(result.stderr), 'Failed to list page videos', {
        pageUrl,
        stderr: result.stderr.slice(0, 2000),
      });
    }

    const lines = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const videos: PageVideo[] = [];
    for (let i = 0; i + 1 < lines.length; i += 2) {
      const url = lines[i];
      const title = lines[i + 1];
      if (url && title && url.startsWith('http')) {
        videos.push({ url, title: cleanFacebookTitle(title) });
      }
    }
    logger.info({ pageUrl, count: videos.length }, 'Page videos listed');
    return videos;
  }
}
