import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ExecOptions, ExecResult } from '../../core/exec';
import { DownloadError, ERROR_CODES } from '../../core/errors';
import type { FacebookExtractorOptions } from './types';
import { FacebookExtractor, buildFacebookAttempts, mapYtDlpError } from './download';

const OPTIONS: FacebookExtractorOptions = {
  ytdlpPath: 'yt-dlp',
  timeoutMs: 1000,
  cookiesB64: '',
  geoBypassCountry: '',
  verbose: false,
};

const INFO = {
  id: '123',
  title: '1.2K views · 30 reactions | My clip | Some Page',
  description: 'Original description',
  duration: 12.5,
  webpage_url: 'https://www.facebook.com/watch/?v=123',
};

interface RunnerCall {
  command: string;
  args: string[];
  options: ExecOptions;
}

/** Stands in for yt-dlp: each outcome either writes the files yt-dlp would, or fails. */
function fakeRunner(outcomes: Array<'ok' | 'fail' | 'empty'>, stderr = 'ERROR: Cannot parse data') {
  const calls: RunnerCall[] = [];
  const runner = async (command: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecResult> => {
    calls.push({ command, args, options });
    const outcome = outcomes[calls.length - 1] ?? 'fail';
    if (outcome === 'fail') return { stdout: '', stderr, code: 1, durationMs: 5 };

    if (outcome === 'ok') {
      const template = args[args.indexOf('-o') + 1] ?? '';
      const outDir = path.dirname(template);
      await fs.writeFile(path.join(outDir, 'My clip.123.mp4'), Buffer.alloc(64));
      await fs.writeJson(path.join(outDir, 'My clip.123.info.json'), INFO);
    }
    return { stdout: '', stderr: '', code: 0, durationMs: 5 };
  };
  return { runner, calls };
}

const target = (call: RunnerCall) => call.args[call.args.length - 1];

describe('buildFacebookAttempts', () => {
  it('tries the original, watch and mobile reel URLs', () => {
    const attempts = buildFacebookAttempts('https://www.facebook.com/watch/?v=123');

    expect(attempts.map((attempt) => attempt.target)).toEqual([
      'https://www.facebook.com/watch/?v=123',
      'https://m.facebook.com/watch/?v=123',
      'https://m.facebook.com/reel/123',
    ]);
    expect(attempts.every((attempt) => attempt.useCookies === false)).toBe(true);
  });

  it('repeats the attempts with cookies when a cookies file exists', () => {
    const attempts = buildFacebookAttempts('https://fb.watch/abcDEF/', '/tmp/cookies.txt');

    expect(attempts).toHaveLength(2);
    expect(attempts.map((attempt) => attempt.useCookies)).toEqual([false, true]);
  });
});

describe('mapYtDlpError', () => {
  it.each([
    ['ERROR: This video is only available to logged in users', ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED],
    ['ERROR: HTTP Error 404: Not Found', ERROR_CODES.ERR_FETCH_FAILED],
    ['ERROR: Unsupported URL: https://www.facebook.com/', ERROR_CODES.ERR_UNSUPPORTED_URL],
    ['ERROR: This video is blocked in your country', ERROR_CODES.ERR_GEO_BLOCKED],
    ['ERROR: something else entirely', ERROR_CODES.ERR_INTERNAL],
  ])('classifies %j', (stderr, expected) => {
    expect(mapYtDlpError(stderr)).toBe(expected);
  });
});

describe('FacebookExtractor', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'extractor-test-'));
  });

  afterEach(async () => {
    await fs.remove(outDir);
  });

  it('downloads the file and reads its cleaned metadata', async () => {
    const { runner, calls } = fakeRunner(['ok']);
    const extractor = new FacebookExtractor(OPTIONS, runner);

    const result = await extractor.download('https://www.facebook.com/watch/?v=123', outDir);

    expect(result).toEqual({
      filePath: path.join(outDir, 'My clip.123.mp4'),
      videoInfo: {
        id: '123',
        title: 'My clip',
        description: 'Original description',
        url: 'https://www.facebook.com/watch/?v=123',
        duration: 12.5,
        thumbnail: undefined,
        uploader: undefined,
      },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('yt-dlp');
    expect(calls[0]?.options).toEqual({ timeout: 1000 });
    expect(calls[0]?.args.slice(0, 8)).toEqual([
      '--no-playlist',
      '--geo-bypass',
      '-f',
      'best[ext=mp4]/best',
      '--write-info-json',
      '--no-write-playlist-metafiles',
      '-o',
      path.join(outDir, '%(title).80B.%(id)s.%(ext)s'),
    ]);
  });

  it('moves on to the next URL form when an attempt fails', async () => {
    const { runner, calls } = fakeRunner(['fail', 'ok']);
    const extractor = new FacebookExtractor(OPTIONS, runner);

    const result = await extractor.download('https://www.facebook.com/watch/?v=123', outDir);

    expect(result.videoInfo.title).toBe('My clip');
    expect(calls.map(target)).toEqual([
      'https://www.facebook.com/watch/?v=123',
      'https://m.facebook.com/watch/?v=123',
    ]);
  });

  it('classifies the failure after every attempt fails', async () => {
    const { runner, calls } = fakeRunner([], 'ERROR: This video is only available to logged in users');
    const extractor = new FacebookExtractor(OPTIONS, runner);

    const downloading = extractor.download('https://www.facebook.com/watch/?v=123', outDir);

    await expect(downloading).rejects.toBeInstanceOf(DownloadError);
    await expect(downloading).rejects.toMatchObject({ reason: ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED });
    expect(calls).toHaveLength(3);
  });

  it('retries with inline cookies written to the session directory', async () => {
    const { runner, calls } = fakeRunner(['fail', 'fail', 'fail', 'ok']);
    const extractor = new FacebookExtractor(OPTIONS, runner);

    await extractor.download('https://www.facebook.com/watch/?v=123', outDir, {
      cookies: { content: '# Netscape HTTP Cookie File\n' },
    });

    const cookiesPath = path.join(outDir, 'cookies.txt');
    expect(await fs.readFile(cookiesPath, 'utf8')).toBe('# Netscape HTTP Cookie File\n');
    expect(calls).toHaveLength(4);
    expect(calls[2]?.args).not.toContain('--cookies');
    const withCookies = calls[3]?.args ?? [];
    expect(withCookies[withCookies.indexOf('--cookies') + 1]).toBe(cookiesPath);
  });

  it('passes the geo-bypass country and verbose flag', async () => {
    const { runner, calls } = fakeRunner(['ok']);
    const extractor = new FacebookExtractor({ ...OPTIONS, geoBypassCountry: 'NL', verbose: true }, runner);

    await extractor.download('https://www.facebook.com/reel/123', outDir);

    const args = calls[0]?.args ?? [];
    expect(args[0]).toBe('-v');
    expect(args[args.indexOf('--geo-bypass-country') + 1]).toBe('NL');
  });

  it('fails when yt-dlp succeeds without leaving a media file', async () => {
    const { runner } = fakeRunner(['empty']);
    const extractor = new FacebookExtractor(OPTIONS, runner);

    await expect(extractor.download('https://www.facebook.com/reel/123', outDir)).rejects.toMatchObject({
      reason: ERROR_CODES.ERR_INTERNAL,
      message: 'Downloaded file not found',
    });
  });

  it('wraps an unexpected runner error', async () => {
    const extractor = new FacebookExtractor(OPTIONS, async () => {
      throw new Error('spawn yt-dlp ENOENT');
    });

    await expect(extractor.download('https://www.facebook.com/reel/123', outDir)).rejects.toMatchObject({
      code: ERROR_CODES.ERR_DOWNLOAD,
      reason: ERROR_CODES.ERR_INTERNAL,
      message: 'Unexpected error during download',
    });
  });

  it('lists the videos of a page as url and title pairs', async () => {
    const calls: string[][] = [];
    const extractor = new FacebookExtractor(OPTIONS, async (_command, args = []) => {
      calls.push(args);
      return {
        stdout: 'https://www.facebook.com/reel/1\nFirst | Page\nhttps://www.facebook.com/reel/2\n5 views | Second\n',
        stderr: '',
        code: 0,
        durationMs: 5,
      };
    });

    const videos = await extractor.listVideos('https://www.facebook.com/somepage/videos', { maxVideos: 2 });

    expect(videos).toEqual([
      { url: 'https://www.facebook.com/reel/1', title: 'First' },
      { url: 'https://www.facebook.com/reel/2', title: 'Second' },
    ]);
    expect(calls[0]).toEqual([
      '--flat-playlist',
      '--print',
      'url',
      '--print',
      'title',
      '--no-warnings',
      '--playlist-end',
      '2',
      'https://www.facebook.com/somepage/videos',
    ]);
  });
});
