import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuthError, ERROR_CODES, TransferError } from '../core/errors';
import type { VideoUploader } from '../pipeline/orchestrator';
import type { UploadFileOptions, UploadResult } from '../services/upload/protocol';
import { MemoryScheduledPostStore } from './memoryStore';
import { PostScheduler } from './scheduler';

const START = new Date('2026-03-01T10:00:00.000Z');

class ScriptedUploader implements VideoUploader {
  readonly calls: Array<{ filePath: string; options: UploadFileOptions }> = [];
  results: UploadResult[] = [];

  async uploadFile(filePath: string, options: UploadFileOptions): Promise<UploadResult> {
    this.calls.push({ filePath, options });
    return (
      this.results.shift() ?? {
        ok: true,
        videoId: 'video-1',
        url: 'https://www.facebook.com/page-1/videos/video-1',
        title: options.title,
        description: options.description,
        bytes: 10,
        chunks: [{ start: 0, end: 10 }],
      }
    );
  }
}

describe('PostScheduler', () => {
  let dir: string;
  let filePath: string;
  let now: Date;
  let store: MemoryScheduledPostStore;
  let uploader: ScriptedUploader;
  let scheduler: PostScheduler;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scheduler-test-'));
    filePath = path.join(dir, 'video.mp4');
    await fs.writeFile(filePath, Buffer.alloc(10));
    now = START;
    store = new MemoryScheduledPostStore();
    uploader = new ScriptedUploader();
    scheduler = new PostScheduler(store, uploader, { accessToken: 'test-token', maxAttempts: 2 }, () => now);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const inMinutes = (minutes: number) => new Date(START.getTime() + minutes * 60 * 1000);

  it('only accepts posts for an existing file in the future', async () => {
    await expect(
      scheduler.schedule({ filePath: path.join(dir, 'missing.mp4'), title: '', description: '', scheduledAt: inMinutes(5) })
    ).rejects.toMatchObject({ code: ERROR_CODES.ERR_FILE_NOT_FOUND });
    await expect(
      scheduler.schedule({ filePath, title: '', description: '', scheduledAt: inMinutes(-1) })
    ).rejects.toMatchObject({ code: ERROR_CODES.ERR_INVALID_REQUEST });

    const post = await scheduler.schedule({ filePath, title: 'Later', description: 'Soon', scheduledAt: inMinutes(5) });
    expect(post).toMatchObject({ status: 'pending', attempts: 0, title: 'Later' });
  });

  it('deletes a post so it is never published', async () => {
    const post = await scheduler.schedule({ filePath, title: 'Gone', description: '', scheduledAt: inMinutes(5) });

    await scheduler.remove(post.id);
    now = inMinutes(10);

    await expect(scheduler.tick()).resolves.toEqual([]);
    expect(uploader.calls).toHaveLength(0);
    await expect(scheduler.remove(post.id)).rejects.toMatchObject({ code: ERROR_CODES.ERR_NOT_FOUND });
  });

  it('publishes posts once they are due', async () => {
    const early = await scheduler.schedule({ filePath, title: 'First', description: 'One', scheduledAt: inMinutes(5) });
    const late = await scheduler.schedule({ filePath, title: 'Second', description: 'Two', scheduledAt: inMinutes(30) });

    now = inMinutes(10);
    const handled = await scheduler.tick();

    expect(handled.map((post) => [post.id, post.status])).toEqual([[early.id, 'published']]);
    expect(handled[0]).toMatchObject({
      attempts: 1,
      videoId: 'video-1',
      videoUrl: 'https://www.facebook.com/page-1/videos/video-1',
      errorMessage: null,
    });
    expect(uploader.calls).toEqual([
      { filePath, options: { title: 'First', description: 'One', accessToken: 'test-token' } },
    ]);
    expect((await store.list('pending')).map((post) => post.id)).toEqual([late.id]);
  });

  it('puts a post back after a retryable failure until attempts run out', async () => {
    await scheduler.schedule({ filePath, title: '', description: '', scheduledAt: inMinutes(1) });
    const failure: UploadResult = {
      ok: false,
      stage: 'transfer',
      error: new TransferError('connection reset', true),
      chunks: [],
    };
    uploader.results = [failure, failure];
    now = inMinutes(2);

    const [first] = await scheduler.tick();
    expect(first).toMatchObject({ status: 'pending', attempts: 1, errorMessage: 'transfer: connection reset' });

    const [second] = await scheduler.tick();
    expect(second).toMatchObject({ status: 'failed', attempts: 2 });
  });

  it('fails a post at once on a non-retryable error', async () => {
    await scheduler.schedule({ filePath, title: '', description: '', scheduledAt: inMinutes(1) });
    uploader.results = [{ ok: false, stage: 'init', error: new AuthError('Invalid OAuth access token'), chunks: [] }];
    now = inMinutes(2);

    const [post] = await scheduler.tick();

    expect(post).toMatchObject({ status: 'failed', attempts: 1, errorMessage: 'init: Invalid OAuth access token' });
  });

  it('fails a post whose file disappeared', async () => {
    await scheduler.schedule({ filePath, title: '', description: '', scheduledAt: inMinutes(1) });
    await fs.remove(filePath);
    now = inMinutes(2);

    const [post] = await scheduler.tick();

    expect(post).toMatchObject({ status: 'failed', errorMessage: `Video file not found: ${filePath}` });
    expect(uploader.calls).toHaveLength(0);
  });
});
