import type { Server } from 'http';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type Config, parseConfig } from '../core/config';
import { AuthError } from '../core/errors';
import { BatchRunner } from '../pipeline/batch';
import { Orchestrator, type VideoUploader, settingsFromConfig } from '../pipeline/orchestrator';
import type { DownloadResult, Extractor, PageVideo } from '../providers/types';
import { MemoryScheduledPostStore } from '../scheduler/memoryStore';
import { PostScheduler } from '../scheduler/scheduler';
import type { GraphAccount } from '../services/facebook/graph';
import type { UploadFileOptions, UploadResult } from '../services/upload/protocol';
import { createApp } from './server';

class InstantExtractor implements Extractor {
  async download(url: string, outDir: string): Promise<DownloadResult> {
    const filePath = path.join(outDir, 'Clip.1.mp4');
    await fs.writeFile(filePath, Buffer.alloc(32));
    return { filePath, videoInfo: { id: '1', title: 'Clip', description: 'From the video', url } };
  }

  async listVideos(): Promise<PageVideo[]> {
    return [];
  }
}

class InstantUploader implements VideoUploader {
  readonly titles: string[] = [];

  async uploadFile(_filePath: string, options: UploadFileOptions): Promise<UploadResult> {
    this.titles.push(options.title);
    return {
      ok: true,
      videoId: 'video-1',
      url: 'https://www.facebook.com/page-1/videos/video-1',
      title: options.title,
      description: options.description,
      bytes: 32,
      chunks: [{ start: 0, end: 32 }],
    };
  }
}

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('web API', () => {
  let dir: string;
  let config: Config;
  let uploader: InstantUploader;
  let account: () => Promise<GraphAccount>;
  let server: Server;
  let baseUrl: string;

  async function call(method: string, route: string, body?: unknown): Promise<{ status: number; body: Json }> {
    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await response.json();
    return { status: response.status, body: isJson(parsed) ? parsed : { value: parsed } };
  }

  async function waitForState(id: string, state: string): Promise<Json> {
    for (let i = 0; i < 100; i++) {
      const { body } = await call('GET', `/api/status/${id}`);
      if (body['state'] === state) return body;
      await sleep(10);
    }
    throw new Error(`Job ${id} never reached ${state}`);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'web-test-'));
    config = parseConfig({
      NODE_ENV: 'test',
      DOWNLOAD_DIR: path.join(dir, 'downloads'),
      FACEBOOK_ACCESS_TOKEN: 'test-secret',
      FACEBOOK_PAGE_ID: 'page-1',
      BATCH_MAX_URLS: '2',
    });
    uploader = new InstantUploader();
    account = async () => ({ id: 'page-1', name: 'Test Page' });

    const orchestrator = new Orchestrator(new InstantExtractor(), uploader, settingsFromConfig(config));
    const app = createApp({
      config,
      orchestrator,
      batches: new BatchRunner(orchestrator, 2),
      scheduler: new PostScheduler(new MemoryScheduledPostStore(), uploader, { accessToken: 'test-secret', maxAttempts: 3 }),
      checkConnection: () => account(),
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await fs.remove(dir);
  });

  it('answers health checks', async () => {
    await expect(call('GET', '/healthz')).resolves.toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('shows the configuration without the access token', async () => {
    const { status, body } = await call('GET', '/api/config');

    expect(status).toBe(200);
    expect(body).toMatchObject({ pageId: 'page-1', hasAccessToken: true, batchMaxUrls: 2 });
    expect(JSON.stringify(body)).not.toContain('test-secret');
  });

  it('rejects a URL that is not a Facebook video', async () => {
    const { status, body } = await call('POST', '/api/download', { url: 'https://example.com/video' });

    expect(status).toBe(400);
    expect(body).toMatchObject({
      code: 'ERR_INVALID_REQUEST',
      error: 'url: Please provide a valid Facebook video URL',
    });
  });

  it('rejects a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/api/download`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"url":',
    });

    expect(response.status).toBe(400);
  });

  it('runs a download job to published', async () => {
    const { status, body } = await call('POST', '/api/download', {
      url: 'https://www.facebook.com/reel/1',
      titlePrefix: '[Re] ',
    });
    expect(status).toBe(202);

    const job = await waitForState(String(body['id']), 'published');

    expect(job).toMatchObject({ type: 'job', url: 'https://www.facebook.com/reel/1' });
    expect(job['upload']).toMatchObject({ videoId: 'video-1', title: '[Re] Clip', description: 'From the video' });
  });

  it('previews, confirms and uploads a job held at downloaded', async () => {
    const { body } = await call('POST', '/api/download', { url: 'https://www.facebook.com/reel/1', upload: false });
    const id = String(body['id']);
    await waitForState(id, 'downloaded');

    const preview = await call('GET', `/api/jobs/${id}/preview`);
    expect(preview.body).toMatchObject({ jobId: id, title: 'Clip', description: 'From the video', sizeBytes: 32 });

    const confirm = await call('POST', `/api/jobs/${id}/upload`, { description: 'Edited' });
    expect(confirm.status).toBe(202);

    const job = await waitForState(id, 'published');
    expect(job['upload']).toMatchObject({ description: 'Edited' });
  });

  it('cancels a job held at downloaded', async () => {
    const { body } = await call('POST', '/api/download', { url: 'https://www.facebook.com/reel/1', upload: false });
    const id = String(body['id']);
    await waitForState(id, 'downloaded');

    const cancelled = await call('POST', `/api/jobs/${id}/cancel`);

    expect(cancelled.status).toBe(200);
    expect(cancelled.body).toMatchObject({ state: 'failed', failedStage: 'init' });
    expect(uploader.titles).toEqual([]);
  });

  it('returns 404 for unknown jobs', async () => {
    expect((await call('GET', '/api/status/missing')).status).toBe(404);
    expect((await call('POST', '/api/jobs/missing/upload', {})).body).toMatchObject({ code: 'ERR_NOT_FOUND' });
    expect((await call('POST', '/api/jobs/missing/cancel')).status).toBe(404);
  });

  it('refuses to preview a job that has not downloaded', async () => {
    const { body } = await call('POST', '/api/download', { url: 'https://www.facebook.com/reel/1' });
    const id = String(body['id']);
    await waitForState(id, 'published');

    const preview = await call('GET', `/api/jobs/${id}/preview`);

    expect(preview.status).toBe(409);
    expect(preview.body).toMatchObject({ code: 'ERR_JOB_STATE' });
  });

  it('runs a batch and reports it by id', async () => {
    const { status, body } = await call('POST', '/api/batch', {
      urls: ['https://www.facebook.com/reel/1', 'https://www.facebook.com/reel/2'],
    });
    expect(status).toBe(202);
    expect(body['jobIds']).toHaveLength(2);

    let summary: Json = {};
    for (let i = 0; i < 100 && summary['finished'] !== true; i++) {
      summary = (await call('GET', `/api/status/${String(body['id'])}`)).body;
      await sleep(10);
    }

    expect(summary).toMatchObject({ type: 'batch', total: 2, published: 2, failed: 0, finished: true });
  });

  it('limits the number of URLs in a batch', async () => {
    const { status, body } = await call('POST', '/api/batch', {
      urls: ['https://www.facebook.com/reel/1', 'https://www.facebook.com/reel/2', 'https://www.facebook.com/reel/3'],
    });

    expect(status).toBe(400);
    expect(body).toMatchObject({ code: 'ERR_INVALID_REQUEST' });
  });

  it('checks the Facebook connection', async () => {
    await expect(call('GET', '/api/facebook/check')).resolves.toEqual({
      status: 200,
      body: { ok: true, account: { id: 'page-1', name: 'Test Page' } },
    });

    account = async () => {
      throw new AuthError('Error validating access token');
    };
    const failed = await call('GET', '/api/facebook/check');
    expect(failed.status).toBe(401);
    expect(failed.body).toMatchObject({ code: 'ERR_AUTH', error: 'Error validating access token' });
  });

  it('schedules posts and lists them', async () => {
    const filePath = path.join(dir, 'video.mp4');
    await fs.writeFile(filePath, Buffer.alloc(8));
    const scheduledAt = new Date(Date.now() + 60 * 60 * 1000).toISOString();

    const past = await call('POST', '/api/schedule', { filePath, scheduledAt: '2020-01-01T00:00:00.000Z' });
    expect(past.status).toBe(400);

    const created = await call('POST', '/api/schedule', { filePath, title: 'Later', scheduledAt });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ filePath, title: 'Later', description: '', status: 'pending', scheduledAt });

    const listed = await call('GET', '/api/schedule');
    expect(listed.body['posts']).toHaveLength(1);
  });

  it('deletes a scheduled post', async () => {
    const filePath = path.join(dir, 'video.mp4');
    await fs.writeFile(filePath, Buffer.alloc(8));
    const scheduledAt = new Date(Date.now() + 60 * 60 * 1000).toISOString();
    const created = await call('POST', '/api/schedule', { filePath, scheduledAt });

    const deleted = await fetch(`${baseUrl}/api/schedule/${String(created.body['id'])}`, { method: 'DELETE' });
    expect(deleted.status).toBe(204);
    expect((await call('GET', '/api/schedule')).body['posts']).toEqual([]);

    const missing = await call('DELETE', `/api/schedule/${String(created.body['id'])}`);
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ code: 'ERR_NOT_FOUND' });
  });

  it('lists stored downloads', async () => {
    const { body } = await call('POST', '/api/download', { url: 'https://www.facebook.com/reel/1', upload: false });
    await waitForState(String(body['id']), 'downloaded');

    const listed = await call('GET', '/api/downloads');

    expect(listed.body['files']).toEqual([expect.objectContaining({ name: 'Clip.1.mp4', sizeBytes: 32 })]);
  });
});
