import type { Config } from '../core/config';
import { AppError, CancelledError, DownloadError, ERROR_CODES, JobStateError, toAppError } from '../core/errors';
import { ensureDownloadDir, makeSessionDir, safeRemove } from '../core/fs';
import { logger } from '../core/logger';
import { ensureBelowLimit } from '../core/size';
import type { CookieSource, DownloadResult, Extractor } from '../providers/types';
import type { UploadFileOptions, UploadResult } from '../services/upload/protocol';
import { type FailedStage, type JobRecord, JobTracker } from './jobs';
import { composePost, type PostText } from './metadata';

/** The part of the upload protocol the orchestrator drives. */
export interface VideoUploader {
  uploadFile(filePath: string, options: UploadFileOptions): Promise<UploadResult>;
}

export interface PipelineSettings {
  accessToken: string;
  autoUpload: boolean;
  maxUploadBytes: number;
  defaultTitlePrefix: string;
  defaultDescription: string;
  downloadDir: string;
  keepDownloads: boolean;
}

export function settingsFromConfig(config: Config): PipelineSettings {
  return {
    accessToken: config.FACEBOOK_ACCESS_TOKEN,
    autoUpload: config.AUTO_UPLOAD,
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    defaultTitlePrefix: config.DEFAULT_TITLE_PREFIX,
    defaultDescription: config.DEFAULT_DESCRIPTION,
    downloadDir: config.DOWNLOAD_DIR,
    keepDownloads: config.KEEP_DOWNLOADS,
  };
}

export interface DownloadJob {
  url: string;
  cookies?: CookieSource | undefined;
  titlePrefix?: string | undefined;
  description?: string | undefined;
  /** Overrides the configured auto-upload toggle for this job. */
  upload?: boolean | undefined;
}

export interface ProcessOptions {
  /** Record to drive; a new one is created when omitted. */
  jobId?: string;
  signal?: AbortSignal | undefined;
}

export interface JobPreview extends PostText {
  jobId: string;
  filePath: string;
  sizeBytes: number;
  thumbnail?: string | undefined;
  duration?: number | undefined;
}

interface JobEntry {
  job: DownloadJob;
  controller: AbortController;
  /** Whether a process/uploadDownloaded call is currently driving the job. */
  running: boolean;
  sessionDir?: string;
  download?: DownloadResult & { sizeBytes: number };
}

/**
 * Drives one job through download and upload:
 * pending -> downloading -> downloaded -> uploading -> published, or failed at a stage.
 */
export class Orchestrator {
  private readonly entries = new Map<string, JobEntry>();

  constructor(
    private readonly extractor: Extractor,
    private readonly uploader: VideoUploader,
    private readonly settings: PipelineSettings,
    readonly tracker: JobTracker = new JobTracker()
  ) {}

  /**
   * Registers a job so it can be cancelled before it starts. With `jobId` the tracker
   * record already exists (batches create theirs up front).
   */
  enqueue(job: DownloadJob, jobId?: string): JobRecord {
    const record = jobId ? this.tracker.require(jobId) : this.tracker.create(job.url);
    if (record.state === 'pending' && !this.entries.has(record.id)) {
      this.entries.set(record.id, { job, controller: new AbortController(), running: false });
    }
    return record;
  }

  /** Runs a job to a terminal state, or to `downloaded` when upload is off. Never rejects for job failures. */
  async process(job: DownloadJob, options: ProcessOptions = {}): Promise<JobRecord> {
    const record = this.enqueue(job, options.jobId);
    if (record.state === 'failed') {
      logger.info({ jobId: record.id }, 'Job cancelled before it started');
      return record;
    }
    const entry = this.entries.get(record.id);
    if (record.state !== 'pending' || !entry || entry.running) {
      throw new JobStateError(record.state, 'downloading');
    }
    entry.job = job;
    entry.running = true;
    const { controller } = entry;

    const onAbort = () => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const downloaded = await this.runDownload(record.id, entry);
      if (!downloaded) return this.tracker.require(record.id);

      const shouldUpload = job.upload ?? this.settings.autoUpload;
      if (!shouldUpload) {
        logger.info({ jobId: record.id }, 'Upload disabled for job, waiting at downloaded');
        return this.tracker.require(record.id);
      }
      return await this.runUpload(record.id, entry);
    } finally {
      entry.running = false;
      options.signal?.removeEventListener('abort', onAbort);
      await this.settle(record.id);
    }
  }

  /** Continues a job that stopped at `downloaded`, with optional new title prefix or description. */
  async uploadDownloaded(jobId: string, overrides: Pick<DownloadJob, 'titlePrefix' | 'description'> = {}): Promise<JobRecord> {
    const record = this.tracker.require(jobId);
    const entry = this.entries.get(jobId);
    if (record.state !== 'downloaded' || !entry || entry.running) {
      throw new JobStateError(record.state, 'uploading');
    }
    if (overrides.titlePrefix !== undefined) entry.job.titlePrefix = overrides.titlePrefix;
    if (overrides.description !== undefined) entry.job.description = overrides.description;

    entry.running = true;
    try {
      return await this.runUpload(jobId, entry);
    } finally {
      entry.running = false;
      await this.settle(jobId);
    }
  }

  preview(jobId: string): JobPreview {
    const record = this.tracker.require(jobId);
    const entry = this.entries.get(jobId);
    if (record.state !== 'downloaded' || !entry?.download) {
      throw new AppError(ERROR_CODES.ERR_JOB_STATE, `Job ${jobId} has no downloaded video to preview`, {
        state: record.state,
      });
    }
    const { videoInfo, filePath, sizeBytes } = entry.download;
    return {
      jobId,
      filePath,
      sizeBytes,
      thumbnail: videoInfo.thumbnail,
      duration: videoInfo.duration,
      ...this.compose(entry),
    };
  }

  /**
   * Requests cancellation. A running job stops at its next stage or chunk boundary.
   * A job still queued fails at `download`, one waiting at `downloaded` fails at `init`.
   */
  async cancel(jobId: string): Promise<boolean> {
    const entry = this.entries.get(jobId);
    const record = this.tracker.get(jobId);
    if (!entry || !record) return false;

    entry.controller.abort();
    if (!entry.running) {
      if (record.state === 'pending') this.tracker.fail(jobId, 'download', new CancelledError());
      if (record.state === 'downloaded') this.tracker.fail(jobId, 'init', new CancelledError());
      await this.settle(jobId);
    }
    logger.info({ jobId, state: record.state }, 'Job cancellation requested');
    return true;
  }

  /**
   * Fails jobs left at `downloaded` for longer than `maxAgeMs`, releasing their files,
   * then drops finished jobs of the same age from the tracker.
   */
  async prune(maxAgeMs: number): Promise<{ expired: number; removed: number }> {
    const stale = this.tracker.olderThan('downloaded', maxAgeMs);
    let expired = 0;
    for (const record of stale) {
      const entry = this.entries.get(record.id);
      if (entry?.running) continue;
      this.tracker.fail(
        record.id,
        'init',
        new AppError(ERROR_CODES.ERR_CANCELLED, 'Upload was not confirmed in time')
      );
      await this.settle(record.id);
      expired++;
    }
    if (expired > 0) logger.info({ expired }, 'Expired unconfirmed downloads');
    return { expired, removed: this.tracker.prune(maxAgeMs) };
  }

  private checkpoint(entry: JobEntry): void {
    if (entry.controller.signal.aborted) throw new CancelledError();
  }

  private compose(entry: JobEntry): PostText {
    if (!entry.download) {
      throw new AppError(ERROR_CODES.ERR_JOB_STATE, 'No downloaded video');
    }
    return composePost(entry.download.videoInfo, entry.job, this.settings);
  }

  private async runDownload(jobId: string, entry: JobEntry): Promise<boolean> {
    try {
      this.checkpoint(entry);
      this.tracker.transition(jobId, 'downloading', 'Downloading video...');

      await ensureDownloadDir(this.settings.downloadDir);
      entry.sessionDir = await makeSessionDir(this.settings.downloadDir);

      let result: DownloadResult;
      try {
        result = await this.extractor.download(entry.job.url, entry.sessionDir, { cookies: entry.job.cookies });
      } catch (error) {
        if (error instanceof AppError) throw error;
        throw new DownloadError(ERROR_CODES.ERR_INTERNAL, error instanceof Error ? error.message : String(error));
      }

      const sizeBytes = await ensureBelowLimit(result.filePath, this.settings.maxUploadBytes);
      this.checkpoint(entry);
      entry.download = { ...result, sizeBytes };
      this.tracker.transition(jobId, 'downloaded', 'Downloaded', {
        download: { filePath: result.filePath, sizeBytes, videoInfo: result.videoInfo },
      });
      return true;
    } catch (error) {
      this.failJob(jobId, 'download', error);
      return false;
    }
  }

  private async runUpload(jobId: string, entry: JobEntry): Promise<JobRecord> {
    try {
      this.checkpoint(entry);
    } catch (error) {
      this.failJob(jobId, 'init', error);
      return this.tracker.require(jobId);
    }

    const download = entry.download;
    if (!download) {
      this.failJob(jobId, 'init', new AppError(ERROR_CODES.ERR_FILE_NOT_FOUND, 'No downloaded file to upload'));
      return this.tracker.require(jobId);
    }

    const post = this.compose(entry);
    this.tracker.transition(jobId, 'uploading', 'Uploading to Facebook...');
    const result = await this.uploader.uploadFile(download.filePath, {
      ...post,
      accessToken: this.settings.accessToken,
      signal: entry.controller.signal,
      onProgress: (transferred, total) => this.tracker.setProgress(jobId, transferred, total),
    });

    if (!result.ok) {
      this.failJob(jobId, result.stage, result.error);
      return this.tracker.require(jobId);
    }

    return this.tracker.transition(jobId, 'published', 'Published to Facebook', {
      upload: {
        videoId: result.videoId,
        url: result.url,
        title: result.title,
        description: result.description,
        bytes: result.bytes,
        chunks: result.chunks,
      },
    });
  }

  private failJob(jobId: string, stage: FailedStage, error: unknown): void {
    const appError = toAppError(error);
    logger.warn({ jobId, stage, code: appError.code, message: appError.message }, 'Job failed');
    this.tracker.fail(jobId, stage, appError);
  }

  /** Releases a job that reached a terminal state. */
  private async settle(jobId: string): Promise<void> {
    const record = this.tracker.get(jobId);
    const entry = this.entries.get(jobId);
    if (!record || !entry) return;
    if (record.state !== 'published' && record.state !== 'failed') return;

    this.entries.delete(jobId);
    const downloadFailed = record.state === 'failed' && record.failedStage === 'download';
    if (entry.sessionDir && (downloadFailed || !this.settings.keepDownloads)) {
      await safeRemove(entry.sessionDir);
    }
  }
}
