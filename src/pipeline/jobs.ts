import { randomBytes } from 'crypto';
import { AppError, ERROR_CODES, JobStateError, toUserMessage } from '../core/errors';
import { logger } from '../core/logger';
import type { VideoInfo } from '../providers/types';
import type { ChunkRecord } from '../services/upload/session';
import type { UploadStage } from '../services/upload/protocol';

export type JobState = 'pending' | 'downloading' | 'downloaded' | 'uploading' | 'published' | 'failed';
export type FailedStage = 'download' | UploadStage;

const TRANSITIONS: Record<JobState, JobState[]> = {
  pending: ['downloading', 'failed'],
  downloading: ['downloaded', 'failed'],
  downloaded: ['uploading', 'failed'],
  uploading: ['published', 'failed'],
  published: [],
  failed: [],
};

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface JobError {
  code: string;
  message: string;
  userMessage: string;
}

export interface JobRecord {
  id: string;
  batchId?: string | undefined;
  url: string;
  state: JobState;
  failedStage?: FailedStage | undefined;
  message: string;
  error?: JobError | undefined;
  download?: { filePath: string; sizeBytes: number; videoInfo: VideoInfo } | undefined;
  upload?:
    | { videoId: string; url: string; title: string; description: string; bytes: number; chunks: ChunkRecord[] }
    | undefined;
  progress?: { transferred: number; total: number } | undefined;
  history: Array<{ state: JobState; at: string }>;
  createdAt: string;
  updatedAt: string;
}

export interface BatchSummary {
  id: string;
  total: number;
  pending: number;
  published: number;
  downloaded: number;
  failed: number;
  finished: boolean;
  items: JobRecord[];
}

type JobPatch = Partial<Pick<JobRecord, 'download' | 'upload' | 'progress'>>;

function isTerminal(state: JobState): boolean {
  return TRANSITIONS[state].length === 0;
}

function newId(): string {
  return randomBytes(8).toString('hex');
}

/** In-memory job and batch status, polled by the web API. */
export class JobTracker {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly batches = new Map<string, string[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(url: string, batchId?: string): JobRecord {
    const at = this.now().toISOString();
    const record: JobRecord = {
      id: newId(),
      batchId,
      url,
      state: 'pending',
      message: 'Queued',
      history: [{ state: 'pending', at }],
      createdAt: at,
      updatedAt: at,
    };
    this.jobs.set(record.id, record);
    return this.snapshot(record);
  }

  createBatch(urls: string[]): { batchId: string; jobs: JobRecord[] } {
    const batchId = newId();
    const jobs = urls.map((url) => this.create(url, batchId));
    this.batches.set(
      batchId,
      jobs.map((job) => job.id)
    );
    return { batchId, jobs };
  }

  get(id: string): JobRecord | undefined {
    const record = this.jobs.get(id);
    return record ? this.snapshot(record) : undefined;
  }

  require(id: string): JobRecord {
    const record = this.get(id);
    if (!record) throw new AppError(ERROR_CODES.ERR_NOT_FOUND, `Job ${id} not found`, { id });
    return record;
  }

  list(): JobRecord[] {
    return [...this.jobs.values()].map((record) => this.snapshot(record));
  }

  transition(id: string, to: JobState, message: string, patch: JobPatch = {}): JobRecord {
    const record = this.jobs.get(id);
    if (!record) throw new AppError(ERROR_CODES.ERR_NOT_FOUND, `Job ${id} not found`, { id });
    if (!canTransition(record.state, to)) {
      throw new JobStateError(record.state, to);
    }

    const at = this.now().toISOString();
    Object.assign(record, patch);
    record.state = to;
    record.message = message;
    record.updatedAt = at;
    record.history.push({ state: to, at });
    logger.debug({ jobId: id, state: to }, 'Job state changed');
    return this.snapshot(record);
  }

  fail(id: string, stage: FailedStage, error: AppError): JobRecord {
    const record = this.jobs.get(id);
    if (!record) throw new AppError(ERROR_CODES.ERR_NOT_FOUND, `Job ${id} not found`, { id });
    if (isTerminal(record.state)) {
      throw new JobStateError(record.state, 'failed');
    }
    record.failedStage = stage;
    record.error = { code: error.code, message: error.message, userMessage: toUserMessage(error) };
    return this.transition(id, 'failed', `Failed at ${stage}: ${error.message}`);
  }

  setProgress(id: string, transferred: number, total: number): void {
    const record = this.jobs.get(id);
    if (!record) return;
    record.progress = { transferred, total };
    record.message = `Uploading ${Math.floor((transferred / total) * 100)}%`;
    record.updatedAt = this.now().toISOString();
  }

  getBatch(batchId: string): BatchSummary | undefined {
    const ids = this.batches.get(batchId);
    if (!ids) return undefined;

    const items = ids.flatMap((id) => {
      const record = this.jobs.get(id);
      return record ? [this.snapshot(record)] : [];
    });
    const count = (state: JobState) => items.filter((item) => item.state === state).length;
    const published = count('published');
    const failed = count('failed');
    const downloaded = count('downloaded');

    return {
      id: batchId,
      total: ids.length,
      pending: items.length - published - failed - downloaded,
      published,
      downloaded,
      failed,
      finished: items.every((item) => isTerminal(item.state) || item.state === 'downloaded'),
      items,
    };
  }

  /** Jobs in `state` last updated more than `maxAgeMs` ago. */
  olderThan(state: JobState, maxAgeMs: number): JobRecord[] {
    const cutoff = this.now().getTime() - maxAgeMs;
    return [...this.jobs.values()]
      .filter((record) => record.state === state && Date.parse(record.updatedAt) < cutoff)
      .map((record) => this.snapshot(record));
  }

  /** Drops finished jobs (and emptied batches) last updated more than `maxAgeMs` ago. */
  prune(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const [id, record] of this.jobs.entries()) {
      if (isTerminal(record.state) && Date.parse(record.updatedAt) < cutoff) {
        this.jobs.delete(id);
        removed++;
      }
    }
    for (const [batchId, ids] of this.batches.entries()) {
      if (ids.every((id) => !this.jobs.has(id))) this.batches.delete(batchId);
    }
    return removed;
  }

  private snapshot(record: JobRecord): JobRecord {
    return structuredClone(record);
  }
}
