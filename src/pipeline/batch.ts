import { ConcurrencyLimiter } from '../core/rateLimit';
import { logger } from '../core/logger';
import type { BatchSummary } from './jobs';
import type { DownloadJob, Orchestrator } from './orchestrator';

export interface StartedBatch {
  batchId: string;
  jobIds: string[];
  completion: Promise<BatchSummary>;
}

/**
 * Runs jobs with bounded parallelism. A failed job is recorded and the batch moves on;
 * nothing short of process shutdown aborts the remaining jobs.
 */
export class BatchRunner {
  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly concurrency: number
  ) {}

  start(jobs: DownloadJob[], signal?: AbortSignal): StartedBatch {
    const tracker = this.orchestrator.tracker;
    const { batchId, jobs: records } = tracker.createBatch(jobs.map((job) => job.url));
    const limiter = new ConcurrencyLimiter(this.concurrency);
    jobs.forEach((job, index) => {
      const record = records[index];
      if (record) this.orchestrator.enqueue(job, record.id);
    });

    logger.info({ batchId, total: jobs.length, concurrency: this.concurrency }, 'Batch started');

    const runs = jobs.map((job, index) => {
      const record = records[index];
      if (!record) return Promise.resolve();
      return limiter
        .run(() => this.orchestrator.process(job, { jobId: record.id, signal }))
        .then(
          (result) => logger.info({ batchId, jobId: result.id, state: result.state }, 'Batch item finished'),
          (error: unknown) => logger.error({ batchId, jobId: record.id, error }, 'Batch item crashed')
        );
    });

    const completion = Promise.all(runs).then(() => {
      const summary = tracker.getBatch(batchId);
      if (!summary) throw new Error(`Batch ${batchId} disappeared before completion`);
      logger.info(
        { batchId, published: summary.published, downloaded: summary.downloaded, failed: summary.failed },
        'Batch finished'
      );
      return summary;
    });

    return { batchId, jobIds: records.map((record) => record.id), completion };
  }

  run(jobs: DownloadJob[], signal?: AbortSignal): Promise<BatchSummary> {
    return this.start(jobs, signal).completion;
  }
}
