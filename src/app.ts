import type { Pool } from 'pg';
import type { Config } from './core/config';
import { logger } from './core/logger';
import { BatchRunner } from './pipeline/batch';
import { JobTracker } from './pipeline/jobs';
import { Orchestrator, settingsFromConfig } from './pipeline/orchestrator';
import { createExtractor } from './providers';
import { MemoryScheduledPostStore } from './scheduler/memoryStore';
import { runMigrations } from './scheduler/migrate';
import { PgScheduledPostStore, createPool } from './scheduler/pgStore';
import { PostScheduler } from './scheduler/scheduler';
import type { ScheduledPostStore } from './scheduler/types';
import { GraphVideoClient } from './services/facebook/graph';
import { UploadProtocol } from './services/upload/protocol';

export interface Services {
  config: Config;
  protocol: UploadProtocol;
  orchestrator: Orchestrator;
  batches: BatchRunner;
  scheduler: PostScheduler;
  /** Creates the scheduled posts table when PostgreSQL is configured. */
  migrate(): Promise<void>;
  close(): Promise<void>;
}

/** Wires the extractor, Graph client and pipeline from one validated config. */
export function createServices(config: Config): Services {
  const graph = new GraphVideoClient({
    graphUrl: config.FACEBOOK_GRAPH_URL,
    pageId: config.FACEBOOK_PAGE_ID,
  });
  const protocol = new UploadProtocol(graph, {
    pageId: config.FACEBOOK_PAGE_ID,
    maxTransferRetries: config.TRANSFER_MAX_RETRIES,
    retryDelayMs: config.TRANSFER_RETRY_DELAY_MS,
    chunkSize: config.UPLOAD_CHUNK_BYTES,
  });

  const orchestrator = new Orchestrator(createExtractor(config), protocol, settingsFromConfig(config), new JobTracker());
  const batches = new BatchRunner(orchestrator, config.BATCH_CONCURRENCY);

  let pool: Pool | null = null;
  let store: ScheduledPostStore;
  if (config.DATABASE_URL) {
    pool = createPool(config);
    store = new PgScheduledPostStore(pool);
  } else {
    logger.info('DATABASE_URL not set, scheduled posts are kept in memory');
    store = new MemoryScheduledPostStore();
  }
  const scheduler = new PostScheduler(store, protocol, {
    accessToken: config.FACEBOOK_ACCESS_TOKEN,
    maxAttempts: config.SCHEDULER_MAX_ATTEMPTS,
  });

  return {
    config,
    protocol,
    orchestrator,
    batches,
    scheduler,
    async migrate() {
      if (pool) await runMigrations(pool);
    },
    async close() {
      scheduler.stop();
      if (pool) {
        await pool.end();
        logger.info('PostgreSQL pool closed');
      }
    },
  };
}
