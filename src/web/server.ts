import type { Server } from 'http';
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cron from 'node-cron';
import { z } from 'zod';
import { type Config, publicConfig } from '../core/config';
import { AppError, ERROR_CODES, type ErrorCode, toUserMessage } from '../core/errors';
import { listStoredFiles } from '../core/fs';
import { logger } from '../core/logger';
import type { BatchRunner } from '../pipeline/batch';
import type { DownloadJob, Orchestrator } from '../pipeline/orchestrator';
import { isFacebookUrl } from '../providers';
import type { CookieSource } from '../providers/types';
import type { PostScheduler } from '../scheduler/scheduler';
import type { GraphAccount } from '../services/facebook/graph';

export interface ServerDeps {
  config: Config;
  orchestrator: Orchestrator;
  batches: BatchRunner;
  scheduler: PostScheduler;
  checkConnection: (accessToken: string) => Promise<GraphAccount>;
}

const facebookUrl = z
  .string()
  .trim()
  .refine(isFacebookUrl, { message: 'Please provide a valid Facebook video URL' });

const uploadOptions = {
  cookies: z.string().optional(),
  titlePrefix: z.string().max(200).optional(),
  description: z.string().max(5000).optional(),
  upload: z.boolean().optional(),
};

const downloadSchema = z.object({ url: facebookUrl, ...uploadOptions });

const confirmSchema = z.object({
  titlePrefix: z.string().max(200).optional(),
  description: z.string().max(5000).optional(),
});

const scheduleSchema = z.object({
  filePath: z.string().min(1),
  title: z.string().default(''),
  description: z.string().default(''),
  scheduledAt: z.coerce.date(),
});

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ERROR_CODES.ERR_INVALID_REQUEST]: 400,
  [ERROR_CODES.ERR_AUTH]: 401,
  [ERROR_CODES.ERR_NOT_FOUND]: 404,
  [ERROR_CODES.ERR_FILE_NOT_FOUND]: 404,
  [ERROR_CODES.ERR_JOB_STATE]: 409,
  [ERROR_CODES.ERR_QUOTA]: 429,
  [ERROR_CODES.ERR_INTERNAL]: 500,
};

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const message = result.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; ');
    throw new AppError(ERROR_CODES.ERR_INVALID_REQUEST, message);
  }
  return result.data;
}

function toCookies(content: string | undefined): CookieSource | undefined {
  return content && content.trim().length > 0 ? { content } : undefined;
}

const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export function createApp(deps: ServerDeps): express.Express {
  const { config, orchestrator, batches, scheduler } = deps;
  const tracker = orchestrator.tracker;

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/config', (_req, res) => {
    res.json(publicConfig(config));
  });

  app.post(
    '/api/download',
    asyncHandler(async (req, res) => {
      const body = parseBody(downloadSchema, req.body);
      const job: DownloadJob = {
        url: body.url,
        cookies: toCookies(body.cookies),
        titlePrefix: body.titlePrefix,
        description: body.description,
        upload: body.upload,
      };
      const record = orchestrator.enqueue(job);
      logger.info({ jobId: record.id, url: job.url }, 'Download requested');

      orchestrator.process(job, { jobId: record.id }).catch((error: unknown) => {
        logger.error({ jobId: record.id, error }, 'Unexpected job error');
      });

      res.status(202).json({ id: record.id });
    })
  );

  app.post(
    '/api/batch',
    asyncHandler(async (req, res) => {
      const body = parseBody(
        z.object({ urls: z.array(facebookUrl).min(1).max(config.BATCH_MAX_URLS), ...uploadOptions }),
        req.body
      );
      const jobs: DownloadJob[] = body.urls.map((url) => ({
        url,
        cookies: toCookies(body.cookies),
        titlePrefix: body.titlePrefix,
        description: body.description,
        upload: body.upload,
      }));
      const started = batches.start(jobs);
      started.completion.catch((error: unknown) => {
        logger.error({ batchId: started.batchId, error }, 'Batch crashed');
      });

      res.status(202).json({ id: started.batchId, jobIds: started.jobIds });
    })
  );

  app.get('/api/status/:id', (req, res) => {
    const id = req.params['id'] ?? '';
    const job = tracker.get(id);
    if (job) {
      res.json({ type: 'job', ...job });
      return;
    }
    const batch = tracker.getBatch(id);
    if (batch) {
      res.json({ type: 'batch', ...batch });
      return;
    }
    res.status(404).json({ error: 'Not found' });
  });

  app.get('/api/jobs/:id/preview', (req, res) => {
    res.json(orchestrator.preview(req.params['id'] ?? ''));
  });

  app.post(
    '/api/jobs/:id/upload',
    asyncHandler(async (req, res) => {
      const id = req.params['id'] ?? '';
      const body = parseBody(confirmSchema, req.body);
      const record = tracker.require(id);
      if (record.state !== 'downloaded') {
        throw new AppError(ERROR_CODES.ERR_JOB_STATE, `Job is ${record.state}, not downloaded`);
      }

      orchestrator.uploadDownloaded(id, body).catch((error: unknown) => {
        logger.error({ jobId: id, error }, 'Confirmed upload failed to start');
      });
      res.status(202).json(tracker.require(id));
    })
  );

  app.post(
    '/api/jobs/:id/cancel',
    asyncHandler(async (req, res) => {
      const id = req.params['id'] ?? '';
      const cancelled = await orchestrator.cancel(id);
      if (!cancelled) {
        res.status(404).json({ error: 'No active job with this id' });
        return;
      }
      res.json(tracker.require(id));
    })
  );

  app.get(
    '/api/downloads',
    asyncHandler(async (_req, res) => {
      res.json({ files: await listStoredFiles(config.DOWNLOAD_DIR) });
    })
  );

  app.get(
    '/api/facebook/check',
    asyncHandler(async (_req, res) => {
      const account = await deps.checkConnection(config.FACEBOOK_ACCESS_TOKEN);
      res.json({ ok: true, account });
    })
  );

  app.get(
    '/api/schedule',
    asyncHandler(async (_req, res) => {
      res.json({ posts: await scheduler.list() });
    })
  );

  app.post(
    '/api/schedule',
    asyncHandler(async (req, res) => {
      const body = parseBody(scheduleSchema, req.body);
      const post = await scheduler.schedule(body);
      res.status(201).json(post);
    })
  );

  app.delete(
    '/api/schedule/:id',
    asyncHandler(async (req, res) => {
      await scheduler.remove(req.params['id'] ?? '');
      res.status(204).end();
    })
  );

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      const status = STATUS_BY_CODE[error.code] ?? 400;
      logger.warn({ path: req.path, code: error.code, message: error.message }, 'Request failed');
      res.status(status).json({ error: error.message, code: error.code, message: toUserMessage(error) });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body', code: ERROR_CODES.ERR_INVALID_REQUEST });
      return;
    }
    logger.error({ path: req.path, error }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/** Starts listening and, every 15 minutes, expires and prunes jobs older than JOB_TTL_MINUTES. */
export function startServer(deps: ServerDeps): Server {
  const { config, orchestrator } = deps;
  const ttlMs = config.JOB_TTL_MINUTES * 60 * 1000;

  const cleanup = cron.schedule('*/15 * * * *', () => {
    orchestrator
      .prune(ttlMs)
      .then(({ removed }) => {
        if (removed > 0) logger.info({ removed }, 'Pruned finished jobs');
      })
      .catch((error: unknown) => logger.error({ error }, 'Job cleanup failed'));
  });

  const server = createApp(deps).listen(config.PORT, () => {
    logger.info({ port: config.PORT }, 'Web server started');
  });
  server.on('close', () => cleanup.stop());
  return server;
}
