import cron, { type ScheduledTask } from 'node-cron';
import * as fs from 'fs-extra';
import { AppError, ERROR_CODES, isRetryable } from '../core/errors';
import { logger } from '../core/logger';
import type { VideoUploader } from '../pipeline/orchestrator';
import type { NewScheduledPost, ScheduledPost, ScheduledPostStore } from './types';

export interface SchedulerSettings {
  accessToken: string;
  maxAttempts: number;
}

/** Publishes scheduled posts once their time comes, checking every minute. */
export class PostScheduler {
  private task: ScheduledTask | null = null;
  private ticking = false;

  constructor(
    private readonly store: ScheduledPostStore,
    private readonly uploader: VideoUploader,
    private readonly settings: SchedulerSettings,
    private readonly now: () => Date = () => new Date()
  ) {}

  async schedule(input: NewScheduledPost): Promise<ScheduledPost> {
    if (!(await fs.pathExists(input.filePath))) {
      throw new AppError(ERROR_CODES.ERR_FILE_NOT_FOUND, 'Video file not found', { filePath: input.filePath });
    }
    if (input.scheduledAt.getTime() <= this.now().getTime()) {
      throw new AppError(ERROR_CODES.ERR_INVALID_REQUEST, 'Scheduled time must be in the future', {
        scheduledAt: input.scheduledAt.toISOString(),
      });
    }
    const post = await this.store.create(input);
    logger.info({ postId: post.id, scheduledAt: post.scheduledAt.toISOString() }, 'Post scheduled');
    return post;
  }

  list(): Promise<ScheduledPost[]> {
    return this.store.list();
  }

  async remove(id: string): Promise<void> {
    const removed = await this.store.remove(id);
    if (!removed) {
      throw new AppError(ERROR_CODES.ERR_NOT_FOUND, `Scheduled post ${id} not found`, { id });
    }
    logger.info({ postId: id }, 'Scheduled post deleted');
  }

  /** Publishes every due post, one at a time. Returns the posts handled in this tick. */
  async tick(): Promise<ScheduledPost[]> {
    if (this.ticking) {
      logger.debug('Previous scheduler tick still running, skipping');
      return [];
    }
    this.ticking = true;
    try {
      const due = await this.store.due(this.now());
      const handled: ScheduledPost[] = [];
      for (const post of due) {
        const claimed = await this.store.claim(post.id);
        if (!claimed) continue;
        const result = await this.publish(claimed);
        if (result) handled.push(result);
      }
      return handled;
    } finally {
      this.ticking = false;
    }
  }

  private async publish(post: ScheduledPost): Promise<ScheduledPost | null> {
    logger.info({ postId: post.id, title: post.title.slice(0, 50) }, 'Processing scheduled post');

    if (!(await fs.pathExists(post.filePath))) {
      return this.store.update(post.id, {
        status: 'failed',
        attempts: post.attempts + 1,
        errorMessage: `Video file not found: ${post.filePath}`,
      });
    }

    const result = await this.uploader.uploadFile(post.filePath, {
      title: post.title,
      description: post.description,
      accessToken: this.settings.accessToken,
    });
    const attempts = post.attempts + 1;

    if (result.ok) {
      logger.info({ postId: post.id, videoId: result.videoId }, 'Scheduled post published');
      return this.store.update(post.id, {
        status: 'published',
        attempts,
        videoId: result.videoId,
        videoUrl: result.url,
        errorMessage: null,
      });
    }

    const retry = isRetryable(result.error) && attempts < this.settings.maxAttempts;
    logger.warn(
      { postId: post.id, stage: result.stage, code: result.error.code, attempts, retry },
      'Scheduled post upload failed'
    );
    return this.store.update(post.id, {
      status: retry ? 'pending' : 'failed',
      attempts,
      errorMessage: `${result.stage}: ${result.error.message}`,
    });
  }

  start(): void {
    if (this.task) return;
    this.task = cron.schedule('* * * * *', () => {
      this.tick().catch((error: unknown) => logger.error({ error }, 'Scheduler tick failed'));
    });
    logger.info('Post scheduler started');
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    logger.info('Post scheduler stopped');
  }
}
