import type {
  NewScheduledPost,
  ScheduledPost,
  ScheduledPostPatch,
  ScheduledPostStatus,
  ScheduledPostStore,
} from './types';

function copy(post: ScheduledPost): ScheduledPost {
  return {
    ...post,
    scheduledAt: new Date(post.scheduledAt),
    createdAt: new Date(post.createdAt),
    updatedAt: new Date(post.updatedAt),
  };
}

/** Used when DATABASE_URL is not set. Posts do not survive a restart. */
export class MemoryScheduledPostStore implements ScheduledPostStore {
  private readonly posts = new Map<string, ScheduledPost>();
  private nextId = 1;

  async create(input: NewScheduledPost): Promise<ScheduledPost> {
    const now = new Date();
    const post: ScheduledPost = {
      id: String(this.nextId++),
      ...input,
      status: 'pending',
      attempts: 0,
      videoId: null,
      videoUrl: null,
      errorMessage: null,
      createdAt: now,
      updatedAt: now,
    };
    this.posts.set(post.id, post);
    return copy(post);
  }

  async list(status?: ScheduledPostStatus): Promise<ScheduledPost[]> {
    return [...this.posts.values()]
      .filter((post) => !status || post.status === status)
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime())
      .map(copy);
  }

  async due(now: Date): Promise<ScheduledPost[]> {
    const pending = await this.list('pending');
    return pending.filter((post) => post.scheduledAt.getTime() <= now.getTime());
  }

  async claim(id: string): Promise<ScheduledPost | null> {
    const post = this.posts.get(id);
    if (!post || post.status !== 'pending') return null;
    post.status = 'processing';
    post.updatedAt = new Date();
    return copy(post);
  }

  async update(id: string, patch: ScheduledPostPatch): Promise<ScheduledPost | null> {
    const post = this.posts.get(id);
    if (!post) return null;
    Object.assign(post, patch, { updatedAt: new Date() });
    return copy(post);
  }

  async remove(id: string): Promise<boolean> {
    return this.posts.delete(id);
  }
}
