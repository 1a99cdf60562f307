export type ScheduledPostStatus = 'pending' | 'processing' | 'published' | 'failed';

export interface ScheduledPost {
  id: string;
  filePath: string;
  title: string;
  description: string;
  scheduledAt: Date;
  status: ScheduledPostStatus;
  attempts: number;
  videoId: string | null;
  videoUrl: string | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewScheduledPost {
  filePath: string;
  title: string;
  description: string;
  scheduledAt: Date;
}

export type ScheduledPostPatch = Partial<
  Pick<ScheduledPost, 'status' | 'attempts' | 'videoId' | 'videoUrl' | 'errorMessage'>
>;

export interface ScheduledPostStore {
  create(input: NewScheduledPost): Promise<ScheduledPost>;
  list(status?: ScheduledPostStatus): Promise<ScheduledPost[]>;
  /** Pending posts whose time has come, oldest first. */
  due(now: Date): Promise<ScheduledPost[]>;
  /** Moves a pending post to processing; null when another worker got there first. */
  claim(id: string): Promise<ScheduledPost | null>;
  update(id: string, patch: ScheduledPostPatch): Promise<ScheduledPost | null>;
  remove(id: string): Promise<boolean>;
}
