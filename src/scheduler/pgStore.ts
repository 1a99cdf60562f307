import { Pool } from 'pg';
import type { Config } from '../core/config';
import { logger } from '../core/logger';
import type {
  NewScheduledPost,
  ScheduledPost,
  ScheduledPostPatch,
  ScheduledPostStatus,
  ScheduledPostStore,
} from './types';

const COLUMNS = `
  id::text AS id,
  file_path,
  title,
  description,
  scheduled_at,
  status,
  attempts,
  video_id,
  video_url,
  error_message,
  created_at,
  updated_at
`;

const INSERT_QUERY = `
  INSERT INTO scheduled_posts (file_path, title, description, scheduled_at)
  VALUES ($1, $2, $3, $4)
  RETURNING ${COLUMNS}
`;

const LIST_QUERY = `SELECT ${COLUMNS} FROM scheduled_posts ORDER BY scheduled_at ASC`;

const LIST_BY_STATUS_QUERY = `SELECT ${COLUMNS} FROM scheduled_posts WHERE status = $1 ORDER BY scheduled_at ASC`;

const DUE_QUERY = `
  SELECT ${COLUMNS}
  FROM scheduled_posts
  WHERE status = 'pending' AND scheduled_at <= $1
  ORDER BY scheduled_at ASC
`;

const CLAIM_QUERY = `
  UPDATE scheduled_posts
  SET status = 'processing', updated_at = NOW()
  WHERE id = $1 AND status = 'pending'
  RETURNING ${COLUMNS}
`;

const UPDATE_QUERY = `
  UPDATE scheduled_posts
  SET
    status = COALESCE($2, status),
    attempts = COALESCE($3, attempts),
    video_id = CASE WHEN $4::boolean THEN $5 ELSE video_id END,
    video_url = CASE WHEN $6::boolean THEN $7 ELSE video_url END,
    error_message = CASE WHEN $8::boolean THEN $9 ELSE error_message END,
    updated_at = NOW()
  WHERE id = $1
  RETURNING ${COLUMNS}
`;

const DELETE_QUERY = `DELETE FROM scheduled_posts WHERE id = $1`;

interface ScheduledPostRow {
  id: string;
  file_path: string;
  title: string;
  description: string;
  scheduled_at: Date;
  status: ScheduledPostStatus;
  attempts: number;
  video_id: string | null;
  video_url: string | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
}

function toPost(row: ScheduledPostRow): ScheduledPost {
  return {
    id: row.id,
    filePath: row.file_path,
    title: row.title,
    description: row.description,
    scheduledAt: row.scheduled_at,
    status: row.status,
    attempts: row.attempts,
    videoId: row.video_id,
    videoUrl: row.video_url,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPool(config: Config): Pool {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    min: config.DB_POOL_MIN,
    max: config.DB_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (error) => {
    logger.error({ error }, 'Unexpected error on idle PostgreSQL client');
  });

  logger.info({ min: config.DB_POOL_MIN, max: config.DB_POOL_MAX }, 'PostgreSQL pool initialized');
  return pool;
}

/** Scheduled posts in the `scheduled_posts` table (see migrations/). */
export class PgScheduledPostStore implements ScheduledPostStore {
  constructor(private readonly pool: Pool) {}

  async create(input: NewScheduledPost): Promise<ScheduledPost> {
    const result = await this.pool.query<ScheduledPostRow>(INSERT_QUERY, [
      input.filePath,
      input.title,
      input.description,
      input.scheduledAt,
    ]);
    const row = result.rows[0];
    if (!row) throw new Error('INSERT into scheduled_posts returned no row');
    return toPost(row);
  }

  async list(status?: ScheduledPostStatus): Promise<ScheduledPost[]> {
    const result = status
      ? await this.pool.query<ScheduledPostRow>(LIST_BY_STATUS_QUERY, [status])
      : await this.pool.query<ScheduledPostRow>(LIST_QUERY);
    return result.rows.map(toPost);
  }

  async due(now: Date): Promise<ScheduledPost[]> {
    const result = await this.pool.query<ScheduledPostRow>(DUE_QUERY, [now]);
    return result.rows.map(toPost);
  }

  async claim(id: string): Promise<ScheduledPost | null> {
    const result = await this.pool.query<ScheduledPostRow>(CLAIM_QUERY, [id]);
    const row = result.rows[0];
    return row ? toPost(row) : null;
  }

  async update(id: string, patch: ScheduledPostPatch): Promise<ScheduledPost | null> {
    const result = await this.pool.query<ScheduledPostRow>(UPDATE_QUERY, [
      id,
      patch.status ?? null,
      patch.attempts ?? null,
      'videoId' in patch,
      patch.videoId ?? null,
      'videoUrl' in patch,
      patch.videoUrl ?? null,
      'errorMessage' in patch,
      patch.errorMessage ?? null,
    ]);
    const row = result.rows[0];
    return row ? toPost(row) : null;
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.pool.query(DELETE_QUERY, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
