import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../core/logger';

export const MIGRATIONS_DIR = path.join(__dirname, '../../migrations');

/** The part of a pg Pool or Client the migrations need. */
export interface Queryable {
  query(sql: string): Promise<unknown>;
}

/**
 * Runs every `.sql` file in `dir` in file-name order. The scripts are written to be
 * idempotent (`IF NOT EXISTS`), so this is safe on every start.
 */
export async function runMigrations(db: Queryable, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = (await fs.readdir(dir)).filter((file) => file.endsWith('.sql')).sort();

  for (const file of files) {
    const sql = await fs.readFile(path.join(dir, file), 'utf-8');
    logger.info({ migration: file }, 'Executing migration');
    try {
      await db.query(sql);
    } catch (error) {
      logger.error({ migration: file, error }, 'Migration failed');
      throw error;
    }
  }

  logger.info({ count: files.length }, 'Migrations completed');
  return files;
}
