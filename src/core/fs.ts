import * as fs from 'fs-extra';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { logger } from './logger';

export async function ensureDownloadDir(baseDir: string): Promise<void> {
  try {
    await fs.ensureDir(baseDir);
    logger.debug({ dir: baseDir }, 'Download directory ensured');
  } catch (error) {
    logger.error({ error, dir: baseDir }, 'Failed to ensure download directory');
    throw error;
  }
}

export async function makeSessionDir(baseDir: string): Promise<string> {
  const sessionId = `session_${Date.now()}_${randomBytes(6).toString('hex')}`;
  const sessionDir = path.join(baseDir, sessionId);

  try {
    await fs.ensureDir(sessionDir);
    logger.debug({ sessionDir }, 'Session directory created');
    return sessionDir;
  } catch (error) {
    logger.error({ error, sessionDir }, 'Failed to create session directory');
    throw error;
  }
}

/** Removes a path if it exists. Cleanup only: failures are logged, not thrown. */
export async function safeRemove(pathToRemove: string): Promise<void> {
  if (!pathToRemove) return;
  try {
    const exists = await fs.pathExists(pathToRemove);
    if (exists) {
      await fs.remove(pathToRemove);
      logger.debug({ path: pathToRemove }, 'Path removed successfully');
    }
  } catch (error) {
    logger.error({ error, path: pathToRemove }, 'Failed to remove path');
  }
}

export interface StoredFile {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: string;
}

const MEDIA_EXTENSIONS = ['.mp4', '.mkv', '.webm', '.mov', '.avi'];

/** Lists media files kept under the download directory, newest first. */
export async function listStoredFiles(baseDir: string): Promise<StoredFile[]> {
  const exists = await fs.pathExists(baseDir);
  if (!exists) return [];

  const found: StoredFile[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (MEDIA_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
        const st = await fs.stat(fullPath);
        found.push({ name: entry.name, path: fullPath, sizeBytes: st.size, modifiedAt: st.mtime.toISOString() });
      }
    }
  };
  await walk(baseDir);

  return found.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt));
}
