import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../core/logger';
import { infoJsonSchema, type InfoJson } from './facebook/types';

const MEDIA_EXTENSIONS = ['.mp4', '.mkv', '.webm', '.mov', '.avi'];

export async function findDownloadedFile(outDir: string): Promise<string | null> {
  try {
    const files = await fs.readdir(outDir);
    const candidates = files.filter((f) => MEDIA_EXTENSIONS.includes(path.extname(f).toLowerCase()));
    if (candidates.length === 0) {
      logger.warn({ outDir }, 'No media files found in session directory');
      return null;
    }
    const stats = await Promise.all(
      candidates.map(async (f) => {
        const p = path.join(outDir, f);
        const st = await fs.stat(p);
        return { p, mtime: st.mtime };
      })
    );
    stats.sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
    return stats[0]?.p ?? null;
  } catch (e) {
    logger.error({ error: e, outDir }, 'findDownloadedFile failed');
    return null;
  }
}

export function infoJsonPath(mediaPath: string): string {
  const ext = path.extname(mediaPath);
  return `${mediaPath.slice(0, mediaPath.length - ext.length)}.info.json`;
}

/** Reads the `.info.json` yt-dlp wrote next to a media file; null when absent or unreadable. */
export async function readInfoJson(mediaPath: string): Promise<InfoJson | null> {
  const jsonPath = infoJsonPath(mediaPath);
  if (!(await fs.pathExists(jsonPath))) {
    logger.warn({ jsonPath }, 'No metadata file found');
    return null;
  }
  try {
    const raw: unknown = await fs.readJson(jsonPath);
    const parsed = infoJsonSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ jsonPath, issues: parsed.error.issues.length }, 'Metadata file has unexpected shape');
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.warn({ jsonPath, error }, 'Error reading metadata file');
    return null;
  }
}

/** Title from a `%(title)s.%(id)s.%(ext)s` file name. */
export function titleFromFileName(filePath: string): { id: string; title: string } {
  const fileName = path.basename(filePath);
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  const parts = base.split('.');
  const id = parts.length > 1 ? parts[parts.length - 1] || 'unknown' : 'unknown';
  let title = parts.length > 1 ? base.slice(0, base.length - id.length - 1) : base;
  if (title.length > 100) title = title.slice(0, 100) + '...';
  return { id, title };
}
