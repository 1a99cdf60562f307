import * as fs from 'fs-extra';
import { AppError, ERROR_CODES, FileTooLargeError } from './errors';
import { logger } from './logger';

export function bytesToMB(bytes: number): number {
  return bytes / (1024 * 1024);
}

/** Returns the file size in bytes, or throws when the file is missing or above `maxBytes`. */
export async function ensureBelowLimit(filePath: string, maxBytes: number): Promise<number> {
  const exists = await fs.pathExists(filePath);
  if (!exists) {
    throw new AppError(ERROR_CODES.ERR_FILE_NOT_FOUND, 'File not found for size check', { filePath });
  }

  const stats = await fs.stat(filePath);
  logger.debug(
    { filePath, sizeBytes: stats.size, sizeMB: bytesToMB(stats.size), maxMB: bytesToMB(maxBytes) },
    'File size check'
  );

  if (stats.size > maxBytes) {
    logger.warn({ filePath, sizeBytes: stats.size, maxBytes }, 'File exceeds size limit');
    throw new FileTooLargeError(stats.size, maxBytes);
  }
  return stats.size;
}
