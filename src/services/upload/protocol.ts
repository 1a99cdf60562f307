import * as fs from 'fs-extra';
import {
  AppError,
  AuthError,
  CancelledError,
  ERROR_CODES,
  IncompleteUploadError,
  PublishError,
  SessionBusyError,
  SessionClosedError,
  TransferError,
  isRetryable,
  toAppError,
} from '../../core/errors';
import { logger } from '../../core/logger';
import { withRetry } from '../../core/retry';
import type { GraphAccount, GraphApi } from '../facebook/graph';
import { type ChunkRecord, UploadSession } from './session';

export type UploadStage = 'init' | 'transfer' | 'publish';

export type UploadResult =
  | {
      ok: true;
      videoId: string;
      url: string;
      title: string;
      description: string;
      bytes: number;
      chunks: ChunkRecord[];
    }
  | {
      ok: false;
      stage: UploadStage;
      error: AppError;
      chunks: ChunkRecord[];
    };

export interface UploadProtocolOptions {
  pageId: string;
  /** Retries of a failed chunk at the same offset, on top of the first attempt. */
  maxTransferRetries: number;
  retryDelayMs: number;
  /** Chunk size used when the remote side does not ask for a specific range. */
  chunkSize: number;
  /** Client-side session lifetime; sessions older than this are treated as expired. */
  sessionTtlMs?: number;
  now?: () => number;
}

export interface UploadFileOptions {
  title: string;
  description: string;
  accessToken: string;
  signal?: AbortSignal | undefined;
  onProgress?: ((transferred: number, total: number) => void) | undefined;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}

/**
 * Sequencing and failure policy for the resumable upload: one session, strictly
 * ordered chunks, publish only after the declared size has been acknowledged.
 */
export class UploadProtocol {
  constructor(
    private readonly api: GraphApi,
    private readonly options: UploadProtocolOptions
  ) {}

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  /** Opens a session for `fileSize` bytes. Auth and quota failures surface without retry. */
  async initiate(fileSize: number, accessToken: string): Promise<UploadSession> {
    if (!accessToken) {
      throw new AuthError('No Facebook access token configured');
    }
    if (!Number.isInteger(fileSize) || fileSize <= 0) {
      throw new AppError(ERROR_CODES.ERR_INTERNAL, `Cannot upload a file of ${fileSize} bytes`, { fileSize });
    }

    const started = await this.api.startUpload(accessToken, fileSize);
    const session = new UploadSession(
      started.sessionId,
      started.videoId,
      fileSize,
      accessToken,
      started.startOffset,
      started.endOffset,
      this.now()
    );
    logger.info({ sessionId: session.sessionId, videoId: session.videoId, fileSize }, 'Upload session initiated');
    return session;
  }

  private assertUsable(session: UploadSession): void {
    const ttl = this.options.sessionTtlMs;
    if (ttl !== undefined && session.state === 'open' && this.now() - session.createdAt > ttl) {
      session.state = 'expired';
    }
    if (session.isTerminal) {
      throw new SessionClosedError(session.sessionId, session.state);
    }
    if (session.state === 'transferring') {
      throw new SessionBusyError(session.sessionId);
    }
  }

  /**
   * Sends `bytes` at `offset` and returns the next offset the remote side expects.
   * Retryable failures are retried at the same offset; the session keeps its last
   * acknowledged offset when the error finally surfaces, so the caller can resume.
   */
  async transferChunk(session: UploadSession, offset: number, bytes: Buffer): Promise<number> {
    this.assertUsable(session);

    if (offset !== session.nextOffset) {
      throw new TransferError(`Chunk offset ${offset} does not match expected offset ${session.nextOffset}`, false, {
        sessionId: session.sessionId,
        offset,
        expected: session.nextOffset,
      });
    }
    if (bytes.length === 0) {
      throw new TransferError('Refusing to send an empty chunk', false, { sessionId: session.sessionId, offset });
    }
    if (offset + bytes.length > session.declaredSize) {
      throw new TransferError(
        `Chunk ends at ${offset + bytes.length}, past declared size ${session.declaredSize}`,
        false,
        { sessionId: session.sessionId, offset, length: bytes.length }
      );
    }

    session.state = 'transferring';
    try {
      const window = await withRetry(
        () => this.api.transferChunk(session.accessToken, session.sessionId, offset, bytes),
        {
          maxAttempts: this.options.maxTransferRetries + 1,
          baseDelayMs: this.options.retryDelayMs,
          isRetryable,
          onRetry: (attempt, err) =>
            logger.warn(
              { sessionId: session.sessionId, offset, attempt, error: err instanceof Error ? err.message : String(err) },
              'Chunk transfer failed, retrying at same offset'
            ),
        }
      );

      if (window.startOffset < session.nextOffset || window.startOffset > session.declaredSize) {
        throw new TransferError(`Remote reported invalid next offset ${window.startOffset}`, false, {
          sessionId: session.sessionId,
          offset,
          window,
        });
      }
      if (window.startOffset > offset) {
        session.chunks.push({ start: offset, end: window.startOffset });
      }
      session.nextOffset = window.startOffset;
      session.requestedEndOffset = window.endOffset;
      logger.debug(
        { sessionId: session.sessionId, nextOffset: session.nextOffset, declaredSize: session.declaredSize },
        'Chunk acknowledged'
      );
      return session.nextOffset;
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new TransferError(error instanceof Error ? error.message : String(error), false, {
        sessionId: session.sessionId,
        offset,
      });
    } finally {
      session.state = 'open';
    }
  }

  /** Publishes a fully transferred session and returns the video id. */
  async publish(session: UploadSession, title: string, description: string): Promise<string> {
    this.assertUsable(session);
    if (!session.isComplete) {
      throw new IncompleteUploadError(session.nextOffset, session.declaredSize);
    }

    const success = await this.api.finishUpload(session.accessToken, session.sessionId, title, description);
    if (!success) {
      throw new PublishError('Facebook did not confirm the publish', { sessionId: session.sessionId });
    }
    session.state = 'published';
    logger.info({ sessionId: session.sessionId, videoId: session.videoId }, 'Video published');
    return session.videoId;
  }

  videoUrl(videoId: string): string {
    return `https://www.facebook.com/${this.options.pageId}/videos/${videoId}`;
  }

  private nextChunkLength(session: UploadSession): number {
    const remaining = session.declaredSize - session.nextOffset;
    const requested = session.requestedEndOffset - session.nextOffset;
    return Math.min(requested > 0 ? requested : this.options.chunkSize, remaining);
  }

  /** Runs init, transfer and publish over a file on disk, reporting the stage that failed. */
  async uploadFile(filePath: string, options: UploadFileOptions): Promise<UploadResult> {
    let stage: UploadStage = 'init';
    let session: UploadSession | undefined;

    try {
      throwIfAborted(options.signal);
      if (!(await fs.pathExists(filePath))) {
        throw new AppError(ERROR_CODES.ERR_FILE_NOT_FOUND, 'Video file not found', { filePath });
      }
      const { size } = await fs.stat(filePath);
      session = await this.initiate(size, options.accessToken);

      stage = 'transfer';
      const fd = await fs.open(filePath, 'r');
      try {
        let stalled = 0;
        while (!session.isComplete) {
          throwIfAborted(options.signal);
          const length = this.nextChunkLength(session);
          const buffer = Buffer.alloc(length);
          const { bytesRead } = await fs.read(fd, buffer, 0, length, session.nextOffset);
          if (bytesRead === 0) {
            throw new TransferError('File ended before the declared size was sent', false, {
              filePath,
              offset: session.nextOffset,
            });
          }

          const before = session.nextOffset;
          await this.transferChunk(session, before, buffer.subarray(0, bytesRead));
          stalled = session.nextOffset === before ? stalled + 1 : 0;
          if (stalled > this.options.maxTransferRetries) {
            throw new TransferError('Remote side stopped advancing the upload offset', false, {
              sessionId: session.sessionId,
              offset: before,
            });
          }
          options.onProgress?.(session.nextOffset, session.declaredSize);
        }
      } finally {
        await fs.close(fd);
      }

      throwIfAborted(options.signal);
      stage = 'publish';
      const videoId = await this.publish(session, options.title, options.description);
      return {
        ok: true,
        videoId,
        url: this.videoUrl(videoId),
        title: options.title,
        description: options.description,
        bytes: session.declaredSize,
        chunks: session.chunks.map((chunk) => ({ ...chunk })),
      };
    } catch (error) {
      const appError = toAppError(error);
      logger.error(
        { filePath, stage, code: appError.code, message: appError.message, sessionId: session?.sessionId },
        'Upload failed'
      );
      return {
        ok: false,
        stage,
        error: appError,
        chunks: session ? session.chunks.map((chunk) => ({ ...chunk })) : [],
      };
    }
  }

  async checkConnection(accessToken: string): Promise<GraphAccount> {
    if (!accessToken) {
      throw new AuthError('No Facebook access token configured');
    }
    return this.api.getAccount(accessToken);
  }
}
