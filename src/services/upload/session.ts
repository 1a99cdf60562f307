export type SessionState = 'open' | 'transferring' | 'published' | 'expired';

export interface ChunkRecord {
  start: number;
  end: number;
}

/**
 * Client-side view of a remote upload session. Only {@link UploadProtocol} mutates it.
 */
export class UploadSession {
  state: SessionState = 'open';
  nextOffset: number;
  /** End of the byte range the remote side asked for next. */
  requestedEndOffset: number;
  readonly chunks: ChunkRecord[] = [];

  constructor(
    readonly sessionId: string,
    readonly videoId: string,
    readonly declaredSize: number,
    readonly accessToken: string,
    startOffset: number,
    endOffset: number,
    readonly createdAt: number = Date.now()
  ) {
    this.nextOffset = startOffset;
    this.requestedEndOffset = endOffset;
  }

  get transferredBytes(): number {
    return this.chunks.reduce((sum, chunk) => sum + (chunk.end - chunk.start), 0);
  }

  get isComplete(): boolean {
    return this.nextOffset === this.declaredSize;
  }

  get isTerminal(): boolean {
    return this.state === 'published' || this.state === 'expired';
  }

  /** A plain snapshot without the access token, for logs and API responses. */
  toJSON() {
    return {
      sessionId: this.sessionId,
      videoId: this.videoId,
      declaredSize: this.declaredSize,
      nextOffset: this.nextOffset,
      state: this.state,
      chunks: this.chunks.map((chunk) => ({ ...chunk })),
    };
  }
}
