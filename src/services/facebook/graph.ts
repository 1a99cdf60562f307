import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { z } from 'zod';
import { logger } from '../../core/logger';
import { toGraphError } from './errors';

export const DEFAULT_GRAPH_URL = 'https://graph.facebook.com/v18.0';

// Graph returns offsets as decimal strings
const offset = z.union([z.string(), z.number()]).pipe(z.coerce.number().int().min(0));

const startResponseSchema = z.object({
  upload_session_id: z.union([z.string(), z.number()]).transform(String),
  video_id: z.union([z.string(), z.number()]).transform(String),
  start_offset: offset,
  end_offset: offset,
});

const transferResponseSchema = z.object({
  start_offset: offset,
  end_offset: offset,
});

const finishResponseSchema = z.object({
  success: z.boolean(),
});

const accountSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
});

export interface StartedUpload {
  sessionId: string;
  videoId: string;
  startOffset: number;
  endOffset: number;
}

/** The byte range the remote side expects next; equal offsets mean it expects nothing more. */
export interface OffsetWindow {
  startOffset: number;
  endOffset: number;
}

export interface GraphAccount {
  id: string;
  name?: string | undefined;
}

/** The three-phase resumable video upload endpoints, plus an identity check. */
export interface GraphApi {
  startUpload(accessToken: string, fileSize: number): Promise<StartedUpload>;
  transferChunk(accessToken: string, sessionId: string, startOffset: number, chunk: Buffer): Promise<OffsetWindow>;
  finishUpload(accessToken: string, sessionId: string, title: string, description: string): Promise<boolean>;
  getAccount(accessToken: string): Promise<GraphAccount>;
}

export interface GraphClientOptions {
  graphUrl?: string;
  pageId: string;
  timeoutMs?: number;
  transferTimeoutMs?: number;
}

export class GraphVideoClient implements GraphApi {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: GraphClientOptions,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: (options.graphUrl ?? DEFAULT_GRAPH_URL).replace(/\/$/, ''),
        timeout: options.timeoutMs ?? 30000,
      });
  }

  private get videosPath(): string {
    return `/${encodeURIComponent(this.options.pageId)}/videos`;
  }

  async startUpload(accessToken: string, fileSize: number): Promise<StartedUpload> {
    const payload = new URLSearchParams();
    payload.append('upload_phase', 'start');
    payload.append('file_size', String(fileSize));
    payload.append('access_token', accessToken);

    try {
      const response = await this.http.post<unknown>(this.videosPath, payload);
      const data = startResponseSchema.parse(response.data);
      logger.debug({ sessionId: data.upload_session_id, videoId: data.video_id }, 'Graph upload session started');
      return {
        sessionId: data.upload_session_id,
        videoId: data.video_id,
        startOffset: data.start_offset,
        endOffset: data.end_offset,
      };
    } catch (error) {
      throw toGraphError(error, 'start');
    }
  }

  async transferChunk(accessToken: string, sessionId: string, startOffset: number, chunk: Buffer): Promise<OffsetWindow> {
    const form = new FormData();
    form.append('upload_phase', 'transfer');
    form.append('upload_session_id', sessionId);
    form.append('start_offset', String(startOffset));
    form.append('access_token', accessToken);
    form.append('video_file_chunk', chunk, { filename: 'chunk.bin', contentType: 'application/octet-stream' });

    try {
      const response = await this.http.post<unknown>(this.videosPath, form, {
        headers: form.getHeaders(),
        maxContentLength: Infinity,
        maxBodyLength: Infinity,
        timeout: this.options.transferTimeoutMs ?? 5 * 60 * 1000,
      });
      const data = transferResponseSchema.parse(response.data);
      return { startOffset: data.start_offset, endOffset: data.end_offset };
    } catch (error) {
      throw toGraphError(error, 'transfer');
    }
  }

  async finishUpload(accessToken: string, sessionId: string, title: string, description: string): Promise<boolean> {
    const payload = new URLSearchParams();
    payload.append('upload_phase', 'finish');
    payload.append('upload_session_id', sessionId);
    payload.append('access_token', accessToken);
    if (title) payload.append('title', title);
    if (description) payload.append('description', description);

    try {
      const response = await this.http.post<unknown>(this.videosPath, payload, { timeout: 60000 });
      return finishResponseSchema.parse(response.data).success;
    } catch (error) {
      throw toGraphError(error, 'finish');
    }
  }

  async getAccount(accessToken: string): Promise<GraphAccount> {
    try {
      const response = await this.http.get<unknown>('/me', {
        params: { access_token: accessToken, fields: 'id,name' },
        timeout: 10000,
      });
      return accountSchema.parse(response.data);
    } catch (error) {
      throw toGraphError(error, 'account');
    }
  }
}
