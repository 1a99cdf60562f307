import { isAxiosError } from 'axios';
import { z } from 'zod';
import { AppError, AuthError, PublishError, QuotaError, TransferError } from '../../core/errors';

export type GraphPhase = 'start' | 'transfer' | 'finish' | 'account';

const graphErrorSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      type: z.string().optional(),
      code: z.number().optional(),
      error_subcode: z.number().optional(),
      is_transient: z.boolean().optional(),
      fbtrace_id: z.string().optional(),
    })
    .passthrough(),
});

export type GraphErrorBody = z.infer<typeof graphErrorSchema>['error'];

const QUOTA_CODES = [4, 17, 32, 341, 368, 613];
const TRANSIENT_CODES = [1, 2];

function isAuthCode(code: number | undefined): boolean {
  if (code === undefined) return false;
  return code === 102 || code === 190 || code === 10 || (code >= 200 && code <= 299);
}

export function parseGraphError(data: unknown): GraphErrorBody | null {
  const parsed = graphErrorSchema.safeParse(data);
  return parsed.success ? parsed.data.error : null;
}

/**
 * Maps a failed Graph API call onto the upload error taxonomy. Token and quota
 * problems keep their kind in every phase; everything else becomes a transfer or
 * publish failure depending on the phase.
 */
export function toGraphError(error: unknown, phase: GraphPhase): AppError {
  if (error instanceof AppError) return error;

  if (isAxiosError(error)) {
    const status = error.response?.status;
    const body = parseGraphError(error.response?.data);
    const message = body?.message ?? error.message;
    const details = { phase, status, graphCode: body?.code, subcode: body?.error_subcode, fbtraceId: body?.fbtrace_id };

    if (status === undefined) {
      // no response: connection reset, DNS, timeout
      return phase === 'finish'
        ? new PublishError(`Publish request failed: ${message}`, details)
        : new TransferError(`Network error during ${phase}: ${message}`, true, details);
    }
    if (isAuthCode(body?.code) || status === 401) {
      return new AuthError(message, details);
    }
    if ((body?.code !== undefined && QUOTA_CODES.includes(body.code)) || status === 429) {
      return new QuotaError(message, details);
    }
    if (status === 403) {
      return new AuthError(message, details);
    }

    const transient =
      body?.is_transient === true || status >= 500 || (body?.code !== undefined && TRANSIENT_CODES.includes(body.code));
    if (phase === 'finish') {
      return new PublishError(message, { ...details, transient });
    }
    return new TransferError(message, transient, details);
  }

  const message = error instanceof Error ? error.message : String(error);
  return phase === 'finish'
    ? new PublishError(message, { phase })
    : new TransferError(message, false, { phase });
}
