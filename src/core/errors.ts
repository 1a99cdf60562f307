export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

export const ERROR_CODES = {
  ERR_AUTH: 'ERR_AUTH',
  ERR_QUOTA: 'ERR_QUOTA',
  ERR_TRANSFER: 'ERR_TRANSFER',
  ERR_INCOMPLETE_UPLOAD: 'ERR_INCOMPLETE_UPLOAD',
  ERR_PUBLISH: 'ERR_PUBLISH',
  ERR_SESSION_STATE: 'ERR_SESSION_STATE',
  ERR_DOWNLOAD: 'ERR_DOWNLOAD',
  ERR_PRIVATE_OR_RESTRICTED: 'ERR_PRIVATE_OR_RESTRICTED',
  ERR_GEO_BLOCKED: 'ERR_GEO_BLOCKED',
  ERR_TOO_LARGE: 'ERR_TOO_LARGE',
  ERR_FETCH_FAILED: 'ERR_FETCH_FAILED',
  ERR_UNSUPPORTED_URL: 'ERR_UNSUPPORTED_URL',
  ERR_FILE_NOT_FOUND: 'ERR_FILE_NOT_FOUND',
  ERR_CANCELLED: 'ERR_CANCELLED',
  ERR_JOB_STATE: 'ERR_JOB_STATE',
  ERR_NOT_FOUND: 'ERR_NOT_FOUND',
  ERR_INVALID_REQUEST: 'ERR_INVALID_REQUEST',
  ERR_INTERNAL: 'ERR_INTERNAL',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export type ExtractorFailure =
  | typeof ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED
  | typeof ERROR_CODES.ERR_GEO_BLOCKED
  | typeof ERROR_CODES.ERR_FETCH_FAILED
  | typeof ERROR_CODES.ERR_UNSUPPORTED_URL
  | typeof ERROR_CODES.ERR_INTERNAL;

/** Missing, expired or insufficient access token. The user must reconfigure. */
export class AuthError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ERROR_CODES.ERR_AUTH, message, details);
    this.name = 'AuthError';
  }
}

export class QuotaError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ERROR_CODES.ERR_QUOTA, message, details);
    this.name = 'QuotaError';
  }
}

export class TransferError extends AppError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    details?: unknown
  ) {
    super(ERROR_CODES.ERR_TRANSFER, message, details);
    this.name = 'TransferError';
  }
}

export class IncompleteUploadError extends AppError {
  constructor(
    public readonly transferred: number,
    public readonly declaredSize: number
  ) {
    super(
      ERROR_CODES.ERR_INCOMPLETE_UPLOAD,
      `Cannot publish: ${transferred} of ${declaredSize} bytes transferred`,
      { transferred, declaredSize }
    );
    this.name = 'IncompleteUploadError';
  }
}

export class PublishError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ERROR_CODES.ERR_PUBLISH, message, details);
    this.name = 'PublishError';
  }
}

export class SessionBusyError extends AppError {
  constructor(sessionId: string) {
    super(ERROR_CODES.ERR_SESSION_STATE, `Upload session ${sessionId} already has a transfer in flight`, { sessionId });
    this.name = 'SessionBusyError';
  }
}

export class SessionClosedError extends AppError {
  constructor(sessionId: string, state: string) {
    super(ERROR_CODES.ERR_SESSION_STATE, `Upload session ${sessionId} is ${state}`, { sessionId, state });
    this.name = 'SessionClosedError';
  }
}

export class DownloadError extends AppError {
  constructor(
    public readonly reason: ExtractorFailure,
    message: string,
    details?: unknown
  ) {
    super(ERROR_CODES.ERR_DOWNLOAD, message, details);
    this.name = 'DownloadError';
  }
}

export class FileTooLargeError extends AppError {
  constructor(
    public readonly sizeBytes: number,
    public readonly maxBytes: number
  ) {
    super(ERROR_CODES.ERR_TOO_LARGE, `File size ${sizeBytes} bytes exceeds limit of ${maxBytes} bytes`, {
      sizeBytes,
      maxBytes,
    });
    this.name = 'FileTooLargeError';
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Job was cancelled') {
    super(ERROR_CODES.ERR_CANCELLED, message);
    this.name = 'CancelledError';
  }
}

export class JobStateError extends AppError {
  constructor(from: string, to: string) {
    super(ERROR_CODES.ERR_JOB_STATE, `Illegal job transition ${from} -> ${to}`, { from, to });
    this.name = 'JobStateError';
  }
}

/** Whether the upload protocol may retry the failed operation at the same offset. */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransferError && error.retryable;
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new AppError(ERROR_CODES.ERR_INTERNAL, message, { originalError: message });
}

export function toUserMessage(error: AppError): string {
  const messages: Record<ErrorCode, string> = {
    [ERROR_CODES.ERR_AUTH]: '❌ Facebook rejected the access token. Update FACEBOOK_ACCESS_TOKEN and try again.',
    [ERROR_CODES.ERR_QUOTA]: '❌ Facebook rate limit or quota reached. Try again later.',
    [ERROR_CODES.ERR_TRANSFER]: '❌ Failed to transfer the video to Facebook.',
    [ERROR_CODES.ERR_INCOMPLETE_UPLOAD]: '❌ Upload is incomplete and cannot be published.',
    [ERROR_CODES.ERR_PUBLISH]: '❌ Facebook refused to publish the video.',
    [ERROR_CODES.ERR_SESSION_STATE]: '❌ Upload session is no longer usable.',
    [ERROR_CODES.ERR_DOWNLOAD]: '❌ Failed to download the video.',
    [ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED]: '❌ Video is private, age-restricted, or requires login. Try providing cookies.',
    [ERROR_CODES.ERR_GEO_BLOCKED]: '❌ Video is geo-blocked in your region. Try setting GEO_BYPASS_COUNTRY.',
    [ERROR_CODES.ERR_TOO_LARGE]: '❌ Video file is too large for upload.',
    [ERROR_CODES.ERR_FETCH_FAILED]: '❌ Failed to fetch video. Please try again later.',
    [ERROR_CODES.ERR_UNSUPPORTED_URL]: '❌ Unsupported URL format or video not found.',
    [ERROR_CODES.ERR_FILE_NOT_FOUND]: '❌ Video file is missing.',
    [ERROR_CODES.ERR_CANCELLED]: '❌ Job was cancelled.',
    [ERROR_CODES.ERR_JOB_STATE]: '❌ Job is not in a state that allows this action.',
    [ERROR_CODES.ERR_NOT_FOUND]: '❌ Not found.',
    [ERROR_CODES.ERR_INVALID_REQUEST]: '❌ Invalid request.',
    [ERROR_CODES.ERR_INTERNAL]: '❌ Internal server error. Please try again or contact support.',
  };

  const code =
    error instanceof DownloadError && error.reason !== ERROR_CODES.ERR_INTERNAL ? error.reason : error.code;
  return `${messages[code]} (${code})`;
}
