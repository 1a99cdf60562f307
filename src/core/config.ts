import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const FALSE_VALUES = ['0', 'false', 'off', 'no'];

// z.coerce.boolean() treats "false" as true
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (typeof value === 'boolean') return value;
      if (value === undefined || value.trim().length === 0) return fallback;
      return !FALSE_VALUES.includes(value.trim().toLowerCase());
    });

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(3000),
  DOWNLOAD_DIR: z.string().default('./downloads'),
  KEEP_DOWNLOADS: booleanFlag(true),
  YTDLP_PATH: z.string().default('yt-dlp'),
  YTDLP_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  // Optional: base64-encoded Netscape cookies.txt for Facebook
  FACEBOOK_COOKIES_B64: z.string().optional().default(''),
  // Optional: two-letter country code to try for geo-bypass (e.g. US, NL)
  GEO_BYPASS_COUNTRY: z.string().optional().default(''),
  FACEBOOK_ACCESS_TOKEN: z.string().optional().default(''),
  FACEBOOK_PAGE_ID: z.string().optional().default(''),
  FACEBOOK_GRAPH_URL: z.string().url().default('https://graph.facebook.com/v18.0'),
  AUTO_UPLOAD: booleanFlag(true),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(1024 * 1024 * 1024),
  DEFAULT_TITLE_PREFIX: z.string().optional().default(''),
  DEFAULT_DESCRIPTION: z.string().optional().default('Uploaded via Facebook Video Downloader'),
  UPLOAD_CHUNK_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),
  TRANSFER_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  TRANSFER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(2),
  BATCH_MAX_URLS: z.coerce.number().int().positive().default(20),
  JOB_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  DATABASE_URL: z.string().optional().default(''),
  DB_POOL_MIN: z.coerce.number().int().positive().optional().default(1),
  DB_POOL_MAX: z.coerce.number().int().positive().optional().default(5),
  SCHEDULER_ENABLED: booleanFlag(false),
  SCHEDULER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: NodeJS.ProcessEnv | Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`));
  }
  return result.data;
}

/**
 * Reads `.env` into `process.env` and validates it. Exits the process on invalid
 * configuration, so only entry points should call this.
 */
export function loadConfig(): Config {
  loadDotenv();
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/** The configuration fields that are safe to show to API clients. */
export function publicConfig(config: Config) {
  return {
    pageId: config.FACEBOOK_PAGE_ID,
    hasAccessToken: config.FACEBOOK_ACCESS_TOKEN.length > 0,
    autoUpload: config.AUTO_UPLOAD,
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    defaultTitlePrefix: config.DEFAULT_TITLE_PREFIX,
    defaultDescription: config.DEFAULT_DESCRIPTION,
    batchMaxUrls: config.BATCH_MAX_URLS,
    schedulerEnabled: config.SCHEDULER_ENABLED,
  };
}
