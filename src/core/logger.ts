import pino from 'pino';
import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).catch('info'),
});

type LoggerEnv = z.infer<typeof envSchema>;

export function createLogger(env: LoggerEnv): pino.Logger {
  const loggerConfig: pino.LoggerOptions = {
    level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
    redact: ['accessToken', 'access_token', '*.accessToken', '*.access_token'],
  };

  if (env.NODE_ENV === 'development') {
    loggerConfig.formatters = {
      level: (label) => ({ level: label }),
    };
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (env.NODE_ENV === 'production') {
    const logsDir = path.join(process.cwd(), 'logs');
    fs.ensureDirSync(logsDir);
    // multi-target transports reject a custom level formatter
    loggerConfig.transport = {
      targets: [
        {
          target: 'pino/file',
          options: { destination: path.join(logsDir, 'app.log') },
          level: 'info',
        },
        {
          target: 'pino/file',
          options: { destination: path.join(logsDir, 'error.log') },
          level: 'error',
        },
      ],
    };
  }

  return pino(loggerConfig);
}

export const logger = createLogger(envSchema.parse(process.env));
