import execa from 'execa';
import { logger } from './logger';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  durationMs: number;
}

export interface ExecOptions {
  cwd?: string;
  timeout?: number;
}

function isExecaError(error: unknown): error is execa.ExecaError {
  return error instanceof Error && 'exitCode' in error && 'stderr' in error;
}

export async function run(command: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecResult> {
  const startTime = Date.now();

  logger.debug({ command, args, cwd: options.cwd, timeout: options.timeout }, 'Executing command');

  try {
    const execaOptions: execa.Options = {
      ...(options.cwd ? { cwd: options.cwd } : {}),
      ...(options.timeout ? { timeout: options.timeout } : {}),
    };

    const result = await execa(command, args, execaOptions);
    const durationMs = Date.now() - startTime;

    logger.debug(
      {
        command,
        durationMs,
        code: result.exitCode,
        stdoutLength: result.stdout.length,
        stderrLength: result.stderr.length,
      },
      'Command executed successfully'
    );

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      code: result.exitCode,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - startTime;

    if (isExecaError(error)) {
      const stdout = error.stdout || '';
      const stderr = error.stderr || '';

      logger.error(
        {
          command,
          args: args.slice(0, 10),
          durationMs,
          code: error.exitCode,
          timedOut: error.timedOut,
          stdoutPreview: stdout.slice(0, 1000),
          stderrPreview: stderr.slice(0, 1000),
        },
        'Command execution failed'
      );

      return {
        stdout,
        stderr,
        code: error.exitCode || 1,
        durationMs,
      };
    }

    logger.error(
      { command, args, durationMs, error: error instanceof Error ? error.message : String(error) },
      'Unexpected error during command execution'
    );
    throw error;
  }
}

/** Signature of {@link run}, so callers can take a stand-in runner. */
export type CommandRunner = typeof run;
