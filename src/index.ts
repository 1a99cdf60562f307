import 'dotenv/config';
import { createServices } from './app';
import { loadConfig } from './core/config';
import { run } from './core/exec';
import { logger } from './core/logger';
import { startServer } from './web/server';

async function logToolVersions(ytdlpPath: string): Promise<void> {
  const ytdlp = await run(ytdlpPath, ['--version'], { timeout: 10000 });
  if (ytdlp.code !== 0) {
    logger.warn({ ytdlpPath, stderr: ytdlp.stderr.trim() }, 'yt-dlp is not available, downloads will fail');
    return;
  }
  logger.info({ 'yt-dlp': ytdlp.stdout.trim() }, 'Tool versions');
}

async function main(): Promise<void> {
  const config = loadConfig();
  const services = createServices(config);

  if (!config.FACEBOOK_ACCESS_TOKEN || !config.FACEBOOK_PAGE_ID) {
    logger.warn('FACEBOOK_ACCESS_TOKEN or FACEBOOK_PAGE_ID missing, uploads will fail');
  }
  await logToolVersions(config.YTDLP_PATH);
  await services.migrate();

  if (config.SCHEDULER_ENABLED) services.scheduler.start();

  const server = startServer({
    config,
    orchestrator: services.orchestrator,
    batches: services.batches,
    scheduler: services.scheduler,
    checkConnection: (accessToken) => services.protocol.checkConnection(accessToken),
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    server.close();
    await services.close();
  };

  process.once('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => logger.error({ error }, 'Shutdown failed'));
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => logger.error({ error }, 'Shutdown failed'));
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start');
  process.exit(1);
});
