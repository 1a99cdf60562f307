#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { createServices } from './app';
import { loadConfig } from './core/config';
import { logger } from './core/logger';
import type { DownloadJob } from './pipeline/orchestrator';
import { createExtractor, isFacebookUrl } from './providers';

const USAGE = `Usage: fb-reupload <url...> [options]

Downloads Facebook videos and re-uploads them to the configured page.

Options:
  --cookies <file>        Netscape cookies.txt used for the download
  --title-prefix <text>   Text put in front of every title
  --description <text>    Description for every upload
  --no-upload             Stop after the download
  --concurrency <n>       Jobs run at the same time (default BATCH_CONCURRENCY)
  --list                  Treat the URLs as pages and print their videos instead
  --max-videos <n>        With --list, stop after n videos per page
  -h, --help              Show this message`;

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function printLine(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value)}\n`);
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      cookies: { type: 'string' },
      'title-prefix': { type: 'string' },
      description: { type: 'string' },
      'no-upload': { type: 'boolean', default: false },
      concurrency: { type: 'string' },
      list: { type: 'boolean', default: false },
      'max-videos': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    process.stdout.write(`${USAGE}\n`);
    return values.help ? 0 : 1;
  }

  const invalid = positionals.filter((url) => !isFacebookUrl(url));
  if (invalid.length > 0) {
    process.stderr.write(`Not a Facebook URL: ${invalid.join(', ')}\n`);
    return 1;
  }

  const config = loadConfig();
  const cookies = values.cookies ? { path: values.cookies } : undefined;

  if (values.list) {
    const extractor = createExtractor(config);
    const maxVideos = parsePositiveInt(values['max-videos'], '--max-videos');
    for (const pageUrl of positionals) {
      const videos = await extractor.listVideos(pageUrl, { cookies, maxVideos });
      for (const video of videos) printLine({ page: pageUrl, ...video });
    }
    return 0;
  }

  if (positionals.length > config.BATCH_MAX_URLS) {
    process.stderr.write(`At most ${config.BATCH_MAX_URLS} URLs per run, got ${positionals.length}\n`);
    return 1;
  }

  const concurrency = parsePositiveInt(values.concurrency, '--concurrency') ?? config.BATCH_CONCURRENCY;
  const services = createServices({ ...config, BATCH_CONCURRENCY: concurrency });
  const jobs: DownloadJob[] = positionals.map((url) => ({
    url,
    cookies,
    titlePrefix: values['title-prefix'],
    description: values.description,
    upload: values['no-upload'] ? false : undefined,
  }));

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.info('Interrupted, cancelling remaining jobs');
    controller.abort();
  });

  try {
    const summary = await services.batches.run(jobs, controller.signal);
    for (const item of summary.items) {
      printLine({
        id: item.id,
        url: item.url,
        state: item.state,
        failedStage: item.failedStage,
        videoId: item.upload?.videoId,
        videoUrl: item.upload?.url,
        filePath: item.download?.filePath,
        error: item.error?.userMessage,
      });
    }
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await services.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
