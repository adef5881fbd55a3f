#!/usr/bin/env tsx

/**
 * CLI for the standings harvest
 * Usage:
 *   npm run harvest -- [options]
 *   npm run harvest -- --pages 1000 --concurrency 20 --output out/players.jsonl
 */

import { HarvestEngine } from '../src/engines/harvest-engine.js';
import { createLogProgressListener } from '../src/engines/progress.js';
import { StandingsApi } from '../src/providers/standings-api.js';
import { JsonLinesSink } from '../src/drivers/result-sink.js';
import { resolveHarvestConfig } from '../src/utils/config.js';
import { parseArgs, USAGE } from '../src/utils/cli-args.js';
import { logger, parseLogLevel, formatTime } from '../src/utils/logger.js';
import { createRunController, describeError, installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { formatDate } from '../src/utils/time-parser.js';
import type { PlayerRecord } from '../src/types/standings.js';

installGlobalErrorHandlers();

const log = logger.createContext('harvest-cli');

function watchInterrupts(controller: AbortController): void {
  const onSignal = (name: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.error(`Received ${name} again, exiting immediately.`);
      process.exit(1);
    }
    log.error(`Received ${name}. Cancelling outstanding pages (press again to force exit)...`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

async function main(): Promise<number> {
  const { options } = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  logger.setConfig({
    level: parseLogLevel(options.logLevel ?? process.env.LOG_LEVEL),
    showTimestamps: options.timestamps ?? false
  });

  const config = resolveHarvestConfig(options);
  const controller = createRunController();
  watchInterrupts(controller);

  log.normal(`Starting harvest at ${formatDate(new Date())}`);
  log.normal(`League ID: ${config.leagueId}, Total Pages: ${config.totalPages}, Concurrency: ${config.concurrency}`);
  log.normal(`Output file: ${config.outputFile}`);

  const source = new StandingsApi({
    baseUrl: config.baseUrl,
    leagueId: config.leagueId,
    requestTimeoutMs: config.requestTimeoutMs
  });
  const sink = await JsonLinesSink.open<PlayerRecord>(config.outputFile);

  try {
    const engine = new HarvestEngine<PlayerRecord>({
      source,
      sink,
      onProgress: createLogProgressListener(logger.createContext('page-fetcher')),
      progressInterval: config.progressInterval
    });

    const summary = await engine.run({
      totalPages: config.totalPages,
      concurrency: config.concurrency,
      maxAttempts: config.maxAttempts,
      failureReportPath: config.failedPagesFile,
      signal: controller.signal
    });

    logger.separator();
    console.log(`Pages:     ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled`);
    console.log(`Records:   ${summary.recordsWritten} written to ${config.outputFile}`);
    console.log(`Duration:  ${formatTime(summary.elapsedMs)}`);

    if (summary.aborted) {
      log.error('Harvest interrupted by user.');
      return 1;
    }
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await sink.close();
  }
}

main().then(
  code => process.exit(code),
  (error: unknown) => {
    log.error(`Unhandled exception at top-level: ${describeError(error)}`);
    process.exit(1);
  }
);
