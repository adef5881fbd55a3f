import { logger, formatETA, formatProgress, formatTime } from '../utils/logger.js';
import { describeError, isCancellation } from '../utils/error-handlers.js';
import { RateGate } from '../core/rate-gate.js';
import { FailureLedger } from '../core/failure-ledger.js';
import { writeFailureReport } from '../drivers/failure-report.js';
import { PageFetcher, DEFAULT_MAX_ATTEMPTS } from './page-fetcher.js';
import type { BackoffPolicy, Sleep } from './page-fetcher.js';
import { noopProgressListener } from './progress.js';
import type { ProgressListener } from './progress.js';
import type { PageResult, PageSource, ResultSink, RunSummary } from '../types/page-fetch.js';

const log = logger.createContext('harvest-engine');

export interface HarvestEngineDeps<T> {
  source: PageSource<T>;
  sink: ResultSink<T>;
  backoff?: BackoffPolicy;
  sleep?: Sleep;
  onProgress?: ProgressListener;
  progressInterval?: number;  // Default: 10000 pages
}

export interface HarvestRunOptions {
  totalPages: number;
  concurrency: number;
  maxAttempts?: number;  // Default: 5
  failureReportPath?: string;  // Report is skipped when not set
  signal?: AbortSignal;
}

interface RunTally {
  succeeded: number;
  cancelled: number;
  records: number;
  completed: number;
}

/**
 * Fetches pages 1..totalPages with bounded concurrency.
 *
 * Every page task is created up front; the rate gate decides when each one
 * actually talks to the remote. Page failures come back as data, so one bad
 * page never takes its siblings down. Cancellation stops retries everywhere
 * and the run still returns a summary of what finished.
 */
export class HarvestEngine<T> {
  private readonly progressInterval: number;

  constructor(private readonly deps: HarvestEngineDeps<T>) {
    this.progressInterval = deps.progressInterval ?? 10_000;
  }

  async run(options: HarvestRunOptions): Promise<RunSummary> {
    const { totalPages, concurrency, signal } = options;
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

    if (!Number.isInteger(totalPages) || totalPages < 1) {
      throw new RangeError(`totalPages must be a positive integer, got ${totalPages}`);
    }

    const startTime = Date.now();
    const ledger = new FailureLedger();
    const gate = new RateGate(concurrency);
    const fetcher = new PageFetcher<T>({
      source: this.deps.source,
      sink: this.deps.sink,
      gate,
      ledger,
      maxAttempts,
      backoff: this.deps.backoff,
      sleep: this.deps.sleep,
      onProgress: this.deps.onProgress ?? noopProgressListener
    });

    log.normal('Harvest configuration:');
    log.normal(`  Total pages: ${totalPages}`);
    log.normal(`  Concurrency: ${concurrency}`);
    log.normal(`  Max attempts: ${maxAttempts}`);
    if (options.failureReportPath) {
      log.normal(`  Failure report: ${options.failureReportPath}`);
    }

    const tally: RunTally = { succeeded: 0, cancelled: 0, records: 0, completed: 0 };
    const tasks: Promise<void>[] = [];

    for (let page = 1; page <= totalPages; page++) {
      tasks.push(
        this.runPage(fetcher, ledger, page, signal).then(result => {
          this.count(tally, result);
          this.reportProgress(tally, ledger, totalPages, startTime);
        })
      );

      if (page % this.progressInterval === 0) {
        log.normal(`Scheduled ${page}/${totalPages} pages so far...`);
      }
    }

    log.normal('All fetch tasks scheduled, now awaiting completion...');
    await Promise.all(tasks);

    const failedPages = ledger.snapshot();
    const summary: RunSummary = {
      totalPages,
      succeeded: tally.succeeded,
      failed: failedPages.length,
      cancelled: tally.cancelled,
      recordsWritten: tally.records,
      failedPages,
      elapsedMs: Date.now() - startTime,
      aborted: signal?.aborted ?? false
    };

    if (options.failureReportPath) {
      await writeFailureReport(options.failureReportPath, failedPages);
    }

    this.logSummary(summary, options.failureReportPath);
    return summary;
  }

  /**
   * Never rejects: anything the fetcher throws besides cancellation of this
   * run marks the page failed so it is still accounted for.
   */
  private async runPage(
    fetcher: PageFetcher<T>,
    ledger: FailureLedger,
    page: number,
    signal?: AbortSignal
  ): Promise<PageResult> {
    try {
      return await fetcher.fetch(page, signal);
    } catch (error) {
      if (signal?.aborted && isCancellation(error)) {
        return { page, status: 'cancelled', attempts: 0, records: 0 };
      }
      const reason = describeError(error);
      log.error(`Unexpected error on page ${page}: ${reason}`);
      ledger.record(page);
      return { page, status: 'failed', attempts: 0, records: 0, reason };
    }
  }

  private count(tally: RunTally, result: PageResult): void {
    tally.completed++;
    if (result.status === 'succeeded') {
      tally.succeeded++;
      tally.records += result.records;
    } else if (result.status === 'cancelled') {
      tally.cancelled++;
    }
  }

  private reportProgress(tally: RunTally, ledger: FailureLedger, totalPages: number, startTime: number): void {
    if (tally.completed % this.progressInterval !== 0 || tally.completed === totalPages) return;

    const elapsed = Date.now() - startTime;
    log.normal(
      `Completed ${formatProgress(tally.completed, totalPages)} | ` +
        `${ledger.size} failed | ETA ${formatETA(tally.completed, totalPages, elapsed)}`
    );
  }

  private logSummary(summary: RunSummary, failureReportPath?: string): void {
    log.normal(summary.aborted ? 'Data fetching interrupted.' : 'Data fetching complete.');
    log.normal(`Total time: ${formatTime(summary.elapsedMs)}`);
    log.normal(
      `Succeeded: ${summary.succeeded}, Failed: ${summary.failed}` +
        (summary.cancelled > 0 ? `, Cancelled: ${summary.cancelled}` : '') +
        `, Records: ${summary.recordsWritten}`
    );

    if (summary.failed > 0) {
      const where = failureReportPath ? ` See ${failureReportPath} for details.` : '';
      log.warn(`Some pages failed.${where}`);
    } else if (!summary.aborted) {
      log.normal('No failed pages!');
    }
  }
}
