import { setTimeout as delay } from 'node:timers/promises';
import { backoffDelay, backoffKindFor, MAX_BACKOFF_MS } from '../core/backoff.js';
import type { BackoffKind } from '../core/backoff.js';
import type { RateGate } from '../core/rate-gate.js';
import type { FailureLedger } from '../core/failure-ledger.js';
import { CancelledError } from '../types/errors.js';
import { describeError, isCancellation } from '../utils/error-handlers.js';
import { noopProgressListener } from './progress.js';
import type { ProgressEvent, ProgressListener } from './progress.js';
import type { FetchOutcome, PageRequest, PageResult, PageSource, ResultSink } from '../types/page-fetch.js';

export const DEFAULT_MAX_ATTEMPTS = 5;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type BackoffPolicy = (attempt: number, kind: BackoffKind) => number;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (isCancellation(error)) {
      throw new CancelledError('Cancelled during backoff');
    }
    throw error;
  }
};

export interface PageFetcherOptions<T> {
  source: PageSource<T>;
  sink: ResultSink<T>;
  gate: RateGate;
  ledger: FailureLedger;
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  sleep?: Sleep;
  onProgress?: ProgressListener;
}

/**
 * Runs the attempt loop for one page:
 * requesting -> success | retry-wait -> requesting ... | terminal failure.
 *
 * A gate slot is held only for the remote call, never during backoff or the
 * sink write. Only the run's own signal cancels a page: it is rethrown as
 * CancelledError and never reaches the ledger.
 */
export class PageFetcher<T> {
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleep;
  private readonly onProgress: ProgressListener;

  constructor(private readonly options: PageFetcherOptions<T>) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    this.backoff = options.backoff ?? backoffDelay;
    this.sleep = options.sleep ?? abortableSleep;
    this.onProgress = options.onProgress ?? noopProgressListener;
  }

  async fetch(page: number, signal?: AbortSignal): Promise<PageResult> {
    const request: PageRequest = { pageNumber: page, attempt: 0 };
    let lastReason = 'no attempt completed';

    while (request.attempt < this.maxAttempts) {
      const attempt = request.attempt + 1;
      this.emit({ page, attempt, state: 'requesting' });

      const startedAt = Date.now();
      const outcome = await this.attempt(request, signal);

      switch (outcome.kind) {
        case 'success':
          return this.deliver(page, attempt, outcome.records, Date.now() - startedAt);

        case 'terminal':
          this.options.ledger.record(page);
          this.emit({ page, attempt, state: 'terminal-failure', failure: outcome.failure, reason: outcome.reason });
          return { page, status: 'failed', attempts: attempt, records: 0, reason: outcome.reason };

        case 'retryable': {
          lastReason = outcome.reason;
          if (attempt >= this.maxAttempts) {
            request.attempt = attempt;
            break;
          }

          // A Retry-After hint can lengthen the wait, but never past MAX_BACKOFF_MS
          const waitMs = Math.max(
            this.backoff(request.attempt, backoffKindFor(outcome.failure)),
            Math.min(outcome.retryAfterMs ?? 0, MAX_BACKOFF_MS)
          );
          this.emit({ page, attempt, state: 'retry-wait', failure: outcome.failure, reason: outcome.reason, waitMs });

          try {
            await this.sleep(waitMs, signal);
          } catch (error) {
            if (signal?.aborted) throw this.cancelled(page, attempt, error);
            throw error;
          }
          request.attempt = attempt;
          break;
        }
      }
    }

    this.options.ledger.record(page);
    this.emit({ page, attempt: this.maxAttempts, state: 'exhausted', reason: lastReason });
    return { page, status: 'failed', attempts: this.maxAttempts, records: 0, reason: lastReason };
  }

  private async attempt(request: PageRequest, signal?: AbortSignal): Promise<FetchOutcome<T>> {
    const { pageNumber } = request;
    try {
      return await this.options.gate.use(() => this.options.source.fetchPage(pageNumber, signal), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw this.cancelled(pageNumber, request.attempt + 1, error);
      }
      // Anything else thrown, including an AbortError the run did not ask for, is a dropped connection
      return { kind: 'retryable', failure: 'connection-error', reason: `Unexpected error: ${describeError(error)}` };
    }
  }

  private async deliver(page: number, attempt: number, records: T[], durationMs: number): Promise<PageResult> {
    try {
      await this.options.sink.write(records);
    } catch (error) {
      const reason = `Failed to write records: ${describeError(error)}`;
      this.options.ledger.record(page);
      this.emit({ page, attempt, state: 'terminal-failure', reason });
      return { page, status: 'failed', attempts: attempt, records: 0, reason };
    }

    this.emit({ page, attempt, state: 'success', records: records.length, durationMs });
    return { page, status: 'succeeded', attempts: attempt, records: records.length };
  }

  private cancelled(page: number, attempt: number, error: unknown): CancelledError {
    this.emit({ page, attempt, state: 'cancelled', failure: 'cancelled' });
    return error instanceof CancelledError ? error : new CancelledError(`Page ${page} cancelled`);
  }

  private emit(event: Omit<ProgressEvent, 'maxAttempts'>): void {
    this.onProgress({ ...event, maxAttempts: this.maxAttempts });
  }
}
