/**
 * Standings API Provider
 *
 * Fetches one page of classic-league standings and turns the HTTP exchange
 * into a FetchOutcome. Nothing here retries or sleeps; that belongs to the
 * page fetcher.
 */

import { logger } from '../utils/logger.js';
import { describeError, isConnectionError } from '../utils/error-handlers.js';
import { CancelledError, RequestTimeoutError } from '../types/errors.js';
import { StandingsPageSchema, toPlayerRecord } from '../types/standings.js';
import type { PlayerRecord } from '../types/standings.js';
import type { FetchOutcome, PageSource } from '../types/page-fetch.js';

const log = logger.createContext('standings-api');

export interface StandingsApiOptions {
  baseUrl: string;
  leagueId: number;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Central API endpoint definitions
 */
const API_ENDPOINTS = {
  standings: (leagueId: number) => `/api/leagues-classic/${leagueId}/standings/`
} as const;

/**
 * Seconds or HTTP-date form of Retry-After, in milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export class StandingsApi implements PageSource<PlayerRecord> {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: StandingsApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildPageUrl(page: number): string {
    const params = new URLSearchParams({ page_standings: page.toString() });
    return `${this.baseUrl}${API_ENDPOINTS.standings(this.options.leagueId)}?${params.toString()}`;
  }

  /**
   * Throws only CancelledError; every other failure is returned as an outcome.
   */
  async fetchPage(page: number, signal?: AbortSignal): Promise<FetchOutcome<PlayerRecord>> {
    if (signal?.aborted) {
      throw new CancelledError(`Page ${page} cancelled before request`);
    }

    const { timeoutMs, controller, dispose } = this.requestSignal(signal);

    try {
      const response = await this.fetchImpl(this.buildPageUrl(page), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal
      });

      if (response.status === 429) {
        await discardBody(response);
        return {
          kind: 'retryable',
          failure: 'rate-limited',
          reason: 'HTTP 429',
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
        };
      }

      if (!response.ok) {
        await discardBody(response);
        const failure = response.status >= 500 && response.status < 600 ? 'server-error' : 'client-protocol-error';
        return { kind: 'retryable', failure, reason: `HTTP ${response.status}` };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (signal?.aborted) throw error;
        // Usually a body cut short by the connection, so it is retried
        return { kind: 'retryable', failure: 'connection-error', reason: `Invalid JSON body: ${describeError(error)}` };
      }

      const parsed = StandingsPageSchema.safeParse(body);
      if (!parsed.success) {
        return {
          kind: 'terminal',
          failure: 'malformed-response',
          reason: `Expected keys not found in the response (${parsed.error.issues[0]?.path.join('.') || 'body'})`
        };
      }

      return { kind: 'success', records: parsed.data.standings.results.map(toPlayerRecord) };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Page ${page} cancelled during request`);
      }
      if (controller.signal.reason instanceof RequestTimeoutError) {
        return { kind: 'retryable', failure: 'connection-error', reason: `Timed out after ${timeoutMs}ms` };
      }
      const prefix = isConnectionError(error) ? 'Connection error' : 'Unexpected error';
      return { kind: 'retryable', failure: 'connection-error', reason: `${prefix}: ${describeError(error)}` };
    } finally {
      dispose();
    }
  }

  /**
   * Abort signal for one request: fires on the run's signal or on timeout.
   */
  private requestSignal(parent?: AbortSignal) {
    const timeoutMs = this.options.requestTimeoutMs;
    const controller = new AbortController();
    const onAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);

    return {
      timeoutMs,
      controller,
      dispose: () => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onAbort);
      }
    };
  }
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    log.debug(`Could not discard response body: ${describeError(error)}`);
  }
}
