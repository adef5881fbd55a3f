import type { ContextualLogger } from '../utils/logger.js';
import { formatTime } from '../utils/logger.js';
import type { FailureKind } from '../types/page-fetch.js';

export type FetchState =
  | 'requesting'
  | 'success'
  | 'retry-wait'
  | 'terminal-failure'
  | 'exhausted'
  | 'cancelled';

/**
 * One page-fetcher state transition. `attempt` is 1-based.
 */
export interface ProgressEvent {
  page: number;
  attempt: number;
  maxAttempts: number;
  state: FetchState;
  failure?: FailureKind;
  reason?: string;
  waitMs?: number;
  records?: number;
  durationMs?: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

export const noopProgressListener: ProgressListener = () => {};

/**
 * Route fetch transitions to the logger: attempts at verbose, retries as
 * warnings, failures as errors.
 */
export function createLogProgressListener(log: ContextualLogger): ProgressListener {
  return event => {
    const { page, attempt, maxAttempts } = event;

    switch (event.state) {
      case 'requesting':
        log.verbose(`Fetching page ${page} (Attempt ${attempt}/${maxAttempts})...`);
        break;
      case 'success':
        log.verbose(
          `Page ${page} fetched successfully with ${event.records ?? 0} records in ${formatTime(event.durationMs ?? 0)}.`
        );
        break;
      case 'retry-wait':
        log.warn(
          `Page ${page}: ${event.reason ?? event.failure} (${event.failure}). ` +
            `Waiting ${formatTime(event.waitMs ?? 0)} before retry ${attempt + 1}/${maxAttempts}...`
        );
        break;
      case 'terminal-failure':
        log.error(`Page ${page}: ${event.reason ?? event.failure}. Not retrying.`);
        break;
      case 'exhausted':
        log.error(`All attempts failed for page ${page}. Last error: ${event.reason ?? 'unknown'}`);
        break;
      case 'cancelled':
        log.debug(`Page ${page} cancelled at attempt ${attempt}.`);
        break;
    }
  };
}
