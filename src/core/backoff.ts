import type { RetryableFailure } from '../types/page-fetch.js';

export type BackoffKind = 'rate-limit' | 'server' | 'generic';

export const RATE_LIMIT_BASE_MS = 5000;
export const DEFAULT_BASE_MS = 1000;
export const MAX_BACKOFF_MS = 15 * 60 * 1000;

/**
 * Wait before the retry that follows attempt `attempt` (0-based).
 *
 * rate-limit: 5s * 2^attempt, server/generic: 1s * 2^attempt, capped at
 * MAX_BACKOFF_MS.
 */
export function backoffDelay(attempt: number, kind: BackoffKind): number {
  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new RangeError(`Attempt index must be a non-negative integer, got ${attempt}`);
  }

  const base = kind === 'rate-limit' ? RATE_LIMIT_BASE_MS : DEFAULT_BASE_MS;
  return Math.min(base * 2 ** attempt, MAX_BACKOFF_MS);
}

export function backoffKindFor(failure: RetryableFailure): BackoffKind {
  switch (failure) {
    case 'rate-limited':
      return 'rate-limit';
    case 'server-error':
    case 'client-protocol-error':
      return 'server';
    case 'connection-error':
      return 'generic';
  }
}
