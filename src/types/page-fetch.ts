export type RetryableFailure =
  | 'rate-limited'
  | 'server-error'
  | 'client-protocol-error'
  | 'connection-error';

export type TerminalFailure = 'malformed-response';

export type FailureKind = RetryableFailure | TerminalFailure | 'cancelled';

export interface PageRequest {
  pageNumber: number;
  attempt: number;
}

/**
 * Result of a single remote attempt for one page.
 */
export type FetchOutcome<T> =
  | { kind: 'success'; records: T[] }
  | { kind: 'retryable'; failure: RetryableFailure; reason: string; retryAfterMs?: number }
  | { kind: 'terminal'; failure: TerminalFailure; reason: string };

/**
 * Anything that can fetch one page of records. Implementations must convert
 * remote failures into outcomes and only throw CancelledError.
 */
export interface PageSource<T> {
  fetchPage(page: number, signal?: AbortSignal): Promise<FetchOutcome<T>>;
}

export interface ResultSink<T> {
  write(records: readonly T[]): Promise<void>;
}

export type PageStatus = 'succeeded' | 'failed' | 'cancelled';

export interface PageResult {
  page: number;
  status: PageStatus;
  attempts: number;
  records: number;
  reason?: string;
}

export interface RunSummary {
  totalPages: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  recordsWritten: number;
  failedPages: number[];
  elapsedMs: number;
  aborted: boolean;
}
