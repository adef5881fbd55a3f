/**
 * Raised when a run-wide abort signal fires. Never recorded as a page failure.
 */
export class CancelledError extends Error {
  constructor(message = 'Operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Raised (as an abort reason) when a single remote call exceeds its timeout.
 */
export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}
