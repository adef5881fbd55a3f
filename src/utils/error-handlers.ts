import { setMaxListeners } from 'node:events';
import { logger } from './logger.js';
import { CancelledError, RequestTimeoutError } from '../types/errors.js';

const log = logger.createContext('error-handlers');

const CONNECTION_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CLOSED',
  'CERT_HAS_EXPIRED',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'ERR_TLS_CERT_ALTNAME_INVALID'
]);

/**
 * Install process-level handlers so a stray rejection is logged instead of
 * killing a long run. Call once at CLI startup.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error(`Unhandled Promise Rejection: ${describeError(reason)}`);
  });

  // The process is in an undefined state after an uncaught exception
  process.on('uncaughtException', (err: Error, origin: string) => {
    log.error(`FATAL: Uncaught Exception (${origin}): ${describeError(err)}`);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Controller for a whole run. Every queued page, request and backoff sleep
 * listens on its signal, so the EventTarget listener warning is turned off.
 */
export function createRunController(): AbortController {
  const controller = new AbortController();
  setMaxListeners(0, controller.signal);
  return controller;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}

/**
 * True for run-wide cancellation, including a DOM AbortError raised by fetch
 * or timers when the run's signal fired.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Transport-level failure: reset, refused, DNS, TLS or timeout. Node's fetch
 * wraps these in `TypeError('fetch failed')` with the real error as `cause`.
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) return true;

  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    const code = errorCode(current);
    if (code && CONNECTION_ERROR_CODES.has(code)) return true;
    if (current instanceof Error && current.name === 'TimeoutError') return true;
    current = errorCause(current);
  }

  return error instanceof TypeError && error.message === 'fetch failed';
}

/**
 * One-line description of an error, with the innermost cause code when present.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  const cause = errorCause(error);
  if (cause === undefined) return error.message;

  const code = errorCode(cause);
  const causeMessage = cause instanceof Error ? cause.message : String(cause);
  return code ? `${error.message} (${code}: ${causeMessage})` : `${error.message} (${causeMessage})`;
}
