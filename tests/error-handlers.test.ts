import { describe, it, expect, vi, afterEach } from 'vitest';
import { getMaxListeners } from 'node:events';
import {
  createRunController,
  describeError,
  isCancellation,
  isConnectionError
} from '../src/utils/error-handlers.js';
import { CancelledError, RequestTimeoutError } from '../src/types/errors.js';

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('Error Handlers', () => {
  describe('isConnectionError', () => {
    it('should identify transport failures wrapped by fetch', () => {
      const codes = ['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'CERT_HAS_EXPIRED'];

      for (const code of codes) {
        const error = new TypeError('fetch failed', { cause: withCode('low level', code) });
        expect(isConnectionError(error)).toBe(true);
      }
    });

    it('should identify timeouts', () => {
      expect(isConnectionError(new RequestTimeoutError(30000))).toBe(true);
      expect(isConnectionError(withCode('read timed out', 'ETIMEDOUT'))).toBe(true);
    });

    it('should treat a bare fetch failure as a connection error', () => {
      expect(isConnectionError(new TypeError('fetch failed'))).toBe(true);
    });

    it('should not identify other errors', () => {
      const others = [
        new Error('Unexpected token'),
        new SyntaxError('Unexpected end of JSON input'),
        withCode('no such file', 'ENOENT'),
        'just a string',
        undefined
      ];

      for (const error of others) {
        expect(isConnectionError(error)).toBe(false);
      }
    });
  });

  describe('isCancellation', () => {
    it('should recognise CancelledError and AbortError', () => {
      expect(isCancellation(new CancelledError())).toBe(true);
      const abort = new Error('The operation was aborted');
      abort.name = 'AbortError';
      expect(isCancellation(abort)).toBe(true);
    });

    it('should not treat timeouts or ordinary errors as cancellation', () => {
      expect(isCancellation(new RequestTimeoutError(10))).toBe(false);
      expect(isCancellation(new Error('boom'))).toBe(false);
      expect(isCancellation(null)).toBe(false);
    });
  });

  describe('createRunController', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should accept one abort listener per page without warning', () => {
      const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
      const controller = createRunController();

      for (let page = 0; page < 50; page++) {
        controller.signal.addEventListener('abort', () => {}, { once: true });
      }

      expect(getMaxListeners(controller.signal)).toBe(0);
      expect(emitWarning).not.toHaveBeenCalled();
    });
  });

  describe('describeError', () => {
    it('should include the cause code and message', () => {
      const error = new TypeError('fetch failed', { cause: withCode('getaddrinfo ENOTFOUND api.test', 'ENOTFOUND') });
      expect(describeError(error)).toBe('fetch failed (ENOTFOUND: getaddrinfo ENOTFOUND api.test)');
    });

    it('should include a cause without a code', () => {
      expect(describeError(new Error('outer', { cause: new Error('inner') }))).toBe('outer (inner)');
    });

    it('should handle plain errors and non-errors', () => {
      expect(describeError(new Error('plain'))).toBe('plain');
      expect(describeError('text')).toBe('text');
      expect(describeError(42)).toBe('42');
    });
  });
});
