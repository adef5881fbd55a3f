import { CancelledError } from '../types/errors.js';

export interface GateToken {
  readonly id: number;
}

interface Waiter {
  resolve: (token: GateToken) => void;
  cancelled: boolean;
  detach: () => void;
}

/**
 * Counting semaphore that caps how many remote calls are in flight.
 *
 * Slots are handed to waiters in arrival order. A freed slot goes straight to
 * the next waiter, so the active count never exceeds capacity even briefly.
 */
export class RateGate {
  private readonly active = new Set<number>();
  private queue: Waiter[] = [];
  private head = 0;
  private waiting = 0;
  private nextId = 1;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Gate capacity must be a positive integer, got ${capacity}`);
    }
  }

  get activeCount(): number {
    return this.active.size;
  }

  get pendingCount(): number {
    return this.waiting;
  }

  acquire(signal?: AbortSignal): Promise<GateToken> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Cancelled before acquiring a request slot'));
    }

    if (this.waiting === 0 && this.active.size < this.capacity) {
      return Promise.resolve(this.grant());
    }

    return new Promise<GateToken>((resolve, reject) => {
      const waiter: Waiter = { resolve, cancelled: false, detach: () => {} };

      if (signal) {
        const onAbort = () => {
          // Left in the queue; dequeue() skips it.
          waiter.cancelled = true;
          this.waiting--;
          reject(new CancelledError('Cancelled while waiting for a request slot'));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.queue.push(waiter);
      this.waiting++;
    });
  }

  /**
   * Free a slot. Releasing a token twice, or one this gate never issued, is a no-op.
   */
  release(token: GateToken): void {
    if (!this.active.delete(token.id)) return;

    const next = this.dequeue();
    if (next) {
      next.detach();
      next.resolve(this.grant());
    }
  }

  /**
   * Run `fn` while holding a slot; the slot is released on every exit path.
   */
  async use<R>(fn: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    const token = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release(token);
    }
  }

  private grant(): GateToken {
    const id = this.nextId++;
    this.active.add(id);
    return { id };
  }

  private dequeue(): Waiter | undefined {
    while (this.head < this.queue.length) {
      const waiter = this.queue[this.head++];
      if (!waiter.cancelled) {
        this.waiting--;
        this.compact();
        return waiter;
      }
    }
    this.compact();
    return undefined;
  }

  private compact(): void {
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
  }
}
