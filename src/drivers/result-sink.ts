import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';
import type { ResultSink } from '../types/page-fetch.js';

const log = logger.createContext('result-sink');

export interface JsonLinesSinkOptions {
  append?: boolean;   // Default: truncate the file
  durable?: boolean;  // Default: true, datasync after every write
}

/**
 * JSON Lines writer shared by all page tasks.
 *
 * Writes go through a single promise chain, so the lines of one write() call
 * are contiguous and never interleave with another call's. Each write resolves
 * only after its bytes are synced to disk. Delivery is at least once: a failed
 * sync still rejects even though the lines were appended.
 */
export class JsonLinesSink<T> implements ResultSink<T> {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private lines = 0;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
    private readonly durable: boolean
  ) {}

  static async open<T>(path: string, options: JsonLinesSinkOptions = {}): Promise<JsonLinesSink<T>> {
    await mkdir(dirname(path), { recursive: true });
    const handle = await open(path, options.append ? 'a' : 'w');
    log.debug(`Opened ${path} (${options.append ? 'append' : 'truncate'})`);
    return new JsonLinesSink<T>(handle, path, options.durable ?? true);
  }

  get linesWritten(): number {
    return this.lines;
  }

  write(records: readonly T[]): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error(`Result sink for ${this.path} is closed`));
    }
    if (records.length === 0) {
      return Promise.resolve();
    }

    let chunk: string;
    try {
      chunk = records.map(record => `${JSON.stringify(record)}\n`).join('');
    } catch (error) {
      return Promise.reject(error);
    }

    const pending = this.tail.then(() => this.append(chunk, records.length));
    // The caller of write() gets the rejection; the chain itself keeps going
    this.tail = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.tail;
    await this.handle.close();
    log.debug(`Closed ${this.path} after ${this.lines} lines`);
  }

  /**
   * A sync failure after a successful append leaves the lines in the file while
   * the caller sees a rejection, so such a page can show up in both the output
   * and the failure report.
   */
  private async append(chunk: string, count: number): Promise<void> {
    await this.handle.appendFile(chunk, 'utf8');
    this.lines += count;
    if (!this.durable) return;

    try {
      await this.handle.datasync();
    } catch (error) {
      throw new Error(
        `${count} line(s) appended to ${this.path} but not synced; the page may appear in both the output and the failure report`,
        { cause: error }
      );
    }
  }
}
