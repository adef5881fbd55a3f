import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, open, readFile, rm, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { JsonLinesSink } from '../result-sink.js';
import { writeFailureReport } from '../failure-report.js';

const RowSchema = z.object({ name: z.string(), id: z.number() });
type Row = z.infer<typeof RowSchema>;

async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf8');
  return content.split('\n').filter(line => line.length > 0);
}

describe('JsonLinesSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'result-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one JSON object per line and keep non-ASCII text', async () => {
    const path = join(dir, 'out.jsonl');
    const sink = await JsonLinesSink.open<Row>(path);

    await sink.write([{ name: 'Zoë', id: 1 }, { name: 'Åsa', id: 2 }]);
    await sink.close();

    expect(await readFile(path, 'utf8')).toBe('{"name":"Zoë","id":1}\n{"name":"Åsa","id":2}\n');
    expect(sink.linesWritten).toBe(2);
  });

  it('should truncate an existing file by default and append when asked', async () => {
    const path = join(dir, 'out.jsonl');
    await writeFile(path, '{"stale":true}\n');

    const fresh = await JsonLinesSink.open<Row>(path);
    await fresh.write([{ name: 'a', id: 1 }]);
    await fresh.close();
    expect(await readLines(path)).toEqual(['{"name":"a","id":1}']);

    const appending = await JsonLinesSink.open<Row>(path, { append: true });
    await appending.write([{ name: 'b', id: 2 }]);
    await appending.close();
    expect(await readLines(path)).toEqual(['{"name":"a","id":1}', '{"name":"b","id":2}']);
  });

  it('should create missing parent directories', async () => {
    const path = join(dir, 'nested', 'deeper', 'out.jsonl');
    const sink = await JsonLinesSink.open<Row>(path);
    await sink.write([{ name: 'x', id: 9 }]);
    await sink.close();

    expect(await readLines(path)).toEqual(['{"name":"x","id":9}']);
  });

  it('should keep concurrent writes whole', async () => {
    const path = join(dir, 'out.jsonl');
    const sink = await JsonLinesSink.open<Row>(path);
    const writers = 200;

    await Promise.all(
      Array.from({ length: writers }, (_, i) =>
        sink.write([{ name: `writer-${i}-${'x'.repeat(i * 10)}`, id: i }])
      )
    );
    await sink.close();

    const lines = await readLines(path);
    expect(lines).toHaveLength(writers);
    const ids = lines.map(line => RowSchema.parse(JSON.parse(line)).id).sort((a, b) => a - b);
    expect(ids).toEqual(Array.from({ length: writers }, (_, i) => i));
  });

  it('should keep the lines of one batch together', async () => {
    const path = join(dir, 'out.jsonl');
    const sink = await JsonLinesSink.open<Row>(path, { durable: false });

    await Promise.all([
      sink.write([{ name: 'a', id: 1 }, { name: 'a', id: 2 }, { name: 'a', id: 3 }]),
      sink.write([{ name: 'b', id: 1 }, { name: 'b', id: 2 }])
    ]);
    await sink.close();

    const names = (await readLines(path)).map(line => RowSchema.parse(JSON.parse(line)).name);
    expect(names).toEqual(['a', 'a', 'a', 'b', 'b']);
  });

  it('should reject a record that cannot be serialized and keep going', async () => {
    const path = join(dir, 'out.jsonl');
    const sink = await JsonLinesSink.open<{ value: unknown }>(path);

    await expect(sink.write([{ value: 10n }])).rejects.toThrow(TypeError);
    await sink.write([{ value: 'fine' }]);
    await sink.close();

    expect(await readLines(path)).toEqual(['{"value":"fine"}']);
  });

  it('should keep appended lines and reject when the sync fails', async () => {
    const path = join(dir, 'out.jsonl');
    const scratch = await open(join(dir, 'scratch'), 'w');
    const handlePrototype: Pick<FileHandle, 'datasync'> = Object.getPrototypeOf(scratch);
    await scratch.close();
    const datasync = vi.spyOn(handlePrototype, 'datasync').mockRejectedValueOnce(new Error('disk gone'));

    const sink = await JsonLinesSink.open<Row>(path);
    try {
      await expect(sink.write([{ name: 'kept', id: 1 }])).rejects.toThrow(
        `1 line(s) appended to ${path} but not synced; the page may appear in both the output and the failure report`
      );
      await sink.write([{ name: 'next', id: 2 }]);
    } finally {
      await sink.close();
      datasync.mockRestore();
    }

    expect(await readLines(path)).toEqual(['{"name":"kept","id":1}', '{"name":"next","id":2}']);
    expect(sink.linesWritten).toBe(2);
  });

  it('should refuse writes after close', async () => {
    const sink = await JsonLinesSink.open<Row>(join(dir, 'out.jsonl'));
    await sink.close();

    await expect(sink.write([{ name: 'late', id: 1 }])).rejects.toThrow('is closed');
  });
});

describe('writeFailureReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'failure-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the failed pages document', async () => {
    const path = join(dir, 'failed_attempts.json');

    const report = await writeFailureReport(path, [3, 12]);

    expect(report).toEqual({ 'Failed Pages': [3, 12] });
    expect(await readFile(path, 'utf8')).toBe('{"Failed Pages":[3,12]}');
  });

  it('should write an empty list when nothing failed', async () => {
    const path = join(dir, 'failed_attempts.json');
    await writeFailureReport(path, []);

    expect(await readFile(path, 'utf8')).toBe('{"Failed Pages":[]}');
  });
});
