import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HarvestEngine } from '../src/engines/harvest-engine.js';
import { StandingsApi } from '../src/providers/standings-api.js';
import { JsonLinesSink } from '../src/drivers/result-sink.js';
import { PlayerRecordSchema } from '../src/types/standings.js';
import type { PlayerRecord } from '../src/types/standings.js';

function standingsBody(page: number, count: number): string {
  return JSON.stringify({
    standings: {
      page,
      results: Array.from({ length: count }, (_, i) => ({
        player_name: `Player ${page}-${i}`,
        entry_name: `Team ${page}-${i}`,
        entry: page * 100 + i
      }))
    }
  });
}

/**
 * In-process stand-in for the standings endpoint.
 * Page 1: two players. Page 2: 429 once, then one player. Page 3: always 500.
 */
function createFakeEndpoint() {
  const hits = new Map<number, number>();

  const fetchImpl = vi.fn<typeof fetch>(async input => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const page = Number(url.searchParams.get('page_standings'));
    const hit = (hits.get(page) ?? 0) + 1;
    hits.set(page, hit);

    if (page === 1) return new Response(standingsBody(1, 2), { status: 200 });
    if (page === 2 && hit === 1) return new Response('Too Many Requests', { status: 429 });
    if (page === 2) return new Response(standingsBody(2, 1), { status: 200 });
    return new Response('Internal Server Error', { status: 500 });
  });

  return { fetchImpl, hits };
}

describe('standings harvest end to end', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'harvest-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should write successes, report the exhausted page and summarise', async () => {
    const outputPath = join(dir, 'player_data.json');
    const reportPath = join(dir, 'failed_attempts.json');
    const { fetchImpl, hits } = createFakeEndpoint();
    const waits: number[] = [];

    const source = new StandingsApi({
      baseUrl: 'https://standings.test',
      leagueId: 314,
      requestTimeoutMs: 1000,
      fetchImpl
    });
    const sink = await JsonLinesSink.open<PlayerRecord>(outputPath);
    const engine = new HarvestEngine<PlayerRecord>({
      source,
      sink,
      sleep: async ms => {
        waits.push(ms);
      }
    });

    const summary = await engine.run({
      totalPages: 3,
      concurrency: 2,
      maxAttempts: 5,
      failureReportPath: reportPath
    });
    await sink.close();

    expect(summary).toMatchObject({ succeeded: 2, failed: 1, cancelled: 0, recordsWritten: 3, failedPages: [3] });
    expect(await readFile(reportPath, 'utf8')).toBe('{"Failed Pages":[3]}');

    const lines = (await readFile(outputPath, 'utf8')).split('\n').filter(Boolean);
    expect(lines).toHaveLength(3);
    const records = lines.map(line => PlayerRecordSchema.parse(JSON.parse(line))).sort((a, b) => Number(a['Player ID']) - Number(b['Player ID']));
    expect(records).toEqual([
      { 'Full Name': 'Player 1-0', 'Team Name': 'Team 1-0', 'Player ID': 100 },
      { 'Full Name': 'Player 1-1', 'Team Name': 'Team 1-1', 'Player ID': 101 },
      { 'Full Name': 'Player 2-0', 'Team Name': 'Team 2-0', 'Player ID': 200 }
    ]);

    expect(hits.get(1)).toBe(1);
    expect(hits.get(2)).toBe(2);
    expect(hits.get(3)).toBe(5);
    // Page 3's waits alone add up to 1+2+4+8 seconds
    expect(waits.reduce((sum, ms) => sum + ms, 0)).toBeGreaterThanOrEqual(15000);
  });
});
