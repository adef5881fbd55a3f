const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

/**
 * Parse a duration into milliseconds.
 * Supports formats like: 250ms, 30s, 2m, 1h, or a bare number of milliseconds
 */
export function parseDurationMs(duration: string): number {
  const match = duration.trim().match(/^(\d+)(ms|s|m|h)?$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use formats like 500ms, 30s, 2m, 1h`);
  }

  const [, value, unit = 'ms'] = match;
  return parseInt(value, 10) * UNIT_MS[unit];
}

/**
 * Format a Date for display
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ') + ' UTC';
}
