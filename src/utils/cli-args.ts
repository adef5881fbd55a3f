export interface CliOptions {
  baseUrl?: string;
  leagueId?: number;
  totalPages?: number;
  concurrency?: number;
  maxAttempts?: number;
  requestTimeout?: string;
  output?: string;
  failedOutput?: string;
  progressInterval?: number;
  logLevel?: string;
  timestamps?: boolean;
  help?: boolean;
}

export interface ParsedArgs {
  options: CliOptions;
}

type ValueFlag = 'baseUrl' | 'requestTimeout' | 'output' | 'failedOutput' | 'logLevel';
type NumericFlag = 'leagueId' | 'totalPages' | 'concurrency' | 'maxAttempts' | 'progressInterval';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '--base-url': 'baseUrl',
  '--timeout': 'requestTimeout',
  '--output': 'output',
  '--failed-output': 'failedOutput',
  '--log-level': 'logLevel'
};

const NUMERIC_FLAGS: Record<string, NumericFlag> = {
  '--league': 'leagueId',
  '--pages': 'totalPages',
  '--concurrency': 'concurrency',
  '--max-attempts': 'maxAttempts',
  '--progress-interval': 'progressInterval'
};

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --timestamps) don't take values. Numbers are parsed
 * here but validated by the config schema.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--timestamps') {
      options.timestamps = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const valueKey = VALUE_FLAGS[flag];
    const numericKey = NUMERIC_FLAGS[flag];

    if (!valueKey && !numericKey) {
      throw new Error(`Unknown option: ${arg}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    } else {
      throw new Error(`Missing value for ${flag}`);
    }

    if (valueKey) {
      options[valueKey] = value.trim();
    } else if (numericKey) {
      options[numericKey] = parseInt(value, 10);
    }
  }

  return { options };
}

export const USAGE = [
  'Usage:',
  '  npm run harvest -- [options]',
  '',
  'Options:',
  '  --pages N                 Number of pages to fetch, starting at 1 (default: 214849)',
  '  --concurrency N           Max simultaneous requests (default: 50)',
  '  --max-attempts N          Attempts per page before giving up, 1 to 9 (default: 5)',
  '  --timeout 30s             Per-request timeout (default: 30s)',
  '  --league N                League id (default: 314)',
  '  --base-url URL            API origin (default: https://fantasy.premierleague.com)',
  '  --output FILE             JSON Lines output (default: player_data.json)',
  '  --failed-output FILE      Failure report (default: failed_attempts.json)',
  '  --progress-interval N     Log progress every N pages (default: 10000)',
  '  --log-level LEVEL         quiet | normal | verbose | debug',
  '  --timestamps              Prefix log lines with ISO timestamps'
].join('\n');
