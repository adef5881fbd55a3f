import { HarvestConfigSchema } from '../types/config.js';
import type { HarvestConfig, HarvestConfigInput } from '../types/config.js';
import { ConfigError } from '../types/errors.js';
import type { CliOptions } from './cli-args.js';

type Env = Record<string, string | undefined>;

// Values copied from dashboards often arrive quoted
function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim().replace(/^["']|["']$/g, '');
  return value ? value : undefined;
}

/**
 * Merge defaults, environment and CLI flags (later wins) and validate.
 */
export function resolveHarvestConfig(options: CliOptions = {}, env: Env = process.env): HarvestConfig {
  const raw: Record<keyof HarvestConfigInput, unknown> = {
    baseUrl: options.baseUrl ?? fromEnv(env, 'STANDINGS_BASE_URL'),
    leagueId: options.leagueId ?? fromEnv(env, 'LEAGUE_ID'),
    totalPages: options.totalPages ?? fromEnv(env, 'TOTAL_PAGES'),
    concurrency: options.concurrency ?? fromEnv(env, 'MAX_CONCURRENT_REQUESTS'),
    maxAttempts: options.maxAttempts ?? fromEnv(env, 'MAX_ATTEMPTS'),
    requestTimeoutMs: options.requestTimeout ?? fromEnv(env, 'REQUEST_TIMEOUT'),
    outputFile: options.output ?? fromEnv(env, 'OUTPUT_FILE'),
    failedPagesFile: options.failedOutput ?? fromEnv(env, 'FAILED_PAGES_FILE'),
    progressInterval: options.progressInterval ?? fromEnv(env, 'PROGRESS_INTERVAL')
  };

  const parsed = HarvestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
