import { z } from 'zod';
import { parseDurationMs } from '../utils/time-parser.js';

const PositiveInt = z.coerce.number().int().positive();

const DurationMsSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .transform((value, ctx) => {
      try {
        return parseDurationMs(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    })
    .pipe(z.number().int().positive()),
]);

export const DEFAULT_BASE_URL = 'https://fantasy.premierleague.com';

// The last wait follows attempt index MAX_ATTEMPTS_LIMIT - 2, and 5s * 2^7 is
// still under MAX_BACKOFF_MS, so configured runs never hit the backoff cap.
export const MAX_ATTEMPTS_LIMIT = 9;

export const HarvestConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  leagueId: PositiveInt.default(314),
  totalPages: PositiveInt.default(214849),
  concurrency: PositiveInt.default(50),
  maxAttempts: PositiveInt.max(MAX_ATTEMPTS_LIMIT).default(5),
  requestTimeoutMs: DurationMsSchema.default(30_000),
  outputFile: z.string().min(1).default('player_data.json'),
  failedPagesFile: z.string().min(1).default('failed_attempts.json'),
  progressInterval: PositiveInt.default(10_000),
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;
