import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// Field values are copied through as-is; only their presence is checked.
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const StandingsEntrySchema = z.object({
  player_name: JsonValueSchema,
  entry_name: JsonValueSchema,
  entry: JsonValueSchema,
});

export type StandingsEntry = z.infer<typeof StandingsEntrySchema>;

// Only the keys we read are declared; anything else in the body is ignored.
export const StandingsPageSchema = z.object({
  standings: z.object({
    results: z.array(StandingsEntrySchema),
  }),
});

export type StandingsPage = z.infer<typeof StandingsPageSchema>;

export const PlayerRecordSchema = z.object({
  'Full Name': JsonValueSchema,
  'Team Name': JsonValueSchema,
  'Player ID': JsonValueSchema,
});

export type PlayerRecord = z.infer<typeof PlayerRecordSchema>;

export function toPlayerRecord(entry: StandingsEntry): PlayerRecord {
  return {
    'Full Name': entry.player_name,
    'Team Name': entry.entry_name,
    'Player ID': entry.entry,
  };
}
