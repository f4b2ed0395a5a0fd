/**
 * Log record schema
 *
 * One line of an evaluation log describes one token of the evaluated
 * text. Which of `completions`, `logp` and `results` are present depends
 * on the challenge the log was produced by.
 */

import { z } from "zod";

/** `[candidate, errorScore, lmScore]`; lmScore is null for unknown words. */
export const RerankingResultSchema = z.tuple([
  z.string(),
  z.number(),
  z.number().nullable(),
]);

export const LogRecordSchema = z.object({
  user: z.string().nullish(),
  character: z.number().int().nonnegative().optional(),
  message: z.number().int().nonnegative().optional(),
  token: z.number().int().nonnegative().optional(),
  target: z.string(),
  completions: z.array(z.array(z.string())).optional(),
  logp: z.number().nullable().optional(),
  results: z.array(RerankingResultSchema).optional(),
});

export type RerankingResult = z.infer<typeof RerankingResultSchema>;
export type LogRecord = z.infer<typeof LogRecordSchema>;

export interface PairedRecord {
  target: string;
  baseline: LogRecord;
  candidate: LogRecord;
}
