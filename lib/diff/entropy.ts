/**
 * Entropy comparison: drift in the log-probability each run assigns to
 * a token, split into bands of width interval/6.
 *
 *   logp difference        style
 *   unknown in both        magenta
 *   unknown -> known       white
 *   known -> unknown       bold white
 *   above +i/2             bold green
 *   +i/6 to +i/2           green
 *   -i/6 to +i/6           yellow
 *   -i/2 to -i/6           red
 *   below -i/2             bold red
 */

import { UsageError } from "../errors.js";
import type { PairedRecord } from "../logs/types.js";
import type { Segment, Style } from "./types.js";

export type EntropyOutcome =
  | "unknown"
  | "became-known"
  | "became-unknown"
  | "much-better"
  | "better"
  | "same"
  | "worse"
  | "much-worse";

export const ENTROPY_STYLES: Record<EntropyOutcome, Style> = {
  unknown: { color: "magenta", bold: false },
  "became-known": { color: "white", bold: false },
  "became-unknown": { color: "white", bold: true },
  "much-better": { color: "green", bold: true },
  better: { color: "green", bold: false },
  same: { color: "yellow", bold: false },
  worse: { color: "red", bold: false },
  "much-worse": { color: "red", bold: true },
};

export const DEFAULT_ENTROPY_INTERVAL = 10;

export function assertValidInterval(interval: number): void {
  if (!Number.isFinite(interval) || interval <= 0) {
    throw new UsageError(`entropy interval must be a positive number, got ${interval}`);
  }
}

/**
 * Classify candidate logp against baseline logp. Band edges belong to the
 * band nearer zero.
 */
export function classifyEntropy(
  base: number | null,
  cand: number | null,
  interval: number = DEFAULT_ENTROPY_INTERVAL
): EntropyOutcome {
  if (base === null && cand === null) return "unknown";
  if (cand === null) return "became-unknown";
  if (base === null) return "became-known";

  const diff = cand - base;
  const x = interval / 6;
  if (diff > 3 * x) return "much-better";
  if (diff > x) return "better";
  if (diff > -x) return "same";
  if (diff > -3 * x) return "worse";
  return "much-worse";
}

export function createEntropyComparator(
  interval: number = DEFAULT_ENTROPY_INTERVAL
): (pair: PairedRecord) => Segment[] {
  assertValidInterval(interval);
  return (pair) => {
    const outcome = classifyEntropy(
      pair.baseline.logp ?? null,
      pair.candidate.logp ?? null,
      interval
    );
    return [{ text: pair.target, style: ENTROPY_STYLES[outcome] }];
  };
}
