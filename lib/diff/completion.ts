/**
 * Completion comparison: how many characters of each token a user must
 * type before the model offers the rest of it.
 *
 *   baseline      candidate     style
 *   predicted     predicted     black
 *   unpredicted   unpredicted   default
 *   unpredicted   predicted     bold green
 *   predicted     unpredicted   bold red
 */

import type { PairedRecord } from "../logs/types.js";
import { NEUTRAL, PLAIN, type Segment, type Style } from "./types.js";

export type CompletionOutcome = "regressed" | "improved" | "unchanged";

export const COMPLETION_STYLES: Record<CompletionOutcome, Style> = {
  regressed: { color: "red", bold: true },
  improved: { color: "green", bold: true },
  unchanged: PLAIN,
};

// Cold-start predictions (nothing typed yet) get one extra slot.
const FIRST_POSITION_MAX_RANK = 3;
const MAX_RANK = 2;

/** 1-based position of `completion` in `candidates`, or null. */
export function rank(candidates: readonly string[], completion: string): number | null {
  const index = candidates.indexOf(completion);
  return index === -1 ? null : index + 1;
}

/**
 * Number of characters typed before the remaining suffix shows up within
 * the acceptable rank, or the full length when it never does.
 */
export function ntyped(target: string, completions: readonly (readonly string[])[]): number {
  const chars = Array.from(target);
  const limit = Math.min(chars.length, completions.length);
  for (let i = 0; i < limit; i++) {
    const r = rank(completions[i], chars.slice(i).join(""));
    if (r !== null && r <= (i === 0 ? FIRST_POSITION_MAX_RANK : MAX_RANK)) {
      return i;
    }
  }
  return chars.length;
}

export interface CompletionClassification {
  /** Characters both runs needed typed. */
  shared: number;
  outcome: CompletionOutcome;
}

export function classifyCompletion(
  target: string,
  baseline: readonly (readonly string[])[],
  candidate: readonly (readonly string[])[]
): CompletionClassification {
  const base = ntyped(target, baseline);
  const cand = ntyped(target, candidate);
  const outcome: CompletionOutcome =
    base < cand ? "regressed" : cand < base ? "improved" : "unchanged";
  return { shared: Math.min(base, cand), outcome };
}

export function compareCompletion(pair: PairedRecord): Segment[] {
  const { shared, outcome } = classifyCompletion(
    pair.target,
    pair.baseline.completions ?? [],
    pair.candidate.completions ?? []
  );
  const chars = Array.from(pair.target);
  return [
    { text: chars.slice(0, shared).join(""), style: NEUTRAL },
    { text: chars.slice(shared).join(""), style: COMPLETION_STYLES[outcome] },
  ];
}
