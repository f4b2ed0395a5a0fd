/**
 * Reranking comparison: how each token's correction state moved from the
 * baseline model to the candidate model.
 *
 *   baseline       candidate      style
 *   unchanged      unchanged      black
 *   corrected      corrected      black
 *   uncorrected    uncorrected    bold black
 *   miscorrected   miscorrected   bold black
 *   miscorrected   unchanged      bold green
 *   unchanged      miscorrected   bold red
 *   uncorrected    corrected      green
 *   corrected      uncorrected    red
 */

import { InvariantViolation } from "../errors.js";
import type { PairedRecord } from "../logs/types.js";
import {
  identityModel,
  isCorrect,
  type CorrectnessPredicate,
} from "./reranking-model.js";
import type { Segment, Style } from "./types.js";

export type RerankingOutcome =
  | "unchanged-to-miscorrected"
  | "corrected-to-uncorrected"
  | "miscorrected-to-unchanged"
  | "uncorrected-to-corrected"
  | "unchanged-bad"
  | "unchanged-good";

export const RERANKING_STYLES: Record<RerankingOutcome, Style> = {
  "unchanged-to-miscorrected": { color: "red", bold: true },
  "corrected-to-uncorrected": { color: "red", bold: false },
  "miscorrected-to-unchanged": { color: "green", bold: true },
  "uncorrected-to-corrected": { color: "green", bold: false },
  "unchanged-bad": { color: "black", bold: true },
  "unchanged-good": { color: "black", bold: false },
};

export interface CorrectionState {
  /** The unmodified output was already right. */
  pre: boolean;
  /** The baseline model's correction is right. */
  base: boolean;
  /** The candidate model's correction is right. */
  post: boolean;
}

/**
 * Map a correction-state triple to its transition. First match wins;
 * a triple matching no row (a predicate that returned something other
 * than a boolean) throws InvariantViolation.
 */
export function classifyTransition(
  state: CorrectionState,
  context: Record<string, unknown> = {}
): RerankingOutcome {
  const { pre, base, post } = state;

  // base -> post changed
  if (pre === true && base === true && post === false) return "unchanged-to-miscorrected";
  if (pre === false && base === true && post === false) return "corrected-to-uncorrected";
  if (pre === true && base === false && post === true) return "miscorrected-to-unchanged";
  if (pre === false && base === false && post === true) return "uncorrected-to-corrected";

  // base -> post unchanged
  if (typeof pre === "boolean" && base === false && post === false) return "unchanged-bad";
  if (typeof pre === "boolean" && base === true && post === true) return "unchanged-good";

  throw new InvariantViolation(
    `unreachable correction transition (pre=${pre}, base=${base}, post=${post})`,
    { pre, base, post, ...context }
  );
}

export function createRerankingComparator(
  basePredicate: CorrectnessPredicate,
  candPredicate: CorrectnessPredicate
): (pair: PairedRecord) => Segment[] {
  return (pair) => {
    const baseResults = pair.baseline.results ?? [];
    const state: CorrectionState = {
      pre: isCorrect(pair.target, baseResults, identityModel),
      base: basePredicate(pair.target, baseResults),
      post: candPredicate(pair.target, pair.candidate.results ?? []),
    };
    const outcome = classifyTransition(state, {
      target: pair.target,
      message: pair.baseline.message,
      token: pair.baseline.token,
    });
    return [{ text: pair.target, style: RERANKING_STYLES[outcome] }];
  };
}
