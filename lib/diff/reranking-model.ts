/**
 * Reranking correctness models
 *
 * A reranking log lists, per token, the candidate corrections with an
 * error-model score and a language-model score. A scoring model combines
 * the two; the candidate with the best combined score is the corrected
 * output. The model fitted to a log is the interpolation weight that
 * corrects the most tokens of that log.
 */

import { logger } from "../logger.js";
import type { LogRecord, RerankingResult } from "../logs/types.js";

export type ScoringModel = (errorScore: number, lmScore: number | null) => number;

/** "Does this ranked result list correct to the target text?" */
export type CorrectnessPredicate = (
  target: string,
  results: readonly RerankingResult[]
) => boolean;

/** No reranking: the error model alone decides. */
export const identityModel: ScoringModel = (errorScore) => errorScore;

export interface FittedRerankingModel {
  weight: number;
  unknownLmScore: number;
  /** Records the model corrects, out of `total`. */
  correct: number;
  total: number;
  score: ScoringModel;
}

const WEIGHT_STEP = 0.05;
const WEIGHT_STEPS = 60;

/**
 * Best-scoring candidate under `model`; the first one wins ties.
 */
export function topCandidate(
  results: readonly RerankingResult[],
  model: ScoringModel
): string | null {
  let best: string | null = null;
  let bestScore = -Infinity;
  for (const [candidate, errorScore, lmScore] of results) {
    const score = model(errorScore, lmScore);
    if (best === null || score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

export function isCorrect(
  target: string,
  results: readonly RerankingResult[],
  model: ScoringModel
): boolean {
  return topCandidate(results, model) === target;
}

export function interpolatedModel(weight: number, unknownLmScore: number): ScoringModel {
  return (errorScore, lmScore) => errorScore + weight * (lmScore ?? unknownLmScore);
}

function countCorrect(records: readonly LogRecord[], model: ScoringModel): number {
  let correct = 0;
  for (const record of records) {
    if (record.results && isCorrect(record.target, record.results, model)) {
      correct++;
    }
  }
  return correct;
}

/**
 * Fit the interpolation weight by grid search over 0, 0.05, ..., 3.
 * Unknown words score one below the lowest known lm score in the log.
 */
export function fitRerankingModel(records: readonly LogRecord[]): FittedRerankingModel {
  const scored = records.filter((r) => r.results !== undefined && r.results.length > 0);
  if (records.length > 0 && scored.length === 0) {
    logger.warn("No reranking results in log; falling back to the error model alone", {
      records: records.length,
    });
  }

  let lowest = Infinity;
  for (const record of scored) {
    for (const [, , lmScore] of record.results ?? []) {
      if (lmScore !== null && lmScore < lowest) lowest = lmScore;
    }
  }
  const unknownLmScore = Number.isFinite(lowest) ? lowest - 1 : 0;

  let weight = 0;
  let correct = countCorrect(scored, identityModel);
  for (let step = 1; step <= WEIGHT_STEPS; step++) {
    const w = step * WEIGHT_STEP;
    const n = countCorrect(scored, interpolatedModel(w, unknownLmScore));
    if (n > correct) {
      weight = w;
      correct = n;
    }
  }

  logger.debug("Fitted reranking model", {
    weight,
    unknownLmScore,
    correct,
    total: scored.length,
  });

  return {
    weight,
    unknownLmScore,
    correct,
    total: scored.length,
    score: interpolatedModel(weight, unknownLmScore),
  };
}

export function correctnessPredicate(model: ScoringModel): CorrectnessPredicate {
  return (target, results) => isCorrect(target, results, model);
}

/**
 * Fit a model to a whole log and return its correctness predicate.
 */
export function buildModel(records: readonly LogRecord[]): CorrectnessPredicate {
  return correctnessPredicate(fitRerankingModel(records).score);
}
