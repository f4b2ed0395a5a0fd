/**
 * Challenge dispatch
 *
 * Each challenge mode names the record fields it reads and knows how to
 * build its comparator from the two logs. "auto" picks the single mode
 * whose fields both logs carry.
 */

import { MalformedRecordError, UsageError } from "../errors.js";
import { logger } from "../logger.js";
import { pairLogs } from "../logs/pairer.js";
import type { LogRecord, PairedRecord } from "../logs/types.js";
import { compareCompletion } from "./completion.js";
import { createEntropyComparator, DEFAULT_ENTROPY_INTERVAL } from "./entropy.js";
import { createRerankingComparator } from "./reranking.js";
import { buildModel } from "./reranking-model.js";
import { renderLines, type LineSink } from "./render.js";
import type { ChallengeMode, Comparator } from "./types.js";

export type ChallengeChoice = ChallengeMode | "auto";

export const CHALLENGE_MODES: readonly ChallengeMode[] = ["completion", "entropy", "reranking"];

export type ModeField = "completions" | "logp" | "results";

export interface ChallengeOptions {
  entropyInterval: number;
}

export interface PreparedChallenge {
  comparator: Comparator;
  baseline: AsyncIterable<LogRecord> | Iterable<LogRecord>;
  candidate: AsyncIterable<LogRecord> | Iterable<LogRecord>;
}

export interface ChallengeDefinition {
  field: ModeField;
  /** Reads both logs fully before the first line can be rendered. */
  materializes: boolean;
  prepare(
    baseline: AsyncIterable<LogRecord>,
    candidate: AsyncIterable<LogRecord>,
    options: ChallengeOptions
  ): Promise<PreparedChallenge>;
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export const CHALLENGES: Record<ChallengeMode, ChallengeDefinition> = {
  completion: {
    field: "completions",
    materializes: false,
    async prepare(baseline, candidate) {
      return { comparator: compareCompletion, baseline, candidate };
    },
  },
  entropy: {
    field: "logp",
    materializes: false,
    async prepare(baseline, candidate, options) {
      return {
        comparator: createEntropyComparator(options.entropyInterval),
        baseline,
        candidate,
      };
    },
  },
  reranking: {
    field: "results",
    materializes: true,
    async prepare(baseline, candidate) {
      const [base, cand] = await Promise.all([collect(baseline), collect(candidate)]);
      logger.info("Fitting reranking models", {
        baselineRecords: base.length,
        candidateRecords: cand.length,
      });
      return {
        comparator: createRerankingComparator(buildModel(base), buildModel(cand)),
        baseline: base,
        candidate: cand,
      };
    },
  },
};

export function isChallengeChoice(value: string): value is ChallengeChoice {
  return value === "auto" || CHALLENGE_MODES.some((mode) => mode === value);
}

export function parseChallengeChoice(value: string): ChallengeChoice {
  if (!isChallengeChoice(value)) {
    throw new UsageError(
      `unknown challenge "${value}" (expected one of: auto, ${CHALLENGE_MODES.join(", ")})`
    );
  }
  return value;
}

/**
 * Modes whose field is present on both records. With exactly one match
 * that mode is returned; otherwise the logs need an explicit --challenge.
 */
export function detectChallenge(
  baseline: LogRecord | undefined,
  candidate: LogRecord | undefined
): ChallengeMode {
  if (baseline === undefined || candidate === undefined) {
    throw new UsageError("cannot detect the challenge of an empty log; pass --challenge");
  }
  const matches = CHALLENGE_MODES.filter((mode) => {
    const field = CHALLENGES[mode].field;
    return baseline[field] !== undefined && candidate[field] !== undefined;
  });
  if (matches.length === 0) {
    throw new UsageError(
      "logs carry none of completions, logp or results; unsupported log format"
    );
  }
  if (matches.length > 1) {
    throw new UsageError(
      `logs support several challenges (${matches.join(", ")}); pass --challenge to pick one`
    );
  }
  return matches[0];
}

export interface PeekedLog {
  first: LogRecord | undefined;
  records: AsyncIterable<LogRecord>;
  /** Release the source without reading `records`. */
  close(): Promise<void>;
}

/**
 * Read the first record without losing it: `records` yields it again,
 * followed by the rest of the source.
 */
export async function peekLog(source: AsyncIterable<LogRecord>): Promise<PeekedLog> {
  const iterator = source[Symbol.asyncIterator]();
  const head = await iterator.next();
  const first = head.done ? undefined : head.value;
  async function* replay(): AsyncGenerator<LogRecord> {
    try {
      if (head.done) return;
      yield head.value;
      while (true) {
        const next = await iterator.next();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      if (iterator.return) await iterator.return();
    }
  }
  return {
    first,
    records: replay(),
    async close() {
      if (iterator.return) await iterator.return();
    },
  };
}

/**
 * Stop with MalformedRecordError on the first pair whose baseline or
 * candidate record lacks `field`.
 */
export async function* requireField(
  pairs: AsyncIterable<PairedRecord>,
  field: ModeField,
  mode: ChallengeMode
): AsyncGenerator<PairedRecord> {
  let position = 0;
  for await (const pair of pairs) {
    for (const side of ["baseline", "candidate"] as const) {
      if (pair[side][field] === undefined) {
        throw new MalformedRecordError(
          `record ${position} has no "${field}" field, which the ${mode} challenge needs`,
          `${side} log`
        );
      }
    }
    yield pair;
    position++;
  }
}

export interface CompareLogsOptions {
  challenge: ChallengeChoice;
  entropyInterval?: number;
  sink: LineSink;
  /** Called once the mode is known, before any record is compared. */
  onChallenge?: (mode: ChallengeMode, definition: ChallengeDefinition) => void;
  /** Called after the comparator is built. */
  onPrepared?: (mode: ChallengeMode) => void;
}

/**
 * Compare two logs and yield rendered lines.
 */
export async function* compareLogs(
  baseline: AsyncIterable<LogRecord>,
  candidate: AsyncIterable<LogRecord>,
  options: CompareLogsOptions
): AsyncGenerator<string> {
  let mode: ChallengeMode;
  if (options.challenge === "auto") {
    const [peekedBase, peekedCand] = await Promise.allSettled([
      peekLog(baseline),
      peekLog(candidate),
    ]);
    if (peekedBase.status === "rejected" || peekedCand.status === "rejected") {
      await Promise.all(
        [peekedBase, peekedCand].map((peeked) =>
          peeked.status === "fulfilled" ? peeked.value.close() : undefined
        )
      );
      throw peekedBase.status === "rejected"
        ? peekedBase.reason
        : peekedCand.status === "rejected"
          ? peekedCand.reason
          : undefined;
    }
    const base = peekedBase.value;
    const cand = peekedCand.value;
    try {
      mode = detectChallenge(base.first, cand.first);
    } catch (err) {
      await Promise.all([base.close(), cand.close()]);
      throw err;
    }
    logger.info("Detected challenge", { challenge: mode });
    baseline = base.records;
    candidate = cand.records;
  } else {
    mode = options.challenge;
  }

  const definition = CHALLENGES[mode];
  options.onChallenge?.(mode, definition);
  const prepared = await definition.prepare(baseline, candidate, {
    entropyInterval: options.entropyInterval ?? DEFAULT_ENTROPY_INTERVAL,
  });
  options.onPrepared?.(mode);

  const pairs = requireField(
    pairLogs(prepared.baseline, prepared.candidate),
    definition.field,
    mode
  );
  yield* renderLines(pairs, prepared.comparator, options.sink);
}
