/**
 * Positional pairing of a baseline log with a candidate log.
 */

import { AlignmentError } from "../errors.js";
import type { LogRecord, PairedRecord } from "./types.js";

export type RecordSource = AsyncIterable<LogRecord> | Iterable<LogRecord>;

function isAsyncSource(source: RecordSource): source is AsyncIterable<LogRecord> {
  return Symbol.asyncIterator in source;
}

function iteratorOf(source: RecordSource): AsyncIterator<LogRecord> | Iterator<LogRecord> {
  if (isAsyncSource(source)) {
    return source[Symbol.asyncIterator]();
  }
  return source[Symbol.iterator]();
}

async function closeIterator(
  iterator: AsyncIterator<LogRecord> | Iterator<LogRecord>
): Promise<void> {
  if (iterator.return) {
    await iterator.return();
  }
}

/**
 * Yield one PairedRecord per position, in order. Single pass: the
 * underlying iterators are consumed and closed when pairing stops.
 *
 * Throws AlignmentError when one log ends before the other, or when the
 * two records at a position have different targets. Two arrays of
 * different length are rejected before the first pair is produced.
 */
export async function* pairLogs(
  baseline: RecordSource,
  candidate: RecordSource
): AsyncGenerator<PairedRecord> {
  if (Array.isArray(baseline) && Array.isArray(candidate) && baseline.length !== candidate.length) {
    throw new AlignmentError(
      `baseline has ${baseline.length} records but candidate has ${candidate.length}`,
      Math.min(baseline.length, candidate.length)
    );
  }

  const base = iteratorOf(baseline);
  const cand = iteratorOf(candidate);
  let position = 0;
  try {
    while (true) {
      const [b, c] = await Promise.all([base.next(), cand.next()]);
      if (b.done && c.done) return;
      if (b.done || c.done) {
        const shorter = b.done ? "baseline" : "candidate";
        throw new AlignmentError(
          `${shorter} log ended after ${position} records while the other continues`,
          position
        );
      }
      if (b.value.target !== c.value.target) {
        throw new AlignmentError(
          `target mismatch at record ${position}: baseline ${JSON.stringify(b.value.target)}, candidate ${JSON.stringify(c.value.target)}`,
          position
        );
      }
      yield { target: b.value.target, baseline: b.value, candidate: c.value };
      position++;
    }
  } finally {
    await Promise.all([closeIterator(base), closeIterator(cand)]);
  }
}
