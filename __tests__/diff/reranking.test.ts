/**
 * Unit tests for reranking comparison and correctness models
 */

import {
  RERANKING_STYLES,
  classifyTransition,
  createRerankingComparator,
  type RerankingOutcome,
} from "../../lib/diff/reranking.js";
import {
  buildModel,
  fitRerankingModel,
  identityModel,
  isCorrect,
  topCandidate,
  type CorrectnessPredicate,
} from "../../lib/diff/reranking-model.js";
import { InvariantViolation } from "../../lib/errors.js";
import type { LogRecord } from "../../lib/logs/types.js";

// Identity picks "their"; the language model needs weight >= 0.2 to flip it.
const THERE: LogRecord = {
  target: "there",
  results: [
    ["their", -1, -5],
    ["there", -1.5, -2],
  ],
};
// Identity is right; weights below 0.75 keep it right.
const CAT: LogRecord = {
  target: "cat",
  results: [
    ["cat", -0.5, -3],
    ["cut", -2, -1],
  ],
};

const always: CorrectnessPredicate = () => true;
const never: CorrectnessPredicate = () => false;
// Stands in for a predicate from untyped code that returns null.
const broken: CorrectnessPredicate = () => JSON.parse("null");

async function runTests() {
  console.log("Running reranking comparison tests...\n");

  let testsPassed = 0;
  let testsFailed = 0;

  // Test 1: Every correction state maps to a transition
  try {
    console.log("Test 1: Every correction state maps to a transition");
    const table: Array<[boolean, boolean, boolean, RerankingOutcome]> = [
      [true, true, false, "unchanged-to-miscorrected"],
      [false, true, false, "corrected-to-uncorrected"],
      [true, false, true, "miscorrected-to-unchanged"],
      [false, false, true, "uncorrected-to-corrected"],
      [true, false, false, "unchanged-bad"],
      [false, false, false, "unchanged-bad"],
      [true, true, true, "unchanged-good"],
      [false, true, true, "unchanged-good"],
    ];
    for (const [pre, base, post, expected] of table) {
      const outcome = classifyTransition({ pre, base, post });
      if (outcome !== expected) {
        throw new Error(`(${pre}, ${base}, ${post}): expected ${expected}, got ${outcome}`);
      }
    }
    console.log("  ✓ All 8 states classified\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 2: Transition styles
  try {
    console.log("Test 2: Transition styles");
    const expected: Record<RerankingOutcome, string> = {
      "unchanged-to-miscorrected": "bold red",
      "corrected-to-uncorrected": "red",
      "miscorrected-to-unchanged": "bold green",
      "uncorrected-to-corrected": "green",
      "unchanged-bad": "bold black",
      "unchanged-good": "black",
    };
    const outcomes: RerankingOutcome[] = [
      "unchanged-to-miscorrected",
      "corrected-to-uncorrected",
      "miscorrected-to-unchanged",
      "uncorrected-to-corrected",
      "unchanged-bad",
      "unchanged-good",
    ];
    for (const outcome of outcomes) {
      const style = RERANKING_STYLES[outcome];
      const name = `${style.bold ? "bold " : ""}${style.color}`;
      if (expected[outcome] !== name) {
        throw new Error(`${outcome}: expected ${expected[outcome]}, got ${name}`);
      }
    }
    console.log("  ✓ (T,T,F) bold red, (T,F,F) bold black\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 3: Top candidate and ties
  try {
    console.log("Test 3: Top candidate and ties");
    const tie = topCandidate(
      [
        ["a", -1, null],
        ["b", -1, null],
      ],
      identityModel
    );
    if (topCandidate(THERE.results ?? [], identityModel) !== "their") {
      throw new Error("Identity should pick the best error score");
    }
    if (tie !== "a") throw new Error(`Tie should keep the first, got ${tie}`);
    if (topCandidate([], identityModel) !== null) throw new Error("Empty results have no top");
    if (isCorrect("x", [], identityModel)) throw new Error("Empty results are never correct");
    console.log("  ✓ First best wins, empty is incorrect\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 4: Fitting picks the smallest weight that corrects the most
  try {
    console.log("Test 4: Fitting picks the smallest best weight");
    const model = fitRerankingModel([THERE, CAT, { target: "skipped" }]);

    if (Math.abs(model.weight - 0.2) > 1e-9) {
      throw new Error(`Expected weight 0.2, got ${model.weight}`);
    }
    if (model.correct !== 2 || model.total !== 2) {
      throw new Error(`Expected 2/2, got ${model.correct}/${model.total}`);
    }
    if (model.unknownLmScore !== -6) {
      throw new Error(`Expected unknown lm score -6, got ${model.unknownLmScore}`);
    }
    if (countCorrect(buildModel([THERE, CAT])) !== 2) {
      throw new Error("Predicate should accept both records");
    }
    console.log(`  ✓ weight ${model.weight}, ${model.correct}/${model.total} correct\n`);
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 5: A fitted model never does worse than no reranking
  try {
    console.log("Test 5: Fitted model is at least as good as identity");
    const misleading: LogRecord = {
      target: "form",
      results: [
        ["form", -0.2, -9],
        ["from", -3, -0.5],
      ],
    };
    const model = fitRerankingModel([misleading]);
    if (model.weight !== 0 || model.correct !== 1) {
      throw new Error(`Expected weight 0 with 1 correct, got ${model.weight} / ${model.correct}`);
    }
    const empty = fitRerankingModel([]);
    if (empty.unknownLmScore !== 0 || empty.total !== 0) {
      throw new Error("Empty log should fit the identity");
    }
    console.log("  ✓ Weight stays 0 when the language model only hurts\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 6: Comparator combines the unmodified output with both predicates
  try {
    console.log("Test 6: Comparator uses pre, base and post");
    const regressed = createRerankingComparator(always, never)({
      target: "there",
      baseline: THERE,
      candidate: THERE,
    });
    const fixed = createRerankingComparator(never, always)({
      target: "cat",
      baseline: CAT,
      candidate: CAT,
    });

    // pre is false for THERE: identity picks "their"
    if (regressed[0].style.color !== "red" || regressed[0].style.bold) {
      throw new Error(`Expected plain red, got ${JSON.stringify(regressed[0].style)}`);
    }
    // pre is true for CAT
    if (fixed[0].style.color !== "green" || !fixed[0].style.bold) {
      throw new Error(`Expected bold green, got ${JSON.stringify(fixed[0].style)}`);
    }
    if (regressed[0].text !== "there" || fixed[0].text !== "cat") {
      throw new Error("Target text not written");
    }
    console.log("  ✓ corrected→uncorrected red, miscorrected→unchanged bold green\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 7: Same log on both sides shows no change
  try {
    console.log("Test 7: Same log on both sides shows no change");
    const log = [THERE, CAT];
    const compare = createRerankingComparator(buildModel(log), buildModel(log));
    for (const record of log) {
      const [segment] = compare({ target: record.target, baseline: record, candidate: record });
      if (segment.style.color !== "black") {
        throw new Error(`${record.target}: expected black, got ${segment.style.color}`);
      }
    }
    console.log("  ✓ Only black styles\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Test 8: A predicate that returns a non-boolean is an invariant violation
  try {
    console.log("Test 8: Non-boolean predicate result");
    let caught: unknown;
    try {
      createRerankingComparator(broken, broken)({
        target: "cat",
        baseline: { ...CAT, message: 2, token: 4 },
        candidate: CAT,
      });
    } catch (err) {
      caught = err;
    }

    if (!(caught instanceof InvariantViolation)) {
      throw new Error(`Expected InvariantViolation, got ${caught}`);
    }
    if (caught.message !== "unreachable correction transition (pre=true, base=null, post=null)") {
      throw new Error(`Unexpected message: ${caught.message}`);
    }
    const { pre, base, post, target, message, token } = caught.details;
    if (pre !== true || base !== null || post !== null) {
      throw new Error(`Unexpected triple: ${JSON.stringify(caught.details)}`);
    }
    if (target !== "cat" || message !== 2 || token !== 4) {
      throw new Error(`Unexpected context: ${JSON.stringify(caught.details)}`);
    }
    console.log("  ✓ Thrown with the triple and the token it came from\n");
    testsPassed++;
  } catch (err) {
    console.error(`  ✗ FAILED: ${err}\n`);
    testsFailed++;
  }

  // Summary
  console.log("=====================================");
  console.log(`Tests passed: ${testsPassed}`);
  console.log(`Tests failed: ${testsFailed}`);
  console.log("=====================================");

  if (testsFailed > 0) {
    process.exit(1);
  }
}

function countCorrect(predicate: CorrectnessPredicate): number {
  return [THERE, CAT].filter((r) => predicate(r.target, r.results ?? [])).length;
}

runTests().catch((error) => {
  console.error("Test execution failed:", error);
  process.exit(1);
});
