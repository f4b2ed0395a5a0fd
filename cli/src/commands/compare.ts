/**
 * Compare Command
 *
 * evaldiff compare baseline.jsonl candidate.jsonl [-c entropy] [-i 6]
 *
 * Prints the candidate log's target text with every token styled by how
 * the candidate did against the baseline, one line per message.
 */

import { access } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import chalk, { Chalk, type ChalkInstance } from "chalk";
import ora, { type Ora } from "ora";
import {
  AnsiLineSink,
  compareLogs,
  parseChallengeChoice,
  type ChallengeChoice,
} from "../../../lib/diff/index.js";
import { EvalDiffError, UsageError, reportError } from "../../../lib/errors.js";
import { readJsonLines } from "../../../lib/logs/loader.js";
import { isLevelEnabled, logger, setVerbosity } from "../../../lib/logger.js";
import {
  getDefaultChallenge,
  getDefaultEntropyInterval,
  parseEntropyInterval,
} from "../config.js";

interface CompareOptions {
  challenge?: ChallengeChoice;
  entropyInterval?: number;
  verbose: number;
  color?: boolean;
}

function commanderParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (err) {
      if (err instanceof UsageError) {
        throw new InvalidArgumentError(err.message);
      }
      throw err;
    }
  };
}

function painterFor(color: boolean | undefined): ChalkInstance {
  if (color === undefined) return chalk;
  if (!color) return new Chalk({ level: 0 });
  return new Chalk({ level: chalk.level > 0 ? chalk.level : 1 });
}

async function assertReadable(path: string): Promise<void> {
  try {
    await access(path);
  } catch {
    throw new UsageError(`cannot read log file ${path}`);
  }
}

export function registerCompareCommand(program: Command): void {
  program
    .command("compare")
    .description("Show a token-by-token comparison of two evaluation logs")
    .argument("<baseline>", "Baseline log (JSON lines, optionally .gz)")
    .argument("<log>", "Candidate log over the same text")
    .option(
      "-c, --challenge <mode>",
      "Challenge to view: completion, entropy, reranking or auto",
      commanderParser(parseChallengeChoice)
    )
    .option(
      "-i, --entropy-interval <n>",
      "Interval to show entropy differences over (positive)",
      commanderParser(parseEntropyInterval)
    )
    .option(
      "-v, --verbose",
      "Log more detail to stderr (repeat for debug output)",
      (_: string, previous: number) => previous + 1,
      0
    )
    .option("--color", "Always emit ANSI styling")
    .option("--no-color", "Never emit ANSI styling")
    .action(async (baselinePath: string, logPath: string, opts: CompareOptions) => {
      setVerbosity(opts.verbose);
      const progress: { spinner?: Ora } = {};

      try {
        const challenge = opts.challenge ?? getDefaultChallenge();
        const entropyInterval = opts.entropyInterval ?? getDefaultEntropyInterval();
        await Promise.all([assertReadable(baselinePath), assertReadable(logPath)]);
        logger.info("Comparing logs", {
          baseline: baselinePath,
          log: logPath,
          challenge,
          entropyInterval,
        });

        const lines = compareLogs(readJsonLines(baselinePath), readJsonLines(logPath), {
          challenge,
          entropyInterval,
          sink: new AnsiLineSink(painterFor(opts.color)),
          onChallenge: (mode, definition) => {
            if (definition.materializes) {
              progress.spinner = ora({
                text: `Fitting ${mode} models...`,
                color: "blue",
                stream: process.stderr,
                isSilent: !process.stderr.isTTY,
              }).start();
            }
          },
          onPrepared: () => {
            progress.spinner?.stop();
          },
        });

        for await (const line of lines) {
          console.log(line);
        }
      } catch (err) {
        progress.spinner?.stop();
        if (!(err instanceof EvalDiffError) || isLevelEnabled("info")) {
          reportError(err, { context: "compare", baseline: baselinePath, log: logPath });
        }
        if (err instanceof UsageError) {
          console.error(chalk.red("Error: " + err.message));
          console.error(chalk.dim("Run evaldiff compare --help for usage."));
        } else if (err instanceof EvalDiffError) {
          console.error(chalk.red(`${err.name}: ${err.message}`));
        } else if (err instanceof Error) {
          console.error(chalk.red("Error: " + err.message));
        }
        process.exit(1);
      }
    });
}
