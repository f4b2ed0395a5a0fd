#!/usr/bin/env node

/**
 * evaldiff CLI
 *
 * Token-by-token comparison of two language-model evaluation logs.
 *
 * Usage:
 *   evaldiff compare base.jsonl cand.jsonl          Auto-detect the challenge
 *   evaldiff compare base.jsonl cand.jsonl -c entropy -i 6
 *   evaldiff config set entropyInterval 6           Change a default
 *   evaldiff config get                             Show defaults
 */

import { Command } from "commander";
import { registerCompareCommand } from "./commands/compare.js";
import { registerConfigCommands } from "./commands/config.js";

const program = new Command();

program
  .name("evaldiff")
  .description("evaldiff — compare a candidate evaluation log against a baseline")
  .version("0.1.0");

registerCompareCommand(program);
registerConfigCommands(program);

await program.parseAsync();
