/**
 * Config Commands
 *
 * evaldiff config get [key]          — Show stored defaults
 * evaldiff config set <key> <value>  — Change a default
 * evaldiff config reset              — Restore built-in defaults
 * evaldiff config path               — Print the config file location
 */

import { Command } from "commander";
import chalk from "chalk";
import { UsageError, reportError } from "../../../lib/errors.js";
import {
  getConfig,
  getConfigPath,
  parseConfigKey,
  resetConfig,
  setConfigValue,
} from "../config.js";

function fail(err: unknown): never {
  if (!(err instanceof UsageError)) {
    reportError(err, { context: "config" });
  }
  console.error(chalk.red("Error: " + (err instanceof Error ? err.message : String(err))));
  process.exit(1);
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage default options for compare");

  config
    .command("get")
    .description("Show stored defaults")
    .argument("[key]", "challenge or entropyInterval")
    .option("--json", "Output raw JSON")
    .action((key: string | undefined, opts: { json?: boolean }) => {
      try {
        const values = getConfig();
        if (key !== undefined) {
          const value = values[parseConfigKey(key)];
          console.log(opts.json ? JSON.stringify(value) : String(value));
          return;
        }
        if (opts.json) {
          console.log(JSON.stringify(values, null, 2));
          return;
        }
        console.log();
        console.log("  challenge:        " + chalk.bold(values.challenge));
        console.log("  entropyInterval:  " + chalk.bold(String(values.entropyInterval)));
        console.log("  Config:           " + chalk.dim(getConfigPath()));
        console.log();
      } catch (err) {
        fail(err);
      }
    });

  config
    .command("set")
    .description("Change a default")
    .argument("<key>", "challenge or entropyInterval")
    .argument("<value>", "New value")
    .action((key: string, value: string) => {
      try {
        setConfigValue(parseConfigKey(key), value);
        console.log(chalk.green("✓") + ` ${key} set to ` + chalk.bold(value));
      } catch (err) {
        fail(err);
      }
    });

  config
    .command("reset")
    .description("Restore built-in defaults")
    .action(() => {
      resetConfig();
      console.log(chalk.green("✓") + " Defaults restored");
    });

  config
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}
