/**
 * CLI Configuration Store
 *
 * Persists default options using `conf` (XDG-compliant).
 * Config is stored at ~/.config/evaldiff-nodejs/config.json
 */

import Conf from "conf";
import { UsageError } from "../../lib/errors.js";
import {
  DEFAULT_ENTROPY_INTERVAL,
  assertValidInterval,
} from "../../lib/diff/entropy.js";
import { parseChallengeChoice, type ChallengeChoice } from "../../lib/diff/challenges.js";

export interface CliConfig {
  challenge: ChallengeChoice;
  entropyInterval: number;
}

export type ConfigKey = keyof CliConfig;

export const CONFIG_DEFAULTS: CliConfig = {
  challenge: "auto",
  entropyInterval: DEFAULT_ENTROPY_INTERVAL,
};

const CONFIG_KEYS: readonly ConfigKey[] = ["challenge", "entropyInterval"];

let store: Conf<CliConfig> | undefined;

function getStore(): Conf<CliConfig> {
  if (!store) {
    store = new Conf<CliConfig>({
      projectName: "evaldiff",
      defaults: CONFIG_DEFAULTS,
    });
  }
  return store;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

export function parseConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new UsageError(`unknown config key "${key}" (expected one of: ${CONFIG_KEYS.join(", ")})`);
  }
  return key;
}

export function parseEntropyInterval(value: string): number {
  const interval = Number(value);
  assertValidInterval(interval);
  return interval;
}

/**
 * Check a value read back from the config file, which may have been
 * edited by hand.
 */
export function checkStoredValue(key: "challenge", value: unknown): ChallengeChoice;
export function checkStoredValue(key: "entropyInterval", value: unknown): number;
export function checkStoredValue(key: ConfigKey, value: unknown): ChallengeChoice | number {
  try {
    if (key === "challenge") {
      if (typeof value !== "string") throw new UsageError(`expected a string, got ${JSON.stringify(value)}`);
      return parseChallengeChoice(value);
    }
    if (typeof value !== "number") throw new UsageError(`expected a number, got ${JSON.stringify(value)}`);
    assertValidInterval(value);
    return value;
  } catch (err) {
    if (err instanceof UsageError) {
      throw new UsageError(
        `invalid stored ${key}: ${err.message} (fix it with "evaldiff config set ${key} <value>" or "evaldiff config reset")`
      );
    }
    throw err;
  }
}

export function getDefaultChallenge(): ChallengeChoice {
  return checkStoredValue("challenge", getStore().get("challenge"));
}

export function getDefaultEntropyInterval(): number {
  return checkStoredValue("entropyInterval", getStore().get("entropyInterval"));
}

export function getConfig(): CliConfig {
  return {
    challenge: getDefaultChallenge(),
    entropyInterval: getDefaultEntropyInterval(),
  };
}

/**
 * Validate and store a value given on the command line.
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  if (key === "challenge") {
    getStore().set("challenge", parseChallengeChoice(value));
  } else {
    getStore().set("entropyInterval", parseEntropyInterval(value));
  }
}

export function resetConfig(): void {
  getStore().clear();
}

export function getConfigPath(): string {
  return getStore().path;
}
