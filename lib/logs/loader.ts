/**
 * JSON-lines log loading
 *
 * Streams a log file one record at a time. Blank lines are skipped;
 * anything else must be a JSON object matching LogRecordSchema.
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { createGunzip } from "node:zlib";
import type { Readable } from "node:stream";
import { MalformedRecordError } from "../errors.js";
import { logger } from "../logger.js";
import { LogRecordSchema, type LogRecord } from "./types.js";

/**
 * Validate one decoded JSON value as a log record.
 */
export function parseLogRecord(
  value: unknown,
  source: string,
  line?: number
): LogRecord {
  const parsed = LogRecordSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new MalformedRecordError(
      `invalid log record${where}: ${issue ? issue.message : "unknown schema error"}`,
      source,
      line
    );
  }
  return parsed.data;
}

/**
 * Decode and validate a single line of JSON.
 */
export function parseLogLine(text: string, source: string, line?: number): LogRecord {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedRecordError(`invalid JSON: ${reason}`, source, line);
  }
  return parseLogRecord(value, source, line);
}

/**
 * Parse records from any readable stream of JSON lines.
 */
export async function* readJsonLinesFrom(
  input: Readable,
  source: string
): AsyncGenerator<LogRecord> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  let count = 0;
  try {
    for await (const text of lines) {
      lineNumber++;
      if (text.trim() === "") continue;
      count++;
      yield parseLogLine(text, source, lineNumber);
    }
  } finally {
    lines.close();
    input.destroy();
  }
  logger.debug("Finished reading log", { source, records: count });
}

/**
 * Stream records from a file. `.gz` files are decompressed on the fly.
 */
export function readJsonLines(path: string): AsyncGenerator<LogRecord> {
  logger.info("Reading log", { path });
  const file = createReadStream(path);
  if (!path.endsWith(".gz")) {
    return readJsonLinesFrom(file, path);
  }
  const gunzip = createGunzip();
  file.on("error", (err) => gunzip.destroy(err));
  return readJsonLinesFrom(file.pipe(gunzip), path);
}
