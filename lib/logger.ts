/**
 * Structured stderr logging.
 *
 * Same line format as reportError: one JSON object per line, so the
 * rendered diff on stdout stays clean when stderr is redirected.
 * The threshold comes from the number of -v flags.
 */

export type LogLevel = "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  warn: 0,
  info: 1,
  debug: 2,
};

let threshold = 0;

/** 0 → warn, 1 → info, 2 or more → debug. */
export function setVerbosity(count: number): void {
  threshold = Math.max(0, Math.floor(count));
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= threshold;
}

function emit(level: LogLevel, message: string, meta: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  const line = JSON.stringify({
    level,
    timestamp: new Date().toISOString(),
    message,
    ...meta,
  });
  if (level === "warn") {
    console.warn(line);
  } else {
    console.error(line);
  }
}

export const logger = {
  warn(message: string, meta: Record<string, unknown> = {}): void {
    emit("warn", message, meta);
  },
  info(message: string, meta: Record<string, unknown> = {}): void {
    emit("info", message, meta);
  },
  debug(message: string, meta: Record<string, unknown> = {}): void {
    emit("debug", message, meta);
  },
};
