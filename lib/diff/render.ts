/**
 * Rendering of styled segments, one output line per message.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { LogRecord, PairedRecord } from "../logs/types.js";
import { PLAIN, type Comparator, type Segment, type Style, type StyleSink } from "./types.js";

export interface LineSink extends StyleSink {
  /** Return everything written since the last call and start a new line. */
  takeLine(): string;
}

export function renderSegments(segments: readonly Segment[], sink: StyleSink): void {
  for (const segment of segments) {
    sink.setStyle(segment.style);
    sink.write(segment.text);
  }
}

/**
 * Buffers one line of ANSI-styled text. Each write is wrapped in its own
 * open/close codes, so every character carries its style on its own.
 */
export class AnsiLineSink implements LineSink {
  private style: Style = PLAIN;
  private buffer = "";

  constructor(private readonly painter: ChalkInstance = chalk) {}

  setStyle(style: Style): void {
    this.style = style;
  }

  write(text: string): void {
    this.buffer += this.paint(text);
  }

  takeLine(): string {
    const line = this.buffer;
    this.buffer = "";
    return line;
  }

  private paint(text: string): string {
    const { color, bold } = this.style;
    if (color === "default" && !bold) return text;
    let paint = bold ? this.painter.bold : this.painter;
    if (color !== "default") {
      paint = paint[color];
    }
    return paint(text);
  }
}

/** Records without a message index each get a line of their own. */
function lineKey(record: LogRecord): string | null {
  if (record.message === undefined) return null;
  return `${record.user ?? ""}\u0000${record.message}`;
}

/**
 * Render each pair through `comparator` into `sink`, yielding a line
 * whenever the message changes. Tokens of one message are separated by
 * a single unstyled space.
 */
export async function* renderLines(
  pairs: AsyncIterable<PairedRecord>,
  comparator: Comparator,
  sink: LineSink
): AsyncGenerator<string> {
  let open = false;
  let currentKey: string | null = null;

  for await (const pair of pairs) {
    const key = lineKey(pair.baseline);
    if (open) {
      if (key !== null && key === currentKey) {
        sink.setStyle(PLAIN);
        sink.write(" ");
      } else {
        yield sink.takeLine();
      }
    }
    renderSegments(comparator(pair), sink);
    open = true;
    currentKey = key;
  }

  if (open) {
    yield sink.takeLine();
  }
}
