/**
 * Types for diff rendering
 *
 * A comparator turns one paired record into styled segments of the
 * record's target text; a sink turns those segments into output.
 */

import type { PairedRecord } from "../logs/types.js";

export type Color =
  | "black"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "white"
  | "default";

export interface Style {
  color: Color;
  bold: boolean;
}

export interface Segment {
  text: string;
  style: Style;
}

export interface StyleSink {
  setStyle(style: Style): void;
  write(text: string): void;
}

export type Comparator = (pair: PairedRecord) => Segment[];

export type ChallengeMode = "completion" | "entropy" | "reranking";

export const NEUTRAL: Style = { color: "black", bold: false };
export const PLAIN: Style = { color: "default", bold: false };
