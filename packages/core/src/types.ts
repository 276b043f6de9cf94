import type { RandomSource } from "./random.js";

/** Which neighbor of an anchor holds the message token it marks. */
export type Direction = "before" | "after";

/** A validated password-derived marker token. */
export interface Anchor {
  token: string;
  index: number;
  direction: Direction;
}

/**
 * One message token wrapped with the anchor(s) that locate it.
 * `anchor` is the governing anchor: the one whose directional neighbor
 * is `message` in `tokens`.
 */
export type Chunk =
  | {
      kind: "self-anchor";
      message: string;
      anchor: string;
      /** Reversed copy of `message`, skipped by the decoder. */
      sentinel: string;
      tokens: readonly [string, string, string];
    }
  | {
      kind: "reversed-anchor" | "reversed-anchor-collision" | "plain";
      message: string;
      anchor: string;
      tokens: readonly [string, string];
    };

export type ChunkKind = Chunk["kind"];

/** A grid slot during encoding; `null` until something is placed. */
export type Slot = string | null;

export type SlotGrid = Slot[][];

/** A finished grid: every slot holds a 2-character token. */
export type Grid = string[][];

/** Result of splitting a message into tokens. */
export interface MessageTokens {
  tokens: string[];
  padded: boolean;
}

/** Where the placer put each chunk, and how. */
export interface PlacementReport {
  strategy: "spread" | "tight";
  attempts: number;
  /** Flat start position of each chunk, in chunk order. */
  positions: number[];
}

export interface PlacementOptions {
  maxAttempts?: number;
}

/** Options for encode(). */
export interface EncodeOptions {
  /** Slots per row. Default: 10. */
  lineMax?: number;
  /** Total slots in the grid. Default: 30. */
  totalMax?: number;
  /** Spread attempts before the tight-fit fallback. Default: 100. */
  maxAttempts?: number;
  /** Seed for a reproducible encode. Ignored when `random` is given. */
  seed?: number | string;
  /** Random source for every choice made during the encode. */
  random?: RandomSource;
}

/** Full outcome of an encode, for callers that want more than the grid. */
export interface EncodeResult {
  grid: Grid;
  padded: boolean;
  chunks: Chunk[];
  placement: PlacementReport;
}
