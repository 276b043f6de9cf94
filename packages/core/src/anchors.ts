import type { Anchor, Direction } from "./types.js";
import { NoAnchorAvailableError } from "./errors.js";
import { pickRandom, type RandomSource } from "./random.js";
import { chars, reverseToken } from "./token.js";

/**
 * Derive the ordered list of valid anchors from a password.
 *
 * Every 2-character sliding window is a candidate. A window is dropped when
 * it occurs more than once, when both characters are the same, or when its
 * reversal is also a window. Survivors keep their password order.
 */
export function extractAnchors(password: string): string[] {
  const cs = chars(password);
  const windows: string[] = [];
  for (let i = 0; i + 1 < cs.length; i++) {
    windows.push(cs[i] + cs[i + 1]);
  }

  const counts = new Map<string, number>();
  for (const w of windows) counts.set(w, (counts.get(w) ?? 0) + 1);
  const windowSet = new Set(windows);

  return windows.filter((w) => {
    if ((counts.get(w) ?? 0) > 1) return false;
    const [a, b] = chars(w);
    if (a === b) return false;
    return !windowSet.has(reverseToken(w));
  });
}

/** Even index → "before", odd → "after". */
export function directionAt(index: number): Direction {
  return index % 2 === 0 ? "before" : "after";
}

/** Anchors of one password with lookup by token and by direction. */
export class AnchorTable {
  readonly anchors: readonly Anchor[];
  private byToken: Map<string, Anchor>;
  private byDirection: Record<Direction, Anchor[]>;

  constructor(tokens: readonly string[]) {
    this.anchors = tokens.map((token, index) => ({
      token,
      index,
      direction: directionAt(index),
    }));
    this.byToken = new Map(this.anchors.map((a) => [a.token, a]));
    this.byDirection = {
      before: this.anchors.filter((a) => a.direction === "before"),
      after: this.anchors.filter((a) => a.direction === "after"),
    };
  }

  static fromPassword(password: string): AnchorTable {
    return new AnchorTable(extractAnchors(password));
  }

  get size(): number {
    return this.anchors.length;
  }

  has(token: string): boolean {
    return this.byToken.has(token);
  }

  get(token: string): Anchor | undefined {
    return this.byToken.get(token);
  }

  tokens(): string[] {
    return this.anchors.map((a) => a.token);
  }

  ofDirection(direction: Direction): readonly Anchor[] {
    return this.byDirection[direction];
  }

  /** Uniformly random anchor, optionally restricted to one direction. */
  pick(random: RandomSource, direction?: Direction): Anchor {
    const pool = direction ? this.byDirection[direction] : this.anchors;
    if (pool.length === 0) {
      throw new NoAnchorAvailableError(direction ?? null);
    }
    return pickRandom(random, pool);
  }
}
