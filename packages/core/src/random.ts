/** Source of uniform floats in [0, 1). Passed to everything that draws. */
export interface RandomSource {
  next(): number;
}

/** Crypto-backed source, the default when no seed is given. */
export class CryptoRandom implements RandomSource {
  private buf = new Uint32Array(1);

  next(): number {
    crypto.getRandomValues(this.buf);
    return this.buf[0] / (0xffffffff + 1);
  }
}

/**
 * xorshift32 generator. String seeds are hashed with FNV-1a so that
 * "my-seed" and 1234 are equally usable from the CLI.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    const s = typeof seed === "string" ? hashSeed(seed) : seed >>> 0;
    // xorshift never leaves the all-zero state
    this.state = s === 0 ? 0x9e3779b9 : s;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }
}

function hashSeed(seed: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** Integer in [0, max). */
export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random.next() * max);
}

export function pickRandom<T>(random: RandomSource, arr: readonly T[]): T {
  return arr[randomInt(random, arr.length)];
}

export function shuffle<T>(random: RandomSource, arr: T[]): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}
