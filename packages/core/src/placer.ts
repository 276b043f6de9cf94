import type { Chunk, PlacementOptions, PlacementReport, Slot, SlotGrid } from "./types.js";
import { PlacementCapacityExceededError } from "./errors.js";
import { GridLayout, flatten, unflatten } from "./grid.js";
import { shuffle, type RandomSource } from "./random.js";
import { chunkSlots } from "./chunk-encoder.js";

export const DEFAULT_MAX_ATTEMPTS = 100;

/**
 * Place chunks, in order, into the grid's empty slots.
 *
 * Each chunk first tries a random free spot inside its share of the grid
 * (chunk i of n gets [i·S/n, (i+1)·S/n)), then anywhere after the previous
 * chunk. A failed attempt starts over from the original grid; after
 * `maxAttempts` failures the chunks are packed left to right instead.
 */
export function placeChunks(
  grid: SlotGrid,
  chunks: readonly Chunk[],
  random: RandomSource,
  options: PlacementOptions = {}
): PlacementReport {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const layout = new GridLayout(grid);
  const base = flatten(grid);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const flat = [...base];
    const positions = trySpread(flat, layout, chunks, random);
    if (positions) {
      unflatten(flat, grid);
      return { strategy: "spread", attempts: attempt, positions };
    }
  }

  const flat = [...base];
  const positions = tightFit(flat, layout, chunks);
  unflatten(flat, grid);
  return { strategy: "tight", attempts: maxAttempts, positions };
}

function trySpread(
  flat: Slot[],
  layout: GridLayout,
  chunks: readonly Chunk[],
  random: RandomSource
): number[] | null {
  const total = layout.size;
  const n = chunks.length;
  const positions: number[] = [];
  let prevEnd = -1;

  for (let i = 0; i < n; i++) {
    const length = chunks[i].tokens.length;
    const startBin = Math.floor((i * total) / n);
    const endBin = Math.floor(((i + 1) * total) / n);

    let pos = findFree(flat, layout, Math.max(prevEnd + 1, startBin), endBin - length, length, random);
    if (pos === null) {
      pos = findFree(flat, layout, prevEnd + 1, total - length, length, random);
    }
    if (pos === null) return null;

    write(flat, pos, chunks[i].tokens);
    positions.push(pos);
    prevEnd = pos + length - 1;
  }
  return positions;
}

/** Random free start in [from, to] that keeps `length` slots in one row. */
function findFree(
  flat: readonly Slot[],
  layout: GridLayout,
  from: number,
  to: number,
  length: number,
  random: RandomSource
): number | null {
  const candidates: number[] = [];
  for (let p = from; p <= to; p++) candidates.push(p);
  shuffle(random, candidates);
  return candidates.find((p) => isFree(flat, layout, p, length)) ?? null;
}

function tightFit(
  flat: Slot[],
  layout: GridLayout,
  chunks: readonly Chunk[]
): number[] {
  const positions: number[] = [];
  let cursor = 0;

  for (const chunk of chunks) {
    const length = chunk.tokens.length;
    while (cursor <= layout.size - length && !isFree(flat, layout, cursor, length)) {
      cursor++;
    }
    if (cursor > layout.size - length) {
      throw new PlacementCapacityExceededError(
        chunkSlots(chunks),
        layout.size,
        `No free run of ${length} slots left for chunk ${positions.length + 1} of ${chunks.length}`
      );
    }
    write(flat, cursor, chunk.tokens);
    positions.push(cursor);
    cursor += length;
  }
  return positions;
}

function isFree(
  flat: readonly Slot[],
  layout: GridLayout,
  pos: number,
  length: number
): boolean {
  if (!layout.fitsInRow(pos, length)) return false;
  for (let k = 0; k < length; k++) {
    if (flat[pos + k] !== null) return false;
  }
  return true;
}

function write(flat: Slot[], pos: number, tokens: readonly string[]): void {
  tokens.forEach((t, k) => {
    flat[pos + k] = t;
  });
}
