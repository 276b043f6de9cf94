import type { Slot, SlotGrid } from "./types.js";
import type { AnchorTable } from "./anchors.js";
import { InvalidOptionsError } from "./errors.js";
import { randomInt, type RandomSource } from "./random.js";

/**
 * Build an empty grid of exactly `totalMax` slots, `lineMax` per row.
 * The last row holds the remainder when `lineMax` does not divide evenly.
 */
export function allocateGrid(lineMax: number, totalMax: number): SlotGrid {
  if (!Number.isInteger(lineMax) || lineMax < 1) {
    throw new InvalidOptionsError(`lineMax must be an integer >= 1, got ${lineMax}`);
  }
  if (!Number.isInteger(totalMax) || totalMax < 0) {
    throw new InvalidOptionsError(`totalMax must be an integer >= 0, got ${totalMax}`);
  }

  const rows: SlotGrid = [];
  for (let remaining = totalMax; remaining > 0; remaining -= lineMax) {
    rows.push(new Array<Slot>(Math.min(lineMax, remaining)).fill(null));
  }
  return rows;
}

/** Maps flat slot positions onto rows of possibly different widths. */
export class GridLayout {
  readonly size: number;
  private rowOf: number[] = [];
  private colOf: number[] = [];
  private widths: number[];

  constructor(grid: readonly (readonly unknown[])[]) {
    this.widths = grid.map((row) => row.length);
    this.widths.forEach((width, r) => {
      for (let c = 0; c < width; c++) {
        this.rowOf.push(r);
        this.colOf.push(c);
      }
    });
    this.size = this.rowOf.length;
  }

  /** True when `length` slots starting at `pos` stay inside one row. */
  fitsInRow(pos: number, length: number): boolean {
    if (pos < 0 || pos + length > this.size) return false;
    return this.colOf[pos] + length <= this.widths[this.rowOf[pos]];
  }

  locate(pos: number): { row: number; col: number } {
    return { row: this.rowOf[pos], col: this.colOf[pos] };
  }
}

export function flatten<T>(grid: readonly (readonly T[])[]): T[] {
  return grid.flatMap((row) => [...row]);
}

/** Write a flat slot list back into the grid's rows. */
export function unflatten<T>(flat: readonly T[], grid: T[][]): void {
  let i = 0;
  for (const row of grid) {
    for (let c = 0; c < row.length; c++) {
      row[c] = flat[i++];
    }
  }
}

/**
 * Put one lone anchor at the edge of a random row, on the side where its
 * direction expects the message token. The decoder finds no neighbor there
 * and drops the padding character.
 */
export function placePaddingMarker(
  grid: SlotGrid,
  anchors: AnchorTable,
  random: RandomSource
): { row: number; col: number; token: string } {
  const anchor = anchors.pick(random);
  const row = randomInt(random, grid.length);
  const col = anchor.direction === "before" ? 0 : grid[row].length - 1;
  grid[row][col] = anchor.token;
  return { row, col, token: anchor.token };
}
