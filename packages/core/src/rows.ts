import type { Grid } from "./types.js";
import { InvalidRowError } from "./errors.js";
import { chars, splitTokens } from "./token.js";

/** One string per row, tokens concatenated. */
export function gridToRows(grid: readonly (readonly string[])[]): string[] {
  return grid.map((row) => row.join(""));
}

export function parseRows(rows: readonly string[]): Grid {
  return rows.map((row, i) => {
    const length = chars(row).length;
    if (length % 2 !== 0) throw new InvalidRowError(i, length);
    return splitTokens(row);
  });
}
