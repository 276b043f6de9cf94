import { chars } from "./token.js";

/**
 * Pretty-print a grid for humans: columns left-aligned to their widest
 * cell, separated by " | ", spaces shown as "(spc)".
 */
export function formatGrid(grid: readonly (readonly (string | null)[])[]): string {
  const cells = grid.map((row) =>
    row.map((token) =>
      token === null ? "" : chars(token).map((ch) => (ch === " " ? "(spc)" : ch)).join("")
    )
  );

  const widths: number[] = [];
  for (const row of cells) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, chars(cell).length);
    });
  }

  return cells
    .map((row) =>
      row
        .map((cell, i) => cell + " ".repeat(widths[i] - chars(cell).length))
        .join(" | ")
        .trimEnd()
    )
    .join("\n");
}
