import { AnchorTable } from "./anchors.js";
import { logDebug } from "./logger.js";
import { parseRows } from "./rows.js";
import { chars, reverseToken } from "./token.js";

/**
 * Recover the message hidden in a grid.
 *
 * Each anchor reads the token next to it (left for "before", right for
 * "after") within its own row. A reversed copy of the anchor is a sentinel
 * and is skipped. An anchor with no neighbor on its side is the padding
 * marker: the final character of the result is dropped.
 *
 * Never throws. Tampered or foreign grids decode to garbage, not errors.
 */
export function decode(
  grid: readonly (readonly string[])[],
  password: string
): string {
  const anchors = AnchorTable.fromPassword(password);
  const emitted: string[] = [];
  let trimLast = false;

  for (const row of grid) {
    row.forEach((token, i) => {
      const anchor = anchors.get(token);
      if (!anchor) return;

      const j = anchor.direction === "before" ? i - 1 : i + 1;
      if (j < 0 || j >= row.length) {
        trimLast = true;
        return;
      }
      const neighbor = row[j];
      if (reverseToken(neighbor) === token) return;
      emitted.push(neighbor);
    });
  }

  let text = emitted.join("");
  if (trimLast) text = chars(text).slice(0, -1).join("");

  logDebug("decode_completed", "Grid decoded", {
    rows: grid.length,
    tokens: emitted.length,
    trimmed: trimLast,
  });
  return text;
}

/** Parse row strings (rejecting odd-length rows) and decode them. */
export function decodeRows(rows: readonly string[], password: string): string {
  return decode(parseRows(rows), password);
}
