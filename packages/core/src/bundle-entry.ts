/**
 * Bundle entry point for IIFE/ESM builds.
 * Exposes a flat API suitable for calling from native bridges
 * (Kotlin JNI, Swift JSContext, etc.) and plain <script> tags.
 *
 * In IIFE mode, everything is available as `TokenGrid.*`:
 *   const rows = TokenGrid.encodeToRows("hello", "my password", 6, 24)
 *   const text = TokenGrid.decodeRows(rows, "my password")
 */

import { encode } from "./encoder.js";
import { gridToRows } from "./rows.js";

export { encode, encodeDetailed } from "./encoder.js";
export { decode, decodeRows } from "./decoder.js";
export { gridToRows, parseRows } from "./rows.js";
export { formatGrid } from "./format.js";
export { extractAnchors } from "./anchors.js";
export { SeededRandom } from "./random.js";
export { TokenGridError } from "./errors.js";

export type { Grid, EncodeOptions, EncodeResult } from "./types.js";

/** Encode straight to transport strings, one per row. */
export function encodeToRows(
  text: string,
  password: string,
  lineMax?: number,
  totalMax?: number
): string[] {
  return gridToRows(encode(text, password, { lineMax, totalMax }));
}
