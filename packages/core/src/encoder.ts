import type { EncodeOptions, EncodeResult, Grid } from "./types.js";
import { AnchorTable } from "./anchors.js";
import { chunkSlots, encodeChunks } from "./chunk-encoder.js";
import { resolveEncodeOptions } from "./config.js";
import { NoAnchorAvailableError, PlacementCapacityExceededError } from "./errors.js";
import { allocateGrid, placePaddingMarker } from "./grid.js";
import { logInfo } from "./logger.js";
import { tokenizeMessage } from "./message.js";
import { fillNoise } from "./noise.js";
import { placeChunks } from "./placer.js";
import { CryptoRandom, SeededRandom, type RandomSource } from "./random.js";

/**
 * Hide `text` in a grid keyed by `password`.
 *
 * text → message tokens → chunks → empty grid → padding marker →
 * placed chunks → noise fill
 *
 * @throws NoAnchorAvailableError when the password cannot mark the message
 * @throws PlacementCapacityExceededError when the grid is too small
 *
 * @example
 * ```ts
 * const grid = encode("meet at noon", "correct horse", { lineMax: 6, totalMax: 36 })
 * decode(grid, "correct horse") // "meet at noon"
 * ```
 */
export function encode(text: string, password: string, options: EncodeOptions = {}): Grid {
  return encodeDetailed(text, password, options).grid;
}

/** Same as encode(), also returning the chunks and placement report. */
export function encodeDetailed(
  text: string,
  password: string,
  options: EncodeOptions = {}
): EncodeResult {
  const { lineMax, totalMax, maxAttempts } = resolveEncodeOptions(options);
  const random = resolveRandom(options);

  const anchors = AnchorTable.fromPassword(password);
  if (anchors.size === 0) throw new NoAnchorAvailableError();

  const { tokens, padded } = tokenizeMessage(text, random);
  const chunks = encodeChunks(tokens, anchors, random);

  const required = chunkSlots(chunks) + (padded ? 1 : 0);
  if (required > totalMax) {
    throw new PlacementCapacityExceededError(required, totalMax);
  }

  logInfo("encode_started", "Encoding message", {
    tokens: tokens.length,
    padded,
    anchors: anchors.size,
    lineMax,
    totalMax,
  });

  const slots = allocateGrid(lineMax, totalMax);
  if (padded) placePaddingMarker(slots, anchors, random);

  const placement = placeChunks(slots, chunks, random, { maxAttempts });
  if (placement.strategy === "tight") {
    logInfo("placement_fallback", "Spread placement failed, packed chunks tightly", {
      attempts: placement.attempts,
      required,
      capacity: totalMax,
    });
  }

  const grid = fillNoise(slots, random, anchors.tokens(), tokens);

  logInfo("encode_completed", "Message encoded", {
    rows: grid.length,
    chunks: chunks.length,
    strategy: placement.strategy,
  });

  return { grid, padded, chunks, placement };
}

function resolveRandom(options: EncodeOptions): RandomSource {
  if (options.random) return options.random;
  if (options.seed !== undefined) return new SeededRandom(options.seed);
  return new CryptoRandom();
}
