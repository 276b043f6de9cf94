import type { Grid, SlotGrid } from "./types.js";
import type { RandomSource } from "./random.js";
import { randomAlphanumeric, reverseToken } from "./token.js";

/**
 * Draw a decoy token that cannot be read as an anchor in either
 * orientation and does not repeat a message token.
 */
export function generateNoiseToken(
  random: RandomSource,
  anchors: ReadonlySet<string>,
  messageTokens: ReadonlySet<string>
): string {
  for (;;) {
    const token = randomAlphanumeric(random, 2);
    if (
      !anchors.has(token) &&
      !anchors.has(reverseToken(token)) &&
      !messageTokens.has(token)
    ) {
      return token;
    }
  }
}

/** Fill every empty slot with noise and return the finished grid. */
export function fillNoise(
  grid: SlotGrid,
  random: RandomSource,
  anchors: Iterable<string>,
  messageTokens: Iterable<string>
): Grid {
  const anchorSet = new Set(anchors);
  const messageSet = new Set(messageTokens);
  return grid.map((row) =>
    row.map((slot) => slot ?? generateNoiseToken(random, anchorSet, messageSet))
  );
}
