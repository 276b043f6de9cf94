import type { MessageTokens } from "./types.js";
import type { RandomSource } from "./random.js";
import { chars, randomAlphanumeric, splitTokens } from "./token.js";

/**
 * Split a message into 2-character tokens. Odd-length text gets one random
 * alphanumeric character appended and is flagged `padded` so that the
 * encoder can add the trim marker.
 */
export function tokenizeMessage(text: string, random: RandomSource): MessageTokens {
  const padded = chars(text).length % 2 !== 0;
  const full = padded ? text + randomAlphanumeric(random, 1) : text;
  return { tokens: splitTokens(full), padded };
}
