import type { Chunk } from "./types.js";
import type { AnchorTable } from "./anchors.js";
import type { RandomSource } from "./random.js";
import { reverseToken } from "./token.js";

/**
 * Wrap one message token with the anchor(s) that will lead the decoder to it.
 *
 * - self-anchor: the token is itself an anchor. It is bracketed by its own
 *   reversal (the sentinel) and a same-direction anchor, so the decoder
 *   reads it through the companion and skips the sentinel.
 * - reversed-anchor: the token's reversal is an anchor. An "after" anchor
 *   goes in front of it, unless the draw is that very reversal, in which
 *   case a "before" anchor goes behind it instead.
 * - plain: any anchor, on the side its direction reads from.
 */
export function encodeChunk(
  message: string,
  anchors: AnchorTable,
  random: RandomSource
): Chunk {
  const reversed = reverseToken(message);
  const self = anchors.get(message);

  if (self) {
    const companion = anchors.pick(random, self.direction).token;
    if (self.direction === "before") {
      return {
        kind: "self-anchor",
        message,
        anchor: companion,
        sentinel: reversed,
        tokens: [reversed, message, companion],
      };
    }
    return {
      kind: "self-anchor",
      message,
      anchor: companion,
      sentinel: reversed,
      tokens: [companion, message, reversed],
    };
  }

  if (anchors.has(reversed)) {
    const after = anchors.pick(random, "after").token;
    if (after !== reversed) {
      return { kind: "reversed-anchor", message, anchor: after, tokens: [after, message] };
    }
    const before = anchors.pick(random, "before").token;
    return {
      kind: "reversed-anchor-collision",
      message,
      anchor: before,
      tokens: [message, before],
    };
  }

  const anchor = anchors.pick(random);
  return {
    kind: "plain",
    message,
    anchor: anchor.token,
    tokens:
      anchor.direction === "before"
        ? [message, anchor.token]
        : [anchor.token, message],
  };
}

export function encodeChunks(
  messages: readonly string[],
  anchors: AnchorTable,
  random: RandomSource
): Chunk[] {
  return messages.map((m) => encodeChunk(m, anchors, random));
}

/** Slots the chunks will occupy once placed. */
export function chunkSlots(chunks: readonly Chunk[]): number {
  return chunks.reduce((sum, c) => sum + c.tokens.length, 0);
}
