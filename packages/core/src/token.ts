import { randomInt, type RandomSource } from "./random.js";

/** Characters used for padding and noise. */
export const ALPHANUMERIC =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Split by code point so astral characters are never halved. */
export function chars(text: string): string[] {
  return Array.from(text);
}

export function reverseToken(token: string): string {
  return chars(token).reverse().join("");
}

/** Resplit text into consecutive 2-character tokens (last one may be short). */
export function splitTokens(text: string): string[] {
  const cs = chars(text);
  const tokens: string[] = [];
  for (let i = 0; i < cs.length; i += 2) {
    tokens.push(cs.slice(i, i + 2).join(""));
  }
  return tokens;
}

export function randomAlphanumeric(random: RandomSource, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC[randomInt(random, ALPHANUMERIC.length)];
  }
  return out;
}
