import { randomInt } from "node:crypto";

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** Random letters, used for the cluster secret and join token. */
export function generateSecret(length = 20): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += LETTERS[randomInt(LETTERS.length)];
  }
  return out;
}
