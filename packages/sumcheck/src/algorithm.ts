/**
 * Hash type detection.
 *
 * The supported algorithms all produce digests of different lengths, so the
 * algorithm of a hex string can be read off its length.
 */

import type { Algorithm, Digest } from './types.js';
import {
  ALGORITHMS,
  ALL_ALGORITHMS,
  InvalidHexCharacterError,
  UnrecognisedHashFormatError,
} from './types.js';

const HEX_CHARS = '0123456789abcdefABCDEF';

/** Algorithm whose hex digest has this length, if any. */
export function algorithmForLength(length: number): Algorithm | undefined {
  return ALL_ALGORITHMS.find((alg) => ALGORITHMS[alg].hexLength === length);
}

/** Index of the first non-hex character, or -1. */
function firstNonHex(value: string): number {
  for (let i = 0; i < value.length; i++) {
    if (!HEX_CHARS.includes(value.charAt(i))) {
      return i;
    }
  }
  return -1;
}

/**
 * Classify a hex string by its length.
 *
 * @throws InvalidHexCharacterError if any character is not hex
 * @throws UnrecognisedHashFormatError if the length matches no algorithm
 */
export function classifyHash(hex: string): Algorithm {
  const bad = firstNonHex(hex);
  if (bad >= 0) {
    throw new InvalidHexCharacterError(hex.charAt(bad), bad);
  }
  const algorithm = algorithmForLength(hex.length);
  if (!algorithm) {
    throw new UnrecognisedHashFormatError(hex.length);
  }
  return algorithm;
}

/** True if the token is hex and has a supported digest length. */
export function isHexDigest(token: string): boolean {
  return token.length > 0 && firstNonHex(token) < 0 && algorithmForLength(token.length) != null;
}

/** Classify and canonicalise a hex string into a Digest. */
export function toDigest(hex: string): Digest {
  return { algorithm: classifyHash(hex), hex: hex.toLowerCase() };
}

/** Digests are equal when algorithm and (case-insensitive) hex agree. */
export function digestsEqual(a: Digest, b: Digest): boolean {
  return a.algorithm === b.algorithm && a.hex.toLowerCase() === b.hex.toLowerCase();
}
