import { describe, expect, it } from 'vitest';

import {
  algorithmForLength,
  classifyHash,
  digestsEqual,
  isHexDigest,
  toDigest,
} from '../src/algorithm.js';
import { InvalidHexCharacterError, UnrecognisedHashFormatError } from '../src/types.js';

describe('classifyHash', () => {
  it('maps each supported length to its algorithm', () => {
    expect(classifyHash('0'.repeat(32))).toBe('md5');
    expect(classifyHash('0'.repeat(40))).toBe('sha1');
    expect(classifyHash('0'.repeat(64))).toBe('sha256');
    expect(classifyHash('0'.repeat(128))).toBe('sha512');
  });

  it('is case-insensitive', () => {
    expect(classifyHash('ABCDEF0123456789'.repeat(4))).toBe('sha256');
  });

  it('rejects unsupported lengths', () => {
    for (const length of [0, 31, 33, 39, 41, 63, 65, 96, 127, 129]) {
      expect(() => classifyHash('a'.repeat(length))).toThrow(UnrecognisedHashFormatError);
    }
    expect(() => classifyHash('a'.repeat(31))).toThrow(
      'Unrecognised hash length: 31 hex characters',
    );
  });

  it('rejects non-hex characters before checking length', () => {
    expect(() => classifyHash('g' + '0'.repeat(31))).toThrow(InvalidHexCharacterError);
    expect(() => classifyHash('00z')).toThrow(
      "Provided hash is not valid hex: unexpected 'z' at position 3",
    );
  });

  it('reports the offending character and position', () => {
    try {
      classifyHash('0'.repeat(10) + ' ' + '0'.repeat(21));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidHexCharacterError);
      if (err instanceof InvalidHexCharacterError) {
        expect(err.character).toBe(' ');
        expect(err.position).toBe(10);
        expect(err.exitCode).toBe(2);
      }
    }
  });
});

describe('algorithm helpers', () => {
  it('algorithmForLength returns undefined for unknown lengths', () => {
    expect(algorithmForLength(40)).toBe('sha1');
    expect(algorithmForLength(48)).toBeUndefined();
  });

  it('isHexDigest requires hex of a supported length', () => {
    expect(isHexDigest('f'.repeat(64))).toBe(true);
    expect(isHexDigest('F'.repeat(40))).toBe(true);
    expect(isHexDigest('f'.repeat(63))).toBe(false);
    expect(isHexDigest('x'.repeat(64))).toBe(false);
    expect(isHexDigest('')).toBe(false);
  });

  it('toDigest canonicalises to lowercase', () => {
    expect(toDigest('ABCDEF'.padEnd(32, '0'))).toEqual({
      algorithm: 'md5',
      hex: 'abcdef' + '0'.repeat(26),
    });
  });

  it('digestsEqual compares algorithm and hex case-insensitively', () => {
    const hex = 'ab'.repeat(20);
    expect(digestsEqual({ algorithm: 'sha1', hex }, { algorithm: 'sha1', hex: hex.toUpperCase() })).toBe(
      true,
    );
    expect(digestsEqual({ algorithm: 'sha1', hex }, { algorithm: 'sha1', hex: 'cd'.repeat(20) })).toBe(
      false,
    );
  });
});
