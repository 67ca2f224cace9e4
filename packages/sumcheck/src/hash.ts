/**
 * Digest computation via node:crypto streaming.
 *
 * Every requested algorithm is updated from the same chunk, so the input is
 * read exactly once however many digests are wanted.
 */

import { createHash } from 'node:crypto';
import type { Readable } from 'node:stream';

import type { InputSource } from './sources.js';
import { toSourceReadError } from './sources.js';
import type { Algorithm, Digest } from './types.js';
import { ALGORITHMS } from './types.js';

/** Stream a source once through each algorithm; digests come back in request order. */
export async function computeDigests(
  source: InputSource,
  algorithms: readonly Algorithm[],
): Promise<Digest[]> {
  return new Promise((resolve, reject) => {
    const states = algorithms.map((algorithm) => ({
      algorithm,
      hash: createHash(ALGORITHMS[algorithm].nodeName),
    }));
    const fail = (err: unknown): void => {
      reject(toSourceReadError(err, 'Cannot read input', source.label));
    };

    let stream: Readable;
    try {
      stream = source.open();
    } catch (err: unknown) {
      fail(err);
      return;
    }

    stream.on('data', (chunk: Buffer | string) => {
      for (const state of states) {
        state.hash.update(chunk);
      }
    });
    stream.on('end', () => {
      resolve(states.map(({ algorithm, hash }) => ({ algorithm, hex: hash.digest('hex') })));
    });
    stream.on('error', (err) => {
      stream.destroy();
      fail(err);
    });
  });
}

/** Stream a source through a single algorithm. */
export async function computeDigest(source: InputSource, algorithm: Algorithm): Promise<Digest> {
  const [digest] = await computeDigests(source, [algorithm]);
  if (!digest) {
    throw new Error(`Internal error: no ${algorithm} digest produced`);
  }
  return digest;
}
