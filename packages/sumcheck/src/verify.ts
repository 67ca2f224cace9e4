/**
 * Verification engine.
 *
 * One run moves through awaiting-input → resolving → hashing → verdict. With
 * no hash source the resolving phase is skipped and every supported digest is
 * computed instead.
 */

import { digestsEqual, toDigest } from './algorithm.js';
import { computeDigest, computeDigests } from './hash.js';
import { filenameMatches, parseHashText, selectExpectedHash } from './listing.js';
import type { HashSource, InputSource } from './sources.js';
import type {
  Digest,
  ExpectedHash,
  HashOrigin,
  Verdict,
  VerdictMessage,
  VerificationOutcome,
  VerifyPhase,
} from './types.js';
import { ALL_ALGORITHMS, DualStandardInputError } from './types.js';

export interface VerifyOptions {
  /** Called on entry to each phase, with a short description. */
  onPhase?: ((phase: VerifyPhase, detail: string) => void) | undefined;
  /** Add a note when a match relies on MD5. Defaults to true. */
  weakAlgorithmNotes?: boolean | undefined;
}

/** Candidates and the one chosen for comparison. */
interface Resolution {
  origin: HashOrigin;
  selected: ExpectedHash;
  candidates: ExpectedHash[];
}

async function resolveExpected(
  hashSource: HashSource,
  inputName: string | undefined,
): Promise<Resolution> {
  const text = await hashSource.read();

  if (hashSource.kind === 'argument') {
    const selected: ExpectedHash = { digest: toDigest(text.trim()), line: 1 };
    return {
      origin: { kind: 'argument', label: hashSource.label, format: 'raw' },
      selected,
      candidates: [selected],
    };
  }

  const parsed = parseHashText(text, hashSource.label);
  return {
    origin: { kind: hashSource.kind, label: hashSource.label, format: parsed.format },
    selected: selectExpectedHash(parsed.records, inputName),
    candidates: parsed.records,
  };
}

/** Filename correlation for a candidate whose digest matched. */
function correlate(
  matched: ExpectedHash,
  input: InputSource,
  messages: VerdictMessage[],
): 'match' | 'maybe' {
  const claimed = matched.filename;
  if (claimed === undefined) {
    return 'match';
  }
  if (input.name === undefined) {
    messages.push({
      level: 'warning',
      text: `The matched hash has filename '${claimed}', which cannot be confirmed for standard input.`,
    });
    return 'maybe';
  }
  if (filenameMatches(claimed, input.name)) {
    return 'match';
  }
  messages.push({
    level: 'warning',
    text: `The matched hash has filename '${claimed}', which does not match the input.`,
  });
  return 'maybe';
}

/**
 * Decide the verdict for a computed digest.
 *
 * A hash match outranks a filename match: if the selected entry disagrees but
 * another entry agrees, the result is MAYBE against that other entry.
 */
function judge(
  computed: Digest,
  input: InputSource,
  resolution: Resolution,
  weakAlgorithmNotes: boolean,
): Verdict {
  const { origin, selected, candidates } = resolution;
  const messages: VerdictMessage[] = [];
  const base = { mode: 'single' as const, inputLabel: input.label, computed, origin, messages };

  if (digestsEqual(selected.digest, computed)) {
    const level = correlate(selected, input, messages);
    addWeakAlgorithmNote(computed, weakAlgorithmNotes, messages);
    return { ...base, level, expected: selected };
  }

  const other = candidates.find((c) => c !== selected && digestsEqual(c.digest, computed));
  if (!other) {
    return { ...base, level: 'mismatch', expected: selected };
  }
  messages.push({
    level: 'warning',
    text: `The entry for '${selected.filename ?? input.label}' does not match, but the entry for '${other.filename ?? `line ${other.line}`}' does.`,
  });
  addWeakAlgorithmNote(computed, weakAlgorithmNotes, messages);
  return { ...base, level: 'maybe', expected: other };
}

function addWeakAlgorithmNote(
  computed: Digest,
  enabled: boolean,
  messages: VerdictMessage[],
): void {
  if (enabled && computed.algorithm === 'md5') {
    messages.push({
      level: 'note',
      text: 'MD5 can easily be forged. Use a stronger algorithm if possible.',
    });
  }
}

/**
 * Verify an input against an expected hash, or compute every supported digest
 * when no hash source is given.
 *
 * @throws DualStandardInputError before any read if both sources are stdin
 */
export async function verify(
  input: InputSource,
  hashSource?: HashSource,
  options: VerifyOptions = {},
): Promise<VerificationOutcome> {
  const onPhase = options.onPhase ?? (() => undefined);
  onPhase('awaiting-input', `input: ${input.label}`);

  if (hashSource?.kind === 'stdin' && input.kind === 'stdin') {
    throw new DualStandardInputError();
  }

  if (!hashSource) {
    onPhase('hashing', `computing ${ALL_ALGORITHMS.length} digests in one pass`);
    const digests = await computeDigests(input, ALL_ALGORITHMS);
    onPhase('verdict', 'no hash supplied, reporting digests');
    return { mode: 'all', inputLabel: input.label, digests };
  }

  onPhase('resolving', `expected hash from ${hashSource.label}`);
  const resolution = await resolveExpected(hashSource, input.name);

  const { algorithm } = resolution.selected.digest;
  onPhase('hashing', `computing ${algorithm} of ${input.label}`);
  const computed = await computeDigest(input, algorithm);

  const verdict = judge(computed, input, resolution, options.weakAlgorithmNotes ?? true);
  onPhase('verdict', verdict.level);
  return verdict;
}
