/**
 * Shared type definitions for sumcheck.
 *
 * Central types and error classes used across the codebase.
 */

/** Supported digest algorithms, told apart by hex digest length. */
export type Algorithm = 'md5' | 'sha1' | 'sha256' | 'sha512';

export interface AlgorithmInfo {
  /** Name shown to the user */
  displayName: string;
  /** Name passed to node:crypto createHash */
  nodeName: string;
  /** Length of the digest as a hex string */
  hexLength: number;
}

export const ALGORITHMS: Record<Algorithm, AlgorithmInfo> = {
  md5: { displayName: 'MD5', nodeName: 'md5', hexLength: 32 },
  sha1: { displayName: 'SHA-1', nodeName: 'sha1', hexLength: 40 },
  sha256: { displayName: 'SHA-256', nodeName: 'sha256', hexLength: 64 },
  sha512: { displayName: 'SHA-512', nodeName: 'sha512', hexLength: 128 },
};

/** Order used for compute-all output. */
export const ALL_ALGORITHMS: readonly Algorithm[] = ['md5', 'sha1', 'sha256', 'sha512'];

/** A finalised digest. `hex` is always lowercase. */
export interface Digest {
  algorithm: Algorithm;
  hex: string;
}

/** One candidate hash parsed from a checksum source. */
export interface ExpectedHash {
  digest: Digest;
  /** Filename claimed by a listing line (absent for bare hashes) */
  filename?: string | undefined;
  /** 1-based line number in the source text */
  line: number;
}

/** How candidate hashes were found in their source. */
export type HashFormat = 'raw' | 'listing';

export type HashSourceKind = 'argument' | 'file' | 'stdin';

/** Where the expected hash came from, for display. */
export interface HashOrigin {
  kind: HashSourceKind;
  /** Check file path, or a description for argument/stdin */
  label: string;
  format: HashFormat;
}

export type MatchLevel = 'match' | 'maybe' | 'mismatch';

export type MessageLevel = 'warning' | 'note';

export interface VerdictMessage {
  level: MessageLevel;
  text: string;
}

/** Result of checking one input against one expected hash. */
export interface Verdict {
  mode: 'single';
  level: MatchLevel;
  /** Display label of the input (path or "standard input") */
  inputLabel: string;
  computed: Digest;
  /** The candidate the computed digest was compared against */
  expected: ExpectedHash;
  origin: HashOrigin;
  messages: VerdictMessage[];
}

/** Digests for every supported algorithm, produced when no hash was supplied. */
export interface DigestReport {
  mode: 'all';
  inputLabel: string;
  digests: Digest[];
}

export type VerificationOutcome = Verdict | DigestReport;

/** Stages of a single verification run. */
export type VerifyPhase = 'awaiting-input' | 'resolving' | 'hashing' | 'verdict';

/** Exit code for MISMATCH and MAYBE verdicts. */
export const EXIT_NOT_VERIFIED = 1;
/** Exit code for any error. */
export const EXIT_ERROR = 2;

export type ErrorCategory = 'validation' | 'not_found' | 'ambiguous' | 'io' | 'usage' | 'unknown';

/** Structured CLI error with category and optional troubleshooting. */
export class SumcheckError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly exitCode = EXIT_ERROR,
    public readonly suggestions?: string[],
  ) {
    super(message);
    this.name = 'SumcheckError';
  }
}

/** Validation error for malformed input or configuration. */
export class ValidationError extends SumcheckError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'validation', EXIT_ERROR, suggestions);
    this.name = 'ValidationError';
  }
}

export class InvalidHexCharacterError extends SumcheckError {
  constructor(
    public readonly character: string,
    public readonly position: number,
  ) {
    super(
      `Provided hash is not valid hex: unexpected '${character}' at position ${position + 1}`,
      'validation',
      EXIT_ERROR,
      ['Hashes may only contain the characters 0-9 and a-f.'],
    );
    this.name = 'InvalidHexCharacterError';
  }
}

export class UnrecognisedHashFormatError extends SumcheckError {
  constructor(public readonly length: number) {
    super(
      `Unrecognised hash length: ${length} hex characters`,
      'validation',
      EXIT_ERROR,
      ['Supported lengths: 32 (MD5), 40 (SHA-1), 64 (SHA-256), 128 (SHA-512).'],
    );
    this.name = 'UnrecognisedHashFormatError';
  }
}

export class NoHashFoundError extends SumcheckError {
  constructor(sourceLabel: string) {
    super(
      `Provided check file '${sourceLabel}' was neither a hash nor a valid digests file`,
      'not_found',
      EXIT_ERROR,
      ['The check file must contain a raw hash or lines like "<hash>  <filename>".'],
    );
    this.name = 'NoHashFoundError';
  }
}

export class AmbiguousHashSelectionError extends SumcheckError {
  constructor(
    message: string,
    public readonly candidates: string[],
  ) {
    super(message, 'ambiguous', EXIT_ERROR, [
      'Rename the input to match its entry in the digests file,',
      'or pass the expected hash directly on the command line.',
    ]);
    this.name = 'AmbiguousHashSelectionError';
  }
}

export class SourceReadError extends SumcheckError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'io', EXIT_ERROR, suggestions);
    this.name = 'SourceReadError';
  }
}

export class DualStandardInputError extends SumcheckError {
  constructor() {
    super('Cannot use stdin for both hash file and input data', 'usage', EXIT_ERROR, [
      'Save one of them to a file first.',
    ]);
    this.name = 'DualStandardInputError';
  }
}

export class ConflictingHashSourcesError extends SumcheckError {
  constructor(methods: string[]) {
    super('Hashes were provided by multiple methods. Use only one.', 'usage', EXIT_ERROR, methods);
    this.name = 'ConflictingHashSourcesError';
  }
}

/** User configuration, loaded from ~/.sumcheck.yml. */
export interface SumcheckConfig {
  color?: ColorMode | undefined;
  weak_algorithm_notes?: boolean | undefined;
}

export type ColorMode = 'auto' | 'always' | 'never';

/** Global CLI options shared across the program. */
export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
}
