/**
 * sumcheck -- Verify a file against an expected hash, whatever its format.
 *
 * Library exports for programmatic usage.
 */

export type {
  Algorithm,
  AlgorithmInfo,
  ColorMode,
  Digest,
  DigestReport,
  ErrorCategory,
  ExpectedHash,
  GlobalOptions,
  HashFormat,
  HashOrigin,
  HashSourceKind,
  MatchLevel,
  MessageLevel,
  SumcheckConfig,
  Verdict,
  VerdictMessage,
  VerificationOutcome,
  VerifyPhase,
} from './types.js';

export {
  ALGORITHMS,
  ALL_ALGORITHMS,
  AmbiguousHashSelectionError,
  ConflictingHashSourcesError,
  DualStandardInputError,
  EXIT_ERROR,
  EXIT_NOT_VERIFIED,
  InvalidHexCharacterError,
  NoHashFoundError,
  SourceReadError,
  SumcheckError,
  UnrecognisedHashFormatError,
  ValidationError,
} from './types.js';

export { algorithmForLength, classifyHash, digestsEqual, isHexDigest, toDigest } from './algorithm.js';
export { computeDigest, computeDigests } from './hash.js';
export type { ParsedHashes } from './listing.js';
export { parseHashText, parseListingLine, selectExpectedHash } from './listing.js';
export type { HashSource, InputSource } from './sources.js';
export {
  argumentSource,
  checkFileSource,
  fileInput,
  resolveInput,
  stdinInput,
  STDIN_PATH,
} from './sources.js';
export type { VerifyOptions } from './verify.js';
export { verify } from './verify.js';
export type { ResolvedConfig } from './config.js';
export { getGlobalConfigPath, loadConfigFile, mergeConfigs, resolveConfig } from './config.js';
export type { Palette } from './format.js';
export { createPalette, formatOutcome, formatError } from './format.js';
export type { CliIO } from './program.js';
export { runCli } from './program.js';
