/**
 * Output formatting for CLI display.
 *
 * Digest listings, side-by-side hash comparison, verdict lines and structured
 * error formatting, with semantic coloring via picocolors.
 *
 * With color disabled, status is carried by ASCII markers instead: bracketed
 * result tokens and a `^` line under differing hex characters.
 */

import colors, { createColors } from 'picocolors';

import type {
  Algorithm,
  ColorMode,
  Digest,
  DigestReport,
  ExpectedHash,
  HashOrigin,
  MatchLevel,
  SumcheckError,
  Verdict,
  VerdictMessage,
  VerificationOutcome,
} from './types.js';
import { ALGORITHMS } from './types.js';

type ColorFn = (s: string | number) => string;

/** Semantic color wrappers for CLI output. */
export interface Palette {
  enabled: boolean;
  success: ColorFn;
  error: ColorFn;
  warning: ColorFn;
  info: ColorFn;
  filename: ColorFn;
  hint: ColorFn;
  algorithm: Record<Algorithm, ColorFn>;
}

export function createPalette(enabled: boolean): Palette {
  const pc = createColors(enabled);
  return {
    enabled,
    success: pc.green,
    error: pc.red,
    warning: pc.yellow,
    info: pc.cyan,
    filename: pc.yellow,
    hint: pc.dim,
    algorithm: {
      md5: pc.magenta,
      sha1: pc.cyan,
      sha256: pc.green,
      sha512: pc.blue,
    },
  };
}

/** Resolve a --color mode; "auto" uses picocolors' own detection. */
export function isColorEnabled(mode: ColorMode): boolean {
  if (mode === 'auto') {
    return colors.isColorSupported;
  }
  return mode === 'always';
}

const RESULT_LABELS: Record<MatchLevel, string> = {
  match: 'OK',
  maybe: 'MAYBE',
  mismatch: 'FAIL',
};

/** "<input> / <algorithm>" */
export function formatHeader(inputLabel: string, algorithm: Algorithm, p: Palette): string {
  return `${p.filename(inputLabel)} / ${p.algorithm[algorithm](ALGORITHMS[algorithm].displayName)}`;
}

/** Color each character of `hex` by whether it agrees with `against`. */
export function formatHexCompare(hex: string, against: string, p: Palette): string {
  let out = '';
  for (let i = 0; i < hex.length; i++) {
    const ch = hex.charAt(i);
    out += ch === against.charAt(i) ? p.success(ch) : p.error(ch);
  }
  return out;
}

/** A line with `^` under each position where the two hex strings differ. */
export function formatDiffMarkers(a: string, b: string): string {
  let out = '';
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    out += a.charAt(i) === b.charAt(i) ? ' ' : '^';
  }
  return out.trimEnd();
}

/** Describe where the compared hash came from. */
export function formatOrigin(origin: HashOrigin, expected: ExpectedHash): string {
  if (origin.kind === 'argument') {
    return 'command line argument';
  }
  if (origin.format === 'raw') {
    return origin.kind === 'stdin'
      ? 'from standard input'
      : `from file '${origin.label}' containing raw hash`;
  }
  const entry =
    expected.filename !== undefined ? `'${expected.filename}'` : `line ${expected.line}`;
  return origin.kind === 'stdin'
    ? `${entry} from digests on standard input`
    : `${entry} in digests file '${origin.label}'`;
}

/** Format warning and note lines, followed by a blank line if any. */
export function formatMessages(messages: VerdictMessage[], p: Palette): string[] {
  const lines = messages.map((m) =>
    m.level === 'warning' ? `${p.warning('(warning)')} ${m.text}` : `${p.info('(note)')} ${m.text}`,
  );
  if (lines.length > 0) {
    lines.push('');
  }
  return lines;
}

/** "Result: OK" in color, or "Result: [OK]" without. */
export function formatResult(level: MatchLevel, p: Palette): string {
  const label = RESULT_LABELS[level];
  if (!p.enabled) {
    return `Result: [${label}]`;
  }
  const paint = level === 'match' ? p.success : level === 'maybe' ? p.warning : p.error;
  return `Result: ${paint(label)}`;
}

function formatDigest(inputLabel: string, digest: Digest, p: Palette): string[] {
  return [formatHeader(inputLabel, digest.algorithm, p), digest.hex, ''];
}

export function formatReport(report: DigestReport, p: Palette): string {
  return report.digests.flatMap((d) => formatDigest(report.inputLabel, d, p)).join('\n');
}

export function formatVerdict(verdict: Verdict, p: Palette, quiet = false): string {
  if (quiet) {
    return formatResult(verdict.level, p);
  }
  const computed = verdict.computed.hex;
  const expected = verdict.expected.digest.hex;
  const lines = [formatHeader(verdict.inputLabel, verdict.computed.algorithm, p)];

  if (p.enabled) {
    lines.push(formatHexCompare(computed, expected, p), formatHexCompare(expected, computed, p));
  } else {
    lines.push(computed, expected);
    if (computed !== expected) {
      lines.push(formatDiffMarkers(computed, expected));
    }
  }
  lines.push(p.filename(formatOrigin(verdict.origin, verdict.expected)), '');
  lines.push(...formatMessages(verdict.messages, p));
  lines.push(formatResult(verdict.level, p));
  return lines.join('\n');
}

export function formatOutcome(outcome: VerificationOutcome, p: Palette, quiet = false): string {
  return outcome.mode === 'all' ? formatReport(outcome, p) : formatVerdict(outcome, p, quiet);
}

/** Format an error with troubleshooting suggestions. */
export function formatError(error: SumcheckError | Error, p: Palette): string {
  const lines: string[] = [p.error(`Error: ${error.message}`)];

  if ('suggestions' in error && error.suggestions) {
    lines.push('');
    for (const suggestion of error.suggestions) {
      lines.push(p.hint(`  ${suggestion}`));
    }
  }

  return lines.join('\n');
}

/** Format a note/hint: "  hint text" */
export function formatHint(hint: string, p: Palette): string {
  return p.hint(`  ${hint}`);
}
