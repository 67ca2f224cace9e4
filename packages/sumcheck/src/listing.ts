/**
 * Checksum source parsing.
 *
 * Accepts either a bare hash or a SHASUMS-style listing. Listing lines are not
 * held to one grammar: the hex digest is located first and whatever remains
 * is taken as the claimed filename once format noise is trimmed off. This
 * covers GNU coreutils output (`<hex>  name`, `<hex> *name`, `\`-escaped
 * names) and BSD / `--tag` output (`SHA256 (name) = <hex>`).
 */

import { isHexDigest, toDigest } from './algorithm.js';
import type { Algorithm, ExpectedHash, HashFormat } from './types.js';
import { ALL_ALGORITHMS, AmbiguousHashSelectionError, NoHashFoundError } from './types.js';

/** Candidates parsed from one checksum source. */
export interface ParsedHashes {
  format: HashFormat;
  records: ExpectedHash[];
}

interface Token {
  text: string;
  start: number;
  end: number;
}

/** Filename coreutils prints for data read from standard input. */
const STDIN_FILENAME = '-';

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\v' || ch === '\f';
}

function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let start = -1;
  for (let i = 0; i <= line.length; i++) {
    const atBreak = i === line.length || isSpace(line.charAt(i));
    if (atBreak && start >= 0) {
      tokens.push({ text: line.slice(start, i), start, end: i });
      start = -1;
    } else if (!atBreak && start < 0) {
      start = i;
    }
  }
  return tokens;
}

function unescapeFilename(name: string): string {
  return name.replace(/\\(.)/g, (_match: string, ch: string) => (ch === 'n' ? '\n' : ch));
}

/** `SHA256 (name) =` → `name`; anything else is returned trimmed of `=`/`:`. */
function filenameBeforeHash(before: string): string {
  let rest = before.trim();
  while (rest.endsWith('=') || rest.endsWith(':')) {
    rest = rest.slice(0, -1).trimEnd();
  }
  const open = rest.indexOf('(');
  if (open >= 0 && rest.endsWith(')')) {
    return rest.slice(open + 1, -1).trim();
  }
  return rest;
}

/** `  *name` → `name` */
function filenameAfterHash(after: string): string {
  const rest = after.trim();
  return rest.startsWith('*') ? rest.slice(1).trimStart() : rest;
}

/** Parse one listing line into a candidate, or undefined if it holds no digest. */
export function parseListingLine(raw: string, lineNumber: number): ExpectedHash | undefined {
  let line = raw.trim();
  if (line === '' || line.startsWith('#')) {
    return undefined;
  }

  const escaped = line.startsWith('\\');
  if (escaped) {
    line = line.slice(1);
  }

  const hexToken = tokenize(line).find((token) => isHexDigest(token.text));
  if (!hexToken) {
    return undefined;
  }

  const after = filenameAfterHash(line.slice(hexToken.end));
  let filename = after !== '' ? after : filenameBeforeHash(line.slice(0, hexToken.start));
  if (escaped) {
    filename = unescapeFilename(filename);
  }

  return {
    digest: toDigest(hexToken.text),
    filename: filename === '' || filename === STDIN_FILENAME ? undefined : filename,
    line: lineNumber,
  };
}

/**
 * Extract candidate hashes from checksum source text.
 *
 * @throws NoHashFoundError if no line holds a digest of a supported length
 */
export function parseHashText(text: string, sourceLabel: string): ParsedHashes {
  const trimmed = text.trim();
  if (isHexDigest(trimmed)) {
    return { format: 'raw', records: [{ digest: toDigest(trimmed), line: 1 }] };
  }

  const records: ExpectedHash[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const record = parseListingLine(line, index + 1);
    if (record) {
      records.push(record);
    }
  });

  if (records.length === 0) {
    throw new NoHashFoundError(sourceLabel);
  }
  return { format: 'listing', records };
}

function digestKey(record: ExpectedHash): string {
  return `${record.digest.algorithm}:${record.digest.hex}`;
}

function distinctDigests(records: ExpectedHash[]): number {
  return new Set(records.map(digestKey)).size;
}

function describeCandidate(record: ExpectedHash): string {
  return record.filename ?? `line ${record.line}`;
}

/**
 * True if a claimed filename names the input exactly. A leading `./` is
 * ignored; any other directory part means the claim is about another path.
 */
export function filenameMatches(claimed: string, inputName: string): boolean {
  const name = claimed.startsWith('./') ? claimed.slice(2) : claimed;
  return name === inputName;
}

/** Algorithms in `records`, strongest first. */
function algorithmsPresent(records: ExpectedHash[]): Algorithm[] {
  return ALL_ALGORITHMS.filter((alg) => records.some((r) => r.digest.algorithm === alg)).reverse();
}

/**
 * Pick the candidate to verify against.
 *
 * Entries naming the input win, the strongest algorithm among them first.
 * Failing that, a single distinct digest is used as is. Several distinct
 * digests with nothing to choose between them are an error; the first line
 * is never guessed.
 *
 * @param inputName basename of the input, undefined for standard input
 */
export function selectExpectedHash(
  records: ExpectedHash[],
  inputName: string | undefined,
): ExpectedHash {
  if (inputName !== undefined) {
    const named = records.filter(
      (r) => r.filename !== undefined && filenameMatches(r.filename, inputName),
    );
    const groups = algorithmsPresent(named).map((alg) =>
      named.filter((r) => r.digest.algorithm === alg),
    );
    for (const group of groups) {
      if (distinctDigests(group) > 1) {
        throw new AmbiguousHashSelectionError(
          `The digests file lists '${inputName}' more than once with different hashes`,
          group.map(describeCandidate),
        );
      }
    }
    // Entries with different algorithms cannot disagree; compare with the strongest.
    const [first] = groups[0] ?? [];
    if (first) {
      return first;
    }
  }

  const [first] = records;
  if (first && distinctDigests(records) === 1) {
    return first;
  }

  const target = inputName !== undefined ? `'${inputName}'` : 'standard input';
  throw new AmbiguousHashSelectionError(
    `The digests file contains ${distinctDigests(records)} different hashes and none is listed for ${target}`,
    records.map(describeCandidate),
  );
}
