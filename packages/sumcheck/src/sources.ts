/**
 * Input and checksum sources.
 *
 * Sources are lazy: nothing is opened or read until the verification engine
 * asks, so conflicting uses of standard input can be rejected up front.
 */

import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Readable } from 'node:stream';
import { text } from 'node:stream/consumers';

import type { HashSourceKind } from './types.js';
import { SourceReadError } from './types.js';

/** Path argument meaning standard input. */
export const STDIN_PATH = '-';

export const STDIN_LABEL = 'standard input';

/** Files are read in fixed-size chunks. */
export const READ_CHUNK_SIZE = 64 * 1024;

/** The bytes to be verified. */
export interface InputSource {
  readonly kind: 'file' | 'stdin';
  /** Basename for named files; undefined for standard input */
  readonly name: string | undefined;
  /** Path or "standard input" */
  readonly label: string;
  open(): Readable;
}

/** Text holding the expected hash: a CLI argument, check file, or stdin. */
export interface HashSource {
  readonly kind: HashSourceKind;
  readonly label: string;
  read(): Promise<string>;
}

export function fileInput(path: string): InputSource {
  return {
    kind: 'file',
    name: basename(path),
    label: path,
    open: () => createReadStream(path, { highWaterMark: READ_CHUNK_SIZE }),
  };
}

export function stdinInput(stream: Readable = process.stdin): InputSource {
  return {
    kind: 'stdin',
    name: undefined,
    label: STDIN_LABEL,
    open: () => stream,
  };
}

/** Input from a path argument, where "-" means standard input. */
export function resolveInput(path: string, stdin?: Readable): InputSource {
  return path === STDIN_PATH ? stdinInput(stdin) : fileInput(path);
}

export function argumentSource(hash: string): HashSource {
  return {
    kind: 'argument',
    label: 'command line argument',
    read: () => Promise.resolve(hash),
  };
}

/** Check file from a path argument, where "-" means standard input. */
export function checkFileSource(path: string, stdin: Readable = process.stdin): HashSource {
  if (path === STDIN_PATH) {
    return {
      kind: 'stdin',
      label: STDIN_LABEL,
      read: async () => {
        try {
          return await text(stdin);
        } catch (err: unknown) {
          throw new SourceReadError(`Error reading check file from standard input: ${errorMessage(err)}`);
        }
      },
    };
  }
  return {
    kind: 'file',
    label: path,
    read: async () => {
      try {
        return await readFile(path, 'utf-8');
      } catch (err: unknown) {
        throw toSourceReadError(err, `Unable to open check file at path '${path}'`, path);
      }
    },
  };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Translate a low-level I/O error into a SourceReadError without errno noise.
 * `context` leads the message; the errno code picks the detail.
 */
export function toSourceReadError(err: unknown, context: string, path: string): SourceReadError {
  if (err instanceof SourceReadError) {
    return err;
  }
  switch (errorCode(err)) {
    case 'ENOENT':
      return new SourceReadError(`${context}: the path '${path}' does not exist.`);
    case 'EISDIR':
      return new SourceReadError(`${context}: the path '${path}' is not a regular file.`);
    case 'EACCES':
    case 'EPERM':
      return new SourceReadError(`${context}: permission denied.`, [
        `Check file permissions: chmod +r ${path}`,
      ]);
    default:
      return new SourceReadError(`${context}: ${errorMessage(err)}`);
  }
}
