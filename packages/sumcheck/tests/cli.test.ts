import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { CliIO } from '../src/program.js';
import { getVersion, runCli } from '../src/program.js';
import { hashString } from './test-utils.js';

const CONTENT = 'cli test content\n';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(stdinChunks: string[] = []): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    stdin: Readable.from(stdinChunks.map((chunk) => Buffer.from(chunk))),
  };
}

let dir: string;
let originalHome: string | undefined;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'sumcheck-cli-'));
  originalHome = process.env.SUMCHECK_HOME;
  process.env.SUMCHECK_HOME = mkdtempSync(join(tmpdir(), 'sumcheck-cli-home-'));
});

afterEach(() => {
  if (originalHome === undefined) {
    delete process.env.SUMCHECK_HOME;
  } else {
    process.env.SUMCHECK_HOME = originalHome;
  }
});

function writeInput(content = CONTENT, name = 'release.tar.gz'): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe('sumcheck CLI', () => {
  it('prints every digest when no hash is given', async () => {
    const path = writeInput();
    const io = captureIO();

    expect(await runCli([path, '--color', 'never'], io)).toBe(0);
    expect(io.out).toEqual([
      [
        `${path} / MD5`,
        hashString(CONTENT, 'md5'),
        '',
        `${path} / SHA-1`,
        hashString(CONTENT, 'sha1'),
        '',
        `${path} / SHA-256`,
        hashString(CONTENT, 'sha256'),
        '',
        `${path} / SHA-512`,
        hashString(CONTENT, 'sha512'),
        '',
      ].join('\n'),
    ]);
    expect(io.err).toEqual([]);
  });

  it('verifies a hash given as an argument', async () => {
    const path = writeInput();
    const hex = hashString(CONTENT);
    const io = captureIO();

    expect(await runCli([path, hex, '--color', 'never'], io)).toBe(0);
    expect(io.out).toEqual([
      [`${path} / SHA-256`, hex, hex, 'command line argument', '', 'Result: [OK]'].join('\n'),
    ]);
  });

  it('exits 1 on a mismatch', async () => {
    const path = writeInput('tampered\n');
    const io = captureIO();

    expect(await runCli([path, hashString(CONTENT), '-C'], io)).toBe(1);
    expect(io.out[0]?.split('\n').at(-1)).toBe('Result: [FAIL]');
  });

  it('exits 1 when only the hash matches', async () => {
    const path = writeInput();
    const sums = join(dir, 'SHA256SUMS');
    writeFileSync(sums, `${hashString(CONTENT)}  other-name.tar.gz\n`);
    const io = captureIO();

    expect(await runCli([path, '-c', sums, '-C'], io)).toBe(1);
    expect(io.out[0]?.split('\n').at(-1)).toBe('Result: [MAYBE]');
  });

  it('checks against a digests file on standard input', async () => {
    const path = writeInput();
    const io = captureIO([`${hashString(CONTENT)}  release.tar.gz\n`]);

    expect(await runCli([path, '--check', '-', '-C', '--quiet'], io)).toBe(0);
    expect(io.out).toEqual(['Result: [OK]']);
  });

  it('hashes standard input when the input is -', async () => {
    const hex = hashString(CONTENT);
    const io = captureIO([CONTENT]);

    expect(await runCli(['-', hex, '-C'], io)).toBe(0);
    expect(io.out[0]?.split('\n')[0]).toBe('standard input / SHA-256');
  });

  it('exits 1 for standard input checked against a named entry', async () => {
    const sums = join(dir, 'SHA256SUMS');
    writeFileSync(sums, `${hashString(CONTENT)}  release.tar.gz\n`);
    const io = captureIO([CONTENT]);

    expect(await runCli(['-', '-c', sums, '-C', '--quiet'], io)).toBe(1);
    expect(io.out).toEqual(['Result: [MAYBE]']);
  });

  it('rejects a hash given both as argument and check file', async () => {
    const path = writeInput();
    const io = captureIO();

    expect(await runCli([path, hashString(CONTENT), '-c', 'SUMS', '-C'], io)).toBe(2);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      [
        'Error: Hashes were provided by multiple methods. Use only one.',
        '',
        '  * specified as command line argument',
        '  * check hash from file (-c)',
      ].join('\n'),
    ]);
  });

  it('rejects standard input for both roles', async () => {
    const io = captureIO([CONTENT]);

    expect(await runCli(['-', '-c', '-', '-C'], io)).toBe(2);
    expect(io.err).toEqual([
      'Error: Cannot use stdin for both hash file and input data\n\n  Save one of them to a file first.',
    ]);
  });

  it('rejects --quiet with --verbose', async () => {
    const io = captureIO();

    expect(await runCli([writeInput(), '--quiet', '--verbose', '-C'], io)).toBe(2);
    expect(io.err).toEqual(['Error: --quiet and --verbose cannot be used together.']);
  });

  it('reports each phase with --verbose', async () => {
    const path = writeInput();
    const io = captureIO();

    expect(await runCli([path, hashString(CONTENT), '--verbose', '-C'], io)).toBe(0);
    expect(io.err).toEqual([
      `  [awaiting-input] input: ${path}`,
      '  [resolving] expected hash from command line argument',
      `  [hashing] computing sha256 of ${path}`,
      '  [verdict] match',
    ]);
  });

  it('adds the MD5 note unless --no-weak-notes is given', async () => {
    const path = writeInput();
    const hex = hashString(CONTENT, 'md5');

    const noted = captureIO();
    expect(await runCli([path, hex, '-C'], noted)).toBe(0);
    expect(noted.out[0]).toContain(
      '(note) MD5 can easily be forged. Use a stronger algorithm if possible.',
    );

    const plain = captureIO();
    expect(await runCli([path, hex, '-C', '--no-weak-notes'], plain)).toBe(0);
    expect(plain.out[0]).not.toContain('(note)');
  });

  it('reads the color mode from the config file', async () => {
    const home = process.env.SUMCHECK_HOME ?? dir;
    writeFileSync(join(home, '.sumcheck.yml'), 'color: never\n');
    const io = captureIO();

    expect(await runCli([writeInput(), hashString(CONTENT)], io)).toBe(0);
    expect(io.out[0]?.split('\n').at(-1)).toBe('Result: [OK]');
  });

  it('reports a missing input file', async () => {
    const path = join(dir, 'absent.iso');
    const io = captureIO();

    expect(await runCli([path, hashString(CONTENT), '-C'], io)).toBe(2);
    expect(io.err).toEqual([`Error: Cannot read input: the path '${path}' does not exist.`]);
  });

  it('rejects an unknown color mode', async () => {
    const io = captureIO();

    expect(await runCli([writeInput(), '--color', 'rainbow'], io)).toBe(2);
    expect(io.err[0]).toContain('Invalid color mode: rainbow');
  });

  it('exits 2 when the input argument is missing', async () => {
    const io = captureIO();

    expect(await runCli([], io)).toBe(2);
    expect(io.err[0]).toContain("missing required argument 'input'");
  });

  it('prints the version from package.json', async () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
    );
    expect(manifest).toMatchObject({ version: getVersion() });

    const io = captureIO();
    expect(await runCli(['--version'], io)).toBe(0);
    expect(io.out).toEqual([getVersion()]);
  });
});
