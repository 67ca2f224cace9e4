/**
 * Commander.js program definition.
 *
 * Kept apart from the bin entry so the whole CLI can be driven in-process
 * through `runCli` with captured output.
 */

import { readFileSync } from 'node:fs';
import type { Readable } from 'node:stream';

import type { Help } from 'commander';
import { Command, CommanderError, Option } from 'commander';

import { parseColorMode, resolveConfig } from './config.js';
import type { Palette } from './format.js';
import { createPalette, formatError, formatHint, formatOutcome, isColorEnabled } from './format.js';
import type { HashSource } from './sources.js';
import { argumentSource, checkFileSource, resolveInput } from './sources.js';
import type { GlobalOptions, SumcheckConfig, VerificationOutcome } from './types.js';
import {
  ConflictingHashSourcesError,
  EXIT_ERROR,
  EXIT_NOT_VERIFIED,
  SumcheckError,
  ValidationError,
} from './types.js';
import { verify } from './verify.js';

/** Where the CLI reads and writes. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin: Readable;
}

export function processIO(): CliIO {
  return {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    stdin: process.stdin,
  };
}

type VerifyAction = (
  input: string,
  hash: string | undefined,
  opts: Record<string, unknown>,
) => Promise<void>;

/** Version from the package manifest, which sits one level above both src/ and dist/. */
export function getVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  throw new Error('Internal error: package.json has no version');
}

function createProgram(io: CliIO, action: VerifyAction): Command {
  const program = new Command();

  program
    .name('sumcheck')
    .description('Verify a file against an expected hash, detecting the algorithm automatically.')
    .version(getVersion(), '--version', 'Show version number')
    .helpOption('-h, --help', 'Display help for command')
    .argument('<input>', 'File to verify, or - for standard input')
    .argument('[hash]', 'Expected hash, supplied directly')
    .option(
      '-c, --check <file>',
      'Raw hash or SHASUMS-style listing to check against (- for stdin)',
    )
    .addOption(new Option('--color <when>', 'Color output: auto, always, never'))
    .option('-C, --no-colour', 'Disable ANSI colours in output')
    .option('--no-weak-notes', 'Do not warn when a match relies on MD5')
    .addOption(new Option('--quiet', 'Print only the result line').preset(true))
    .addOption(new Option('--verbose', 'Show each verification step').preset(true))
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str.trimEnd()),
      writeErr: (str) => io.stderr(str.trimEnd()),
    })
    .configureHelp({
      helpWidth: 80,
      formatHelp: (cmd: Command, helper: Help) => {
        const termWidth = 25;
        const lines: string[] = [];

        lines.push(`Usage: ${helper.commandUsage(cmd)}`);
        lines.push('');

        const desc = helper.commandDescription(cmd);
        if (desc) {
          lines.push(desc);
          lines.push('');
        }

        const args = helper.visibleArguments(cmd);
        if (args.length > 0) {
          lines.push('Arguments:');
          for (const arg of args) {
            lines.push(`  ${arg.name()}`.padEnd(termWidth) + arg.description);
          }
          lines.push('');
        }

        const opts = helper.visibleOptions(cmd);
        if (opts.length > 0) {
          lines.push('Options:');
          for (const opt of opts) {
            lines.push(`  ${opt.flags}`.padEnd(termWidth) + opt.description);
          }
          lines.push('');
        }

        lines.push('Examples:');
        lines.push('  sumcheck image.iso                   print MD5, SHA-1, SHA-256, SHA-512');
        lines.push('  sumcheck image.iso <hash>            check against a hash');
        lines.push('  sumcheck image.iso -c SHA256SUMS     check against a digests file');
        lines.push('  curl -s URL | sumcheck image.iso -c -');
        lines.push('');

        return lines.join('\n');
      },
    })
    .action(action);

  return program;
}

/** Collect config overrides given on the command line. */
function flagOverrides(opts: Record<string, unknown>): SumcheckConfig {
  const flags: SumcheckConfig = {};
  if (typeof opts.color === 'string') {
    flags.color = parseColorMode(opts.color);
  }
  if (opts.colour === false) {
    flags.color = 'never';
  }
  if (opts.weakNotes === false) {
    flags.weak_algorithm_notes = false;
  }
  return flags;
}

function getGlobalOpts(opts: Record<string, unknown>): GlobalOptions {
  return { quiet: Boolean(opts.quiet), verbose: Boolean(opts.verbose) };
}

function outcomeExitCode(outcome: VerificationOutcome): number {
  if (outcome.mode === 'all' || outcome.level === 'match') {
    return 0;
  }
  return EXIT_NOT_VERIFIED;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * Returns the process exit code instead of exiting.
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  let exitCode = 0;
  let palette: Palette = createPalette(isColorEnabled('auto'));

  const handleVerify: VerifyAction = async (input, hash, opts) => {
    const config = await resolveConfig(flagOverrides(opts));
    palette = createPalette(isColorEnabled(config.color));
    const p = palette;

    const globalOpts = getGlobalOpts(opts);
    if (globalOpts.quiet && globalOpts.verbose) {
      throw new ValidationError('--quiet and --verbose cannot be used together.');
    }

    const check = typeof opts.check === 'string' ? opts.check : undefined;
    if (hash !== undefined && check !== undefined) {
      throw new ConflictingHashSourcesError([
        '* specified as command line argument',
        '* check hash from file (-c)',
      ]);
    }

    let hashSource: HashSource | undefined;
    if (hash !== undefined) {
      hashSource = argumentSource(hash);
    } else if (check !== undefined) {
      hashSource = checkFileSource(check, io.stdin);
    }

    const outcome = await verify(resolveInput(input, io.stdin), hashSource, {
      weakAlgorithmNotes: config.weak_algorithm_notes,
      onPhase: globalOpts.verbose
        ? (phase, detail) => io.stderr(formatHint(`[${phase}] ${detail}`, p))
        : undefined,
    });

    io.stdout(formatOutcome(outcome, p, globalOpts.quiet));
    exitCode = outcomeExitCode(outcome);
  };

  try {
    await createProgram(io, handleVerify).parseAsync([...argv], { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // Commander has already printed its own message.
      return err.exitCode === 0 ? 0 : EXIT_ERROR;
    }
    if (err instanceof SumcheckError) {
      io.stderr(formatError(err, palette));
      return err.exitCode;
    }
    const error = err instanceof Error ? err : new Error(String(err));
    io.stderr(palette.error(`Error: ${error.message}`));
    return EXIT_ERROR;
  }
  return exitCode;
}
