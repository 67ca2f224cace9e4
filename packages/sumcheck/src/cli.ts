#!/usr/bin/env node

/**
 * CLI entry point for sumcheck.
 */

import { runCli } from './program.js';

export async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 2;
});
