/**
 * Configuration loading and merging.
 *
 * Resolution order: built-in defaults <- ~/.sumcheck.yml <- command-line flags.
 * Shallow merge; undefined values never override.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';

import { parse as parseYaml } from 'yaml';

import type { ColorMode, SumcheckConfig } from './types.js';
import { ValidationError } from './types.js';

const CONFIG_FILENAME = '.sumcheck.yml';

const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

/** Fully resolved configuration. */
export interface ResolvedConfig {
  color: ColorMode;
  weak_algorithm_notes: boolean;
}

export function getBuiltinDefaults(): ResolvedConfig {
  return {
    color: 'auto',
    weak_algorithm_notes: true,
  };
}

export function isColorMode(value: unknown): value is ColorMode {
  return COLOR_MODES.some((mode) => mode === value);
}

/** Parse a --color value or config entry. */
export function parseColorMode(value: string): ColorMode {
  if (!isColorMode(value)) {
    throw new ValidationError(`Invalid color mode: ${value}`, [
      `Use one of: ${COLOR_MODES.join(', ')}`,
    ]);
  }
  return value;
}

function validateConfigFields(parsed: object, filePath: string): SumcheckConfig {
  const config: SumcheckConfig = {};
  if ('color' in parsed && parsed.color !== undefined && parsed.color !== null) {
    if (!isColorMode(parsed.color)) {
      throw new ValidationError(
        `Invalid "color" in ${filePath}: expected one of ${COLOR_MODES.join(', ')}`,
      );
    }
    config.color = parsed.color;
  }
  if (
    'weak_algorithm_notes' in parsed &&
    parsed.weak_algorithm_notes !== undefined &&
    parsed.weak_algorithm_notes !== null
  ) {
    if (typeof parsed.weak_algorithm_notes !== 'boolean') {
      throw new ValidationError(`Invalid "weak_algorithm_notes" in ${filePath}: expected a boolean`);
    }
    config.weak_algorithm_notes = parsed.weak_algorithm_notes;
  }
  return config;
}

/** Parse a single .sumcheck.yml file. */
export async function loadConfigFile(filePath: string): Promise<SumcheckConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Cannot read config file: ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Malformed YAML in config file: ${filePath}: ${message}`, [
      `Check that ${CONFIG_FILENAME} contains valid YAML.`,
    ]);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`Invalid config file (not an object): ${filePath}`);
  }

  return validateConfigFields(parsed, filePath);
}

/** Override replaces whole keys; undefined values are skipped. */
export function mergeConfigs(base: ResolvedConfig, override: SumcheckConfig): ResolvedConfig {
  return {
    color: override.color ?? base.color,
    weak_algorithm_notes: override.weak_algorithm_notes ?? base.weak_algorithm_notes,
  };
}

/**
 * Get the global config file path (~/.sumcheck.yml).
 * Respects SUMCHECK_HOME environment variable for testing.
 */
export function getGlobalConfigPath(): string {
  const home = process.env.SUMCHECK_HOME ?? homedir();
  return join(home, CONFIG_FILENAME);
}

/** Defaults, then the global config file if present, then flag overrides. */
export async function resolveConfig(flags: SumcheckConfig = {}): Promise<ResolvedConfig> {
  let config = getBuiltinDefaults();

  const globalConfig = getGlobalConfigPath();
  if (existsSync(globalConfig)) {
    config = mergeConfigs(config, await loadConfigFile(globalConfig));
  }

  return mergeConfigs(config, flags);
}
