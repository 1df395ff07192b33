/**
 * Configuration Loader for the LeanDoc front ends
 * Loads and validates .leandoc.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_TEXT_WIDTH } from './tree/dump.js';
import { type ContractError, createContractError } from './types.js';

// ============================================================
// TYPES
// ============================================================

export type DumpMode = 'tokens' | 'ast' | 'json';
export type ErrorFormat = 'human' | 'json' | 'compact';

export interface LeanDocConfig {
  readonly dump: {
    /** Text fields longer than this are cut in tree dumps */
    readonly textWidth: number;
    readonly mode: DumpMode;
  };
  readonly errors: {
    readonly format: ErrorFormat;
    /** Source lines shown around an error location */
    readonly contextLines: number;
  };
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.leandoc.yaml';

const DUMP_MODES: readonly DumpMode[] = ['tokens', 'ast', 'json'];
const ERROR_FORMATS: readonly ErrorFormat[] = ['human', 'json', 'compact'];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LeanDocConfig {
  return {
    dump: { textWidth: DEFAULT_TEXT_WIDTH, mode: 'ast' },
    errors: { format: 'human', contextLines: 2 },
  };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(detail: string): ContractError {
  return createContractError('LEANDOC-C004', { detail });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkKeys(
  section: Record<string, unknown>,
  path: string,
  allowed: readonly string[]
): void {
  for (const key of Object.keys(section)) {
    if (!allowed.includes(key)) {
      throw invalid(`unknown key ${path ? `${path}.` : ''}${key}`);
    }
  }
}

function sectionOf(
  data: Record<string, unknown>,
  name: string
): Record<string, unknown> {
  const section = data[name];
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    throw invalid(`${name} must be a mapping`);
  }
  return section;
}

function integerOf(
  value: unknown,
  path: string,
  min: number,
  fallback: number
): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    const kind = min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw invalid(`${path} must be ${kind}`);
  }
  return value;
}

function choiceOf<T extends string>(
  value: unknown,
  path: string,
  choices: readonly T[],
  fallback: T
): T {
  if (value === undefined) return fallback;
  const choice = choices.find((c) => c === value);
  if (choice === undefined) {
    throw invalid(`${path} must be one of ${choices.join(', ')}`);
  }
  return choice;
}

/**
 * Validate parsed file content and merge it over the defaults.
 * Throws ContractError (LEANDOC-C004) on unknown keys and wrong types.
 */
export function resolveConfig(data: unknown): LeanDocConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;
  if (!isRecord(data)) {
    throw invalid('must be a mapping');
  }
  checkKeys(data, '', ['dump', 'errors']);

  const dump = sectionOf(data, 'dump');
  checkKeys(dump, 'dump', ['textWidth', 'mode']);
  const errors = sectionOf(data, 'errors');
  checkKeys(errors, 'errors', ['format', 'contextLines']);

  return {
    dump: {
      textWidth: integerOf(
        dump['textWidth'],
        'dump.textWidth',
        1,
        defaults.dump.textWidth
      ),
      mode: choiceOf(dump['mode'], 'dump.mode', DUMP_MODES, defaults.dump.mode),
    },
    errors: {
      format: choiceOf(
        errors['format'],
        'errors.format',
        ERROR_FORMATS,
        defaults.errors.format
      ),
      contextLines: integerOf(
        errors['contextLines'],
        'errors.contextLines',
        0,
        defaults.errors.contextLines
      ),
    },
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .leandoc.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns The merged configuration, or the defaults if the file is missing
 * @throws ContractError (LEANDOC-C004) if the file is not valid YAML or has
 * unknown keys or values of the wrong type
 */
export function loadConfig(cwd: string): LeanDocConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return resolveConfig(parsedData);
}
