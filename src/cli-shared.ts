/**
 * CLI Shared Utilities
 * Source reading, version lookup and error output for the CLI tools
 */

import { readFileSync, statSync } from 'node:fs';
import type { ErrorFormat, LeanDocConfig } from './config.js';
import { enrichError } from './cli-error-enrichment.js';
import { formatError } from './cli-error-formatter.js';
import {
  type ContractError,
  createContractError,
  LeanDocError,
} from './types.js';

/** Argument naming standard input instead of a file */
export const STDIN_ARG = '-';

/**
 * Read the package version from package.json next to the sources (or next
 * to dist/ when installed).
 */
export function readVersion(): string {
  const pkgUrl = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(pkgUrl, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

function fileNotFound(path: string): ContractError {
  return createContractError('LEANDOC-C003', { path });
}

/**
 * Read a document from `file`, or from standard input for `-`.
 *
 * @throws ContractError (LEANDOC-C003) if the file does not exist or is a
 * directory
 */
export function readSource(file: string): string {
  if (file === STDIN_ARG) {
    return readFileSync(0, 'utf-8');
  }
  try {
    if (statSync(file).isDirectory()) {
      throw fileNotFound(file);
    }
    return readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof LeanDocError) throw err;
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw fileNotFound(file);
    }
    throw err;
  }
}

/**
 * Format a structured error for stderr with the configured format and
 * snippet size.
 */
export function describeError(
  err: LeanDocError,
  source: string,
  config: LeanDocConfig,
  file?: string
): string {
  const enriched = enrichError(err, source, config.errors.contextLines);
  return formatError(enriched, {
    format: config.errors.format,
    file: file === STDIN_ARG ? undefined : file,
  });
}

// ============================================================
// COMMAND RESULTS
// ============================================================

/** Output of one CLI invocation, written by the entry point */
export interface CliResult {
  readonly exitCode: 0 | 1 | 2;
  readonly stdout: string;
  readonly stderr: string;
}

/** Write a result to the process streams and set the exit code */
export function emit(result: CliResult): void {
  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr) process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

/** Extract the `--format` value, if any */
export function parseFormatFlag(argv: string[]): ErrorFormat | undefined {
  const formatIndex = argv.indexOf('--format');
  if (formatIndex === -1) return undefined;

  const formatValue = argv[formatIndex + 1];
  if (
    formatValue === 'human' ||
    formatValue === 'json' ||
    formatValue === 'compact'
  ) {
    return formatValue;
  }
  if (!formatValue || formatValue.startsWith('-')) {
    throw new Error('--format requires argument: human, json or compact');
  }
  throw new Error(
    `Invalid format: ${formatValue}. Expected human, json or compact`
  );
}

/**
 * First argument that is neither a flag nor a flag's value. A lone `-`
 * counts as an argument. Every flag must be one of `knownFlags`.
 */
export function positionalArg(
  argv: string[],
  knownFlags: ReadonlySet<string>
): string | undefined {
  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      i++; // Skip the format value
      continue;
    }
    if (arg !== STDIN_ARG && arg.startsWith('-')) {
      if (!knownFlags.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      continue;
    }
    if (file === undefined) file = arg;
  }
  return file;
}
