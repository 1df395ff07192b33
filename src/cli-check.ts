#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Parses a LeanDoc document and reports what a generator could not render:
 * structural errors, unresolved directives and unexpanded includes.
 */

import {
  type ErrorFormat,
  type LeanDocConfig,
  loadConfig,
} from './config.js';
import {
  type CliResult,
  describeError,
  emit,
  parseFormatFlag,
  positionalArg,
  readSource,
  readVersion,
} from './cli-shared.js';
import { tryParse } from './parser/index.js';
import { checkContract } from './tree/index.js';

/**
 * Parsed command-line arguments for leandoc-check
 */
export type ParsedCheckArgs =
  | { mode: 'check'; file: string; format: ErrorFormat | undefined }
  | { mode: 'help' }
  | { mode: 'version' };

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--format',
]);

const HELP = `leandoc-check - Validate LeanDoc documents

Usage: leandoc-check [options] <file | ->

Options:
  --format <fmt>  Output format: human (default), json or compact
  -h, --help      Show this help message
  -v, --version   Show version number`;

/**
 * Parse command-line arguments for leandoc-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const format = parseFormatFlag(argv);
  const file = positionalArg(argv, KNOWN_FLAGS);
  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, format };
}

/** Join formatted reports; JSON reports become one array */
function joinReports(reports: string[], format: ErrorFormat): string {
  if (format === 'json') {
    return `[\n${reports.join(',\n')}\n]\n`;
  }
  return `${reports.join(format === 'human' ? '\n\n' : '\n')}\n`;
}

// ============================================================
// COMMAND
// ============================================================

/**
 * Run leandoc-check without touching the process streams.
 * Exit code 1 means a parse error or contract violations were reported;
 * 2 is a usage, configuration or I/O error.
 */
export function runCheck(argv: string[], cwd: string): CliResult {
  let args: ParsedCheckArgs;
  try {
    args = parseCheckArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { exitCode: 2, stdout: '', stderr: `Error: ${message}\n` };
  }

  if (args.mode === 'help') {
    return { exitCode: 0, stdout: `${HELP}\n`, stderr: '' };
  }
  if (args.mode === 'version') {
    return { exitCode: 0, stdout: `${readVersion()}\n`, stderr: '' };
  }

  let source: string;
  let config: LeanDocConfig;
  try {
    const loaded = loadConfig(cwd);
    config = {
      dump: loaded.dump,
      errors: {
        ...loaded.errors,
        format: args.format ?? loaded.errors.format,
      },
    };
    source = readSource(args.file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { exitCode: 2, stdout: '', stderr: `Error: ${message}\n` };
  }

  const format = config.errors.format;
  const outcome = tryParse(source);
  if (!outcome.success) {
    const report = describeError(outcome.error, source, config, args.file);
    return { exitCode: 1, stdout: joinReports([report], format), stderr: '' };
  }

  const violations = checkContract(outcome.document);
  if (violations.length === 0) {
    const stdout = format === 'json' ? '[]\n' : 'No issues found\n';
    return { exitCode: 0, stdout, stderr: '' };
  }

  const reports = violations.map((v) =>
    describeError(v, source, config, args.file)
  );
  return { exitCode: 1, stdout: joinReports(reports, format), stderr: '' };
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  emit(runCheck(process.argv.slice(2), process.cwd()));
}
