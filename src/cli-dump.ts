#!/usr/bin/env node
/**
 * CLI Dump Entry Point
 *
 * Prints the line tokens, the indented tree or the JSON payload view of a
 * LeanDoc document.
 */

import {
  type DumpMode,
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
import { tokenize } from './lexer/index.js';
import { tryParse } from './parser/index.js';
import { dumpTokens, dumpTree, toPayload } from './tree/index.js';

/**
 * Parsed command-line arguments for leandoc-dump.
 * `dump` and `format` are undefined when the flag is absent, so the
 * configuration file decides.
 */
export type ParsedDumpArgs =
  | {
      mode: 'dump';
      file: string;
      dump: DumpMode | undefined;
      format: ErrorFormat | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const MODE_FLAGS: ReadonlyMap<string, DumpMode> = new Map([
  ['--tokens', 'tokens'],
  ['--ast', 'ast'],
  ['--json', 'json'],
]);

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--format',
  ...MODE_FLAGS.keys(),
]);

const HELP = `leandoc-dump - Print the structure of a LeanDoc document

Usage: leandoc-dump [options] <file | ->

Options:
  --tokens        One line per classified input line
  --ast           Indented document tree (default)
  --json          Document tree as JSON
  --format <fmt>  Error format: human (default), json or compact
  -h, --help      Show this help message
  -v, --version   Show version number`;

/**
 * Parse command-line arguments for leandoc-dump
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws Error on unknown options, conflicting modes or a missing file
 */
export function parseDumpArgs(argv: string[]): ParsedDumpArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const format = parseFormatFlag(argv);
  const file = positionalArg(argv, KNOWN_FLAGS);

  const modes = argv.flatMap((arg) => {
    const mode = MODE_FLAGS.get(arg);
    return mode ? [mode] : [];
  });
  if (modes.length > 1) {
    throw new Error('Specify at most one of --tokens, --ast, --json');
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'dump', file, dump: modes[0], format };
}

// ============================================================
// COMMAND
// ============================================================

/**
 * Run leandoc-dump without touching the process streams.
 * Exit code 1 is a parse error; 2 is a usage, configuration or I/O error.
 */
export function runDump(argv: string[], cwd: string): CliResult {
  let args: ParsedDumpArgs;
  try {
    args = parseDumpArgs(argv);
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
      dump: { ...loaded.dump, mode: args.dump ?? loaded.dump.mode },
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

  if (config.dump.mode === 'tokens') {
    return { exitCode: 0, stdout: dumpTokens(tokenize(source)), stderr: '' };
  }

  const outcome = tryParse(source);
  if (!outcome.success) {
    return {
      exitCode: 1,
      stdout: '',
      stderr: `${describeError(outcome.error, source, config, args.file)}\n`,
    };
  }

  const stdout =
    config.dump.mode === 'json'
      ? `${JSON.stringify(toPayload(outcome.document), null, 2)}\n`
      : dumpTree(outcome.document, { textWidth: config.dump.textWidth });
  return { exitCode: 0, stdout, stderr: '' };
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
  emit(runDump(process.argv.slice(2), process.cwd()));
}
