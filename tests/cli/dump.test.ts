/**
 * LeanDoc CLI Tests: leandoc-dump command
 */

import { describe, expect, it, beforeAll, afterAll, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parseDumpArgs, runDump } from '../../src/cli-dump.js';

describe('leandoc-dump CLI', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leandoc-dump-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // Remove the config file so each test starts from the defaults
  afterEach(async () => {
    await fs.rm(path.join(tempDir, '.leandoc.yaml'), { force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('parseDumpArgs', () => {
    it('leaves mode and format to the configuration', () => {
      expect(parseDumpArgs(['doc.adoc'])).toEqual({
        mode: 'dump',
        file: 'doc.adoc',
        dump: undefined,
        format: undefined,
      });
    });

    it('reads the mode and format flags', () => {
      expect(
        parseDumpArgs(['--json', '--format', 'compact', 'doc.adoc'])
      ).toEqual({
        mode: 'dump',
        file: 'doc.adoc',
        dump: 'json',
        format: 'compact',
      });
    });

    it('reads a file named like an object property', () => {
      expect(parseDumpArgs(['constructor'])).toEqual({
        mode: 'dump',
        file: 'constructor',
        dump: undefined,
        format: undefined,
      });
    });

    it('accepts - for standard input', () => {
      expect(parseDumpArgs(['--tokens', '-'])).toMatchObject({ file: '-' });
    });

    it('checks help and version first', () => {
      expect(parseDumpArgs(['--bogus', '--help'])).toEqual({ mode: 'help' });
      expect(parseDumpArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('rejects bad arguments', () => {
      expect(() => parseDumpArgs(['--tokens', '--json', 'a'])).toThrow(
        'Specify at most one of --tokens, --ast, --json'
      );
      expect(() => parseDumpArgs([])).toThrow('Missing file argument');
      expect(() => parseDumpArgs(['a', '--bogus'])).toThrow(
        'Unknown option: --bogus'
      );
      expect(() => parseDumpArgs(['--format', 'xml', 'a'])).toThrow(
        'Invalid format: xml. Expected human, json or compact'
      );
      expect(() => parseDumpArgs(['a', '--format'])).toThrow(
        '--format requires argument: human, json or compact'
      );
    });
  });

  describe('runDump', () => {
    it('prints the tree by default', async () => {
      const file = await writeFile('tree.adoc', '= T\n\nHi *you*\n');
      expect(runDump([file], tempDir)).toEqual({
        exitCode: 0,
        stdout:
          'Document @1 kv=2\n  Paragraph @3\n    Text @3 text="Hi "\n    Emphasis @3 name="bold"\n      Text @3 text="you"\n',
        stderr: '',
      });
    });

    it('prints tokens', async () => {
      const file = await writeFile('tokens.adoc', 'a\n');
      expect(runDump(['--tokens', file], tempDir).stdout).toBe(
        '1: TEXT rest="a"\n2: BLANK\n3: EOF\n'
      );
    });

    it('prints the payload tree as JSON', async () => {
      const file = await writeFile('json.adoc', '== S\n');
      const result = runDump(['--json', file], tempDir);
      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({
        kind: 'Document',
        children: [{ kind: 'Section', name: 'S', kv: { level: '2' } }],
      });
    });

    it('applies the configured width and mode', async () => {
      await writeFile('.leandoc.yaml', 'dump:\n  textWidth: 3\n');
      const file = await writeFile('width.adoc', 'abcdef\n');
      expect(runDump([file], tempDir).stdout).toBe(
        'Document @1\n  Paragraph @1\n    Text @1 text="abc"...\n'
      );

      await writeFile('.leandoc.yaml', 'dump:\n  mode: tokens\n');
      expect(runDump([file], tempDir).stdout).toBe(
        '1: TEXT rest="abcdef"\n2: BLANK\n3: EOF\n'
      );
      expect(runDump(['--ast', file], tempDir).stdout).toBe(
        'Document @1\n  Paragraph @1\n    Text @1 text="abcdef"\n'
      );
    });

    it('reports parse errors on stderr with exit code 1', async () => {
      await writeFile('.leandoc.yaml', 'errors:\n  format: compact\n');
      const file = await writeFile('broken.adoc', '----\ncode\n');
      expect(runDump([file], tempDir)).toEqual({
        exitCode: 1,
        stdout: '',
        stderr: `[LEANDOC-P001] Expected closing delimiter ---- at ${file}:4:1\n`,
      });
    });

    it('exits with 2 for missing files and directories', () => {
      const missing = path.join(tempDir, 'missing.adoc');
      expect(runDump([missing], tempDir)).toEqual({
        exitCode: 2,
        stdout: '',
        stderr: `Error: File not found: ${missing}\n`,
      });
      expect(runDump([tempDir], tempDir).stderr).toBe(
        `Error: File not found: ${tempDir}\n`
      );
    });

    it('exits with 2 for invalid configuration', async () => {
      await writeFile('.leandoc.yaml', 'foo: 1\n');
      const file = await writeFile('ok.adoc', 'text\n');
      expect(runDump([file], tempDir)).toEqual({
        exitCode: 2,
        stdout: '',
        stderr: 'Error: Invalid configuration: unknown key foo\n',
      });
    });

    it('exits with 2 for usage errors', () => {
      expect(runDump([], tempDir)).toEqual({
        exitCode: 2,
        stdout: '',
        stderr: 'Error: Missing file argument\n',
      });
    });

    it('prints help and version', () => {
      expect(runDump(['--help'], tempDir).stdout).toContain(
        'Usage: leandoc-dump [options] <file | ->'
      );
      expect(runDump(['--version'], tempDir).stdout).toMatch(
        /^\d+\.\d+\.\d+\n$/
      );
    });
  });
});
