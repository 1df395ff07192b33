/**
 * LeanDoc CLI Tests: leandoc-check command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parseCheckArgs, runCheck } from '../../src/cli-check.js';

const UNRESOLVED = 'include::a.adoc[]\nifdef::x[]\ntext\nendif::[]\n';

describe('leandoc-check CLI', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leandoc-check-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('parseCheckArgs', () => {
    it('parses file and format', () => {
      expect(parseCheckArgs(['--format', 'json', 'doc.adoc'])).toEqual({
        mode: 'check',
        file: 'doc.adoc',
        format: 'json',
      });
    });

    it('rejects dump flags', () => {
      expect(() => parseCheckArgs(['--tokens', 'doc.adoc'])).toThrow(
        'Unknown option: --tokens'
      );
    });

    it('requires a file', () => {
      expect(() => parseCheckArgs(['--format', 'human'])).toThrow(
        'Missing file argument'
      );
    });
  });

  describe('runCheck', () => {
    it('reports a clean document', async () => {
      const file = await writeFile('clean.adoc', '= T\n\ntext\n');
      expect(runCheck([file], tempDir)).toEqual({
        exitCode: 0,
        stdout: 'No issues found\n',
        stderr: '',
      });
    });

    it('prints each violation in compact format', async () => {
      const file = await writeFile('unresolved.adoc', UNRESOLVED);
      expect(runCheck(['--format', 'compact', file], tempDir)).toEqual({
        exitCode: 1,
        stdout:
          `[LEANDOC-C002] Unexpanded include of a.adoc[] at ${file}:1:1\n` +
          `[LEANDOC-C001] Unresolved ifdef directive at ${file}:2:1\n`,
        stderr: '',
      });
    });

    it('prints one JSON array', async () => {
      const file = await writeFile('unresolved-json.adoc', UNRESOLVED);
      const result = runCheck(['--format', 'json', file], tempDir);
      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stdout)).toMatchObject([
        { code: 'LEANDOC-C002', range: { start: { line: 0, character: 0 } } },
        { code: 'LEANDOC-C001', range: { start: { line: 1, character: 0 } } },
      ]);

      const clean = await writeFile('clean-json.adoc', 'text\n');
      expect(runCheck(['--format', 'json', clean], tempDir).stdout).toBe(
        '[]\n'
      );
    });

    it('separates human reports with a blank line', async () => {
      const file = await writeFile('human.adoc', 'endif::[]\nendif::[]\n');
      const result = runCheck([file], tempDir);
      expect(result.exitCode).toBe(1);
      expect(result.stdout).toBe(
        [
          'error[LEANDOC-C001]: Unresolved endif directive',
          `  --> ${file}:1:1`,
          '   |',
          ' 1 | endif::[]',
          '   | ^^^^^^^^^',
          ' 2 | endif::[]',
          ' 3 |',
          '   |',
          '',
          'error[LEANDOC-C001]: Unresolved endif directive',
          `  --> ${file}:2:1`,
          '   |',
          ' 1 | endif::[]',
          ' 2 | endif::[]',
          '   | ^^^^^^^^^',
          ' 3 |',
          '   |',
          '',
        ].join('\n')
      );
    });

    it('reports parse errors with exit code 1', async () => {
      const file = await writeFile('ragged.adoc', '|===\n|a|b\n|c\n|===\n');
      expect(runCheck(['--format', 'compact', file], tempDir)).toEqual({
        exitCode: 1,
        stdout: `[LEANDOC-P004] The number of cells (3) is not a multiple of the column count (2) at ${file}:2:1\n`,
        stderr: '',
      });
    });

    it('exits with 2 for a missing file', () => {
      const missing = path.join(tempDir, 'nope.adoc');
      expect(runCheck([missing], tempDir)).toEqual({
        exitCode: 2,
        stdout: '',
        stderr: `Error: File not found: ${missing}\n`,
      });
    });

    it('prints help', () => {
      expect(runCheck(['-h'], tempDir).stdout).toContain(
        'Usage: leandoc-check [options] <file | ->'
      );
    });
  });
});
