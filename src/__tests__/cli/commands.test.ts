/**
 * Tests for the commands registered by createProgram (src/cli.ts).
 * Drives commander in-process against real temporary trees.
 */

jest.mock('chalk', () => {
  const identity = (s: string) => s;
  const proxy: Record<string, unknown> = {};
  ['green', 'red', 'yellow', 'blue', 'gray', 'cyan', 'bold'].forEach((c) => { proxy[c] = identity; });
  proxy.level = 0;
  return { default: Object.assign(identity, proxy), __esModule: true };
});

jest.mock('systeminformation', () => ({
  fsSize: jest.fn().mockResolvedValue([]),
  processes: jest.fn().mockRejectedValue(new Error('no process table')),
}));

import fs from 'fs/promises';
import path from 'path';
import { createProgram } from '../../cli';
import { createCliContext } from '../../cli/context';
import { UsageError } from '../../core/errors';
import { makeTempDir, removeTempDir, writeTree } from '../../../tests/helpers/tempTree';

const TEST_ENV = { TREEKIT_LOG_LEVEL: 'error' };

async function runCli(args: string[], env: NodeJS.ProcessEnv = TEST_ENV): Promise<void> {
  const program = createProgram(createCliContext(), env);
  program.exitOverride();
  await program.parseAsync(args, { from: 'user' });
}

describe('treekit commands', () => {
  let root: string;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let processExitSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;

  const stdoutLines = () => consoleLogSpy.mock.calls.map((call) => call.join(' '));
  const stderrLines = () => consoleErrorSpy.mock.calls.map((call) => call.join(' '));

  beforeEach(async () => {
    root = await makeTempDir('cli-');
    await writeTree(root, {
      'a.txt': 'hello\n',
      'sub/b.txt': 'hello world\n',
      'words.md': 'a a b b b c\n',
      'junk.tmp': 'tmp',
      'sub/old.bak': 'bak'
    });

    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    processExitSpy = jest.spyOn(process, 'exit').mockImplementation((_code?: string | number | null) => {
      throw new Error(`process.exit(${_code})`);
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    processExitSpy.mockRestore();
    await removeTempDir(root);
  });

  it('registers every command', () => {
    const names = createProgram(createCliContext(), TEST_ENV).commands.map((c) => c.name());
    expect(names).toEqual(['inspect', 'backup', 'cleanup', 'process', 'monitor', 'help', 'version']);
  });

  describe('inspect', () => {
    it('prints the directory summary', async () => {
      await runCli(['inspect', root, '--ext', '.txt']);

      const lines = stdoutLines();
      expect(lines[0]).toBe(`Directory: ${root}`);
      expect(lines).toContain('Matching files (*.txt): 2');
      expect(lines).toContain('Top 2 files by size:');
      expect(lines[lines.length - 1]).toBe(`  6B\t${path.join(root, 'a.txt')}`);
    });

    it('prints matching lines when a pattern is given', async () => {
      await runCli(['inspect', root, '--pattern', 'hel+o', '--ext', '.txt']);

      const lines = stdoutLines();
      expect(lines).toContain("Files matching 'hel+o' (*.txt): 2");
      expect(lines.slice(-2)).toEqual([
        `${path.join(root, 'a.txt')}:1:hello`,
        `${path.join(root, 'sub', 'b.txt')}:1:hello world`
      ]);
    });

    it('reports no matches as information, not failure', async () => {
      await runCli(['inspect', root, '--pattern', 'zzz']);
      expect(stdoutLines()).toContain("No matches found for pattern 'zzz'");
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('matches literally with --fixed-strings', async () => {
      await fs.writeFile(path.join(root, 'code.txt'), 'f(x)\n');
      await runCli(['inspect', root, '--pattern', '(', '--fixed-strings']);
      expect(stdoutLines()).toContain(`${path.join(root, 'code.txt')}:1:f(x)`);
    });

    it('exits 1 for an invalid pattern', async () => {
      await expect(runCli(['inspect', root, '--pattern', '('])).rejects.toThrow('process.exit(1)');
      expect(stderrLines()[0]).toMatch(/^✗ Error: invalid pattern '\('/);
    });

    it('exits 1 for a missing directory', async () => {
      const missing = path.join(root, 'missing');
      await expect(runCli(['inspect', missing])).rejects.toThrow('process.exit(1)');
      expect(stderrLines()).toEqual([`✗ Error: directory '${missing}' does not exist`]);
    });
  });

  describe('backup', () => {
    it('writes the archive and reports it', async () => {
      const output = path.join(root, 'out.tar.gz');
      await runCli(['backup', root, '--output', output, '--ext', '.txt']);

      await expect(fs.access(output)).resolves.toBeUndefined();
      expect(stdoutLines()[0].startsWith(`✓ Archived 2 files to ${output} (`)).toBe(true);
    });

    it('prints nothing on success with --quiet', async () => {
      await runCli(['--quiet', 'backup', root, '--output', path.join(root, 'q.tar.gz')]);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('exits 1 without --output', async () => {
      await expect(runCli(['backup', root])).rejects.toThrow('process.exit(1)');
    });

    it('exits 1 for a compression level out of range', async () => {
      await expect(
        runCli(['backup', root, '--output', path.join(root, 'x.tar.gz'), '--level', '12'])
      ).rejects.toThrow('process.exit(1)');
      expect(stderrLines()).toEqual(["✗ Error: --level must be an integer from 0 to 9, got '12'"]);
    });
  });

  describe('cleanup', () => {
    it('lists without deleting in dry-run mode', async () => {
      await runCli(['cleanup', root, '--dry-run']);

      expect(stdoutLines()).toEqual([
        `Would delete: ${path.join(root, 'junk.tmp')}`,
        `Would delete: ${path.join(root, 'sub', 'old.bak')}`,
        'ℹ 2 files would be deleted'
      ]);
      await expect(fs.access(path.join(root, 'junk.tmp'))).resolves.toBeUndefined();
    });

    it('deletes the matching files', async () => {
      await runCli(['cleanup', root]);

      expect(stdoutLines()).toEqual([
        `Deleted: ${path.join(root, 'junk.tmp')}`,
        `Deleted: ${path.join(root, 'sub', 'old.bak')}`,
        '✓ Deleted 2 of 2 files'
      ]);
      await expect(fs.access(path.join(root, 'junk.tmp'))).rejects.toThrow();
      await expect(fs.access(path.join(root, 'a.txt'))).resolves.toBeUndefined();
    });

    it('exits 1 when the directory is a file', async () => {
      await expect(runCli(['cleanup', path.join(root, 'a.txt')])).rejects.toThrow('process.exit(1)');
    });
  });

  describe('process', () => {
    it('prints statistics and the top tokens', async () => {
      const file = path.join(root, 'words.md');
      await runCli(['process', file, '--top', '2']);

      expect(stdoutLines()).toEqual([
        `File: ${file}`,
        'Lines: 1',
        'Words: 6',
        'Bytes: 12',
        'Distinct tokens: 3',
        'Top 2 tokens:',
        '  3\tb',
        '  2\ta'
      ]);
    });

    it('takes the default N from the environment', async () => {
      await runCli(['process', path.join(root, 'words.md')], { ...TEST_ENV, TREEKIT_DEFAULT_TOP: '1' });
      expect(stdoutLines()).toContain('Top 1 tokens:');
    });

    it.each(['0', '-3', '2.5', 'ten'])('exits 1 for --top %s', async (top) => {
      await expect(runCli(['process', path.join(root, 'words.md'), '--top', top])).rejects.toThrow('process.exit(1)');
      expect(stderrLines()).toEqual([`✗ Error: --top must be a positive integer, got '${top}'`]);
    });

    it('exits 1 for a missing file', async () => {
      const missing = path.join(root, 'nope.txt');
      await expect(runCli(['process', missing])).rejects.toThrow('process.exit(1)');
      expect(stderrLines()).toEqual([`✗ Error: file '${missing}' does not exist`]);
    });
  });

  describe('monitor', () => {
    it('prints a snapshot of the working directory', async () => {
      const cwdSpy = jest.spyOn(process, 'cwd').mockReturnValue(root);
      try {
        await runCli(['monitor']);
      } finally {
        cwdSpy.mockRestore();
      }

      const lines = stdoutLines();
      expect(lines.slice(3, 5)).toEqual(['Disk:', '  (unavailable)']);
      expect(lines).toContain('Top directories (size):');
      expect(lines[lines.length - 1]).toBe('  (unavailable)');
    });

    it('rejects extra arguments', async () => {
      await expect(runCli(['monitor', 'extra'])).rejects.toThrow('process.exit(1)');
    });
  });

  describe('help and version', () => {
    it('prints usage for one command', async () => {
      await runCli(['help', 'backup']);
      const written = stdoutSpy.mock.calls.map((call) => String(call[0])).join('');
      expect(written).toContain('Usage: treekit backup [options] <dir>');
    });

    it('exits 1 for help on an unknown command', async () => {
      await expect(runCli(['help', 'nope'])).rejects.toThrow('process.exit(1)');
      expect(stderrLines()).toEqual(["✗ Error: unknown command 'nope'"]);
    });

    it('prints the version', async () => {
      await runCli(['version']);
      expect(stdoutLines()).toEqual(['1.0.0']);
    });
  });

  describe('global options', () => {
    it('refuses --verbose together with --quiet', async () => {
      await expect(runCli(['--verbose', '--quiet', 'version'])).rejects.toBeInstanceOf(UsageError);
    });

    it('warns about invalid environment values and carries on', async () => {
      await runCli(['version'], { ...TEST_ENV, TREEKIT_MONITOR_ROWS: 'lots' });
      expect(stderrLines()).toEqual(['⚠ Ignoring TREEKIT_MONITOR_ROWS: monitor.rows must be an integer at least 1']);
      expect(stdoutLines()).toEqual(['1.0.0']);
    });

    it('rejects an unknown command', async () => {
      await expect(runCli(['frobnicate'])).rejects.toMatchObject({ exitCode: 1 });
    });
  });
});
