/**
 * Tests for src/cli/output.ts
 * Covers: logSuccess, logError, logWarning, logInfo, printLines, reportWarnings, handleCommandError
 */

jest.mock('chalk', () => {
  const identity = (s: string) => s;
  const proxy: Record<string, unknown> = {};
  ['green', 'red', 'yellow', 'blue', 'gray', 'cyan', 'bold'].forEach((c) => { proxy[c] = identity; });
  proxy.level = 0;
  return { default: Object.assign(identity, proxy), __esModule: true };
});

import {
  handleCommandError,
  logError,
  logInfo,
  logSuccess,
  logWarning,
  printLines,
  reportWarnings
} from '../../cli/output';
import { ArchiveError, NotFoundError } from '../../core/errors';
import { FileOperationError } from '../../utils/files/types';

describe('output helpers', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let processExitSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = jest.spyOn(process, 'exit').mockImplementation((_code?: string | number | null) => {
      throw new Error(`process.exit(${_code})`);
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it('writes success and info lines to stdout', () => {
    logSuccess('done');
    logInfo('fyi');
    expect(consoleLogSpy.mock.calls).toEqual([['✓', 'done'], ['ℹ', 'fyi']]);
    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('writes warnings and errors to stderr', () => {
    logWarning('careful');
    logError('broken');
    expect(consoleErrorSpy.mock.calls).toEqual([['⚠', 'careful'], ['✗', 'broken']]);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('prints report lines one per call', () => {
    printLines(['a', 'b']);
    expect(consoleLogSpy.mock.calls).toEqual([['a'], ['b']]);
  });

  it('prints one warning per file', () => {
    reportWarnings([{ path: '/x/a', message: 'permission denied', code: 'EACCES' }]);
    expect(consoleErrorSpy).toHaveBeenCalledWith('⚠', '/x/a: permission denied');
  });

  describe('handleCommandError', () => {
    it('prints toolkit errors without a stack and exits 1', () => {
      expect(() => handleCommandError(new NotFoundError('/data', 'directory'))).toThrow('process.exit(1)');
      expect(consoleErrorSpy.mock.calls).toEqual([['✗', "Error: directory '/data' does not exist"]]);
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('prints file operation failures', () => {
      const failure = new FileOperationError("cannot access directory '/data': EACCES", 'stat', '/data', 'EACCES');
      expect(() => handleCommandError(failure)).toThrow('process.exit(1)');
      expect(consoleErrorSpy.mock.calls).toEqual([['✗', "Error: cannot access directory '/data': EACCES"]]);
    });

    it('prints the message of unexpected errors', () => {
      expect(() => handleCommandError(new Error('sys'))).toThrow('process.exit(1)');
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗', 'Error: sys');
    });

    it('handles non-Error values', () => {
      expect(() => handleCommandError('plain')).toThrow('process.exit(1)');
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗', 'Error: plain');
    });

    it('exits 1 for archive failures', () => {
      expect(() => handleCommandError(new ArchiveError('disk full'))).toThrow('process.exit(1)');
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗', 'Error: disk full');
    });
  });
});
