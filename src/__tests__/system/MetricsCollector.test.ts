/**
 * MetricsCollector unit tests.
 *
 * systeminformation is mocked so no host probing happens; directory sizes
 * are measured on a real temporary tree.
 */

jest.mock('systeminformation', () => ({
  fsSize: jest.fn(),
  processes: jest.fn(),
}));

import * as si from 'systeminformation';
import { MetricsCollector, renderSnapshot } from '../../system/MetricsCollector';
import { SystemSnapshot } from '../../system/types';
import { createLogger } from '../../utils/logger';
import { makeTempDir, removeTempDir, writeTree } from '../../../tests/helpers/tempTree';

const mockSi = jest.mocked(si);

function makeCollector(): MetricsCollector {
  return new MetricsCollector(createLogger({ enableConsole: false }));
}

// Fixtures carry only the fields the collector reads
const disk = (fs: string, size: number, used: number, use: number, mount: string) =>
  ({ fs, type: 'ext4', size, used, available: size - used, use, mount, rw: true }) as si.Systeminformation.FsSizeData;

describe('MetricsCollector', () => {
  describe('getDiskUsage', () => {
    it('maps filesystems and keeps the first N', async () => {
      mockSi.fsSize.mockResolvedValue([
        disk('/dev/sda1', 1000, 400, 40, '/'),
        disk('/dev/sdb1', 2000, 500, 25, '/data'),
      ]);

      await expect(makeCollector().getDiskUsage(1)).resolves.toEqual([
        { filesystem: '/dev/sda1', size: 1000, used: 400, available: 600, percentage: 40, mountpoint: '/' },
      ]);
    });

    it('returns an empty list when the probe fails', async () => {
      mockSi.fsSize.mockRejectedValue(new Error('no df'));
      await expect(makeCollector().getDiskUsage()).resolves.toEqual([]);
    });
  });

  describe('getTopProcesses', () => {
    const proc = (pid: number, name: string, cpu: number, mem: number) =>
      ({ pid, name, cpu, mem }) as si.Systeminformation.ProcessesProcessData;

    it('orders by CPU descending, ties by pid', async () => {
      mockSi.processes.mockResolvedValue({
        all: 3, running: 1, blocked: 0, sleeping: 2, unknown: 0,
        list: [proc(30, 'idle', 0.5, 1), proc(20, 'worker', 12, 3.25), proc(10, 'db', 12, 8)],
      } as si.Systeminformation.ProcessesData);

      const top = await makeCollector().getTopProcesses(2);
      expect(top).toEqual([
        { pid: 10, name: 'db', cpu: 12, memory: 8 },
        { pid: 20, name: 'worker', cpu: 12, memory: 3.25 },
      ]);
    });

    it('returns an empty list when the probe fails', async () => {
      mockSi.processes.mockRejectedValue(new Error('denied'));
      await expect(makeCollector().getTopProcesses()).resolves.toEqual([]);
    });
  });

  describe('getTopDirectories', () => {
    let root: string;

    beforeAll(async () => {
      root = await makeTempDir('metrics-');
      await writeTree(root, {
        'top.bin': 'x'.repeat(10),
        'a/one.bin': 'x'.repeat(100),
        'a/b/two.bin': 'x'.repeat(50),
        'c/three.bin': 'x'.repeat(150),
      });
    });

    afterAll(async () => {
      await removeTempDir(root);
    });

    it('sums sizes up every ancestor, root as "."', async () => {
      await expect(makeCollector().getTopDirectories(root, 10)).resolves.toEqual([
        { path: '.', sizeBytes: 310 },
        { path: 'a', sizeBytes: 150 },
        { path: 'c', sizeBytes: 150 },
        { path: 'a/b', sizeBytes: 50 },
      ]);
    });

    it('keeps only the first N rows', async () => {
      const rows = await makeCollector().getTopDirectories(root, 2);
      expect(rows.map(row => row.path)).toEqual(['.', 'a']);
    });
  });
});

describe('renderSnapshot', () => {
  const snapshot: SystemSnapshot = {
    host: { date: new Date(2024, 0, 5, 7, 3), hostname: 'build-01', kernel: 'Linux 6.1.0', uptime: 100 },
    disks: [{ filesystem: '/dev/sda1', size: 2048, used: 1024, available: 1024, percentage: 50, mountpoint: '/' }],
    topDirectories: [{ path: '.', sizeBytes: 1536 }],
    processes: [{ pid: 42, name: 'node', cpu: 3.14, memory: 1 }],
  };

  it('renders every section', () => {
    const lines = renderSnapshot(snapshot);
    expect(lines.slice(1)).toEqual([
      'Host: build-01',
      'Kernel: Linux 6.1.0',
      'Disk:',
      '  Filesystem\tSize\tUsed\tAvail\tUse%\tMounted on',
      '  /dev/sda1\t2.0K\t1.0K\t1.0K\t50%\t/',
      'Top directories (size):',
      '  1.5K\t.',
      'Processes:',
      '  PID\tCOMMAND\t%CPU\t%MEM',
      '  42\tnode\t3.1\t1.0',
    ]);
    expect(lines[0]).toMatch(/^Date: /);
  });

  it('marks unavailable sections', () => {
    const lines = renderSnapshot({ ...snapshot, disks: [], processes: [] });
    expect(lines).toContain('  (unavailable)');
    expect(lines[lines.length - 1]).toBe('  (unavailable)');
  });
});
