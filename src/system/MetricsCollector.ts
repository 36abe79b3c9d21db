/**
 * MetricsCollector - host snapshot for the `monitor` command
 *
 * Collects host, disk, directory-size and process information using
 * `systeminformation` and the Node.js `os` module. Every probe degrades to an
 * empty result (and a logged warning) rather than failing the snapshot.
 */

import * as os from 'os';
import fs from 'fs/promises';
import * as path from 'path';
import * as si from 'systeminformation';
import { ToolkitLogger } from '../utils/logger';
import { findRegularFiles } from '../utils/files/FileSearch';
import { comparePaths } from '../core/paths';
import { formatSize } from '../core/Reporter';
import {
  DirectorySize,
  DiskUsage,
  HostInfo,
  ProcessInfo,
  SnapshotOptions,
  SystemSnapshot,
} from './types';

export const DEFAULT_SNAPSHOT_ROWS = 5;

export class MetricsCollector {
  constructor(private readonly logger: ToolkitLogger) {}

  /**
   * Date, host name and kernel
   */
  getHostInfo(): HostInfo {
    return {
      date: new Date(),
      hostname: os.hostname(),
      kernel: `${os.type()} ${os.release()}`,
      uptime: os.uptime(),
    };
  }

  /**
   * First `limit` mounted filesystems
   */
  async getDiskUsage(limit: number = DEFAULT_SNAPSHOT_ROWS): Promise<DiskUsage[]> {
    try {
      const fsSize = await si.fsSize();
      return fsSize.slice(0, limit).map((fsInfo) => ({
        filesystem: fsInfo.fs,
        size: fsInfo.size,
        used: fsInfo.used,
        available: fsInfo.available,
        percentage: fsInfo.use,
        mountpoint: fsInfo.mount,
      }));
    } catch (error) {
      this.logger.warn('Disk usage not available', { error: String(error) });
      return [];
    }
  }

  /**
   * Directories under `directory` (itself included, as `.`) by cumulative
   * regular-file size, largest first, ties by path.
   */
  async getTopDirectories(directory: string, limit: number = DEFAULT_SNAPSHOT_ROWS): Promise<DirectorySize[]> {
    let files: string[];
    try {
      files = await findRegularFiles(directory);
    } catch (error) {
      this.logger.warn(`Cannot walk ${directory}`, { error: String(error) });
      return [];
    }

    const totals = new Map<string, number>([['.', 0]]);
    for (const relativePath of files) {
      let size: number;
      try {
        size = (await fs.lstat(path.join(directory, relativePath))).size;
      } catch (error) {
        this.logger.debug(`Skipping ${relativePath}`, { error: String(error) });
        continue;
      }

      let dir = path.posix.dirname(relativePath);
      while (dir !== '.') {
        totals.set(dir, (totals.get(dir) ?? 0) + size);
        dir = path.posix.dirname(dir);
      }
      totals.set('.', (totals.get('.') ?? 0) + size);
    }

    return Array.from(totals, ([dirPath, sizeBytes]) => ({ path: dirPath, sizeBytes }))
      .sort((a, b) => b.sizeBytes - a.sizeBytes || comparePaths(a.path, b.path))
      .slice(0, limit);
  }

  /**
   * Busiest processes by CPU percentage
   */
  async getTopProcesses(limit: number = DEFAULT_SNAPSHOT_ROWS): Promise<ProcessInfo[]> {
    try {
      const processes = await si.processes();
      return processes.list
        .map((proc) => ({
          pid: proc.pid,
          name: proc.name,
          cpu: proc.cpu,
          memory: proc.mem,
        }))
        .sort((a, b) => b.cpu - a.cpu || a.pid - b.pid)
        .slice(0, limit);
    } catch (error) {
      this.logger.warn('Process list not available', { error: String(error) });
      return [];
    }
  }

  /**
   * Gather every section of the snapshot
   */
  async collectSnapshot(options: SnapshotOptions = {}): Promise<SystemSnapshot> {
    const limit = options.limit ?? DEFAULT_SNAPSHOT_ROWS;
    const directory = options.directory ?? process.cwd();

    return {
      host: this.getHostInfo(),
      disks: await this.getDiskUsage(limit),
      topDirectories: await this.getTopDirectories(directory, limit),
      processes: await this.getTopProcesses(limit),
    };
  }
}

/**
 * Text lines for a snapshot
 */
export function renderSnapshot(snapshot: SystemSnapshot): string[] {
  const lines: string[] = [
    `Date: ${snapshot.host.date.toString()}`,
    `Host: ${snapshot.host.hostname}`,
    `Kernel: ${snapshot.host.kernel}`,
    'Disk:',
  ];

  if (snapshot.disks.length === 0) {
    lines.push('  (unavailable)');
  } else {
    lines.push('  Filesystem\tSize\tUsed\tAvail\tUse%\tMounted on');
    snapshot.disks.forEach((disk) => {
      lines.push(
        `  ${disk.filesystem}\t${formatSize(disk.size)}\t${formatSize(disk.used)}\t` +
          `${formatSize(disk.available)}\t${Math.round(disk.percentage)}%\t${disk.mountpoint}`
      );
    });
  }

  lines.push('Top directories (size):');
  snapshot.topDirectories.forEach((dir) => lines.push(`  ${formatSize(dir.sizeBytes)}\t${dir.path}`));

  lines.push('Processes:');
  if (snapshot.processes.length === 0) {
    lines.push('  (unavailable)');
  } else {
    lines.push('  PID\tCOMMAND\t%CPU\t%MEM');
    snapshot.processes.forEach((proc) => {
      lines.push(`  ${proc.pid}\t${proc.name}\t${proc.cpu.toFixed(1)}\t${proc.memory.toFixed(1)}`);
    });
  }

  return lines;
}
