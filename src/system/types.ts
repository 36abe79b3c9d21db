/**
 * Shared types for the host snapshot printed by `monitor`
 */

export interface HostInfo {
  date: Date;
  hostname: string;
  /** Kernel name and release, as `uname -sr` prints them */
  kernel: string;
  uptime: number;
}

/**
 * Disk usage information
 */
export interface DiskUsage {
  filesystem: string;
  size: number;
  used: number;
  available: number;
  percentage: number;
  mountpoint: string;
}

/**
 * Cumulative size of the regular files below one directory
 */
export interface DirectorySize {
  path: string;
  sizeBytes: number;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  /** CPU percentage */
  cpu: number;
  /** Memory percentage */
  memory: number;
}

export interface SystemSnapshot {
  host: HostInfo;
  disks: DiskUsage[];
  topDirectories: DirectorySize[];
  processes: ProcessInfo[];
}

export interface SnapshotOptions {
  /** Directory whose subdirectories are ranked by size (default: cwd) */
  directory?: string;
  /** Rows per section (default 5) */
  limit?: number;
}
