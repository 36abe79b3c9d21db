/**
 * Temporary directory trees for filesystem tests
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';

/** Relative path → file content */
export type TreeSpec = Record<string, string | Buffer>;

export async function makeTempDir(prefix: string = 'treekit-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write every file of `spec` below `root`, creating parent directories.
 */
export async function writeTree(root: string, spec: TreeSpec): Promise<void> {
  for (const [relativePath, content] of Object.entries(spec)) {
    const fullPath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true, maxRetries: 3 });
}
