/**
 * Filesystem Provider
 *
 * The primitives the walker, the reader and the root policy need. The default
 * implementation is fs/promises; tests wrap it to count calls or to make
 * particular paths fail.
 */

import * as fs from 'fs';

export interface SearchFileSystem {
  stat(path: string): Promise<fs.Stats>;
  readdir(path: string): Promise<fs.Dirent[]>;
  /** Canonical path with every symlink resolved */
  realpath(path: string): Promise<string>;
  /** Open, read everything, close. The handle is closed on every path. */
  readFile(path: string): Promise<Buffer>;
}

export const nodeFileSystem: SearchFileSystem = {
  stat: (path) => fs.promises.stat(path),
  readdir: (path) => fs.promises.readdir(path, { withFileTypes: true }),
  realpath: (path) => fs.promises.realpath(path),
  async readFile(path) {
    const handle = await fs.promises.open(path, 'r');
    try {
      return await handle.readFile();
    } finally {
      await handle.close();
    }
  },
};

/**
 * The errno code of a failed system call ('ENOENT', 'EACCES', ...), if any.
 * Node's own argument errors also carry a code but no syscall; they are not
 * filesystem failures.
 */
export function errnoCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    'code' in error && typeof error.code === 'string' &&
    'syscall' in error && typeof error.syscall === 'string'
  ) {
    return error.code;
  }
  return undefined;
}
