// ABOUTME: BuildFileSystem backed by node:fs/promises, resolving every path under a root directory.

import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import type { BuildFileSystem, DirectoryEntry, FileStat } from './types';

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export class NodeBuildFileSystem implements BuildFileSystem {
  constructor(private readonly rootDirectory: string = process.cwd()) {}

  resolvePath(path: string): string {
    return resolve(this.rootDirectory, path);
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const stat = await fs.stat(this.resolvePath(path));
      return { mtimeMs: stat.mtimeMs, isDirectory: stat.isDirectory() };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async readdir(path: string): Promise<DirectoryEntry[] | null> {
    try {
      const entries = await fs.readdir(this.resolvePath(path), { withFileTypes: true });
      return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async remove(path: string): Promise<boolean> {
    try {
      await fs.unlink(this.resolvePath(path));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(this.resolvePath(from), this.resolvePath(to));
  }
}
