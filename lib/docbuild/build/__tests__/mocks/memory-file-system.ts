// ABOUTME: In-memory BuildFileSystem with a simulated clock for deterministic staleness tests.
// ABOUTME: Every mutation advances the clock, and adding or removing an entry touches its parent directory.

import { posix } from 'node:path';
import type { BuildFileSystem, DirectoryEntry, FileStat } from '../../types';

interface MemoryFile {
  content: string;
  mtimeMs: number;
}

const ROOT = '.';
const CLOCK_STEP_MS = 1000;

export function normalizePath(path: string): string {
  const normalized = posix.normalize(path);
  if (normalized === '' || normalized === './') {
    return ROOT;
  }
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

export class MemoryFileSystem implements BuildFileSystem {
  private clock = 1_700_000_000_000;
  private readonly files = new Map<string, MemoryFile>();
  private readonly directories = new Map<string, number>([[ROOT, this.clock]]);

  /**
   * Advance the simulated clock and return the new time
   */
  tick(): number {
    this.clock += CLOCK_STEP_MS;
    return this.clock;
  }

  now(): number {
    return this.clock;
  }

  mkdir(path: string): void {
    const normalized = normalizePath(path);
    if (normalized === ROOT || this.directories.has(normalized)) {
      return;
    }
    this.mkdir(posix.dirname(normalized));
    this.directories.set(normalized, this.tick());
    this.touchParent(normalized);
  }

  writeFile(path: string, content: string = ''): void {
    const normalized = normalizePath(path);
    this.mkdir(posix.dirname(normalized));
    const isNew = !this.files.has(normalized);
    this.files.set(normalized, { content, mtimeMs: this.tick() });
    if (isNew) {
      this.touchParent(normalized);
    }
  }

  /**
   * Update the modification time of an existing file or directory
   */
  touch(path: string): void {
    const normalized = normalizePath(path);
    const file = this.files.get(normalized);
    if (file) {
      file.mtimeMs = this.tick();
      return;
    }
    if (this.directories.has(normalized)) {
      this.directories.set(normalized, this.tick());
      return;
    }
    throw new Error(`ENOENT: no such file or directory, utime '${path}'`);
  }

  readFile(path: string): string | undefined {
    return this.files.get(normalizePath(path))?.content;
  }

  exists(path: string): boolean {
    const normalized = normalizePath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  async stat(path: string): Promise<FileStat | null> {
    const normalized = normalizePath(path);
    const file = this.files.get(normalized);
    if (file) {
      return { mtimeMs: file.mtimeMs, isDirectory: false };
    }
    const dirMtime = this.directories.get(normalized);
    if (dirMtime !== undefined) {
      return { mtimeMs: dirMtime, isDirectory: true };
    }
    return null;
  }

  async readdir(path: string): Promise<DirectoryEntry[] | null> {
    const normalized = normalizePath(path);
    if (!this.directories.has(normalized)) {
      return null;
    }

    const entries: DirectoryEntry[] = [];
    for (const dir of this.directories.keys()) {
      if (dir !== ROOT && posix.dirname(dir) === normalized) {
        entries.push({ name: posix.basename(dir), isDirectory: true });
      }
    }
    for (const file of this.files.keys()) {
      if (posix.dirname(file) === normalized) {
        entries.push({ name: posix.basename(file), isDirectory: false });
      }
    }
    return entries;
  }

  async remove(path: string): Promise<boolean> {
    const normalized = normalizePath(path);
    if (!this.files.delete(normalized)) {
      return false;
    }
    this.touchParent(normalized);
    return true;
  }

  async rename(from: string, to: string): Promise<void> {
    const source = normalizePath(from);
    const destination = normalizePath(to);
    const file = this.files.get(source);
    if (!file) {
      throw new Error(`ENOENT: no such file or directory, rename '${from}' -> '${to}'`);
    }
    this.files.delete(source);
    this.files.set(destination, file);
    this.touchParent(source);
    if (posix.dirname(destination) !== posix.dirname(source)) {
      this.touchParent(destination);
    }
  }

  private touchParent(path: string): void {
    const parent = posix.dirname(path);
    if (this.directories.has(parent)) {
      this.directories.set(parent, this.tick());
    }
  }
}
