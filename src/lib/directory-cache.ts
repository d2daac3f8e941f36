import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, createLogger, describeError } from '../utils/logger';

export interface DirEntry {
  readonly mtimeMs: number;
  readonly name: string;
}

export interface ScanResult {
  readonly files: readonly DirEntry[];
  readonly dirs: readonly DirEntry[];
}

interface PendingScan {
  readonly promise: Promise<ScanResult>;
  readonly generation: number;
  readonly dirMtimeMs: number;
}

interface CacheEntry {
  readonly result: ScanResult;
  readonly createdAt: number;   // epoch ms, from the cache clock
  readonly dirMtimeMs: number;  // directory mtime when the scan started
}

export interface StatLike {
  mtimeMs: number;
  isFile(): boolean;
  isDirectory(): boolean;
}

/**
 * The filesystem calls a scan needs. stat follows symlinks.
 */
export interface CacheFileSystem {
  stat(filePath: string): Promise<StatLike>;
  readdir(dirPath: string): Promise<string[]>;
}

export const nodeFileSystem: CacheFileSystem = {
  stat: (filePath) => fs.stat(filePath),
  readdir: (dirPath) => fs.readdir(dirPath),
};

export interface DirectoryCacheOptions {
  fileSystem?: CacheFileSystem;
  clock?: () => number;
  resetHour?: number;
  logger?: Logger;
}

const EMPTY_RESULT: ScanResult = Object.freeze({
  files: Object.freeze([]),
  dirs: Object.freeze([]),
});

/**
 * First local `hour`:00 strictly after `timestamp`
 */
export function nextResetAfter(timestamp: number, hour: number): number {
  const created = new Date(timestamp);
  const boundary = new Date(
    created.getFullYear(),
    created.getMonth(),
    created.getDate(),
    hour,
    0,
    0,
    0
  );
  if (timestamp >= boundary.getTime()) {
    boundary.setDate(boundary.getDate() + 1);
  }
  return boundary.getTime();
}

function byNewest(a: DirEntry, b: DirEntry): number {
  return b.mtimeMs - a.mtimeMs || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
}

/**
 * Caches directory listings keyed by absolute path.
 *
 * An entry is served while both hold:
 * - the clock has not passed the next reset hour after the entry was created
 * - the directory's mtime still equals the one recorded at scan time
 *
 * Entries are frozen and swapped into the map in a single assignment, so a
 * reader sees either the previous scan or the new one. Concurrent scans of
 * the same path share one read.
 */
export class DirectoryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, PendingScan>();
  private readonly fileSystem: CacheFileSystem;
  private readonly clock: () => number;
  private readonly resetHour: number;
  private readonly logger: Logger;
  private generation = 0;

  constructor(options: DirectoryCacheOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.clock = options.clock ?? Date.now;
    this.resetHour = options.resetHour ?? 3;
    this.logger = options.logger ?? createLogger('Directory Cache');
  }

  /**
   * Files and subdirectories of `dirPath`, newest first, hidden entries excluded
   */
  async scan(dirPath: string): Promise<ScanResult> {
    const key = path.resolve(dirPath);
    const dirStat = await this.statDirectory(key);
    if (!dirStat) {
      this.entries.delete(key);
      return EMPTY_RESULT;
    }

    const entry = this.entries.get(key);
    if (entry && this.isValid(entry, dirStat.mtimeMs)) {
      this.logger.debug(`Using cached directory scan for ${key}`);
      return entry.result;
    }

    // Only join a read started against the same mount table and directory state
    const pending = this.inflight.get(key);
    if (pending && pending.generation === this.generation && pending.dirMtimeMs === dirStat.mtimeMs) {
      return pending.promise;
    }

    const scan: PendingScan = {
      promise: this.readDirectory(key, dirStat.mtimeMs).finally(() => {
        if (this.inflight.get(key) === scan) {
          this.inflight.delete(key);
        }
      }),
      generation: this.generation,
      dirMtimeMs: dirStat.mtimeMs,
    };
    this.inflight.set(key, scan);
    return scan.promise;
  }

  async fileNames(dirPath: string): Promise<string[]> {
    const { files } = await this.scan(dirPath);
    return files.map((entry) => entry.name);
  }

  async dirNames(dirPath: string): Promise<string[]> {
    const { dirs } = await this.scan(dirPath);
    return dirs.map((entry) => entry.name);
  }

  invalidate(dirPath: string): void {
    this.generation++;
    this.entries.delete(path.resolve(dirPath));
  }

  invalidateAll(): void {
    this.generation++;
    this.entries.clear();
    this.logger.debug('Directory cache invalidated');
  }

  has(dirPath: string): boolean {
    return this.entries.has(path.resolve(dirPath));
  }

  get size(): number {
    return this.entries.size;
  }

  private isValid(entry: CacheEntry, currentMtimeMs: number): boolean {
    if (this.clock() >= nextResetAfter(entry.createdAt, this.resetHour)) {
      return false;
    }
    return entry.dirMtimeMs === currentMtimeMs;
  }

  private async statDirectory(dirPath: string): Promise<StatLike | null> {
    try {
      const stats = await this.fileSystem.stat(dirPath);
      return stats.isDirectory() ? stats : null;
    } catch {
      return null;
    }
  }

  private async readDirectory(dirPath: string, dirMtimeMs: number): Promise<ScanResult> {
    const generation = this.generation;
    const createdAt = this.clock();

    let names: string[];
    try {
      names = await this.fileSystem.readdir(dirPath);
    } catch (error) {
      this.logger.warn(`Unable to read directory ${dirPath}: ${describeError(error)}`);
      return EMPTY_RESULT;
    }

    const files: DirEntry[] = [];
    const dirs: DirEntry[] = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;

      let stats: StatLike;
      try {
        stats = await this.fileSystem.stat(path.join(dirPath, name));
      } catch {
        // Removed between readdir and stat
        continue;
      }

      const entry: DirEntry = Object.freeze({ mtimeMs: stats.mtimeMs, name });
      if (stats.isFile()) {
        files.push(entry);
      } else if (stats.isDirectory()) {
        dirs.push(entry);
      }
    }

    files.sort(byNewest);
    dirs.sort(byNewest);

    const result: ScanResult = Object.freeze({
      files: Object.freeze(files),
      dirs: Object.freeze(dirs),
    });

    // An invalidation while reading means the mount table changed under us
    if (generation === this.generation) {
      this.entries.set(dirPath, Object.freeze({ result, createdAt, dirMtimeMs }));
    }

    this.logger.debug(`Cached directory scan for ${dirPath}: ${files.length} files, ${dirs.length} dirs`);
    return result;
  }
}
