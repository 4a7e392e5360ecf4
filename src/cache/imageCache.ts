import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { errorMessage } from '../utils/errorHandler';
import { logger } from '../utils/logger';

// Dual-hash key: {16 hex source hash}_{16 hex settings hash}
export const DUAL_HASH_KEY_LENGTH = 33;
export const DUAL_HASH_SEPARATOR_POS = 16;
export const DUAL_HASH_SEPARATOR = '_';
const HASHED_KEY_LENGTH = 32;
const TEMP_FILE_PATTERN = /\.tmp\.\d+\.\d+$/; // Matches .tmp.{pid}.{timestamp}

export interface ImageCacheOptions {
  ttl?: number | null;        // seconds
  maxSize?: number | null;    // bytes
  maxCount?: number | null;   // files
}

export interface CacheStats {
  count: number;
  size: number;
}

interface CacheFile {
  path: string;
  name: string;
  size: number;
  mtimeMs: number;
}

function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

export function isDualHashKey(key: string): boolean {
  return key.length === DUAL_HASH_KEY_LENGTH && key[DUAL_HASH_SEPARATOR_POS] === DUAL_HASH_SEPARATOR;
}

/**
 * Keys already in dual-hash form are kept as-is so every variant of one
 * source image can later be found by its source half. Anything else becomes
 * a truncated SHA-256.
 */
export function hashKey(key: string): string {
  if (isDualHashKey(key)) {
    return key;
  }
  return sha256Hex(key).slice(0, HASHED_KEY_LENGTH);
}

export function sourceHash(sourceId: string): string {
  return sha256Hex(sourceId).slice(0, DUAL_HASH_SEPARATOR_POS);
}

export function buildDualHashKey(sourceId: string, settings: string): string {
  return `${sourceHash(sourceId)}${DUAL_HASH_SEPARATOR}${sha256Hex(settings).slice(0, DUAL_HASH_SEPARATOR_POS)}`;
}

/**
 * File-backed image cache. The directory listing and file mtimes are the
 * only state; nothing is held in memory between calls. Assumes one process
 * owns the directory.
 */
export class ImageCache {
  readonly cacheDir: string;
  readonly ttl: number | null;
  readonly maxSize: number | null;
  readonly maxCount: number | null;

  constructor(cacheDir: string, options: ImageCacheOptions = {}) {
    this.cacheDir = cacheDir;
    this.ttl = options.ttl ?? null;
    this.maxSize = options.maxSize ?? null;
    this.maxCount = options.maxCount ?? null;
    fs.ensureDirSync(this.cacheDir);
  }

  pathFor(key: string, extension: string = 'jpg'): string {
    return path.join(this.cacheDir, `${hashKey(key)}.${extension}`);
  }

  async isValid(filePath: string): Promise<boolean> {
    let mtimeMs: number;
    try {
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) return false;
      mtimeMs = stat.mtimeMs;
    } catch {
      return false;
    }

    if (this.ttl === null) {
      return true;
    }
    return (Date.now() - mtimeMs) / 1000 < this.ttl;
  }

  async get(key: string, extension: string = 'jpg'): Promise<string | null> {
    const filePath = this.pathFor(key, extension);
    return (await this.isValid(filePath)) ? filePath : null;
  }

  /**
   * Writes through a temp file and rename, then evicts when a size or count
   * limit is set. Eviction problems are logged, never thrown.
   */
  async store(key: string, data: Buffer | Uint8Array, extension: string = 'jpg'): Promise<string> {
    const filePath = this.pathFor(key, extension);
    const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      logger.error(`Failed to write cache entry ${filePath}: ${errorMessage(error)}`);
      await fs.remove(tempPath);
      throw error;
    }

    if (this.maxSize !== null || this.maxCount !== null) {
      try {
        await this.evict();
      } catch (error) {
        logger.warn(`Cache eviction in ${this.cacheDir} failed: ${errorMessage(error)}`);
      }
    }

    return filePath;
  }

  private async listFiles(): Promise<CacheFile[]> {
    const entries = await fs.readdir(this.cacheDir, { withFileTypes: true });
    const files: CacheFile[] = [];

    for (const entry of entries) {
      // Writes still in progress are not entries yet
      if (!entry.isFile() || TEMP_FILE_PATTERN.test(entry.name)) continue;
      const filePath = path.join(this.cacheDir, entry.name);
      try {
        const stat = await fs.stat(filePath);
        files.push({ path: filePath, name: entry.name, size: stat.size, mtimeMs: stat.mtimeMs });
      } catch (error) {
        // Removed between readdir and stat
        logger.debug(`Could not stat cache file ${filePath}: ${errorMessage(error)}`);
      }
    }

    return files;
  }

  private isUnderLimits(size: number, count: number): boolean {
    const sizeOk = this.maxSize === null || size <= this.maxSize;
    const countOk = this.maxCount === null || count <= this.maxCount;
    return sizeOk && countOk;
  }

  /**
   * Deletes oldest-by-mtime files until both limits hold. Returns the
   * number of files removed.
   */
  async evict(): Promise<number> {
    if (this.maxSize === null && this.maxCount === null) {
      return 0;
    }

    const files = await this.listFiles();
    let size = files.reduce((total, file) => total + file.size, 0);
    let count = files.length;

    if (this.isUnderLimits(size, count)) {
      return 0;
    }

    files.sort((a, b) => a.mtimeMs - b.mtimeMs);

    let removed = 0;
    for (const file of files) {
      if (this.isUnderLimits(size, count)) break;
      await fs.remove(file.path);
      size -= file.size;
      count -= 1;
      removed += 1;
      logger.debug(`Evicted cache file ${file.name} (${file.size} bytes)`);
    }

    return removed;
  }

  /**
   * Removes files older than `maxAge` seconds, or older than the TTL when
   * `maxAge` is omitted. Without either, nothing is removed.
   */
  async cleanup(maxAge?: number | null): Promise<number> {
    const ageLimit = maxAge ?? this.ttl;
    if (ageLimit === null) {
      return 0;
    }

    const now = Date.now();
    let removed = 0;
    for (const file of await this.listFiles()) {
      if ((now - file.mtimeMs) / 1000 > ageLimit) {
        await fs.remove(file.path);
        removed += 1;
      }
    }
    return removed;
  }

  async clear(): Promise<number> {
    const files = await this.listFiles();
    for (const file of files) {
      await fs.remove(file.path);
    }
    return files.length;
  }

  async stats(): Promise<CacheStats> {
    const files = await this.listFiles();
    return {
      count: files.length,
      size: files.reduce((total, file) => total + file.size, 0),
    };
  }

  /**
   * Removes every dual-hash entry whose source half matches, whatever its
   * settings half or extension.
   */
  async removeBySourceHash(hash: string): Promise<number> {
    const prefix = `${hash}${DUAL_HASH_SEPARATOR}`;
    let removed = 0;
    for (const file of await this.listFiles()) {
      const stem = path.parse(file.name).name;
      if (isDualHashKey(stem) && stem.startsWith(prefix)) {
        await fs.remove(file.path);
        removed += 1;
      }
    }
    return removed;
  }
}
