/**
 * Content hashing through the (path, size, mtime) cache
 */

import pLimit from 'p-limit';
import type { HashCache } from './file-cache.js';
import type { FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import type { FileStat } from './types.js';

const log = rootLogger.child('ContentHasher');

export class ContentHasher {
  private computed = 0;
  private cached = 0;

  constructor(
    private readonly fs: FileSystem,
    private readonly cache: HashCache | null = null,
    private readonly concurrency: number = 4
  ) {}

  /**
   * Hash a file, trusting the cache only for the file's current size and mtime.
   * Pass a fresh stat to skip the extra stat call.
   */
  async hash(path: string, current?: FileStat): Promise<string> {
    const info = current ?? (await this.fs.stat(path));

    if (this.cache) {
      const hit = this.cache.get(path, info.size, info.mtimeMs);
      if (hit) {
        this.cached++;
        return hit;
      }
    }

    const digest = await this.fs.computeHash(path);
    this.computed++;

    if (this.cache) {
      // Re-stat so a file modified while hashing is not cached under the old mtime
      const after = await this.fs.stat(path);
      if (after.size === info.size && after.mtimeMs === info.mtimeMs) {
        this.cache.put(path, info.size, info.mtimeMs, digest);
      } else {
        log.warn('File changed while hashing, not caching', { path });
      }
    }

    return digest;
  }

  /**
   * Hash many files with bounded concurrency; unreadable files map to null
   */
  async hashMany(paths: string[]): Promise<Map<string, string | null>> {
    const limit = pLimit(this.concurrency);
    const entries = await Promise.all(
      paths.map(path =>
        limit(async (): Promise<[string, string | null]> => {
          try {
            return [path, await this.hash(path)];
          } catch (error) {
            log.warn(`Failed to hash ${path}: ${errorMessage(error)}`);
            return [path, null];
          }
        })
      )
    );
    return new Map(entries);
  }

  getStats(): { computed: number; cached: number } {
    return { computed: this.computed, cached: this.cached };
  }
}
