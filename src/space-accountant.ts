/**
 * Estimates disk space actually released by deleting files that may be hardlinked
 */

import type { FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import { identityKey, type FileStat } from './types.js';

const log = rootLogger.child('SpaceAccountant');

/**
 * Tracks, across calls in one run, which directory entries of each inode are
 * slated for deletion. An inode's size counts once, when its last link joins
 * the set; paths are never removed here, so this also works for dry runs.
 */
export class SpaceAccountant {
  private pending = new Map<string, Set<string>>();
  private counted = new Set<string>();

  constructor(private readonly fs: FileSystem) {}

  async estimateFreed(paths: string[]): Promise<number> {
    let freed = 0;

    for (const path of paths) {
      let info: FileStat;
      try {
        info = await this.fs.stat(path);
      } catch (error) {
        log.debug(`Skipping unreadable file: ${errorMessage(error)}`, { path });
        continue;
      }

      const key = identityKey(info);
      if (this.counted.has(key)) continue;

      const links = this.pending.get(key) ?? new Set<string>();
      links.add(path);
      this.pending.set(key, links);

      if (links.size >= info.nlink) {
        this.counted.add(key);
        freed += info.size;
      }
    }

    return freed;
  }

  reset(): void {
    this.pending.clear();
    this.counted.clear();
  }
}
