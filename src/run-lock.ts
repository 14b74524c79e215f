/**
 * Single-run lock file: at most one retention run mutates the torrent directory at a time
 */

import { closeSync, mkdirSync, openSync, readFileSync, statSync, unlinkSync, writeSync } from 'fs';
import { dirname } from 'path';
import { errorMessage, logger as rootLogger } from './logger.js';

const log = rootLogger.child('RunLock');

/** An owner may have created the file but not yet written its pid */
export const UNREADABLE_LOCK_GRACE_MS = 10_000;

export interface LockOwner {
  pid: number;
  startedAt: string;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists under another user
    return hasCode(error, 'EPERM');
  }
}

export function readLockOwner(path: string): LockOwner | null {
  try {
    const [pidLine, startedAt = ''] = readFileSync(path, 'utf-8').split('\n');
    const pid = Number.parseInt(pidLine, 10);
    return Number.isInteger(pid) && pid > 0 ? { pid, startedAt: startedAt.trim() } : null;
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return null;
    throw error;
  }
}

export class RunLock {
  private held = false;

  constructor(
    readonly path: string,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  /**
   * Create the lock file exclusively. Returns false while another live
   * process holds it; a lock left by a dead process is replaced.
   */
  acquire(): boolean {
    mkdirSync(dirname(this.path), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const fd = openSync(this.path, 'wx');
        try {
          writeSync(fd, `${process.pid}\n${new Date().toISOString()}\n`);
        } finally {
          closeSync(fd);
        }
        this.held = true;
        log.debug(`Acquired run lock ${this.path}`);
        return true;
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) throw error;
      }

      const owner = readLockOwner(this.path);
      if (!owner && this.isFresh()) {
        log.warn(`Run lock ${this.path} is being written by another run`, { lockFile: this.path });
        return false;
      }
      if (owner && this.isAlive(owner.pid)) {
        log.warn(`Another run is in progress (pid ${owner.pid}, started ${owner.startedAt || 'unknown'})`, {
          lockFile: this.path,
        });
        return false;
      }

      log.warn(`Removing stale run lock ${this.path}`, { pid: owner?.pid });
      try {
        unlinkSync(this.path);
      } catch (error) {
        if (!hasCode(error, 'ENOENT')) throw error;
      }
    }

    return false;
  }

  private isFresh(): boolean {
    try {
      return Date.now() - statSync(this.path).mtimeMs < UNREADABLE_LOCK_GRACE_MS;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    try {
      unlinkSync(this.path);
      log.debug(`Released run lock ${this.path}`);
    } catch (error) {
      log.warn(`Failed to remove run lock ${this.path}: ${errorMessage(error)}`);
    }
  }

  get isHeld(): boolean {
    return this.held;
  }
}
