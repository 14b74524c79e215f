/**
 * Persistent content-hash cache keyed by (path, size, mtime)
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { dirname } from 'path';
import { errorMessage, Logger, logger as rootLogger } from './logger.js';

export interface HashCache {
  get(path: string, size: number, mtimeMs: number): string | null;
  put(path: string, size: number, mtimeMs: number, hash: string): void;
}

export interface FileCacheStats {
  totalEntries: number;
  dbSizeBytes: number;
  hits: number;
  misses: number;
  hitRate: number;
}

interface CacheRow {
  size: number;
  mtime_ms: number;
  hash: string;
}

/**
 * SQLite-backed hash cache. A row is only trusted while its size and mtime
 * still match the live file; a mismatched row is dropped on read.
 */
export class FileHashCache implements HashCache {
  private db: Database.Database;
  private dbPath: string;
  private hits = 0;
  private misses = 0;
  private log: Logger;

  constructor(dbPath: string = './cache/file_cache.db') {
    this.dbPath = dbPath;
    this.log = rootLogger.child('FileHashCache');
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = this.openOrRecover(dbPath);
    this.log.info(`Initialized file cache at ${dbPath}`);
  }

  /**
   * A cache file SQLite cannot read is moved aside and replaced with an empty one
   */
  private openOrRecover(dbPath: string): Database.Database {
    try {
      return openDatabase(dbPath);
    } catch (error) {
      if (dbPath === ':memory:' || !existsSync(dbPath)) throw error;

      const aside = `${dbPath}.corrupt-${Date.now()}`;
      this.log.warn(`Cache database unreadable, moving it to ${aside}: ${errorMessage(error)}`);
      renameSync(dbPath, aside);
      rmSync(`${dbPath}-wal`, { force: true });
      rmSync(`${dbPath}-shm`, { force: true });
      return openDatabase(dbPath);
    }
  }

  get(path: string, size: number, mtimeMs: number): string | null {
    let row: CacheRow | undefined;
    try {
      row = this.db
        .prepare<[string], CacheRow>('SELECT size, mtime_ms, hash FROM file_cache WHERE path = ?')
        .get(path);
    } catch (error) {
      this.log.warn(`Cache read failed, treating as miss: ${errorMessage(error)}`, { path });
      this.misses++;
      return null;
    }

    if (!row) {
      this.misses++;
      this.log.debug('Cache miss', { path });
      return null;
    }

    if (row.size !== size || row.mtime_ms !== mtimeMs || typeof row.hash !== 'string' || row.hash === '') {
      this.misses++;
      this.log.debug('Cache entry stale (size/mtime changed)', { path });
      this.invalidate(path);
      return null;
    }

    this.hits++;
    try {
      this.db.prepare('UPDATE file_cache SET last_accessed = ? WHERE path = ?').run(Date.now(), path);
    } catch (error) {
      this.log.debug(`Could not touch cache entry: ${errorMessage(error)}`, { path });
    }
    return row.hash;
  }

  put(path: string, size: number, mtimeMs: number, hash: string): void {
    try {
      this.db
        .prepare(`
          INSERT OR REPLACE INTO file_cache (path, size, mtime_ms, hash, last_accessed)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(path, size, mtimeMs, hash, Date.now());
    } catch (error) {
      this.log.warn(`Cache write failed: ${errorMessage(error)}`, { path });
    }
  }

  private invalidate(path: string): void {
    try {
      this.db.prepare('DELETE FROM file_cache WHERE path = ?').run(path);
    } catch (error) {
      this.log.warn(`Cache invalidation failed: ${errorMessage(error)}`, { path });
    }
  }

  /**
   * Drop entries no run has read within `maxAgeMs`
   */
  prune(maxAgeMs: number = 30 * 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAgeMs;
    try {
      const result = this.db.prepare('DELETE FROM file_cache WHERE last_accessed < ?').run(cutoff);
      if (result.changes > 0) {
        this.log.info(`Pruned ${result.changes} old cache entries`, { count: result.changes });
      }
      return result.changes;
    } catch (error) {
      this.log.warn(`Cache prune failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  getStats(): FileCacheStats {
    const { count } = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM file_cache').get() ?? { count: 0 };
    const total = this.hits + this.misses;
    return {
      totalEntries: count,
      dbSizeBytes: this.dbPath !== ':memory:' && existsSync(this.dbPath) ? statSync(this.dbPath).size : 0,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? Math.round((this.hits / total) * 10000) / 100 : 0,
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function openDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    initSchema(db);
    return db;
  } catch (error) {
    db.close();
    throw error;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS file_cache (
      path TEXT PRIMARY KEY,
      size INTEGER NOT NULL,
      mtime_ms REAL NOT NULL,
      hash TEXT NOT NULL,
      last_accessed INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_file_cache_last_accessed ON file_cache(last_accessed);
  `);
}
