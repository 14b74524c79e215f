import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, extname, join } from 'path';
import type { FileSystem } from '../src/filesystem.js';
import type { TorrentClient, TorrentFileEntry, TorrentSummary } from '../src/qbittorrent-client.js';
import type { FileRef, TorrentRecord, TrackerRef } from '../src/types.js';

export const DAY = 86_400;

const MEDIA = new Set(['.mkv', '.mp4', '.avi']);

let counter = 0;

/**
 * Fresh scratch directory under .test-tmp
 */
export function scratchDir(name: string): string {
  counter++;
  const dir = join(process.cwd(), '.test-tmp', `${name}-${process.pid}-${counter}`);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function writeFile(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

export async function fileRef(fs: FileSystem, path: string): Promise<FileRef> {
  const info = await fs.stat(path);
  return {
    path,
    size: info.size,
    mtimeMs: info.mtimeMs,
    identity: { device: info.device, inode: info.inode },
    isMedia: MEDIA.has(extname(path).toLowerCase()),
  };
}

export function torrent(overrides: Partial<TorrentRecord> & { id: string }): TorrentRecord {
  return {
    name: overrides.id,
    savePath: '/downloads',
    files: [],
    ratio: 0,
    seedingSeconds: 0,
    state: 'uploading',
    trackers: [],
    ...overrides,
  };
}

export function syntheticFile(path: string, inode: string, options: { device?: string; size?: number; isMedia?: boolean } = {}): FileRef {
  return {
    path,
    size: options.size ?? 100,
    mtimeMs: 1_700_000_000_000,
    identity: { device: options.device ?? 'dev-1', inode },
    isMedia: options.isMedia ?? true,
  };
}

export interface FakeTorrent {
  summary: TorrentSummary;
  files: TorrentFileEntry[];
  trackers: TrackerRef[];
}

/**
 * In-memory torrent client recording every mutating call
 */
export class FakeTorrentClient implements TorrentClient {
  readonly deleted: Array<{ id: string; deleteFiles: boolean }> = [];
  readonly paused: string[] = [];
  readonly resumed: string[] = [];
  readonly failing = new Set<string>();
  readonly failingDeletes = new Set<string>();
  closed = false;

  constructor(private readonly torrents: FakeTorrent[]) {}

  async listTorrents(): Promise<TorrentSummary[]> {
    return this.torrents.map(entry => entry.summary);
  }

  private find(id: string): FakeTorrent {
    const entry = this.torrents.find(candidate => candidate.summary.id === id);
    if (!entry || this.failing.has(id)) {
      throw new Error(`torrent ${id} unavailable`);
    }
    return entry;
  }

  async listFiles(id: string): Promise<TorrentFileEntry[]> {
    return this.find(id).files;
  }

  async listTrackers(id: string): Promise<TrackerRef[]> {
    return this.find(id).trackers;
  }

  async deleteTorrent(id: string, deleteFiles: boolean): Promise<void> {
    if (this.failingDeletes.has(id)) {
      throw new Error(`delete rejected for ${id}`);
    }
    this.deleted.push({ id, deleteFiles });
  }

  async pauseTorrent(id: string): Promise<void> {
    this.paused.push(id);
  }

  async resumeTorrent(id: string): Promise<void> {
    this.resumed.push(id);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
