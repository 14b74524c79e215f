/**
 * Filesystem collaborator: stat, hardlink and hash operations the engine needs
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { link, rename, stat, unlink } from 'fs/promises';
import { resolve } from 'path';
import fg from 'fast-glob';
import type { FileStat } from './types.js';

export interface FileSystem {
  stat(path: string): Promise<FileStat>;
  createHardlink(existingPath: string, newPath: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  remove(path: string): Promise<void>;
  computeHash(path: string): Promise<string>;
  listFiles(root: string): Promise<string[]>;
}

export class NodeFileSystem implements FileSystem {
  constructor(private readonly chunkSize: number = 64 * 1024) {}

  async stat(path: string): Promise<FileStat> {
    const info = await stat(path, { bigint: true });
    return {
      device: info.dev.toString(),
      inode: info.ino.toString(),
      size: Number(info.size),
      mtimeMs: Number(info.mtimeNs) / 1_000_000,
      nlink: Number(info.nlink),
      isFile: info.isFile(),
    };
  }

  async createHardlink(existingPath: string, newPath: string): Promise<void> {
    await link(existingPath, newPath);
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await rename(fromPath, toPath);
  }

  async remove(path: string): Promise<void> {
    await unlink(path);
  }

  /**
   * SHA-256 hex digest of the file contents, streamed
   */
  computeHash(path: string): Promise<string> {
    return new Promise((resolvePromise, reject) => {
      const hash = createHash('sha256');
      const stream = createReadStream(path, { highWaterMark: this.chunkSize });
      stream.on('data', chunk => hash.update(chunk));
      stream.on('error', reject);
      stream.on('end', () => resolvePromise(hash.digest('hex')));
    });
  }

  async listFiles(root: string): Promise<string[]> {
    return fg('**/*', {
      cwd: resolve(root),
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      unique: true,
      absolute: true,
    });
  }
}
