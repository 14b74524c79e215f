/**
 * Index of the media library by physical identity and by size
 */

import { basename } from 'path';
import pLimit from 'p-limit';
import type { FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import { identityKey, type FileIdentity, type FileStat } from './types.js';

const log = rootLogger.child('LibraryIndex');

export interface LibraryFile {
  path: string;
  size: number;
  mtimeMs: number;
  identity: FileIdentity;
}

export class LibraryIndex {
  private byIdentity = new Map<string, LibraryFile>();
  private bySize = new Map<number, LibraryFile[]>();
  private scanErrors = 0;

  constructor(
    readonly root: string,
    readonly device: string | null
  ) {}

  add(file: LibraryFile): void {
    const key = identityKey(file.identity);
    if (!this.byIdentity.has(key)) {
      this.byIdentity.set(key, file);
    }
    const sameSize = this.bySize.get(file.size);
    if (sameSize) {
      sameSize.push(file);
    } else {
      this.bySize.set(file.size, [file]);
    }
  }

  hasIdentity(identity: FileIdentity): boolean {
    return this.byIdentity.has(identityKey(identity));
  }

  /**
   * Library files of the given size, those named like `preferName` first
   */
  candidatesBySize(size: number, preferName?: string): LibraryFile[] {
    const candidates = this.bySize.get(size) ?? [];
    if (!preferName) return [...candidates];
    const wanted = basename(preferName);
    return [
      ...candidates.filter(candidate => basename(candidate.path) === wanted),
      ...candidates.filter(candidate => basename(candidate.path) !== wanted),
    ];
  }

  isSameDevice(device: string): boolean {
    return this.device !== null && this.device === device;
  }

  get size(): number {
    return this.byIdentity.size;
  }

  get fileCount(): number {
    let count = 0;
    for (const files of this.bySize.values()) count += files.length;
    return count;
  }

  get errors(): number {
    return this.scanErrors;
  }

  recordError(): void {
    this.scanErrors++;
  }
}

export async function buildLibraryIndex(
  fs: FileSystem,
  root: string,
  concurrency: number = 16
): Promise<LibraryIndex> {
  log.info(`Building media library index for: ${root}`);

  let rootStat: FileStat;
  try {
    rootStat = await fs.stat(root);
  } catch (error) {
    log.warn(`Media library not accessible: ${errorMessage(error)}`, { root });
    return new LibraryIndex(root, null);
  }

  const index = new LibraryIndex(root, rootStat.device);
  const paths = await fs.listFiles(root);
  const limit = pLimit(concurrency);

  const scanned = await Promise.all(
    [...paths].sort().map(path =>
      limit(async (): Promise<LibraryFile | null> => {
        try {
          const info = await fs.stat(path);
          if (!info.isFile) return null;
          return {
            path,
            size: info.size,
            mtimeMs: info.mtimeMs,
            identity: { device: info.device, inode: info.inode },
          };
        } catch (error) {
          index.recordError();
          log.warn(`Error indexing file ${path}: ${errorMessage(error)}`);
          return null;
        }
      })
    )
  );

  for (const file of scanned) {
    if (file) index.add(file);
  }

  log.info(`Media library index built: ${index.fileCount} files indexed, ${index.errors} errors`);
  return index;
}
