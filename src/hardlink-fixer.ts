/**
 * Atomic hardlink repair: replace a torrent file with a hardlink to its
 * byte-identical copy in the media library, rolling back on failure.
 */

import type { ContentHasher } from './content-hasher.js';
import type { FileSystem } from './filesystem.js';
import { isUnderDirectory } from './hardlink-grouper.js';
import type { LibraryFile, LibraryIndex } from './library-index.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import type { FileRef, FileStat, TorrentRecord } from './types.js';

const log = rootLogger.child('HardlinkFixer');

export type HardlinkAction =
  | 'fixed'
  | 'dry-run'
  | 'already-linked'
  | 'no-match'
  | 'cross-device'
  | 'size-mismatch'
  | 'hash-mismatch'
  | 'validation-failed'
  | 'stat-failed'
  | 'backup-failed'
  | 'link-failed-restored'
  | 'link-failed-restore-failed';

const ACTIONABLE_FAILURES: ReadonlySet<HardlinkAction> = new Set<HardlinkAction>([
  'backup-failed',
  'link-failed-restored',
  'link-failed-restore-failed',
]);

export function isActionableFailure(action: HardlinkAction): boolean {
  return ACTIONABLE_FAILURES.has(action);
}

export interface HardlinkResult {
  success: boolean;
  action: HardlinkAction;
  message: string;
}

export interface OrphanCandidate {
  torrentId: string;
  torrentName: string;
  file: FileRef;
}

export interface MatchedOrphan extends OrphanCandidate {
  libraryFile: LibraryFile;
}

export interface OrphanMatches {
  matched: MatchedOrphan[];
  unreadable: HardlinkFixResult[];
}

export interface HardlinkFixResult {
  torrentId: string;
  torrentName: string;
  file: string;
  libraryFile: string | null;
  isMedia: boolean;
  result: HardlinkResult;
}

export interface HardlinkBatchResult {
  attempted: number;
  fixed: number;
  failed: number;
  mediaFilesFixed: number;
  bytesSaved: number;
  fixedTorrentIds: Set<string>;
  results: HardlinkFixResult[];
}

export function emptyBatchResult(): HardlinkBatchResult {
  return {
    attempted: 0,
    fixed: 0,
    failed: 0,
    mediaFilesFixed: 0,
    bytesSaved: 0,
    fixedTorrentIds: new Set<string>(),
    results: [],
  };
}

/**
 * Files that could not even be read count as attempted and failed
 */
export function unreadableBatch(unreadable: HardlinkFixResult[]): HardlinkBatchResult {
  const batch = emptyBatchResult();
  batch.attempted = unreadable.length;
  batch.failed = unreadable.length;
  batch.results = [...unreadable];
  return batch;
}

export function mergeBatchResults(into: HardlinkBatchResult, from: HardlinkBatchResult): HardlinkBatchResult {
  into.attempted += from.attempted;
  into.fixed += from.fixed;
  into.failed += from.failed;
  into.mediaFilesFixed += from.mediaFilesFixed;
  into.bytesSaved += from.bytesSaved;
  from.fixedTorrentIds.forEach(id => into.fixedTorrentIds.add(id));
  into.results.push(...from.results);
  return into;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Files under the torrent directory (any extension) that share no inode with the library
 */
export function findOrphanedFiles(
  torrents: TorrentRecord[],
  library: LibraryIndex,
  torrentDir: string
): OrphanCandidate[] {
  const orphans: OrphanCandidate[] = [];
  for (const torrent of torrents) {
    for (const file of torrent.files) {
      if (!isUnderDirectory(file.path, torrentDir)) continue;
      if (library.hasIdentity(file.identity)) continue;
      orphans.push({ torrentId: torrent.id, torrentName: torrent.name, file });
    }
  }
  return orphans;
}

export class HardlinkFixer {
  constructor(
    private readonly fs: FileSystem,
    private readonly hasher: ContentHasher,
    private readonly library: LibraryIndex
  ) {}

  /**
   * Replace `orphanPath` with a hardlink to `libraryPath`.
   * 1. rename orphan to .bak  2. link  3. drop .bak; on link failure restore .bak
   */
  async fixHardlink(orphanPath: string, libraryPath: string, dryRun: boolean = true): Promise<HardlinkResult> {
    let orphan: FileStat;
    let target: FileStat;
    try {
      orphan = await this.fs.stat(orphanPath);
      target = await this.fs.stat(libraryPath);
    } catch (error) {
      if (isMissing(error)) {
        return { success: false, action: 'validation-failed', message: `File does not exist: ${errorMessage(error)}` };
      }
      return { success: false, action: 'stat-failed', message: `Failed to stat files: ${errorMessage(error)}` };
    }

    if (!orphan.isFile || !target.isFile) {
      return { success: false, action: 'validation-failed', message: 'Both paths must be regular files' };
    }

    if (orphan.device === target.device && orphan.inode === target.inode) {
      return { success: true, action: 'already-linked', message: `Already hardlinked to ${libraryPath}` };
    }

    if (orphan.device !== target.device) {
      return {
        success: false,
        action: 'cross-device',
        message: `Cannot hardlink across filesystems: ${orphanPath} -> ${libraryPath}`,
      };
    }

    if (orphan.size !== target.size) {
      return {
        success: false,
        action: 'size-mismatch',
        message: `Size mismatch: orphaned=${orphan.size}, media=${target.size}`,
      };
    }

    try {
      const [orphanHash, targetHash] = [
        await this.hasher.hash(orphanPath, orphan),
        await this.hasher.hash(libraryPath, target),
      ];
      if (orphanHash !== targetHash) {
        return { success: false, action: 'hash-mismatch', message: `Content differs from ${libraryPath}` };
      }
    } catch (error) {
      return { success: false, action: 'stat-failed', message: `Failed to hash files: ${errorMessage(error)}` };
    }

    if (dryRun) {
      log.info(`[DRY RUN] Would fix hardlink: ${orphanPath} -> ${libraryPath}`);
      return { success: true, action: 'dry-run', message: `Would create hardlink from ${libraryPath}` };
    }

    const backupPath = `${orphanPath}.bak`;
    try {
      log.debug(`Backing up: ${orphanPath} -> ${backupPath}`);
      await this.fs.rename(orphanPath, backupPath);
    } catch (error) {
      log.error(`Failed to backup file: ${errorMessage(error)}`);
      return { success: false, action: 'backup-failed', message: `Failed to backup file: ${errorMessage(error)}` };
    }

    try {
      await this.fs.createHardlink(libraryPath, orphanPath);
    } catch (linkError) {
      log.warn(`Failed to create hardlink, restoring backup: ${errorMessage(linkError)}`, { file: orphanPath });
      try {
        await this.fs.rename(backupPath, orphanPath);
        return {
          success: false,
          action: 'link-failed-restored',
          message: `Failed to create hardlink (backup restored): ${errorMessage(linkError)}`,
        };
      } catch (restoreError) {
        log.error(
          `Failed to restore backup! Original: ${orphanPath}, Backup: ${backupPath}`,
          restoreError instanceof Error ? restoreError : undefined
        );
        return {
          success: false,
          action: 'link-failed-restore-failed',
          message: `Failed to create hardlink AND restore backup: ${errorMessage(linkError)}, ${errorMessage(restoreError)}`,
        };
      }
    }

    try {
      await this.fs.remove(backupPath);
    } catch (error) {
      log.warn(`Hardlink created but backup could not be removed: ${errorMessage(error)}`, { backupPath });
    }

    log.info(`Fixed hardlink: ${orphanPath} -> ${libraryPath}`);
    return { success: true, action: 'fixed', message: `Created hardlink to ${libraryPath}` };
  }

  /**
   * Library file that is byte-identical to `file` on the same filesystem
   */
  async findMatch(file: FileRef): Promise<{ match: LibraryFile | null; action: HardlinkAction; message?: string }> {
    const sameSize = this.library.candidatesBySize(file.size, file.path);
    if (sameSize.length === 0) {
      return { match: null, action: 'no-match' };
    }

    const sameDevice = sameSize.filter(candidate => candidate.identity.device === file.identity.device);
    if (sameDevice.length === 0) {
      return { match: null, action: 'cross-device' };
    }

    let fileHash: string;
    try {
      fileHash = await this.hasher.hash(file.path);
    } catch (error) {
      return { match: null, action: 'stat-failed', message: `Failed to hash ${file.path}: ${errorMessage(error)}` };
    }

    for (const candidate of sameDevice) {
      try {
        if ((await this.hasher.hash(candidate.path)) === fileHash) {
          return { match: candidate, action: 'fixed' };
        }
      } catch (error) {
        log.warn(`Could not hash library file ${candidate.path}: ${errorMessage(error)}`);
      }
    }

    return { match: null, action: 'hash-mismatch' };
  }

  /**
   * Pair each orphan with its byte-identical library file. Orphans that could not be
   * read come back as failed results; orphans without a match are dropped.
   */
  async matchOrphans(orphans: OrphanCandidate[]): Promise<OrphanMatches> {
    const matches: OrphanMatches = { matched: [], unreadable: [] };
    if (orphans.length === 0) return matches;

    log.info(`Looking for library matches for ${orphans.length} orphaned files...`);

    for (const orphan of orphans) {
      const { match, action, message } = await this.findMatch(orphan.file);

      if (action === 'stat-failed') {
        log.warn(message ?? `Could not check ${orphan.file.path}`);
        matches.unreadable.push({
          torrentId: orphan.torrentId,
          torrentName: orphan.torrentName,
          file: orphan.file.path,
          libraryFile: null,
          isMedia: orphan.file.isMedia,
          result: { success: false, action, message: message ?? 'Failed to read file' },
        });
        continue;
      }

      if (!match) {
        if (action === 'cross-device') {
          log.info(`Same-size library file is on another filesystem, cannot hardlink: ${orphan.file.path}`);
        } else {
          log.debug(`No match found for: ${orphan.file.path}`);
        }
        continue;
      }

      matches.matched.push({ ...orphan, libraryFile: match });
    }

    log.info(`${matches.matched.length} of ${orphans.length} orphaned files have a library match`);
    return matches;
  }

  /**
   * Link every matched orphan; only these count as attempted
   */
  async fixMatched(matched: MatchedOrphan[], dryRun: boolean = true): Promise<HardlinkBatchResult> {
    const batch = emptyBatchResult();

    for (const orphan of matched) {
      batch.attempted++;

      const result = await this.fixHardlink(orphan.file.path, orphan.libraryFile.path, dryRun);
      batch.results.push({
        torrentId: orphan.torrentId,
        torrentName: orphan.torrentName,
        file: orphan.file.path,
        libraryFile: orphan.libraryFile.path,
        isMedia: orphan.file.isMedia,
        result,
      });

      if (result.action === 'fixed' || result.action === 'dry-run') {
        batch.fixed++;
        batch.bytesSaved += orphan.file.size;
        if (orphan.file.isMedia) {
          batch.mediaFilesFixed++;
          batch.fixedTorrentIds.add(orphan.torrentId);
        }
      } else if (result.action === 'already-linked') {
        if (orphan.file.isMedia) batch.fixedTorrentIds.add(orphan.torrentId);
      } else {
        batch.failed++;
        log.warn(`Failed to fix hardlink: ${result.message}`, { file: orphan.file.path });
      }
    }

    return batch;
  }

  async fixOrphanedFiles(orphans: OrphanCandidate[], dryRun: boolean = true): Promise<HardlinkBatchResult> {
    const { matched, unreadable } = await this.matchOrphans(orphans);
    const batch = await this.fixMatched(matched, dryRun);
    return mergeBatchResults(batch, unreadableBatch(unreadable));
  }
}
