/**
 * One retention pass: snapshot, hardlink repair, grouping, decisions, execution
 */

import { extname, join } from 'path';
import type { ContentHasher } from './content-hasher.js';
import { decideAll } from './decision-engine.js';
import type { FileSystem } from './filesystem.js';
import {
  emptyBatchResult,
  findOrphanedFiles,
  HardlinkFixer,
  mergeBatchResults,
  unreadableBatch,
  type HardlinkBatchResult,
  type MatchedOrphan,
  type OrphanCandidate,
} from './hardlink-fixer.js';
import { detectLibraryLinks, groupTorrents } from './hardlink-grouper.js';
import { buildLibraryIndex } from './library-index.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import type { Notifier } from './notifier.js';
import type { TorrentClient, TorrentSummary } from './qbittorrent-client.js';
import { SpaceAccountant } from './space-accountant.js';
import { aggregateGroups } from './stat-aggregator.js';
import type { DeadTrackerOptions } from './tracker-health.js';
import {
  emptyReasonCounts,
  type CriteriaSet,
  type Decision,
  type FileRef,
  type RunError,
  type RunSummary,
  type TorrentRecord,
} from './types.js';

const log = rootLogger.child('RetentionRun');

export interface RetentionRunOptions {
  torrentDir: string;
  mediaLibraryDir: string;
  criteria: CriteriaSet;
  deadTrackers: DeadTrackerOptions;
  mediaExtensions: string[];
  dryRun: boolean;
  fixHardlinks: boolean;
  deleteFiles: boolean;
}

export interface RetentionRunDeps {
  client: TorrentClient;
  fs: FileSystem;
  hasher: ContentHasher;
  notifier?: Notifier;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Torrents the user (or the client) already stopped must be left as they are */
export function isPausedState(state: string): boolean {
  return /^(paused|stopped)/i.test(state);
}

export class RetentionRunner {
  private readonly mediaExtensions: ReadonlySet<string>;

  constructor(
    private readonly deps: RetentionRunDeps,
    private readonly options: RetentionRunOptions
  ) {
    this.mediaExtensions = new Set(options.mediaExtensions.map(ext => ext.toLowerCase()));
  }

  isMediaPath(path: string): boolean {
    return this.mediaExtensions.has(extname(path).toLowerCase());
  }

  /**
   * Fetch torrents with their files and trackers and stat every file present on disk.
   * A torrent whose details cannot be fetched is recorded and left out of the run.
   */
  async buildSnapshot(errors: RunError[]): Promise<TorrentRecord[]> {
    log.info('Retrieving torrents from torrent client...');
    const summaries = await this.deps.client.listTorrents();
    const torrents: TorrentRecord[] = [];

    for (const summary of summaries) {
      try {
        torrents.push(await this.snapshotTorrent(summary, errors));
      } catch (error) {
        log.warn(`Could not get details for torrent ${summary.name}: ${errorMessage(error)}`);
        errors.push({ scope: 'torrent', subject: summary.name, message: errorMessage(error) });
      }
    }

    log.info(`Snapshot: ${torrents.length} of ${summaries.length} torrents`);
    return torrents;
  }

  private async snapshotTorrent(summary: TorrentSummary, errors: RunError[]): Promise<TorrentRecord> {
    const [entries, trackers] = await Promise.all([
      this.deps.client.listFiles(summary.id),
      this.deps.client.listTrackers(summary.id),
    ]);

    const files: FileRef[] = [];
    for (const entry of entries) {
      const path = join(summary.savePath, entry.name);
      try {
        const info = await this.deps.fs.stat(path);
        if (!info.isFile) continue;
        files.push({
          path,
          size: info.size,
          mtimeMs: info.mtimeMs,
          identity: { device: info.device, inode: info.inode },
          isMedia: this.isMediaPath(path),
        });
      } catch (error) {
        if (isMissing(error)) {
          log.debug(`File not on disk, skipping: ${path}`);
          continue;
        }
        errors.push({ scope: 'file', subject: path, message: errorMessage(error) });
      }
    }

    return {
      id: summary.id,
      name: summary.name,
      savePath: summary.savePath,
      files,
      ratio: summary.ratio,
      seedingSeconds: summary.seedingSeconds,
      state: summary.state,
      trackers,
    };
  }

  /**
   * Relink matched orphans torrent by torrent. Only torrents with a library match are
   * touched, and only running ones are paused around a real fix.
   */
  private async fixHardlinks(
    orphans: OrphanCandidate[],
    torrents: TorrentRecord[],
    fixer: HardlinkFixer,
    errors: RunError[]
  ): Promise<HardlinkBatchResult> {
    const { matched, unreadable } = await fixer.matchOrphans(orphans);
    const total = unreadableBatch(unreadable);
    for (const item of unreadable) {
      errors.push({ scope: 'file', subject: item.file, message: item.result.message });
    }

    const byTorrent = new Map<string, MatchedOrphan[]>();
    for (const orphan of matched) {
      const list = byTorrent.get(orphan.torrentId) ?? [];
      list.push(orphan);
      byTorrent.set(orphan.torrentId, list);
    }

    const { client } = this.deps;
    const { dryRun } = this.options;
    const states = new Map(torrents.map(torrent => [torrent.id, torrent.state]));

    for (const [torrentId, candidates] of byTorrent) {
      const name = candidates[0].torrentName;
      const alreadyPaused = isPausedState(states.get(torrentId) ?? '');
      let paused = false;
      if (!dryRun && client.pauseTorrent && !alreadyPaused) {
        try {
          log.info(`Pausing torrent '${name}' during hardlink fix`);
          await client.pauseTorrent(torrentId);
          paused = true;
        } catch (error) {
          log.warn(`Failed to pause torrent '${name}': ${errorMessage(error)}`);
        }
      }

      try {
        const batch = await fixer.fixMatched(candidates, dryRun);
        mergeBatchResults(total, batch);
        for (const item of batch.results) {
          if (!item.result.success) {
            errors.push({ scope: 'file', subject: item.file, message: item.result.message });
          }
        }
      } finally {
        if (paused && client.resumeTorrent) {
          try {
            log.info(`Resuming torrent '${name}' after hardlink fix`);
            await client.resumeTorrent(torrentId);
          } catch (error) {
            log.warn(`Failed to resume torrent '${name}': ${errorMessage(error)}`);
            errors.push({ scope: 'torrent', subject: name, message: `Resume failed: ${errorMessage(error)}` });
          }
        }
      }
    }

    return total;
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    const { fs, hasher, notifier } = this.deps;
    const { dryRun, torrentDir } = this.options;
    const errors: RunError[] = [];

    if (dryRun) {
      log.warn('Running in DRY RUN mode - no changes will be made');
    }

    const torrents = await this.buildSnapshot(errors);
    const library = await buildLibraryIndex(fs, this.options.mediaLibraryDir);

    const orphans = findOrphanedFiles(torrents, library, torrentDir);
    log.info(`Found ${orphans.length} files not linked into the media library`);

    const fixes = this.options.fixHardlinks
      ? await this.fixHardlinks(orphans, torrents, new HardlinkFixer(fs, hasher, library), errors)
      : emptyBatchResult();

    const groups = groupTorrents(torrents, { torrentDir });
    const linked = await detectLibraryLinks(torrents, library, hasher, { torrentDir });
    for (const group of groups) {
      if (group.torrentIds.length > 1) {
        log.info(`Group of ${group.torrentIds.length} torrents sharing content`, { group: group.id });
      }
    }

    const groupStats = aggregateGroups({
      groups,
      torrents,
      linkedTorrentIds: linked,
      fixedTorrentIds: fixes.fixedTorrentIds,
    });

    const decisions = decideAll({
      torrents,
      groups,
      groupStats,
      criteria: this.options.criteria,
      deadTrackers: this.options.deadTrackers,
    });

    const summary: RunSummary = {
      dryRun,
      startedAt,
      finishedAt: startedAt,
      torrentsProcessed: torrents.length,
      torrentsKept: 0,
      torrentsDeleted: 0,
      reasonCounts: emptyReasonCounts(),
      deletedTorrents: [],
      deletionReasons: {},
      hardlinksAttempted: fixes.attempted,
      hardlinksFixed: fixes.fixed,
      hardlinksFailed: fixes.failed,
      orphanedFilesFound: orphans.length,
      spaceFreedDeadTrackerBytes: 0,
      spaceFreedCriteriaBytes: 0,
      spaceSavedHardlinksBytes: fixes.bytesSaved,
      decisions,
      errors,
    };

    await this.execute(decisions, torrents, summary);

    summary.finishedAt = new Date();
    log.info(
      `Run complete: ${summary.torrentsProcessed} processed, ${summary.torrentsDeleted} deleted, ${summary.torrentsKept} kept`,
      { errors: errors.length, dryRun }
    );

    if (notifier) {
      const sent = await notifier.sendSummary(summary);
      if (!sent) {
        errors.push({ scope: 'notification', subject: 'summary', message: 'Failed to send run summary' });
      }
    }

    return summary;
  }

  private async execute(decisions: Decision[], torrents: TorrentRecord[], summary: RunSummary): Promise<void> {
    const byId = new Map(torrents.map(torrent => [torrent.id, torrent]));
    const accountant = new SpaceAccountant(this.deps.fs);
    const { dryRun, deleteFiles } = this.options;

    for (const decision of decisions) {
      summary.reasonCounts[decision.reason]++;
      log.info(`${decision.action === 'delete' ? 'Delete' : 'Keep'}: ${decision.torrentName} (${decision.reason})`, {
        explanations: decision.explanations,
      });

      if (decision.action === 'keep') {
        summary.torrentsKept++;
        continue;
      }

      const torrent = byId.get(decision.torrentId);
      if (!torrent) continue;

      // Measured before deletion: link counts drop once the client removes files
      const freed = deleteFiles ? await accountant.estimateFreed(torrent.files.map(file => file.path)) : 0;

      if (dryRun) {
        log.info(`[DRY RUN] Would delete torrent: ${torrent.name} (deleteFiles=${deleteFiles})`);
      } else {
        try {
          await this.deps.client.deleteTorrent(torrent.id, deleteFiles);
        } catch (error) {
          log.error(`Failed to delete torrent ${torrent.name}: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
          summary.errors.push({ scope: 'torrent', subject: torrent.name, message: `Delete failed: ${errorMessage(error)}` });
          continue;
        }
      }

      summary.torrentsDeleted++;
      summary.deletedTorrents.push(torrent.name);

      const reasonKey = decision.reason === 'dead-tracker' ? 'Dead tracker' : `Criteria [${decision.matchedRule ?? ''}]`;
      summary.deletionReasons[reasonKey] = (summary.deletionReasons[reasonKey] ?? 0) + 1;

      if (decision.reason === 'dead-tracker') {
        summary.spaceFreedDeadTrackerBytes += freed;
      } else {
        summary.spaceFreedCriteriaBytes += freed;
      }
    }
  }
}
