/**
 * Public API of the retention engine
 */

export * from './types.js';
export {
  InvalidCriteriaError,
  parseDuration,
  parseCriteria,
  legacyCriteria,
  formatDuration,
  formatRule,
  formatCriteria,
  evaluateCriteria,
  matchesCriteria,
  type CriteriaStats,
  type CriteriaEvaluation,
} from './criteria-parser.js';
export {
  DEFAULT_DEAD_TRACKER_MESSAGES,
  classifyTrackerTier,
  isDeadTorrent,
  realTrackers,
  type DeadTrackerOptions,
} from './tracker-health.js';
export { DisjointSet } from './union-find.js';
export { groupTorrents, detectLibraryLinks, mediaFilesInScope, isUnderDirectory, type GroupingOptions } from './hardlink-grouper.js';
export { aggregateGroups, type AggregationInput } from './stat-aggregator.js';
export { decideAll, decideTorrent, groupIndex, type DecisionInput } from './decision-engine.js';
export {
  HardlinkFixer,
  findOrphanedFiles,
  isActionableFailure,
  type HardlinkAction,
  type HardlinkResult,
  type HardlinkBatchResult,
  type HardlinkFixResult,
  type OrphanCandidate,
} from './hardlink-fixer.js';
export { LibraryIndex, buildLibraryIndex, type LibraryFile } from './library-index.js';
export { NodeFileSystem, type FileSystem } from './filesystem.js';
export { FileHashCache, type HashCache, type FileCacheStats } from './file-cache.js';
export { ContentHasher } from './content-hasher.js';
export { SpaceAccountant } from './space-accountant.js';
export {
  QBittorrentClient,
  TorrentClientError,
  type TorrentClient,
  type TorrentSummary,
  type TorrentFileEntry,
  type QBittorrentOptions,
} from './qbittorrent-client.js';
export { DiscordNotifier, buildSummaryEmbed, type Notifier, type Embed, type EmbedField } from './notifier.js';
export {
  ConfigManager,
  ConfigValidationError,
  DEFAULT_CONFIG,
  type RetentionConfig,
} from './config.js';
export { RunLock, isProcessAlive } from './run-lock.js';
export { RetentionRunner, type RetentionRunOptions, type RetentionRunDeps } from './retention-run.js';
export { Logger, logger, AppError, handleError, type LogLevel, type LogEntry } from './logger.js';
