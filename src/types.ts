/**
 * Core data model for the retention engine
 */

/**
 * Physical identity of a file: the same (device, inode) pair means the same bytes on disk.
 * Kept as decimal strings because inode numbers can exceed Number.MAX_SAFE_INTEGER.
 */
export interface FileIdentity {
  device: string;
  inode: string;
}

export interface FileStat extends FileIdentity {
  size: number;
  mtimeMs: number;
  nlink: number;
  isFile: boolean;
}

export interface FileRef {
  path: string;
  size: number;
  mtimeMs: number;
  identity: FileIdentity;
  isMedia: boolean;
}

export type TrackerTier = 'real' | 'dht' | 'pex' | 'lsd';

export interface TrackerRef {
  url: string;
  message: string;
  tier: TrackerTier;
}

export interface TorrentRecord {
  id: string;
  name: string;
  savePath: string;
  files: FileRef[];
  ratio: number;
  seedingSeconds: number;
  /** Client-reported state, e.g. `uploading`, `stoppedUP` */
  state: string;
  trackers: TrackerRef[];
}

export type Condition =
  | { kind: 'min-seeding-duration'; seconds: number; label: string }
  | { kind: 'min-ratio'; ratio: number; label: string };

export interface Rule {
  conditions: Condition[];
}

export interface CriteriaSet {
  rules: Rule[];
}

export interface LinkGroup {
  id: string;
  torrentIds: string[];
}

export interface GroupStats {
  groupId: string;
  torrentIds: string[];
  maxSeedingSeconds: number;
  sumRatio: number;
  anyLinkedToLibrary: boolean;
}

export type DecisionAction = 'keep' | 'delete';

export type ReasonCode =
  | 'dead-tracker'
  | 'hardlink-preserved'
  | 'not-completed'
  | 'criteria-matched'
  | 'criteria-not-met';

export interface Decision {
  torrentId: string;
  torrentName: string;
  action: DecisionAction;
  reason: ReasonCode;
  groupId: string;
  explanations: string[];
  /** Criteria rule that triggered a criteria-matched deletion */
  matchedRule?: string;
}

export type RunErrorScope = 'torrent' | 'file' | 'notification';

export interface RunError {
  scope: RunErrorScope;
  subject: string;
  message: string;
}

export interface RunSummary {
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  torrentsProcessed: number;
  torrentsKept: number;
  torrentsDeleted: number;
  reasonCounts: Record<ReasonCode, number>;
  deletedTorrents: string[];
  deletionReasons: Record<string, number>;
  hardlinksAttempted: number;
  hardlinksFixed: number;
  hardlinksFailed: number;
  orphanedFilesFound: number;
  spaceFreedDeadTrackerBytes: number;
  spaceFreedCriteriaBytes: number;
  spaceSavedHardlinksBytes: number;
  decisions: Decision[];
  errors: RunError[];
}

export function identityKey(identity: FileIdentity): string {
  return `${identity.device}:${identity.inode}`;
}

export function emptyReasonCounts(): Record<ReasonCode, number> {
  return {
    'dead-tracker': 0,
    'hardlink-preserved': 0,
    'not-completed': 0,
    'criteria-matched': 0,
    'criteria-not-met': 0,
  };
}
