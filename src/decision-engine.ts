/**
 * Keep/delete decision per torrent, evaluated under its link group
 */

import { evaluateCriteria, formatDuration } from './criteria-parser.js';
import { AppError } from './logger.js';
import { isDeadTorrent, realTrackers, type DeadTrackerOptions } from './tracker-health.js';
import type { CriteriaSet, Decision, GroupStats, LinkGroup, TorrentRecord } from './types.js';

export interface DecisionInput {
  torrents: TorrentRecord[];
  groups: LinkGroup[];
  groupStats: Map<string, GroupStats>;
  criteria: CriteriaSet;
  deadTrackers: DeadTrackerOptions;
}

export function groupIndex(groups: LinkGroup[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const group of groups) {
    for (const torrentId of group.torrentIds) {
      index.set(torrentId, group.id);
    }
  }
  return index;
}

/**
 * Order of precedence:
 * 1. every real tracker reports a dead message -> delete (before anything else)
 * 2. any torrent in the group is linked into the library -> keep
 * 3. group never finished seeding (0s) -> keep
 * 4. criteria on the group's max seeding time and summed ratio
 */
export function decideTorrent(
  torrent: TorrentRecord,
  stats: GroupStats,
  criteria: CriteriaSet,
  deadTrackers: DeadTrackerOptions
): Decision {
  const base = { torrentId: torrent.id, torrentName: torrent.name, groupId: stats.groupId };

  if (isDeadTorrent(torrent.trackers, deadTrackers)) {
    const messages = [...new Set(realTrackers(torrent.trackers).map(tracker => tracker.message))];
    return {
      ...base,
      action: 'delete',
      reason: 'dead-tracker',
      explanations: [`All trackers report: ${messages.join(', ')}`],
    };
  }

  if (stats.anyLinkedToLibrary) {
    return {
      ...base,
      action: 'keep',
      reason: 'hardlink-preserved',
      explanations: ['Media file(s) hardlinked into the media library'],
    };
  }

  if (stats.maxSeedingSeconds <= 0) {
    return {
      ...base,
      action: 'keep',
      reason: 'not-completed',
      explanations: ['Torrent not completed yet'],
    };
  }

  const evaluation = evaluateCriteria(criteria, {
    seedingSeconds: stats.maxSeedingSeconds,
    ratio: stats.sumRatio,
  });

  const explanations = stats.torrentIds.length > 1
    ? [
        `Group of ${stats.torrentIds.length} torrents: age ${formatDuration(stats.maxSeedingSeconds)}, ratio ${stats.sumRatio.toFixed(2)}`,
        ...evaluation.explanations,
      ]
    : evaluation.explanations;

  if (evaluation.matched) {
    return { ...base, action: 'delete', reason: 'criteria-matched', explanations, matchedRule: evaluation.matchedRule };
  }

  return {
    ...base,
    action: 'keep',
    reason: 'criteria-not-met',
    explanations: explanations.length > 0 ? explanations : ['No deletion criteria configured'],
  };
}

export function decideAll(input: DecisionInput): Decision[] {
  const groupOf = groupIndex(input.groups);

  return input.torrents.map(torrent => {
    const groupId = groupOf.get(torrent.id);
    const stats = groupId === undefined ? undefined : input.groupStats.get(groupId);
    if (!stats) {
      throw new AppError(`Torrent ${torrent.name} has no link group`, 'MISSING_GROUP', 500, { torrentId: torrent.id });
    }
    return decideTorrent(torrent, stats, input.criteria, input.deadTrackers);
  });
}
