/**
 * Per-group seeding stats: torrents sharing content count as one logical copy
 */

import type { GroupStats, LinkGroup, TorrentRecord } from './types.js';

export interface AggregationInput {
  groups: LinkGroup[];
  torrents: TorrentRecord[];
  /** Torrents with a media file already hardlinked (or identical) in the library */
  linkedTorrentIds: ReadonlySet<string>;
  /** Torrents the hardlink fixer linked into the library during this run */
  fixedTorrentIds?: ReadonlySet<string>;
}

export function aggregateGroups(input: AggregationInput): Map<string, GroupStats> {
  const byId = new Map(input.torrents.map(torrent => [torrent.id, torrent]));
  const fixed = input.fixedTorrentIds ?? new Set<string>();
  const stats = new Map<string, GroupStats>();

  for (const group of input.groups) {
    let maxSeedingSeconds = 0;
    let sumRatio = 0;
    let anyLinkedToLibrary = false;

    for (const torrentId of group.torrentIds) {
      const torrent = byId.get(torrentId);
      if (!torrent) continue;
      maxSeedingSeconds = Math.max(maxSeedingSeconds, torrent.seedingSeconds);
      sumRatio += torrent.ratio;
      if (input.linkedTorrentIds.has(torrentId) || fixed.has(torrentId)) {
        anyLinkedToLibrary = true;
      }
    }

    stats.set(group.id, {
      groupId: group.id,
      torrentIds: [...group.torrentIds],
      maxSeedingSeconds,
      sumRatio,
      anyLinkedToLibrary,
    });
  }

  return stats;
}
