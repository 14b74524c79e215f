import { describe, it, expect } from 'vitest';
import { parseCriteria } from './criteria-parser.js';
import { decideAll, decideTorrent } from './decision-engine.js';
import { aggregateGroups } from './stat-aggregator.js';
import { classifyTrackerTier, DEFAULT_DEAD_TRACKER_MESSAGES } from './tracker-health.js';
import type { GroupStats, TorrentRecord, TrackerRef } from './types.js';
import { AppError } from './logger.js';
import { DAY, syntheticFile, torrent } from '../tests/fixtures.js';

const deadTrackers = { enabled: true, messages: DEFAULT_DEAD_TRACKER_MESSAGES };
const disabled = { enabled: false, messages: DEFAULT_DEAD_TRACKER_MESSAGES };

function tracker(url: string, message: string): TrackerRef {
  return { url, message, tier: classifyTrackerTier(url) };
}

function singleton(record: TorrentRecord, linked: boolean = false): GroupStats {
  return {
    groupId: record.id,
    torrentIds: [record.id],
    maxSeedingSeconds: record.seedingSeconds,
    sumRatio: record.ratio,
    anyLinkedToLibrary: linked,
  };
}

describe('decideTorrent', () => {
  const criteria = parseCriteria('30d 2.0');

  it('should delete a dead torrent even when criteria are not met', () => {
    const record = torrent({
      id: 'dead',
      ratio: 0.1,
      seedingSeconds: DAY,
      trackers: [tracker('https://a.example/announce', 'Unregistered torrent'), tracker('** [DHT] **', '')],
    });

    const decision = decideTorrent(record, singleton(record), criteria, deadTrackers);

    expect(decision.action).toBe('delete');
    expect(decision.reason).toBe('dead-tracker');
    expect(decision.explanations).toEqual(['All trackers report: Unregistered torrent']);
  });

  it('should put the dead-tracker check ahead of hardlink preservation', () => {
    const record = torrent({ id: 'dead', trackers: [tracker('https://a.example/announce', 'torrent not found')] });
    const decision = decideTorrent(record, singleton(record, true), criteria, deadTrackers);
    expect(decision.reason).toBe('dead-tracker');
  });

  it('should ignore dead trackers when the check is disabled', () => {
    const record = torrent({
      id: 'dead',
      seedingSeconds: DAY,
      trackers: [tracker('https://a.example/announce', 'unregistered torrent')],
    });
    expect(decideTorrent(record, singleton(record), criteria, disabled).reason).toBe('criteria-not-met');
  });

  it('should keep a torrent linked into the library regardless of criteria', () => {
    const record = torrent({ id: 'linked', ratio: 5, seedingSeconds: 100 * DAY });
    const decision = decideTorrent(record, singleton(record, true), criteria, deadTrackers);
    expect(decision.action).toBe('keep');
    expect(decision.reason).toBe('hardlink-preserved');
  });

  it('should keep a torrent that has not finished downloading', () => {
    const record = torrent({ id: 'new', ratio: 5, seedingSeconds: 0 });
    const decision = decideTorrent(record, singleton(record), parseCriteria('0d'), deadTrackers);
    expect(decision).toMatchObject({ action: 'keep', reason: 'not-completed', explanations: ['Torrent not completed yet'] });
  });

  it('should delete when criteria match and record the rule', () => {
    const record = torrent({ id: 'old', ratio: 2.5, seedingSeconds: 40 * DAY });
    const decision = decideTorrent(record, singleton(record), criteria, deadTrackers);
    expect(decision).toMatchObject({ action: 'delete', reason: 'criteria-matched', matchedRule: '30d AND 2' });
    expect(decision.explanations).toEqual(['Rule [30d AND 2]: PASS (age 40d >= 30d, ratio 2.50 >= 2)']);
  });

  it('should keep everything with an empty criteria set', () => {
    const record = torrent({ id: 'old', ratio: 50, seedingSeconds: 400 * DAY });
    const decision = decideTorrent(record, singleton(record), parseCriteria(''), deadTrackers);
    expect(decision).toMatchObject({
      action: 'keep',
      reason: 'criteria-not-met',
      explanations: ['No deletion criteria configured'],
    });
  });
});

describe('decideAll', () => {
  it('should judge hardlinked torrents on their combined stats', () => {
    const torrents = [
      torrent({ id: 'a', ratio: 0.3, seedingSeconds: 5 * DAY, files: [syntheticFile('/downloads/a/movie.mkv', '1')] }),
      torrent({ id: 'b', ratio: 0.4, seedingSeconds: 12 * DAY, files: [syntheticFile('/downloads/b/movie.mkv', '1')] }),
    ];
    const groups = [{ id: 'a', torrentIds: ['a', 'b'] }];
    const groupStats = aggregateGroups({ groups, torrents, linkedTorrentIds: new Set() });

    const decisions = decideAll({ torrents, groups, groupStats, criteria: parseCriteria('10d 0.5'), deadTrackers });

    expect(decisions.map(decision => [decision.torrentId, decision.action, decision.groupId])).toEqual([
      ['a', 'delete', 'a'],
      ['b', 'delete', 'a'],
    ]);
    expect(decisions[0].explanations).toEqual([
      'Group of 2 torrents: age 12d, ratio 0.70',
      'Rule [10d AND 0.5]: PASS (age 12d >= 10d, ratio 0.70 >= 0.5)',
    ]);
  });

  it('should keep the whole group when one member is in the library', () => {
    const torrents = [
      torrent({ id: 'a', ratio: 3, seedingSeconds: 50 * DAY }),
      torrent({ id: 'b', ratio: 3, seedingSeconds: 50 * DAY }),
    ];
    const groups = [{ id: 'a', torrentIds: ['a', 'b'] }];
    const groupStats = aggregateGroups({ groups, torrents, linkedTorrentIds: new Set(['b']) });

    const decisions = decideAll({ torrents, groups, groupStats, criteria: parseCriteria('30d 2.0'), deadTrackers });

    expect(decisions.every(decision => decision.reason === 'hardlink-preserved')).toBe(true);
  });

  it('should fail loudly for a torrent without a group', () => {
    const torrents = [torrent({ id: 'orphan' })];
    expect(() =>
      decideAll({ torrents, groups: [], groupStats: new Map(), criteria: parseCriteria('30d'), deadTrackers })
    ).toThrow(AppError);
  });
});
