import { describe, it, expect } from 'vitest';
import { classifyTrackerTier, DEFAULT_DEAD_TRACKER_MESSAGES, isDeadTorrent, realTrackers } from './tracker-health.js';
import type { TrackerRef } from './types.js';

function tracker(url: string, message: string): TrackerRef {
  return { url, message, tier: classifyTrackerTier(url) };
}

const enabled = { enabled: true, messages: DEFAULT_DEAD_TRACKER_MESSAGES };

describe('classifyTrackerTier', () => {
  it('should recognise the pseudo trackers', () => {
    expect(classifyTrackerTier('** [DHT] **')).toBe('dht');
    expect(classifyTrackerTier('** [PeX] **')).toBe('pex');
    expect(classifyTrackerTier('** [LSD] **')).toBe('lsd');
    expect(classifyTrackerTier('https://tracker.example/announce')).toBe('real');
  });
});

describe('isDeadTorrent', () => {
  it('should be dead when every real tracker reports a dead message in any case', () => {
    const trackers = [
      tracker('** [DHT] **', ''),
      tracker('https://a.example/announce', 'Unregistered Torrent'),
      tracker('https://b.example/announce', ' TORRENT NOT FOUND '),
    ];
    expect(isDeadTorrent(trackers, enabled)).toBe(true);
  });

  it('should not be dead when one real tracker is healthy', () => {
    const trackers = [
      tracker('https://a.example/announce', 'unregistered torrent'),
      tracker('https://b.example/announce', ''),
    ];
    expect(isDeadTorrent(trackers, enabled)).toBe(false);
  });

  it('should require an exact message match', () => {
    const trackers = [tracker('https://a.example/announce', 'Error: unregistered torrent (code 4)')];
    expect(isDeadTorrent(trackers, enabled)).toBe(false);
  });

  it('should never call a torrent with only DHT dead', () => {
    const trackers = [tracker('** [DHT] **', 'unregistered torrent')];
    expect(realTrackers(trackers)).toEqual([]);
    expect(isDeadTorrent(trackers, enabled)).toBe(false);
  });

  it('should do nothing when disabled or without messages', () => {
    const trackers = [tracker('https://a.example/announce', 'unregistered torrent')];
    expect(isDeadTorrent(trackers, { enabled: false, messages: DEFAULT_DEAD_TRACKER_MESSAGES })).toBe(false);
    expect(isDeadTorrent(trackers, { enabled: true, messages: [] })).toBe(false);
  });

  it('should honour custom messages', () => {
    const trackers = [tracker('https://a.example/announce', 'Torrent Deleted')];
    expect(isDeadTorrent(trackers, { enabled: true, messages: ['torrent deleted'] })).toBe(true);
  });
});
