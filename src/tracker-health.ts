/**
 * Tracker health: a torrent is dead when every real tracker reports a configured "gone" message
 */

import type { TrackerRef, TrackerTier } from './types.js';

export const DEFAULT_DEAD_TRACKER_MESSAGES = [
  'unregistered torrent',
  'torrent not registered with this tracker',
  'torrent not found',
  'infohash not found',
];

const PSEUDO_TRACKERS: Record<string, TrackerTier> = {
  '** [dht] **': 'dht',
  '** [pex] **': 'pex',
  '** [lsd] **': 'lsd',
};

export function classifyTrackerTier(url: string): TrackerTier {
  return PSEUDO_TRACKERS[url.trim().toLowerCase()] ?? 'real';
}

export interface DeadTrackerOptions {
  enabled: boolean;
  messages: string[];
}

function normalizeMessage(message: string): string {
  return message.trim().toLowerCase();
}

export function realTrackers(trackers: TrackerRef[]): TrackerRef[] {
  return trackers.filter(tracker => tracker.tier === 'real');
}

/**
 * Dead iff enabled, at least one real tracker, and every real tracker's message equals
 * (case-insensitively) one of the configured messages. Substrings do not count.
 */
export function isDeadTorrent(trackers: TrackerRef[], options: DeadTrackerOptions): boolean {
  if (!options.enabled) return false;

  const real = realTrackers(trackers);
  if (real.length === 0) return false;

  const dead = new Set(options.messages.map(normalizeMessage).filter(Boolean));
  if (dead.size === 0) return false;

  return real.every(tracker => dead.has(normalizeMessage(tracker.message)));
}
