/**
 * Groups torrents that share on-disk media content and detects which torrents
 * are already preserved in the media library.
 */

import { isAbsolute, relative, resolve } from 'path';
import type { ContentHasher } from './content-hasher.js';
import type { LibraryIndex } from './library-index.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import { DisjointSet } from './union-find.js';
import { identityKey, type FileRef, type LinkGroup, type TorrentRecord } from './types.js';

const log = rootLogger.child('HardlinkGrouper');

export interface GroupingOptions {
  torrentDir: string;
}

export function isUnderDirectory(path: string, dir: string): boolean {
  const rel = relative(resolve(dir), resolve(path));
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

export function mediaFilesInScope(torrent: TorrentRecord, torrentDir: string): FileRef[] {
  return torrent.files.filter(file => file.isMedia && isUnderDirectory(file.path, torrentDir));
}

/**
 * Union torrents whose media files share a (device, inode). Content hashes are
 * never used here: identical bytes in separate inodes are separate copies.
 * Each torrent lands in exactly one group; the group id is its first member's id.
 */
export function groupTorrents(torrents: TorrentRecord[], options: GroupingOptions): LinkGroup[] {
  const sets = new DisjointSet(torrents.length);
  const ownerByIdentity = new Map<string, number>();

  torrents.forEach((torrent, index) => {
    for (const file of mediaFilesInScope(torrent, options.torrentDir)) {
      const key = identityKey(file.identity);
      const owner = ownerByIdentity.get(key);
      if (owner === undefined) {
        ownerByIdentity.set(key, index);
      } else {
        sets.union(owner, index);
      }
    }
  });

  return sets.components().map(members => ({
    id: torrents[members[0]].id,
    torrentIds: members.map(member => torrents[member].id),
  }));
}

/**
 * Torrents with at least one media file linked into the library. Same-device
 * files must share an inode with a library file; across devices, where no
 * hardlink is possible, a same-size library file with an equal content hash counts.
 */
export async function detectLibraryLinks(
  torrents: TorrentRecord[],
  library: LibraryIndex,
  hasher: ContentHasher,
  options: GroupingOptions
): Promise<Set<string>> {
  const linked = new Set<string>();

  for (const torrent of torrents) {
    for (const file of mediaFilesInScope(torrent, options.torrentDir)) {
      if (library.hasIdentity(file.identity)) {
        log.debug('Media file hardlinked into library', { torrent: torrent.name, file: file.path });
        linked.add(torrent.id);
        break;
      }

      if (library.device === null || library.isSameDevice(file.identity.device)) {
        continue;
      }

      if (await hasIdenticalCopy(file, library, hasher)) {
        log.debug('Media file has identical copy on library device', { torrent: torrent.name, file: file.path });
        linked.add(torrent.id);
        break;
      }
    }
  }

  return linked;
}

async function hasIdenticalCopy(file: FileRef, library: LibraryIndex, hasher: ContentHasher): Promise<boolean> {
  const candidates = library.candidatesBySize(file.size, file.path);
  if (candidates.length === 0) return false;

  let fileHash: string;
  try {
    fileHash = await hasher.hash(file.path);
  } catch (error) {
    log.warn(`Could not hash ${file.path}: ${errorMessage(error)}`);
    return false;
  }

  for (const candidate of candidates) {
    try {
      if ((await hasher.hash(candidate.path)) === fileHash) {
        return true;
      }
    } catch (error) {
      log.warn(`Could not hash library file ${candidate.path}: ${errorMessage(error)}`);
    }
  }

  return false;
}
