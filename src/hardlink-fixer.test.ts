import { describe, it, expect, beforeEach } from 'vitest';
import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { ContentHasher } from './content-hasher.js';
import { NodeFileSystem } from './filesystem.js';
import { findOrphanedFiles, HardlinkFixer, isActionableFailure } from './hardlink-fixer.js';
import { buildLibraryIndex } from './library-index.js';
import { fileRef, scratchDir, torrent, writeFile } from '../tests/fixtures.js';

class BrokenLinkFileSystem extends NodeFileSystem {
  renames = 0;

  constructor(private readonly failRestore: boolean) {
    super();
  }

  async createHardlink(): Promise<void> {
    throw new Error('EXDEV: link not permitted');
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    this.renames++;
    if (this.failRestore && this.renames > 1) {
      throw new Error('EACCES: restore denied');
    }
    await super.rename(fromPath, toPath);
  }
}

describe('HardlinkFixer', () => {
  const fs = new NodeFileSystem();
  let torrentDir: string;
  let libraryDir: string;

  beforeEach(() => {
    const root = scratchDir('fixer');
    torrentDir = join(root, 'torrents');
    libraryDir = join(root, 'media');
  });

  async function setup(torrentContent: string, libraryContent: string, fileSystem: NodeFileSystem = fs) {
    const orphanPath = writeFile(join(torrentDir, 'show', 'episode.mkv'), torrentContent);
    const libraryPath = writeFile(join(libraryDir, 'Show', 'episode.mkv'), libraryContent);
    const library = await buildLibraryIndex(fileSystem, libraryDir);
    const fixer = new HardlinkFixer(fileSystem, new ContentHasher(fileSystem, null), library);
    const record = torrent({ id: 't1', files: [await fileRef(fileSystem, orphanPath)] });
    return { orphanPath, libraryPath, library, fixer, record };
  }

  it('should replace an identical orphan with a hardlink', async () => {
    const { orphanPath, libraryPath, library, fixer, record } = await setup('episode bytes', 'episode bytes');
    const orphans = findOrphanedFiles([record], library, torrentDir);

    const batch = await fixer.fixOrphanedFiles(orphans, false);

    expect(batch).toMatchObject({ attempted: 1, fixed: 1, failed: 0, mediaFilesFixed: 1, bytesSaved: 13 });
    expect([...batch.fixedTorrentIds]).toEqual(['t1']);
    expect(statSync(orphanPath).ino).toBe(statSync(libraryPath).ino);
    expect(existsSync(`${orphanPath}.bak`)).toBe(false);
  });

  it('should leave the file untouched in a dry run', async () => {
    const { orphanPath, libraryPath, library, fixer, record } = await setup('episode bytes', 'episode bytes');

    const batch = await fixer.fixOrphanedFiles(findOrphanedFiles([record], library, torrentDir), true);

    expect(batch.fixed).toBe(1);
    expect(batch.results[0].result.action).toBe('dry-run');
    expect(batch.fixedTorrentIds.has('t1')).toBe(true);
    expect(statSync(orphanPath).ino).not.toBe(statSync(libraryPath).ino);
  });

  it('should be a no-op the second time', async () => {
    const { orphanPath, libraryPath, fixer, record } = await setup('episode bytes', 'episode bytes');
    await fixer.fixHardlink(orphanPath, libraryPath, false);

    const again = await fixer.fixHardlink(orphanPath, libraryPath, false);
    expect(again).toEqual({ success: true, action: 'already-linked', message: `Already hardlinked to ${libraryPath}` });

    const rescanned = await buildLibraryIndex(fs, libraryDir);
    const refreshed = torrent({ ...record, files: [await fileRef(fs, orphanPath)] });
    expect(findOrphanedFiles([refreshed], rescanned, torrentDir)).toEqual([]);
  });

  it('should only count orphans that have a library match as attempted', async () => {
    const { libraryPath, library, fixer, record } = await setup('episode bytes', 'episode bytes');
    const extraPath = writeFile(join(torrentDir, 'show', 'sample.mkv'), 'no library copy');
    const withExtra = torrent({ ...record, files: [...record.files, await fileRef(fs, extraPath)] });
    const orphans = findOrphanedFiles([withExtra], library, torrentDir);

    const { matched, unreadable } = await fixer.matchOrphans(orphans);
    expect(orphans).toHaveLength(2);
    expect(matched.map(orphan => orphan.libraryFile.path)).toEqual([libraryPath]);
    expect(unreadable).toEqual([]);

    const batch = await fixer.fixOrphanedFiles(orphans, true);
    expect(batch).toMatchObject({ attempted: 1, fixed: 1, failed: 0 });
  });

  it('should refuse files whose content differs', async () => {
    const { orphanPath, libraryPath, library, fixer, record } = await setup('episode AAAA', 'episode BBBB');

    const batch = await fixer.fixOrphanedFiles(findOrphanedFiles([record], library, torrentDir), false);
    expect(batch).toMatchObject({ attempted: 0, fixed: 0, failed: 0, results: [] });

    const direct = await fixer.fixHardlink(orphanPath, libraryPath, false);
    expect(direct.action).toBe('hash-mismatch');
    expect(readFileSync(orphanPath, 'utf-8')).toBe('episode AAAA');
  });

  it('should refuse files whose size differs', async () => {
    const { orphanPath, libraryPath, fixer } = await setup('short', 'much longer');
    const result = await fixer.fixHardlink(orphanPath, libraryPath, false);
    expect(result).toEqual({ success: false, action: 'size-mismatch', message: 'Size mismatch: orphaned=5, media=11' });
  });

  it('should report a missing file as a validation failure', async () => {
    const { libraryPath, fixer } = await setup('episode bytes', 'episode bytes');
    const result = await fixer.fixHardlink(join(torrentDir, 'missing.mkv'), libraryPath, false);
    expect(result.action).toBe('validation-failed');
    expect(isActionableFailure(result.action)).toBe(false);
  });

  it('should restore the original when linking fails', async () => {
    const broken = new BrokenLinkFileSystem(false);
    const { orphanPath, libraryPath, fixer } = await setup('episode bytes', 'episode bytes', broken);

    const result = await fixer.fixHardlink(orphanPath, libraryPath, false);

    expect(result.action).toBe('link-failed-restored');
    expect(isActionableFailure(result.action)).toBe(true);
    expect(readFileSync(orphanPath, 'utf-8')).toBe('episode bytes');
    expect(existsSync(`${orphanPath}.bak`)).toBe(false);
  });

  it('should keep the backup when the restore also fails', async () => {
    const broken = new BrokenLinkFileSystem(true);
    const { orphanPath, libraryPath, fixer } = await setup('episode bytes', 'episode bytes', broken);

    const result = await fixer.fixHardlink(orphanPath, libraryPath, false);

    expect(result.action).toBe('link-failed-restore-failed');
    expect(existsSync(orphanPath)).toBe(false);
    expect(readFileSync(`${orphanPath}.bak`, 'utf-8')).toBe('episode bytes');
  });
});
