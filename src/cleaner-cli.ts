#!/usr/bin/env node
/**
 * torrent-retention: one retention pass against qBittorrent
 */

import { config as loadEnv } from 'dotenv';
import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, type RetentionConfig } from './config.js';
import { ContentHasher } from './content-hasher.js';
import { formatCriteria, parseCriteria } from './criteria-parser.js';
import { FileHashCache } from './file-cache.js';
import { NodeFileSystem } from './filesystem.js';
import { errorMessage, handleError, logger } from './logger.js';
import { DiscordNotifier, type Notifier } from './notifier.js';
import { QBittorrentClient, type TorrentClient } from './qbittorrent-client.js';
import { RetentionRunner } from './retention-run.js';
import { RunLock } from './run-lock.js';
import type { RunSummary } from './types.js';

export interface CliOptions {
  configPath?: string;
  dryRun?: boolean;
  criteria?: string;
  help: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createClient?: (config: RetentionConfig) => TorrentClient;
  createNotifier?: (config: RetentionConfig) => Notifier;
}

export function printUsage(): void {
  console.log(`
Usage:
  torrent-retention [options]

Options:
  --config PATH     YAML or JSON config file (default: $CONFIG_PATH or ./config.yaml)
  --dry-run         Report decisions without deleting or relinking anything
  --no-dry-run      Apply deletions and hardlink fixes
  --criteria STR    Deletion criteria, e.g. "30d 2.0 | 90d"
  -h, --help        Show this help
`);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false };
  const args = [...argv];

  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '--config':
        options.configPath = args.shift();
        if (!options.configPath) throw new Error('--config requires a path');
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--no-dry-run':
        options.dryRun = false;
        break;
      case '--criteria':
        options.criteria = args.shift();
        if (options.criteria === undefined) throw new Error('--criteria requires a value');
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function formatGB(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
}

export function logSummary(summary: RunSummary): void {
  const rule = '='.repeat(80);
  logger.info(rule);
  logger.info(`${summary.dryRun ? '[DRY RUN] ' : ''}Torrent Retention Summary`);
  logger.info(rule);
  logger.info(`Torrents processed: ${summary.torrentsProcessed}`);
  logger.info(`Torrents deleted: ${summary.torrentsDeleted}`);
  logger.info(`Torrents kept: ${summary.torrentsKept}`);
  logger.info(`  - Kept (hardlink preserved): ${summary.reasonCounts['hardlink-preserved']}`);
  logger.info(`  - Kept (criteria not met): ${summary.reasonCounts['criteria-not-met']}`);
  logger.info(`  - Kept (not completed): ${summary.reasonCounts['not-completed']}`);
  logger.info(`Hardlinks attempted: ${summary.hardlinksAttempted}`);
  logger.info(`Hardlinks fixed: ${summary.hardlinksFixed}`);
  logger.info(`Hardlinks failed: ${summary.hardlinksFailed}`);
  logger.info(`Orphaned files found: ${summary.orphanedFilesFound}`);
  logger.info(
    `Space freed: ${formatGB(summary.spaceFreedDeadTrackerBytes + summary.spaceFreedCriteriaBytes)}, ` +
      `saved by hardlinks: ${formatGB(summary.spaceSavedHardlinksBytes)}`
  );
  if (summary.deletedTorrents.length > 0) {
    logger.info('Deleted torrents:');
    for (const name of summary.deletedTorrents) logger.info(`  - ${name}`);
  }
  if (summary.errors.length > 0) {
    logger.warn(`${summary.errors.length} error(s) during run`, { errors: summary.errors.slice(0, 20) });
  }
  logger.info(rule);
}

/**
 * Returns the process exit code: 0 on success or when another run holds the lock, 1 on fatal failure
 */
export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    printUsage();
    return 1;
  }

  if (options.help) {
    printUsage();
    return 0;
  }

  const env = deps.env ?? process.env;
  let notifier: Notifier | null = null;
  let cache: FileHashCache | null = null;
  let client: TorrentClient | null = null;
  let lock: RunLock | null = null;

  try {
    const manager = new ConfigManager(options.configPath ?? env.CONFIG_PATH, env);
    manager.override({ dryRun: options.dryRun, criteria: options.criteria });
    const config = manager.getAll();

    logger.setMinLevel(config.logging.level);
    logger.configureFile(config.logging.file, config.logging.maxFiles);
    notifier = deps.createNotifier?.(config) ?? new DiscordNotifier(config.notifications.discordWebhookUrl);

    logger.info('='.repeat(80));
    logger.info('Torrent Retention Starting');
    logger.info('='.repeat(80));
    logger.debug('Effective configuration', { config: manager.toJSON() });

    manager.assertValid();
    const criteria = parseCriteria(config.retention.criteria);
    logger.info(`Deletion criteria: ${formatCriteria(criteria) || '(none)'}`);

    lock = new RunLock(config.lockFile);
    if (!lock.acquire()) {
      logger.warn('Another retention run is in progress, exiting');
      return 0;
    }

    const fs = new NodeFileSystem();
    cache = config.cache.enabled ? new FileHashCache(config.cache.dbPath) : null;
    const hasher = new ContentHasher(fs, cache, config.hashConcurrency);
    client = deps.createClient?.(config) ?? new QBittorrentClient(config.qbittorrent);

    const runner = new RetentionRunner(
      { client, fs, hasher, notifier },
      {
        torrentDir: config.paths.torrentDir,
        mediaLibraryDir: config.paths.mediaLibraryDir,
        criteria,
        deadTrackers: {
          enabled: config.retention.deleteDeadTrackers,
          messages: config.retention.deadTrackerMessages,
        },
        mediaExtensions: config.retention.mediaExtensions,
        dryRun: config.dryRun,
        fixHardlinks: config.fixHardlinks,
        deleteFiles: config.retention.deleteFiles,
      }
    );

    const summary = await runner.run();
    logSummary(summary);

    if (cache) {
      cache.prune();
      const stats = cache.getStats();
      logger.info(`Hash cache: ${stats.hits} hits, ${stats.misses} misses (${stats.hitRate}% hit rate)`);
    }

    logger.success('Torrent retention finished successfully');
    return 0;
  } catch (error) {
    const appError = handleError(error, 'cleaner-cli');
    if (notifier) {
      await notifier.sendError(`Fatal error: ${appError.message}`);
    }
    return 1;
  } finally {
    await client?.close?.();
    cache?.close();
    lock?.release();
    logger.disableFile();
  }
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(resolve(entry)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  loadEnv();
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Fatal error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  );
}
