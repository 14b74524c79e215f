/**
 * Configuration system with YAML and JSON support and environment overrides
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import * as YAML from 'js-yaml';
import { legacyCriteria, parseCriteria } from './criteria-parser.js';
import { AppError, errorMessage, logger, normalizeLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_DEAD_TRACKER_MESSAGES } from './tracker-health.js';

export interface QBittorrentConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  maxRetries: number;
  retryDelayMs: number;
}

export interface PathsConfig {
  torrentDir: string;
  mediaLibraryDir: string;
  dataDir: string;
}

export interface RetentionSettings {
  /** Criteria string, e.g. `30d 2.0 | 90d` */
  criteria: string;
  deleteFiles: boolean;
  deleteDeadTrackers: boolean;
  deadTrackerMessages: string[];
  mediaExtensions: string[];
}

export interface CacheConfig {
  enabled: boolean;
  /** Empty means `<dataDir>/cache/file_cache.db` */
  dbPath: string;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Empty means `<dataDir>/logs/cleaner.log` */
  file: string;
  maxFiles: number;
}

export interface RetentionConfig {
  qbittorrent: QBittorrentConfig;
  paths: PathsConfig;
  retention: RetentionSettings;
  dryRun: boolean;
  fixHardlinks: boolean;
  hashConcurrency: number;
  cache: CacheConfig;
  logging: LoggingConfig;
  notifications: { discordWebhookUrl: string };
  /** Empty means `<dataDir>/torrent-retention.lock` */
  lockFile: string;
}

export const DEFAULT_MEDIA_EXTENSIONS = ['.mkv', '.mp4', '.avi', '.mov', '.m4v', '.wmv', '.flv', '.webm', '.ts', '.m2ts'];

export const DEFAULT_CONFIG: RetentionConfig = {
  qbittorrent: {
    host: '',
    port: 8080,
    username: '',
    password: '',
    maxRetries: 3,
    retryDelayMs: 1000,
  },
  paths: {
    torrentDir: '/data/torrents',
    mediaLibraryDir: '/data/media',
    dataDir: '/app/data/torrent-retention',
  },
  retention: {
    criteria: '30d 2.0',
    deleteFiles: true,
    deleteDeadTrackers: false,
    deadTrackerMessages: [...DEFAULT_DEAD_TRACKER_MESSAGES],
    mediaExtensions: [...DEFAULT_MEDIA_EXTENSIONS],
  },
  dryRun: true,
  fixHardlinks: true,
  hashConcurrency: 4,
  cache: {
    enabled: true,
    dbPath: '',
  },
  logging: {
    level: 'info',
    file: '',
    maxFiles: 5,
  },
  notifications: {
    discordWebhookUrl: '',
  },
  lockFile: '',
};

export class ConfigValidationError extends AppError {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, 'INVALID_CONFIG', 400, { errors });
    this.name = 'ConfigValidationError';
  }
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function normalizeExtensions(extensions: string[]): string[] {
  return [...new Set(extensions.map(ext => {
    const lowered = ext.trim().toLowerCase();
    return lowered.startsWith('.') ? lowered : `.${lowered}`;
  }).filter(ext => ext.length > 1))];
}

function cloneConfig(config: RetentionConfig): RetentionConfig {
  return structuredClone(config);
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function readString(raw: RawSection, key: string, fallback: string): string {
  const value = raw[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function readNumber(raw: RawSection, key: string, fallback: number): number {
  const value = raw[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

function readBoolean(raw: RawSection, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return parseBoolean(value, fallback);
  return fallback;
}

function readList(raw: RawSection, key: string, fallback: string[]): string[] {
  const value = raw[key];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  if (typeof value === 'string') return parseList(value);
  return [...fallback];
}

/**
 * Overlay a parsed config file on the defaults; unknown keys are ignored and
 * values of the wrong type keep the default.
 */
export function mergeConfig(defaults: RetentionConfig, raw: RawSection): RetentionConfig {
  const qbt = section(raw, 'qbittorrent');
  const paths = section(raw, 'paths');
  const retention = section(raw, 'retention');
  const cache = section(raw, 'cache');
  const logging = section(raw, 'logging');
  const notifications = section(raw, 'notifications');

  return {
    qbittorrent: {
      host: readString(qbt, 'host', defaults.qbittorrent.host),
      port: readNumber(qbt, 'port', defaults.qbittorrent.port),
      username: readString(qbt, 'username', defaults.qbittorrent.username),
      password: readString(qbt, 'password', defaults.qbittorrent.password),
      maxRetries: readNumber(qbt, 'maxRetries', defaults.qbittorrent.maxRetries),
      retryDelayMs: readNumber(qbt, 'retryDelayMs', defaults.qbittorrent.retryDelayMs),
    },
    paths: {
      torrentDir: readString(paths, 'torrentDir', defaults.paths.torrentDir),
      mediaLibraryDir: readString(paths, 'mediaLibraryDir', defaults.paths.mediaLibraryDir),
      dataDir: readString(paths, 'dataDir', defaults.paths.dataDir),
    },
    retention: {
      criteria: readString(retention, 'criteria', defaults.retention.criteria),
      deleteFiles: readBoolean(retention, 'deleteFiles', defaults.retention.deleteFiles),
      deleteDeadTrackers: readBoolean(retention, 'deleteDeadTrackers', defaults.retention.deleteDeadTrackers),
      deadTrackerMessages: readList(retention, 'deadTrackerMessages', defaults.retention.deadTrackerMessages),
      mediaExtensions: normalizeExtensions(readList(retention, 'mediaExtensions', defaults.retention.mediaExtensions)),
    },
    dryRun: readBoolean(raw, 'dryRun', defaults.dryRun),
    fixHardlinks: readBoolean(raw, 'fixHardlinks', defaults.fixHardlinks),
    hashConcurrency: readNumber(raw, 'hashConcurrency', defaults.hashConcurrency),
    cache: {
      enabled: readBoolean(cache, 'enabled', defaults.cache.enabled),
      dbPath: readString(cache, 'dbPath', defaults.cache.dbPath),
    },
    logging: {
      level: normalizeLogLevel(readString(logging, 'level', defaults.logging.level), defaults.logging.level),
      file: readString(logging, 'file', defaults.logging.file),
      maxFiles: readNumber(logging, 'maxFiles', defaults.logging.maxFiles),
    },
    notifications: {
      discordWebhookUrl: readString(notifications, 'discordWebhookUrl', defaults.notifications.discordWebhookUrl),
    },
    lockFile: readString(raw, 'lockFile', defaults.lockFile),
  };
}

/**
 * Environment variables win over the config file
 */
export function applyEnvironment(config: RetentionConfig, env: NodeJS.ProcessEnv): RetentionConfig {
  const next = cloneConfig(config);
  const text = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };
  const numeric = (key: string, fallback: number): number => {
    const value = text(key);
    return value === undefined ? fallback : Number(value);
  };

  next.qbittorrent.host = text('QBITTORRENT_HOST') ?? next.qbittorrent.host;
  next.qbittorrent.port = numeric('QBITTORRENT_PORT', next.qbittorrent.port);
  next.qbittorrent.username = text('QBITTORRENT_USERNAME') ?? next.qbittorrent.username;
  next.qbittorrent.password = env.QBITTORRENT_PASSWORD || next.qbittorrent.password;
  next.qbittorrent.maxRetries = numeric('API_MAX_RETRIES', next.qbittorrent.maxRetries);
  next.qbittorrent.retryDelayMs = numeric('API_RETRY_DELAY_MS', next.qbittorrent.retryDelayMs);

  next.paths.torrentDir = text('TORRENT_DIR') ?? next.paths.torrentDir;
  next.paths.mediaLibraryDir = text('MEDIA_LIBRARY_DIR') ?? next.paths.mediaLibraryDir;
  next.paths.dataDir = text('DATA_DIR') ?? next.paths.dataDir;

  const criteria = text('DELETION_CRITERIA');
  if (criteria !== undefined) {
    next.retention.criteria = criteria;
  } else if (text('MIN_SEEDING_DURATION') !== undefined || text('MIN_RATIO') !== undefined) {
    next.retention.criteria =
      legacyCriteria(text('MIN_SEEDING_DURATION') ?? '30d', text('MIN_RATIO') ?? '2.0') ?? next.retention.criteria;
  }

  next.retention.deleteDeadTrackers = parseBoolean(env.DELETE_DEAD_TRACKERS, next.retention.deleteDeadTrackers);
  const deadMessages = text('DEAD_TRACKER_MESSAGES');
  if (deadMessages !== undefined) next.retention.deadTrackerMessages = parseList(deadMessages);
  const extensions = text('MEDIA_EXTENSIONS');
  if (extensions !== undefined) next.retention.mediaExtensions = normalizeExtensions(parseList(extensions));

  next.dryRun = parseBoolean(env.DRY_RUN, next.dryRun);
  next.fixHardlinks = parseBoolean(env.FIX_HARDLINKS, next.fixHardlinks);
  next.hashConcurrency = numeric('HASH_CONCURRENCY', next.hashConcurrency);

  next.cache.enabled = parseBoolean(env.ENABLE_CACHE, next.cache.enabled);
  next.cache.dbPath = text('CACHE_DB_PATH') ?? next.cache.dbPath;

  next.notifications.discordWebhookUrl = text('DISCORD_WEBHOOK_URL') ?? next.notifications.discordWebhookUrl;

  next.logging.level = normalizeLogLevel(text('LOG_LEVEL'), next.logging.level);
  next.logging.file = text('LOG_FILE') ?? next.logging.file;
  next.logging.maxFiles = numeric('LOG_MAX_FILES', next.logging.maxFiles);

  next.lockFile = text('LOCK_FILE') ?? next.lockFile;

  return next;
}

/**
 * Fill the paths that default to locations under the data directory
 */
export function resolveDerivedPaths(config: RetentionConfig): RetentionConfig {
  const next = cloneConfig(config);
  const dataDir = next.paths.dataDir;
  if (!next.cache.dbPath) next.cache.dbPath = join(dataDir, 'cache', 'file_cache.db');
  if (!next.logging.file) next.logging.file = join(dataDir, 'logs', 'cleaner.log');
  if (!next.lockFile) next.lockFile = join(dataDir, 'torrent-retention.lock');
  return next;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: RetentionConfig;
  private configPath: string;

  constructor(configPath: string = './config.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = resolveDerivedPaths(applyEnvironment(this.loadConfig(), env));
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): RetentionConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath }, 'ConfigManager');
      return cloneConfig(DEFAULT_CONFIG);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new ConfigValidationError([`Failed to load config ${this.configPath}: ${errorMessage(error)}`]);
    }

    if (parsed === undefined || parsed === null) {
      return cloneConfig(DEFAULT_CONFIG);
    }
    if (!isRecord(parsed)) {
      throw new ConfigValidationError([`Config file ${this.configPath} must contain a mapping`]);
    }

    logger.info(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');
    return mergeConfig(cloneConfig(DEFAULT_CONFIG), parsed);
  }

  /**
   * Get complete configuration
   */
  getAll(): RetentionConfig {
    return cloneConfig(this.config);
  }

  /**
   * Command-line overrides applied after file and environment
   */
  override(changes: { dryRun?: boolean; criteria?: string }): void {
    if (changes.dryRun !== undefined) this.config.dryRun = changes.dryRun;
    if (changes.criteria !== undefined) this.config.retention.criteria = changes.criteria;
  }

  /**
   * Validate configuration, reporting every problem at once
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { qbittorrent, paths, retention } = this.config;

    if (!qbittorrent.host) errors.push('Required setting not set: QBITTORRENT_HOST');
    if (!qbittorrent.username) errors.push('Required setting not set: QBITTORRENT_USERNAME');
    if (!qbittorrent.password) errors.push('Required setting not set: QBITTORRENT_PASSWORD');

    if (!Number.isInteger(qbittorrent.port) || qbittorrent.port < 1 || qbittorrent.port > 65535) {
      errors.push('Invalid port number (must be 1-65535)');
    }
    if (!Number.isInteger(qbittorrent.maxRetries) || qbittorrent.maxRetries < 0) {
      errors.push('API max retries must be a non-negative integer');
    }
    if (!Number.isFinite(qbittorrent.retryDelayMs) || qbittorrent.retryDelayMs < 0) {
      errors.push('API retry delay must be a non-negative number');
    }
    if (!Number.isInteger(this.config.hashConcurrency) || this.config.hashConcurrency < 1) {
      errors.push('Hash concurrency must be at least 1');
    }
    if (!Number.isInteger(this.config.logging.maxFiles) || this.config.logging.maxFiles < 0) {
      errors.push('Log max files must be a non-negative integer');
    }

    if (!existsSync(paths.torrentDir)) {
      errors.push(`Torrent directory does not exist: ${paths.torrentDir}`);
    }
    if (!existsSync(paths.mediaLibraryDir)) {
      errors.push(`Media library directory does not exist: ${paths.mediaLibraryDir}`);
    }

    try {
      parseCriteria(retention.criteria);
    } catch (error) {
      errors.push(`Invalid deletion criteria: ${errorMessage(error)}`);
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  assertValid(): void {
    const { valid, errors } = this.validate();
    if (!valid) throw new ConfigValidationError(errors);
  }

  private masked(): RetentionConfig {
    const copy = cloneConfig(this.config);
    if (copy.qbittorrent.password) copy.qbittorrent.password = '***';
    return copy;
  }

  /**
   * Export configuration as JSON (password masked)
   */
  toJSON(): string {
    return JSON.stringify(this.masked(), null, 2);
  }

  /**
   * Export configuration as YAML (password masked)
   */
  toYAML(): string {
    return YAML.dump(this.masked());
  }
}
