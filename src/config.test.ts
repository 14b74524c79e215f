import { describe, it, expect, beforeEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as YAML from 'js-yaml';
import {
  applyEnvironment,
  ConfigManager,
  ConfigValidationError,
  DEFAULT_CONFIG,
  normalizeExtensions,
  parseBoolean,
} from './config.js';
import { scratchDir } from '../tests/fixtures.js';

describe('ConfigManager', () => {
  let configDir: string;
  let torrentDir: string;
  let mediaDir: string;

  beforeEach(() => {
    configDir = scratchDir('config');
    torrentDir = join(configDir, 'torrents');
    mediaDir = join(configDir, 'media');
    mkdirSync(torrentDir, { recursive: true });
    mkdirSync(mediaDir, { recursive: true });
  });

  function requiredEnv(): NodeJS.ProcessEnv {
    return {
      QBITTORRENT_HOST: 'localhost',
      QBITTORRENT_USERNAME: 'admin',
      QBITTORRENT_PASSWORD: 'test-secret',
      TORRENT_DIR: torrentDir,
      MEDIA_LIBRARY_DIR: mediaDir,
    };
  }

  describe('Initialization', () => {
    it('should fall back to defaults when the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), {});
      const config = manager.getAll();

      expect(config.retention.criteria).toBe('30d 2.0');
      expect(config.dryRun).toBe(true);
      expect(config.qbittorrent.port).toBe(8080);
    });

    it('should derive cache, log and lock paths from the data directory', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), { DATA_DIR: '/srv/retention' });
      const config = manager.getAll();

      expect(config.cache.dbPath).toBe('/srv/retention/cache/file_cache.db');
      expect(config.logging.file).toBe('/srv/retention/logs/cleaner.log');
      expect(config.lockFile).toBe('/srv/retention/torrent-retention.lock');
    });

    it('should hand out copies', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), {});
      manager.getAll().qbittorrent.host = 'changed';
      expect(manager.getAll().qbittorrent.host).toBe('');
      expect(DEFAULT_CONFIG.qbittorrent.host).toBe('');
    });
  });

  describe('File Configuration', () => {
    it('should load YAML configuration', () => {
      const configPath = join(configDir, 'config.yaml');
      writeFileSync(
        configPath,
        YAML.dump({
          qbittorrent: { host: 'qbt.local', port: 9090 },
          retention: { criteria: '90d | 30d 3.0', mediaExtensions: ['MKV', 'mp4'] },
          dryRun: false,
        })
      );

      const config = new ConfigManager(configPath, {}).getAll();

      expect(config.qbittorrent.host).toBe('qbt.local');
      expect(config.qbittorrent.port).toBe(9090);
      expect(config.retention.criteria).toBe('90d | 30d 3.0');
      expect(config.retention.mediaExtensions).toEqual(['.mkv', '.mp4']);
      expect(config.dryRun).toBe(false);
    });

    it('should load JSON configuration and keep defaults for the rest', () => {
      const configPath = join(configDir, 'config.json');
      writeFileSync(configPath, JSON.stringify({ cache: { enabled: false }, hashConcurrency: 8 }));

      const config = new ConfigManager(configPath, {}).getAll();

      expect(config.cache.enabled).toBe(false);
      expect(config.hashConcurrency).toBe(8);
      expect(config.retention.deleteFiles).toBe(true);
    });

    it('should ignore values of the wrong type', () => {
      const configPath = join(configDir, 'config.json');
      writeFileSync(configPath, JSON.stringify({ qbittorrent: { port: 'not a number' }, dryRun: 42 }));

      const config = new ConfigManager(configPath, {}).getAll();

      expect(config.qbittorrent.port).toBe(8080);
      expect(config.dryRun).toBe(true);
    });

    it('should treat an empty YAML file as defaults', () => {
      const configPath = join(configDir, 'config.yaml');
      writeFileSync(configPath, '');
      expect(new ConfigManager(configPath, {}).getAll().retention.criteria).toBe('30d 2.0');
    });

    it('should reject a file that does not parse', () => {
      const configPath = join(configDir, 'config.json');
      writeFileSync(configPath, '{ not json');
      expect(() => new ConfigManager(configPath, {})).toThrow(ConfigValidationError);
    });

    it('should reject a file that is not a mapping', () => {
      const configPath = join(configDir, 'config.yaml');
      writeFileSync(configPath, '- one\n- two\n');
      expect(() => new ConfigManager(configPath, {})).toThrow(`Config file ${configPath} must contain a mapping`);
    });
  });

  describe('Environment Overrides', () => {
    it('should let environment variables win over the file', () => {
      const configPath = join(configDir, 'config.yaml');
      writeFileSync(configPath, YAML.dump({ qbittorrent: { host: 'from-file' }, retention: { criteria: '10d' } }));

      const config = new ConfigManager(configPath, {
        QBITTORRENT_HOST: 'from-env',
        DELETION_CRITERIA: '60d 1.0',
        DRY_RUN: 'false',
        DELETE_DEAD_TRACKERS: 'yes',
        DEAD_TRACKER_MESSAGES: 'gone, removed ',
        LOG_LEVEL: 'WARNING',
      }).getAll();

      expect(config.qbittorrent.host).toBe('from-env');
      expect(config.retention.criteria).toBe('60d 1.0');
      expect(config.dryRun).toBe(false);
      expect(config.retention.deleteDeadTrackers).toBe(true);
      expect(config.retention.deadTrackerMessages).toEqual(['gone', 'removed']);
      expect(config.logging.level).toBe('warn');
    });

    it('should build criteria from the legacy pair', () => {
      expect(applyEnvironment(DEFAULT_CONFIG, { MIN_RATIO: '1.5' }).retention.criteria).toBe('30d 1.5');
      expect(applyEnvironment(DEFAULT_CONFIG, { MIN_SEEDING_DURATION: '7d' }).retention.criteria).toBe('7d 2.0');
      expect(
        applyEnvironment(DEFAULT_CONFIG, { MIN_RATIO: '1.5', DELETION_CRITERIA: '3m' }).retention.criteria
      ).toBe('3m');
    });

    it('should apply command-line overrides last', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), { DRY_RUN: 'false' });
      manager.override({ dryRun: true, criteria: '1y' });
      expect(manager.getAll().dryRun).toBe(true);
      expect(manager.getAll().retention.criteria).toBe('1y');
    });
  });

  describe('Validation', () => {
    it('should accept a complete configuration', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), requiredEnv());
      expect(manager.validate()).toEqual({ valid: true, errors: [] });
    });

    it('should report every problem at once', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), {
        TORRENT_DIR: join(configDir, 'nope'),
        MEDIA_LIBRARY_DIR: mediaDir,
        QBITTORRENT_PORT: '70000',
        DELETION_CRITERIA: '30d abc',
      });

      const { valid, errors } = manager.validate();

      expect(valid).toBe(false);
      expect(errors).toEqual([
        'Required setting not set: QBITTORRENT_HOST',
        'Required setting not set: QBITTORRENT_USERNAME',
        'Required setting not set: QBITTORRENT_PASSWORD',
        'Invalid port number (must be 1-65535)',
        `Torrent directory does not exist: ${join(configDir, 'nope')}`,
        'Invalid deletion criteria: Invalid criteria token "abc": expected a duration (e.g. 30d, 3m, 1y) or a ratio (e.g. 2.0)',
      ]);
    });

    it('should throw a ConfigValidationError from assertValid', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), { ...requiredEnv(), HASH_CONCURRENCY: '0' });
      expect(() => manager.assertValid()).toThrow('Hash concurrency must be at least 1');
    });
  });

  describe('Export', () => {
    it('should mask the password', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), requiredEnv());
      expect(manager.toJSON()).toContain('"password": "***"');
      expect(manager.toJSON()).not.toContain('test-secret');
      expect(manager.toYAML()).toContain("password: '***'");
    });
  });
});

describe('parseBoolean', () => {
  it('should accept true, 1 and yes', () => {
    expect(parseBoolean('TRUE', false)).toBe(true);
    expect(parseBoolean('1', false)).toBe(true);
    expect(parseBoolean('yes', false)).toBe(true);
    expect(parseBoolean('no', true)).toBe(false);
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean(' ', false)).toBe(false);
  });
});

describe('normalizeExtensions', () => {
  it('should lowercase, add the dot and dedupe', () => {
    expect(normalizeExtensions(['MKV', '.mkv', ' mp4 ', '.'])).toEqual(['.mkv', '.mp4']);
  });
});
