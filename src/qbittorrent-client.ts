/**
 * qBittorrent Web API (v2) client
 */

import pRetry, { AbortError } from 'p-retry';
import { AppError, errorMessage, logger as rootLogger } from './logger.js';
import { classifyTrackerTier } from './tracker-health.js';
import type { TrackerRef } from './types.js';

const log = rootLogger.child('QBittorrentClient');

export interface TorrentSummary {
  id: string;
  name: string;
  savePath: string;
  ratio: number;
  seedingSeconds: number;
  state: string;
}

export interface TorrentFileEntry {
  /** Path relative to the torrent's save path */
  name: string;
}

/**
 * What the retention run needs from a torrent client
 */
export interface TorrentClient {
  listTorrents(): Promise<TorrentSummary[]>;
  listFiles(torrentId: string): Promise<TorrentFileEntry[]>;
  listTrackers(torrentId: string): Promise<TrackerRef[]>;
  deleteTorrent(torrentId: string, deleteFiles: boolean): Promise<void>;
  pauseTorrent?(torrentId: string): Promise<void>;
  resumeTorrent?(torrentId: string): Promise<void>;
  close?(): Promise<void>;
}

export class TorrentClientError extends AppError {
  constructor(message: string, statusCode: number = 502, context?: Record<string, unknown>) {
    super(message, 'TORRENT_CLIENT_ERROR', statusCode, context);
    this.name = 'TorrentClientError';
  }
}

export interface QBittorrentOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(row: Record<string, unknown>, key: string, fallback: string = ''): string {
  const value = row[key];
  return typeof value === 'string' ? value : fallback;
}

function readNumber(row: Record<string, unknown>, key: string, fallback: number = 0): number {
  const value = row[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function rows(data: unknown, what: string): Record<string, unknown>[] {
  if (!Array.isArray(data)) {
    throw new TorrentClientError(`Unexpected ${what} response: expected an array`);
  }
  return data.filter(isRecord);
}

export function baseUrlFor(host: string, port: number): string {
  const withScheme = /^https?:\/\//i.test(host) ? host : `http://${host}`;
  const url = new URL(withScheme);
  if (!url.port) url.port = String(port);
  return url.origin;
}

export class QBittorrentClient implements TorrentClient {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private cookie: string | null = null;
  private loggedIn = false;

  constructor(private readonly options: QBittorrentOptions) {
    this.baseUrl = baseUrlFor(options.host, options.port);
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async login(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/api/v2/auth/login`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Referer: this.baseUrl,
      },
      body: new URLSearchParams({ username: this.options.username, password: this.options.password }),
    });

    const text = (await response.text()).trim();
    if (response.status === 403) {
      throw new TorrentClientError('qBittorrent login banned: too many failed attempts', 403);
    }
    if (!response.ok || text !== 'Ok.') {
      throw new TorrentClientError('Failed to login to qBittorrent: invalid credentials', 401);
    }

    const setCookie = response.headers.get('set-cookie') ?? '';
    const sid = /SID=([^;]+)/.exec(setCookie);
    this.cookie = sid ? `SID=${sid[1]}` : null;
    this.loggedIn = true;
    log.info(`Successfully connected to qBittorrent at ${this.baseUrl}`);
  }

  /**
   * Authenticated request with exponential backoff. 4xx responses abort
   * retrying, except one re-login on 403 (expired session).
   */
  private async request(path: string, params: Record<string, string> = {}, method: 'GET' | 'POST' = 'GET'): Promise<Response> {
    let reloggedIn = false;

    const attempt = async (): Promise<Response> => {
      if (!this.loggedIn) {
        try {
          await this.login();
        } catch (error) {
          if (error instanceof TorrentClientError && error.statusCode < 500) throw new AbortError(error);
          throw error;
        }
      }

      const query = new URLSearchParams(params);
      const url = method === 'GET' && Object.keys(params).length > 0
        ? `${this.baseUrl}/api/v2/${path}?${query.toString()}`
        : `${this.baseUrl}/api/v2/${path}`;

      const headers: Record<string, string> = { Referer: this.baseUrl };
      if (this.cookie) headers.Cookie = this.cookie;
      if (method === 'POST') headers['Content-Type'] = 'application/x-www-form-urlencoded';

      const response = await fetch(url, {
        method,
        headers,
        body: method === 'POST' ? query : undefined,
      });

      if (response.ok) return response;

      if (response.status === 403 && !reloggedIn) {
        reloggedIn = true;
        this.loggedIn = false;
        this.cookie = null;
        throw new TorrentClientError(`Session expired on ${path}`, 403);
      }

      const error = new TorrentClientError(`qBittorrent ${path} failed: HTTP ${response.status}`, response.status, { path });
      if (response.status >= 400 && response.status < 500) {
        throw new AbortError(error);
      }
      throw error;
    };

    try {
      return await pRetry(attempt, {
        retries: this.maxRetries,
        factor: 2,
        minTimeout: this.retryDelayMs,
        onFailedAttempt: error => {
          log.warn(`Request ${path} failed (attempt ${error.attemptNumber}, ${error.retriesLeft} left): ${error.message}`);
        },
      });
    } catch (error) {
      if (error instanceof TorrentClientError) throw error;
      throw new TorrentClientError(`qBittorrent ${path} failed: ${errorMessage(error)}`, 502, { path });
    }
  }

  private async json(path: string, params: Record<string, string> = {}): Promise<unknown> {
    const response = await this.request(path, params, 'GET');
    const data: unknown = await response.json();
    return data;
  }

  async listTorrents(): Promise<TorrentSummary[]> {
    const torrents = rows(await this.json('torrents/info'), 'torrents/info').map(row => ({
      id: readString(row, 'hash'),
      name: readString(row, 'name'),
      savePath: readString(row, 'save_path'),
      ratio: readNumber(row, 'ratio'),
      seedingSeconds: readNumber(row, 'seeding_time'),
      state: readString(row, 'state'),
    }));
    log.debug(`Retrieved ${torrents.length} torrents from qBittorrent`);
    return torrents.filter(torrent => torrent.id !== '');
  }

  async listFiles(torrentId: string): Promise<TorrentFileEntry[]> {
    return rows(await this.json('torrents/files', { hash: torrentId }), 'torrents/files')
      .map(row => ({ name: readString(row, 'name') }))
      .filter(entry => entry.name !== '');
  }

  async listTrackers(torrentId: string): Promise<TrackerRef[]> {
    return rows(await this.json('torrents/trackers', { hash: torrentId }), 'torrents/trackers').map(row => {
      const url = readString(row, 'url');
      return { url, message: readString(row, 'msg'), tier: classifyTrackerTier(url) };
    });
  }

  async deleteTorrent(torrentId: string, deleteFiles: boolean): Promise<void> {
    await this.request('torrents/delete', { hashes: torrentId, deleteFiles: String(deleteFiles) }, 'POST');
    log.info(`Deleted torrent ${torrentId} (deleteFiles=${deleteFiles})`);
  }

  async pauseTorrent(torrentId: string): Promise<void> {
    await this.withLegacyFallback('torrents/stop', 'torrents/pause', torrentId);
    log.debug(`Paused torrent: ${torrentId}`);
  }

  async resumeTorrent(torrentId: string): Promise<void> {
    await this.withLegacyFallback('torrents/start', 'torrents/resume', torrentId);
    log.debug(`Resumed torrent: ${torrentId}`);
  }

  /**
   * qBittorrent 5 renamed pause/resume to stop/start; older servers answer 404
   */
  private async withLegacyFallback(current: string, legacy: string, torrentId: string): Promise<void> {
    try {
      await this.request(current, { hashes: torrentId }, 'POST');
    } catch (error) {
      if (error instanceof TorrentClientError && error.statusCode === 404) {
        await this.request(legacy, { hashes: torrentId }, 'POST');
        return;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (!this.loggedIn) return;
    const headers: Record<string, string> = { Referer: this.baseUrl };
    if (this.cookie) headers.Cookie = this.cookie;
    try {
      await fetch(`${this.baseUrl}/api/v2/auth/logout`, { method: 'POST', headers });
      log.debug('Logged out from qBittorrent');
    } catch (error) {
      log.warn(`Error during logout: ${errorMessage(error)}`);
    } finally {
      this.loggedIn = false;
      this.cookie = null;
    }
  }
}
