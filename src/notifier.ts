/**
 * Run notifications via Discord webhook
 */

import { errorMessage, logger as rootLogger } from './logger.js';
import type { RunSummary } from './types.js';

const log = rootLogger.child('DiscordNotifier');

const GREEN = 0x00ff00;
const YELLOW = 0xffff00;
const RED = 0xff0000;
const GIB = 1024 ** 3;
const MAX_LISTED_TORRENTS = 5;

export interface Notifier {
  sendSummary(summary: RunSummary): Promise<boolean>;
  sendError(message: string): Promise<boolean>;
}

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface Embed {
  title: string;
  description: string;
  color: number;
  fields?: EmbedField[];
  timestamp: string;
  footer?: { text: string };
}

function gib(bytes: number): string {
  return `${(bytes / GIB).toFixed(2)} GB`;
}

export function buildSummaryEmbed(summary: RunSummary, now: Date = new Date()): Embed {
  let color = GREEN;
  if (summary.torrentsDeleted > 0) {
    color = summary.dryRun ? YELLOW : RED;
  }

  const fields: EmbedField[] = [
    { name: 'Torrents Processed', value: String(summary.torrentsProcessed), inline: true },
    { name: 'Torrents Deleted', value: String(summary.torrentsDeleted), inline: true },
    { name: 'Torrents Kept', value: String(summary.torrentsKept), inline: true },
  ];

  if (summary.hardlinksAttempted > 0) {
    fields.push(
      { name: 'Hardlinks Fixed', value: String(summary.hardlinksFixed), inline: true },
      { name: 'Hardlinks Failed', value: String(summary.hardlinksFailed), inline: true }
    );
  }

  fields.push({ name: 'Orphaned Files Found', value: String(summary.orphanedFilesFound), inline: true });

  const freed = summary.spaceFreedDeadTrackerBytes + summary.spaceFreedCriteriaBytes;
  const total = freed + summary.spaceSavedHardlinksBytes;
  if (total > 0) {
    const parts: string[] = [];
    if (summary.spaceFreedDeadTrackerBytes > 0) parts.push(`Dead trackers: ${gib(summary.spaceFreedDeadTrackerBytes)}`);
    if (summary.spaceFreedCriteriaBytes > 0) parts.push(`Criteria: ${gib(summary.spaceFreedCriteriaBytes)}`);
    if (summary.spaceSavedHardlinksBytes > 0) parts.push(`Hardlinks: ${gib(summary.spaceSavedHardlinksBytes)}`);
    let value = gib(total);
    if (parts.length > 1) value += `\n(${parts.join(', ')})`;
    fields.push({ name: 'Space Saved', value, inline: true });
  }

  const reasons = Object.entries(summary.deletionReasons);
  if (reasons.length > 0) {
    fields.push({
      name: 'Deletion Reasons',
      value: reasons.map(([reason, count]) => `• ${reason}: ${count}`).join('\n'),
      inline: false,
    });
  }

  if (summary.deletedTorrents.length > 0) {
    let value = summary.deletedTorrents
      .slice(0, MAX_LISTED_TORRENTS)
      .map(name => `• ${name}`)
      .join('\n');
    if (summary.deletedTorrents.length > MAX_LISTED_TORRENTS) {
      value += `\n... and ${summary.deletedTorrents.length - MAX_LISTED_TORRENTS} more`;
    }
    fields.push({ name: 'Deleted Torrents', value, inline: false });
  }

  if (summary.errors.length > 0) {
    fields.push({ name: 'Errors', value: String(summary.errors.length), inline: true });
  }

  return {
    title: `${summary.dryRun ? '[DRY RUN] ' : ''}Torrent Retention Summary`,
    description: `Run completed at ${now.toISOString()}`,
    color,
    fields,
    timestamp: now.toISOString(),
    footer: { text: 'Torrent Retention' },
  };
}

export class DiscordNotifier implements Notifier {
  readonly enabled: boolean;

  constructor(private readonly webhookUrl: string | undefined, private readonly timeoutMs: number = 10_000) {
    this.enabled = Boolean(webhookUrl);
    if (!this.enabled) {
      log.info('Discord notifications disabled (no webhook URL)');
    }
  }

  async sendSummary(summary: RunSummary): Promise<boolean> {
    if (!this.enabled) {
      log.debug('Discord notifications disabled, skipping');
      return true;
    }
    return this.post(buildSummaryEmbed(summary), 'summary');
  }

  async sendError(message: string): Promise<boolean> {
    if (!this.enabled) return true;
    const now = new Date();
    return this.post(
      { title: 'Torrent Retention Error', description: message, color: RED, timestamp: now.toISOString() },
      'error'
    );
  }

  private async post(embed: Embed, kind: string): Promise<boolean> {
    if (!this.webhookUrl) return true;
    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ embeds: [embed] }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        log.error(`Failed to send Discord ${kind} notification: HTTP ${response.status}`);
        return false;
      }
      log.info(`Discord ${kind} notification sent successfully`);
      return true;
    } catch (error) {
      log.error(`Failed to send Discord ${kind} notification: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
      return false;
    }
  }
}
