import { downloadBytes } from '../clients/tautulli.js';
import type { DownloadFn, JsonObject, NewFinishedSeason, ProviderConfig } from '../types/index.js';
import { formatShortDateTime } from '../utils/dateUtils.js';
import { logger, type Log } from '../utils/logger.js';
import { type WebhookProvider, defaultHeaders, resolveProviderConfig } from './base.js';

/**
 * Split a comma-separated recipient list, trimming and dropping blanks
 */
export function parseRecipients(raw: string): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((recipient) => recipient.trim())
    .filter((recipient) => recipient.length > 0);
}

/**
 * Payload for signal-cli-rest-api's `POST /v2/send`
 */
export class SignalCliProvider implements WebhookProvider {
  readonly name = 'signal-cli';
  private config: ProviderConfig;
  private log: Log;
  private download: DownloadFn;

  constructor(config: Partial<ProviderConfig> = {}, log: Log = logger, download?: DownloadFn) {
    this.config = resolveProviderConfig(config);
    this.log = log;
    this.download = download ?? ((url) => downloadBytes(url, log));
  }

  validateConfig(): boolean {
    if (!this.config.signalNumber) {
      this.log.error('[SIGNAL] Missing required config: SIGNAL_NUMBER');
      return false;
    }
    if (!this.config.signalRecipients) {
      this.log.error('[SIGNAL] Missing required config: SIGNAL_RECIPIENTS');
      return false;
    }
    return true;
  }

  // Signal never gets an empty notification, whatever WEBHOOK_ON_EMPTY says
  shouldSendOnEmpty(): boolean {
    return false;
  }

  getHeaders(): Record<string, string> {
    return defaultHeaders();
  }

  /**
   * Signal text styling: *bold*, _italic_
   */
  formatMessage(seasons: NewFinishedSeason[], now: Date = new Date()): string {
    const count = seasons.length;
    const plural = count > 1 ? 's' : '';
    const lines = [
      `📺 *${count} new season${plural}* completed in the last ${this.config.lookbackDays} days!`,
      '',
    ];

    for (const season of seasons) {
      lines.push(`• *${season.show}* - Season ${season.season} (${season.episode_count} episodes)`);
    }

    lines.push('');
    lines.push(`_${formatShortDateTime(now)}_`);

    return lines.join('\n');
  }

  async buildPayload(seasons: NewFinishedSeason[]): Promise<JsonObject> {
    const payload: JsonObject = {
      message: this.formatMessage(seasons),
      number: this.config.signalNumber,
      recipients: parseRecipients(this.config.signalRecipients),
      text_mode: this.config.signalTextMode,
    };

    if (this.config.signalIncludeCovers && seasons.length > 0) {
      const covers = await this.getCoversAsBase64(seasons);
      if (covers.length > 0) {
        payload['base64_attachments'] = covers;
      }
    }

    return payload;
  }

  /**
   * One download at a time; a failed cover is skipped
   */
  private async getCoversAsBase64(seasons: NewFinishedSeason[]): Promise<string[]> {
    const covers: string[] = [];
    for (const season of seasons) {
      if (!season.cover_url) {
        continue;
      }
      try {
        const data = await this.download(season.cover_url);
        if (data) {
          covers.push(data.toString('base64'));
        } else {
          this.log.warn(`[SIGNAL] Failed to download cover for ${season.show}`);
        }
      } catch (error) {
        this.log.warn(`[SIGNAL] Failed to download cover for ${season.show}:`, error);
      }
    }
    return covers;
  }
}
