import type { JsonObject, NewFinishedSeason, ProviderConfig } from '../types/index.js';
import { toLocalIsoString } from '../utils/dateUtils.js';
import { logger, type Log } from '../utils/logger.js';
import {
  type WebhookProvider,
  defaultHeaders,
  formatShowList,
  renderMessageTemplate,
  resolveProviderConfig,
  substitutePlaceholders,
} from './base.js';

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when WEBHOOK_PAYLOAD_TEMPLATE holds an actual template rather than
 * the "default" marker
 */
export function hasCustomTemplate(template: string): boolean {
  const trimmed = template.trim();
  return trimmed !== '' && trimmed.toLowerCase() !== 'default';
}

/**
 * Plain JSON webhook. Sends `{timestamp, period_days, season_count, seasons, message}`
 * unless a payload template is configured, in which case `{timestamp}`,
 * `{period_days}`, `{season_count}`, `{message}`, `{show_list}` and `{seasons}`
 * are replaced by their JSON literals.
 */
export class GenericProvider implements WebhookProvider {
  readonly name: string;
  private config: ProviderConfig;
  private log: Log;

  constructor(config: Partial<ProviderConfig> = {}, log: Log = logger, name: string = 'default') {
    this.config = resolveProviderConfig(config);
    this.log = log;
    this.name = name;
  }

  validateConfig(): boolean {
    return true;
  }

  shouldSendOnEmpty(): boolean {
    return this.config.onEmpty;
  }

  getHeaders(): Record<string, string> {
    return defaultHeaders();
  }

  formatMessage(seasons: NewFinishedSeason[]): string {
    return renderMessageTemplate(this.config, seasons);
  }

  async buildPayload(seasons: NewFinishedSeason[]): Promise<JsonObject> {
    const message = this.formatMessage(seasons);
    const timestamp = toLocalIsoString(new Date());

    if (hasCustomTemplate(this.config.payloadTemplate)) {
      const custom = this.renderPayloadTemplate(seasons, message, timestamp);
      if (custom) {
        return custom;
      }
    }

    return {
      timestamp,
      period_days: this.config.lookbackDays,
      season_count: seasons.length,
      seasons,
      message,
    };
  }

  private renderPayloadTemplate(
    seasons: NewFinishedSeason[],
    message: string,
    timestamp: string
  ): JsonObject | null {
    const text = substitutePlaceholders(this.config.payloadTemplate, {
      timestamp: JSON.stringify(timestamp),
      period_days: JSON.stringify(this.config.lookbackDays),
      season_count: JSON.stringify(seasons.length),
      message: JSON.stringify(message),
      show_list: JSON.stringify(formatShowList(seasons)),
      seasons: JSON.stringify(seasons),
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      this.log.error('[WEBHOOK] Failed to parse custom payload template, using default payload:', error);
      return null;
    }

    if (!isJsonObject(parsed)) {
      this.log.error('[WEBHOOK] Custom payload template must produce a JSON object, using default payload');
      return null;
    }

    return parsed;
  }
}
