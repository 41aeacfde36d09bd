import type { JsonObject, NewFinishedSeason, ProviderConfig } from '../types/index.js';
import { DEFAULT_LOOKBACK_DAYS, DEFAULT_MESSAGE_TEMPLATE } from '../utils/config.js';
import { toLocalIsoString } from '../utils/dateUtils.js';

export const USER_AGENT = 'New-Seasons-Reminder/1.0';

/**
 * A notification destination. Add a class implementing this and register it
 * in `createProvider` to support another service.
 */
export interface WebhookProvider {
  readonly name: string;
  validateConfig(): boolean;
  shouldSendOnEmpty(): boolean;
  buildPayload(seasons: NewFinishedSeason[]): Promise<JsonObject>;
  getHeaders(): Record<string, string>;
  formatMessage(seasons: NewFinishedSeason[]): string;
}

export const DEFAULT_PROVIDER_CONFIG: ProviderConfig = {
  lookbackDays: DEFAULT_LOOKBACK_DAYS,
  onEmpty: false,
  messageTemplate: DEFAULT_MESSAGE_TEMPLATE,
  payloadTemplate: 'default',
  signalNumber: '',
  signalRecipients: '',
  signalTextMode: 'styled',
  signalIncludeCovers: false,
};

export function resolveProviderConfig(config: Partial<ProviderConfig>): ProviderConfig {
  return { ...DEFAULT_PROVIDER_CONFIG, ...config };
}

export function defaultHeaders(): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
  };
}

/**
 * "Show S3, Other Show S1", or "None" for an empty batch
 */
export function formatShowList(seasons: NewFinishedSeason[]): string {
  if (seasons.length === 0) {
    return 'None';
  }
  return seasons.map((s) => `${s.show} S${s.season}`).join(', ');
}

/**
 * Replace every `{name}` token whose name is a key of `values`. Other braces
 * are kept as they are, and replaced text is never scanned again.
 */
export function substitutePlaceholders(
  template: string,
  values: Record<string, string>
): string {
  return template.replace(/\{([a-z_]+)\}/g, (token: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : token
  );
}

/**
 * Render the configured message template with season_count, period_days,
 * timestamp and show_list
 */
export function renderMessageTemplate(
  config: ProviderConfig,
  seasons: NewFinishedSeason[],
  now: Date = new Date()
): string {
  return substitutePlaceholders(config.messageTemplate, {
    season_count: String(seasons.length),
    period_days: String(config.lookbackDays),
    timestamp: toLocalIsoString(now),
    show_list: formatShowList(seasons),
  });
}
