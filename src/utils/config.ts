import cron from 'node-cron';
import type { Config, ProviderConfig } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { logger, type Log } from './logger.js';

export const DEFAULT_LOOKBACK_DAYS = 7;
export const DEFAULT_MESSAGE_TEMPLATE = '📺 {season_count} new season(s) completed this week!';
export const DEFAULT_SCHEDULE_CRON = '0 9 * * 1';

type Env = Record<string, string | undefined>;

function isRunMode(value: string): value is Config['runMode'] {
  return value === 'once' || value === 'daemon';
}

/**
 * LOOKBACK_DAYS must be an integer in [1, 365]; anything else falls back to 7
 */
export function parseLookbackDays(raw: string | undefined, log: Log = logger): number {
  const value = (raw ?? String(DEFAULT_LOOKBACK_DAYS)).trim();

  if (!/^[+-]?\d+$/.test(value)) {
    log.warn(
      `[CONFIG] Invalid LOOKBACK_DAYS: "${value}" is not an integer. Using default of ${DEFAULT_LOOKBACK_DAYS}.`
    );
    return DEFAULT_LOOKBACK_DAYS;
  }

  const days = parseInt(value, 10);
  if (days < 1 || days > 365) {
    log.warn(
      `[CONFIG] Invalid LOOKBACK_DAYS: must be between 1 and 365 (got ${days}). Using default of ${DEFAULT_LOOKBACK_DAYS}.`
    );
    return DEFAULT_LOOKBACK_DAYS;
  }

  return days;
}

export function loadConfig(env: Env = process.env, log: Log = logger): Config {
  const required = (name: string): string => {
    const value = env[name];
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable: ${name}`);
    }
    return value;
  };

  const optional = (name: string, defaultValue: string): string => {
    return env[name] || defaultValue;
  };

  const flag = (name: string): boolean => {
    return optional(name, 'false').toLowerCase() === 'true';
  };

  const runMode = optional('RUN_MODE', 'once').toLowerCase();
  if (!isRunMode(runMode)) {
    throw new ConfigurationError(`Unsupported RUN_MODE: ${runMode} (expected "once" or "daemon")`);
  }

  const scheduleCron = optional('SCHEDULE_CRON', DEFAULT_SCHEDULE_CRON);
  if (runMode === 'daemon' && !cron.validate(scheduleCron)) {
    throw new ConfigurationError(`Invalid SCHEDULE_CRON expression: ${scheduleCron}`);
  }

  return {
    tautulli: {
      url: required('TAUTULLI_URL'),
      apiKey: required('TAUTULLI_APIKEY'),
    },
    plex: {
      url: optional('PLEX_URL', ''),
      token: optional('PLEX_TOKEN', ''),
    },
    webhook: {
      url: optional('WEBHOOK_URL', ''),
      mode: optional('WEBHOOK_MODE', 'default').toLowerCase(),
      messageTemplate: optional('WEBHOOK_MESSAGE_TEMPLATE', DEFAULT_MESSAGE_TEMPLATE),
      payloadTemplate: optional('WEBHOOK_PAYLOAD_TEMPLATE', 'default'),
      onEmpty: flag('WEBHOOK_ON_EMPTY'),
    },
    signal: {
      number: optional('SIGNAL_NUMBER', ''),
      recipients: optional('SIGNAL_RECIPIENTS', ''),
      textMode: optional('SIGNAL_TEXT_MODE', 'styled'),
      includeCovers: flag('SIGNAL_INCLUDE_COVERS'),
    },
    schedule: {
      cron: scheduleCron,
    },
    lookbackDays: parseLookbackDays(env['LOOKBACK_DAYS'], log),
    runMode,
    runOnStartup: flag('RUN_ON_STARTUP'),
    debug: flag('DEBUG'),
    logLevel: optional('LOG_LEVEL', 'info').toLowerCase(),
  };
}

/**
 * Settings the webhook providers read
 */
export function getProviderConfig(config: Config): ProviderConfig {
  return {
    lookbackDays: config.lookbackDays,
    onEmpty: config.webhook.onEmpty,
    messageTemplate: config.webhook.messageTemplate,
    payloadTemplate: config.webhook.payloadTemplate,
    signalNumber: config.signal.number,
    signalRecipients: config.signal.recipients,
    signalTextMode: config.signal.textMode,
    signalIncludeCovers: config.signal.includeCovers,
  };
}
