import type { DownloadFn, ProviderConfig, WebhookMode } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger, type Log } from '../utils/logger.js';
import type { WebhookProvider } from './base.js';
import { GenericProvider } from './generic.js';
import { SignalCliProvider } from './signalCli.js';

export type { WebhookProvider } from './base.js';
export { GenericProvider } from './generic.js';
export { SignalCliProvider } from './signalCli.js';

export const WEBHOOK_MODES: readonly WebhookMode[] = ['default', 'custom', 'signal-cli'];

export function isWebhookMode(value: string): value is WebhookMode {
  return WEBHOOK_MODES.some((mode) => mode === value);
}

export interface ProviderDeps {
  log?: Log;
  download?: DownloadFn;
}

/**
 * Pick the provider for WEBHOOK_MODE and check its settings
 */
export function createProvider(
  mode: string,
  config: Partial<ProviderConfig>,
  deps: ProviderDeps = {}
): WebhookProvider {
  const log = deps.log ?? logger;
  const normalized = mode.toLowerCase();

  if (!isWebhookMode(normalized)) {
    throw new ConfigurationError(`Unsupported webhook mode: ${mode}`);
  }

  const provider: WebhookProvider =
    normalized === 'signal-cli'
      ? new SignalCliProvider(config, log, deps.download)
      : new GenericProvider(config, log, normalized);

  if (!provider.validateConfig()) {
    throw new ConfigurationError(`Invalid configuration for ${normalized} provider`);
  }

  return provider;
}
