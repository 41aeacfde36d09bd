import type { WebhookProvider } from '../providers/base.js';
import type { NewFinishedSeason } from '../types/index.js';
import { logger, type Log } from '../utils/logger.js';
import { REQUEST_TIMEOUT_MS } from './tautulli.js';

const SUCCESS_STATUSES = new Set([200, 201, 202, 204]);

/**
 * POST the provider's payload once. Returns true when the destination accepted
 * it, or when there was nothing to send and the provider skips empty batches.
 */
export async function sendWebhook(
  seasons: NewFinishedSeason[],
  provider: WebhookProvider,
  webhookUrl: string,
  log: Log = logger
): Promise<boolean> {
  if (seasons.length === 0 && !provider.shouldSendOnEmpty()) {
    log.info('[WEBHOOK] No new seasons found, skipping webhook');
    return true;
  }

  if (!webhookUrl) {
    log.warn('[WEBHOOK] WEBHOOK_URL not set, skipping webhook send');
    return false;
  }

  try {
    const payload = await provider.buildPayload(seasons);
    log.debug(`[WEBHOOK] POST ${webhookUrl} (${provider.name})`);

    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: provider.getHeaders(),
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (SUCCESS_STATUSES.has(response.status)) {
      log.info(`[WEBHOOK] Webhook sent successfully to ${webhookUrl}`);
      return true;
    }

    log.warn(`[WEBHOOK] Webhook returned status ${response.status}`);
    return false;
  } catch (error) {
    log.error('[WEBHOOK] Failed to send webhook:', error);
    return false;
  }
}
