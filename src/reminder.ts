import cron, { type ScheduledTask } from 'node-cron';
import { TautulliClient } from './clients/tautulli.js';
import { sendWebhook } from './clients/webhook.js';
import { findNewFinishedSeasons } from './logic/seasons.js';
import { createProvider, type WebhookProvider } from './providers/index.js';
import type { Config, NewFinishedSeason, SeasonSource } from './types/index.js';
import { getProviderConfig } from './utils/config.js';
import { logger, type Log } from './utils/logger.js';

export interface ReminderDeps {
  source?: SeasonSource;
  provider?: WebhookProvider;
  log?: Log;
}

export class SeasonReminder {
  private config: Config;
  private source: SeasonSource;
  private provider: WebhookProvider;
  private log: Log;
  private scheduledTasks: ScheduledTask[] = [];

  /**
   * Throws ConfigurationError when the webhook mode or its settings are invalid
   */
  constructor(config: Config, deps: ReminderDeps = {}) {
    this.config = config;
    this.log = deps.log ?? logger;

    const tautulli = new TautulliClient(config.tautulli.url, config.tautulli.apiKey, {
      plexUrl: config.plex.url,
      plexToken: config.plex.token,
      log: this.log,
    });
    this.source = deps.source ?? tautulli;
    this.provider =
      deps.provider ??
      createProvider(config.webhook.mode, getProviderConfig(config), {
        log: this.log,
        download: (url) => tautulli.downloadBytes(url),
      });
  }

  private logSummary(seasons: NewFinishedSeason[]): void {
    this.log.info(`Found ${seasons.length} new finished season(s)`);
    for (const season of seasons) {
      this.log.info(`  - ${season.show} Season ${season.season} (${season.episode_count} episodes)`);
    }
  }

  /**
   * Classify and notify once. Resolves to false when the notification failed.
   */
  async runOnce(): Promise<boolean> {
    const seasons = await findNewFinishedSeasons(this.config.lookbackDays, this.source, this.log);
    this.logSummary(seasons);

    if (!this.config.webhook.url) {
      this.log.warn('WEBHOOK_URL not set, skipping webhook send (useful for testing)');
      if (seasons.length > 0) {
        console.log(JSON.stringify(seasons, null, 2));
      }
      return true;
    }

    const sent = await sendWebhook(seasons, this.provider, this.config.webhook.url, this.log);
    if (!sent) {
      this.log.error('Failed to send webhook notification');
    }
    return sent;
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.log.error('Scheduled run failed:', error);
    }
  }

  /**
   * Run in daemon mode (long-running with scheduler)
   */
  async runDaemon(): Promise<void> {
    this.log.info('Starting in daemon mode...');

    const task = cron.schedule(this.config.schedule.cron, () => {
      this.log.debug('Running scheduled check...');
      void this.runScheduled();
    });
    this.scheduledTasks.push(task);
    this.log.info(`Scheduled check: ${this.config.schedule.cron}`);

    if (this.config.runOnStartup) {
      this.log.info('Running initial check on startup...');
      await this.runScheduled();
    }
  }

  /**
   * Start based on the configured run mode. In `once` mode resolves to the
   * outcome of the single run; daemon mode always resolves to true.
   */
  async start(): Promise<boolean> {
    this.log.info('='.repeat(50));
    this.log.info(`📺 New Seasons Reminder (${this.provider.name}, last ${this.config.lookbackDays} days)`);
    this.log.info('='.repeat(50));

    if (this.config.runMode === 'daemon') {
      await this.runDaemon();
      return true;
    }

    return this.runOnce();
  }

  stop(): void {
    this.log.info('Stopping...');
    for (const task of this.scheduledTasks) {
      task.stop();
    }
    this.scheduledTasks = [];
  }
}
