import { getConfigValue, type WeekLetterConfig } from '../config/json-config.js';
import { SlackChannel } from '../interfaces/slack_channel.js';
import { TelegramChannel } from '../interfaces/telegram_channel.js';
import { ChannelDispatcher } from '../services/channel-dispatcher.js';
import { ChannelRegistry } from '../services/channel-registry.js';
import { ContentAdapter } from '../services/content-adapter.js';
import { openDatabase, type SqliteDatabase } from '../services/db.js';
import { DedupGate } from '../services/dedup-gate.js';
import { DeliveryCoordinator } from '../services/delivery-coordinator.js';
import { SqliteDeliveryStore, type DeliveryStore } from '../services/delivery-store.js';
import { FileDocumentSource } from '../services/file-document-source.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { RetryTracker } from '../services/retry-tracker.js';
import { WeekLetterScheduler } from '../services/week-letter-scheduler.js';
import type { Channel } from '../types/channels.js';
import type { DocumentSource } from '../types/delivery.js';

/** Every long-lived service of one process, wired from a config. */
export interface Runtime {
  config: WeekLetterConfig;
  db: SqliteDatabase;
  store: DeliveryStore;
  retries: RetryTracker;
  registry: ChannelRegistry;
  coordinator: DeliveryCoordinator;
  jobs: JobScheduler;
  scheduler: WeekLetterScheduler;
  /** Stop jobs and channels, then close the database. */
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  databasePath?: string;
  /** Replaces the channels built from the config. */
  channels?: Channel[];
  source?: DocumentSource;
  now?: () => Date;
}

/** Channels enabled in the config, with secrets resolved from the environment first. */
export function buildChannels(config: WeekLetterConfig): Channel[] {
  const channels: Channel[] = [];
  const { telegram, slack } = config.channels;

  const botToken = getConfigValue('TELEGRAM_BOT_TOKEN', config);
  if (telegram.enabled && botToken) {
    channels.push(new TelegramChannel({
      token: botToken,
      chatIds: telegram.chatIds,
      defaultChatId: telegram.defaultChatId,
    }));
  }

  if (slack.enabled) {
    channels.push(new SlackChannel({
      webhookUrl: getConfigValue('SLACK_WEBHOOK_URL', config) ?? null,
      webhooks: slack.webhooks,
    }));
  }

  return channels;
}

export function createRuntime(config: WeekLetterConfig, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? (() => new Date());
  const db = openDatabase(
    overrides.databasePath ?? getConfigValue('WEEKLETTER_DATABASE_PATH', config) ?? config.storage.databasePath,
  );
  const store = new SqliteDeliveryStore(db);
  const retries = new RetryTracker(store, {
    retryIntervalHours: config.weekLetter.retryIntervalHours,
    maxRetryDurationHours: config.weekLetter.maxRetryDurationHours,
    now,
  });

  const registry = new ChannelRegistry();
  for (const channel of overrides.channels ?? buildChannels(config)) {
    registry.register(channel);
  }

  const source = overrides.source
    ?? new FileDocumentSource(getConfigValue('WEEKLETTER_LETTERS_DIR', config) ?? config.source.lettersDir);

  const coordinator = new DeliveryCoordinator({
    store,
    dedup: new DedupGate(store, now),
    retries,
    adapter: new ContentAdapter(),
    dispatcher: new ChannelDispatcher(registry, { sendTimeoutMs: config.delivery.sendTimeoutMs }),
    source,
    recipientNames: Object.fromEntries(config.recipients.map((recipient) => [recipient.id, recipient.displayName])),
  });

  const jobs = new JobScheduler();
  const scheduler = new WeekLetterScheduler(jobs, coordinator, retries, {
    recipients: config.recipients.map((recipient) => recipient.id),
    checkCron: config.scheduling.checkCron,
    retryPollCron: config.scheduling.retryPollCron,
    timezone: config.scheduling.timezone,
    postOnStartup: config.weekLetter.postOnStartup,
    now,
  });

  return {
    config,
    db,
    store,
    retries,
    registry,
    coordinator,
    jobs,
    scheduler,
    async close() {
      scheduler.stop();
      jobs.stopAll();
      await registry.stopAll();
      db.close();
    },
  };
}
