/**
 * Configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for a merged
 * {@link WeekLetterConfig}. Secret values never appear in messages.
 */

import cron from 'node-cron';
import { isValidTimeZone } from '../utils/period.js';
import { getConfigValue, type WeekLetterConfig } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  /** Dotted path of the affected setting, e.g. `channels.slack.webhookUrl`. */
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Hint for the operator (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  issues: ConfigIssue[];
  /** Channels that are enabled and fully configured. */
  activeChannels: string[];
  validatedAt: string;
}

export class ConfigValidationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Invalid configuration:\n${issues.map((issue) => `  - [${issue.class}] ${issue.key}: ${issue.message}`).join('\n')}`,
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// ── Internal helpers ─────────────────────────────────────────────────────────

const RECIPIENT_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function isHttpsUrl(value: string): boolean {
  try {
    return new URL(value).protocol === 'https:';
  } catch {
    return false;
  }
}

function checkPositive(issues: ConfigIssue[], key: string, value: number, integer: boolean): void {
  if (value > 0 && (!integer || Number.isInteger(value))) return;
  issues.push({
    key,
    class: 'format_error',
    message: `${key} must be a positive ${integer ? 'integer' : 'number'}, got ${value}.`,
    remediation: `Set ${key} to a value greater than zero.`,
  });
}

function checkCron(issues: ConfigIssue[], key: string, expression: string): void {
  if (cron.validate(expression)) return;
  issues.push({
    key,
    class: 'format_error',
    message: `${key} is not a valid cron expression: '${expression}'.`,
    remediation: 'Use five or six space-separated cron fields, e.g. "0 16 * * 0".',
  });
}

function validateTiming(config: WeekLetterConfig, issues: ConfigIssue[]): void {
  const { retryIntervalHours, maxRetryDurationHours } = config.weekLetter;
  checkPositive(issues, 'weekLetter.retryIntervalHours', retryIntervalHours, false);
  checkPositive(issues, 'weekLetter.maxRetryDurationHours', maxRetryDurationHours, false);
  if (retryIntervalHours > 0 && maxRetryDurationHours > 0 && maxRetryDurationHours < retryIntervalHours) {
    issues.push({
      key: 'weekLetter.maxRetryDurationHours',
      class: 'format_error',
      message: 'maxRetryDurationHours is shorter than retryIntervalHours; only one attempt would ever be made.',
      remediation: 'Raise maxRetryDurationHours or lower retryIntervalHours.',
    });
  }
  checkPositive(issues, 'delivery.sendTimeoutMs', config.delivery.sendTimeoutMs, true);
  checkCron(issues, 'scheduling.checkCron', config.scheduling.checkCron);
  checkCron(issues, 'scheduling.retryPollCron', config.scheduling.retryPollCron);
  const { timezone } = config.scheduling;
  if (timezone !== null && !isValidTimeZone(timezone)) {
    issues.push({
      key: 'scheduling.timezone',
      class: 'format_error',
      message: `scheduling.timezone is not a known time zone: '${timezone}'.`,
      remediation: 'Use an IANA zone name such as "Europe/Copenhagen", or null for UTC.',
    });
  }
}

function validateRecipients(config: WeekLetterConfig, issues: ConfigIssue[]): void {
  if (config.recipients.length === 0) {
    issues.push({
      key: 'recipients',
      class: 'missing_required',
      message: 'No recipients are configured.',
      remediation: 'Add at least one entry such as { "id": "emma", "displayName": "Emma" } to recipients.',
    });
    return;
  }

  const seen = new Set<string>();
  for (const recipient of config.recipients) {
    if (!RECIPIENT_ID.test(recipient.id)) {
      issues.push({
        key: 'recipients',
        class: 'format_error',
        message: `Recipient id '${recipient.id}' may only contain letters, digits, '.', '_' and '-'.`,
        remediation: 'Rename the recipient; the id is used as a directory name.',
      });
    }
    if (seen.has(recipient.id)) {
      issues.push({
        key: 'recipients',
        class: 'format_error',
        message: `Recipient id '${recipient.id}' is listed more than once.`,
        remediation: 'Remove the duplicate entry.',
      });
    }
    seen.add(recipient.id);
  }
}

function validateTelegram(config: WeekLetterConfig, issues: ConfigIssue[]): boolean {
  const telegram = config.channels.telegram;
  if (!telegram.enabled) return false;

  let ok = true;
  if (!getConfigValue('TELEGRAM_BOT_TOKEN', config)) {
    ok = false;
    issues.push({
      key: 'channels.telegram.botToken',
      class: 'missing_conditional',
      message: 'Telegram is enabled but no bot token is configured.',
      remediation: 'Set TELEGRAM_BOT_TOKEN in the environment or channels.telegram.botToken in the config file.',
    });
  }
  if (telegram.defaultChatId === null && Object.keys(telegram.chatIds).length === 0) {
    ok = false;
    issues.push({
      key: 'channels.telegram.chatIds',
      class: 'missing_conditional',
      message: 'Telegram is enabled but no chat is configured for any recipient.',
      remediation: 'Add channels.telegram.chatIds entries or a channels.telegram.defaultChatId.',
    });
  }
  return ok;
}

function validateSlack(config: WeekLetterConfig, issues: ConfigIssue[]): boolean {
  const slack = config.channels.slack;
  if (!slack.enabled) return false;

  const defaultWebhook = getConfigValue('SLACK_WEBHOOK_URL', config);
  const hooks = Object.entries(slack.webhooks);

  if (!defaultWebhook && hooks.length === 0) {
    issues.push({
      key: 'channels.slack.webhookUrl',
      class: 'missing_conditional',
      message: 'Slack is enabled but no webhook is configured.',
      remediation: 'Set SLACK_WEBHOOK_URL or add channels.slack.webhooks entries.',
    });
    return false;
  }

  let ok = true;
  if (defaultWebhook && !isHttpsUrl(defaultWebhook)) {
    ok = false;
    issues.push({
      key: 'channels.slack.webhookUrl',
      class: 'format_error',
      message: 'The default Slack webhook is not an https URL.',
      remediation: 'Copy the incoming-webhook URL from the Slack app settings.',
    });
  }
  for (const [recipientId, url] of hooks) {
    if (isHttpsUrl(url)) continue;
    ok = false;
    issues.push({
      key: `channels.slack.webhooks.${recipientId}`,
      class: 'format_error',
      message: `The Slack webhook for '${recipientId}' is not an https URL.`,
      remediation: 'Copy the incoming-webhook URL from the Slack app settings.',
    });
  }
  return ok;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate a merged configuration.
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateConfig(
  config: WeekLetterConfig,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const activeChannels: string[] = [];

  validateTiming(config, issues);
  validateRecipients(config, issues);
  if (validateTelegram(config, issues)) activeChannels.push('telegram');
  if (validateSlack(config, issues)) activeChannels.push('slack');

  return {
    ok: issues.length === 0,
    issues,
    activeChannels,
    validatedAt: now().toISOString(),
  };
}

/** Throw {@link ConfigValidationError} when the configuration has any issue. */
export function assertConfig(config: WeekLetterConfig): void {
  const result = validateConfig(config);
  if (!result.ok) {
    throw new ConfigValidationError(result.issues);
  }
}
