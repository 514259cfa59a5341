import * as fs from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';

export interface RecipientConfig {
    /** Stable identifier; also the letters sub-directory name. */
    id: string;
    displayName: string;
}

export interface TelegramChannelConfig {
    enabled: boolean;
    botToken: string;
    /** Chat used for recipients without their own entry in `chatIds`. */
    defaultChatId: string | null;
    chatIds: Record<string, string>;
}

export interface SlackChannelConfig {
    enabled: boolean;
    /** Webhook used for recipients without their own entry in `webhooks`. */
    webhookUrl: string;
    webhooks: Record<string, string>;
}

export interface WeekLetterConfig {
    weekLetter: {
        retryIntervalHours: number;
        maxRetryDurationHours: number;
        postOnStartup: boolean;
    };
    scheduling: {
        checkCron: string;
        retryPollCron: string;
        /** IANA zone for both cron expressions; `null` uses the process zone. */
        timezone: string | null;
    };
    delivery: {
        sendTimeoutMs: number;
    };
    storage: {
        databasePath: string;
    };
    source: {
        lettersDir: string;
    };
    recipients: RecipientConfig[];
    channels: {
        telegram: TelegramChannelConfig;
        slack: SlackChannelConfig;
    };
}

export const DEFAULT_CONFIG_FILE = 'weekletter.json';

export const DEFAULT_CONFIG: WeekLetterConfig = {
    weekLetter: {
        retryIntervalHours: 2,
        maxRetryDurationHours: 48,
        postOnStartup: false,
    },
    scheduling: {
        checkCron: '0 16 * * 0',
        retryPollCron: '*/10 * * * *',
        timezone: null,
    },
    delivery: {
        sendTimeoutMs: 15_000,
    },
    storage: {
        databasePath: 'memory/week-letters.db',
    },
    source: {
        lettersDir: 'memory/letters',
    },
    recipients: [],
    channels: {
        telegram: {
            enabled: false,
            botToken: '',
            defaultChatId: null,
            chatIds: {},
        },
        slack: {
            enabled: false,
            webhookUrl: '',
            webhooks: {},
        },
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.WEEKLETTER_CONFIG_PATH) {
        return path.resolve(process.env.WEEKLETTER_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function readConfig(overridePath?: string): Promise<WeekLetterConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        const parsed: unknown = JSON.parse(rawData);
        return mergeWithDefaults(parsed);
    } catch (error) {
        if (isMissingFile(error)) return mergeWithDefaults({});
        throw new Error(`Failed to parse config file at ${targetPath}: ${describe(error)}`);
    }
}

export async function writeConfig(config: WeekLetterConfig, overridePath?: string): Promise<string> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
        return targetPath;
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${describe(error)}`);
    }
}

// ── Merging ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

/** Strings and numbers (Telegram chat ids are often written as numbers). */
function pickId(value: unknown): string | null {
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

function pickIdMap(source: Record<string, unknown>, key: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [recipientId, value] of Object.entries(section(source, key))) {
        const id = pickId(value);
        if (id !== null) result[recipientId] = id;
    }
    return result;
}

function pickRecipients(value: unknown): RecipientConfig[] {
    if (!Array.isArray(value)) return [];
    const recipients: RecipientConfig[] = [];
    for (const entry of value) {
        if (typeof entry === 'string' && entry.trim()) {
            recipients.push({ id: entry.trim(), displayName: entry.trim() });
        } else if (isRecord(entry) && typeof entry.id === 'string' && entry.id.trim()) {
            const id = entry.id.trim();
            recipients.push({ id, displayName: pickString(entry, 'displayName', id) });
        }
    }
    return recipients;
}

/** Overlay a parsed JSON document on {@link DEFAULT_CONFIG}. Values of the wrong type keep the default. */
export function mergeWithDefaults(loaded: unknown): WeekLetterConfig {
    const root: Record<string, unknown> = isRecord(loaded) ? loaded : {};
    const defaults = DEFAULT_CONFIG;

    const weekLetter = section(root, 'weekLetter');
    const scheduling = section(root, 'scheduling');
    const delivery = section(root, 'delivery');
    const storage = section(root, 'storage');
    const source = section(root, 'source');
    const channels = section(root, 'channels');
    const telegram = section(channels, 'telegram');
    const slack = section(channels, 'slack');

    const timezone = scheduling.timezone;

    return {
        weekLetter: {
            retryIntervalHours: pickNumber(weekLetter, 'retryIntervalHours', defaults.weekLetter.retryIntervalHours),
            maxRetryDurationHours: pickNumber(weekLetter, 'maxRetryDurationHours', defaults.weekLetter.maxRetryDurationHours),
            postOnStartup: pickBoolean(weekLetter, 'postOnStartup', defaults.weekLetter.postOnStartup),
        },
        scheduling: {
            checkCron: pickString(scheduling, 'checkCron', defaults.scheduling.checkCron),
            retryPollCron: pickString(scheduling, 'retryPollCron', defaults.scheduling.retryPollCron),
            timezone: typeof timezone === 'string' && timezone.trim() ? timezone.trim() : defaults.scheduling.timezone,
        },
        delivery: {
            sendTimeoutMs: pickNumber(delivery, 'sendTimeoutMs', defaults.delivery.sendTimeoutMs),
        },
        storage: {
            databasePath: pickString(storage, 'databasePath', defaults.storage.databasePath),
        },
        source: {
            lettersDir: pickString(source, 'lettersDir', defaults.source.lettersDir),
        },
        recipients: pickRecipients(root.recipients),
        channels: {
            telegram: {
                enabled: pickBoolean(telegram, 'enabled', defaults.channels.telegram.enabled),
                botToken: pickString(telegram, 'botToken', defaults.channels.telegram.botToken),
                defaultChatId: pickId(telegram.defaultChatId) ?? defaults.channels.telegram.defaultChatId,
                chatIds: pickIdMap(telegram, 'chatIds'),
            },
            slack: {
                enabled: pickBoolean(slack, 'enabled', defaults.channels.slack.enabled),
                webhookUrl: pickString(slack, 'webhookUrl', defaults.channels.slack.webhookUrl),
                webhooks: pickIdMap(slack, 'webhooks'),
            },
        },
    };
}

// ── Cached access ───────────────────────────────────────────────────────────

let cachedConfig: WeekLetterConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

/** Synchronously (re)load the config file into the cache and return it. */
export function reloadConfigSync(overridePath?: string): WeekLetterConfig {
    const configPath = getConfigPath(overridePath);
    let config = mergeWithDefaults({});
    try {
        if (existsSync(configPath)) {
            config = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = config;
    return config;
}

export function getCachedConfig(): WeekLetterConfig {
    return cachedConfig ?? reloadConfigSync();
}

/** Keys that may be overridden from the environment. Secrets belong there rather than in the file. */
export type ConfigKey =
    | 'TELEGRAM_BOT_TOKEN'
    | 'SLACK_WEBHOOK_URL'
    | 'WEEKLETTER_DATABASE_PATH'
    | 'WEEKLETTER_LETTERS_DIR';

function fileValue(key: ConfigKey, config: WeekLetterConfig): string {
    switch (key) {
        case 'TELEGRAM_BOT_TOKEN': return config.channels.telegram.botToken;
        case 'SLACK_WEBHOOK_URL': return config.channels.slack.webhookUrl;
        case 'WEEKLETTER_DATABASE_PATH': return config.storage.databasePath;
        case 'WEEKLETTER_LETTERS_DIR': return config.source.lettersDir;
    }
}

/**
 * Resolve a value from the environment first, then from the config.
 * Empty strings count as unset.
 */
export function getConfigValue(key: ConfigKey, config: WeekLetterConfig = getCachedConfig()): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const jsonValue = fileValue(key, config);
    return jsonValue.trim() !== '' ? jsonValue : undefined;
}
