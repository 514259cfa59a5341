import fs from 'node:fs/promises';
import path from 'node:path';

const LOG_DIR = path.resolve(process.env.WEEKLETTER_LOG_DIR ?? 'memory/logs');
const REDACTED = '[REDACTED]';

/** Env keys whose values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN', 'SLACK_WEBHOOK_URL'];

const SENSITIVE_PATTERNS: RegExp[] = [
    // Telegram bot tokens: <bot id>:<35 char secret>
    /\b\d{6,}:[A-Za-z0-9_-]{30,}\b/g,
    // Slack incoming webhook paths
    /https:\/\/hooks\.slack\.com\/services\/[A-Za-z0-9/_-]+/g,
    // key=value style secrets
    /\b(token|secret|password|api[_-]?key)\s*[=:]\s*[^\s,;]+/gi,
];

/**
 * Remove secrets from free text before it is persisted or printed.
 * Redacts the raw values of known sensitive env vars wherever they appear,
 * plus token-shaped substrings.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.trim().length >= 8) {
            scrubbed = scrubbed.split(value.trim()).join(REDACTED);
        }
    }

    for (const pattern of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, (match, label: unknown) =>
            typeof label === 'string' && match.toLowerCase().startsWith(label.toLowerCase())
                ? `${label}=${REDACTED}`
                : REDACTED,
        );
    }

    return scrubbed;
}

function dailyLogPath(now: Date): string {
    return path.join(LOG_DIR, `${now.toISOString().slice(0, 10)}.md`);
}

/**
 * Append an operational note to today's markdown log. Never rejects; write
 * failures are reported on stderr.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const line = `- [${now.toISOString()}] ${scrubSensitiveText(message)}\n`;

    try {
        await fs.mkdir(LOG_DIR, { recursive: true });
        await fs.appendFile(dailyLogPath(now), line, 'utf8');
    } catch (err) {
        console.error('[Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
    }
}
