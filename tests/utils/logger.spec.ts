import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'TELEGRAM_BOT_TOKEN';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'env-secret-leak-value-123456789';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts raw sensitive values even when they appear outside key=value patterns', () => {
    const scrubbed = scrubSensitiveText('diagnostic trace => env-secret-leak-value-123456789 <= should be hidden');

    expect(scrubbed).toBe('diagnostic trace => [REDACTED] <= should be hidden');
  });

  it('redacts token-shaped values', () => {
    const token = `123456789:${'A'.repeat(35)}`;

    expect(scrubSensitiveText(`bot ${token} failed`)).toBe('bot [REDACTED] failed');
    expect(scrubSensitiveText('posting to https://hooks.slack.com/services/T000/B000/placeholder')).toBe(
      'posting to [REDACTED]',
    );
    expect(scrubSensitiveText('token=test-secret sent')).toBe('token=[REDACTED] sent');
  });
});

describe('logThought', () => {
  let logDir: string;
  let previousLogDir: string | undefined;

  beforeEach(async () => {
    logDir = await mkdtemp(path.join(os.tmpdir(), 'weekletter-logs-'));
    previousLogDir = process.env.WEEKLETTER_LOG_DIR;
    process.env.WEEKLETTER_LOG_DIR = logDir;
    vi.resetModules();
  });

  afterEach(async () => {
    if (previousLogDir === undefined) {
      delete process.env.WEEKLETTER_LOG_DIR;
    } else {
      process.env.WEEKLETTER_LOG_DIR = previousLogDir;
    }
    await rm(logDir, { recursive: true, force: true });
  });

  it('appends scrubbed, timestamped lines to the daily log file', async () => {
    const { logThought } = await import('../../src/utils/logger.js');

    await logThought('[Test] password=test-secret rotated');

    const files = await readdir(logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^\d{4}-\d{2}-\d{2}\.md$/);

    const content = await readFile(path.join(logDir, files[0] ?? ''), 'utf8');
    expect(content).toMatch(/^- \[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Test\] password=\[REDACTED\] rotated\n$/);
  });
});
