import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm } from 'node:fs/promises';
import {
  formatRetryState,
  formatTickEntry,
  handleHelpCli,
  handleUnknownCommand,
  runCliCommand,
  type CliContext,
} from '../../src/core/cli.js';
import { createRuntime } from '../../src/core/runtime.js';
import { DEFAULT_CONFIG, type WeekLetterConfig } from '../../src/config/json-config.js';
import { FakeChannel, MemoryDocumentSource, createClock } from '../harness/fake-channel.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

const WEEK_42 = { week: 42, year: 2024 };

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  // Reset exitCode before each test
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when no help flag is present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['check'])).toBe(false);
    expect(handleHelpCli(['channels', 'test'])).toBe(false);
  });

  it('prints help for --help, -h and help', () => {
    for (const argv of [['--help'], ['-h'], ['help'], ['check', '--help']]) {
      consoleOutput = [];
      expect(handleHelpCli(argv)).toBe(true);
      expect(consoleOutput.join('\n')).toMatch(/^Usage: weekletter/);
      expect(process.exitCode).toBe(0);
    }
  });

  it('help output includes known commands', () => {
    handleHelpCli(['--help']);
    const output = consoleOutput.join('\n');
    expect(output).toContain('retry-reset <recipient> <week> <year>');
    expect(output).toContain('channels test');
    expect(output).toContain('config init [--force]');
  });

  it('warns that check must not run beside the service', () => {
    handleHelpCli(['--help']);
    expect(consoleOutput.join('\n')).toContain(
      '(stop the running service first: two processes on one\n'
        + '                                     database do not share the per-letter lock)',
    );
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('returns false when there is no command', () => {
    expect(handleUnknownCommand([])).toBe(false);
    expect(process.exitCode).toBeUndefined();
  });

  it('reports an unknown command', () => {
    expect(handleUnknownCommand(['deliver'])).toBe(true);
    expect(consoleErrors).toEqual([
      "[CLI] Unknown command: 'deliver'",
      "Run 'weekletter --help' to see available commands.",
    ]);
    expect(process.exitCode).toBe(1);
  });
});

// ── Formatting ───────────────────────────────────────────────────────────────

describe('formatTickEntry', () => {
  it('describes each delivery outcome on one line', () => {
    expect(formatTickEntry({
      recipientId: 'emma',
      period: WEEK_42,
      ok: true,
      result: {
        status: 'delivered',
        recipientId: 'emma',
        period: WEEK_42,
        contentHash: 'h',
        outcomes: {
          telegram: { ok: true, chunks: 1, durationMs: 3 },
          slack: { ok: false, error: 'down', durationMs: 2 },
        },
      },
    })).toBe('emma  week 42/2024  delivered via telegram');

    expect(formatTickEntry({
      recipientId: 'emma',
      period: WEEK_42,
      ok: true,
      result: { status: 'exhausted_retries', recipientId: 'emma', period: WEEK_42, attemptCount: 24, reason: 'down', outcomes: {} },
    })).toBe('emma  week 42/2024  exhausted after 24 attempt(s): down');

    expect(formatTickEntry({ recipientId: 'emma', period: WEEK_42, ok: false, error: 'database is locked' })).toBe(
      'emma  week 42/2024  failed: database is locked',
    );
  });
});

describe('formatRetryState', () => {
  it('shows progress and the next attempt', () => {
    expect(formatRetryState({
      recipientId: 'noah',
      period: WEEK_42,
      attemptCount: 24,
      firstAttemptAt: new Date('2024-10-13T16:00:00.000Z'),
      lastAttemptAt: new Date('2024-10-15T14:00:00.000Z'),
      nextAttemptAt: null,
      maxAttempts: 24,
      succeeded: false,
      lastError: null,
    })).toBe('noah  week 42/2024  24/24  no further attempts');
  });
});

// ── Commands against a runtime ───────────────────────────────────────────────

describe('runCliCommand', () => {
  let tempDir: string;
  let config: WeekLetterConfig;
  let channel: FakeChannel;
  let source: MemoryDocumentSource;
  let context: CliContext;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'weekletter-cli-'));
    config = structuredClone(DEFAULT_CONFIG);
    config.recipients = [
      { id: 'emma', displayName: 'Emma' },
      { id: 'noah', displayName: 'Noah' },
    ];
    channel = new FakeChannel({ platformId: 'telegram', preferredFormat: 'html' });
    source = new MemoryDocumentSource();
    const clock = createClock('2024-10-13T16:00:00.000Z');
    const databasePath = path.join(tempDir, 'week-letters.db');

    context = {
      loadConfig: async () => config,
      openRuntime: (loaded) => createRuntime(loaded, { databasePath, channels: [channel], source, now: clock.now }),
      configPath: path.join(tempDir, 'weekletter.json'),
    };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns false without a command so the caller starts the schedule', async () => {
    await expect(runCliCommand([], context)).resolves.toBe(false);
  });

  it('runs the weekly check and lists the resulting retries', async () => {
    source.publish('emma', WEEK_42, '<h1>Hi</h1><p>Party Friday</p>');

    await expect(runCliCommand(['check'], context)).resolves.toBe(true);

    expect(consoleOutput).toEqual([
      'emma  week 42/2024  delivered via telegram',
      'noah  week 42/2024  retrying (attempt 1, next 2024-10-13T18:00:00.000Z): Week letter is not available yet.',
    ]);
    expect(channel.sent).toEqual([
      { recipientId: 'emma', text: '<b>Week letter for Emma, week 42/2024</b>\n\n<b>Hi</b>\n\nParty Friday' },
    ]);
    expect(channel.started).toBe(1);
    expect(channel.stopped).toBe(1);
    expect(process.exitCode).toBe(0);

    consoleOutput = [];
    await runCliCommand(['retries'], context);

    expect(consoleOutput).toEqual([
      'Pending (1):',
      '  noah  week 42/2024  1/24  next 2024-10-13T18:00:00.000Z  Week letter is not available yet.',
      'Exhausted (0):',
    ]);
  });

  it('skips letters that a previous run already delivered', async () => {
    source.publish('emma', WEEK_42, '<p>Swimming</p>');
    config.recipients = [{ id: 'emma', displayName: 'Emma' }];

    await runCliCommand(['check'], context);
    consoleOutput = [];
    await runCliCommand(['check'], context);

    expect(consoleOutput).toEqual(['emma  week 42/2024  skipped (already delivered)']);
    expect(channel.sent).toHaveLength(1);
  });

  it('reports when no recipient is configured', async () => {
    config.recipients = [];

    await runCliCommand(['check'], context);

    expect(consoleOutput).toEqual(['No recipients configured.']);
    expect(process.exitCode).toBe(0);
  });

  it('resets a retry record', async () => {
    config.recipients = [{ id: 'noah', displayName: 'Noah' }];
    await runCliCommand(['check'], context);
    consoleOutput = [];

    await runCliCommand(['retry-reset', 'noah', '42', '2024'], context);
    expect(consoleOutput).toEqual(['Retry record for noah week 42/2024 removed.']);
    expect(process.exitCode).toBe(0);

    await runCliCommand(['retry-reset', 'noah', '42', '2024'], context);
    expect(consoleErrors).toEqual(['No retry record for noah week 42/2024.']);
    expect(process.exitCode).toBe(1);
  });

  it('validates retry-reset arguments before opening the runtime', async () => {
    const openRuntime = vi.spyOn(context, 'openRuntime');

    await runCliCommand(['retry-reset', 'noah'], context);
    await runCliCommand(['retry-reset', 'noah', '60', '2024'], context);

    expect(consoleErrors).toEqual([
      'Usage: weekletter retry-reset <recipient> <week> <year>',
      '[CLI] Week must be an integer between 1 and 53, got 60.',
    ]);
    expect(process.exitCode).toBe(1);
    expect(openRuntime).not.toHaveBeenCalled();
  });

  it('tests channel connections', async () => {
    await runCliCommand(['channels', 'test'], context);
    expect(consoleOutput).toEqual(['telegram: ok']);
    expect(process.exitCode).toBe(0);

    channel.mode = 'fail';
    consoleOutput = [];
    await runCliCommand(['channels', 'test'], context);
    expect(consoleOutput).toEqual(['telegram: FAILED']);
    expect(process.exitCode).toBe(1);
  });

  it('requires the test subcommand for channels', async () => {
    await runCliCommand(['channels'], context);

    expect(consoleErrors).toEqual(['Usage: weekletter channels test']);
    expect(process.exitCode).toBe(1);
  });

  it('writes a default config only once without --force', async () => {
    const configPath = path.join(tempDir, 'weekletter.json');

    await runCliCommand(['config', 'init'], context);
    expect(consoleOutput).toEqual([`Wrote default config to ${configPath}.`]);
    expect(process.exitCode).toBe(0);

    await runCliCommand(['config', 'init'], context);
    expect(consoleErrors).toEqual([`Config already exists at ${configPath}. Use --force to overwrite.`]);
    expect(process.exitCode).toBe(1);

    await runCliCommand(['config', 'init', '--force'], context);
    expect(consoleOutput).toHaveLength(2);
    expect(process.exitCode).toBe(0);
  });

  it('validates the loaded config', async () => {
    await runCliCommand(['config', 'validate'], context);
    expect(consoleOutput).toEqual([
      `Config at ${path.join(tempDir, 'weekletter.json')} is valid. Active channels: none.`,
    ]);
    expect(process.exitCode).toBe(0);

    config.recipients = [];
    await runCliCommand(['config', 'validate'], context);
    expect(consoleErrors).toEqual([
      '[missing_required] recipients: No recipients are configured. '
        + 'Add at least one entry such as { "id": "emma", "displayName": "Emma" } to recipients.',
    ]);
    expect(process.exitCode).toBe(1);
  });
});
