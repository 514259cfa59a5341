import { existsSync } from 'node:fs';
import {
  DEFAULT_CONFIG,
  getConfigPath,
  readConfig,
  writeConfig,
  type WeekLetterConfig,
} from '../config/json-config.js';
import { validateConfig } from '../config/config-validator.js';
import type { DeliveryResult, RetryState } from '../types/delivery.js';
import { formatPeriod, validatePeriod } from '../utils/period.js';
import { errorMessage } from '../utils/errors.js';
import type { TickEntry } from '../services/week-letter-scheduler.js';
import { createRuntime, type Runtime } from './runtime.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: weekletter [command] [options]

Without a command the courier starts its schedule and runs until stopped.

Commands:
  check                              Run the weekly letter check now and print the results
                                     (stop the running service first: two processes on one
                                     database do not share the per-letter lock)
  retries                            List pending and exhausted retries
  retry-reset <recipient> <week> <year>
                                     Forget the retry record so the letter is attempted again
  channels test                      Probe every enabled channel
  config init [--force]              Write a default config file
  config validate                    Check the config file and report issues

Options:
  --help, -h                         Show this help message

Environment:
  WEEKLETTER_CONFIG_PATH             Config file (default ./weekletter.json)
  TELEGRAM_BOT_TOKEN                 Overrides channels.telegram.botToken
  SLACK_WEBHOOK_URL                  Overrides channels.slack.webhookUrl

Examples:
  weekletter config init
  weekletter check
  weekletter retry-reset emma 42 2024
`.trim();

/** What the command handlers need from the outside world. */
export interface CliContext {
  loadConfig: () => Promise<WeekLetterConfig>;
  openRuntime: (config: WeekLetterConfig) => Runtime;
  configPath?: string;
}

export function defaultCliContext(configPath?: string): CliContext {
  return {
    loadConfig: () => readConfig(configPath),
    openRuntime: (config) => createRuntime(config),
    configPath,
  };
}

// ── Formatting ───────────────────────────────────────────────────────────────

function describeResult(result: DeliveryResult): string {
  switch (result.status) {
    case 'delivered':
      return `delivered via ${Object.entries(result.outcomes).filter(([, outcome]) => outcome.ok).map(([id]) => id).join(', ')}`;
    case 'skipped':
      return 'skipped (already delivered)';
    case 'retrying':
      return `retrying (attempt ${result.attemptCount}, next ${result.nextAttemptAt.toISOString()}): ${result.reason}`;
    case 'exhausted_retries':
      return `exhausted after ${result.attemptCount} attempt(s): ${result.reason}`;
    case 'no_recipients':
      return 'no channel configured for this recipient';
    case 'error':
      return `error: ${result.reason}`;
  }
}

export function formatTickEntry(entry: TickEntry): string {
  const head = `${entry.recipientId}  week ${formatPeriod(entry.period)}  `;
  return entry.ok ? head + describeResult(entry.result) : `${head}failed: ${entry.error}`;
}

export function formatRetryState(state: RetryState): string {
  const next = state.nextAttemptAt ? `next ${state.nextAttemptAt.toISOString()}` : 'no further attempts';
  return `${state.recipientId}  week ${formatPeriod(state.period)}  ${state.attemptCount}/${state.maxAttempts}  ${next}  ${state.lastError ?? ''}`.trimEnd();
}

async function withRuntime(context: CliContext, work: (runtime: Runtime) => Promise<void>): Promise<void> {
  const runtime = context.openRuntime(await context.loadConfig());
  try {
    await work(runtime);
  } finally {
    await runtime.close();
  }
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (argv[0] !== 'help' && !argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

export async function handleCheckCli(argv: string[], context: CliContext): Promise<boolean> {
  if (argv[0] !== 'check') return false;

  await withRuntime(context, async (runtime) => {
    await runtime.registry.startAll();
    const entries = await runtime.scheduler.runWeeklyCheck();
    if (entries.length === 0) {
      console.log('No recipients configured.');
    }
    for (const entry of entries) {
      console.log(formatTickEntry(entry));
    }
    const failed = entries.some((entry) => !entry.ok || entry.result.status === 'error');
    process.exitCode = failed ? 1 : 0;
  });
  return true;
}

export async function handleRetriesCli(argv: string[], context: CliContext): Promise<boolean> {
  if (argv[0] !== 'retries') return false;

  await withRuntime(context, async (runtime) => {
    const pending = runtime.retries.getPending();
    const exhausted = runtime.retries.getExhausted();

    console.log(`Pending (${pending.length}):`);
    for (const state of pending) console.log(`  ${formatRetryState(state)}`);
    console.log(`Exhausted (${exhausted.length}):`);
    for (const state of exhausted) console.log(`  ${formatRetryState(state)}`);
    process.exitCode = 0;
  });
  return true;
}

export async function handleRetryResetCli(argv: string[], context: CliContext): Promise<boolean> {
  if (argv[0] !== 'retry-reset') return false;

  const [, recipientId, weekArg, yearArg] = argv;
  const period = { week: Number(weekArg), year: Number(yearArg) };
  if (!recipientId || !weekArg || !yearArg) {
    console.error('Usage: weekletter retry-reset <recipient> <week> <year>');
    process.exitCode = 1;
    return true;
  }
  try {
    validatePeriod(period);
  } catch (error) {
    console.error(`[CLI] ${errorMessage(error)}`);
    process.exitCode = 1;
    return true;
  }

  await withRuntime(context, async (runtime) => {
    const removed = runtime.retries.reset(recipientId, period);
    if (removed) {
      console.log(`Retry record for ${recipientId} week ${formatPeriod(period)} removed.`);
      process.exitCode = 0;
    } else {
      console.error(`No retry record for ${recipientId} week ${formatPeriod(period)}.`);
      process.exitCode = 1;
    }
  });
  return true;
}

export async function handleChannelsCli(argv: string[], context: CliContext): Promise<boolean> {
  if (argv[0] !== 'channels') return false;

  if (argv[1] !== 'test') {
    console.error('Usage: weekletter channels test');
    process.exitCode = 1;
    return true;
  }

  await withRuntime(context, async (runtime) => {
    const results = await runtime.registry.testAll();
    const entries = Object.entries(results);
    if (entries.length === 0) {
      console.error('No channels are enabled.');
      process.exitCode = 1;
      return;
    }
    for (const [platformId, ok] of entries) {
      console.log(`${platformId}: ${ok ? 'ok' : 'FAILED'}`);
    }
    process.exitCode = entries.every(([, ok]) => ok) ? 0 : 1;
  });
  return true;
}

export async function handleConfigCli(argv: string[], context: CliContext): Promise<boolean> {
  if (argv[0] !== 'config') return false;

  const targetPath = getConfigPath(context.configPath);

  if (argv[1] === 'init') {
    if (existsSync(targetPath) && !argv.includes('--force')) {
      console.error(`Config already exists at ${targetPath}. Use --force to overwrite.`);
      process.exitCode = 1;
      return true;
    }
    const written = await writeConfig(DEFAULT_CONFIG, context.configPath);
    console.log(`Wrote default config to ${written}.`);
    process.exitCode = 0;
    return true;
  }

  if (argv[1] === 'validate') {
    const result = validateConfig(await context.loadConfig());
    if (result.ok) {
      console.log(`Config at ${targetPath} is valid. Active channels: ${result.activeChannels.join(', ') || 'none'}.`);
      process.exitCode = 0;
    } else {
      for (const issue of result.issues) {
        console.error(`[${issue.class}] ${issue.key}: ${issue.message} ${issue.remediation}`);
      }
      process.exitCode = 1;
    }
    return true;
  }

  console.error('Usage: weekletter config <init|validate>');
  process.exitCode = 1;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command === undefined) return false;

  console.error(`[CLI] Unknown command: '${command}'`);
  console.error(`Run 'weekletter --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/**
 * Run a one-shot command. Resolves `false` when `argv` holds no command, in
 * which case the caller starts the long-running schedule.
 */
export async function runCliCommand(argv: string[], context: CliContext = defaultCliContext()): Promise<boolean> {
  if (handleHelpCli(argv)) return true;
  if (await handleCheckCli(argv, context)) return true;
  if (await handleRetriesCli(argv, context)) return true;
  if (await handleRetryResetCli(argv, context)) return true;
  if (await handleChannelsCli(argv, context)) return true;
  if (await handleConfigCli(argv, context)) return true;
  return handleUnknownCommand(argv);
}
