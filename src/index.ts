#!/usr/bin/env node
import { readConfig } from './config/json-config.js';
import { assertConfig } from './config/config-validator.js';
import { runCliCommand } from './core/cli.js';
import { createRuntime } from './core/runtime.js';
import { logThought } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

async function main(argv: string[]): Promise<void> {
    // ── One-shot CLI commands (bypass service startup) ───────────────────────
    if (await runCliCommand(argv)) {
        return;
    }

    const config = await readConfig();
    assertConfig(config);

    const runtime = createRuntime(config);
    await runtime.registry.startAll();

    const enabled = runtime.registry.listEnabled().map((channel) => channel.platformId);
    if (enabled.length === 0) {
        console.warn('[WeekLetter] No channels are enabled; letters will be reported as no_recipients.');
    }
    console.log(`Week-letter courier started (${enabled.join(', ') || 'no channels'}).`);

    // ── Graceful shutdown ────────────────────────────────────────────────────
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        await logThought(`[WeekLetter] Received ${signal}; shutting down.`);
        await runtime.close();
        process.exit(0);
    };
    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });

    await runtime.scheduler.start();
}

main(process.argv.slice(2)).catch((err: unknown) => {
    console.error(`[WeekLetter] Fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
});
