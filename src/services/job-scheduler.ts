import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    JobConfig,
    JobSnapshot,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

/** Internal bookkeeping for a registered job. */
interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    inFlight: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
}

/**
 * Named, repeating background jobs on top of `node-cron`.
 *
 * A tick that fires while the previous run of the same job is still in flight
 * is skipped, so a slow retry sweep never overlaps itself.
 *
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'week-letter-retries',
 *   cronExpression: '*\/10 * * * *',
 *   description: 'Deliver due week-letter retries',
 *   handler: async () => { … },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Register a new repeating job. Throws if a job with the same ID already exists. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            inFlight: false,
            lastRunAt: null,
            lastError: null,
            runCount: 0,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Run a job's handler once, outside its schedule. Resolves when the run finishes. */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#executeJob(entry);
    }

    /** Stop all running jobs. */
    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        const options = entry.config.timezone ? { timezone: entry.config.timezone } : undefined;
        entry.task = cron.schedule(
            entry.config.cronExpression,
            () => {
                void this.#executeJob(entry);
            },
            options,
        );

        entry.status = 'idle';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;

        if (entry.inFlight) {
            this.#emit({ type: 'job:skipped', jobId: config.id, timestamp: new Date() });
            void logThought(`[JobScheduler] Skipped tick for '${config.id}': previous run still in flight.`);
            return;
        }

        entry.inFlight = true;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        entry.runCount += 1;

        this.#emit({ type: 'job:start', jobId: config.id, timestamp: new Date() });

        try {
            await logThought(`[JobScheduler] Executing job '${config.id}' (${config.cronExpression}).`);
            await config.handler();
            entry.status = 'idle';
            entry.lastError = null;

            this.#emit({ type: 'job:done', jobId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`);

            this.#emit({ type: 'job:error', jobId: config.id, timestamp: new Date(), error: message });
        } finally {
            entry.inFlight = false;
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
