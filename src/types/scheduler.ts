/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a new repeating job. */
export interface JobConfig {
    /** Unique identifier for this job (e.g. 'week-letter-retries'). */
    id: string;
    /** A cron expression defining the schedule (node-cron format). */
    cronExpression: string;
    description: string;
    /** The async callback to execute on each tick. */
    handler: () => Promise<void> | void;
    /**
     * If true, the job will start immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
    /** IANA time zone the cron expression is evaluated in. Defaults to the process zone. */
    timezone?: string;
}

/** Read-only snapshot of a registered job's state. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
}

/**
 * Event types emitted by the job scheduler.
 * - 'job:start': fired just before a job handler executes.
 * - 'job:done': fired after a job handler completes successfully.
 * - 'job:error': fired when a job handler throws.
 * - 'job:skipped': fired when a tick arrives while the previous run is still in flight.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error' | 'job:skipped';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
