/** The persistence layer could not complete an operation. Fatal for the current delivery. */
export class DeliveryStoreError extends Error {
    readonly operation: string;

    constructor(operation: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Delivery store '${operation}' failed: ${detail}`, { cause });
        this.name = 'DeliveryStoreError';
        this.operation = operation;
    }
}

/** A document was rejected before reaching the pipeline. */
export class DocumentValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DocumentValidationError';
    }
}

/** A channel send did not settle within its time limit. */
export class ChannelTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms.`);
        this.name = 'ChannelTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
