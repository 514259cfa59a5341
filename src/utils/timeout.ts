import { ChannelTimeoutError } from './errors.js';

/**
 * Race `work` against a timer. The timer is always cleared, so a settled
 * send leaves nothing running. When the timer wins, the signal handed to
 * `work` is aborted; work must check it before starting its next step.
 */
export async function withTimeout<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
): Promise<T> {
    const controller = new AbortController();
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        return work(controller.signal);
    }

    let timeoutHandle: NodeJS.Timeout | null = null;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
            const error = new ChannelTimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([work(controller.signal), timeoutPromise]);
    } finally {
        if (timeoutHandle) {
            clearTimeout(timeoutHandle);
        }
    }
}
