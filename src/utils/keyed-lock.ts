/**
 * Serializes async work per key. Callers on the same key run one after the
 * other in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
    readonly #tails: Map<string, Promise<void>> = new Map();

    async run<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.#tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.#tails.set(key, tail);

        await previous;
        try {
            return await work();
        } finally {
            release();
            if (this.#tails.get(key) === tail) {
                this.#tails.delete(key);
            }
        }
    }

    /** Number of keys with queued or running work. */
    get activeKeys(): number {
        return this.#tails.size;
    }
}
