/**
 * MutationSerializer — FIFO queue per key
 *
 * Dashboard writes replace whole lists, so two concurrent compositions on
 * one dashboard would silently drop one of them. Calls sharing a key run
 * strictly one after the other; different keys never wait on each other.
 *
 * @module
 */
export class MutationSerializer {
    /** Tail of the queue for each key */
    private readonly _chains = new Map<string, Promise<void>>();

    async serialize<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const prev = this._chains.get(key) ?? Promise.resolve();

        let releaseLock: () => void = () => undefined;
        const lock = new Promise<void>(resolve => { releaseLock = resolve; });
        this._chains.set(key, lock);

        try {
            await prev;
            return await fn();
        } finally {
            releaseLock();
            if (this._chains.get(key) === lock) {
                this._chains.delete(key);
            }
        }
    }

    /** Keys with a call running or queued. 0 when idle. */
    get activeChains(): number {
        return this._chains.size;
    }
}
