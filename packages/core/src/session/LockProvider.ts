/**
 * Lock abstraction used to serialize writers of the same key.
 */
export interface LockProvider {
    withLock<T>(key: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T>;
}

/**
 * Lock provider that executes immediately without acquiring any lock.
 */
export class NoopLockProvider implements LockProvider {
    async withLock<T>(_key: string, _ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
        return fn();
    }
}

/**
 * Lock provider that serializes callers sharing a key within this process.
 *
 * Holders queue behind each other. A holder still running after `ttlSeconds`
 * loses the lock and the next waiter proceeds, as with an expiring Redis lock;
 * a TTL of zero or less never expires.
 */
export class InProcessLockProvider implements LockProvider {
    private readonly tails = new Map<string, Promise<void>>();

    async withLock<T>(key: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => {};
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        const expiry = ttlSeconds > 0 ? setTimeout(release, ttlSeconds * 1000) : undefined;
        expiry?.unref?.();
        try {
            return await fn();
        } finally {
            clearTimeout(expiry);
            release();
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }

    /**
     * Number of keys with a pending or running holder.
     */
    get size(): number {
        return this.tails.size;
    }
}
