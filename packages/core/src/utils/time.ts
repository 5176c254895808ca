import { StoreError } from "../errors";

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

/**
 * Floors a TTL to whole seconds. Zero is accepted and yields an already-expired record.
 */
export function normalizeTtl(ttlSeconds: number): number {
    const ttl = Math.floor(ttlSeconds);
    if (!Number.isFinite(ttl) || ttl < 0) {
        throw new StoreError("INVALID_TTL", "ttlSeconds must be a non-negative number.", undefined, {
            ttlSeconds,
        });
    }
    return ttl;
}

export function assertKey(key: unknown): asserts key is string {
    if (typeof key !== "string" || key.length === 0) {
        throw new StoreError("INVALID_KEY", "Session key must be a non-empty string.");
    }
}
