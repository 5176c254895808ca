import type { SessionData, SessionStore } from "./SessionStore";
import {
    decodeValue,
    encodeValue,
    resolveSerializer,
    type SerializedData,
    type Serializer,
    type SerializerInput,
} from "../serializer/Serializer";
import { assertKey, normalizeTtl, nowSeconds } from "../utils/time";

type Entry = { data: SerializedData; expiration: number };

export type MapSessionStoreOptions<TValue> = {
    serializer?: SerializerInput<TValue>;
    cleanupIntervalSeconds?: number; // default 60
    maxSize?: number;
};

/**
 * In-memory {@link SessionStore}. Values are kept in serialized form so the
 * configured codec behaves exactly as it would against a database.
 */
export class MapSessionStore<TValue = SessionData> implements SessionStore<TValue> {
    private readonly map = new Map<string, Entry>();
    private readonly serializer: Serializer<TValue>;
    private readonly maxSize: number | undefined;
    private readonly cleanupTimer: NodeJS.Timeout;

    constructor(options?: MapSessionStoreOptions<TValue>) {
        this.serializer = resolveSerializer(options?.serializer);
        this.maxSize = options?.maxSize;

        const interval = (options?.cleanupIntervalSeconds ?? 60) * 1000;
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref?.();
    }

    async get(key: string): Promise<TValue | null> {
        assertKey(key);
        const e = this.map.get(key);
        if (!e || e.expiration <= nowSeconds()) return null;

        return decodeValue(this.serializer, key, e.data);
    }

    async set(key: string, value: TValue, ttlSeconds: number): Promise<void> {
        assertKey(key);
        const ttl = normalizeTtl(ttlSeconds);
        const data = encodeValue(this.serializer, key, value);

        if (this.maxSize && !this.map.has(key) && this.map.size >= this.maxSize) {
            this.cleanup();
            if (this.map.size >= this.maxSize) {
                const oldest = this.map.keys().next();
                if (!oldest.done) this.map.delete(oldest.value);
            }
        }

        this.map.set(key, { data, expiration: nowSeconds() + ttl });
    }

    async remove(key: string): Promise<void> {
        assertKey(key);
        this.map.delete(key);
    }

    async close(): Promise<void> {
        clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    /**
     * Entries held, expired ones included until the next cleanup.
     */
    get size(): number {
        return this.map.size;
    }

    private cleanup(): void {
        const now = nowSeconds();
        for (const [k, e] of this.map.entries()) {
            if (e.expiration <= now) this.map.delete(k);
        }
    }
}
