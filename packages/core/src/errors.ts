/**
 * Stable error codes surfaced by stashline stores.
 */
export type ErrorCode =
    | "INVALID_CONFIG"
    | "INVALID_KEY"
    | "INVALID_TTL"
    | "SERIALIZATION_FAILED"
    | "DESERIALIZATION_FAILED"
    | "STORE_CLOSED";

/**
 * Canonical error type used across stashline packages.
 *
 * Driver errors are never wrapped in it; they reach the caller as thrown.
 */
export class StoreError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "StoreError";
        this.details = details;
    }
}

/**
 * Logger contract used by stores for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Type guard for {@link StoreError}.
 */
export function isStoreError(error: unknown): error is StoreError {
    return error instanceof StoreError;
}

