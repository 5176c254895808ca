/**
 * Session payload shape handed to stores by the session framework.
 */
export type SessionData = Record<string, unknown>;

/**
 * Storage abstraction implemented by every stashline backend.
 *
 * `get` resolves `null` for keys that are absent or expired; that is never an error.
 */
export interface SessionStore<TValue = SessionData> {
  get(key: string): Promise<TValue | null>;
  set(key: string, value: TValue, ttlSeconds: number): Promise<void>;
  remove(key: string): Promise<void>;
  close?(): Promise<void>;
}
