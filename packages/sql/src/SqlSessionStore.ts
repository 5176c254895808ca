import {
  NoopLockProvider,
  StoreError,
  assertKey,
  decodeValue,
  encodeValue,
  normalizeTtl,
  nowSeconds,
  resolveSerializer,
  type LockProvider,
  type Logger,
  type SerializedData,
  type SerializerInput,
  type Serializer,
  type SessionData,
  type SessionStore,
} from "@stashline/core";
import {
  SqlClientManager,
  isUniqueViolation,
  type SqlClientLike,
  type SqlClientWrapper,
  type SqlConnectionInput,
  type SqlConnectionParams,
  type SqlStatementLike,
} from "./internal/sqlClient";
import {
  DEFAULT_NAMING,
  buildSqlTemplates,
  type IdentifierQuoter,
  type SqlNaming,
  type SqlTemplates,
} from "./sqlTemplates";

/**
 * Configuration for {@link SqlSessionStore}.
 */
export type SqlSessionStoreOptions<TValue> = Partial<SqlNaming> & {
  serializer?: SerializerInput<TValue>;
  /**
   * How table and column names are written into the SQL. Defaults to ANSI
   * double quotes; pass `backtickQuote` for MySQL or `bareIdentifier` to
   * interpolate names as configured.
   */
  quoteIdentifier?: IdentifierQuoter;
  /**
   * What to do when the insert branch of `set` hits a unique-key violation,
   * either from a concurrent writer or from an expired row still holding the
   * key. `"update"` (default) overwrites that row; `"throw"` surfaces the driver error.
   */
  insertConflict?: "throw" | "update";
  lockProvider?: LockProvider;
  lockKeyPrefix?: string;
  /**
   * Upper bound on how long one `set` holds the lock before the next writer of
   * the same key may proceed. Passed to the lock provider as its TTL.
   */
  lockTtlSeconds?: number;
  logger?: Logger;
};

const DEFAULT_LOCK_KEY_PREFIX = "stashline:set:";
const DEFAULT_LOCK_TTL_SECONDS = 10;

/**
 * SQL-backed implementation of the stashline `SessionStore`.
 *
 * Rows hold `(key, data, expiration)` where `expiration` is epoch seconds. A row
 * whose expiration is not strictly after the current time is treated as absent;
 * expired rows stay in the table until overwritten or removed.
 */
export class SqlSessionStore<TValue = SessionData> implements SessionStore<TValue> {
  readonly naming: Readonly<SqlNaming>;
  readonly templates: SqlTemplates;
  private readonly serializer: Serializer<TValue>;
  private readonly clientManager: SqlClientManager;
  private readonly insertConflict: "throw" | "update";
  private readonly lockProvider: LockProvider;
  private readonly lockKeyPrefix: string;
  private readonly lockTtlSeconds: number;
  private readonly logger: Logger | undefined;

  constructor(connection: SqlConnectionInput, options?: SqlSessionStoreOptions<TValue>) {
    this.naming = Object.freeze({
      table: options?.table ?? DEFAULT_NAMING.table,
      keyColumn: options?.keyColumn ?? DEFAULT_NAMING.keyColumn,
      dataColumn: options?.dataColumn ?? DEFAULT_NAMING.dataColumn,
      expirationColumn: options?.expirationColumn ?? DEFAULT_NAMING.expirationColumn,
    });
    this.templates = buildSqlTemplates(this.naming, options?.quoteIdentifier);
    this.serializer = resolveSerializer(options?.serializer);
    this.insertConflict = options?.insertConflict ?? "update";
    this.lockProvider = options?.lockProvider ?? new NoopLockProvider();
    this.lockKeyPrefix = options?.lockKeyPrefix ?? DEFAULT_LOCK_KEY_PREFIX;
    this.lockTtlSeconds = options?.lockTtlSeconds ?? DEFAULT_LOCK_TTL_SECONDS;
    this.logger = options?.logger;
    this.clientManager = new SqlClientManager(connection, this.logger);

    if (this.insertConflict !== "throw" && this.insertConflict !== "update") {
      throw new StoreError("INVALID_CONFIG", `Unknown insertConflict mode: ${String(this.insertConflict)}`);
    }
  }

  async get(key: string): Promise<TValue | null> {
    assertKey(key);
    const statement = await this.clientManager.prepareCached(this.templates.select);
    const row = statement.get(key, nowSeconds());
    if (row === undefined || row === null) {
      return null;
    }

    return decodeValue(this.serializer, key, this.readData(key, row));
  }

  async set(key: string, value: TValue, ttlSeconds: number): Promise<void> {
    assertKey(key);
    const ttl = normalizeTtl(ttlSeconds);
    const data = toBindable(encodeValue(this.serializer, key, value));

    await this.lockProvider.withLock(`${this.lockKeyPrefix}${key}`, this.lockTtlSeconds, async () => {
      const now = nowSeconds();
      const expiration = now + ttl;

      const exists = await this.clientManager.prepareCached(this.templates.exists);
      const live = exists.get(key, now);

      if (live !== undefined && live !== null) {
        this.logger?.debug("Updating live session row.", { key, expiration });
        await this.runUpdate(key, data, expiration);
        return;
      }

      this.logger?.debug("Inserting session row.", { key, expiration });
      const insert = await this.clientManager.prepareCached(this.templates.insert);
      try {
        insert.run(key, data, expiration);
      } catch (error) {
        if (this.insertConflict !== "update" || !isUniqueViolation(error)) {
          throw error;
        }
        this.logger?.warn("Insert hit an existing row; updating instead.", { key });
        await this.runUpdate(key, data, expiration);
      }
    });
  }

  async remove(key: string): Promise<void> {
    assertKey(key);
    const statement = await this.clientManager.prepareCached(this.templates.delete);
    statement.run(key);
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  /**
   * Exposes the client manager so callers can share the connection, e.g. for
   * schema setup or an expired-row sweep.
   */
  getClientManager(): SqlClientManager {
    return this.clientManager;
  }

  private async runUpdate(key: string, data: SerializedData, expiration: number): Promise<void> {
    const update = await this.clientManager.prepareCached(this.templates.update);
    update.run(data, expiration, key);
  }

  private readData(key: string, row: unknown): SerializedData {
    const column = this.naming.dataColumn;
    const raw = typeof row === "object" && row !== null ? (row as Record<string, unknown>)[column] : undefined;

    if (typeof raw === "string" || raw instanceof Uint8Array) {
      return raw;
    }

    throw new StoreError("DESERIALIZATION_FAILED", `Session "${key}" has no readable ${column} column.`, undefined, {
      key,
      column,
    });
  }
}

// Drivers bind Buffer as a blob; a bare Uint8Array is not accepted by all of them.
function toBindable(data: SerializedData): SerializedData {
  if (typeof data === "string" || Buffer.isBuffer(data)) {
    return data;
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export type { SqlClientLike, SqlClientWrapper, SqlConnectionInput, SqlConnectionParams, SqlStatementLike };
