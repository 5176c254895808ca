import type { Options as BetterSqliteOptions } from "better-sqlite3";
import { StoreError, type Logger } from "@stashline/core";

export interface SqlStatementLike {
  get(...params: unknown[]): unknown;
  run(...params: unknown[]): unknown;
}

/**
 * Minimal database handle the store needs. A `better-sqlite3` `Database`
 * satisfies it as is.
 */
export interface SqlClientLike {
  prepare(sql: string): SqlStatementLike;
  close?(): unknown;
}

export type SqlConnectionParams = {
  filename?: string; // default ":memory:"
  options?: BetterSqliteOptions;
};

export type SqlClientWrapper = {
  client: SqlClientLike;
  manageClient?: boolean;
};

export type SqlConnectionInput = SqlClientLike | SqlClientWrapper | SqlConnectionParams;

const DEFAULT_FILENAME = ":memory:";

/**
 * Owns (or borrows) the database handle and caches prepared statements by SQL text.
 */
export class SqlClientManager {
  private readonly ownClient: boolean;
  private readonly connectionInput: SqlConnectionInput;
  private readonly statements = new Map<string, SqlStatementLike>();
  private client: SqlClientLike | null = null;
  private clientInitPromise: Promise<SqlClientLike> | null = null;
  private closed = false;

  constructor(
    connection: SqlConnectionInput,
    private readonly logger?: Logger,
  ) {
    this.connectionInput = connection;

    if (isSqlClientLike(connection)) {
      this.ownClient = false;
      this.client = connection;
      return;
    }

    if (isClientWrapper(connection)) {
      this.ownClient = connection.manageClient ?? false;
      this.client = connection.client;
      return;
    }

    this.ownClient = true;
  }

  async getClient(): Promise<SqlClientLike> {
    if (this.closed) {
      throw new StoreError("STORE_CLOSED", "The session store has been closed.");
    }

    if (this.client) {
      return this.client;
    }

    if (!this.clientInitPromise) {
      this.clientInitPromise = this.createOwnedClient();
    }

    this.client = await this.clientInitPromise;
    return this.client;
  }

  /**
   * Returns the prepared statement for `sql`, preparing it on first use.
   */
  async prepareCached(sql: string): Promise<SqlStatementLike> {
    const cached = this.statements.get(sql);
    if (cached) {
      return cached;
    }

    const client = await this.getClient();
    const statement = client.prepare(sql);
    this.statements.set(sql, statement);
    return statement;
  }

  get cachedStatementCount(): number {
    return this.statements.size;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.statements.clear();

    if (!this.ownClient) {
      return;
    }

    this.closed = true;
    const client = this.client ?? (this.clientInitPromise ? await this.clientInitPromise : null);
    if (client && typeof client.close === "function") {
      client.close();
      this.logger?.debug("Closed owned SQL connection.");
    }
    this.client = null;
  }

  private async createOwnedClient(): Promise<SqlClientLike> {
    const connection = this.connectionInput;
    if (isSqlClientLike(connection)) {
      return connection;
    }

    if (isClientWrapper(connection)) {
      return connection.client;
    }

    const { default: Database } = await import("better-sqlite3");
    const filename = connection.filename ?? DEFAULT_FILENAME;
    const client = new Database(filename, connection.options);
    this.logger?.debug("Opened owned SQL connection.", { filename });
    return client;
  }
}

export function isSqlClientLike(value: unknown): value is SqlClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as Partial<SqlClientLike>;
  return typeof target.prepare === "function";
}

export function isClientWrapper(value: unknown): value is SqlClientWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  const target = value as { client?: unknown };
  return isSqlClientLike(target.client);
}

/**
 * Recognizes unique/primary-key violations across the drivers the store is
 * commonly paired with (SQLite, PostgreSQL, MySQL).
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  const code = (error as { code?: unknown }).code;
  if (typeof code !== "string") {
    return false;
  }

  return (
    code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
    code === "SQLITE_CONSTRAINT_UNIQUE" ||
    code === "23505" ||
    code === "ER_DUP_ENTRY"
  );
}
