import { StoreError } from "@stashline/core";

/**
 * Table and column names a {@link SqlTemplates} set is derived from.
 */
export type SqlNaming = {
  table: string;
  keyColumn: string;
  dataColumn: string;
  expirationColumn: string;
};

export type SqlTemplates = Readonly<{
  insert: string;
  update: string;
  exists: string;
  select: string;
  delete: string;
}>;

/**
 * Turns one configured name into the identifier text placed in the SQL.
 */
export type IdentifierQuoter = (name: string) => string;

export const DEFAULT_NAMING: Readonly<SqlNaming> = Object.freeze({
  table: "sessions",
  keyColumn: "key",
  dataColumn: "data",
  expirationColumn: "expiration",
});

/**
 * Derives the parameterized statements a store runs. Names are trusted
 * configuration and are quoted into the text here; every value is bound as `?`.
 *
 * The default quoter emits ANSI double quotes. Use {@link backtickQuote} for
 * MySQL without `ANSI_QUOTES`, or {@link bareIdentifier} to keep names as given
 * (PostgreSQL then folds them to lower case as it does for unquoted DDL).
 */
export function buildSqlTemplates(naming: SqlNaming, quote: IdentifierQuoter = ansiQuote): SqlTemplates {
  assertName("table", naming.table);
  assertName("keyColumn", naming.keyColumn);
  assertName("dataColumn", naming.dataColumn);
  assertName("expirationColumn", naming.expirationColumn);

  const table = naming.table.split(".").map(quote).join(".");
  const key = quote(naming.keyColumn);
  const data = quote(naming.dataColumn);
  const expiration = quote(naming.expirationColumn);

  return Object.freeze({
    insert: `INSERT INTO ${table} (${key}, ${data}, ${expiration}) VALUES (?, ?, ?)`,
    update: `UPDATE ${table} SET ${data} = ?, ${expiration} = ? WHERE ${key} = ?`,
    exists: `SELECT 1 FROM ${table} WHERE ${key} = ? AND ${expiration} > ?`,
    select: `SELECT ${data} FROM ${table} WHERE ${key} = ? AND ${expiration} > ?`,
    delete: `DELETE FROM ${table} WHERE ${key} = ?`,
  });
}

export const ansiQuote: IdentifierQuoter = (name) => `"${name.replace(/"/g, '""')}"`;

export const backtickQuote: IdentifierQuoter = (name) => `\`${name.replace(/`/g, "``")}\``;

export const bareIdentifier: IdentifierQuoter = (name) => name;

function assertName(option: keyof SqlNaming, value: unknown): void {
  if (typeof value !== "string" || value.length === 0 || /[\s\u0000-\u001f]/.test(value)) {
    throw new StoreError("INVALID_CONFIG", `${option} must be a non-empty name without whitespace.`, undefined, {
      option,
      value,
    });
  }

  if (option === "table" && value.split(".").some((part) => part.length === 0)) {
    throw new StoreError("INVALID_CONFIG", `table has an empty qualifier: ${value}`, undefined, { option, value });
  }
}
