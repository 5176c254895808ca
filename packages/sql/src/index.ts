export {
  SqlSessionStore,
  type SqlClientLike,
  type SqlClientWrapper,
  type SqlConnectionInput,
  type SqlConnectionParams,
  type SqlSessionStoreOptions,
  type SqlStatementLike,
} from "./SqlSessionStore";

export { SqlClientManager, isUniqueViolation } from "./internal/sqlClient";

export {
  DEFAULT_NAMING,
  ansiQuote,
  backtickQuote,
  bareIdentifier,
  buildSqlTemplates,
  type IdentifierQuoter,
  type SqlNaming,
  type SqlTemplates,
} from "./sqlTemplates";
