export { createSqliteKvStore, type SqliteKvConfig } from "./sqlite-kv.ts";
