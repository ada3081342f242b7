export {
  IN_MEMORY_DB,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteRow,
  type SQLiteStorageOptions,
} from "./sqlite.storage";
export { RESOURCE_CACHE_SCHEMA_SQL, SQLiteResourceCache } from "./resource_cache.sqlite";
