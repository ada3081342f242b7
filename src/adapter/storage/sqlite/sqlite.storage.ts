import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";

export type SQLiteParam = string | number | bigint | Buffer | null;
export type SQLiteRow = Record<string, unknown>;

export interface SQLiteStorageOptions {
  /** File path, or `:memory:`. */
  readonly dbPath: string;
  /** Idempotent DDL, run on every connect. */
  readonly schemaSql: string;
  readonly expectedSchemaVersion?: string;
}

export const IN_MEMORY_DB = ":memory:";
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";

function isRow(value: unknown): value is SQLiteRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** One better-sqlite3 connection whose schema carries a single version row. */
export class SQLiteStorage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(private readonly options: SQLiteStorageOptions) {
    if (options.dbPath.trim() === "") {
      throw new Error("SQLITE_STORAGE_ERROR dbPath must not be empty");
    }
    this.dbPath = options.dbPath === IN_MEMORY_DB ? IN_MEMORY_DB : path.resolve(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
  }

  connect(): void {
    if (this.closed || this.db !== null) {
      throw new Error(`SQLITE_STORAGE_ERROR connection already ${this.closed ? "closed" : "open"}`);
    }
    if (this.dbPath !== IN_MEMORY_DB) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    const db = new BetterSqlite3(this.dbPath);
    try {
      if (this.dbPath !== IN_MEMORY_DB) {
        db.pragma("journal_mode = WAL");
      }
      db.pragma("synchronous = FULL");
      this.db = db;
      this.migrate();
    } catch (error) {
      db.close();
      this.db = null;
      throw error;
    }
  }

  close(): void {
    this.db?.close();
    this.db = null;
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): void {
    this.requireDb()
      .prepare(sql)
      .run(...params);
  }

  query(sql: string, params: readonly SQLiteParam[] = []): readonly SQLiteRow[] {
    const rows: unknown[] = this.requireDb()
      .prepare(sql)
      .all(...params);
    return rows.filter(isRow);
  }

  transaction<T>(work: () => T): T {
    return this.requireDb().transaction(work)();
  }

  private migrate(): void {
    const db = this.requireDb();
    db.exec("CREATE TABLE IF NOT EXISTS schema_version (version TEXT PRIMARY KEY, applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP)");
    const stored = this.query("SELECT version FROM schema_version")
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");

    if (stored.length === 0) {
      this.transaction(() => {
        db.exec(this.options.schemaSql);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [this.expectedSchemaVersion]);
      });
      return;
    }
    if (stored.length !== 1 || stored[0] !== this.expectedSchemaVersion) {
      throw new Error(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${stored.join(",")}`
      );
    }
    db.exec(this.options.schemaSql);
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      throw new Error(`SQLITE_STORAGE_ERROR connection is ${this.closed ? "closed" : "not open"}`);
    }
    return this.db;
  }
}
