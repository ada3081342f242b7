import { createLog } from "../../../core/_shared/log";
import type { ResourceCache } from "../../../core/resource/resource.cache";
import { ResourceRecord } from "../../../core/resource/resource.record";
import { SQLiteStorage } from "./sqlite.storage";

const log = createLog("resource-cache");

export const RESOURCE_CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS resource_cache (
  job_id TEXT NOT NULL,
  checksum TEXT NOT NULL,
  records TEXT NOT NULL,
  stored_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (job_id, checksum)
);
`;

function decodeRecords(serialized: string): ResourceRecord[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch {
    return undefined;
  }
  if (!Array.isArray(parsed)) {
    return undefined;
  }
  const records: ResourceRecord[] = [];
  for (const item of parsed) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      return undefined;
    }
    const entries = Object.entries(item);
    if (!entries.every((entry): entry is [string, string] => typeof entry[1] === "string")) {
      return undefined;
    }
    records.push(new ResourceRecord(entries));
  }
  return records;
}

/**
 * Keeps the last records of each `cachable` resource job, keyed by job id and
 * checksum. Storing a new checksum drops the job's older entries.
 */
export class SQLiteResourceCache implements ResourceCache {
  constructor(private readonly storage: SQLiteStorage) {}

  static open(dbPath: string): SQLiteResourceCache {
    const storage = new SQLiteStorage({ dbPath, schemaSql: RESOURCE_CACHE_SCHEMA_SQL });
    storage.connect();
    return new SQLiteResourceCache(storage);
  }

  get(jobId: string, checksum: string): ResourceRecord[] | undefined {
    const [row] = this.storage.query("SELECT records FROM resource_cache WHERE job_id = ? AND checksum = ?", [
      jobId,
      checksum,
    ]);
    if (!row || typeof row.records !== "string") {
      return undefined;
    }
    const records = decodeRecords(row.records);
    if (!records) {
      log.warn(`ignoring unreadable cache entry for ${jobId}`);
    }
    return records;
  }

  put(jobId: string, checksum: string, records: readonly ResourceRecord[]): void {
    const serialized = JSON.stringify(records.map((record) => record.toJSON()));
    this.storage.transaction(() => {
      this.storage.exec("DELETE FROM resource_cache WHERE job_id = ?", [jobId]);
      this.storage.exec("INSERT INTO resource_cache(job_id, checksum, records) VALUES (?, ?, ?)", [
        jobId,
        checksum,
        serialized,
      ]);
    });
  }

  close(): void {
    this.storage.close();
  }
}
