import fs from "node:fs";
import path from "node:path";
import { SessionStateError, SnapshotWriteError } from "../core/errors/engine.errors";
import { writeFileAtomically } from "./atomic_write";
import { decodeSnapshot, encodeSnapshot } from "./snapshot.codec";
import type { SessionSnapshot, SnapshotStore } from "./session.types";

const BACKUP_DIR_NAME = "_bak";
const MAX_BACKUP_FILES_PER_SESSION = 10;
const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export function assertSessionId(sessionId: string): string {
  const normalized = sessionId.trim();
  if (!SESSION_ID_PATTERN.test(normalized) || normalized === "." || normalized === "..") {
    throw new SessionStateError(`SESSION_STATE_PATH_ERROR invalid session id: ${sessionId}`);
  }
  return normalized;
}

export function snapshotFilename(sessionId: string): string {
  return `session_state.${assertSessionId(sessionId)}.json`;
}

export function lockFilename(sessionId: string): string {
  return `session_state.${assertSessionId(sessionId)}.lock`;
}

function formatTimestampLocal(value: Date): string {
  const year = String(value.getFullYear()).padStart(4, "0");
  const month = String(value.getMonth() + 1).padStart(2, "0");
  const day = String(value.getDate()).padStart(2, "0");
  const hours = String(value.getHours()).padStart(2, "0");
  const minutes = String(value.getMinutes()).padStart(2, "0");
  const seconds = String(value.getSeconds()).padStart(2, "0");
  const millis = String(value.getMilliseconds()).padStart(3, "0");
  return `${year}${month}${day}_${hours}${minutes}${seconds}${millis}`;
}

function enforceBackupRetention(backupDirPath: string, sessionId: string): void {
  const prefix = `session_state.${sessionId}.`;
  const suffix = ".json.bak";
  const entries = fs
    .readdirSync(backupDirPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith(suffix))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  if (entries.length <= MAX_BACKUP_FILES_PER_SESSION) {
    return;
  }

  const excess = entries.slice(0, entries.length - MAX_BACKUP_FILES_PER_SESSION);
  for (const name of excess) {
    fs.unlinkSync(path.join(backupDirPath, name));
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** One JSON snapshot per session id under `rootDir`, with bounded backups in `_bak`. */
export class FileSnapshotStore implements SnapshotStore {
  readonly location: string;
  private readonly sessionId: string;

  constructor(rootDir: string, sessionId: string) {
    this.sessionId = assertSessionId(sessionId);
    this.location = path.resolve(rootDir, snapshotFilename(this.sessionId));
  }

  async load(): Promise<SessionSnapshot | null> {
    let serialized: string;
    try {
      serialized = await fs.promises.readFile(this.location, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized);
    } catch (error) {
      throw new SessionStateError(
        `SESSION_STATE_PARSE_ERROR ${this.location}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    const snapshot = decodeSnapshot(parsed);
    if (snapshot.sessionId !== this.sessionId) {
      throw new SessionStateError(
        `SESSION_STATE_VALIDATION_ERROR sessionId expected=${this.sessionId} actual=${snapshot.sessionId}`
      );
    }
    return snapshot;
  }

  async save(next: SessionSnapshot): Promise<void> {
    try {
      await writeFileAtomically(this.location, encodeSnapshot(next));
    } catch (error) {
      throw new SnapshotWriteError(this.location, { cause: error });
    }
  }

  async discard(): Promise<void> {
    if (!fs.existsSync(this.location)) {
      return;
    }
    const backupDirPath = path.join(path.dirname(this.location), BACKUP_DIR_NAME);
    const backupPath = path.join(
      backupDirPath,
      `session_state.${this.sessionId}.${formatTimestampLocal(new Date())}.json.bak`
    );
    try {
      await fs.promises.mkdir(backupDirPath, { recursive: true });
      await fs.promises.rename(this.location, backupPath);
      enforceBackupRetention(backupDirPath, this.sessionId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SessionStateError(
        `SESSION_STATE_ROTATION_ERROR ${this.location} -> ${backupPath}: ${message}`,
        { cause: error }
      );
    }
  }
}
