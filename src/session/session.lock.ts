import fs from "node:fs";
import path from "node:path";
import { createLog } from "../core/_shared/log";
import { SessionLockedError } from "../core/errors/engine.errors";
import { lockFilename } from "./file_snapshot.store";

const log = createLog("session");

export interface SessionLock {
  readonly lockPath: string;
  release(): void;
}

export interface AcquireLockOptions {
  /** Liveness probe for the pid recorded in an existing lock file. */
  readonly isAlive?: (pid: number) => boolean;
}

function processIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

function readHolderPid(lockPath: string): number | undefined {
  let content: string;
  try {
    content = fs.readFileSync(lockPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

/**
 * Single-owner lock per session id: an `O_EXCL` lock file holding the owner
 * pid. A lock whose pid is gone (or unreadable) is stale and taken over.
 */
export function acquireSessionLock(
  rootDir: string,
  sessionId: string,
  options: AcquireLockOptions = {}
): SessionLock {
  const lockPath = path.resolve(rootDir, lockFilename(sessionId));
  const isAlive = options.isAlive ?? processIsAlive;
  fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o700 });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    let fd: number;
    try {
      fd = fs.openSync(lockPath, "wx", 0o600);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw error;
      }
      const holder = readHolderPid(lockPath);
      if (holder !== undefined && isAlive(holder)) {
        throw new SessionLockedError(sessionId, holder);
      }
      log.warn(`removing stale lock ${lockPath} pid=${holder === undefined ? "unknown" : String(holder)}`);
      fs.rmSync(lockPath, { force: true });
      continue;
    }

    try {
      fs.writeSync(fd, `${process.pid}\n`);
    } finally {
      fs.closeSync(fd);
    }

    let released = false;
    return {
      lockPath,
      release() {
        if (released) {
          return;
        }
        released = true;
        fs.rmSync(lockPath, { force: true });
      },
    };
  }
  throw new SessionLockedError(sessionId);
}
