import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { createLog } from "../core/_shared/log";

const log = createLog("session");

function partialPathFor(targetPath: string): string {
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${process.pid}.${randomUUID()}.partial`);
}

async function writeDurably(filePath: string, data: string, mode: number): Promise<void> {
  const handle = await fs.open(filePath, "wx", mode);
  try {
    await handle.writeFile(data, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function syncDirectory(dirPath: string): Promise<void> {
  try {
    const handle = await fs.open(dirPath, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    // Some filesystems refuse fsync on a directory; the rename has already landed.
    log.debug(`directory sync skipped for ${dirPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Replaces `targetPath` so that a reader, or a process restarted after a
 * power cut, finds either the previous contents or the new ones in full.
 */
export async function writeFileAtomically(
  targetPath: string,
  data: string,
  options: { readonly mode?: number } = {}
): Promise<void> {
  const dirPath = path.dirname(targetPath);
  const partialPath = partialPathFor(targetPath);
  await fs.mkdir(dirPath, { recursive: true, mode: 0o700 });

  try {
    await writeDurably(partialPath, data, options.mode ?? 0o600);
    await fs.rename(partialPath, targetPath);
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    throw error;
  }
  await syncDirectory(dirPath);
}
