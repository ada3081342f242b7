import { createLog } from "../_shared/log";
import { ResourceRecord } from "./resource.record";

const log = createLog("resource");

/**
 * Parses resource job output: records separated by blank lines, one
 * `key: value` pair per line. Indented lines continue the previous value.
 */
export function parseResourceOutput(output: string): ResourceRecord[] {
  const records: ResourceRecord[] = [];
  let current: Array<[string, string]> = [];
  let lastKey: string | undefined;

  const flush = (): void => {
    if (current.length > 0) {
      records.push(new ResourceRecord(current));
    }
    current = [];
    lastKey = undefined;
  };

  const lines = output.split(/\r?\n/);
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i];
    if (line.trim() === "") {
      flush();
      continue;
    }

    if (/^\s/.test(line) && lastKey !== undefined) {
      const entry = current.find(([key]) => key === lastKey);
      if (entry) {
        entry[1] = `${entry[1]}\n${line.trim()}`;
      }
      continue;
    }

    const idx = line.indexOf(":");
    if (idx <= 0) {
      log.debug(`ignoring malformed resource line ${String(i + 1)}: '${line}'`);
      continue;
    }

    const key = line.slice(0, idx).trim();
    const value = line.slice(idx + 1).trim();
    const existing = current.find(([k]) => k === key);
    if (existing) {
      existing[1] = value;
    } else {
      current.push([key, value]);
    }
    lastKey = key;
  }

  flush();
  return records;
}
