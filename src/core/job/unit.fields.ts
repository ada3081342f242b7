import { CatalogLoadError } from "../errors/engine.errors";

export type UnitRecord = Readonly<Record<string, unknown>>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function assertUnit(value: unknown, where: string): UnitRecord {
  if (!isRecord(value)) {
    throw new CatalogLoadError(where, "unit must be an object");
  }
  return value;
}

export function assertKnownKeys(unit: UnitRecord, allowed: ReadonlySet<string>, where: string): void {
  const unknown = Object.keys(unit).filter((key) => !allowed.has(key));
  if (unknown.length > 0) {
    throw new CatalogLoadError(where, `unknown field(s): ${unknown.sort().join(", ")}`);
  }
}

export function readString(unit: UnitRecord, key: string, where: string): string {
  const value = unit[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new CatalogLoadError(where, `${key} must be a non-empty string`);
  }
  return value.trim();
}

export function readOptionalString(unit: UnitRecord, key: string, where: string): string | undefined {
  const value = unit[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new CatalogLoadError(where, `${key} must be a string`);
  }
  return value;
}

/**
 * Accepts either a list of strings or one string with whitespace or comma
 * separated items.
 */
export function readList(unit: UnitRecord, key: string, where: string): string[] {
  const value = unit[key];
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return value.split(/[\s,]+/).filter((item) => item.length > 0);
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return value.map((item) => item.trim()).filter((item) => item.length > 0);
  }
  throw new CatalogLoadError(where, `${key} must be a string or a list of strings`);
}

/** Multi-line text given either as one string or as a list of lines. */
export function readLines(unit: UnitRecord, key: string, where: string): string | undefined {
  const value = unit[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return value.join("\n");
  }
  throw new CatalogLoadError(where, `${key} must be a string or a list of strings`);
}

export function readOptionalNumber(unit: UnitRecord, key: string, where: string): number | undefined {
  const value = unit[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < 0) {
    throw new CatalogLoadError(where, `${key} must be a non-negative number`);
  }
  return parsed;
}

export function readOptionalBoolean(unit: UnitRecord, key: string, where: string): boolean | undefined {
  const value = unit[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new CatalogLoadError(where, `${key} must be a boolean`);
  }
  return value;
}

export function readStringMap(
  unit: UnitRecord,
  key: string,
  where: string
): Record<string, string> {
  const value = unit[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new CatalogLoadError(where, `${key} must be an object`);
  }
  const out: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new CatalogLoadError(where, `${key}.${name} must be a string`);
    }
    out[name] = entry;
  }
  return out;
}
