import { CatalogLoadError, JobIdError } from "../errors/engine.errors";
import { JobId } from "./job_id";
import { assertKnownKeys, readOptionalString, readString, type UnitRecord } from "./unit.fields";

export type ManifestValueType = "bool" | "natural";

/** A question about the machine under test, answered once per session. */
export interface ManifestEntry {
  readonly id: string;
  /** Field name inside the `manifest` resource record. */
  readonly key: string;
  readonly prompt: string;
  readonly valueType: ManifestValueType;
}

const MANIFEST_KEYS: ReadonlySet<string> = new Set(["id", "namespace", "prompt", "valueType"]);

export function parseManifestUnit(unit: UnitRecord, defaultNamespace: string | undefined): ManifestEntry {
  const rawId = typeof unit.id === "string" ? unit.id : "<unnamed manifest entry>";
  assertKnownKeys(unit, MANIFEST_KEYS, rawId);
  const namespace = readOptionalString(unit, "namespace", rawId) ?? defaultNamespace;
  let id: JobId;
  try {
    id = JobId.parse(readString(unit, "id", rawId), namespace);
  } catch (error) {
    if (error instanceof JobIdError) {
      throw new CatalogLoadError(rawId, error.message, { cause: error });
    }
    throw error;
  }
  const where = id.toString();
  const valueType = readOptionalString(unit, "valueType", where) ?? "bool";
  if (valueType !== "bool" && valueType !== "natural") {
    throw new CatalogLoadError(where, `valueType must be bool or natural, got '${valueType}'`);
  }
  return Object.freeze({
    id: where,
    key: id.partialId,
    prompt: readString(unit, "prompt", where),
    valueType,
  });
}

/**
 * Normalises an answer to the text stored in the manifest record: `True` or
 * `False` for yes/no questions, a decimal for counts. Returns `undefined` for
 * an answer that does not fit the question.
 */
export function normalizeManifestAnswer(entry: ManifestEntry, answer: string): string | undefined {
  const trimmed = answer.trim();
  if (entry.valueType === "natural") {
    return /^\d+$/.test(trimmed) ? String(Number.parseInt(trimmed, 10)) : undefined;
  }
  const lowered = trimmed.toLowerCase();
  if (["y", "yes", "true", "1"].includes(lowered)) {
    return "True";
  }
  if (["n", "no", "false", "0"].includes(lowered)) {
    return "False";
  }
  return undefined;
}
