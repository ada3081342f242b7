import { CatalogLoadError, JobIdError, ResourceProgramError } from "../errors/engine.errors";
import { JOB_UNIT_KEYS } from "../job/job.parser";
import { JobId } from "../job/job_id";
import {
  assertKnownKeys,
  isRecord,
  readLines,
  readOptionalString,
  readString,
  type UnitRecord,
} from "../job/unit.fields";
import { ResourceProgram } from "../resource/resource.program";
import { isTemplateEngine, type Template, type TemplateEngine, type UnitSkeleton } from "./template.types";

const TEMPLATE_KEYS: ReadonlySet<string> = new Set(["id", "namespace", "resource", "engine", "filter", "unit"]);

const ENGINE_ALIASES: Readonly<Record<string, TemplateEngine>> = Object.freeze({ jinja2: "jinja" });

function readSkeleton(unit: UnitRecord, where: string): UnitSkeleton {
  const raw = unit.unit;
  if (!isRecord(raw)) {
    throw new CatalogLoadError(where, "unit must be an object");
  }
  const skeleton: Record<string, string | number | boolean | readonly string[]> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!JOB_UNIT_KEYS.has(key) || key === "namespace") {
      throw new CatalogLoadError(where, `unit.${key} is not a job field`);
    }
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      skeleton[key] = value;
    } else if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
      skeleton[key] = Object.freeze([...value]);
    } else {
      throw new CatalogLoadError(where, `unit.${key} must be a string, number, boolean or string list`);
    }
  }
  if (typeof skeleton.id !== "string") {
    throw new CatalogLoadError(where, "unit.id must be a string");
  }
  return Object.freeze(skeleton);
}

export function parseTemplateUnit(unit: UnitRecord, defaultNamespace: string | undefined): Template {
  const rawId = typeof unit.id === "string" ? unit.id : "<unnamed template>";
  assertKnownKeys(unit, TEMPLATE_KEYS, rawId);
  const namespace = readOptionalString(unit, "namespace", rawId) ?? defaultNamespace;

  let id: JobId;
  let resource: JobId;
  try {
    id = JobId.parse(readString(unit, "id", rawId), namespace);
    resource = JobId.parse(readString(unit, "resource", rawId), id.namespace);
  } catch (error) {
    if (error instanceof JobIdError) {
      throw new CatalogLoadError(rawId, error.message, { cause: error });
    }
    throw error;
  }
  const where = id.toString();

  const rawEngine = readOptionalString(unit, "engine", where) ?? "simple";
  const engine = ENGINE_ALIASES[rawEngine] ?? rawEngine;
  if (!isTemplateEngine(engine)) {
    throw new CatalogLoadError(where, `unknown template engine '${rawEngine}'`);
  }

  const filterText = readLines(unit, "filter", where);
  let filter: ResourceProgram | undefined;
  if (filterText !== undefined && filterText.trim() !== "") {
    try {
      filter = ResourceProgram.compile(filterText, { namespace: id.namespace });
    } catch (error) {
      if (error instanceof ResourceProgramError) {
        throw new CatalogLoadError(where, error.message, { cause: error });
      }
      throw error;
    }
  }

  return Object.freeze({
    id: where,
    namespace: id.namespace,
    resource: resource.toString(),
    engine,
    filterText: filter ? filterText : undefined,
    filter,
    unit: readSkeleton(unit, where),
  });
}
