import { CatalogLoadError, JobIdError, ResourceProgramError } from "../errors/engine.errors";
import { ResourceProgram } from "../resource/resource.program";
import { createJob, isJobType, type Job, type JobType } from "./job.types";
import { JobId } from "./job_id";
import {
  assertKnownKeys,
  readLines,
  readList,
  readOptionalNumber,
  readOptionalString,
  readString,
  readStringMap,
  type UnitRecord,
} from "./unit.fields";

export const JOB_UNIT_KEYS: ReadonlySet<string> = new Set([
  "id",
  "namespace",
  "type",
  "summary",
  "description",
  "command",
  "requires",
  "imports",
  "depends",
  "after",
  "salvages",
  "flags",
  "estimatedDuration",
  "user",
  "environ",
]);

const COMMAND_REQUIRED: ReadonlySet<JobType> = new Set<JobType>(["automated", "resource", "attachment"]);

export interface JobParseContext {
  /** Namespace for unqualified ids; without one every id must be qualified. */
  readonly namespace?: string;
  readonly origin: string;
}

function parseId(text: string, namespace: string | undefined, where: string): JobId {
  try {
    return JobId.parse(text, namespace);
  } catch (error) {
    if (error instanceof JobIdError) {
      throw new CatalogLoadError(where, error.message, { cause: error });
    }
    throw error;
  }
}

function compileRequires(
  text: string,
  namespace: string,
  imports: Readonly<Record<string, string>>,
  where: string
): ResourceProgram {
  try {
    return ResourceProgram.compile(text, { namespace, imports });
  } catch (error) {
    if (error instanceof ResourceProgramError) {
      throw new CatalogLoadError(where, error.message, { cause: error });
    }
    throw error;
  }
}

/** Validates one job unit and builds the frozen job. Throws `CatalogLoadError`. */
export function parseJobUnit(unit: UnitRecord, context: JobParseContext): Job {
  const rawId = typeof unit.id === "string" ? unit.id : "<unnamed job>";
  assertKnownKeys(unit, JOB_UNIT_KEYS, rawId);

  const namespace = readOptionalString(unit, "namespace", rawId) ?? context.namespace;
  const id = parseId(readString(unit, "id", rawId), namespace, rawId);
  const where = id.toString();
  const flags = readList(unit, "flags", where);

  const rawType = readOptionalString(unit, "type", where);
  let type: JobType;
  if (rawType === undefined) {
    if (!flags.includes("simple")) {
      throw new CatalogLoadError(where, "type is required unless the job is flagged simple");
    }
    type = "automated";
  } else if (isJobType(rawType)) {
    type = rawType;
  } else {
    throw new CatalogLoadError(where, `unknown job type '${rawType}'`);
  }

  const command = readOptionalString(unit, "command", where);
  if (COMMAND_REQUIRED.has(type) && (command === undefined || command.trim() === "")) {
    throw new CatalogLoadError(where, `${type} jobs need a command`);
  }

  const imports: Record<string, string> = {};
  for (const [alias, target] of Object.entries(readStringMap(unit, "imports", where))) {
    imports[alias] = parseId(target, id.namespace, where).toString();
  }

  const requiresText = readLines(unit, "requires", where);
  const requires =
    requiresText === undefined || requiresText.trim() === ""
      ? undefined
      : compileRequires(requiresText, id.namespace, imports, where);

  const user = readOptionalString(unit, "user", where)?.trim();

  return createJob({
    id,
    type,
    summary: readOptionalString(unit, "summary", where)?.trim() || id.partialId,
    description: readOptionalString(unit, "description", where),
    command,
    requiresText: requires ? requiresText : undefined,
    requires,
    imports,
    depends: readList(unit, "depends", where).map((ref) => parseId(ref, id.namespace, where)),
    after: readList(unit, "after", where).map((ref) => parseId(ref, id.namespace, where)),
    salvages: readList(unit, "salvages", where).map((ref) => parseId(ref, id.namespace, where)),
    flags: new Set(flags),
    estimatedDuration: readOptionalNumber(unit, "estimatedDuration", where),
    user: user === undefined || user === "" ? undefined : user,
    environ: readList(unit, "environ", where),
    origin: context.origin,
  });
}
