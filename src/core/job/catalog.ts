import { createLog } from "../_shared/log";
import { CatalogLoadError } from "../errors/engine.errors";
import { parseTestPlanUnit, type TestPlan } from "../plan/test_plan";
import { lintProgram } from "../resource/resource.program";
import { parseTemplateUnit } from "../template/template.parser";
import type { Template } from "../template/template.types";
import { parseJobUnit } from "./job.parser";
import { findCycle, prerequisitesOf } from "./job.relations";
import { createJob, hasFlag, STATIC_ORIGIN, type Job } from "./job.types";
import type { JobId } from "./job_id";
import { parseManifestUnit, type ManifestEntry } from "./manifest";
import { assertUnit, isRecord, type UnitRecord } from "./unit.fields";

const log = createLog("catalog");

export type DiagnosticCode =
  | "MALFORMED_UNIT"
  | "DUPLICATE_ID"
  | "UNRESOLVED_RELATION"
  | "DEPENDENCY_CYCLE";

export interface CatalogDiagnostic {
  readonly unit: string;
  readonly code: DiagnosticCode;
  readonly message: string;
}

export interface CatalogLoadResult {
  readonly catalog: Catalog;
  readonly diagnostics: readonly CatalogDiagnostic[];
}

export interface LoadCatalogOptions {
  /** Namespace for unqualified ids when the document does not name one. */
  readonly namespace?: string;
}

const CATALOG_KEYS: ReadonlySet<string> = new Set(["namespace", "jobs", "templates", "testPlans", "manifest"]);

export const AFTER_SUSPEND_PREFIX = "after-suspend-";

/**
 * The validated set of jobs, templates, test plans and manifest questions.
 * Jobs keep declaration order; template-rendered jobs follow the static ones.
 */
export class Catalog {
  private readonly byId: ReadonlyMap<string, Job>;
  private readonly declared: ReadonlyMap<string, number>;

  private constructor(
    readonly jobs: readonly Job[],
    readonly templates: readonly Template[],
    readonly testPlans: readonly TestPlan[],
    readonly manifest: readonly ManifestEntry[]
  ) {
    this.byId = new Map(jobs.map((job) => [job.id.toString(), job]));
    this.declared = new Map(jobs.map((job, idx) => [job.id.toString(), idx]));
  }

  static create(parts: {
    readonly jobs?: readonly Job[];
    readonly templates?: readonly Template[];
    readonly testPlans?: readonly TestPlan[];
    readonly manifest?: readonly ManifestEntry[];
  }): Catalog {
    return new Catalog(
      Object.freeze([...(parts.jobs ?? [])]),
      Object.freeze([...(parts.templates ?? [])]),
      Object.freeze([...(parts.testPlans ?? [])]),
      Object.freeze([...(parts.manifest ?? [])])
    );
  }

  get(id: JobId | string): Job | undefined {
    return this.byId.get(id.toString());
  }

  has(id: JobId | string): boolean {
    return this.byId.has(id.toString());
  }

  /** Declaration index; unknown ids sort last. */
  declarationIndex(id: JobId | string): number {
    return this.declared.get(id.toString()) ?? this.jobs.length;
  }

  testPlan(id: string): TestPlan | undefined {
    return this.testPlans.find((plan) => plan.id === id || plan.id.endsWith(`::${id}`));
  }

  templatesFor(group: string): Template[] {
    return this.templates.filter((template) => template.resource === group);
  }

  /** Replaces every job previously rendered from `templateId` with `generated`. */
  withGenerated(templateId: string, generated: readonly Job[]): Catalog {
    return new Catalog(
      Object.freeze([...this.jobs.filter((job) => job.origin !== templateId), ...generated]),
      this.templates,
      this.testPlans,
      this.manifest
    );
  }
}

function readSection(root: UnitRecord, key: string): readonly unknown[] {
  const value = root[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new CatalogLoadError("<catalog>", `${key} must be an array`);
  }
  return value;
}

function afterSuspendSibling(job: Job, noReturnJobs: readonly Job[]): Job {
  const flags = new Set(job.flags);
  flags.delete("also-after-suspend");
  const after = [...job.after, job.id];
  for (const candidate of noReturnJobs) {
    if (candidate.id.namespace === job.id.namespace && !after.includes(candidate.id)) {
      after.push(candidate.id);
    }
  }
  return createJob({
    ...job,
    id: job.id.withPartialId(`${AFTER_SUSPEND_PREFIX}${job.id.partialId}`),
    summary: `${job.summary} (after suspend)`,
    after,
    flags,
  });
}

/**
 * Drops jobs whose relations point outside the accepted set, repeatedly, so a
 * rejected job also rejects everything that needs it. Then rejects every job
 * on a dependency cycle and starts over.
 */
function pruneRelations(jobs: readonly Job[], report: (diagnostic: CatalogDiagnostic) => void): Job[] {
  const accepted = new Map(jobs.map((job) => [job.id.toString(), job]));
  for (;;) {
    let changed = true;
    while (changed) {
      changed = false;
      for (const [key, job] of accepted) {
        const missing = prerequisitesOf(job).find((prereq) => {
          const target = accepted.get(prereq.target);
          return !target || (prereq.kind === "resource" && target.type !== "resource");
        });
        if (missing) {
          const reason = accepted.has(missing.target)
            ? `resource '${missing.target}' is not produced by a resource job`
            : `${missing.kind} '${missing.target}' does not resolve`;
          report({ unit: key, code: "UNRESOLVED_RELATION", message: reason });
          accepted.delete(key);
          changed = true;
        }
      }
    }

    const cycle = findCycle([...accepted.keys()], (node) => {
      const job = accepted.get(node);
      return job ? prerequisitesOf(job).map((prereq) => prereq.target) : [];
    });
    if (!cycle) {
      return [...accepted.values()];
    }
    const message = `DEPENDENCY_CYCLE ${cycle.join(" -> ")}`;
    for (const member of new Set(cycle)) {
      report({ unit: member, code: "DEPENDENCY_CYCLE", message });
      accepted.delete(member);
    }
  }
}

function parseUnits<T>(
  section: readonly unknown[],
  label: string,
  parse: (unit: UnitRecord) => T,
  report: (diagnostic: CatalogDiagnostic) => void
): T[] {
  const out: T[] = [];
  section.forEach((raw, idx) => {
    const where = isRecord(raw) && typeof raw.id === "string" ? raw.id : `${label}[${idx}]`;
    try {
      out.push(parse(assertUnit(raw, where)));
    } catch (error) {
      if (!(error instanceof CatalogLoadError)) {
        throw error;
      }
      report({ unit: error.unit, code: "MALFORMED_UNIT", message: error.message });
    }
  });
  return out;
}

function dropDuplicates<T>(
  units: readonly T[],
  keyOf: (unit: T) => string,
  report: (diagnostic: CatalogDiagnostic) => void
): T[] {
  const seen = new Set<string>();
  return units.filter((unit) => {
    const key = keyOf(unit);
    if (seen.has(key)) {
      report({ unit: key, code: "DUPLICATE_ID", message: `DUPLICATE_ID ${key} is declared more than once` });
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Validates a pre-parsed catalog document. Problems with one unit exclude
 * that unit (and whatever depends on it) and are returned as diagnostics;
 * only a document that is not a catalog at all throws.
 */
export function loadCatalog(raw: unknown, options: LoadCatalogOptions = {}): CatalogLoadResult {
  if (!isRecord(raw)) {
    throw new CatalogLoadError("<catalog>", "catalog must be an object");
  }
  const unknownKeys = Object.keys(raw).filter((key) => !CATALOG_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new CatalogLoadError("<catalog>", `unknown field(s): ${unknownKeys.sort().join(", ")}`);
  }
  const declaredNamespace = raw.namespace;
  if (declaredNamespace !== undefined && typeof declaredNamespace !== "string") {
    throw new CatalogLoadError("<catalog>", "namespace must be a string");
  }
  const namespace = declaredNamespace ?? options.namespace;

  const diagnostics: CatalogDiagnostic[] = [];
  const report = (diagnostic: CatalogDiagnostic) => {
    log.warn(`excluded ${diagnostic.unit}: ${diagnostic.message}`);
    diagnostics.push(diagnostic);
  };

  const manifest = dropDuplicates(
    parseUnits(readSection(raw, "manifest"), "manifest", (unit) => parseManifestUnit(unit, namespace), report),
    (entry) => entry.id,
    report
  );
  const testPlans = dropDuplicates(
    parseUnits(readSection(raw, "testPlans"), "testPlans", (unit) => parseTestPlanUnit(unit, namespace), report),
    (plan) => plan.id,
    report
  );
  const parsedTemplates = dropDuplicates(
    parseUnits(readSection(raw, "templates"), "templates", (unit) => parseTemplateUnit(unit, namespace), report),
    (template) => template.id,
    report
  );
  const declared = dropDuplicates(
    parseUnits(
      readSection(raw, "jobs"),
      "jobs",
      (unit) => parseJobUnit(unit, { namespace, origin: STATIC_ORIGIN }),
      report
    ),
    (job) => job.id.toString(),
    report
  );

  const noReturnJobs = declared.filter((job) => hasFlag(job, "noreturn"));
  const siblings = declared
    .filter((job) => hasFlag(job, "also-after-suspend"))
    .map((job) => afterSuspendSibling(job, noReturnJobs));
  const jobs = pruneRelations(
    dropDuplicates([...declared, ...siblings], (job) => job.id.toString(), report),
    report
  );

  for (const job of jobs) {
    if (job.requires) {
      for (const warning of lintProgram(job.requires)) {
        log.warn(`${job.id.toString()} requires: ${warning.line}: ${warning.message}`);
      }
    }
  }

  const byId = new Map(jobs.map((job) => [job.id.toString(), job]));
  const templates = parsedTemplates.filter((template) => {
    if (byId.get(template.resource)?.type === "resource") {
      return true;
    }
    report({
      unit: template.id,
      code: "UNRESOLVED_RELATION",
      message: `resource '${template.resource}' is not produced by a resource job`,
    });
    return false;
  });

  log.debug(
    `loaded jobs=${jobs.length} templates=${templates.length} plans=${testPlans.length} diagnostics=${diagnostics.length}`
  );
  return {
    catalog: Catalog.create({ jobs, templates, testPlans, manifest }),
    diagnostics,
  };
}
