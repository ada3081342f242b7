import { createLog } from "../_shared/log";
import {
  CatalogLoadError,
  DuplicateJobIdError,
  TemplateExpansionError,
} from "../errors/engine.errors";
import type { Catalog, CatalogDiagnostic } from "../job/catalog";
import { parseJobUnit } from "../job/job.parser";
import { prerequisitesOf } from "../job/job.relations";
import type { Job } from "../job/job.types";
import type { ResourceRecord } from "../resource/resource.record";
import type { ResourceStore } from "../resource/resource.store";
import { engineFor } from "./render.engines";
import type { RenderContext, RenderEngine, Template } from "./template.types";

const log = createLog("template");

export interface ExpandOptions {
  /** Ids already owned by something other than this template. */
  readonly isTaken?: (id: string) => boolean;
}

function renderUnit(
  template: Template,
  engine: RenderEngine,
  context: RenderContext
): Record<string, unknown> {
  const rendered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(template.unit)) {
    if (typeof value === "string") {
      rendered[key] = engine.render(value, context);
    } else if (typeof value === "number" || typeof value === "boolean") {
      rendered[key] = value;
    } else {
      rendered[key] = value.map((item) => engine.render(item, context));
    }
  }
  rendered.namespace = template.namespace;
  return rendered;
}

function instantiate(template: Template, engine: RenderEngine, record: ResourceRecord, index: number): Job {
  const context: RenderContext = {
    fields: record.toJSON(),
    positional: record.values(),
    index,
    resourceId: template.resource,
  };
  let unit: Record<string, unknown>;
  try {
    unit = renderUnit(template, engine, context);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateExpansionError(template.id, `instance ${index}: ${reason}`, { cause: error });
  }
  try {
    return parseJobUnit(unit, { namespace: template.namespace, origin: template.id });
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      throw new TemplateExpansionError(template.id, `instance ${index}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Renders one job per record of the template's resource group that passes
 * the filter. The filter sees one record of that group at a time, and the
 * rest of the store for any other group it names. Any duplicate id
 * rejects the whole expansion.
 */
export function expand(template: Template, store: ResourceStore, options: ExpandOptions = {}): Job[] {
  const engine = engineFor(template.engine);
  const jobs: Job[] = [];
  const seen = new Set<string>();
  let index = 0;
  for (const record of store.records(template.resource)) {
    if (template.filter && !template.filter.evaluateRecord(template.resource, record, store)) {
      continue;
    }
    const job = instantiate(template, engine, record, index);
    const key = job.id.toString();
    if (seen.has(key) || options.isTaken?.(key)) {
      throw new DuplicateJobIdError(key, template.id);
    }
    seen.add(key);
    jobs.push(job);
    index += 1;
  }
  return jobs;
}

export interface CatalogExpansion {
  readonly catalog: Catalog;
  readonly generated: readonly Job[];
  readonly diagnostics: readonly CatalogDiagnostic[];
}

/**
 * Re-expands `template` against the store and swaps its previous output in
 * the catalog. Rendered jobs whose relations do not resolve are left out and
 * reported, the same way static jobs are at load time.
 */
export function expandIntoCatalog(catalog: Catalog, template: Template, store: ResourceStore): CatalogExpansion {
  const rendered = expand(template, store, {
    isTaken: (id) => {
      const owner = catalog.get(id);
      return owner !== undefined && owner.origin !== template.id;
    },
  });

  const diagnostics: CatalogDiagnostic[] = [];
  let accepted = rendered;
  let next = catalog.withGenerated(template.id, accepted);
  for (;;) {
    const broken = accepted.filter((job) =>
      prerequisitesOf(job).some((prereq) => !next.has(prereq.target))
    );
    if (broken.length === 0) {
      break;
    }
    for (const job of broken) {
      const missing = prerequisitesOf(job).filter((prereq) => !next.has(prereq.target));
      const message = missing.map((prereq) => `${prereq.kind} '${prereq.target}' does not resolve`).join("; ");
      log.warn(`excluded ${job.id.toString()}: ${message}`);
      diagnostics.push({ unit: job.id.toString(), code: "UNRESOLVED_RELATION", message });
    }
    accepted = accepted.filter((job) => !broken.includes(job));
    next = catalog.withGenerated(template.id, accepted);
  }

  log.debug(`expanded ${template.id} into ${accepted.length} job(s)`);
  return { catalog: next, generated: accepted, diagnostics };
}
