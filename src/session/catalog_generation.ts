import { checksumOf } from "../core/_shared/utils/checksum";
import type { Catalog } from "../core/job/catalog";
import { STATIC_ORIGIN } from "../core/job/job.types";

/**
 * Tag of everything a session depends on in the catalog: static job
 * checksums, templates and test plans. Template-rendered jobs are left out;
 * they follow from the templates and the recorded resources.
 */
export function computeCatalogGeneration(catalog: Catalog): string {
  const jobs: Record<string, string> = {};
  for (const job of catalog.jobs) {
    if (job.origin === STATIC_ORIGIN) {
      jobs[job.id.toString()] = job.checksum;
    }
  }
  const templates: Record<string, unknown> = {};
  for (const template of catalog.templates) {
    templates[template.id] = {
      resource: template.resource,
      engine: template.engine,
      filter: template.filterText ?? null,
      unit: template.unit,
    };
  }
  const testPlans: Record<string, unknown> = {};
  for (const plan of catalog.testPlans) {
    testPlans[plan.id] = {
      include: plan.include.map((pattern) => pattern.text),
      exclude: plan.exclude.map((pattern) => pattern.text),
      bootstrap: plan.bootstrap.map((pattern) => pattern.text),
      ordered: plan.ordered,
    };
  }

  return checksumOf({ jobs, templates, testPlans });
}

export interface CatalogDrift {
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly changed: readonly string[];
}

/**
 * Compares the checksums recorded for a session's run list with the current
 * catalog. `currentRunList` names the jobs the session would select today.
 */
export function diffRunList(
  recorded: Readonly<Record<string, string>>,
  catalog: Catalog,
  currentRunList: readonly string[]
): CatalogDrift {
  const removed: string[] = [];
  const changed: string[] = [];
  for (const [jobId, checksum] of Object.entries(recorded)) {
    const job = catalog.get(jobId);
    if (!job) {
      removed.push(jobId);
    } else if (job.checksum !== checksum) {
      changed.push(jobId);
    }
  }
  const added = currentRunList.filter((jobId) => !(jobId in recorded));
  return { added, removed: removed.sort(), changed: changed.sort() };
}
