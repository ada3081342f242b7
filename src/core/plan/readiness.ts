import { hasFlag, RUN_OUTCOMES, type Job, type Outcome } from "../job/job.types";
import { isReservedGroup, type ResourceStore } from "../resource/resource.store";

export type InhibitorCause =
  | "PENDING_DEP"
  | "FAILED_DEP"
  | "PENDING_RESOURCE"
  | "FAILED_RESOURCE"
  | "SALVAGE_NOT_NEEDED";

export interface ReadinessInhibitor {
  readonly cause: InhibitorCause;
  readonly relatedJob?: string;
  readonly relatedExpression?: string;
}

export type Readiness =
  | { kind: "ready" }
  | {
      kind: "blocked";
      /** Outcome recorded for the job without running it. */
      outcome: Outcome;
      inhibitors: ReadinessInhibitor[];
    };

const SALVAGE_TRIGGERS: ReadonlySet<Outcome> = new Set<Outcome>(["fail", "crash"]);

/**
 * Decides, at the job's turn, whether it runs. Relation problems leave the
 * job not-started; an unmet resource program alone skips it (or fails it
 * when flagged `fail-on-resource`).
 */
export function assessReadiness(
  job: Job,
  outcomes: ReadonlyMap<string, Outcome>,
  store: ResourceStore
): Readiness {
  const inhibitors: ReadinessInhibitor[] = [];

  for (const target of job.depends) {
    const outcome = outcomes.get(target.toString());
    if (outcome === undefined) {
      inhibitors.push({ cause: "PENDING_DEP", relatedJob: target.toString() });
    } else if (outcome !== "pass") {
      inhibitors.push({ cause: "FAILED_DEP", relatedJob: target.toString() });
    }
  }
  for (const target of job.after) {
    const outcome = outcomes.get(target.toString());
    if (outcome === undefined) {
      inhibitors.push({ cause: "PENDING_DEP", relatedJob: target.toString() });
    } else if (!RUN_OUTCOMES.has(outcome)) {
      inhibitors.push({ cause: "FAILED_DEP", relatedJob: target.toString() });
    }
  }
  for (const target of job.salvages) {
    const outcome = outcomes.get(target.toString());
    if (outcome === undefined) {
      inhibitors.push({ cause: "PENDING_DEP", relatedJob: target.toString() });
    } else if (!SALVAGE_TRIGGERS.has(outcome)) {
      inhibitors.push({ cause: "SALVAGE_NOT_NEEDED", relatedJob: target.toString() });
    }
  }

  const program = job.requires;
  if (program) {
    for (const group of program.requiredGroups) {
      if (!isReservedGroup(group) && !outcomes.has(group)) {
        inhibitors.push({ cause: "PENDING_RESOURCE", relatedJob: group });
      }
    }
  }

  if (inhibitors.length > 0) {
    return { kind: "blocked", outcome: "not-started", inhibitors };
  }

  if (program && !program.evaluate(store)) {
    const failing = program
      .explain(store)
      .filter((verdict) => !verdict.satisfied)
      .map((verdict) => ({ cause: "FAILED_RESOURCE" as const, relatedExpression: verdict.text }));
    return {
      kind: "blocked",
      outcome: hasFlag(job, "fail-on-resource") ? "fail" : "skip",
      inhibitors: failing,
    };
  }

  return { kind: "ready" };
}

export function formatInhibitors(inhibitors: readonly ReadinessInhibitor[]): string {
  return inhibitors
    .map((inhibitor) => {
      const subject = inhibitor.relatedJob ?? inhibitor.relatedExpression;
      return subject === undefined ? inhibitor.cause : `${inhibitor.cause} ${subject}`;
    })
    .join("; ");
}
