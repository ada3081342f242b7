import { DependencyCycleError } from "../errors/engine.errors";
import type { Catalog } from "../job/catalog";
import { findCycle, prerequisitesOf, type RelationKind } from "../job/job.relations";
import type { Job } from "../job/job.types";

/** Relations that pull their target into the run list. Salvage targets only order. */
const PULLING_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>(["depends", "after", "resource"]);

export type ResolveResult =
  | {
      kind: "ok";
      order: Job[];
      /** Jobs that were not selected but are needed by selected ones. */
      pulledIn: Job[];
    }
  | {
      kind: "cycle";
      cycle: string[];
      error: DependencyCycleError;
    }
  | {
      kind: "unresolved";
      jobId: string;
      target: string;
      message: string;
    };

interface Node {
  readonly job: Job;
  rank: number;
}

/**
 * Orders `selection` (already in rank order) and everything it needs.
 *
 * Every edge is honoured; among jobs that are ready at the same time the one
 * with the lowest rank goes first, then declaration order. A prerequisite
 * inherits the lowest rank of the jobs that need it.
 */
export function resolve(selection: readonly Job[], catalog: Catalog): ResolveResult {
  const nodes = new Map<string, Node>();
  const selectedIds = new Set(selection.map((job) => job.id.toString()));

  const pull = (job: Job, rank: number): ResolveResult | undefined => {
    const key = job.id.toString();
    const existing = nodes.get(key);
    if (existing) {
      if (rank >= existing.rank) {
        return undefined;
      }
      existing.rank = rank;
    } else {
      nodes.set(key, { job, rank });
    }
    for (const prereq of prerequisitesOf(job)) {
      if (!PULLING_RELATIONS.has(prereq.kind)) {
        continue;
      }
      const target = catalog.get(prereq.target);
      if (!target) {
        return {
          kind: "unresolved",
          jobId: key,
          target: prereq.target,
          message: `${prereq.kind} '${prereq.target}' of ${key} is not in the catalog`,
        };
      }
      const failed = pull(target, rank);
      if (failed) {
        return failed;
      }
    }
    return undefined;
  };

  for (const [rank, job] of selection.entries()) {
    const failed = pull(job, rank);
    if (failed) {
      return failed;
    }
  }

  const edgesOf = (key: string): string[] => {
    const node = nodes.get(key);
    return node
      ? prerequisitesOf(node.job)
          .map((prereq) => prereq.target)
          .filter((target) => nodes.has(target))
      : [];
  };

  const waitingOn = new Map<string, Set<string>>();
  const dependents = new Map<string, string[]>();
  for (const key of nodes.keys()) {
    const prereqs = new Set(edgesOf(key));
    waitingOn.set(key, prereqs);
    for (const target of prereqs) {
      const list = dependents.get(target) ?? [];
      list.push(key);
      dependents.set(target, list);
    }
  }

  const sortKey = (key: string): [number, number] => [
    nodes.get(key)?.rank ?? Number.MAX_SAFE_INTEGER,
    catalog.declarationIndex(key),
  ];
  const before = (a: string, b: string): boolean => {
    const [rankA, declA] = sortKey(a);
    const [rankB, declB] = sortKey(b);
    return rankA < rankB || (rankA === rankB && declA < declB);
  };

  const ready = [...waitingOn.entries()].filter(([, prereqs]) => prereqs.size === 0).map(([key]) => key);
  const order: Job[] = [];
  while (ready.length > 0) {
    let best = 0;
    for (let i = 1; i < ready.length; i += 1) {
      if (before(ready[i], ready[best])) {
        best = i;
      }
    }
    const [key] = ready.splice(best, 1);
    const node = nodes.get(key);
    if (node) {
      order.push(node.job);
    }
    for (const dependent of dependents.get(key) ?? []) {
      const prereqs = waitingOn.get(dependent);
      prereqs?.delete(key);
      if (prereqs && prereqs.size === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length < nodes.size) {
    const placed = new Set(order.map((job) => job.id.toString()));
    const remaining = [...nodes.keys()].filter((key) => !placed.has(key));
    const cycle = findCycle(remaining, edgesOf) ?? remaining;
    return { kind: "cycle", cycle, error: new DependencyCycleError(cycle) };
  }

  return {
    kind: "ok",
    order,
    pulledIn: order.filter((job) => !selectedIds.has(job.id.toString())),
  };
}

export interface DurationEstimate {
  /** Seconds, over the jobs that declare an estimate. */
  readonly totalSeconds: number;
  readonly unknownCount: number;
}

export function estimateDuration(jobs: readonly Job[]): DurationEstimate {
  let totalSeconds = 0;
  let unknownCount = 0;
  for (const job of jobs) {
    if (job.estimatedDuration === undefined) {
      unknownCount += 1;
    } else {
      totalSeconds += job.estimatedDuration;
    }
  }
  return { totalSeconds, unknownCount };
}
