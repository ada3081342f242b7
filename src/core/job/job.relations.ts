import type { Job } from "./job.types";
import { resourceGroupsOf } from "./job.types";
import { isReservedGroup } from "../resource/resource.store";

export type RelationKind = "depends" | "after" | "salvages" | "resource";

export interface Prerequisite {
  readonly kind: RelationKind;
  /** Full id of the job that has to come first. */
  readonly target: string;
}

/** Everything that must be ordered before `job`, with the relation that demands it. */
export function prerequisitesOf(job: Job): Prerequisite[] {
  const out: Prerequisite[] = [];
  const seen = new Set<string>();
  const push = (kind: RelationKind, target: string) => {
    const key = `${kind}\u0000${target}`;
    if (!seen.has(key)) {
      seen.add(key);
      out.push({ kind, target });
    }
  };
  job.depends.forEach((id) => push("depends", id.toString()));
  job.after.forEach((id) => push("after", id.toString()));
  job.salvages.forEach((id) => push("salvages", id.toString()));
  resourceGroupsOf(job)
    .filter((group) => !isReservedGroup(group))
    .forEach((group) => push("resource", group));
  return out;
}

/**
 * Depth-first search for a cycle over `nodes`. Returns the cycle as a path
 * that starts and ends with the same id, or `undefined` for an acyclic graph.
 * Edges to ids outside `nodes` are ignored.
 */
export function findCycle(
  nodes: readonly string[],
  edgesOf: (node: string) => readonly string[]
): string[] | undefined {
  const known = new Set(nodes);
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (node: string): string[] | undefined => {
    state.set(node, "visiting");
    path.push(node);
    for (const next of edgesOf(node)) {
      if (!known.has(next)) {
        continue;
      }
      const mark = state.get(next);
      if (mark === "visiting") {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (mark === undefined) {
        const found = visit(next);
        if (found) {
          return found;
        }
      }
    }
    path.pop();
    state.set(node, "done");
    return undefined;
  };

  for (const node of nodes) {
    if (!state.has(node)) {
      const found = visit(node);
      if (found) {
        return found;
      }
    }
  }
  return undefined;
}
