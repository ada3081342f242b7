import { createLog } from "../core/_shared/log";
import { ResumeConflictError } from "../core/errors/engine.errors";
import type { Catalog } from "../core/job/catalog";
import type { Job } from "../core/job/job.types";
import { resolve } from "../core/plan/dependency_graph";
import { selectJobs, type TestPlan } from "../core/plan/test_plan";
import { computeCatalogGeneration, diffRunList, type CatalogDrift } from "./catalog_generation";
import {
  SessionController,
  type SessionDeps,
  type SessionSelection,
} from "./session.controller";
import type { SessionSnapshot } from "./session.types";

const log = createLog("session");

export type ConflictDecision = "abort" | "discard" | "accept";

/** A stored session whose catalog generation differs from the current catalog. */
export interface ResumeConflict {
  readonly sessionId: string;
  readonly recordedGeneration: string;
  readonly currentGeneration: string;
  readonly drift: CatalogDrift;
}

export interface OpenSessionInput {
  readonly sessionId: string;
  readonly catalog: Catalog;
  /** Plan for a new session; a resumed session keeps the plan it was started with. */
  readonly plan?: TestPlan;
  /** Explicit job ids for a new session without a plan. */
  readonly jobIds?: readonly string[];
  readonly environment?: Readonly<Record<string, string>>;
  readonly manifest?: Readonly<Record<string, string>>;
  /** Move any stored snapshot aside and start over. */
  readonly freshSession?: boolean;
  readonly decide: (conflict: ResumeConflict) => ConflictDecision | Promise<ConflictDecision>;
}

export interface OpenedSession {
  readonly controller: SessionController;
  readonly resumed: boolean;
  readonly conflict?: ResumeConflict;
}

export function shouldVerifyOnBoot(loaded: SessionSnapshot | null): loaded is SessionSnapshot {
  return loaded !== null;
}

function selectionForNew(input: OpenSessionInput): SessionSelection {
  if (input.plan) {
    return { kind: "plan", plan: input.plan };
  }
  return { kind: "jobs", jobIds: input.jobIds ?? [] };
}

function selectionForResume(snapshot: SessionSnapshot, catalog: Catalog): SessionSelection {
  if (snapshot.testPlan !== null) {
    const plan = catalog.testPlan(snapshot.testPlan);
    if (plan) {
      return { kind: "plan", plan };
    }
    log.warn(`test plan ${snapshot.testPlan} is no longer in the catalog; keeping the recorded run list`);
  }
  const generated = new Set(snapshot.generatedJobs);
  return { kind: "jobs", jobIds: snapshot.runList.filter((jobId) => !generated.has(jobId)) };
}

function currentRunList(selection: SessionSelection, catalog: Catalog): string[] {
  let seeds: Job[];
  if (selection.kind === "plan") {
    const picked = selectJobs(selection.plan, catalog.jobs);
    seeds = [...picked.bootstrap, ...picked.selected];
  } else {
    seeds = selection.jobIds.flatMap((jobId) => {
      const job = catalog.get(jobId);
      return job ? [job] : [];
    });
  }
  const resolved = resolve(seeds, catalog);
  const order = resolved.kind === "ok" ? resolved.order : seeds;
  return order.map((job) => job.id.toString());
}

function detectConflict(
  snapshot: SessionSnapshot,
  catalog: Catalog,
  selection: SessionSelection,
  currentGeneration: string
): ResumeConflict | undefined {
  if (snapshot.catalogGeneration === currentGeneration) {
    return undefined;
  }
  const generated = new Set(snapshot.generatedJobs);
  const recorded = Object.fromEntries(
    Object.entries(snapshot.jobChecksums).filter(([jobId]) => !generated.has(jobId))
  );
  return {
    sessionId: snapshot.sessionId,
    recordedGeneration: snapshot.catalogGeneration,
    currentGeneration,
    drift: diffRunList(recorded, catalog, currentRunList(selection, catalog)),
  };
}

/**
 * Loads the stored session when there is one and resumes it, or starts a new
 * one. A generation mismatch is never resolved here: the caller's `decide`
 * picks abort, discard or accept.
 */
export async function openSession(input: OpenSessionInput, deps: SessionDeps): Promise<OpenedSession> {
  const catalogGeneration = computeCatalogGeneration(input.catalog);
  if (input.freshSession) {
    await deps.snapshots.discard();
  }

  const startNew = async (): Promise<SessionController> =>
    SessionController.start(
      {
        sessionId: input.sessionId,
        catalog: input.catalog,
        catalogGeneration,
        selection: selectionForNew(input),
        environment: input.environment,
        manifest: input.manifest,
      },
      deps
    );

  const loaded = await deps.snapshots.load();
  if (!shouldVerifyOnBoot(loaded)) {
    return { controller: await startNew(), resumed: false };
  }
  log.info(`loaded ${deps.snapshots.location} (sessionId=${loaded.sessionId}, phase=${loaded.phase})`);

  const selection = selectionForResume(loaded, input.catalog);
  const conflict = detectConflict(loaded, input.catalog, selection, catalogGeneration);
  if (conflict) {
    log.warn(
      `catalog changed since the session was saved: added=${conflict.drift.added.length} removed=${conflict.drift.removed.length} changed=${conflict.drift.changed.length}`
    );
    const decision = await input.decide(conflict);
    if (decision === "abort") {
      throw new ResumeConflictError(loaded.sessionId, loaded.catalogGeneration, catalogGeneration);
    }
    if (decision === "discard") {
      await deps.snapshots.discard();
      return { controller: await startNew(), resumed: false, conflict };
    }
    for (const jobId of conflict.drift.removed) {
      log.warn(`dropping ${jobId}: no longer in the catalog`);
    }
  }

  const controller = await SessionController.resume(
    { snapshot: loaded, catalog: input.catalog, catalogGeneration, selection },
    deps
  );
  return { controller, resumed: true, conflict };
}
