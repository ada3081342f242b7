import { createLog } from "../core/_shared/log";
import {
  DuplicateJobIdError,
  SessionStateError,
  TemplateExpansionError,
} from "../core/errors/engine.errors";
import type { Catalog } from "../core/job/catalog";
import { hasFlag, STATIC_ORIGIN, type Job, type Outcome } from "../core/job/job.types";
import { normalizeManifestAnswer } from "../core/job/manifest";
import { estimateDuration, resolve, type DurationEstimate } from "../core/plan/dependency_graph";
import { assessReadiness, formatInhibitors } from "../core/plan/readiness";
import { selectJobs, type TestPlan } from "../core/plan/test_plan";
import type { ResourceCache } from "../core/resource/resource.cache";
import { parseResourceOutput } from "../core/resource/resource.output";
import type { ResourceRecord } from "../core/resource/resource.record";
import { MANIFEST_GROUP, ResourceStore } from "../core/resource/resource.store";
import { emptyResult, type CommandLauncher, type ExecutionResult, type InteractionPort } from "../core/runner/execution.types";
import type { JobRunnerRegistry } from "../core/runner/job_runner.registry";
import { expandIntoCatalog } from "../core/template/template.expander";
import { assertTransition, phaseOnLoad } from "./session.machine";
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
  type JobResultRecord,
  type ResumePoint,
  type SessionPhase,
  type SessionSnapshot,
  type SnapshotStore,
} from "./session.types";

const log = createLog("session");

const MANIFEST_ATTEMPTS = 3;

export type ResumePolicy = "pass" | "crash";

export type SessionSelection =
  | { readonly kind: "plan"; readonly plan: TestPlan }
  | { readonly kind: "jobs"; readonly jobIds: readonly string[] };

export interface SessionDeps {
  readonly snapshots: SnapshotStore;
  readonly runners: JobRunnerRegistry;
  readonly launcher: CommandLauncher;
  readonly interaction: InteractionPort;
  /** Outcome given to a `noreturn` job found on restart. */
  readonly resumePolicy: ResumePolicy;
  readonly resourceCache?: ResourceCache;
  /** Variables commands may inherit before per-session overrides; filtered by the launcher. */
  readonly baseEnvironment?: Readonly<Record<string, string>>;
  readonly now?: () => Date;
}

export interface StartSessionInput {
  readonly sessionId: string;
  readonly catalog: Catalog;
  readonly catalogGeneration: string;
  readonly selection: SessionSelection;
  readonly environment?: Readonly<Record<string, string>>;
  readonly manifest?: Readonly<Record<string, string>>;
}

export interface ResumeSessionInput {
  readonly snapshot: SessionSnapshot;
  readonly catalog: Catalog;
  readonly catalogGeneration: string;
  readonly selection: SessionSelection;
}

export type StepReport =
  | { kind: "settled"; job: Job; outcome: Outcome; ran: boolean }
  | { kind: "suspended"; job: Job }
  | { kind: "paused"; nextJob: Job }
  | { kind: "completed" };

interface ControllerInit {
  readonly sessionId: string;
  readonly catalog: Catalog;
  readonly catalogGeneration: string;
  readonly selection: SessionSelection;
  readonly store: ResourceStore;
  readonly environment: Readonly<Record<string, string>>;
  readonly manifest: Record<string, string>;
  readonly phase: SessionPhase;
  readonly results: Map<string, JobResultRecord>;
  readonly createdAt: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns one session's mutable state and moves it one job at a time, writing a
 * snapshot after every transition and before every job start.
 */
export class SessionController {
  readonly sessionId: string;
  private catalog: Catalog;
  private readonly catalogGeneration: string;
  private readonly selection: SessionSelection;
  private readonly store: ResourceStore;
  private readonly environment: Readonly<Record<string, string>>;
  private readonly manifest: Record<string, string>;
  private phase: SessionPhase;
  private readonly results: Map<string, JobResultRecord>;
  private readonly createdAt: string;
  private runList: Job[] = [];
  private jobChecksums: Record<string, string> = {};
  private resumePoint: ResumePoint | null = null;
  private stopRequested = false;

  private constructor(
    init: ControllerInit,
    private readonly deps: SessionDeps
  ) {
    this.sessionId = init.sessionId;
    this.catalog = init.catalog;
    this.catalogGeneration = init.catalogGeneration;
    this.selection = init.selection;
    this.store = init.store;
    this.environment = init.environment;
    this.manifest = init.manifest;
    this.phase = init.phase;
    this.results = init.results;
    this.createdAt = init.createdAt;
  }

  static async start(input: StartSessionInput, deps: SessionDeps): Promise<SessionController> {
    const now = (deps.now ?? (() => new Date()))().toISOString();
    const environment = { ...(input.environment ?? {}) };
    const manifest = { ...(input.manifest ?? {}) };
    const controller = new SessionController(
      {
        sessionId: input.sessionId,
        catalog: input.catalog,
        catalogGeneration: input.catalogGeneration,
        selection: input.selection,
        store: new ResourceStore({ manifest, environment }),
        environment,
        manifest,
        phase: "NEW",
        results: new Map(),
        createdAt: now,
      },
      deps
    );
    controller.resolveRunList();
    await controller.collectManifest();
    await controller.persist();
    log.info(`initialized new session (sessionId=${input.sessionId}, jobs=${controller.runList.length})`);
    return controller;
  }

  /**
   * Rebuilds a session from its snapshot and settles whatever the previous
   * process left in flight. Run-list ids missing from `catalog` are dropped
   * with a notice.
   */
  static async resume(input: ResumeSessionInput, deps: SessionDeps): Promise<SessionController> {
    const { snapshot } = input;
    const manifest = { ...snapshot.manifest };
    const store = ResourceStore.fromPlain(snapshot.resources);
    store.setManifest(manifest);
    store.setEnvironment(snapshot.environment);

    const controller = new SessionController(
      {
        sessionId: snapshot.sessionId,
        catalog: input.catalog,
        catalogGeneration: input.catalogGeneration,
        selection: input.selection,
        store,
        environment: { ...snapshot.environment },
        manifest,
        phase: phaseOnLoad(snapshot),
        results: new Map(Object.entries(snapshot.results)),
        createdAt: snapshot.createdAt,
      },
      deps
    );
    controller.restoreGeneratedJobs(snapshot.generatedJobs);
    controller.restoreRunList(snapshot.runList);
    controller.jobChecksums = { ...snapshot.jobChecksums };
    controller.settleResumePoint(snapshot.resumePoint);
    if (controller.phase !== "COMPLETED") {
      controller.transition("RUNNING");
    }
    await controller.persist();
    log.info(`resumed session (sessionId=${snapshot.sessionId}, remaining=${controller.remaining().length})`);
    return controller;
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  get jobs(): readonly Job[] {
    return this.runList;
  }

  get resources(): ResourceStore {
    return this.store;
  }

  result(jobId: string): JobResultRecord | undefined {
    return this.results.get(jobId);
  }

  /** Jobs on the run list without a recorded outcome, in run order. */
  remaining(): Job[] {
    return this.runList.filter((job) => !this.results.has(job.id.toString()));
  }

  estimateRemaining(): DurationEstimate {
    return estimateDuration(this.remaining());
  }

  outcomes(): Map<string, Outcome> {
    return new Map([...this.results].map(([jobId, record]) => [jobId, record.outcome]));
  }

  summary(): Record<Outcome, number> {
    const counts: Record<Outcome, number> = {
      pass: 0,
      fail: 0,
      skip: 0,
      crash: 0,
      "not-supported": 0,
      "not-started": 0,
    };
    for (const job of this.runList) {
      const record = this.results.get(job.id.toString());
      if (record) {
        counts[record.outcome] += 1;
      }
    }
    return counts;
  }

  /** Takes effect at the next job boundary. */
  requestStop(): void {
    this.stopRequested = true;
  }

  async runNext(): Promise<StepReport> {
    if (this.phase === "COMPLETED") {
      return { kind: "completed" };
    }
    this.transition("RUNNING");

    const job = this.remaining()[0];
    if (!job) {
      this.resumePoint = null;
      this.transition("COMPLETED");
      await this.persist();
      log.info(`session completed (sessionId=${this.sessionId})`);
      return { kind: "completed" };
    }

    if (this.stopRequested) {
      this.stopRequested = false;
      this.resumePoint = { jobId: job.id.toString(), reason: "pause", at: this.timestamp() };
      this.transition("SUSPENDED");
      await this.persist();
      log.info(`paused before ${job.id.toString()}`);
      return { kind: "paused", nextJob: job };
    }

    const readiness = assessReadiness(job, this.outcomes(), this.store);
    if (readiness.kind === "blocked") {
      const result = emptyResult(readiness.outcome);
      this.record(job, result, [formatInhibitors(readiness.inhibitors)], null);
      this.afterJob(job, result, undefined);
      await this.persist();
      log.info(`${job.id.toString()} -> ${readiness.outcome} (${formatInhibitors(readiness.inhibitors)})`);
      return { kind: "settled", job, outcome: readiness.outcome, ran: false };
    }

    const startedAt = this.timestamp();
    // A noreturn job may take the process down before the launcher answers.
    const reason = hasFlag(job, "noreturn") ? "noreturn" : "running";
    this.resumePoint = { jobId: job.id.toString(), reason, at: startedAt };
    await this.persist();

    const cached = this.cachedRecords(job);
    const result = cached ? emptyResult("pass") : await this.execute(job);

    if (result.noReturn) {
      this.resumePoint = { jobId: job.id.toString(), reason: "noreturn", at: this.timestamp() };
      this.transition("SUSPENDED");
      await this.persist();
      log.info(`${job.id.toString()} started without return; session suspended`);
      return { kind: "suspended", job };
    }

    this.resumePoint = null;
    const comments = [
      ...(result.comment ? [result.comment] : []),
      ...(cached ? ["resource loaded from cache"] : []),
    ];
    this.record(job, result, comments, startedAt);
    this.afterJob(job, result, cached);
    await this.persist();
    log.info(`${job.id.toString()} -> ${result.outcome}`);
    return { kind: "settled", job, outcome: result.outcome, ran: true };
  }

  toSnapshot(): SessionSnapshot {
    return {
      format: SNAPSHOT_FORMAT,
      version: SNAPSHOT_VERSION,
      sessionId: this.sessionId,
      catalogGeneration: this.catalogGeneration,
      testPlan: this.selection.kind === "plan" ? this.selection.plan.id : null,
      phase: this.phase,
      runList: this.runList.map((job) => job.id.toString()),
      generatedJobs: this.catalog.jobs
        .filter((job) => job.origin !== STATIC_ORIGIN)
        .map((job) => job.id.toString()),
      jobChecksums: { ...this.jobChecksums },
      results: Object.fromEntries(this.results),
      resumePoint: this.resumePoint,
      environment: { ...this.environment },
      manifest: { ...this.manifest },
      resources: this.store.toPlain(),
      createdAt: this.createdAt,
      updatedAt: this.timestamp(),
    };
  }

  private timestamp(): string {
    return (this.deps.now ?? (() => new Date()))().toISOString();
  }

  private transition(to: SessionPhase): void {
    if (this.phase === to && to !== "RUNNING") {
      return;
    }
    assertTransition(this.phase, to);
    this.phase = to;
  }

  private async persist(): Promise<void> {
    await this.deps.snapshots.save(this.toSnapshot());
  }

  private seedJobs(): Job[] {
    if (this.selection.kind === "plan") {
      const picked = selectJobs(this.selection.plan, this.catalog.jobs);
      return [...picked.bootstrap, ...picked.selected];
    }
    const seeds: Job[] = [];
    for (const jobId of this.selection.jobIds) {
      const job = this.catalog.get(jobId);
      if (job) {
        seeds.push(job);
      } else {
        log.warn(`selected job ${jobId} is not in the catalog; dropped`);
      }
    }
    const seeded = new Set(seeds);
    for (const job of this.catalog.jobs) {
      if (job.origin !== STATIC_ORIGIN && !seeded.has(job)) {
        seeds.push(job);
      }
    }
    return seeds;
  }

  private resolveRunList(): void {
    const resolved = resolve(this.seedJobs(), this.catalog);
    if (resolved.kind === "cycle") {
      throw resolved.error;
    }
    if (resolved.kind === "unresolved") {
      throw new SessionStateError(`SESSION_RESOLVE_ERROR ${resolved.message}`);
    }
    this.runList = resolved.order;
    this.jobChecksums = Object.fromEntries(resolved.order.map((job) => [job.id.toString(), job.checksum]));
  }

  private restoreGeneratedJobs(recorded: readonly string[]): void {
    for (const group of this.store.publishedGroups()) {
      this.expandTemplates(group);
    }
    const missing = recorded.filter((jobId) => !this.catalog.has(jobId));
    for (const jobId of missing) {
      log.warn(`generated job ${jobId} could not be re-created from the recorded resources`);
    }
  }

  private restoreRunList(recorded: readonly string[]): void {
    const runList: Job[] = [];
    for (const jobId of recorded) {
      const job = this.catalog.get(jobId);
      if (job) {
        runList.push(job);
      } else {
        log.warn(`dropping ${jobId}: present in the snapshot, absent from the current catalog`);
      }
    }
    this.runList = runList;
  }

  private settleResumePoint(point: ResumePoint | null): void {
    this.resumePoint = null;
    if (!point) {
      return;
    }
    const job = this.catalog.get(point.jobId);
    if (!job) {
      log.warn(`resume point ${point.jobId} is not in the current catalog; ignored`);
      return;
    }
    if (point.reason === "running") {
      const result = emptyResult("crash", { diagnostic: "INTERRUPTED job did not finish before the session stopped" });
      this.record(job, result, ["job was running when the session was interrupted"], point.at);
      this.afterJob(job, result, undefined);
      log.warn(`${point.jobId} was interrupted; recorded as crash`);
      return;
    }
    if (point.reason === "noreturn") {
      const outcome = this.deps.resumePolicy;
      this.record(job, emptyResult(outcome), [`noreturn job settled as ${outcome} on restart`], point.at);
      log.info(`${point.jobId} returned through a restart; recorded as ${outcome}`);
    }
  }

  private async collectManifest(): Promise<void> {
    const wanted = new Set<string>();
    for (const job of this.runList) {
      job.requires?.fieldsOf(MANIFEST_GROUP).forEach((field) => wanted.add(field));
    }
    for (const entry of this.catalog.manifest) {
      if (!wanted.has(entry.key) || entry.key in this.manifest) {
        continue;
      }
      for (let attempt = 0; attempt < MANIFEST_ATTEMPTS; attempt += 1) {
        const answer = normalizeManifestAnswer(entry, await this.deps.interaction.askManifest(entry));
        if (answer !== undefined) {
          this.manifest[entry.key] = answer;
          break;
        }
      }
      if (!(entry.key in this.manifest)) {
        log.warn(`manifest question ${entry.id} left unanswered`);
      }
    }
    this.store.setManifest(this.manifest);
  }

  private launchEnvironment(): Record<string, string> {
    return { ...(this.deps.baseEnvironment ?? {}), ...this.environment };
  }

  private async execute(job: Job): Promise<ExecutionResult> {
    return this.deps.runners.execute(job, {
      environment: this.launchEnvironment(),
      sessionId: this.sessionId,
      launcher: this.deps.launcher,
      interaction: this.deps.interaction,
    });
  }

  private cachedRecords(job: Job): ResourceRecord[] | undefined {
    if (job.type !== "resource" || !hasFlag(job, "cachable") || !this.deps.resourceCache) {
      return undefined;
    }
    return this.deps.resourceCache.get(job.id.toString(), job.checksum);
  }

  private record(job: Job, result: ExecutionResult, comments: readonly string[], startedAt: string | null): void {
    this.results.set(job.id.toString(), {
      outcome: result.outcome,
      comments: comments.filter((comment) => comment.length > 0),
      startedAt,
      finishedAt: this.timestamp(),
      returnCode: result.returnCode,
      durationMs: result.durationMs,
      diagnostic: result.diagnostic ?? null,
    });
  }

  /** Publishes a resource job's records and re-expands the templates bound to it. */
  private afterJob(job: Job, result: ExecutionResult, cached: ResourceRecord[] | undefined): void {
    if (job.type !== "resource") {
      return;
    }
    const group = job.id.toString();
    let records: ResourceRecord[] = [];
    if (cached) {
      records = cached;
    } else if (result.outcome === "pass" || result.outcome === "fail") {
      records = parseResourceOutput(result.output);
      if (result.outcome === "pass" && hasFlag(job, "cachable")) {
        this.deps.resourceCache?.put(group, job.checksum, records);
      }
    }
    this.store.publish(group, records);
    log.debug(`published ${group} records=${records.length}`);

    const before = this.catalog;
    if (this.expandTemplates(group)) {
      try {
        this.resolveRunList();
      } catch (error) {
        log.error(`generated jobs for ${group} rejected: ${errorMessage(error)}`);
        this.catalog = before;
        this.resolveRunList();
      }
    }
  }

  /** Returns whether the catalog changed. Rejected expansions are logged and leave it as it was. */
  private expandTemplates(group: string): boolean {
    let changed = false;
    for (const template of this.catalog.templatesFor(group)) {
      try {
        const expansion = expandIntoCatalog(this.catalog, template, this.store);
        this.catalog = expansion.catalog;
        changed = true;
      } catch (error) {
        if (error instanceof TemplateExpansionError || error instanceof DuplicateJobIdError) {
          log.error(`template ${template.id} rejected: ${error.message}`);
          continue;
        }
        throw error;
      }
    }
    return changed;
  }
}
