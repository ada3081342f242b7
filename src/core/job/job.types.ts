import { checksumOf } from "../_shared/utils/checksum";
import { deepFreeze } from "../_shared/utils/deep_freeze";
import type { ResourceProgram } from "../resource/resource.program";
import type { JobId } from "./job_id";

export const JOB_TYPES = Object.freeze([
  "manual",
  "automated",
  "interactive",
  "interactive-verify",
  "resource",
  "attachment",
] as const);

export type JobType = (typeof JOB_TYPES)[number];

export const KNOWN_FLAGS = Object.freeze([
  "noreturn",
  "simple",
  "fail-on-resource",
  "also-after-suspend",
  "cachable",
  "explicit-fail",
] as const);

export type KnownFlag = (typeof KNOWN_FLAGS)[number];

export const OUTCOMES = Object.freeze([
  "pass",
  "fail",
  "skip",
  "crash",
  "not-supported",
  "not-started",
] as const);

export type Outcome = (typeof OUTCOMES)[number];

/** Outcomes that mean the job's command (or question) actually ran to an end. */
export const RUN_OUTCOMES: ReadonlySet<Outcome> = new Set<Outcome>(["pass", "fail", "crash"]);

export const STATIC_ORIGIN = "static";

export function isJobType(value: string): value is JobType {
  return (JOB_TYPES as readonly string[]).includes(value);
}

export function isOutcome(value: string): value is Outcome {
  return (OUTCOMES as readonly string[]).includes(value);
}

export interface Job {
  readonly id: JobId;
  readonly type: JobType;
  readonly summary: string;
  readonly description?: string;
  readonly command?: string;
  /** Source text of the resource program, kept for snapshots and reports. */
  readonly requiresText?: string;
  readonly requires?: ResourceProgram;
  readonly imports: Readonly<Record<string, string>>;
  readonly depends: readonly JobId[];
  readonly after: readonly JobId[];
  readonly salvages: readonly JobId[];
  readonly flags: ReadonlySet<string>;
  /** Seconds. */
  readonly estimatedDuration?: number;
  /** Account the command runs as; absent means the session's own account. */
  readonly user?: string;
  /** Environment variable names the command is allowed to see. */
  readonly environ: readonly string[];
  /** `static`, or the id of the template that rendered the job. */
  readonly origin: string;
  readonly checksum: string;
}

export type JobFields = Omit<Job, "checksum">;

export function hasFlag(job: Job, flag: KnownFlag): boolean {
  return job.flags.has(flag);
}

/** Resource groups the job reads, which makes their producers implicit prerequisites. */
export function resourceGroupsOf(job: Job): string[] {
  return job.requires?.requiredGroups ?? [];
}

export function computeJobChecksum(fields: JobFields): string {
  return checksumOf({
    id: fields.id.toString(),
    type: fields.type,
    summary: fields.summary,
    description: fields.description ?? null,
    command: fields.command ?? null,
    requires: fields.requiresText ?? null,
    imports: fields.imports,
    depends: fields.depends.map((id) => id.toString()),
    after: fields.after.map((id) => id.toString()),
    salvages: fields.salvages.map((id) => id.toString()),
    flags: [...fields.flags].sort(),
    estimatedDuration: fields.estimatedDuration ?? null,
    user: fields.user ?? null,
    environ: fields.environ,
  });
}

export function createJob(fields: JobFields): Job {
  const job: Job = {
    ...fields,
    imports: deepFreeze({ ...fields.imports }),
    depends: Object.freeze([...fields.depends]),
    after: Object.freeze([...fields.after]),
    salvages: Object.freeze([...fields.salvages]),
    flags: new Set(fields.flags),
    environ: Object.freeze([...fields.environ]),
    checksum: computeJobChecksum(fields),
  };
  return Object.freeze(job);
}
