import type { Outcome } from "../core/job/job.types";
import type { PlainResourceMap } from "../core/resource/resource.store";

export const SNAPSHOT_FORMAT = "checkrun.session";
export const SNAPSHOT_VERSION = 1;

export type SessionPhase = "NEW" | "RUNNING" | "SUSPENDED" | "INTERRUPTED" | "COMPLETED";

/**
 * Why the session stopped at `jobId`:
 * `running` - the job was in flight (a crash lands here),
 * `noreturn` - the job was started and not waited for,
 * `pause` - a stop was requested before the job started.
 */
export type ResumeReason = "running" | "noreturn" | "pause";

export interface ResumePoint {
  readonly jobId: string;
  readonly reason: ResumeReason;
  readonly at: string;
}

export interface JobResultRecord {
  readonly outcome: Outcome;
  readonly comments: readonly string[];
  readonly startedAt: string | null;
  readonly finishedAt: string;
  readonly returnCode: number | null;
  readonly durationMs: number;
  readonly diagnostic: string | null;
}

export interface SessionSnapshot {
  readonly format: typeof SNAPSHOT_FORMAT;
  readonly version: typeof SNAPSHOT_VERSION;
  readonly sessionId: string;
  readonly catalogGeneration: string;
  readonly testPlan: string | null;
  readonly phase: SessionPhase;
  /** Full ids in run order, including pulled-in prerequisites. */
  readonly runList: readonly string[];
  /** Ids rendered from templates, re-created on resume from `resources`. */
  readonly generatedJobs: readonly string[];
  /** Checksum of every job on the run list when it was last resolved. */
  readonly jobChecksums: Readonly<Record<string, string>>;
  readonly results: Readonly<Record<string, JobResultRecord>>;
  readonly resumePoint: ResumePoint | null;
  readonly environment: Readonly<Record<string, string>>;
  readonly manifest: Readonly<Record<string, string>>;
  readonly resources: PlainResourceMap;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface SnapshotStore {
  /** Where the snapshot lives, for log lines and errors. */
  readonly location: string;
  load(): Promise<SessionSnapshot | null>;
  /** Atomic; throws `SnapshotWriteError`. */
  save(next: SessionSnapshot): Promise<void>;
  /** Moves the current snapshot aside so the session can start over. */
  discard(): Promise<void>;
}
