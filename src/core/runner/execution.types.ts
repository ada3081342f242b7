import type { ManifestEntry } from "../job/manifest";
import type { Job, Outcome } from "../job/job.types";

export interface ExecutionResult {
  readonly outcome: Outcome;
  readonly output: string;
  readonly errorOutput: string;
  /** `null` when the command never produced an exit status. */
  readonly returnCode: number | null;
  readonly durationMs: number;
  /** Set when the command was started and deliberately not waited for. */
  readonly noReturn?: boolean;
  readonly diagnostic?: string;
  /** Operator comment, for jobs answered through the interaction port. */
  readonly comment?: string;
}

export type ManualVerdict = "pass" | "fail" | "skip";

export interface ManualAnswer {
  readonly outcome: ManualVerdict;
  readonly comment?: string;
}

/** Operator-facing questions. Answers are recorded by the session and never asked again. */
export interface InteractionPort {
  /** Manual jobs: the operator performs the steps and reports the verdict. */
  confirmManual(job: Job): Promise<ManualAnswer>;
  /** Interactive-verify jobs: the operator judges what the command did. */
  verifyResult(job: Job, result: ExecutionResult): Promise<ManualAnswer>;
  /** Asked when a `fail` answer needs an explanation (`explicit-fail`). */
  askComment(job: Job): Promise<string>;
  askManifest(entry: ManifestEntry): Promise<string>;
}

export interface LaunchContext {
  /** Variables available to commands; filtered per job and by the launcher allow-list. */
  readonly environment: Readonly<Record<string, string>>;
  readonly sessionId: string;
}

export interface CommandLauncher {
  run(job: Job, context: LaunchContext): Promise<ExecutionResult>;
}

export function emptyResult(outcome: Outcome, fields: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    output: "",
    errorOutput: "",
    returnCode: null,
    durationMs: 0,
    ...fields,
    outcome,
  };
}
