import { hasFlag, type Job, type JobType } from "../job/job.types";
import {
  emptyResult,
  type CommandLauncher,
  type ExecutionResult,
  type InteractionPort,
  type LaunchContext,
  type ManualAnswer,
} from "./execution.types";

export interface RunContext extends LaunchContext {
  readonly launcher: CommandLauncher;
  readonly interaction: InteractionPort;
}

export type JobRunner = (job: Job, context: RunContext) => Promise<ExecutionResult> | ExecutionResult;

export interface JobRunnerRegistry {
  register(type: JobType, runner: JobRunner): this;
  /** Never throws: a missing runner is `not-supported`, a throwing one is `crash`. */
  execute(job: Job, context: RunContext): Promise<ExecutionResult>;
}

class DefaultJobRunnerRegistry implements JobRunnerRegistry {
  private readonly runners = new Map<JobType, JobRunner>();

  register(type: JobType, runner: JobRunner): this {
    this.runners.set(type, runner);
    return this;
  }

  async execute(job: Job, context: RunContext): Promise<ExecutionResult> {
    const runner = this.runners.get(job.type);
    if (!runner) {
      return emptyResult("not-supported", { diagnostic: `JOB_RUNNER_UNAVAILABLE:${job.type}` });
    }

    try {
      return await runner(job, context);
    } catch (error) {
      return emptyResult("crash", {
        diagnostic: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      });
    }
  }
}

export function createJobRunnerRegistry(): JobRunnerRegistry {
  return new DefaultJobRunnerRegistry();
}

const COMMENT_ATTEMPTS = 3;

/** `explicit-fail` jobs do not accept a bare `fail`; the operator is asked for a reason. */
async function withRequiredComment(job: Job, answer: ManualAnswer, interaction: InteractionPort): Promise<ManualAnswer> {
  if (answer.outcome !== "fail" || !hasFlag(job, "explicit-fail") || answer.comment?.trim()) {
    return answer;
  }
  for (let attempt = 0; attempt < COMMENT_ATTEMPTS; attempt += 1) {
    const comment = (await interaction.askComment(job)).trim();
    if (comment) {
      return { outcome: "fail", comment };
    }
  }
  return answer;
}

const runCommand: JobRunner = (job, context) => context.launcher.run(job, context);

const runManual: JobRunner = async (job, context) => {
  const started = Date.now();
  const answer = await withRequiredComment(job, await context.interaction.confirmManual(job), context.interaction);
  return emptyResult(answer.outcome, { comment: answer.comment, durationMs: Date.now() - started });
};

const runInteractiveVerify: JobRunner = async (job, context) => {
  const result = await context.launcher.run(job, context);
  if (result.outcome === "crash" || result.noReturn) {
    return result;
  }
  const answer = await withRequiredComment(
    job,
    await context.interaction.verifyResult(job, result),
    context.interaction
  );
  return { ...result, outcome: answer.outcome, comment: answer.comment };
};

/** Runners for every job type the catalog accepts. */
export function createDefaultJobRunners(): JobRunnerRegistry {
  return createJobRunnerRegistry()
    .register("automated", runCommand)
    .register("resource", runCommand)
    .register("attachment", runCommand)
    .register("interactive", runCommand)
    .register("manual", runManual)
    .register("interactive-verify", runInteractiveVerify);
}
