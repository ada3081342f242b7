import type { Interface } from "node:readline/promises";
import type { Job } from "../../src/core/job/job.types";
import type { ManifestEntry } from "../../src/core/job/manifest";
import type { ExecutionResult, InteractionPort, ManualAnswer, ManualVerdict } from "../../src/core/runner/execution.types";
import type { ConflictDecision, ResumeConflict } from "../../src/session/session.lifecycle";
import { normalizeConflictDecision } from "./run_session.args";

const VERDICTS: Readonly<Record<string, ManualVerdict>> = Object.freeze({
  p: "pass",
  pass: "pass",
  y: "pass",
  f: "fail",
  fail: "fail",
  n: "fail",
  s: "skip",
  skip: "skip",
});

function describeJob(job: Job): string {
  const lines = [`== ${job.summary} (${job.id.toString()})`];
  if (job.description) {
    lines.push(job.description);
  }
  return lines.join("\n");
}

async function askVerdict(rl: Interface, question: string): Promise<ManualAnswer> {
  for (;;) {
    const raw = (await rl.question(`${question} [p]ass/[f]ail/[s]kip: `)).trim().toLowerCase();
    const outcome = VERDICTS[raw];
    if (outcome) {
      return { outcome };
    }
  }
}

export function createTerminalInteraction(rl: Interface): InteractionPort {
  return {
    async confirmManual(job: Job) {
      rl.write(`${describeJob(job)}\n`);
      return askVerdict(rl, "Result?");
    },
    async verifyResult(job: Job, result: ExecutionResult) {
      rl.write(`${describeJob(job)}\n`);
      if (result.output) {
        rl.write(`${result.output.trimEnd()}\n`);
      }
      return askVerdict(rl, `Command exited with ${String(result.returnCode)}. Did it behave correctly?`);
    },
    async askComment(job: Job) {
      return rl.question(`Why did ${job.id.toString()} fail? `);
    },
    async askManifest(entry: ManifestEntry) {
      const hint = entry.valueType === "bool" ? " [y/n]" : " (number)";
      return rl.question(`${entry.prompt}${hint}: `);
    },
  };
}

export async function askConflictDecision(rl: Interface, conflict: ResumeConflict): Promise<ConflictDecision> {
  const { added, removed, changed } = conflict.drift;
  rl.write(
    `The job catalog changed since session ${conflict.sessionId} was saved.\n` +
      `  added:   ${added.join(", ") || "-"}\n` +
      `  removed: ${removed.join(", ") || "-"}\n` +
      `  changed: ${changed.join(", ") || "-"}\n`
  );
  for (;;) {
    const raw = await rl.question("Continue with [accept], start over with [discard], or [abort]? ");
    try {
      return normalizeConflictDecision(raw);
    } catch (error) {
      rl.write(`${error instanceof Error ? error.message : String(error)}\n`);
    }
  }
}
