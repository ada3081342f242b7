import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { SessionController, StepReport } from "../../src/session/session.controller";

export const DEFAULT_RECURSION_LIMIT = 10_000;

export const SessionGraphState = Annotation.Root({
  lastReport: Annotation<StepReport | undefined>,
  steps: Annotation<number>,
  stepLog: Annotation<string[]>({
    reducer: (left, right) => left.concat(right),
    default: () => [],
  }),
});

export type SessionGraphValues = typeof SessionGraphState.State;

export function describeStep(report: StepReport): string {
  switch (report.kind) {
    case "settled":
      return `${report.job.id.toString()} ${report.outcome}${report.ran ? "" : " (not run)"}`;
    case "suspended":
      return `suspended at ${report.job.id.toString()}`;
    case "paused":
      return `paused before ${report.nextJob.id.toString()}`;
    case "completed":
      return "completed";
  }
}

/** One graph step per job; the loop ends on completion, suspension or a pause. */
export function buildSessionGraph(controller: SessionController) {
  return new StateGraph(SessionGraphState)
    .addNode("run_job", async (state: SessionGraphValues) => {
      const report = await controller.runNext();
      return { lastReport: report, steps: state.steps + 1, stepLog: [describeStep(report)] };
    })
    .addEdge(START, "run_job")
    .addConditionalEdges("run_job", (state: SessionGraphValues) =>
      state.lastReport?.kind === "settled" ? "run_job" : END
    )
    .compile();
}

export async function runSessionGraph(
  controller: SessionController,
  options: { readonly recursionLimit?: number } = {}
): Promise<SessionGraphValues> {
  const app = buildSessionGraph(controller);
  return app.invoke(
    { lastReport: undefined, steps: 0, stepLog: [] },
    { recursionLimit: options.recursionLimit ?? DEFAULT_RECURSION_LIMIT }
  );
}
