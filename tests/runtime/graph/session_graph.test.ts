/** Intent: the session graph drives the controller one job per step until it stops settling jobs. */
import test from "node:test";
import assert from "node:assert/strict";
import { emptyResult } from "../../../src/core/runner/execution.types";
import { SessionController } from "../../../src/session/session.controller";
import { describeStep, runSessionGraph } from "../../../runtime/graph/session_graph";
import { catalogFrom, fakeDeps, ScriptedLauncher } from "../../session/session_fixtures";

const CATALOG = catalogFrom({
  jobs: [
    { id: "dev", type: "resource", command: "list-devices" },
    { id: "disk-check", type: "automated", command: "check-disk", requires: "dev.kind == 'disk'" },
    { id: "ask", type: "manual" },
  ],
});

function start(launcher: ScriptedLauncher) {
  return SessionController.start(
    {
      sessionId: "bench-1",
      catalog: CATALOG,
      catalogGeneration: "gen-test",
      selection: { kind: "jobs", jobIds: ["ns::disk-check", "ns::ask"] },
    },
    fakeDeps({ launcher })
  );
}

test("session graph: runs every job then completes", async () => {
  const launcher = new ScriptedLauncher({
    "ns::dev": emptyResult("pass", { output: "kind: disk\n", returnCode: 0 }),
    "ns::disk-check": emptyResult("fail", { returnCode: 1 }),
  });
  const controller = await start(launcher);
  const state = await runSessionGraph(controller);

  assert.deepEqual(state.stepLog, ["ns::dev pass", "ns::disk-check fail", "ns::ask pass", "completed"]);
  assert.equal(state.steps, 4);
  assert.deepEqual(state.lastReport, { kind: "completed" });
  assert.equal(controller.currentPhase, "COMPLETED");
});

test("session graph: a stop request ends the run at a pause", async () => {
  const controller = await start(new ScriptedLauncher());
  controller.requestStop();
  const state = await runSessionGraph(controller);

  assert.deepEqual(state.stepLog, ["paused before ns::dev"]);
  assert.equal(state.steps, 1);
  assert.equal(controller.currentPhase, "SUSPENDED");
});

test("describeStep: names jobs by full id", async () => {
  const controller = await start(new ScriptedLauncher());
  const job = controller.jobs[0];
  assert.ok(job);
  assert.equal(describeStep({ kind: "suspended", job }), "suspended at ns::dev");
  assert.equal(describeStep({ kind: "completed" }), "completed");
});
