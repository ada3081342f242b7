/** Intent: a resumed session settles what the previous process left in flight and carries on from the next job. */
import test from "node:test";
import assert from "node:assert/strict";
import type { Catalog } from "../../src/core/job/catalog";
import { SessionController } from "../../src/session/session.controller";
import type { SessionSnapshot } from "../../src/session/session.types";
import { catalogFrom, fakeDeps, sampleSnapshot, ScriptedLauncher, type FakeDeps } from "./session_fixtures";

const CATALOG = {
  jobs: [
    { id: "a", type: "manual" },
    { id: "b", type: "automated", command: "run-b" },
    { id: "c", type: "manual" },
  ],
};

const LEFT_RUNNING = sampleSnapshot({
  phase: "RUNNING",
  runList: ["ns::a", "ns::b", "ns::c"],
  jobChecksums: {},
  resumePoint: { jobId: "ns::b", reason: "running", at: "2026-01-01T00:00:02.000Z" },
  resources: {},
});

function resume(snapshot: SessionSnapshot, deps: FakeDeps, catalog: Catalog = catalogFrom(CATALOG)) {
  return SessionController.resume(
    {
      snapshot,
      catalog,
      catalogGeneration: snapshot.catalogGeneration,
      selection: { kind: "jobs", jobIds: snapshot.runList },
    },
    deps
  );
}

test("resume: a job that was running is recorded as crash", async () => {
  const deps = fakeDeps();
  const controller = await resume(LEFT_RUNNING, deps);

  assert.equal(controller.currentPhase, "RUNNING");
  assert.deepEqual(controller.result("ns::b"), {
    outcome: "crash",
    comments: ["job was running when the session was interrupted"],
    startedAt: "2026-01-01T00:00:02.000Z",
    finishedAt: "2026-01-01T00:00:00.000Z",
    returnCode: null,
    durationMs: 0,
    diagnostic: "INTERRUPTED job did not finish before the session stopped",
  });
  assert.deepEqual(
    controller.remaining().map((job) => job.id.toString()),
    ["ns::c"]
  );
  assert.equal(deps.snapshots.saved.length, 1);
  assert.equal(deps.snapshots.saved[0]?.resumePoint, null);
  assert.equal(deps.snapshots.saved[0]?.phase, "RUNNING");
  assert.deepEqual(deps.launcher.launched, []);
});

test("resume: a noreturn job is settled by the resume policy", async () => {
  const point = { jobId: "ns::b", reason: "noreturn" as const, at: "2026-01-01T00:00:02.000Z" };
  const snapshot = sampleSnapshot({ ...LEFT_RUNNING, phase: "SUSPENDED", resumePoint: point });

  const passed = await resume(snapshot, fakeDeps({ resumePolicy: "pass" }));
  assert.equal(passed.result("ns::b")?.outcome, "pass");
  assert.deepEqual(passed.result("ns::b")?.comments, ["noreturn job settled as pass on restart"]);

  const crashed = await resume(snapshot, fakeDeps({ resumePolicy: "crash" }));
  assert.equal(crashed.result("ns::b")?.outcome, "crash");
});

test("resume: a paused session runs the job it stopped before", async () => {
  const launcher = new ScriptedLauncher();
  const snapshot = sampleSnapshot({
    ...LEFT_RUNNING,
    phase: "SUSPENDED",
    resumePoint: { jobId: "ns::b", reason: "pause", at: "2026-01-01T00:00:02.000Z" },
  });
  const controller = await resume(snapshot, fakeDeps({ launcher }));

  assert.equal(controller.result("ns::b"), undefined);
  const report = await controller.runNext();
  assert.equal(report.kind, "settled");
  assert.deepEqual(launcher.launched, ["ns::b"]);
});

test("resume: run-list entries missing from the catalog are dropped", async () => {
  const snapshot = sampleSnapshot({ ...LEFT_RUNNING, runList: ["ns::a", "ns::gone", "ns::c"], resumePoint: null });
  const controller = await resume(snapshot, fakeDeps());
  assert.deepEqual(
    controller.jobs.map((job) => job.id.toString()),
    ["ns::a", "ns::c"]
  );
});

test("resume: generated jobs are re-created from recorded resources", async () => {
  const catalog = catalogFrom({
    jobs: [{ id: "dev", type: "resource", command: "list-devices" }],
    templates: [{ id: "per-disk", resource: "dev", unit: { id: "smart-{name}", type: "manual" } }],
  });
  const snapshot = sampleSnapshot({
    phase: "RUNNING",
    runList: ["ns::dev", "ns::smart-sda"],
    generatedJobs: ["ns::smart-sda"],
    jobChecksums: {},
    results: {
      "ns::dev": {
        outcome: "pass",
        comments: [],
        startedAt: "2026-01-01T00:00:00.000Z",
        finishedAt: "2026-01-01T00:00:01.000Z",
        returnCode: 0,
        durationMs: 1000,
        diagnostic: null,
      },
    },
    resumePoint: null,
    resources: { "ns::dev": [{ name: "sda" }] },
  });
  const controller = await resume(snapshot, fakeDeps(), catalog);

  assert.deepEqual(
    controller.remaining().map((job) => job.id.toString()),
    ["ns::smart-sda"]
  );
  assert.deepEqual(controller.resources.toPlain(), { "ns::dev": [{ name: "sda" }] });
});

test("resume: manifest and environment come back from the snapshot", async () => {
  const controller = await resume(sampleSnapshot({ ...LEFT_RUNNING, resumePoint: null }), fakeDeps());
  assert.deepEqual(controller.resources.records("manifest")[0]?.toJSON(), { has_gpu: "False" });
  assert.deepEqual(controller.resources.records("environment")[0]?.toJSON(), { LANG: "C" });
});

test("resume: a completed session stays completed", async () => {
  const deps = fakeDeps();
  const controller = await resume(sampleSnapshot({ ...LEFT_RUNNING, phase: "COMPLETED", resumePoint: null }), deps);
  assert.equal(controller.currentPhase, "COMPLETED");
  assert.deepEqual(await controller.runNext(), { kind: "completed" });
  assert.deepEqual(deps.launcher.launched, []);
});
