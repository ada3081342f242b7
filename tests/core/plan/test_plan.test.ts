import test from "node:test";
import assert from "node:assert/strict";
import { CatalogLoadError } from "../../../src/core/errors/engine.errors";
import { loadCatalog } from "../../../src/core/job/catalog";
import { compileIdPattern, selectJobs } from "../../../src/core/plan/test_plan";

const JOBS = ["setup", "disk-a", "disk-b", "net", "cpu"].map((id) => ({ id, type: "manual" }));

function planCatalog(plan: Record<string, unknown>) {
  const { catalog, diagnostics } = loadCatalog({ namespace: "ns", jobs: JOBS, testPlans: [plan] });
  assert.deepEqual(diagnostics, []);
  const [loaded] = catalog.testPlans;
  assert.ok(loaded);
  return { catalog, plan: loaded };
}

const ids = (jobs: readonly { id: { toString(): string } }[]) => jobs.map((job) => job.id.toString());

test("selectJobs: ordered plans rank by include pattern, bootstrap first", () => {
  const { catalog, plan } = planCatalog({
    id: "smoke",
    include: ["net", "disk-.*"],
    exclude: "disk-b",
    bootstrap: "setup",
  });
  assert.equal(plan.ordered, true);
  const selection = selectJobs(plan, catalog.jobs);
  assert.deepEqual(ids(selection.bootstrap), ["ns::setup"]);
  assert.deepEqual(ids(selection.selected), ["ns::net", "ns::disk-a"]);
});

test("selectJobs: unordered plans keep declaration order", () => {
  const { catalog, plan } = planCatalog({ id: "smoke", include: ["net", "disk-.*"], ordered: false });
  assert.deepEqual(ids(selectJobs(plan, catalog.jobs).selected), ["ns::disk-a", "ns::disk-b", "ns::net"]);
});

test("selectJobs: patterns match the whole id", () => {
  const { catalog, plan } = planCatalog({ id: "smoke", include: "disk" });
  assert.deepEqual(ids(selectJobs(plan, catalog.jobs).selected), []);
});

test("compileIdPattern: qualified patterns are used as written", () => {
  const pattern = compileIdPattern("other::.*", "ns", "ns::p");
  assert.equal(pattern.regex.test("other::x"), true);
  assert.equal(pattern.regex.test("ns::x"), false);
  assert.throws(() => compileIdPattern("(", "ns", "ns::p"), CatalogLoadError);
});

test("testPlan units: an empty include is a malformed unit", () => {
  const { catalog, diagnostics } = loadCatalog({ namespace: "ns", jobs: JOBS, testPlans: [{ id: "empty", include: [] }] });
  assert.equal(catalog.testPlans.length, 0);
  assert.deepEqual(diagnostics, [
    {
      unit: "ns::empty",
      code: "MALFORMED_UNIT",
      message: "CATALOG_LOAD_ERROR ns::empty: include must name at least one pattern",
    },
  ]);
});

test("catalog.testPlan: looks plans up by full or partial id", () => {
  const { catalog } = planCatalog({ id: "smoke", include: "net" });
  assert.equal(catalog.testPlan("smoke")?.id, "ns::smoke");
  assert.equal(catalog.testPlan("ns::smoke")?.id, "ns::smoke");
  assert.equal(catalog.testPlan("nope"), undefined);
});
