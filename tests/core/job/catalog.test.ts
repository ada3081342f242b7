import test from "node:test";
import assert from "node:assert/strict";
import { CatalogLoadError } from "../../../src/core/errors/engine.errors";
import { loadCatalog } from "../../../src/core/job/catalog";
import { hasFlag } from "../../../src/core/job/job.types";

test("catalog: ids and relations are qualified with the catalog namespace", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "com.example",
    jobs: [
      { id: "cpu", type: "resource", command: "cpu_resource" },
      { id: "stress", type: "automated", command: "stress-ng", depends: "cpu", requires: "cpu.count > 1" },
    ],
  });
  assert.deepEqual(diagnostics, []);
  const stress = catalog.get("com.example::stress");
  assert.ok(stress);
  assert.deepEqual(
    stress.depends.map((id) => id.toString()),
    ["com.example::cpu"]
  );
  assert.deepEqual(stress.requires?.requiredGroups, ["com.example::cpu"]);
  assert.equal(stress.summary, "stress");
  assert.equal(catalog.declarationIndex("com.example::stress"), 1);
  assert.equal(catalog.declarationIndex("com.example::nope"), 2);
});

test("catalog: a malformed unit is excluded, the rest loads", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "good", type: "manual" },
      { id: "bad", type: "weird" },
      { id: "untyped", command: "true" },
    ],
  });
  assert.deepEqual(
    catalog.jobs.map((job) => job.id.toString()),
    ["ns::good"]
  );
  assert.deepEqual(diagnostics, [
    { unit: "ns::bad", code: "MALFORMED_UNIT", message: "CATALOG_LOAD_ERROR ns::bad: unknown job type 'weird'" },
    {
      unit: "ns::untyped",
      code: "MALFORMED_UNIT",
      message: "CATALOG_LOAD_ERROR ns::untyped: type is required unless the job is flagged simple",
    },
  ]);
});

test("catalog: simple jobs default to automated", () => {
  const { catalog } = loadCatalog({ namespace: "ns", jobs: [{ id: "quick", command: "true", flags: "simple" }] });
  assert.equal(catalog.get("ns::quick")?.type, "automated");
});

test("catalog: the first declaration of a duplicated id wins", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "a", type: "manual", summary: "first" },
      { id: "a", type: "manual", summary: "second" },
    ],
  });
  assert.equal(catalog.get("ns::a")?.summary, "first");
  assert.deepEqual(diagnostics, [
    { unit: "ns::a", code: "DUPLICATE_ID", message: "DUPLICATE_ID ns::a is declared more than once" },
  ]);
});

test("catalog: unresolved relations exclude the job and everything that needs it", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "root", type: "manual" },
      { id: "b", type: "manual", depends: ["missing"] },
      { id: "c", type: "manual", after: ["b"] },
    ],
  });
  assert.deepEqual(
    catalog.jobs.map((job) => job.id.toString()),
    ["ns::root"]
  );
  assert.deepEqual(diagnostics, [
    { unit: "ns::b", code: "UNRESOLVED_RELATION", message: "depends 'ns::missing' does not resolve" },
    { unit: "ns::c", code: "UNRESOLVED_RELATION", message: "after 'ns::b' does not resolve" },
  ]);
});

test("catalog: requires must name resource jobs", () => {
  const { diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "plain", type: "automated", command: "true" },
      { id: "needs", type: "automated", command: "true", requires: "plain.x == '1'" },
    ],
  });
  assert.deepEqual(diagnostics, [
    {
      unit: "ns::needs",
      code: "UNRESOLVED_RELATION",
      message: "resource 'ns::plain' is not produced by a resource job",
    },
  ]);
});

test("catalog: every job on a cycle is excluded with the cycle path", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "x", type: "manual", depends: "y" },
      { id: "y", type: "manual", after: "x" },
      { id: "z", type: "manual" },
    ],
  });
  assert.deepEqual(
    catalog.jobs.map((job) => job.id.toString()),
    ["ns::z"]
  );
  const message = "DEPENDENCY_CYCLE ns::x -> ns::y -> ns::x";
  assert.deepEqual(diagnostics, [
    { unit: "ns::x", code: "DEPENDENCY_CYCLE", message },
    { unit: "ns::y", code: "DEPENDENCY_CYCLE", message },
  ]);
});

test("catalog: also-after-suspend creates a sibling ordered after the noreturn jobs", () => {
  const { catalog } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "check", type: "automated", command: "check_usb", flags: "also-after-suspend" },
      { id: "suspend", type: "automated", command: "rtcwake -m mem", flags: "noreturn" },
    ],
  });
  const sibling = catalog.get("ns::after-suspend-check");
  assert.ok(sibling);
  assert.equal(sibling.summary, "check (after suspend)");
  assert.equal(sibling.command, "check_usb");
  assert.deepEqual(
    sibling.after.map((id) => id.toString()),
    ["ns::check", "ns::suspend"]
  );
  assert.equal(hasFlag(sibling, "also-after-suspend"), false);
  assert.notEqual(sibling.checksum, catalog.get("ns::check")?.checksum);
});

test("catalog: templates must point at a resource job", () => {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [
      { id: "device", type: "resource", command: "udev_resource" },
      { id: "manual", type: "manual" },
    ],
    templates: [
      { id: "per-device", resource: "device", unit: { id: "dev-{name}", type: "manual" } },
      { id: "wrong", resource: "manual", unit: { id: "x-{name}", type: "manual" } },
    ],
  });
  assert.deepEqual(
    catalog.templates.map((template) => template.id),
    ["ns::per-device"]
  );
  assert.deepEqual(
    catalog.templatesFor("ns::device").map((template) => template.id),
    ["ns::per-device"]
  );
  assert.deepEqual(diagnostics, [
    { unit: "ns::wrong", code: "UNRESOLVED_RELATION", message: "resource 'ns::manual' is not produced by a resource job" },
  ]);
});

test("catalog: test plans are found by full or partial id", () => {
  const { catalog } = loadCatalog({
    namespace: "ns",
    jobs: [{ id: "a", type: "manual" }],
    testPlans: [{ id: "smoke", include: "a" }],
  });
  assert.equal(catalog.testPlan("smoke")?.id, "ns::smoke");
  assert.equal(catalog.testPlan("ns::smoke")?.ordered, true);
  assert.equal(catalog.testPlan("other"), undefined);
});

test("catalog: a document that is not a catalog throws", () => {
  assert.throws(() => loadCatalog([]), CatalogLoadError);
  assert.throws(
    () => loadCatalog({ jobs: [], bogus: 1 }),
    (error: unknown) =>
      error instanceof CatalogLoadError && error.message === "CATALOG_LOAD_ERROR <catalog>: unknown field(s): bogus"
  );
});
