import test from "node:test";
import assert from "node:assert/strict";
import { DuplicateJobIdError, TemplateExpansionError } from "../../../src/core/errors/engine.errors";
import { loadCatalog } from "../../../src/core/job/catalog";
import { ResourceStore } from "../../../src/core/resource/resource.store";
import { simpleEngine } from "../../../src/core/template/render.engines";
import { expand, expandIntoCatalog } from "../../../src/core/template/template.expander";

function catalogWith(template: Record<string, unknown>, extraJobs: Record<string, unknown>[] = []) {
  const { catalog, diagnostics } = loadCatalog({
    namespace: "ns",
    jobs: [{ id: "device", type: "resource", command: "udev_resource" }, ...extraJobs],
    templates: [template],
  });
  assert.deepEqual(diagnostics, []);
  const [loaded] = catalog.templates;
  assert.ok(loaded);
  return { catalog, template: loaded };
}

function devices(rows: Record<string, string>[]): ResourceStore {
  return ResourceStore.fromPlain({ "ns::device": rows });
}

const DISK_TEMPLATE = {
  id: "per-disk",
  resource: "device",
  filter: "device.category == 'DISK'",
  unit: { id: "disk-{name}", type: "automated", command: "smartctl /dev/{name}", summary: "Disk {__index__}" },
};

test("expand: one job per matching record, index counts matches only", () => {
  const { template } = catalogWith(DISK_TEMPLATE);
  const jobs = expand(
    template,
    devices([
      { name: "eth0", category: "NETWORK" },
      { name: "sda", category: "DISK" },
      { name: "sdb", category: "DISK" },
    ])
  );
  assert.deepEqual(
    jobs.map((job) => [job.id.toString(), job.summary, job.command, job.origin]),
    [
      ["ns::disk-sda", "Disk 0", "smartctl /dev/sda", "ns::per-disk"],
      ["ns::disk-sdb", "Disk 1", "smartctl /dev/sdb", "ns::per-disk"],
    ]
  );
});

test("expand: filter lines may read other published groups", () => {
  const { template } = catalogWith({ ...DISK_TEMPLATE, filter: "device.category == 'DISK'\nmanifest.has_smart == 'True'" });
  const rows = [{ name: "sda", category: "DISK" }];
  const withManifest = (answer: string) =>
    ResourceStore.fromPlain({ "ns::device": rows, manifest: [{ has_smart: answer }] });
  assert.deepEqual(
    expand(template, withManifest("True")).map((job) => job.id.toString()),
    ["ns::disk-sda"]
  );
  assert.deepEqual(expand(template, withManifest("False")), []);
  assert.deepEqual(expand(template, devices(rows)), []);
});

test("expand: repeated expansion yields the same ids", () => {
  const { template } = catalogWith(DISK_TEMPLATE);
  const store = devices([{ name: "sda", category: "DISK" }]);
  const first = expand(template, store);
  const second = expand(template, store);
  assert.deepEqual(
    second.map((job) => job.id),
    first.map((job) => job.id)
  );
  assert.equal(second[0]?.checksum, first[0]?.checksum);
});

test("expand: duplicate rendered ids reject the expansion", () => {
  const { template } = catalogWith(DISK_TEMPLATE);
  assert.throws(
    () =>
      expand(
        template,
        devices([
          { name: "sda", category: "DISK" },
          { name: "sda", category: "DISK" },
        ])
      ),
    (error: unknown) =>
      error instanceof DuplicateJobIdError && error.message === "DUPLICATE_JOB_ID ns::disk-sda (from ns::per-disk)"
  );
});

test("expand: a missing field names the failing instance", () => {
  const { template } = catalogWith({ id: "t", resource: "device", unit: { id: "x-{name}", type: "manual" } });
  assert.throws(
    () => expand(template, devices([{ name: "ok" }, { serial: "42" }])),
    (error: unknown) =>
      error instanceof TemplateExpansionError &&
      error.message === "TEMPLATE_EXPANSION_ERROR ns::t: instance 1: RENDER_ERROR missing key 'name'"
  );
});

test("expand: jinja templates support conditionals", () => {
  const { template } = catalogWith({
    id: "per-nic",
    resource: "device",
    engine: "jinja2",
    unit: {
      id: "nic-{{ name }}",
      type: "manual",
      summary: "{% if speed == '1000' %}gigabit{% else %}slow{% endif %} link on {{ name }}",
    },
  });
  const jobs = expand(template, devices([{ name: "eth0", speed: "1000" }, { name: "eth1", speed: "100" }]));
  assert.deepEqual(
    jobs.map((job) => [job.id.toString(), job.summary]),
    [
      ["ns::nic-eth0", "gigabit link on eth0"],
      ["ns::nic-eth1", "slow link on eth1"],
    ]
  );
});

test("expandIntoCatalog: rendered ids may not take a static job's id", () => {
  const { catalog, template } = catalogWith(DISK_TEMPLATE, [{ id: "disk-sda", type: "manual" }]);
  assert.throws(
    () => expandIntoCatalog(catalog, template, devices([{ name: "sda", category: "DISK" }])),
    DuplicateJobIdError
  );
});

test("expandIntoCatalog: replaces earlier output and drops unresolved jobs", () => {
  const { catalog, template } = catalogWith({
    id: "per-dev",
    resource: "device",
    unit: { id: "check-{name}", type: "manual", depends: "{dep}" },
  });
  const first = expandIntoCatalog(
    catalog,
    template,
    devices([
      { name: "a", dep: "device" },
      { name: "b", dep: "nope" },
    ])
  );
  assert.deepEqual(
    first.generated.map((job) => job.id.toString()),
    ["ns::check-a"]
  );
  assert.deepEqual(first.diagnostics, [
    { unit: "ns::check-b", code: "UNRESOLVED_RELATION", message: "depends 'ns::nope' does not resolve" },
  ]);

  const second = expandIntoCatalog(first.catalog, template, devices([{ name: "c", dep: "device" }]));
  assert.deepEqual(
    second.catalog.jobs.map((job) => job.id.toString()),
    ["ns::device", "ns::check-c"]
  );
});

test("simple engine: doubled braces are literal, positional fields work", () => {
  const rendered = simpleEngine.render("{{raw}} {0}/{__resource_id__}", {
    fields: { name: "sda" },
    positional: ["sda"],
    index: 0,
    resourceId: "ns::device",
  });
  assert.equal(rendered, "{raw} sda/ns::device");
  assert.throws(
    () => simpleEngine.render("{name!r}", { fields: { name: "x" }, positional: [], index: 0, resourceId: "r" }),
    /RENDER_ERROR unsupported replacement field/
  );
});
