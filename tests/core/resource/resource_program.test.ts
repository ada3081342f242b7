import test from "node:test";
import assert from "node:assert/strict";
import { ResourceProgramError } from "../../../src/core/errors/engine.errors";
import { evaluate, lintProgram, ResourceProgram } from "../../../src/core/resource/resource.program";
import { ResourceRecord } from "../../../src/core/resource/resource.record";
import { ResourceStore } from "../../../src/core/resource/resource.store";

function storeOf(groups: Record<string, Record<string, string>[]>): ResourceStore {
  return ResourceStore.fromPlain(groups);
}

test("program: every line must hold for some record", () => {
  const store = storeOf({ disk: [{ removable: "no" }] });
  assert.equal(evaluate(ResourceProgram.compile("disk.removable == 'no'"), store), true);
  assert.equal(
    evaluate(ResourceProgram.compile("disk.removable == 'no'\ndisk.removable == 'yes'"), store),
    false
  );
});

test("program: lines are quantified independently over the group", () => {
  const store = storeOf({ disk: [{ removable: "no" }, { removable: "yes" }] });
  const program = ResourceProgram.compile("disk.removable == 'no'\ndisk.removable == 'yes'");
  assert.equal(program.evaluate(store), true);
});

test("program: a line naming two groups is tried over their cross product", () => {
  const program = ResourceProgram.compile("a.x == b.x");
  assert.equal(program.evaluate(storeOf({ a: [{ x: "1" }, { x: "2" }], b: [{ x: "2" }] })), true);
  assert.equal(program.evaluate(storeOf({ a: [{ x: "1" }, { x: "2" }], b: [{ x: "3" }] })), false);
});

test("program: evaluation errors reject only the offending record", () => {
  const store = storeOf({ device: [{ name: "hda" }, { category: "AUDIO" }] });
  assert.equal(ResourceProgram.compile("device.category == 'AUDIO'").evaluate(store), true);

  const cpu = ResourceProgram.compile("int(cpu.count) > 2");
  assert.equal(cpu.evaluate(storeOf({ cpu: [{ count: "many" }, { count: "4" }] })), true);
  assert.equal(cpu.evaluate(storeOf({ cpu: [{ count: "many" }] })), false);
});

test("program: empty or unpublished groups make their lines false", () => {
  const program = ResourceProgram.compile("disk.removable == 'no'\nusb.count > 0");
  const store = storeOf({ disk: [{ removable: "no" }] });
  assert.deepEqual(program.explain(store), [
    { text: "disk.removable == 'no'", groups: ["disk"], satisfied: true, emptyGroups: [] },
    { text: "usb.count > 0", groups: ["usb"], satisfied: false, emptyGroups: ["usb"] },
  ]);
});

test("program: bare names resolve into the job namespace, imports win", () => {
  const plain = ResourceProgram.compile("device.category == 'AUDIO'\nmanifest.has_dock == 'True'", {
    namespace: "com.example",
  });
  assert.deepEqual(plain.requiredGroups, ["com.example::device", "manifest"]);

  const imported = ResourceProgram.compile("dev.category == 'AUDIO'\ncpu.count > 1", {
    namespace: "com.example",
    imports: { dev: "com.vendor::device" },
  });
  assert.deepEqual(imported.requiredGroups, ["com.vendor::device", "com.example::cpu"]);
});

test("program: blank and comment lines are skipped, nothing else is not a program", () => {
  const program = ResourceProgram.compile("\n# audio only\n  device.category == 'AUDIO'  \n");
  assert.deepEqual(
    program.lines.map((line) => line.text),
    ["device.category == 'AUDIO'"]
  );
  assert.throws(
    () => ResourceProgram.compile("# nothing\n\n"),
    (error: unknown) => error instanceof ResourceProgramError && /program has no expressions/.test(error.message)
  );
});

test("program: fieldsOf lists the fields read from one group", () => {
  const program = ResourceProgram.compile("manifest.has_camera == 'True' and manifest.usb_ports != '0'\ncpu.count > 1");
  assert.deepEqual(program.fieldsOf("manifest"), ["has_camera", "usb_ports"]);
  assert.deepEqual(program.fieldsOf("cpu"), ["count"]);
});

test("program: evaluateRecord checks a single record of one group", () => {
  const filter = ResourceProgram.compile("device.category == 'NETWORK'", { namespace: "ns" });
  assert.equal(filter.evaluateRecord("ns::device", ResourceRecord.from({ category: "NETWORK" })), true);
  assert.equal(filter.evaluateRecord("ns::device", ResourceRecord.from({ category: "AUDIO" })), false);
  assert.equal(filter.evaluateRecord("ns::other", ResourceRecord.from({ category: "NETWORK" })), false);
});

test("program: evaluateRecord lets other groups range over the store", () => {
  const filter = ResourceProgram.compile("device.category == 'NETWORK'\nmanifest.has_lan == 'True'", {
    namespace: "ns",
  });
  const record = ResourceRecord.from({ category: "NETWORK" });
  assert.equal(filter.evaluateRecord("ns::device", record), false);
  assert.equal(filter.evaluateRecord("ns::device", record, storeOf({ manifest: [{ has_lan: "True" }] })), true);
  assert.equal(filter.evaluateRecord("ns::device", record, storeOf({ manifest: [{ has_lan: "False" }] })), false);

  const pinned = ResourceProgram.compile("device.category == 'NETWORK'", { namespace: "ns" });
  const store = storeOf({ "ns::device": [{ category: "NETWORK" }] });
  assert.equal(pinned.evaluateRecord("ns::device", ResourceRecord.from({ category: "AUDIO" }), store), false);
});

test("lint: negative comparisons are flagged once per operator and line", () => {
  const program = ResourceProgram.compile("device.bus != 'usb' and device.driver != ''\npackage.name not in ('a', 'b')\ncpu.count > 1");
  assert.deepEqual(lintProgram(program), [
    {
      line: "device.bus != 'usb' and device.driver != ''",
      message: "'!=' holds when any record differs, not when every record does",
    },
    {
      line: "package.name not in ('a', 'b')",
      message: "'not in' holds when any record differs, not when every record does",
    },
  ]);
});
