import test from "node:test";
import assert from "node:assert/strict";
import { ResourceRecord } from "../../../src/core/resource/resource.record";
import { ENVIRONMENT_GROUP, MANIFEST_GROUP, ResourceStore } from "../../../src/core/resource/resource.store";

test("store: unpublished groups read as empty", () => {
  const store = new ResourceStore();
  assert.deepEqual(store.records("ns::device"), []);
  assert.equal(store.isPublished("ns::device"), false);
});

test("store: publish replaces a group wholesale", () => {
  const store = new ResourceStore();
  store.publish("ns::device", [ResourceRecord.from({ category: "AUDIO" }), ResourceRecord.from({ category: "WIRELESS" })]);
  store.publish("ns::device", [ResourceRecord.from({ category: "DISK" })]);
  assert.deepEqual(
    store.records("ns::device").map((record) => record.text("category")),
    ["DISK"]
  );
});

test("store: manifest and environment are single-record reserved groups", () => {
  const store = new ResourceStore({ manifest: { has_camera: "True" }, environment: { LANG: "C" } });
  assert.equal(store.records(MANIFEST_GROUP)[0]?.text("has_camera"), "True");
  assert.equal(store.records(ENVIRONMENT_GROUP)[0]?.text("LANG"), "C");
  assert.deepEqual(store.publishedGroups(), []);
});

test("store: plain form round-trips job groups only", () => {
  const store = new ResourceStore({ manifest: { x: "1" } });
  store.publish("ns::cpu", [ResourceRecord.from({ count: "8" })]);
  store.publish("ns::empty", []);
  const plain = store.toPlain();
  assert.deepEqual(plain, { "ns::cpu": [{ count: "8" }], "ns::empty": [] });

  const restored = ResourceStore.fromPlain(plain);
  assert.equal(restored.records("ns::cpu")[0]?.int("count"), 8);
  assert.equal(restored.isPublished("ns::empty"), true);
});
