/** Intent: snapshots are strict on load, atomic on save, and set aside (not deleted) on discard. */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SessionStateError, SnapshotWriteError } from "../../src/core/errors/engine.errors";
import { FileSnapshotStore, snapshotFilename } from "../../src/session/file_snapshot.store";
import { decodeSnapshot, encodeSnapshot } from "../../src/session/snapshot.codec";
import { sampleSnapshot } from "./session_fixtures";

function makeTempRoot(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "snapshot-store-"));
}

function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

test("load: a missing snapshot is null and creates nothing", async () => {
  const root = makeTempRoot();
  try {
    const store = new FileSnapshotStore(root, "bench-1");
    assert.equal(await store.load(), null);
    assert.deepEqual(fs.readdirSync(root), []);
  } finally {
    cleanup(root);
  }
});

test("save then load returns the same snapshot", async () => {
  const root = makeTempRoot();
  try {
    const store = new FileSnapshotStore(root, "bench-1");
    const snapshot = sampleSnapshot();
    await store.save(snapshot);
    assert.equal(store.location, path.join(root, "session_state.bench-1.json"));
    assert.deepEqual(await store.load(), snapshot);
    assert.deepEqual(fs.readdirSync(root), ["session_state.bench-1.json"]);
  } finally {
    cleanup(root);
  }
});

test("load: rejects a snapshot that belongs to another session", async () => {
  const root = makeTempRoot();
  try {
    fs.writeFileSync(path.join(root, snapshotFilename("bench-1")), encodeSnapshot(sampleSnapshot({ sessionId: "other" })));
    await assert.rejects(
      new FileSnapshotStore(root, "bench-1").load(),
      (error: unknown) =>
        error instanceof SessionStateError &&
        error.message === "SESSION_STATE_VALIDATION_ERROR sessionId expected=bench-1 actual=other"
    );
  } finally {
    cleanup(root);
  }
});

test("load: rejects a file that is not JSON", async () => {
  const root = makeTempRoot();
  try {
    fs.writeFileSync(path.join(root, snapshotFilename("bench-1")), "{ not json");
    await assert.rejects(new FileSnapshotStore(root, "bench-1").load(), /^SessionStateError: SESSION_STATE_PARSE_ERROR/);
  } finally {
    cleanup(root);
  }
});

test("save: an unwritable location is a SnapshotWriteError", async () => {
  const root = makeTempRoot();
  try {
    const blocker = path.join(root, "not-a-dir");
    fs.writeFileSync(blocker, "");
    await assert.rejects(new FileSnapshotStore(blocker, "bench-1").save(sampleSnapshot()), SnapshotWriteError);
  } finally {
    cleanup(root);
  }
});

test("discard: moves the snapshot into _bak and keeps at most ten", async () => {
  const root = makeTempRoot();
  try {
    const bakDir = path.join(root, "_bak");
    fs.mkdirSync(bakDir);
    for (let i = 0; i < 10; i += 1) {
      fs.writeFileSync(path.join(bakDir, `session_state.bench-1.20000101_0000000${String(i).padStart(2, "0")}.json.bak`), "{}");
    }
    fs.writeFileSync(path.join(bakDir, "session_state.bench-2.20000101_000000000.json.bak"), "{}");

    const store = new FileSnapshotStore(root, "bench-1");
    await store.save(sampleSnapshot());
    await store.discard();

    assert.equal(fs.existsSync(store.location), false);
    const kept = fs.readdirSync(bakDir).filter((name) => name.startsWith("session_state.bench-1."));
    assert.equal(kept.length, 10);
    assert.equal(kept.includes("session_state.bench-1.20000101_000000000.json.bak"), false);
    assert.equal(fs.existsSync(path.join(bakDir, "session_state.bench-2.20000101_000000000.json.bak")), true);
    await store.discard();
  } finally {
    cleanup(root);
  }
});

test("session ids are restricted to a safe file-name alphabet", () => {
  assert.throws(() => new FileSnapshotStore("/tmp", "../escape"), SessionStateError);
  assert.throws(() => snapshotFilename(".."), SessionStateError);
  assert.equal(snapshotFilename(" bench-1 "), "session_state.bench-1.json");
});

test("decodeSnapshot: unknown fields and versions are rejected", () => {
  const encoded = sampleSnapshot();
  assert.deepEqual(decodeSnapshot(JSON.parse(encodeSnapshot(encoded))), encoded);
  assert.throws(
    () => decodeSnapshot({ ...encoded, extra: true }),
    (error: unknown) =>
      error instanceof SessionStateError &&
      error.message === "SESSION_STATE_VALIDATION_ERROR snapshot has unexpected or missing fields"
  );
  assert.throws(
    () => decodeSnapshot({ ...encoded, version: 2 }),
    (error: unknown) =>
      error instanceof SessionStateError &&
      error.message === "SESSION_STATE_VALIDATION_ERROR unsupported version '2', expected 1"
  );
  assert.throws(
    () => decodeSnapshot({ ...encoded, phase: "PAUSED" }),
    (error: unknown) =>
      error instanceof SessionStateError &&
      error.message === "SESSION_STATE_VALIDATION_ERROR phase 'PAUSED' is not a session phase"
  );
});
