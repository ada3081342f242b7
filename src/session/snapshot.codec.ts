import { SessionStateError } from "../core/errors/engine.errors";
import { isOutcome } from "../core/job/job.types";
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
  type JobResultRecord,
  type ResumePoint,
  type ResumeReason,
  type SessionPhase,
  type SessionSnapshot,
} from "./session.types";

const SNAPSHOT_KEYS = [
  "format",
  "version",
  "sessionId",
  "catalogGeneration",
  "testPlan",
  "phase",
  "runList",
  "generatedJobs",
  "jobChecksums",
  "results",
  "resumePoint",
  "environment",
  "manifest",
  "resources",
  "createdAt",
  "updatedAt",
] as const;

const RESULT_KEYS = [
  "outcome",
  "comments",
  "startedAt",
  "finishedAt",
  "returnCode",
  "durationMs",
  "diagnostic",
] as const;

const PHASES: readonly SessionPhase[] = ["NEW", "RUNNING", "SUSPENDED", "INTERRUPTED", "COMPLETED"];
const RESUME_REASONS: readonly ResumeReason[] = ["running", "noreturn", "pause"];

function fail(message: string): never {
  throw new SessionStateError(`SESSION_STATE_VALIDATION_ERROR ${message}`);
}

function toRecord(value: unknown, where: string): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  fail(`${where} must be an object`);
}

function assertExactKeys(row: Record<string, unknown>, allowed: readonly string[], where: string): void {
  const keys = Object.keys(row).sort();
  const expected = [...allowed].sort();
  if (keys.length !== expected.length || keys.some((key, idx) => key !== expected[idx])) {
    fail(`${where} has unexpected or missing fields`);
  }
}

function readString(row: Record<string, unknown>, key: string, where: string): string {
  const value = row[key];
  if (typeof value !== "string") {
    fail(`${where}.${key} must be a string`);
  }
  return value;
}

function readNullableString(row: Record<string, unknown>, key: string, where: string): string | null {
  const value = row[key];
  if (value === null) {
    return null;
  }
  if (typeof value !== "string") {
    fail(`${where}.${key} must be a string or null`);
  }
  return value;
}

function readStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    fail(`${where} must be a list of strings`);
  }
  return [...value];
}

function readStringMap(value: unknown, where: string): Record<string, string> {
  const row = toRecord(value, where);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(row)) {
    if (typeof entry !== "string") {
      fail(`${where}.${key} must be a string`);
    }
    out[key] = entry;
  }
  return out;
}

function readResult(value: unknown, where: string): JobResultRecord {
  const row = toRecord(value, where);
  assertExactKeys(row, RESULT_KEYS, where);
  const outcome = readString(row, "outcome", where);
  if (!isOutcome(outcome)) {
    fail(`${where}.outcome '${outcome}' is not an outcome`);
  }
  const rawReturnCode = row.returnCode;
  let returnCode: number | null = null;
  if (rawReturnCode !== null) {
    if (typeof rawReturnCode !== "number" || !Number.isInteger(rawReturnCode)) {
      fail(`${where}.returnCode must be an integer or null`);
    }
    returnCode = rawReturnCode;
  }
  const durationMs = row.durationMs;
  if (typeof durationMs !== "number" || durationMs < 0) {
    fail(`${where}.durationMs must be a non-negative number`);
  }
  return {
    outcome,
    comments: readStringList(row.comments, `${where}.comments`),
    startedAt: readNullableString(row, "startedAt", where),
    finishedAt: readString(row, "finishedAt", where),
    returnCode,
    durationMs,
    diagnostic: readNullableString(row, "diagnostic", where),
  };
}

function readResumePoint(value: unknown): ResumePoint | null {
  if (value === null) {
    return null;
  }
  const row = toRecord(value, "resumePoint");
  assertExactKeys(row, ["jobId", "reason", "at"], "resumePoint");
  const reason = readString(row, "reason", "resumePoint");
  const known = RESUME_REASONS.find((candidate) => candidate === reason);
  if (!known) {
    fail(`resumePoint.reason '${reason}' is not a resume reason`);
  }
  return {
    jobId: readString(row, "jobId", "resumePoint"),
    reason: known,
    at: readString(row, "at", "resumePoint"),
  };
}

function readResources(value: unknown): Record<string, Record<string, string>[]> {
  const row = toRecord(value, "resources");
  const out: Record<string, Record<string, string>[]> = {};
  for (const [group, records] of Object.entries(row)) {
    if (!Array.isArray(records)) {
      fail(`resources.${group} must be a list`);
    }
    out[group] = records.map((record: unknown, idx) => readStringMap(record, `resources.${group}[${idx}]`));
  }
  return out;
}

/** Validates a parsed snapshot document; rejects unknown formats, versions and fields. */
export function decodeSnapshot(value: unknown): SessionSnapshot {
  const row = toRecord(value, "snapshot");
  if (row.format !== SNAPSHOT_FORMAT) {
    fail(`format must be '${SNAPSHOT_FORMAT}'`);
  }
  if (row.version !== SNAPSHOT_VERSION) {
    fail(`unsupported version '${String(row.version)}', expected ${SNAPSHOT_VERSION}`);
  }
  assertExactKeys(row, SNAPSHOT_KEYS, "snapshot");

  const phase = readString(row, "phase", "snapshot");
  const knownPhase = PHASES.find((candidate) => candidate === phase);
  if (!knownPhase) {
    fail(`phase '${phase}' is not a session phase`);
  }

  const resultsRow = toRecord(row.results, "results");
  const results: Record<string, JobResultRecord> = {};
  for (const [jobId, result] of Object.entries(resultsRow)) {
    results[jobId] = readResult(result, `results.${jobId}`);
  }

  return {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    sessionId: readString(row, "sessionId", "snapshot"),
    catalogGeneration: readString(row, "catalogGeneration", "snapshot"),
    testPlan: readNullableString(row, "testPlan", "snapshot"),
    phase: knownPhase,
    runList: readStringList(row.runList, "runList"),
    generatedJobs: readStringList(row.generatedJobs, "generatedJobs"),
    jobChecksums: readStringMap(row.jobChecksums, "jobChecksums"),
    results,
    resumePoint: readResumePoint(row.resumePoint),
    environment: readStringMap(row.environment, "environment"),
    manifest: readStringMap(row.manifest, "manifest"),
    resources: readResources(row.resources),
    createdAt: readString(row, "createdAt", "snapshot"),
    updatedAt: readString(row, "updatedAt", "snapshot"),
  };
}

export function encodeSnapshot(snapshot: SessionSnapshot): string {
  const ordered: Record<string, unknown> = {};
  for (const key of SNAPSHOT_KEYS) {
    ordered[key] = snapshot[key];
  }
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
