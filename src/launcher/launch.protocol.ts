import { LaunchProtocolError } from "../core/errors/engine.errors";

export const LAUNCH_PROTOCOL = "checkrun.launch/1";

export interface LaunchRequest {
  readonly protocol: typeof LAUNCH_PROTOCOL;
  readonly jobId: string;
  /** Passed verbatim to `bash -c`. */
  readonly command: string;
  /** Account the command must run as; `null` keeps the worker's own. */
  readonly user: string | null;
  readonly environment: Readonly<Record<string, string>>;
  readonly noReturn: boolean;
}

export type LaunchFailure = "exec-failed" | "privilege-denied";

export type LaunchResponse =
  | {
      readonly protocol: typeof LAUNCH_PROTOCOL;
      readonly status: "exited";
      readonly exitCode: number;
      readonly stdout: string;
      readonly stderr: string;
      readonly durationMs: number;
    }
  | {
      readonly protocol: typeof LAUNCH_PROTOCOL;
      readonly status: "failed";
      readonly failure: LaunchFailure;
      readonly message: string;
      readonly durationMs: number;
    };

const REQUEST_KEYS = ["protocol", "jobId", "command", "user", "environment", "noReturn"];
const EXITED_KEYS = ["protocol", "status", "exitCode", "stdout", "stderr", "durationMs"];
const FAILED_KEYS = ["protocol", "status", "failure", "message", "durationMs"];

type Row = Record<string, unknown>;

function parseLine(line: string, what: string): Row {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new LaunchProtocolError(`${what} is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new LaunchProtocolError(`${what} must be an object`);
  }
  const row: Row = Object.fromEntries(Object.entries(parsed));
  if (row.protocol !== LAUNCH_PROTOCOL) {
    throw new LaunchProtocolError(`${what} protocol must be '${LAUNCH_PROTOCOL}'`);
  }
  return row;
}

function assertExactKeys(row: Row, allowed: readonly string[], what: string): void {
  const unknown = Object.keys(row).filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    throw new LaunchProtocolError(`${what} has unknown fields: ${unknown.sort().join(", ")}`);
  }
  const missing = allowed.filter((key) => !(key in row));
  if (missing.length > 0) {
    throw new LaunchProtocolError(`${what} is missing fields: ${missing.join(", ")}`);
  }
}

function stringField(row: Row, key: string, what: string): string {
  const value = row[key];
  if (typeof value !== "string") {
    throw new LaunchProtocolError(`${what}.${key} must be a string`);
  }
  return value;
}

function durationField(row: Row, what: string): number {
  const value = row.durationMs;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new LaunchProtocolError(`${what}.durationMs must be a non-negative number`);
  }
  return value;
}

export function encodeLaunchRequest(request: LaunchRequest): string {
  return `${JSON.stringify(request)}\n`;
}

export function decodeLaunchRequest(line: string): LaunchRequest {
  const row = parseLine(line, "request");
  assertExactKeys(row, REQUEST_KEYS, "request");

  const user = row.user;
  if (user !== null && (typeof user !== "string" || user.length === 0)) {
    throw new LaunchProtocolError("request.user must be a non-empty string or null");
  }
  const noReturn = row.noReturn;
  if (typeof noReturn !== "boolean") {
    throw new LaunchProtocolError("request.noReturn must be a boolean");
  }
  const rawEnvironment = row.environment;
  if (typeof rawEnvironment !== "object" || rawEnvironment === null || Array.isArray(rawEnvironment)) {
    throw new LaunchProtocolError("request.environment must be an object");
  }
  const environment: Record<string, string> = {};
  for (const [key, value] of Object.entries(rawEnvironment)) {
    if (typeof value !== "string") {
      throw new LaunchProtocolError(`request.environment.${key} must be a string`);
    }
    environment[key] = value;
  }
  const command = stringField(row, "command", "request");
  if (command.trim().length === 0) {
    throw new LaunchProtocolError("request.command must not be empty");
  }

  return {
    protocol: LAUNCH_PROTOCOL,
    jobId: stringField(row, "jobId", "request"),
    command,
    user,
    environment,
    noReturn,
  };
}

export function encodeLaunchResponse(response: LaunchResponse): string {
  return `${JSON.stringify(response)}\n`;
}

export function decodeLaunchResponse(line: string): LaunchResponse {
  const row = parseLine(line, "response");
  if (row.status === "exited") {
    assertExactKeys(row, EXITED_KEYS, "response");
    const exitCode = row.exitCode;
    if (typeof exitCode !== "number" || !Number.isInteger(exitCode)) {
      throw new LaunchProtocolError("response.exitCode must be an integer");
    }
    return {
      protocol: LAUNCH_PROTOCOL,
      status: "exited",
      exitCode,
      stdout: stringField(row, "stdout", "response"),
      stderr: stringField(row, "stderr", "response"),
      durationMs: durationField(row, "response"),
    };
  }
  if (row.status === "failed") {
    assertExactKeys(row, FAILED_KEYS, "response");
    const failure = row.failure;
    if (failure !== "exec-failed" && failure !== "privilege-denied") {
      throw new LaunchProtocolError(`response.failure '${String(failure)}' is not a launch failure`);
    }
    return {
      protocol: LAUNCH_PROTOCOL,
      status: "failed",
      failure,
      message: stringField(row, "message", "response"),
      durationMs: durationField(row, "response"),
    };
  }
  throw new LaunchProtocolError(`response.status '${String(row.status)}' is not 'exited' or 'failed'`);
}
