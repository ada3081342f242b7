import { spawn } from "node:child_process";
import os from "node:os";
import readline from "node:readline";
import { createLog } from "../core/_shared/log";
import { LaunchProtocolError } from "../core/errors/engine.errors";
import {
  LAUNCH_PROTOCOL,
  decodeLaunchRequest,
  encodeLaunchResponse,
  type LaunchRequest,
  type LaunchResponse,
} from "./launch.protocol";

// stdout carries the protocol; only warn and error reach stderr.
const log = createLog("launcher-worker");

export interface ShellOutcome {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Runs a literal command line; rejects only when the shell itself cannot start. */
export type ShellRunner = (command: string, environment: Readonly<Record<string, string>>) => Promise<ShellOutcome>;

export interface WorkerOptions {
  readonly shell?: ShellRunner;
  readonly currentUser?: () => string;
  readonly now?: () => number;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  return signal ? 128 + (os.constants.signals[signal] ?? 0) : 1;
}

export const runInBash: ShellRunner = (command, environment) =>
  new Promise((resolve, reject) => {
    const child = spawn("bash", ["-c", command], {
      env: { ...environment },
      stdio: ["ignore", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.once("error", reject);
    child.once("close", (code, signal) => {
      resolve({ exitCode: code ?? signalExitCode(signal), stdout, stderr });
    });
  });

function currentUsername(): string {
  return os.userInfo().username;
}

/**
 * Executes one validated request. The worker checks that it really runs as
 * the requested account and never falls back to its own.
 */
export async function executeLaunchRequest(request: LaunchRequest, options: WorkerOptions = {}): Promise<LaunchResponse> {
  const now = options.now ?? Date.now;
  const started = now();
  const actualUser = (options.currentUser ?? currentUsername)();
  if (request.user !== null && request.user !== actualUser) {
    return {
      protocol: LAUNCH_PROTOCOL,
      status: "failed",
      failure: "privilege-denied",
      message: `worker runs as ${actualUser}, ${request.jobId} requires ${request.user}`,
      durationMs: now() - started,
    };
  }

  try {
    const outcome = await (options.shell ?? runInBash)(request.command, request.environment);
    return {
      protocol: LAUNCH_PROTOCOL,
      status: "exited",
      exitCode: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      durationMs: now() - started,
    };
  } catch (error) {
    return {
      protocol: LAUNCH_PROTOCOL,
      status: "failed",
      failure: "exec-failed",
      message: error instanceof Error ? error.message : String(error),
      durationMs: now() - started,
    };
  }
}

async function readFirstLine(input: NodeJS.ReadableStream): Promise<string | null> {
  const reader = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of reader) {
      return line;
    }
    return null;
  } finally {
    reader.close();
  }
}

/** Reads one request line, answers with one response line. Returns the process exit code. */
export async function runWorker(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  options: WorkerOptions = {}
): Promise<number> {
  const line = await readFirstLine(input);
  if (line === null) {
    log.error("no request received");
    return 2;
  }

  let request: LaunchRequest;
  try {
    request = decodeLaunchRequest(line);
  } catch (error) {
    if (error instanceof LaunchProtocolError) {
      log.error(error.message);
      return 2;
    }
    throw error;
  }

  const response = await executeLaunchRequest(request, options);
  await new Promise<void>((resolve, reject) => {
    output.write(encodeLaunchResponse(response), (error) => (error ? reject(error) : resolve()));
  });
  return 0;
}
