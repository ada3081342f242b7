import { spawn } from "node:child_process";
import os from "node:os";
import readline from "node:readline";
import { fileURLToPath } from "node:url";
import { createLog } from "../core/_shared/log";
import { LaunchProtocolError } from "../core/errors/engine.errors";
import { hasFlag, type Job } from "../core/job/job.types";
import {
  emptyResult,
  type CommandLauncher,
  type ExecutionResult,
  type LaunchContext,
} from "../core/runner/execution.types";
import {
  LAUNCH_PROTOCOL,
  decodeLaunchResponse,
  encodeLaunchRequest,
  type LaunchRequest,
  type LaunchResponse,
} from "./launch.protocol";

const log = createLog("launcher");

export const DEFAULT_ELEVATION: readonly string[] = Object.freeze(["sudo", "-n", "-u", "{user}"]);
export const DEFAULT_ENVIRONMENT_ALLOW_LIST: readonly string[] = Object.freeze(["PATH", "LANG", "LC_ALL", "TERM"]);
export const SESSION_ID_VARIABLE = "CHECKRUN_SESSION_ID";

export interface WorkerExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;
}

/** Both ends of one worker process: a request goes in, one response line comes out. */
export interface WorkerChannel {
  /** Writes the request and closes the worker's stdin. */
  send(line: string): Promise<void>;
  /** First line of the worker's stdout, or `null` once stdout closes without one. */
  readLine(): Promise<string | null>;
  readonly exited: Promise<WorkerExit>;
  kill(): void;
  /** Stops listening; the worker keeps running on its own. */
  detach(): void;
}

export type WorkerSpawner = (argv: readonly string[], options: { readonly detached: boolean }) => WorkerChannel;

export interface TrustedLauncherOptions {
  /** argv that starts a worker; defaults to this runtime running `worker_main.ts`. */
  readonly workerCommand?: readonly string[];
  /** argv prefix used when the job's account differs from ours; `{user}` is replaced. */
  readonly elevation?: readonly string[];
  readonly environmentAllowList?: readonly string[];
  readonly timeoutMs?: number;
  readonly spawner?: WorkerSpawner;
  readonly currentUser?: () => string;
  readonly now?: () => number;
}

export function defaultWorkerCommand(): string[] {
  const entry = fileURLToPath(new URL("../../runtime/launcher/worker_main.ts", import.meta.url));
  return [process.execPath, ...process.execArgv, entry];
}

export const spawnWorker: WorkerSpawner = (argv, options) => {
  const [file, ...args] = argv;
  if (file === undefined) {
    throw new LaunchProtocolError("worker command is empty");
  }
  const child = spawn(file, args, { stdio: ["pipe", "pipe", "pipe"], detached: options.detached });

  let stderr = "";
  child.stderr.setEncoding("utf8");
  child.stderr.on("data", (chunk: string) => {
    stderr += chunk;
  });
  child.stdin.on("error", (error) => {
    log.debug(`worker stdin: ${error.message}`);
  });

  const exited = new Promise<WorkerExit>((resolve) => {
    child.once("error", (error) => resolve({ code: null, signal: null, stderr: `${stderr}${error.message}` }));
    child.once("close", (code, signal) => resolve({ code, signal, stderr }));
  });

  const firstLine = new Promise<string | null>((resolve) => {
    const reader = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    let seen = false;
    reader.once("line", (line) => {
      seen = true;
      resolve(line);
      reader.close();
    });
    reader.once("close", () => {
      if (!seen) {
        resolve(null);
      }
    });
  });

  return {
    send: (line) =>
      new Promise<void>((resolve, reject) => {
        child.stdin.write(line, (error) => {
          if (error) {
            reject(error);
            return;
          }
          child.stdin.end();
          resolve();
        });
      }),
    readLine: () => firstLine,
    exited,
    kill: () => {
      child.kill("SIGKILL");
    },
    detach: () => {
      child.stdout.destroy();
      child.stderr.destroy();
      child.unref();
    },
  };
};

type Reply = { kind: "line"; line: string | null } | { kind: "timeout" };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The unprivileged half of privilege separation. It builds a request from the
 * job and the allow-listed environment, starts a worker (elevated when the
 * job names another account) and maps the worker's reply to an outcome.
 */
export class TrustedLauncher implements CommandLauncher {
  private readonly workerCommand: readonly string[];
  private readonly elevation: readonly string[];
  private readonly allowList: readonly string[];
  private readonly spawner: WorkerSpawner;
  private readonly currentUser: () => string;
  private readonly now: () => number;

  constructor(private readonly options: TrustedLauncherOptions = {}) {
    this.workerCommand = options.workerCommand ?? defaultWorkerCommand();
    this.elevation = options.elevation ?? DEFAULT_ELEVATION;
    this.allowList = options.environmentAllowList ?? DEFAULT_ENVIRONMENT_ALLOW_LIST;
    this.spawner = options.spawner ?? spawnWorker;
    this.currentUser = options.currentUser ?? (() => os.userInfo().username);
    this.now = options.now ?? Date.now;
  }

  buildRequest(job: Job, context: LaunchContext): LaunchRequest | undefined {
    if (job.command === undefined) {
      return undefined;
    }
    const environment: Record<string, string> = {};
    for (const name of new Set([...this.allowList, ...job.environ])) {
      const value = context.environment[name];
      if (value !== undefined) {
        environment[name] = value;
      }
    }
    environment[SESSION_ID_VARIABLE] = context.sessionId;
    return {
      protocol: LAUNCH_PROTOCOL,
      jobId: job.id.toString(),
      command: job.command,
      user: job.user ?? null,
      environment,
      noReturn: hasFlag(job, "noreturn"),
    };
  }

  workerArgv(user: string | null): string[] {
    if (user === null || user === this.currentUser()) {
      return [...this.workerCommand];
    }
    return [...this.elevation.map((part) => part.split("{user}").join(user)), ...this.workerCommand];
  }

  async run(job: Job, context: LaunchContext): Promise<ExecutionResult> {
    const request = this.buildRequest(job, context);
    if (!request) {
      return emptyResult("fail", { diagnostic: `LAUNCH_NO_COMMAND ${job.id.toString()} has no command` });
    }
    const elevated = request.user !== null && request.user !== this.currentUser();
    const started = this.now();

    let channel: WorkerChannel;
    try {
      channel = this.spawner(this.workerArgv(request.user), { detached: request.noReturn });
    } catch (error) {
      return emptyResult("crash", { diagnostic: `LAUNCH_SPAWN_FAILED ${errorMessage(error)}` });
    }

    try {
      await channel.send(encodeLaunchRequest(request));
    } catch (error) {
      channel.kill();
      return emptyResult("crash", { diagnostic: `LAUNCH_CHANNEL_CLOSED ${errorMessage(error)}` });
    }

    if (request.noReturn) {
      channel.detach();
      log.info(`${request.jobId} started without return`);
      return emptyResult("not-started", { noReturn: true, durationMs: this.now() - started });
    }

    const reply = await this.awaitReply(channel);
    const durationMs = this.now() - started;
    if (reply.kind === "timeout") {
      channel.kill();
      log.warn(`${request.jobId} killed after ${String(this.options.timeoutMs)}ms`);
      return emptyResult("crash", {
        durationMs,
        diagnostic: `LAUNCH_TIMEOUT worker killed after ${String(this.options.timeoutMs)}ms`,
      });
    }
    if (reply.line === null) {
      const exit = await channel.exited;
      const detail = exit.stderr.trim();
      const code = exit.code === null ? `signal=${String(exit.signal)}` : `exit=${exit.code}`;
      const prefix = elevated && exit.code !== 0 ? "LAUNCH_PRIVILEGE_DENIED" : "LAUNCH_CHANNEL_CLOSED";
      return emptyResult("crash", { durationMs, errorOutput: exit.stderr, diagnostic: `${prefix} ${code} ${detail}`.trim() });
    }

    let response: LaunchResponse;
    try {
      response = decodeLaunchResponse(reply.line);
    } catch (error) {
      channel.kill();
      return emptyResult("crash", { durationMs, diagnostic: errorMessage(error) });
    }
    return this.toResult(response);
  }

  private async awaitReply(channel: WorkerChannel): Promise<Reply> {
    const line = channel.readLine().then((value): Reply => ({ kind: "line", line: value }));
    const timeoutMs = this.options.timeoutMs;
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return line;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Reply>((resolve) => {
      timer = setTimeout(() => resolve({ kind: "timeout" }), timeoutMs);
    });
    try {
      return await Promise.race([line, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toResult(response: LaunchResponse): ExecutionResult {
    if (response.status === "exited") {
      return emptyResult(response.exitCode === 0 ? "pass" : "fail", {
        output: response.stdout,
        errorOutput: response.stderr,
        returnCode: response.exitCode,
        durationMs: response.durationMs,
      });
    }
    if (response.failure === "privilege-denied") {
      return emptyResult("crash", {
        durationMs: response.durationMs,
        diagnostic: `LAUNCH_PRIVILEGE_DENIED ${response.message}`,
      });
    }
    return emptyResult("fail", {
      durationMs: response.durationMs,
      diagnostic: `LAUNCH_EXEC_FAILED ${response.message}`,
    });
  }
}
