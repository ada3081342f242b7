/** Intent: every way a worker can answer, fail or vanish maps to exactly one outcome. */
import test from "node:test";
import assert from "node:assert/strict";
import { parseJobUnit } from "../../src/core/job/job.parser";
import { STATIC_ORIGIN, type Job } from "../../src/core/job/job.types";
import type { LaunchContext } from "../../src/core/runner/execution.types";
import {
  LAUNCH_PROTOCOL,
  decodeLaunchRequest,
  encodeLaunchResponse,
  type LaunchResponse,
} from "../../src/launcher/launch.protocol";
import {
  TrustedLauncher,
  type TrustedLauncherOptions,
  type WorkerChannel,
  type WorkerExit,
} from "../../src/launcher/trusted_launcher";

const WORKER = ["node", "worker_main.ts"];

const CONTEXT: LaunchContext = {
  environment: { PATH: "/bin", HOME: "/home/tester", LANG: "C", SENSOR_BUS: "i2c-1" },
  sessionId: "bench-1",
};

function job(fields: Record<string, unknown>): Job {
  return parseJobUnit(
    { id: "probe", type: "automated", command: "probe --all", ...fields },
    { namespace: "ns", origin: STATIC_ORIGIN }
  );
}

class FakeChannel implements WorkerChannel {
  readonly sent: string[] = [];
  killed = false;
  detached = false;
  readonly exited: Promise<WorkerExit>;

  constructor(
    private readonly reply: Promise<string | null>,
    exit: WorkerExit = { code: 0, signal: null, stderr: "" },
    private readonly sendError?: Error
  ) {
    this.exited = Promise.resolve(exit);
  }

  async send(line: string): Promise<void> {
    if (this.sendError) {
      throw this.sendError;
    }
    this.sent.push(line);
  }

  readLine(): Promise<string | null> {
    return this.reply;
  }

  kill(): void {
    this.killed = true;
  }

  detach(): void {
    this.detached = true;
  }
}

interface Harness {
  readonly launcher: TrustedLauncher;
  readonly spawned: { argv: readonly string[]; detached: boolean }[];
}

function harness(channel: FakeChannel, extra: Partial<TrustedLauncherOptions> = {}): Harness {
  const spawned: { argv: readonly string[]; detached: boolean }[] = [];
  const launcher = new TrustedLauncher({
    workerCommand: WORKER,
    currentUser: () => "tester",
    now: () => 1000,
    spawner: (argv, options) => {
      spawned.push({ argv, detached: options.detached });
      return channel;
    },
    ...extra,
  });
  return { launcher, spawned };
}

function replying(response: LaunchResponse): FakeChannel {
  return new FakeChannel(Promise.resolve(encodeLaunchResponse(response).trim()));
}

function exited(exitCode: number, stdout = "", stderr = ""): LaunchResponse {
  return { protocol: LAUNCH_PROTOCOL, status: "exited", exitCode, stdout, stderr, durationMs: 25 };
}

test("buildRequest: only allow-listed and declared variables reach the worker", () => {
  const { launcher } = harness(replying(exited(0)));
  assert.deepEqual(launcher.buildRequest(job({ environ: "SENSOR_BUS" }), CONTEXT), {
    protocol: LAUNCH_PROTOCOL,
    jobId: "ns::probe",
    command: "probe --all",
    user: null,
    environment: { PATH: "/bin", LANG: "C", SENSOR_BUS: "i2c-1", CHECKRUN_SESSION_ID: "bench-1" },
    noReturn: false,
  });
  assert.equal(launcher.buildRequest(job({ type: "manual", command: undefined }), CONTEXT), undefined);
});

test("workerArgv: elevation only for another account", () => {
  const { launcher } = harness(replying(exited(0)));
  assert.deepEqual(launcher.workerArgv(null), WORKER);
  assert.deepEqual(launcher.workerArgv("tester"), WORKER);
  assert.deepEqual(launcher.workerArgv("root"), ["sudo", "-n", "-u", "root", ...WORKER]);

  const custom = harness(replying(exited(0)), { elevation: ["pkexec", "--user", "{user}"] });
  assert.deepEqual(custom.launcher.workerArgv("root"), ["pkexec", "--user", "root", ...WORKER]);
});

test("run: exit 0 passes with the command's output", async () => {
  const channel = replying(exited(0, "temp: 41\n", "warn\n"));
  const { launcher, spawned } = harness(channel);
  const result = await launcher.run(job({ user: "root" }), CONTEXT);

  assert.deepEqual(result, {
    outcome: "pass",
    output: "temp: 41\n",
    errorOutput: "warn\n",
    returnCode: 0,
    durationMs: 25,
  });
  assert.deepEqual(spawned, [{ argv: ["sudo", "-n", "-u", "root", ...WORKER], detached: false }]);
  assert.equal(channel.sent.length, 1);
  assert.equal(decodeLaunchRequest(channel.sent[0] ?? "").user, "root");
});

test("run: a non-zero exit fails", async () => {
  const { launcher } = harness(replying(exited(2, "", "bad sensor\n")));
  const result = await launcher.run(job({}), CONTEXT);
  assert.equal(result.outcome, "fail");
  assert.equal(result.returnCode, 2);
});

test("run: worker-reported failures", async () => {
  const denied = harness(
    replying({ protocol: LAUNCH_PROTOCOL, status: "failed", failure: "privilege-denied", message: "runs as tester", durationMs: 1 })
  );
  assert.deepEqual(await denied.launcher.run(job({}), CONTEXT), {
    outcome: "crash",
    output: "",
    errorOutput: "",
    returnCode: null,
    durationMs: 1,
    diagnostic: "LAUNCH_PRIVILEGE_DENIED runs as tester",
  });

  const execFailed = harness(
    replying({ protocol: LAUNCH_PROTOCOL, status: "failed", failure: "exec-failed", message: "spawn bash ENOENT", durationMs: 2 })
  );
  const result = await execFailed.launcher.run(job({}), CONTEXT);
  assert.equal(result.outcome, "fail");
  assert.equal(result.diagnostic, "LAUNCH_EXEC_FAILED spawn bash ENOENT");
});

test("run: noreturn jobs are started detached and not waited for", async () => {
  const channel = new FakeChannel(new Promise<string | null>(() => undefined));
  const { launcher, spawned } = harness(channel);
  const result = await launcher.run(job({ flags: "noreturn" }), CONTEXT);

  assert.deepEqual(result, {
    outcome: "not-started",
    output: "",
    errorOutput: "",
    returnCode: null,
    durationMs: 0,
    noReturn: true,
  });
  assert.equal(spawned[0]?.detached, true);
  assert.equal(channel.detached, true);
});

test("run: an elevated worker that exits without a reply was denied", async () => {
  const stderr = "sudo: a password is required\n";
  const channel = new FakeChannel(Promise.resolve(null), { code: 1, signal: null, stderr });
  const result = await harness(channel).launcher.run(job({ user: "root" }), CONTEXT);
  assert.equal(result.outcome, "crash");
  assert.equal(result.errorOutput, stderr);
  assert.equal(result.diagnostic, "LAUNCH_PRIVILEGE_DENIED exit=1 sudo: a password is required");
});

test("run: a worker that dies without a reply is a crash", async () => {
  const channel = new FakeChannel(Promise.resolve(null), { code: null, signal: "SIGKILL", stderr: "" });
  const result = await harness(channel).launcher.run(job({}), CONTEXT);
  assert.equal(result.outcome, "crash");
  assert.equal(result.diagnostic, "LAUNCH_CHANNEL_CLOSED signal=SIGKILL");
});

test("run: a reply that does not decode kills the worker", async () => {
  const channel = new FakeChannel(Promise.resolve('{"protocol":"checkrun.launch/1","status":"maybe"}'));
  const result = await harness(channel).launcher.run(job({}), CONTEXT);
  assert.equal(result.outcome, "crash");
  assert.equal(result.diagnostic, "LAUNCH_PROTOCOL_ERROR response.status 'maybe' is not 'exited' or 'failed'");
  assert.equal(channel.killed, true);
});

test("run: a worker that never answers is killed at the timeout", async () => {
  const channel = new FakeChannel(new Promise<string | null>(() => undefined));
  const result = await harness(channel, { timeoutMs: 10 }).launcher.run(job({}), CONTEXT);
  assert.equal(result.outcome, "crash");
  assert.equal(result.diagnostic, "LAUNCH_TIMEOUT worker killed after 10ms");
  assert.equal(channel.killed, true);
});

test("run: spawn and channel errors are crashes", async () => {
  const failingSpawn = new TrustedLauncher({
    workerCommand: WORKER,
    currentUser: () => "tester",
    spawner: () => {
      throw new Error("spawn sudo ENOENT");
    },
  });
  const spawnResult = await failingSpawn.run(job({}), CONTEXT);
  assert.equal(spawnResult.outcome, "crash");
  assert.equal(spawnResult.diagnostic, "LAUNCH_SPAWN_FAILED spawn sudo ENOENT");

  const channel = new FakeChannel(Promise.resolve(null), undefined, new Error("write EPIPE"));
  const sendResult = await harness(channel).launcher.run(job({}), CONTEXT);
  assert.equal(sendResult.outcome, "crash");
  assert.equal(sendResult.diagnostic, "LAUNCH_CHANNEL_CLOSED write EPIPE");
  assert.equal(channel.killed, true);
});

test("run: jobs without a command fail without a worker", async () => {
  const { launcher, spawned } = harness(replying(exited(0)));
  const result = await launcher.run(job({ type: "manual", command: undefined }), CONTEXT);
  assert.equal(result.outcome, "fail");
  assert.equal(result.diagnostic, "LAUNCH_NO_COMMAND ns::probe has no command");
  assert.deepEqual(spawned, []);
});
