import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { SQLiteResourceCache } from "../../src/adapter/storage/sqlite";
import { loadEngineConfig } from "../../src/config/engine.config";
import { loadCatalog } from "../../src/core/job/catalog";
import { OUTCOMES } from "../../src/core/job/job.types";
import { createDefaultJobRunners } from "../../src/core/runner/job_runner.registry";
import { TrustedLauncher } from "../../src/launcher/trusted_launcher";
import { FileSnapshotStore } from "../../src/session/file_snapshot.store";
import { acquireSessionLock } from "../../src/session/session.lock";
import { openSession } from "../../src/session/session.lifecycle";
import { toRuntimeError } from "../error";
import { runSessionGraph } from "../graph/session_graph";
import { parseRunSessionArgs } from "./run_session.args";
import { askConflictDecision, createTerminalInteraction } from "./terminal.interaction";

function inheritedEnvironment(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseRunSessionArgs(process.argv.slice(2));
  const config = loadEngineConfig({ configPath: args.configPath });

  const catalogPath = path.resolve(args.catalogPath);
  const { catalog, diagnostics } = loadCatalog(JSON.parse(fs.readFileSync(catalogPath, "utf8")));
  if (diagnostics.length > 0) {
    console.warn(`[run-session] ${diagnostics.length} catalog unit(s) excluded`);
  }
  const plan = args.plan === undefined ? undefined : catalog.testPlan(args.plan);
  if (args.plan !== undefined && !plan) {
    throw new Error(`TEST_PLAN_NOT_FOUND ${args.plan}`);
  }

  const lock = acquireSessionLock(config.session.root, args.sessionId);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const cache = config.cache.path === null ? undefined : SQLiteResourceCache.open(config.cache.path);
  try {
    const { controller, resumed } = await openSession(
      {
        sessionId: args.sessionId,
        catalog,
        plan,
        jobIds: args.jobs,
        environment: args.environment,
        manifest: args.manifest,
        freshSession: args.freshSession,
        decide: (conflict) => args.onConflict ?? askConflictDecision(rl, conflict),
      },
      {
        snapshots: new FileSnapshotStore(config.session.root, args.sessionId),
        runners: createDefaultJobRunners(),
        launcher: new TrustedLauncher({
          elevation: config.launcher.elevation,
          environmentAllowList: config.launcher.environment,
          timeoutMs: config.launcher.timeoutMs,
        }),
        interaction: createTerminalInteraction(rl),
        resumePolicy: config.session.resumePolicy,
        resourceCache: cache,
        baseEnvironment: inheritedEnvironment(),
      }
    );
    console.log(`[run-session] ${resumed ? "resumed" : "started"} session ${controller.sessionId}`);
    const estimate = controller.estimateRemaining();
    console.log(
      `[run-session] ${controller.remaining().length} job(s) left, about ${Math.ceil(estimate.totalSeconds)}s` +
        (estimate.unknownCount > 0 ? ` plus ${estimate.unknownCount} without an estimate` : "")
    );

    const onInterrupt = (): void => {
      console.log("[run-session] stopping after the current job");
      controller.requestStop();
    };
    process.once("SIGINT", onInterrupt);
    try {
      await runSessionGraph(controller);
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }

    const summary = controller.summary();
    console.log(`[run-session] phase=${controller.currentPhase}`);
    for (const outcome of OUTCOMES) {
      if (summary[outcome] > 0) {
        console.log(`  ${outcome.padEnd(14)} ${summary[outcome]}`);
      }
    }
    if (summary.fail > 0 || summary.crash > 0) {
      process.exitCode = 1;
    }
  } finally {
    cache?.close();
    rl.close();
    lock.release();
  }
}

main().catch((error: unknown) => {
  const runtimeError = toRuntimeError(error);
  console.error(`[run-session] ${runtimeError.message}`);
  console.error(`[run-session] ${runtimeError.guideMessage}`);
  process.exitCode = runtimeError.exitCode;
});
