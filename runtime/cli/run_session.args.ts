import type { ConflictDecision } from "../../src/session/session.lifecycle";

export const CONFLICT_DECISIONS: readonly ConflictDecision[] = ["abort", "discard", "accept"];

export interface RunSessionArgs {
  catalogPath: string;
  plan?: string;
  jobs: string[];
  sessionId: string;
  configPath?: string;
  freshSession: boolean;
  onConflict?: ConflictDecision;
  environment: Record<string, string>;
  manifest: Record<string, string>;
}

export const DEFAULT_SESSION_ID = "default";

function requireValue(argv: readonly string[], idx: number, flag: string): string {
  const next = argv[idx + 1];
  if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
    throw new Error(`${flag} requires a value`);
  }
  return next.trim();
}

function parseAssignment(raw: string, flag: string): [string, string] {
  const idx = raw.indexOf("=");
  if (idx <= 0) {
    throw new Error(`${flag} expects KEY=VALUE, got "${raw}"`);
  }
  return [raw.slice(0, idx), raw.slice(idx + 1)];
}

export function normalizeConflictDecision(raw: string): ConflictDecision {
  const lowered = raw.trim().toLowerCase();
  const known = CONFLICT_DECISIONS.find((decision) => decision === lowered);
  if (!known) {
    throw new Error(`Unknown conflict decision "${raw}". Available: ${CONFLICT_DECISIONS.join(", ")}`);
  }
  return known;
}

/** Positional arguments are job ids, used when no `--plan` is given. */
export function parseRunSessionArgs(argv: readonly string[]): RunSessionArgs {
  const jobs: string[] = [];
  const environment: Record<string, string> = {};
  const manifest: Record<string, string> = {};
  let catalogPath: string | undefined;
  let plan: string | undefined;
  let sessionId: string | undefined;
  let configPath: string | undefined;
  let freshSession = false;
  let onConflict: ConflictDecision | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    switch (token) {
      case "--":
        break;
      case "--catalog":
        catalogPath = requireValue(argv, i, token);
        i += 1;
        break;
      case "--plan":
        plan = requireValue(argv, i, token);
        i += 1;
        break;
      case "--session":
        sessionId = requireValue(argv, i, token);
        i += 1;
        break;
      case "--config":
        configPath = requireValue(argv, i, token);
        i += 1;
        break;
      case "--fresh-session":
        freshSession = true;
        break;
      case "--on-conflict":
        onConflict = normalizeConflictDecision(requireValue(argv, i, token));
        i += 1;
        break;
      case "--env": {
        const [key, value] = parseAssignment(requireValue(argv, i, token), token);
        environment[key] = value;
        i += 1;
        break;
      }
      case "--manifest": {
        const [key, value] = parseAssignment(requireValue(argv, i, token), token);
        manifest[key] = value;
        i += 1;
        break;
      }
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown option ${token}`);
        }
        jobs.push(token);
    }
  }

  if (catalogPath === undefined) {
    throw new Error("--catalog is required");
  }
  if (plan !== undefined && jobs.length > 0) {
    throw new Error("job ids cannot be combined with --plan");
  }

  return {
    catalogPath,
    plan,
    jobs,
    sessionId: sessionId ?? DEFAULT_SESSION_ID,
    configPath,
    freshSession,
    onConflict,
    environment,
    manifest,
  };
}
