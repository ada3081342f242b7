import os from "node:os";
import path from "node:path";
import type { ResumePolicy } from "../session/session.controller";
import { DEFAULT_ELEVATION, DEFAULT_ENVIRONMENT_ALLOW_LIST } from "../launcher/trusted_launcher";
import { ConfigurationError } from "./config.errors";
import { loadYamlFile } from "./yaml.loader";

export const CONFIG_VERSION = 1;
export const CONFIG_FILENAME = "checkrun.yaml";

export interface EngineConfig {
  readonly version: typeof CONFIG_VERSION;
  readonly session: {
    readonly root: string;
    readonly resumePolicy: ResumePolicy;
  };
  readonly launcher: {
    /** argv prefix for running a worker as another account; `{user}` is substituted. */
    readonly elevation: readonly string[];
    /** Variable names a command may inherit. */
    readonly environment: readonly string[];
    readonly timeoutMs?: number;
  };
  readonly cache: {
    /** SQLite file for cachable resource jobs; `null` disables the cache. */
    readonly path: string | null;
  };
}

type Row = Record<string, unknown>;

const TOP_LEVEL_KEYS = ["version", "session", "launcher", "cache"];
const SESSION_KEYS = ["root", "resumePolicy"];
const LAUNCHER_KEYS = ["elevation", "environment", "timeoutMs"];
const CACHE_KEYS = ["path"];

function cacheHome(env: NodeJS.ProcessEnv): string {
  const xdg = env.XDG_CACHE_HOME?.trim();
  return xdg ? xdg : path.join(os.homedir(), ".cache");
}

export function defaultEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const base = path.join(cacheHome(env), "checkrun");
  return {
    version: CONFIG_VERSION,
    session: { root: path.join(base, "sessions"), resumePolicy: "crash" },
    launcher: { elevation: DEFAULT_ELEVATION, environment: DEFAULT_ENVIRONMENT_ALLOW_LIST },
    cache: { path: path.join(base, "resource_cache.sqlite") },
  };
}

function toRow(value: unknown, where: string): Row {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`${where} must be a mapping`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(row: Row, allowed: readonly string[], where: string): void {
  for (const key of Object.keys(row)) {
    if (!allowed.includes(key)) {
      throw new ConfigurationError(`${where}.${key} is not a known setting`);
    }
  }
}

function optionalSection(row: Row, key: string, allowed: readonly string[]): Row {
  if (row[key] === undefined) {
    return {};
  }
  const section = toRow(row[key], key);
  assertKnownKeys(section, allowed, key);
  return section;
}

function readResumePolicy(value: unknown, where: string): ResumePolicy {
  if (value === "pass" || value === "crash") {
    return value;
  }
  throw new ConfigurationError(`${where} must be 'pass' or 'crash'`);
}

function readStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string" && item.length > 0)) {
    throw new ConfigurationError(`${where} must be a list of non-empty strings`);
  }
  return [...value];
}

function readPath(value: unknown, where: string, baseDir: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`${where} must be a non-empty path`);
  }
  return path.resolve(baseDir, value);
}

/** Validates a parsed configuration document. Relative paths resolve against `baseDir`. */
export function parseEngineConfig(raw: unknown, baseDir: string, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const defaults = defaultEngineConfig(env);
  const row = toRow(raw, "config");
  assertKnownKeys(row, TOP_LEVEL_KEYS, "config");
  if (row.version !== CONFIG_VERSION) {
    throw new ConfigurationError(`config.version must be ${CONFIG_VERSION}`);
  }

  const session = optionalSection(row, "session", SESSION_KEYS);
  const launcher = optionalSection(row, "launcher", LAUNCHER_KEYS);
  const cache = optionalSection(row, "cache", CACHE_KEYS);

  const elevation =
    launcher.elevation === undefined ? defaults.launcher.elevation : readStringList(launcher.elevation, "launcher.elevation");
  if (elevation.length > 0 && !elevation.some((part) => part.includes("{user}"))) {
    throw new ConfigurationError("launcher.elevation must contain the {user} placeholder");
  }

  let timeoutMs: number | undefined;
  if (launcher.timeoutMs !== undefined) {
    const value = launcher.timeoutMs;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError("launcher.timeoutMs must be a positive integer");
    }
    timeoutMs = value;
  }

  return {
    version: CONFIG_VERSION,
    session: {
      root: session.root === undefined ? defaults.session.root : readPath(session.root, "session.root", baseDir),
      resumePolicy:
        session.resumePolicy === undefined
          ? defaults.session.resumePolicy
          : readResumePolicy(session.resumePolicy, "session.resumePolicy"),
    },
    launcher: {
      elevation,
      environment:
        launcher.environment === undefined
          ? defaults.launcher.environment
          : readStringList(launcher.environment, "launcher.environment"),
      ...(timeoutMs === undefined ? {} : { timeoutMs }),
    },
    cache: {
      path:
        cache.path === undefined
          ? defaults.cache.path
          : cache.path === null
            ? null
            : readPath(cache.path, "cache.path", baseDir),
    },
  };
}

/** `CHECKRUN_SESSION_ROOT` and `CHECKRUN_RESUME_POLICY` win over the file. */
export function applyEnvironmentOverrides(config: EngineConfig, env: NodeJS.ProcessEnv): EngineConfig {
  const root = env.CHECKRUN_SESSION_ROOT?.trim();
  const policy = env.CHECKRUN_RESUME_POLICY?.trim();
  return {
    ...config,
    session: {
      root: root ? path.resolve(root) : config.session.root,
      resumePolicy: policy ? readResumePolicy(policy, "CHECKRUN_RESUME_POLICY") : config.session.resumePolicy,
    },
  };
}

export function loadEngineConfig(
  input: { readonly configPath?: string; readonly env?: NodeJS.ProcessEnv; readonly cwd?: string } = {}
): EngineConfig {
  const env = input.env ?? process.env;
  const cwd = input.cwd ?? process.cwd();
  if (input.configPath === undefined) {
    return applyEnvironmentOverrides(defaultEngineConfig(env), env);
  }
  const absPath = path.resolve(cwd, input.configPath);
  const parsed = parseEngineConfig(loadYamlFile(absPath), path.dirname(absPath), env);
  return applyEnvironmentOverrides(parsed, env);
}
