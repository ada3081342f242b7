import {
  CatalogLoadError,
  DependencyCycleError,
  ResumeConflictError,
  SessionLockedError,
  SnapshotWriteError,
} from "../src/core/errors/engine.errors";
import { ConfigurationError } from "../src/config/config.errors";

export const RUNTIME_ERROR_CODES = Object.freeze({
  SESSION_LOCKED: "SESSION_LOCKED",
  SESSION_CONFLICT: "SESSION_CONFLICT",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  CATALOG_INVALID: "CATALOG_INVALID",
  SNAPSHOT_WRITE_FAILED: "SNAPSHOT_WRITE_FAILED",
  RUNTIME_FAILED: "RUNTIME_FAILED",
} as const);

export type RuntimeErrorCode = (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

const EXIT_CODES: Readonly<Record<RuntimeErrorCode, number>> = Object.freeze({
  RUNTIME_FAILED: 1,
  CONFIGURATION_ERROR: 2,
  CATALOG_INVALID: 2,
  SESSION_LOCKED: 3,
  SESSION_CONFLICT: 4,
  SNAPSHOT_WRITE_FAILED: 5,
});

export class RuntimeError extends Error {
  readonly errorCode: RuntimeErrorCode;
  readonly guideMessage: string;
  readonly exitCode: number;

  constructor(
    message: string,
    input: {
      readonly errorCode: RuntimeErrorCode;
      readonly guideMessage: string;
      readonly cause?: unknown;
    }
  ) {
    super(message, { cause: input.cause });
    this.name = "RuntimeError";
    this.errorCode = input.errorCode;
    this.guideMessage = input.guideMessage;
    this.exitCode = EXIT_CODES[input.errorCode];
  }
}

function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function classify(error: unknown): { errorCode: RuntimeErrorCode; guideMessage: string } {
  if (error instanceof SessionLockedError) {
    return { errorCode: RUNTIME_ERROR_CODES.SESSION_LOCKED, guideMessage: "another process owns this session" };
  }
  if (error instanceof ResumeConflictError) {
    return {
      errorCode: RUNTIME_ERROR_CODES.SESSION_CONFLICT,
      guideMessage: "rerun with --on-conflict discard or --on-conflict accept",
    };
  }
  if (error instanceof ConfigurationError) {
    return { errorCode: RUNTIME_ERROR_CODES.CONFIGURATION_ERROR, guideMessage: "fix the configuration file" };
  }
  if (error instanceof CatalogLoadError || error instanceof DependencyCycleError) {
    return { errorCode: RUNTIME_ERROR_CODES.CATALOG_INVALID, guideMessage: "fix the job catalog" };
  }
  if (error instanceof SnapshotWriteError) {
    return {
      errorCode: RUNTIME_ERROR_CODES.SNAPSHOT_WRITE_FAILED,
      guideMessage: "the session directory is not writable; the session stopped",
    };
  }
  return { errorCode: RUNTIME_ERROR_CODES.RUNTIME_FAILED, guideMessage: "unexpected failure" };
}

export function toRuntimeError(error: unknown): RuntimeError {
  if (error instanceof RuntimeError) {
    return error;
  }
  return new RuntimeError(asMessage(error), { ...classify(error), cause: error });
}
