abstract class EngineError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

/** A resource program line that cannot be compiled (syntax or disallowed construct). */
export class ResourceProgramError extends EngineError {
  readonly kind = "ResourceProgram";
  readonly line: string;

  constructor(line: string, reason: string, options?: { cause?: unknown }) {
    super(`RESOURCE_PROGRAM_ERROR ${reason} in '${line}'`, options);
    this.name = "ResourceProgramError";
    this.line = line;
  }
}

/** Raised while evaluating one expression against one binding; always swallowed per record. */
export class EvaluationError extends EngineError {
  readonly kind = "Evaluation";

  constructor(message: string) {
    super(`EVALUATION_ERROR ${message}`);
    this.name = "EvaluationError";
  }
}

export class TemplateExpansionError extends EngineError {
  readonly kind = "TemplateExpansion";
  readonly templateId: string;

  constructor(templateId: string, message: string, options?: { cause?: unknown }) {
    super(`TEMPLATE_EXPANSION_ERROR ${templateId}: ${message}`, options);
    this.name = "TemplateExpansionError";
    this.templateId = templateId;
  }
}

export class DuplicateJobIdError extends EngineError {
  readonly kind = "DuplicateJobId";
  readonly jobId: string;

  constructor(jobId: string, origin: string) {
    super(`DUPLICATE_JOB_ID ${jobId} (from ${origin})`);
    this.name = "DuplicateJobIdError";
    this.jobId = jobId;
  }
}

export class DependencyCycleError extends EngineError {
  readonly kind = "DependencyCycle";
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`DEPENDENCY_CYCLE ${cycle.join(" -> ")}`);
    this.name = "DependencyCycleError";
    this.cycle = cycle;
  }
}

export class SnapshotWriteError extends EngineError {
  readonly kind = "SnapshotWrite";

  constructor(snapshotPath: string, options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? "unknown");
    super(`SNAPSHOT_WRITE_FAILED ${snapshotPath}: ${reason}`, options);
    this.name = "SnapshotWriteError";
  }
}

export class SessionStateError extends EngineError {
  readonly kind = "SessionState";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionStateError";
  }
}

export class SessionLockedError extends EngineError {
  readonly kind = "SessionLocked";
  readonly sessionId: string;

  constructor(sessionId: string, holderPid?: number) {
    super(
      `SESSION_LOCKED session=${sessionId}${holderPid === undefined ? "" : ` pid=${String(holderPid)}`}`
    );
    this.name = "SessionLockedError";
    this.sessionId = sessionId;
  }
}

export class LaunchProtocolError extends EngineError {
  readonly kind = "LaunchProtocol";

  constructor(message: string) {
    super(`LAUNCH_PROTOCOL_ERROR ${message}`);
    this.name = "LaunchProtocolError";
  }
}

export class JobIdError extends EngineError {
  readonly kind = "JobId";

  constructor(text: string, reason: string) {
    super(`JOB_ID_ERROR '${text}': ${reason}`);
    this.name = "JobIdError";
  }
}

/** One catalog unit that cannot be loaded; collected as a diagnostic, never fatal to the load. */
export class CatalogLoadError extends EngineError {
  readonly kind = "CatalogLoad";
  readonly unit: string;

  constructor(unit: string, message: string, options?: { cause?: unknown }) {
    super(`CATALOG_LOAD_ERROR ${unit}: ${message}`, options);
    this.name = "CatalogLoadError";
    this.unit = unit;
  }
}

export class ResumeConflictError extends EngineError {
  readonly kind = "ResumeConflict";
  readonly sessionId: string;

  constructor(sessionId: string, recorded: string, current: string) {
    super(`SESSION_RESUME_CONFLICT session=${sessionId} recorded=${recorded} current=${current}`);
    this.name = "ResumeConflictError";
    this.sessionId = sessionId;
  }
}
