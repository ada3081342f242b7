import { JobIdError } from "../errors/engine.errors";

export const JOB_ID_SEPARATOR = "::";

const NAMESPACE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const PARTIAL_ID_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.+@/-]*$/;

/**
 * Interned, namespaced job identifier.
 *
 * `JobId.of("com.example", "disk")` always returns the same instance for the
 * same pair, so identity comparison (`===`) and `Map`/`Set` membership are
 * structural checks on the (namespace, partialId) pair.
 */
export class JobId {
  private static readonly interned = new Map<string, JobId>();

  private constructor(
    readonly namespace: string,
    readonly partialId: string
  ) {}

  static of(namespace: string, partialId: string): JobId {
    if (!NAMESPACE_PATTERN.test(namespace)) {
      throw new JobIdError(`${namespace}${JOB_ID_SEPARATOR}${partialId}`, "invalid namespace");
    }
    if (!PARTIAL_ID_PATTERN.test(partialId) || partialId.includes(JOB_ID_SEPARATOR)) {
      throw new JobIdError(`${namespace}${JOB_ID_SEPARATOR}${partialId}`, "invalid partial id");
    }
    const key = `${namespace}${JOB_ID_SEPARATOR}${partialId}`;
    const existing = JobId.interned.get(key);
    if (existing) {
      return existing;
    }
    const created = new JobId(namespace, partialId);
    JobId.interned.set(key, created);
    return created;
  }

  /**
   * Parses `namespace::partial` or, when `defaultNamespace` is given, a bare
   * partial id relative to it.
   */
  static parse(text: string, defaultNamespace?: string): JobId {
    const trimmed = text.trim();
    const idx = trimmed.indexOf(JOB_ID_SEPARATOR);
    if (idx < 0) {
      if (defaultNamespace === undefined) {
        throw new JobIdError(trimmed, "namespace is required");
      }
      return JobId.of(defaultNamespace, trimmed);
    }
    return JobId.of(trimmed.slice(0, idx), trimmed.slice(idx + JOB_ID_SEPARATOR.length));
  }

  static tryParse(text: string, defaultNamespace?: string): JobId | undefined {
    try {
      return JobId.parse(text, defaultNamespace);
    } catch (error) {
      if (error instanceof JobIdError) {
        return undefined;
      }
      throw error;
    }
  }

  withPartialId(partialId: string): JobId {
    return JobId.of(this.namespace, partialId);
  }

  toString(): string {
    return `${this.namespace}${JOB_ID_SEPARATOR}${this.partialId}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
