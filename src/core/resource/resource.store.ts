import { ResourceRecord } from "./resource.record";

export const MANIFEST_GROUP = "manifest";
export const ENVIRONMENT_GROUP = "environment";
export const RESERVED_GROUPS: readonly string[] = Object.freeze([MANIFEST_GROUP, ENVIRONMENT_GROUP]);

export type PlainResourceMap = Readonly<Record<string, readonly Readonly<Record<string, string>>[]>>;

export function isReservedGroup(group: string): boolean {
  return RESERVED_GROUPS.includes(group);
}

/**
 * Resource groups keyed by the producing job id. A group that was never
 * published reads as empty, which is how an expression sees a resource job
 * that has not run yet.
 */
export class ResourceStore {
  private readonly groups = new Map<string, readonly ResourceRecord[]>();

  constructor(
    init: {
      readonly manifest?: Readonly<Record<string, string>>;
      readonly environment?: Readonly<Record<string, string>>;
    } = {}
  ) {
    this.setManifest(init.manifest ?? {});
    this.setEnvironment(init.environment ?? {});
  }

  static fromPlain(map: PlainResourceMap): ResourceStore {
    const store = new ResourceStore();
    for (const [group, rows] of Object.entries(map)) {
      store.publish(
        group,
        rows.map((row) => ResourceRecord.from(row))
      );
    }
    return store;
  }

  /** Replaces the group wholesale and makes it visible to evaluation. */
  publish(group: string, records: readonly ResourceRecord[]): void {
    this.groups.set(group, Object.freeze([...records]));
  }

  records(group: string): readonly ResourceRecord[] {
    return this.groups.get(group) ?? [];
  }

  isPublished(group: string): boolean {
    return this.groups.has(group);
  }

  setManifest(answers: Readonly<Record<string, string>>): void {
    this.groups.set(MANIFEST_GROUP, Object.freeze([ResourceRecord.from(answers)]));
  }

  setEnvironment(variables: Readonly<Record<string, string>>): void {
    this.groups.set(ENVIRONMENT_GROUP, Object.freeze([ResourceRecord.from(variables)]));
  }

  publishedGroups(): string[] {
    return [...this.groups.keys()].filter((group) => !isReservedGroup(group));
  }

  /** Plain form of the job-produced groups, used by the session snapshot. */
  toPlain(): Record<string, Record<string, string>[]> {
    const out: Record<string, Record<string, string>[]> = {};
    for (const group of this.publishedGroups()) {
      out[group] = this.records(group).map((record) => record.toJSON());
    }
    return out;
  }
}
