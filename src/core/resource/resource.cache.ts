import type { ResourceRecord } from "./resource.record";

/** Cross-session storage for the output of `cachable` resource jobs. */
export interface ResourceCache {
  /** Records stored for this job at this checksum, or `undefined`. */
  get(jobId: string, checksum: string): ResourceRecord[] | undefined;
  put(jobId: string, checksum: string, records: readonly ResourceRecord[]): void;
}
