/**
 * Object storage the tools read their input files from.
 * A missing or empty object resolves to `null`.
 */
export interface IBlobStorage {
  fetch(bucket: string, path: string): Promise<Uint8Array | null>;
}
