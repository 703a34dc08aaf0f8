import { readFile } from 'node:fs/promises';
import { resolve, sep } from 'node:path';
import type { IBlobStorage } from '@deep-research/domain/ports';

const isMissingFile = (error: unknown) =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'EISDIR');

/**
 * Blob storage over a local directory: bucket `b`, path `p` is the file
 * `<root>/b/p`. Paths escaping the bucket directory are treated as missing.
 */
export class FilesystemBlobStorage implements IBlobStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async fetch(bucket: string, path: string): Promise<Uint8Array | null> {
    const bucketDir = resolve(this.root, bucket);
    const filePath = resolve(bucketDir, path);
    if (!filePath.startsWith(bucketDir + sep)) {
      return null;
    }
    try {
      const content = await readFile(filePath);
      return content.byteLength > 0 ? new Uint8Array(content) : null;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }
}
