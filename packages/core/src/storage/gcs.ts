/**
 * Google Cloud Storage object store
 *
 * Note: @google-cloud/storage is loaded on first use so the fs and memory
 * backends work without GCP credentials.
 */

import type { Bucket } from '@google-cloud/storage';
import type { DeleteOutcome, ObjectStore, ObjectSummary } from './types.js';
import { assertValidKey } from './types.js';

let Storage: typeof import('@google-cloud/storage').Storage | undefined;

async function loadStorage(): Promise<typeof import('@google-cloud/storage').Storage> {
  if (!Storage) {
    const module = await import('@google-cloud/storage');
    Storage = module.Storage;
  }
  return Storage;
}

export interface GcsObjectStoreOptions {
  bucket: string;
  projectId?: string;
}

export class GcsObjectStore implements ObjectStore {
  readonly kind = 'gcs';
  private bucketPromise: Promise<Bucket> | null = null;

  constructor(private options: GcsObjectStoreOptions) {
    if (!options.bucket) {
      throw new Error('A bucket name is required for the gcs object store');
    }
  }

  private async getBucket(): Promise<Bucket> {
    if (!this.bucketPromise) {
      this.bucketPromise = loadStorage().then((StorageClass) => {
        const storage = new StorageClass(
          this.options.projectId ? { projectId: this.options.projectId } : undefined
        );
        return storage.bucket(this.options.bucket);
      });
    }
    return this.bucketPromise;
  }

  async get(key: string): Promise<Buffer | null> {
    assertValidKey(key);
    const file = (await this.getBucket()).file(key);

    const [exists] = await file.exists();
    if (!exists) {
      return null;
    }

    const [contents] = await file.download();
    return contents;
  }

  async put(key: string, body: Buffer | string, contentType: string): Promise<void> {
    assertValidKey(key);
    const file = (await this.getBucket()).file(key);
    await file.save(body, { contentType, resumable: false });
  }

  async delete(key: string): Promise<DeleteOutcome> {
    assertValidKey(key);
    const file = (await this.getBucket()).file(key);

    const [exists] = await file.exists();
    if (!exists) {
      return 'absent';
    }

    await file.delete();
    return 'deleted';
  }

  async list(prefix = ''): Promise<ObjectSummary[]> {
    const [files] = await (await this.getBucket()).getFiles({ prefix });

    return files.map((file) => ({
      key: file.name,
      size: Number(file.metadata.size ?? 0) || 0,
      contentType: file.metadata.contentType ?? 'application/octet-stream',
      updated: file.metadata.updated ?? '',
    }));
  }
}
