/**
 * In-memory object store
 * Used by tests and by `PAGEWRIGHT_STORE=memory` for throwaway sessions.
 */

import type { DeleteOutcome, ObjectStore, ObjectSummary } from './types.js';
import { assertValidKey } from './types.js';

interface StoredObject {
  body: Buffer;
  contentType: string;
  updated: string;
}

export class MemoryObjectStore implements ObjectStore {
  readonly kind = 'memory';
  private objects: Map<string, StoredObject> = new Map();

  constructor(private clock: () => Date = () => new Date()) {}

  async get(key: string): Promise<Buffer | null> {
    assertValidKey(key);
    const object = this.objects.get(key);
    return object ? Buffer.from(object.body) : null;
  }

  async put(key: string, body: Buffer | string, contentType: string): Promise<void> {
    assertValidKey(key);
    this.objects.set(key, {
      body: typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body),
      contentType,
      updated: this.clock().toISOString(),
    });
  }

  async delete(key: string): Promise<DeleteOutcome> {
    assertValidKey(key);
    return this.objects.delete(key) ? 'deleted' : 'absent';
  }

  async list(prefix = ''): Promise<ObjectSummary[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, object]) => ({
        key,
        size: object.body.length,
        contentType: object.contentType,
        updated: object.updated,
      }));
  }

  /** Check if a key exists */
  has(key: string): boolean {
    return this.objects.has(key);
  }

  /** Content type recorded for a key */
  contentTypeOf(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }

  /** Object contents as UTF-8 text */
  async getText(key: string): Promise<string | null> {
    const body = await this.get(key);
    return body ? body.toString('utf-8') : null;
  }
}
