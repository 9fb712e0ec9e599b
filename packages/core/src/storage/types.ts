/**
 * Object store contract
 * A flat key/value blob store: the site's documents and published HTML
 * live side by side in one namespace.
 */

export type DeleteOutcome = 'deleted' | 'absent';

export interface ObjectSummary {
  key: string;
  size: number;
  contentType: string;
  updated: string;
}

export interface ObjectStore {
  /** Backend name, e.g. "memory", "fs", "gcs" */
  readonly kind: string;

  /** Object contents, or null when the key does not exist */
  get(key: string): Promise<Buffer | null>;

  put(key: string, body: Buffer | string, contentType: string): Promise<void>;

  delete(key: string): Promise<DeleteOutcome>;

  list(prefix?: string): Promise<ObjectSummary[]>;
}

/**
 * Validate an object key - prevent path traversal
 */
export function validateKey(key: string): { valid: boolean; error?: string } {
  if (!key) {
    return { valid: false, error: 'Key is required' };
  }

  if (key.startsWith('/')) {
    return { valid: false, error: 'Key must not start with /' };
  }

  if (key.split('/').includes('..')) {
    return { valid: false, error: 'Key must not contain ..' };
  }

  if (key.includes('//')) {
    return { valid: false, error: 'Key must not contain //' };
  }

  return { valid: true };
}

export function assertValidKey(key: string): void {
  const result = validateKey(key);
  if (!result.valid) {
    throw new Error(`Invalid object key "${key}": ${result.error}`);
  }
}
