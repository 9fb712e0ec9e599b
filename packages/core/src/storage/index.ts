import type { PagewrightConfig } from '../config.js';
import { validateConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { FileSystemObjectStore } from './filesystem.js';
import { GcsObjectStore } from './gcs.js';
import { MemoryObjectStore } from './memory.js';
import type { ObjectStore } from './types.js';

export type { ObjectStore, ObjectSummary, DeleteOutcome } from './types.js';
export type { GcsObjectStoreOptions } from './gcs.js';
export { validateKey } from './types.js';
export { MemoryObjectStore, FileSystemObjectStore, GcsObjectStore };

/**
 * Create the object store selected by the configuration
 */
export function createObjectStore(config: PagewrightConfig): ObjectStore {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigError(problems.join('\n'));
  }

  switch (config.store) {
    case 'memory':
      return new MemoryObjectStore();
    case 'gcs':
      return new GcsObjectStore({
        bucket: config.bucket,
        projectId: config.gcpProjectId || undefined,
      });
    case 'fs':
      return new FileSystemObjectStore(config.rootDir);
  }
}
