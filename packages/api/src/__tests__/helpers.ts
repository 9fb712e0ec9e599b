import { createPagewright, loadConfig, MemoryObjectStore, type Pagewright } from '@pagewright/core';

export interface TestServices extends Pagewright {
  objects: MemoryObjectStore;
}

export function createTestServices(): TestServices {
  const objects = new MemoryObjectStore();
  const app = createPagewright({
    config: loadConfig({ PAGEWRIGHT_STORE: 'memory' }),
    objects,
    clock: () => new Date('2026-03-01T12:00:00.000Z'),
  });
  return { ...app, objects };
}
