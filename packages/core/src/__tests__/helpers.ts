import { vi, type Mock } from 'vitest';
import { loadConfig } from '../config.js';
import { createPagewright, type Pagewright } from '../context.js';
import type { Logger } from '../logger.js';
import { MemoryObjectStore } from '../storage/memory.js';

export const START = new Date('2026-03-01T12:00:00.000Z');

/** Clock that advances one second per reading */
export function steppingClock(start: Date = START): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

export interface TestLogger extends Logger {
  info: Mock;
  warn: Mock;
  error: Mock;
  debug: Mock;
}

export function createTestLogger(): TestLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export interface TestPagewright extends Pagewright {
  objects: MemoryObjectStore;
}

export function createTestPagewright(
  options: { clock?: () => Date; logger?: Logger; objects?: MemoryObjectStore } = {}
): TestPagewright {
  const objects = options.objects ?? new MemoryObjectStore();
  const app = createPagewright({
    config: loadConfig({ PAGEWRIGHT_STORE: 'memory' }),
    objects,
    clock: options.clock ?? (() => START),
    logger: options.logger,
  });
  return { ...app, objects };
}
