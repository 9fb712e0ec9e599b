/**
 * Definition sources
 * Raw component, color scheme and template entries, parsed by the catalog.
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { parseJson } from '@pagewright/schema';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';

export const COMPONENTS_FILE = 'components.json';
export const COLOR_SCHEMES_FILE = 'color_schemes.json';
export const TEMPLATES_FILE = 'templates.json';

/** Definitions shipped with this package */
export const BUNDLED_DEFINITIONS_DIR = fileURLToPath(new URL('../../definitions', import.meta.url));

export interface DefinitionSource {
  loadComponents(): unknown[];
  loadColorSchemes(): unknown[];
  loadTemplates(): unknown[];
}

/**
 * Reads `{ "<collection>": [...] }` files from a directory.
 * A missing or unreadable file yields an empty collection.
 */
export class FileDefinitionSource implements DefinitionSource {
  readonly dir: string;
  private logger: Logger;

  constructor(dir: string = BUNDLED_DEFINITIONS_DIR, logger: Logger = noopLogger) {
    this.dir = path.resolve(dir);
    this.logger = logger;
  }

  private readCollection(filename: string, collection: string): unknown[] {
    const filepath = path.join(this.dir, filename);
    if (!existsSync(filepath)) {
      this.logger.warn(`Definition file not found: ${filepath}`);
      return [];
    }

    const json = parseJson(readFileSync(filepath, 'utf-8'));
    if (!json.success) {
      this.logger.warn(`Invalid JSON in ${filepath}`, json.errors);
      return [];
    }

    const entries = typeof json.data === 'object' && json.data !== null
      ? Reflect.get(json.data, collection)
      : undefined;
    if (!Array.isArray(entries)) {
      this.logger.warn(`${filepath} has no "${collection}" array`);
      return [];
    }
    return entries;
  }

  loadComponents(): unknown[] {
    return this.readCollection(COMPONENTS_FILE, 'components');
  }

  loadColorSchemes(): unknown[] {
    return this.readCollection(COLOR_SCHEMES_FILE, 'color_schemes');
  }

  loadTemplates(): unknown[] {
    return this.readCollection(TEMPLATES_FILE, 'templates');
  }
}

export interface StaticDefinitions {
  components?: unknown[];
  colorSchemes?: unknown[];
  templates?: unknown[];
}

/**
 * Definitions supplied in code
 */
export class StaticDefinitionSource implements DefinitionSource {
  constructor(private definitions: StaticDefinitions) {}

  loadComponents(): unknown[] {
    return this.definitions.components ?? [];
  }

  loadColorSchemes(): unknown[] {
    return this.definitions.colorSchemes ?? [];
  }

  loadTemplates(): unknown[] {
    return this.definitions.templates ?? [];
  }
}
