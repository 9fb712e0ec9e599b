/**
 * Wiring
 * Builds the catalog, stores, renderers and lifecycle manager once per process.
 */

import { DefinitionCatalog } from './catalog/catalog.js';
import { loadConfig, type PagewrightConfig } from './config.js';
import { ConfigStore } from './config-store.js';
import type { Logger } from './logger.js';
import { noopLogger } from './logger.js';
import { ComponentRenderer } from './render/component-renderer.js';
import { PageRenderer } from './render/page-renderer.js';
import { AssetLibrary } from './services/asset.service.js';
import { PageLifecycleManager } from './services/lifecycle.service.js';
import { createObjectStore } from './storage/index.js';
import type { ObjectStore } from './storage/types.js';
import { createDefaultTemplates } from './templates/index.js';
import type { TemplateRegistry } from './templates/registry.js';

export interface PagewrightOptions {
  /** Defaults to loadConfig() */
  config?: PagewrightConfig;
  /** Overrides the store chosen by config */
  objects?: ObjectStore;
  /** Overrides the catalog loaded from config.definitionsDir */
  catalog?: DefinitionCatalog;
  templates?: TemplateRegistry;
  clock?: () => Date;
  logger?: Logger;
}

export interface Pagewright {
  config: PagewrightConfig;
  objects: ObjectStore;
  store: ConfigStore;
  catalog: DefinitionCatalog;
  templates: TemplateRegistry;
  components: ComponentRenderer;
  renderer: PageRenderer;
  lifecycle: PageLifecycleManager;
  assets: AssetLibrary;
  logger: Logger;
}

export function createPagewright(options: PagewrightOptions = {}): Pagewright {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? noopLogger;

  const objects = options.objects ?? createObjectStore(config);
  const catalog = options.catalog ?? DefinitionCatalog.fromDirectory(config.definitionsDir, logger);
  const templates = options.templates ?? createDefaultTemplates();
  const store = new ConfigStore(objects, { clock: options.clock, logger });
  const components = new ComponentRenderer(catalog, templates, logger);
  const renderer = new PageRenderer({ store, catalog, templates, components, logger });
  const lifecycle = new PageLifecycleManager({ store, objects, catalog, renderer, logger });
  const assets = new AssetLibrary(objects, { logger });

  return { config, objects, store, catalog, templates, components, renderer, lifecycle, assets, logger };
}
