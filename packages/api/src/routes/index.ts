import { initTRPC } from '@trpc/server';
import type { AssetLibrary, DefinitionCatalog, PageLifecycleManager } from '@pagewright/core';
import { createCatalogRouter } from './catalog.js';
import { createSiteRouter } from './site.js';
import { createPageRouter } from './pages.js';
import { createPublishRouter } from './publish.js';
import { createAssistantRouter } from './assistant.js';
import { createAssetRouter } from './assets.js';

const t = initTRPC.create();

export function createAppRouter(lifecycle: PageLifecycleManager, catalog: DefinitionCatalog, assets: AssetLibrary) {
  return t.router({
    catalog: createCatalogRouter(catalog),
    site: createSiteRouter(lifecycle),
    pages: createPageRouter(lifecycle),
    publish: createPublishRouter(lifecycle),
    assistant: createAssistantRouter(lifecycle, catalog),
    assets: createAssetRouter(assets),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;
