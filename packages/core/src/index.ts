/**
 * @pagewright/core
 *
 * Definition catalog, config store, renderers and page lifecycle.
 */

// Wiring & configuration
export { createPagewright } from './context.js';
export type { Pagewright, PagewrightOptions } from './context.js';
export { loadConfig, validateConfig, parseStoreKind, STORE_KINDS } from './config.js';
export type { PagewrightConfig, StoreKind } from './config.js';

// Errors & logging
export * from './errors.js';
export { noopLogger, createConsoleLogger } from './logger.js';
export type { Logger } from './logger.js';

// Catalog
export * from './catalog/index.js';

// Storage
export * from './storage/index.js';
export {
  ConfigStore,
  SITE_CONFIG_KEY,
  PAGE_CONFIG_PREFIX,
  pageConfigKey,
} from './config-store.js';
export type { ConfigStoreOptions } from './config-store.js';

// Rendering
export * from './templates/index.js';
export {
  ComponentRenderer,
  renderErrorFragment,
  MAX_NESTING_DEPTH,
  PUBLISHED_ERROR_TEXT,
} from './render/component-renderer.js';
export { PageRenderer, PREVIEW_SITE } from './render/page-renderer.js';
export type { RenderPageOptions, PageRendererOptions } from './render/page-renderer.js';
export {
  FALLBACK_COLORS,
  mergeColors,
  resolveColors,
  generateColorCss,
  toCssVariableName,
} from './render/colors.js';
export { escapeHtml, safeUrl, richText, FieldReader } from './render/html.js';

// Lifecycle
export { PageLifecycleManager, HTML_CONTENT_TYPE } from './services/lifecycle.service.js';
export type {
  PublishedArtifact,
  PublishFailure,
  PublishAllResult,
  RemovalOutcome,
  DeletePageResult,
  PageSummary,
  PageListing,
  ReconcileResult,
  Dashboard,
  AddPageOptions,
  SavePageOptions,
  SavePageResult,
  PageLifecycleOptions,
} from './services/lifecycle.service.js';
export {
  createDefaultPage,
  copySlots,
  assignComponentIds,
  freeComponentIds,
  usedComponentIds,
  DEFAULT_SLOTS,
} from './services/page-factory.js';

// Image assets
export {
  AssetLibrary,
  ASSET_UPLOAD_PREFIX,
  IMAGE_CONTENT_TYPES,
  imageContentType,
} from './services/asset.service.js';
export type { Asset, AssetLibraryOptions } from './services/asset.service.js';

// Assistant output
export {
  parseAssistantReply,
  validateGeneratedComponents,
  buildGeneratedPage,
  assistantPayloadSchema,
  SITE_WIDE_COMPONENTS,
  DEFAULT_GENERATED_PAGE_ID,
  DEFAULT_GENERATED_PAGE_TITLE,
} from './services/assistant.service.js';
export type { AssistantPayload, GeneratedComponentsCheck } from './services/assistant.service.js';
