export { DefinitionCatalog } from './catalog.js';
export {
  FileDefinitionSource,
  StaticDefinitionSource,
  BUNDLED_DEFINITIONS_DIR,
  COMPONENTS_FILE,
  COLOR_SCHEMES_FILE,
  TEMPLATES_FILE,
} from './sources.js';
export type { DefinitionSource, StaticDefinitions } from './sources.js';
