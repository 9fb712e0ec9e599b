/**
 * @pagewright/schema
 *
 * Document schemas, parsing and validation shared by every Pagewright package.
 */

// Schemas & types
export * from './schema.js';

// Parsing
export type { ParseResult } from './parser.js';
export {
  parseJson,
  parseSiteConfig,
  parsePageConfig,
  parsePageDraft,
  toValidationErrors,
  formatValidationErrors,
} from './parser.js';

// Validation
export { validateComponentData, isBlank, optionValues } from './validation.js';

// Page identity
export {
  INDEX_PAGE_ID,
  isValidPageId,
  slugifyPageId,
  slugForPage,
  publishedFilename,
  navigationUrl,
} from './pages.js';
