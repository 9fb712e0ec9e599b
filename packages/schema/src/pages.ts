/**
 * Page identity helpers
 * Page ids double as published filenames and navigation URLs
 */

export const INDEX_PAGE_ID = 'index';

const PAGE_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
const MAX_PAGE_ID_LENGTH = 64;

/**
 * Check if a page id is usable as a filename segment
 */
export function isValidPageId(pageId: string): boolean {
  return pageId.length <= MAX_PAGE_ID_LENGTH && PAGE_ID_PATTERN.test(pageId);
}

/**
 * Derive a page id from free text ("About Us!" -> "about-us")
 */
export function slugifyPageId(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, MAX_PAGE_ID_LENGTH);
}

/**
 * URL slug for a page; the index page has an empty slug
 */
export function slugForPage(pageId: string): string {
  return pageId === INDEX_PAGE_ID ? '' : pageId;
}

/**
 * Object key of a page's published HTML
 */
export function publishedFilename(pageId: string): string {
  return `${pageId}.html`;
}

/**
 * Navigation URL pointing at a published page
 */
export function navigationUrl(pageId: string): string {
  return pageId === INDEX_PAGE_ID ? '/' : `/${publishedFilename(pageId)}`;
}
