/**
 * Document parsing
 * Turns untrusted JSON into typed site and page configs
 */

import type { z } from 'zod';
import {
  pageConfigSchema,
  pageDraftSchema,
  siteConfigSchema,
  type PageConfig,
  type SiteConfig,
  type ValidationError,
} from './schema.js';

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Convert zod issues into path/message pairs
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): ParseResult<z.infer<S>> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toValidationErrors(result.error) };
}

/**
 * Parse JSON text, reporting syntax errors as a validation error
 */
export function parseJson(text: string): ParseResult<unknown> {
  try {
    return { success: true, data: JSON.parse(text) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, errors: [{ path: '(root)', message: `Invalid JSON: ${message}` }] };
  }
}

/**
 * Validate a site config document
 */
export function parseSiteConfig(value: unknown): ParseResult<SiteConfig> {
  return parseWith(siteConfigSchema, value);
}

/**
 * Validate a page config document
 */
export function parsePageConfig(value: unknown): ParseResult<PageConfig> {
  return parseWith(pageConfigSchema, value);
}

/**
 * Validate unsaved page content (id defaults to "preview")
 */
export function parsePageDraft(value: unknown): ParseResult<PageConfig> {
  return parseWith(pageDraftSchema, value);
}

/**
 * Format validation errors for display, one per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((error) => `${error.path}: ${error.message}`).join('\n');
}
