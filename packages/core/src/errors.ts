/**
 * Pagewright error types
 * Every domain failure carries a stable code so callers can map it
 * to an HTTP status or exit message without parsing text.
 */

import type { ValidationError } from '@pagewright/schema';

export type PagewrightErrorCode =
  | 'SITE_NOT_INITIALIZED'
  | 'PAGE_NOT_FOUND'
  | 'TEMPLATE_NOT_FOUND'
  | 'COLOR_SCHEME_NOT_FOUND'
  | 'PAGE_EXISTS'
  | 'PROTECTED_PAGE'
  | 'INVALID_PAGE_ID'
  | 'INVALID_DOCUMENT'
  | 'INVALID_CONFIG'
  | 'UNKNOWN_COMPONENT'
  | 'INVALID_COMPONENT_DATA'
  | 'UNSUPPORTED_ASSET';

export class PagewrightError extends Error {
  code: PagewrightErrorCode;

  constructor(message: string, code: PagewrightErrorCode) {
    super(message);
    this.name = 'PagewrightError';
    this.code = code;
  }
}

export class SiteNotInitializedError extends PagewrightError {
  constructor() {
    super('Site not initialized', 'SITE_NOT_INITIALIZED');
    this.name = 'SiteNotInitializedError';
  }
}

export class PageNotFoundError extends PagewrightError {
  pageId: string;

  constructor(pageId: string) {
    super(`Page not found: ${pageId}`, 'PAGE_NOT_FOUND');
    this.name = 'PageNotFoundError';
    this.pageId = pageId;
  }
}

/**
 * Thrown for an unknown template id, and for a missing render template
 * reference such as "components/hero-text"
 */
export class TemplateNotFoundError extends PagewrightError {
  reference: string;

  constructor(reference: string) {
    super(`Template not found: ${reference}`, 'TEMPLATE_NOT_FOUND');
    this.name = 'TemplateNotFoundError';
    this.reference = reference;
  }
}

export class ColorSchemeNotFoundError extends PagewrightError {
  constructor(schemeId: string) {
    super(`Color scheme not found: ${schemeId}`, 'COLOR_SCHEME_NOT_FOUND');
    this.name = 'ColorSchemeNotFoundError';
  }
}

export class PageExistsError extends PagewrightError {
  constructor(pageId: string) {
    super(`Page already exists: ${pageId}`, 'PAGE_EXISTS');
    this.name = 'PageExistsError';
  }
}

export class ProtectedPageError extends PagewrightError {
  constructor(pageId: string) {
    super(`Cannot delete the ${pageId} page`, 'PROTECTED_PAGE');
    this.name = 'ProtectedPageError';
  }
}

export class InvalidPageIdError extends PagewrightError {
  constructor(pageId: string) {
    super(
      `Invalid page id "${pageId}": use lowercase letters, digits and single hyphens`,
      'INVALID_PAGE_ID'
    );
    this.name = 'InvalidPageIdError';
  }
}

export class InvalidDocumentError extends PagewrightError {
  errors: ValidationError[];

  constructor(subject: string, errors: ValidationError[]) {
    const detail = errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    super(`Invalid ${subject}: ${detail}`, 'INVALID_DOCUMENT');
    this.name = 'InvalidDocumentError';
    this.errors = errors;
  }
}

export class ConfigError extends PagewrightError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export class UnknownComponentError extends PagewrightError {
  constructor(componentType: string) {
    super(`Unknown component type: ${componentType}`, 'UNKNOWN_COMPONENT');
    this.name = 'UnknownComponentError';
  }
}

export class ComponentDataError extends PagewrightError {
  componentType: string;
  errors: ValidationError[];

  constructor(componentType: string, errors: ValidationError[]) {
    super(errors.map((e) => e.message).join(', '), 'INVALID_COMPONENT_DATA');
    this.name = 'ComponentDataError';
    this.componentType = componentType;
    this.errors = errors;
  }
}

export class UnsupportedAssetError extends PagewrightError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_ASSET');
    this.name = 'UnsupportedAssetError';
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
