/**
 * Domain error mapping
 */

import { TRPCError } from '@trpc/server';
import { PagewrightError, errorMessage, type PagewrightErrorCode } from '@pagewright/core';

type TRPCErrorCode = TRPCError['code'];

const TRPC_CODES: Partial<Record<PagewrightErrorCode, TRPCErrorCode>> = {
  SITE_NOT_INITIALIZED: 'PRECONDITION_FAILED',
  PAGE_NOT_FOUND: 'NOT_FOUND',
  TEMPLATE_NOT_FOUND: 'NOT_FOUND',
  COLOR_SCHEME_NOT_FOUND: 'NOT_FOUND',
  PAGE_EXISTS: 'CONFLICT',
  PROTECTED_PAGE: 'BAD_REQUEST',
  INVALID_PAGE_ID: 'BAD_REQUEST',
  INVALID_DOCUMENT: 'BAD_REQUEST',
  UNKNOWN_COMPONENT: 'BAD_REQUEST',
  INVALID_COMPONENT_DATA: 'BAD_REQUEST',
  UNSUPPORTED_ASSET: 'BAD_REQUEST',
};

/**
 * Convert anything thrown by core into a TRPCError
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof PagewrightError) {
    return new TRPCError({
      code: TRPC_CODES[error.code] ?? 'INTERNAL_SERVER_ERROR',
      message: error.message,
      cause: error,
    });
  }
  return new TRPCError({ code: 'INTERNAL_SERVER_ERROR', message: errorMessage(error), cause: error });
}

/**
 * Run a core operation, rethrowing failures as TRPCErrors
 */
export async function handle<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toTRPCError(error);
  }
}

/**
 * HTTP status for the plain Express routes; missing site and missing page
 * both answer 404
 */
export function httpStatusFor(error: unknown): number {
  if (!(error instanceof PagewrightError)) {
    return 500;
  }
  switch (error.code) {
    case 'SITE_NOT_INITIALIZED':
    case 'PAGE_NOT_FOUND':
    case 'TEMPLATE_NOT_FOUND':
      return 404;
    case 'PAGE_EXISTS':
      return 409;
    case 'INVALID_DOCUMENT':
    case 'INVALID_PAGE_ID':
    case 'UNKNOWN_COMPONENT':
    case 'INVALID_COMPONENT_DATA':
    case 'UNSUPPORTED_ASSET':
      return 400;
    default:
      return 500;
  }
}
