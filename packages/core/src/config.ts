/**
 * Pagewright configuration
 * Reads from environment variables; CLI flags override individual fields.
 */

import { ConfigError } from './errors.js';

export const STORE_KINDS = ['fs', 'gcs', 'memory'] as const;
export type StoreKind = (typeof STORE_KINDS)[number];

export interface PagewrightConfig {
  /** Object store backend */
  store: StoreKind;

  /** Root directory for the fs store (documents and published HTML) */
  rootDir: string;

  /** GCS bucket for the gcs store */
  bucket: string;

  /** GCP project ID (uses default credentials if empty) */
  gcpProjectId: string;

  /** Directory holding components.json, color_schemes.json and templates.json */
  definitionsDir: string;

  /** HTTP server port */
  port: number;

  /** HTTP server host */
  host: string;
}

function isStoreKind(value: string): value is StoreKind {
  const kinds: readonly string[] = STORE_KINDS;
  return kinds.includes(value);
}

/**
 * Parse a store backend name
 */
export function parseStoreKind(value: string): StoreKind {
  const normalized = value.trim().toLowerCase();
  if (!isStoreKind(normalized)) {
    throw new ConfigError(
      `Unknown store "${value}". Expected one of: ${STORE_KINDS.join(', ')}`
    );
  }
  return normalized;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PagewrightConfig {
  return {
    store: parseStoreKind(env.PAGEWRIGHT_STORE || 'fs'),
    rootDir: env.PAGEWRIGHT_ROOT || './site',
    bucket: env.PAGEWRIGHT_BUCKET || '',
    gcpProjectId: env.PAGEWRIGHT_GCP_PROJECT || '',
    definitionsDir: env.PAGEWRIGHT_DEFINITIONS_DIR || '',
    port: parsePort(env.PORT || '4000'),
    host: env.HOST || 'localhost',
  };
}

/**
 * Check required settings for the chosen backend; returns the problems found
 */
export function validateConfig(config: PagewrightConfig): string[] {
  const problems: string[] = [];

  if (config.store === 'gcs' && !config.bucket) {
    problems.push('PAGEWRIGHT_BUCKET is required when PAGEWRIGHT_STORE=gcs');
  }
  if (config.store === 'fs' && !config.rootDir) {
    problems.push('PAGEWRIGHT_ROOT is required when PAGEWRIGHT_STORE=fs');
  }

  return problems;
}
