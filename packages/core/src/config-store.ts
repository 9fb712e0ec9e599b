/**
 * Config store
 * Persists the site config and page configs as JSON documents under
 * the reserved `_builder/` prefix of the object store.
 */

import {
  parseJson,
  parsePageConfig,
  parseSiteConfig,
  type PageConfig,
  type ParseResult,
  type SiteConfig,
} from '@pagewright/schema';
import type { Logger } from './logger.js';
import { noopLogger } from './logger.js';
import type { DeleteOutcome, ObjectStore } from './storage/types.js';

export const BUILDER_PREFIX = '_builder/';
export const SITE_CONFIG_KEY = `${BUILDER_PREFIX}site.json`;
export const PAGE_CONFIG_PREFIX = `${BUILDER_PREFIX}pages/`;
export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Object key of a page config document
 */
export function pageConfigKey(pageId: string): string {
  return `${PAGE_CONFIG_PREFIX}${pageId}.json`;
}

export interface ConfigStoreOptions {
  /** Clock used for updated_at stamps */
  clock?: () => Date;
  logger?: Logger;
}

export class ConfigStore {
  private clock: () => Date;
  private logger: Logger;

  constructor(
    private objects: ObjectStore,
    options: ConfigStoreOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? noopLogger;
  }

  /** Current time as an ISO-8601 string */
  now(): string {
    return this.clock().toISOString();
  }

  private async readDocument<T>(
    key: string,
    parse: (value: unknown) => ParseResult<T>
  ): Promise<T | null> {
    const body = await this.objects.get(key);
    if (!body) {
      return null;
    }

    const json = parseJson(body.toString('utf-8'));
    const result = json.success ? parse(json.data) : json;
    if (!result.success) {
      this.logger.warn(`Ignoring unreadable document ${key}`, result.errors);
      return null;
    }
    return result.data;
  }

  private async writeDocument(key: string, document: SiteConfig | PageConfig): Promise<void> {
    await this.objects.put(key, JSON.stringify(document, null, 2), JSON_CONTENT_TYPE);
  }

  /**
   * Get the site config; null when absent or unreadable
   */
  async getSiteConfig(): Promise<SiteConfig | null> {
    return this.readDocument(SITE_CONFIG_KEY, parseSiteConfig);
  }

  /**
   * Save the site config, stamping updated_at
   */
  async saveSiteConfig(config: SiteConfig): Promise<SiteConfig> {
    const stamped: SiteConfig = { ...config, updated_at: this.now() };
    await this.writeDocument(SITE_CONFIG_KEY, stamped);
    this.logger.debug('Saved site config');
    return stamped;
  }

  /**
   * Get a page config; null when absent or unreadable
   */
  async getPageConfig(pageId: string): Promise<PageConfig | null> {
    return this.readDocument(pageConfigKey(pageId), parsePageConfig);
  }

  /**
   * Save a page config, stamping updated_at
   */
  async savePageConfig(pageId: string, config: PageConfig): Promise<PageConfig> {
    const stamped: PageConfig = { ...config, updated_at: this.now() };
    await this.writeDocument(pageConfigKey(pageId), stamped);
    this.logger.debug(`Saved page config ${pageId}`);
    return stamped;
  }

  /**
   * Delete a page config document
   */
  async deletePageConfig(pageId: string): Promise<DeleteOutcome> {
    return this.objects.delete(pageConfigKey(pageId));
  }

  /**
   * Ids of all stored page config documents
   */
  async listPageConfigIds(): Promise<string[]> {
    const objects = await this.objects.list(PAGE_CONFIG_PREFIX);
    return objects
      .map((object) => object.key.slice(PAGE_CONFIG_PREFIX.length))
      .filter((name) => name.endsWith('.json') && !name.includes('/'))
      .map((name) => name.slice(0, -'.json'.length));
  }
}
