/**
 * Page lifecycle
 *
 * Site initialization and page create/copy/delete/publish, coordinating the
 * config store, the renderer and the published artifacts in the object store.
 * Each operation runs sequentially to completion; there is no locking, so the
 * last write to the site config wins.
 */

import {
  INDEX_PAGE_ID,
  isValidPageId,
  navigationUrl,
  pagePatchSchema,
  publishedFilename,
  siteSettingsPatchSchema,
  slugForPage,
  toValidationErrors,
  type NavigationItem,
  type PageConfig,
  type SiteConfig,
} from '@pagewright/schema';
import type { DefinitionCatalog } from '../catalog/catalog.js';
import type { ConfigStore } from '../config-store.js';
import { pageConfigKey } from '../config-store.js';
import {
  ColorSchemeNotFoundError,
  InvalidDocumentError,
  InvalidPageIdError,
  PageExistsError,
  PageNotFoundError,
  ProtectedPageError,
  SiteNotInitializedError,
  TemplateNotFoundError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';
import type { PageRenderer } from '../render/page-renderer.js';
import type { DeleteOutcome, ObjectStore } from '../storage/types.js';
import {
  DEFAULT_GENERATED_PAGE_TITLE,
  buildGeneratedPage,
  validateGeneratedComponents,
  type AssistantPayload,
} from './assistant.service.js';
import {
  assignComponentIds,
  copySlots,
  createDefaultPage,
  freeComponentIds,
  usedComponentIds,
} from './page-factory.js';

export const HTML_CONTENT_TYPE = 'text/html';

export interface PublishedArtifact {
  pageId: string;
  key: string;
  bytes: number;
}

export interface PublishFailure {
  pageId: string;
  reason: string;
}

export interface PublishAllResult {
  published: string[];
  failures: PublishFailure[];
}

export type RemovalOutcome =
  | { key: string; status: DeleteOutcome }
  | { key: string; status: 'failed'; reason: string };

export interface DeletePageResult {
  pageId: string;
  site: SiteConfig;
  document: RemovalOutcome;
  artifact: RemovalOutcome;
}

export interface PageSummary {
  id: string;
  title: string;
  slug: string;
  updated_at: string;
}

export interface PageListing {
  site: SiteConfig;
  pages: PageSummary[];
  /** Ids in site.pages with no page config */
  orphans: string[];
  /** Stored page configs that site.pages does not list */
  unlisted: string[];
}

export interface ReconcileResult {
  changed: boolean;
  removed: string[];
  site: SiteConfig;
}

export type Dashboard =
  | { initialized: false }
  | { initialized: true; site: SiteConfig; pages: PageSummary[]; repaired: string[] };

export interface AddPageOptions {
  /** Start the main slot with a heading showing the page title */
  starter?: boolean;
}

export interface SavePageOptions {
  publish?: boolean;
}

export interface SavePageResult {
  page: PageConfig;
  published: PublishedArtifact | null;
}

export interface PageLifecycleOptions {
  store: ConfigStore;
  objects: ObjectStore;
  catalog: DefinitionCatalog;
  renderer: PageRenderer;
  logger?: Logger;
}

/**
 * Navigation without entries (at any depth) pointing at a URL
 */
function removeNavigation(items: NavigationItem[], url: string): NavigationItem[] {
  return items
    .filter((item) => item.url !== url)
    .map((item) => ({ ...item, children: removeNavigation(item.children, url) }));
}

export class PageLifecycleManager {
  private store: ConfigStore;
  private objects: ObjectStore;
  private catalog: DefinitionCatalog;
  private renderer: PageRenderer;
  private logger: Logger;

  constructor(options: PageLifecycleOptions) {
    this.store = options.store;
    this.objects = options.objects;
    this.catalog = options.catalog;
    this.renderer = options.renderer;
    this.logger = options.logger ?? noopLogger;
  }

  private async requireSite(): Promise<SiteConfig> {
    const site = await this.store.getSiteConfig();
    if (!site) {
      throw new SiteNotInitializedError();
    }
    return site;
  }

  private async requirePage(pageId: string): Promise<PageConfig> {
    const page = await this.store.getPageConfig(pageId);
    if (!page) {
      throw new PageNotFoundError(pageId);
    }
    return page;
  }

  private assertPageId(pageId: string): void {
    if (!isValidPageId(pageId)) {
      throw new InvalidPageIdError(pageId);
    }
  }

  /**
   * Add a page id to site.pages and the navigation, unless already listed
   */
  private withPage(site: SiteConfig, pageId: string, title: string): SiteConfig {
    if (site.pages.includes(pageId)) {
      return site;
    }
    return {
      ...site,
      pages: [...site.pages, pageId],
      navigation: [...site.navigation, { label: title, url: navigationUrl(pageId), children: [] }],
    };
  }

  private assertColorScheme(colorSchemeId: string): void {
    if (!this.catalog.getColorScheme(colorSchemeId)) {
      throw new ColorSchemeNotFoundError(colorSchemeId);
    }
  }

  // ===========================================================================
  // Site
  // ===========================================================================

  /**
   * Create the site config and its index page; re-running overwrites both
   */
  async initSite(templateId: string, colorSchemeId: string, siteName: string): Promise<SiteConfig> {
    const template = this.catalog.getTemplate(templateId);
    if (!template) {
      throw new TemplateNotFoundError(templateId);
    }
    this.assertColorScheme(colorSchemeId);

    const now = this.store.now();
    const year = new Date(now).getUTCFullYear();
    const site: SiteConfig = {
      version: '1.0',
      template_id: templateId,
      color_scheme_id: colorSchemeId,
      color_overrides: {},
      site_name: siteName,
      logo_url: '',
      favicon_url: '',
      pages: [INDEX_PAGE_ID],
      navigation: [{ label: 'Home', url: navigationUrl(INDEX_PAGE_ID), children: [] }],
      footer_text: `© ${year} ${siteName}. All rights reserved.`,
      social_links: {},
      created_at: now,
      updated_at: now,
    };

    const index = createDefaultPage(this.catalog, {
      pageId: INDEX_PAGE_ID,
      title: 'Home',
      template,
      starterHeading: siteName ? `Welcome to ${siteName}` : 'Welcome',
      now,
    });

    const saved = await this.store.saveSiteConfig(site);
    await this.store.savePageConfig(INDEX_PAGE_ID, index);
    this.logger.info(`Initialized site "${siteName}" with template ${templateId}`);
    return saved;
  }

  /**
   * Current site config, or null before initialization
   */
  async getSite(): Promise<SiteConfig | null> {
    return this.store.getSiteConfig();
  }

  /**
   * Update site-wide settings (name, colors, navigation, footer, logo)
   */
  async updateSiteSettings(patch: unknown): Promise<SiteConfig> {
    const parsed = siteSettingsPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new InvalidDocumentError('site settings', toValidationErrors(parsed.error));
    }
    const settings = parsed.data;

    if (settings.color_scheme_id !== undefined) {
      this.assertColorScheme(settings.color_scheme_id);
    }

    const site = { ...(await this.requireSite()) };
    if (settings.site_name !== undefined) site.site_name = settings.site_name;
    if (settings.color_scheme_id !== undefined) site.color_scheme_id = settings.color_scheme_id;
    if (settings.color_overrides !== undefined) site.color_overrides = settings.color_overrides;
    if (settings.footer_text !== undefined) site.footer_text = settings.footer_text;
    if (settings.navigation !== undefined) site.navigation = settings.navigation;
    if (settings.logo_url !== undefined) site.logo_url = settings.logo_url;
    if (settings.favicon_url !== undefined) site.favicon_url = settings.favicon_url;
    if (settings.social_links !== undefined) site.social_links = settings.social_links;

    return this.store.saveSiteConfig(site);
  }

  // ===========================================================================
  // Pages
  // ===========================================================================

  /**
   * Create a page and list it in the site; listing is skipped when the id is
   * already present, but the page config is always (re)written
   */
  async addPage(pageId: string, title: string, options: AddPageOptions = {}): Promise<PageConfig> {
    this.assertPageId(pageId);
    const site = await this.requireSite();

    const page = createDefaultPage(this.catalog, {
      pageId,
      title,
      template: this.catalog.getTemplate(site.template_id),
      starterHeading: options.starter ? title : undefined,
      now: this.store.now(),
    });

    const saved = await this.store.savePageConfig(pageId, page);
    const updated = this.withPage(site, pageId, title);
    if (updated !== site) {
      await this.store.saveSiteConfig(updated);
    }
    this.logger.info(`Added page ${pageId}`);
    return saved;
  }

  /**
   * Copy a page's slots under a new id with fresh component ids
   */
  async copyPage(sourceId: string, newId: string, newTitle: string): Promise<PageConfig> {
    this.assertPageId(newId);
    const site = await this.requireSite();
    const source = await this.requirePage(sourceId);
    if (site.pages.includes(newId)) {
      throw new PageExistsError(newId);
    }

    const now = this.store.now();
    const copy: PageConfig = {
      id: newId,
      title: newTitle,
      slug: slugForPage(newId),
      slots: copySlots(source.slots),
      meta_description: source.meta_description,
      created_at: now,
      updated_at: now,
    };

    const saved = await this.store.savePageConfig(newId, copy);
    await this.store.saveSiteConfig(this.withPage(site, newId, newTitle));
    this.logger.info(`Copied page ${sourceId} to ${newId}`);
    return saved;
  }

  /**
   * Remove a page from the site, then delete its config and published HTML.
   * The two deletions are best-effort and reported individually.
   */
  async deletePage(pageId: string): Promise<DeletePageResult> {
    if (pageId === INDEX_PAGE_ID) {
      throw new ProtectedPageError(pageId);
    }
    const site = await this.requireSite();

    const saved = await this.store.saveSiteConfig({
      ...site,
      pages: site.pages.filter((id) => id !== pageId),
      navigation: removeNavigation(site.navigation, navigationUrl(pageId)),
    });

    const document = await this.attemptRemoval(pageConfigKey(pageId), () =>
      this.store.deletePageConfig(pageId)
    );
    const artifactKey = publishedFilename(pageId);
    const artifact = await this.attemptRemoval(artifactKey, () => this.objects.delete(artifactKey));

    this.logger.info(`Deleted page ${pageId}`, { document: document.status, artifact: artifact.status });
    return { pageId, site: saved, document, artifact };
  }

  private async attemptRemoval(key: string, remove: () => Promise<DeleteOutcome>): Promise<RemovalOutcome> {
    try {
      return { key, status: await remove() };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn(`Could not delete ${key}`, reason);
      return { key, status: 'failed', reason };
    }
  }

  /**
   * Get a page config
   */
  async getPage(pageId: string): Promise<PageConfig> {
    return this.requirePage(pageId);
  }

  /**
   * Update a page's title, slots or meta description; optionally publish it
   */
  async savePage(pageId: string, patch: unknown, options: SavePageOptions = {}): Promise<SavePageResult> {
    const parsed = pagePatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new InvalidDocumentError('page', toValidationErrors(parsed.error));
    }
    const changes = parsed.data;
    const existing = await this.requirePage(pageId);

    const page = await this.store.savePageConfig(pageId, {
      ...existing,
      title: changes.title ?? existing.title,
      meta_description: changes.meta_description ?? existing.meta_description,
      slots: assignComponentIds(changes.slots ?? existing.slots),
    });

    const published = options.publish ? await this.publishPage(pageId) : null;
    return { page, published };
  }

  /**
   * The site's pages in site order, plus ids whose config is missing.
   * Read-only; see reconcileSite for the repair.
   */
  async listPages(): Promise<PageListing> {
    const site = await this.requireSite();
    const pages: PageSummary[] = [];
    const orphans: string[] = [];

    for (const pageId of site.pages) {
      const page = await this.store.getPageConfig(pageId);
      if (!page) {
        orphans.push(pageId);
        continue;
      }
      pages.push({ id: page.id, title: page.title, slug: page.slug, updated_at: page.updated_at });
    }

    const stored = await this.store.listPageConfigIds();
    const unlisted = stored.filter((pageId) => !site.pages.includes(pageId));

    return { site, pages, orphans, unlisted };
  }

  /**
   * Drop ids without a page config from site.pages and the navigation.
   * Saves only when something was removed.
   */
  async reconcileSite(): Promise<ReconcileResult> {
    const { site, orphans } = await this.listPages();
    if (orphans.length === 0) {
      return { changed: false, removed: [], site };
    }

    let navigation = site.navigation;
    for (const pageId of orphans) {
      navigation = removeNavigation(navigation, navigationUrl(pageId));
    }

    const saved = await this.store.saveSiteConfig({
      ...site,
      pages: site.pages.filter((id) => !orphans.includes(id)),
      navigation,
    });
    this.logger.warn(`Removed missing pages from site: ${orphans.join(', ')}`);
    return { changed: true, removed: orphans, site: saved };
  }

  /**
   * Dashboard read: list pages and repair orphaned entries
   */
  async loadDashboard(): Promise<Dashboard> {
    if (!(await this.store.getSiteConfig())) {
      return { initialized: false };
    }

    const listing = await this.listPages();
    if (listing.orphans.length === 0) {
      return { initialized: true, site: listing.site, pages: listing.pages, repaired: [] };
    }

    const repair = await this.reconcileSite();
    return { initialized: true, site: repair.site, pages: listing.pages, repaired: repair.removed };
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  /**
   * Render a page and write it to its public filename
   */
  async publishPage(pageId: string): Promise<PublishedArtifact> {
    const page = await this.requirePage(pageId);
    const html = await this.renderer.renderPage(page, { mode: 'publish' });
    const key = publishedFilename(pageId);

    await this.objects.put(key, html, HTML_CONTENT_TYPE);
    this.logger.info(`Published ${key}`);
    return { pageId, key, bytes: Buffer.byteLength(html, 'utf-8') };
  }

  /**
   * Publish every page in site order; a failing page is reported and skipped
   */
  async publishAll(): Promise<PublishAllResult> {
    const site = await this.requireSite();
    const published: string[] = [];
    const failures: PublishFailure[] = [];

    for (const pageId of site.pages) {
      try {
        await this.publishPage(pageId);
        published.push(pageId);
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.error(`Failed to publish ${pageId}`, reason);
        failures.push({ pageId, reason });
      }
    }

    return { published, failures };
  }

  /**
   * Render a saved page with preview error detail, without publishing
   */
  async previewPage(pageId: string): Promise<string> {
    const page = await this.requirePage(pageId);
    return this.renderer.renderPage(page, { mode: 'preview' });
  }

  // ===========================================================================
  // Assistant
  // ===========================================================================

  /**
   * Store assistant-generated components as a page's main slot. An existing
   * page keeps its other slots; a new page gets the default skeleton.
   */
  async applyGeneratedPage(pageId: string, payload: AssistantPayload): Promise<PageConfig> {
    this.assertPageId(pageId);
    const check = validateGeneratedComponents(this.catalog, payload.components);
    if (!check.valid) {
      throw new InvalidDocumentError(
        'generated components',
        check.errors.map((message) => ({ path: 'components', message }))
      );
    }

    const title = payload.page_title || DEFAULT_GENERATED_PAGE_TITLE;
    const existing = await this.store.getPageConfig(pageId);
    const base = existing ?? (await this.addPage(pageId, title));

    const kept = Object.fromEntries(Object.entries(base.slots).filter(([slotId]) => slotId !== 'main'));
    const nextId = freeComponentIds(usedComponentIds(kept));
    const generated = buildGeneratedPage(payload, pageId, this.store.now(), nextId);

    const { page } = await this.savePage(pageId, {
      title: payload.page_title ?? base.title,
      meta_description: payload.meta_description ?? base.meta_description,
      slots: { ...base.slots, main: generated.slots.main },
    });
    return page;
  }
}
