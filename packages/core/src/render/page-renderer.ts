/**
 * Page renderer
 * Renders a page config into a complete HTML document: every slot's
 * components, the site's color variables and the template's page shell.
 */

import { parsePageDraft, type PageConfig, type SiteConfig } from '@pagewright/schema';
import type { DefinitionCatalog } from '../catalog/catalog.js';
import type { ConfigStore } from '../config-store.js';
import { InvalidDocumentError, SiteNotInitializedError } from '../errors.js';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';
import { DEFAULT_TEMPLATE_ID } from '../templates/index.js';
import { BASE_STYLES } from '../templates/pages/styles.js';
import type { TemplateRegistry } from '../templates/registry.js';
import type { RenderMode, SiteContext } from '../templates/types.js';
import { FALLBACK_COLORS, generateColorCss, mergeColors, resolveColors } from './colors.js';
import type { ComponentRenderer } from './component-renderer.js';
import { escapeHtml, lines } from './html.js';

/** Site context used when previewing before the site exists */
export const PREVIEW_SITE: SiteContext = {
  site_name: 'Preview',
  logo_url: '',
  favicon_url: '',
  navigation: [],
  footer_text: '',
  social_links: {},
};

export interface RenderPageOptions {
  mode?: RenderMode;
}

export interface PageRendererOptions {
  store: ConfigStore;
  catalog: DefinitionCatalog;
  templates: TemplateRegistry;
  components: ComponentRenderer;
  logger?: Logger;
}

export class PageRenderer {
  private store: ConfigStore;
  private catalog: DefinitionCatalog;
  private templates: TemplateRegistry;
  private components: ComponentRenderer;
  private logger: Logger;

  constructor(options: PageRendererOptions) {
    this.store = options.store;
    this.catalog = options.catalog;
    this.templates = options.templates;
    this.components = options.components;
    this.logger = options.logger ?? noopLogger;
  }

  private async requireSite(): Promise<SiteConfig> {
    const site = await this.store.getSiteConfig();
    if (!site) {
      throw new SiteNotInitializedError();
    }
    return site;
  }

  /**
   * Render a page against the stored site config
   */
  async renderPage(page: PageConfig, options: RenderPageOptions = {}): Promise<string> {
    const site = await this.requireSite();
    return this.renderWithSite(page, site, options.mode ?? 'publish');
  }

  /**
   * Render unsaved page content with preview error detail
   */
  async renderPagePreview(pageData: unknown): Promise<string> {
    const site = await this.requireSite();
    const parsed = parsePageDraft(pageData);
    if (!parsed.success) {
      throw new InvalidDocumentError('page', parsed.errors);
    }
    return this.renderWithSite(parsed.data, site, 'preview');
  }

  /**
   * Render a page against a given site config; no I/O
   */
  renderWithSite(page: PageConfig, site: SiteConfig, mode: RenderMode): string {
    const colors = resolveColors(site, this.catalog);

    const slots: Record<string, string> = {};
    for (const [slotId, instances] of Object.entries(page.slots)) {
      slots[slotId] = instances.map((instance) => this.components.render(instance, site, mode)).join('\n');
    }

    let templateId = site.template_id;
    if (!this.templates.hasPage(templateId)) {
      this.logger.debug(`No page shell for template ${templateId}, using ${DEFAULT_TEMPLATE_ID}`);
      templateId = DEFAULT_TEMPLATE_ID;
    }

    return this.templates.renderPage(templateId, {
      site,
      page,
      slots,
      colorCss: generateColorCss(colors),
      mode,
    });
  }

  /**
   * Standalone document showing one component with the site's colors,
   * or the fallback palette when there is no site or its scheme is unknown
   */
  async renderComponentPreview(componentType: string, data: Record<string, unknown> = {}): Promise<string> {
    const site = await this.store.getSiteConfig();
    const scheme = site ? this.catalog.getColorScheme(site.color_scheme_id) : undefined;
    const colors = site && scheme ? mergeColors(scheme.colors, site.color_overrides) : { ...FALLBACK_COLORS };

    const fragment = this.components.render(
      { id: 'preview', type: componentType, data },
      site ?? PREVIEW_SITE,
      'preview'
    );

    return lines(
      `<!DOCTYPE html>`,
      `<html lang="en">`,
      `<head>`,
      `  <meta charset="UTF-8">`,
      `  <meta name="viewport" content="width=device-width, initial-scale=1.0">`,
      `  <meta name="robots" content="noindex">`,
      `  <title>Preview: ${escapeHtml(componentType)}</title>`,
      `  <style>`,
      generateColorCss(colors) + BASE_STYLES,
      `  </style>`,
      `</head>`,
      `<body class="component-preview">`,
      fragment,
      `</body>`,
      `</html>`
    );
  }
}
