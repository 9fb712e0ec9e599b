import type { NavigationItem, PageConfig } from '@pagewright/schema';
import type { FieldReader } from '../render/html.js';

export type RenderMode = 'publish' | 'preview';

/** Site-wide values visible to every template */
export interface SiteContext {
  site_name: string;
  logo_url: string;
  favicon_url: string;
  navigation: NavigationItem[];
  footer_text: string;
  social_links: Record<string, string>;
}

export interface ComponentTemplateContext {
  /** Instance id, used as the element id */
  componentId: string;
  fields: FieldReader;
  site: SiteContext;
  mode: RenderMode;
  /** Render a nested list of component instances (layout components) */
  renderChildren(value: unknown, slotName: string): string;
}

export type ComponentTemplate = (context: ComponentTemplateContext) => string;

export interface PageTemplateContext {
  site: SiteContext;
  page: PageConfig;
  /** Rendered HTML per slot, in the page's slot order */
  slots: Record<string, string>;
  colorCss: string;
  mode: RenderMode;
}

export type PageTemplate = (context: PageTemplateContext) => string;
