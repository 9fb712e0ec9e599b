import { TemplateRegistry } from './registry.js';
import { navMain } from './components/navigation.js';
import { heroImage, heroText } from './components/hero.js';
import { contentBlock, ctaBanner, textHeading, textParagraph } from './components/content.js';
import { twoColumn } from './components/layout.js';
import { galleryGrid } from './components/gallery.js';
import { contactForm } from './components/contact.js';
import { footerSimple } from './components/footer.js';
import { sidebarAbout } from './components/sidebar.js';
import { defaultPage } from './pages/default.js';

export const DEFAULT_TEMPLATE_ID = 'default';

/**
 * Registry with the bundled component templates and page shells
 */
export function createDefaultTemplates(): TemplateRegistry {
  return new TemplateRegistry()
    .registerComponent('nav-main', navMain)
    .registerComponent('hero-text', heroText)
    .registerComponent('hero-image', heroImage)
    .registerComponent('text-heading', textHeading)
    .registerComponent('text-paragraph', textParagraph)
    .registerComponent('content-block', contentBlock)
    .registerComponent('two-column', twoColumn)
    .registerComponent('gallery-grid', galleryGrid)
    .registerComponent('contact-form', contactForm)
    .registerComponent('cta-banner', ctaBanner)
    .registerComponent('footer-simple', footerSimple)
    .registerComponent('sidebar-about', sidebarAbout)
    .registerPage(DEFAULT_TEMPLATE_ID, defaultPage);
}

export { TemplateRegistry, componentTemplateRef, pageTemplateRef } from './registry.js';
export { parseSocialLinks } from './components/footer.js';
export { LAYOUT_SLOTS } from './pages/default.js';
export type {
  RenderMode,
  SiteContext,
  ComponentTemplate,
  ComponentTemplateContext,
  PageTemplate,
  PageTemplateContext,
} from './types.js';
