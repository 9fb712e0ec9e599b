import { describe, it, expect, beforeEach } from 'vitest';
import type { PageConfig } from '@pagewright/schema';
import { InvalidDocumentError, SiteNotInitializedError } from '../errors.js';
import { createTestPagewright, type TestPagewright } from './helpers.js';

function page(slots: PageConfig['slots'], title = 'Landing'): PageConfig {
  return {
    id: 'landing',
    title,
    slug: 'landing',
    slots,
    meta_description: '',
    created_at: '',
    updated_at: '',
  };
}

describe('PageRenderer', () => {
  let app: TestPagewright;

  beforeEach(() => {
    app = createTestPagewright();
  });

  it('should require an initialized site', async () => {
    await expect(app.renderer.renderPage(page({}))).rejects.toThrow(SiteNotInitializedError);
  });

  describe('with a site', () => {
    beforeEach(async () => {
      await app.lifecycle.initSite('business-classic', 'ocean-blue', 'Acme');
    });

    it('should render the index page as a full document', async () => {
      const index = await app.lifecycle.getPage('index');
      const html = await app.renderer.renderPage(index);

      expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true);
      expect(html.endsWith('</body>\n</html>')).toBe(true);
      expect(html).toContain('<title>Home | Acme</title>');
      expect(html).toContain('  --color-primary: #0077b6;');
      expect(html).toContain('<ul class="nav-links"><li><a href="/">Home</a></li></ul>');
      expect(html).toContain('<h2>Welcome to Acme</h2>');
      expect(html).toContain('<p class="footer-text">© 2026 Acme. All rights reserved.</p>');
      expect(html).not.toContain('noindex');
    });

    it('should mark previews as noindex', async () => {
      const index = await app.lifecycle.getPage('index');
      const html = await app.renderer.renderPage(index, { mode: 'preview' });
      expect(html).toContain('<meta name="robots" content="noindex">');
    });

    it('should apply color overrides', async () => {
      await app.lifecycle.updateSiteSettings({ color_overrides: { primary: '#999999' } });
      const html = await app.renderer.renderPage(await app.lifecycle.getPage('index'));

      expect(html).toContain('  --color-primary: #999999;');
      expect(html).toContain('  --color-text: #03045e;');
    });

    it('should render the same bytes for the same input', async () => {
      const index = await app.lifecycle.getPage('index');
      expect(await app.renderer.renderPage(index)).toBe(await app.renderer.renderPage(index));
    });

    it('should isolate a failing component', async () => {
      const html = await app.renderer.renderPage(
        page({
          main: [
            { id: 'a', type: 'text-heading', data: { heading: 'Before' } },
            { id: 'b', type: 'mystery', data: {} },
            { id: 'c', type: 'text-heading', data: { heading: 'After' } },
          ],
        })
      );
      const fragment = '<div class="component-error" data-component-type="mystery">This section could not be displayed.</div>';

      expect(html.split(fragment)).toHaveLength(2);
      expect(html.indexOf('<h2>Before</h2>')).toBeLessThan(html.indexOf(fragment));
      expect(html.indexOf(fragment)).toBeLessThan(html.indexOf('<h2>After</h2>'));
      expect(html.endsWith('</html>')).toBe(true);
    });

    it('should place extra slots after the main content', async () => {
      const html = await app.renderer.renderPage(
        page({
          main: [{ id: 'a', type: 'text-heading', data: { heading: 'Main' } }],
          promo: [{ id: 'b', type: 'text-heading', data: { heading: 'Promo' } }],
        })
      );
      const promo = html.indexOf('<section class="page-slot page-slot-promo" data-slot="promo">');

      expect(promo).toBeGreaterThan(html.indexOf('<h2>Main</h2>'));
      expect(html.indexOf('<h2>Promo</h2>')).toBeGreaterThan(promo);
      expect(html.indexOf('</main>')).toBeGreaterThan(html.indexOf('<h2>Promo</h2>'));
    });

    it('should title a page without a title with the site name', async () => {
      const html = await app.renderer.renderPage(page({}, ''));
      expect(html).toContain('<title>Acme</title>');
    });

    it('should preview unsaved page data with error detail', async () => {
      const html = await app.renderer.renderPagePreview({
        title: 'Draft',
        slots: { main: [{ type: 'mystery' }] },
      });

      expect(html).toContain('<title>Draft | Acme</title>');
      expect(html).toContain('Component mystery error: Unknown component type: mystery');
    });

    it('should reject malformed preview data', async () => {
      await expect(app.renderer.renderPagePreview({ slots: 'nope' })).rejects.toThrow(InvalidDocumentError);
    });

    it('should preview a component with the site colors', async () => {
      const html = await app.renderer.renderComponentPreview('hero-text', { title: 'Hi' });

      expect(html).toContain('  --color-primary: #0077b6;');
      expect(html).toContain('<title>Preview: hero-text</title>');
      expect(html).toContain('<h1 class="hero-title">Hi</h1>');
    });
  });

  it('should preview a component with the fallback palette before init', async () => {
    const html = await app.renderer.renderComponentPreview('hero-text');

    expect(html).toContain('  --color-primary: #0066cc;');
    expect(html).toContain('<h1 class="hero-title">Welcome</h1>');
  });
});
