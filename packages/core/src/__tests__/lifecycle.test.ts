import { describe, it, expect, beforeEach } from 'vitest';
import {
  ColorSchemeNotFoundError,
  InvalidDocumentError,
  InvalidPageIdError,
  PageExistsError,
  PageNotFoundError,
  ProtectedPageError,
  SiteNotInitializedError,
  TemplateNotFoundError,
} from '../errors.js';
import { assistantPayloadSchema } from '../services/assistant.service.js';
import type { DeleteOutcome } from '../storage/types.js';
import { MemoryObjectStore } from '../storage/memory.js';
import { createTestLogger, createTestPagewright, steppingClock, type TestPagewright } from './helpers.js';

describe('PageLifecycleManager', () => {
  let app: TestPagewright;

  beforeEach(() => {
    app = createTestPagewright();
  });

  describe('initSite', () => {
    it('should create the site config and index page', async () => {
      const site = await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');

      expect(site.template_id).toBe('default');
      expect(site.color_scheme_id).toBe('ocean-blue');
      expect(site.pages).toEqual(['index']);
      expect(site.navigation).toEqual([{ label: 'Home', url: '/', children: [] }]);
      expect(site.footer_text).toBe('© 2026 Acme. All rights reserved.');

      const index = await app.lifecycle.getPage('index');
      expect(index.title).toBe('Home');
      expect(index.slug).toBe('');
      expect(Object.keys(index.slots)).toEqual(['header', 'hero', 'main', 'sidebar', 'footer']);
      expect(index.slots.header).toEqual([
        { id: 'comp-0', type: 'nav-main', data: { logo_text: '', show_logo: true, sticky: false } },
      ]);
      expect(index.slots.footer.map((c) => [c.id, c.type])).toEqual([['comp-1', 'footer-simple']]);
      expect(index.slots.main).toEqual([
        {
          id: 'comp-2',
          type: 'text-heading',
          data: { heading: 'Welcome to Acme', subtitle: '', alignment: 'center', anchor_id: '' },
        },
      ]);
    });

    it('should use the template slots', async () => {
      await app.lifecycle.initSite('portfolio', 'elegant-dark', 'Studio');
      const index = await app.lifecycle.getPage('index');
      expect(Object.keys(index.slots)).toEqual(['header', 'hero', 'main', 'footer']);
    });

    it('should reject an unknown template and store nothing', async () => {
      await expect(app.lifecycle.initSite('nope', 'ocean-blue', 'Acme')).rejects.toThrow(TemplateNotFoundError);
      expect(app.objects.has('_builder/site.json')).toBe(false);
    });

    it('should reject an unknown color scheme and store nothing', async () => {
      await expect(app.lifecycle.initSite('default', 'neon', 'Acme')).rejects.toThrow(ColorSchemeNotFoundError);
      expect(app.objects.has('_builder/site.json')).toBe(false);
      expect(app.objects.has('_builder/pages/index.json')).toBe(false);
    });
  });

  describe('pages', () => {
    beforeEach(async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
    });

    it('should add a page to the site and navigation', async () => {
      const page = await app.lifecycle.addPage('about', 'About Us');
      const site = await app.lifecycle.getSite();

      expect(page.slug).toBe('about');
      expect(page.slots.main).toEqual([]);
      expect(site?.pages).toEqual(['index', 'about']);
      expect(site?.navigation[1]).toEqual({ label: 'About Us', url: '/about.html', children: [] });
    });

    it('should start the page with a heading on request', async () => {
      const page = await app.lifecycle.addPage('team', 'Our Team', { starter: true });
      expect(page.slots.main.map((c) => c.data.heading)).toEqual(['Our Team']);
    });

    it('should not list a page twice', async () => {
      await app.lifecycle.addPage('about', 'About');
      await app.lifecycle.addPage('about', 'About again');

      const site = await app.lifecycle.getSite();
      expect(site?.pages).toEqual(['index', 'about']);
      expect(site?.navigation).toHaveLength(2);
      expect((await app.lifecycle.getPage('about')).title).toBe('About again');
    });

    it('should reject ids that are not filename-safe', async () => {
      await expect(app.lifecycle.addPage('About Us', 'About')).rejects.toThrow(InvalidPageIdError);
      await expect(app.lifecycle.addPage('../etc', 'Nope')).rejects.toThrow(InvalidPageIdError);
    });

    it('should copy a page with fresh, unique component ids', async () => {
      const copy = await app.lifecycle.copyPage('index', 'landing', 'Landing');
      const source = await app.lifecycle.getPage('index');

      expect(copy.title).toBe('Landing');
      expect(Object.keys(copy.slots)).toEqual(Object.keys(source.slots));
      expect(copy.slots.header.map((c) => c.id)).toEqual(['comp-0']);
      expect(copy.slots.main.map((c) => c.id)).toEqual(['comp-1']);
      expect(copy.slots.footer.map((c) => c.id)).toEqual(['comp-2']);
      expect(copy.slots.main[0].data).toEqual(source.slots.main[0].data);
      expect((await app.lifecycle.getSite())?.pages).toEqual(['index', 'landing']);
    });

    it('should refuse to copy onto an existing page or from a missing one', async () => {
      await expect(app.lifecycle.copyPage('missing', 'landing', 'Landing')).rejects.toThrow(PageNotFoundError);
      await expect(app.lifecycle.copyPage('index', 'index', 'Home')).rejects.toThrow(PageExistsError);
      await expect(app.lifecycle.copyPage('index', 'Bad Id', 'Bad')).rejects.toThrow(InvalidPageIdError);
    });

    it('should save page changes and renumber duplicate ids', async () => {
      await app.lifecycle.addPage('about', 'About');
      const { page, published } = await app.lifecycle.savePage('about', {
        title: 'About Acme',
        slots: {
          main: [
            { id: 'hero', type: 'hero-text', data: {} },
            { id: 'hero', type: 'text-heading', data: {} },
            { type: 'text-paragraph' },
          ],
        },
      });

      expect(page.title).toBe('About Acme');
      expect(page.slots.main.map((c) => c.id)).toEqual(['hero', 'comp-0', 'comp-1']);
      expect(published).toBeNull();
    });

    it('should publish on save when asked', async () => {
      await app.lifecycle.addPage('about', 'About');
      const { published } = await app.lifecycle.savePage('about', {}, { publish: true });

      expect(published?.key).toBe('about.html');
      expect(app.objects.has('about.html')).toBe(true);
    });

    it('should reject an invalid page patch', async () => {
      await expect(app.lifecycle.savePage('index', { slots: 'nope' })).rejects.toThrow(InvalidDocumentError);
    });

    it('should update site settings', async () => {
      const site = await app.lifecycle.updateSiteSettings({ site_name: 'Acme Corp', color_scheme_id: 'forest-green' });

      expect(site.site_name).toBe('Acme Corp');
      expect(site.color_scheme_id).toBe('forest-green');
      expect(site.pages).toEqual(['index']);
    });

    it('should reject unknown color schemes and malformed settings', async () => {
      await expect(app.lifecycle.updateSiteSettings({ color_scheme_id: 'neon' })).rejects.toThrow(
        ColorSchemeNotFoundError
      );
      await expect(app.lifecycle.updateSiteSettings({ site_name: 5 })).rejects.toThrow(InvalidDocumentError);
    });
  });

  describe('deletePage', () => {
    it('should never delete the index page', async () => {
      await expect(app.lifecycle.deletePage('index')).rejects.toThrow(ProtectedPageError);
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await expect(app.lifecycle.deletePage('index')).rejects.toThrow('Cannot delete the index page');
      expect((await app.lifecycle.getSite())?.pages).toEqual(['index']);
    });

    it('should remove the page, its document and its published HTML', async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About');
      await app.lifecycle.publishPage('about');

      const result = await app.lifecycle.deletePage('about');

      expect(result.document).toEqual({ key: '_builder/pages/about.json', status: 'deleted' });
      expect(result.artifact).toEqual({ key: 'about.html', status: 'deleted' });
      expect(result.site.pages).toEqual(['index']);
      expect(result.site.navigation).toEqual([{ label: 'Home', url: '/', children: [] }]);
      expect(app.objects.has('about.html')).toBe(false);
    });

    it('should report an unpublished page as absent', async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About');

      const result = await app.lifecycle.deletePage('about');
      expect(result.artifact).toEqual({ key: 'about.html', status: 'absent' });
    });

    it('should remove nested navigation entries', async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About');
      await app.lifecycle.updateSiteSettings({
        navigation: [
          { label: 'Home', url: '/' },
          { label: 'Company', url: '/company.html', children: [{ label: 'About', url: '/about.html' }] },
        ],
      });

      const { site } = await app.lifecycle.deletePage('about');
      expect(site.navigation).toEqual([
        { label: 'Home', url: '/', children: [] },
        { label: 'Company', url: '/company.html', children: [] },
      ]);
    });

    it('should report a failed artifact removal and still update the site', async () => {
      class LockedHtmlStore extends MemoryObjectStore {
        override async delete(key: string): Promise<DeleteOutcome> {
          if (key.endsWith('.html')) {
            throw new Error('permission denied');
          }
          return super.delete(key);
        }
      }
      const logger = createTestLogger();
      app = createTestPagewright({ objects: new LockedHtmlStore(), logger });
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About');

      const result = await app.lifecycle.deletePage('about');

      expect(result.document.status).toBe('deleted');
      expect(result.artifact).toEqual({ key: 'about.html', status: 'failed', reason: 'permission denied' });
      expect((await app.lifecycle.getSite())?.pages).toEqual(['index']);
      expect(logger.warn).toHaveBeenCalledWith('Could not delete about.html', 'permission denied');
    });
  });

  describe('publishing', () => {
    beforeEach(async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About Us');
    });

    it('should publish every page in site order', async () => {
      const result = await app.lifecycle.publishAll();

      expect(result).toEqual({ published: ['index', 'about'], failures: [] });
      expect(app.objects.contentTypeOf('index.html')).toBe('text/html');
      const about = await app.objects.getText('about.html');
      expect(about).toContain('<title>About Us | Acme</title>');
      expect(about).toContain('<li><a href="/">Home</a></li><li><a href="/about.html">About Us</a></li>');
    });

    it('should write identical bytes when republishing', async () => {
      const first = await app.lifecycle.publishPage('index');
      const before = await app.objects.getText('index.html');
      const second = await app.lifecycle.publishPage('index');

      expect(await app.objects.getText('index.html')).toBe(before);
      expect(second).toEqual(first);
      expect(first.key).toBe('index.html');
    });

    it('should report pages that fail and publish the rest', async () => {
      await app.objects.delete('_builder/pages/about.json');

      expect(await app.lifecycle.publishAll()).toEqual({
        published: ['index'],
        failures: [{ pageId: 'about', reason: 'Page not found: about' }],
      });
    });

    it('should render checkboxes saved as "true" strings', async () => {
      await app.lifecycle.savePage('index', {
        slots: { header: [{ id: 'comp-0', type: 'nav-main', data: { show_logo: 'true' } }] },
      });
      await app.lifecycle.publishPage('index');

      const html = await app.objects.getText('index.html');
      expect(html).toContain('<nav class="site-nav" id="comp-0">');
      expect(html).not.toContain('class="component-error"');
    });

    it('should preview a saved page without publishing', async () => {
      const html = await app.lifecycle.previewPage('about');

      expect(html).toContain('<meta name="robots" content="noindex">');
      expect(app.objects.has('about.html')).toBe(false);
    });
  });

  describe('listing and repair', () => {
    beforeEach(async () => {
      app = createTestPagewright({ clock: steppingClock() });
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
      await app.lifecycle.addPage('about', 'About');
    });

    it('should list pages in site order', async () => {
      const listing = await app.lifecycle.listPages();

      expect(listing.pages.map((p) => [p.id, p.title, p.slug])).toEqual([
        ['index', 'Home', ''],
        ['about', 'About', 'about'],
      ]);
      expect(listing.orphans).toEqual([]);
      expect(listing.unlisted).toEqual([]);
    });

    it('should report stored pages the site does not list', async () => {
      await app.objects.put('_builder/pages/draft.json', JSON.stringify({ id: 'draft' }), 'application/json');

      const listing = await app.lifecycle.listPages();

      expect(listing.unlisted).toEqual(['draft']);
      expect(listing.pages.map((p) => p.id)).toEqual(['index', 'about']);
    });

    it('should report orphans without changing the site', async () => {
      await app.objects.delete('_builder/pages/about.json');
      const before = await app.lifecycle.getSite();

      const listing = await app.lifecycle.listPages();

      expect(listing.orphans).toEqual(['about']);
      expect(listing.pages.map((p) => p.id)).toEqual(['index']);
      expect(await app.lifecycle.getSite()).toEqual(before);
    });

    it('should drop orphans when reconciling', async () => {
      await app.objects.delete('_builder/pages/about.json');

      const first = await app.lifecycle.reconcileSite();
      expect(first.changed).toBe(true);
      expect(first.removed).toEqual(['about']);
      expect(first.site.pages).toEqual(['index']);
      expect(first.site.navigation).toEqual([{ label: 'Home', url: '/', children: [] }]);

      const second = await app.lifecycle.reconcileSite();
      expect(second).toEqual({ changed: false, removed: [], site: first.site });
    });

    it('should repair the site when loading the dashboard', async () => {
      await app.objects.delete('_builder/pages/about.json');

      const dashboard = await app.lifecycle.loadDashboard();

      expect(dashboard.initialized).toBe(true);
      if (dashboard.initialized) {
        expect(dashboard.repaired).toEqual(['about']);
        expect(dashboard.pages.map((p) => p.id)).toEqual(['index']);
      }
      expect((await app.lifecycle.getSite())?.pages).toEqual(['index']);
    });
  });

  it('should report an uninitialized dashboard', async () => {
    expect(await app.lifecycle.loadDashboard()).toEqual({ initialized: false });
  });

  it('should require a site for page operations', async () => {
    await expect(app.lifecycle.addPage('about', 'About')).rejects.toThrow(SiteNotInitializedError);
    await expect(app.lifecycle.publishAll()).rejects.toThrow(SiteNotInitializedError);
    await expect(app.lifecycle.deletePage('about')).rejects.toThrow(SiteNotInitializedError);
  });

  describe('applyGeneratedPage', () => {
    beforeEach(async () => {
      await app.lifecycle.initSite('default', 'ocean-blue', 'Acme');
    });

    it('should create a page from generated components', async () => {
      const payload = assistantPayloadSchema.parse({
        page_title: 'Our Services',
        components: [{ type: 'hero-text', data: { title: 'Services' } }],
      });

      const page = await app.lifecycle.applyGeneratedPage('services', payload);

      expect(page.title).toBe('Our Services');
      expect(page.slots.header.map((c) => c.id)).toEqual(['comp-0']);
      expect(page.slots.main).toEqual([
        { id: 'comp-2', type: 'hero-text', data: { title: 'Services', anchor_id: 'comp-2' } },
      ]);
      expect((await app.lifecycle.getSite())?.navigation[1]).toEqual({
        label: 'Our Services',
        url: '/services.html',
        children: [],
      });
    });

    it('should replace only the main slot of an existing page', async () => {
      const payload = assistantPayloadSchema.parse({
        components: [{ type: 'text-heading', data: { heading: 'New', anchor_id: 'intro' } }],
      });

      const page = await app.lifecycle.applyGeneratedPage('index', payload);

      expect(page.title).toBe('Home');
      expect(page.slots.header[0].type).toBe('nav-main');
      expect(page.slots.main).toEqual([
        { id: 'comp-2', type: 'text-heading', data: { heading: 'New', anchor_id: 'intro' } },
      ]);
    });

    it('should reject site-wide components', async () => {
      const payload = assistantPayloadSchema.parse({ components: [{ type: 'nav-main', data: {} }] });

      await expect(app.lifecycle.applyGeneratedPage('services', payload)).rejects.toThrow(
        "Invalid generated components: components: Component 0: 'nav-main' is a site-wide component"
      );
    });
  });
});
