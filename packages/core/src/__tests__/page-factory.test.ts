import { describe, it, expect } from 'vitest';
import { DefinitionCatalog } from '../catalog/catalog.js';
import { assignComponentIds, copySlots, createDefaultPage, freeComponentIds } from '../services/page-factory.js';

const catalog = DefinitionCatalog.fromDirectory();

describe('createDefaultPage', () => {
  it('should use the default slots without a template', () => {
    const page = createDefaultPage(catalog, { pageId: 'about', title: 'About', now: '2026-03-01T12:00:00.000Z' });

    expect(Object.keys(page.slots)).toEqual(['header', 'hero', 'main', 'sidebar', 'footer']);
    expect(page.slots.header.map((c) => c.type)).toEqual(['nav-main']);
    expect(page.slots.footer.map((c) => c.type)).toEqual(['footer-simple']);
    expect(page.slots.main).toEqual([]);
  });

  it('should always include a main slot', () => {
    const template = catalog.getTemplate('default');
    expect(template).toBeDefined();
    if (!template) return;

    const page = createDefaultPage(catalog, {
      pageId: 'bare',
      title: 'Bare',
      template: { ...template, slots: [{ id: 'header', name: 'Header', allowed_categories: ['*'], max_items: 1, min_items: 0 }] },
      now: '',
    });

    expect(Object.keys(page.slots)).toEqual(['header', 'main']);
  });

  it('should not share default data with the catalog', () => {
    const page = createDefaultPage(catalog, { pageId: 'about', title: 'About', now: '' });
    page.slots.header[0].data.logo_text = 'Changed';

    expect(catalog.getComponent('nav-main')?.default_data.logo_text).toBe('');
  });
});

describe('copySlots', () => {
  it('should renumber ids and deep copy data', () => {
    const source = {
      main: [{ id: 'x', type: 'two-column', data: { left_slot: [{ type: 'text-heading' }] } }],
      footer: [{ id: 'y', type: 'footer-simple', data: {} }],
    };

    const copy = copySlots(source);

    expect(copy.main[0].id).toBe('comp-0');
    expect(copy.footer[0].id).toBe('comp-1');
    expect(copy.main[0].data).toEqual(source.main[0].data);
    expect(copy.main[0].data.left_slot).not.toBe(source.main[0].data.left_slot);
  });
});

describe('assignComponentIds', () => {
  it('should keep unique ids and fill the gaps', () => {
    const slots = assignComponentIds({
      header: [{ id: 'comp-1', type: 'nav-main', data: {} }],
      main: [
        { id: '', type: 'text-heading', data: {} },
        { id: 'comp-1', type: 'text-heading', data: {} },
        { id: 'intro', type: 'text-heading', data: {} },
      ],
    });

    expect(slots.header.map((c) => c.id)).toEqual(['comp-1']);
    expect(slots.main.map((c) => c.id)).toEqual(['comp-0', 'comp-2', 'intro']);
  });
});

describe('freeComponentIds', () => {
  it('should skip ids already in use', () => {
    const next = freeComponentIds(new Set(['comp-0', 'comp-2']));
    expect([next(), next(), next()]).toEqual(['comp-1', 'comp-3', 'comp-4']);
  });
});
