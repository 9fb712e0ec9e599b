import { describe, it, expect } from 'vitest';
import { DefinitionCatalog } from '../catalog/catalog.js';
import { FileDefinitionSource, StaticDefinitionSource } from '../catalog/sources.js';
import { createTestLogger } from './helpers.js';

describe('DefinitionCatalog', () => {
  describe('bundled definitions', () => {
    const catalog = DefinitionCatalog.fromDirectory();

    it('should load every bundled component', () => {
      expect(catalog.getComponents().map((c) => c.id)).toEqual([
        'nav-main',
        'hero-text',
        'hero-image',
        'text-heading',
        'text-paragraph',
        'content-block',
        'two-column',
        'gallery-grid',
        'contact-form',
        'cta-banner',
        'footer-simple',
        'sidebar-about',
      ]);
    });

    it('should filter components by category', () => {
      expect(catalog.getComponents('hero').map((c) => c.id)).toEqual(['hero-text', 'hero-image']);
      expect(catalog.getComponents('footer').map((c) => c.id)).toEqual(['footer-simple']);
    });

    it('should return an empty list for an unknown category', () => {
      expect(catalog.getComponents('unknown')).toEqual([]);
    });

    it('should look up color schemes by id', () => {
      expect(catalog.getColorSchemes()).toHaveLength(6);
      expect(catalog.getColorScheme('ocean-blue')?.colors.primary).toBe('#0077b6');
      expect(catalog.getColorScheme('missing')).toBeUndefined();
    });

    it('should look up templates with their slots', () => {
      expect(catalog.getTemplates().map((t) => t.id)).toEqual(['default', 'business-classic', 'portfolio']);
      expect(catalog.getTemplate('default')?.slots.map((s) => s.id)).toEqual([
        'header',
        'hero',
        'main',
        'sidebar',
        'footer',
      ]);
      expect(catalog.getTemplate('business-classic')?.default_color_scheme).toBe('ocean-blue');
    });

    it('should freeze returned definitions', () => {
      const heading = catalog.getComponent('text-heading');
      expect(heading).toBeDefined();
      expect(Object.isFrozen(heading)).toBe(true);
      expect(Object.isFrozen(heading?.default_data)).toBe(true);
    });
  });

  it('should be empty, not fail, when the directory does not exist', () => {
    const logger = createTestLogger();
    const catalog = new DefinitionCatalog(
      new FileDefinitionSource('/nonexistent/pagewright-definitions', logger),
      logger
    );

    expect(catalog.getComponents()).toEqual([]);
    expect(catalog.getColorSchemes()).toEqual([]);
    expect(catalog.getTemplates()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it('should skip invalid entries and keep the rest', () => {
    const logger = createTestLogger();
    const catalog = new DefinitionCatalog(
      new StaticDefinitionSource({
        components: [
          { id: 'ok', name: 'OK', category: 'content' },
          { id: 'bad', name: 'Bad', category: 'weird' },
        ],
      }),
      logger
    );

    expect(catalog.getComponents().map((c) => c.id)).toEqual(['ok']);
    expect(logger.warn).toHaveBeenCalledWith('Skipping invalid component definition #1', expect.any(Array));
  });

  it('should keep the first of duplicate ids', () => {
    const logger = createTestLogger();
    const catalog = new DefinitionCatalog(
      new StaticDefinitionSource({
        colorSchemes: [
          { id: 'mono', name: 'First', colors: { primary: '#000000' } },
          { id: 'mono', name: 'Second', colors: { primary: '#ffffff' } },
        ],
      }),
      logger
    );

    expect(catalog.getColorSchemes()).toHaveLength(1);
    expect(catalog.getColorScheme('mono')?.name).toBe('First');
    expect(logger.warn).toHaveBeenCalledWith('Skipping duplicate color scheme definition: mono');
  });

  it('should warn about components whose defaults fail their own fields', () => {
    const logger = createTestLogger();
    new DefinitionCatalog(
      new StaticDefinitionSource({
        components: [
          {
            id: 'signup',
            name: 'Signup',
            category: 'contact',
            editable_fields: [{ name: 'email', type: 'email', label: 'Recipient Email', required: true }],
            default_data: { email: '' },
          },
          { id: 'note', name: 'Note', category: 'content', editable_fields: [{ name: 'text' }] },
        ],
      }),
      logger
    );

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Component signup needs input before it renders: Recipient Email is required');
  });

  it('should flag the bundled contact form as needing a recipient', () => {
    const logger = createTestLogger();
    DefinitionCatalog.fromDirectory(undefined, logger);

    expect(logger.warn).toHaveBeenCalledWith(
      'Component contact-form needs input before it renders: Recipient Email is required'
    );
  });

  it('should apply template defaults', () => {
    const catalog = new DefinitionCatalog(
      new StaticDefinitionSource({ templates: [{ id: 'bare', name: 'Bare' }] })
    );
    const template = catalog.getTemplate('bare');

    expect(template?.slots).toEqual([]);
    expect(template?.default_color_scheme).toBe('ocean-blue');
    expect(template?.features).toEqual([]);
  });
});
