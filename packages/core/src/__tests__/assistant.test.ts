import { describe, it, expect } from 'vitest';
import { DefinitionCatalog } from '../catalog/catalog.js';
import {
  assistantPayloadSchema,
  buildGeneratedPage,
  parseAssistantReply,
  validateGeneratedComponents,
} from '../services/assistant.service.js';

const catalog = DefinitionCatalog.fromDirectory();

describe('parseAssistantReply', () => {
  it('should take the last fenced json block', () => {
    const reply = [
      'Here is a draft:',
      '```json',
      '{"action": "draft", "components": []}',
      '```',
      'And the final version:',
      '```json',
      '{"action": "create_page", "components": [{"type": "text-heading", "data": {"heading": "Hi"}}]}',
      '```',
    ].join('\n');

    const payload = parseAssistantReply(reply);

    expect(payload?.action).toBe('create_page');
    expect(payload?.components).toEqual([{ type: 'text-heading', data: { heading: 'Hi' } }]);
  });

  it('should fall back to a bare object mentioning components', () => {
    const payload = parseAssistantReply(
      'Sure! {"message": "Built it {for you}", "components": [{"type": "cta-banner"}]} Enjoy.'
    );

    expect(payload?.message).toBe('Built it {for you}');
    expect(payload?.components).toEqual([{ type: 'cta-banner' }]);
  });

  it('should skip a broken fenced block and use an earlier valid one', () => {
    const reply = '```json\n{"action": "ok"}\n```\n```json\n{broken\n```';
    expect(parseAssistantReply(reply)?.action).toBe('ok');
  });

  it('should return null when there is no payload', () => {
    expect(parseAssistantReply('No JSON here, just {braces}.')).toBeNull();
  });
});

describe('validateGeneratedComponents', () => {
  it('should accept catalog components with their required fields', () => {
    expect(
      validateGeneratedComponents(catalog, [
        { type: 'hero-text', data: { title: 'Welcome' } },
        { type: 'text-paragraph', data: { content: 'Hello' } },
      ])
    ).toEqual({ valid: true, errors: [] });
  });

  it('should report site-wide, unknown and incomplete components by index', () => {
    const result = validateGeneratedComponents(catalog, [
      { type: 'footer-simple', data: {} },
      { type: 'carousel' },
      { type: 'contact-form', data: { email: 'not-an-email' } },
      { type: 'cta-banner' },
    ]);

    expect(result).toEqual({
      valid: false,
      errors: [
        "Component 0: 'footer-simple' is a site-wide component",
        "Component 1: Unknown type 'carousel'",
        'Component 2 (contact-form): Recipient Email must be an email address',
        'Component 3 (cta-banner): Heading is required',
      ],
    });
  });
});

describe('buildGeneratedPage', () => {
  it('should number components and default their anchors', () => {
    const payload = assistantPayloadSchema.parse({
      components: [
        { type: 'text-heading', data: { heading: 'One' } },
        { type: 'text-heading', data: { heading: 'Two', anchor_id: 'two' } },
      ],
    });

    const page = buildGeneratedPage(payload, undefined, '2026-03-01T12:00:00.000Z');

    expect(page).toEqual({
      id: 'ai-generated',
      title: 'AI Generated Page',
      slug: 'ai-generated',
      meta_description: '',
      slots: {
        main: [
          { id: 'comp-0', type: 'text-heading', data: { heading: 'One', anchor_id: 'comp-0' } },
          { id: 'comp-1', type: 'text-heading', data: { heading: 'Two', anchor_id: 'two' } },
        ],
      },
      created_at: '2026-03-01T12:00:00.000Z',
      updated_at: '2026-03-01T12:00:00.000Z',
    });
  });

  it('should use the payload title and description', () => {
    const payload = assistantPayloadSchema.parse({ page_title: 'Pricing', meta_description: 'Plans', components: [] });
    const page = buildGeneratedPage(payload, 'pricing');

    expect(page.title).toBe('Pricing');
    expect(page.meta_description).toBe('Plans');
    expect(page.slots.main).toEqual([]);
  });
});
