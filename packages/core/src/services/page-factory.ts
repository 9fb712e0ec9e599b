/**
 * Page skeletons and component ids
 */

import {
  slugForPage,
  type PageComponent,
  type PageConfig,
  type TemplateDefinition,
} from '@pagewright/schema';
import type { DefinitionCatalog } from '../catalog/catalog.js';

export const DEFAULT_SLOTS = ['header', 'hero', 'main', 'sidebar', 'footer'];

export interface DefaultPageOptions {
  pageId: string;
  title: string;
  template?: TemplateDefinition;
  /** When set, main starts with a text-heading showing this text */
  starterHeading?: string;
  now: string;
}

/**
 * Sequential comp-N id generator
 */
export function componentIdSequence(): () => string {
  let counter = 0;
  return () => `comp-${counter++}`;
}

function instanceOf(
  catalog: DefinitionCatalog,
  type: string,
  id: string,
  overrides: Record<string, unknown> = {}
): PageComponent {
  const defaults = catalog.getComponent(type)?.default_data ?? {};
  return { id, type, data: { ...structuredClone(defaults), ...overrides } };
}

/**
 * New page with the site navigation in its header and the footer in its footer
 */
export function createDefaultPage(catalog: DefinitionCatalog, options: DefaultPageOptions): PageConfig {
  const slotIds =
    options.template && options.template.slots.length > 0
      ? options.template.slots.map((slot) => slot.id)
      : [...DEFAULT_SLOTS];
  if (!slotIds.includes('main')) {
    slotIds.push('main');
  }

  const slots: Record<string, PageComponent[]> = {};
  for (const slotId of slotIds) {
    slots[slotId] = [];
  }

  const nextId = componentIdSequence();
  if (slots.header) {
    slots.header.push(instanceOf(catalog, 'nav-main', nextId()));
  }
  if (slots.footer) {
    slots.footer.push(instanceOf(catalog, 'footer-simple', nextId()));
  }
  if (options.starterHeading !== undefined) {
    slots.main.push(instanceOf(catalog, 'text-heading', nextId(), { heading: options.starterHeading }));
  }

  return {
    id: options.pageId,
    title: options.title,
    slug: slugForPage(options.pageId),
    slots,
    meta_description: '',
    created_at: options.now,
    updated_at: options.now,
  };
}

/**
 * Generator of the lowest comp-N ids not yet in use; ids it returns count as used
 */
export function freeComponentIds(used: Set<string> = new Set()): () => string {
  let counter = 0;
  return () => {
    while (used.has(`comp-${counter}`)) counter++;
    const id = `comp-${counter}`;
    used.add(id);
    return id;
  };
}

/**
 * Ids of all instances in a set of slots
 */
export function usedComponentIds(slots: Record<string, PageComponent[]>): Set<string> {
  const used = new Set<string>();
  for (const instances of Object.values(slots)) {
    for (const instance of instances) {
      if (instance.id) used.add(instance.id);
    }
  }
  return used;
}

/**
 * Deep copy of slots with fresh comp-N ids in slot order
 */
export function copySlots(slots: Record<string, PageComponent[]>): Record<string, PageComponent[]> {
  const nextId = componentIdSequence();
  const copy: Record<string, PageComponent[]> = {};
  for (const [slotId, instances] of Object.entries(slots)) {
    copy[slotId] = instances.map((instance) => ({
      id: nextId(),
      type: instance.type,
      data: structuredClone(instance.data),
    }));
  }
  return copy;
}

/**
 * Give every instance a page-unique id. The first holder of an id keeps it;
 * missing and duplicate ids get the lowest free comp-N.
 */
export function assignComponentIds(slots: Record<string, PageComponent[]>): Record<string, PageComponent[]> {
  const used = new Set<string>();
  const keeps = new Set<string>();

  for (const [slotId, instances] of Object.entries(slots)) {
    instances.forEach((instance, index) => {
      if (instance.id && !used.has(instance.id)) {
        used.add(instance.id);
        keeps.add(`${slotId}/${index}`);
      }
    });
  }

  const nextFree = freeComponentIds(used);

  const result: Record<string, PageComponent[]> = {};
  for (const [slotId, instances] of Object.entries(slots)) {
    result[slotId] = instances.map((instance, index) =>
      keeps.has(`${slotId}/${index}`) ? instance : { ...instance, id: nextFree() }
    );
  }
  return result;
}
