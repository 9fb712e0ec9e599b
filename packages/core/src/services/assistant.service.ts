/**
 * Assistant output handling
 *
 * A content assistant (outside this package) replies with prose plus a JSON
 * payload describing page components. These helpers pull the payload out of
 * the reply, check it against the catalog and turn it into a page config.
 */

import { z } from 'zod';
import {
  parseJson,
  slugForPage,
  validateComponentData,
  type PageComponent,
  type PageConfig,
} from '@pagewright/schema';
import type { DefinitionCatalog } from '../catalog/catalog.js';
import { componentIdSequence } from './page-factory.js';

/** Component types placed on every page by the site itself */
export const SITE_WIDE_COMPONENTS = ['nav-main', 'footer-simple', 'sidebar-about'];

export const DEFAULT_GENERATED_PAGE_ID = 'ai-generated';
export const DEFAULT_GENERATED_PAGE_TITLE = 'AI Generated Page';

export const assistantPayloadSchema = z
  .object({
    action: z.string().optional(),
    message: z.string().optional(),
    page_title: z.string().optional(),
    meta_description: z.string().optional(),
    components: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type AssistantPayload = z.infer<typeof assistantPayloadSchema>;

export interface GeneratedComponentsCheck {
  valid: boolean;
  errors: string[];
}

const FENCED_JSON = /```json\s*([\s\S]*?)```/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Top-level brace-delimited spans of a text, skipping braces inside strings
 */
function braceObjects(text: string): string[] {
  const spans: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) spans.push(text.slice(start, i + 1));
    }
  }
  return spans;
}

function toPayload(candidate: string): AssistantPayload | null {
  const json = parseJson(candidate.trim());
  if (!json.success || !isRecord(json.data)) return null;
  const result = assistantPayloadSchema.safeParse(json.data);
  return result.success ? result.data : null;
}

/**
 * Extract the JSON payload from an assistant reply: the last fenced json
 * block that parses, else the last bare object mentioning "action" or
 * "components". Null when there is none.
 */
export function parseAssistantReply(text: string): AssistantPayload | null {
  const blocks = [...text.matchAll(FENCED_JSON)].map((match) => match[1]);
  for (const block of blocks.reverse()) {
    const payload = toPayload(block);
    if (payload) return payload;
  }

  const objects = braceObjects(text).filter(
    (span) => span.includes('"action"') || span.includes('"components"')
  );
  for (const span of objects.reverse()) {
    const payload = toPayload(span);
    if (payload) return payload;
  }

  return null;
}

/**
 * Check generated components: no site-wide types, only catalog types,
 * required fields present
 */
export function validateGeneratedComponents(
  catalog: DefinitionCatalog,
  components: unknown[]
): GeneratedComponentsCheck {
  const errors: string[] = [];

  components.forEach((component, index) => {
    const type = isRecord(component) && typeof component.type === 'string' ? component.type : '';
    if (SITE_WIDE_COMPONENTS.includes(type)) {
      errors.push(`Component ${index}: '${type}' is a site-wide component`);
      return;
    }

    const definition = catalog.getComponent(type);
    if (!definition) {
      errors.push(`Component ${index}: Unknown type '${type}'`);
      return;
    }

    const data = isRecord(component) && isRecord(component.data) ? component.data : {};
    for (const problem of validateComponentData(definition, data).errors) {
      errors.push(`Component ${index} (${type}): ${problem.message}`);
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Page config with the generated components in its main slot. Components
 * get sequential comp-N ids (from nextId when given); anchor_id defaults to
 * the component id.
 */
export function buildGeneratedPage(
  payload: AssistantPayload,
  pageId: string = DEFAULT_GENERATED_PAGE_ID,
  now: string = new Date().toISOString(),
  nextId: () => string = componentIdSequence()
): PageConfig {
  const main: PageComponent[] = payload.components.filter(isRecord).map((component) => {
    const id = nextId();
    const data = isRecord(component.data) ? { ...component.data } : {};
    if (!data.anchor_id) {
      data.anchor_id = id;
    }
    return { id, type: typeof component.type === 'string' ? component.type : 'unknown', data };
  });

  return {
    id: pageId,
    title: payload.page_title || DEFAULT_GENERATED_PAGE_TITLE,
    slug: slugForPage(pageId),
    meta_description: payload.meta_description ?? '',
    slots: { main },
    created_at: now,
    updated_at: now,
  };
}
