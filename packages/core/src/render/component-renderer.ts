/**
 * Component renderer
 * Renders one component instance to an HTML fragment. A failing component
 * becomes an inline error fragment so the rest of the page still renders.
 */

import {
  pageComponentSchema,
  toValidationErrors,
  validateComponentData,
  type PageComponent,
} from '@pagewright/schema';
import type { DefinitionCatalog } from '../catalog/catalog.js';
import {
  ComponentDataError,
  InvalidDocumentError,
  UnknownComponentError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';
import type { TemplateRegistry } from '../templates/registry.js';
import type { RenderMode, SiteContext } from '../templates/types.js';
import { FieldReader, escapeHtml } from './html.js';

/** Layout components may nest other components this many levels deep */
export const MAX_NESTING_DEPTH = 4;

export const PUBLISHED_ERROR_TEXT = 'This section could not be displayed.';

/**
 * Inline fragment standing in for a component that failed to render.
 * Published pages get a generic message; previews include the error detail.
 */
export function renderErrorFragment(componentType: string, error: unknown, mode: RenderMode): string {
  const type = escapeHtml(componentType || 'unknown');
  const message =
    mode === 'preview'
      ? `Component ${type} error: ${escapeHtml(errorMessage(error))}`
      : PUBLISHED_ERROR_TEXT;
  return `<div class="component-error" data-component-type="${type}">${message}</div>`;
}

function describeType(item: unknown): string {
  if (typeof item === 'object' && item !== null) {
    const type = Reflect.get(item, 'type');
    if (typeof type === 'string') return type;
  }
  return 'unknown';
}

export class ComponentRenderer {
  private logger: Logger;

  constructor(
    private catalog: DefinitionCatalog,
    private templates: TemplateRegistry,
    logger: Logger = noopLogger
  ) {
    this.logger = logger;
  }

  /**
   * Render a component instance; never throws
   */
  render(instance: PageComponent, site: SiteContext, mode: RenderMode = 'publish'): string {
    return this.renderAt(instance, site, mode, 0);
  }

  /**
   * Render a component instance, throwing on unknown types, invalid data
   * or template errors
   */
  renderOrThrow(
    instance: PageComponent,
    site: SiteContext,
    mode: RenderMode = 'publish',
    depth = 0
  ): string {
    if (depth > MAX_NESTING_DEPTH) {
      throw new Error(`Components nested more than ${MAX_NESTING_DEPTH} levels deep`);
    }

    const definition = this.catalog.getComponent(instance.type);
    if (!definition) {
      throw new UnknownComponentError(instance.type);
    }

    const data = { ...definition.default_data, ...instance.data };
    const validation = validateComponentData(definition, data);
    if (!validation.valid) {
      throw new ComponentDataError(instance.type, validation.errors);
    }

    return this.templates.renderComponent(instance.type, {
      componentId: instance.id,
      fields: new FieldReader(data),
      site,
      mode,
      renderChildren: (value, slotName) =>
        this.renderChildren(value, `${instance.id}-${slotName}`, site, mode, depth + 1),
    });
  }

  private renderAt(instance: PageComponent, site: SiteContext, mode: RenderMode, depth: number): string {
    try {
      return this.renderOrThrow(instance, site, mode, depth);
    } catch (error) {
      this.logger.warn(`Component ${instance.type} (${instance.id}) failed to render`, errorMessage(error));
      return renderErrorFragment(instance.type, error, mode);
    }
  }

  private renderChildren(
    value: unknown,
    idPrefix: string,
    site: SiteContext,
    mode: RenderMode,
    depth: number
  ): string {
    if (!Array.isArray(value)) {
      return '';
    }

    return value
      .map((item: unknown, index) => {
        const parsed = pageComponentSchema.safeParse(item);
        if (!parsed.success) {
          const error = new InvalidDocumentError('component', toValidationErrors(parsed.error));
          return renderErrorFragment(describeType(item), error, mode);
        }
        const child = { ...parsed.data, id: parsed.data.id || `${idPrefix}-${index}` };
        return this.renderAt(child, site, mode, depth);
      })
      .join('\n');
  }
}
