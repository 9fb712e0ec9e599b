import { TemplateNotFoundError } from '../errors.js';
import type {
  ComponentTemplate,
  ComponentTemplateContext,
  PageTemplate,
  PageTemplateContext,
} from './types.js';

/** "components/{type}" */
export function componentTemplateRef(componentType: string): string {
  return `components/${componentType}`;
}

/** "templates/{id}/page" */
export function pageTemplateRef(templateId: string): string {
  return `templates/${templateId}/page`;
}

/**
 * Render templates addressed by reference
 */
export class TemplateRegistry {
  private templates: Map<string, ComponentTemplate> = new Map();
  private pages: Map<string, PageTemplate> = new Map();

  /**
   * Register the template for a component type
   */
  registerComponent(componentType: string, template: ComponentTemplate): this {
    this.templates.set(componentTemplateRef(componentType), template);
    return this;
  }

  /**
   * Register the page shell for a site template
   */
  registerPage(templateId: string, template: PageTemplate): this {
    this.pages.set(pageTemplateRef(templateId), template);
    return this;
  }

  hasPage(templateId: string): boolean {
    return this.pages.has(pageTemplateRef(templateId));
  }

  /**
   * Render a component template
   * @throws TemplateNotFoundError when no template is registered for the type
   */
  renderComponent(componentType: string, context: ComponentTemplateContext): string {
    const ref = componentTemplateRef(componentType);
    const template = this.templates.get(ref);
    if (!template) {
      throw new TemplateNotFoundError(ref);
    }
    return template(context);
  }

  /**
   * Render a page shell
   * @throws TemplateNotFoundError when no shell is registered for the template
   */
  renderPage(templateId: string, context: PageTemplateContext): string {
    const ref = pageTemplateRef(templateId);
    const template = this.pages.get(ref);
    if (!template) {
      throw new TemplateNotFoundError(ref);
    }
    return template(context);
  }
}
