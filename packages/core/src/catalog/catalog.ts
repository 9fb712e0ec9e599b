import type { z } from 'zod';
import {
  colorSchemeSchema,
  componentDefinitionSchema,
  templateDefinitionSchema,
  toValidationErrors,
  validateComponentData,
  type ColorScheme,
  type ComponentCategory,
  type ComponentDefinition,
  type TemplateDefinition,
} from '@pagewright/schema';
import type { Logger } from '../logger.js';
import { noopLogger } from '../logger.js';
import type { DefinitionSource } from './sources.js';
import { FileDefinitionSource } from './sources.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read-only catalog of component, color scheme and template definitions
 */
export class DefinitionCatalog {
  private components: Map<string, ComponentDefinition> = new Map();
  private colorSchemes: Map<string, ColorScheme> = new Map();
  private templates: Map<string, TemplateDefinition> = new Map();
  private logger: Logger;

  constructor(source: DefinitionSource, logger: Logger = noopLogger) {
    this.logger = logger;
    this.load(this.components, source.loadComponents(), componentDefinitionSchema, 'component');
    this.load(this.colorSchemes, source.loadColorSchemes(), colorSchemeSchema, 'color scheme');
    this.load(this.templates, source.loadTemplates(), templateDefinitionSchema, 'template');
    this.checkComponentDefaults();
  }

  /**
   * Load a catalog from a definitions directory (bundled definitions by default)
   */
  static fromDirectory(dir?: string, logger: Logger = noopLogger): DefinitionCatalog {
    return new DefinitionCatalog(new FileDefinitionSource(dir || undefined, logger), logger);
  }

  private load<S extends z.ZodTypeAny>(
    map: Map<string, z.infer<S>>,
    entries: unknown[],
    schema: S,
    kind: string
  ): void {
    entries.forEach((entry, index) => {
      const result = schema.safeParse(entry);
      if (!result.success) {
        this.logger.warn(`Skipping invalid ${kind} definition #${index}`, toValidationErrors(result.error));
        return;
      }
      if (map.has(result.data.id)) {
        this.logger.warn(`Skipping duplicate ${kind} definition: ${result.data.id}`);
        return;
      }
      map.set(result.data.id, deepFreeze(result.data));
    });
  }

  /** Components whose default_data fails their own fields render as errors until edited */
  private checkComponentDefaults(): void {
    for (const component of this.components.values()) {
      const check = validateComponentData(component, component.default_data);
      if (!check.valid) {
        const problems = check.errors.map((error) => error.message).join('; ');
        this.logger.warn(`Component ${component.id} needs input before it renders: ${problems}`);
      }
    }
  }

  /**
   * Get all components, optionally filtered by category
   */
  getComponents(category?: ComponentCategory | string): ComponentDefinition[] {
    const all = Array.from(this.components.values());
    return category ? all.filter((c) => c.category === category) : all;
  }

  /**
   * Get a component by ID
   */
  getComponent(id: string): ComponentDefinition | undefined {
    return this.components.get(id);
  }

  /**
   * Get all color schemes
   */
  getColorSchemes(): ColorScheme[] {
    return Array.from(this.colorSchemes.values());
  }

  /**
   * Get a color scheme by ID
   */
  getColorScheme(id: string): ColorScheme | undefined {
    return this.colorSchemes.get(id);
  }

  /**
   * Get all templates
   */
  getTemplates(): TemplateDefinition[] {
    return Array.from(this.templates.values());
  }

  /**
   * Get a template by ID
   */
  getTemplate(id: string): TemplateDefinition | undefined {
    return this.templates.get(id);
  }
}
