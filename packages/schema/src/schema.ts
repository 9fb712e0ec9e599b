/**
 * Pagewright document schemas
 * Zod schemas for the definition files, site config and page configs
 */

import { z } from 'zod';

// =============================================================================
// Definitions (read-only catalog)
// =============================================================================

export const FIELD_TYPES = [
  'text',
  'textarea',
  'image',
  'url',
  'email',
  'color',
  'select',
  'checkbox',
] as const;

export const COMPONENT_CATEGORIES = [
  'navigation',
  'hero',
  'content',
  'gallery',
  'contact',
  'footer',
  'sidebar',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];
export type ComponentCategory = (typeof COMPONENT_CATEGORIES)[number];

export const selectOptionSchema = z.union([
  z.string(),
  z.object({
    value: z.string(),
    label: z.string().optional(),
  }),
]);

export const editableFieldSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(FIELD_TYPES).default('text'),
    label: z.string().optional(),
    required: z.boolean().default(false),
    default: z.unknown().optional(),
    options: z.array(selectOptionSchema).optional(),
    placeholder: z.string().default(''),
    help_text: z.string().default(''),
  })
  .transform((field) => ({ ...field, label: field.label ?? field.name }));

export const componentDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.enum(COMPONENT_CATEGORIES),
  thumbnail: z.string().default(''),
  editable_fields: z.array(editableFieldSchema).default([]),
  default_data: z.record(z.unknown()).default({}),
});

export const colorSchemeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  colors: z.record(z.string()),
});

/** Cardinality bounds are declarative; rendering does not enforce them */
export const templateSlotSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  allowed_categories: z.array(z.string()).default(['*']),
  max_items: z.number().int().nonnegative().default(10),
  min_items: z.number().int().nonnegative().default(0),
});

export const templateDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.string().default('business'),
  thumbnail: z.string().default(''),
  slots: z.array(templateSlotSchema).default([]),
  default_color_scheme: z.string().default('ocean-blue'),
  features: z.array(z.string()).default([]),
});

export type SelectOption = z.infer<typeof selectOptionSchema>;
export type EditableField = z.infer<typeof editableFieldSchema>;
export type ComponentDefinition = z.infer<typeof componentDefinitionSchema>;
export type ColorScheme = z.infer<typeof colorSchemeSchema>;
export type TemplateSlot = z.infer<typeof templateSlotSchema>;
export type TemplateDefinition = z.infer<typeof templateDefinitionSchema>;

// =============================================================================
// Site & page documents (persisted)
// =============================================================================

export interface NavigationItem {
  label: string;
  url: string;
  children: NavigationItem[];
}

export interface NavigationItemInput {
  label: string;
  url: string;
  children?: NavigationItemInput[];
}

export const navigationItemSchema: z.ZodType<NavigationItem, z.ZodTypeDef, NavigationItemInput> =
  z.lazy(() =>
    z.object({
      label: z.string(),
      url: z.string(),
      children: z.array(navigationItemSchema).default([]),
    })
  );

export const pageComponentSchema = z.object({
  id: z.string().default(''),
  type: z.string().min(1),
  data: z.record(z.unknown()).default({}),
});

export const pageConfigSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  slug: z.string().default(''),
  slots: z.record(z.array(pageComponentSchema)).default({}),
  meta_description: z.string().default(''),
  created_at: z.string().default(''),
  updated_at: z.string().default(''),
});

/** Unsaved page content sent for preview; the id is optional */
export const pageDraftSchema = pageConfigSchema.extend({
  id: z.string().min(1).default('preview'),
});

export const siteConfigSchema = z.object({
  version: z.string().default('1.0'),
  template_id: z.string().min(1),
  color_scheme_id: z.string().min(1),
  color_overrides: z.record(z.string()).default({}),
  site_name: z.string().default(''),
  logo_url: z.string().default(''),
  favicon_url: z.string().default(''),
  pages: z.array(z.string()).default([]),
  navigation: z.array(navigationItemSchema).default([]),
  footer_text: z.string().default(''),
  social_links: z.record(z.string()).default({}),
  created_at: z.string().default(''),
  updated_at: z.string().default(''),
});

/** Fields a user may change through site settings */
export const siteSettingsPatchSchema = z
  .object({
    site_name: z.string(),
    color_scheme_id: z.string().min(1),
    color_overrides: z.record(z.string()),
    footer_text: z.string(),
    navigation: z.array(navigationItemSchema),
    logo_url: z.string(),
    favicon_url: z.string(),
    social_links: z.record(z.string()),
  })
  .partial();

export const pagePatchSchema = z
  .object({
    title: z.string(),
    slots: z.record(z.array(pageComponentSchema)),
    meta_description: z.string(),
  })
  .partial();

export type PageComponent = z.infer<typeof pageComponentSchema>;
export type PageConfig = z.infer<typeof pageConfigSchema>;
export type PageConfigInput = z.input<typeof pageConfigSchema>;
export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type SiteConfigInput = z.input<typeof siteConfigSchema>;
export type SiteSettingsPatch = z.infer<typeof siteSettingsPatchSchema>;
export type PagePatch = z.infer<typeof pagePatchSchema>;

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
