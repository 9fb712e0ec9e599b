/**
 * Color variables
 * A site's colors are its scheme's colors with per-site overrides on top,
 * emitted as CSS custom properties.
 */

import type { DefinitionCatalog } from '../catalog/catalog.js';
import type { SiteConfig } from '@pagewright/schema';

/** Palette used when no site or scheme is available */
export const FALLBACK_COLORS: Readonly<Record<string, string>> = {
  primary: '#0066cc',
  text: '#1a1a2e',
  background: '#ffffff',
  surface: '#f8fafc',
  border: '#e2e8f0',
};

/**
 * Overrides win on key collision
 */
export function mergeColors(
  base: Record<string, string>,
  overrides: Record<string, string>
): Record<string, string> {
  return { ...base, ...overrides };
}

/**
 * Resolve a site's colors; unknown schemes contribute nothing
 */
export function resolveColors(site: SiteConfig, catalog: DefinitionCatalog): Record<string, string> {
  const scheme = catalog.getColorScheme(site.color_scheme_id);
  return mergeColors(scheme?.colors ?? {}, site.color_overrides);
}

/**
 * "text_muted" / "textMuted" -> "text-muted"
 */
export function toCssVariableName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/[\s_]+/g, '-')
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '');
}

/**
 * Strip characters that could end the declaration or the style element
 */
function sanitizeCssValue(value: string): string {
  return value.replace(/[;{}<>]/g, '').trim();
}

/**
 * Emit a :root block with one --color-* variable per entry
 */
export function generateColorCss(colors: Record<string, string>): string {
  let css = ':root {\n';
  for (const [name, value] of Object.entries(colors)) {
    const variable = toCssVariableName(name);
    if (!variable) continue;
    css += `  --color-${variable}: ${sanitizeCssValue(value)};\n`;
  }
  css += '}\n';
  return css;
}
