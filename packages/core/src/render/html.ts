/**
 * HTML helpers for render templates
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape text for HTML element content and attribute values
 */
export function escapeHtml(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Only http(s), mailto, tel, root-relative, relative and fragment URLs pass;
 * anything else (javascript:, data:) becomes "#"
 */
export function safeUrl(value: unknown, fallback = '#'): string {
  const url = typeof value === 'string' ? value.trim() : '';
  if (!url) return fallback;
  if (/^(https?:|mailto:|tel:)/i.test(url)) return url;
  if (/^[a-z][a-z0-9+.-]*:/i.test(url)) return fallback;
  return url;
}

/**
 * Render text with blank-line paragraphs as <p> elements; text that already
 * contains markup is passed through as-is
 */
export function richText(value: string): string {
  if (/<[a-z][\s\S]*>/i.test(value)) {
    return value;
  }
  return value
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .map((paragraph) => `<p>${escapeHtml(paragraph).replace(/\n/g, '<br>')}</p>`)
    .join('\n');
}

/**
 * Typed access to a component's merged data
 */
export class FieldReader {
  constructor(readonly values: Record<string, unknown>) {}

  /** Raw value */
  get(name: string): unknown {
    return this.values[name];
  }

  /** Value as text; numbers and booleans are stringified */
  str(name: string, fallback = ''): string {
    const value = this.values[name];
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return fallback;
  }

  /** Escaped text */
  text(name: string, fallback = ''): string {
    return escapeHtml(this.str(name, fallback));
  }

  /** Checkbox value; accepts "true"/"false" strings from form posts */
  bool(name: string, fallback = false): boolean {
    const value = this.values[name];
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return fallback;
  }

  /** List of strings from an array or newline/comma separated text */
  strings(name: string): string[] {
    const value = this.values[name];
    const items = Array.isArray(value)
      ? value.filter((item): item is string => typeof item === 'string')
      : typeof value === 'string'
        ? value.split(/[\n,]/)
        : [];
    return items.map((item) => item.trim()).filter(Boolean);
  }

  /** Select value restricted to the allowed options */
  choice<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    const value = this.str(name);
    return allowed.find((option) => option === value) ?? fallback;
  }
}

/**
 * Join non-empty lines; falsy parts are dropped
 */
export function lines(...parts: Array<string | false | null | undefined>): string {
  return parts.filter((part): part is string => typeof part === 'string' && part.length > 0).join('\n');
}
