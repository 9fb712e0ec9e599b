import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { PageTemplate } from '../types.js';
import { BASE_STYLES } from './styles.js';

/** Slots the shell places itself; any other slot follows the main content */
export const LAYOUT_SLOTS = ['header', 'hero', 'main', 'sidebar', 'footer'];

export const defaultPage: PageTemplate = ({ site, page, slots, colorCss, mode }) => {
  const title = page.title ? `${page.title} | ${site.site_name}` : site.site_name;
  const hero = slots['hero'] ?? '';
  const sidebar = slots['sidebar'] ?? '';
  const extras = Object.keys(slots)
    .filter((name) => !LAYOUT_SLOTS.includes(name))
    .map((name) =>
      lines(
        `<section class="page-slot page-slot-${escapeHtml(name)}" data-slot="${escapeHtml(name)}">`,
        slots[name],
        `</section>`
      )
    );

  return lines(
    `<!DOCTYPE html>`,
    `<html lang="en">`,
    `<head>`,
    `  <meta charset="UTF-8">`,
    `  <meta name="viewport" content="width=device-width, initial-scale=1.0">`,
    mode === 'preview' && `  <meta name="robots" content="noindex">`,
    `  <title>${escapeHtml(title)}</title>`,
    page.meta_description && `  <meta name="description" content="${escapeHtml(page.meta_description)}">`,
    site.favicon_url && `  <link rel="icon" href="${escapeHtml(safeUrl(site.favicon_url))}">`,
    `  <style>`,
    colorCss + BASE_STYLES,
    `  </style>`,
    `</head>`,
    `<body id="top" class="page-${escapeHtml(page.id)}">`,
    `<header class="site-header">`,
    slots['header'],
    `</header>`,
    hero && `<div class="site-hero">\n${hero}\n</div>`,
    `<div class="container page-body${sidebar ? ' has-sidebar' : ''}">`,
    `<main class="page-main">`,
    slots['main'],
    ...extras,
    `</main>`,
    sidebar && `<aside class="page-sidebar">\n${sidebar}\n</aside>`,
    `</div>`,
    `<div class="site-footer-slot">`,
    slots['footer'],
    `</div>`,
    `</body>`,
    `</html>`
  );
};
