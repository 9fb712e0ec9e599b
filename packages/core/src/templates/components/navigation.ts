import type { NavigationItem } from '@pagewright/schema';
import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

function renderNavItems(items: NavigationItem[]): string {
  return items
    .map((item) => {
      const children =
        item.children.length > 0 ? `<ul class="nav-children">${renderNavItems(item.children)}</ul>` : '';
      return `<li><a href="${escapeHtml(safeUrl(item.url))}">${escapeHtml(item.label)}</a>${children}</li>`;
    })
    .join('');
}

/** nav-main: brand plus the site's navigation tree */
export const navMain: ComponentTemplate = ({ componentId, fields, site }) => {
  const brand = fields.str('logo_text') || site.site_name;
  const logo =
    fields.bool('show_logo') && site.logo_url
      ? `<img class="nav-logo" src="${escapeHtml(safeUrl(site.logo_url))}" alt="">`
      : '';

  return lines(
    `<nav class="site-nav${fields.bool('sticky') ? ' sticky' : ''}" id="${escapeHtml(componentId)}">`,
    `  <div class="container nav-inner">`,
    `    <a class="nav-brand" href="/">${logo}${escapeHtml(brand)}</a>`,
    `    <ul class="nav-links">${renderNavItems(site.navigation)}</ul>`,
    `  </div>`,
    `</nav>`
  );
};
