import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

interface SocialLink {
  platform: string;
  url: string;
}

/**
 * Parse "platform|url" entries, one per line or comma separated
 */
export function parseSocialLinks(value: string): SocialLink[] {
  return value
    .split(/[\n,]/)
    .map((entry) => entry.split('|').map((part) => part.trim()))
    .filter(([platform, url]) => Boolean(platform) && Boolean(url))
    .map(([platform, url]) => ({ platform, url }));
}

export const footerSimple: ComponentTemplate = ({ componentId, fields, site }) => {
  const text = fields.str('copyright_text') || site.footer_text;
  let links = parseSocialLinks(fields.str('social_links'));
  if (links.length === 0) {
    links = Object.entries(site.social_links).map(([platform, url]) => ({ platform, url }));
  }

  const items = links.map(
    ({ platform, url }) =>
      `<li><a class="social-${escapeHtml(platform.toLowerCase())}" href="${escapeHtml(safeUrl(url))}" rel="noopener" target="_blank">${escapeHtml(platform)}</a></li>`
  );

  return lines(
    `<footer class="site-footer" id="${escapeHtml(componentId)}">`,
    `  <div class="container footer-inner">`,
    `    <p class="footer-text">${escapeHtml(text)}</p>`,
    items.length > 0 && `    <ul class="social-links">${items.join('')}</ul>`,
    fields.bool('show_back_to_top') && `    <a class="back-to-top" href="#top">Back to top</a>`,
    `  </div>`,
    `</footer>`
  );
};
