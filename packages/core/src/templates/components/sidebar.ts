import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

export const sidebarAbout: ComponentTemplate = ({ componentId, fields }) => {
  const image = fields.str('image_url');

  return lines(
    `<div class="sidebar-widget about-widget" id="${escapeHtml(componentId)}">`,
    image && `  <img class="about-photo" src="${escapeHtml(safeUrl(image))}" alt="${fields.text('title')}">`,
    fields.str('title') && `  <h3>${fields.text('title')}</h3>`,
    fields.str('text') && `  <p class="about-text">${fields.text('text')}</p>`,
    `</div>`
  );
};
