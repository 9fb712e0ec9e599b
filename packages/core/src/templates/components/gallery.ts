import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

const COLUMNS = ['2', '3', '4'] as const;

export const galleryGrid: ComponentTemplate = ({ componentId, fields }) => {
  const id = escapeHtml(componentId);
  const columns = fields.choice('columns', COLUMNS, '3');
  const lightbox = fields.bool('show_lightbox');

  const items = fields.strings('images').map((image) => {
    const src = escapeHtml(safeUrl(image));
    const img = `<img src="${src}" alt="" loading="lazy">`;
    return lightbox
      ? `    <a class="gallery-item" href="${src}" data-lightbox="${id}">${img}</a>`
      : `    <div class="gallery-item">${img}</div>`;
  });

  return lines(
    `<section class="gallery" id="${id}">`,
    fields.str('title') && `  <h2 class="gallery-title">${fields.text('title')}</h2>`,
    `  <div class="gallery-grid cols-${columns}">`,
    ...items,
    `  </div>`,
    `</section>`
  );
};
