import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

export const ALIGNMENTS = ['left', 'center', 'right'] as const;
const HEIGHTS = ['small', 'medium', 'large'] as const;

export const heroText: ComponentTemplate = ({ componentId, fields }) => {
  const alignment = fields.choice('alignment', ALIGNMENTS, 'center');
  const ctaText = fields.str('cta_text');

  return lines(
    `<section class="hero hero-text text-${alignment}" id="${escapeHtml(componentId)}">`,
    `  <div class="container">`,
    `    <h1 class="hero-title">${fields.text('title')}</h1>`,
    fields.str('subtitle') && `    <p class="hero-subtitle">${fields.text('subtitle')}</p>`,
    ctaText &&
      `    <a class="btn btn-primary" href="${escapeHtml(safeUrl(fields.str('cta_link')))}">${escapeHtml(ctaText)}</a>`,
    `  </div>`,
    `</section>`
  );
};

export const heroImage: ComponentTemplate = ({ componentId, fields }) => {
  const height = fields.choice('height', HEIGHTS, 'medium');
  const image = fields.str('background_image');
  const style = image ? ` style="background-image: url('${escapeHtml(safeUrl(image))}')"` : '';
  const ctaText = fields.str('cta_text');

  return lines(
    `<section class="hero hero-image hero-${height}" id="${escapeHtml(componentId)}"${style}>`,
    `  <div class="hero-overlay">`,
    `    <div class="container">`,
    `      <h1 class="hero-title">${fields.text('title')}</h1>`,
    fields.str('subtitle') && `      <p class="hero-subtitle">${fields.text('subtitle')}</p>`,
    ctaText &&
      `      <a class="btn btn-primary" href="${escapeHtml(safeUrl(fields.str('cta_link')))}">${escapeHtml(ctaText)}</a>`,
    `    </div>`,
    `  </div>`,
    `</section>`
  );
};
