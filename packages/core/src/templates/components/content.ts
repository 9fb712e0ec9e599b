import { escapeHtml, lines, richText, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';
import { ALIGNMENTS } from './hero.js';

const SPACINGS = ['none', 'small', 'medium', 'large'] as const;

export const textHeading: ComponentTemplate = ({ componentId, fields }) => {
  const alignment = fields.choice('alignment', ALIGNMENTS, 'center');
  const anchor = fields.str('anchor_id') || componentId;

  return lines(
    `<div class="section-heading text-${alignment}" id="${escapeHtml(anchor)}">`,
    `  <h2>${fields.text('heading')}</h2>`,
    fields.str('subtitle') && `  <p class="section-subtitle">${fields.text('subtitle')}</p>`,
    `</div>`
  );
};

/** text-paragraph: content is rich text and is not escaped */
export const textParagraph: ComponentTemplate = ({ componentId, fields }) => {
  const alignment = fields.choice('alignment', ALIGNMENTS, 'left');

  return lines(
    `<div class="text-block text-${alignment}" id="${escapeHtml(componentId)}">`,
    richText(fields.str('content')),
    `</div>`
  );
};

/** content-block: each part is toggled by a show_* flag */
export const contentBlock: ComponentTemplate = ({ componentId, fields }) => {
  const anchor = fields.str('anchor_id') || componentId;
  const top = fields.choice('spacing_top', SPACINGS, 'medium');
  const bottom = fields.choice('spacing_bottom', SPACINGS, 'medium');
  const imageUrl = fields.str('image_url');
  const showImage = fields.bool('show_image') && imageUrl !== '';
  const overlay = showImage && fields.bool('show_overlay');
  const title = fields.str('title');
  const timestamp = fields.str('timestamp');
  const text = fields.str('text');

  const classes = ['content-block', `spacing-top-${top}`, `spacing-bottom-${bottom}`];
  if (fields.bool('show_border')) classes.push('bordered');
  if (overlay) classes.push('has-overlay');

  const caption = overlay && title ? `<figcaption class="content-overlay">${escapeHtml(title)}</figcaption>` : '';

  return lines(
    `<div class="${classes.join(' ')}" id="${escapeHtml(anchor)}">`,
    showImage &&
      `  <figure class="content-image"><img src="${escapeHtml(safeUrl(imageUrl))}" alt="${fields.text('image_alt')}" loading="lazy">${caption}</figure>`,
    title && !overlay && `  <h3 class="content-title">${escapeHtml(title)}</h3>`,
    fields.bool('show_timestamp') && timestamp && `  <time class="content-timestamp">${escapeHtml(timestamp)}</time>`,
    fields.bool('show_text', true) && text && `  <div class="content-text">${richText(text)}</div>`,
    `</div>`
  );
};

export const ctaBanner: ComponentTemplate = ({ componentId, fields }) => {
  const buttonText = fields.str('button_text');

  return lines(
    `<section class="cta-banner" id="${escapeHtml(componentId)}">`,
    `  <div class="container">`,
    `    <h2>${fields.text('heading')}</h2>`,
    fields.str('text') && `    <p>${fields.text('text')}</p>`,
    buttonText &&
      `    <a class="btn btn-light" href="${escapeHtml(safeUrl(fields.str('button_link')))}">${escapeHtml(buttonText)}</a>`,
    `  </div>`,
    `</section>`
  );
};
