import { escapeHtml, lines, safeUrl } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

export const contactForm: ComponentTemplate = ({ componentId, fields }) => {
  const email = fields.text('email');
  const action = escapeHtml(safeUrl(fields.str('form_action'), '/api/contact'));

  return lines(
    `<section class="contact" id="${escapeHtml(componentId)}">`,
    fields.str('title') && `  <h2 class="contact-title">${fields.text('title')}</h2>`,
    fields.str('description') && `  <p class="contact-description">${fields.text('description')}</p>`,
    `  <form class="contact-form" method="post" action="${action}" data-recipient="${email}">`,
    `    <input type="hidden" name="recipient" value="${email}">`,
    `    <label>Name<input type="text" name="name" required></label>`,
    `    <label>Email<input type="email" name="email" required></label>`,
    fields.bool('show_phone') && `    <label>Phone<input type="tel" name="phone"></label>`,
    `    <label>Message<textarea name="message" rows="5" required></textarea></label>`,
    `    <button type="submit" class="btn btn-primary">${fields.text('button_text', 'Send Message')}</button>`,
    `  </form>`,
    `</section>`
  );
};
