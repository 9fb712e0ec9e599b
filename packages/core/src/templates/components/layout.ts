import { escapeHtml, lines } from '../../render/html.js';
import type { ComponentTemplate } from '../types.js';

const RATIOS = ['50-50', '60-40', '40-60'] as const;

/** two-column: each column is a nested list of component instances */
export const twoColumn: ComponentTemplate = ({ componentId, fields, renderChildren }) => {
  const ratio = fields.choice('ratio', RATIOS, '50-50');

  return lines(
    `<div class="two-column ratio-${ratio}" id="${escapeHtml(componentId)}">`,
    `  <div class="column column-left">`,
    renderChildren(fields.get('left_slot'), 'left'),
    `  </div>`,
    `  <div class="column column-right">`,
    renderChildren(fields.get('right_slot'), 'right'),
    `  </div>`,
    `</div>`
  );
};
