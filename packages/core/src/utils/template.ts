/**
 * Template Rendering
 */

import type { TemplateVars } from '../types.js';

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

/**
 * Replace every `{{name}}` placeholder with its value.
 *
 * Placeholders without a value stay as written. Values are inserted in one
 * pass, so a value that contains `{{other}}` is not expanded again.
 *
 * @example
 * renderTemplate('Explain {{topic}}', { topic: 'queues' }) // 'Explain queues'
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.hasOwn(vars, name) ? vars[name] : placeholder
  );
}
