/**
 * Ibex scaffold - the fixed document the rendered stims are spliced into.
 *
 * The bundled template holds the shuffle sequence, the defaults, the intro
 * form, the three practice trials, the separator and the counter item.
 * Placeholders are `{{conditions}}` and `{{stims}}`.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError, FileAccessError } from '../errors/ConversionError.js';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/ibex.js.tmpl', import.meta.url),
);

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;

export type TemplateValues = Readonly<Record<string, string>>;

/**
 * Read a scaffold template, the bundled one when no path is given.
 *
 * @throws FileAccessError when the file cannot be read
 * @throws ConfigError when the template has no `{{stims}}` placeholder
 */
export function loadTemplate(templatePath: string = DEFAULT_TEMPLATE_PATH): string {
  let template: string;
  try {
    template = readFileSync(templatePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    throw new FileAccessError(
      missing ? `Template not found: ${templatePath}` : `Cannot read template: ${templatePath}`,
      missing ? 'ERR_FILE_NOT_FOUND' : 'ERR_FILE_UNREADABLE',
      { filePath: templatePath }
    );
  }

  if (!template.includes('{{stims}}')) {
    throw new ConfigError(
      'Template has no {{stims}} placeholder',
      { filePath: templatePath },
      'Mark where the generated items go with {{stims}}'
    );
  }
  return template;
}

/**
 * Substitute `{{name}}` placeholders. Unknown names are left as they are.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) =>
    Object.hasOwn(values, name) ? values[name] : placeholder
  );
}
