import Handlebars from 'handlebars';
import { readFileSync, readdirSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../shared/utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

Handlebars.registerHelper('lowercase', (str: string) => str?.toLowerCase());

Handlebars.registerHelper(
  'ifEquals',
  function (this: unknown, arg1: unknown, arg2: unknown, options: Handlebars.HelperOptions) {
    return arg1 === arg2 ? options.fn(this) : options.inverse(this);
  }
);

Handlebars.registerHelper('length', (arr: unknown[]) => {
  return Array.isArray(arr) ? arr.length : 0;
});

Handlebars.registerHelper('join', (arr: unknown[], separator: string) => {
  if (!Array.isArray(arr)) return '';
  return arr.join(typeof separator === 'string' ? separator : ', ');
});

Handlebars.registerHelper(
  'gt',
  function (this: unknown, a: number, b: number, options: Handlebars.HelperOptions) {
    return a > b ? options.fn(this) : options.inverse(this);
  }
);

// Template cache
const templateCache = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Compile every .hbs file of a directory. Templates render plain-text
 * email, so output is not HTML-escaped.
 */
export function initializeTemplates(templatesDir: string): void {
  if (!existsSync(templatesDir)) {
    logger.warn({ templatesDir }, 'Templates directory does not exist');
    return;
  }

  const files = readdirSync(templatesDir).filter((f) => f.endsWith('.hbs'));

  for (const file of files) {
    const templateName = file.replace('.hbs', '');
    const templateSource = readFileSync(join(templatesDir, file), 'utf-8');

    try {
      templateCache.set(templateName, Handlebars.compile(templateSource, { noEscape: true }));
    } catch (error) {
      logger.error({ template: templateName, error }, 'Failed to compile template');
      throw error;
    }
  }

  logger.debug({ count: templateCache.size, templatesDir }, 'Templates loaded');
}

/**
 * Render a template with the given context
 */
export function renderTemplate<T extends object>(templateName: string, context: T): string {
  const template = templateCache.get(templateName);
  if (!template) {
    throw new Error(`Template not found: ${templateName}`);
  }
  return template(context);
}

export function hasTemplate(templateName: string): boolean {
  return templateCache.has(templateName);
}

// Resolves to <root>/templates from both src/templates and dist/templates
export const TEMPLATES_DIR = join(__dirname, '..', '..', 'templates');

initializeTemplates(TEMPLATES_DIR);
