/**
 * Handlebars Templates
 *
 * File templates (`<dir>/<name>.hbs`) are compiled once and cached; inline
 * reward messages are compiled on demand and cached by source.
 */

import Handlebars from 'handlebars';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface TemplateRenderer {
  render(name: string, params: Record<string, unknown>): Promise<string>;
  renderString(source: string, params: Record<string, unknown>): string;
}

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** MM/DD/YYYY HH:MM:SS (UTC) */
export function formatAwardDate(value: Date): string {
  return `${pad(value.getUTCMonth() + 1)}/${pad(value.getUTCDate())}/${value.getUTCFullYear()} ` +
    `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
}

export class HandlebarsTemplates implements TemplateRenderer {
  private readonly hbs = Handlebars.create();
  private readonly files = new Map<string, Handlebars.TemplateDelegate>();
  private readonly inline = new Map<string, Handlebars.TemplateDelegate>();

  constructor(private readonly dir: string = DEFAULT_TEMPLATES_DIR) {
    this.hbs.registerHelper('date', (value: unknown) =>
      value instanceof Date ? formatAwardDate(value) : String(value ?? '')
    );
    this.hbs.registerHelper('plural', (count: unknown, singular: unknown, plural: unknown) =>
      count === 1 ? String(singular) : String(plural)
    );
  }

  async render(name: string, params: Record<string, unknown>): Promise<string> {
    let template = this.files.get(name);
    if (!template) {
      const source = await readFile(path.join(this.dir, `${name}.hbs`), 'utf8');
      template = this.hbs.compile(source);
      this.files.set(name, template);
    }
    return template(params);
  }

  renderString(source: string, params: Record<string, unknown>): string {
    let template = this.inline.get(source);
    if (!template) {
      template = this.hbs.compile(source, { strict: false });
      this.inline.set(source, template);
    }
    return template(params);
  }
}
