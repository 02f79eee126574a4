import fs from 'node:fs/promises';
import path from 'node:path';
import Handlebars from 'handlebars';

const cache = new Map<string, Handlebars.TemplateDelegate>();

export function templatesDir() {
  return path.join(process.cwd(), 'src', 'templates');
}

// Notifications are plain text, so HTML escaping is off.
export async function renderTemplate(name: string, vars: Record<string, unknown>): Promise<string> {
  let tmpl = cache.get(name);
  if (!tmpl) {
    const source = await fs.readFile(path.join(templatesDir(), `${name}.hbs`), 'utf8');
    tmpl = Handlebars.compile(source, { noEscape: true });
    cache.set(name, tmpl);
  }
  return tmpl(vars).trim();
}

export function renderInline(source: string, vars: Record<string, unknown>): string {
  return Handlebars.compile(source, { noEscape: true })(vars).trim();
}
