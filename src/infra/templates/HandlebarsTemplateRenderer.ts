/**
 * Handlebars Template Renderer
 *
 * Loads `<name>.hbs` files from a templates directory. The first name is the
 * page; the others are registered as partials under their own name, so a
 * page can pull in `{{> layouts/base}}`.
 */
import { readFile } from 'fs/promises';
import path from 'path';
import Handlebars from 'handlebars';
import type { ITemplateRenderer } from '../../domain/ports/ITemplateRenderer.js';

const TEMPLATE_EXTENSION = '.hbs';

export class TemplateNotFoundError extends Error {
  constructor(public readonly templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
  }
}

export interface HandlebarsTemplateRendererOptions {
  /** Directory the template names are resolved against */
  baseDir: string;
  /** Keep loaded sources in memory (disable in development to pick up edits) */
  cache?: boolean;
}

export class HandlebarsTemplateRenderer implements ITemplateRenderer {
  private readonly baseDir: string;
  private readonly cacheEnabled: boolean;
  private readonly sources = new Map<string, string>();

  constructor(options: HandlebarsTemplateRendererOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.cacheEnabled = options.cache ?? true;
  }

  async render(names: readonly string[], data: unknown): Promise<string> {
    const [page, ...partials] = names;
    if (page === undefined) {
      throw new Error('No template name given');
    }

    // Isolated environment per render: partial names never leak between pages
    const env = Handlebars.create();
    for (const name of partials) {
      env.registerPartial(name, await this.load(name));
    }

    const template = env.compile(await this.load(page), { strict: false });
    return template(data);
  }

  private async load(name: string): Promise<string> {
    const cached = this.sources.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const file = this.resolve(name);
    let source: string;
    try {
      source = await readFile(file, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new TemplateNotFoundError(name);
      }
      throw error;
    }

    if (this.cacheEnabled) {
      this.sources.set(name, source);
    }
    return source;
  }

  private resolve(name: string): string {
    const file = path.resolve(this.baseDir, `${name}${TEMPLATE_EXTENSION}`);
    if (!file.startsWith(this.baseDir + path.sep)) {
      throw new TemplateNotFoundError(name);
    }
    return file;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
