import * as fs from 'fs';
import * as path from 'path';
import { HeaderTemplate } from '../models/headerTemplate';
import { TemplateResolutionError } from '../shared/errors';

const TEMPLATE_EXTENSION = '.tmpl';

/**
 * Immutable set of named header templates.
 * Built once at startup and passed to whoever needs it.
 */
export class TemplateCatalog {
  private readonly templates: ReadonlyMap<string, HeaderTemplate>;

  constructor(templates: readonly HeaderTemplate[]) {
    const map = new Map<string, HeaderTemplate>();
    for (const template of templates) {
      if (map.has(template.id)) {
        throw new Error(`Duplicate template id "${template.id}"`);
      }
      map.set(template.id, Object.freeze({ ...template }));
    }
    this.templates = map;
  }

  /**
   * Load every *.tmpl file of a directory; the id is the file's base name
   * @param dir Directory holding the templates
   */
  public static async fromDirectory(dir: string): Promise<TemplateCatalog> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(TEMPLATE_EXTENSION))
      .map((entry) => entry.name)
      .sort();

    const templates = await Promise.all(
      files.map(async (file): Promise<HeaderTemplate> => {
        const id = path.basename(file, TEMPLATE_EXTENSION);
        const content = await fs.promises.readFile(path.join(dir, file), 'utf8');
        return { id, name: id, content, source: 'builtin' };
      }),
    );
    return new TemplateCatalog(templates);
  }

  public get ids(): string[] {
    return [...this.templates.keys()];
  }

  public get(id: string): HeaderTemplate | undefined {
    return this.templates.get(id);
  }

  /**
   * Resolve a template by exact id, then by unique substring of an id,
   * then as a path to a template file
   * @param nameOrPath Template name, name fragment or file path
   * @throws TemplateResolutionError when nothing or more than one template matches;
   * other read errors of the template file are passed on
   */
  public async resolve(nameOrPath: string): Promise<HeaderTemplate> {
    const exact = this.templates.get(nameOrPath);
    if (exact) {
      return exact;
    }

    const matches = this.ids.filter((id) => id.includes(nameOrPath));
    if (matches.length > 1) {
      throw new TemplateResolutionError(nameOrPath, matches, true);
    }
    if (matches.length === 1) {
      return this.templates.get(matches[0]) ?? this.notFound(nameOrPath);
    }

    const filePath = path.resolve(nameOrPath);
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return this.notFound(nameOrPath);
      }
      throw error;
    }
    return {
      id: path.basename(filePath, path.extname(filePath)),
      name: filePath,
      content,
      source: 'file',
    };
  }

  private notFound(nameOrPath: string): never {
    throw new TemplateResolutionError(nameOrPath, this.ids, false);
  }
}
