import { CommentStyle } from '../models/commentStyle';
import { HeaderTemplate } from '../models/headerTemplate';
import { VariableSet } from '../models/variableSet';
import { MissingVariableError } from '../shared/errors';

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z0-9_]+)\}/g;

/**
 * Service for filling templates and wrapping them in comments
 */
export class TemplateService {
  /**
   * Replace every ${name} placeholder in one pass.
   * Substituted values are not scanned again.
   * @throws MissingVariableError when a placeholder has no value
   */
  public static substitute(content: string, variables: VariableSet): string {
    return content.replace(PLACEHOLDER_PATTERN, (_placeholder: string, name: string) => {
      const value = Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : undefined;
      if (value === undefined) {
        throw new MissingVariableError(name);
      }
      return value;
    });
  }

  /**
   * Names of the placeholders a template uses, in order of first use
   */
  public static placeholders(content: string): string[] {
    const names = new Set<string>();
    for (const match of content.matchAll(PLACEHOLDER_PATTERN)) {
      names.add(match[1]);
    }
    return [...names];
  }

  /**
   * Render a template as comment lines for the given style
   * @param template Header template
   * @param variables Resolved variables
   * @param style Comment style of the target file
   * @returns Header lines without terminators
   */
  public static render(template: HeaderTemplate, variables: VariableSet, style: CommentStyle): string[] {
    const body = this.substitute(template.content, variables)
      .replace(/(\r?\n)+$/, '')
      .split(/\r?\n/);

    if (style.comment.kind === 'block') {
      const prefix = style.comment.bodyPrefix;
      return [style.comment.start, ...body.map((line) => this.prefixLine(prefix, line)), style.comment.end];
    }

    const prefix = style.comment.prefix;
    return body.map((line) => this.prefixLine(prefix, line));
  }

  private static prefixLine(prefix: string, line: string): string {
    const text = line.trimEnd();
    if (prefix.length === 0) {
      return text;
    }
    return text.length === 0 ? prefix : `${prefix} ${text}`;
  }
}
