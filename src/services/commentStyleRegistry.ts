import { CommentStyle, CommentSyntax, KeepLinePattern } from '../models/commentStyle';
import { UnsupportedLanguageError } from '../shared/errors';
import { normalizeExtension } from '../shared/utils/stringUtils';

const SHEBANG: KeepLinePattern = { name: 'shebang', pattern: /^#!/, maxLine: 0 };

// PEP 263: the declaration must be on line 1 or 2
const PYTHON_ENCODING: KeepLinePattern = {
  name: 'encoding',
  pattern: /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/,
  maxLine: 1,
};

const RUBY_MAGIC_COMMENT: KeepLinePattern = {
  name: 'magic-comment',
  pattern: /^#\s*(-\*-.*-\*-|(?:en)?coding[:=]|frozen_string_literal:|typed:|warn_indent:|shareable_constant_value:)/,
  maxLine: 5,
  repeat: true,
};

const C_BLOCK: CommentSyntax = { kind: 'block', start: '/*', end: ' */', bodyPrefix: ' *' };
const XML_BLOCK: CommentSyntax = { kind: 'block', start: '<!--', end: '-->', bodyPrefix: '' };
const HASH_LINE: CommentSyntax = { kind: 'line', prefix: '#' };
const SLASH_LINE: CommentSyntax = { kind: 'line', prefix: '//' };
const DASH_LINE: CommentSyntax = { kind: 'line', prefix: '--' };

const STYLES: readonly CommentStyle[] = [
  { languageId: 'c', name: 'C/C++', extensions: ['.c', '.cc', '.cpp', '.cxx', '.c++', '.h', '.hh', '.hpp', '.hxx'], comment: C_BLOCK, keepLinePatterns: [] },
  { languageId: 'java', name: 'Java/Scala/Groovy/Kotlin', extensions: ['.java', '.scala', '.groovy', '.gradle', '.kt', '.kts', '.jape'], comment: C_BLOCK, keepLinePatterns: [] },
  { languageId: 'javascript', name: 'JavaScript/TypeScript', extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'], comment: C_BLOCK, keepLinePatterns: [SHEBANG] },
  { languageId: 'css', name: 'CSS/SCSS/Less', extensions: ['.css', '.scss', '.less'], comment: C_BLOCK, keepLinePatterns: [] },
  { languageId: 'go', name: 'Go', extensions: ['.go'], comment: C_BLOCK, keepLinePatterns: [] },
  { languageId: 'rust', name: 'Rust', extensions: ['.rs'], comment: C_BLOCK, keepLinePatterns: [] },
  { languageId: 'swift', name: 'Swift/Objective-C', extensions: ['.swift', '.m', '.mm'], comment: C_BLOCK, keepLinePatterns: [] },
  {
    languageId: 'php',
    name: 'PHP',
    extensions: ['.php'],
    comment: C_BLOCK,
    keepLinePatterns: [SHEBANG, { name: 'php-open-tag', pattern: /^<\?php\b/, maxLine: 1 }],
  },
  {
    languageId: 'xml',
    name: 'XML',
    extensions: ['.xml', '.xsd', '.xsl', '.xslt', '.svg'],
    comment: XML_BLOCK,
    keepLinePatterns: [{ name: 'xml-declaration', pattern: /^\s*<\?xml.*\?>/, maxLine: 0 }],
  },
  {
    languageId: 'html',
    name: 'HTML',
    extensions: ['.html', '.htm', '.xhtml', '.vue'],
    comment: XML_BLOCK,
    keepLinePatterns: [{ name: 'doctype', pattern: /^\s*<!DOCTYPE\b/i, maxLine: 0 }],
  },
  { languageId: 'python', name: 'Python', extensions: ['.py', '.pyw', '.pyi'], comment: HASH_LINE, keepLinePatterns: [SHEBANG, PYTHON_ENCODING] },
  { languageId: 'shell', name: 'Shell', extensions: ['.sh', '.bash', '.zsh', '.csh', '.ksh'], comment: HASH_LINE, keepLinePatterns: [SHEBANG] },
  { languageId: 'perl', name: 'Perl', extensions: ['.pl', '.pm'], comment: HASH_LINE, keepLinePatterns: [SHEBANG] },
  { languageId: 'ruby', name: 'Ruby', extensions: ['.rb', '.rake', '.gemspec'], comment: HASH_LINE, keepLinePatterns: [SHEBANG, RUBY_MAGIC_COMMENT] },
  { languageId: 'yaml', name: 'YAML', extensions: ['.yml', '.yaml'], comment: HASH_LINE, keepLinePatterns: [] },
  { languageId: 'r', name: 'R', extensions: ['.r'], comment: HASH_LINE, keepLinePatterns: [SHEBANG] },
  { languageId: 'csharp', name: 'C#', extensions: ['.cs'], comment: SLASH_LINE, keepLinePatterns: [] },
  { languageId: 'sql', name: 'SQL', extensions: ['.sql'], comment: DASH_LINE, keepLinePatterns: [] },
  { languageId: 'lua', name: 'Lua', extensions: ['.lua'], comment: DASH_LINE, keepLinePatterns: [SHEBANG] },
  { languageId: 'haskell', name: 'Haskell', extensions: ['.hs'], comment: DASH_LINE, keepLinePatterns: [SHEBANG] },
  { languageId: 'vb', name: 'Visual Basic', extensions: ['.vb'], comment: { kind: 'line', prefix: "'" }, keepLinePatterns: [] },
  { languageId: 'erlang', name: 'Erlang', extensions: ['.erl', '.hrl'], comment: { kind: 'line', prefix: '%%' }, keepLinePatterns: [SHEBANG] },
];

/**
 * Registry of comment rules per language.
 * Adding a language means adding one row to STYLES.
 */
export class CommentStyleRegistry {
  private static defaultRegistry: CommentStyleRegistry | undefined;

  private readonly byLanguage = new Map<string, CommentStyle>();
  private readonly byExtension = new Map<string, CommentStyle>();

  constructor(styles: readonly CommentStyle[]) {
    for (const style of styles) {
      if (this.byLanguage.has(style.languageId)) {
        throw new Error(`Duplicate language id "${style.languageId}"`);
      }
      const frozen = CommentStyleRegistry.freeze(style);
      this.byLanguage.set(frozen.languageId, frozen);

      for (const extension of frozen.extensions) {
        const existing = this.byExtension.get(extension);
        if (existing) {
          throw new Error(
            `Extension "${extension}" registered for both "${existing.languageId}" and "${frozen.languageId}"`,
          );
        }
        this.byExtension.set(extension, frozen);
      }
    }
  }

  /**
   * Registry built from the built-in table, created on first use
   */
  public static get default(): CommentStyleRegistry {
    if (!this.defaultRegistry) {
      this.defaultRegistry = new CommentStyleRegistry(STYLES);
    }
    return this.defaultRegistry;
  }

  public lookup(languageId: string): CommentStyle | undefined {
    return this.byLanguage.get(languageId);
  }

  /**
   * Find the style for a file extension (case-insensitive, leading dot optional)
   */
  public lookupByExtension(extension: string): CommentStyle | undefined {
    return this.byExtension.get(normalizeExtension(extension));
  }

  /**
   * Like lookup, but fails instead of returning undefined
   */
  public require(languageId: string): CommentStyle {
    const style = this.lookup(languageId);
    if (!style) {
      throw new UnsupportedLanguageError(languageId);
    }
    return style;
  }

  public languages(): CommentStyle[] {
    return [...this.byLanguage.values()];
  }

  /**
   * All registered extensions, sorted
   */
  public extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  private static freeze(style: CommentStyle): CommentStyle {
    return Object.freeze({
      ...style,
      extensions: Object.freeze(style.extensions.map(normalizeExtension)),
      comment: Object.freeze({ ...style.comment }),
      keepLinePatterns: Object.freeze(style.keepLinePatterns.map((rule) => Object.freeze({ ...rule }))),
    });
  }
}
