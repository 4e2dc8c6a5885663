/**
 * Block comment syntax (e.g. C-like "/* ... *\/")
 */
export interface BlockCommentSyntax {
  kind: 'block';

  /** Opening delimiter, written on its own line (e.g. "/*") */
  start: string;

  /** Closing delimiter, written on its own line (e.g. " *\/") */
  end: string;

  /** Prefix for each body line (e.g. " *"), empty when body lines are left bare */
  bodyPrefix: string;
}

/**
 * Line comment syntax (e.g. Python-like "#")
 */
export interface LineCommentSyntax {
  kind: 'line';

  /** Prefix written at the start of every header line (e.g. "#") */
  prefix: string;
}

export type CommentSyntax = BlockCommentSyntax | LineCommentSyntax;

/**
 * Leading line that must stay on top of the file (shebang, encoding declaration)
 */
export interface KeepLinePattern {
  /** Rule name, used in debug output */
  name: string;

  /** Pattern tested against the raw line */
  pattern: RegExp;

  /** Highest 0-based line index this rule may match */
  maxLine: number;

  /** Whether the rule may consume several consecutive lines */
  repeat?: boolean;
}

/**
 * Comment rules for one language
 */
export interface CommentStyle {
  /** Language identifier (e.g. "python") */
  languageId: string;

  /** Display name for help output */
  name: string;

  /** File extensions handled by this style, lower case with leading dot */
  extensions: readonly string[];

  /** Comment delimiters used to wrap the header */
  comment: CommentSyntax;

  /** Keep-line rules, applied in order */
  keepLinePatterns: readonly KeepLinePattern[];
}
