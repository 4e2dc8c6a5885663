/**
 * Header template with `${name}` placeholders
 */
export interface HeaderTemplate {
  /** Template identifier (file base name for built-ins) */
  id: string;

  /** Display name */
  name: string;

  /** Raw template text */
  content: string;

  /** Where the template was loaded from */
  source: 'builtin' | 'file' | 'inline';
}
