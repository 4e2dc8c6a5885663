/**
 * Base class for errors raised by license-stamp
 */
export class LicenseStampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A template placeholder has no value from any source
 */
export class MissingVariableError extends LicenseStampError {
  public readonly variable: string;

  constructor(variable: string) {
    super(`No value for template variable "${variable}"`);
    this.variable = variable;
  }
}

/**
 * No comment style is registered for a language or extension
 */
export class UnsupportedLanguageError extends LicenseStampError {
  public readonly languageId: string;

  constructor(languageId: string) {
    super(`No comment style registered for "${languageId}"`);
    this.languageId = languageId;
  }
}

/**
 * A template name matched no template, or more than one
 */
export class TemplateResolutionError extends LicenseStampError {
  public readonly templateName: string;
  public readonly candidates: readonly string[];

  constructor(templateName: string, candidates: readonly string[], ambiguous: boolean) {
    super(
      ambiguous
        ? `Template name "${templateName}" is ambiguous: ${candidates.join(', ')}`
        : `"${templateName}" is neither a built-in template nor a file. Built-in templates: ${candidates.join(', ')}`,
    );
    this.templateName = templateName;
    this.candidates = candidates;
  }
}

/**
 * Invalid configuration file or option value
 */
export class ConfigError extends LicenseStampError {}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
