/**
 * Normalize path separators to forward slashes
 */
export function normalizePathSeparators(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Normalize an extension to lower case with a leading dot
 * Example: "PY" -> ".py"
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Environment variable name for a template variable
 * Example: "projectname" -> "LICENSE_STAMP_PROJECTNAME"
 */
export function toEnvName(prefix: string, variable: string): string {
  return `${prefix}${variable.replace(/[^A-Za-z0-9]/g, '_').toUpperCase()}`;
}
