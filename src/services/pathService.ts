import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import { normalizePathSeparators } from '../shared/utils/stringUtils';

const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * Service for locating the package and the files to process
 */
export class PathService {
  /**
   * Find the directory holding this package's package.json
   * @param currentPath Path to start searching from
   */
  public static findPackageRoot(currentPath: string = __dirname): string | null {
    let dir = currentPath;
    const root = path.parse(dir).root;

    while (true) {
      const manifest = path.join(dir, 'package.json');
      const templates = path.join(dir, 'templates');
      if (fs.existsSync(manifest) && fs.existsSync(templates)) {
        return dir;
      }

      if (dir === root) {
        break;
      }
      dir = path.dirname(dir);
    }

    return null;
  }

  /**
   * Directory of the built-in templates
   */
  public static builtinTemplatesDir(): string {
    const packageRoot = this.findPackageRoot();
    if (!packageRoot) {
      throw new Error(`Could not locate the templates directory from ${__dirname}`);
    }
    return path.join(packageRoot, 'templates');
  }

  /**
   * List files below a directory with one of the given extensions
   * @param dir Directory to search
   * @param extensions Extensions with leading dot, lower case
   * @returns Paths relative to dir with forward slashes, sorted
   */
  public static async discoverFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
    const wanted = new Set(extensions);
    const files = await glob('**/*', {
      cwd: dir,
      nodir: true,
      dot: false,
      ignore: ['**/node_modules/**', '**/.git/**', '**/*.bak'],
    });

    return files
      .map(normalizePathSeparators)
      .filter((file) => wanted.has(path.extname(file).toLowerCase()))
      .sort();
  }

  /**
   * Whether a relative path matches an exclude pattern.
   * Patterns with glob characters are matched with minimatch, others as plain substrings.
   */
  public static isExcluded(relativePath: string, patterns: readonly string[]): boolean {
    const file = normalizePathSeparators(relativePath);
    return patterns.some((pattern) =>
      GLOB_CHARS.test(pattern)
        ? minimatch(file, pattern, { dot: true, matchBase: !pattern.includes('/') })
        : file.includes(pattern),
    );
  }
}
