import { ResolvedVariables, VariableOrigin } from '../models/variableSet';
import { toEnvName } from '../shared/utils/stringUtils';
import { getCurrentYear } from '../utils/dateUtils';

/** Prefix of environment overrides, e.g. LICENSE_STAMP_OWNER */
export const ENV_PREFIX = 'LICENSE_STAMP_';

/** Variables every run knows about */
export const KNOWN_VARIABLES = ['owner', 'years', 'projectname', 'projecturl'] as const;

/** Value used for ${file_name} when file names are turned off */
export const ANONYMOUS_FILE_NAME = 'This file';

/**
 * Value sources, highest precedence first
 */
export interface VariableSources {
  explicit?: Readonly<Record<string, string | undefined>>;
  env?: NodeJS.ProcessEnv;
  config?: Readonly<Record<string, string | undefined>>;
  currentYear?: number;
}

/**
 * Service for resolving template variables before rendering
 */
export class VariableService {
  /**
   * Resolve each name as explicit value > environment override > config file > default.
   * Only `years` has a default (the current year); names without any value are left
   * out so rendering reports them.
   * @param names Variable names to resolve
   * @param sources Value sources
   */
  public static resolve(names: readonly string[], sources: VariableSources): ResolvedVariables {
    const values: Record<string, string> = {};
    const origins: Record<string, VariableOrigin> = {};

    for (const name of names) {
      const resolved = this.resolveOne(name, sources);
      if (resolved) {
        values[name] = resolved.value;
        origins[name] = resolved.origin;
      }
    }

    return { values, origins };
  }

  /**
   * Value for ${file_name}
   * @param baseName File name without directories
   * @param includeFileName Whether to reveal the file name
   */
  public static fileNameValue(baseName: string, includeFileName: boolean): string {
    return includeFileName ? baseName : ANONYMOUS_FILE_NAME;
  }

  private static resolveOne(
    name: string,
    sources: VariableSources,
  ): { value: string; origin: VariableOrigin } | undefined {
    const explicit = sources.explicit?.[name];
    if (explicit !== undefined) {
      return { value: explicit, origin: 'explicit' };
    }

    const fromEnv = sources.env?.[toEnvName(ENV_PREFIX, name)];
    if (fromEnv !== undefined && fromEnv !== '') {
      return { value: fromEnv, origin: 'environment' };
    }

    const fromConfig = sources.config?.[name];
    if (fromConfig !== undefined) {
      return { value: fromConfig, origin: 'config' };
    }

    if (name === 'years') {
      return { value: String(sources.currentYear ?? getCurrentYear()), origin: 'default' };
    }
    return undefined;
  }
}
