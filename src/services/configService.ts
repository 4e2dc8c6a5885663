import * as fs from 'fs';
import * as path from 'path';
import { ConfigFile, ToolConfig } from '../models/toolConfig';
import { ConfigError, errorMessage } from '../shared/errors';

/**
 * Options given on the command line
 */
export interface CliOptions {
  dir?: string;
  template?: string;
  years?: string;
  owner?: string;
  projectname?: string;
  projecturl?: string;
  exclude?: string[];
  addOnly?: boolean;
  refreshYears?: boolean;
  backup?: boolean;
  includeFileName?: boolean;
  dryRun?: boolean;
  concurrency?: number;
}

/**
 * Service for loading and validating run configuration
 */
export class ConfigService {
  public static readonly CONFIG_FILE_NAME = '.licensestamp.json';
  public static readonly DEFAULT_CONCURRENCY = 8;

  private static readonly STRING_FIELDS = ['owner', 'projectname', 'projecturl', 'template'] as const;
  private static readonly BOOLEAN_FIELDS = ['backup', 'addOnly'] as const;

  /**
   * Merge command-line options with the config file of the target directory.
   * Command-line values win over the file.
   * @param options Parsed command-line options
   */
  public static async loadConfig(options: CliOptions): Promise<ToolConfig> {
    const dir = path.resolve(options.dir ?? '.');
    const file = await this.readConfigFile(path.join(dir, this.CONFIG_FILE_NAME));

    const concurrency = options.concurrency ?? this.DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const variables: Record<string, string> = {};
    for (const name of ['owner', 'years', 'projectname', 'projecturl'] as const) {
      const value = options[name];
      if (value !== undefined) {
        variables[name] = value;
      }
    }

    const configVariables: Record<string, string> = {};
    for (const name of ['owner', 'projectname', 'projecturl'] as const) {
      const value = file[name];
      if (value !== undefined) {
        configVariables[name] = value;
      }
    }

    return {
      dir,
      template: options.template ?? file.template,
      variables,
      configVariables,
      exclude: [...(file.exclude ?? []), ...(options.exclude ?? [])],
      addOnly: options.addOnly ?? file.addOnly ?? false,
      refreshYears: options.refreshYears ?? false,
      backup: options.backup ?? file.backup ?? false,
      includeFileName: options.includeFileName ?? true,
      dryRun: options.dryRun ?? false,
      concurrency,
    };
  }

  /**
   * Read and validate a config file; a missing file is an empty config
   * @param filePath Path of the JSON file
   */
  public static async readConfigFile(filePath: string): Promise<ConfigFile> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`);
    }
    return this.validate(parsed, filePath);
  }

  /**
   * Check the shape of a parsed config file
   */
  public static validate(value: unknown, source: string): ConfigFile {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ConfigError(`${source}: expected a JSON object`);
    }
    const raw = new Map<string, unknown>(Object.entries(value));
    const config: ConfigFile = {};

    for (const field of this.STRING_FIELDS) {
      const fieldValue = raw.get(field);
      if (fieldValue === undefined) {
        continue;
      }
      if (typeof fieldValue !== 'string') {
        throw new ConfigError(`${source}: "${field}" must be a string`);
      }
      config[field] = fieldValue;
    }

    for (const field of this.BOOLEAN_FIELDS) {
      const fieldValue = raw.get(field);
      if (fieldValue === undefined) {
        continue;
      }
      if (typeof fieldValue !== 'boolean') {
        throw new ConfigError(`${source}: "${field}" must be a boolean`);
      }
      config[field] = fieldValue;
    }

    const exclude = raw.get('exclude');
    if (exclude !== undefined) {
      if (!Array.isArray(exclude) || !exclude.every((item): item is string => typeof item === 'string')) {
        throw new ConfigError(`${source}: "exclude" must be an array of strings`);
      }
      config.exclude = exclude;
    }

    const known = new Set<string>([...this.STRING_FIELDS, ...this.BOOLEAN_FIELDS, 'exclude']);
    const unknown = [...raw.keys()].filter((key) => !known.has(key));
    if (unknown.length > 0) {
      throw new ConfigError(`${source}: unknown field(s) ${unknown.join(', ')}`);
    }

    return config;
  }
}
