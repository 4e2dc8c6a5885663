/**
 * Settings for one batch run, merged from CLI flags and the config file
 */
export interface ToolConfig {
  /** Directory to process recursively */
  dir: string;

  /** Template name or path; years-only update when absent */
  template?: string;

  /** Explicit variable values (owner, years, projectname, projecturl) */
  variables: Record<string, string>;

  /** Variable values read from the config file */
  configVariables: Record<string, string>;

  /** Exclude patterns (globs or plain substrings) */
  exclude: string[];

  /** Only add headers to files that have none */
  addOnly: boolean;

  /** Extend existing year ranges to the current year */
  refreshYears: boolean;

  /** Copy each file to <file>.bak before writing */
  backup: boolean;

  /** Substitute the file name for ${file_name} */
  includeFileName: boolean;

  /** Report changes without writing */
  dryRun: boolean;

  /** Maximum number of files processed at once */
  concurrency: number;
}

/**
 * Shape of the optional .licensestamp.json file
 */
export interface ConfigFile {
  owner?: string;
  projectname?: string;
  projecturl?: string;
  template?: string;
  exclude?: string[];
  backup?: boolean;
  addOnly?: boolean;
}
