import * as fs from 'fs';
import * as path from 'path';
import { BatchReport } from '../models/batchReport';
import { CommentStyle } from '../models/commentStyle';
import { FileTransformResult } from '../models/fileTransformResult';
import { HeaderTemplate } from '../models/headerTemplate';
import { ToolConfig } from '../models/toolConfig';
import { ResolvedVariables } from '../models/variableSet';
import { ConfigError, errorMessage, UnsupportedLanguageError } from '../shared/errors';
import { Logger } from '../shared/utils/logger';
import { CommentStyleRegistry } from '../services/commentStyleRegistry';
import { HeaderUpdateService } from '../services/headerUpdateService';
import { PathService } from '../services/pathService';
import { TemplateCatalog } from '../services/templateCatalog';
import { TemplateService } from '../services/templateService';
import { KNOWN_VARIABLES, VariableService } from '../services/variableService';
import { getCurrentYear } from '../utils/dateUtils';

/**
 * Collaborators of a batch run
 */
export interface ApplyHeadersContext {
  catalog: TemplateCatalog;
  registry?: CommentStyleRegistry;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  currentYear?: number;
}

type FileOutcome = 'updated' | 'unchanged';

/**
 * Command that adds or updates headers in every supported file below a directory
 */
export class ApplyHeadersCommand {
  /**
   * Run over the configured directory.
   * Files are handled independently; a failure is recorded and the rest go on.
   * @param config Run configuration
   * @param context Template catalog and optional overrides
   */
  public static async execute(config: ToolConfig, context: ApplyHeadersContext): Promise<BatchReport> {
    const registry = context.registry ?? CommentStyleRegistry.default;
    const logger = (context.logger ?? new Logger('license-stamp')).child('apply');
    const currentYear = context.currentYear ?? getCurrentYear();

    const template = config.template ? await context.catalog.resolve(config.template) : undefined;
    if (template) {
      logger.info(`Using template ${template.name}`);
    }

    const names = template
      ? [...new Set<string>([...KNOWN_VARIABLES, ...TemplateService.placeholders(template.content)])]
      : [...KNOWN_VARIABLES];
    const variables = VariableService.resolve(names, {
      explicit: config.variables,
      env: context.env ?? process.env,
      config: config.configVariables,
      currentYear,
    });
    if (!template && variables.origins.years === 'default' && !config.refreshYears) {
      throw new ConfigError('No template given and no years to update, nothing to do');
    }

    logger.debug(`Processing directory ${config.dir}`);
    const files = (await PathService.discoverFiles(config.dir, registry.extensions())).filter((file) => {
      const excluded = PathService.isExcluded(file, config.exclude);
      if (excluded) {
        logger.debug(`Excluded ${file}`);
      }
      return !excluded;
    });
    logger.info(`Found ${files.length} file(s) to check`);

    const report: BatchReport = { updated: [], unchanged: [], failures: [] };
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < files.length) {
        const file = files[next++];
        try {
          const outcome = await this.processFile(file, config, registry, template, variables, currentYear, logger);
          report[outcome].push(file);
        } catch (error) {
          logger.error(`Failed to process ${file}: ${errorMessage(error)}`);
          report.failures.push({ path: file, message: errorMessage(error) });
        }
      }
    };
    await Promise.all(Array.from({ length: Math.min(config.concurrency, files.length) }, worker));

    report.updated.sort();
    report.unchanged.sort();
    report.failures.sort((a, b) => a.path.localeCompare(b.path));
    return report;
  }

  /**
   * Read, transform and write back one file
   */
  private static async processFile(
    file: string,
    config: ToolConfig,
    registry: CommentStyleRegistry,
    template: HeaderTemplate | undefined,
    variables: ResolvedVariables,
    currentYear: number,
    logger: Logger,
  ): Promise<FileOutcome> {
    const extension = path.extname(file);
    const style = registry.lookupByExtension(extension);
    if (!style) {
      throw new UnsupportedLanguageError(extension);
    }

    const absolutePath = path.join(config.dir, file);
    const original = await fs.promises.readFile(absolutePath, 'utf8');
    const result = this.transform(original, file, style, config, template, variables, currentYear);
    if (!result.changed) {
      logger.debug(`Unchanged ${file}`);
      return 'unchanged';
    }

    if (config.dryRun) {
      logger.info(`Would update ${file}`);
      return 'updated';
    }
    if (config.backup) {
      await fs.promises.copyFile(absolutePath, `${absolutePath}.bak`);
    }
    await fs.promises.writeFile(absolutePath, result.newContent, 'utf8');
    logger.info(`Updated ${file}`);
    return 'updated';
  }

  private static transform(
    original: string,
    file: string,
    style: CommentStyle,
    config: ToolConfig,
    template: HeaderTemplate | undefined,
    variables: ResolvedVariables,
    currentYear: number,
  ): FileTransformResult {
    const yearsExplicit = variables.origins.years !== undefined && variables.origins.years !== 'default';

    if (!template) {
      return HeaderUpdateService.updateYears(original, style, {
        years: yearsExplicit ? variables.values.years : undefined,
        refreshYears: config.refreshYears,
        currentYear,
      });
    }

    const values = {
      ...variables.values,
      file_name: VariableService.fileNameValue(path.basename(file), config.includeFileName),
    };
    return HeaderUpdateService.update(original, style, template, values, {
      mode: config.addOnly ? 'addOnly' : 'replace',
      yearsExplicit,
      refreshYears: config.refreshYears,
      currentYear,
    });
  }
}
