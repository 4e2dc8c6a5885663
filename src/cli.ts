#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import kleur from 'kleur';
import { ApplyHeadersCommand } from './commands/applyHeadersCommand';
import { BatchReport } from './models/batchReport';
import { CommentStyleRegistry } from './services/commentStyleRegistry';
import { CliOptions, ConfigService } from './services/configService';
import { PathService } from './services/pathService';
import { TemplateCatalog } from './services/templateCatalog';
import { ENV_PREFIX } from './services/variableService';
import { ConfigError, errorMessage } from './shared/errors';
import { Logger } from './shared/utils/logger';

/**
 * license-stamp command line
 *
 * Adds a license header to every supported file below a directory, or
 * replaces the one already there. Without a template, only the years of
 * existing headers are updated.
 */

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const OPTIONS = {
  dir: { type: 'string', short: 'd' },
  tmpl: { type: 'string', short: 't' },
  years: { type: 'string', short: 'y' },
  owner: { type: 'string', short: 'o' },
  projname: { type: 'string', short: 'n' },
  projurl: { type: 'string', short: 'u' },
  exclude: { type: 'string', short: 'x', multiple: true },
  'add-only': { type: 'boolean', short: 'a' },
  'refresh-years': { type: 'boolean', short: 'r' },
  backup: { type: 'boolean', short: 'b' },
  'no-file-name': { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  concurrency: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  version: { type: 'boolean', short: 'V' },
  help: { type: 'boolean', short: 'h' },
} as const;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
};

function usage(catalog: TemplateCatalog | undefined): string {
  const templates = catalog ? catalog.ids.join(', ') : '(unavailable)';
  const languages = CommentStyleRegistry.default
    .languages()
    .map((style) => `  ${style.name}: ${style.extensions.join(' ')}`)
    .join('\n');
  return `Usage: license-stamp [options]

Add or replace license headers in all supported files in or below a directory.

Options:
  -d, --dir <dir>           Directory to process (default: .)
  -t, --tmpl <name|file>    Template name, name fragment or template file
  -y, --years <years>       Year or year range, e.g. 2019-2024
  -o, --owner <name>        Copyright owner
  -n, --projname <name>     Project name
  -u, --projurl <url>       Project URL
  -x, --exclude <pattern>   Skip paths matching a glob or containing a string (repeatable)
  -a, --add-only            Only add headers to files that have none
  -r, --refresh-years       Extend existing year ranges to the current year
  -b, --backup              Copy each file to <file>.bak before changing it
      --no-file-name        Use "This file" instead of the file name for \${file_name}
      --dry-run             Report what would change without writing
  -c, --concurrency <n>     Files processed at once (default: ${ConfigService.DEFAULT_CONCURRENCY})
  -v, --verbose             More output (repeatable)
  -V, --version             Print the version
  -h, --help                Print this help

Variables can also come from ${ENV_PREFIX}<NAME> environment variables
or a ${ConfigService.CONFIG_FILE_NAME} file in the target directory.

Templates: ${templates}

Languages:
${languages}

Example:
  license-stamp -t apache-2 -o "Eager Hacker" -d src`;
}

function readVersion(): string {
  const root = PathService.findPackageRoot();
  if (!root) {
    return 'unknown';
  }
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return 'unknown';
}

function summarize(report: BatchReport, dryRun: boolean): string {
  const verb = dryRun ? 'would update' : 'updated';
  const parts = [`${report.updated.length} ${verb}`, `${report.unchanged.length} unchanged`];
  if (report.failures.length > 0) {
    parts.push(kleur.red(`${report.failures.length} failed`));
  }
  return parts.join(', ');
}

/**
 * Parse arguments into CLI options
 * @throws TypeError on unknown options, ConfigError on bad values
 */
export function parseCliOptions(args: string[]): CliOptions & { verbosity: number; help: boolean; version: boolean } {
  const { values } = parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false });

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`--concurrency must be a positive integer, got "${values.concurrency}"`);
    }
  }

  return {
    dir: values.dir,
    template: values.tmpl,
    years: values.years,
    owner: values.owner,
    projectname: values.projname,
    projecturl: values.projurl,
    exclude: values.exclude ?? [],
    addOnly: values['add-only'],
    refreshYears: values['refresh-years'],
    backup: values.backup,
    includeFileName: values['no-file-name'] ? false : undefined,
    dryRun: values['dry-run'],
    concurrency,
    verbosity: values.verbose?.length ?? 0,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

/**
 * Run the command line
 * @returns Process exit code
 */
export async function run(args: string[], io: CliIo = defaultIo): Promise<number> {
  let options: ReturnType<typeof parseCliOptions>;
  try {
    options = parseCliOptions(args);
  } catch (error) {
    io.err(kleur.red(errorMessage(error)));
    io.err('Run with --help for usage.');
    return EXIT_USAGE;
  }

  const logger = new Logger('license-stamp', Logger.levelForVerbosity(options.verbosity), io.err);

  if (options.version) {
    io.out(readVersion());
    return EXIT_OK;
  }

  try {
    const catalog = await TemplateCatalog.fromDirectory(PathService.builtinTemplatesDir());
    if (options.help) {
      io.out(usage(catalog));
      return EXIT_OK;
    }

    const config = await ConfigService.loadConfig(options);
    const report = await ApplyHeadersCommand.execute(config, { catalog, logger, env: io.env });

    io.out(summarize(report, config.dryRun));
    for (const failure of report.failures) {
      io.err(kleur.red(`  ${failure.path}: ${failure.message}`));
    }
    return report.failures.length > 0 ? EXIT_FAILURE : EXIT_OK;
  } catch (error) {
    logger.error(errorMessage(error));
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
