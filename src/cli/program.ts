/**
 * gentags command line
 */

import { readFileSync } from 'node:fs';
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  type OutputConfiguration,
} from 'commander';
import { z } from 'zod';
import {
  loadConfig,
  describeConfig,
  resolveLogSettings,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from '../shared/config/index.js';
import { createLogger, type Logger } from '../shared/logging/index.js';
import { UNBOUNDED_DEPTH, type GentagsConfig } from '../shared/types/index.js';
import {
  ALL_LANGUAGES,
  LANGUAGE_TAGS,
  UnknownLanguageTagError,
} from '../domains/languages/language-profile.service.js';
import { NoValidInputError } from '../domains/collection/file-collector.service.js';
import { TagGenerationService } from '../domains/generation/tag-generation.service.js';
import { IndexerRunner, type CommandExecutor } from '../infrastructure/indexers/indexer-runner.js';

export const PROGRAM_NAME = 'gentags';

/**
 * Parsed command-line options
 */
export interface CliOptions {
  dirs?: string[];
  depth?: number;
  exclude?: string[];
  /** `true` when -t is given without values */
  types?: string[] | true;
  indexFile?: string;
  configFile?: string;
  indexOnly?: boolean;
  clean?: boolean;
  showConfig?: boolean;
  verbose?: boolean;
}

export interface CliDependencies {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Replaces the logger built from --verbose and GENTAGS_LOG_FORMAT */
  logger?: Logger;
  executor?: CommandExecutor;
  output?: OutputConfiguration;
}

const EXAMPLES = `
Examples:
  # Scan src and lib directories for C/C++ files
  $ gentags -d src lib -t c_cpp

  # Exclude specific directories
  $ gentags -d src -e src/test src/deprecated

  # Limit the scan depth
  $ gentags -d src/core --depth 2

  # Generate only the index file
  $ gentags -d src -i

  # Show the current configuration
  $ gentags -d src -s

  # Clean generated files
  $ gentags -c`;

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJson = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  return packageJsonSchema.parse(JSON.parse(packageJson)).version;
}

/**
 * `--depth` accepts a whole number or "unlimited"
 */
export function parseDepth(value: string): number {
  const depth = value.trim().toLowerCase();
  if (depth === 'unlimited') {
    return UNBOUNDED_DEPTH;
  }
  if (!/^\d+$/.test(depth)) {
    throw new InvalidArgumentError('Depth must be a whole number or "unlimited".');
  }
  return Number(depth);
}

/**
 * Exit status: 2 for input the user has to correct, 1 for runtime failures
 */
export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ConfigValidationError ||
    error instanceof UnknownLanguageTagError ||
    error instanceof NoValidInputError
  ) {
    return 2;
  }
  return 1;
}

export function createProgram(
  action: (options: CliOptions) => Promise<void>,
  output?: OutputConfiguration
): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Generate cscope database and ctags files for code navigation')
    .version(readVersion())
    .option('-d, --dirs <dirs...>', 'Directories to scan')
    .option('--depth <depth>', 'Maximum directory depth for scanning (default: unlimited)', parseDepth)
    .option('-e, --exclude <paths...>', 'Directories to exclude from scanning')
    .option(
      '-t, --types [types...]',
      `Programming languages to include (default: ${DEFAULT_CONFIG.types.join(' ')}; ` +
        `without values: all). Available options: ${[...LANGUAGE_TAGS, ALL_LANGUAGES].join(', ')}`
    )
    .option('-f, --index-file <path>', `Index file path (default: ${DEFAULT_CONFIG.indexFile})`)
    .option('-o, --config-file <path>', `Config file path (default: ${DEFAULT_CONFIG.configFile})`)
    .option('-i, --index-only', 'Only generate index file without tags')
    .option('-c, --clean', 'Clean all generated files')
    .option('-s, --show-config', 'Show current configuration')
    .option('-v, --verbose', 'Enable verbose logging')
    .addHelpText('after', EXAMPLES)
    .exitOverride()
    .action(async (options: CliOptions) => {
      await action(options);
    });

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

async function execute(
  options: CliOptions,
  argv: readonly string[],
  dependencies: CliDependencies
): Promise<number> {
  const verbose = options.verbose ?? false;
  const settings = resolveLogSettings(verbose, dependencies.env ?? process.env);
  const logger = dependencies.logger ?? createLogger(settings.level, settings.pretty);

  let service: TagGenerationService;
  let config: GentagsConfig;
  try {
    config = loadConfig(
      {
        dirs: options.dirs,
        depth: options.depth,
        exclude: options.exclude,
        types: options.types === true ? [] : options.types,
        indexFile: options.indexFile,
        configFile: options.configFile,
        indexOnly: options.indexOnly,
        verbose,
      },
      dependencies.cwd ?? process.cwd()
    );
    service = new TagGenerationService(config, {
      logger,
      indexers: new IndexerRunner(config.cwd, logger, dependencies.executor),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message, verbose && error instanceof Error ? error : undefined);
    return exitCodeFor(error);
  }

  // the service logs its own failures
  try {
    if (options.clean) {
      await service.clean();
    } else if (options.showConfig) {
      describeConfig(config).forEach((line) => logger.info(line));
    } else {
      await service.generate([PROGRAM_NAME, ...argv]);
    }
    return 0;
  } catch (error) {
    return exitCodeFor(error);
  }
}

/**
 * Parse the arguments (without the node executable and script) and run
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (options) => {
    exitCode = await execute(options, argv, dependencies);
  }, dependencies.output);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}
