/**
 * Run configuration
 *
 * Raw options (from the command line or a caller) are validated with zod,
 * merged over DEFAULT_CONFIG and resolved into a frozen GentagsConfig that is
 * passed by value to every service of the run.
 */

import path from 'node:path';
import { z } from 'zod';
import type { GentagsConfig, ScanConfig } from '../types/index.js';
import { UNBOUNDED_DEPTH } from '../types/index.js';
import type { LogLevel } from '../logging/index.js';
import { LanguageProfileService } from '../../domains/languages/language-profile.service.js';

/**
 * Error thrown when configuration input fails validation
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

const configInputSchema = z
  .object({
    dirs: z.array(z.string().min(1, 'Directory paths must not be empty')),
    types: z.array(z.string()),
    exclude: z.array(z.string().min(1, 'Exclusion paths must not be empty')),
    depth: z
      .number()
      .nonnegative()
      .refine((value) => Number.isInteger(value) || value === UNBOUNDED_DEPTH, {
        message: 'Expected a whole number or unlimited depth',
      }),
    indexFile: z.string().min(1),
    configFile: z.string().min(1),
    commandFile: z.string().min(1),
    indexOnly: z.boolean(),
    verbose: z.boolean(),
  })
  .strict();

export type ConfigInput = z.infer<typeof configInputSchema>;

export const DEFAULT_CONFIG: Readonly<ConfigInput> = Object.freeze({
  dirs: [],
  types: ['c_cpp'],
  exclude: [],
  depth: UNBOUNDED_DEPTH,
  indexFile: 'gentags.files',
  configFile: 'gentags.conf',
  commandFile: 'gentags.cmd',
  indexOnly: false,
  verbose: false,
});

/**
 * Human-readable validation errors, empty when the object is valid
 */
export function getConfigValidationErrors(candidate: unknown): string[] {
  const result = configInputSchema.safeParse(candidate);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${field}: ${issue.message}`;
  });
}

export function validateConfigObject(candidate: unknown): candidate is ConfigInput {
  return configInputSchema.safeParse(candidate).success;
}

function uniqueInOrder(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}

/**
 * Build the configuration of one run
 *
 * @param input - Options to apply over DEFAULT_CONFIG; undefined fields keep the default
 * @param cwd - Directory that relative paths are resolved against
 * @throws ConfigValidationError when the merged input is invalid
 * @throws UnknownLanguageTagError when a language tag is not recognized
 */
export function loadConfig(input: Partial<ConfigInput> = {}, cwd: string = process.cwd()): GentagsConfig {
  const merged = {
    dirs: input.dirs ?? DEFAULT_CONFIG.dirs,
    types: input.types ?? DEFAULT_CONFIG.types,
    exclude: input.exclude ?? DEFAULT_CONFIG.exclude,
    depth: input.depth ?? DEFAULT_CONFIG.depth,
    indexFile: input.indexFile ?? DEFAULT_CONFIG.indexFile,
    configFile: input.configFile ?? DEFAULT_CONFIG.configFile,
    commandFile: input.commandFile ?? DEFAULT_CONFIG.commandFile,
    indexOnly: input.indexOnly ?? DEFAULT_CONFIG.indexOnly,
    verbose: input.verbose ?? DEFAULT_CONFIG.verbose,
  };

  const errors = getConfigValidationErrors(merged);
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }

  const languageProfiles = new LanguageProfileService();
  const languages = languageProfiles.resolveTags(merged.types);
  const base = path.resolve(cwd);

  const scan: ScanConfig = Object.freeze({
    roots: Object.freeze(uniqueInOrder(merged.dirs.map((dir) => path.resolve(base, dir)))),
    exclude: Object.freeze(uniqueInOrder(merged.exclude.map((dir) => path.resolve(base, dir)))),
    maxDepth: merged.depth,
    languages: Object.freeze(languages),
    suffixes: Object.freeze(languageProfiles.suffixesFor(languages)),
  });

  return Object.freeze({
    scan,
    cwd: base,
    indexFile: path.resolve(base, merged.indexFile),
    configFile: path.resolve(base, merged.configFile),
    commandFile: path.resolve(base, merged.commandFile),
    indexOnly: merged.indexOnly,
    verbose: merged.verbose,
  });
}

export function formatDepth(depth: number): string {
  return depth === UNBOUNDED_DEPTH ? 'unlimited' : String(depth);
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

/**
 * Lines printed by --show-config
 */
export function describeConfig(config: GentagsConfig): string[] {
  return [
    'Current configuration:',
    `  Directories: ${formatList(config.scan.roots)}`,
    `  Depth: ${formatDepth(config.scan.maxDepth)}`,
    `  Exclude: ${formatList(config.scan.exclude)}`,
    `  Languages: ${formatList(config.scan.languages)}`,
    `  File types: ${config.scan.suffixes.join(' ')}`,
    `  Index file: ${config.indexFile}`,
    `  Config file: ${config.configFile}`,
  ];
}

export interface LogSettings {
  level: LogLevel;
  pretty: boolean;
}

/**
 * Log level from --verbose; GENTAGS_LOG_FORMAT=json switches off pretty output
 */
export function resolveLogSettings(
  verbose: boolean,
  env: NodeJS.ProcessEnv = process.env
): LogSettings {
  return {
    level: verbose ? 'debug' : 'info',
    pretty: env.GENTAGS_LOG_FORMAT?.toLowerCase() !== 'json',
  };
}
