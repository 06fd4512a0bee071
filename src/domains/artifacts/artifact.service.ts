/**
 * Artifact Service
 *
 * Writes the files produced by a run (index file, config record, saved
 * command line) and removes them, together with the cscope and ctags
 * databases, on clean.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { GentagsConfig } from '../../shared/types/index.js';
import { formatDepth } from '../../shared/config/index.js';
import { createLogger, type Logger } from '../../shared/logging/index.js';
import { NoValidInputError } from '../collection/file-collector.service.js';

/**
 * Databases written by cscope -bkq and ctags, relative to the working directory
 */
export const INDEXER_OUTPUT_FILES: readonly string[] = Object.freeze([
  'cscope.out',
  'cscope.in.out',
  'cscope.po.out',
  'tags',
]);

/**
 * Error thrown when an artifact cannot be written or removed
 */
export class ArtifactError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'ArtifactError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Index file contents: one path per line
 */
export function renderIndexFile(files: readonly string[]): string {
  return files.map((file) => `${file}\n`).join('');
}

/**
 * INI-style record of the run settings
 */
export function renderConfigFile(config: GentagsConfig): string {
  const { scan } = config;
  let content = '[global]\n';
  content += `filetype = ${scan.suffixes.join(' ')}\n`;
  content += `depth = ${formatDepth(scan.maxDepth)}\n\n`;

  content += '[dirs]\n';
  for (const root of scan.roots) {
    content += `path = ${root}\n`;
  }
  content += '\n';

  if (scan.exclude.length > 0) {
    content += '[exclude_dirs]\n';
    for (const prefix of scan.exclude) {
      content += `path = ${prefix}\n`;
    }
  }

  return content;
}

export function renderCommandLine(argv: readonly string[]): string {
  return `${argv.join(' ')}\n`;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Artifact Service
 */
export class ArtifactService {
  private logger: Logger;

  constructor(private readonly config: GentagsConfig, logger: Logger = createLogger('info')) {
    this.logger = logger.child('ArtifactService');
  }

  async writeIndexFile(files: readonly string[]): Promise<string> {
    this.logger.info('Generating index file...', { fileCount: files.length });
    await this.write(this.config.indexFile, renderIndexFile(files));
    this.logger.info(`Index file generated: ${this.config.indexFile}`);
    return this.config.indexFile;
  }

  /**
   * @throws NoValidInputError when the configuration has no roots
   */
  async writeConfigFile(): Promise<string> {
    if (this.config.scan.roots.length === 0) {
      throw new NoValidInputError('No valid directories to scan');
    }

    this.logger.info('Generating config file...');
    await this.write(this.config.configFile, renderConfigFile(this.config));
    this.logger.info(`Config file generated: ${this.config.configFile}`);
    return this.config.configFile;
  }

  async writeCommandFile(argv: readonly string[]): Promise<string> {
    this.logger.debug('Saving user command...', { commandFile: this.config.commandFile });
    await this.write(this.config.commandFile, renderCommandLine(argv));
    this.logger.info(`User command saved: ${this.config.commandFile}`);
    return this.config.commandFile;
  }

  /**
   * Remove every generated file that exists
   *
   * @returns The removed paths, in removal order
   */
  async clean(): Promise<string[]> {
    this.logger.info('Cleaning generated files...');

    const candidates = [
      this.config.indexFile,
      this.config.configFile,
      this.config.commandFile,
      ...INDEXER_OUTPUT_FILES.map((file) => path.join(this.config.cwd, file)),
    ];
    const removed: string[] = [];

    for (const candidate of candidates) {
      try {
        await rm(candidate);
        removed.push(candidate);
        this.logger.info(`Removed: ${candidate}`);
      } catch (error) {
        if (isMissingFileError(error)) {
          continue;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ArtifactError(`Failed to remove ${candidate}: ${message}`, error);
      }
    }

    this.logger.info('Clean completed.', { removedCount: removed.length });
    return removed;
  }

  private async write(target: string, content: string): Promise<void> {
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ArtifactError(`Failed to write ${target}: ${message}`, error);
    }
  }
}
