/**
 * Runs the external indexing tools over an index file
 *
 * cscope and ctags are treated as opaque: they read the file list and write
 * their databases into the working directory.
 */

import { execa } from 'execa';
import { createLogger, startTimer, type Logger } from '../../shared/logging/index.js';

/**
 * Error thrown when an indexing tool cannot be started or exits with failure
 */
export class IndexerError extends Error {
  constructor(message: string, public readonly command: string, public cause?: unknown) {
    super(message);
    this.name = 'IndexerError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface CommandOptions {
  cwd: string;
}

/**
 * Spawns a command and resolves once it exits successfully
 */
export type CommandExecutor = (
  file: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<void>;

export const execaExecutor: CommandExecutor = async (file, args, options) => {
  await execa(file, [...args], { cwd: options.cwd, stdio: 'inherit' });
};

export interface IndexerCommand {
  name: string;
  file: string;
  args: string[];
}

export function cscopeCommand(indexFile: string): IndexerCommand {
  return { name: 'cscope database', file: 'cscope', args: ['-bkq', '-i', indexFile] };
}

export function ctagsCommand(indexFile: string): IndexerCommand {
  return { name: 'tags file', file: 'ctags', args: ['-L', indexFile] };
}

/**
 * Indexer runner
 */
export class IndexerRunner {
  private logger: Logger;

  constructor(
    private readonly cwd: string,
    logger: Logger = createLogger('info'),
    private readonly executor: CommandExecutor = execaExecutor
  ) {
    this.logger = logger.child('IndexerRunner');
  }

  async runCscope(indexFile: string): Promise<void> {
    await this.run(cscopeCommand(indexFile));
  }

  async runCtags(indexFile: string): Promise<void> {
    await this.run(ctagsCommand(indexFile));
  }

  private async run(command: IndexerCommand): Promise<void> {
    const commandLine = [command.file, ...command.args].join(' ');
    const timer = startTimer(command.file, this.logger);

    this.logger.info(`Generating ${command.name}...`);
    this.logger.debug(`Executing: ${commandLine}`, { cwd: this.cwd });

    try {
      await this.executor(command.file, command.args, { cwd: this.cwd });
    } catch (error) {
      timer.end();
      const message = error instanceof Error ? error.message : String(error);
      throw new IndexerError(`Command execution failed: ${commandLine}: ${message}`, commandLine, error);
    }

    timer.end();
    this.logger.info(`Generation of ${command.name} completed.`);
  }
}
