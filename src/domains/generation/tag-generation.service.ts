/**
 * Tag Generation Service
 *
 * Sequences one run:
 * - Command and config records
 * - File collection
 * - Index file
 * - cscope and ctags over the index file (unless index-only)
 */

import type {
  CollectionStatistics,
  GentagsConfig,
  ScanIssue,
} from '../../shared/types/index.js';
import { createLogger, startTimer, type Logger } from '../../shared/logging/index.js';
import { FileCollectorService } from '../collection/file-collector.service.js';
import { ArtifactService } from '../artifacts/artifact.service.js';
import { IndexerRunner } from '../../infrastructure/indexers/indexer-runner.js';

/**
 * Outcome of a generation run
 */
export interface GenerationReport {
  indexFile: string;
  files: string[];
  issues: ScanIssue[];
  statistics: CollectionStatistics;
  /** False when the run stopped after the index file */
  indexersRun: boolean;
  durationMs: number;
}

export interface TagGenerationDependencies {
  logger?: Logger;
  collector?: FileCollectorService;
  artifacts?: ArtifactService;
  indexers?: IndexerRunner;
}

/**
 * Tag generation service
 */
export class TagGenerationService {
  private logger: Logger;
  private collector: FileCollectorService;
  private artifacts: ArtifactService;
  private indexers: IndexerRunner;

  constructor(private readonly config: GentagsConfig, dependencies: TagGenerationDependencies = {}) {
    const logger = dependencies.logger ?? createLogger(config.verbose ? 'debug' : 'info');
    this.logger = logger.child('TagGenerationService');
    this.collector = dependencies.collector ?? new FileCollectorService(logger);
    this.artifacts = dependencies.artifacts ?? new ArtifactService(config, logger);
    this.indexers = dependencies.indexers ?? new IndexerRunner(config.cwd, logger);
  }

  /**
   * Run the whole pipeline
   *
   * @param argv - Command line recorded in the command file
   */
  async generate(argv: readonly string[]): Promise<GenerationReport> {
    const overallTimer = startTimer('generate', this.logger);
    const { scan } = this.config;

    this.logger.debug('Starting tag generation', {
      roots: scan.roots,
      exclude: scan.exclude,
      maxDepth: scan.maxDepth,
      languages: scan.languages,
    });

    try {
      await this.artifacts.writeCommandFile(argv);
      await this.artifacts.writeConfigFile();

      const collectTimer = startTimer('collect', this.logger);
      const { files, issues, statistics } = this.collector.collect(scan);
      collectTimer.end();

      this.logger.info('File collection completed', {
        matchedFiles: statistics.matchedFiles,
        filesVisited: statistics.filesVisited,
        issueCount: issues.length,
      });

      const indexFile = await this.artifacts.writeIndexFile(files);

      if (this.config.indexOnly) {
        this.logger.info('Index file generation completed. Skipping cscope and ctags generation.');
        return {
          indexFile,
          files,
          issues,
          statistics,
          indexersRun: false,
          durationMs: overallTimer.end(),
        };
      }

      await this.indexers.runCscope(indexFile);
      await this.indexers.runCtags(indexFile);

      this.logger.info('All operations completed successfully!');
      return {
        indexFile,
        files,
        issues,
        statistics,
        indexersRun: true,
        durationMs: overallTimer.end(),
      };
    } catch (error) {
      overallTimer.end();
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(errorMessage, error instanceof Error ? error : undefined, {
        roots: scan.roots,
      });
      throw error;
    }
  }

  /**
   * Remove generated files
   */
  async clean(): Promise<string[]> {
    try {
      return await this.artifacts.clean();
    } catch (error) {
      this.logger.error(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
      throw error;
    }
  }
}
