/**
 * gentags public API
 */

export { FileCollectorService, NoValidInputError, isExcluded } from './domains/collection/file-collector.service.js';
export type { DirectoryReader } from './domains/collection/file-collector.service.js';
export {
  LanguageProfileService,
  LANGUAGE_PROFILES,
  LANGUAGE_TAGS,
  UnknownLanguageTagError,
} from './domains/languages/language-profile.service.js';
export { ArtifactService, ArtifactError } from './domains/artifacts/artifact.service.js';
export { TagGenerationService } from './domains/generation/tag-generation.service.js';
export type { GenerationReport } from './domains/generation/tag-generation.service.js';
export { IndexerRunner, IndexerError } from './infrastructure/indexers/indexer-runner.js';
export type { CommandExecutor } from './infrastructure/indexers/indexer-runner.js';
export { loadConfig, ConfigValidationError, DEFAULT_CONFIG } from './shared/config/index.js';
export { createLogger } from './shared/logging/index.js';
export type { Logger } from './shared/logging/index.js';
export { UNBOUNDED_DEPTH } from './shared/types/index.js';
export type {
  CollectionResult,
  CollectionStatistics,
  GentagsConfig,
  LanguageTag,
  ScanConfig,
  ScanIssue,
  ScanIssueKind,
} from './shared/types/index.js';
