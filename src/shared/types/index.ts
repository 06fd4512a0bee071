/**
 * Shared type definitions
 */

/**
 * Languages whose source files can be collected
 */
export type LanguageTag = 'c_cpp' | 'python' | 'javascript' | 'typescript';

/**
 * Tag accepted on input that stands for every LanguageTag
 */
export type AllLanguagesTag = 'all';

/**
 * Sentinel for "no depth limit"
 */
export const UNBOUNDED_DEPTH = Number.POSITIVE_INFINITY;

/**
 * What to scan and how to filter it
 */
export interface ScanConfig {
  /** Absolute, distinct scan roots in request order */
  readonly roots: readonly string[];
  /** Absolute, normalized exclusion prefixes */
  readonly exclude: readonly string[];
  /** Directory levels traversed below each root; UNBOUNDED_DEPTH for no limit */
  readonly maxDepth: number;
  readonly languages: readonly LanguageTag[];
  /** Union of the suffixes of `languages` */
  readonly suffixes: readonly string[];
}

/**
 * Complete configuration of one gentags run
 */
export interface GentagsConfig {
  readonly scan: ScanConfig;
  readonly cwd: string;
  readonly indexFile: string;
  readonly configFile: string;
  readonly commandFile: string;
  readonly indexOnly: boolean;
  readonly verbose: boolean;
}

export type ScanIssueKind = 'DirectoryNotFound' | 'PermissionDenied' | 'ReadError';

/**
 * Recoverable problem met while scanning; the scan goes on
 */
export interface ScanIssue {
  kind: ScanIssueKind;
  path: string;
  message: string;
}

export interface CollectionStatistics {
  directoriesVisited: number;
  filesVisited: number;
  matchedFiles: number;
  /** Directories and files skipped because of an exclusion prefix */
  excludedPaths: number;
  /** Matches dropped because an overlapping root had already produced them */
  duplicatesRemoved: number;
}

export interface CollectionResult {
  /** Sorted absolute paths, no duplicates */
  files: string[];
  issues: ScanIssue[];
  statistics: CollectionStatistics;
}
