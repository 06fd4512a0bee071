/**
 * File Collector Service
 *
 * Walks the scan roots up to the configured depth and returns the sorted,
 * deduplicated list of source files whose names match the requested languages.
 * Traversal is synchronous and read-only. Missing roots and unreadable
 * subtrees are returned as ScanIssues; the scan carries on with the rest.
 */

import fs from 'node:fs';
import path from 'node:path';
import type {
  CollectionResult,
  CollectionStatistics,
  ScanConfig,
  ScanIssue,
  ScanIssueKind,
} from '../../shared/types/index.js';
import { createLogger, type Logger } from '../../shared/logging/index.js';
import { matchesSuffix } from '../languages/language-profile.service.js';

/**
 * Error thrown when not a single requested root can be scanned
 */
export class NoValidInputError extends Error {
  constructor(message: string, public readonly issues: ScanIssue[] = []) {
    super(message);
    this.name = 'NoValidInputError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Filesystem access used by the collector
 */
export interface DirectoryReader {
  readDirectory(directory: string): fs.Dirent[];
  /** Follows symlinks */
  stat(target: string): fs.Stats;
}

export const nodeDirectoryReader: DirectoryReader = {
  readDirectory: (directory) => fs.readdirSync(directory, { withFileTypes: true }),
  stat: (target) => fs.statSync(target),
};

/**
 * Whether `candidate` equals one of the prefixes or lies below it
 */
export function isExcluded(candidate: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => {
    if (candidate === prefix) {
      return true;
    }
    const directoryPrefix = prefix.endsWith(path.sep) ? prefix : prefix + path.sep;
    return candidate.startsWith(directoryPrefix);
  });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function issueKindFor(code: string | undefined): ScanIssueKind {
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'DirectoryNotFound';
    case 'EACCES':
    case 'EPERM':
      return 'PermissionDenied';
    default:
      return 'ReadError';
  }
}

interface WalkState {
  scan: ScanConfig;
  matched: Set<string>;
  issues: ScanIssue[];
  statistics: CollectionStatistics;
}

/**
 * File Collector Service
 */
export class FileCollectorService {
  private logger: Logger;
  private reader: DirectoryReader;

  constructor(logger: Logger = createLogger('info'), reader: DirectoryReader = nodeDirectoryReader) {
    this.logger = logger.child('FileCollectorService');
    this.reader = reader;
  }

  /**
   * Collect the source files selected by a scan configuration
   *
   * @throws NoValidInputError when there are no roots, or none of them exists
   */
  collect(scan: ScanConfig): CollectionResult {
    if (scan.roots.length === 0) {
      throw new NoValidInputError('No directories to scan');
    }

    const state: WalkState = {
      scan,
      matched: new Set<string>(),
      issues: [],
      statistics: {
        directoriesVisited: 0,
        filesVisited: 0,
        matchedFiles: 0,
        excludedPaths: 0,
        duplicatesRemoved: 0,
      },
    };

    let validRoots = 0;

    for (const root of scan.roots) {
      const rootIssue = this.inspectRoot(root);
      if (rootIssue) {
        this.report(state, rootIssue);
      }
      if (rootIssue?.kind === 'DirectoryNotFound') {
        continue;
      }

      // an existing root counts even when it cannot be read
      validRoots++;
      if (!rootIssue) {
        this.logger.debug('Scanning root directory', { root, maxDepth: scan.maxDepth });
        this.walk(root, 0, state);
      }
    }

    if (validRoots === 0) {
      throw new NoValidInputError('No valid directories to scan', state.issues);
    }

    const files = Array.from(state.matched).sort();
    state.statistics.matchedFiles = files.length;

    if (files.length === 0) {
      this.logger.warn('No source files found. Check your directories and filters.', {
        roots: scan.roots,
        languages: scan.languages,
      });
    } else {
      this.logger.debug('File collection completed', { ...state.statistics });
    }

    return { files, issues: state.issues, statistics: state.statistics };
  }

  private inspectRoot(root: string): ScanIssue | null {
    try {
      const stats = this.reader.stat(root);
      if (!stats.isDirectory()) {
        return { kind: 'DirectoryNotFound', path: root, message: `Not a directory: ${root}` };
      }
      return null;
    } catch (error) {
      const kind = issueKindFor(errorCode(error));
      const message =
        kind === 'DirectoryNotFound' ? `Directory not found: ${root}` : errorMessage(error);
      return { kind, path: root, message };
    }
  }

  private walk(directory: string, level: number, state: WalkState): void {
    if (isExcluded(directory, state.scan.exclude)) {
      state.statistics.excludedPaths++;
      this.logger.debug('Skipping excluded directory', { directory });
      return;
    }

    let entries: fs.Dirent[];
    try {
      entries = this.reader.readDirectory(directory);
    } catch (error) {
      this.report(state, {
        kind: issueKindFor(errorCode(error)),
        path: directory,
        message: errorMessage(error),
      });
      return;
    }

    state.statistics.directoriesVisited++;
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (level < state.scan.maxDepth) {
          this.walk(fullPath, level + 1, state);
        }
      } else if (entry.isFile() || (entry.isSymbolicLink() && this.isRegularFile(fullPath))) {
        this.visitFile(fullPath, entry.name, state);
      }
    }
  }

  private visitFile(filePath: string, fileName: string, state: WalkState): void {
    state.statistics.filesVisited++;

    if (isExcluded(filePath, state.scan.exclude)) {
      state.statistics.excludedPaths++;
      return;
    }

    if (!matchesSuffix(fileName, state.scan.suffixes)) {
      return;
    }

    if (state.matched.has(filePath)) {
      state.statistics.duplicatesRemoved++;
      return;
    }

    state.matched.add(filePath);
  }

  private isRegularFile(target: string): boolean {
    try {
      return this.reader.stat(target).isFile();
    } catch (error) {
      this.logger.debug('Skipping unresolvable symlink', {
        path: target,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private report(state: WalkState, issue: ScanIssue): void {
    state.issues.push(issue);
    this.logger.warn(issue.message, { kind: issue.kind, path: issue.path });
  }
}
