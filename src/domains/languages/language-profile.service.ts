/**
 * Language Profile Service
 *
 * Maps language tags to the file-name suffixes collected for them.
 * Supports: C/C++, Python, JavaScript, TypeScript
 */

import path from 'node:path';
import type { AllLanguagesTag, LanguageTag } from '../../shared/types/index.js';

/**
 * Canonical order of the supported tags
 */
export const LANGUAGE_TAGS: readonly LanguageTag[] = Object.freeze([
  'c_cpp',
  'python',
  'javascript',
  'typescript',
]);

export const ALL_LANGUAGES: AllLanguagesTag = 'all';

/**
 * Suffixes per language. Matching is case-sensitive: `.C` and `.c` are both listed.
 */
export const LANGUAGE_PROFILES: Readonly<Record<LanguageTag, readonly string[]>> = Object.freeze({
  c_cpp: Object.freeze(['.c', '.h', '.cpp', '.hpp', '.cxx', '.hxx', '.cc', '.hh', '.C', '.H', '.S', '.s']),
  python: Object.freeze(['.py', '.pyw', '.pyx', '.pxd', '.pxi']),
  javascript: Object.freeze(['.js', '.jsx', '.mjs', '.cjs']),
  typescript: Object.freeze(['.ts', '.tsx', '.mts', '.cts']),
});

/**
 * Error thrown when a requested language tag is not recognized
 */
export class UnknownLanguageTagError extends Error {
  constructor(public readonly tag: string) {
    super(
      `Unknown language type '${tag}'. Expected one of: ${[...LANGUAGE_TAGS, ALL_LANGUAGES].join(', ')}`
    );
    this.name = 'UnknownLanguageTagError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isLanguageTag(value: string): value is LanguageTag {
  return (LANGUAGE_TAGS as readonly string[]).includes(value);
}

/**
 * Language Profile Service
 */
export class LanguageProfileService {
  /**
   * Resolve requested tags into distinct LanguageTags in canonical order.
   * `all`, or no tag at all, selects every language.
   *
   * @throws UnknownLanguageTagError for any unrecognized tag
   */
  resolveTags(requested: readonly string[]): LanguageTag[] {
    const selected = new Set<LanguageTag>();

    for (const tag of requested) {
      if (tag === ALL_LANGUAGES) {
        LANGUAGE_TAGS.forEach((language) => selected.add(language));
      } else if (isLanguageTag(tag)) {
        selected.add(tag);
      } else {
        throw new UnknownLanguageTagError(tag);
      }
    }

    if (requested.length === 0) {
      return [...LANGUAGE_TAGS];
    }

    return LANGUAGE_TAGS.filter((language) => selected.has(language));
  }

  /**
   * Union of the suffixes of the given languages, without duplicates
   */
  suffixesFor(languages: readonly LanguageTag[]): string[] {
    const suffixes = new Set<string>();
    for (const language of languages) {
      LANGUAGE_PROFILES[language].forEach((suffix) => suffixes.add(suffix));
    }
    return [...suffixes];
  }

  /**
   * Detect the language of a file from its name
   *
   * @returns The language, or null when no profile claims the suffix
   */
  detectLanguage(filePath: string): LanguageTag | null {
    const fileName = path.basename(filePath);
    return (
      LANGUAGE_TAGS.find((language) =>
        matchesSuffix(fileName, LANGUAGE_PROFILES[language])
      ) ?? null
    );
  }
}

/**
 * Whether a file name ends with one of the suffixes
 */
export function matchesSuffix(fileName: string, suffixes: readonly string[]): boolean {
  return suffixes.some((suffix) => fileName.endsWith(suffix));
}
