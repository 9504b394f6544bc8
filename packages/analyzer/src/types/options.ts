/**
 * Analyzer configuration
 */

import type { RuleId, Severity } from '@mapcheck/core';

/** A rule severity, or `off` to suppress the rule */
export type SeveritySetting = Severity | 'off';

export type DependencyCategory = 'dataAccess' | 'remote' | 'fileSystem' | 'service';

/**
 * Type-name patterns that mark a captured dependency or static type as
 * expensive to call from inside a mapping expression. A pattern matches a
 * type name that equals it, starts with it, or ends with it.
 */
export type DependencyPatterns = Record<DependencyCategory, string[]>;

export interface FuzzyMatchOptions {
  /** Maximum edit distance for a "did you mean" suggestion (default: 2) */
  maxDistance: number;
  /** Maximum difference in name length (default: 2) */
  maxLengthDifference: number;
}

export interface AnalyzerOptions {
  /** Per-rule severity overrides */
  rules?: Partial<Record<RuleId, SeveritySetting>>;
  /** Report performance hazards (default: true) */
  performanceWarnings?: boolean;
  /** Report nullability loss (default: true) */
  nullableWarnings?: boolean;
  /** Severity for NonDeterministicOperation unless overridden in `rules` */
  nonDeterministicSeverity?: Severity;
  /** Extra patterns, merged with the built-in ones */
  dependencyPatterns?: Partial<DependencyPatterns>;
  fuzzyMatch?: Partial<FuzzyMatchOptions>;
}

export interface ResolvedAnalyzerOptions {
  rules: Partial<Record<RuleId, SeveritySetting>>;
  performanceWarnings: boolean;
  nullableWarnings: boolean;
  nonDeterministicSeverity?: Severity;
  dependencyPatterns: DependencyPatterns;
  fuzzyMatch: FuzzyMatchOptions;
}

export const DEFAULT_DEPENDENCY_PATTERNS: DependencyPatterns = {
  dataAccess: [
    'DbContext',
    'DbSet',
    'IQueryable',
    'Repository',
    'IDbConnection',
    'SqlConnection',
    'SqlCommand',
    'DataContext',
    'ISession',
  ],
  remote: ['HttpClient', 'IHttpClientFactory', 'WebClient', 'RestClient', 'GrpcChannel'],
  fileSystem: ['File', 'Directory', 'FileInfo', 'FileStream', 'StreamReader', 'StreamWriter'],
  service: ['Service', 'Gateway', 'ApiClient'],
};

export const DEFAULT_FUZZY_MATCH: FuzzyMatchOptions = {
  maxDistance: 2,
  maxLengthDifference: 2,
};

export function resolveAnalyzerOptions(options: AnalyzerOptions = {}): ResolvedAnalyzerOptions {
  const extra = options.dependencyPatterns ?? {};
  return {
    rules: { ...(options.rules ?? {}) },
    performanceWarnings: options.performanceWarnings ?? true,
    nullableWarnings: options.nullableWarnings ?? true,
    nonDeterministicSeverity: options.nonDeterministicSeverity,
    dependencyPatterns: {
      dataAccess: [...DEFAULT_DEPENDENCY_PATTERNS.dataAccess, ...(extra.dataAccess ?? [])],
      remote: [...DEFAULT_DEPENDENCY_PATTERNS.remote, ...(extra.remote ?? [])],
      fileSystem: [...DEFAULT_DEPENDENCY_PATTERNS.fileSystem, ...(extra.fileSystem ?? [])],
      service: [...DEFAULT_DEPENDENCY_PATTERNS.service, ...(extra.service ?? [])],
    },
    fuzzyMatch: { ...DEFAULT_FUZZY_MATCH, ...(options.fuzzyMatch ?? {}) },
  };
}
