/**
 * pqcscan - Quantum-Vulnerable Cryptography Scanner for Go
 *
 * @example
 * ```typescript
 * import { quickScan, analyzeFile, parseGoFile } from 'pqcscan';
 *
 * // Whole source tree
 * const output = await quickScan('./service', { traversal: 'deep' });
 *
 * // Single file
 * const diagnostics = analyzeFile(parseGoFile(source, 'main.go'));
 * ```
 */

// Core
export { Analyzer, quickScan, calculateSummary } from './core/analyzer.js';
export { analyzeFile, findCallReferences, asCallReference, importMessage, callMessage } from './core/matcher.js';
export { importPath, defaultAlias, localAlias, resolveAlias } from './core/resolver.js';
export { decodeStringLiteral, type DecodeResult } from './core/literal.js';
export { MalformedLiteralError } from './core/errors.js';
export {
  CATEGORIES,
  CATEGORY_INFO,
  DEFAULT_DEFINITION,
  DEFAULT_TAXONOMY,
  createTaxonomy,
  extendTaxonomy,
  type Category,
  type CategoryInfo,
  type ModuleEntry,
  type FunctionEntry,
  type Taxonomy,
  type TaxonomyDefinition
} from './core/taxonomy.js';

// Go front end
export { GoLanguageAdapter, createGoAdapter, parseGoFile, tokenize } from './languages/go/index.js';
export type {
  GoFile,
  ImportSpec,
  Statement,
  Expression,
  Identifier,
  Token,
  TokenKind,
  LoadedFile,
  AdapterOptions
} from './languages/go/index.js';

// Types
export type {
  Diagnostic,
  ImportDiagnostic,
  CallDiagnostic,
  Position,
  TraversalPolicy,
  MatchOptions,
  FileStatus,
  FileResult,
  ScanSummary,
  ScanOutput,
  ScanOptions
} from './types.js';

// Watch mode
export {
  Watcher,
  startWatch,
  diffFindings,
  isRelevantChange,
  type WatchOptions,
  type WatchStats,
  type FindingDelta
} from './watch/index.js';

// Configuration
export {
  loadConfig,
  loadConfigFromFile,
  loadConfigFromPackageJson,
  mergeConfig,
  validateConfig,
  taxonomyFromConfig,
  generateSampleConfig,
  findConfigPath,
  generateConfigSchema,
  formatSchema,
  type PqcScanConfig
} from './config/index.js';

// Ignore files
export {
  loadIgnoreConfig,
  parseIgnoreFile,
  shouldIgnore,
  filterIgnored,
  addPatterns,
  generateSampleIgnoreFile,
  type IgnoreConfig
} from './ignore/index.js';

// Output
export {
  renderOutput,
  formatReport,
  formatDiagnostic,
  toSarif,
  generateAnnotations,
  formatAnnotation,
  annotationsToStrings,
  type OutputFormat,
  type SarifOutput,
  type Annotation
} from './output/index.js';

export { VERSION } from './version.js';
