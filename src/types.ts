/**
 * pqcscan - Type Definitions
 */

import type { Position } from './languages/go/ast.js';
import type { Category, Taxonomy } from './core/taxonomy.js';

export type { Position } from './languages/go/ast.js';
export type { Category } from './core/taxonomy.js';

// ============================================================
// Diagnostics
// ============================================================

/**
 * Import of a package listed under `category`
 */
export interface ImportDiagnostic {
  kind: 'import';
  position: Position;
  message: string;
  module: string;
  category: Category;
}

/**
 * Call of a listed function through an import alias
 */
export interface CallDiagnostic {
  kind: 'call';
  position: Position;
  message: string;
  module: string;
  qualifier: string;       // alias as written at the call site
  functionName: string;
}

export type Diagnostic = ImportDiagnostic | CallDiagnostic;

// ============================================================
// Analysis
// ============================================================

/**
 * shallow: top-level assignment and expression statements of each function
 * deep:    every call expression anywhere in each function
 */
export type TraversalPolicy = 'shallow' | 'deep';

export interface MatchOptions {
  taxonomy?: Taxonomy;
  traversal?: TraversalPolicy;
}

export type FileStatus = 'analyzed' | 'skipped' | 'error';

export interface FileResult {
  file: string;            // relative to the scanned directory
  status: FileStatus;
  packageName?: string;
  diagnostics: Diagnostic[];
  error?: string;
  // Why a file was skipped (e.g. external test package)
  reason?: string;
}

export interface ScanSummary {
  filesScanned: number;
  filesSkipped: number;
  filesFailed: number;
  filesWithFindings: number;
  diagnostics: number;
  importFindings: number;
  callFindings: number;
  byCategory: Record<Category, number>;
}

export interface ScanOutput {
  version: string;
  timestamp: string;
  sourceDir: string;
  traversal: TraversalPolicy;
  summary: ScanSummary;
  files: FileResult[];
}

// ============================================================
// Options
// ============================================================

export interface ScanOptions {
  sourceDir: string;
  concurrency?: number;
  verbose?: boolean;
  // Also scan external test packages (package foo_test)
  includeTests?: boolean;
  traversal?: TraversalPolicy;
  // Extra gitignore-style patterns
  ignorePatterns?: string[];
  // Ignore file to use instead of .pqcscanignore / .gitignore
  ignoreFile?: string;
  taxonomy?: Taxonomy;
}
