/**
 * pqcscan - Core Analyzer
 * Scans every Go file of a source tree and collects the diagnostics
 */

import { resolve } from 'node:path';
import type {
  Category,
  Diagnostic,
  FileResult,
  ScanOptions,
  ScanOutput,
  ScanSummary,
  TraversalPolicy,
} from '../types.js';
import { GoLanguageAdapter, type LoadedFile } from '../languages/go/index.js';
import { addPatterns, filterIgnored, loadIgnoreConfig } from '../ignore/index.js';
import { analyzeFile } from './matcher.js';
import { DEFAULT_TAXONOMY, type Taxonomy } from './taxonomy.js';
import { MalformedLiteralError } from './errors.js';
import { VERSION } from '../version.js';

interface ResolvedScanOptions {
  sourceDir: string;
  concurrency: number;
  verbose: boolean;
  includeTests: boolean;
  traversal: TraversalPolicy;
  ignorePatterns: string[];
  ignoreFile?: string;
  taxonomy: Taxonomy;
}

export class Analyzer {
  private options: ResolvedScanOptions;

  constructor(options: ScanOptions) {
    this.options = {
      sourceDir: options.sourceDir,
      concurrency: options.concurrency ?? 10,
      verbose: options.verbose ?? false,
      includeTests: options.includeTests ?? false,
      traversal: options.traversal ?? 'shallow',
      ignorePatterns: options.ignorePatterns ?? [],
      ignoreFile: options.ignoreFile,
      taxonomy: options.taxonomy ?? DEFAULT_TAXONOMY,
    };
  }

  /**
   * Scan the source directory
   */
  async analyze(): Promise<ScanOutput> {
    const sourceDir = resolve(this.options.sourceDir);
    const adapter = new GoLanguageAdapter({ concurrency: this.options.concurrency });

    if (!(await adapter.canHandle(sourceDir))) {
      throw new Error(`No Go sources found in ${this.options.sourceDir}`);
    }

    const ignoreConfig = addPatterns(
      await loadIgnoreConfig(sourceDir, this.options.ignoreFile),
      this.options.ignorePatterns
    );
    const allFiles = await adapter.findSourceFiles(sourceDir);
    const files = filterIgnored(allFiles, ignoreConfig);

    if (this.options.verbose) {
      console.error(`Scanning ${files.length} Go files in ${sourceDir}`);
      if (allFiles.length !== files.length) {
        console.error(`Ignored ${allFiles.length - files.length} files (${ignoreConfig.sources.join(', ') || 'patterns'})`);
      }
    }

    const loaded = await adapter.loadFiles(sourceDir, files);
    const results = loaded.map(file => this.analyzeLoaded(file));

    if (this.options.verbose) {
      for (const result of results) {
        if (result.status === 'error') {
          console.error(`Failed: ${result.file}: ${result.error}`);
        }
      }
    }

    return {
      version: VERSION,
      timestamp: new Date().toISOString(),
      sourceDir,
      traversal: this.options.traversal,
      summary: calculateSummary(results),
      files: results,
    };
  }

  /**
   * Match one loaded file. A malformed import path fails only that file.
   */
  private analyzeLoaded(loaded: LoadedFile): FileResult {
    if (!loaded.ok) {
      return { file: loaded.file, status: 'error', diagnostics: [], error: loaded.error };
    }

    const { parsed } = loaded;
    const packageName = parsed.packageName?.name;

    // External test packages (package foo_test)
    if (!this.options.includeTests && packageName?.endsWith('_test')) {
      return { file: loaded.file, status: 'skipped', packageName, diagnostics: [], reason: 'test package' };
    }

    try {
      const diagnostics = analyzeFile(parsed, {
        taxonomy: this.options.taxonomy,
        traversal: this.options.traversal,
      });
      return { file: loaded.file, status: 'analyzed', packageName, diagnostics };
    } catch (error) {
      if (!(error instanceof MalformedLiteralError)) throw error;
      return { file: loaded.file, status: 'error', packageName, diagnostics: [], error: error.message };
    }
  }
}

/**
 * Summary statistics over file results
 */
export function calculateSummary(results: FileResult[]): ScanSummary {
  const diagnostics: Diagnostic[] = results.flatMap(r => r.diagnostics);
  const byCategory: Record<Category, number> = {
    'elliptic-curve': 0,
    'integer-factorization': 0,
    'key-exchange': 0,
  };

  for (const diagnostic of diagnostics) {
    if (diagnostic.kind === 'import') {
      byCategory[diagnostic.category]++;
    }
  }

  return {
    filesScanned: results.filter(r => r.status === 'analyzed').length,
    filesSkipped: results.filter(r => r.status === 'skipped').length,
    filesFailed: results.filter(r => r.status === 'error').length,
    filesWithFindings: results.filter(r => r.diagnostics.length > 0).length,
    diagnostics: diagnostics.length,
    importFindings: diagnostics.filter(d => d.kind === 'import').length,
    callFindings: diagnostics.filter(d => d.kind === 'call').length,
    byCategory,
  };
}

/**
 * Quick scan helper
 */
export async function quickScan(
  sourceDir: string,
  options?: Partial<Omit<ScanOptions, 'sourceDir'>>
): Promise<ScanOutput> {
  const analyzer = new Analyzer({ sourceDir, ...options });
  return analyzer.analyze();
}
