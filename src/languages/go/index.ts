/**
 * pqcscan - Go Language Adapter
 * Finds, reads and parses the Go files of a source tree
 */

import { promises as fs } from 'fs';
import { join, relative } from 'path';
import { glob } from 'glob';
import pLimit from 'p-limit';
import { parseGoFile } from './parser.js';
import type { GoFile } from './ast.js';

export * from './ast.js';
export { parseGoFile } from './parser.js';
export { tokenize, type Token, type TokenKind } from './lexer.js';

export interface AdapterOptions {
  concurrency?: number;
}

export type LoadedFile =
  | { file: string; ok: true; parsed: GoFile }
  | { file: string; ok: false; error: string };

/**
 * Go Language Adapter
 */
export class GoLanguageAdapter {
  readonly language = 'go' as const;
  readonly fileExtensions = ['.go'];

  /** Directories that never hold the project's own sources */
  protected readonly ignorePatterns: readonly string[] = [
    '**/node_modules/**',
    '**/.git/**',
    '**/vendor/**',
    '**/testdata/**',
  ];

  /** Concurrency limit for file parsing */
  protected concurrency: number = 10;

  constructor(options: AdapterOptions = {}) {
    if (options.concurrency !== undefined) this.setConcurrency(options.concurrency);
  }

  /**
   * Set concurrency limit for parallel file processing
   */
  setConcurrency(limit: number): void {
    this.concurrency = Math.max(1, limit);
  }

  /**
   * A directory is a Go project if it has a go.mod or contains .go files
   */
  async canHandle(sourceDir: string): Promise<boolean> {
    try {
      await fs.access(join(sourceDir, 'go.mod'));
      return true;
    } catch {
      // Fall through
    }

    try {
      const files = await this.findSourceFiles(sourceDir);
      return files.length > 0;
    } catch {
      return false;
    }
  }

  /**
   * Absolute paths of the Go files under `sourceDir`, sorted. `_test.go`
   * files are included; external test packages are skipped by package name
   * later on.
   */
  async findSourceFiles(sourceDir: string): Promise<string[]> {
    const patterns = this.fileExtensions.map(ext => `**/*${ext}`);

    const files = await glob(patterns, {
      cwd: sourceDir,
      absolute: true,
      ignore: [...this.ignorePatterns],
      nodir: true,
    });

    return files.sort();
  }

  /**
   * Read and parse files with bounded concurrency. Results keep the order
   * of `files`; unreadable files are reported, not dropped.
   */
  async loadFiles(sourceDir: string, files: string[]): Promise<LoadedFile[]> {
    const limit = pLimit(this.concurrency);

    const tasks = files.map(file => limit(async (): Promise<LoadedFile> => {
      const relPath = relative(sourceDir, file).split('\\').join('/');
      try {
        const content = await fs.readFile(file, 'utf-8');
        return { file: relPath, ok: true, parsed: parseGoFile(content, relPath) };
      } catch (error) {
        return { file: relPath, ok: false, error: error instanceof Error ? error.message : String(error) };
      }
    }));

    return Promise.all(tasks);
  }
}

/**
 * Create a Go language adapter instance
 */
export function createGoAdapter(options?: AdapterOptions): GoLanguageAdapter {
  return new GoLanguageAdapter(options);
}
