/**
 * pqcscan - Ignore File Support
 *
 * Excludes paths from a scan using .pqcscanignore (or .gitignore) files with
 * gitignore-style patterns. This selects which files are read; it never
 * hides findings in files that are scanned.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import picomatch from 'picomatch';

export interface IgnorePattern {
  /** The pattern as written */
  pattern: string;
  /** Whether this is a negation pattern (!pattern) */
  negated: boolean;
  matcher: (path: string) => boolean;
  /** File (or "<config>") the pattern came from */
  source: string;
  line: number;
}

export interface IgnoreConfig {
  patterns: IgnorePattern[];
  sources: string[];
  /** Root directory for relative path matching */
  rootDir: string;
}

/**
 * Ignore file names, in priority order; only the first found is used
 */
export const DEFAULT_IGNORE_FILES = ['.pqcscanignore', '.gitignore'];

/**
 * Parse a single line from an ignore file
 */
export function parseIgnoreLine(line: string, lineNumber: number, source: string): IgnorePattern | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return null;
  }

  const negated = trimmed.startsWith('!');
  let pattern = (negated ? trimmed.slice(1) : trimmed).replace(/\\(.)/g, '$1');
  if (pattern.length === 0) {
    return null;
  }

  const options: picomatch.PicomatchOptions = {
    dot: true,
    nonegate: true,  // negation is handled here
    nocase: process.platform === 'win32',
  };

  // dir/ matches everything below dir
  if (pattern.endsWith('/')) {
    pattern = pattern + '**';
  }

  // /pattern is anchored at the root; a pattern without a slash matches at any depth
  if (pattern.startsWith('/')) {
    pattern = pattern.slice(1);
  } else if (!pattern.includes('/')) {
    pattern = '**/' + pattern;
  }

  const match = picomatch(pattern, options);
  // A bare name also matches everything inside a directory of that name
  const matchInside = picomatch(pattern + '/**', options);

  return {
    pattern: trimmed,
    negated,
    matcher: (path: string) => match(path) || matchInside(path),
    source,
    line: lineNumber,
  };
}

export function parseIgnoreFile(content: string, source: string): IgnorePattern[] {
  return content
    .split('\n')
    .map((line, i) => parseIgnoreLine(line, i + 1, source))
    .filter((p): p is IgnorePattern => p !== null);
}

/**
 * Load ignore configuration from a directory.
 * An explicit file replaces the default lookup; a missing explicit file is an error.
 */
export async function loadIgnoreConfig(rootDir: string, customFile?: string): Promise<IgnoreConfig> {
  const resolvedRoot = resolve(rootDir);

  if (customFile) {
    const customPath = resolve(rootDir, customFile);
    if (!existsSync(customPath)) {
      throw new Error(`Ignore file not found: ${customPath}`);
    }
    const content = await readFile(customPath, 'utf-8');
    return { patterns: parseIgnoreFile(content, customPath), sources: [customPath], rootDir: resolvedRoot };
  }

  for (const filename of DEFAULT_IGNORE_FILES) {
    const filePath = join(resolvedRoot, filename);
    if (existsSync(filePath)) {
      const content = await readFile(filePath, 'utf-8');
      return { patterns: parseIgnoreFile(content, filePath), sources: [filePath], rootDir: resolvedRoot };
    }
  }

  return createEmptyConfig(resolvedRoot);
}

/**
 * Check if a path should be ignored. Later patterns override earlier ones.
 */
export function shouldIgnore(filePath: string, config: IgnoreConfig): boolean {
  const relativePath = relative(config.rootDir, resolve(config.rootDir, filePath));

  if (relativePath.startsWith('..')) {
    return false;
  }

  const normalizedPath = relativePath.split('\\').join('/');
  let ignored = false;

  for (const pattern of config.patterns) {
    if (pattern.matcher(normalizedPath)) {
      ignored = !pattern.negated;
    }
  }

  return ignored;
}

export function filterIgnored(files: string[], config: IgnoreConfig): string[] {
  return files.filter(file => !shouldIgnore(file, config));
}

export function createEmptyConfig(rootDir: string): IgnoreConfig {
  return { patterns: [], sources: [], rootDir: resolve(rootDir) };
}

/**
 * Add patterns programmatically (e.g. from the config file or --ignore)
 */
export function addPatterns(config: IgnoreConfig, patterns: string[], source: string = '<config>'): IgnoreConfig {
  const added = patterns
    .map((p, i) => parseIgnoreLine(p, i + 1, source))
    .filter((p): p is IgnorePattern => p !== null);

  if (added.length === 0) return config;

  return {
    ...config,
    patterns: [...config.patterns, ...added],
    sources: [...config.sources, source],
  };
}

export function generateSampleIgnoreFile(): string {
  return `# pqcscan ignore file
# Patterns follow gitignore syntax

# Generated code
*.pb.go
*_gen.go
zz_generated.*

# Third-party code
third_party/

# Example: negate a pattern to keep a specific file
# !third_party/keys/keys.go
`;
}
