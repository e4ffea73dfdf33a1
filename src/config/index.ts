/**
 * pqcscan Configuration File Support
 *
 * Supports:
 * - .pqcscanrc (JSON)
 * - .pqcscanrc.json
 * - package.json "pqcscan" field
 */

import * as fs from 'fs';
import * as path from 'path';
import type { OutputFormat } from '../output/index.js';
import type { TraversalPolicy } from '../types.js';
import {
  CATEGORIES,
  DEFAULT_TAXONOMY,
  extendTaxonomy,
  type FunctionEntry,
  type ModuleEntry,
  type Taxonomy,
} from '../core/taxonomy.js';
import { OUTPUT_FORMATS, TRAVERSAL_POLICIES } from './schema.js';

// Re-export schema utilities
export {
  generateConfigSchema,
  formatSchema,
  generateConfigWithSchema,
  OUTPUT_FORMATS,
  TRAVERSAL_POLICIES
} from './schema.js';
export type { JSONSchemaType } from './schema.js';

export interface PqcScanConfig {
  // Analysis options
  ignorePaths?: string[];
  includeTests?: boolean;
  traversal?: TraversalPolicy;
  concurrency?: number;

  // Output options
  output?: OutputFormat;

  // Entries added to the built-in taxonomy
  taxonomy?: {
    modules?: ModuleEntry[];
    functions?: FunctionEntry[];
  };

  // Watch mode options
  watch?: {
    debounce?: number;
    quiet?: boolean;
  };

  // CI options
  ci?: {
    annotations?: boolean;
  };
}

const CONFIG_FILES = [
  '.pqcscanrc',
  '.pqcscanrc.json',
];

/**
 * Load configuration from a specific file. Returns null when the file does
 * not exist; throws when it is not valid JSON.
 */
export function loadConfigFromFile(filePath: string): PqcScanConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config file ${filePath}: ${message}`);
  }
}

/**
 * Load configuration from package.json "pqcscan" field
 */
export function loadConfigFromPackageJson(dir: string): PqcScanConfig | null {
  const pkgPath = path.join(dir, 'package.json');

  if (!fs.existsSync(pkgPath)) {
    return null;
  }

  try {
    const content = fs.readFileSync(pkgPath, 'utf-8');
    const pkg = JSON.parse(content);
    return pkg.pqcscan ?? null;
  } catch {
    // Not ours to validate
    return null;
  }
}

/**
 * Find and load configuration from the project directory
 * Searches in order: explicit file > config files > package.json
 */
export function loadConfig(dir: string, explicitConfigPath?: string): PqcScanConfig | null {
  // 1. Explicit config file takes precedence
  if (explicitConfigPath) {
    const configPath = path.isAbsolute(explicitConfigPath)
      ? explicitConfigPath
      : path.join(dir, explicitConfigPath);
    const config = loadConfigFromFile(configPath);
    if (!config) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return config;
  }

  // 2. Search for config files in order
  for (const configFile of CONFIG_FILES) {
    const config = loadConfigFromFile(path.join(dir, configFile));
    if (config) {
      return config;
    }
  }

  // 3. Check package.json "pqcscan" field
  return loadConfigFromPackageJson(dir);
}

function pick<T>(override: T | undefined, base: T | undefined): T | undefined {
  return override !== undefined ? override : base;
}

/**
 * Merge configurations (CLI options override config file)
 */
export function mergeConfig(
  fileConfig: PqcScanConfig | null,
  cliOptions: PqcScanConfig
): PqcScanConfig {
  const base = fileConfig ?? {};
  const merged: PqcScanConfig = {};

  const ignorePaths = pick(cliOptions.ignorePaths, base.ignorePaths);
  if (ignorePaths !== undefined) merged.ignorePaths = ignorePaths;
  const includeTests = pick(cliOptions.includeTests, base.includeTests);
  if (includeTests !== undefined) merged.includeTests = includeTests;
  const traversal = pick(cliOptions.traversal, base.traversal);
  if (traversal !== undefined) merged.traversal = traversal;
  const concurrency = pick(cliOptions.concurrency, base.concurrency);
  if (concurrency !== undefined) merged.concurrency = concurrency;
  const output = pick(cliOptions.output, base.output);
  if (output !== undefined) merged.output = output;

  // Nested objects merge field by field
  if (base.taxonomy || cliOptions.taxonomy) {
    merged.taxonomy = {
      modules: [...(base.taxonomy?.modules ?? []), ...(cliOptions.taxonomy?.modules ?? [])],
      functions: [...(base.taxonomy?.functions ?? []), ...(cliOptions.taxonomy?.functions ?? [])],
    };
  }
  if (base.watch || cliOptions.watch) {
    merged.watch = {};
    const debounce = pick(cliOptions.watch?.debounce, base.watch?.debounce);
    if (debounce !== undefined) merged.watch.debounce = debounce;
    const quiet = pick(cliOptions.watch?.quiet, base.watch?.quiet);
    if (quiet !== undefined) merged.watch.quiet = quiet;
  }
  if (base.ci || cliOptions.ci) {
    merged.ci = {};
    const annotations = pick(cliOptions.ci?.annotations, base.ci?.annotations);
    if (annotations !== undefined) merged.ci.annotations = annotations;
  }

  return merged;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value !== '';
}

/**
 * Errors for an optional list of taxonomy entries read from JSON
 */
function validateEntries(
  list: unknown,
  name: string,
  check: (entry: Record<string, unknown>, at: string) => string[]
): string[] {
  if (list === undefined) return [];
  if (!Array.isArray(list)) return [`${name} must be an array`];

  return list.flatMap((entry: unknown, index) => {
    const at = `${name}[${index}]`;
    return isObject(entry) ? check(entry, at) : [`${at} must be an object`];
  });
}

function includes(values: readonly string[], value: unknown): boolean {
  return typeof value === 'string' && values.includes(value);
}

/**
 * Validate configuration
 */
export function validateConfig(config: PqcScanConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.ignorePaths !== undefined && !isStringArray(config.ignorePaths)) {
    errors.push('ignorePaths must be an array of strings');
  }

  if (config.includeTests !== undefined && typeof config.includeTests !== 'boolean') {
    errors.push('includeTests must be a boolean');
  }

  if (config.traversal !== undefined && !includes(TRAVERSAL_POLICIES, config.traversal)) {
    errors.push(`Invalid traversal: ${config.traversal}. Valid options: ${TRAVERSAL_POLICIES.join(', ')}`);
  }

  if (config.output !== undefined && !includes(OUTPUT_FORMATS, config.output)) {
    errors.push(`Invalid output: ${config.output}. Valid options: ${OUTPUT_FORMATS.join(', ')}`);
  }

  if (config.concurrency !== undefined && (!Number.isInteger(config.concurrency) || config.concurrency < 1)) {
    errors.push('concurrency must be a positive integer');
  }

  const taxonomy: unknown = config.taxonomy;
  if (taxonomy !== undefined) {
    if (!isObject(taxonomy)) {
      errors.push('taxonomy must be an object');
    } else {
      errors.push(...validateEntries(taxonomy.modules, 'taxonomy.modules', (entry, at) => [
        ...(isNonEmptyString(entry.path) ? [] : [`${at}.path must be a non-empty string`]),
        ...(includes(CATEGORIES, entry.category)
          ? []
          : [`Invalid ${at}.category: ${String(entry.category)}. Valid options: ${CATEGORIES.join(', ')}`]),
      ]));
      errors.push(...validateEntries(taxonomy.functions, 'taxonomy.functions', (entry, at) => [
        ...(isNonEmptyString(entry.module) ? [] : [`${at}.module must be a non-empty string`]),
        ...(isNonEmptyString(entry.name) ? [] : [`${at}.name must be a non-empty string`]),
      ]));
    }
  }

  const watch: unknown = config.watch;
  if (watch !== undefined) {
    if (!isObject(watch)) {
      errors.push('watch must be an object');
    } else if (watch.debounce !== undefined && (typeof watch.debounce !== 'number' || watch.debounce < 0)) {
      errors.push('watch.debounce must be a positive number');
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Taxonomy with the configured entries added to the built-in one
 */
export function taxonomyFromConfig(config: PqcScanConfig): Taxonomy {
  if (!config.taxonomy) {
    return DEFAULT_TAXONOMY;
  }
  return extendTaxonomy(DEFAULT_TAXONOMY, config.taxonomy);
}

/**
 * Generate a sample configuration file
 */
export function generateSampleConfig(): string {
  const sampleConfig: PqcScanConfig = {
    ignorePaths: ['gen/**', '**/*.pb.go'],
    includeTests: false,
    traversal: 'shallow',
    concurrency: 10,
    taxonomy: {
      modules: [],
      functions: []
    },
    watch: {
      debounce: 500,
      quiet: false
    },
    ci: {
      annotations: true
    }
  };

  return JSON.stringify(sampleConfig, null, 2);
}

/**
 * Find configuration file path (for reporting)
 */
export function findConfigPath(dir: string): string | null {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(dir, configFile);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  // Check package.json
  const pkgPath = path.join(dir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    try {
      const content = fs.readFileSync(pkgPath, 'utf-8');
      const pkg = JSON.parse(content);
      if (pkg.pqcscan) {
        return pkgPath + ' (pqcscan field)';
      }
    } catch {
      // Ignore parse errors
    }
  }

  return null;
}
