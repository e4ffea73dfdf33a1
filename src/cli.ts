#!/usr/bin/env node

/**
 * pqcscan - CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { Analyzer } from './core/analyzer.js';
import { CATEGORIES, CATEGORY_INFO } from './core/taxonomy.js';
import {
  loadConfig,
  mergeConfig,
  validateConfig,
  taxonomyFromConfig,
  generateSampleConfig,
  generateConfigWithSchema,
  formatSchema,
  findConfigPath,
  type PqcScanConfig,
} from './config/index.js';
import { renderOutput } from './output/index.js';
import { startWatch, type Watcher } from './watch/index.js';
import type { ScanOutput } from './types.js';
import { VERSION } from './version.js';

interface ScanCommandOptions {
  config?: string;
  json?: boolean;
  sarif?: boolean;
  annotations?: boolean;
  pretty?: boolean;
  deep?: boolean;
  includeTests?: boolean;
  ignore?: string[];
  concurrency?: number;
  verbose?: boolean;
}

interface WatchCommandOptions {
  config?: string;
  debounce?: number;
  quiet?: boolean;
  deep?: boolean;
  includeTests?: boolean;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Load, merge and validate configuration; exits on invalid config
 */
function resolveConfig(dir: string, explicitPath: string | undefined, cliOptions: PqcScanConfig): PqcScanConfig {
  // The file is checked on its own first; merging assumes well-formed lists
  const fileConfig = loadConfig(dir, explicitPath);
  if (fileConfig) {
    exitIfInvalid(fileConfig);
  }
  const config = mergeConfig(fileConfig, cliOptions);
  exitIfInvalid(config);
  return config;
}

function exitIfInvalid(config: PqcScanConfig): void {
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error(chalk.red('Error: Invalid configuration:'));
    for (const error of validation.errors) {
      console.error(chalk.red(`  - ${error}`));
    }
    process.exit(1);
  }
}

function exitCode(output: ScanOutput): number {
  if (output.summary.filesFailed > 0) return 1;
  if (output.summary.diagnostics > 0) return 2;
  return 0;
}

const program = new Command();

program
  .name('pqcscan')
  .description('Find quantum-vulnerable cryptography in Go source code')
  .version(VERSION);

// === scan command ===
program
  .command('scan [dir]')
  .description('Scan a Go source tree for quantum-vulnerable imports and calls')
  .option('-c, --config <file>', 'Path to config file')
  .option('--json', 'Output JSON')
  .option('--sarif', 'Output in SARIF format (for GitHub Code Scanning)')
  .option('--annotations', 'Output GitHub Actions annotations')
  .option('--pretty', 'Pretty print JSON output')
  .option('--deep', 'Check every call, including nested blocks and closures')
  .option('--include-tests', 'Also scan external test packages (package foo_test)')
  .option('--ignore <patterns...>', 'Additional gitignore-style patterns to skip')
  .option('--concurrency <n>', 'Files parsed in parallel', parseInteger)
  .option('-v, --verbose', 'Show progress')
  .action(async (dir: string | undefined, options: ScanCommandOptions) => {
    try {
      const sourceDir = dir ?? '.';
      const config = resolveConfig(sourceDir, options.config, {
        ignorePaths: options.ignore,
        includeTests: options.includeTests,
        traversal: options.deep ? 'deep' : undefined,
        concurrency: options.concurrency,
        output: options.sarif ? 'sarif' : options.json ? 'json' : undefined,
        ci: options.annotations ? { annotations: true } : undefined,
      });

      if (options.verbose) {
        console.error(chalk.cyan(`pqcscan v${VERSION}`));
      }

      const analyzer = new Analyzer({
        sourceDir,
        verbose: options.verbose,
        includeTests: config.includeTests,
        traversal: config.traversal,
        concurrency: config.concurrency,
        ignorePatterns: config.ignorePaths,
        taxonomy: taxonomyFromConfig(config),
      });

      const output = await analyzer.analyze();

      const rendered = renderOutput(output, {
        format: config.output ?? 'text',
        pretty: options.pretty,
        annotations: config.ci?.annotations,
      });
      for (const line of rendered.stderr) {
        console.error(line);
      }
      console.log(rendered.stdout);

      process.exit(exitCode(output));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

// === taxonomy command ===
program
  .command('taxonomy')
  .description('List the packages and functions that are flagged')
  .option('-c, --config <file>', 'Path to config file')
  .option('--json', 'Output JSON')
  .action((options: { config?: string; json?: boolean }) => {
    try {
      const config = resolveConfig(process.cwd(), options.config, {});
      const taxonomy = taxonomyFromConfig(config);

      if (options.json) {
        console.log(JSON.stringify({
          modules: taxonomy.listModules(),
          functions: taxonomy.listFunctions(),
        }, null, 2));
        return;
      }

      for (const category of CATEGORIES) {
        console.log(chalk.cyan.bold(`\n${CATEGORY_INFO[category].label}`));
        console.log(chalk.gray(`  ${CATEGORY_INFO[category].description}`));
        console.log(chalk.gray(`  Replacement: ${CATEGORY_INFO[category].replacement}`));
        for (const entry of taxonomy.listModules().filter(m => m.category === category)) {
          console.log(`  - ${entry.path}`);
        }
      }

      console.log(chalk.cyan.bold('\nFunctions'));
      for (const entry of taxonomy.listFunctions()) {
        console.log(`  - ${entry.module}.${entry.name}`);
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

// === watch command ===
program
  .command('watch [dir]')
  .description('Watch Go sources and re-scan on changes')
  .option('-c, --config <file>', 'Path to config file')
  .option('--debounce <ms>', 'Debounce delay in milliseconds', parseInteger)
  .option('--quiet', 'Quiet mode - only show summary line')
  .option('--deep', 'Check every call, including nested blocks and closures')
  .option('--include-tests', 'Also scan external test packages (package foo_test)')
  .action(async (dir: string | undefined, options: WatchCommandOptions) => {
    try {
      const sourceDir = dir ?? '.';
      const config = resolveConfig(sourceDir, options.config, {
        includeTests: options.includeTests,
        traversal: options.deep ? 'deep' : undefined,
        watch: { debounce: options.debounce, quiet: options.quiet },
      });

      const watcher: Watcher = await startWatch({
        sourceDir,
        includeTests: config.includeTests,
        traversal: config.traversal,
        concurrency: config.concurrency,
        ignorePatterns: config.ignorePaths,
        taxonomy: taxonomyFromConfig(config),
        debounceMs: config.watch?.debounce,
        quiet: config.watch?.quiet,
      });

      // Handle Ctrl+C gracefully
      const cleanup = async (): Promise<void> => {
        await watcher.stop();
        process.exit(0);
      };

      process.on('SIGINT', () => void cleanup());
      process.on('SIGTERM', () => void cleanup());
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

// === init command ===
program
  .command('init')
  .description('Create a configuration file in the current directory')
  .option('--schema', 'Also write pqcscan.schema.json and reference it')
  .option('--force', 'Overwrite existing config file')
  .action(async (options: { schema?: boolean; force?: boolean }) => {
    // Check for existing config
    const existing = findConfigPath(process.cwd());
    if (existing && !options.force) {
      console.error(chalk.yellow(`Config file already exists: ${existing}`));
      console.error(chalk.gray('Use --force to overwrite'));
      process.exit(1);
    }

    const filename = '.pqcscanrc.json';
    if (options.schema) {
      await writeFile('pqcscan.schema.json', formatSchema() + '\n');
      await writeFile(filename, generateConfigWithSchema() + '\n');
      console.log(chalk.green('✓ Created pqcscan.schema.json'));
    } else {
      await writeFile(filename, generateSampleConfig() + '\n');
    }
    console.log(chalk.green(`✓ Created ${filename}`));
    if (!existsSync('.pqcscanignore')) {
      console.log(chalk.gray('Add a .pqcscanignore file to skip generated code.'));
    }
  });

// === config command ===
program
  .command('config')
  .description('Show current configuration')
  .option('-c, --config <file>', 'Path to config file')
  .option('--validate', 'Validate the configuration')
  .action((options: { config?: string; validate?: boolean }) => {
    try {
      const config = loadConfig(process.cwd(), options.config);

      if (!config) {
        console.error(chalk.yellow('No configuration file found.'));
        console.error(chalk.gray('Run `pqcscan init` to create one.'));
        process.exit(1);
      }

      const configPath = options.config ?? findConfigPath(process.cwd());
      console.log(chalk.cyan(`Config loaded from: ${configPath}`));
      console.log();

      if (options.validate) {
        const validation = validateConfig(config);
        if (validation.valid) {
          console.log(chalk.green('✓ Configuration is valid'));
        } else {
          console.log(chalk.red('✗ Configuration has errors:'));
          for (const error of validation.errors) {
            console.log(chalk.red(`  - ${error}`));
          }
          process.exit(1);
        }
        console.log();
      }

      console.log(chalk.gray('Current configuration:'));
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

// Run CLI
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
