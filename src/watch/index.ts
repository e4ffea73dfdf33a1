/**
 * pqcscan Watch Mode
 *
 * Re-scans a Go source tree whenever a Go file, go.mod or a pqcscan
 * config/ignore file changes, and reports which findings appeared or
 * went away since the previous scan.
 */

import { basename } from 'node:path';
import { watch as chokidarWatch, type FSWatcher } from 'chokidar';
import chalk from 'chalk';
import { Analyzer } from '../core/analyzer.js';
import { formatDiagnostic, formatReport } from '../output/index.js';
import type { Diagnostic, ScanOptions, ScanOutput } from '../types.js';

export interface WatchOptions extends ScanOptions {
  /** Delay after the last change before re-scanning, in milliseconds */
  debounceMs?: number;
  /** Print one summary line per scan instead of the full report */
  quiet?: boolean;
  /** Glob patterns the watcher ignores */
  ignored?: string[];
  /** Called after every successful scan */
  onAnalysis?: (output: ScanOutput, delta: FindingDelta) => void;
}

export interface FindingDelta {
  added: Diagnostic[];
  resolved: Diagnostic[];
}

export interface WatchStats {
  scans: number;
  failures: number;
  lastScan: Date | null;
  lastChanged: string | null;
}

type ScanTrigger = 'initial' | 'change' | 'manual';

const TRIGGER_FILES = new Set(['go.mod', '.pqcscanignore', '.gitignore', '.pqcscanrc', '.pqcscanrc.json']);

/**
 * Whether a change to `path` can alter the scan result
 */
export function isRelevantChange(path: string): boolean {
  return path.endsWith('.go') || TRIGGER_FILES.has(basename(path));
}

function findingKey(diagnostic: Diagnostic): string {
  return formatDiagnostic(diagnostic);
}

/**
 * Findings of `current` missing from `previous` (added) and the reverse
 * (resolved). Identical findings are counted, not collapsed.
 */
export function diffFindings(previous: ScanOutput | null, current: ScanOutput): FindingDelta {
  const before = previous ? previous.files.flatMap(f => f.diagnostics) : [];
  const after = current.files.flatMap(f => f.diagnostics);

  const remaining = new Map<string, number>();
  for (const diagnostic of before) {
    const key = findingKey(diagnostic);
    remaining.set(key, (remaining.get(key) ?? 0) + 1);
  }

  const added: Diagnostic[] = [];
  for (const diagnostic of after) {
    const key = findingKey(diagnostic);
    const count = remaining.get(key) ?? 0;
    if (count > 0) {
      remaining.set(key, count - 1);
    } else {
      added.push(diagnostic);
    }
  }

  const resolved: Diagnostic[] = [];
  for (const diagnostic of before) {
    const key = findingKey(diagnostic);
    const count = remaining.get(key) ?? 0;
    if (count > 0) {
      remaining.set(key, count - 1);
      resolved.push(diagnostic);
    }
  }

  return { added, resolved };
}

export class Watcher {
  private fsWatcher: FSWatcher | null = null;
  private readonly analyzer: Analyzer;
  private readonly debounceMs: number;
  private readonly ignored: string[];
  private stats: WatchStats = { scans: 0, failures: 0, lastScan: null, lastChanged: null };
  private previous: ScanOutput | null = null;
  private timer: NodeJS.Timeout | null = null;
  private changed = new Set<string>();
  private scanning = false;

  constructor(private readonly options: WatchOptions) {
    this.debounceMs = options.debounceMs ?? 500;
    this.ignored = options.ignored ?? ['**/node_modules/**', '**/.git/**', '**/vendor/**'];
    this.analyzer = new Analyzer(options);
  }

  /**
   * Scan once, then watch the source directory
   */
  async start(): Promise<void> {
    console.log(chalk.cyan.bold('\npqcscan watch mode'));
    console.log(chalk.gray(`Source: ${this.options.sourceDir}\n`));

    await this.scan('initial');

    this.fsWatcher = chokidarWatch(this.options.sourceDir, {
      ignored: this.ignored,
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 50 },
    });

    for (const event of ['add', 'change', 'unlink'] as const) {
      this.fsWatcher.on(event, (path: string) => this.onChange(path));
    }
    this.fsWatcher.on('error', (error: unknown) => this.fail('Watch error', error));

    console.log(chalk.cyan('\nWatching for changes... (Ctrl+C to stop)\n'));
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.fsWatcher?.close();
    this.fsWatcher = null;
    console.log(chalk.gray('\nWatch mode stopped'));
  }

  /**
   * Run one scan now, outside the file watcher. Resolves to null when the
   * scan failed or another scan is still running.
   */
  async analyzeNow(): Promise<ScanOutput | null> {
    return this.scan('manual');
  }

  getStats(): WatchStats {
    return { ...this.stats };
  }

  private onChange(path: string): void {
    if (!isRelevantChange(path)) return;

    this.changed.add(path);
    this.stats.lastChanged = path;

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.scan('change');
    }, this.debounceMs);
  }

  private fail(context: string, error: unknown): void {
    this.stats.failures++;
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\n${context}: ${message}`));
  }

  private async scan(trigger: ScanTrigger): Promise<ScanOutput | null> {
    if (this.scanning) return null;

    this.scanning = true;
    this.stats.scans++;
    this.stats.lastScan = new Date();
    const changed = [...this.changed];
    this.changed.clear();

    try {
      const started = Date.now();
      const output = await this.analyzer.analyze();
      const delta = diffFindings(this.previous, output);
      this.previous = output;

      this.report(output, delta, trigger, changed, Date.now() - started);
      this.options.onAnalysis?.(output, delta);
      return output;
    } catch (error) {
      this.fail('Analysis error', error);
      return null;
    } finally {
      this.scanning = false;
    }
  }

  private report(output: ScanOutput, delta: FindingDelta, trigger: ScanTrigger, changed: string[], ms: number): void {
    const time = chalk.gray(`[${new Date().toLocaleTimeString()}]`);
    const { summary } = output;

    if (this.options.quiet) {
      const status = summary.callFindings > 0 ? chalk.red('!') : summary.diagnostics > 0 ? chalk.yellow('●') : chalk.green('✓');
      console.log(`${time} ${status} ${summary.importFindings} imports, ${summary.callFindings} calls ${chalk.gray(`(${ms}ms)`)}`);
      return;
    }

    if (trigger !== 'change') {
      console.log(`${time} ${chalk.gray(`Scan completed in ${ms}ms`)}`);
      console.log(formatReport(output));
      return;
    }

    console.log(chalk.gray('\n' + '-'.repeat(50)));
    if (changed.length > 0) {
      console.log(chalk.gray(`Changed: ${changed.map(f => basename(f)).join(', ')}`));
    }
    console.log(`${time} ${chalk.gray(`Scan updated in ${ms}ms`)}`);
    for (const diagnostic of delta.added) {
      console.log(chalk.red(`  + ${formatDiagnostic(diagnostic)}`));
    }
    for (const diagnostic of delta.resolved) {
      console.log(chalk.green(`  - ${formatDiagnostic(diagnostic)}`));
    }
    if (delta.added.length === 0 && delta.resolved.length === 0) {
      console.log(chalk.gray('  No change in findings'));
    }
    console.log(`  Findings: ${summary.diagnostics} (${summary.importFindings} imports, ${summary.callFindings} calls)`);
  }
}

/**
 * Start watch mode (convenience function)
 */
export async function startWatch(options: WatchOptions): Promise<Watcher> {
  const watcher = new Watcher(options);
  await watcher.start();
  return watcher;
}
