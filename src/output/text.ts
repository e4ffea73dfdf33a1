/**
 * pqcscan - Text Report
 */

import chalk from 'chalk';
import type { Diagnostic, ScanOutput } from '../types.js';
import { CATEGORIES, CATEGORY_INFO } from '../core/taxonomy.js';

/**
 * `file:line:column: message`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { file, line, column } = diagnostic.position;
  return `${file}:${line}:${column}: ${diagnostic.message}`;
}

/**
 * Human-readable report, grouped by file
 */
export function formatReport(output: ScanOutput): string {
  const lines: string[] = [];
  const { summary } = output;

  lines.push(chalk.cyan.bold('pqcscan report'));
  lines.push(chalk.gray(`Source: ${output.sourceDir}`));
  lines.push(chalk.gray(`Traversal: ${output.traversal}`));
  lines.push('');

  const withFindings = output.files.filter(f => f.diagnostics.length > 0);
  for (const result of withFindings) {
    lines.push(chalk.bold(result.file));
    for (const diagnostic of result.diagnostics) {
      const color = diagnostic.kind === 'call' ? chalk.red : chalk.yellow;
      lines.push(`  ${color(formatDiagnostic(diagnostic))}`);
    }
    lines.push('');
  }

  const failed = output.files.filter(f => f.status === 'error');
  if (failed.length > 0) {
    lines.push(chalk.red.bold('Failed:'));
    for (const result of failed) {
      lines.push(chalk.red(`  ${result.file}: ${result.error ?? 'unknown error'}`));
    }
    lines.push('');
  }

  lines.push(chalk.bold('Summary:'));
  lines.push(`  Files scanned: ${summary.filesScanned}`);
  if (summary.filesSkipped > 0) {
    lines.push(`  Files skipped: ${summary.filesSkipped}`);
  }
  if (summary.filesFailed > 0) {
    lines.push(chalk.red(`  Files failed: ${summary.filesFailed}`));
  }
  lines.push(`  Findings: ${summary.diagnostics} (${summary.importFindings} imports, ${summary.callFindings} calls)`);
  for (const category of CATEGORIES) {
    if (summary.byCategory[category] > 0) {
      lines.push(`    ${CATEGORY_INFO[category].label}: ${summary.byCategory[category]}`);
    }
  }

  if (summary.diagnostics === 0 && summary.filesFailed === 0) {
    lines.push('');
    lines.push(chalk.green('No quantum-vulnerable cryptography found'));
  }

  return lines.join('\n');
}
