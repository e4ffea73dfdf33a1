/**
 * GitHub Actions Annotations Output
 *
 * Generates workflow annotations for findings:
 * - ::error - for calls of vulnerable functions and files that failed
 * - ::warning - for imports of vulnerable packages
 */

import type { Diagnostic, FileResult, ScanOutput } from '../types.js';

export interface AnnotationOptions {
  /** Include errors for vulnerable calls and failed files (default: true) */
  errors?: boolean;
  /** Include warnings for vulnerable imports (default: true) */
  warnings?: boolean;
  /** Maximum annotations to output */
  maxAnnotations?: number;
}

export interface Annotation {
  level: 'error' | 'warning';
  title: string;
  message: string;
  file?: string;
  line?: number;
  col?: number;
}

/**
 * Generate GitHub Actions annotations from scan output
 */
export function generateAnnotations(
  output: ScanOutput,
  options: AnnotationOptions = {}
): Annotation[] {
  const {
    errors = true,
    warnings = true,
    maxAnnotations = 50,
  } = options;

  const annotations: Annotation[] = [];

  for (const result of output.files) {
    if (result.status === 'error' && errors) {
      annotations.push(failureToAnnotation(result));
    }
    for (const diagnostic of result.diagnostics) {
      if (diagnostic.kind === 'call' ? errors : warnings) {
        annotations.push(diagnosticToAnnotation(diagnostic));
      }
    }
  }

  return annotations.slice(0, maxAnnotations);
}

function diagnosticToAnnotation(diagnostic: Diagnostic): Annotation {
  const { file, line, column } = diagnostic.position;
  return {
    level: diagnostic.kind === 'call' ? 'error' : 'warning',
    title: diagnostic.kind === 'call' ? 'Quantum-vulnerable function call' : 'Quantum-vulnerable import',
    message: diagnostic.message,
    file,
    line,
    col: column,
  };
}

function failureToAnnotation(result: FileResult): Annotation {
  return {
    level: 'error',
    title: 'Analysis failed',
    message: result.error ?? 'analysis failed',
    file: result.file,
  };
}

/**
 * Escape workflow command data
 */
export function escapeData(value: string): string {
  return value
    .replace(/%/g, '%25')
    .replace(/\r/g, '%0D')
    .replace(/\n/g, '%0A');
}

/**
 * Escape workflow command property values
 */
export function escapeProperty(value: string): string {
  return escapeData(value)
    .replace(/:/g, '%3A')
    .replace(/,/g, '%2C');
}

/**
 * Format annotation as GitHub Actions command
 */
export function formatAnnotation(annotation: Annotation): string {
  const parts: string[] = [];

  if (annotation.file) {
    parts.push(`file=${escapeProperty(annotation.file)}`);
  }
  if (annotation.line !== undefined) {
    parts.push(`line=${annotation.line}`);
  }
  if (annotation.col !== undefined) {
    parts.push(`col=${annotation.col}`);
  }
  if (annotation.title) {
    parts.push(`title=${escapeProperty(annotation.title)}`);
  }

  const params = parts.length > 0 ? ` ${parts.join(',')}` : '';
  return `::${annotation.level}${params}::${escapeData(annotation.message)}`;
}

/**
 * Generate and print all annotations to stdout
 */
export function printAnnotations(
  output: ScanOutput,
  options: AnnotationOptions = {}
): void {
  const annotations = generateAnnotations(output, options);
  for (const annotation of annotations) {
    console.log(formatAnnotation(annotation));
  }
}

/**
 * Generate annotations as string array
 */
export function annotationsToStrings(
  output: ScanOutput,
  options: AnnotationOptions = {}
): string[] {
  const annotations = generateAnnotations(output, options);
  return annotations.map(formatAnnotation);
}
