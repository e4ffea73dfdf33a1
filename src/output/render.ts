/**
 * pqcscan - Output selection
 *
 * Workflow annotations share stdout with the text report only. With JSON or
 * SARIF output, stdout holds exactly one document and annotations go to
 * stderr.
 */

import type { ScanOutput } from '../types.js';
import { annotationsToStrings } from './annotations.js';
import { toSarif } from './sarif.js';
import { formatReport } from './text.js';

export type OutputFormat = 'text' | 'json' | 'sarif';

export interface RenderOptions {
  format: OutputFormat;
  pretty?: boolean;
  annotations?: boolean;
}

export interface RenderedOutput {
  stdout: string;
  stderr: string[];
}

function toJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export function renderOutput(output: ScanOutput, options: RenderOptions): RenderedOutput {
  const annotations = options.annotations ? annotationsToStrings(output) : [];
  const pretty = options.pretty ?? false;

  switch (options.format) {
    case 'sarif':
      return { stdout: toJson(toSarif(output), pretty), stderr: annotations };
    case 'json':
      return { stdout: toJson(output, pretty), stderr: annotations };
    case 'text':
      return { stdout: [...annotations, formatReport(output)].join('\n'), stderr: [] };
  }
}
