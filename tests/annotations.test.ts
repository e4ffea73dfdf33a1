/**
 * GitHub Actions annotation tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  generateAnnotations,
  formatAnnotation,
  escapeData,
  escapeProperty,
  printAnnotations,
  annotationsToStrings,
} from '../src/output/annotations.js';
import { analyzeFile } from '../src/core/matcher.js';
import { calculateSummary } from '../src/core/analyzer.js';
import { parseGoFile } from '../src/languages/go/parser.js';
import type { FileResult, ScanOutput } from '../src/types.js';

const MAIN_GO = 'package main\n\nimport "crypto/rsa"\n\nfunc main() {\n\trsa.SignPSS(nil, nil, 0, nil, nil)\n}\n';

function scanOutput(files: FileResult[]): ScanOutput {
  return {
    version: '0.1.0',
    timestamp: '2026-01-01T00:00:00.000Z',
    sourceDir: '/src',
    traversal: 'shallow',
    summary: calculateSummary(files),
    files,
  };
}

const output = scanOutput([
  { file: 'bad.go', status: 'error', diagnostics: [], error: 'read failed' },
  { file: 'main.go', status: 'analyzed', packageName: 'main', diagnostics: analyzeFile(parseGoFile(MAIN_GO, 'main.go')) },
]);

describe('generateAnnotations', () => {
  it('should create annotations in file order', () => {
    expect(generateAnnotations(output)).toEqual([
      { level: 'error', title: 'Analysis failed', message: 'read failed', file: 'bad.go' },
      {
        level: 'warning',
        title: 'Quantum-vulnerable import',
        message: '"crypto/rsa" uses quantum-vulnerable integer factorization cryptography',
        file: 'main.go',
        line: 3,
        col: 8,
      },
      {
        level: 'error',
        title: 'Quantum-vulnerable function call',
        message: 'function "rsa.SignPSS" implements quantum-vulnerable cryptography',
        file: 'main.go',
        line: 6,
        col: 2,
      },
    ]);
  });

  it('should filter by level', () => {
    expect(generateAnnotations(output, { errors: false }).map(a => a.title)).toEqual(['Quantum-vulnerable import']);
    expect(generateAnnotations(output, { warnings: false }).map(a => a.title))
      .toEqual(['Analysis failed', 'Quantum-vulnerable function call']);
  });

  it('should respect maxAnnotations', () => {
    expect(generateAnnotations(output, { maxAnnotations: 1 })).toHaveLength(1);
  });
});

describe('escaping', () => {
  it('should escape data', () => {
    expect(escapeData('50%\r\ndone')).toBe('50%25%0D%0Adone');
  });

  it('should escape properties', () => {
    expect(escapeProperty('a:b,c%')).toBe('a%3Ab%2Cc%25');
  });
});

describe('formatAnnotation', () => {
  it('should format a full annotation', () => {
    expect(formatAnnotation({ level: 'warning', title: 'T', message: 'a\nb%', file: 'dir/a,b.go', line: 3, col: 8 }))
      .toBe('::warning file=dir/a%2Cb.go,line=3,col=8,title=T::a%0Ab%25');
  });

  it('should omit missing properties', () => {
    expect(formatAnnotation({ level: 'error', title: '', message: 'failed' })).toBe('::error::failed');
  });

  it('should format scan output', () => {
    expect(annotationsToStrings(output, { warnings: false })).toEqual([
      '::error file=bad.go,title=Analysis failed::read failed',
      '::error file=main.go,line=6,col=2,title=Quantum-vulnerable function call::function "rsa.SignPSS" implements quantum-vulnerable cryptography',
    ]);
  });
});

describe('printAnnotations', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print one command per line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printAnnotations(output, { maxAnnotations: 2 });

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenNthCalledWith(1, '::error file=bad.go,title=Analysis failed::read failed');
  });
});
