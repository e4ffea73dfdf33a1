/**
 * Watch mode tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Watcher, diffFindings, isRelevantChange, type FindingDelta } from '../src/watch/index.js';
import { analyzeFile } from '../src/core/matcher.js';
import { calculateSummary } from '../src/core/analyzer.js';
import { parseGoFile } from '../src/languages/go/parser.js';
import type { FileResult, ScanOutput } from '../src/types.js';

describe('Watcher', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pqcscan-watch-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should scan on demand and report to the callback', async () => {
    await writeFile(join(tempDir, 'main.go'), 'package main\n\nimport "crypto/ecdsa"\n');
    const seen: FindingDelta[] = [];
    const watcher = new Watcher({ sourceDir: tempDir, quiet: true, onAnalysis: (_output, delta) => seen.push(delta) });

    const output = await watcher.analyzeNow();

    expect(output?.summary.importFindings).toBe(1);
    expect(output?.summary.byCategory['elliptic-curve']).toBe(1);
    expect(seen).toHaveLength(1);
    expect(seen[0].added.map(d => d.message)).toEqual(['"crypto/ecdsa" uses quantum-vulnerable elliptic curve cryptography']);
    expect(seen[0].resolved).toEqual([]);
    expect(watcher.getStats()).toMatchObject({ scans: 1, failures: 0, lastChanged: null });
  });

  it('should count failed scans and keep going', async () => {
    const watcher = new Watcher({ sourceDir: tempDir });

    expect(await watcher.analyzeNow()).toBeNull();
    expect(watcher.getStats()).toMatchObject({ scans: 1, failures: 1 });
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining(`Analysis error: No Go sources found in ${tempDir}`));

    await writeFile(join(tempDir, 'main.go'), 'package main\n');
    const output = await watcher.analyzeNow();

    expect(output?.summary.filesScanned).toBe(1);
    expect(watcher.getStats().scans).toBe(2);
  });
});

function outputOf(source: string): ScanOutput {
  const files: FileResult[] = [
    { file: 'main.go', status: 'analyzed', packageName: 'main', diagnostics: analyzeFile(parseGoFile(source, 'main.go')) },
  ];
  return {
    version: '0.1.0',
    timestamp: '2026-01-01T00:00:00.000Z',
    sourceDir: '/src',
    traversal: 'shallow',
    summary: calculateSummary(files),
    files,
  };
}

describe('diffFindings', () => {
  const RSA = 'package main\n\nimport "crypto/rsa"\n';
  const RSA_AND_DSA = 'package main\n\nimport "crypto/rsa"\nimport "crypto/dsa"\n';

  it('should treat every finding as new on the first scan', () => {
    const delta = diffFindings(null, outputOf(RSA));

    expect(delta.added.map(d => d.module)).toEqual(['crypto/rsa']);
    expect(delta.resolved).toEqual([]);
  });

  it('should report added and resolved findings', () => {
    const grown = diffFindings(outputOf(RSA), outputOf(RSA_AND_DSA));
    expect(grown.added.map(d => d.module)).toEqual(['crypto/dsa']);
    expect(grown.resolved).toEqual([]);

    const shrunk = diffFindings(outputOf(RSA_AND_DSA), outputOf(RSA));
    expect(shrunk.added).toEqual([]);
    expect(shrunk.resolved.map(d => d.module)).toEqual(['crypto/dsa']);
  });

  it('should count identical findings', () => {
    const twice = 'package main\n\nimport (\n\t"crypto/rsa"\n\t"crypto/rsa"\n)\n';
    const once = 'package main\n\nimport (\n\t"crypto/rsa"\n)\n';

    expect(diffFindings(outputOf(once), outputOf(twice)).added.map(d => d.position.line)).toEqual([5]);
  });
});

describe('isRelevantChange', () => {
  it('should accept Go sources, go.mod and pqcscan files', () => {
    expect(isRelevantChange('/src/pkg/a.go')).toBe(true);
    expect(isRelevantChange('/src/go.mod')).toBe(true);
    expect(isRelevantChange('/src/.pqcscanignore')).toBe(true);
    expect(isRelevantChange('/src/.pqcscanrc.json')).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isRelevantChange('/src/go.sum')).toBe(false);
    expect(isRelevantChange('/src/README.md')).toBe(false);
  });
});
