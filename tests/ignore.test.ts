/**
 * Tests for ignore file support
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  parseIgnoreLine,
  parseIgnoreFile,
  loadIgnoreConfig,
  shouldIgnore,
  filterIgnored,
  createEmptyConfig,
  addPatterns,
  generateSampleIgnoreFile,
  DEFAULT_IGNORE_FILES
} from '../src/ignore/index.js';

describe('parseIgnoreLine', () => {
  it('should parse simple pattern', () => {
    const result = parseIgnoreLine('vendor', 1, 'test');
    expect(result).toMatchObject({ pattern: 'vendor', negated: false, source: 'test', line: 1 });
  });

  it('should parse negation pattern', () => {
    const result = parseIgnoreLine('!keep.go', 3, 'test');
    expect(result).toMatchObject({ pattern: '!keep.go', negated: true, line: 3 });
  });

  it('should skip empty lines and comments', () => {
    expect(parseIgnoreLine('', 1, 'test')).toBeNull();
    expect(parseIgnoreLine('   ', 1, 'test')).toBeNull();
    expect(parseIgnoreLine('# comment', 1, 'test')).toBeNull();
    expect(parseIgnoreLine('!', 1, 'test')).toBeNull();
  });

  it('should match a bare name at any depth, including directory contents', () => {
    const result = parseIgnoreLine('vendor', 1, 'test');
    expect(result?.matcher('vendor/x.go')).toBe(true);
    expect(result?.matcher('a/vendor/b.go')).toBe(true);
    expect(result?.matcher('vendored.go')).toBe(false);
  });

  it('should anchor patterns with a leading slash', () => {
    const result = parseIgnoreLine('/gen', 1, 'test');
    expect(result?.matcher('gen/a.go')).toBe(true);
    expect(result?.matcher('x/gen/a.go')).toBe(false);
  });

  it('should match globs', () => {
    const result = parseIgnoreLine('*.pb.go', 1, 'test');
    expect(result?.matcher('a.pb.go')).toBe(true);
    expect(result?.matcher('api/v1/a.pb.go')).toBe(true);
    expect(result?.matcher('a.go')).toBe(false);
  });

  it('should handle directory patterns', () => {
    const result = parseIgnoreLine('third_party/', 1, 'test');
    expect(result?.matcher('third_party/x/y.go')).toBe(true);
    expect(result?.matcher('third_party.go')).toBe(false);
  });
});

describe('shouldIgnore', () => {
  it('should let later negations win', () => {
    const config = { ...createEmptyConfig('/project'), patterns: parseIgnoreFile('*.go\n!keep.go\n', 'test') };

    expect(shouldIgnore('a.go', config)).toBe(true);
    expect(shouldIgnore('keep.go', config)).toBe(false);
    expect(shouldIgnore('/project/sub/a.go', config)).toBe(true);
  });

  it('should never ignore paths outside the root', () => {
    const config = addPatterns(createEmptyConfig('/project'), ['gen/']);

    expect(shouldIgnore('/project/gen/a.go', config)).toBe(true);
    expect(shouldIgnore('/other/gen/a.go', config)).toBe(false);
  });

  it('should filter a file list', () => {
    const config = addPatterns(createEmptyConfig('/project'), ['*_gen.go']);

    expect(filterIgnored(['/project/a.go', '/project/b_gen.go', '/project/c/d_gen.go'], config)).toEqual(['/project/a.go']);
  });
});

describe('addPatterns', () => {
  it('should return the same config when nothing is added', () => {
    const config = createEmptyConfig('/project');

    expect(addPatterns(config, [])).toBe(config);
    expect(addPatterns(config, ['# only a comment'])).toBe(config);
  });

  it('should record the source', () => {
    const config = addPatterns(createEmptyConfig('/project'), ['a', 'b'], '--ignore');

    expect(config.sources).toEqual(['--ignore']);
    expect(config.patterns.map(p => p.line)).toEqual([1, 2]);
  });
});

describe('loadIgnoreConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pqcscan-ignore-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return an empty config without ignore files', async () => {
    const config = await loadIgnoreConfig(tempDir);

    expect(config.patterns).toEqual([]);
    expect(config.sources).toEqual([]);
    expect(config.rootDir).toBe(tempDir);
  });

  it('should fall back to .gitignore', async () => {
    await writeFile(join(tempDir, '.gitignore'), 'build/\n');

    const config = await loadIgnoreConfig(tempDir);

    expect(config.sources).toEqual([join(tempDir, '.gitignore')]);
    expect(config.patterns.map(p => p.pattern)).toEqual(['build/']);
  });

  it('should prefer .pqcscanignore over .gitignore', async () => {
    await writeFile(join(tempDir, '.gitignore'), 'build/\n');
    await writeFile(join(tempDir, '.pqcscanignore'), '# generated\n*.pb.go\n');

    const config = await loadIgnoreConfig(tempDir);

    expect(config.sources).toEqual([join(tempDir, '.pqcscanignore')]);
    expect(config.patterns.map(p => [p.pattern, p.line])).toEqual([['*.pb.go', 2]]);
    expect(DEFAULT_IGNORE_FILES[0]).toBe('.pqcscanignore');
  });

  it('should load an explicit ignore file', async () => {
    await writeFile(join(tempDir, 'custom.ignore'), 'legacy/\n');

    const config = await loadIgnoreConfig(tempDir, 'custom.ignore');

    expect(config.sources).toEqual([join(tempDir, 'custom.ignore')]);
  });

  it('should reject a missing explicit ignore file', async () => {
    await expect(loadIgnoreConfig(tempDir, 'missing.ignore'))
      .rejects.toThrow(`Ignore file not found: ${join(tempDir, 'missing.ignore')}`);
  });
});

describe('generateSampleIgnoreFile', () => {
  it('should produce parseable patterns', () => {
    const patterns = parseIgnoreFile(generateSampleIgnoreFile(), 'sample');

    expect(patterns.map(p => p.pattern)).toEqual(['*.pb.go', '*_gen.go', 'zz_generated.*', 'third_party/']);
  });
});
