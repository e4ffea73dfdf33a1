/**
 * Integration tests for Go Language Adapter
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { GoLanguageAdapter } from '../src/languages/go/index.js';

describe('GoLanguageAdapter', () => {
  let adapter: GoLanguageAdapter;
  let tempDir: string;

  beforeAll(async () => {
    adapter = new GoLanguageAdapter();
    tempDir = join(tmpdir(), `pqcscan-go-test-${Date.now()}`);
    await fs.mkdir(tempDir, { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('canHandle', () => {
    it('should detect Go project with go.mod', async () => {
      const projectDir = join(tempDir, 'go-mod-project');
      await fs.mkdir(projectDir, { recursive: true });
      await fs.writeFile(join(projectDir, 'go.mod'), 'module example.com/test\n\ngo 1.21\n');

      expect(await adapter.canHandle(projectDir)).toBe(true);
    });

    it('should detect Go project with .go files only', async () => {
      const projectDir = join(tempDir, 'go-files-only');
      await fs.mkdir(projectDir, { recursive: true });
      await fs.writeFile(join(projectDir, 'main.go'), 'package main\n');

      expect(await adapter.canHandle(projectDir)).toBe(true);
    });

    it('should return false for non-Go project', async () => {
      const projectDir = join(tempDir, 'non-go');
      await fs.mkdir(projectDir, { recursive: true });
      await fs.writeFile(join(projectDir, 'package.json'), '{}');

      expect(await adapter.canHandle(projectDir)).toBe(false);
    });
  });

  describe('findSourceFiles', () => {
    it('should skip vendor and testdata but keep test files', async () => {
      const projectDir = join(tempDir, 'layout');
      await fs.mkdir(join(projectDir, 'pkg', 'vendor'), { recursive: true });
      await fs.mkdir(join(projectDir, 'testdata'), { recursive: true });
      await fs.writeFile(join(projectDir, 'b.go'), 'package main\n');
      await fs.writeFile(join(projectDir, 'a.go'), 'package main\n');
      await fs.writeFile(join(projectDir, 'a_test.go'), 'package main\n');
      await fs.writeFile(join(projectDir, 'pkg', 'vendor', 'v.go'), 'package vendor\n');
      await fs.writeFile(join(projectDir, 'testdata', 't.go'), 'package testdata\n');

      const files = await adapter.findSourceFiles(projectDir);
      expect(files).toEqual([join(projectDir, 'a.go'), join(projectDir, 'a_test.go'), join(projectDir, 'b.go')]);
    });
  });

  describe('loadFiles', () => {
    it('should parse files and report unreadable ones', async () => {
      const projectDir = join(tempDir, 'load');
      await fs.mkdir(join(projectDir, 'sub'), { recursive: true });
      await fs.writeFile(join(projectDir, 'sub', 'x.go'), 'package sub\n\nimport "crypto/rsa"\n');

      const loaded = await adapter.loadFiles(projectDir, [
        join(projectDir, 'sub', 'x.go'),
        join(projectDir, 'missing.go'),
      ]);

      expect(loaded).toHaveLength(2);
      const [parsed, missing] = loaded;
      expect(parsed.file).toBe('sub/x.go');
      expect(parsed.ok && parsed.parsed.imports[0].literalPosition.file).toBe('sub/x.go');
      expect(missing).toMatchObject({ file: 'missing.go', ok: false });
    });
  });
});
