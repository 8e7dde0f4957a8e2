/**
 * Tests for file discovery and fingerprinting
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  discoverFiles,
  fingerprintFiles,
  hashFile,
  matchPatterns,
  normalizeReportedPath,
} from '../file-walker.js';
import { Logger, type LogEntry } from '../../utils/logger.js';

describe('file-walker', () => {
  let root: string;

  const put = async (file: string, content = 'x') => {
    await mkdir(dirname(join(root, file)), { recursive: true });
    await writeFile(join(root, file), content);
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'file-walker-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('discoverFiles', () => {
    it('should return sorted POSIX paths filtered by extension', async () => {
      await put('src/z.ts');
      await put('src/a/b.js');
      await put('styles.css');

      const result = await discoverFiles({ rootDir: root });

      expect(result.files).toEqual(['src/a/b.js', 'src/z.ts']);
      expect(result.count).toBe(2);
    });

    it('should honor custom extensions and ignore globs', async () => {
      await put('a.py');
      await put('gen/b.py');
      await put('c.ts');

      const result = await discoverFiles({ rootDir: root, includeExtensions: ['.py'], ignore: ['gen/**'] });

      expect(result.files).toEqual(['a.py']);
    });

    it('should skip excluded directories at any depth', async () => {
      await put('packages/app/node_modules/dep/index.js');
      await put('packages/app/index.js');

      const result = await discoverFiles({ rootDir: root });

      expect(result.files).toEqual(['packages/app/index.js']);
    });
  });

  describe('matchPatterns', () => {
    it('should resolve exact paths and globs without duplicates', async () => {
      await put('package.json');
      await put('config/a.yml');
      await put('config/b.yml');

      const files = await matchPatterns(root, ['package.json', 'config/*.yml', 'config/a.yml', 'missing.txt']);

      expect(files).toEqual(['config/a.yml', 'config/b.yml', 'package.json']);
    });

    it('should return nothing for no patterns', async () => {
      expect(await matchPatterns(root, [])).toEqual([]);
    });
  });

  describe('fingerprints', () => {
    it('should produce 16 hex characters that follow content', async () => {
      await put('a.ts', 'one');
      const first = await hashFile(join(root, 'a.ts'));
      await put('a.ts', 'two');
      const second = await hashFile(join(root, 'a.ts'));

      expect(first).toMatch(/^[0-9a-f]{16}$/);
      expect(second).not.toBe(first);
    });

    it('should skip unreadable files with a warning', async () => {
      await put('a.ts', 'one');
      const entries: LogEntry[] = [];
      const logger = new Logger({ enableConsole: false, onLog: (entry) => entries.push(entry) });

      const result = await fingerprintFiles(root, ['a.ts', 'vanished.ts'], logger);

      expect([...result.keys()]).toEqual(['a.ts']);
      expect(entries[0]?.message).toBe('Skipping unreadable file');
      expect(entries[0]?.context?.file).toBe('vanished.ts');
    });
  });

  describe('normalizeReportedPath', () => {
    it('should relativize absolute paths under the root', () => {
      expect(normalizeReportedPath(join(root, 'src', 'a.ts'), root)).toBe('src/a.ts');
    });

    it('should normalize relative paths', () => {
      expect(normalizeReportedPath('./src/../src/a.ts', root)).toBe('src/a.ts');
      expect(normalizeReportedPath('src\\win\\a.ts', root)).toBe('src/win/a.ts');
    });

    it('should pass through absolute paths outside the root', () => {
      expect(normalizeReportedPath('/elsewhere/a.ts', root)).toBe('/elsewhere/a.ts');
    });
  });
});
