import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { validatePath, safeReadTextFile, safeIsFile, PathValidationError } from './safe-fs.js';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve and validate absolute paths', () => {
      expect(validatePath('/tmp/test.toml')).toBe('/tmp/test.toml');
    });

    it('should resolve relative paths against the given base', () => {
      expect(validatePath('conf/app.toml', '/srv/project')).toBe('/srv/project/conf/app.toml');
    });

    it('should resolve relative paths to absolute without a base', () => {
      expect(path.isAbsolute(validatePath('./test.toml'))).toBe(true);
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      const bad = '/tmp/test\0file.toml';
      expect(() => validatePath(bad)).toThrow('Path cannot contain null bytes');
      try {
        validatePath(bad);
      } catch (error) {
        expect(error instanceof PathValidationError && error.invalidPath).toBe(bad);
      }
    });

    describe('Property-based tests', () => {
      it('non-empty strings without null bytes resolve to absolute paths', () => {
        fc.assert(
          fc.property(
            fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
            (p) => path.isAbsolute(validatePath(p))
          )
        );
      });

      it('strings with null bytes throw PathValidationError', () => {
        fc.assert(
          fc.property(fc.string(), fc.string(), (before, after) => {
            expect(() => validatePath(`${before}\0${after}`)).toThrow(PathValidationError);
          })
        );
      });
    });
  });

  describe('safeReadTextFile', () => {
    it('should read a file after validating the path', async () => {
      const file = join(tempDir, 'read.toml');
      await writeFile(file, 'key = "value"\n');
      expect(await safeReadTextFile(file)).toBe('key = "value"\n');
    });

    it('should throw validation error for empty path', async () => {
      await expect(safeReadTextFile('')).rejects.toThrow(PathValidationError);
    });

    it('should reject when the file does not exist', async () => {
      await expect(safeReadTextFile(join(tempDir, 'missing.toml'))).rejects.toThrow('ENOENT');
    });
  });

  describe('safeIsFile', () => {
    it('should return true for existing files', async () => {
      const file = join(tempDir, 'exists.toml');
      await writeFile(file, '');
      expect(await safeIsFile(file)).toBe(true);
    });

    it('should return false for directories', async () => {
      const dir = join(tempDir, 'subdir');
      await mkdir(dir, { recursive: true });
      expect(await safeIsFile(dir)).toBe(false);
    });

    it('should return false for non-existent files', async () => {
      expect(await safeIsFile(join(tempDir, 'nope.toml'))).toBe(false);
    });

    it('should throw validation error for empty path', async () => {
      await expect(safeIsFile('')).rejects.toThrow(PathValidationError);
    });
  });
});
