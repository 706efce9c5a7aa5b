import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import {
  validatePath,
  safeReadFile,
  safeReadFileSync,
  safeWriteFile,
  safeExists,
  PathValidationError,
} from './safe-fs.js';
import { mkdtemp, rm } from 'node:fs/promises';
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
      expect(validatePath('/tmp/rules.toml')).toBe('/tmp/rules.toml');
    });

    it('should resolve relative paths to absolute', () => {
      const result = validatePath('./protocol.json');
      expect(path.isAbsolute(result)).toBe(true);
      expect(result).toBe(path.resolve('./protocol.json'));
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/proto\0col.json')).toThrow('null bytes');
    });

    it('should reject non-string values', () => {
      expect(() => Reflect.apply(validatePath, undefined, [undefined])).toThrow(PathValidationError);
    });

    it('should always return an absolute path for non-empty inputs without null bytes', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => path.isAbsolute(validatePath(input))
        )
      );
    });
  });

  describe('file operations', () => {
    it('should write and read back a text file', async () => {
      const filePath = join(tempDir, 'report.txt');
      await safeWriteFile(filePath, 'Protocol Quality Report', 'utf-8');

      expect(await safeReadFile(filePath, 'utf-8')).toBe('Protocol Quality Report');
      expect(safeReadFileSync(filePath, 'utf-8')).toBe('Protocol Quality Report');
    });

    it('should report existence', async () => {
      const filePath = join(tempDir, 'exists.txt');
      expect(await safeExists(filePath)).toBe(false);
      await safeWriteFile(filePath, '', 'utf-8');
      expect(await safeExists(filePath)).toBe(true);
    });

    it('should reject reading a missing file', async () => {
      await expect(safeReadFile(join(tempDir, 'missing.toml'), 'utf-8')).rejects.toThrow();
    });
  });
});
