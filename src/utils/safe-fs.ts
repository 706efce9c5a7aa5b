/**
 * File system helpers that validate paths before use.
 *
 * Every path is resolved to an absolute path and rejected when it is empty
 * or contains null bytes, so rule catalogs, configuration files and protocol
 * documents named on the command line are only read from where they resolve.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is not a string, is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @param encoding - Text encoding.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string, encoding: BufferEncoding): Promise<string> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readFile(validatedPath, { encoding });
}

/**
 * Synchronously reads a text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @param encoding - Text encoding.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeReadFileSync(filePath: string, encoding: BufferEncoding): string {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fsSync.readFileSync(validatedPath, { encoding });
}

/**
 * Writes a text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @param encoding - Text encoding.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding
): Promise<void> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  await fs.writeFile(validatedPath, data, { encoding });
}

/**
 * Checks whether a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronously reports whether a path exists and is a directory.
 *
 * @param filePath - The path to check.
 * @returns Existence and directory flags; `isDirectory` is false when the path is missing.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeStatSync(filePath: string): { exists: boolean; isDirectory: boolean } {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  const stats = fsSync.statSync(validatedPath, { throwIfNoEntry: false });
  if (stats === undefined) {
    return { exists: false, isDirectory: false };
  }
  return { exists: true, isDirectory: stats.isDirectory() };
}
