/**
 * Safe file system utilities with path validation.
 *
 * Every path is resolved to an absolute path and checked before any file
 * system operation is attempted:
 *
 * - empty paths and paths with null bytes are rejected
 * - "." and ".." segments are normalized away by resolution
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
 * @throws {PathValidationError} If the path is empty, contains null bytes, or
 *   does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
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
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf8');
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf8');
}

/**
 * Synchronously checks if a file or directory exists after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}

/**
 * Lists a directory's entries after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be read.
 */
export async function safeReaddirEntries(dirPath: string): Promise<fsSync.Dirent[]> {
  const validatedPath = validatePath(dirPath);
  return fs.readdir(validatedPath, { withFileTypes: true });
}

/**
 * Gets file statistics after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the statistics cannot be retrieved.
 */
export async function safeStat(filePath: string): Promise<fsSync.Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}
