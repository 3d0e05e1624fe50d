/**
 * File system helpers with path validation.
 *
 * Every path is resolved to an absolute path and rejected when empty or when
 * it contains null bytes, before any file system call is made. Include
 * resolution and schema loading go through these helpers.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
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
 * @throws {PathValidationError} If the path is empty or contains null bytes.
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
 * Synchronously checks that a path names a regular file.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists and is a file; false for directories,
 *   missing paths and paths that descend through a file.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeIsFileSync(filePath: string): boolean {
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(validatePath(filePath), { throwIfNoEntry: false });
  } catch (error) {
    // A path running through a regular file does not exist either.
    if (error instanceof Error && 'code' in error && error.code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
  return stats?.isFile() ?? false;
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadFileSync(filePath: string): string {
  return fs.readFileSync(validatePath(filePath), 'utf8');
}
