/**
 * Safe file system utilities with path validation.
 *
 * Every function resolves and validates its path before touching the file
 * system. Empty paths and paths containing null bytes are rejected.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
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
 * Validates that a path stays inside a root directory.
 *
 * Used for output files whose names are derived from input namespaces.
 *
 * @param root - The directory the path must stay within.
 * @param relativePath - The path relative to the root.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path escapes the root.
 */
export function resolveWithin(root: string, relativePath: string): string {
  const resolvedRoot = validatePath(root);
  const resolved = validatePath(path.resolve(resolvedRoot, relativePath));
  const relative = path.relative(resolvedRoot, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathValidationError(`Path escapes output directory '${root}'`, relativePath);
  }

  return resolved;
}

/**
 * Checks whether a path is a directory or one of its descendants.
 *
 * @param directory - The candidate ancestor.
 * @param target - The path to locate.
 * @returns True when `target` resolves to `directory` or a path below it.
 */
export function containsPath(directory: string, target: string): boolean {
  const relative = path.relative(validatePath(directory), validatePath(target));
  const outside = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !outside && !path.isAbsolute(relative);
}

/**
 * Safely reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns A promise that resolves to the file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Safely writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Safely creates a directory after validating the path.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive mode.
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Safely removes a file or directory after validating the path.
 *
 * @param filePath - The path to remove.
 * @param options - Options for removal.
 */
export async function safeRm(
  filePath: string,
  options?: { force?: boolean; recursive?: boolean }
): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.rm(validatedPath, options);
}
