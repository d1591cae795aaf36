/**
 * File system utilities with path validation and user-path expansion.
 *
 * Every path is validated and resolved to an absolute path before any
 * file system operation is attempted. Operator-supplied paths additionally
 * go through home-directory and environment-variable expansion.
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
import * as os from 'node:os';
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
 * What currently occupies a path.
 */
export type PathKind = 'missing' | 'directory' | 'file' | 'other';

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes, or does not resolve to an absolute path.
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
 * Expands a leading `~` and any `$VAR` or `${VAR}` references.
 *
 * Variables missing from `env` are left exactly as written.
 *
 * @param filePath - The path as typed by the operator.
 * @param env - Environment to read variables from.
 * @param home - Home directory used for `~`.
 * @returns The expanded (possibly still relative) path.
 *
 * @example
 * ```typescript
 * expandPath('~/out/$CLUSTER', { CLUSTER: 'foo' }, '/home/op'); // "/home/op/out/foo"
 * ```
 */
export function expandPath(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
  home: string = os.homedir()
): string {
  let expanded = filePath;

  if (expanded === '~') {
    expanded = home;
  } else if (expanded.startsWith('~/') || expanded.startsWith(`~${path.sep}`)) {
    expanded = path.join(home, expanded.slice(2));
  }

  return expanded.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) {
        return match;
      }
      const value = env[name];
      return value ?? match;
    }
  );
}

/**
 * Expands and resolves an operator-supplied path to an absolute path.
 *
 * @param filePath - The path as typed by the operator.
 * @param env - Environment to read variables from.
 * @param home - Home directory used for `~`.
 * @returns The absolute path.
 * @throws {PathValidationError} If the expanded path is invalid.
 */
export function resolveUserPath(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
  home: string = os.homedir()
): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  return validatePath(expandPath(filePath, env, home));
}

/**
 * Reports what occupies a path, following symbolic links.
 *
 * @param filePath - The path to inspect.
 * @throws {PathValidationError} If the path is invalid.
 */
export function inspectPathSync(filePath: string): PathKind {
  const validatedPath = validatePath(filePath);
  let stats: fsSync.Stats | undefined;
  try {
    stats = fsSync.statSync(validatedPath, { throwIfNoEntry: false });
  } catch (error) {
    // A file somewhere in the parent chain means nothing can exist here.
    if (error instanceof Error && 'code' in error && error.code === 'ENOTDIR') {
      return 'missing';
    }
    throw error;
  }

  if (stats === undefined) {
    return 'missing';
  }
  if (stats.isDirectory()) {
    return 'directory';
  }
  if (stats.isFile()) {
    return 'file';
  }
  return 'other';
}

/**
 * Synchronously checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf-8');
}

/**
 * Synchronously writes to a file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The data to write to the file.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export function safeWriteFileSync(filePath: string, data: string): void {
  const validatedPath = validatePath(filePath);
  fsSync.writeFileSync(validatedPath, data, 'utf-8');
}

/**
 * Synchronously creates a directory after validating the path.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive mode and mode options.
 * @returns The first directory created, when recursive.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created (e.g., permission denied, file exists).
 */
export function safeMkdirSync(
  filePath: string,
  options?: { recursive?: boolean; mode?: number }
): string | undefined {
  const validatedPath = validatePath(filePath);
  return fsSync.mkdirSync(validatedPath, options);
}
