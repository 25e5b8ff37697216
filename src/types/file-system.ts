/**
 * FileSystem interface
 * The handshake files, archive moves and JSON state all go through this.
 * Writes are atomic (temp file, then rename) in every implementation.
 */

import type { Result } from './result';

export interface WriteOptions {
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

export interface FileStats {
  size: number;
  isFile: boolean;
  isDirectory: boolean;
  modifiedAt: Date;
}

export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'ALREADY_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  writeFile(path: string, content: string, options?: WriteOptions): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  stat(path: string): Promise<Result<FileStats, FileSystemError>>;

  /**
   * Create a directory. Succeeds if it already exists.
   */
  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  /**
   * Move a file; the destination directory must exist
   */
  rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>>;

  resolve(...paths: string[]): string;
  join(...paths: string[]): string;
  isAbsolute(path: string): boolean;
}

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    ALREADY_EXISTS: `Path already exists: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}
