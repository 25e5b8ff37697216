/**
 * Real FileSystem implementation
 * Uses node:fs with atomic writes, mapping errno codes to FileSystemError
 */

import { promises as fsp } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { randomBytes } from 'crypto';
import { createFileSystemError } from '../types/file-system';
import type { FileStats, FileSystem, FileSystemError, WriteOptions } from '../types/file-system';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Translate a thrown fs error into a FileSystemError
 */
export function toFileSystemError(error: unknown, path: string): FileSystemError {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return createFileSystemError('NOT_FOUND', path);
    case 'EACCES':
    case 'EPERM':
      return createFileSystemError('PERMISSION_DENIED', path);
    case 'EEXIST':
      return createFileSystemError('ALREADY_EXISTS', path);
    case 'EISDIR':
      return createFileSystemError('NOT_A_FILE', path);
    case 'ENOTDIR':
      return createFileSystemError('NOT_A_DIRECTORY', path);
    default: {
      const cause = error instanceof Error ? error : new Error(String(error));
      return createFileSystemError('IO_ERROR', path, cause.message, cause);
    }
  }
}

export class RealFileSystem implements FileSystem {
  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    try {
      return ok(await fsp.readFile(path, { encoding: 'utf-8' }));
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const tempPath = `${path}.${randomBytes(8).toString('hex')}.tmp`;
    try {
      if (options?.createParents) {
        await fsp.mkdir(dirname(path), { recursive: true });
      }
      await fsp.writeFile(tempPath, content, { encoding: 'utf-8' });
      await fsp.rename(tempPath, path);
      return ok(undefined);
    } catch (error) {
      await fsp.rm(tempPath, { force: true });
      return err(toFileSystemError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fsp.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    try {
      const stats = await fsp.stat(path);
      return ok({
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        modifiedAt: stats.mtime,
      });
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    try {
      await fsp.mkdir(path, { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        const stats = await this.stat(path);
        if (stats.ok && stats.value.isDirectory) {
          return ok(undefined);
        }
      }
      return err(toFileSystemError(error, path));
    }
  }

  async rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>> {
    try {
      await fsp.rename(oldPath, newPath);
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, oldPath));
    }
  }

  resolve(...paths: string[]): string {
    return resolve(...paths);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  isAbsolute(path: string): boolean {
    return isAbsolute(path);
  }
}

export function createRealFileSystem(): FileSystem {
  return new RealFileSystem();
}
