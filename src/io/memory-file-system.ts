/**
 * In-memory FileSystem implementation
 * For tests - a virtual POSIX tree, with optional failure injection per operation
 */

import { posix } from 'path';
import { createFileSystemError } from '../types/file-system';
import type {
  FileStats,
  FileSystem,
  FileSystemError,
  FileSystemErrorCode,
  WriteOptions,
} from '../types/file-system';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';

interface VirtualFile {
  type: 'file';
  content: string;
  modifiedAt: Date;
}

interface VirtualDirectory {
  type: 'directory';
  modifiedAt: Date;
}

type VirtualEntry = VirtualFile | VirtualDirectory;

export type MemoryOperation = 'readFile' | 'writeFile' | 'mkdir' | 'rename';

interface InjectedFailure {
  operation: MemoryOperation;
  code: FileSystemErrorCode;
  /** Only fail for paths containing this fragment */
  pathIncludes?: string;
}

export class MemoryFileSystem implements FileSystem {
  private entries: Map<string, VirtualEntry> = new Map();
  private failures: InjectedFailure[] = [];

  constructor(initialFiles: Record<string, string> = {}) {
    this.entries.set('/', { type: 'directory', modifiedAt: new Date() });
    for (const [path, content] of Object.entries(initialFiles)) {
      this.seedFile(path, content);
    }
  }

  /**
   * Make the next matching operation fail with the given code
   */
  failNext(operation: MemoryOperation, code: FileSystemErrorCode, pathIncludes?: string): void {
    this.failures.push({ operation, code, pathIncludes });
  }

  /**
   * Synchronously create a file and its parents (test setup)
   */
  seedFile(path: string, content: string): void {
    const normalized = this.normalizePath(path);
    this.ensureParents(normalized);
    this.entries.set(normalized, { type: 'file', content, modifiedAt: new Date() });
  }

  /**
   * Synchronously read a file (test assertions); undefined when missing
   */
  peek(path: string): string | undefined {
    const entry = this.entries.get(this.normalizePath(path));
    return entry?.type === 'file' ? entry.content : undefined;
  }

  /**
   * All file paths under a prefix, sorted
   */
  filesUnder(prefix: string): string[] {
    const normalized = this.normalizePath(prefix);
    return [...this.entries.entries()]
      .filter(([p, e]) => e.type === 'file' && (p === normalized || p.startsWith(`${normalized}/`)))
      .map(([p]) => p)
      .sort();
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const injected = this.takeFailure('readFile', path);
    if (injected) return err(injected);

    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(entry.content);
  }

  async writeFile(path: string, content: string, options?: WriteOptions): Promise<Result<void, FileSystemError>> {
    const injected = this.takeFailure('writeFile', path);
    if (injected) return err(injected);

    const normalized = this.normalizePath(path);
    const parent = posix.dirname(normalized);
    const parentEntry = this.entries.get(parent);

    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', parent, 'Parent directory does not exist'));
      }
      this.ensureParents(normalized);
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parent));
    }

    if (this.entries.get(normalized)?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.set(normalized, { type: 'file', content, modifiedAt: new Date() });
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(this.normalizePath(path));
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    return ok({
      size: entry.type === 'file' ? entry.content.length : 0,
      isFile: entry.type === 'file',
      isDirectory: entry.type === 'directory',
      modifiedAt: entry.modifiedAt,
    });
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const injected = this.takeFailure('mkdir', path);
    if (injected) return err(injected);

    const normalized = this.normalizePath(path);
    const existing = this.entries.get(normalized);
    if (existing) {
      return existing.type === 'directory'
        ? ok(undefined)
        : err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const parent = posix.dirname(normalized);
    const parentEntry = this.entries.get(parent);
    if (!parentEntry) {
      if (!recursive) {
        return err(createFileSystemError('NOT_FOUND', parent, 'Parent directory does not exist'));
      }
      this.ensureParents(normalized);
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parent));
    }

    this.entries.set(normalized, { type: 'directory', modifiedAt: new Date() });
    return ok(undefined);
  }

  async rename(oldPath: string, newPath: string): Promise<Result<void, FileSystemError>> {
    const injected = this.takeFailure('rename', oldPath);
    if (injected) return err(injected);

    const from = this.normalizePath(oldPath);
    const to = this.normalizePath(newPath);
    const entry = this.entries.get(from);
    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', oldPath));
    }
    const destParent = this.entries.get(posix.dirname(to));
    if (!destParent || destParent.type !== 'directory') {
      return err(createFileSystemError('NOT_FOUND', posix.dirname(to), 'Parent directory does not exist'));
    }

    this.entries.delete(from);
    this.entries.set(to, entry);
    return ok(undefined);
  }

  resolve(...paths: string[]): string {
    return posix.resolve('/', ...paths);
  }

  join(...paths: string[]): string {
    return posix.join(...paths);
  }

  isAbsolute(path: string): boolean {
    return posix.isAbsolute(path);
  }

  private normalizePath(path: string): string {
    return posix.resolve('/', path);
  }

  private ensureParents(normalized: string): void {
    let current = posix.dirname(normalized);
    const missing: string[] = [];
    while (!this.entries.has(current)) {
      missing.push(current);
      current = posix.dirname(current);
    }
    for (const dir of missing.reverse()) {
      this.entries.set(dir, { type: 'directory', modifiedAt: new Date() });
    }
  }

  private takeFailure(operation: MemoryOperation, path: string): FileSystemError | undefined {
    const index = this.failures.findIndex(
      (f) => f.operation === operation && (f.pathIncludes === undefined || path.includes(f.pathIncludes))
    );
    if (index === -1) {
      return undefined;
    }
    const [failure] = this.failures.splice(index, 1);
    return createFileSystemError(failure.code, path, `Injected ${failure.code} on ${operation}`);
  }
}
