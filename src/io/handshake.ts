/**
 * Instruction/result handshake
 *
 * The Manager side writes one instruction file; the Worker answers with one
 * result file, which is moved under `processed/` once consumed.
 */

import { basename, dirname, extname, resolve } from 'path';
import type { Clock } from '../types/clock';
import type { HandshakeConfig } from '../types/effective-config';
import type { FileSystem, FileSystemError } from '../types/file-system';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';

export interface HandshakePaths {
  instructionsDir: string;
  logsDir: string;
  processedDir: string;
  instructionFile: string;
  resultFile: string;
}

// Collisions inside the same millisecond are rare; give up well before this
const MAX_ARCHIVE_SUFFIX = 1000;

export function resolveHandshakePaths(workspaceRoot: string, config: HandshakeConfig): HandshakePaths {
  const instructionsDir = resolve(workspaceRoot, config.instructionsDir);
  const logsDir = resolve(workspaceRoot, config.logsDir);
  return {
    instructionsDir,
    logsDir,
    processedDir: resolve(logsDir, config.processedDirName),
    instructionFile: resolve(instructionsDir, config.instructionFileName),
    resultFile: resolve(logsDir, config.resultFileName),
  };
}

/**
 * Create the instructions, logs and processed directories
 */
export async function ensureHandshakeDirectories(
  fs: FileSystem,
  paths: HandshakePaths
): Promise<Result<void, FileSystemError>> {
  for (const dir of [paths.instructionsDir, paths.logsDir, paths.processedDir]) {
    const created = await fs.mkdir(dir, true);
    if (!created.ok) {
      return created;
    }
  }
  return ok(undefined);
}

/**
 * Overwrite the instruction file with the Manager's latest instruction
 */
export async function writeInstruction(
  fs: FileSystem,
  paths: HandshakePaths,
  instruction: string
): Promise<Result<void, FileSystemError>> {
  return fs.writeFile(paths.instructionFile, instruction, { createParents: true });
}

export async function readResult(fs: FileSystem, paths: HandshakePaths): Promise<Result<string, FileSystemError>> {
  return fs.readFile(paths.resultFile);
}

/**
 * `YYYYMMDD_HHMMSS_mmm` in UTC
 */
export function formatArchiveTimestamp(date: Date): string {
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}_${pad(date.getUTCMilliseconds(), 3)}`;
}

/**
 * Move the consumed result file into the processed directory.
 * Returns the archived path. The file is never deleted.
 */
export async function archiveResult(
  fs: FileSystem,
  paths: HandshakePaths,
  clock: Clock
): Promise<Result<string, FileSystemError>> {
  const created = await fs.mkdir(paths.processedDir, true);
  if (!created.ok) {
    return created;
  }

  const ext = extname(paths.resultFile);
  const stem = `${basename(paths.resultFile, ext)}_${formatArchiveTimestamp(clock.now())}`;

  let target = resolve(paths.processedDir, `${stem}${ext}`);
  for (let suffix = 1; await fs.exists(target); suffix++) {
    if (suffix > MAX_ARCHIVE_SUFFIX) {
      return err({
        code: 'ALREADY_EXISTS',
        path: target,
        message: `No free archive slot for ${paths.resultFile}`,
      });
    }
    target = resolve(paths.processedDir, `${stem}-${suffix}${ext}`);
  }

  const moved = await fs.rename(paths.resultFile, target);
  return moved.ok ? ok(target) : moved;
}

/**
 * Archive a result file left over from an earlier wait, so the next result is a
 * new file again. Returns the archived path, or null when there was none.
 */
export async function archiveStaleResult(
  fs: FileSystem,
  paths: HandshakePaths,
  clock: Clock
): Promise<Result<string | null, FileSystemError>> {
  if (!(await fs.exists(paths.resultFile))) {
    return ok(null);
  }
  return archiveResult(fs, paths, clock);
}

/**
 * Whether a watcher event names the result file directly inside the logs directory
 */
export function isResultFileEvent(eventPath: string, paths: HandshakePaths): boolean {
  const absolute = resolve(paths.logsDir, eventPath);
  return dirname(absolute) === paths.logsDir && absolute === paths.resultFile;
}
