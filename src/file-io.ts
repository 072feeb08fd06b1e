/**
 * @fileoverview Whole-file load and save
 * @description The buffer is a byte-for-byte mirror of the file; there is no
 * container format and no incremental write path.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { EditorError, fail, fromNodeError, errorCode, errorMessage, ok, type Result } from './errors';
import { EditorErrorKind } from './types/editor-types';
import { type ConfirmationGate } from './types/common';
import { formatFileSize } from './utils/hex';
import { type Logger, silentLogger } from './utils/logger';

interface LoadOptions {
  /** Sizes above this need `confirm` to agree */
  largeFileThreshold?: number;
  confirm?: ConfirmationGate;
  logger?: Logger;
}

interface LoadedFile {
  path: string;
  bytes: Buffer;
  size: number;
  mtime: Date;
}

interface SaveOptions {
  /** Write a temporary sibling and rename it over an existing target */
  atomic?: boolean;
  logger?: Logger;
}

interface SavedFile {
  path: string;
  size: number;
  mtime: Date;
  wasAtomic: boolean;
}

const DEFAULT_LARGE_FILE_THRESHOLD = 500 * 1024 * 1024;

/**
 * Read a whole file into memory
 */
async function loadBinaryFile(filePath: string, options: LoadOptions = {}): Promise<Result<LoadedFile>> {
  const logger = options.logger ?? silentLogger;
  const threshold = options.largeFileThreshold ?? DEFAULT_LARGE_FILE_THRESHOLD;

  let stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error) {
    return fail(fromNodeError(error, 'stat', filePath));
  }

  if (!stats.isFile()) {
    return fail(new EditorError(EditorErrorKind.IO_FAILURE, `Not a regular file: ${filePath}`, { path: filePath }));
  }

  if (stats.size > threshold) {
    const message =
      `This file is ${formatFileSize(stats.size)}. ` +
      'Loading large files may use significant memory. Continue?';
    const approved = options.confirm
      ? await options.confirm({ reason: 'large_file', message, path: filePath, size: stats.size })
      : false;
    if (!approved) {
      logger.info(`Declined to load ${filePath} (${stats.size} bytes)`);
      return fail(new EditorError(EditorErrorKind.LOAD_DECLINED, `Load of ${filePath} was not confirmed`, { path: filePath }));
    }
  }

  try {
    const bytes = await fs.readFile(filePath);
    logger.debug(`Loaded ${bytes.length} bytes from ${filePath}`);
    return ok({ path: filePath, bytes, size: bytes.length, mtime: stats.mtime });
  } catch (error) {
    return fail(fromNodeError(error, 'read', filePath));
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function tempPathFor(target: string): string {
  const suffix = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

async function removeTempFile(tempPath: string, logger: Logger): Promise<void> {
  try {
    await fs.unlink(tempPath);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      logger.warn(`Failed to clean up temporary file ${tempPath}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Write the full buffer to `filePath`. An existing target is replaced
 * through a temporary file so a failed write leaves it intact.
 */
async function saveBinaryFile(filePath: string, bytes: Uint8Array, options: SaveOptions = {}): Promise<Result<SavedFile>> {
  const logger = options.logger ?? silentLogger;
  const atomic = (options.atomic ?? true) && (await fileExists(filePath));

  if (!atomic) {
    try {
      await fs.writeFile(filePath, bytes);
    } catch (error) {
      return fail(fromNodeError(error, 'write', filePath));
    }
  } else {
    const tempPath = tempPathFor(filePath);
    try {
      await fs.writeFile(tempPath, bytes);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await removeTempFile(tempPath, logger);
      return fail(fromNodeError(error, 'write', filePath));
    }
  }

  try {
    const stats = await fs.stat(filePath);
    logger.debug(`Saved ${bytes.length} bytes to ${filePath}${atomic ? ' (atomic)' : ''}`);
    return ok({ path: filePath, size: stats.size, mtime: stats.mtime, wasAtomic: atomic });
  } catch (error) {
    return fail(fromNodeError(error, 'stat', filePath));
  }
}

/**
 * Write a text report
 */
async function writeTextFile(filePath: string, text: string): Promise<Result<void>> {
  try {
    await fs.writeFile(filePath, text, 'utf8');
    return ok(undefined);
  } catch (error) {
    return fail(fromNodeError(error, 'write', filePath));
  }
}

export {
  DEFAULT_LARGE_FILE_THRESHOLD,
  loadBinaryFile,
  saveBinaryFile,
  writeTextFile,
  fileExists,
  type LoadOptions,
  type LoadedFile,
  type SaveOptions,
  type SavedFile
};
