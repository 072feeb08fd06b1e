/**
 * @fileoverview Most-recently-opened file list, persisted one path per line
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { errorCode, fail, fromNodeError, ok, type Result } from './errors';
import { fileExists } from './file-io';
import { type Logger, silentLogger } from './utils/logger';

const RECENT_FILES_NAME = 'recent_hex_files.txt';

/**
 * Default location: `~/.octet-editor/recent_hex_files.txt`
 */
function defaultRecentFilesPath(): string {
  return path.join(os.homedir(), '.octet-editor', RECENT_FILES_NAME);
}

interface RecentFilesOptions {
  storePath?: string;
  limit?: number;
  logger?: Logger;
}

class RecentFiles {
  private readonly storePath: string;
  private limit: number;
  private readonly logger: Logger;
  private entries: string[] = [];

  constructor(options: RecentFilesOptions = {}) {
    this.storePath = options.storePath ?? defaultRecentFilesPath();
    this.limit = options.limit !== undefined && options.limit > 0 ? options.limit : 10;
    this.logger = options.logger ?? silentLogger;
  }

  get path(): string {
    return this.storePath;
  }

  /**
   * Most recent first
   */
  list(): string[] {
    return [...this.entries];
  }

  /**
   * Move `filePath` to the front, dropping the oldest entry past the limit
   */
  add(filePath: string): void {
    this.entries = [filePath, ...this.entries.filter(entry => entry !== filePath)].slice(0, this.limit);
  }

  /**
   * Change the cap, trimming the oldest entries if needed
   */
  setLimit(limit: number): void {
    if (Number.isInteger(limit) && limit > 0) {
      this.limit = limit;
      this.entries = this.entries.slice(0, limit);
    }
  }

  remove(filePath: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter(entry => entry !== filePath);
    return this.entries.length !== before;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Read the store. Entries whose file no longer exists are dropped; a
   * missing store is an empty list.
   */
  async load(): Promise<Result<string[]>> {
    let text: string;
    try {
      text = await fs.readFile(this.storePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.entries = [];
        return ok([]);
      }
      return fail(fromNodeError(error, 'read', this.storePath));
    }

    const candidates = text
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .slice(0, this.limit);

    const live: string[] = [];
    for (const candidate of candidates) {
      if (await fileExists(candidate)) {
        if (!live.includes(candidate)) {
          live.push(candidate);
        }
      } else {
        this.logger.debug(`Dropping stale recent file ${candidate}`);
      }
    }

    this.entries = live;
    return ok(this.list());
  }

  async save(): Promise<Result<void>> {
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(this.storePath, this.entries.map(entry => `${entry}\n`).join(''), 'utf8');
      return ok(undefined);
    } catch (error) {
      return fail(fromNodeError(error, 'write', this.storePath));
    }
  }
}

export {
  RecentFiles,
  defaultRecentFilesPath,
  RECENT_FILES_NAME,
  type RecentFilesOptions
};
