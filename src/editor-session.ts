/**
 * @fileoverview Editing session facade
 * @description One loaded buffer with its undo history, search state,
 * bookmarks, cursor and selection. Presentation layers drive it through
 * method calls and redraw from notifications and {@link EditorSession.getState}.
 */

import * as path from 'path';
import { ByteBuffer } from './byte-buffer';
import { EditUndoSystem, type UndoStats } from './undo-system';
import { BookmarkManager } from './bookmark-manager';
import { SearchCursor, matchesAt, replaceAll as replaceResults, search, type ReplaceSummary } from './pattern-matcher';
import {
  analyzeStructure,
  detectFileType,
  extractStrings,
  findKnownPatterns,
  KNOWN_PATTERNS,
  type FileTypeLabel
} from './structure-detector';
import { computeChecksums } from './checksum-engine';
import { inspectAt, type InspectionRow } from './data-inspector';
import { lineCount, lineIndexFor, renderLine, renderLines } from './display-lines';
import { loadBinaryFile, saveBinaryFile } from './file-io';
import { exportAnalysis, exportBytes, exportHexDump, selectionFileName } from './exporters';
import { findDifferences, type CompareResult } from './file-compare';
import { applyPatches, loadPatchFile, type PatchApplySummary } from './patch-file';
import { type RecentFiles } from './recent-files';
import { resolveConfig, type EditorConfig } from './config';
import { EditorError, errorMessage, fail, ok, type Result } from './errors';
import { EditorErrorKind, Endianness, NotificationType, Severity } from './types/editor-types';
import {
  type Bookmark,
  type ChecksumReport,
  type ConfirmationGate,
  type EditorNotification,
  type FilePicker,
  type HexDisplayLine,
  type NotificationListener,
  type SearchResult,
  type SearchResultSet,
  type Selection,
  type SessionState,
  type StringMatchSet,
  type StructureNode
} from './types/common';
import { formatFileSize, formatOffset, parseHexBytes, parseOffset } from './utils/hex';
import { type Logger, silentLogger } from './utils/logger';

interface EditorSessionOptions {
  config?: Partial<EditorConfig>;
  logger?: Logger;
  /** Asked before large loads and before discarding unsaved changes */
  confirm?: ConfirmationGate;
  /** Used when open/save/export are called without a path */
  filePicker?: FilePicker;
  recentFiles?: RecentFiles;
}

interface CloseOptions {
  /** true: save first. false: discard. Unset: ask the confirmation gate. */
  save?: boolean;
}

const UNTITLED = 'untitled';
const NOTIFICATION_HISTORY_LIMIT = 200;
// Changes spanning more lines than this invalidate the whole display
const LINE_INVALIDATION_LIMIT = 64;

class EditorNotificationImpl implements EditorNotification {
  constructor(
    public type: NotificationType,
    public severity: Severity,
    public message: string,
    public metadata: Record<string, unknown>,
    public timestamp: Date
  ) {}
}

class EditorSession {
  private config: EditorConfig;
  private readonly logger: Logger;
  private readonly confirm: ConfirmationGate | null;
  private readonly filePicker: FilePicker | null;
  private readonly recentFiles: RecentFiles | null;

  // Loaded document
  private buffer: ByteBuffer | null = null;
  private undoSystem: EditUndoSystem | null = null;
  private detachBufferListener: (() => void) | null = null;
  private filePath: string | null = null;
  private displayName: string = UNTITLED;

  // Navigation
  private cursor: number = 0;
  private selection: Selection = { start: 0, length: 0 };
  private readonly searchCursor: SearchCursor = new SearchCursor();
  // Re-checks a cached hit against the current bytes before it is replaced
  private isResultCurrent: (result: SearchResult) => boolean = () => false;
  public readonly bookmarks: BookmarkManager = new BookmarkManager();

  // Notification system
  private statusMessage: string = 'Ready';
  private notifications: EditorNotification[] = [];
  private listeners: NotificationListener[] = [];

  // Clock function (can be mocked for testing)
  private clockFunction: () => Date = () => new Date();

  constructor(options: EditorSessionOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.confirm = options.confirm ?? null;
    this.filePicker = options.filePicker ?? null;
    this.recentFiles = options.recentFiles ?? null;
    if (this.recentFiles && options.config?.recentFilesLimit !== undefined) {
      this.recentFiles.setLimit(this.config.recentFilesLimit);
    }
  }

  // =================== CONFIGURATION ===================

  configure(partial: Partial<EditorConfig>): EditorConfig {
    const previousBytesPerLine = this.config.bytesPerLine;
    this.config = resolveConfig(partial, this.config);
    if (this.undoSystem) {
      this.undoSystem.configure({ maxUndoLevels: this.config.maxUndoLevels });
    }
    if (this.recentFiles && partial.recentFilesLimit !== undefined) {
      this.recentFiles.setLimit(this.config.recentFilesLimit);
    }
    if (this.config.bytesPerLine !== previousBytesPerLine) {
      this._notify(NotificationType.DISPLAY_INVALIDATED, Severity.INFO, 'Display layout changed', {
        bytesPerLine: this.config.bytesPerLine
      });
    }
    return { ...this.config };
  }

  getConfig(): EditorConfig {
    return { ...this.config };
  }

  /**
   * Set custom clock function (for testing)
   */
  setClock(clockFn: () => Date): void {
    this.clockFunction = clockFn;
    this.bookmarks.setClock(clockFn);
    if (this.undoSystem) {
      this.undoSystem.setClock(() => clockFn().getTime());
    }
  }

  // =================== NOTIFICATIONS ===================

  /**
   * Register a listener; returns a function that removes it
   */
  subscribe(listener: NotificationListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  getNotifications(): EditorNotification[] {
    return [...this.notifications];
  }

  clearNotifications(type: NotificationType | null = null): void {
    this.notifications = type ? this.notifications.filter(n => n.type !== type) : [];
  }

  private _notify(type: NotificationType, severity: Severity, message: string, metadata: Record<string, unknown> = {}): void {
    const notification = new EditorNotificationImpl(type, severity, message, metadata, this.clockFunction());
    this.notifications.push(notification);
    if (this.notifications.length > NOTIFICATION_HISTORY_LIMIT) {
      this.notifications.shift();
    }

    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        this.logger.error('Notification listener error:', error);
      }
    }
  }

  private _setStatus(message: string, severity: Severity = Severity.INFO): void {
    this.statusMessage = message;
    this._notify(NotificationType.STATUS, severity, message);
  }

  private _reportError(error: EditorError): void {
    this.logger.warn(error.message);
    this.statusMessage = error.message;
    this._notify(NotificationType.ERROR, Severity.ERROR, error.message, { kind: error.kind, path: error.path });
  }

  /**
   * Immutable snapshot for redrawing
   */
  getState(): Readonly<SessionState> {
    const buffer = this.buffer;
    return Object.freeze({
      filePath: this.filePath,
      size: buffer ? buffer.length : 0,
      isLoaded: buffer !== null,
      isDirty: buffer ? buffer.isDirty : false,
      modifiedCount: buffer ? buffer.modifiedOffsets.size : 0,
      cursor: this.cursor,
      selection: Object.freeze({ ...this.selection }),
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      searchResultCount: this.searchCursor.count,
      searchIndex: this.searchCursor.currentIndex,
      bookmarkCount: this.bookmarks.count,
      statusMessage: this.statusMessage
    });
  }

  get isLoaded(): boolean {
    return this.buffer !== null;
  }

  get size(): number {
    return this.buffer ? this.buffer.length : 0;
  }

  /**
   * Copy of the current bytes, or null when nothing is loaded
   */
  getBytes(): Buffer | null {
    return this.buffer ? this.buffer.snapshot() : null;
  }

  getByte(offset: number): number | null {
    return this.buffer ? this.buffer.getByte(offset) : null;
  }

  isModified(offset: number): boolean {
    return this.buffer ? this.buffer.isModified(offset) : false;
  }

  // =================== FILE LIFECYCLE ===================

  /**
   * Load a file, replacing the current buffer. Without a path the file
   * picker is asked; `ok(false)` means the picker or a prompt was cancelled.
   */
  async open(filePath?: string): Promise<Result<boolean>> {
    const target = filePath ?? (await this._pickPath('open', 'Open File', ''));
    if (target === null) {
      return ok(false);
    }

    if (!(await this._confirmDiscard())) {
      return ok(false);
    }

    const loaded = await loadBinaryFile(target, {
      largeFileThreshold: this.config.largeFileThreshold,
      confirm: this.confirm ?? undefined,
      logger: this.logger
    });
    if (!loaded.ok) {
      if (loaded.error.kind === EditorErrorKind.LOAD_DECLINED) {
        this._setStatus('Load cancelled');
      } else {
        this._reportError(loaded.error);
      }
      return loaded;
    }

    this._attach(new ByteBuffer(loaded.value.bytes), target);
    await this._rememberRecent(target);

    this._notify(NotificationType.FILE_LOADED, Severity.INFO, 'Loaded file', {
      path: target,
      size: loaded.value.size
    });
    this._setStatus(`Loaded ${path.basename(target)} (${formatFileSize(loaded.value.size)})`);
    return ok(true);
  }

  /**
   * Load in-memory bytes as an unsaved document
   */
  loadBytes(bytes: Uint8Array, name: string = UNTITLED): void {
    this._attach(ByteBuffer.copyOf(bytes), null, name);
    this._notify(NotificationType.FILE_LOADED, Severity.INFO, 'Loaded binary content', {
      path: null,
      size: bytes.length
    });
    this._setStatus(`Loaded ${name} (${formatFileSize(bytes.length)})`);
  }

  /**
   * Write the buffer to its file. Untitled buffers go through {@link saveAs}.
   */
  async save(): Promise<Result<boolean>> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    if (this.filePath === null) {
      return this.saveAs();
    }
    if (!buffer.value.isDirty) {
      this._notify(NotificationType.STATUS, Severity.INFO, 'Save skipped: buffer is unmodified', {
        path: this.filePath,
        reason: 'unmodified'
      });
      return ok(true);
    }
    return this._writeTo(this.filePath, buffer.value);
  }

  /**
   * Write the buffer to a new path and make it the session's file
   */
  async saveAs(filePath?: string): Promise<Result<boolean>> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const target = filePath ?? (await this._pickPath('save', 'Save File As', this.displayName));
    if (target === null) {
      return ok(false);
    }
    const saved = await this._writeTo(target, buffer.value);
    if (saved.ok) {
      await this._rememberRecent(target);
    }
    return saved;
  }

  /**
   * Drop the buffer. Returns `ok(false)` when the close was cancelled.
   */
  async close(options: CloseOptions = {}): Promise<Result<boolean>> {
    if (!this.buffer) {
      return ok(true);
    }

    if (this.buffer.isDirty) {
      if (options.save === true) {
        const saved = await this.save();
        if (!saved.ok || !saved.value) {
          return saved;
        }
      } else if (options.save === undefined && !(await this._confirmDiscard())) {
        return ok(false);
      }
    }

    const closedPath = this.filePath;
    this._detach();
    this._notify(NotificationType.FILE_CLOSED, Severity.INFO, 'Closed file', { path: closedPath });
    this._setStatus('Ready');
    return ok(true);
  }

  private async _writeTo(target: string, buffer: ByteBuffer): Promise<Result<boolean>> {
    const saved = await saveBinaryFile(target, buffer.data, { logger: this.logger });
    if (!saved.ok) {
      this._reportError(saved.error);
      return saved;
    }

    buffer.markSaved();
    this.filePath = target;
    this.displayName = path.basename(target);
    this._notify(NotificationType.FILE_SAVED, Severity.INFO, 'Saved file', {
      path: target,
      size: saved.value.size,
      atomic: saved.value.wasAtomic
    });
    this._notify(NotificationType.DISPLAY_INVALIDATED, Severity.INFO, 'Modification highlights cleared');
    this._setStatus(`Saved ${this.displayName}`);
    return ok(true);
  }

  private async _confirmDiscard(): Promise<boolean> {
    if (!this.buffer || !this.buffer.isDirty) {
      return true;
    }
    if (!this.confirm) {
      this._setStatus('Unsaved changes; save or discard first', Severity.WARNING);
      return false;
    }
    return this.confirm({
      reason: 'unsaved_changes',
      message: `${this.displayName} has unsaved changes. Discard them?`,
      path: this.filePath,
      size: this.buffer.length
    });
  }

  private async _pickPath(mode: 'open' | 'save', title: string, suggestedName: string): Promise<string | null> {
    if (!this.filePicker) {
      return null;
    }
    return mode === 'open'
      ? this.filePicker.pickOpenPath(title)
      : this.filePicker.pickSavePath(title, suggestedName);
  }

  private async _rememberRecent(filePath: string): Promise<void> {
    if (!this.recentFiles) {
      return;
    }
    this.recentFiles.add(filePath);
    const saved = await this.recentFiles.save();
    if (!saved.ok) {
      this.logger.warn(`Could not update recent files: ${saved.error.message}`);
    }
  }

  private _attach(buffer: ByteBuffer, filePath: string | null, name: string | null = null): void {
    this._detach();
    this.buffer = buffer;
    this.filePath = filePath;
    this.displayName = name ?? (filePath ? path.basename(filePath) : UNTITLED);

    const clock = this.clockFunction;
    this.undoSystem = new EditUndoSystem(buffer, { maxUndoLevels: this.config.maxUndoLevels }, this.logger);
    this.undoSystem.setClock(() => clock().getTime());
    this.detachBufferListener = buffer.onChange((offset, length) => this._onBytesChanged(offset, length));
  }

  private _detach(): void {
    if (this.detachBufferListener) {
      this.detachBufferListener();
      this.detachBufferListener = null;
    }
    this.buffer = null;
    this.undoSystem = null;
    this.filePath = null;
    this.displayName = UNTITLED;
    this.cursor = 0;
    this.selection = { start: 0, length: 0 };
    this.searchCursor.reset();
    this.isResultCurrent = () => false;
    this.bookmarks.clear();
  }

  private _onBytesChanged(offset: number, length: number): void {
    const bytesPerLine = this.config.bytesPerLine;
    const first = lineIndexFor(offset, bytesPerLine);
    const last = lineIndexFor(offset + length - 1, bytesPerLine);

    if (last - first + 1 > LINE_INVALIDATION_LIMIT) {
      this._notify(NotificationType.DISPLAY_INVALIDATED, Severity.INFO, 'Display invalidated', { offset, length });
    } else {
      for (let lineIndex = first; lineIndex <= last; lineIndex++) {
        this._notify(NotificationType.LINE_INVALIDATED, Severity.INFO, 'Line invalidated', { lineIndex });
      }
    }

    this._notify(NotificationType.BUFFER_MODIFIED, Severity.INFO, 'Buffer modified', {
      offset,
      length,
      isDirty: this.buffer ? this.buffer.isDirty : false
    });
  }

  private _requireBuffer(): Result<ByteBuffer> {
    if (!this.buffer) {
      return fail(new EditorError(EditorErrorKind.NO_BUFFER, 'No file loaded'));
    }
    return ok(this.buffer);
  }

  private _requireEditable(): Result<{ buffer: ByteBuffer; undoSystem: EditUndoSystem }> {
    if (!this.buffer || !this.undoSystem) {
      return fail(new EditorError(EditorErrorKind.NO_BUFFER, 'No file loaded'));
    }
    return ok({ buffer: this.buffer, undoSystem: this.undoSystem });
  }

  // =================== EDITING ===================

  /**
   * Overwrite one byte. Out-of-range offsets and unchanged values are no-ops.
   */
  writeByte(offset: number, value: number): boolean {
    if (!this.undoSystem || !Number.isInteger(value) || value < 0 || value > 0xff) {
      return false;
    }
    return this.undoSystem.apply(offset, Buffer.of(value)) !== null;
  }

  /**
   * Overwrite `data.length` bytes at `offset`. A write that would run past
   * the end is rejected whole.
   */
  writeBytes(offset: number, data: Uint8Array): Result<boolean> {
    const editable = this._requireEditable();
    if (!editable.ok) {
      return editable;
    }
    if (data.length === 0) {
      return ok(false);
    }
    if (!editable.value.buffer.containsRange(offset, data.length)) {
      return fail(new EditorError(
        EditorErrorKind.OUT_OF_RANGE,
        `Cannot write ${data.length} bytes at 0x${formatOffset(Math.max(0, offset))}: past end of buffer`
      ));
    }
    return ok(editable.value.undoSystem.apply(offset, data) !== null);
  }

  /**
   * Parse whole hex bytes and overwrite them at `offset` (the cursor by default)
   */
  pasteHex(text: string, offset: number = this.cursor): Result<number> {
    const bytes = parseHexBytes(text);
    if (!bytes.ok) {
      this._setStatus(bytes.error.message, Severity.WARNING);
      return bytes;
    }
    const written = this.writeBytes(offset, bytes.value);
    if (!written.ok) {
      this._setStatus(written.error.message, Severity.WARNING);
      return written;
    }
    this._setStatus(`Pasted ${bytes.value.length} bytes`);
    return ok(bytes.value.length);
  }

  /**
   * Set every selected byte to `value`
   */
  fillSelection(value: number): Result<number> {
    const editable = this._requireEditable();
    if (!editable.ok) {
      return editable;
    }
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      return fail(new EditorError(EditorErrorKind.INVALID_PATTERN, `Fill value must be a byte, got ${value}`));
    }
    const { start, length } = this.selection;
    if (length === 0) {
      return ok(0);
    }
    editable.value.undoSystem.apply(start, Buffer.alloc(length, value));
    this._setStatus(`Filled ${length} bytes with 0x${formatOffset(value, 2)}`);
    return ok(length);
  }

  /**
   * Zero the selection. The buffer length never changes.
   */
  zeroSelection(): Result<number> {
    return this.fillSelection(0);
  }

  /**
   * Run several edits as one undoable step. The transaction is rolled back
   * if `work` throws. Nested calls join the outer step.
   */
  transaction<T>(name: string, work: () => T): Result<T> {
    const editable = this._requireEditable();
    if (!editable.ok) {
      return editable;
    }
    return ok(editable.value.undoSystem.runInTransaction(name, work));
  }

  undo(): boolean {
    if (!this.undoSystem) {
      return false;
    }
    const group = this.undoSystem.undo();
    if (!group) {
      return false;
    }
    this._setStatus(group.name ? `Undo ${group.name}` : 'Undo');
    return true;
  }

  redo(): boolean {
    if (!this.undoSystem) {
      return false;
    }
    const group = this.undoSystem.redo();
    if (!group) {
      return false;
    }
    this._setStatus(group.name ? `Redo ${group.name}` : 'Redo');
    return true;
  }

  canUndo(): boolean {
    return this.undoSystem ? this.undoSystem.canUndo() : false;
  }

  canRedo(): boolean {
    return this.undoSystem ? this.undoSystem.canRedo() : false;
  }

  getUndoStats(): UndoStats | null {
    return this.undoSystem ? this.undoSystem.getStats() : null;
  }

  // =================== NAVIGATION ===================

  /**
   * Move the cursor, clamped to the buffer. Returns the new position.
   */
  setCursor(offset: number): number {
    const clamped = this._clampOffset(offset);
    if (clamped !== this.cursor) {
      this.cursor = clamped;
      this._notify(NotificationType.CURSOR_MOVED, Severity.INFO, 'Cursor moved', {
        offset: clamped,
        lineIndex: lineIndexFor(clamped, this.config.bytesPerLine)
      });
    }
    return this.cursor;
  }

  getCursor(): number {
    return this.cursor;
  }

  /**
   * Select `length` bytes from `start`, clamped to the buffer, and move the
   * cursor to the start
   */
  select(start: number, length: number): Selection {
    const size = this.size;
    const from = this._clampOffset(start);
    const span = size === 0 || !Number.isFinite(length) ? 0 : Math.max(0, Math.min(Math.floor(length), size - from));
    this.selection = { start: from, length: span };
    this.setCursor(from);
    return { ...this.selection };
  }

  selectAll(): Selection {
    return this.select(0, this.size);
  }

  getSelection(): Selection {
    return { ...this.selection };
  }

  getSelectionBytes(): Buffer {
    if (!this.buffer) {
      return Buffer.alloc(0);
    }
    return this.buffer.readRange(this.selection.start, this.selection.start + this.selection.length);
  }

  /**
   * Jump to a typed offset ("0x1F0" or "496")
   */
  goTo(text: string): boolean {
    const offset = parseOffset(text);
    if (offset === null) {
      this._setStatus('Invalid offset format', Severity.WARNING);
      return false;
    }
    if (!this.buffer || offset >= this.buffer.length) {
      this._setStatus(`Offset 0x${formatOffset(offset)} is beyond end of file`, Severity.WARNING);
      return false;
    }
    this.select(offset, 0);
    this._setStatus(`Jumped to 0x${formatOffset(offset)}`);
    return true;
  }

  private _clampOffset(offset: number): number {
    const size = this.size;
    if (size === 0 || !Number.isFinite(offset) || offset < 0) {
      return 0;
    }
    return Math.min(Math.floor(offset), size - 1);
  }

  // =================== SEARCH ===================

  /**
   * Search for hex bytes ("FF 00"), wildcard hex ("FF ?? 00") or text and
   * select the first hit
   */
  search(query: string): Result<SearchResultSet> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    if (query.length === 0) {
      return fail(new EditorError(EditorErrorKind.INVALID_PATTERN, 'Search query is empty'));
    }

    const found = search(buffer.value.data, query, {
      limit: this.config.searchResultLimit,
      previewLength: this.config.previewLength
    });
    const resultSet: SearchResultSet = { results: found.results, truncated: found.truncated };
    const data = buffer.value.data;
    const pattern = found.query.pattern;
    this._loadResults(resultSet, { query, mode: found.query.mode }, result => matchesAt(data, result.offset, pattern));
    return ok(resultSet);
  }

  findNext(): SearchResult | null {
    return this._moveToResult(this.searchCursor.findNext());
  }

  findPrevious(): SearchResult | null {
    return this._moveToResult(this.searchCursor.findPrevious());
  }

  getSearchResults(): SearchResult[] {
    return this.searchCursor.getResults();
  }

  /**
   * Overwrite every equal-length hit of the last search (or of `query`,
   * when given) with hex bytes, as one undoable step. Hits that an edit
   * since the search no longer matches are skipped.
   */
  replaceAll(replacementHex: string, query?: string): Result<ReplaceSummary> {
    const editable = this._requireEditable();
    if (!editable.ok) {
      return editable;
    }
    const replacement = parseHexBytes(replacementHex);
    if (!replacement.ok) {
      this._setStatus(replacement.error.message, Severity.WARNING);
      return replacement;
    }
    if (query !== undefined) {
      const searched = this.search(query);
      if (!searched.ok) {
        return searched;
      }
    }

    const summary = replaceResults(
      editable.value.undoSystem,
      this.searchCursor.getResults(),
      replacement.value,
      'Replace all',
      this.isResultCurrent
    );
    this.searchCursor.reset();
    this.isResultCurrent = () => false;
    this._setStatus(
      `Replaced ${summary.replaced} occurrences` + (summary.skipped > 0 ? `, ${summary.skipped} skipped` : '')
    );
    return ok(summary);
  }

  private _loadResults(
    resultSet: SearchResultSet,
    metadata: Record<string, unknown>,
    isCurrent: (result: SearchResult) => boolean
  ): void {
    this.searchCursor.reset(resultSet);
    this.isResultCurrent = isCurrent;
    const count = resultSet.results.length;
    this._notify(NotificationType.SEARCH_COMPLETED, Severity.INFO, 'Search completed', {
      ...metadata,
      count,
      truncated: resultSet.truncated
    });
    if (count === 0) {
      this._setStatus('No matches found');
      return;
    }
    this.findNext();
    const limited = resultSet.truncated ? ` (limited to ${this.config.searchResultLimit})` : '';
    this._setStatus(`Found ${count} matches${limited}`);
  }

  private _moveToResult(result: SearchResult | null): SearchResult | null {
    if (result) {
      this.select(result.offset, result.length);
    }
    return result;
  }

  // =================== ANALYSIS ===================

  computeChecksums(): Result<ChecksumReport> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const report = computeChecksums(buffer.value.data, this.clockFunction());
    this._notify(NotificationType.ANALYSIS_COMPLETED, Severity.INFO, 'Checksums computed', { analysis: 'checksums' });
    return ok(report);
  }

  detectFileType(): Result<FileTypeLabel> {
    const buffer = this._requireBuffer();
    return buffer.ok ? ok(detectFileType(buffer.value.data)) : buffer;
  }

  /**
   * Signature scan over a snapshot, so edits made while it runs are not seen
   */
  async analyzeStructure(): Promise<Result<StructureNode>> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const tree = await analyzeStructure(buffer.value.snapshot(), { stride: this.config.signatureStride });
    this._notify(NotificationType.ANALYSIS_COMPLETED, Severity.INFO, 'Structure analysis completed', {
      analysis: 'structure',
      structures: tree.children.length
    });
    this._setStatus(`Found ${tree.children.length} structures`);
    return ok(tree);
  }

  extractStrings(): Result<StringMatchSet> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const found = extractStrings(buffer.value.data, {
      minLength: this.config.minStringLength,
      limit: this.config.stringResultLimit
    });
    this._notify(NotificationType.ANALYSIS_COMPLETED, Severity.INFO, 'String extraction completed', {
      analysis: 'strings',
      count: found.matches.length,
      truncated: found.truncated
    });
    this._setStatus(`Found ${found.matches.length} strings`);
    return ok(found);
  }

  /**
   * Locate known magics and load them as the current search results
   */
  findKnownPatterns(): Result<SearchResultSet> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const data = buffer.value.data;
    const found = findKnownPatterns(data, this.config.searchResultLimit);
    this._loadResults(found, { query: null, mode: 'known_patterns' }, result => {
      const known = KNOWN_PATTERNS.find(pattern => pattern.name === result.previewText);
      return known !== undefined && matchesAt(data, result.offset, known.magic);
    });
    return ok(found);
  }

  /**
   * Every value interpretation at `offset` (the cursor by default)
   */
  inspect(endianness: Endianness = Endianness.LITTLE, offset: number = this.cursor): InspectionRow {
    return inspectAt(this.buffer ? this.buffer.data : Buffer.alloc(0), offset, endianness);
  }

  /**
   * Compare the buffer with another file and move to the first difference
   */
  async compareWith(filePath?: string): Promise<Result<CompareResult | null>> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const target = filePath ?? (await this._pickPath('open', 'Select file to compare with', ''));
    if (target === null) {
      return ok(null);
    }

    const other = await loadBinaryFile(target, {
      largeFileThreshold: this.config.largeFileThreshold,
      confirm: this.confirm ?? undefined,
      logger: this.logger
    });
    if (!other.ok) {
      this._reportError(other.error);
      return other;
    }

    const result = findDifferences(buffer.value.data, other.value.bytes);
    if (result.differences.length > 0) {
      this.select(result.differences[0], 1);
      this._setStatus(`First difference at offset 0x${formatOffset(result.differences[0])}`);
    } else {
      this._setStatus(result.sizeMismatch ? 'No differences in common area; sizes differ' : 'Files are identical');
    }
    return ok(result);
  }

  /**
   * Apply a patch file through the undo history as one step
   */
  async applyPatchFile(patchPath: string): Promise<Result<PatchApplySummary>> {
    const editable = this._requireEditable();
    if (!editable.ok) {
      return editable;
    }
    const loaded = await loadPatchFile(patchPath, this.logger);
    if (!loaded.ok) {
      this._reportError(loaded.error);
      return loaded;
    }

    const summary = applyPatches(
      editable.value.undoSystem,
      editable.value.buffer,
      loaded.value.patches,
      `Patch ${path.basename(patchPath)}`,
      this.logger
    );
    this._setStatus(
      `Applied ${summary.applied} patches` + (summary.rejected > 0 ? `, ${summary.rejected} rejected` : ''),
      summary.rejected > 0 ? Severity.WARNING : Severity.INFO
    );
    return ok(summary);
  }

  // =================== EXPORT ===================

  async exportHexDump(targetPath?: string): Promise<Result<boolean>> {
    return this._export(targetPath, 'Export Hex Dump', `${this._baseName()}_hexdump.txt`, async (target, buffer) =>
      exportHexDump(target, buffer.data, { sourceName: this.filePath ?? this.displayName, now: this.clockFunction() })
    );
  }

  async exportAnalysis(targetPath?: string): Promise<Result<boolean>> {
    return this._export(targetPath, 'Export Analysis Report', `${this._baseName()}_analysis.txt`, async (target, buffer) =>
      exportAnalysis(target, buffer.data, { sourceName: this.filePath ?? this.displayName, now: this.clockFunction() })
    );
  }

  /**
   * Write the selected bytes to a file
   */
  async exportSelection(targetPath?: string): Promise<Result<boolean>> {
    if (this.selection.length === 0) {
      return fail(new EditorError(EditorErrorKind.OUT_OF_RANGE, 'Nothing selected'));
    }
    const selected = this.getSelectionBytes();
    return this._export(targetPath, 'Export Selection', selectionFileName(this.selection.start), async target => {
      const written = await exportBytes(target, selected);
      return written.ok ? ok(undefined) : written;
    });
  }

  private async _export(
    targetPath: string | undefined,
    title: string,
    suggestedName: string,
    write: (target: string, buffer: ByteBuffer) => Promise<Result<void>>
  ): Promise<Result<boolean>> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    const target = targetPath ?? (await this._pickPath('save', title, suggestedName));
    if (target === null) {
      return ok(false);
    }
    const written = await write(target, buffer.value);
    if (!written.ok) {
      this._reportError(written.error);
      return written;
    }
    this._setStatus(`Exported to ${path.basename(target)}`);
    return ok(true);
  }

  private _baseName(): string {
    const name = this.filePath ? path.basename(this.filePath) : this.displayName;
    const extension = path.extname(name);
    return extension ? name.slice(0, -extension.length) : name;
  }

  // =================== BOOKMARKS ===================

  /**
   * Bookmark `offset` (the cursor by default)
   */
  addBookmark(name: string, description: string = '', offset: number = this.cursor): Result<Bookmark> {
    const buffer = this._requireBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    if (!buffer.value.inRange(offset)) {
      return fail(new EditorError(EditorErrorKind.OUT_OF_RANGE, `Bookmark offset ${offset} is outside the buffer`));
    }
    try {
      const bookmark = this.bookmarks.add(name, offset, description);
      this._setStatus(`Bookmark "${name}" added at 0x${formatOffset(offset)}`);
      return ok(bookmark);
    } catch (error) {
      return fail(new EditorError(EditorErrorKind.OUT_OF_RANGE, errorMessage(error), { cause: error }));
    }
  }

  removeBookmark(id: number): boolean {
    return this.bookmarks.remove(id);
  }

  goToBookmark(id: number): Bookmark | null {
    return this._moveToBookmark(this.bookmarks.get(id));
  }

  nextBookmark(): Bookmark | null {
    return this._moveToBookmark(this.bookmarks.next(this.cursor));
  }

  previousBookmark(): Bookmark | null {
    return this._moveToBookmark(this.bookmarks.previous(this.cursor));
  }

  private _moveToBookmark(bookmark: Bookmark | null): Bookmark | null {
    if (bookmark) {
      this.select(bookmark.offset, 0);
      this._setStatus(`Bookmark: ${bookmark.name}`);
    }
    return bookmark;
  }

  // =================== DISPLAY ===================

  get lineCount(): number {
    return lineCount(this.size, this.config.bytesPerLine);
  }

  getLine(lineIndex: number): HexDisplayLine | null {
    return this.buffer ? renderLine(this.buffer, lineIndex, this.config.bytesPerLine) : null;
  }

  getLines(firstLine: number, count: number): HexDisplayLine[] {
    return this.buffer ? renderLines(this.buffer, firstLine, count, this.config.bytesPerLine) : [];
  }

  /**
   * Line holding `offset`
   */
  lineIndexOf(offset: number): number {
    return lineIndexFor(offset, this.config.bytesPerLine);
  }
}

export {
  EditorSession,
  type EditorSessionOptions,
  type CloseOptions
};
