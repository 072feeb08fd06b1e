/**
 * @fileoverview Binary file editing engine
 * @description In-memory byte editor with bounded undo/redo, hex/text/wildcard
 * search, magic-byte structure detection, checksums, a typed data inspector,
 * bookmarks, patch files and text exports.
 *
 * @example
 * import { EditorSession } from 'octet-editor';
 *
 * const session = new EditorSession({ config: { maxUndoLevels: 50 } });
 * session.subscribe(n => console.log(n.type, n.message));
 *
 * await session.open('boot.img');
 * session.writeByte(0x10, 0xff);
 * session.search('41 4E ?? 52');
 * session.replaceAll('00 00 00 00');
 * session.undo();
 *
 * const checksums = session.computeChecksums();
 * const tree = await session.analyzeStructure();
 * await session.save();
 */

import { EditorSession } from './editor-session';
import { ByteBuffer } from './byte-buffer';
import { EditOperation } from './edit-operation';
import { EditUndoSystem, OperationGroup } from './undo-system';
import { BookmarkManager } from './bookmark-manager';
import { SearchCursor, parseSearchQuery, search, searchPattern, replaceAll } from './pattern-matcher';
import {
  FileTypeLabel,
  detectFileType,
  scanSignatures,
  analyzeStructure,
  extractStrings,
  findKnownPatterns
} from './structure-detector';
import { crc32, computeChecksums, shannonEntropy } from './checksum-engine';
import { decodeValue, inspectAt, DECODE_SENTINEL } from './data-inspector';
import { renderLine, renderLines, lineCount } from './display-lines';
import { loadBinaryFile, saveBinaryFile } from './file-io';
import { formatHexDump, formatAnalysisReport, exportHexDump, exportAnalysis, exportBytes } from './exporters';
import { RecentFiles } from './recent-files';
import { parsePatchFile, formatPatchFile, loadPatchFile, savePatchFile, applyPatches } from './patch-file';
import { findDifferences } from './file-compare';
import { DEFAULT_CONFIG, resolveConfig, type EditorConfig } from './config';
import { EditorError, ok, fail, type Result } from './errors';
import { ConsoleLogger, createConsoleLogger, silentLogger, type Logger } from './utils/logger';
import {
  EditorErrorKind,
  EditKind,
  Endianness,
  DecodeKind,
  QueryMode,
  NotificationType,
  Severity
} from './types/editor-types';
import {
  type SearchResult,
  type SearchResultSet,
  type StructureNode,
  type StringMatch,
  type ChecksumReport,
  type Bookmark,
  type HexDisplayLine,
  type HexPatch,
  type SessionState,
  type EditorNotification,
  type ConfirmationGate,
  type FilePicker
} from './types/common';

// Export all the classes and types
export {
  // Core classes
  EditorSession,
  ByteBuffer,
  EditUndoSystem,
  BookmarkManager,
  SearchCursor,
  RecentFiles,

  // Operation and undo system
  EditOperation,
  OperationGroup,

  // Search and analysis
  parseSearchQuery,
  search,
  searchPattern,
  replaceAll,
  detectFileType,
  scanSignatures,
  analyzeStructure,
  extractStrings,
  findKnownPatterns,
  crc32,
  computeChecksums,
  shannonEntropy,
  decodeValue,
  inspectAt,
  DECODE_SENTINEL,
  findDifferences,

  // Display and files
  renderLine,
  renderLines,
  lineCount,
  loadBinaryFile,
  saveBinaryFile,
  formatHexDump,
  formatAnalysisReport,
  exportHexDump,
  exportAnalysis,
  exportBytes,
  parsePatchFile,
  formatPatchFile,
  loadPatchFile,
  savePatchFile,
  applyPatches,

  // Ambient
  DEFAULT_CONFIG,
  resolveConfig,
  EditorError,
  ok,
  fail,
  ConsoleLogger,
  createConsoleLogger,
  silentLogger,

  // Enums and constants
  FileTypeLabel,
  EditorErrorKind,
  EditKind,
  Endianness,
  DecodeKind,
  QueryMode,
  NotificationType,
  Severity,

  // Types
  type EditorConfig,
  type Result,
  type Logger,
  type SearchResult,
  type SearchResultSet,
  type StructureNode,
  type StringMatch,
  type ChecksumReport,
  type Bookmark,
  type HexDisplayLine,
  type HexPatch,
  type SessionState,
  type EditorNotification,
  type ConfirmationGate,
  type FilePicker
};

// Default export for convenience
export default {
  EditorSession,
  ByteBuffer,
  EditUndoSystem,
  BookmarkManager,
  SearchCursor,
  RecentFiles,
  EditOperation,
  OperationGroup,
  EditorError,
  FileTypeLabel,
  EditorErrorKind,
  Endianness,
  DecodeKind,
  QueryMode,
  NotificationType,
  Severity
};
