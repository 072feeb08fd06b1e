/**
 * @fileoverview Common types shared across the editor engine
 * @description Centralized type definitions to avoid duplication
 */

import { type QueryMode, type NotificationType, type Severity } from './editor-types';

// =================== SEARCH TYPES ===================

/**
 * A single search hit
 */
export interface SearchResult {
  offset: number;
  length: number;
  previewText: string;
}

/**
 * Ordered hits plus a flag telling whether the result cap stopped the scan
 */
export interface SearchResultSet {
  results: SearchResult[];
  truncated: boolean;
}

/**
 * Search pattern after parsing. `null` entries (wildcard tokens) match any byte.
 */
export interface ParsedQuery {
  mode: QueryMode;
  pattern: Array<number | null>;
  source: string;
}

// =================== STRUCTURE TYPES ===================

/**
 * Node in the detected-structure tree
 */
export interface StructureNode {
  name: string;
  locationDescriptor: string;
  offset: number | null;
  children: StructureNode[];
}

/**
 * Printable ASCII run found in the buffer
 */
export interface StringMatch {
  offset: number;
  length: number;
  previewText: string;
}

export interface StringMatchSet {
  matches: StringMatch[];
  truncated: boolean;
}

/**
 * Magic byte signature table entry
 */
export interface Signature {
  name: string;
  magic: readonly number[];
}

// =================== CHECKSUM TYPES ===================

/**
 * Frequency of one byte value
 */
export interface ByteFrequency {
  value: number;
  count: number;
  percentage: number;
}

/**
 * Checksums and byte distribution for one buffer snapshot
 */
export interface ChecksumReport {
  size: number;
  crc32: number;
  md5: string;
  sha1: string;
  sha256: string;
  histogram: number[];
  topBytes: ByteFrequency[];
  computedAt: Date;
}

// =================== BOOKMARK TYPES ===================

export interface Bookmark {
  id: number;
  name: string;
  offset: number;
  description: string;
  createdAt: Date;
}

/**
 * Bookmark as written to persistence
 */
export interface BookmarkRecord {
  name: string;
  offset: number;
  description: string;
  createdAt: string;
}

// =================== DISPLAY TYPES ===================

export interface HexDisplayLine {
  lineIndex: number;
  offset: number;
  offsetText: string;
  hexText: string;
  asciiText: string;
  hasModifiedBytes: boolean;
}

// =================== SESSION TYPES ===================

export interface Selection {
  start: number;
  length: number;
}

/**
 * Snapshot of everything a presentation layer needs to redraw
 */
export interface SessionState {
  filePath: string | null;
  size: number;
  isLoaded: boolean;
  isDirty: boolean;
  modifiedCount: number;
  cursor: number;
  selection: Selection;
  canUndo: boolean;
  canRedo: boolean;
  searchResultCount: number;
  searchIndex: number;
  bookmarkCount: number;
  statusMessage: string;
}

export interface EditorNotification {
  type: NotificationType;
  severity: Severity;
  message: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

export type NotificationListener = (notification: EditorNotification) => void;

// =================== COLLABORATORS ===================

/**
 * Asks the operator a yes/no question. Resolves `true` to proceed.
 */
export type ConfirmationGate = (request: ConfirmationRequest) => Promise<boolean> | boolean;

export interface ConfirmationRequest {
  reason: 'large_file' | 'unsaved_changes';
  message: string;
  path: string | null;
  size: number;
}

/**
 * File picker returning a path, or `null` when cancelled
 */
export interface FilePicker {
  pickOpenPath(title: string): Promise<string | null>;
  pickSavePath(title: string, suggestedName: string): Promise<string | null>;
}

// =================== PATCH TYPES ===================

/**
 * Expected bytes at an offset and their replacement
 */
export interface HexPatch {
  offset: number;
  originalBytes: Buffer;
  newBytes: Buffer;
  description: string;
}
