/**
 * @fileoverview Exact and wildcard byte pattern search, result cycling and
 * replace-all over a fixed-length buffer
 */

import { type EditUndoSystem } from './undo-system';
import { QueryMode } from './types/editor-types';
import { type ParsedQuery, type SearchResult, type SearchResultSet } from './types/common';
import { bytesToHex } from './utils/hex';

const HEX_TOKEN = /^[0-9a-f]{1,2}$/i;
const WILDCARD_TOKEN = /^(\?\?|\*\*)$/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

interface SearchOptions {
  /** Maximum number of hits collected */
  limit?: number;
  /** Bytes rendered into each result's preview */
  previewLength?: number;
}

/**
 * Encode free text for searching: UTF-8, or ASCII ('?' for anything
 * outside 7-bit) when the text holds unpaired surrogates UTF-8 cannot carry.
 */
function encodeText(text: string): Buffer {
  if (!LONE_SURROGATE.test(text)) {
    return Buffer.from(text, 'utf8');
  }
  const bytes = Buffer.alloc(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    bytes[i] = code < 0x80 ? code : 0x3f;
  }
  return bytes;
}

/**
 * Interpret a search query.
 *
 * Space-separated one- or two-digit hex tokens ("FF 00 AB") are exact bytes;
 * adding `??` or `**` tokens makes them wildcards. Everything else, a
 * malformed hex token included, is searched as text.
 */
function parseSearchQuery(query: string): ParsedQuery {
  const tokens = query.trim().split(/\s+/).filter(token => token.length > 0);

  if (tokens.length > 1) {
    if (tokens.every(token => HEX_TOKEN.test(token))) {
      return {
        mode: QueryMode.HEX,
        pattern: tokens.map(token => parseInt(token, 16)),
        source: query
      };
    }

    const hasWildcard = tokens.some(token => WILDCARD_TOKEN.test(token));
    if (hasWildcard && tokens.every(token => HEX_TOKEN.test(token) || WILDCARD_TOKEN.test(token))) {
      return {
        mode: QueryMode.WILDCARD_HEX,
        pattern: tokens.map(token => (WILDCARD_TOKEN.test(token) ? null : parseInt(token, 16))),
        source: query
      };
    }
  }

  return {
    mode: QueryMode.TEXT,
    pattern: Array.from(encodeText(query)),
    source: query
  };
}

/**
 * Whether `pattern` matches at `offset`. `null` entries match any byte.
 */
function matchesAt(bytes: Uint8Array, offset: number, pattern: ReadonlyArray<number | null>): boolean {
  for (let j = 0; j < pattern.length; j++) {
    const expected = pattern[j];
    if (expected !== null && bytes[offset + j] !== expected) {
      return false;
    }
  }
  return true;
}

/**
 * Linear sliding-window scan. Hits come back in offset order; overlapping
 * hits are all reported. `truncated` is set when more hits exist past the limit.
 */
function searchPattern(
  bytes: Uint8Array,
  pattern: ReadonlyArray<number | null>,
  options: SearchOptions = {}
): SearchResultSet {
  const limit = options.limit ?? 1000;
  const previewLength = options.previewLength ?? 16;
  const results: SearchResult[] = [];
  let truncated = false;

  if (pattern.length === 0 || pattern.length > bytes.length) {
    return { results, truncated };
  }

  const lastStart = bytes.length - pattern.length;
  for (let i = 0; i <= lastStart; i++) {
    if (!matchesAt(bytes, i, pattern)) {
      continue;
    }
    if (results.length >= limit) {
      truncated = true;
      break;
    }
    results.push({
      offset: i,
      length: pattern.length,
      previewText: bytesToHex(bytes.subarray(i, Math.min(i + previewLength, bytes.length)))
    });
  }

  return { results, truncated };
}

/**
 * Parse `query` and search for it
 */
function search(bytes: Uint8Array, query: string, options: SearchOptions = {}): SearchResultSet & { query: ParsedQuery } {
  const parsed = parseSearchQuery(query);
  return { ...searchPattern(bytes, parsed.pattern, options), query: parsed };
}

/**
 * Position within the last result set; next/previous wrap around
 */
class SearchCursor {
  private results: SearchResult[] = [];
  private index: number = -1;

  reset(resultSet: SearchResultSet = { results: [], truncated: false }): void {
    this.results = [...resultSet.results];
    this.index = -1;
  }

  get count(): number {
    return this.results.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  getResults(): SearchResult[] {
    return [...this.results];
  }

  findNext(): SearchResult | null {
    if (this.results.length === 0) {
      return null;
    }
    this.index = (this.index + 1) % this.results.length;
    return this.results[this.index];
  }

  findPrevious(): SearchResult | null {
    if (this.results.length === 0) {
      return null;
    }
    this.index = this.index <= 0 ? this.results.length - 1 : this.index - 1;
    return this.results[this.index];
  }
}

interface ReplaceSummary {
  replaced: number;
  skipped: number;
}

/**
 * Overwrite every hit whose length equals the replacement's, as a single
 * undoable step. Hits are applied from the highest offset down.
 */
function replaceAll(
  undoSystem: EditUndoSystem,
  results: ReadonlyArray<SearchResult>,
  replacement: Uint8Array,
  transactionName: string = 'Replace all',
  isCurrent: (result: SearchResult) => boolean = () => true
): ReplaceSummary {
  const ordered = [...results].sort((a, b) => b.offset - a.offset);
  let replaced = 0;
  let skipped = 0;

  undoSystem.runInTransaction(transactionName, () => {
    for (const result of ordered) {
      if (result.length !== replacement.length || !isCurrent(result)) {
        skipped++;
        continue;
      }
      undoSystem.apply(result.offset, replacement);
      replaced++;
    }
  });

  return { replaced, skipped };
}

export {
  parseSearchQuery,
  matchesAt,
  searchPattern,
  search,
  encodeText,
  replaceAll,
  SearchCursor,
  type SearchOptions,
  type ReplaceSummary
};
