/**
 * @fileoverview Magic-byte identification, stride signature scan and
 * printable string extraction
 */

import { type Signature, type StringMatch, type StringMatchSet, type StructureNode, type SearchResultSet, type SearchResult } from './types/common';
import { formatOffset, isPrintableAscii } from './utils/hex';
import { searchPattern } from './pattern-matcher';

/**
 * Labels produced by {@link detectFileType}
 */
const FileTypeLabel = {
  ANDROID_BOOT_IMAGE: 'Android Boot Image',
  ELF: 'ELF Executable',
  ZIP: 'ZIP Archive (possibly APK)',
  SPARSE_IMAGE: 'Android Sparse Image',
  PNG: 'PNG Image',
  JPEG: 'JPEG Image',
  TEXT: 'Text File',
  BINARY: 'Binary File',
  UNKNOWN: 'Unknown'
} as const;

type FileTypeLabel = typeof FileTypeLabel[keyof typeof FileTypeLabel];

function ascii(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0));
}

// Checked in order at offset 0
const FILE_TYPE_SIGNATURES: ReadonlyArray<{ label: FileTypeLabel; magic: readonly number[] }> = [
  { label: FileTypeLabel.ANDROID_BOOT_IMAGE, magic: ascii('ANDROID!') },
  { label: FileTypeLabel.ELF, magic: [0x7f, 0x45, 0x4c, 0x46] },
  { label: FileTypeLabel.ZIP, magic: [0x50, 0x4b, 0x03, 0x04] },
  { label: FileTypeLabel.SPARSE_IMAGE, magic: [0x3a, 0xff, 0x26, 0xed] },
  { label: FileTypeLabel.PNG, magic: [0x89, 0x50, 0x4e, 0x47] },
  { label: FileTypeLabel.JPEG, magic: [0xff, 0xd8, 0xff] }
];

/**
 * Embedded structures looked for by the stride scan
 */
const STRUCTURE_SIGNATURES: ReadonlyArray<Signature> = [
  { name: 'Android Boot Header', magic: ascii('ANDROID!') },
  { name: 'GPT Header', magic: ascii('EFI PART') },
  { name: 'FAT Boot Sector', magic: ascii('MSDOS5.0') },
  { name: 'EXT Superblock', magic: [0x53, 0xef] },
  { name: 'SquashFS', magic: ascii('hsqs') },
  { name: 'GZIP Data', magic: [0x1f, 0x8b] },
  { name: 'XZ Data', magic: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] }
];

/**
 * Magics reported at every offset by {@link findKnownPatterns}
 */
const KNOWN_PATTERNS: ReadonlyArray<Signature> = [
  { name: 'Android Boot Magic', magic: ascii('ANDROID!') },
  { name: 'ELF Magic', magic: [0x7f, 0x45, 0x4c, 0x46] },
  { name: 'ZIP/APK', magic: [0x50, 0x4b, 0x03, 0x04] },
  { name: 'PNG', magic: [0x89, 0x50, 0x4e, 0x47] },
  { name: 'JPEG', magic: [0xff, 0xd8, 0xff] },
  { name: 'DEX', magic: ascii('dex\n') },
  { name: 'GZIP', magic: [0x1f, 0x8b] }
];

const TEXT_SAMPLE_SIZE = 1000;
const STRING_PREVIEW_LENGTH = 50;

function startsWith(bytes: Uint8Array, magic: readonly number[], offset: number = 0): boolean {
  if (offset + magic.length > bytes.length) {
    return false;
  }
  for (let j = 0; j < magic.length; j++) {
    if (bytes[offset + j] !== magic[j]) {
      return false;
    }
  }
  return true;
}

// Tab, LF, VT, FF, CR and ESC are the only control bytes text may carry
function isTextControlByte(value: number): boolean {
  return value < 9 || (value > 13 && value < 32 && value !== 27);
}

/**
 * Classify a buffer by the magic at offset 0, then by a text/binary heuristic
 */
function detectFileType(bytes: Uint8Array): FileTypeLabel {
  if (bytes.length < 4) {
    return FileTypeLabel.UNKNOWN;
  }

  for (const signature of FILE_TYPE_SIGNATURES) {
    if (startsWith(bytes, signature.magic)) {
      return signature.label;
    }
  }

  const sampleEnd = Math.min(TEXT_SAMPLE_SIZE, bytes.length);
  for (let i = 0; i < sampleEnd; i++) {
    if (isTextControlByte(bytes[i])) {
      return FileTypeLabel.BINARY;
    }
  }
  return FileTypeLabel.TEXT;
}

interface ScanOptions {
  /** Offset interval between probes. Signatures off the stride are not found. */
  stride?: number;
  signatures?: ReadonlyArray<Signature>;
}

function describeRange(length: number): string {
  return length === 0 ? 'empty' : `0x0 - 0x${(length - 1).toString(16).toUpperCase()}`;
}

/**
 * Build the structure tree: the whole file at the root, with one child per
 * signature at the first stride-aligned offset where it occurs.
 */
function scanSignatures(bytes: Uint8Array, options: ScanOptions = {}): StructureNode {
  const stride = options.stride !== undefined && options.stride > 0 ? Math.floor(options.stride) : 512;
  const signatures = options.signatures ?? STRUCTURE_SIGNATURES;

  const root: StructureNode = {
    name: detectFileType(bytes),
    locationDescriptor: describeRange(bytes.length),
    offset: 0,
    children: []
  };

  for (const signature of signatures) {
    for (let offset = 0; offset + signature.magic.length <= bytes.length; offset += stride) {
      if (startsWith(bytes, signature.magic, offset)) {
        root.children.push({
          name: signature.name,
          locationDescriptor: `@ 0x${formatOffset(offset)}`,
          offset,
          children: []
        });
        break;
      }
    }
  }

  return root;
}

/**
 * {@link scanSignatures} deferred to a later turn of the event loop so
 * callers can await it off the interactive path
 */
async function analyzeStructure(bytes: Uint8Array, options: ScanOptions = {}): Promise<StructureNode> {
  await new Promise(resolve => setImmediate(resolve));
  return scanSignatures(bytes, options);
}

interface StringExtractionOptions {
  minLength?: number;
  limit?: number;
}

/**
 * Collect printable ASCII runs (0x20-0x7E) of at least `minLength` bytes
 */
function extractStrings(bytes: Uint8Array, options: StringExtractionOptions = {}): StringMatchSet {
  const minLength = options.minLength ?? 4;
  const limit = options.limit ?? 1000;
  const matches: StringMatch[] = [];
  let runStart = -1;

  // Returns false once the limit is exceeded
  const emit = (start: number, end: number): boolean => {
    if (end - start < minLength) {
      return true;
    }
    if (matches.length >= limit) {
      return false;
    }
    const text = Buffer.from(bytes.subarray(start, end)).toString('latin1');
    matches.push({
      offset: start,
      length: end - start,
      previewText: text.length > STRING_PREVIEW_LENGTH ? `${text.slice(0, STRING_PREVIEW_LENGTH)}...` : text
    });
    return true;
  };

  for (let i = 0; i < bytes.length; i++) {
    if (isPrintableAscii(bytes[i])) {
      if (runStart < 0) {
        runStart = i;
      }
      continue;
    }
    if (runStart >= 0) {
      if (!emit(runStart, i)) {
        return { matches, truncated: true };
      }
      runStart = -1;
    }
  }

  if (runStart >= 0 && !emit(runStart, bytes.length)) {
    return { matches, truncated: true };
  }

  return { matches, truncated: false };
}

/**
 * Every offset of each known magic, labelled by name, in table order
 */
function findKnownPatterns(bytes: Uint8Array, limit: number = 1000): SearchResultSet {
  const results: SearchResult[] = [];
  let truncated = false;

  for (const pattern of KNOWN_PATTERNS) {
    const found = searchPattern(bytes, pattern.magic, { limit: limit - results.length });
    for (const hit of found.results) {
      results.push({ offset: hit.offset, length: hit.length, previewText: pattern.name });
    }
    if (found.truncated) {
      truncated = true;
      break;
    }
  }

  return { results, truncated };
}

export {
  FileTypeLabel,
  FILE_TYPE_SIGNATURES,
  STRUCTURE_SIGNATURES,
  KNOWN_PATTERNS,
  detectFileType,
  scanSignatures,
  analyzeStructure,
  extractStrings,
  findKnownPatterns,
  type ScanOptions,
  type StringExtractionOptions
};
