/**
 * @fileoverview Fixed-width hex display lines over a byte buffer
 */

import { type HexDisplayLine } from './types/common';
import { formatOffset, isPrintableAscii, toHexByte } from './utils/hex';

/**
 * What the renderer reads from a buffer
 */
interface LineSource {
  readonly length: number;
  readonly data: Uint8Array;
  isModified(offset: number): boolean;
}

function lineCount(size: number, bytesPerLine: number): number {
  return size === 0 ? 0 : Math.ceil(size / bytesPerLine);
}

function lineIndexFor(offset: number, bytesPerLine: number): number {
  return Math.floor(offset / bytesPerLine);
}

/**
 * Hex column: "XX " per byte, padded with blanks to a full line
 */
function formatHexColumn(bytes: Uint8Array, bytesPerLine: number): string {
  let text = '';
  for (const value of bytes) {
    text += `${toHexByte(value)} `;
  }
  return text + '   '.repeat(Math.max(0, bytesPerLine - bytes.length));
}

function formatAsciiColumn(bytes: Uint8Array): string {
  let text = '';
  for (const value of bytes) {
    text += isPrintableAscii(value) ? String.fromCharCode(value) : '.';
  }
  return text;
}

/**
 * Render line `lineIndex`, or null when it lies past the end of the buffer
 */
function renderLine(source: LineSource, lineIndex: number, bytesPerLine: number): HexDisplayLine | null {
  if (!Number.isInteger(lineIndex) || lineIndex < 0 || lineIndex >= lineCount(source.length, bytesPerLine)) {
    return null;
  }

  const offset = lineIndex * bytesPerLine;
  const end = Math.min(offset + bytesPerLine, source.length);
  const bytes = source.data.subarray(offset, end);

  let hasModifiedBytes = false;
  for (let position = offset; position < end; position++) {
    if (source.isModified(position)) {
      hasModifiedBytes = true;
      break;
    }
  }

  return {
    lineIndex,
    offset,
    offsetText: formatOffset(offset),
    hexText: formatHexColumn(bytes, bytesPerLine),
    asciiText: formatAsciiColumn(bytes),
    hasModifiedBytes
  };
}

/**
 * Render up to `count` lines starting at `firstLine`
 */
function renderLines(source: LineSource, firstLine: number, count: number, bytesPerLine: number): HexDisplayLine[] {
  const lines: HexDisplayLine[] = [];
  const last = Math.min(firstLine + count, lineCount(source.length, bytesPerLine));
  for (let index = Math.max(0, firstLine); index < last; index++) {
    const line = renderLine(source, index, bytesPerLine);
    if (line) {
      lines.push(line);
    }
  }
  return lines;
}

export {
  lineCount,
  lineIndexFor,
  renderLine,
  renderLines,
  formatHexColumn,
  formatAsciiColumn,
  type LineSource
};
