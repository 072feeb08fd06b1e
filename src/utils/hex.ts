/**
 * @fileoverview Hex formatting and parsing helpers
 */

import { EditorError, fail, ok, type Result } from '../errors';
import { EditorErrorKind } from '../types/editor-types';

const HEX_DIGITS = /^[0-9a-fA-F]+$/;
const SIZE_SUFFIXES = ['B', 'KB', 'MB', 'GB', 'TB'];

function toHexByte(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Upper-case hex offset, zero padded (8 digits by default)
 */
function formatOffset(offset: number, digits: number = 8): string {
  return offset.toString(16).toUpperCase().padStart(digits, '0');
}

function bytesToHex(bytes: Uint8Array, separator: string = ' '): string {
  return Array.from(bytes, toHexByte).join(separator);
}

function isPrintableAscii(value: number): boolean {
  return value >= 0x20 && value <= 0x7e;
}

/**
 * Parse a whole-byte hex string such as "FF 00 AB", "ff00ab" or "FF-00-AB".
 * Odd digit counts and non-hex characters are rejected.
 */
function parseHexBytes(text: string): Result<Buffer> {
  const compact = text.replace(/[\s-]/g, '');
  if (compact.length === 0) {
    return fail(new EditorError(EditorErrorKind.INVALID_PATTERN, 'Hex input is empty'));
  }
  if (!HEX_DIGITS.test(compact)) {
    return fail(new EditorError(EditorErrorKind.INVALID_PATTERN, `Invalid hex characters in "${text}"`));
  }
  if (compact.length % 2 !== 0) {
    return fail(new EditorError(EditorErrorKind.INVALID_PATTERN, `Hex input has an odd number of digits: "${text}"`));
  }
  return ok(Buffer.from(compact, 'hex'));
}

/**
 * Parse a user-entered offset: "0x" prefix means hex, otherwise decimal.
 * Returns null when the text is not a non-negative integer.
 */
function parseOffset(text: string): number | null {
  const input = text.trim();
  if (/^0x[0-9a-f]+$/i.test(input)) {
    return parseInt(input.slice(2), 16);
  }
  if (/^\d+$/.test(input)) {
    return parseInt(input, 10);
  }
  return null;
}

function formatFileSize(bytes: number): string {
  let size = bytes;
  let index = 0;
  while (size >= 1024 && index < SIZE_SUFFIXES.length - 1) {
    size /= 1024;
    index++;
  }
  return `${size.toFixed(2)} ${SIZE_SUFFIXES[index]}`;
}

export {
  toHexByte,
  formatOffset,
  bytesToHex,
  isPrintableAscii,
  parseHexBytes,
  parseOffset,
  formatFileSize
};
