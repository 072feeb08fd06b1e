/**
 * @fileoverview Fixed-width value decoding at a cursor
 */

import { TextDecoder } from 'util';
import { DecodeKind, Endianness } from './types/editor-types';

/** Returned when a value cannot be decoded at the requested offset */
const DECODE_SENTINEL = '-';

const MAX_STRING_BYTES = 64;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const WIDTHS: Readonly<Record<Exclude<DecodeKind, DecodeKind.STRING>, number>> = {
  [DecodeKind.INT8]: 1,
  [DecodeKind.UINT8]: 1,
  [DecodeKind.BINARY]: 1,
  [DecodeKind.INT16]: 2,
  [DecodeKind.UINT16]: 2,
  [DecodeKind.INT32]: 4,
  [DecodeKind.UINT32]: 4,
  [DecodeKind.FLOAT32]: 4,
  [DecodeKind.INT64]: 8,
  [DecodeKind.UINT64]: 8,
  [DecodeKind.FLOAT64]: 8
};

/**
 * Bytes consumed by `kind`; strings read up to 64 bytes
 */
function decodeWidth(kind: DecodeKind): number {
  return kind === DecodeKind.STRING ? MAX_STRING_BYTES : WIDTHS[kind];
}

// Shortest decimal that reads back as the same single-precision value
function formatFloat32(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

function decodeString(bytes: Uint8Array, offset: number): string {
  const window = bytes.subarray(offset, Math.min(offset + MAX_STRING_BYTES, bytes.length));
  const terminator = window.indexOf(0);
  const text = terminator >= 0 ? window.subarray(0, terminator) : window;
  try {
    return utf8Decoder.decode(text);
  } catch {
    return Array.from(text, value => (value < 0x80 ? String.fromCharCode(value) : '?')).join('');
  }
}

function decodeNumber(window: Buffer, kind: Exclude<DecodeKind, DecodeKind.STRING>): string {
  switch (kind) {
    case DecodeKind.INT8:
      return String(window.readInt8(0));
    case DecodeKind.UINT8:
      return String(window.readUInt8(0));
    case DecodeKind.BINARY:
      return window[0].toString(2).padStart(8, '0');
    case DecodeKind.INT16:
      return String(window.readInt16LE(0));
    case DecodeKind.UINT16:
      return String(window.readUInt16LE(0));
    case DecodeKind.INT32:
      return String(window.readInt32LE(0));
    case DecodeKind.UINT32:
      return String(window.readUInt32LE(0));
    case DecodeKind.FLOAT32:
      return formatFloat32(window.readFloatLE(0));
    case DecodeKind.INT64:
      return window.readBigInt64LE(0).toString();
    case DecodeKind.UINT64:
      return window.readBigUInt64LE(0).toString();
    case DecodeKind.FLOAT64:
      return String(window.readDoubleLE(0));
  }
}

/**
 * Decode the value of `kind` at `offset`. Big-endian reverses the window
 * before it is read. Reads past the end, bad offsets and conversion
 * failures all yield "-". Never mutates `bytes`.
 */
function decodeValue(
  bytes: Uint8Array,
  offset: number,
  kind: DecodeKind,
  endianness: Endianness = Endianness.LITTLE
): string {
  if (!Number.isInteger(offset) || offset < 0 || offset >= bytes.length) {
    return DECODE_SENTINEL;
  }

  try {
    if (kind === DecodeKind.STRING) {
      return decodeString(bytes, offset);
    }

    const width = WIDTHS[kind];
    if (offset + width > bytes.length) {
      return DECODE_SENTINEL;
    }

    const window = Buffer.from(bytes.subarray(offset, offset + width));
    if (endianness === Endianness.BIG && width > 1) {
      window.reverse();
    }
    return decodeNumber(window, kind);
  } catch {
    return DECODE_SENTINEL;
  }
}

type InspectionRow = Record<DecodeKind, string>;

/**
 * Every interpretation at once, as shown by an inspector panel
 */
function inspectAt(bytes: Uint8Array, offset: number, endianness: Endianness = Endianness.LITTLE): InspectionRow {
  const decode = (kind: DecodeKind): string => decodeValue(bytes, offset, kind, endianness);
  return {
    [DecodeKind.INT8]: decode(DecodeKind.INT8),
    [DecodeKind.UINT8]: decode(DecodeKind.UINT8),
    [DecodeKind.INT16]: decode(DecodeKind.INT16),
    [DecodeKind.UINT16]: decode(DecodeKind.UINT16),
    [DecodeKind.INT32]: decode(DecodeKind.INT32),
    [DecodeKind.UINT32]: decode(DecodeKind.UINT32),
    [DecodeKind.INT64]: decode(DecodeKind.INT64),
    [DecodeKind.UINT64]: decode(DecodeKind.UINT64),
    [DecodeKind.FLOAT32]: decode(DecodeKind.FLOAT32),
    [DecodeKind.FLOAT64]: decode(DecodeKind.FLOAT64),
    [DecodeKind.STRING]: decode(DecodeKind.STRING),
    [DecodeKind.BINARY]: decode(DecodeKind.BINARY)
  };
}

export {
  DECODE_SENTINEL,
  decodeValue,
  decodeWidth,
  inspectAt,
  type InspectionRow
};
