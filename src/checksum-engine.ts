/**
 * @fileoverview Whole-buffer checksums and byte distribution
 * @description Pure functions of a buffer snapshot. Nothing here is cached;
 * a report describes exactly the bytes it was computed from.
 */

import * as crypto from 'crypto';
import { type ByteFrequency, type ChecksumReport } from './types/common';

const CRC32_POLYNOMIAL = 0xedb88320;
const TOP_BYTES = 20;
const CHUNK_SIZE = 64 * 1024;

const CRC32_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let j = 0; j < 8; j++) {
      crc = crc & 1 ? (crc >>> 1) ^ CRC32_POLYNOMIAL : crc >>> 1;
    }
    table[i] = crc >>> 0;
  }
  return table;
})();

/**
 * CRC-32 (IEEE 802.3, reflected), as an unsigned 32-bit integer
 */
function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < bytes.length; i++) {
    crc = CRC32_TABLE[(crc ^ bytes[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function formatCrc32(value: number): string {
  return value.toString(16).toUpperCase().padStart(8, '0');
}

/**
 * Count of each byte value, indexed by value
 */
function byteHistogram(bytes: Uint8Array): number[] {
  const counts = new Array<number>(256).fill(0);
  for (let i = 0; i < bytes.length; i++) {
    counts[bytes[i]]++;
  }
  return counts;
}

/**
 * Most frequent byte values, highest count first (ties by value)
 */
function topByteFrequencies(histogram: ReadonlyArray<number>, total: number, count: number = TOP_BYTES): ByteFrequency[] {
  return histogram
    .map((occurrences, value) => ({ value, count: occurrences }))
    .filter(entry => entry.count > 0)
    .sort((a, b) => b.count - a.count || a.value - b.value)
    .slice(0, count)
    .map(entry => ({
      value: entry.value,
      count: entry.count,
      percentage: total > 0 ? (entry.count * 100) / total : 0
    }));
}

/**
 * Shannon entropy in bits per byte (0 to 8)
 */
function shannonEntropy(bytes: Uint8Array, histogram: ReadonlyArray<number> = byteHistogram(bytes)): number {
  if (bytes.length === 0) return 0;
  let entropy = 0;
  for (const occurrences of histogram) {
    if (occurrences === 0) continue;
    const p = occurrences / bytes.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/**
 * CRC32, MD5, SHA1, SHA256 and the byte histogram in one pass over the buffer
 */
function computeChecksums(bytes: Uint8Array, now: Date = new Date()): ChecksumReport {
  const md5 = crypto.createHash('md5');
  const sha1 = crypto.createHash('sha1');
  const sha256 = crypto.createHash('sha256');
  const histogram = new Array<number>(256).fill(0);
  let crc = 0xffffffff;

  for (let start = 0; start < bytes.length; start += CHUNK_SIZE) {
    const chunk = bytes.subarray(start, Math.min(start + CHUNK_SIZE, bytes.length));
    md5.update(chunk);
    sha1.update(chunk);
    sha256.update(chunk);
    for (let i = 0; i < chunk.length; i++) {
      const value = chunk[i];
      crc = CRC32_TABLE[(crc ^ value) & 0xff] ^ (crc >>> 8);
      histogram[value]++;
    }
  }

  return {
    size: bytes.length,
    crc32: (crc ^ 0xffffffff) >>> 0,
    md5: md5.digest('hex').toUpperCase(),
    sha1: sha1.digest('hex').toUpperCase(),
    sha256: sha256.digest('hex').toUpperCase(),
    histogram,
    topBytes: topByteFrequencies(histogram, bytes.length),
    computedAt: now
  };
}

export {
  crc32,
  formatCrc32,
  byteHistogram,
  topByteFrequencies,
  shannonEntropy,
  computeChecksums
};
