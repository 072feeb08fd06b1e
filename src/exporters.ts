/**
 * @fileoverview Text reports and raw selection export
 */

import { promises as fs } from 'fs';
import { fail, fromNodeError, ok, type Result } from './errors';
import { formatHexColumn, formatAsciiColumn } from './display-lines';
import { computeChecksums, formatCrc32, shannonEntropy } from './checksum-engine';
import { detectFileType } from './structure-detector';
import { writeTextFile } from './file-io';
import { formatFileSize, formatOffset } from './utils/hex';
import { type ChecksumReport } from './types/common';

const DUMP_BYTES_PER_LINE = 16;
const DUMP_RULE_WIDTH = 80;
const REPORT_RULE_WIDTH = 60;

interface ReportOptions {
  /** Name printed in the header, usually the source path */
  sourceName: string;
  /** Timestamp printed in the header */
  now?: Date;
}

function dumpColumnHeader(): string {
  const columns: string[] = [];
  for (let i = 0; i < DUMP_BYTES_PER_LINE; i++) {
    columns.push(formatOffset(i, 2));
  }
  return `Offset     ${columns.join(' ')}  ASCII`;
}

/**
 * Hex dump with a header, 16 bytes per row
 */
function formatHexDump(bytes: Uint8Array, options: ReportOptions): string {
  const now = options.now ?? new Date();
  const lines: string[] = [
    `Hex Dump of: ${options.sourceName}`,
    `Size: ${formatFileSize(bytes.length)}`,
    `Generated: ${now.toISOString()}`,
    '='.repeat(DUMP_RULE_WIDTH),
    '',
    dumpColumnHeader(),
    '-'.repeat(DUMP_RULE_WIDTH)
  ];

  for (let offset = 0; offset < bytes.length; offset += DUMP_BYTES_PER_LINE) {
    const row = bytes.subarray(offset, Math.min(offset + DUMP_BYTES_PER_LINE, bytes.length));
    lines.push(`${formatOffset(offset)}   ${formatHexColumn(row, DUMP_BYTES_PER_LINE)} ${formatAsciiColumn(row)}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Analysis report: checksums, detected type, entropy and the top byte values
 */
function formatAnalysisReport(bytes: Uint8Array, options: ReportOptions, report: ChecksumReport = computeChecksums(bytes)): string {
  const now = options.now ?? new Date();
  const lines: string[] = [
    'File Analysis Report',
    '='.repeat(REPORT_RULE_WIDTH),
    `File: ${options.sourceName}`,
    `Size: ${formatFileSize(bytes.length)} (${bytes.length} bytes)`,
    `Generated: ${now.toISOString()}`,
    '',
    'Checksums:',
    `  CRC32:  ${formatCrc32(report.crc32)}`,
    `  MD5:    ${report.md5}`,
    `  SHA1:   ${report.sha1}`,
    `  SHA256: ${report.sha256}`,
    '',
    `File Type: ${detectFileType(bytes)}`,
    `Entropy: ${shannonEntropy(bytes, report.histogram).toFixed(4)} bits/byte`,
    '',
    'Byte Distribution:'
  ];

  for (const entry of report.topBytes) {
    lines.push(`  0x${formatOffset(entry.value, 2)}: ${String(entry.count).padStart(10)} (${entry.percentage.toFixed(2)}%)`);
  }

  return lines.join('\n') + '\n';
}

async function exportHexDump(targetPath: string, bytes: Uint8Array, options: ReportOptions): Promise<Result<void>> {
  return writeTextFile(targetPath, formatHexDump(bytes, options));
}

async function exportAnalysis(
  targetPath: string,
  bytes: Uint8Array,
  options: ReportOptions,
  report?: ChecksumReport
): Promise<Result<void>> {
  return writeTextFile(targetPath, formatAnalysisReport(bytes, options, report));
}

/**
 * Write raw bytes (typically a selection) to `targetPath`
 */
async function exportBytes(targetPath: string, bytes: Uint8Array): Promise<Result<number>> {
  try {
    await fs.writeFile(targetPath, bytes);
    return ok(bytes.length);
  } catch (error) {
    return fail(fromNodeError(error, 'write', targetPath));
  }
}

/**
 * Default export name for a selection, e.g. "selection_0x00000010.bin"
 */
function selectionFileName(start: number): string {
  return `selection_0x${formatOffset(start)}.bin`;
}

export {
  formatHexDump,
  formatAnalysisReport,
  exportHexDump,
  exportAnalysis,
  exportBytes,
  selectionFileName,
  type ReportOptions
};
