/**
 * @fileoverview Text patch files: `OFFSET:ORIGINAL:NEW[:DESCRIPTION]` per line
 * @description `#` and `//` lines are comments. Offsets are hex with an
 * optional `0x`; byte fields are whole hex bytes. Applying verifies the
 * original bytes before writing through the undo system.
 */

import { promises as fs } from 'fs';
import { type EditUndoSystem } from './undo-system';
import { fail, fromNodeError, ok, type Result } from './errors';
import { type HexPatch } from './types/common';
import { bytesToHex, parseHexBytes } from './utils/hex';
import { type Logger, silentLogger } from './utils/logger';

interface PatchParseError {
  lineNumber: number;
  line: string;
  message: string;
}

interface ParsedPatchFile {
  patches: HexPatch[];
  errors: PatchParseError[];
}

type PatchStatus = 'ready' | 'applied' | 'mismatch' | 'out_of_range' | 'length_mismatch' | 'unchanged';

interface PatchOutcome {
  patch: HexPatch;
  status: PatchStatus;
  /** Bytes found at the offset when verification failed */
  found: Buffer | null;
}

interface PatchApplySummary {
  applied: number;
  rejected: number;
  outcomes: PatchOutcome[];
}

const OFFSET_PATTERN = /^(0x)?([0-9a-f]+)$/i;

function isComment(line: string): boolean {
  return line.startsWith('#') || line.startsWith('//');
}

function parsePatchLine(line: string): HexPatch | string {
  const parts = line.split(':');
  if (parts.length < 3) {
    return 'Expected OFFSET:ORIGINAL:NEW[:DESCRIPTION]';
  }

  const offsetMatch = OFFSET_PATTERN.exec(parts[0].trim());
  if (!offsetMatch) {
    return `Invalid offset "${parts[0].trim()}"`;
  }

  const original = parseHexBytes(parts[1]);
  if (!original.ok) {
    return original.error.message;
  }
  const replacement = parseHexBytes(parts[2]);
  if (!replacement.ok) {
    return replacement.error.message;
  }

  return {
    offset: parseInt(offsetMatch[2], 16),
    originalBytes: original.value,
    newBytes: replacement.value,
    // Descriptions may themselves contain ':'
    description: parts.slice(3).join(':').trim()
  };
}

/**
 * Parse patch file text. Malformed lines are reported, not fatal.
 */
function parsePatchFile(text: string): ParsedPatchFile {
  const patches: HexPatch[] = [];
  const errors: PatchParseError[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line.length === 0 || isComment(line)) {
      return;
    }
    const parsed = parsePatchLine(line);
    if (typeof parsed === 'string') {
      errors.push({ lineNumber: index + 1, line: raw, message: parsed });
    } else {
      patches.push(parsed);
    }
  });

  return { patches, errors };
}

function formatPatchFile(patches: ReadonlyArray<HexPatch>): string {
  const lines = ['# Hex Patch File', '# Format: OFFSET:ORIGINAL:NEW:DESCRIPTION', ''];
  for (const patch of patches) {
    lines.push(
      `0x${patch.offset.toString(16).toUpperCase()}:${bytesToHex(patch.originalBytes, '')}:` +
      `${bytesToHex(patch.newBytes, '')}:${patch.description}`
    );
  }
  return lines.join('\n') + '\n';
}

async function loadPatchFile(filePath: string, logger: Logger = silentLogger): Promise<Result<ParsedPatchFile>> {
  try {
    const parsed = parsePatchFile(await fs.readFile(filePath, 'utf8'));
    logger.debug(`Loaded ${parsed.patches.length} patches from ${filePath}`);
    for (const error of parsed.errors) {
      logger.warn(`${filePath}:${error.lineNumber}: ${error.message}`);
    }
    return ok(parsed);
  } catch (error) {
    return fail(fromNodeError(error, 'read', filePath));
  }
}

async function savePatchFile(filePath: string, patches: ReadonlyArray<HexPatch>): Promise<Result<void>> {
  try {
    await fs.writeFile(filePath, formatPatchFile(patches), 'utf8');
    return ok(undefined);
  } catch (error) {
    return fail(fromNodeError(error, 'write', filePath));
  }
}

/**
 * Byte store access needed to verify a patch
 */
interface PatchTarget {
  containsRange(offset: number, length: number): boolean;
  readRange(start: number, end: number): Buffer;
}

/**
 * Check a patch against the current bytes without writing. A passing patch
 * reports `ready`, or `unchanged` when the new bytes equal the original.
 */
function verifyPatch(target: PatchTarget, patch: HexPatch): PatchOutcome {
  if (patch.originalBytes.length !== patch.newBytes.length) {
    return { patch, status: 'length_mismatch', found: null };
  }
  if (!target.containsRange(patch.offset, patch.originalBytes.length)) {
    return { patch, status: 'out_of_range', found: null };
  }
  const found = target.readRange(patch.offset, patch.offset + patch.originalBytes.length);
  if (!found.equals(patch.originalBytes)) {
    return { patch, status: 'mismatch', found };
  }
  if (patch.newBytes.equals(patch.originalBytes)) {
    return { patch, status: 'unchanged', found: null };
  }
  return { patch, status: 'ready', found: null };
}

/**
 * Apply each verified patch through `undoSystem` as one undoable step.
 * Patches are checked in order, so a patch sees the writes of those before it.
 */
function applyPatches(
  undoSystem: EditUndoSystem,
  target: PatchTarget,
  patches: ReadonlyArray<HexPatch>,
  transactionName: string = 'Apply patches',
  logger: Logger = silentLogger
): PatchApplySummary {
  const outcomes: PatchOutcome[] = [];
  let applied = 0;
  let rejected = 0;

  undoSystem.runInTransaction(transactionName, () => {
    for (const patch of patches) {
      const outcome = verifyPatch(target, patch);
      if (outcome.status === 'ready') {
        undoSystem.apply(patch.offset, patch.newBytes);
        outcomes.push({ ...outcome, status: 'applied' });
        applied++;
        continue;
      }
      outcomes.push(outcome);
      if (outcome.status !== 'unchanged') {
        rejected++;
        const detail = outcome.found ? ` (expected ${bytesToHex(patch.originalBytes)}, found ${bytesToHex(outcome.found)})` : '';
        logger.warn(`Patch at 0x${patch.offset.toString(16).toUpperCase()} rejected: ${outcome.status}${detail}`);
      }
    }
  });

  return { applied, rejected, outcomes };
}

export {
  parsePatchFile,
  formatPatchFile,
  loadPatchFile,
  savePatchFile,
  verifyPatch,
  applyPatches,
  type PatchTarget,
  type PatchParseError,
  type ParsedPatchFile,
  type PatchStatus,
  type PatchOutcome,
  type PatchApplySummary
};
