/**
 * @fileoverview Reversible fixed-size edit recorded by the undo system
 */

import { EditKind } from './types/editor-types';

/**
 * Global operation counter for determining chronological order
 */
let globalOperationCounter: number = 0;

/**
 * Reset the global operation counter (for testing)
 */
function resetOperationCounter(): void {
  globalOperationCounter = 0;
}

/**
 * One overwrite of `oldData` by `newData` at `offset`. Both payloads always
 * have the same length; the buffer never grows or shrinks.
 */
class EditOperation {
  public readonly kind: EditKind = EditKind.MODIFY;
  public readonly offset: number;
  public readonly oldData: Buffer;
  public readonly newData: Buffer;
  public readonly timestamp: number;
  public readonly operationNumber: number;
  public readonly id: string;

  constructor(offset: number, oldData: Uint8Array, newData: Uint8Array, timestamp: number | null = null) {
    if (oldData.length !== newData.length) {
      throw new Error(
        `Edit at ${offset} would change buffer length (${oldData.length} -> ${newData.length} bytes)`
      );
    }
    this.offset = offset;
    this.oldData = Buffer.from(oldData);
    this.newData = Buffer.from(newData);
    this.timestamp = timestamp ?? Date.now();
    this.operationNumber = ++globalOperationCounter;
    this.id = `op_${this.operationNumber}_${this.timestamp}`;
  }

  get length(): number {
    return this.newData.length;
  }

  /**
   * Offset one past the last byte this edit touches
   */
  getEndOffset(): number {
    return this.offset + this.newData.length;
  }

  getMemoryUsage(): number {
    return this.oldData.length + this.newData.length;
  }

  /**
   * Whether `other` continues this edit closely enough to undo with it:
   * it starts exactly where this one ends and within the time window.
   */
  canMergeWith(other: EditOperation, timeWindow: number): boolean {
    if (timeWindow <= 0) {
      return false;
    }
    if (Math.abs(other.timestamp - this.timestamp) > timeWindow) {
      return false;
    }
    return other.offset === this.getEndOffset();
  }
}

export {
  EditOperation,
  resetOperationCounter
};
