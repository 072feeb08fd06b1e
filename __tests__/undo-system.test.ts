/**
 * Undo System Tests
 * Bounded history, redo invalidation, transactions and merging
 */

import { ByteBuffer } from '../src/byte-buffer';
import { EditUndoSystem } from '../src/undo-system';
import { EditOperation, resetOperationCounter } from '../src/edit-operation';

describe('EditUndoSystem', () => {
  let buffer: ByteBuffer;
  let undoSystem: EditUndoSystem;
  let mockTime: number;

  beforeEach(() => {
    resetOperationCounter();
    mockTime = 1000;
    buffer = ByteBuffer.alloc(64);
    undoSystem = new EditUndoSystem(buffer, { maxUndoLevels: 100 });
    undoSystem.setClock(() => mockTime);
  });

  describe('Recording', () => {
    test('should record an edit and apply it', () => {
      const op = undoSystem.apply(10, Buffer.from([0xff]));

      expect(op).not.toBeNull();
      expect(op?.oldData).toEqual(Buffer.from([0x00]));
      expect(op?.newData).toEqual(Buffer.from([0xff]));
      expect(buffer.getByte(10)).toBe(0xff);
      expect(undoSystem.canUndo()).toBe(true);
    });

    test('should ignore unchanged, empty and out-of-range writes', () => {
      expect(undoSystem.apply(10, Buffer.from([0x00]))).toBeNull();
      expect(undoSystem.apply(10, Buffer.alloc(0))).toBeNull();
      expect(undoSystem.apply(63, Buffer.from([1, 2]))).toBeNull();
      expect(undoSystem.apply(-1, Buffer.from([1]))).toBeNull();
      expect(undoSystem.canUndo()).toBe(false);
      expect(buffer.isDirty).toBe(false);
    });

    test('should reject operations that change length', () => {
      expect(() => new EditOperation(0, Buffer.from([1]), Buffer.from([1, 2]))).toThrow('would change buffer length');
    });
  });

  describe('Undo and redo', () => {
    test('should restore exact bytes through undo then redo', () => {
      undoSystem.apply(4, Buffer.from([1, 2, 3]));
      undoSystem.apply(5, Buffer.from([9]));
      const afterEdits = buffer.snapshot();

      undoSystem.undo();
      undoSystem.undo();
      expect(buffer.snapshot()).toEqual(Buffer.alloc(64));
      expect(buffer.isDirty).toBe(false);

      undoSystem.redo();
      undoSystem.redo();
      expect(buffer.snapshot()).toEqual(afterEdits);
      expect(buffer.isDirty).toBe(true);
    });

    test('should return null when stacks are empty', () => {
      expect(undoSystem.undo()).toBeNull();
      expect(undoSystem.redo()).toBeNull();
    });

    test('should clear redo history on a new edit', () => {
      undoSystem.apply(0, Buffer.from([1]));
      undoSystem.undo();
      expect(undoSystem.canRedo()).toBe(true);

      undoSystem.apply(1, Buffer.from([2]));
      expect(undoSystem.canRedo()).toBe(false);
    });

    test('should keep the modified flag while another edit still differs', () => {
      undoSystem.apply(3, Buffer.from([0x10]));
      undoSystem.apply(3, Buffer.from([0x20]));
      undoSystem.undo();

      expect(buffer.getByte(3)).toBe(0x10);
      expect(buffer.isModified(3)).toBe(true);

      undoSystem.undo();
      expect(buffer.isModified(3)).toBe(false);
    });
  });

  describe('History limit', () => {
    test('should evict the oldest group past the limit', () => {
      const limit = 5;
      undoSystem.configure({ maxUndoLevels: limit });

      for (let i = 0; i <= limit; i++) {
        undoSystem.apply(i, Buffer.from([0x40 + i]));
      }
      for (let i = 0; i <= limit; i++) {
        undoSystem.undo();
      }

      // The first edit fell off the history and stays applied
      expect(buffer.getByte(0)).toBe(0x40);
      for (let i = 1; i <= limit; i++) {
        expect(buffer.getByte(i)).toBe(0);
      }
      expect(undoSystem.getStats().evictedGroups).toBe(1);
    });

    test('should default to 100 levels', () => {
      const fresh = new EditUndoSystem(ByteBuffer.alloc(8));
      expect(fresh.getStats().maxUndoLevels).toBe(100);
    });
  });

  describe('Transactions', () => {
    test('should undo a transaction as one step', () => {
      undoSystem.beginTransaction('Fill');
      undoSystem.apply(0, Buffer.from([1]));
      undoSystem.apply(8, Buffer.from([2]));
      undoSystem.commitTransaction();

      expect(undoSystem.getStats().undoGroups).toBe(1);

      const group = undoSystem.undo();
      expect(group?.name).toBe('Fill');
      expect(buffer.getByte(0)).toBe(0);
      expect(buffer.getByte(8)).toBe(0);
    });

    test('should leave no history for an empty transaction', () => {
      undoSystem.beginTransaction('Nothing');
      expect(undoSystem.commitTransaction()).toBe(true);
      expect(undoSystem.canUndo()).toBe(false);
    });

    test('should roll back uncommitted edits', () => {
      undoSystem.beginTransaction('Abandoned');
      undoSystem.apply(2, Buffer.from([7, 7]));
      expect(undoSystem.rollbackTransaction()).toBe(true);

      expect(buffer.readRange(2, 4)).toEqual(Buffer.from([0, 0]));
      expect(buffer.isDirty).toBe(false);
      expect(undoSystem.inTransaction()).toBe(false);
    });

    test('should join an active transaction from runInTransaction', () => {
      undoSystem.beginTransaction('Outer');
      undoSystem.apply(0, Buffer.from([1]));
      const result = undoSystem.runInTransaction('Inner', () => undoSystem.apply(1, Buffer.from([2])) !== null);
      undoSystem.commitTransaction();

      expect(result).toBe(true);
      expect(undoSystem.getStats().undoGroups).toBe(1);
      expect(undoSystem.undo()?.name).toBe('Outer');
      expect(buffer.readRange(0, 2)).toEqual(Buffer.from([0, 0]));
    });

    test('should roll back its own transaction when work throws', () => {
      expect(() =>
        undoSystem.runInTransaction('Broken', () => {
          undoSystem.apply(4, Buffer.from([9]));
          throw new Error('stop');
        })
      ).toThrow('stop');

      expect(buffer.getByte(4)).toBe(0);
      expect(undoSystem.inTransaction()).toBe(false);
      expect(undoSystem.canUndo()).toBe(false);
    });

    test('should refuse nested transactions', () => {
      undoSystem.beginTransaction('Outer');
      expect(() => undoSystem.beginTransaction('Inner')).toThrow('another transaction is already active');
    });
  });

  describe('Merging', () => {
    test('should not merge by default', () => {
      undoSystem.apply(0, Buffer.from([1]));
      undoSystem.apply(1, Buffer.from([2]));
      expect(undoSystem.getStats().undoGroups).toBe(2);
    });

    test('should merge contiguous edits inside the time window', () => {
      undoSystem.configure({ mergeTimeWindow: 500 });
      undoSystem.apply(0, Buffer.from([1]));
      mockTime += 100;
      undoSystem.apply(1, Buffer.from([2]));
      mockTime += 1000;
      undoSystem.apply(2, Buffer.from([3]));

      expect(undoSystem.getStats().undoGroups).toBe(2);
      expect(undoSystem.getStats().totalUndoOperations).toBe(3);

      undoSystem.undo();
      expect(buffer.readRange(0, 3)).toEqual(Buffer.from([1, 2, 0]));
      undoSystem.undo();
      expect(buffer.readRange(0, 3)).toEqual(Buffer.from([0, 0, 0]));
    });
  });
});
