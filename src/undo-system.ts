/**
 * @fileoverview Bounded linear undo/redo history for fixed-size edits
 */

import { EditOperation } from './edit-operation';
import { type Logger, silentLogger } from './utils/logger';

interface UndoConfig {
  maxUndoLevels?: number;
  /** Adjacent edits closer than this many ms undo together. 0 disables merging. */
  mergeTimeWindow?: number;
}

interface UndoStats {
  undoGroups: number;
  redoGroups: number;
  totalUndoOperations: number;
  totalRedoOperations: number;
  currentTransactionOperations: number;
  memoryUsage: number;
  maxUndoLevels: number;
  evictedGroups: number;
}

/**
 * What the undo system needs from the byte store
 */
interface UndoTarget {
  readonly length: number;
  containsRange(offset: number, length: number): boolean;
  readRange(start: number, end: number): Buffer;
  applyBytes(offset: number, data: Uint8Array): void;
  restoreBytes(offset: number, data: Uint8Array): void;
}

/**
 * Groups related operations together for undo/redo
 */
class OperationGroup {
  public id: string;
  public name: string | null;
  public operations: EditOperation[] = [];
  public timestamp: number;
  public isFromTransaction: boolean = false;

  constructor(id: string, name: string | null = null, timestamp: number = Date.now()) {
    this.id = id;
    this.name = name;
    this.timestamp = timestamp;
  }

  getMemoryUsage(): number {
    let total = 0;
    for (const op of this.operations) {
      total += op.getMemoryUsage();
    }
    return total;
  }

  lastOperation(): EditOperation | null {
    return this.operations.length > 0 ? this.operations[this.operations.length - 1] : null;
  }
}

/**
 * Transaction for grouping operations
 */
class OperationTransaction {
  public name: string;
  public operations: EditOperation[] = [];
  public startTime: number;

  constructor(name: string, startTime: number) {
    this.name = name;
    this.startTime = startTime;
  }
}

/**
 * Linear undo/redo over a fixed-length byte store.
 *
 * Every mutation goes through {@link EditUndoSystem.apply}; a new mutation
 * discards the redo history. The undo stack holds at most `maxUndoLevels`
 * groups and drops the oldest when full.
 */
class EditUndoSystem {
  private target: UndoTarget;
  private maxUndoLevels: number;
  private mergeTimeWindow: number = 0;
  private logger: Logger;

  private undoStack: OperationGroup[] = [];
  private redoStack: OperationGroup[] = [];
  private activeTransaction: OperationTransaction | null = null;

  private groupIdCounter: number = 0;
  private evictedGroups: number = 0;

  // Clock function (can be mocked for testing)
  private clockFunction: () => number = () => Date.now();

  constructor(target: UndoTarget, config: UndoConfig = {}, logger: Logger = silentLogger) {
    this.target = target;
    this.maxUndoLevels = 100;
    this.logger = logger;
    this.configure(config);
  }

  configure(config: UndoConfig): void {
    if (config.maxUndoLevels !== undefined && config.maxUndoLevels > 0) {
      this.maxUndoLevels = config.maxUndoLevels;
      this._enforceLimit();
    }
    if (config.mergeTimeWindow !== undefined && config.mergeTimeWindow >= 0) {
      this.mergeTimeWindow = config.mergeTimeWindow;
    }
  }

  /**
   * Set custom clock function (for testing)
   */
  setClock(clockFn: () => number): void {
    this.clockFunction = clockFn;
  }

  getClock(): number {
    return this.clockFunction();
  }

  private _generateGroupId(): string {
    return `group_${++this.groupIdCounter}_${this.getClock()}`;
  }

  /**
   * Overwrite bytes at `offset` with `data` and record the edit.
   * Returns null (and records nothing) when the range is outside the buffer,
   * the data is empty, or the bytes are already equal.
   */
  apply(offset: number, data: Uint8Array): EditOperation | null {
    if (data.length === 0 || !this.target.containsRange(offset, data.length)) {
      return null;
    }

    const oldData = this.target.readRange(offset, offset + data.length);
    if (oldData.equals(data)) {
      return null;
    }

    const operation = new EditOperation(offset, oldData, data, this.getClock());
    this.target.applyBytes(offset, operation.newData);
    this._recordOperation(operation);
    return operation;
  }

  private _recordOperation(operation: EditOperation): void {
    // Branching edits discard forward history
    this.redoStack = [];

    if (this.activeTransaction) {
      this.activeTransaction.operations.push(operation);
      return;
    }

    const topGroup = this.undoStack.length > 0 ? this.undoStack[this.undoStack.length - 1] : null;
    if (topGroup && !topGroup.isFromTransaction) {
      const lastOp = topGroup.lastOperation();
      if (lastOp && lastOp.canMergeWith(operation, this.mergeTimeWindow)) {
        topGroup.operations.push(operation);
        return;
      }
    }

    const group = new OperationGroup(this._generateGroupId(), null, operation.timestamp);
    group.operations.push(operation);
    this._pushUndoGroup(group);
  }

  private _pushUndoGroup(group: OperationGroup): void {
    this.undoStack.push(group);
    this._enforceLimit();
  }

  private _enforceLimit(): void {
    while (this.undoStack.length > this.maxUndoLevels) {
      const evicted = this.undoStack.shift();
      this.evictedGroups++;
      this.logger.debug(`Evicted undo group ${evicted?.id ?? '?'} (limit ${this.maxUndoLevels})`);
    }
  }

  // =================== TRANSACTIONS ===================

  /**
   * Start collecting edits into one undoable step
   */
  beginTransaction(name: string): void {
    if (this.activeTransaction) {
      throw new Error('Cannot start transaction - another transaction is already active');
    }
    this.activeTransaction = new OperationTransaction(name, this.getClock());
  }

  /**
   * Close the active transaction. Empty transactions leave no history entry.
   */
  commitTransaction(finalName: string | null = null): boolean {
    if (!this.activeTransaction) {
      return false;
    }

    if (this.activeTransaction.operations.length > 0) {
      const group = new OperationGroup(
        this._generateGroupId(),
        finalName ?? this.activeTransaction.name,
        this.activeTransaction.startTime
      );
      group.operations = [...this.activeTransaction.operations];
      group.isFromTransaction = true;
      this._pushUndoGroup(group);
    }

    this.activeTransaction = null;
    return true;
  }

  /**
   * Revert every edit of the active transaction and discard it
   */
  rollbackTransaction(): boolean {
    if (!this.activeTransaction) {
      return false;
    }
    const operations = this.activeTransaction.operations;
    for (let i = operations.length - 1; i >= 0; i--) {
      this.target.restoreBytes(operations[i].offset, operations[i].oldData);
    }
    this.activeTransaction = null;
    return true;
  }

  /**
   * Run `work` as one undoable step. Inside an active transaction the edits
   * join it instead, and the outer caller decides whether they are kept.
   * A throw rolls back a transaction this call started.
   */
  runInTransaction<T>(name: string, work: () => T): T {
    if (this.activeTransaction) {
      return work();
    }
    this.beginTransaction(name);
    try {
      const result = work();
      this.commitTransaction();
      return result;
    } catch (error) {
      this.rollbackTransaction();
      throw error;
    }
  }

  inTransaction(): boolean {
    return this.activeTransaction !== null;
  }

  // =================== UNDO/REDO ===================

  /**
   * Revert the most recent group. Returns the group, or null when there is
   * nothing to undo.
   */
  undo(): OperationGroup | null {
    // Undo during an active transaction rolls it back
    if (this.activeTransaction) {
      this.rollbackTransaction();
      return null;
    }

    const group = this.undoStack.pop();
    if (!group) {
      return null;
    }

    for (let i = group.operations.length - 1; i >= 0; i--) {
      const operation = group.operations[i];
      this.target.restoreBytes(operation.offset, operation.oldData);
    }

    this.redoStack.push(group);
    return group;
  }

  /**
   * Re-apply the most recently undone group, or return null
   */
  redo(): OperationGroup | null {
    if (this.activeTransaction) {
      return null;
    }

    const group = this.redoStack.pop();
    if (!group) {
      return null;
    }

    for (const operation of group.operations) {
      this.target.applyBytes(operation.offset, operation.newData);
    }

    this.undoStack.push(group);
    return group;
  }

  canUndo(): boolean {
    return this.activeTransaction !== null || this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.activeTransaction === null && this.redoStack.length > 0;
  }

  getStats(): UndoStats {
    let totalUndoOperations = 0;
    let totalRedoOperations = 0;
    let memoryUsage = 0;

    for (const group of this.undoStack) {
      totalUndoOperations += group.operations.length;
      memoryUsage += group.getMemoryUsage();
    }
    for (const group of this.redoStack) {
      totalRedoOperations += group.operations.length;
      memoryUsage += group.getMemoryUsage();
    }

    return {
      undoGroups: this.undoStack.length,
      redoGroups: this.redoStack.length,
      totalUndoOperations,
      totalRedoOperations,
      currentTransactionOperations: this.activeTransaction ? this.activeTransaction.operations.length : 0,
      memoryUsage,
      maxUndoLevels: this.maxUndoLevels,
      evictedGroups: this.evictedGroups
    };
  }

  /**
   * Clear all undo/redo history
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.activeTransaction = null;
    this.groupIdCounter = 0;
    this.evictedGroups = 0;
  }
}

export {
  EditUndoSystem,
  OperationGroup,
  OperationTransaction,
  type UndoConfig,
  type UndoTarget,
  type UndoStats
};
