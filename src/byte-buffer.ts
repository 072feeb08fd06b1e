/**
 * @fileoverview Fixed-length in-memory byte store with modification tracking
 * @description Owns the loaded bytes, the set of modified offsets and the dirty
 * flag. Writes are expected to come from the undo system only.
 */

type ByteChangeListener = (offset: number, length: number) => void;

/**
 * Mutable, fixed-length byte sequence for one editing session
 */
class ByteBuffer {
  private readonly bytes: Buffer;

  // Byte values as of the last load/save, kept only for offsets touched since
  private readonly baseline: Map<number, number> = new Map();
  private readonly modified: Set<number> = new Set();
  private dirty: boolean = false;

  private changeListeners: ByteChangeListener[] = [];

  constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  /**
   * Create a buffer holding a private copy of `source`
   */
  static copyOf(source: Uint8Array): ByteBuffer {
    return new ByteBuffer(Buffer.from(source));
  }

  /**
   * Create a zero-filled buffer
   */
  static alloc(size: number): ByteBuffer {
    return new ByteBuffer(Buffer.alloc(size));
  }

  get length(): number {
    return this.bytes.length;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get modifiedOffsets(): ReadonlySet<number> {
    return this.modified;
  }

  /**
   * Live view of the bytes. Callers must treat it as read-only.
   */
  get data(): Buffer {
    return this.bytes;
  }

  inRange(offset: number): boolean {
    return Number.isInteger(offset) && offset >= 0 && offset < this.bytes.length;
  }

  /**
   * Whether `length` bytes starting at `offset` lie inside the buffer
   */
  containsRange(offset: number, length: number): boolean {
    return this.inRange(offset) && Number.isInteger(length) && length >= 0 && offset + length <= this.bytes.length;
  }

  getByte(offset: number): number | null {
    return this.inRange(offset) ? this.bytes[offset] : null;
  }

  /**
   * Copy of [start, end), clamped to the buffer
   */
  readRange(start: number, end: number): Buffer {
    const from = Math.max(0, Math.min(start, this.bytes.length));
    const to = Math.max(from, Math.min(end, this.bytes.length));
    return Buffer.from(this.bytes.subarray(from, to));
  }

  /**
   * Private copy of the whole buffer
   */
  snapshot(): Buffer {
    return Buffer.from(this.bytes);
  }

  isModified(offset: number): boolean {
    return this.modified.has(offset);
  }

  /**
   * Write `data` at `offset`. Written offsets count as modified unless they
   * hold their last loaded/saved value. The range must already be validated.
   */
  applyBytes(offset: number, data: Uint8Array): void {
    this._write(offset, data);
  }

  /**
   * Write `data` back at `offset` (undo)
   */
  restoreBytes(offset: number, data: Uint8Array): void {
    this._write(offset, data);
  }

  private _write(offset: number, data: Uint8Array): void {
    this._assertRange(offset, data.length);
    for (let i = 0; i < data.length; i++) {
      const position = offset + i;
      if (!this.baseline.has(position)) {
        this.baseline.set(position, this.bytes[position]);
      }
      this.bytes[position] = data[i];
      if (this.baseline.get(position) === data[i]) {
        this.modified.delete(position);
        this.baseline.delete(position);
      } else {
        this.modified.add(position);
      }
    }
    this.dirty = this.modified.size > 0;
    this._emitChange(offset, data.length);
  }

  /**
   * Treat the current contents as the on-disk state
   */
  markSaved(): void {
    this.modified.clear();
    this.baseline.clear();
    this.dirty = false;
  }

  onChange(listener: ByteChangeListener): () => void {
    this.changeListeners.push(listener);
    return () => {
      this.changeListeners = this.changeListeners.filter(l => l !== listener);
    };
  }

  private _emitChange(offset: number, length: number): void {
    for (const listener of this.changeListeners) {
      listener(offset, length);
    }
  }

  private _assertRange(offset: number, length: number): void {
    if (!this.containsRange(offset, length)) {
      throw new RangeError(`Range ${offset}+${length} is outside buffer of ${this.bytes.length} bytes`);
    }
  }
}

export {
  ByteBuffer,
  type ByteChangeListener
};
