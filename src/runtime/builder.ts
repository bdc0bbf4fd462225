import type { ScalarKind, ScalarValue } from './byte-buffer.js';
import {
  ByteBuffer,
  FILE_IDENTIFIER_LENGTH,
  SIZE_PREFIX_LENGTH,
  SIZEOF_INT,
  SIZEOF_SHORT,
} from './byte-buffer.js';

export interface BuilderOptions {
  /** Initial capacity in bytes. Default: 1024. */
  initialSize?: number;
  /** Write scalar fields even when they equal their default. */
  forceDefaults?: boolean;
}

const MAX_BUFFER_SIZE = 0x7fffffff;
const VTABLE_HEADER_FIELDS = 2;

const utf8Encoder = new TextEncoder();

function asBigInt(value: ScalarValue): bigint {
  if (typeof value === 'bigint') return value;
  return BigInt(typeof value === 'boolean' ? Number(value) : Math.trunc(value));
}

function asNumber(value: ScalarValue): number {
  return typeof value === 'number' ? value : Number(value);
}

/**
 * Builds a FlatBuffer back to front.
 *
 * Offsets handed out by the builder are measured from the END of the buffer, so they stay valid
 * when the buffer grows (growth copies existing data to the high end of a larger array).
 */
export class Builder {
  private bb: ByteBuffer;
  /** Free bytes below the written region; the next write lands at `space - size`. */
  private space: number;
  private minalign = 1;
  private vtable: number[] | null = null;
  private objectStart = 0;
  private vectorElements = 0;
  private nested = false;
  private finished = false;
  /** Content-addressed vtable cache: slot layout -> offset of the vtable already written. */
  private vtables = new Map<string, number>();
  private readonly forceDefaults: boolean;
  private readonly initialSize: number;

  constructor(options: BuilderOptions = {}) {
    this.initialSize = Math.max(1, options.initialSize ?? 1024);
    this.forceDefaults = options.forceDefaults ?? false;
    this.bb = ByteBuffer.allocate(this.initialSize);
    this.space = this.initialSize;
  }

  reset(): void {
    this.bb = ByteBuffer.allocate(this.initialSize);
    this.space = this.initialSize;
    this.minalign = 1;
    this.vtable = null;
    this.objectStart = 0;
    this.vectorElements = 0;
    this.nested = false;
    this.finished = false;
    this.vtables.clear();
  }

  /**
   * Current offset, measured from the end of the buffer.
   */
  offset(): number {
    return this.bb.capacity() - this.space;
  }

  private grow(): void {
    const old = this.bb.bytes();
    const oldSize = old.length;
    if (oldSize >= MAX_BUFFER_SIZE / 2) {
      throw new RangeError('FlatBuffers cannot grow beyond 2GB');
    }
    const next = new Uint8Array(oldSize * 2);
    next.set(old, oldSize);
    this.bb = new ByteBuffer(next);
    this.space += oldSize;
  }

  pad(bytes: number): void {
    for (let i = 0; i < bytes; i++) this.bb.writeUint8(--this.space, 0);
  }

  /**
   * Make room for `size` bytes aligned to `size`, after `additionalBytes` will have been written.
   * Also tracks the largest alignment seen, which `finish` uses to align the root.
   */
  prep(size: number, additionalBytes: number): void {
    if (size > this.minalign) this.minalign = size;
    const alignSize = (~(this.bb.capacity() - this.space + additionalBytes) + 1) & (size - 1);
    while (this.space < alignSize + size + additionalBytes) this.grow();
    this.pad(alignSize);
  }

  writeInt8(value: number): void {
    this.bb.writeInt8((this.space -= 1), value);
  }

  writeUint8(value: number): void {
    this.bb.writeUint8((this.space -= 1), value);
  }

  writeBool(value: boolean): void {
    this.writeUint8(value ? 1 : 0);
  }

  writeInt16(value: number): void {
    this.bb.writeInt16((this.space -= 2), value);
  }

  writeUint16(value: number): void {
    this.bb.writeUint16((this.space -= 2), value);
  }

  writeInt32(value: number): void {
    this.bb.writeInt32((this.space -= 4), value);
  }

  writeUint32(value: number): void {
    this.bb.writeUint32((this.space -= 4), value);
  }

  writeInt64(value: bigint): void {
    this.bb.writeInt64((this.space -= 8), value);
  }

  writeUint64(value: bigint): void {
    this.bb.writeUint64((this.space -= 8), value);
  }

  writeFloat32(value: number): void {
    this.bb.writeFloat32((this.space -= 4), value);
  }

  writeFloat64(value: number): void {
    this.bb.writeFloat64((this.space -= 8), value);
  }

  /**
   * Raw write of any scalar at the current position; the caller has already aligned.
   */
  writeScalar(kind: ScalarKind, value: ScalarValue): void {
    switch (kind) {
      case 'bool':
        return this.writeUint8(asNumber(value) ? 1 : 0);
      case 'int8':
        return this.writeInt8(asNumber(value));
      case 'uint8':
        return this.writeUint8(asNumber(value));
      case 'int16':
        return this.writeInt16(asNumber(value));
      case 'uint16':
        return this.writeUint16(asNumber(value));
      case 'int32':
        return this.writeInt32(asNumber(value));
      case 'uint32':
        return this.writeUint32(asNumber(value));
      case 'int64':
        return this.writeInt64(asBigInt(value));
      case 'uint64':
        return this.writeUint64(asBigInt(value));
      case 'float32':
        return this.writeFloat32(asNumber(value));
      case 'float64':
        return this.writeFloat64(asNumber(value));
    }
  }

  addInt8(value: number): void {
    this.prep(1, 0);
    this.writeInt8(value);
  }

  addUint8(value: number): void {
    this.prep(1, 0);
    this.writeUint8(value);
  }

  addBool(value: boolean): void {
    this.prep(1, 0);
    this.writeBool(value);
  }

  addInt16(value: number): void {
    this.prep(2, 0);
    this.writeInt16(value);
  }

  addUint16(value: number): void {
    this.prep(2, 0);
    this.writeUint16(value);
  }

  addInt32(value: number): void {
    this.prep(4, 0);
    this.writeInt32(value);
  }

  addUint32(value: number): void {
    this.prep(4, 0);
    this.writeUint32(value);
  }

  addInt64(value: bigint): void {
    this.prep(8, 0);
    this.writeInt64(value);
  }

  addUint64(value: bigint): void {
    this.prep(8, 0);
    this.writeUint64(value);
  }

  addFloat32(value: number): void {
    this.prep(4, 0);
    this.writeFloat32(value);
  }

  addFloat64(value: number): void {
    this.prep(8, 0);
    this.writeFloat64(value);
  }

  addScalar(kind: ScalarKind, value: ScalarValue): void {
    const size = scalarWidth(kind);
    this.prep(size, 0);
    this.writeScalar(kind, value);
  }

  /**
   * Write a uoffset pointing at an object written earlier.
   */
  addOffset(offset: number): void {
    this.prep(SIZEOF_INT, 0);
    if (offset > this.offset()) throw new RangeError('Offset refers to data not yet written');
    this.writeUint32(this.offset() - offset + SIZEOF_INT);
  }

  private assertNotNested(): void {
    if (this.nested) {
      throw new Error('Builder: objects cannot be created while a table or vector is open');
    }
  }

  startTable(slotCount: number): void {
    this.assertNotNested();
    this.vtable = new Array<number>(slotCount).fill(0);
    this.nested = true;
    this.objectStart = this.offset();
  }

  /**
   * Record that the value just written belongs to vtable slot `slot`.
   */
  slot(slot: number): void {
    if (!this.vtable) throw new Error('Builder: field added outside a table');
    if (slot < 0 || slot >= this.vtable.length) {
      throw new RangeError(`Builder: slot ${slot} is outside the table (${this.vtable.length} slots)`);
    }
    this.vtable[slot] = this.offset();
  }

  /** NaN matches a NaN default; `-0` matches `0`. */
  private elide(value: ScalarValue, defaultValue: ScalarValue): boolean {
    if (this.forceDefaults) return false;
    return value === defaultValue || (Number.isNaN(value) && Number.isNaN(defaultValue));
  }

  addFieldInt8(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addInt8(value);
    this.slot(slot);
  }

  addFieldUint8(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addUint8(value);
    this.slot(slot);
  }

  addFieldBool(slot: number, value: boolean, defaultValue: boolean): void {
    if (this.elide(value, defaultValue)) return;
    this.addBool(value);
    this.slot(slot);
  }

  addFieldInt16(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addInt16(value);
    this.slot(slot);
  }

  addFieldUint16(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addUint16(value);
    this.slot(slot);
  }

  addFieldInt32(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addInt32(value);
    this.slot(slot);
  }

  addFieldUint32(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addUint32(value);
    this.slot(slot);
  }

  addFieldInt64(slot: number, value: bigint, defaultValue: bigint): void {
    if (this.elide(value, defaultValue)) return;
    this.addInt64(value);
    this.slot(slot);
  }

  addFieldUint64(slot: number, value: bigint, defaultValue: bigint): void {
    if (this.elide(value, defaultValue)) return;
    this.addUint64(value);
    this.slot(slot);
  }

  addFieldFloat32(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addFloat32(value);
    this.slot(slot);
  }

  addFieldFloat64(slot: number, value: number, defaultValue: number): void {
    if (this.elide(value, defaultValue)) return;
    this.addFloat64(value);
    this.slot(slot);
  }

  addFieldScalar(slot: number, kind: ScalarKind, value: ScalarValue, defaultValue: ScalarValue): void {
    if (this.elide(value, defaultValue)) return;
    this.addScalar(kind, value);
    this.slot(slot);
  }

  /**
   * Add a reference to an object. Offset 0 means "no object" and is never written.
   */
  addFieldOffset(slot: number, offset: number): void {
    if (offset === 0) return;
    this.addOffset(offset);
    this.slot(slot);
  }

  /**
   * Claim a struct that was written inline immediately before this call.
   */
  addFieldStruct(slot: number, offset: number): void {
    if (offset !== this.offset()) {
      throw new Error('Builder: structs must be written inline, right before addFieldStruct');
    }
    this.slot(slot);
  }

  /**
   * Close the open table: write its soffset and vtable, reusing an identical vtable when one has
   * already been written. Returns the table's offset.
   */
  endTable(): number {
    if (!this.vtable || !this.nested) throw new Error('Builder: endTable without startTable');
    this.addInt32(0);
    const objectOffset = this.offset();

    let used = this.vtable.length;
    while (used > 0 && this.vtable[used - 1] === 0) used--;
    const entries: number[] = [];
    for (let s = 0; s < used; s++) {
      const at = this.vtable[s] ?? 0;
      entries.push(at !== 0 ? objectOffset - at : 0);
    }
    const vtableBytes = (used + VTABLE_HEADER_FIELDS) * SIZEOF_SHORT;
    const tableBytes = objectOffset - this.objectStart;
    const key = [vtableBytes, tableBytes, ...entries].join(',');

    let vtableOffset = this.vtables.get(key);
    if (vtableOffset === undefined) {
      for (let s = entries.length - 1; s >= 0; s--) this.addInt16(entries[s] ?? 0);
      this.addInt16(tableBytes);
      this.addInt16(vtableBytes);
      vtableOffset = this.offset();
      this.vtables.set(key, vtableOffset);
    }
    // soffset = table position - vtable position; negative when the vtable lies after the table.
    this.bb.writeInt32(this.bb.capacity() - objectOffset, vtableOffset - objectOffset);

    this.vtable = null;
    this.nested = false;
    return objectOffset;
  }

  /**
   * Throw when the table at `table` has no value in the slot at byte offset `vtableOffset`.
   */
  requiredField(table: number, vtableOffset: number, name?: string): void {
    const tablePos = this.bb.capacity() - table;
    const vtablePos = tablePos - this.bb.readInt32(tablePos);
    const present =
      vtableOffset < this.bb.readUint16(vtablePos) &&
      this.bb.readUint16(vtablePos + vtableOffset) !== 0;
    if (!present) {
      throw new TypeError(`Missing required field${name ? ` "${name}"` : ''}`);
    }
  }

  /**
   * Begin a vector of `count` elements of `elementSize` bytes each. Elements are then written
   * last-to-first with `add*`/struct writers.
   */
  startVector(elementSize: number, count: number, alignment: number): void {
    this.assertNotNested();
    this.vectorElements = count;
    this.prep(SIZEOF_INT, elementSize * count);
    this.prep(alignment, elementSize * count);
    this.nested = true;
  }

  endVector(): number {
    if (!this.nested) throw new Error('Builder: endVector without startVector');
    this.nested = false;
    this.prep(SIZEOF_INT, 0);
    this.writeUint32(this.vectorElements);
    return this.offset();
  }

  createString(value: string | Uint8Array): number {
    const utf8 = typeof value === 'string' ? utf8Encoder.encode(value) : value;
    this.addUint8(0);
    this.startVector(1, utf8.length, 1);
    this.space -= utf8.length;
    this.bb.bytes().set(utf8, this.space);
    return this.endVector();
  }

  createScalarVector(kind: ScalarKind, values: readonly ScalarValue[]): number {
    const size = scalarWidth(kind);
    this.startVector(size, values.length, size);
    for (let i = values.length - 1; i >= 0; i--) {
      const v = values[i];
      if (v !== undefined) this.writeScalar(kind, v);
    }
    return this.endVector();
  }

  /**
   * Vector of references; every offset must already be written.
   */
  createOffsetVector(offsets: readonly number[]): number {
    this.startVector(SIZEOF_INT, offsets.length, SIZEOF_INT);
    for (let i = offsets.length - 1; i >= 0; i--) this.addOffset(offsets[i] ?? 0);
    return this.endVector();
  }

  createStructVector<T>(
    elementSize: number,
    alignment: number,
    items: readonly T[],
    write: (builder: Builder, item: T) => unknown,
  ): number {
    this.startVector(elementSize, items.length, alignment);
    for (let i = items.length - 1; i >= 0; i--) {
      const item = items[i];
      if (item !== undefined) write(this, item);
    }
    return this.endVector();
  }

  /**
   * Write the root offset (and optional file identifier and size prefix), completing the buffer.
   */
  finish(rootTable: number, fileIdentifier?: string, sizePrefix = false): void {
    const prefixBytes = sizePrefix ? SIZE_PREFIX_LENGTH : 0;
    if (fileIdentifier !== undefined) {
      if (fileIdentifier.length !== FILE_IDENTIFIER_LENGTH) {
        throw new RangeError(
          `File identifier must be ${FILE_IDENTIFIER_LENGTH} characters: "${fileIdentifier}"`,
        );
      }
      this.prep(this.minalign, SIZEOF_INT + FILE_IDENTIFIER_LENGTH + prefixBytes);
      for (let i = FILE_IDENTIFIER_LENGTH - 1; i >= 0; i--) {
        this.writeUint8(fileIdentifier.charCodeAt(i));
      }
    }
    this.prep(this.minalign, SIZEOF_INT + prefixBytes);
    this.addOffset(rootTable);
    if (sizePrefix) this.addUint32(this.bb.capacity() - this.space);
    this.finished = true;
  }

  /**
   * Copy of the finished buffer (from the current position to the end).
   */
  asUint8Array(): Uint8Array {
    if (!this.finished) throw new Error('Builder: asUint8Array before finish');
    return this.bb.bytes().slice(this.space);
  }
}

function scalarWidth(kind: ScalarKind): number {
  switch (kind) {
    case 'bool':
    case 'int8':
    case 'uint8':
      return 1;
    case 'int16':
    case 'uint16':
      return 2;
    case 'int32':
    case 'uint32':
    case 'float32':
      return 4;
    case 'int64':
    case 'uint64':
    case 'float64':
      return 8;
  }
}
