export const SIZEOF_SHORT = 2;
export const SIZEOF_INT = 4;
export const FILE_IDENTIFIER_LENGTH = 4;
export const SIZE_PREFIX_LENGTH = 4;

/**
 * Canonical scalar type names. Schema aliases (`int`, `ubyte`, `double`, ...) map onto these.
 */
export type ScalarKind =
  | 'bool'
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64';

/**
 * Value of a scalar as seen by JavaScript: 64-bit integers are `bigint`, `bool` is `boolean`,
 * everything else is `number`.
 */
export type ScalarValue = number | bigint | boolean;

const utf8Decoder = new TextDecoder('utf-8', { fatal: false });

/**
 * Little-endian view over a finished (or growing) buffer.
 *
 * All offsets are absolute byte positions in {@link bytes}. Reads never copy except for strings.
 */
export class ByteBuffer {
  private view: DataView;

  constructor(private data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  static allocate(size: number): ByteBuffer {
    return new ByteBuffer(new Uint8Array(size));
  }

  bytes(): Uint8Array {
    return this.data;
  }

  capacity(): number {
    return this.data.length;
  }

  readInt8(offset: number): number {
    return this.view.getInt8(offset);
  }

  readUint8(offset: number): number {
    return this.view.getUint8(offset);
  }

  readBool(offset: number): boolean {
    return this.view.getUint8(offset) !== 0;
  }

  readInt16(offset: number): number {
    return this.view.getInt16(offset, true);
  }

  readUint16(offset: number): number {
    return this.view.getUint16(offset, true);
  }

  readInt32(offset: number): number {
    return this.view.getInt32(offset, true);
  }

  readUint32(offset: number): number {
    return this.view.getUint32(offset, true);
  }

  readInt64(offset: number): bigint {
    return this.view.getBigInt64(offset, true);
  }

  readUint64(offset: number): bigint {
    return this.view.getBigUint64(offset, true);
  }

  readFloat32(offset: number): number {
    return this.view.getFloat32(offset, true);
  }

  readFloat64(offset: number): number {
    return this.view.getFloat64(offset, true);
  }

  writeInt8(offset: number, value: number): void {
    this.view.setInt8(offset, value);
  }

  writeUint8(offset: number, value: number): void {
    this.view.setUint8(offset, value);
  }

  writeInt16(offset: number, value: number): void {
    this.view.setInt16(offset, value, true);
  }

  writeUint16(offset: number, value: number): void {
    this.view.setUint16(offset, value, true);
  }

  writeInt32(offset: number, value: number): void {
    this.view.setInt32(offset, value, true);
  }

  writeUint32(offset: number, value: number): void {
    this.view.setUint32(offset, value, true);
  }

  writeInt64(offset: number, value: bigint): void {
    this.view.setBigInt64(offset, value, true);
  }

  writeUint64(offset: number, value: bigint): void {
    this.view.setBigUint64(offset, value, true);
  }

  writeFloat32(offset: number, value: number): void {
    this.view.setFloat32(offset, value, true);
  }

  writeFloat64(offset: number, value: number): void {
    this.view.setFloat64(offset, value, true);
  }

  readScalar(kind: ScalarKind, offset: number): ScalarValue {
    switch (kind) {
      case 'bool':
        return this.readBool(offset);
      case 'int8':
        return this.readInt8(offset);
      case 'uint8':
        return this.readUint8(offset);
      case 'int16':
        return this.readInt16(offset);
      case 'uint16':
        return this.readUint16(offset);
      case 'int32':
        return this.readInt32(offset);
      case 'uint32':
        return this.readUint32(offset);
      case 'int64':
        return this.readInt64(offset);
      case 'uint64':
        return this.readUint64(offset);
      case 'float32':
        return this.readFloat32(offset);
      case 'float64':
        return this.readFloat64(offset);
    }
  }

  /**
   * Position of the root table: the uoffset at the start of the buffer (after the size prefix,
   * when there is one).
   */
  rootTable(sizePrefixed = false): number {
    const base = sizePrefixed ? SIZE_PREFIX_LENGTH : 0;
    return base + this.readUint32(base);
  }

  /**
   * Byte offset of a field within the table at `tablePos`, looked up through its vtable, or 0
   * when the field is absent (not written, or beyond the end of an older vtable).
   */
  fieldOffset(tablePos: number, vtableOffset: number): number {
    const vtable = tablePos - this.readInt32(tablePos);
    return vtableOffset < this.readUint16(vtable) ? this.readUint16(vtable + vtableOffset) : 0;
  }

  /**
   * Follow the uoffset stored at `offset`.
   */
  indirect(offset: number): number {
    return offset + this.readUint32(offset);
  }

  /**
   * Decode the string referenced by the uoffset stored at `offset`.
   */
  readString(offset: number): string {
    const start = this.indirect(offset);
    const length = this.readUint32(start);
    const from = start + SIZEOF_INT;
    return utf8Decoder.decode(this.data.subarray(from, from + length));
  }

  /**
   * Position of the first element of the vector referenced by the uoffset stored at `offset`.
   */
  vectorStart(offset: number): number {
    return this.indirect(offset) + SIZEOF_INT;
  }

  vectorLength(offset: number): number {
    return this.readUint32(this.indirect(offset));
  }

  /**
   * Position of the table referenced by a union value slot.
   */
  unionTable(offset: number): number {
    return this.indirect(offset);
  }

  /**
   * The 4-byte file identifier following the root offset, if the buffer is long enough.
   */
  identifier(sizePrefixed = false): string {
    const start = (sizePrefixed ? SIZE_PREFIX_LENGTH : 0) + SIZEOF_INT;
    let out = '';
    for (let i = 0; i < FILE_IDENTIFIER_LENGTH && start + i < this.data.length; i++) {
      out += String.fromCharCode(this.readUint8(start + i));
    }
    return out;
  }

  hasIdentifier(ident: string, sizePrefixed = false): boolean {
    if (ident.length !== FILE_IDENTIFIER_LENGTH) {
      throw new RangeError(`File identifier must be ${FILE_IDENTIFIER_LENGTH} characters: "${ident}"`);
    }
    return this.identifier(sizePrefixed) === ident;
  }
}
