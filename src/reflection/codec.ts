import type {
  DeclId,
  IrDefault,
  IrSchema,
  IrStruct,
  IrTable,
  IrTableField,
  IrType,
  ScalarKind,
} from '../ir/types.js';
import {
  declOf,
  inlineScalarOf,
  is64BitScalar,
  scalarSize,
  slotToVtableOffset,
  tableWriteOrder,
} from '../ir/types.js';
import type { ScalarValue } from '../runtime/byte-buffer.js';
import { ByteBuffer, SIZEOF_INT } from '../runtime/byte-buffer.js';
import { Builder } from '../runtime/builder.js';

/**
 * Plain-JS form of buffer data, keyed by schema field names.
 *
 * Scalars follow {@link ScalarValue}; enums are their numeric values; absent objects are `null`.
 * A union field holds `{ type: <variant name>, value: <table object> }`.
 */
export type ReflectValue = ScalarValue | string | null | ReflectValue[] | ReflectObject;

export interface ReflectObject {
  [field: string]: ReflectValue | undefined;
}

export interface SerializeRootOptions {
  /** Table to encode; defaults to the schema's `root_type`. */
  table?: DeclId;
  sizePrefix?: boolean;
  forceDefaults?: boolean;
}

export interface DeserializeRootOptions {
  table?: DeclId;
  sizePrefixed?: boolean;
}

function tableOf(ir: IrSchema, id: DeclId): IrTable {
  const decl = declOf(ir, id);
  if (decl.kind !== 'Table') throw new TypeError(`"${decl.fqn}" is not a table`);
  return decl;
}

function structOf(ir: IrSchema, type: IrType): IrStruct | undefined {
  if (type.kind !== 'Named') return undefined;
  const decl = declOf(ir, type.ref);
  return decl.kind === 'Struct' ? decl : undefined;
}

function isObject(value: ReflectValue | undefined): value is ReflectObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: ReflectValue | undefined, where: string): ReflectObject {
  if (!isObject(value)) throw new TypeError(`${where}: expected an object`);
  return value;
}

function expectString(value: ReflectValue | undefined, where: string): string {
  if (typeof value !== 'string') throw new TypeError(`${where}: expected a string`);
  return value;
}

function expectArray(value: ReflectValue | undefined, where: string): ReflectValue[] {
  if (!Array.isArray(value)) throw new TypeError(`${where}: expected an array`);
  return value;
}

/**
 * Coerce a scalar into the JS type its kind decodes to, so default comparison is exact.
 */
function normalizeScalar(kind: ScalarKind, value: ReflectValue | undefined, where: string): ScalarValue {
  if (typeof value !== 'number' && typeof value !== 'bigint' && typeof value !== 'boolean') {
    throw new TypeError(`${where}: expected a ${kind} value`);
  }
  if (kind === 'bool') return typeof value === 'boolean' ? value : Number(value) !== 0;
  if (is64BitScalar(kind)) {
    if (typeof value === 'bigint') return value;
    return BigInt(typeof value === 'boolean' ? Number(value) : value);
  }
  return Number(value);
}

function defaultScalar(kind: ScalarKind, def: IrDefault): ScalarValue {
  switch (def.kind) {
    case 'Int':
      if (kind === 'bool') return def.value !== 0n;
      return is64BitScalar(kind) ? def.value : Number(def.value);
    case 'Float':
      return def.value;
    case 'Bool':
      return def.value;
    case 'None':
      return is64BitScalar(kind) ? 0n : kind === 'bool' ? false : 0;
  }
}

/**
 * Write a struct inline at the current builder position; returns its offset.
 */
export function writeStruct(builder: Builder, ir: IrSchema, struct: IrStruct, value: ReflectObject): number {
  builder.prep(struct.alignment, struct.size);
  for (let i = struct.fields.length - 1; i >= 0; i--) {
    const field = struct.fields[i];
    if (!field) continue;
    builder.pad(field.padding);
    const where = `${struct.fqn}.${field.name}`;
    const nested = structOf(ir, field.type);
    if (nested) {
      writeStruct(builder, ir, nested, expectObject(value[field.name], where));
      continue;
    }
    const kind = inlineScalarOf(ir, field.type);
    if (!kind) throw new TypeError(`${where}: unsupported struct field type`);
    builder.writeScalar(kind, normalizeScalar(kind, value[field.name], where));
  }
  return builder.offset();
}

function encodeVector(
  builder: Builder,
  ir: IrSchema,
  element: IrType,
  items: ReflectValue[],
  where: string,
): number {
  const kind = inlineScalarOf(ir, element);
  if (kind) {
    return builder.createScalarVector(
      kind,
      items.map((v, i) => normalizeScalar(kind, v, `${where}[${i}]`)),
    );
  }
  const struct = structOf(ir, element);
  if (struct) {
    return builder.createStructVector(struct.size, struct.alignment, items, (b, item) =>
      writeStruct(b, ir, struct, expectObject(item, where)),
    );
  }
  if (element.kind === 'String') {
    return builder.createOffsetVector(
      items.map((v, i) => builder.createString(expectString(v, `${where}[${i}]`))),
    );
  }
  if (element.kind === 'Named') {
    const table = tableOf(ir, element.ref);
    return builder.createOffsetVector(
      items.map((v, i) => encodeObject(builder, ir, table.id, expectObject(v, `${where}[${i}]`))),
    );
  }
  throw new TypeError(`${where}: unsupported vector element type`);
}

interface ChildRef {
  offset: number;
  /** Union discriminant, for union fields. */
  tag?: number;
}

function encodeChild(
  builder: Builder,
  ir: IrSchema,
  field: IrTableField,
  value: ReflectValue,
  where: string,
): ChildRef | undefined {
  const type = field.type;
  switch (type.kind) {
    case 'Scalar':
      return undefined;
    case 'String':
      return { offset: builder.createString(expectString(value, where)) };
    case 'Vector':
      return { offset: encodeVector(builder, ir, type.element, expectArray(value, where), where) };
    case 'Named': {
      const decl = declOf(ir, type.ref);
      if (decl.kind === 'Table') return { offset: encodeObject(builder, ir, decl.id, expectObject(value, where)) };
      if (decl.kind !== 'Union') return undefined;
      const union = expectObject(value, where);
      const name = expectString(union.type, `${where}.type`);
      const variant = decl.variants.find((v) => v.name === name);
      if (!variant) throw new TypeError(`${where}: "${name}" is not a variant of ${decl.fqn}`);
      const offset = encodeObject(builder, ir, variant.table, expectObject(union.value, `${where}.value`));
      return { offset, tag: variant.tag };
    }
  }
}

/**
 * Encode a table from its plain-JS form. Out-of-line children are written first, in field
 * order; the table's own fields follow {@link tableWriteOrder}. Returns the table offset.
 */
export function encodeObject(builder: Builder, ir: IrSchema, tableId: DeclId, value: ReflectObject): number {
  const table = tableOf(ir, tableId);
  const children = new Map<IrTableField, ChildRef>();
  for (const field of table.fields) {
    if (field.deprecated) continue;
    const v = value[field.name];
    if (v === undefined || v === null) continue;
    const child = encodeChild(builder, ir, field, v, `${table.fqn}.${field.name}`);
    if (child) children.set(field, child);
  }

  builder.startTable(table.slotCount);
  for (const w of tableWriteOrder(ir, table)) {
    const field = w.field;
    const where = `${table.fqn}.${field.name}`;
    const child = children.get(field);
    if (w.part === 'type') {
      builder.addFieldUint8(w.slot, child?.tag ?? 0, 0);
      continue;
    }
    const kind = inlineScalarOf(ir, field.type);
    if (kind) {
      const def = defaultScalar(kind, field.defaultValue);
      const v = value[field.name];
      const actual = v === undefined || v === null ? def : normalizeScalar(kind, v, where);
      builder.addFieldScalar(w.slot, kind, actual, def);
      continue;
    }
    const struct = structOf(ir, field.type);
    if (struct) {
      const v = value[field.name];
      if (v === undefined || v === null) continue;
      builder.addFieldStruct(w.slot, writeStruct(builder, ir, struct, expectObject(v, where)));
      continue;
    }
    builder.addFieldOffset(w.slot, child?.offset ?? 0);
  }
  const end = builder.endTable();
  for (const field of table.fields) {
    if (field.required) builder.requiredField(end, slotToVtableOffset(field.slot), field.name);
  }
  return end;
}

function decodeStruct(bb: ByteBuffer, ir: IrSchema, struct: IrStruct, pos: number): ReflectObject {
  const out: ReflectObject = {};
  for (const field of struct.fields) {
    const nested = structOf(ir, field.type);
    if (nested) {
      out[field.name] = decodeStruct(bb, ir, nested, pos + field.offset);
      continue;
    }
    const kind = inlineScalarOf(ir, field.type);
    if (kind) out[field.name] = bb.readScalar(kind, pos + field.offset);
  }
  return out;
}

function decodeVector(bb: ByteBuffer, ir: IrSchema, element: IrType, at: number): ReflectValue[] {
  const start = bb.vectorStart(at);
  const length = bb.vectorLength(at);
  const out: ReflectValue[] = [];
  const kind = inlineScalarOf(ir, element);
  const struct = structOf(ir, element);
  for (let i = 0; i < length; i++) {
    if (kind) {
      out.push(bb.readScalar(kind, start + i * scalarSize(kind)));
    } else if (struct) {
      out.push(decodeStruct(bb, ir, struct, start + i * struct.size));
    } else if (element.kind === 'String') {
      out.push(bb.readString(start + i * SIZEOF_INT));
    } else if (element.kind === 'Named') {
      out.push(decodeObject(bb, ir, element.ref, bb.indirect(start + i * SIZEOF_INT)));
    }
  }
  return out;
}

/**
 * Decode the table at absolute position `pos`. Absent scalars read as their defaults and absent
 * objects as `null`; deprecated fields are omitted.
 */
export function decodeObject(bb: ByteBuffer, ir: IrSchema, tableId: DeclId, pos: number): ReflectObject {
  const table = tableOf(ir, tableId);
  const out: ReflectObject = {};
  for (const field of table.fields) {
    if (field.deprecated) continue;
    const o = bb.fieldOffset(pos, slotToVtableOffset(field.slot));
    const type = field.type;
    const kind = inlineScalarOf(ir, type);
    if (kind) {
      out[field.name] = o ? bb.readScalar(kind, pos + o) : defaultScalar(kind, field.defaultValue);
      continue;
    }
    if (!o) {
      out[field.name] = null;
      continue;
    }
    if (type.kind === 'String') {
      out[field.name] = bb.readString(pos + o);
    } else if (type.kind === 'Vector') {
      out[field.name] = decodeVector(bb, ir, type.element, pos + o);
    } else if (type.kind === 'Named') {
      const decl = declOf(ir, type.ref);
      if (decl.kind === 'Struct') {
        out[field.name] = decodeStruct(bb, ir, decl, pos + o);
      } else if (decl.kind === 'Table') {
        out[field.name] = decodeObject(bb, ir, decl.id, bb.indirect(pos + o));
      } else if (decl.kind === 'Union') {
        const t = field.typeSlot === undefined ? 0 : bb.fieldOffset(pos, slotToVtableOffset(field.typeSlot));
        const tag = t ? bb.readUint8(pos + t) : 0;
        const variant = decl.variants.find((v) => v.tag === tag);
        out[field.name] = variant
          ? { type: variant.name, value: decodeObject(bb, ir, variant.table, bb.unionTable(pos + o)) }
          : null;
      }
    }
  }
  return out;
}

function rootTableId(ir: IrSchema, table: DeclId | undefined): DeclId {
  const id = table ?? ir.rootType;
  if (id === undefined) throw new TypeError('Schema declares no root_type; pass options.table');
  return id;
}

/**
 * Encode a complete buffer. The file identifier is written when encoding the schema's root type.
 */
export function serializeRoot(ir: IrSchema, value: ReflectObject, options: SerializeRootOptions = {}): Uint8Array {
  const tableId = rootTableId(ir, options.table);
  const builder = new Builder({ forceDefaults: options.forceDefaults ?? false });
  const root = encodeObject(builder, ir, tableId, value);
  builder.finish(root, tableId === ir.rootType ? ir.fileIdentifier : undefined, options.sizePrefix ?? false);
  return builder.asUint8Array();
}

export function deserializeRoot(
  ir: IrSchema,
  bytes: Uint8Array,
  options: DeserializeRootOptions = {},
): ReflectObject {
  const bb = new ByteBuffer(bytes);
  return decodeObject(bb, ir, rootTableId(ir, options.table), bb.rootTable(options.sizePrefixed ?? false));
}
