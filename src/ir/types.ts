/**
 * Intermediate representation consumed by code generators.
 *
 * Every cross-reference is a {@link DeclId} into {@link IrSchema.decls}; no names are resolved
 * after the IR is built. Instances are deep-frozen by the builder.
 */
import type { ScalarKind, SourceSpan } from '../frontend/ast.js';

export type { ScalarKind } from '../frontend/ast.js';

/**
 * Stable index into the declaration arena.
 */
export type DeclId = number;

export type IntegralScalar = Exclude<ScalarKind, 'bool' | 'float32' | 'float64'>;

export type IrType =
  | { readonly kind: 'Scalar'; readonly scalar: ScalarKind }
  | { readonly kind: 'String' }
  | { readonly kind: 'Vector'; readonly element: IrType }
  | { readonly kind: 'Named'; readonly ref: DeclId };

/**
 * Resolved default for a table field. Non-scalar fields always default to `None` (absent).
 */
export type IrDefault =
  | { readonly kind: 'Int'; readonly value: bigint }
  | { readonly kind: 'Float'; readonly value: number }
  | { readonly kind: 'Bool'; readonly value: boolean }
  | { readonly kind: 'None' };

export interface IrAttribute {
  readonly name: string;
  readonly value?: string | number | bigint | boolean;
}

interface IrDeclBase {
  readonly id: DeclId;
  readonly name: string;
  readonly namespace: readonly string[];
  /** Fully-qualified dotted name. */
  readonly fqn: string;
  readonly doc: readonly string[];
  readonly attributes: readonly IrAttribute[];
  readonly span: SourceSpan;
}

export interface IrEnumValue {
  readonly name: string;
  readonly value: bigint;
  readonly doc: readonly string[];
}

export interface IrEnum extends IrDeclBase {
  readonly kind: 'Enum';
  readonly underlying: IntegralScalar;
  readonly bitFlags: boolean;
  readonly values: readonly IrEnumValue[];
}

export interface IrUnionVariant {
  readonly name: string;
  /** Discriminant value, 1..N in declaration order. */
  readonly tag: number;
  readonly table: DeclId;
  readonly doc: readonly string[];
}

export interface IrUnion extends IrDeclBase {
  readonly kind: 'Union';
  readonly variants: readonly IrUnionVariant[];
  /**
   * Hidden discriminant enum: `NONE = 0` followed by one value per variant.
   */
  readonly discriminant: {
    readonly name: string;
    readonly underlying: 'uint8';
    readonly values: readonly IrEnumValue[];
  };
}

export interface IrStructField {
  readonly name: string;
  readonly type: IrType;
  readonly offset: number;
  readonly size: number;
  /** Bytes of padding after this field, before the next field or the struct end. */
  readonly padding: number;
  readonly doc: readonly string[];
  readonly attributes: readonly IrAttribute[];
}

export interface IrStruct extends IrDeclBase {
  readonly kind: 'Struct';
  readonly fields: readonly IrStructField[];
  readonly size: number;
  readonly alignment: number;
}

export interface IrTableField {
  readonly name: string;
  readonly type: IrType;
  /** vtable slot index of the value (for unions: the value slot). */
  readonly slot: number;
  /** Union fields only: vtable slot index of the hidden discriminant. */
  readonly typeSlot?: number;
  readonly defaultValue: IrDefault;
  readonly required: boolean;
  readonly deprecated: boolean;
  readonly key: boolean;
  readonly doc: readonly string[];
  readonly attributes: readonly IrAttribute[];
}

export interface IrTable extends IrDeclBase {
  readonly kind: 'Table';
  /** Fields in declaration order. */
  readonly fields: readonly IrTableField[];
  /** Total vtable slots (union fields count twice). */
  readonly slotCount: number;
}

export type StreamingMode = 'none' | 'server' | 'client' | 'bidi';

export interface IrRpcMethod {
  readonly name: string;
  readonly request: DeclId;
  readonly response: DeclId;
  readonly streaming: StreamingMode;
  readonly doc: readonly string[];
  readonly attributes: readonly IrAttribute[];
}

export interface IrRpcService extends IrDeclBase {
  readonly kind: 'RpcService';
  readonly methods: readonly IrRpcMethod[];
}

export type IrDecl = IrEnum | IrUnion | IrStruct | IrTable | IrRpcService;

export interface IrNamespace {
  /** Dotted name; `''` for the global namespace. */
  readonly name: string;
  /** Declarations owned by the namespace, in arena order. */
  readonly decls: readonly DeclId[];
}

export interface IrSchema {
  readonly decls: readonly IrDecl[];
  /** Namespaces in order of first appearance. */
  readonly namespaces: readonly IrNamespace[];
  readonly rootType?: DeclId;
  readonly fileIdentifier?: string;
  readonly fileExtension?: string;
  /** User attributes declared with `attribute "name";`. */
  readonly declaredAttributes: readonly string[];
}

/**
 * Byte offset of a vtable slot relative to the vtable start (two header u16s, then one u16 per slot).
 */
export function slotToVtableOffset(slot: number): number {
  return 4 + 2 * slot;
}

export function scalarSize(scalar: ScalarKind): number {
  switch (scalar) {
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

export function isIntegralScalar(scalar: ScalarKind): scalar is IntegralScalar {
  return scalar !== 'bool' && scalar !== 'float32' && scalar !== 'float64';
}

export function is64BitScalar(scalar: ScalarKind): boolean {
  return scalar === 'int64' || scalar === 'uint64';
}

/**
 * Inclusive value range of an integral scalar.
 */
export function integralRange(scalar: IntegralScalar): { min: bigint; max: bigint } {
  const bits = BigInt(scalarSize(scalar) * 8);
  if (scalar.startsWith('u')) return { min: 0n, max: (1n << bits) - 1n };
  return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
}

export function declOf(ir: IrSchema, id: DeclId): IrDecl {
  const decl = ir.decls[id];
  if (!decl) throw new RangeError(`Unknown declaration id ${id}`);
  return decl;
}

/**
 * Scalar storage kind of a type that is stored inline as a number (scalars and enums).
 */
export function inlineScalarOf(ir: IrSchema, type: IrType): ScalarKind | undefined {
  if (type.kind === 'Scalar') return type.scalar;
  if (type.kind !== 'Named') return undefined;
  const decl = declOf(ir, type.ref);
  return decl.kind === 'Enum' ? decl.underlying : undefined;
}

/**
 * One vtable slot written by a table encoder. Union fields produce two writes.
 */
export interface SlotWrite {
  readonly field: IrTableField;
  readonly part: 'value' | 'type';
  readonly slot: number;
  /** Byte width of the inline value (offsets are 4). */
  readonly width: number;
}

/**
 * Order in which encoders add a table's fields: widest first so that alignment padding inside the
 * table stays minimal, declaration order among equal widths. Deprecated fields are never written.
 *
 * Generated encoders and the reflection codec share this order, so both produce identical bytes.
 */
export function tableWriteOrder(ir: IrSchema, table: IrTable): SlotWrite[] {
  const writes: SlotWrite[] = [];
  for (const field of table.fields) {
    if (field.deprecated) continue;
    if (field.typeSlot !== undefined) {
      writes.push({ field, part: 'type', slot: field.typeSlot, width: 1 });
    }
    writes.push({ field, part: 'value', slot: field.slot, width: inlineWidth(ir, field.type) });
  }
  return writes
    .map((w, i) => ({ w, i }))
    .sort((a, b) => b.w.width - a.w.width || a.i - b.i)
    .map(({ w }) => w);
}

function inlineWidth(ir: IrSchema, type: IrType): number {
  const scalar = inlineScalarOf(ir, type);
  if (scalar) return scalarSize(scalar);
  if (type.kind === 'Named') {
    const decl = declOf(ir, type.ref);
    if (decl.kind === 'Struct') return decl.alignment;
  }
  return 4;
}
