import type { Diagnostic, SemanticErrorId } from '../diagnostics/types.js';
import { DiagnosticIds, hasErrors } from '../diagnostics/types.js';
import type {
  AttributeNode,
  EnumDeclNode,
  FieldNode,
  LiteralNode,
  NamespacePath,
  RpcServiceDeclNode,
  SchemaNode,
  SourceSpan,
  StructDeclNode,
  TableDeclNode,
  TypeExprNode,
  UnionDeclNode,
} from '../frontend/ast.js';
import type {
  DeclId,
  IntegralScalar,
  IrAttribute,
  IrDecl,
  IrDefault,
  IrEnum,
  IrEnumValue,
  IrNamespace,
  IrRpcMethod,
  IrSchema,
  IrStructField,
  IrTableField,
  IrType,
  IrUnionVariant,
  StreamingMode,
} from '../ir/types.js';
import { tableFieldMembers } from '../ir/names.js';
import { integralRange, isIntegralScalar, scalarSize } from '../ir/types.js';
import type { StructFieldShape, StructShape } from './layout.js';
import { layoutStructs, scalarStorage } from './layout.js';
import type { SymbolTable } from './symbols.js';
import { at, detectStructCycles, qualifiedName, resolveOrReport, sortSchemas } from './symbols.js';

/**
 * Attributes with built-in meaning. Anything else must be declared with `attribute "name";`.
 */
export const BUILTIN_ATTRIBUTES: ReadonlySet<string> = new Set([
  'id',
  'deprecated',
  'required',
  'key',
  'streaming',
  'force_align',
  'bit_flags',
  'original_order',
  'idempotent',
]);

const STREAMING_MODES: ReadonlySet<string> = new Set<StreamingMode>([
  'none',
  'server',
  'client',
  'bidi',
]);

const MAX_FORCE_ALIGN = 16;
const MAX_UNION_VARIANTS = 255;

export interface BuildIrOptions {
  /**
   * Path of the entry schema. `root_type`, `file_identifier` and `file_extension` are taken from
   * this file only; directives in included files are still validated. When omitted, every file
   * contributes and the last directive in merge order wins.
   */
  entryFile?: string;
}

function report(
  diagnostics: Diagnostic[],
  id: SemanticErrorId,
  message: string,
  where: SourceSpan,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: where.file,
    line: where.start.line,
    column: where.start.column,
  });
}

function attributeValue(lit: LiteralNode | undefined): IrAttribute['value'] {
  if (!lit) return undefined;
  switch (lit.kind) {
    case 'IntLiteral':
    case 'FloatLiteral':
    case 'BoolLiteral':
    case 'StringLiteral':
      return lit.value;
    case 'IdentLiteral':
      return lit.name;
  }
}

function toIrAttributes(attrs: readonly AttributeNode[]): IrAttribute[] {
  return attrs.map((a) => {
    const value = attributeValue(a.value);
    return value === undefined ? { name: a.name } : { name: a.name, value };
  });
}

function findAttribute(attrs: readonly AttributeNode[], name: string): AttributeNode | undefined {
  return attrs.find((a) => a.name === name);
}

function describeLiteral(lit: LiteralNode): string {
  switch (lit.kind) {
    case 'IntLiteral':
      return lit.value.toString();
    case 'FloatLiteral':
      return String(lit.value);
    case 'BoolLiteral':
      return String(lit.value);
    case 'StringLiteral':
      return JSON.stringify(lit.value);
    case 'IdentLiteral':
      return lit.name;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate the merged schemas and build the immutable IR.
 *
 * Every semantic error in the unit is collected before giving up. Returns `undefined` when
 * `diagnostics` holds any error afterwards (including errors from earlier phases).
 */
export function buildIr(
  schemas: readonly SchemaNode[],
  symbols: SymbolTable,
  diagnostics: Diagnostic[],
  options: BuildIrOptions = {},
): IrSchema | undefined {
  const sorted = sortSchemas(schemas);
  const cyclic = detectStructCycles(symbols, diagnostics);

  const declaredAttributes: string[] = [];
  for (const schema of sorted) {
    for (const item of schema.items) {
      if (item.kind === 'AttributeDecl' && !declaredAttributes.includes(item.name)) {
        declaredAttributes.push(item.name);
      }
    }
  }
  const knownAttribute = (name: string): boolean =>
    BUILTIN_ATTRIBUTES.has(name) || declaredAttributes.includes(name);

  const checkAttributes = (attrs: readonly AttributeNode[]): void => {
    for (const a of attrs) {
      if (knownAttribute(a.name)) continue;
      report(
        diagnostics,
        DiagnosticIds.UnknownAttribute,
        `Unknown attribute "${a.name}"; declare it with \`attribute "${a.name}";\` first.`,
        a.span,
      );
    }
  };

  const decls = Array.from({ length: symbols.entries.length }, (): IrDecl | undefined => undefined);
  const enums = new Map<DeclId, IrEnum>();
  const kindOf = (id: DeclId): string | undefined => symbols.entries[id]?.decl.kind;

  const resolveNamed = (name: string, ns: NamespacePath, where: SourceSpan): DeclId | undefined =>
    resolveOrReport(symbols, name, ns, where, diagnostics);

  const resolveType = (te: TypeExprNode, ns: NamespacePath): IrType | undefined => {
    switch (te.kind) {
      case 'ScalarType':
        return { kind: 'Scalar', scalar: te.scalar };
      case 'StringType':
        return { kind: 'String' };
      case 'NamedType': {
        const ref = resolveNamed(te.name, ns, te.span);
        return ref === undefined ? undefined : { kind: 'Named', ref };
      }
      case 'VectorType': {
        if (te.element.kind === 'VectorType') {
          report(
            diagnostics,
            DiagnosticIds.InvalidVectorElement,
            'Nested vectors are not supported; wrap the inner vector in a table.',
            te.span,
          );
          return undefined;
        }
        const element = resolveType(te.element, ns);
        if (!element) return undefined;
        if (element.kind === 'Named' && kindOf(element.ref) === 'UnionDecl') {
          report(
            diagnostics,
            DiagnosticIds.InvalidVectorElement,
            'Vectors of unions are not supported.',
            te.span,
          );
          return undefined;
        }
        if (element.kind === 'Named' && kindOf(element.ref) === 'RpcServiceDecl') {
          report(
            diagnostics,
            DiagnosticIds.InvalidVectorElement,
            'Vector elements cannot be RPC services.',
            te.span,
          );
          return undefined;
        }
        return { kind: 'Vector', element };
      }
    }
  };

  // Pass 1: enums. Struct layout and table defaults depend on them.
  for (const entry of symbols.entries) {
    if (entry.decl.kind !== 'EnumDecl') continue;
    const built = buildEnum(entry.decl, entry.id, entry.fqn);
    if (built) {
      enums.set(entry.id, built);
      decls[entry.id] = built;
    }
  }

  function buildEnum(decl: EnumDeclNode, id: DeclId, fqn: string): IrEnum | undefined {
    checkAttributes(decl.attributes);
    if (decl.underlying.kind !== 'ScalarType' || !isIntegralScalar(decl.underlying.scalar)) {
      report(
        diagnostics,
        DiagnosticIds.InvalidEnum,
        `Enum "${fqn}" must have an integral underlying type.`,
        decl.underlying.span,
      );
      return undefined;
    }
    const underlying: IntegralScalar = decl.underlying.scalar;
    if (decl.values.length === 0) {
      report(diagnostics, DiagnosticIds.InvalidEnum, `Enum "${fqn}" has no values.`, decl.span);
      return undefined;
    }
    const bitFlags = findAttribute(decl.attributes, 'bit_flags') !== undefined;
    const range = integralRange(underlying);
    const bits = BigInt(scalarSize(underlying) * 8);
    const values: IrEnumValue[] = [];
    const seen = new Set<string>();
    let ok = true;
    let prev: bigint | undefined;
    for (const v of decl.values) {
      if (seen.has(v.name)) {
        report(
          diagnostics,
          DiagnosticIds.InvalidEnum,
          `Duplicate value "${v.name}" in enum "${fqn}".`,
          v.span,
        );
        ok = false;
        continue;
      }
      seen.add(v.name);
      const raw = v.value ?? (prev === undefined ? 0n : prev + 1n);
      if (prev !== undefined && raw <= prev) {
        report(
          diagnostics,
          DiagnosticIds.InvalidEnum,
          `Enum values must be ascending: "${v.name}" = ${raw.toString()} follows ${prev.toString()}.`,
          v.span,
        );
        ok = false;
      }
      prev = raw;
      let value = raw;
      if (bitFlags) {
        if (raw < 0n || raw >= bits) {
          report(
            diagnostics,
            DiagnosticIds.InvalidEnum,
            `Bit position ${raw.toString()} of "${v.name}" does not fit in ${underlying}.`,
            v.span,
          );
          ok = false;
          continue;
        }
        value = 1n << raw;
      }
      if (value < range.min || value > range.max) {
        report(
          diagnostics,
          DiagnosticIds.InvalidEnum,
          `Value ${value.toString()} of "${v.name}" is out of range for ${underlying}.`,
          v.span,
        );
        ok = false;
        continue;
      }
      values.push({ name: v.name, value, doc: v.doc });
    }
    if (!ok) return undefined;
    return {
      kind: 'Enum',
      id,
      name: decl.name,
      namespace: decl.namespace,
      fqn,
      doc: decl.doc,
      attributes: toIrAttributes(decl.attributes),
      span: decl.span,
      underlying,
      bitFlags,
      values,
    };
  }

  // Pass 2: unions.
  for (const entry of symbols.entries) {
    if (entry.decl.kind === 'UnionDecl') buildUnion(entry.decl, entry.id, entry.fqn);
  }

  function buildUnion(decl: UnionDeclNode, id: DeclId, fqn: string): void {
    checkAttributes(decl.attributes);
    const discriminantName = `${decl.name}Type`;
    const clash = symbols.byName.get(qualifiedName(decl.namespace, discriminantName));
    if (clash !== undefined) {
      const other = symbols.entries[clash];
      report(
        diagnostics,
        DiagnosticIds.DuplicateDeclaration,
        `Union "${fqn}" needs the name "${other?.fqn ?? discriminantName}" for its type enum, but it is already declared${other ? ` at ${at(other.decl.span)}` : ''}.`,
        decl.span,
      );
    }
    if (decl.variants.length === 0) {
      report(diagnostics, DiagnosticIds.InvalidUnionVariant, `Union "${fqn}" has no variants.`, decl.span);
      return;
    }
    if (decl.variants.length > MAX_UNION_VARIANTS) {
      report(
        diagnostics,
        DiagnosticIds.InvalidUnionVariant,
        `Union "${fqn}" has more than ${MAX_UNION_VARIANTS} variants.`,
        decl.span,
      );
      return;
    }
    const variants: IrUnionVariant[] = [];
    const seenNames = new Set<string>(['NONE']);
    const seenTables = new Set<DeclId>();
    for (const v of decl.variants) {
      const table = resolveNamed(v.typeName, decl.namespace, v.span);
      if (table === undefined) continue;
      const name = v.typeName.replace(/\./g, '_');
      if (kindOf(table) !== 'TableDecl') {
        report(
          diagnostics,
          DiagnosticIds.InvalidUnionVariant,
          `Union "${fqn}" variant "${v.typeName}" must be a table.`,
          v.span,
        );
        continue;
      }
      if (seenNames.has(name) || seenTables.has(table)) {
        report(
          diagnostics,
          DiagnosticIds.InvalidUnionVariant,
          `Union "${fqn}" lists "${v.typeName}" more than once.`,
          v.span,
        );
        continue;
      }
      seenNames.add(name);
      seenTables.add(table);
      variants.push({ name, tag: variants.length + 1, table, doc: v.doc });
    }
    decls[id] = {
      kind: 'Union',
      id,
      name: decl.name,
      namespace: decl.namespace,
      fqn,
      doc: decl.doc,
      attributes: toIrAttributes(decl.attributes),
      span: decl.span,
      variants,
      discriminant: {
        name: discriminantName,
        underlying: 'uint8',
        values: [
          { name: 'NONE', value: 0n, doc: [] },
          ...variants.map((v) => ({ name: v.name, value: BigInt(v.tag), doc: v.doc })),
        ],
      },
    };
  }

  // Pass 3: structs. Shapes first, then layout over the whole struct graph.
  const structFieldTypes = new Map<DeclId, Array<IrType | undefined>>();
  const shapes = new Map<DeclId, StructShape>();
  for (const entry of symbols.entries) {
    if (entry.decl.kind !== 'StructDecl') continue;
    const decl = entry.decl;
    const types: Array<IrType | undefined> = [];
    const fields: StructFieldShape[] = [];
    checkAttributes(decl.attributes);
    checkDuplicateFields(decl, entry.fqn);
    if (decl.fields.length === 0) {
      report(
        diagnostics,
        DiagnosticIds.InvalidStructField,
        `Struct "${entry.fqn}" must have at least one field.`,
        decl.span,
      );
    }
    for (const f of decl.fields) {
      const type = structFieldType(decl, entry.fqn, f);
      types.push(type);
      fields.push(shapeOf(type));
    }
    structFieldTypes.set(entry.id, types);
    const forceAlign = forceAlignOf(decl, entry.fqn);
    shapes.set(entry.id, forceAlign === undefined ? { fields } : { fields, forceAlign });
  }

  function shapeOf(type: IrType | undefined): StructFieldShape {
    if (!type) return { kind: 'invalid' };
    if (type.kind === 'Scalar') return { kind: 'inline', storage: scalarStorage(type.scalar) };
    if (type.kind !== 'Named') return { kind: 'invalid' };
    const e = enums.get(type.ref);
    if (e) return { kind: 'inline', storage: scalarStorage(e.underlying) };
    return kindOf(type.ref) === 'StructDecl' ? { kind: 'struct', ref: type.ref } : { kind: 'invalid' };
  }

  function structFieldType(decl: StructDeclNode, fqn: string, f: FieldNode): IrType | undefined {
    checkAttributes(f.attributes);
    if (f.defaultValue) {
      report(
        diagnostics,
        DiagnosticIds.InvalidStructField,
        `Struct field "${fqn}.${f.name}" cannot have a default value.`,
        f.defaultValue.span,
      );
    }
    const required = findAttribute(f.attributes, 'required');
    if (required) {
      report(
        diagnostics,
        DiagnosticIds.InvalidRequired,
        `Struct field "${fqn}.${f.name}" is always present and cannot be marked required.`,
        required.span,
      );
    }
    const type = resolveType(f.typeExpr, decl.namespace);
    if (!type) return undefined;
    const inlineOk =
      type.kind === 'Scalar' ||
      (type.kind === 'Named' &&
        (kindOf(type.ref) === 'StructDecl' || kindOf(type.ref) === 'EnumDecl'));
    if (!inlineOk) {
      report(
        diagnostics,
        DiagnosticIds.InvalidStructField,
        `Struct field "${fqn}.${f.name}" must be a scalar, enum or struct.`,
        f.typeExpr.span,
      );
      return undefined;
    }
    return type;
  }

  function forceAlignOf(decl: StructDeclNode, fqn: string): number | undefined {
    const attr = findAttribute(decl.attributes, 'force_align');
    if (!attr) return undefined;
    const v = attr.value;
    if (v?.kind === 'IntLiteral') {
      const n = Number(v.value);
      if (n >= 1 && n <= MAX_FORCE_ALIGN && (n & (n - 1)) === 0) return n;
    }
    report(
      diagnostics,
      DiagnosticIds.UnknownAttributeValue,
      `force_align on "${fqn}" must be a power of two between 1 and ${MAX_FORCE_ALIGN}.`,
      attr.span,
    );
    return undefined;
  }

  function checkDuplicateFields(decl: StructDeclNode | TableDeclNode, fqn: string): void {
    const seen = new Set<string>();
    for (const f of decl.fields) {
      if (seen.has(f.name)) {
        report(
          diagnostics,
          DiagnosticIds.DuplicateField,
          `Field "${f.name}" is declared more than once in "${fqn}".`,
          f.span,
        );
      }
      seen.add(f.name);
    }
  }

  const layouts = layoutStructs(shapes);
  for (const entry of symbols.entries) {
    if (entry.decl.kind !== 'StructDecl') continue;
    const decl = entry.decl;
    const layout = layouts.get(entry.id);
    const types = structFieldTypes.get(entry.id) ?? [];
    if (!layout || cyclic.has(entry.id)) continue;
    const fields: IrStructField[] = [];
    decl.fields.forEach((f, i) => {
      const type = types[i];
      const place = layout.fields[i];
      if (!type || !place) return;
      fields.push({
        name: f.name,
        type,
        offset: place.offset,
        size: place.size,
        padding: place.padding,
        doc: f.doc,
        attributes: toIrAttributes(f.attributes),
      });
    });
    decls[entry.id] = {
      kind: 'Struct',
      id: entry.id,
      name: decl.name,
      namespace: decl.namespace,
      fqn: entry.fqn,
      doc: decl.doc,
      attributes: toIrAttributes(decl.attributes),
      span: decl.span,
      fields,
      size: layout.size,
      alignment: layout.alignment,
    };
  }

  // Pass 4: tables.
  for (const entry of symbols.entries) {
    if (entry.decl.kind === 'TableDecl') buildTable(entry.decl, entry.id, entry.fqn);
  }

  function defaultFor(type: IrType, f: FieldNode, fqn: string): IrDefault | undefined {
    const lit = f.defaultValue;
    const invalid = (why: string): undefined => {
      report(
        diagnostics,
        DiagnosticIds.InvalidDefaultForType,
        `Invalid default for "${fqn}.${f.name}": ${why}.`,
        lit?.span ?? f.span,
      );
      return undefined;
    };

    if (type.kind === 'Scalar') {
      const scalar = type.scalar;
      if (scalar === 'bool') {
        if (!lit) return { kind: 'Bool', value: false };
        if (lit.kind === 'BoolLiteral') return { kind: 'Bool', value: lit.value };
        if (lit.kind === 'IntLiteral' && (lit.value === 0n || lit.value === 1n)) {
          return { kind: 'Bool', value: lit.value === 1n };
        }
        return invalid(`${describeLiteral(lit)} is not a bool`);
      }
      if (scalar === 'float32' || scalar === 'float64') {
        if (!lit) return { kind: 'Float', value: 0 };
        if (lit.kind === 'FloatLiteral') return { kind: 'Float', value: lit.value };
        if (lit.kind === 'IntLiteral') return { kind: 'Float', value: Number(lit.value) };
        return invalid(`${describeLiteral(lit)} is not a number`);
      }
      if (!lit) return { kind: 'Int', value: 0n };
      if (lit.kind !== 'IntLiteral') return invalid(`${describeLiteral(lit)} is not an integer`);
      const range = integralRange(scalar);
      if (lit.value < range.min || lit.value > range.max) {
        return invalid(`${lit.value.toString()} is out of range for ${scalar}`);
      }
      return { kind: 'Int', value: lit.value };
    }

    if (type.kind === 'Named') {
      const e = enums.get(type.ref);
      if (e) {
        if (!lit) {
          if (e.bitFlags || e.values.some((v) => v.value === 0n)) return { kind: 'Int', value: 0n };
          return invalid(`enum "${e.fqn}" has no value 0, so an explicit default is required`);
        }
        if (lit.kind === 'IdentLiteral') {
          const match = e.values.find((v) => v.name === lit.name);
          if (match) return { kind: 'Int', value: match.value };
          return invalid(`"${lit.name}" is not a value of enum "${e.fqn}"`);
        }
        if (lit.kind === 'IntLiteral') {
          if (e.bitFlags || e.values.some((v) => v.value === lit.value)) {
            const range = integralRange(e.underlying);
            if (lit.value >= range.min && lit.value <= range.max) {
              return { kind: 'Int', value: lit.value };
            }
          }
          return invalid(`${lit.value.toString()} is not a value of enum "${e.fqn}"`);
        }
        return invalid(`${describeLiteral(lit)} is not a value of enum "${e.fqn}"`);
      }
      if (kindOf(type.ref) === 'EnumDecl') return undefined;
    }

    if (lit) return invalid('only scalar and enum fields can have defaults');
    return { kind: 'None' };
  }

  function buildTable(decl: TableDeclNode, id: DeclId, fqn: string): void {
    checkAttributes(decl.attributes);
    checkDuplicateFields(decl, fqn);

    const explicitIds = decl.fields.map((f) => findAttribute(f.attributes, 'id'));
    const withId = explicitIds.filter((a) => a !== undefined).length;
    const useExplicit = withId > 0;
    if (useExplicit && withId !== decl.fields.length) {
      report(
        diagnostics,
        DiagnosticIds.DuplicateOrGappedFieldId,
        `Either all fields of "${fqn}" must have an id attribute or none.`,
        decl.span,
      );
    }

    const fields: IrTableField[] = [];
    const slotOwner = new Map<number, string>();
    let nextSlot = 0;
    let keyCount = 0;

    decl.fields.forEach((f, i) => {
      checkAttributes(f.attributes);
      const type = resolveType(f.typeExpr, decl.namespace);
      if (type?.kind === 'Named' && kindOf(type.ref) === 'RpcServiceDecl') {
        report(
          diagnostics,
          DiagnosticIds.InvalidStructField,
          `Field "${fqn}.${f.name}" cannot have an RPC service type.`,
          f.typeExpr.span,
        );
        return;
      }
      const isUnion = type?.kind === 'Named' && kindOf(type.ref) === 'UnionDecl';

      let slot: number;
      let typeSlot: number | undefined;
      const idAttr = explicitIds[i];
      if (useExplicit) {
        if (!idAttr) return;
        const v = idAttr.value;
        if (v?.kind !== 'IntLiteral' || v.value < 0n || v.value > 0xfffen) {
          report(
            diagnostics,
            DiagnosticIds.UnknownAttributeValue,
            `id of "${fqn}.${f.name}" must be a non-negative integer.`,
            idAttr.span,
          );
          return;
        }
        slot = Number(v.value);
        if (isUnion) {
          if (slot === 0) {
            report(
              diagnostics,
              DiagnosticIds.DuplicateOrGappedFieldId,
              `Union field "${fqn}.${f.name}" needs id >= 1; id - 1 holds its type.`,
              idAttr.span,
            );
            return;
          }
          typeSlot = slot - 1;
        }
      } else if (isUnion) {
        typeSlot = nextSlot++;
        slot = nextSlot++;
      } else {
        slot = nextSlot++;
      }

      for (const s of typeSlot === undefined ? [slot] : [typeSlot, slot]) {
        const owner = slotOwner.get(s);
        if (owner !== undefined) {
          report(
            diagnostics,
            DiagnosticIds.DuplicateOrGappedFieldId,
            `Field "${fqn}.${f.name}" reuses id ${s} already taken by "${owner}".`,
            (idAttr ?? f).span,
          );
        } else {
          slotOwner.set(s, f.name);
        }
      }

      if (!type) return;
      const defaultValue = defaultFor(type, f, fqn);
      const requiredAttr = findAttribute(f.attributes, 'required');
      const scalarLike =
        type.kind === 'Scalar' || (type.kind === 'Named' && kindOf(type.ref) === 'EnumDecl');
      if (requiredAttr && scalarLike) {
        report(
          diagnostics,
          DiagnosticIds.InvalidRequired,
          `Scalar field "${fqn}.${f.name}" cannot be required; it always reads as its default.`,
          requiredAttr.span,
        );
      }
      const key = findAttribute(f.attributes, 'key') !== undefined;
      if (key) keyCount++;
      if (!defaultValue) return;

      const field: IrTableField = {
        name: f.name,
        type,
        slot,
        defaultValue,
        required: requiredAttr !== undefined,
        deprecated: findAttribute(f.attributes, 'deprecated') !== undefined,
        key,
        doc: f.doc,
        attributes: toIrAttributes(f.attributes),
      };
      fields.push(typeSlot === undefined ? field : { ...field, typeSlot });
    });

    checkMemberNames(decl, fqn, fields);

    if (keyCount > 1) {
      report(
        diagnostics,
        DiagnosticIds.DuplicateField,
        `Table "${fqn}" has more than one key field.`,
        decl.span,
      );
    }

    const slotCount = slotOwner.size === 0 ? 0 : Math.max(...slotOwner.keys()) + 1;
    if (useExplicit && slotOwner.size !== slotCount) {
      const missing: number[] = [];
      for (let s = 0; s < slotCount; s++) if (!slotOwner.has(s)) missing.push(s);
      report(
        diagnostics,
        DiagnosticIds.DuplicateOrGappedFieldId,
        `Field ids of "${fqn}" must be contiguous from 0; missing ${missing.join(', ')}.`,
        decl.span,
      );
    }

    decls[id] = {
      kind: 'Table',
      id,
      name: decl.name,
      namespace: decl.namespace,
      fqn,
      doc: decl.doc,
      attributes: toIrAttributes(decl.attributes),
      span: decl.span,
      fields,
      slotCount,
    };
  }

  /**
   * Fields whose generated accessors would share a name: `a_b` and `aB`, or a vector `x` next to
   * a field `x_length`.
   */
  function checkMemberNames(decl: TableDeclNode, fqn: string, fields: readonly IrTableField[]): void {
    const owners = new Map<string, string>();
    for (const f of fields) {
      if (f.deprecated) continue;
      for (const member of tableFieldMembers(f)) {
        const owner = owners.get(member);
        if (owner === undefined) {
          owners.set(member, f.name);
        } else if (owner !== f.name) {
          const node = decl.fields.find((n) => n.name === f.name);
          report(
            diagnostics,
            DiagnosticIds.DuplicateField,
            `Fields "${fqn}.${owner}" and "${fqn}.${f.name}" both generate the accessor "${member}()".`,
            (node ?? decl).span,
          );
        }
      }
    }
  }

  // Pass 5: services.
  for (const entry of symbols.entries) {
    if (entry.decl.kind === 'RpcServiceDecl') buildService(entry.decl, entry.id, entry.fqn);
  }

  function rpcTable(name: string, decl: RpcServiceDeclNode, where: SourceSpan, role: string): DeclId | undefined {
    const ref = resolveNamed(name, decl.namespace, where);
    if (ref === undefined) return undefined;
    if (kindOf(ref) !== 'TableDecl') {
      report(
        diagnostics,
        DiagnosticIds.NonTableRpcType,
        `RPC ${role} type "${name}" must be a table.`,
        where,
      );
      return undefined;
    }
    return ref;
  }

  function buildService(decl: RpcServiceDeclNode, id: DeclId, fqn: string): void {
    checkAttributes(decl.attributes);
    const methods: IrRpcMethod[] = [];
    const seen = new Set<string>();
    for (const m of decl.methods) {
      checkAttributes(m.attributes);
      if (seen.has(m.name)) {
        report(
          diagnostics,
          DiagnosticIds.DuplicateField,
          `Method "${m.name}" is declared more than once in "${fqn}".`,
          m.span,
        );
      }
      seen.add(m.name);
      const request = rpcTable(m.requestType, decl, m.span, 'request');
      const response = rpcTable(m.responseType, decl, m.span, 'response');

      let streaming: StreamingMode = 'none';
      const attr = findAttribute(m.attributes, 'streaming');
      if (attr) {
        const v = attr.value;
        const text = v?.kind === 'StringLiteral' ? v.value : v?.kind === 'IdentLiteral' ? v.name : undefined;
        if (text !== undefined && STREAMING_MODES.has(text)) {
          streaming = parseStreaming(text);
        } else {
          report(
            diagnostics,
            DiagnosticIds.UnknownAttributeValue,
            `Unknown streaming mode ${v ? describeLiteral(v) : '(none)'} on "${fqn}.${m.name}"; expected "none", "server", "client" or "bidi".`,
            attr.span,
          );
          continue;
        }
      }
      if (request === undefined || response === undefined) continue;
      methods.push({
        name: m.name,
        request,
        response,
        streaming,
        doc: m.doc,
        attributes: toIrAttributes(m.attributes),
      });
    }
    decls[id] = {
      kind: 'RpcService',
      id,
      name: decl.name,
      namespace: decl.namespace,
      fqn,
      doc: decl.doc,
      attributes: toIrAttributes(decl.attributes),
      span: decl.span,
      methods,
    };
  }

  // File-level directives.
  let rootType: DeclId | undefined;
  let fileIdentifier: string | undefined;
  let fileExtension: string | undefined;
  for (const schema of sorted) {
    const isEntry = options.entryFile === undefined || schema.path === options.entryFile;
    for (const item of schema.items) {
      if (item.kind === 'RootType') {
        const ref = resolveNamed(item.typeName, item.namespace, item.span);
        if (ref === undefined) continue;
        if (kindOf(ref) !== 'TableDecl') {
          report(
            diagnostics,
            DiagnosticIds.InvalidRootType,
            `root_type "${item.typeName}" must be a table.`,
            item.span,
          );
          continue;
        }
        if (isEntry) rootType = ref;
      } else if (item.kind === 'FileIdentifier') {
        const ascii = [...item.value].every((ch) => ch.charCodeAt(0) < 0x80);
        if (item.value.length !== 4 || !ascii) {
          report(
            diagnostics,
            DiagnosticIds.InvalidFileIdentifier,
            `file_identifier must be exactly 4 ASCII characters, got ${JSON.stringify(item.value)}.`,
            item.span,
          );
          continue;
        }
        if (isEntry) fileIdentifier = item.value;
      } else if (item.kind === 'FileExtension') {
        if (isEntry) fileExtension = item.value;
      }
    }
  }

  if (hasErrors(diagnostics)) return undefined;

  const complete: IrDecl[] = [];
  for (const d of decls) {
    if (!d) {
      // Every declaration either builds or reports; reaching this is a checker bug.
      throw new Error('IR builder produced no declaration without reporting an error');
    }
    complete.push(d);
  }

  const namespaces: IrNamespace[] = [];
  const byNs = new Map<string, DeclId[]>();
  for (const d of complete) {
    const name = d.namespace.join('.');
    let list = byNs.get(name);
    if (!list) {
      list = [];
      byNs.set(name, list);
      namespaces.push({ name, decls: list });
    }
    list.push(d.id);
  }

  const ir: IrSchema = {
    decls: complete,
    namespaces,
    ...(rootType !== undefined ? { rootType } : {}),
    ...(fileIdentifier !== undefined ? { fileIdentifier } : {}),
    ...(fileExtension !== undefined ? { fileExtension } : {}),
    declaredAttributes,
  };
  return deepFreeze(ir);
}

function parseStreaming(text: string): StreamingMode {
  switch (text) {
    case 'server':
    case 'client':
    case 'bidi':
      return text;
    default:
      return 'none';
  }
}
