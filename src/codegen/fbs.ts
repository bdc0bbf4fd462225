import type {
  AttributeNode,
  DeclNode,
  EnumValueNode,
  FieldNode,
  LiteralNode,
  RpcMethodNode,
  SchemaItemNode,
  SourceSpan,
  TypeExprNode,
  UnionVariantNode,
} from '../frontend/ast.js';
import { printSchema } from '../frontend/printer.js';
import type {
  DeclId,
  IrAttribute,
  IrDecl,
  IrDefault,
  IrSchema,
  IrTableField,
  IrType,
} from '../ir/types.js';
import { declOf } from '../ir/types.js';
import { DEFAULT_ROOT_MODULE } from './typescript.js';
import type { GeneratedFile, GeneratorOptions } from './types.js';

function syntheticSpan(file: string): SourceSpan {
  const at = { line: 1, column: 1, offset: 0 };
  return { file, start: at, end: at };
}

function literalOf(value: IrAttribute['value'], span: SourceSpan): LiteralNode | undefined {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'bigint':
      return { kind: 'IntLiteral', span, value };
    case 'number':
      return { kind: 'FloatLiteral', span, value };
    case 'boolean':
      return { kind: 'BoolLiteral', span, value };
    case 'string':
      return { kind: 'StringLiteral', span, value };
  }
}

function attributeNodes(attrs: readonly IrAttribute[], span: SourceSpan): AttributeNode[] {
  return attrs.map((a): AttributeNode => {
    const value = literalOf(a.value, span);
    return value ? { kind: 'Attribute', span, name: a.name, value } : { kind: 'Attribute', span, name: a.name };
  });
}

function defaultLiteral(def: IrDefault, span: SourceSpan): LiteralNode | undefined {
  switch (def.kind) {
    case 'Int':
      return def.value === 0n ? undefined : { kind: 'IntLiteral', span, value: def.value };
    case 'Float':
      return def.value === 0 && !Object.is(def.value, -0) ? undefined : { kind: 'FloatLiteral', span, value: def.value };
    case 'Bool':
      return def.value ? { kind: 'BoolLiteral', span, value: true } : undefined;
    case 'None':
      return undefined;
  }
}

function bitPosition(value: bigint): bigint {
  return BigInt(value.toString(2).length - 1);
}

/**
 * Rebuilds a canonical AST from the IR. Names are written relative to the namespace in effect
 * and fully qualified otherwise.
 */
class SchemaRebuilder {
  private namespace = '';

  constructor(private readonly ir: IrSchema) {}

  enter(namespace: string): void {
    this.namespace = namespace;
  }

  nameOf(id: DeclId): string {
    const decl = declOf(this.ir, id);
    return decl.namespace.join('.') === this.namespace ? decl.name : decl.fqn;
  }

  typeExpr(type: IrType, span: SourceSpan): TypeExprNode {
    switch (type.kind) {
      case 'Scalar':
        return { kind: 'ScalarType', span, scalar: type.scalar };
      case 'String':
        return { kind: 'StringType', span };
      case 'Vector':
        return { kind: 'VectorType', span, element: this.typeExpr(type.element, span) };
      case 'Named':
        return { kind: 'NamedType', span, name: this.nameOf(type.ref) };
    }
  }

  tableField(f: IrTableField, span: SourceSpan): FieldNode {
    const node: FieldNode = {
      kind: 'Field',
      span,
      name: f.name,
      typeExpr: this.typeExpr(f.type, span),
      attributes: attributeNodes(f.attributes, span),
      doc: [...f.doc],
    };
    const def = defaultLiteral(f.defaultValue, span);
    return def ? { ...node, defaultValue: def } : node;
  }

  decl(decl: IrDecl): DeclNode {
    const span = decl.span;
    const base = {
      span,
      name: decl.name,
      namespace: decl.namespace,
      doc: [...decl.doc],
      attributes: attributeNodes(decl.attributes, span),
    };
    switch (decl.kind) {
      case 'Enum':
        return {
          ...base,
          kind: 'EnumDecl',
          underlying: { kind: 'ScalarType', span, scalar: decl.underlying },
          values: decl.values.map((v): EnumValueNode => ({
            kind: 'EnumValue',
            span,
            name: v.name,
            value: decl.bitFlags ? bitPosition(v.value) : v.value,
            doc: [...v.doc],
          })),
        };
      case 'Union':
        return {
          ...base,
          kind: 'UnionDecl',
          variants: decl.variants.map((v): UnionVariantNode => ({
            kind: 'UnionVariant',
            span,
            typeName: this.nameOf(v.table),
            doc: [...v.doc],
          })),
        };
      case 'Struct':
        return {
          ...base,
          kind: 'StructDecl',
          fields: decl.fields.map((f): FieldNode => ({
            kind: 'Field',
            span,
            name: f.name,
            typeExpr: this.typeExpr(f.type, span),
            attributes: attributeNodes(f.attributes, span),
            doc: [...f.doc],
          })),
        };
      case 'Table':
        return { ...base, kind: 'TableDecl', fields: decl.fields.map((f) => this.tableField(f, span)) };
      case 'RpcService':
        return {
          ...base,
          kind: 'RpcServiceDecl',
          methods: decl.methods.map((m): RpcMethodNode => ({
            kind: 'RpcMethod',
            span,
            name: m.name,
            requestType: this.nameOf(m.request),
            responseType: this.nameOf(m.response),
            attributes: attributeNodes(m.attributes, span),
            doc: [...m.doc],
          })),
        };
    }
  }
}

/**
 * Canonical `.fbs` rendering of the whole validated schema in a single file.
 */
export function generateFbs(ir: IrSchema, opts?: GeneratorOptions): GeneratedFile[] {
  const path = `${opts?.rootModuleName ?? DEFAULT_ROOT_MODULE}.fbs`;
  const span = syntheticSpan(path);
  const rebuild = new SchemaRebuilder(ir);
  const items: SchemaItemNode[] = ir.declaredAttributes.map((name): SchemaItemNode => ({ kind: 'AttributeDecl', span, name }));

  let current = '';
  for (const ns of ir.namespaces) {
    if (ns.decls.length === 0) continue;
    if (ns.name !== current) {
      items.push({ kind: 'Namespace', span, path: ns.name.length > 0 ? ns.name.split('.') : [] });
      current = ns.name;
    }
    rebuild.enter(ns.name);
    for (const id of ns.decls) items.push(rebuild.decl(declOf(ir, id)));
  }

  if (ir.rootType !== undefined) {
    const namespace = current.length > 0 ? current.split('.') : [];
    items.push({ kind: 'RootType', span, typeName: rebuild.nameOf(ir.rootType), namespace });
  }
  if (ir.fileIdentifier !== undefined) items.push({ kind: 'FileIdentifier', span, value: ir.fileIdentifier });
  if (ir.fileExtension !== undefined) items.push({ kind: 'FileExtension', span, value: ir.fileExtension });

  return [
    {
      kind: 'fbs',
      path,
      text: printSchema({ kind: 'Schema', span, path, items }, opts?.printer),
    },
  ];
}
