import type {
  AttributeNode,
  DeclNode,
  FieldNode,
  LiteralNode,
  SchemaItemNode,
  SchemaNode,
  TypeExprNode,
} from './ast.js';

export interface PrintOptions {
  /** Indentation for declaration members. Default: two spaces. */
  indent?: string;
  lineEnding?: '\n' | '\r\n';
}

export function printTypeExpr(te: TypeExprNode): string {
  switch (te.kind) {
    case 'ScalarType':
      return te.scalar;
    case 'StringType':
      return 'string';
    case 'VectorType':
      return `[${printTypeExpr(te.element)}]`;
    case 'NamedType':
      return te.name;
  }
}

/**
 * Render a float so that it lexes back as a float literal with the same value.
 */
export function printFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  if (value === Number.NEGATIVE_INFINITY) return '-inf';
  if (Object.is(value, -0)) return '-0.0';
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function printLiteral(lit: LiteralNode): string {
  switch (lit.kind) {
    case 'IntLiteral':
      return lit.value.toString();
    case 'FloatLiteral':
      return printFloat(lit.value);
    case 'BoolLiteral':
      return lit.value ? 'true' : 'false';
    case 'StringLiteral':
      return JSON.stringify(lit.value);
    case 'IdentLiteral':
      return lit.name;
  }
}

function printAttributes(attrs: readonly AttributeNode[]): string {
  if (attrs.length === 0) return '';
  const parts = attrs.map((a) => (a.value ? `${a.name}: ${printLiteral(a.value)}` : a.name));
  return ` (${parts.join(', ')})`;
}

function docLines(doc: readonly string[], indent: string): string[] {
  return doc.map((line) => (line.length > 0 ? `${indent}/// ${line}` : `${indent}///`));
}

function printField(f: FieldNode, indent: string): string[] {
  const def = f.defaultValue ? ` = ${printLiteral(f.defaultValue)}` : '';
  return [
    ...docLines(f.doc, indent),
    `${indent}${f.name}: ${printTypeExpr(f.typeExpr)}${def}${printAttributes(f.attributes)};`,
  ];
}

function printDecl(decl: DeclNode, indent: string): string[] {
  const out = docLines(decl.doc, '');
  const attrs = printAttributes(decl.attributes);
  switch (decl.kind) {
    case 'EnumDecl':
      out.push(`enum ${decl.name} : ${printTypeExpr(decl.underlying)}${attrs} {`);
      for (const v of decl.values) {
        out.push(...docLines(v.doc, indent));
        out.push(`${indent}${v.name}${v.value !== undefined ? ` = ${v.value.toString()}` : ''},`);
      }
      break;
    case 'UnionDecl':
      out.push(`union ${decl.name}${attrs} {`);
      for (const v of decl.variants) {
        out.push(...docLines(v.doc, indent));
        out.push(`${indent}${v.typeName},`);
      }
      break;
    case 'StructDecl':
    case 'TableDecl':
      out.push(`${decl.kind === 'StructDecl' ? 'struct' : 'table'} ${decl.name}${attrs} {`);
      for (const f of decl.fields) out.push(...printField(f, indent));
      break;
    case 'RpcServiceDecl':
      out.push(`rpc_service ${decl.name}${attrs} {`);
      for (const m of decl.methods) {
        out.push(...docLines(m.doc, indent));
        out.push(
          `${indent}${m.name}(${m.requestType}): ${m.responseType}${printAttributes(m.attributes)};`,
        );
      }
      break;
  }
  out.push('}');
  return out;
}

function printItem(item: SchemaItemNode, indent: string): string[] {
  switch (item.kind) {
    case 'Include':
      return [`include ${JSON.stringify(item.path)};`];
    case 'Namespace':
      return [item.path.length > 0 ? `namespace ${item.path.join('.')};` : 'namespace;'];
    case 'AttributeDecl':
      return [`attribute ${JSON.stringify(item.name)};`];
    case 'RootType':
      return [`root_type ${item.typeName};`];
    case 'FileIdentifier':
      return [`file_identifier ${JSON.stringify(item.value)};`];
    case 'FileExtension':
      return [`file_extension ${JSON.stringify(item.value)};`];
    default:
      return printDecl(item, indent);
  }
}

/**
 * Pretty-print a parsed schema in canonical form.
 *
 * Scalar aliases are written with their canonical names and comments other than `///` are
 * dropped; re-parsing the output yields the same AST modulo source spans.
 */
export function printSchema(schema: SchemaNode, opts?: PrintOptions): string {
  const indent = opts?.indent ?? '  ';
  const lineEnding = opts?.lineEnding ?? '\n';
  const blocks = schema.items.map((item) => printItem(item, indent).join(lineEnding));
  return blocks.length > 0 ? blocks.join(lineEnding + lineEnding) + lineEnding : '';
}
