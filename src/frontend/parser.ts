import type {
  AttributeNode,
  DeclNode,
  EnumDeclNode,
  EnumValueNode,
  FieldNode,
  LiteralNode,
  NamespacePath,
  RpcMethodNode,
  RpcServiceDeclNode,
  ScalarKind,
  SchemaItemNode,
  SchemaNode,
  SourceSpan,
  StructDeclNode,
  TableDeclNode,
  TypeExprNode,
  UnionDeclNode,
  UnionVariantNode,
} from './ast.js';
import type { Keyword, Punct, Token } from './lexer.js';
import { describeToken, tokenize } from './lexer.js';
import { joinSpans, makeSourceFile, span } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/**
 * Scalar type spellings accepted in schemas, mapped to their canonical name.
 */
export const SCALAR_ALIASES: ReadonlyMap<string, ScalarKind> = new Map<string, ScalarKind>([
  ['bool', 'bool'],
  ['byte', 'int8'],
  ['int8', 'int8'],
  ['ubyte', 'uint8'],
  ['uint8', 'uint8'],
  ['short', 'int16'],
  ['int16', 'int16'],
  ['ushort', 'uint16'],
  ['uint16', 'uint16'],
  ['int', 'int32'],
  ['int32', 'int32'],
  ['uint', 'uint32'],
  ['uint32', 'uint32'],
  ['long', 'int64'],
  ['int64', 'int64'],
  ['ulong', 'uint64'],
  ['uint64', 'uint64'],
  ['float', 'float32'],
  ['float32', 'float32'],
  ['double', 'float64'],
  ['float64', 'float64'],
]);

const TOP_LEVEL_KEYWORDS: ReadonlySet<Keyword> = new Set<Keyword>([
  'namespace',
  'include',
  'attribute',
  'root_type',
  'file_identifier',
  'file_extension',
  'enum',
  'union',
  'struct',
  'table',
  'rpc_service',
]);

/**
 * Thrown inside the parser to abandon the current construct; never escapes `parseSchemaFile`.
 */
class SyntaxFailure extends Error {}

function diag(
  diagnostics: Diagnostic[],
  at: SourceSpan,
  expected: string,
  found: string,
  message = `Expected ${expected}, found ${found}.`,
): void {
  diagnostics.push({
    id: DiagnosticIds.ParseError,
    severity: 'error',
    message,
    file: at.file,
    line: at.start.line,
    column: at.start.column,
    expected,
    found,
  });
}

/**
 * Parse one `.fbs` file into a {@link SchemaNode}.
 *
 * Returns `undefined` only when lexing fails. Otherwise a node is always returned; callers must
 * check `diagnostics` for parse errors before using it, since faulty constructs are dropped or
 * truncated during recovery.
 */
export function parseSchemaFile(
  path: string,
  sourceText: string,
  diagnostics: Diagnostic[],
): SchemaNode | undefined {
  const file = makeSourceFile(path, sourceText);
  const tokens = tokenize(file, diagnostics);
  if (!tokens) return undefined;

  let idx = 0;
  let pendingDoc: string[] = [];

  const peek = (ahead = 0): Token => tokens[Math.min(idx + ahead, tokens.length - 1)]!;

  /** Next non-doc token; doc comments are collected into `pendingDoc`. */
  const current = (): Token => {
    while (peek().kind === 'doc') {
      pendingDoc.push(peek().text);
      idx++;
    }
    return peek();
  };

  const takeDoc = (): string[] => {
    current();
    const doc = pendingDoc;
    pendingDoc = [];
    return doc;
  };

  const advance = (): Token => {
    const t = current();
    if (t.kind !== 'eof') idx++;
    return t;
  };

  const fail = (expected: string): never => {
    const t = current();
    diag(diagnostics, t.span, expected, describeToken(t));
    throw new SyntaxFailure(expected);
  };

  const isPunct = (text: Punct): boolean => {
    const t = current();
    return t.kind === 'punct' && t.text === text;
  };

  const eatPunct = (text: Punct): boolean => {
    if (!isPunct(text)) return false;
    advance();
    return true;
  };

  const expectPunct = (text: Punct): Token => {
    if (!isPunct(text)) fail(`"${text}"`);
    return advance();
  };

  const expectIdent = (what: string): { name: string; span: SourceSpan } => {
    const t = current();
    if (t.kind !== 'ident') fail(what);
    advance();
    return { name: t.text, span: t.span };
  };

  /** Field and attribute names may reuse keywords (`table`, `union`, ...). */
  const expectName = (what: string): { name: string; span: SourceSpan } => {
    const t = current();
    if (t.kind !== 'ident' && t.kind !== 'keyword') fail(what);
    advance();
    return { name: t.text, span: t.span };
  };

  const expectString = (what: string): { value: string; span: SourceSpan } => {
    const t = current();
    if (t.kind !== 'string') fail(what);
    advance();
    return { value: t.kind === 'string' ? t.value : '', span: t.span };
  };

  const parseDottedName = (what: string): { name: string; span: SourceSpan } => {
    const first = expectIdent(what);
    let name = first.name;
    let last = first.span;
    while (isPunct('.')) {
      advance();
      const part = expectIdent('identifier after "."');
      name += `.${part.name}`;
      last = part.span;
    }
    return { name, span: joinSpans(first.span, last) };
  };

  const parseTypeExpr = (): TypeExprNode => {
    const start = current();
    if (start.kind === 'punct' && start.text === '[') {
      advance();
      const element = parseTypeExpr();
      const close = expectPunct(']');
      return { kind: 'VectorType', span: joinSpans(start.span, close.span), element };
    }
    if (start.kind !== 'ident') fail('type');
    const dotted = parseDottedName('type');
    if (dotted.name === 'string') return { kind: 'StringType', span: dotted.span };
    const scalar = SCALAR_ALIASES.get(dotted.name);
    if (scalar) return { kind: 'ScalarType', span: dotted.span, scalar };
    return { kind: 'NamedType', span: dotted.span, name: dotted.name };
  };

  const parseLiteral = (): LiteralNode => {
    const first = current();
    let sign = 1;
    let signSpan: SourceSpan | undefined;
    if (first.kind === 'punct' && (first.text === '-' || first.text === '+')) {
      sign = first.text === '-' ? -1 : 1;
      signSpan = first.span;
      advance();
    }
    const t = current();
    const spanFrom = (s: SourceSpan) => (signSpan ? joinSpans(signSpan, s) : s);
    switch (t.kind) {
      case 'int':
        advance();
        return { kind: 'IntLiteral', span: spanFrom(t.span), value: sign < 0 ? -t.value : t.value };
      case 'float':
        advance();
        return { kind: 'FloatLiteral', span: spanFrom(t.span), value: sign * t.value };
      case 'ident': {
        const lower = t.text.toLowerCase();
        if (lower === 'nan' || lower === 'inf' || lower === 'infinity') {
          advance();
          const value = lower === 'nan' ? Number.NaN : sign * Number.POSITIVE_INFINITY;
          return { kind: 'FloatLiteral', span: spanFrom(t.span), value };
        }
        if (!signSpan) {
          advance();
          return { kind: 'IdentLiteral', span: t.span, name: t.text };
        }
        break;
      }
      case 'keyword':
        if (!signSpan && (t.text === 'true' || t.text === 'false')) {
          advance();
          return { kind: 'BoolLiteral', span: t.span, value: t.text === 'true' };
        }
        break;
      case 'string':
        if (!signSpan) {
          advance();
          return { kind: 'StringLiteral', span: t.span, value: t.value };
        }
        break;
      default:
        break;
    }
    return fail(signSpan ? 'number' : 'literal');
  };

  const parseAttributes = (): AttributeNode[] => {
    const attrs: AttributeNode[] = [];
    if (!isPunct('(')) return attrs;
    advance();
    if (isPunct(')')) {
      advance();
      return attrs;
    }
    while (true) {
      const name = expectName('attribute name');
      let value: LiteralNode | undefined;
      if (eatPunct(':')) value = parseLiteral();
      attrs.push({
        kind: 'Attribute',
        span: value ? joinSpans(name.span, value.span) : name.span,
        name: name.name,
        ...(value ? { value } : {}),
      });
      if (eatPunct(',')) continue;
      expectPunct(')');
      return attrs;
    }
  };

  /**
   * Skip to the end of the current member (`;` consumed) or to the closing `}` of the body
   * (not consumed), whichever comes first.
   */
  const recoverInBody = (): void => {
    while (true) {
      const t = current();
      if (t.kind === 'eof') return;
      if (t.kind === 'punct' && t.text === '}') return;
      advance();
      if (t.kind === 'punct' && t.text === ';') return;
    }
  };

  const recoverTopLevel = (): void => {
    let depth = 0;
    while (true) {
      const t = current();
      if (t.kind === 'eof') return;
      if (depth === 0 && t.kind === 'keyword' && TOP_LEVEL_KEYWORDS.has(t.text)) return;
      advance();
      if (t.kind === 'punct' && t.text === '{') depth++;
      if (t.kind === 'punct' && t.text === '}') {
        depth = Math.max(0, depth - 1);
        if (depth === 0) return;
      }
    }
  };

  /**
   * Parse `{ member; member; ... }`, collecting member-level errors and resuming after each.
   */
  const parseBody = <T>(parseMember: () => T): { members: T[]; close: SourceSpan } => {
    expectPunct('{');
    const members: T[] = [];
    while (true) {
      const t = current();
      if (t.kind === 'punct' && t.text === '}') {
        advance();
        pendingDoc = [];
        return { members, close: t.span };
      }
      if (t.kind === 'eof') fail('"}"');
      try {
        members.push(parseMember());
      } catch (err) {
        if (!(err instanceof SyntaxFailure)) throw err;
        pendingDoc = [];
        recoverInBody();
      }
    }
  };

  const parseField = (): FieldNode => {
    const doc = takeDoc();
    const name = expectName('field name');
    expectPunct(':');
    const typeExpr = parseTypeExpr();
    let defaultValue: LiteralNode | undefined;
    if (eatPunct('=')) defaultValue = parseLiteral();
    const attributes = parseAttributes();
    const semi = expectPunct(';');
    return {
      kind: 'Field',
      span: joinSpans(name.span, semi.span),
      name: name.name,
      typeExpr,
      ...(defaultValue ? { defaultValue } : {}),
      attributes,
      doc,
    };
  };

  const parseRpcMethod = (): RpcMethodNode => {
    const doc = takeDoc();
    const name = expectIdent('method name');
    expectPunct('(');
    const request = parseDottedName('request type');
    expectPunct(')');
    expectPunct(':');
    const response = parseDottedName('response type');
    const attributes = parseAttributes();
    const semi = expectPunct(';');
    return {
      kind: 'RpcMethod',
      span: joinSpans(name.span, semi.span),
      name: name.name,
      requestType: request.name,
      responseType: response.name,
      attributes,
      doc,
    };
  };

  /**
   * Parse a comma-separated `{ a, b, c }` list (trailing comma permitted).
   */
  const parseCommaList = <T>(parseItem: () => T): { items: T[]; close: SourceSpan } => {
    expectPunct('{');
    const items: T[] = [];
    while (true) {
      if (isPunct('}')) {
        const close = advance();
        pendingDoc = [];
        return { items, close: close.span };
      }
      items.push(parseItem());
      if (eatPunct(',')) continue;
      const close = expectPunct('}');
      return { items, close: close.span };
    }
  };

  const parseEnum = (start: Token, doc: string[], namespace: NamespacePath): EnumDeclNode => {
    const name = expectIdent('enum name');
    expectPunct(':');
    const underlying = parseTypeExpr();
    const attributes = parseAttributes();
    const { items, close } = parseCommaList((): EnumValueNode => {
      const valueDoc = takeDoc();
      const member = expectIdent('enum value name');
      let value: bigint | undefined;
      let end = member.span;
      if (eatPunct('=')) {
        const lit = parseLiteral();
        if (lit.kind !== 'IntLiteral') {
          diag(diagnostics, lit.span, 'integer', lit.kind === 'IdentLiteral' ? `"${lit.name}"` : 'non-integer literal');
          throw new SyntaxFailure('integer');
        }
        value = lit.value;
        end = lit.span;
      }
      return {
        kind: 'EnumValue',
        span: joinSpans(member.span, end),
        name: member.name,
        ...(value !== undefined ? { value } : {}),
        doc: valueDoc,
      };
    });
    return {
      kind: 'EnumDecl',
      span: joinSpans(start.span, close),
      name: name.name,
      namespace,
      doc,
      attributes,
      underlying,
      values: items,
    };
  };

  const parseUnion = (start: Token, doc: string[], namespace: NamespacePath): UnionDeclNode => {
    const name = expectIdent('union name');
    const attributes = parseAttributes();
    const { items, close } = parseCommaList((): UnionVariantNode => {
      const variantDoc = takeDoc();
      const ref = parseDottedName('union variant type');
      return { kind: 'UnionVariant', span: ref.span, typeName: ref.name, doc: variantDoc };
    });
    return {
      kind: 'UnionDecl',
      span: joinSpans(start.span, close),
      name: name.name,
      namespace,
      doc,
      attributes,
      variants: items,
    };
  };

  const parseProduct = (
    start: Token,
    doc: string[],
    namespace: NamespacePath,
    kind: 'StructDecl' | 'TableDecl',
  ): StructDeclNode | TableDeclNode => {
    const name = expectIdent(kind === 'StructDecl' ? 'struct name' : 'table name');
    const attributes = parseAttributes();
    const { members, close } = parseBody(parseField);
    return {
      kind,
      span: joinSpans(start.span, close),
      name: name.name,
      namespace,
      doc,
      attributes,
      fields: members,
    };
  };

  const parseService = (start: Token, doc: string[], namespace: NamespacePath): RpcServiceDeclNode => {
    const name = expectIdent('service name');
    const attributes = parseAttributes();
    const { members, close } = parseBody(parseRpcMethod);
    return {
      kind: 'RpcServiceDecl',
      span: joinSpans(start.span, close),
      name: name.name,
      namespace,
      doc,
      attributes,
      methods: members,
    };
  };

  const parseStringDirective = (start: Token): { value: string; span: SourceSpan } => {
    const value = expectString('string literal');
    const semi = expectPunct(';');
    return { value: value.value, span: joinSpans(start.span, semi.span) };
  };

  const items: SchemaItemNode[] = [];
  let namespace: NamespacePath = [];

  const parseTopLevel = (): void => {
    const doc = takeDoc();
    const t = current();
    if (t.kind === 'punct' && t.text === ';') {
      advance();
      return;
    }
    if (t.kind !== 'keyword' || !TOP_LEVEL_KEYWORDS.has(t.text)) {
      fail('declaration');
      return;
    }
    advance();
    let decl: DeclNode | undefined;
    switch (t.text) {
      case 'namespace': {
        const path = isPunct(';') ? { name: '', span: t.span } : parseDottedName('namespace name');
        const semi = expectPunct(';');
        namespace = Object.freeze(path.name.length > 0 ? path.name.split('.') : []);
        items.push({ kind: 'Namespace', span: joinSpans(t.span, semi.span), path: namespace });
        return;
      }
      case 'include': {
        const d = parseStringDirective(t);
        items.push({ kind: 'Include', span: d.span, path: d.value });
        return;
      }
      case 'attribute': {
        const nameTok = current();
        let name: string;
        if (nameTok.kind === 'string') {
          name = nameTok.value;
          advance();
        } else {
          name = expectIdent('attribute name').name;
        }
        const semi = expectPunct(';');
        items.push({ kind: 'AttributeDecl', span: joinSpans(t.span, semi.span), name });
        return;
      }
      case 'root_type': {
        const ref = parseDottedName('root type name');
        const semi = expectPunct(';');
        items.push({ kind: 'RootType', span: joinSpans(t.span, semi.span), typeName: ref.name, namespace });
        return;
      }
      case 'file_identifier': {
        const d = parseStringDirective(t);
        items.push({ kind: 'FileIdentifier', span: d.span, value: d.value });
        return;
      }
      case 'file_extension': {
        const d = parseStringDirective(t);
        items.push({ kind: 'FileExtension', span: d.span, value: d.value });
        return;
      }
      case 'enum':
        decl = parseEnum(t, doc, namespace);
        break;
      case 'union':
        decl = parseUnion(t, doc, namespace);
        break;
      case 'struct':
        decl = parseProduct(t, doc, namespace, 'StructDecl');
        break;
      case 'table':
        decl = parseProduct(t, doc, namespace, 'TableDecl');
        break;
      case 'rpc_service':
        decl = parseService(t, doc, namespace);
        break;
      default:
        fail('declaration');
    }
    if (decl) items.push(decl);
  };

  while (current().kind !== 'eof') {
    try {
      parseTopLevel();
    } catch (err) {
      if (!(err instanceof SyntaxFailure)) throw err;
      pendingDoc = [];
      recoverTopLevel();
    }
  }

  return {
    kind: 'Schema',
    span: span(file, 0, sourceText.length),
    path,
    items,
  };
}
