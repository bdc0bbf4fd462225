/**
 * Frontend AST contracts for `.fbs` schemas.
 *
 * This module defines types only. Nodes are built once by the parser and never mutated.
 */
import type { ScalarKind } from '../runtime/byte-buffer.js';

export type { ScalarKind } from '../runtime/byte-buffer.js';

export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Dotted namespace path, outermost segment first. The global namespace is `[]`.
 */
export type NamespacePath = readonly string[];

/**
 * A single parsed `.fbs` file.
 */
export interface SchemaNode extends BaseNode {
  kind: 'Schema';
  path: string;
  items: SchemaItemNode[];
}

/**
 * Top-level items permitted in a schema file, in source order.
 */
export type SchemaItemNode =
  | IncludeNode
  | NamespaceNode
  | AttributeDeclNode
  | RootTypeNode
  | FileIdentifierNode
  | FileExtensionNode
  | DeclNode;

export type DeclNode =
  | EnumDeclNode
  | UnionDeclNode
  | StructDeclNode
  | TableDeclNode
  | RpcServiceDeclNode;

export interface IncludeNode extends BaseNode {
  kind: 'Include';
  path: string;
}

/**
 * `namespace a.b;` directive. Applies to all following declarations until the next directive.
 */
export interface NamespaceNode extends BaseNode {
  kind: 'Namespace';
  path: NamespacePath;
}

/**
 * User attribute declaration: `attribute "priority";`.
 */
export interface AttributeDeclNode extends BaseNode {
  kind: 'AttributeDecl';
  name: string;
}

export interface RootTypeNode extends BaseNode {
  kind: 'RootType';
  /** Type name as written (may be dotted). */
  typeName: string;
  namespace: NamespacePath;
}

export interface FileIdentifierNode extends BaseNode {
  kind: 'FileIdentifier';
  value: string;
}

export interface FileExtensionNode extends BaseNode {
  kind: 'FileExtension';
  value: string;
}

/**
 * Fields shared by every declaration.
 */
export interface DeclBase extends BaseNode {
  name: string;
  /** Namespace in effect when the declaration was parsed. */
  namespace: NamespacePath;
  /** `///` lines preceding the declaration, without the marker. */
  doc: string[];
  attributes: AttributeNode[];
}

export interface EnumDeclNode extends DeclBase {
  kind: 'EnumDecl';
  underlying: TypeExprNode;
  values: EnumValueNode[];
}

export interface EnumValueNode extends BaseNode {
  kind: 'EnumValue';
  name: string;
  value?: bigint;
  doc: string[];
}

export interface UnionDeclNode extends DeclBase {
  kind: 'UnionDecl';
  variants: UnionVariantNode[];
}

export interface UnionVariantNode extends BaseNode {
  kind: 'UnionVariant';
  /** Table name as written (may be dotted). */
  typeName: string;
  doc: string[];
}

export interface StructDeclNode extends DeclBase {
  kind: 'StructDecl';
  fields: FieldNode[];
}

export interface TableDeclNode extends DeclBase {
  kind: 'TableDecl';
  fields: FieldNode[];
}

export interface FieldNode extends BaseNode {
  kind: 'Field';
  name: string;
  typeExpr: TypeExprNode;
  defaultValue?: LiteralNode;
  attributes: AttributeNode[];
  doc: string[];
}

export interface RpcServiceDeclNode extends DeclBase {
  kind: 'RpcServiceDecl';
  methods: RpcMethodNode[];
}

export interface RpcMethodNode extends BaseNode {
  kind: 'RpcMethod';
  name: string;
  requestType: string;
  responseType: string;
  attributes: AttributeNode[];
  doc: string[];
}

/**
 * `name` or `name: value` inside a parenthesised attribute list.
 */
export interface AttributeNode extends BaseNode {
  kind: 'Attribute';
  name: string;
  value?: LiteralNode;
}

/**
 * Type expression variants.
 */
export type TypeExprNode =
  | { kind: 'ScalarType'; span: SourceSpan; scalar: ScalarKind }
  | { kind: 'StringType'; span: SourceSpan }
  | { kind: 'VectorType'; span: SourceSpan; element: TypeExprNode }
  | { kind: 'NamedType'; span: SourceSpan; name: string };

/**
 * Literal variants used by defaults and attribute values.
 */
export type LiteralNode =
  | { kind: 'IntLiteral'; span: SourceSpan; value: bigint }
  | { kind: 'FloatLiteral'; span: SourceSpan; value: number }
  | { kind: 'BoolLiteral'; span: SourceSpan; value: boolean }
  | { kind: 'StringLiteral'; span: SourceSpan; value: string }
  | { kind: 'IdentLiteral'; span: SourceSpan; name: string };

/**
 * Union of all AST node types.
 */
export type Node =
  | SchemaNode
  | SchemaItemNode
  | EnumValueNode
  | UnionVariantNode
  | FieldNode
  | RpcMethodNode
  | AttributeNode
  | TypeExprNode
  | LiteralNode;
