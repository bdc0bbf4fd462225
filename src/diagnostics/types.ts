/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `FBS101`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Parse errors only: description of what the grammar expected at this position. */
  expected?: string;
  /** Parse errors only: the token actually found. */
  found?: string;
}

/**
 * Known diagnostic IDs.
 *
 * Ranges: `FBS0xx` loader, `FBS1xx` lexer, `FBS2xx` parser, `FBS3xx` resolver, `FBS4xx` checker.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'FBS000',

  /** Failed to read a schema file from disk. */
  IoReadFailed: 'FBS001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'FBS002',

  /** `include` could not be resolved on any search path. */
  IncludeNotFound: 'FBS003',

  /** Unexpected character in schema text. */
  LexUnexpectedChar: 'FBS100',

  /** String literal runs to end of line or file. */
  LexUnterminatedString: 'FBS101',

  /** Block comment runs to end of file. */
  LexUnterminatedComment: 'FBS102',

  /** Generic parse error: the grammar expected something other than what was found. */
  ParseError: 'FBS200',

  /** A type reference does not resolve to any declaration. */
  UnresolvedType: 'FBS300',

  /** A qualified type reference resolves to different declarations relative and absolute. */
  AmbiguousType: 'FBS301',

  /** Two declarations share one fully-qualified name. */
  DuplicateDeclaration: 'FBS302',

  /** A struct contains itself, directly or transitively. */
  StructCycle: 'FBS303',

  /** Default literal does not fit the field type. */
  InvalidDefaultForType: 'FBS400',

  /** RPC request/response type is not a table. */
  NonTableRpcType: 'FBS401',

  /** Known attribute carries a value outside its domain (e.g. `streaming: "sideways"`). */
  UnknownAttributeValue: 'FBS402',

  /** Explicit field ids are duplicated, gapped, or mixed with implicit ids. */
  DuplicateOrGappedFieldId: 'FBS403',

  /** Two fields (or enum values, union variants, RPC methods) share a name in one declaration. */
  DuplicateField: 'FBS404',

  /** Struct field type is not a scalar, integral enum or struct. */
  InvalidStructField: 'FBS405',

  /** Union variant does not reference a table. */
  InvalidUnionVariant: 'FBS406',

  /** Enum underlying type or member values are invalid. */
  InvalidEnum: 'FBS407',

  /** Vector element type is not supported (nested vector, vector of union). */
  InvalidVectorElement: 'FBS408',

  /** `root_type` does not name a table. */
  InvalidRootType: 'FBS409',

  /** `file_identifier` is not exactly four ASCII characters. */
  InvalidFileIdentifier: 'FBS410',

  /** Attribute is neither built in nor declared with `attribute "name";`. */
  UnknownAttribute: 'FBS411',

  /** `required` on a field that cannot be required. */
  InvalidRequired: 'FBS412',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Diagnostic IDs produced by the resolver and checker (the `SemanticError` family).
 */
export type SemanticErrorId = Extract<
  DiagnosticId,
  `FBS3${string}` | `FBS4${string}`
>;

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
