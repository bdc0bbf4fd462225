export { compile, compileSources, fileSystemHost, loadSchemas, memoryHost } from './compile.js';
export type { SourceCompilerOptions, SourceFiles, SourceHost } from './compile.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

export { DiagnosticIds, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity, SemanticErrorId } from './diagnostics/types.js';

export { parseSchemaFile } from './frontend/parser.js';
export { printSchema } from './frontend/printer.js';
export type { PrintOptions } from './frontend/printer.js';
export type { SchemaNode, SourcePosition, SourceSpan } from './frontend/ast.js';

export { buildSymbolTable, resolveTypeName } from './semantics/symbols.js';
export type { SymbolTable } from './semantics/symbols.js';
export { buildIr } from './semantics/check.js';
export type { BuildIrOptions } from './semantics/check.js';
export type {
  DeclId,
  IrDecl,
  IrEnum,
  IrNamespace,
  IrRpcService,
  IrSchema,
  IrStruct,
  IrTable,
  IrType,
  IrUnion,
  ScalarKind,
} from './ir/types.js';
export { tableWriteOrder } from './ir/types.js';

export { defaultGenerators, generateFbs, generateTypeScript, TARGET_NAMES } from './codegen/index.js';
export type { GeneratedFile, Generator, GeneratorOptions, Generators, TargetName } from './codegen/index.js';

export { decodeObject, deserializeRoot, encodeObject, serializeRoot } from './reflection/codec.js';
export type { ReflectObject, ReflectValue } from './reflection/codec.js';
