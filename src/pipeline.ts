import type { Diagnostic } from './diagnostics/types.js';
import type { GeneratedFile, Generators, TargetName } from './codegen/types.js';
import type { PrintOptions } from './frontend/printer.js';

/**
 * Options that influence schema loading and which files are generated.
 */
export interface CompilerOptions {
  /**
   * Additional include/search directories.
   *
   * These directories are consulted when resolving `include` statements after checking paths
   * relative to the including file.
   */
  includeDirs?: string[];
  /** Targets to generate. Default: `['ts']`. */
  targets?: TargetName[];
  /** Module specifier generated TypeScript imports the buffer runtime from. */
  runtimeImport?: string;
  /** File stem for the global namespace and single-file targets. */
  rootModuleName?: string;
  /** Formatting of the `fbs` target. */
  printer?: PrintOptions;
}

/**
 * Result of a compilation run: diagnostics plus the generated files (none when any error was
 * reported).
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: GeneratedFile[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete generators so the core pipeline stays pure and in-memory.
 */
export interface PipelineDeps {
  generators: Generators;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
