import type { PrintOptions } from '../frontend/printer.js';
import type { IrSchema } from '../ir/types.js';

/**
 * Output targets the compiler knows how to generate.
 */
export type TargetName = 'ts' | 'fbs';

export const TARGET_NAMES: readonly TargetName[] = ['ts', 'fbs'];

export interface GeneratorOptions {
  /**
   * Module specifier generated TypeScript imports the buffer runtime from.
   * Default: `fbsgen/runtime`.
   */
  runtimeImport?: string;
  /**
   * File stem for declarations in the global namespace (and for single-file targets).
   * Default: `root`.
   */
  rootModuleName?: string;
  /** Formatting of `fbs` output. */
  printer?: PrintOptions;
}

/**
 * In-memory generated source file. `path` is relative to the output directory.
 */
export interface GeneratedFile {
  kind: TargetName;
  path: string;
  text: string;
}

/**
 * A code generator walks the immutable IR once and returns its files. Generators never report
 * errors: the IR they receive is already validated.
 */
export type Generator = (ir: IrSchema, opts?: GeneratorOptions) => GeneratedFile[];

export type Generators = Record<TargetName, Generator>;
