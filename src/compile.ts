import { readFile } from 'node:fs/promises';
import { dirname, posix, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

import type { IncludeNode, SchemaNode } from './frontend/ast.js';
import { parseSchemaFile } from './frontend/parser.js';
import type { GeneratedFile, GeneratorOptions, TargetName } from './codegen/types.js';
import { buildIr } from './semantics/check.js';
import { buildSymbolTable, sortSchemas } from './semantics/symbols.js';

/**
 * Where schema text comes from. `read` resolves to `undefined` when nothing exists at `path`;
 * any other failure rejects.
 */
export interface SourceHost {
  normalize(path: string): string;
  /** Candidate path for `include` target `spec` relative to directory `dir`. */
  join(dir: string, spec: string): string;
  dirname(path: string): string;
  read(path: string): Promise<string | undefined>;
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR' || err.code === 'EISDIR';
}

export const fileSystemHost: SourceHost = {
  normalize: (p) => resolve(p),
  join: (dir, spec) => resolve(dir, spec),
  dirname: (p) => dirname(p),
  async read(p) {
    try {
      return await readFile(p, 'utf8');
    } catch (err) {
      if (isMissingFileError(err)) return undefined;
      throw err;
    }
  },
};

/**
 * Schema text keyed by path.
 */
export type SourceFiles = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isSourceMap(files: SourceFiles): files is ReadonlyMap<string, string> {
  return files instanceof Map;
}

/**
 * Host over an in-memory `path -> text` map. Paths are POSIX-style and kept relative.
 */
export function memoryHost(files: SourceFiles): SourceHost {
  const table = new Map<string, string>();
  const entries = isSourceMap(files) ? [...files.entries()] : Object.entries(files);
  for (const [path, text] of entries) table.set(posix.normalize(path), text);
  return {
    normalize: (p) => posix.normalize(p),
    join: (dir, spec) => posix.normalize(posix.join(dir, spec)),
    dirname: (p) => posix.dirname(p),
    read: (p) => Promise.resolve(table.get(p)),
  };
}

function includesOf(schema: SchemaNode): IncludeNode[] {
  return schema.items.filter((i): i is IncludeNode => i.kind === 'Include');
}

function includeCandidates(host: SourceHost, from: string, spec: string, includeDirs: string[]): string[] {
  const out = [host.join(host.dirname(from), spec), ...includeDirs.map((d) => host.join(d, spec))];
  return [...new Set(out)];
}

type Probe =
  | { kind: 'found'; path: string; text: string }
  | { kind: 'missing'; tried: string[] }
  | { kind: 'failed'; path: string; error: unknown };

type ReadFn = (path: string) => Promise<string | undefined>;

async function probe(read: ReadFn, candidates: string[]): Promise<Probe> {
  for (const c of candidates) {
    try {
      // Candidates are tried in order; the first hit wins.
      // eslint-disable-next-line no-await-in-loop
      const text = await read(c);
      if (text !== undefined) return { kind: 'found', path: c, text };
    } catch (error) {
      return { kind: 'failed', path: c, error };
    }
  }
  return { kind: 'missing', tried: candidates };
}

function parseOrReport(path: string, text: string, diagnostics: Diagnostic[]): SchemaNode | undefined {
  try {
    return parseSchemaFile(path, text, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}

/**
 * Load the entry schema and everything it includes, transitively. Each file is read and parsed
 * once, however often it is included; sibling includes load concurrently.
 *
 * Diagnostics are collected per file and merged in path order, so the result does not depend on
 * which read finished first.
 */
export async function loadSchemas(
  entryFile: string,
  host: SourceHost,
  diagnostics: Diagnostic[],
  options: Pick<CompilerOptions, 'includeDirs'> = {},
): Promise<SchemaNode[] | undefined> {
  const entryPath = host.normalize(entryFile);
  const includeDirs = (options.includeDirs ?? []).map((d) => host.normalize(d));
  const schemas = new Map<string, SchemaNode>();
  const perFile = new Map<string, Diagnostic[]>();
  const started = new Set<string>();
  const reads = new Map<string, Promise<string | undefined>>();
  const read: ReadFn = (path) => {
    let pending = reads.get(path);
    if (!pending) {
      pending = host.read(path);
      reads.set(path, pending);
    }
    return pending;
  };

  const load = async (path: string, text: string): Promise<void> => {
    const local: Diagnostic[] = [];
    perFile.set(path, local);
    const schema = parseOrReport(path, text, local);
    if (!schema) return;
    schemas.set(path, schema);

    const includes = includesOf(schema);
    const probes = await Promise.all(
      includes.map((inc) => probe(read, includeCandidates(host, path, inc.path, includeDirs))),
    );
    const next: Array<Promise<void>> = [];
    probes.forEach((result, i) => {
      const inc = includes[i];
      if (!inc) return;
      const where = { file: path, line: inc.span.start.line, column: inc.span.start.column };
      switch (result.kind) {
        case 'missing':
          local.push({
            id: DiagnosticIds.IncludeNotFound,
            severity: 'error',
            message: `Failed to resolve include "${inc.path}" from "${path}". Tried:\n${result.tried
              .map((c) => `- ${c}`)
              .join('\n')}`,
            ...where,
          });
          return;
        case 'failed':
          local.push({
            id: DiagnosticIds.IoReadFailed,
            severity: 'error',
            message: `Failed to read included file "${result.path}": ${String(result.error)}`,
            ...where,
          });
          return;
        case 'found':
          if (started.has(result.path)) return;
          started.add(result.path);
          next.push(load(result.path, result.text));
      }
    });
    await Promise.all(next);
  };

  let entryText: string | undefined;
  try {
    entryText = await read(entryPath);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read entry file: ${String(err)}`,
      file: entryPath,
    });
    return undefined;
  }
  if (entryText === undefined) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Entry file "${entryPath}" does not exist.`,
      file: entryPath,
    });
    return undefined;
  }

  started.add(entryPath);
  await load(entryPath, entryText);

  for (const path of [...perFile.keys()].sort()) diagnostics.push(...(perFile.get(path) ?? []));
  if (hasErrors(diagnostics)) return undefined;
  return sortSchemas([...schemas.values()]);
}

function generate(
  schemas: SchemaNode[],
  entryFile: string,
  diagnostics: Diagnostic[],
  options: CompilerOptions,
  deps: PipelineDeps,
): GeneratedFile[] {
  const symbols = buildSymbolTable(schemas, diagnostics);
  const ir = buildIr(schemas, symbols, diagnostics, { entryFile });
  if (!ir || hasErrors(diagnostics)) return [];

  const genOptions: GeneratorOptions = {
    ...(options.runtimeImport !== undefined ? { runtimeImport: options.runtimeImport } : {}),
    ...(options.rootModuleName !== undefined ? { rootModuleName: options.rootModuleName } : {}),
    ...(options.printer !== undefined ? { printer: options.printer } : {}),
  };
  const targets: TargetName[] = [...new Set<TargetName>(options.targets ?? ['ts'])];
  return targets.flatMap((t) => deps.generators[t](ir, genOptions));
}

async function compileWith(
  host: SourceHost,
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> {
  const diagnostics: Diagnostic[] = [];
  const schemas = await loadSchemas(entryFile, host, diagnostics, options);
  if (!schemas) return { diagnostics, artifacts: [] };

  const artifacts = generate(schemas, host.normalize(entryFile), diagnostics, options, deps);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };
  return { diagnostics, artifacts };
}

/**
 * Compile a schema starting from an entry file on disk.
 *
 * Artifacts are produced in memory via `deps.generators`; nothing is written.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => compileWith(fileSystemHost, entryFile, options, deps);

export interface SourceCompilerOptions extends CompilerOptions {
  /** Entry schema. Default: the first file given. */
  entryFile?: string;
}

/**
 * Compile schemas held in memory. Includes resolve against the same map.
 */
export async function compileSources(
  files: SourceFiles,
  options: SourceCompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> {
  const first = isSourceMap(files) ? [...files.keys()][0] : Object.keys(files)[0];
  const entryFile = options.entryFile ?? first;
  if (entryFile === undefined) {
    return {
      diagnostics: [
        { id: DiagnosticIds.IoReadFailed, severity: 'error', message: 'No schema sources given.', file: '' },
      ],
      artifacts: [],
    };
  }
  return compileWith(memoryHost(files), entryFile, options, deps);
}
