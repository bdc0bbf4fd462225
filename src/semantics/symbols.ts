import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { DeclNode, NamespacePath, SchemaNode, SourceSpan } from '../frontend/ast.js';
import type { DeclId } from '../ir/types.js';

/**
 * One declaration in the arena.
 */
export interface SymbolEntry {
  readonly id: DeclId;
  readonly fqn: string;
  readonly decl: DeclNode;
}

/**
 * Fully-qualified name -> declaration mapping across every merged schema file.
 *
 * Derived from the AST without mutating it. Ids are dense, start at 0 and are assigned in
 * (file path, source order) order, so they do not depend on the order files were loaded in.
 */
export interface SymbolTable {
  readonly entries: readonly SymbolEntry[];
  readonly byName: ReadonlyMap<string, DeclId>;
}

export type Resolution =
  | { kind: 'resolved'; id: DeclId }
  | { kind: 'unresolved'; tried: string[] }
  | { kind: 'ambiguous'; relative: string; absolute: string };

export function qualifiedName(namespace: NamespacePath, name: string): string {
  return namespace.length > 0 ? `${namespace.join('.')}.${name}` : name;
}

function isDecl(item: SchemaNode['items'][number]): item is DeclNode {
  return (
    item.kind === 'EnumDecl' ||
    item.kind === 'UnionDecl' ||
    item.kind === 'StructDecl' ||
    item.kind === 'TableDecl' ||
    item.kind === 'RpcServiceDecl'
  );
}

/** `file:line:column` of a span's start. */
export function at(s: SourceSpan): string {
  return `${s.file}:${s.start.line}:${s.start.column}`;
}

/**
 * Files sorted by path; the merge order every later phase relies on.
 */
export function sortSchemas(schemas: readonly SchemaNode[]): SchemaNode[] {
  return [...schemas].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Build the global symbol table. Every duplicate fully-qualified name is reported; the first
 * declaration (in merge order) keeps the name.
 */
export function buildSymbolTable(
  schemas: readonly SchemaNode[],
  diagnostics: Diagnostic[],
): SymbolTable {
  const entries: SymbolEntry[] = [];
  const byName = new Map<string, DeclId>();

  for (const schema of sortSchemas(schemas)) {
    for (const item of schema.items) {
      if (!isDecl(item)) continue;
      const fqn = qualifiedName(item.namespace, item.name);
      const prev = byName.get(fqn);
      if (prev !== undefined) {
        const first = entries[prev];
        diagnostics.push({
          id: DiagnosticIds.DuplicateDeclaration,
          severity: 'error',
          message: `Duplicate declaration "${fqn}"${first ? ` (first declared at ${at(first.decl.span)})` : ''}.`,
          file: item.span.file,
          line: item.span.start.line,
          column: item.span.start.column,
        });
        continue;
      }
      const id = entries.length;
      entries.push({ id, fqn, decl: item });
      byName.set(fqn, id);
    }
  }

  return { entries, byName };
}

/**
 * Resolve a type name written inside `namespace`.
 *
 * Search order: `namespace.name`, then each enclosing namespace, then `name` as written. The
 * first hit wins, except that a qualified name which resolves both relative to the namespace
 * chain and as a literal fully-qualified path to two different declarations is ambiguous.
 */
export function resolveTypeName(
  table: SymbolTable,
  name: string,
  namespace: NamespacePath,
): Resolution {
  const tried: string[] = [];
  for (let depth = namespace.length; depth > 0; depth--) {
    const candidate = qualifiedName(namespace.slice(0, depth), name);
    tried.push(candidate);
    const id = table.byName.get(candidate);
    if (id === undefined) continue;
    if (name.includes('.')) {
      const literal = table.byName.get(name);
      if (literal !== undefined && literal !== id) {
        return { kind: 'ambiguous', relative: candidate, absolute: name };
      }
    }
    return { kind: 'resolved', id };
  }
  tried.push(name);
  const id = table.byName.get(name);
  return id !== undefined ? { kind: 'resolved', id } : { kind: 'unresolved', tried };
}

/**
 * {@link resolveTypeName}, reporting `UnresolvedType` / `AmbiguousType` on failure.
 */
export function resolveOrReport(
  table: SymbolTable,
  name: string,
  namespace: NamespacePath,
  where: SourceSpan,
  diagnostics: Diagnostic[],
): DeclId | undefined {
  const res = resolveTypeName(table, name, namespace);
  if (res.kind === 'resolved') return res.id;
  const loc = { file: where.file, line: where.start.line, column: where.start.column };
  if (res.kind === 'ambiguous') {
    diagnostics.push({
      id: DiagnosticIds.AmbiguousType,
      severity: 'error',
      message: `Type reference "${name}" is ambiguous: matches both "${res.relative}" and "${res.absolute}".`,
      ...loc,
    });
    return undefined;
  }
  diagnostics.push({
    id: DiagnosticIds.UnresolvedType,
    severity: 'error',
    message: `Unknown type "${name}" (tried ${res.tried.map((t) => `"${t}"`).join(', ')}).`,
    ...loc,
  });
  return undefined;
}

/**
 * Find struct containment cycles by depth-first traversal over struct-typed struct fields.
 *
 * Each distinct cycle is reported once, at the declaration where the traversal entered it, with
 * the full path (`A -> B -> A`). Returns the ids of every struct on some cycle.
 */
export function detectStructCycles(table: SymbolTable, diagnostics: Diagnostic[]): Set<DeclId> {
  const edges = new Map<DeclId, DeclId[]>();
  for (const entry of table.entries) {
    if (entry.decl.kind !== 'StructDecl') continue;
    const out: DeclId[] = [];
    for (const field of entry.decl.fields) {
      if (field.typeExpr.kind !== 'NamedType') continue;
      const res = resolveTypeName(table, field.typeExpr.name, entry.decl.namespace);
      if (res.kind !== 'resolved') continue;
      if (table.entries[res.id]?.decl.kind === 'StructDecl') out.push(res.id);
    }
    edges.set(entry.id, out);
  }

  const state = new Map<DeclId, 'visiting' | 'done'>();
  const onCycle = new Set<DeclId>();
  const reported = new Set<string>();
  const fqn = (id: DeclId): string => table.entries[id]?.fqn ?? `#${id}`;

  const visit = (id: DeclId, stack: DeclId[]): void => {
    state.set(id, 'visiting');
    stack.push(id);
    for (const next of edges.get(id) ?? []) {
      const s = state.get(next);
      if (s === 'done') continue;
      if (s === 'visiting') {
        const cycle = stack.slice(stack.indexOf(next));
        for (const member of cycle) onCycle.add(member);
        const key = [...cycle].sort((a, b) => a - b).join(',');
        if (reported.has(key)) continue;
        reported.add(key);
        const head = table.entries[next];
        if (!head) continue;
        const path = [...cycle, next].map(fqn).join(' -> ');
        diagnostics.push({
          id: DiagnosticIds.StructCycle,
          severity: 'error',
          message: `Struct "${head.fqn}" contains itself: ${path}.`,
          file: head.decl.span.file,
          line: head.decl.span.start.line,
          column: head.decl.span.start.column,
        });
        continue;
      }
      visit(next, stack);
    }
    stack.pop();
    state.set(id, 'done');
  };

  for (const id of edges.keys()) {
    if (!state.has(id)) visit(id, []);
  }
  return onCycle;
}
