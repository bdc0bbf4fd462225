import type { DeclId, ScalarKind } from '../ir/types.js';
import { scalarSize } from '../ir/types.js';

export interface TypeStorageInfo {
  size: number;
  alignment: number;
}

export interface FieldPlacement {
  offset: number;
  size: number;
  /** Bytes between the end of this field and the next field (or the struct end). */
  padding: number;
}

export interface StructLayout {
  fields: FieldPlacement[];
  size: number;
  alignment: number;
}

function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

/**
 * Lay out struct fields in declaration order.
 *
 * Each field goes at the smallest offset at or after the running offset that is a multiple of
 * its own alignment; the struct is then padded to a multiple of its alignment, which is the
 * largest field alignment (raised to `forceAlign` when given). Fields are never reordered.
 */
export function computeStructLayout(
  fields: readonly TypeStorageInfo[],
  forceAlign?: number,
): StructLayout {
  let offset = 0;
  let alignment = 1;
  const placed: FieldPlacement[] = [];
  for (const f of fields) {
    offset = alignUp(offset, f.alignment);
    placed.push({ offset, size: f.size, padding: 0 });
    offset += f.size;
    if (f.alignment > alignment) alignment = f.alignment;
  }
  if (forceAlign !== undefined && forceAlign > alignment) alignment = forceAlign;
  const size = alignUp(offset, alignment);
  for (let i = 0; i < placed.length; i++) {
    const cur = placed[i]!;
    const nextOffset = placed[i + 1]?.offset ?? size;
    cur.padding = nextOffset - (cur.offset + cur.size);
  }
  return { fields: placed, size, alignment };
}

export function scalarStorage(scalar: ScalarKind): TypeStorageInfo {
  const size = scalarSize(scalar);
  return { size, alignment: size };
}

/**
 * What the layout pass needs to know about a struct field's type.
 */
export type StructFieldShape =
  | { kind: 'inline'; storage: TypeStorageInfo }
  | { kind: 'struct'; ref: DeclId }
  | { kind: 'invalid' };

export interface StructShape {
  fields: readonly StructFieldShape[];
  forceAlign?: number;
}

/**
 * Compute layouts for a set of structs that may nest each other.
 *
 * Structs are resolved on demand and memoised; a struct that (transitively) contains itself or
 * contains an invalid field gets no layout. Cycle reporting is the resolver's job, so nothing is
 * diagnosed here.
 */
export function layoutStructs(shapes: ReadonlyMap<DeclId, StructShape>): Map<DeclId, StructLayout> {
  const memo = new Map<DeclId, StructLayout>();
  const visiting = new Set<DeclId>();

  const layoutOf = (id: DeclId): StructLayout | undefined => {
    const cached = memo.get(id);
    if (cached) return cached;
    const shape = shapes.get(id);
    if (!shape || visiting.has(id)) return undefined;
    visiting.add(id);
    try {
      const infos: TypeStorageInfo[] = [];
      for (const f of shape.fields) {
        if (f.kind === 'invalid') return undefined;
        if (f.kind === 'inline') {
          infos.push(f.storage);
          continue;
        }
        const nested = layoutOf(f.ref);
        if (!nested) return undefined;
        infos.push({ size: nested.size, alignment: nested.alignment });
      }
      const layout = computeStructLayout(infos, shape.forceAlign);
      memo.set(id, layout);
      return layout;
    } finally {
      visiting.delete(id);
    }
  };

  for (const id of shapes.keys()) layoutOf(id);
  return memo;
}
