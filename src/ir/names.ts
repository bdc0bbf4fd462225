import type { IrTableField } from './types.js';

/** Accessor-class members a field method must not shadow. */
const RESERVED_MEMBERS: ReadonlySet<string> = new Set(['bb', 'bbPos', 'unpack', 'constructor']);

/**
 * `snake_case` / `PascalCase` schema names to lower camelCase member names.
 */
export function camelCase(name: string): string {
  const joined = name.replace(/_+([a-zA-Z0-9])/g, (_m, c: string) => c.toUpperCase());
  return joined.charAt(0).toLowerCase() + joined.slice(1);
}

export function upperSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toUpperCase();
}

/**
 * Name of a field's accessor method and object-API property.
 */
export function memberName(name: string): string {
  const camel = camelCase(name);
  return RESERVED_MEMBERS.has(camel) ? `${camel}_` : camel;
}

/**
 * Every accessor-class member a table field occupies: its own accessor, plus `<x>Length` and
 * `<x>Array` for vectors or `<x>Type` for unions.
 */
export function tableFieldMembers(field: Pick<IrTableField, 'name' | 'type' | 'typeSlot'>): string[] {
  const name = memberName(field.name);
  if (field.type.kind === 'Vector') return [name, `${name}Length`, `${name}Array`];
  if (field.typeSlot !== undefined) return [name, `${name}Type`];
  return [name];
}
