import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { DiagnosticId } from '../src/diagnostics/types.js';
import { declOf } from '../src/ir/types.js';
import { buildSchema, checkText, declId, irOf } from './test-helpers.js';

function errorsOf(text: string): Array<[DiagnosticId, string]> {
  return checkText(text).diagnostics.map((d) => [d.id, d.message]);
}

describe('checker diagnostics', () => {
  it.each<[string, string, DiagnosticId, string]>([
    ['empty enum', 'enum E : int {}', DiagnosticIds.InvalidEnum, 'Enum "E" has no values.'],
    [
      'descending enum values',
      'enum E : byte { A = 2, B = 1 }',
      DiagnosticIds.InvalidEnum,
      'Enum values must be ascending: "B" = 1 follows 2.',
    ],
    [
      'non-integral enum',
      'enum E : float { A }',
      DiagnosticIds.InvalidEnum,
      'Enum "E" must have an integral underlying type.',
    ],
    [
      'enum value out of range',
      'enum E : ubyte { A = 256 }',
      DiagnosticIds.InvalidEnum,
      'Value 256 of "A" is out of range for uint8.',
    ],
    [
      'bit flag past the width',
      'enum E : ubyte (bit_flags) { A = 8 }',
      DiagnosticIds.InvalidEnum,
      'Bit position 8 of "A" does not fit in uint8.',
    ],
    ['empty union', 'union U {}', DiagnosticIds.InvalidUnionVariant, 'Union "U" has no variants.'],
    [
      'struct union variant',
      'struct S { x: int; }\nunion U { S }',
      DiagnosticIds.InvalidUnionVariant,
      'Union "U" variant "S" must be a table.',
    ],
    [
      'struct default',
      'struct S { x: int = 1; }',
      DiagnosticIds.InvalidStructField,
      'Struct field "S.x" cannot have a default value.',
    ],
    [
      'string in a struct',
      'struct S { name: string; }',
      DiagnosticIds.InvalidStructField,
      'Struct field "S.name" must be a scalar, enum or struct.',
    ],
    [
      'duplicate field',
      'table T { a: int; a: short; }',
      DiagnosticIds.DuplicateField,
      'Field "a" is declared more than once in "T".',
    ],
    [
      'partial ids',
      'table T { a: int (id: 0); b: int; }',
      DiagnosticIds.DuplicateOrGappedFieldId,
      'Either all fields of "T" must have an id attribute or none.',
    ],
    [
      'gapped ids',
      'table T { a: int (id: 0); b: int (id: 2); }',
      DiagnosticIds.DuplicateOrGappedFieldId,
      'Field ids of "T" must be contiguous from 0; missing 1.',
    ],
    [
      'out of range default',
      'table T { a: byte = 300; }',
      DiagnosticIds.InvalidDefaultForType,
      'Invalid default for "T.a": 300 is out of range for int8.',
    ],
    [
      'string default on an int',
      'table T { a: int = "x"; }',
      DiagnosticIds.InvalidDefaultForType,
      'Invalid default for "T.a": "x" is not an integer.',
    ],
    [
      'enum without zero',
      'enum E : byte { A = 1 }\ntable T { e: E; }',
      DiagnosticIds.InvalidDefaultForType,
      'Invalid default for "T.e": enum "E" has no value 0, so an explicit default is required.',
    ],
    [
      'unknown enum default',
      'enum E : byte { A }\ntable T { e: E = B; }',
      DiagnosticIds.InvalidDefaultForType,
      'Invalid default for "T.e": "B" is not a value of enum "E".',
    ],
    [
      'required scalar',
      'table T { a: int (required); }',
      DiagnosticIds.InvalidRequired,
      'Scalar field "T.a" cannot be required; it always reads as its default.',
    ],
    [
      'struct rpc request',
      'table R { x: int; }\nstruct S { x: int; }\nrpc_service Svc { Get(S): R; }',
      DiagnosticIds.NonTableRpcType,
      'RPC request type "S" must be a table.',
    ],
    [
      'struct root type',
      'struct S { x: int; }\nroot_type S;',
      DiagnosticIds.InvalidRootType,
      'root_type "S" must be a table.',
    ],
    [
      'short file identifier',
      'table T {}\nfile_identifier "ab";',
      DiagnosticIds.InvalidFileIdentifier,
      'file_identifier must be exactly 4 ASCII characters, got "ab".',
    ],
    [
      'undeclared attribute',
      'table T { a: int (priority: 1); }',
      DiagnosticIds.UnknownAttribute,
      'Unknown attribute "priority"; declare it with `attribute "priority";` first.',
    ],
    [
      'unknown streaming mode',
      'table R {}\nrpc_service S { M(R): R (streaming: "sideways"); }',
      DiagnosticIds.UnknownAttributeValue,
      'Unknown streaming mode "sideways" on "S.M"; expected "none", "server", "client" or "bidi".',
    ],
    [
      'bad force_align',
      'struct S (force_align: 3) { x: int; }',
      DiagnosticIds.UnknownAttributeValue,
      'force_align on "S" must be a power of two between 1 and 16.',
    ],
    [
      'nested vector',
      'table T { v: [[int]]; }',
      DiagnosticIds.InvalidVectorElement,
      'Nested vectors are not supported; wrap the inner vector in a table.',
    ],
    [
      'vector of unions',
      'table A {}\nunion U { A }\ntable T { v: [U]; }',
      DiagnosticIds.InvalidVectorElement,
      'Vectors of unions are not supported.',
    ],
    [
      'declaration named like a union type enum',
      'table A {}\nenum PetType : byte { X }\nunion Pet { A }\ntable T { p: Pet; }',
      DiagnosticIds.DuplicateDeclaration,
      'Union "Pet" needs the name "PetType" for its type enum, but it is already declared at test.fbs:2:1.',
    ],
    [
      'field shadowing a vector length accessor',
      'table T { x: [int]; x_length: int; }',
      DiagnosticIds.DuplicateField,
      'Fields "T.x" and "T.x_length" both generate the accessor "xLength()".',
    ],
    [
      'field shadowing a vector array accessor',
      'table T { x_array: int; x: [int]; }',
      DiagnosticIds.DuplicateField,
      'Fields "T.x_array" and "T.x" both generate the accessor "xArray()".',
    ],
    [
      'field shadowing a union type accessor',
      'table A {}\nunion U { A }\ntable T { u: U; u_type: int; }',
      DiagnosticIds.DuplicateField,
      'Fields "T.u" and "T.u_type" both generate the accessor "uType()".',
    ],
    [
      'fields with the same camelCase name',
      'table T { a_b: int; aB: int; }',
      DiagnosticIds.DuplicateField,
      'Fields "T.a_b" and "T.aB" both generate the accessor "aB()".',
    ],
    [
      'union at id 0',
      'table A {}\nunion U { A }\ntable T { u: U (id: 0); }',
      DiagnosticIds.DuplicateOrGappedFieldId,
      'Union field "T.u" needs id >= 1; id - 1 holds its type.',
    ],
  ])('rejects %s', (_name, text, id, message) => {
    expect(errorsOf(text)).toEqual([[id, message]]);
  });

  it('collects every error in the unit before giving up', () => {
    const { ir, diagnostics } = checkText(
      'enum E : int {}\ntable T { a: byte = 300; b: Missing; }\nroot_type Nope;\nfile_identifier "toolong";',
    );
    expect(ir).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.line])).toEqual([
      [DiagnosticIds.InvalidEnum, 1],
      [DiagnosticIds.InvalidDefaultForType, 2],
      [DiagnosticIds.UnresolvedType, 2],
      [DiagnosticIds.UnresolvedType, 3],
      [DiagnosticIds.InvalidFileIdentifier, 4],
    ]);
  });

  it('accepts a declared user attribute', () => {
    expect(errorsOf('attribute "priority";\ntable T { a: int (priority: 1); }')).toEqual([]);
  });

  it('lets a deprecated field keep a name a live accessor uses', () => {
    expect(errorsOf('table T { x: [int]; x_length: int (deprecated); }')).toEqual([]);
  });

  it('points at the offending literal', () => {
    const { diagnostics } = checkText('table T {\n  a: byte = 300;\n}');
    expect([diagnostics[0]?.line, diagnostics[0]?.column]).toEqual([2, 13]);
  });
});

describe('IR', () => {
  it('numbers enum values implicitly and shifts bit flags', () => {
    const ir = irOf('enum Level : short { Low, Mid = 5, High }\nenum Perms : ubyte (bit_flags) { Read, Write, Exec = 7 }');
    const level = declOf(ir, declId(ir, 'Level'));
    const perms = declOf(ir, declId(ir, 'Perms'));
    expect(level.kind === 'Enum' ? level.values.map((v) => [v.name, v.value]) : undefined).toEqual([
      ['Low', 0n],
      ['Mid', 5n],
      ['High', 6n],
    ]);
    expect(perms.kind === 'Enum' ? perms.values.map((v) => v.value) : undefined).toEqual([1n, 2n, 128n]);
  });

  it('gives unions a hidden discriminant and two slots per field', () => {
    const ir = irOf('namespace n;\ntable A {}\ntable B {}\nunion Pick { A, n.B }\ntable Holder { x: int; pick: Pick; y: int; }');
    const pick = declOf(ir, declId(ir, 'n.Pick'));
    expect(pick.kind === 'Union' ? pick.discriminant.values.map((v) => [v.name, v.value]) : undefined).toEqual([
      ['NONE', 0n],
      ['A', 1n],
      ['n_B', 2n],
    ]);
    const holder = declOf(ir, declId(ir, 'n.Holder'));
    if (holder.kind !== 'Table') throw new Error('Holder is not a table');
    expect(holder.fields.map((f) => [f.name, f.typeSlot, f.slot])).toEqual([
      ['x', undefined, 0],
      ['pick', 1, 2],
      ['y', undefined, 3],
    ]);
    expect(holder.slotCount).toBe(4);
  });

  it('takes slots from explicit ids', () => {
    const ir = irOf('table A {}\nunion U { A }\ntable T { b: int (id: 2); u: U (id: 1); c: int (id: 3); }');
    const t = declOf(ir, declId(ir, 'T'));
    if (t.kind !== 'Table') throw new Error('T is not a table');
    expect(t.fields.map((f) => [f.name, f.typeSlot, f.slot])).toEqual([
      ['b', undefined, 2],
      ['u', 0, 1],
      ['c', undefined, 3],
    ]);
  });

  it('resolves defaults by field type', () => {
    const ir = irOf(`
enum Color : byte { Red = -1, Green, Blue }
table T {
  flag: bool = 1;
  ratio: float = 2;
  count: ulong = 18446744073709551615;
  color: Color = Blue;
  shade: Color = -1;
  name: string;
}`);
    const t = declOf(ir, declId(ir, 'T'));
    if (t.kind !== 'Table') throw new Error('T is not a table');
    expect(t.fields.map((f) => [f.name, f.defaultValue])).toEqual([
      ['flag', { kind: 'Bool', value: true }],
      ['ratio', { kind: 'Float', value: 2 }],
      ['count', { kind: 'Int', value: 18446744073709551615n }],
      ['color', { kind: 'Int', value: 1n }],
      ['shade', { kind: 'Int', value: -1n }],
      ['name', { kind: 'None' }],
    ]);
  });

  const directiveFiles = {
    'main.fbs': 'table Main {}\nroot_type Main;\nfile_identifier "MAIN";',
    'other.fbs': 'table Other {}\nroot_type Other;\nfile_identifier "OTHR";',
  };

  it('lets the last file in path order win without an entry file', () => {
    const merged = buildSchema(directiveFiles).ir;
    expect(merged?.fileIdentifier).toBe('OTHR');
    expect(merged?.decls.find((d) => d.id === merged.rootType)?.name).toBe('Other');
  });

  it('takes file directives from the entry file only', () => {
    const merged = buildSchema(directiveFiles, { entryFile: 'main.fbs' }).ir;
    expect(merged?.fileIdentifier).toBe('MAIN');
    expect(merged?.decls.find((d) => d.id === merged.rootType)?.name).toBe('Main');
  });

  it('still validates directives in included files', () => {
    const { diagnostics } = buildSchema(
      { 'main.fbs': 'table Main {}\nroot_type Main;', 'lib.fbs': 'file_identifier "bad";' },
      { entryFile: 'main.fbs' },
    );
    expect(diagnostics.map((d) => [d.file, d.message])).toEqual([
      ['lib.fbs', 'file_identifier must be exactly 4 ASCII characters, got "bad".'],
    ]);
  });

  it('is deeply frozen', () => {
    const ir = irOf('table T { a: int; }');
    expect(Object.isFrozen(ir)).toBe(true);
    expect(Object.isFrozen(ir.decls[0])).toBe(true);
  });
});
