import { describe, expect, it } from 'vitest';
import { readFile, readdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Builder, ByteBuffer } from '../src/runtime/index.js';
import { hex } from './test-helpers.js';

function helloRequest(builder: Builder): Uint8Array {
  const name = builder.createString('world');
  builder.startTable(1);
  builder.addFieldOffset(0, name);
  const root = builder.endTable();
  builder.finish(root);
  return builder.asUint8Array();
}

function paint(builder: Builder, color: number, fileIdentifier?: string, sizePrefix = false): Uint8Array {
  builder.startTable(1);
  builder.addFieldInt32(0, color, 0);
  const root = builder.endTable();
  builder.finish(root, fileIdentifier, sizePrefix);
  return builder.asUint8Array();
}

describe('Builder', () => {
  it('writes a table with one string field', () => {
    expect(hex(helloRequest(new Builder()))).toBe(
      '0c 00 00 00 00 00 06 00 08 00 04 00 06 00 00 00 04 00 00 00 05 00 00 00 77 6f 72 6c 64 00 00 00',
    );
  });

  it('writes an int field and omits it at its default', () => {
    expect(hex(paint(new Builder(), 1))).toBe('0c 00 00 00 00 00 06 00 08 00 04 00 06 00 00 00 01 00 00 00');
    expect(hex(paint(new Builder(), 0))).toBe('08 00 00 00 04 00 04 00 04 00 00 00');
  });

  it('writes default values when forced', () => {
    expect(hex(paint(new Builder({ forceDefaults: true }), 0))).toBe(
      '0c 00 00 00 00 00 06 00 08 00 04 00 06 00 00 00 00 00 00 00',
    );
  });

  it('omits a NaN field whose default is NaN', () => {
    const table = (value: number): string => {
      const builder = new Builder();
      builder.startTable(1);
      builder.addFieldFloat32(0, value, Number.NaN);
      builder.finish(builder.endTable());
      return hex(builder.asUint8Array());
    };
    expect(table(Number.NaN)).toBe('08 00 00 00 04 00 04 00 04 00 00 00');
    expect(table(0)).toBe('0c 00 00 00 00 00 06 00 08 00 04 00 06 00 00 00 00 00 00 00');
  });

  it('places the file identifier after the root offset', () => {
    const bytes = paint(new Builder(), 1, 'TEST');
    expect(bytes).toHaveLength(24);
    expect(hex(bytes)).toBe('10 00 00 00 54 45 53 54 00 00 06 00 08 00 04 00 06 00 00 00 01 00 00 00');
    const bb = new ByteBuffer(bytes);
    expect(bb.rootTable()).toBe(16);
    expect(bb.hasIdentifier('TEST')).toBe(true);
    expect(bb.hasIdentifier('NOPE')).toBe(false);
  });

  it('prefixes the buffer with its size', () => {
    const bytes = paint(new Builder(), 1, undefined, true);
    expect(hex(bytes)).toBe('14 00 00 00 0c 00 00 00 00 00 06 00 08 00 04 00 06 00 00 00 01 00 00 00');
    const bb = new ByteBuffer(bytes);
    expect(bb.readUint32(0)).toBe(bytes.length - 4);
    expect(bb.rootTable(true)).toBe(16);
    expect(bb.readInt32(bb.rootTable(true) + bb.fieldOffset(bb.rootTable(true), 4))).toBe(1);
  });

  it('shares one vtable between tables with the same shape', () => {
    const builder = new Builder();
    builder.startTable(2);
    builder.addFieldInt32(0, 1, 0);
    builder.addFieldInt32(1, 2, 0);
    const first = builder.endTable();
    expect(first).toBe(12);
    expect(builder.offset()).toBe(20);

    builder.startTable(2);
    builder.addFieldInt32(0, 3, 0);
    builder.addFieldInt32(1, 4, 0);
    const second = builder.endTable();
    expect(second).toBe(32);
    expect(builder.offset()).toBe(32);

    builder.finish(second);
    const bytes = builder.asUint8Array();
    const bb = new ByteBuffer(bytes);
    const root = bb.rootTable();
    expect(root).toBe(4);
    expect(bb.readInt32(root)).toBe(-12);
    const firstPos = bytes.length - first;
    expect(firstPos - bb.readInt32(firstPos)).toBe(root - bb.readInt32(root));
    expect([bb.readInt32(root + bb.fieldOffset(root, 4)), bb.readInt32(root + bb.fieldOffset(root, 6))]).toEqual([3, 4]);
    expect([bb.readInt32(firstPos + bb.fieldOffset(firstPos, 4)), bb.readInt32(firstPos + bb.fieldOffset(firstPos, 6))]).toEqual([1, 2]);
  });

  it('writes scalar vectors back to front with their length', () => {
    const builder = new Builder();
    const vec = builder.createScalarVector('int16', [1, 2, 3]);
    builder.finish(vec);
    const bytes = builder.asUint8Array();
    expect(hex(bytes)).toBe('04 00 00 00 03 00 00 00 01 00 02 00 03 00 00 00');
    const bb = new ByteBuffer(bytes);
    expect(bb.vectorLength(0)).toBe(3);
    const start = bb.vectorStart(0);
    expect([0, 1, 2].map((i) => bb.readInt16(start + 2 * i))).toEqual([1, 2, 3]);
  });

  it('produces the same bytes when it has to grow', () => {
    expect(hex(helloRequest(new Builder({ initialSize: 1 })))).toBe(hex(helloRequest(new Builder())));
  });

  it('starts over after reset', () => {
    const builder = new Builder();
    const first = paint(builder, 1);
    builder.reset();
    expect(paint(builder, 1)).toEqual(first);
  });

  it('reports a missing required field by name', () => {
    const builder = new Builder();
    builder.startTable(1);
    const table = builder.endTable();
    expect(() => builder.requiredField(table, 4, 'name')).toThrow(new TypeError('Missing required field "name"'));
  });

  it('accepts a required field that was written', () => {
    const builder = new Builder();
    const name = builder.createString('x');
    builder.startTable(1);
    builder.addFieldOffset(0, name);
    const table = builder.endTable();
    expect(() => builder.requiredField(table, 4, 'name')).not.toThrow();
  });

  it('refuses to start an object inside an open table', () => {
    const builder = new Builder();
    builder.startTable(1);
    expect(() => builder.createString('nested')).toThrow(
      'Builder: objects cannot be created while a table or vector is open',
    );
  });

  it('rejects slots outside the table', () => {
    const builder = new Builder();
    builder.startTable(1);
    expect(() => builder.addFieldInt32(3, 1, 0)).toThrow('Builder: slot 3 is outside the table (1 slots)');
  });

  it('insists structs are claimed right after they are written', () => {
    const builder = new Builder();
    builder.startTable(1);
    builder.addInt32(5);
    const structAt = builder.offset();
    builder.addInt8(1);
    expect(() => builder.addFieldStruct(0, structAt)).toThrow(
      'Builder: structs must be written inline, right before addFieldStruct',
    );
  });

  it('has no bytes to hand out before finish', () => {
    expect(() => new Builder().asUint8Array()).toThrow('Builder: asUint8Array before finish');
  });

  it('rejects file identifiers of the wrong length', () => {
    const builder = new Builder();
    builder.startTable(0);
    const root = builder.endTable();
    expect(() => builder.finish(root, 'AB')).toThrow(new RangeError('File identifier must be 4 characters: "AB"'));
  });
});

describe('ByteBuffer', () => {
  it('reads strings through their uoffset', () => {
    const bb = new ByteBuffer(helloRequest(new Builder()));
    const root = bb.rootTable();
    expect(root).toBe(12);
    const field = bb.fieldOffset(root, 4);
    expect(field).toBe(4);
    expect(bb.readString(root + field)).toBe('world');
    expect(bb.vectorLength(root + field)).toBe(5);
  });

  it('reports absent fields as offset 0', () => {
    const bb = new ByteBuffer(paint(new Builder(), 0));
    expect(bb.fieldOffset(bb.rootTable(), 4)).toBe(0);
  });

  it('only compares four-character identifiers', () => {
    const bb = new ByteBuffer(paint(new Builder(), 1, 'TEST'));
    expect(bb.identifier()).toBe('TEST');
    expect(() => bb.hasIdentifier('TES')).toThrow(RangeError);
  });

  it('reads 64-bit values as bigint', () => {
    const bytes = new Uint8Array(8);
    const bb = new ByteBuffer(bytes);
    bb.writeInt64(0, -2n);
    expect(bb.readInt64(0)).toBe(-2n);
    expect(bb.readUint64(0)).toBe(0xfffffffffffffffen);
    expect(bb.readScalar('int64', 0)).toBe(-2n);
  });
});

describe('runtime sources', () => {
  const runtimeDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'src', 'runtime');

  it('import nothing from outside the runtime directory', async () => {
    const files = (await readdir(runtimeDir)).filter((f) => f.endsWith('.ts')).sort();
    expect(files).toContain('byte-buffer.ts');
    const outside: string[] = [];
    for (const file of files) {
      const source = await readFile(join(runtimeDir, file), 'utf8');
      for (const m of source.matchAll(/from '([^']+)'/g)) {
        const spec = m[1] ?? '';
        if (!spec.startsWith('./') && !spec.startsWith('node:')) outside.push(`${file}: ${spec}`);
      }
    }
    expect(outside).toEqual([]);
  });
});
