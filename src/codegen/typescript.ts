import type {
  DeclId,
  IrDecl,
  IrDefault,
  IrEnum,
  IrNamespace,
  IrRpcMethod,
  IrRpcService,
  IrSchema,
  IrStruct,
  IrTable,
  IrTableField,
  IrType,
  IrUnion,
  ScalarKind,
} from '../ir/types.js';
import {
  declOf,
  inlineScalarOf,
  is64BitScalar,
  scalarSize,
  slotToVtableOffset,
  tableWriteOrder,
} from '../ir/types.js';
import { camelCase, memberName, upperSnakeCase } from '../ir/names.js';
import type { GeneratedFile, GeneratorOptions } from './types.js';
import { CodeWriter } from './writer.js';

export const DEFAULT_RUNTIME_IMPORT = 'fbsgen/runtime';
export const DEFAULT_ROOT_MODULE = 'root';

const HEADER = '// Generated by fbsgen. Do not edit by hand.';
const RUNTIME = 'fb';

const SCALAR_METHOD: Record<ScalarKind, string> = {
  bool: 'Bool',
  int8: 'Int8',
  uint8: 'Uint8',
  int16: 'Int16',
  uint16: 'Uint16',
  int32: 'Int32',
  uint32: 'Uint32',
  int64: 'Int64',
  uint64: 'Uint64',
  float32: 'Float32',
  float64: 'Float64',
};

export function moduleStem(namespace: string, rootModuleName: string): string {
  return namespace.length > 0 ? namespace : rootModuleName;
}

function tsNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return 'Infinity';
  if (value === Number.NEGATIVE_INFINITY) return '-Infinity';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

function tsScalarType(kind: ScalarKind): string {
  if (kind === 'bool') return 'boolean';
  return is64BitScalar(kind) ? 'bigint' : 'number';
}

function tsDefault(kind: ScalarKind, def: IrDefault): string {
  switch (def.kind) {
    case 'Int':
      if (kind === 'bool') return def.value !== 0n ? 'true' : 'false';
      return is64BitScalar(kind) ? `${def.value.toString()}n` : def.value.toString();
    case 'Float':
      return tsNumber(def.value);
    case 'Bool':
      return def.value ? 'true' : 'false';
    case 'None':
      if (kind === 'bool') return 'false';
      return is64BitScalar(kind) ? '0n' : '0';
  }
}

/**
 * One generated module: the declarations of a single namespace, with a typed accessor and
 * encoder API over the buffer runtime.
 */
class TsModule {
  readonly w = new CodeWriter();
  private readonly imports = new Map<string, string>();
  private usesRuntime = false;

  constructor(
    readonly schema: IrSchema,
    private readonly ns: IrNamespace,
    private readonly runtimeImport: string,
    private readonly rootModuleName: string,
  ) {}

  get fileIdentifier(): string | undefined {
    return this.schema.fileIdentifier;
  }

  get fileExtension(): string | undefined {
    return this.schema.fileExtension;
  }

  isRootType(id: DeclId): boolean {
    return this.schema.rootType === id;
  }

  /** Reference to a runtime export. */
  rt(name: string): string {
    this.usesRuntime = true;
    return `${RUNTIME}.${name}`;
  }

  /**
   * Identifier `ident` exported by the module that owns declaration `id`, qualified with an
   * import alias when that module is not this one.
   */
  qualify(id: DeclId, ident: string): string {
    const decl = declOf(this.schema, id);
    const ns = decl.namespace.join('.');
    if (ns === this.ns.name) return ident;
    const stem = moduleStem(ns, this.rootModuleName);
    const alias = `ns_${stem.replace(/[^A-Za-z0-9_$]/g, '_')}`;
    this.imports.set(alias, `./${stem}.js`);
    return `${alias}.${ident}`;
  }

  ref(id: DeclId, suffix = '', prefix = ''): string {
    return this.qualify(id, `${prefix}${declOf(this.schema, id).name}${suffix}`);
  }

  scalarOf(type: IrType): ScalarKind | undefined {
    return inlineScalarOf(this.schema, type);
  }

  declFor(type: IrType): IrDecl | undefined {
    return type.kind === 'Named' ? declOf(this.schema, type.ref) : undefined;
  }

  /** Object-API type of a value. */
  objectType(type: IrType): string {
    switch (type.kind) {
      case 'Scalar':
        return tsScalarType(type.scalar);
      case 'String':
        return 'string';
      case 'Vector':
        return `${this.objectType(type.element)}[]`;
      case 'Named': {
        const decl = declOf(this.schema, type.ref);
        if (decl.kind === 'Struct' || decl.kind === 'Table') return this.ref(decl.id, 'Object');
        return this.ref(decl.id);
      }
    }
  }

  render(): string {
    const head = new CodeWriter();
    head.line(HEADER);
    head.line();
    if (this.usesRuntime) head.line(`import * as ${RUNTIME} from '${this.runtimeImport}';`);
    for (const alias of [...this.imports.keys()].sort()) {
      head.line(`import * as ${alias} from '${this.imports.get(alias) ?? ''}';`);
    }
    return `${head.toString()}\n${this.w.toString()}`;
  }
}

function emitEnum(m: TsModule, e: IrEnum): void {
  const w = m.w;
  w.doc(e.doc);
  if (is64BitScalar(e.underlying)) {
    w.block(`export const ${e.name} = {`, () => {
      for (const v of e.values) {
        w.doc(v.doc);
        w.line(`${v.name}: ${v.value.toString()}n,`);
      }
    }, '} as const;');
    w.line(`export type ${e.name} = bigint;`);
  } else {
    w.block(`export enum ${e.name} {`, () => {
      for (const v of e.values) {
        w.doc(v.doc);
        w.line(`${v.name} = ${v.value.toString()},`);
      }
    });
  }
  w.blank();
  const valueType = is64BitScalar(e.underlying) ? 'bigint' : 'number';
  const suffix = is64BitScalar(e.underlying) ? 'n' : '';
  w.block(`export function nameOf${e.name}(value: ${valueType}): string | undefined {`, () => {
    w.block('switch (value) {', () => {
      for (const v of e.values) w.line(`case ${v.value.toString()}${suffix}:`).line(`  return '${v.name}';`);
      w.line('default:').line('  return undefined;');
    });
  });
  w.blank();
}

function emitUnion(m: TsModule, u: IrUnion): void {
  const w = m.w;
  w.doc(u.doc);
  w.block(`export enum ${u.discriminant.name} {`, () => {
    for (const v of u.discriminant.values) w.line(`${v.name} = ${v.value.toString()},`);
  });
  w.blank();
  w.line(`export type ${u.name} =`);
  u.variants.forEach((v, i) => {
    const end = i === u.variants.length - 1 ? ';' : '';
    w.line(`  | { type: '${v.name}'; value: ${m.ref(v.table, 'Object')} }${end}`);
  });
  w.blank();
  w.line(`export type ${u.name}Accessor = ${u.variants.map((v) => m.ref(v.table)).join(' | ')};`);
  w.blank();
  w.block(`export function encode${u.name}(builder: ${m.rt('Builder')}, value: ${u.name}): number {`, () => {
    w.block('switch (value.type) {', () => {
      for (const v of u.variants) {
        w.line(`case '${v.name}':`);
        w.line(`  return ${m.ref(v.table, '', 'encode')}(builder, value.value);`);
      }
    });
  });
  w.blank();
  w.block(
    `export function unpack${u.name}(accessor: ${u.name}Accessor | null): ${u.name} | null {`,
    () => {
      for (const v of u.variants) {
        w.line(`if (accessor instanceof ${m.ref(v.table)}) return { type: '${v.name}', value: accessor.unpack() };`);
      }
      w.line('return null;');
    },
  );
  w.blank();
}

function emitStruct(m: TsModule, s: IrStruct): void {
  const w = m.w;
  const bb = m.rt('ByteBuffer');
  w.doc(s.doc);
  w.block(`export class ${s.name} {`, () => {
    w.line(`constructor(readonly bb: ${bb}, readonly bbPos: number) {}`);
    for (const f of s.fields) {
      w.blank();
      w.doc(f.doc);
      const name = memberName(f.name);
      const nested = m.declFor(f.type);
      const pos = f.offset === 0 ? 'this.bbPos' : `this.bbPos + ${f.offset}`;
      if (nested?.kind === 'Struct') {
        w.block(`${name}(): ${m.ref(nested.id)} {`, () => {
          w.line(`return new ${m.ref(nested.id)}(this.bb, ${pos});`);
        });
        continue;
      }
      const kind = m.scalarOf(f.type) ?? 'uint8';
      w.block(`${name}(): ${m.objectType(f.type)} {`, () => {
        w.line(`return this.bb.read${SCALAR_METHOD[kind]}(${pos});`);
      });
    }
    w.blank();
    w.block(`unpack(): ${s.name}Object {`, () => {
      w.block('return {', () => {
        for (const f of s.fields) {
          const name = memberName(f.name);
          const nested = m.declFor(f.type)?.kind === 'Struct';
          w.line(`${name}: this.${name}()${nested ? '.unpack()' : ''},`);
        }
      }, '};');
    });
  });
  w.blank();
  w.block(`export interface ${s.name}Object {`, () => {
    for (const f of s.fields) w.line(`${memberName(f.name)}: ${m.objectType(f.type)};`);
  });
  w.blank();
  w.block(`export function write${s.name}(builder: ${m.rt('Builder')}, value: ${s.name}Object): number {`, () => {
    w.line(`builder.prep(${s.alignment}, ${s.size});`);
    for (let i = s.fields.length - 1; i >= 0; i--) {
      const f = s.fields[i];
      if (!f) continue;
      if (f.padding > 0) w.line(`builder.pad(${f.padding});`);
      const name = memberName(f.name);
      const nested = m.declFor(f.type);
      if (nested?.kind === 'Struct') {
        w.line(`${m.ref(nested.id, '', 'write')}(builder, value.${name});`);
      } else {
        w.line(`builder.write${SCALAR_METHOD[m.scalarOf(f.type) ?? 'uint8']}(value.${name});`);
      }
    }
    w.line('return builder.offset();');
  });
  w.blank();
}

interface VectorElement {
  size: number;
  type: string;
  read: (pos: string) => string;
  /** `unpack()` is needed to reach the object form. */
  accessor: boolean;
}

function vectorElement(m: TsModule, element: IrType): VectorElement {
  const kind = m.scalarOf(element);
  if (kind) {
    return {
      size: scalarSize(kind),
      type: m.objectType(element),
      read: (pos) => `this.bb.read${SCALAR_METHOD[kind]}(${pos})`,
      accessor: false,
    };
  }
  const decl = m.declFor(element);
  if (decl?.kind === 'Struct') {
    const cls = m.ref(decl.id);
    return { size: decl.size, type: cls, read: (pos) => `new ${cls}(this.bb, ${pos})`, accessor: true };
  }
  if (decl?.kind === 'Table') {
    const cls = m.ref(decl.id);
    return {
      size: 4,
      type: cls,
      read: (pos) => `new ${cls}(this.bb, this.bb.indirect(${pos}))`,
      accessor: true,
    };
  }
  return { size: 4, type: 'string', read: (pos) => `this.bb.readString(${pos})`, accessor: false };
}

function emitTableAccessor(m: TsModule, t: IrTable, f: IrTableField): string {
  const w = m.w;
  const name = memberName(f.name);
  const vt = slotToVtableOffset(f.slot);
  const lookup = `const o = this.bb.fieldOffset(this.bbPos, ${vt});`;
  w.blank();
  w.doc(f.doc);

  const kind = m.scalarOf(f.type);
  if (kind) {
    w.block(`${name}(): ${m.objectType(f.type)} {`, () => {
      w.line(lookup);
      w.line(`return o ? this.bb.read${SCALAR_METHOD[kind]}(this.bbPos + o) : ${tsDefault(kind, f.defaultValue)};`);
    });
    return `this.${name}()`;
  }

  if (f.type.kind === 'String') {
    w.block(`${name}(): string | null {`, () => {
      w.line(lookup);
      w.line('return o ? this.bb.readString(this.bbPos + o) : null;');
    });
    return `this.${name}()`;
  }

  if (f.type.kind === 'Vector') {
    const el = vectorElement(m, f.type.element);
    w.block(`${name}(index: number): ${el.type} | null {`, () => {
      w.line(lookup);
      w.line(`return o ? ${el.read(`this.bb.vectorStart(this.bbPos + o) + index * ${el.size}`)} : null;`);
    });
    w.blank();
    w.block(`${name}Length(): number {`, () => {
      w.line(lookup);
      w.line('return o ? this.bb.vectorLength(this.bbPos + o) : 0;');
    });
    w.blank();
    w.block(`${name}Array(): ${el.type}[] | null {`, () => {
      w.line(lookup);
      w.line('if (!o) return null;');
      w.line('const start = this.bb.vectorStart(this.bbPos + o);');
      w.line(`const out: ${el.type}[] = [];`);
      w.block('for (let i = 0, n = this.bb.vectorLength(this.bbPos + o); i < n; i++) {', () => {
        w.line(`out.push(${el.read(`start + i * ${el.size}`)});`);
      });
      w.line('return out;');
    });
    return el.accessor ? `this.${name}Array()?.map((v) => v.unpack()) ?? null` : `this.${name}Array()`;
  }

  const decl = m.declFor(f.type);
  if (decl?.kind === 'Struct') {
    w.block(`${name}(): ${m.ref(decl.id)} | null {`, () => {
      w.line(lookup);
      w.line(`return o ? new ${m.ref(decl.id)}(this.bb, this.bbPos + o) : null;`);
    });
    return `this.${name}()?.unpack() ?? null`;
  }
  if (decl?.kind === 'Table') {
    w.block(`${name}(): ${m.ref(decl.id)} | null {`, () => {
      w.line(lookup);
      w.line(`return o ? new ${m.ref(decl.id)}(this.bb, this.bb.indirect(this.bbPos + o)) : null;`);
    });
    return `this.${name}()?.unpack() ?? null`;
  }
  if (decl?.kind === 'Union' && f.typeSlot !== undefined) {
    const tagType = m.ref(decl.id, 'Type');
    w.block(`${name}Type(): ${tagType} {`, () => {
      w.line(`const o = this.bb.fieldOffset(this.bbPos, ${slotToVtableOffset(f.typeSlot ?? 0)});`);
      w.line('return o ? this.bb.readUint8(this.bbPos + o) : 0;');
    });
    w.blank();
    w.block(`${name}(): ${m.ref(decl.id, 'Accessor')} | null {`, () => {
      w.line(lookup);
      w.line('if (!o) return null;');
      w.line('const pos = this.bb.unionTable(this.bbPos + o);');
      w.block(`switch (this.${name}Type()) {`, () => {
        for (const v of decl.variants) {
          w.line(`case ${tagType}.${v.name}:`);
          w.line(`  return new ${m.ref(v.table)}(this.bb, pos);`);
        }
        w.line('default:');
        w.line('  return null;');
      });
    });
    return `${m.ref(decl.id, '', 'unpack')}(this.${name}())`;
  }
  throw new Error(`Unsupported field type in ${t.fqn}.${f.name}`);
}

function isOutOfLine(m: TsModule, type: IrType): boolean {
  if (type.kind === 'String' || type.kind === 'Vector') return true;
  const decl = m.declFor(type);
  return decl?.kind === 'Table' || decl?.kind === 'Union';
}

function childExpr(m: TsModule, type: IrType, value: string): string {
  if (type.kind === 'String') return `builder.createString(${value})`;
  if (type.kind === 'Vector') {
    const element = type.element;
    const kind = m.scalarOf(element);
    if (kind) return `builder.createScalarVector('${kind}', ${value})`;
    if (element.kind === 'String') {
      return `builder.createOffsetVector(${value}.map((v) => builder.createString(v)))`;
    }
    const decl = m.declFor(element);
    if (decl?.kind === 'Struct') {
      return `builder.createStructVector(${decl.size}, ${decl.alignment}, ${value}, ${m.ref(decl.id, '', 'write')})`;
    }
    if (decl?.kind === 'Table') {
      return `builder.createOffsetVector(${value}.map((v) => ${m.ref(decl.id, '', 'encode')}(builder, v)))`;
    }
  }
  const decl = m.declFor(type);
  if (decl) return `${m.ref(decl.id, '', 'encode')}(builder, ${value})`;
  return '0';
}

function emitTable(m: TsModule, t: IrTable): void {
  const w = m.w;
  const live = t.fields.filter((f) => !f.deprecated);
  const isRoot = m.isRootType(t.id);
  const constPrefix = upperSnakeCase(t.name);

  if (isRoot && m.fileIdentifier !== undefined) {
    w.line(`export const ${constPrefix}_FILE_IDENTIFIER = '${m.fileIdentifier}';`);
  }
  if (isRoot && m.fileExtension !== undefined) {
    w.line(`export const ${constPrefix}_FILE_EXTENSION = '${m.fileExtension}';`);
  }
  w.blank();

  w.doc(t.doc);
  const unpackExprs: Array<[string, string]> = [];
  w.block(`export class ${t.name} {`, () => {
    w.line(`constructor(readonly bb: ${m.rt('ByteBuffer')}, readonly bbPos: number) {}`);
    w.blank();
    w.block(
      `static fromBytes(bytes: Uint8Array, options: ${m.rt('DeserializeOptions')} = {}): ${t.name} {`,
      () => {
        w.line(`const bb = new ${m.rt('ByteBuffer')}(bytes);`);
        w.line(`return new ${t.name}(bb, bb.rootTable(options.sizePrefixed ?? false));`);
      },
    );
    for (const f of live) unpackExprs.push([memberName(f.name), emitTableAccessor(m, t, f)]);
    w.blank();
    w.block(`unpack(): ${t.name}Object {`, () => {
      w.block('return {', () => {
        for (const [name, expr] of unpackExprs) w.line(`${name}: ${expr},`);
      }, '};');
    });
  });
  w.blank();

  w.doc(t.doc);
  w.block(`export interface ${t.name}Object {`, () => {
    for (const f of live) {
      const scalar = m.scalarOf(f.type) !== undefined;
      w.line(`${memberName(f.name)}?: ${m.objectType(f.type)}${scalar ? '' : ' | null'};`);
    }
  });
  w.blank();

  w.block(`export function encode${t.name}(builder: ${m.rt('Builder')}, value: ${t.name}Object): number {`, () => {
    for (const f of live) {
      if (!isOutOfLine(m, f.type)) continue;
      const v = `value.${memberName(f.name)}`;
      w.line(`const off${f.slot} = ${v} != null ? ${childExpr(m, f.type, v)} : 0;`);
    }
    w.line(`builder.startTable(${t.slotCount});`);
    for (const write of tableWriteOrder(m.schema, t)) {
      const f = write.field;
      const v = `value.${memberName(f.name)}`;
      const decl = m.declFor(f.type);
      if (write.part === 'type' && decl) {
        w.line(`builder.addFieldUint8(${write.slot}, ${v} != null ? ${m.ref(decl.id, 'Type')}[${v}.type] : 0, 0);`);
        continue;
      }
      const kind = m.scalarOf(f.type);
      if (kind) {
        const def = tsDefault(kind, f.defaultValue);
        w.line(`builder.addField${SCALAR_METHOD[kind]}(${write.slot}, ${v} ?? ${def}, ${def});`);
        continue;
      }
      if (decl?.kind === 'Struct') {
        w.line(`if (${v} != null) builder.addFieldStruct(${write.slot}, ${m.ref(decl.id, '', 'write')}(builder, ${v}));`);
        continue;
      }
      w.line(`builder.addFieldOffset(${write.slot}, off${f.slot});`);
    }
    w.line('const end = builder.endTable();');
    for (const f of t.fields) {
      if (f.required) w.line(`builder.requiredField(end, ${slotToVtableOffset(f.slot)}, '${f.name}');`);
    }
    w.line('return end;');
  });
  w.blank();

  const ident = isRoot && m.fileIdentifier !== undefined ? `${constPrefix}_FILE_IDENTIFIER` : 'undefined';
  w.block(
    `export function serialize${t.name}(value: ${t.name}Object, options: ${m.rt('SerializeOptions')} = {}): Uint8Array {`,
    () => {
      w.line(`const builder = new ${m.rt('Builder')}(options);`);
      w.line(`builder.finish(encode${t.name}(builder, value), ${ident}, options.sizePrefix ?? false);`);
      w.line('return builder.asUint8Array();');
    },
  );
  w.blank();
  w.block(
    `export function deserialize${t.name}(bytes: Uint8Array, options: ${m.rt('DeserializeOptions')} = {}): ${t.name}Object {`,
    () => {
      w.line(`return ${t.name}.fromBytes(bytes, options).unpack();`);
    },
  );
  w.blank();
  if (isRoot && m.fileIdentifier !== undefined) {
    w.block(`export function ${camelCase(t.name)}BufferHasIdentifier(bytes: Uint8Array): boolean {`, () => {
      w.line(`return new ${m.rt('ByteBuffer')}(bytes).hasIdentifier(${constPrefix}_FILE_IDENTIFIER);`);
    });
    w.blank();
  }
}

const CALL_HELPER: Record<IrRpcMethod['streaming'], string> = {
  none: 'unaryCall',
  server: 'serverStreamingCall',
  client: 'clientStreamingCall',
  bidi: 'bidiStreamingCall',
};

const SERVER_HOOK: Record<IrRpcMethod['streaming'], string> = {
  none: 'handleUnary',
  server: 'handleServerStreaming',
  client: 'handleClientStreaming',
  bidi: 'handleBidiStreaming',
};

function emitService(m: TsModule, s: IrRpcService): void {
  const w = m.w;
  const methods = `${s.name}Methods`;
  const codec = (id: DeclId): string =>
    `{ encode: ${m.ref(id, '', 'serialize')}, decode: ${m.ref(id, '', 'deserialize')} }`;

  w.block(`export const ${methods} = {`, () => {
    for (const method of s.methods) {
      w.block(`${camelCase(method.name)}: ${m.rt('defineMethod')}(`, () => {
        w.line(`'${s.fqn}',`);
        w.line(`'${method.name}',`);
        w.line(`'${method.streaming}',`);
        w.line(`${codec(method.request)},`);
        w.line(`${codec(method.response)},`);
      }, '),');
    }
  }, '} as const;');
  w.blank();

  w.doc(s.doc);
  w.block(`export class ${s.name}Client {`, () => {
    w.line(`constructor(private readonly transport: ${m.rt('RpcTransport')}) {}`);
    for (const method of s.methods) {
      const req = m.ref(method.request, 'Object');
      const res = m.ref(method.response, 'Object');
      const input = method.streaming === 'client' || method.streaming === 'bidi'
        ? `requests: AsyncIterable<${req}>`
        : `request: ${req}`;
      const output = method.streaming === 'server' || method.streaming === 'bidi'
        ? `${m.rt('ServerStream')}<${res}>`
        : `Promise<${res}>`;
      const arg = input.startsWith('requests') ? 'requests' : 'request';
      w.blank();
      w.doc(method.doc);
      w.block(`${camelCase(method.name)}(${input}, options?: ${m.rt('CallOptions')}): ${output} {`, () => {
        w.line(
          `return ${m.rt(CALL_HELPER[method.streaming])}(this.transport, ${methods}.${camelCase(method.name)}, ${arg}, options);`,
        );
      });
    }
  });
  w.blank();

  w.block(`export interface ${s.name}Handlers {`, () => {
    for (const method of s.methods) {
      const req = m.ref(method.request, 'Object');
      const res = m.ref(method.response, 'Object');
      const streamingIn = method.streaming === 'client' || method.streaming === 'bidi';
      const streamingOut = method.streaming === 'server' || method.streaming === 'bidi';
      const input = streamingIn ? `requests: AsyncIterable<${req}>` : `request: ${req}`;
      const output = streamingOut ? `AsyncIterable<${res}>` : `Promise<${res}>`;
      w.doc(method.doc);
      w.line(`${camelCase(method.name)}(${input}, context: ${m.rt('CallContext')}): ${output};`);
    }
  });
  w.blank();

  w.block(
    `export function register${s.name}(server: ${m.rt('RpcServer')}, handlers: ${s.name}Handlers): void {`,
    () => {
      for (const method of s.methods) {
        const name = camelCase(method.name);
        const arg = method.streaming === 'client' || method.streaming === 'bidi' ? 'requests' : 'request';
        w.line(
          `server.${SERVER_HOOK[method.streaming]}(${methods}.${name}, (${arg}, context) => handlers.${name}(${arg}, context));`,
        );
      }
    },
  );
  w.blank();
}

/**
 * Generate one TypeScript module per namespace.
 */
export function generateTypeScript(ir: IrSchema, opts?: GeneratorOptions): GeneratedFile[] {
  const runtimeImport = opts?.runtimeImport ?? DEFAULT_RUNTIME_IMPORT;
  const rootModuleName = opts?.rootModuleName ?? DEFAULT_ROOT_MODULE;
  const files: GeneratedFile[] = [];
  for (const ns of ir.namespaces) {
    const m = new TsModule(ir, ns, runtimeImport, rootModuleName);
    for (const id of ns.decls) {
      const decl = declOf(ir, id);
      switch (decl.kind) {
        case 'Enum':
          emitEnum(m, decl);
          break;
        case 'Union':
          emitUnion(m, decl);
          break;
        case 'Struct':
          emitStruct(m, decl);
          break;
        case 'Table':
          emitTable(m, decl);
          break;
        case 'RpcService':
          emitService(m, decl);
          break;
      }
    }
    files.push({ kind: 'ts', path: `${moduleStem(ns.name, rootModuleName)}.ts`, text: m.render() });
  }
  return files;
}
