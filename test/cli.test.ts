import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { compareDiagnosticsForCli, formatDiagnostic, runCli } from '../src/cli.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

type Captured = { code: number; stdout: string; stderr: string };

async function run(args: string[]): Promise<Captured> {
  const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  try {
    const code = await runCli(args);
    return {
      code,
      stdout: out.mock.calls.map((c) => String(c[0])).join(''),
      stderr: err.mock.calls.map((c) => String(c[0])).join(''),
    };
  } finally {
    out.mockRestore();
    err.mockRestore();
  }
}

describe('cli', () => {
  let work: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'fbsgen-cli-'));
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('writes generated files next to the entry by default', async () => {
    const entry = join(work, 'hello.fbs');
    await writeFile(entry, 'table Hello { name: string; }\nroot_type Hello;\n', 'utf8');

    const res = await run([entry]);
    expect(res).toEqual({ code: 0, stdout: `${join(work, 'root.ts')}\n`, stderr: '' });
    expect(await readFile(join(work, 'root.ts'), 'utf8')).toContain('export function serializeHello(');
  });

  it('writes every requested target into --out-dir', async () => {
    const entry = join(work, 'hello.fbs');
    await writeFile(entry, 'table Hello { name: string; }\n', 'utf8');
    const outDir = join(work, 'gen');

    const res = await run(['-t', 'fbs', '--target=ts', '-o', outDir, '--runtime', '@acme/buffers', entry]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${join(outDir, 'root.fbs')}\n${join(outDir, 'root.ts')}\n`);
    expect((await readdir(outDir)).sort()).toEqual(['root.fbs', 'root.ts']);
    expect(await readFile(join(outDir, 'root.fbs'), 'utf8')).toBe('table Hello {\n  name: string;\n}\n');
    expect(await readFile(join(outDir, 'root.ts'), 'utf8')).toContain("import * as fb from '@acme/buffers';");
  });

  it('resolves includes through -I', async () => {
    const entry = join(work, 'main.fbs');
    await writeFile(entry, 'include "dep.fbs";\ntable Main { d: Dep; }\n', 'utf8');
    const lib = join(work, 'lib');
    await mkdir(lib);
    await writeFile(join(lib, 'dep.fbs'), 'table Dep {}\n', 'utf8');

    expect((await run([entry])).code).toBe(1);
    const res = await run(['-I', lib, entry]);
    expect(res.code).toBe(0);
  });

  it('prints diagnostics and writes nothing when the schema has errors', async () => {
    const entry = join(work, 'bad.fbs');
    await writeFile(entry, 'table Bad { x: Nope; }\n', 'utf8');

    const res = await run([entry]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr.startsWith(`${entry}:1:`)).toBe(true);
    expect(res.stderr.endsWith(': error: [FBS300] Unknown type "Nope" (tried "Nope").\n')).toBe(true);
    expect(await readdir(work)).toEqual(['bad.fbs']);
  });

  it('reports a missing entry file', async () => {
    const entry = join(work, 'absent.fbs');
    const res = await run([entry]);
    expect(res).toEqual({
      code: 1,
      stdout: '',
      stderr: `${entry}: error: [FBS001] Entry file "${entry}" does not exist.\n`,
    });
  });

  it.each([
    [[], 'Expected exactly one <entry.fbs> argument'],
    [['a.fbs', 'b.fbs'], 'Expected exactly one <entry.fbs> argument'],
    [['--bogus', 'a.fbs'], 'Unknown option "--bogus"'],
    [['-t', 'cpp', 'a.fbs'], 'Unsupported --target "cpp" (expected ts|fbs)'],
    [['a.fbs', '-o'], '-o expects a value'],
    [['--out-dir=', 'a.fbs'], '--out-dir expects a value'],
  ])('rejects usage %j', async (args, message) => {
    const res = await run(args);
    expect(res.code).toBe(2);
    expect(res.stdout).toBe('');
    expect(res.stderr.startsWith(`fbsgen: ${message}\nfbsgen [options] <entry.fbs>\n`)).toBe(true);
  });

  it('prints help and version', async () => {
    const help = await run(['--help']);
    expect(help.code).toBe(0);
    expect(help.stdout.split('\n')[0]).toBe('fbsgen [options] <entry.fbs>');
    await expect(run(['-V'])).resolves.toEqual({ code: 0, stdout: '0.1.0\n', stderr: '' });
  });
});

describe('diagnostic formatting', () => {
  const d = (file: string, line: number | undefined, id: Diagnostic['id'], message = 'm'): Diagnostic => ({
    id,
    severity: 'error',
    message,
    file,
    ...(line !== undefined ? { line, column: 1 } : {}),
  });

  it('formats with and without a location', () => {
    expect(formatDiagnostic(d('a.fbs', 3, DiagnosticIds.ParseError, 'Unexpected "}"'))).toBe(
      'a.fbs:3:1: error: [FBS200] Unexpected "}"',
    );
    expect(formatDiagnostic(d('a.fbs', undefined, DiagnosticIds.IoReadFailed))).toBe('a.fbs: error: [FBS001] m');
  });

  it('orders by file, then line, then id', () => {
    const sorted = [
      d('b.fbs', 1, DiagnosticIds.UnresolvedType),
      d('a.fbs', undefined, DiagnosticIds.IoReadFailed),
      d('a.fbs', 2, DiagnosticIds.ParseError),
      d('a.fbs', 2, DiagnosticIds.LexUnexpectedChar),
    ].sort(compareDiagnosticsForCli);
    expect(sorted.map((x) => `${x.file}:${x.line ?? '-'}:${x.id}`)).toEqual([
      'a.fbs:2:FBS100',
      'a.fbs:2:FBS200',
      'a.fbs:-:FBS001',
      'b.fbs:1:FBS300',
    ]);
  });
});
