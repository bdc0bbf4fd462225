#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defaultGenerators } from './codegen/index.js';
import type { GeneratedFile, TargetName } from './codegen/types.js';
import { TARGET_NAMES } from './codegen/types.js';
import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outDir: string;
  targets: TargetName[];
  includeDirs: string[];
  runtimeImport?: string;
};

class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

function usage(): string {
  return [
    'fbsgen [options] <entry.fbs>',
    '',
    'Options:',
    '  -o, --out-dir <dir>     Directory generated files are written to (default: next to entry)',
    `  -t, --target <target>   Output target: ${TARGET_NAMES.join('|')} (repeatable, default: ts)`,
    '  -I, --include <dir>     Add include search path (repeatable)',
    '      --runtime <spec>    Module specifier generated code imports the runtime from',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw new CliError(message);
}

function isTarget(value: string): value is TargetName {
  return TARGET_NAMES.some((t) => t === value);
}

async function readVersion(): Promise<string> {
  // src/cli.ts and dist/src/cli.js both sit below the package root.
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const text = await readFile(join(dir, 'package.json'), 'utf8').catch((err: unknown) => {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    });
    if (text !== undefined) {
      const pkg: unknown = JSON.parse(text);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

/**
 * `-x value`, `--long value` or `--long=value`; advances `i` past a separate value.
 */
function optionValue(argv: string[], i: { at: number }, short: string, long: string): string | undefined {
  const a = argv[i.at] ?? '';
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return v;
  }
  if (a !== long && (short === '' || a !== short)) return undefined;
  const v = argv[++i.at];
  if (!v) fail(`${a} expects a value`);
  return v;
}

async function parseArgs(argv: string[]): Promise<CliOptions | CliExit> {
  let outDir: string | undefined;
  let runtimeImport: string | undefined;
  const targets: TargetName[] = [];
  const includeDirs: string[] = [];
  let entryFile: string | undefined;

  for (const i = { at: 0 }; i.at < argv.length; i.at++) {
    const a = argv[i.at] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${await readVersion()}\n`);
      return { code: 0 };
    }

    const out = optionValue(argv, i, '-o', '--out-dir');
    if (out !== undefined) {
      outDir = out;
      continue;
    }
    const target = optionValue(argv, i, '-t', '--target');
    if (target !== undefined) {
      if (!isTarget(target)) fail(`Unsupported --target "${target}" (expected ${TARGET_NAMES.join('|')})`);
      if (!targets.includes(target)) targets.push(target);
      continue;
    }
    const include = optionValue(argv, i, '-I', '--include');
    if (include !== undefined) {
      includeDirs.push(include);
      continue;
    }
    const runtime = optionValue(argv, i, '', '--runtime');
    if (runtime !== undefined) {
      runtimeImport = runtime;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined) {
      fail(`Expected exactly one <entry.fbs> argument`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.fbs> argument`);
  }

  return {
    entryFile,
    outDir: outDir ?? dirname(resolve(entryFile)),
    targets: targets.length > 0 ? targets : ['ts'],
    includeDirs,
    ...(runtimeImport !== undefined ? { runtimeImport } : {}),
  };
}

async function writeArtifacts(outDir: string, artifacts: GeneratedFile[]): Promise<void> {
  const root = resolve(outDir);
  const written = await Promise.all(
    artifacts.map(async (a) => {
      const path = resolve(root, a.path);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, a.text, 'utf8');
      return path;
    }),
  );
  for (const p of written) process.stdout.write(`${p}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

export function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = await parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        includeDirs: parsed.includeDirs,
        targets: parsed.targets,
        ...(parsed.runtimeImport !== undefined ? { runtimeImport: parsed.runtimeImport } : {}),
      },
      { generators: defaultGenerators },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) process.stderr.write(`${formatDiagnostic(d)}\n`);

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(parsed.outDir, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`fbsgen: ${msg}\n`);
    if (err instanceof CliError) {
      process.stderr.write(`${usage()}\n`);
      return 2;
    }
    return 1;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm bin shims can surface a different spelling of the same file.
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && normalizePathForCompare(self).endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
