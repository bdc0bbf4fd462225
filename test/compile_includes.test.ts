import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { defaultGenerators } from '../src/codegen/index.js';
import { compile, compileSources, loadSchemas, memoryHost } from '../src/compile.js';
import type { SourceHost } from '../src/compile.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

const here = dirname(fileURLToPath(import.meta.url));
const includesDir = join(here, 'fixtures', 'includes');
const deps = { generators: defaultGenerators };

function countingHost(files: Record<string, string>): { host: SourceHost; reads: string[] } {
  const inner = memoryHost(files);
  const reads: string[] = [];
  return {
    reads,
    host: {
      ...inner,
      read: (p) => {
        reads.push(p);
        return inner.read(p);
      },
    },
  };
}

describe('include resolution on disk', () => {
  const entry = join(includesDir, 'entry.fbs');

  it('fails when the include is only reachable through a search directory', async () => {
    const res = await compile(entry, {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.IncludeNotFound,
      file: entry,
      line: 1,
      message: `Failed to resolve include "shared.fbs" from "${entry}". Tried:\n- ${join(includesDir, 'shared.fbs')}`,
    });
  });

  it('finds includes under includeDirs', async () => {
    const res = await compile(entry, { includeDirs: [join(includesDir, 'vendor')] }, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts.map((a) => a.path).sort()).toEqual(['app.ts', 'shared.ts']);
  });
});

describe('include resolution in memory', () => {
  it('lists every candidate it tried', async () => {
    const res = await compileSources(
      { 'main.fbs': 'include "missing.fbs";\ntable Main {}' },
      { includeDirs: ['lib'] },
      deps,
    );
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toMatchObject([
      {
        id: DiagnosticIds.IncludeNotFound,
        file: 'main.fbs',
        line: 1,
        message: 'Failed to resolve include "missing.fbs" from "main.fbs". Tried:\n- missing.fbs\n- lib/missing.fbs',
      },
    ]);
  });

  it('reads a file included along two paths once', async () => {
    const { host, reads } = countingHost({
      'main.fbs': 'include "a.fbs";\ninclude "b.fbs";\ntable Main { a: a.A; b: b.B; }\nroot_type Main;',
      'a.fbs': 'include "base.fbs";\nnamespace a;\ntable A { s: base.Shared; }',
      'b.fbs': 'include "base.fbs";\nnamespace b;\ntable B { s: base.Shared; }',
      'base.fbs': 'namespace base;\ntable Shared { n: int; }',
    });
    const diagnostics: Diagnostic[] = [];
    const schemas = await loadSchemas('main.fbs', host, diagnostics);
    expect(diagnostics).toEqual([]);
    expect(schemas?.map((s) => s.path)).toEqual(['a.fbs', 'b.fbs', 'base.fbs', 'main.fbs']);
    expect(reads.filter((p) => p === 'base.fbs')).toHaveLength(1);
  });

  it('tolerates include cycles', async () => {
    const diagnostics: Diagnostic[] = [];
    const schemas = await loadSchemas(
      'a.fbs',
      memoryHost({ 'a.fbs': 'include "b.fbs";\ntable A {}', 'b.fbs': 'include "a.fbs";\ntable B {}' }),
      diagnostics,
    );
    expect(diagnostics).toEqual([]);
    expect(schemas?.map((s) => s.path)).toEqual(['a.fbs', 'b.fbs']);
  });

  it('reports diagnostics in path order', async () => {
    const res = await compileSources(
      {
        'z.fbs': 'include "a.fbs";\ninclude "nope1.fbs";',
        'a.fbs': 'include "nope2.fbs";',
      },
      {},
      deps,
    );
    expect(res.diagnostics.map((d) => [d.file, d.line, d.id])).toEqual([
      ['a.fbs', 1, DiagnosticIds.IncludeNotFound],
      ['z.fbs', 2, DiagnosticIds.IncludeNotFound],
    ]);
  });

  it('takes file directives from the entry file', async () => {
    const res = await compileSources(
      {
        'dep.fbs': 'table Dep {}\nroot_type Dep;',
        'main.fbs': 'include "dep.fbs";\ntable Main { d: Dep; }\nroot_type Main;',
      },
      { entryFile: 'main.fbs', targets: ['fbs'] },
      deps,
    );
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts.map((a) => a.path)).toEqual(['root.fbs']);
    expect(res.artifacts[0]?.text.endsWith('root_type Main;\n')).toBe(true);
  });

  it('generates each requested target once', async () => {
    const res = await compileSources({ 'one.fbs': 'table T {}' }, { targets: ['fbs', 'ts', 'fbs'] }, deps);
    expect(res.artifacts.map((a) => a.path)).toEqual(['root.fbs', 'root.ts']);
  });

  it('reports an empty source set', async () => {
    await expect(compileSources({}, {}, deps)).resolves.toEqual({
      diagnostics: [
        { id: DiagnosticIds.IoReadFailed, severity: 'error', message: 'No schema sources given.', file: '' },
      ],
      artifacts: [],
    });
  });

  it('reports a missing entry file', async () => {
    const res = await compileSources({ 'a.fbs': '' }, { entryFile: 'b.fbs' }, deps);
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: 'Entry file "b.fbs" does not exist.',
        file: 'b.fbs',
      },
    ]);
  });
});
