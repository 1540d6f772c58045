import { describe, expect, it } from 'vitest';

import { CacheEntry, CallEdge, CodeSymbol } from '../types';
import { buildCallGraph, queryCalls } from './graph';
import { identity } from './hash';

function entry(filePath: string, symbols: CodeSymbol[], edges: CallEdge[]): CacheEntry {
  const fileIdentity = identity(filePath, Buffer.from(filePath));
  return {
    key: '0'.repeat(64),
    path: filePath,
    contentFingerprint: fileIdentity.contentFingerprint,
    configVersion: 'v1',
    minimap: { fileIdentity, symbols, edges, extractionStatus: 'ok' },
    writtenAt: '2026-01-01T00:00:00.000Z',
  };
}

function symbol(name: string, qualifiedName: string, kind: CodeSymbol['kind'], declaredLine: number): CodeSymbol {
  return { name, qualifiedName, kind, declaredLine, language: 'python' };
}

const cacheModule = entry(
  'pkg/cache.py',
  [
    symbol('Cache', 'Cache', 'class', 4),
    symbol('lookup', 'Cache.lookup', 'method', 5),
    symbol('fetch', 'Cache.fetch', 'method', 8),
    symbol('cache_lookup', 'cache_lookup', 'function', 12),
    symbol('helper', 'helper', 'function', 17),
  ],
  [
    { callerSymbol: 'Cache.lookup', calleeName: 'Cache.fetch', line: 6 },
    { callerSymbol: 'Cache.fetch', calleeName: 'os.environ.get', line: 9 },
    { callerSymbol: 'cache_lookup', calleeName: 'Cache', line: 13 },
    { callerSymbol: 'cache_lookup', calleeName: 'cache.lookup', line: 14 },
    { callerSymbol: 'helper', calleeName: 'cache_lookup', line: 18 },
  ],
);

const appModule = entry(
  'pkg/app.py',
  [symbol('main', 'main', 'function', 1)],
  [
    { callerSymbol: 'main', calleeName: 'helper', line: 2 },
    { callerSymbol: '(module)', calleeName: 'main', line: 5 },
  ],
);

describe('queryCalls', () => {
  const graph = buildCallGraph([cacheModule, appModule]);

  it('lists definitions, callers and callees of a function', () => {
    expect(queryCalls(graph, 'cache_lookup', 10)).toEqual({
      name: 'cache_lookup',
      definitions: [{ path: 'pkg/cache.py', qualifiedName: 'cache_lookup', kind: 'function', line: 12 }],
      callers: [{ path: 'pkg/cache.py', caller: 'helper', callee: 'cache_lookup', line: 18, resolved: true }],
      callees: [
        { path: 'pkg/cache.py', caller: 'cache_lookup', callee: 'Cache', line: 13, resolved: true },
        { path: 'pkg/cache.py', caller: 'cache_lookup', callee: 'cache.lookup', line: 14, resolved: false },
      ],
    });
  });

  it('resolves methods called through self by their qualified name', () => {
    const result = queryCalls(graph, 'fetch', 10);

    expect(result.definitions.map((definition) => definition.qualifiedName)).toEqual(['Cache.fetch']);
    expect(result.callers).toEqual([
      { path: 'pkg/cache.py', caller: 'Cache.lookup', callee: 'Cache.fetch', line: 6, resolved: true },
    ]);
    expect(result.callees).toEqual([
      { path: 'pkg/cache.py', caller: 'Cache.fetch', callee: 'os.environ.get', line: 9, resolved: false },
    ]);
  });

  it('keeps calls into other files unresolved', () => {
    const result = queryCalls(graph, 'helper', 10);

    expect(result.definitions).toEqual([{ path: 'pkg/cache.py', qualifiedName: 'helper', kind: 'function', line: 17 }]);
    expect(result.callers).toEqual([
      { path: 'pkg/app.py', caller: 'main', callee: 'helper', line: 2, resolved: false },
    ]);
    expect(result.callees.map((site) => site.callee)).toEqual(['cache_lookup']);
  });

  it('reports module-level callers and external callees', () => {
    expect(queryCalls(graph, 'main', 10).callers).toEqual([
      { path: 'pkg/app.py', caller: '(module)', callee: 'main', line: 5, resolved: true },
    ]);

    const external = queryCalls(graph, 'os.environ.get', 10);
    expect(external.definitions).toEqual([]);
    expect(external.callers.map((site) => site.caller)).toEqual(['Cache.fetch']);
  });

  it('does not treat the module scope as a symbol', () => {
    expect(queryCalls(graph, '(module)', 10)).toEqual({ name: '(module)', definitions: [], callers: [], callees: [] });
  });

  it('truncates each list to the limit', () => {
    expect(queryCalls(graph, 'cache_lookup', 1).callees.map((site) => site.callee)).toEqual(['Cache']);
  });
});

describe('buildCallGraph', () => {
  it('skips files whose extraction failed', () => {
    const broken: CacheEntry = {
      ...appModule,
      path: 'pkg/broken.py',
      minimap: { fileIdentity: identity('pkg/broken.py', Buffer.from('')), symbols: [], edges: [], extractionStatus: 'parseError' },
    };
    const graph = buildCallGraph([broken]);

    expect(graph.order).toBe(0);
    expect(graph.size).toBe(0);
  });
});
