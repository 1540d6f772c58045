import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runAnnotate } from './annotate';
import { runCache } from './cache';
import { runCalls } from './calls';
import { runSearch } from './search';

describe('commands', () => {
  let rootDir: string;
  let cacheDir: string;
  let outDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-cmd-repo-'));
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-cmd-cache-'));
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-cmd-out-'));
    await fs.mkdir(path.join(rootDir, 'pkg'));
    await fs.copyFile(path.join(__dirname, '..', 'core', '__fixtures__', 'cache.py'), path.join(rootDir, 'pkg', 'cache.py'));
  });

  afterEach(async () => {
    for (const dir of [rootDir, cacheDir, outDir]) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  const annotate = () =>
    runAnnotate({
      rootDir,
      cacheDir,
      tools: [],
      lint: false,
      ignore: [],
      outputPath: path.join(outDir, 'annotations.json'),
      verbose: false,
    });

  it('annotates, then answers search and call queries from the cache', async () => {
    const summary = await annotate();
    expect(summary).toMatchObject({
      command: 'annotate',
      cacheDir,
      totalFiles: 1,
      computedFiles: 1,
      cachedFiles: 0,
      parseErrors: 0,
      degradedHeatmaps: 0,
      tools: [],
      outputPath: path.join(outDir, 'annotations.json'),
    });
    const written: unknown = JSON.parse(await fs.readFile(path.join(outDir, 'annotations.json'), 'utf8'));
    expect(written).toMatchObject({ command: 'annotate', files: [{ path: 'pkg/cache.py', status: 'computed' }] });

    const found = await runSearch({
      rootDir,
      cacheDir,
      query: 'cache_lookup',
      mode: 'semantic',
      pattern: false,
      globs: [],
      kinds: [],
      limit: 10,
      snippets: false,
      tools: [],
      lint: false,
      ignore: [],
      verbose: false,
    });
    expect(found).toEqual({
      command: 'search',
      query: 'cache_lookup',
      mode: 'semantic',
      indexedFiles: 1,
      missingFiles: 0,
      results: [
        {
          path: 'pkg/cache.py',
          line: 12,
          startLine: 7,
          endLine: 17,
          score: 4,
          text: 'def cache_lookup(key):',
          symbol: 'cache_lookup',
          kind: 'function',
        },
      ],
    });

    const calls = await runCalls({
      rootDir,
      cacheDir,
      symbolName: 'cache_lookup',
      limit: 10,
      format: 'md',
      outputPath: path.join(outDir, 'calls.md'),
      tools: [],
      lint: false,
      ignore: [],
      verbose: false,
    });
    expect(calls.callers.map((site) => site.caller)).toEqual(['helper']);
    const markdown = await fs.readFile(path.join(outDir, 'calls.md'), 'utf8');
    expect(markdown.split('\n')).toContain('- `pkg/cache.py:18` `helper` calls `cache_lookup`');
    expect(markdown.split('\n')).toContain('- `pkg/cache.py:14` `cache_lookup` calls `cache.lookup` (unresolved)');
  });

  it('serves the second annotate run from the cache', async () => {
    await annotate();
    const again = await annotate();

    expect(again).toMatchObject({ computedFiles: 0, cachedFiles: 1 });
  });

  it('does not mix entries from a different artifact selection', async () => {
    await annotate();

    const found = await runSearch({
      rootDir,
      cacheDir,
      query: 'cache',
      mode: 'text',
      pattern: false,
      globs: [],
      kinds: [],
      limit: 10,
      snippets: true,
      tools: [],
      minimap: false,
      lint: false,
      ignore: [],
      verbose: false,
    });

    expect(found).toMatchObject({ indexedFiles: 0, missingFiles: 1, results: [], snippets: [] });
  });

  it('reports, evicts and clears the store', async () => {
    await annotate();

    const stats = await runCache({ rootDir, cacheDir, action: 'stats', verbose: false });
    expect(stats.action === 'stats' && stats.stats).toMatchObject({ cacheDir, entries: 1, runs: 1 });

    const evicted = await runCache({ rootDir, cacheDir, action: 'evict', maxRunsUnread: 1, verbose: false });
    expect(evicted.action === 'evict' && evicted.evicted).toMatchObject({ removed: 0, remainingEntries: 1 });

    const cleared = await runCache({ rootDir, cacheDir, action: 'clear', verbose: false });
    expect(cleared).toEqual({ command: 'cache', action: 'clear', cacheDir });
    const after = await runCache({ rootDir, cacheDir, action: 'stats', verbose: false });
    expect(after.action === 'stats' && after.stats).toMatchObject({ entries: 0, runs: 0 });
  });
});
