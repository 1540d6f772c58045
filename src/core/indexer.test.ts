import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { AnnotationCache } from './cache';
import { resolveEngineConfig } from './config';
import { CancelledError } from './errors';
import { discoverSourceFiles } from './files';
import { annotateFiles, collectCachedDocuments } from './indexer';
import { ProcessOutcome, ProcessRequest } from './process';
import { buildIndex, search } from './search';

function recordingRunner(outcome: ProcessOutcome) {
  const requests: ProcessRequest[] = [];
  const runner = async (request: ProcessRequest): Promise<ProcessOutcome> => {
    requests.push(request);
    return outcome;
  };
  return { runner, requests };
}

const lintOutput: ProcessOutcome = {
  status: 'exited',
  exitCode: 1,
  stdout: 'pkg/cache.py:6: warning: slow path\n',
  stderr: '',
  truncated: false,
  durationMs: 4,
};

describe('annotateFiles', () => {
  let rootDir: string;
  let cacheDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-repo-'));
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-store-'));
    await fs.mkdir(path.join(rootDir, 'pkg'));
    await fs.copyFile(path.join(__dirname, '__fixtures__', 'cache.py'), path.join(rootDir, 'pkg', 'cache.py'));
    await fs.writeFile(path.join(rootDir, 'notes.md'), '# Notes\n\nSee cache_lookup.\n');
    await fs.writeFile(path.join(rootDir, 'logo.bin'), Buffer.from([0x89, 0x00, 0x01, 0x02]));
    await fs.writeFile(
      path.join(rootDir, '.repoglyph.json'),
      JSON.stringify({ tools: [{ name: 'fake-lint', command: 'fake-lint', languages: ['python'] }] }),
    );
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
    await fs.rm(cacheDir, { recursive: true, force: true });
  });

  async function annotateOnce(runner: (request: ProcessRequest) => Promise<ProcessOutcome>) {
    const config = await resolveEngineConfig(rootDir, { cacheDir, maxWorkers: 2 }, {});
    const sourceFiles = await discoverSourceFiles(rootDir, config.ignore);
    const cache = await AnnotationCache.open({ cacheDir: config.cacheDir });
    try {
      return await annotateFiles(sourceFiles, { config, cache, runner });
    } finally {
      await cache.close();
    }
  }

  it('computes annotations on the first run and serves them from the cache afterwards', async () => {
    const first = recordingRunner(lintOutput);
    const initial = await annotateOnce(first.runner);

    expect(initial).toMatchObject({ computedFiles: 2, cachedFiles: 0, binaryFiles: 1, unreadableFiles: 0 });
    expect(initial.files.map((file) => [file.path, file.language, file.status])).toEqual([
      ['logo.bin', 'text', 'binary'],
      ['notes.md', 'markdown', 'computed'],
      ['pkg/cache.py', 'python', 'computed'],
    ]);
    expect(first.requests).toHaveLength(1);
    expect(first.requests[0]).toMatchObject({
      command: 'fake-lint',
      args: [path.join(rootDir, 'pkg', 'cache.py')],
      cwd: rootDir,
    });

    const python = initial.files[2].entry;
    expect(python?.minimap?.symbols.map((symbol) => symbol.qualifiedName)).toEqual([
      'Cache',
      'Cache.lookup',
      'Cache.fetch',
      'cache_lookup',
      'helper',
    ]);
    expect(python?.heatmap).toMatchObject({ lineSeverity: { '6': 'warning' }, runStatus: 'ok' });
    expect(initial.files[1].entry?.minimap?.extractionStatus).toBe('unsupportedLanguage');
    expect(initial.files[1].entry?.heatmap?.toolRuns).toEqual([]);

    const second = recordingRunner(lintOutput);
    const repeated = await annotateOnce(second.runner);
    expect(repeated).toMatchObject({ computedFiles: 0, cachedFiles: 2, binaryFiles: 1 });
    expect(second.requests).toEqual([]);
    expect(repeated.configVersion).toBe(initial.configVersion);
    expect(repeated.files[2].entry).toEqual(python);
  });

  it('recomputes only the files whose content changed', async () => {
    await annotateOnce(recordingRunner(lintOutput).runner);
    await fs.writeFile(path.join(rootDir, 'notes.md'), '# Notes\n\nRewritten.\n');

    const run = await annotateOnce(recordingRunner(lintOutput).runner);

    expect(run.files.map((file) => [file.path, file.status])).toEqual([
      ['logo.bin', 'binary'],
      ['notes.md', 'computed'],
      ['pkg/cache.py', 'cached'],
    ]);
  });

  it('keeps a timed-out heatmap until the content or config changes', async () => {
    const timedOut = await annotateOnce(recordingRunner({ status: 'timeout', durationMs: 20 }).runner);
    expect(timedOut.files[2].entry?.heatmap?.runStatus).toBe('timeout');

    const again = recordingRunner(lintOutput);
    const run = await annotateOnce(again.runner);
    expect(run.files[2].status).toBe('cached');
    expect(run.files[2].entry?.heatmap?.runStatus).toBe('timeout');
    expect(again.requests).toEqual([]);
  });

  it('caches files whose linter is not installed and still serves them to queries', async () => {
    await fs.writeFile(
      path.join(rootDir, '.repoglyph.json'),
      JSON.stringify({ tools: [{ name: 'absent', command: 'repoglyph-absent-linter', languages: ['python'] }] }),
    );

    const annotateWithRealRunner = async () => {
      const config = await resolveEngineConfig(rootDir, { cacheDir }, {});
      const sourceFiles = await discoverSourceFiles(rootDir, config.ignore);
      const cache = await AnnotationCache.open({ cacheDir });
      try {
        return { run: await annotateFiles(sourceFiles, { config, cache }), config, sourceFiles };
      } finally {
        await cache.close();
      }
    };

    const first = await annotateWithRealRunner();
    expect(first.run.files[2]).toMatchObject({ path: 'pkg/cache.py', status: 'computed' });
    expect(first.run.files[2].entry?.heatmap?.runStatus).toBe('toolMissing');
    expect(first.run.files[2].entry?.minimap?.extractionStatus).toBe('ok');

    const second = await annotateWithRealRunner();
    expect(second.run.files.map((file) => file.status)).toEqual(['binary', 'cached', 'cached']);

    const reader = await AnnotationCache.open({ cacheDir, recordRun: false });
    const collected = await collectCachedDocuments(second.sourceFiles, second.config, reader);
    await reader.close();
    expect(collected.missingFiles).toBe(1);
    expect(collected.documents.map((document) => document.entry.path)).toEqual(['notes.md', 'pkg/cache.py']);

    const hits = search(buildIndex(collected.documents), 'cache_lookup', 'semantic');
    expect(hits.map((hit) => [hit.path, hit.line])).toEqual([['pkg/cache.py', 12]]);
  });

  it('never runs more tool processes than workers across many files', async () => {
    for (let index = 0; index < 6; index += 1) {
      await fs.writeFile(path.join(rootDir, 'pkg', `mod${index}.py`), `def f${index}():\n    return ${index}\n`);
    }
    let running = 0;
    let observedPeak = 0;
    const requests: ProcessRequest[] = [];
    const runner = async (request: ProcessRequest): Promise<ProcessOutcome> => {
      requests.push(request);
      running += 1;
      observedPeak = Math.max(observedPeak, running);
      await new Promise((resolve) => setTimeout(resolve, 15));
      running -= 1;
      return { ...lintOutput, stdout: '' };
    };

    const run = await annotateOnce(runner);

    expect(requests).toHaveLength(7);
    expect(observedPeak).toBeLessThanOrEqual(2);
    expect(run.peakToolProcesses).toBeLessThanOrEqual(2);
    expect(run.peakToolProcesses).toBeGreaterThan(0);
  });

  it('stops before reading anything when already cancelled', async () => {
    const config = await resolveEngineConfig(rootDir, { cacheDir }, {});
    const sourceFiles = await discoverSourceFiles(rootDir, config.ignore);
    const cache = await AnnotationCache.open({ cacheDir });
    const controller = new AbortController();
    controller.abort();

    await expect(annotateFiles(sourceFiles, { config, cache, signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(await cache.stats()).toMatchObject({ entries: 0 });
    await cache.close();
  });
});

describe('collectCachedDocuments', () => {
  it('returns stored entries and counts files that were never annotated', async () => {
    const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-collect-'));
    try {
      await fs.writeFile(path.join(rootDir, 'a.py'), 'def a():\n    pass\n');
      await fs.writeFile(path.join(rootDir, 'b.py'), 'def b():\n    pass\n');
      const config = await resolveEngineConfig(rootDir, { heatmap: false }, {});
      const sourceFiles = await discoverSourceFiles(rootDir, config.ignore);
      const cache = await AnnotationCache.open({ cacheDir: config.cacheDir });

      await annotateFiles(sourceFiles.slice(0, 1), { config, cache });
      const collected = await collectCachedDocuments(sourceFiles, config, cache);
      await cache.close();

      expect(collected.missingFiles).toBe(1);
      expect(collected.documents.map((document) => [document.entry.path, document.content])).toEqual([
        ['a.py', 'def a():\n    pass\n'],
      ]);
    } finally {
      await fs.rm(rootDir, { recursive: true, force: true });
    }
  });
});
