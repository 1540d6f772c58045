import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { configVersion, locateCommand, resolveCacheDir, resolveEngineConfig } from './config';
import { ConfigError } from './errors';

describe('engine config', () => {
  let rootDir: string;

  const writeConfig = (value: unknown): Promise<void> =>
    fs.writeFile(path.join(rootDir, '.repoglyph.json'), typeof value === 'string' ? value : JSON.stringify(value));

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-config-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    const config = await resolveEngineConfig(rootDir, {}, {});

    expect(config).toMatchObject({
      rootDir,
      cacheDir: path.join(rootDir, '.repoglyph', 'cache'),
      toolTimeoutMs: 20_000,
      maxFileBytes: 512 * 1024,
      contextLines: 5,
      minimap: true,
      heatmap: true,
      ignore: [],
    });
    expect(config.tools.map((tool) => tool.name)).toEqual(['eslint', 'ruff', 'shellcheck']);
  });

  it('merges custom tools from the file with built-in ones', async () => {
    await writeConfig({
      tools: ['ruff', { name: 'fake-lint', command: 'fake-lint', languages: ['python'] }],
      maxWorkers: 3,
      ignore: ['vendor/**'],
    });

    const config = await resolveEngineConfig(rootDir, { ignore: ['tmp/**'] }, {});

    expect(config.maxWorkers).toBe(3);
    expect(config.ignore).toEqual(['vendor/**', 'tmp/**']);
    expect(config.tools).toEqual([
      { name: 'fake-lint', command: 'fake-lint', args: [], languages: ['python'], input: 'path', format: 'lines' },
      expect.objectContaining({ name: 'ruff', format: 'ruff' }),
    ]);
  });

  it('lets command line selections win over the file', async () => {
    await writeConfig({ tools: ['ruff'], maxWorkers: 3 });

    const config = await resolveEngineConfig(rootDir, { tools: ['eslint'], maxWorkers: 1 }, {});

    expect(config.maxWorkers).toBe(1);
    expect(config.tools.map((tool) => tool.name)).toEqual(['eslint']);
  });

  it('rejects a file that is not JSON', async () => {
    await writeConfig('{ tools: ');

    await expect(resolveEngineConfig(rootDir, {}, {})).rejects.toThrow(/^\.repoglyph\.json is not valid JSON: /);
  });

  it('names the offending setting', async () => {
    await writeConfig({ maxWorkers: 0 });
    await expect(resolveEngineConfig(rootDir, {}, {})).rejects.toThrow(
      '.repoglyph.json: maxWorkers: Number must be greater than 0',
    );

    await writeConfig({ workers: 2 });
    await expect(resolveEngineConfig(rootDir, {}, {})).rejects.toThrow(
      ".repoglyph.json: (root): Unrecognized key(s) in object: 'workers'",
    );
  });

  it('rejects unknown tool names', async () => {
    await expect(resolveEngineConfig(rootDir, { tools: ['pylint'] }, {})).rejects.toThrow('unknown tool "pylint"');
  });

  it('skips tool resolution when the heatmap is off', async () => {
    const config = await resolveEngineConfig(rootDir, { heatmap: false, tools: ['pylint'] }, {});

    expect(config.tools).toEqual([]);
  });

  it('requires a tool given as a path to be executable', async () => {
    await writeConfig({ tools: [{ name: 'local', command: './bin/lint', languages: ['python'] }] });

    const missing = resolveEngineConfig(rootDir, {}, {});
    await expect(missing).rejects.toBeInstanceOf(ConfigError);
    await expect(missing).rejects.toThrow(
      `tool "local" points at ${path.join(rootDir, 'bin', 'lint')}, which is not an executable file`,
    );

    await fs.mkdir(path.join(rootDir, 'bin'));
    await fs.writeFile(path.join(rootDir, 'bin', 'lint'), '#!/bin/sh\nexit 0\n', { mode: 0o755 });
    const config = await resolveEngineConfig(rootDir, {}, {});
    expect(config.tools[0].command).toBe(path.join(rootDir, 'bin', 'lint'));
  });
});

describe('resolveCacheDir', () => {
  it('prefers the flag, then the environment, then the file', () => {
    const env = { REPOGLYPH_CACHE_DIR: '/var/cache/repoglyph' };

    expect(resolveCacheDir('/repo', 'flag-cache', 'file-cache', env)).toBe('/repo/flag-cache');
    expect(resolveCacheDir('/repo', undefined, 'file-cache', env)).toBe('/var/cache/repoglyph');
    expect(resolveCacheDir('/repo', undefined, 'file-cache', {})).toBe('/repo/file-cache');
    expect(resolveCacheDir('/repo', undefined, undefined, {})).toBe('/repo/.repoglyph/cache');
  });
});

describe('configVersion', () => {
  it('changes with settings that shape entries and ignores the worker count', async () => {
    const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-version-'));
    try {
      const base = await resolveEngineConfig(rootDir, {}, {});
      const version = configVersion(base);

      expect(configVersion({ ...base, maxWorkers: base.maxWorkers + 4 })).toBe(version);
      expect(configVersion({ ...base, toolTimeoutMs: 5 })).not.toBe(version);
      expect(configVersion({ ...base, minimap: false })).not.toBe(version);
      expect(configVersion({ ...base, tools: base.tools.slice(1) })).not.toBe(version);
      expect(configVersion({ ...base, toolLocations: { ...base.toolLocations, ruff: '/opt/lint/ruff' } })).not.toBe(
        version,
      );

      const lintOff = configVersion({ ...base, heatmap: false });
      expect(configVersion({ ...base, heatmap: false, tools: [] })).toBe(lintOff);
    } finally {
      await fs.rm(rootDir, { recursive: true, force: true });
    }
  });
});

describe('tool locations', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-bin-'));
    await fs.writeFile(path.join(binDir, 'fake-lint'), '#!/bin/sh\nexit 0\n', { mode: 0o755 });
    await fs.writeFile(path.join(binDir, 'notes'), 'not a program\n', { mode: 0o644 });
  });

  afterEach(async () => {
    await fs.rm(binDir, { recursive: true, force: true });
  });

  it('finds bare commands on PATH and reports absent ones as null', async () => {
    const env = { PATH: ['', binDir].join(path.delimiter) };

    expect(await locateCommand('fake-lint', env)).toBe(path.join(binDir, 'fake-lint'));
    expect(await locateCommand('notes', env)).toBeNull();
    expect(await locateCommand('repoglyph-absent-linter', env)).toBeNull();
    expect(await locateCommand(path.join(binDir, 'fake-lint'), {})).toBe(path.join(binDir, 'fake-lint'));
  });

  it('records where each enabled tool lives', async () => {
    const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoglyph-located-'));
    try {
      await fs.writeFile(
        path.join(rootDir, '.repoglyph.json'),
        JSON.stringify({
          tools: [
            { name: 'fake-lint', command: 'fake-lint', languages: ['python'] },
            { name: 'absent', command: 'repoglyph-absent-linter', languages: ['python'] },
          ],
        }),
      );

      const missing = await resolveEngineConfig(rootDir, {}, {});
      const installed = await resolveEngineConfig(rootDir, {}, { PATH: binDir });

      expect(missing.toolLocations).toEqual({ absent: null, 'fake-lint': null });
      expect(installed.toolLocations).toEqual({ absent: null, 'fake-lint': path.join(binDir, 'fake-lint') });
      expect(configVersion(installed)).not.toBe(configVersion(missing));
    } finally {
      await fs.rm(rootDir, { recursive: true, force: true });
    }
  });
});
