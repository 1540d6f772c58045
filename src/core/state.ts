import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

import { z } from 'zod';

import { CacheEntry } from '../types';
import { MAX_RECORDED_RUNS } from './constants';

const ENTRIES_DIR = 'entries';
const RUNS_FILE = 'runs.json';

const severitySchema = z.enum(['info', 'warning', 'error']);
const runStatusSchema = z.enum(['ok', 'timeout', 'toolMissing', 'toolError']);

const fileIdentitySchema = z.object({
  path: z.string(),
  contentFingerprint: z.string(),
  size: z.number(),
  mtimeMs: z.number(),
});

const minimapSchema = z.object({
  fileIdentity: fileIdentitySchema,
  symbols: z.array(
    z.object({
      name: z.string(),
      qualifiedName: z.string(),
      kind: z.enum(['class', 'function', 'method', 'interface']),
      declaredLine: z.number().int().positive(),
      language: z.string(),
    }),
  ),
  edges: z.array(
    z.object({
      callerSymbol: z.string(),
      calleeName: z.string(),
      line: z.number().int().positive(),
    }),
  ),
  extractionStatus: z.enum(['ok', 'unsupportedLanguage', 'parseError']),
});

const heatmapSchema = z.object({
  fileIdentity: fileIdentitySchema,
  lineSeverity: z.record(severitySchema),
  rawFindings: z.array(
    z.object({
      line: z.number().int().positive(),
      severity: severitySchema,
      message: z.string(),
      sourceToolName: z.string(),
      code: z.string().optional(),
    }),
  ),
  runStatus: runStatusSchema,
  toolRuns: z.array(
    z.object({
      tool: z.string(),
      status: runStatusSchema,
      durationMs: z.number(),
      exitCode: z.number().nullable().optional(),
      detail: z.string().optional(),
    }),
  ),
});

export const cacheEntrySchema = z.object({
  key: z.string().regex(/^[0-9a-f]{64}$/),
  path: z.string(),
  contentFingerprint: z.string(),
  configVersion: z.string(),
  minimap: minimapSchema.optional(),
  heatmap: heatmapSchema.optional(),
  writtenAt: z.string(),
});

const runManifestSchema = z.object({
  runs: z.array(z.object({ startedAt: z.number() })),
});

export type RunManifest = z.infer<typeof runManifestSchema>;

export type EntryReadResult =
  | { kind: 'hit'; entry: CacheEntry }
  | { kind: 'miss' }
  | { kind: 'invalid'; reason: string };

export interface StoredEntry {
  key: string;
  filePath: string;
  size: number;
  mtimeMs: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function entriesDir(cacheDir: string): string {
  return path.join(cacheDir, ENTRIES_DIR);
}

export function entryPath(cacheDir: string, key: string): string {
  return path.join(entriesDir(cacheDir), key.slice(0, 2), `${key}.json`);
}

/**
 * Writes through a sibling temp file and a rename, so readers see either the
 * previous file or the complete new one.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(value)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function readEntry(cacheDir: string, key: string): Promise<EntryReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(entryPath(cacheDir, key), 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return { kind: 'miss' };
    }
    return { kind: 'invalid', reason: error instanceof Error ? error.message : String(error) };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: 'invalid', reason: 'entry is not valid json' };
  }

  const parsed = cacheEntrySchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'invalid', reason: parsed.error.issues[0]?.message ?? 'entry does not match its schema' };
  }
  if (parsed.data.key !== key) {
    return { kind: 'invalid', reason: `entry stored under ${key} carries key ${parsed.data.key}` };
  }
  return { kind: 'hit', entry: parsed.data };
}

export async function writeEntry(cacheDir: string, entry: CacheEntry, accessedAt: Date): Promise<void> {
  const filePath = entryPath(cacheDir, entry.key);
  await writeJsonAtomic(filePath, entry);
  await fs.utimes(filePath, accessedAt, accessedAt);
}

/** Marks an entry as read in the current run. Content is never rewritten. */
export async function touchEntry(cacheDir: string, key: string, accessedAt: Date): Promise<void> {
  await fs.utimes(entryPath(cacheDir, key), accessedAt, accessedAt);
}

export async function removeEntry(cacheDir: string, key: string): Promise<void> {
  await fs.rm(entryPath(cacheDir, key), { force: true });
}

export async function listEntries(cacheDir: string): Promise<StoredEntry[]> {
  let shards: string[];
  try {
    shards = await fs.readdir(entriesDir(cacheDir));
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const entries: StoredEntry[] = [];
  for (const shard of shards.sort()) {
    const shardDir = path.join(entriesDir(cacheDir), shard);
    let names: string[];
    try {
      names = await fs.readdir(shardDir);
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      throw error;
    }
    for (const name of names.sort()) {
      if (!name.endsWith('.json')) {
        continue;
      }
      const filePath = path.join(shardDir, name);
      try {
        const stats = await fs.stat(filePath);
        entries.push({ key: name.slice(0, -'.json'.length), filePath, size: stats.size, mtimeMs: stats.mtimeMs });
      } catch (error) {
        // Removed by a concurrent eviction.
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
  }
  return entries;
}

export async function loadRunManifest(cacheDir: string): Promise<RunManifest> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(path.join(cacheDir, RUNS_FILE), 'utf8'));
  } catch {
    // Missing, unreadable or damaged: run history starts over.
    return { runs: [] };
  }
  const parsed = runManifestSchema.safeParse(json);
  return parsed.success ? parsed.data : { runs: [] };
}

export async function recordRun(cacheDir: string, startedAt: Date): Promise<RunManifest> {
  const manifest = await loadRunManifest(cacheDir);
  const runs = [...manifest.runs, { startedAt: startedAt.getTime() }].slice(-MAX_RECORDED_RUNS);
  const next: RunManifest = { runs };
  await writeJsonAtomic(path.join(cacheDir, RUNS_FILE), next);
  return next;
}

export async function clearStore(cacheDir: string): Promise<void> {
  await fs.rm(entriesDir(cacheDir), { recursive: true, force: true });
  await fs.rm(path.join(cacheDir, RUNS_FILE), { recursive: true, force: true });
}
