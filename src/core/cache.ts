import * as fs from 'fs/promises';

import { CacheEntry, FileIdentity, HeatmapOverlay, Minimap } from '../types';
import { compareText } from '../utils/compare';
import { describeError, logVerbose, logWarn } from '../utils/log';
import { DEFAULT_EVICT_MAX_RUNS } from './constants';
import { CancelledError, throwIfAborted } from './errors';
import { cacheKey } from './hash';
import {
  clearStore,
  listEntries,
  loadRunManifest,
  readEntry,
  recordRun,
  removeEntry,
  StoredEntry,
  touchEntry,
  writeEntry,
} from './state';

export interface ComputedArtifacts {
  minimap?: Minimap;
  heatmap?: HeatmapOverlay;
}

export type ComputeFn = (signal?: AbortSignal) => Promise<ComputedArtifacts>;

export interface AnnotationCacheOptions {
  cacheDir: string;
  verbose?: boolean;
  now?: () => Date;
  // Query and maintenance commands open the store without counting as a run.
  recordRun?: boolean;
}

export interface EvictOptions {
  maxRunsUnread?: number;
  maxBytes?: number;
}

export interface EvictResult {
  removed: number;
  freedBytes: number;
  remainingEntries: number;
  remainingBytes: number;
}

export interface CacheStats {
  cacheDir: string;
  entries: number;
  bytes: number;
  runs: number;
  lastRunAt: string | null;
}

/**
 * Content-addressed store of annotation entries. Entries are immutable; a
 * changed file or configuration lands under a new key and the old one waits
 * for eviction.
 */
export class AnnotationCache {
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();
  private closed = false;

  private constructor(
    readonly cacheDir: string,
    private readonly verbose: boolean,
    private readonly now: () => Date,
  ) {}

  /** Opens the store and, by default, records the start of a run for eviction bookkeeping. */
  static async open(options: AnnotationCacheOptions): Promise<AnnotationCache> {
    const now = options.now ?? (() => new Date());
    await fs.mkdir(options.cacheDir, { recursive: true });
    if (options.recordRun ?? true) {
      try {
        await recordRun(options.cacheDir, now());
      } catch (error) {
        logWarn(`could not record run in ${options.cacheDir}: ${describeError(error)}`);
      }
    }
    return new AnnotationCache(options.cacheDir, options.verbose ?? false, now);
  }

  /** Read-only lookup: no computation, no access bookkeeping. */
  async peek(fileIdentity: FileIdentity, configVersion: string): Promise<CacheEntry | null> {
    const key = cacheKey(fileIdentity.path, fileIdentity.contentFingerprint, configVersion);
    const result = await readEntry(this.cacheDir, key);
    if (result.kind === 'invalid') {
      logVerbose(this.verbose, `[cache] ignoring ${fileIdentity.path}: ${result.reason}`);
    }
    return result.kind === 'hit' ? result.entry : null;
  }

  getOrCompute(
    fileIdentity: FileIdentity,
    configVersion: string,
    compute: ComputeFn,
    signal?: AbortSignal,
  ): Promise<CacheEntry> {
    if (this.closed) {
      return Promise.reject(new Error('annotation cache is closed'));
    }

    const key = cacheKey(fileIdentity.path, fileIdentity.contentFingerprint, configVersion);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const task = this.lookupOrCompute(key, fileIdentity, configVersion, compute, signal);
    this.inFlight.set(key, task);
    const release = (): void => {
      this.inFlight.delete(key);
    };
    task.then(release, release);
    return task;
  }

  private async lookupOrCompute(
    key: string,
    fileIdentity: FileIdentity,
    configVersion: string,
    compute: ComputeFn,
    signal?: AbortSignal,
  ): Promise<CacheEntry> {
    const stored = await readEntry(this.cacheDir, key);
    if (stored.kind === 'hit') {
      await this.touch(key);
      return stored.entry;
    }
    if (stored.kind === 'invalid') {
      logVerbose(this.verbose, `[cache] recomputing ${fileIdentity.path}: ${stored.reason}`);
    }

    throwIfAborted(signal);
    const artifacts = await compute(signal);
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const entry: CacheEntry = {
      key,
      path: fileIdentity.path,
      contentFingerprint: fileIdentity.contentFingerprint,
      configVersion,
      ...(artifacts.minimap ? { minimap: artifacts.minimap } : {}),
      ...(artifacts.heatmap ? { heatmap: artifacts.heatmap } : {}),
      writtenAt: this.now().toISOString(),
    };

    try {
      await writeEntry(this.cacheDir, entry, this.now());
    } catch (error) {
      logWarn(`could not store cache entry for ${fileIdentity.path}: ${describeError(error)}`);
    }
    return entry;
  }

  private async touch(key: string): Promise<void> {
    try {
      await touchEntry(this.cacheDir, key, this.now());
    } catch (error) {
      logVerbose(this.verbose, `[cache] could not touch ${key}: ${describeError(error)}`);
    }
  }

  async evict(options: EvictOptions = {}): Promise<EvictResult> {
    const maxRunsUnread = options.maxRunsUnread ?? DEFAULT_EVICT_MAX_RUNS;
    const manifest = await loadRunManifest(this.cacheDir);
    const entries = await listEntries(this.cacheDir);

    const runs = manifest.runs.map((run) => run.startedAt).sort((a, b) => a - b);
    const threshold = maxRunsUnread > 0 && runs.length >= maxRunsUnread ? runs[runs.length - maxRunsUnread] : null;

    let removed = 0;
    let freedBytes = 0;
    const kept: StoredEntry[] = [];
    for (const entry of entries) {
      // utimes round-trips through float seconds; compare whole milliseconds.
      if (threshold !== null && Math.round(entry.mtimeMs) < threshold && !this.inFlight.has(entry.key)) {
        await removeEntry(this.cacheDir, entry.key);
        removed += 1;
        freedBytes += entry.size;
      } else {
        kept.push(entry);
      }
    }

    let remainingBytes = kept.reduce((sum, entry) => sum + entry.size, 0);
    if (options.maxBytes !== undefined && remainingBytes > options.maxBytes) {
      kept.sort((a, b) => a.mtimeMs - b.mtimeMs || compareText(a.key, b.key));
      while (kept.length > 0 && remainingBytes > options.maxBytes) {
        const oldest = kept.shift();
        if (!oldest) {
          break;
        }
        await removeEntry(this.cacheDir, oldest.key);
        removed += 1;
        freedBytes += oldest.size;
        remainingBytes -= oldest.size;
      }
    }

    return { removed, freedBytes, remainingEntries: kept.length, remainingBytes };
  }

  async stats(): Promise<CacheStats> {
    const [entries, manifest] = await Promise.all([listEntries(this.cacheDir), loadRunManifest(this.cacheDir)]);
    const lastRun = manifest.runs[manifest.runs.length - 1];
    return {
      cacheDir: this.cacheDir,
      entries: entries.length,
      bytes: entries.reduce((sum, entry) => sum + entry.size, 0),
      runs: manifest.runs.length,
      lastRunAt: lastRun ? new Date(lastRun.startedAt).toISOString() : null,
    };
  }

  async clear(): Promise<void> {
    await this.drain();
    await clearStore(this.cacheDir);
  }

  /** Waits for in-flight computations; later calls to getOrCompute reject. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  private async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight.values()));
  }
}
