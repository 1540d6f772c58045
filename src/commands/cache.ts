import * as path from 'path';

import { AnnotationCache, CacheStats, EvictResult } from '../core/cache';
import { loadConfigFile, resolveCacheDir } from '../core/config';
import { logVerbose } from '../utils/log';

export type CacheAction = 'stats' | 'evict' | 'clear';

export interface CacheCommandOptions {
  rootDir: string;
  cacheDir?: string;
  action: CacheAction;
  maxRunsUnread?: number;
  maxBytes?: number;
  verbose: boolean;
}

export type CacheCommandResult =
  | { command: 'cache'; action: 'stats'; stats: CacheStats }
  | { command: 'cache'; action: 'evict'; evicted: EvictResult; stats: CacheStats }
  | { command: 'cache'; action: 'clear'; cacheDir: string };

export async function runCache(options: CacheCommandOptions): Promise<CacheCommandResult> {
  const fileConfig = await loadConfigFile(options.rootDir);
  const cacheDir = resolveCacheDir(options.rootDir, options.cacheDir, fileConfig.cacheDir);
  logVerbose(options.verbose, `[cache] using ${path.relative(options.rootDir, cacheDir) || cacheDir}`);

  const cache = await AnnotationCache.open({ cacheDir, verbose: options.verbose, recordRun: false });
  try {
    if (options.action === 'clear') {
      await cache.clear();
      return { command: 'cache', action: 'clear', cacheDir };
    }
    if (options.action === 'evict') {
      const evicted = await cache.evict({ maxRunsUnread: options.maxRunsUnread, maxBytes: options.maxBytes });
      logVerbose(options.verbose, `[cache] removed ${evicted.removed} entries (${evicted.freedBytes} bytes)`);
      return { command: 'cache', action: 'evict', evicted, stats: await cache.stats() };
    }
    return { command: 'cache', action: 'stats', stats: await cache.stats() };
  } finally {
    await cache.close();
  }
}
