import { AnnotatedFile, EngineConfig, HeatmapOverlay, Minimap } from '../types';
import { logVerbose } from '../utils/log';
import { AnnotationCache, ComputedArtifacts } from './cache';
import { configVersion } from './config';
import { SourceFile, readSourceFile } from './files';
import { identity } from './hash';
import { runLinters } from './linter';
import { extract } from './minimap';
import { WorkerPool, mapLimit } from './parallel';
import { ProcessRunner } from './process';
import { IndexDocument } from './search';

export interface AnnotateRunOptions {
  config: EngineConfig;
  cache: AnnotationCache;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  verbose?: boolean;
}

export interface AnnotationRun {
  files: AnnotatedFile[];
  configVersion: string;
  computedFiles: number;
  cachedFiles: number;
  binaryFiles: number;
  unreadableFiles: number;
  peakToolProcesses: number;
}

/**
 * Annotates every file once: unchanged content under an unchanged config is
 * served from the cache, everything else gets a fresh minimap and heatmap.
 */
export async function annotateFiles(sourceFiles: SourceFile[], options: AnnotateRunOptions): Promise<AnnotationRun> {
  const { config, cache, signal } = options;
  const verbose = options.verbose ?? false;
  const version = configVersion(config);
  const pool = new WorkerPool({ size: config.maxWorkers, signal });

  const files = await mapLimit(
    sourceFiles,
    config.maxWorkers,
    async (sourceFile): Promise<AnnotatedFile> => {
      const read = await readSourceFile(sourceFile);
      if (read.kind === 'binary') {
        return { path: sourceFile.relPath, language: sourceFile.language, status: 'binary' };
      }
      if (read.kind === 'unreadable') {
        logVerbose(verbose, `[annotate] cannot read ${sourceFile.relPath}: ${read.reason}`);
        return { path: sourceFile.relPath, language: sourceFile.language, status: 'unreadable', detail: read.reason };
      }

      const fileIdentity = identity(sourceFile.relPath, read.bytes, { mtimeMs: read.mtimeMs });
      let computed = false;

      const entry = await cache.getOrCompute(
        fileIdentity,
        version,
        async (computeSignal): Promise<ComputedArtifacts> => {
          computed = true;
          const [minimap, heatmap] = await Promise.all([
            config.minimap
              ? extract(fileIdentity, read.text, sourceFile.language, {
                  maxBytes: config.maxFileBytes,
                  onFailure: (reason) => logVerbose(verbose, `[annotate] ${sourceFile.relPath}: ${reason}`),
                })
              : Promise.resolve<Minimap | undefined>(undefined),
            config.heatmap
              ? runLinters(fileIdentity, read.text, sourceFile.language, config.tools, {
                  pool,
                  rootDir: config.rootDir,
                  absPath: sourceFile.absPath,
                  defaultTimeoutMs: config.toolTimeoutMs,
                  runner: options.runner,
                  signal: computeSignal,
                })
              : Promise.resolve<HeatmapOverlay | undefined>(undefined),
          ]);
          return { minimap, heatmap };
        },
        signal,
      );

      return {
        path: sourceFile.relPath,
        language: sourceFile.language,
        status: computed ? 'computed' : 'cached',
        entry,
      };
    },
    signal,
  );

  const count = (status: AnnotatedFile['status']): number => files.filter((file) => file.status === status).length;

  return {
    files,
    configVersion: version,
    computedFiles: count('computed'),
    cachedFiles: count('cached'),
    binaryFiles: count('binary'),
    unreadableFiles: count('unreadable'),
    peakToolProcesses: pool.peakRunning,
  };
}

export interface CachedDocuments {
  documents: IndexDocument[];
  missingFiles: number;
}

/**
 * Pairs every readable file with its stored entry under the current config.
 * Nothing is computed; files without an entry are counted and left out.
 */
export async function collectCachedDocuments(
  sourceFiles: SourceFile[],
  config: EngineConfig,
  cache: AnnotationCache,
): Promise<CachedDocuments> {
  const version = configVersion(config);
  const found = await mapLimit(sourceFiles, config.maxWorkers, async (sourceFile): Promise<IndexDocument | null> => {
    const read = await readSourceFile(sourceFile);
    if (read.kind !== 'text') {
      return null;
    }
    const fileIdentity = identity(sourceFile.relPath, read.bytes, { mtimeMs: read.mtimeMs });
    const entry = await cache.peek(fileIdentity, version);
    return entry ? { entry, content: read.text } : null;
  });

  const documents = found.filter((document): document is IndexDocument => document !== null);
  return { documents, missingFiles: found.length - documents.length };
}
