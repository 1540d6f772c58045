import * as fs from 'fs/promises';
import * as path from 'path';

import { AnnotateOptions, AnnotatedFile } from '../types';
import { AnnotationCache } from '../core/cache';
import { resolveEngineConfig } from '../core/config';
import { discoverSourceFiles } from '../core/files';
import { AnnotationRun, annotateFiles } from '../core/indexer';
import { ProcessRunner } from '../core/process';
import { logVerbose } from '../utils/log';

export interface AnnotateSummary {
  command: 'annotate';
  cacheDir: string;
  configVersion: string;
  totalFiles: number;
  computedFiles: number;
  cachedFiles: number;
  binaryFiles: number;
  unreadableFiles: number;
  parseErrors: number;
  degradedHeatmaps: number;
  tools: string[];
  outputPath?: string;
  generatedAt: string;
}

export interface AnnotateHooks {
  runner?: ProcessRunner;
  signal?: AbortSignal;
}

function countParseErrors(files: AnnotatedFile[]): number {
  return files.filter((file) => file.entry?.minimap?.extractionStatus === 'parseError').length;
}

function countDegradedHeatmaps(files: AnnotatedFile[]): number {
  return files.filter((file) => {
    const status = file.entry?.heatmap?.runStatus;
    return status !== undefined && status !== 'ok';
  }).length;
}

export async function runAnnotate(options: AnnotateOptions, hooks: AnnotateHooks = {}): Promise<AnnotateSummary> {
  const config = await resolveEngineConfig(options.rootDir, {
    cacheDir: options.cacheDir,
    maxWorkers: options.maxWorkers,
    toolTimeoutMs: options.toolTimeoutMs,
    tools: options.tools,
    minimap: options.minimap,
    heatmap: options.lint,
    ignore: options.ignore,
  });

  logVerbose(options.verbose, `[annotate] scanning files in ${config.rootDir}`);
  const sourceFiles = await discoverSourceFiles(config.rootDir, config.ignore);
  logVerbose(options.verbose, `[annotate] discovered ${sourceFiles.length} files, tools: ${config.tools.map((tool) => tool.name).join(', ') || '(none)'}`);

  const cache = await AnnotationCache.open({ cacheDir: config.cacheDir, verbose: options.verbose });
  let run: AnnotationRun;
  try {
    run = await annotateFiles(sourceFiles, {
      config,
      cache,
      runner: hooks.runner,
      signal: hooks.signal,
      verbose: options.verbose,
    });
  } finally {
    await cache.close();
  }
  logVerbose(options.verbose, `[annotate] at most ${run.peakToolProcesses} tool processes ran at once`);

  const summary: AnnotateSummary = {
    command: 'annotate',
    cacheDir: config.cacheDir,
    configVersion: run.configVersion,
    totalFiles: run.files.length,
    computedFiles: run.computedFiles,
    cachedFiles: run.cachedFiles,
    binaryFiles: run.binaryFiles,
    unreadableFiles: run.unreadableFiles,
    parseErrors: countParseErrors(run.files),
    degradedHeatmaps: countDegradedHeatmaps(run.files),
    tools: config.tools.map((tool) => tool.name),
    generatedAt: new Date().toISOString(),
  };

  if (options.outputPath) {
    const outputPath = path.isAbsolute(options.outputPath)
      ? options.outputPath
      : path.join(config.rootDir, options.outputPath);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, `${JSON.stringify({ ...summary, files: run.files }, null, 2)}\n`, 'utf8');
    summary.outputPath = outputPath;
    logVerbose(options.verbose, `[annotate] wrote ${outputPath}`);
  }

  return summary;
}
