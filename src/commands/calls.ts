import * as fs from 'fs/promises';
import * as path from 'path';

import { ArtifactSelection } from '../types';
import { AnnotationCache } from '../core/cache';
import { resolveEngineConfig } from '../core/config';
import { ConfigError } from '../core/errors';
import { discoverSourceFiles } from '../core/files';
import { CallQueryResult, CallSite, buildCallGraph, queryCalls } from '../core/graph';
import { CachedDocuments, collectCachedDocuments } from '../core/indexer';
import { logVerbose } from '../utils/log';

export interface CallsOptions extends ArtifactSelection {
  rootDir: string;
  cacheDir?: string;
  symbolName: string;
  limit: number;
  format: 'json' | 'md';
  outputPath?: string;
  ignore: string[];
  verbose: boolean;
}

export interface CallsResult extends CallQueryResult {
  command: 'calls';
  format: 'json' | 'md';
  outputPath?: string;
}

function siteLine(site: CallSite, label: string): string {
  const resolution = site.resolved ? '' : ' (unresolved)';
  return `- \`${site.path}:${site.line}\` ${label}${resolution}`;
}

function toMarkdown(result: CallsResult): string {
  const lines: string[] = [];
  lines.push('# repoglyph calls');
  lines.push('');
  lines.push(`- symbol: \`${result.name}\``);
  lines.push(`- definitions: ${result.definitions.length}`);
  lines.push(`- callers: ${result.callers.length}`);
  lines.push(`- callees: ${result.callees.length}`);
  lines.push('');

  lines.push('## Definitions');
  if (result.definitions.length === 0) {
    lines.push('- (none found in cached minimaps)');
  } else {
    for (const def of result.definitions) {
      lines.push(`- \`${def.path}:${def.line}\` ${def.kind} \`${def.qualifiedName}\``);
    }
  }

  lines.push('');
  lines.push('## Callers');
  if (result.callers.length === 0) {
    lines.push('- (none)');
  } else {
    for (const site of result.callers) {
      lines.push(siteLine(site, `\`${site.caller}\` calls \`${site.callee}\``));
    }
  }

  lines.push('');
  lines.push('## Callees');
  if (result.callees.length === 0) {
    lines.push('- (none)');
  } else {
    for (const site of result.callees) {
      lines.push(siteLine(site, `\`${site.caller}\` calls \`${site.callee}\``));
    }
  }

  lines.push('');
  return `${lines.join('\n')}\n`;
}

export async function runCalls(options: CallsOptions): Promise<CallsResult> {
  const symbolName = options.symbolName.trim();
  if (symbolName.length === 0) {
    throw new ConfigError('symbol name is empty', 'pass --name <symbol>');
  }

  const config = await resolveEngineConfig(options.rootDir, {
    cacheDir: options.cacheDir,
    tools: options.tools,
    minimap: options.minimap,
    heatmap: options.lint,
    ignore: options.ignore,
  });
  const sourceFiles = await discoverSourceFiles(config.rootDir, config.ignore);
  const cache = await AnnotationCache.open({ cacheDir: config.cacheDir, verbose: options.verbose, recordRun: false });
  let collected: CachedDocuments;
  try {
    collected = await collectCachedDocuments(sourceFiles, config, cache);
  } finally {
    await cache.close();
  }
  const { documents, missingFiles } = collected;
  if (missingFiles > 0) {
    logVerbose(options.verbose, `[calls] ${missingFiles} files have no cached minimap`);
  }

  const graph = buildCallGraph(documents.map((document) => document.entry));
  logVerbose(options.verbose, `[calls] call graph has ${graph.order} nodes and ${graph.size} edges`);

  const result: CallsResult = {
    command: 'calls',
    format: options.format,
    ...queryCalls(graph, symbolName, options.limit),
  };

  if (options.outputPath) {
    const outputPath = path.isAbsolute(options.outputPath)
      ? options.outputPath
      : path.join(config.rootDir, options.outputPath);

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    const content = options.format === 'md'
      ? toMarkdown(result)
      : `${JSON.stringify(result, null, 2)}\n`;
    await fs.writeFile(outputPath, content, 'utf8');
    result.outputPath = outputPath;
    logVerbose(options.verbose, `[calls] wrote ${outputPath}`);
  }

  return result;
}
