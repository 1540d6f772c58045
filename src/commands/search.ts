import { SearchOptions } from '../types';
import { AnnotationCache } from '../core/cache';
import { resolveEngineConfig } from '../core/config';
import { discoverSourceFiles } from '../core/files';
import { CachedDocuments, collectCachedDocuments } from '../core/indexer';
import { SearchHit, Snippet, buildIndex, search, toSnippets } from '../core/search';
import { logVerbose } from '../utils/log';

interface SearchResultItem {
  path: string;
  line: number;
  startLine: number;
  endLine: number;
  score: number;
  text: string;
  symbol?: string;
  kind?: string;
}

export interface SearchResult {
  command: 'search';
  query: string;
  mode: SearchOptions['mode'];
  indexedFiles: number;
  missingFiles: number;
  results: SearchResultItem[];
  snippets?: Snippet[];
}

function toItem(hit: SearchHit): SearchResultItem {
  return {
    path: hit.path,
    line: hit.line,
    startLine: hit.lineRange.start,
    endLine: hit.lineRange.end,
    score: hit.score,
    text: hit.text,
    ...(hit.symbol ? { symbol: hit.symbol.qualifiedName, kind: hit.symbol.kind } : {}),
  };
}

export async function runSearch(options: SearchOptions): Promise<SearchResult> {
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
    logVerbose(options.verbose, `[search] ${missingFiles} files have no cached annotations; run \`repoglyph annotate\` to include them`);
  }

  const index = buildIndex(documents);
  const hits = search(index, options.query, options.mode, {
    globs: options.globs,
    kinds: options.kinds,
    pattern: options.pattern,
    contextLines: options.contextLines ?? (options.mode === 'semantic' ? config.contextLines : 0),
    limit: options.limit,
  });
  logVerbose(options.verbose, `[search] ${hits.length} matches in ${index.files.length} indexed files`);

  return {
    command: 'search',
    query: options.query,
    mode: options.mode,
    indexedFiles: index.files.length,
    missingFiles,
    results: hits.map(toItem),
    ...(options.snippets ? { snippets: toSnippets(index, hits) } : {}),
  };
}
