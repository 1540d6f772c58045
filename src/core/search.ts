import { minimatch } from 'minimatch';

import { CacheEntry, CodeSymbol, ExtractionStatus, FileIdentity, SymbolKind } from '../types';
import { compareText } from '../utils/compare';
import { DEFAULT_CONTEXT_LINES, DEFAULT_SEARCH_LIMIT } from './constants';
import { ConfigError } from './errors';
import { detectLanguage } from './files';

export type SearchMode = 'text' | 'semantic';

export interface IndexDocument {
  entry: CacheEntry;
  content: string;
}

export interface IndexedFile {
  path: string;
  language: string;
  fileIdentity: FileIdentity;
  lines: string[];
  symbols: CodeSymbol[];
  extractionStatus: ExtractionStatus | null;
}

export interface QueryIndex {
  files: IndexedFile[];
  builtAt: string;
}

export interface SearchFilters {
  globs?: string[];
  kinds?: SymbolKind[];
  pattern?: boolean;
  contextLines?: number;
  limit?: number;
}

export interface LineRange {
  start: number;
  end: number;
}

export interface SearchHit {
  path: string;
  fileIdentity: FileIdentity;
  line: number;
  lineRange: LineRange;
  score: number;
  text: string;
  symbol?: CodeSymbol;
}

export interface Snippet {
  path: string;
  language: string;
  startLine: number;
  endLine: number;
  lines: string[];
  matchLines: number[];
}

export interface SnippetOptions {
  mergeGap?: number;
  maxLines?: number;
}

function splitLines(content: string): string[] {
  const lines = content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function identityOf(entry: CacheEntry, content: string): FileIdentity {
  return (
    entry.minimap?.fileIdentity ??
    entry.heatmap?.fileIdentity ?? {
      path: entry.path,
      contentFingerprint: entry.contentFingerprint,
      size: Buffer.byteLength(content, 'utf8'),
      mtimeMs: 0,
    }
  );
}

/** Builds a read-only index. Later documents for the same path replace earlier ones. */
export function buildIndex(documents: IndexDocument[]): QueryIndex {
  const byPath = new Map<string, IndexedFile>();
  for (const { entry, content } of documents) {
    byPath.set(entry.path, {
      path: entry.path,
      language: detectLanguage(entry.path),
      fileIdentity: identityOf(entry, content),
      lines: splitLines(content),
      symbols: entry.minimap?.symbols ?? [],
      extractionStatus: entry.minimap?.extractionStatus ?? null,
    });
  }

  return {
    files: Array.from(byPath.values()).sort((a, b) => compareText(a.path, b.path)),
    builtAt: new Date().toISOString(),
  };
}

export function globAccepts(filePath: string, globs: string[]): boolean {
  if (globs.length === 0) {
    return true;
  }
  return globs.some((glob) =>
    minimatch(filePath, glob, { nocase: true, dot: true, matchBase: !glob.includes('/') }),
  );
}

function clampRange(line: number, context: number, total: number): LineRange {
  return {
    start: Math.max(1, line - context),
    end: Math.max(1, Math.min(total, line + context)),
  };
}

type LineMatcher = (line: string) => number;

function lineMatcher(query: string, pattern: boolean): LineMatcher {
  if (!pattern) {
    const folded = query.toLowerCase();
    return (line) => {
      if (line.includes(query)) {
        return 2;
      }
      return line.toLowerCase().includes(folded) ? 1 : 0;
    };
  }

  let exact: RegExp;
  let folded: RegExp;
  try {
    exact = new RegExp(query);
    folded = new RegExp(query, 'i');
  } catch (error) {
    throw new ConfigError(
      `invalid search pattern: ${error instanceof Error ? error.message : String(error)}`,
      'drop --pattern to search for the literal text',
    );
  }
  return (line) => {
    if (exact.test(line)) {
      return 2;
    }
    return folded.test(line) ? 1 : 0;
  };
}

export function symbolScore(symbol: CodeSymbol, query: string): number {
  const folded = query.toLowerCase();
  const names = [symbol.name, symbol.qualifiedName];
  if (names.some((name) => name === query)) {
    return 4;
  }
  if (names.some((name) => name.toLowerCase() === folded)) {
    return 3;
  }
  if (names.some((name) => name.includes(query))) {
    return 2;
  }
  return names.some((name) => name.toLowerCase().includes(folded)) ? 1 : 0;
}

function compareHits(a: SearchHit, b: SearchHit): number {
  return (
    b.score - a.score ||
    compareText(a.path, b.path) ||
    a.line - b.line ||
    compareText(a.symbol?.qualifiedName ?? '', b.symbol?.qualifiedName ?? '')
  );
}

function searchText(index: QueryIndex, query: string, filters: SearchFilters): SearchHit[] {
  const match = lineMatcher(query, filters.pattern ?? false);
  const context = filters.contextLines ?? 0;
  const globs = filters.globs ?? [];
  const hits: SearchHit[] = [];

  for (const file of index.files) {
    if (!globAccepts(file.path, globs)) {
      continue;
    }
    file.lines.forEach((text, i) => {
      const score = match(text);
      if (score === 0) {
        return;
      }
      const line = i + 1;
      hits.push({
        path: file.path,
        fileIdentity: file.fileIdentity,
        line,
        lineRange: clampRange(line, context, file.lines.length),
        score,
        text,
      });
    });
  }
  return hits;
}

function searchSymbols(index: QueryIndex, query: string, filters: SearchFilters): SearchHit[] {
  const context = filters.contextLines ?? DEFAULT_CONTEXT_LINES;
  const globs = filters.globs ?? [];
  const kinds = filters.kinds ?? [];
  const hits: SearchHit[] = [];

  for (const file of index.files) {
    if (file.extractionStatus !== 'ok' || !globAccepts(file.path, globs)) {
      continue;
    }
    for (const symbol of file.symbols) {
      if (kinds.length > 0 && !kinds.includes(symbol.kind)) {
        continue;
      }
      const score = symbolScore(symbol, query);
      if (score === 0) {
        continue;
      }
      hits.push({
        path: file.path,
        fileIdentity: file.fileIdentity,
        line: symbol.declaredLine,
        lineRange: clampRange(symbol.declaredLine, context, file.lines.length),
        score,
        text: file.lines[symbol.declaredLine - 1] ?? '',
        symbol,
      });
    }
  }
  return hits;
}

/**
 * Ranked matches over an already built index. Files that were never
 * annotated are simply not in the index.
 */
export function search(index: QueryIndex, query: string, mode: SearchMode, filters: SearchFilters = {}): SearchHit[] {
  if (query.length === 0) {
    return [];
  }
  const hits = mode === 'semantic' ? searchSymbols(index, query, filters) : searchText(index, query, filters);
  hits.sort(compareHits);
  return hits.slice(0, filters.limit ?? DEFAULT_SEARCH_LIMIT);
}

/** Groups hits per file and merges ranges that overlap or sit within `mergeGap` lines. */
export function toSnippets(index: QueryIndex, hits: SearchHit[], options: SnippetOptions = {}): Snippet[] {
  const mergeGap = options.mergeGap ?? 3;
  const maxLines = options.maxLines ?? 60;
  const files = new Map(index.files.map((file) => [file.path, file]));

  const byPath = new Map<string, SearchHit[]>();
  for (const hit of hits) {
    const list = byPath.get(hit.path) ?? [];
    list.push(hit);
    byPath.set(hit.path, list);
  }

  const snippets: Snippet[] = [];
  for (const filePath of Array.from(byPath.keys()).sort(compareText)) {
    const file = files.get(filePath);
    const fileHits = byPath.get(filePath);
    if (!file || !fileHits) {
      continue;
    }

    const ranges = fileHits
      .map((hit) => ({ start: hit.lineRange.start, end: hit.lineRange.end, matches: [hit.line] }))
      .sort((a, b) => a.start - b.start || a.end - b.end);

    const merged: typeof ranges = [];
    for (const range of ranges) {
      const last = merged[merged.length - 1];
      if (last && range.start <= last.end + mergeGap) {
        last.end = Math.max(last.end, range.end);
        last.matches.push(...range.matches);
      } else {
        merged.push({ ...range, matches: [...range.matches] });
      }
    }

    for (const range of merged) {
      const endLine = Math.min(range.end, range.start + maxLines - 1);
      snippets.push({
        path: filePath,
        language: file.language,
        startLine: range.start,
        endLine,
        lines: file.lines.slice(range.start - 1, endLine),
        matchLines: Array.from(new Set(range.matches)).sort((a, b) => a - b),
      });
    }
  }
  return snippets;
}
