import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';

import { BINARY_SNIFF_BYTES, DEFAULT_IGNORES, SPECIAL_FILENAMES, SUPPORTED_EXTENSIONS } from './constants';
import { compareText } from '../utils/compare';
import { normalizeRepoPath, toRepoRelative } from '../utils/path';

export interface SourceFile {
  absPath: string;
  relPath: string;
  language: string;
}

export type ReadResult =
  | { kind: 'text'; bytes: Buffer; text: string; mtimeMs: number }
  | { kind: 'binary' }
  | { kind: 'unreadable'; reason: string };

export function detectLanguage(filePath: string): string {
  const base = path.basename(filePath).toLowerCase();
  const special = SPECIAL_FILENAMES[base];
  if (special) {
    return special;
  }
  const ext = path.extname(base);
  return SUPPORTED_EXTENSIONS[ext] ?? 'text';
}

export function isProbablyText(bytes: Uint8Array): boolean {
  const limit = Math.min(bytes.byteLength, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i += 1) {
    if (bytes[i] === 0) {
      return false;
    }
  }
  return true;
}

export function toSourceFile(rootDir: string, relPath: string): SourceFile {
  const normalized = normalizeRepoPath(relPath);
  return {
    absPath: path.join(rootDir, normalized),
    relPath: normalized,
    language: detectLanguage(normalized),
  };
}

export async function discoverSourceFiles(rootDir: string, ignore: string[]): Promise<SourceFile[]> {
  const files = await glob('**/*', {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    dot: false,
    ignore: [...DEFAULT_IGNORES, ...ignore],
  });

  const discovered = files
    .map((absPath) => toRepoRelative(rootDir, absPath))
    .filter((relPath): relPath is string => relPath !== null)
    .map((relPath) => toSourceFile(rootDir, relPath));
  discovered.sort((a, b) => compareText(a.relPath, b.relPath));
  return discovered;
}

export async function readSourceFile(sourceFile: SourceFile): Promise<ReadResult> {
  try {
    const [bytes, stats] = await Promise.all([fs.readFile(sourceFile.absPath), fs.stat(sourceFile.absPath)]);
    if (!isProbablyText(bytes)) {
      return { kind: 'binary' };
    }
    return {
      kind: 'text',
      bytes,
      text: bytes.toString('utf8'),
      mtimeMs: stats.mtimeMs,
    };
  } catch (error) {
    return {
      kind: 'unreadable',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}
