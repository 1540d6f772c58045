import * as path from 'path';

export function normalizeRepoPath(value: string): string {
  const slashed = value.split('\\').join('/');
  const normalized = path.posix.normalize(slashed);
  return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

export function toRepoRelative(rootDir: string, filePath: string): string | null {
  const absolute = path.isAbsolute(filePath) ? filePath : path.join(rootDir, filePath);
  const relative = path.relative(rootDir, absolute);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return normalizeRepoPath(relative);
}
