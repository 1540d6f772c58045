import { createHash } from 'crypto';

import { FileIdentity } from '../types';
import { normalizeRepoPath } from '../utils/path';

export interface IdentityStats {
  mtimeMs: number;
}

export function hashContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Identity of one content snapshot. Only the bytes reach the fingerprint;
 * `mtimeMs` is carried along for diagnostics.
 */
export function identity(filePath: string, bytes: Uint8Array, stats?: IdentityStats): FileIdentity {
  return {
    path: normalizeRepoPath(filePath),
    contentFingerprint: hashContent(bytes),
    size: bytes.byteLength,
    mtimeMs: stats?.mtimeMs ?? 0,
  };
}

export function cacheKey(filePath: string, contentFingerprint: string, configVersion: string): string {
  return hashContent(`${normalizeRepoPath(filePath)}\u0000${contentFingerprint}\u0000${configVersion}`);
}
