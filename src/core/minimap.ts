import { FileIdentity, Minimap } from '../types';
import { DEFAULT_MAX_FILE_BYTES } from './constants';
import { capabilityFor } from './languages';

export interface ExtractOptions {
  maxBytes?: number;
  onFailure?: (reason: string) => void;
}

function emptyMinimap(fileIdentity: FileIdentity, extractionStatus: Minimap['extractionStatus']): Minimap {
  return { fileIdentity, symbols: [], edges: [], extractionStatus };
}

/**
 * Builds the structural summary of one file. Never rejects: missing grammars
 * and unparsable or oversized content come back as a status.
 */
export async function extract(
  fileIdentity: FileIdentity,
  content: string,
  language: string,
  options: ExtractOptions = {},
): Promise<Minimap> {
  const capability = capabilityFor(language);
  if (!capability) {
    return emptyMinimap(fileIdentity, 'unsupportedLanguage');
  }

  const maxBytes = options.maxBytes ?? DEFAULT_MAX_FILE_BYTES;
  if (Buffer.byteLength(content, 'utf8') > maxBytes) {
    options.onFailure?.(`content exceeds ${maxBytes} bytes`);
    return emptyMinimap(fileIdentity, 'parseError');
  }

  try {
    const structure = await capability.extract(content.replace(/^\uFEFF/, ''));
    if (!structure.ok) {
      options.onFailure?.(structure.reason);
      return emptyMinimap(fileIdentity, 'parseError');
    }
    return {
      fileIdentity,
      symbols: structure.symbols,
      edges: structure.edges,
      extractionStatus: 'ok',
    };
  } catch (error) {
    options.onFailure?.(error instanceof Error ? error.message : String(error));
    return emptyMinimap(fileIdentity, 'parseError');
  }
}
