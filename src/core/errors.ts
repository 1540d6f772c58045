export type ErrorCode = 'CONFIG_INVALID' | 'RESOURCE_EXHAUSTED' | 'CANCELLED';

export class RepoglyphError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'RepoglyphError';
  }
}

/** Invalid configuration the engine cannot work around. */
export class ConfigError extends RepoglyphError {
  constructor(message: string, hint?: string) {
    super('CONFIG_INVALID', message, hint ?? 'check .repoglyph.json and the command line flags');
    this.name = 'ConfigError';
  }
}

export class ResourceExhaustedError extends RepoglyphError {
  constructor(message: string) {
    super('RESOURCE_EXHAUSTED', message, 'lower --max-workers or analyze fewer files per run');
    this.name = 'ResourceExhaustedError';
  }
}

export class CancelledError extends RepoglyphError {
  constructor(message = 'operation cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof RepoglyphError)) {
    return 1;
  }
  if (error.code === 'CONFIG_INVALID') {
    return 2;
  }
  if (error.code === 'RESOURCE_EXHAUSTED') {
    return 3;
  }
  return 130;
}
