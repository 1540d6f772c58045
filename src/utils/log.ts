export function logVerbose(verbose: boolean, message: string): void {
  if (verbose) {
    console.error(message);
  }
}

export function logWarn(message: string): void {
  console.warn(`[repoglyph] ${message}`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
