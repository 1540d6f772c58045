import { ChildProcess, spawn } from 'child_process';

import { ResourceExhaustedError } from './errors';

const MISSING_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);
const EXHAUSTED_CODES = new Set(['EMFILE', 'ENFILE', 'EAGAIN', 'ENOMEM']);
const DEFAULT_MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ProcessRequest {
  command: string;
  args: string[];
  cwd?: string;
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  maxOutputBytes?: number;
}

export type ProcessOutcome =
  | {
      status: 'exited';
      exitCode: number | null;
      stdout: string;
      stderr: string;
      truncated: boolean;
      durationMs: number;
      pid?: number;
    }
  | { status: 'timeout'; durationMs: number; pid?: number }
  | { status: 'cancelled'; durationMs: number; pid?: number }
  | { status: 'missing'; durationMs: number; detail: string };

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessOutcome>;

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function killTree(child: ChildProcess): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return;
  }
  if (process.platform !== 'win32') {
    try {
      // Negative pid addresses the whole process group created by `detached`.
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      if (errorCode(error) === 'ESRCH') {
        return;
      }
    }
  }
  child.kill('SIGKILL');
}

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.size + chunk.length > this.limit) {
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Runs one external command to completion, bounded by `timeoutMs`. The child
 * (and its process group on POSIX) is killed on timeout or abort, and the
 * returned promise settles only after the child has closed.
 */
export function runProcess(request: ProcessRequest): Promise<ProcessOutcome> {
  const startedAt = Date.now();
  const elapsed = (): number => Date.now() - startedAt;

  if (request.signal?.aborted) {
    return Promise.resolve({ status: 'cancelled', durationMs: 0 });
  }

  return new Promise<ProcessOutcome>((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(request.command, request.args, {
        cwd: request.cwd,
        stdio: [request.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
        windowsHide: true,
      });
    } catch (error) {
      const code = errorCode(error);
      if (code && EXHAUSTED_CODES.has(code)) {
        reject(new ResourceExhaustedError(`cannot start ${request.command}: ${code}`));
        return;
      }
      resolve({ status: 'missing', durationMs: elapsed(), detail: String(error) });
      return;
    }

    const limit = request.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const stdout = new OutputBuffer(limit);
    const stderr = new OutputBuffer(limit);
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let stdinError: string | undefined;

    const onAbort = (): void => {
      cancelled = true;
      killTree(child);
    };
    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
    }, request.timeoutMs);

    const finish = (outcome: ProcessOutcome | Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
      if (outcome instanceof Error) {
        reject(outcome);
      } else {
        resolve(outcome);
      }
    };

    request.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => {
      const code = errorCode(error);
      if (child.pid !== undefined) {
        // Already running; the close event reports the result.
        stderr.push(Buffer.from(`\n${error.message}`));
        return;
      }
      if (code && EXHAUSTED_CODES.has(code)) {
        finish(new ResourceExhaustedError(`cannot start ${request.command}: ${code}`));
        return;
      }
      finish({
        status: 'missing',
        durationMs: elapsed(),
        detail: code && MISSING_CODES.has(code) ? `${request.command}: ${code}` : error.message,
      });
    });

    child.on('close', (exitCode) => {
      if (timedOut) {
        finish({ status: 'timeout', durationMs: elapsed(), pid: child.pid });
        return;
      }
      if (cancelled) {
        finish({ status: 'cancelled', durationMs: elapsed(), pid: child.pid });
        return;
      }
      const stderrText = stdinError ? `${stderr.toString()}\nstdin: ${stdinError}` : stderr.toString();
      finish({
        status: 'exited',
        exitCode,
        stdout: stdout.toString(),
        stderr: stderrText,
        truncated: stdout.truncated,
        durationMs: elapsed(),
        pid: child.pid,
      });
    });

    if (request.input !== undefined && child.stdin) {
      child.stdin.on('error', (error) => {
        stdinError = error.message;
      });
      child.stdin.end(request.input);
    }
  });
}
