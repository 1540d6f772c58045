import { FileIdentity, HeatmapOverlay, LintFinding, RunStatus, Severity, ToolDefinition, ToolRun } from '../types';
import { compareText } from '../utils/compare';
import { CancelledError } from './errors';
import { applicableTools } from './languages';
import { WorkerPool } from './parallel';
import { ProcessOutcome, ProcessRunner, runProcess } from './process';
import { DEFAULT_OK_EXIT_CODES, expandArgs, parseToolOutput } from './tools';

export const SEVERITY_RANK: Record<Severity, number> = {
  info: 1,
  warning: 2,
  error: 3,
};

// Failing statuses, most severe first.
const FAILURE_PRECEDENCE: RunStatus[] = ['timeout', 'toolError', 'toolMissing'];

export interface LintOptions {
  pool: WorkerPool;
  rootDir: string;
  absPath: string;
  defaultTimeoutMs: number;
  runner?: ProcessRunner;
  signal?: AbortSignal;
}

interface ToolResult {
  run: ToolRun;
  findings: LintFinding[];
}

export function maxSeverity(a: Severity | undefined, b: Severity): Severity {
  if (a === undefined) {
    return b;
  }
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

export function compareFindings(a: LintFinding, b: LintFinding): number {
  return (
    a.line - b.line ||
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareText(a.sourceToolName, b.sourceToolName) ||
    compareText(a.message, b.message)
  );
}

export function overallStatus(runs: ToolRun[]): RunStatus {
  for (const status of FAILURE_PRECEDENCE) {
    if (runs.some((run) => run.status === status)) {
      return status;
    }
  }
  return 'ok';
}

/**
 * Folds per-tool results into one overlay. Only findings from tools that
 * finished cleanly reach `rawFindings` and `lineSeverity`.
 */
export function buildOverlay(fileIdentity: FileIdentity, results: ToolResult[]): HeatmapOverlay {
  const rawFindings = results
    .filter((result) => result.run.status === 'ok')
    .flatMap((result) => result.findings)
    .sort(compareFindings);

  const lineSeverity: Record<string, Severity> = {};
  for (const finding of rawFindings) {
    const key = String(finding.line);
    lineSeverity[key] = maxSeverity(lineSeverity[key], finding.severity);
  }

  const toolRuns = results.map((result) => result.run).sort((a, b) => compareText(a.tool, b.tool));

  return {
    fileIdentity,
    lineSeverity,
    rawFindings,
    runStatus: overallStatus(toolRuns),
    toolRuns,
  };
}

function firstLine(text: string): string {
  const line = text.split('\n').find((candidate) => candidate.trim().length > 0);
  return line ? line.trim().slice(0, 200) : '';
}

export function interpretOutcome(tool: ToolDefinition, outcome: ProcessOutcome, timeoutMs: number): ToolResult {
  const base = { tool: tool.name, durationMs: outcome.durationMs };

  if (outcome.status === 'cancelled') {
    throw new CancelledError(`${tool.name} cancelled`);
  }
  if (outcome.status === 'missing') {
    return { run: { ...base, status: 'toolMissing', detail: outcome.detail }, findings: [] };
  }
  if (outcome.status === 'timeout') {
    return { run: { ...base, status: 'timeout', detail: `killed after ${timeoutMs}ms` }, findings: [] };
  }

  const okExitCodes = tool.okExitCodes ?? DEFAULT_OK_EXIT_CODES;
  if (outcome.exitCode === null || !okExitCodes.includes(outcome.exitCode)) {
    const stderr = firstLine(outcome.stderr);
    return {
      run: {
        ...base,
        status: 'toolError',
        exitCode: outcome.exitCode,
        detail: stderr ? `exit code ${outcome.exitCode}: ${stderr}` : `exit code ${outcome.exitCode}`,
      },
      findings: [],
    };
  }
  if (outcome.truncated) {
    return {
      run: { ...base, status: 'toolError', exitCode: outcome.exitCode, detail: 'output exceeded the capture limit' },
      findings: [],
    };
  }

  const parsed = parseToolOutput(tool.format, outcome.stdout, tool.name);
  if (!parsed.ok) {
    return { run: { ...base, status: 'toolError', exitCode: outcome.exitCode, detail: parsed.reason }, findings: [] };
  }
  return { run: { ...base, status: 'ok', exitCode: outcome.exitCode }, findings: parsed.findings };
}

/**
 * Runs every tool that applies to `language` against one file through the
 * shared pool and folds the results. Tool failures become run statuses; only
 * cancellation and resource exhaustion reject.
 */
export async function runLinters(
  fileIdentity: FileIdentity,
  content: string,
  language: string,
  tools: ToolDefinition[],
  options: LintOptions,
): Promise<HeatmapOverlay> {
  const runner = options.runner ?? runProcess;
  const selected = applicableTools(language, tools);

  const settled = await Promise.allSettled(
    selected.map((tool) =>
      options.pool.run(async (poolSignal) => {
        const timeoutMs = tool.timeoutMs ?? options.defaultTimeoutMs;
        const outcome = await runner({
          command: tool.command,
          args: expandArgs(tool, options.absPath),
          cwd: options.rootDir,
          input: tool.input === 'stdin' ? content : undefined,
          timeoutMs,
          signal: options.signal ?? poolSignal,
        });
        return interpretOutcome(tool, outcome, timeoutMs);
      }),
    ),
  );

  const results: ToolResult[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    results.push(result.value);
  }
  return buildOverlay(fileIdentity, results);
}
