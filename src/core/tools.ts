import { z } from 'zod';

import { LintFinding, Severity, ToolDefinition, ToolFormat } from '../types';

export const FILE_PLACEHOLDER = '{file}';

export const BUILTIN_TOOLS: Record<string, ToolDefinition> = {
  ruff: {
    name: 'ruff',
    command: 'ruff',
    args: ['check', '--output-format', 'json', '--no-cache', FILE_PLACEHOLDER],
    languages: ['python'],
    input: 'path',
    format: 'ruff',
  },
  eslint: {
    name: 'eslint',
    command: 'eslint',
    args: ['--format', 'json', '--no-error-on-unmatched-pattern', FILE_PLACEHOLDER],
    languages: ['javascript', 'typescript', 'tsx'],
    input: 'path',
    format: 'eslint',
  },
  shellcheck: {
    name: 'shellcheck',
    command: 'shellcheck',
    args: ['-f', 'json', FILE_PLACEHOLDER],
    languages: ['shell'],
    input: 'path',
    format: 'shellcheck',
  },
};

export const DEFAULT_OK_EXIT_CODES = [0, 1];

export type ParsedOutput = { ok: true; findings: LintFinding[] } | { ok: false; reason: string };

const ruffOutputSchema = z.array(
  z.object({
    code: z.string().nullable().optional(),
    message: z.string(),
    location: z.object({ row: z.number() }),
  }),
);

const eslintOutputSchema = z.array(
  z.object({
    filePath: z.string(),
    messages: z.array(
      z.object({
        ruleId: z.string().nullable().optional(),
        severity: z.number(),
        message: z.string(),
        line: z.number().optional(),
      }),
    ),
  }),
);

const shellcheckOutputSchema = z.array(
  z.object({
    line: z.number(),
    level: z.enum(['error', 'warning', 'info', 'style']),
    code: z.number().optional(),
    message: z.string(),
  }),
);

const LINE_FINDING = /^(.+?):(\d+)(?::\d+)?:\s*(?:(error|warning|warn|info|note|style)\b:?\s*)?(.*)$/i;

export function ruffSeverity(code: string | null | undefined): Severity {
  if (!code || /^(F|E|B)\d/.test(code)) {
    return 'error';
  }
  if (/^(D|I)\d/.test(code)) {
    return 'info';
  }
  return 'warning';
}

function lineSeverity(word: string | undefined): Severity {
  const lower = (word ?? '').toLowerCase();
  if (lower === 'error') {
    return 'error';
  }
  if (lower === 'warning' || lower === 'warn') {
    return 'warning';
  }
  return lower === '' ? 'warning' : 'info';
}

function parseJson<T>(stdout: string, schema: z.ZodType<T>): { ok: true; value: T } | { ok: false; reason: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    return { ok: false, reason: `invalid json: ${error instanceof Error ? error.message : String(error)}` };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: `unexpected output at ${issue.path.join('.') || '(root)'}: ${issue.message}` };
  }
  return { ok: true, value: parsed.data };
}

const clampLine = (line: number | undefined): number => Math.max(1, Math.floor(line ?? 1));

/**
 * Converts a tool's stdout into findings. Whitespace-only output means the
 * tool had nothing to report.
 */
export function parseToolOutput(format: ToolFormat, stdout: string, toolName: string): ParsedOutput {
  if (stdout.trim().length === 0) {
    return { ok: true, findings: [] };
  }

  if (format === 'ruff') {
    const parsed = parseJson(stdout, ruffOutputSchema);
    if (!parsed.ok) {
      return parsed;
    }
    return {
      ok: true,
      findings: parsed.value.map((item) => ({
        line: clampLine(item.location.row),
        severity: ruffSeverity(item.code),
        message: item.message,
        sourceToolName: toolName,
        code: item.code ?? undefined,
      })),
    };
  }

  if (format === 'eslint') {
    const parsed = parseJson(stdout, eslintOutputSchema);
    if (!parsed.ok) {
      return parsed;
    }
    return {
      ok: true,
      findings: parsed.value.flatMap((file) =>
        file.messages.map((message) => ({
          line: clampLine(message.line),
          severity: message.severity >= 2 ? 'error' : 'warning',
          message: message.message,
          sourceToolName: toolName,
          code: message.ruleId ?? undefined,
        })),
      ),
    };
  }

  if (format === 'shellcheck') {
    const parsed = parseJson(stdout, shellcheckOutputSchema);
    if (!parsed.ok) {
      return parsed;
    }
    return {
      ok: true,
      findings: parsed.value.map((item) => ({
        line: clampLine(item.line),
        severity: item.level === 'error' || item.level === 'warning' ? item.level : 'info',
        message: item.message,
        sourceToolName: toolName,
        code: item.code === undefined ? undefined : `SC${item.code}`,
      })),
    };
  }

  const findings: LintFinding[] = [];
  const lines = stdout.split('\n').filter((line) => line.trim().length > 0);
  for (const line of lines) {
    const match = LINE_FINDING.exec(line.trim());
    if (!match) {
      continue;
    }
    findings.push({
      line: clampLine(Number.parseInt(match[2], 10)),
      severity: lineSeverity(match[3]),
      message: match[4].trim(),
      sourceToolName: toolName,
    });
  }
  if (findings.length === 0) {
    return { ok: false, reason: 'no line in the output matched path:line: message' };
  }
  return { ok: true, findings };
}

export function expandArgs(tool: ToolDefinition, absPath: string): string[] {
  const hasPlaceholder = tool.args.some((arg) => arg.includes(FILE_PLACEHOLDER));
  const args = tool.args.map((arg) => arg.split(FILE_PLACEHOLDER).join(absPath));
  if (tool.input === 'path' && !hasPlaceholder) {
    args.push(absPath);
  }
  return args;
}
