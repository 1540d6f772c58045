import * as fs from 'fs/promises';
import * as path from 'path';

import { z } from 'zod';

import { EngineConfig, ToolDefinition } from '../types';
import { compareText } from '../utils/compare';
import {
  CACHE_DIR_ENV,
  CACHE_SUBDIR,
  CONFIG_FILE,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_MAX_FILE_BYTES,
  DEFAULT_MAX_WORKERS,
  DEFAULT_TOOL_TIMEOUT_MS,
  ENGINE_VERSION,
} from './constants';
import { ConfigError } from './errors';
import { hashContent } from './hash';
import { BUILTIN_TOOLS } from './tools';

const positiveInt = z.number().int().positive();

export const ToolConfigSchema = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    languages: z.array(z.string().min(1)).min(1),
    input: z.enum(['path', 'stdin']).default('path'),
    format: z.enum(['ruff', 'eslint', 'shellcheck', 'lines']).default('lines'),
    timeoutMs: positiveInt.optional(),
    okExitCodes: z.array(z.number().int()).optional(),
  })
  .strict();

export const FileConfigSchema = z
  .object({
    tools: z.array(z.union([z.string().min(1), ToolConfigSchema])).optional(),
    maxWorkers: positiveInt.optional(),
    toolTimeoutMs: positiveInt.optional(),
    maxFileBytes: positiveInt.optional(),
    contextLines: z.number().int().nonnegative().optional(),
    minimap: z.boolean().optional(),
    heatmap: z.boolean().optional(),
    ignore: z.array(z.string()).optional(),
    cacheDir: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ConfigOverrides {
  cacheDir?: string;
  maxWorkers?: number;
  toolTimeoutMs?: number;
  tools?: string[];
  minimap?: boolean;
  heatmap?: boolean;
  ignore?: string[];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadConfigFile(rootDir: string): Promise<FileConfig> {
  const configPath = path.join(rootDir, CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILE} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`${CONFIG_FILE}: ${where}: ${issue.message}`);
  }
  return parsed.data;
}

export function resolveCacheDir(
  rootDir: string,
  flag: string | undefined,
  fromFile: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const chosen = flag ?? env[CACHE_DIR_ENV] ?? fromFile;
  if (chosen && chosen.trim().length > 0) {
    return path.resolve(rootDir, chosen);
  }
  return path.join(rootDir, CACHE_SUBDIR);
}

function looksLikePath(command: string): boolean {
  return command.includes('/') || command.includes('\\');
}

/**
 * A command given as a path must exist up front; a bare command name is looked
 * up at spawn time and reported per file as a missing tool.
 */
async function checkToolCommand(rootDir: string, tool: ToolDefinition): Promise<ToolDefinition> {
  if (!looksLikePath(tool.command)) {
    return tool;
  }
  const command = path.resolve(rootDir, tool.command);
  try {
    await fs.access(command, fs.constants.X_OK);
  } catch (error) {
    throw new ConfigError(
      `tool "${tool.name}" points at ${command}, which is not an executable file`,
      error instanceof Error ? error.message : undefined,
    );
  }
  return { ...tool, command };
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks a tool up the way spawn will: a path as given, a bare name on PATH. */
export async function locateCommand(command: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  if (path.isAbsolute(command)) {
    return (await isExecutable(command)) ? command : null;
  }
  const extensions = process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (dir.length === 0) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = path.join(dir, `${command}${extension}`);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export async function resolveTools(
  rootDir: string,
  fromFile: FileConfig['tools'],
  selected: string[] | undefined,
): Promise<ToolDefinition[]> {
  const available = new Map<string, ToolDefinition>(Object.entries(BUILTIN_TOOLS));
  const enabledByFile: string[] = [];

  for (const item of fromFile ?? []) {
    if (typeof item === 'string') {
      enabledByFile.push(item);
      continue;
    }
    available.set(item.name, item);
    enabledByFile.push(item.name);
  }

  let names: string[];
  if (selected && selected.length > 0) {
    names = selected;
  } else if (fromFile) {
    names = enabledByFile;
  } else {
    names = Object.keys(BUILTIN_TOOLS);
  }

  const tools: ToolDefinition[] = [];
  for (const name of Array.from(new Set(names))) {
    const tool = available.get(name);
    if (!tool) {
      const known = Array.from(available.keys()).sort().join(', ');
      throw new ConfigError(`unknown tool "${name}"`, `known tools: ${known}; custom tools go under "tools" in ${CONFIG_FILE}`);
    }
    tools.push(await checkToolCommand(rootDir, tool));
  }
  return tools.sort((a, b) => compareText(a.name, b.name));
}

export async function resolveEngineConfig(
  rootDir: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<EngineConfig> {
  const fileConfig = await loadConfigFile(rootDir);

  const maxWorkers = overrides.maxWorkers ?? fileConfig.maxWorkers ?? DEFAULT_MAX_WORKERS;
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new ConfigError(`max workers must be a positive integer, got ${maxWorkers}`);
  }
  const toolTimeoutMs = overrides.toolTimeoutMs ?? fileConfig.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  if (!Number.isInteger(toolTimeoutMs) || toolTimeoutMs < 1) {
    throw new ConfigError(`tool timeout must be a positive number of milliseconds, got ${toolTimeoutMs}`);
  }

  const heatmap = overrides.heatmap ?? fileConfig.heatmap ?? true;
  const tools = heatmap ? await resolveTools(rootDir, fileConfig.tools, overrides.tools) : [];
  const toolLocations: Record<string, string | null> = {};
  for (const tool of tools) {
    toolLocations[tool.name] = await locateCommand(tool.command, env);
  }

  return {
    rootDir,
    cacheDir: resolveCacheDir(rootDir, overrides.cacheDir, fileConfig.cacheDir, env),
    maxWorkers,
    toolTimeoutMs,
    maxFileBytes: fileConfig.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES,
    contextLines: fileConfig.contextLines ?? DEFAULT_CONTEXT_LINES,
    minimap: overrides.minimap ?? fileConfig.minimap ?? true,
    heatmap,
    tools,
    toolLocations,
    ignore: [...(fileConfig.ignore ?? []), ...(overrides.ignore ?? [])],
  };
}

/**
 * Fingerprint of every setting that changes what an entry contains. A tool's
 * location counts, so installing a missing linter moves files to new keys;
 * worker counts do not.
 */
export function configVersion(config: EngineConfig): string {
  const tools = config.heatmap
    ? config.tools.map((tool) => ({
        name: tool.name,
        command: tool.command,
        args: tool.args,
        languages: [...tool.languages].sort(),
        input: tool.input,
        format: tool.format,
        okExitCodes: tool.okExitCodes ?? null,
        timeoutMs: tool.timeoutMs ?? config.toolTimeoutMs,
        location: config.toolLocations[tool.name] ?? null,
      }))
    : [];

  return hashContent(
    JSON.stringify({
      engine: ENGINE_VERSION,
      minimap: config.minimap,
      heatmap: config.heatmap,
      maxFileBytes: config.maxFileBytes,
      tools,
    }),
  );
}
