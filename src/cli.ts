#!/usr/bin/env node

import * as path from 'path';

import { ArtifactSelection, SymbolKind } from './types';
import { runAnnotate } from './commands/annotate';
import { CacheAction, runCache } from './commands/cache';
import { runCalls } from './commands/calls';
import { runSearch } from './commands/search';
import { DEFAULT_SEARCH_LIMIT } from './core/constants';
import { ConfigError, RepoglyphError, exitCodeFor } from './core/errors';
import { registeredLanguages } from './core/languages';
import { BUILTIN_TOOLS } from './core/tools';
import {
  ParsedOptions,
  parseArgs,
  readBooleanOption,
  readCsvOption,
  readEnumOption,
  readIntOption,
  readNonNegativeIntOption,
  readOptionalBooleanOption,
  readOptionalIntOption,
  readStringArrayOption,
  readStringOption,
} from './utils/args';
import { describeError } from './utils/log';

const SYMBOL_KINDS: readonly SymbolKind[] = ['class', 'function', 'method', 'interface'];
const CACHE_ACTIONS: readonly CacheAction[] = ['stats', 'evict', 'clear'];

function printHelp(): void {
  console.log(`repoglyph - incremental minimap and lint heatmap annotations for source repositories

Usage:
  repoglyph annotate [--root <dir>] [--cache-dir <dir>] [--max-workers <n>] [--timeout-ms <n>] [--tool <name>] [--no-lint] [--no-minimap] [--ignore <glob>] [--output <path>] [--verbose]
  repoglyph search --query <text> [--mode <text|semantic>] [--pattern] [--glob <glob>] [--kind <kind>] [--context <n>] [--limit <n>] [--snippets] [--verbose]
  repoglyph calls --name <symbol> [--limit <n>] [--format <json|md>] [--output <path>] [--verbose]
  repoglyph cache <stats|evict|clear> [--max-runs <n>] [--max-bytes <n>] [--cache-dir <dir>] [--verbose]

Examples:
  repoglyph annotate --root . --max-workers 6 --output .repoglyph/annotations.json
  repoglyph annotate --tool ruff --tool eslint --timeout-ms 10000
  repoglyph search --query cache_lookup --mode semantic --kind function --context 5
  repoglyph search --query "TODO|FIXME" --pattern --glob "src/**/*.ts" --snippets
  repoglyph calls --name Cache.lookup --format md --output .repoglyph/calls.md
  repoglyph cache evict --max-runs 20 --max-bytes 104857600

Notes:
  search and calls read cached annotations only; run annotate first
  the cache lives in --cache-dir, else $REPOGLYPH_CACHE_DIR, else <root>/.repoglyph/cache
  built-in tools: ${Object.keys(BUILTIN_TOOLS).join(', ')}
  languages with a minimap: ${registeredLanguages().join(', ')}
`);
}

function readArtifactSelection(options: ParsedOptions): ArtifactSelection {
  return {
    tools: readCsvOption(options, 'tool'),
    lint: readOptionalBooleanOption(options, 'lint'),
    minimap: readOptionalBooleanOption(options, 'minimap'),
  };
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.command || parsed.command === 'help' || parsed.command === '--help') {
    printHelp();
    return;
  }

  const rootDir = path.resolve(readStringOption(parsed.options, 'root') ?? process.cwd());
  const cacheDir = readStringOption(parsed.options, 'cache-dir');
  const ignore = readStringArrayOption(parsed.options, 'ignore');
  const verbose = readBooleanOption(parsed.options, 'verbose');

  if (parsed.command === 'annotate') {
    const controller = new AbortController();
    const onSignal = (): void => controller.abort();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    try {
      const summary = await runAnnotate(
        {
          rootDir,
          cacheDir,
          maxWorkers: readOptionalIntOption(parsed.options, 'max-workers'),
          toolTimeoutMs: readOptionalIntOption(parsed.options, 'timeout-ms'),
          ...readArtifactSelection(parsed.options),
          ignore,
          outputPath: readStringOption(parsed.options, 'output'),
          verbose,
        },
        { signal: controller.signal },
      );
      console.log(JSON.stringify(summary, null, 2));
    } finally {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    }
    return;
  }

  if (parsed.command === 'search') {
    const query = readStringOption(parsed.options, 'query') ?? parsed.positionals.join(' ');
    if (query.trim().length === 0) {
      throw new ConfigError('search requires --query <text>');
    }

    const result = await runSearch({
      rootDir,
      cacheDir,
      query,
      mode: readEnumOption(parsed.options, 'mode', ['text', 'semantic'] as const, 'text'),
      pattern: readBooleanOption(parsed.options, 'pattern'),
      globs: readCsvOption(parsed.options, 'glob'),
      kinds: readCsvOption(parsed.options, 'kind').map((kind) =>
        readEnumOption({ kind }, 'kind', SYMBOL_KINDS, 'function'),
      ),
      contextLines: readNonNegativeIntOption(parsed.options, 'context'),
      limit: readIntOption(parsed.options, 'limit', DEFAULT_SEARCH_LIMIT),
      snippets: readBooleanOption(parsed.options, 'snippets'),
      ...readArtifactSelection(parsed.options),
      ignore,
      verbose,
    });
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (parsed.command === 'calls') {
    const symbolName = readStringOption(parsed.options, 'name');
    if (!symbolName) {
      throw new ConfigError('calls requires --name <symbol>');
    }

    const result = await runCalls({
      rootDir,
      cacheDir,
      symbolName,
      limit: readIntOption(parsed.options, 'limit', 80),
      format: readEnumOption(parsed.options, 'format', ['json', 'md'] as const, 'json'),
      outputPath: readStringOption(parsed.options, 'output'),
      ...readArtifactSelection(parsed.options),
      ignore,
      verbose,
    });
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (parsed.command === 'cache') {
    const action = readEnumOption({ action: parsed.positionals[0] ?? 'stats' }, 'action', CACHE_ACTIONS, 'stats');
    const result = await runCache({
      rootDir,
      cacheDir,
      action,
      maxRunsUnread: readNonNegativeIntOption(parsed.options, 'max-runs'),
      maxBytes: readNonNegativeIntOption(parsed.options, 'max-bytes'),
      verbose,
    });
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  throw new ConfigError(`unknown command: ${parsed.command}`, 'run `repoglyph help` for usage');
}

main().catch((error: unknown) => {
  console.error(`[repoglyph] ${describeError(error)}`);
  if (error instanceof RepoglyphError && error.hint) {
    console.error(`[repoglyph] hint: ${error.hint}`);
  }
  process.exitCode = exitCodeFor(error);
});
