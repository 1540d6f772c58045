import * as fs from 'fs/promises';
import * as path from 'path';

import Parser from 'tree-sitter';

import { SymbolKind } from '../types';
import { compareText } from '../utils/compare';

type Grammar = Parameters<Parser['setLanguage']>[0];

const Python: Grammar = require('tree-sitter-python');
const JavaScript: Grammar = require('tree-sitter-javascript');
const TypeScript: { typescript: Grammar; tsx: Grammar } = require('tree-sitter-typescript');

export type TreeSitterLanguage = 'python' | 'javascript' | 'typescript' | 'tsx';

const LANGUAGE_CONFIG: Record<TreeSitterLanguage, { grammar: Grammar; queryFile: string }> = {
  python: {
    grammar: Python,
    queryFile: 'python-tags.scm',
  },
  javascript: {
    grammar: JavaScript,
    queryFile: 'javascript-tags.scm',
  },
  typescript: {
    grammar: TypeScript.typescript,
    queryFile: 'typescript-tags.scm',
  },
  tsx: {
    grammar: TypeScript.tsx,
    queryFile: 'typescript-tags.scm',
  },
};

const SYMBOL_KINDS: readonly SymbolKind[] = ['class', 'function', 'method', 'interface'];
const PARSE_CHUNK = 4096;
const MAX_CALLEE_LENGTH = 120;

// Receivers that refer to the enclosing class instance.
const SELF_RECEIVERS = new Set(['self', 'cls', 'this']);

interface CompiledQueries {
  tags: Parser.Query;
  errors: Parser.Query;
}

export interface RawDefinition {
  key: string;
  name: string;
  kind: SymbolKind;
  line: number;
  column: number;
  parentKey: string | null;
}

export interface RawCall {
  line: number;
  column: number;
  callee: string;
  receiverMember: string | null;
  scopeKey: string | null;
}

export interface ParsedTags {
  definitions: RawDefinition[];
  calls: RawCall[];
  hasSyntaxErrors: boolean;
}

const parserCache = new Map<TreeSitterLanguage, Parser>();
const queryCache = new Map<TreeSitterLanguage, Promise<CompiledQueries>>();

function queryBaseDir(): string {
  return path.resolve(__dirname, '../../queries');
}

async function compileQueries(language: TreeSitterLanguage): Promise<CompiledQueries> {
  const config = LANGUAGE_CONFIG[language];
  const source = await fs.readFile(path.join(queryBaseDir(), config.queryFile), 'utf8');
  return {
    tags: new Parser.Query(config.grammar, source),
    errors: new Parser.Query(config.grammar, '(ERROR) @error'),
  };
}

function loadQueries(language: TreeSitterLanguage): Promise<CompiledQueries> {
  let pending = queryCache.get(language);
  if (!pending) {
    pending = compileQueries(language);
    queryCache.set(language, pending);
    pending.catch(() => queryCache.delete(language));
  }
  return pending;
}

function parserFor(language: TreeSitterLanguage): Parser {
  const cached = parserCache.get(language);
  if (cached) {
    return cached;
  }

  const parser = new Parser();
  parser.setLanguage(LANGUAGE_CONFIG[language].grammar);
  parserCache.set(language, parser);
  return parser;
}

function nodeKey(node: Parser.SyntaxNode): string {
  return `${node.startIndex}:${node.endIndex}`;
}

function kindFromCapture(captureName: string): SymbolKind | null {
  const suffix = captureName.slice('definition.'.length);
  return SYMBOL_KINDS.find((kind) => kind === suffix) ?? null;
}

function enclosingDefinition(node: Parser.SyntaxNode, definitionKeys: Set<string>): string | null {
  let current = node.parent;
  while (current) {
    const key = nodeKey(current);
    if (definitionKeys.has(key)) {
      return key;
    }
    current = current.parent;
  }
  return null;
}

function calleeText(node: Parser.SyntaxNode): string {
  const text = node.text.replace(/\s+/g, ' ').trim();
  return text.length > MAX_CALLEE_LENGTH ? `${text.slice(0, MAX_CALLEE_LENGTH)}...` : text;
}

function receiverMember(callee: Parser.SyntaxNode): string | null {
  if (callee.type !== 'attribute' && callee.type !== 'member_expression') {
    return null;
  }
  const receiver = callee.childForFieldName('object');
  const member = callee.childForFieldName(callee.type === 'attribute' ? 'attribute' : 'property');
  if (!receiver || !member || !SELF_RECEIVERS.has(receiver.text)) {
    return null;
  }
  return member.text;
}

function byPosition<T extends { line: number; column: number }>(a: T, b: T): number {
  return a.line - b.line || a.column - b.column;
}

/**
 * Runs the tag query for `language` over `content` and returns definitions and
 * call sites in source order, each linked to its innermost enclosing definition.
 */
export async function parseTags(language: TreeSitterLanguage, content: string): Promise<ParsedTags> {
  const parser = parserFor(language);
  const queries = await loadQueries(language);

  const tree = parser.parse((index: number) =>
    index < content.length ? content.slice(index, index + PARSE_CHUNK) : '',
  );
  const hasSyntaxErrors = queries.errors.captures(tree.rootNode).length > 0;

  const definitionNodes: Array<{ node: Parser.SyntaxNode; name: Parser.SyntaxNode; kind: SymbolKind }> = [];
  const callNodes: Array<{ node: Parser.SyntaxNode; callee: Parser.SyntaxNode }> = [];

  for (const match of queries.tags.matches(tree.rootNode)) {
    let outer: Parser.SyntaxNode | null = null;
    let inner: Parser.SyntaxNode | null = null;
    let kind: SymbolKind | null = null;

    for (const capture of match.captures) {
      if (capture.name.startsWith('definition.')) {
        outer = capture.node;
        kind = kindFromCapture(capture.name);
      } else if (capture.name === 'reference.call') {
        outer = capture.node;
      } else if (capture.name.startsWith('name.')) {
        inner = capture.node;
      }
    }

    if (!outer || !inner) {
      continue;
    }
    if (kind) {
      definitionNodes.push({ node: outer, name: inner, kind });
    } else {
      callNodes.push({ node: outer, callee: inner });
    }
  }

  const definitionKeys = new Set(definitionNodes.map((entry) => nodeKey(entry.node)));

  const definitions: RawDefinition[] = definitionNodes
    .map(({ node, name, kind }) => ({
      key: nodeKey(node),
      name: name.text.trim(),
      kind,
      line: name.startPosition.row + 1,
      column: name.startPosition.column,
      parentKey: enclosingDefinition(node, definitionKeys),
    }))
    .filter((definition) => definition.name.length > 0);
  definitions.sort((a, b) => byPosition(a, b) || compareText(a.name, b.name));

  const calls: RawCall[] = callNodes.map(({ node, callee }) => ({
    line: node.startPosition.row + 1,
    column: node.startPosition.column,
    callee: calleeText(callee),
    receiverMember: receiverMember(callee),
    scopeKey: enclosingDefinition(node, definitionKeys),
  }));
  calls.sort(byPosition);

  return { definitions, calls, hasSyntaxErrors };
}
