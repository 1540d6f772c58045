import { MultiDirectedGraph } from 'graphology';

import { CacheEntry, CallEdge, CodeSymbol, SymbolKind } from '../types';
import { compareText } from '../utils/compare';
import { MODULE_SCOPE } from './languages';

const SYMBOL_NODE_PREFIX = 'sym:';
const EXTERNAL_NODE_PREFIX = 'ext:';

// graphology attribute types must be plain object types.
type SymbolNode = {
  kind: 'symbol';
  path: string;
  name: string;
  qualifiedName: string;
  symbolKind: SymbolKind | 'module';
  line: number;
};

type ExternalNode = {
  kind: 'external';
  name: string;
};

type NodeAttributes = SymbolNode | ExternalNode;

type CallAttributes = {
  path: string;
  line: number;
  calleeName: string;
  resolved: boolean;
};

export type CallGraph = MultiDirectedGraph<NodeAttributes, CallAttributes>;

export interface SymbolDefinition {
  path: string;
  qualifiedName: string;
  kind: SymbolKind;
  line: number;
}

export interface CallSite {
  path: string;
  caller: string;
  callee: string;
  line: number;
  resolved: boolean;
}

export interface CallQueryResult {
  name: string;
  definitions: SymbolDefinition[];
  callers: CallSite[];
  callees: CallSite[];
}

function encodeKeyPart(value: string): string {
  return encodeURIComponent(value);
}

function symbolNodeId(filePath: string, qualifiedName: string): string {
  return `${SYMBOL_NODE_PREFIX}${encodeKeyPart(filePath)}:${encodeKeyPart(qualifiedName)}`;
}

function externalNodeId(name: string): string {
  return `${EXTERNAL_NODE_PREFIX}${encodeKeyPart(name)}`;
}

function addSymbolNode(graph: CallGraph, filePath: string, symbol: CodeSymbol): void {
  const id = symbolNodeId(filePath, symbol.qualifiedName);
  if (graph.hasNode(id)) {
    return;
  }
  graph.addNode(id, {
    kind: 'symbol',
    path: filePath,
    name: symbol.name,
    qualifiedName: symbol.qualifiedName,
    symbolKind: symbol.kind,
    line: symbol.declaredLine,
  });
}

function ensureCallerNode(graph: CallGraph, filePath: string, caller: string): string {
  const id = symbolNodeId(filePath, caller);
  if (!graph.hasNode(id)) {
    graph.addNode(id, {
      kind: 'symbol',
      path: filePath,
      name: caller,
      qualifiedName: caller,
      symbolKind: 'module',
      line: 1,
    });
  }
  return id;
}

/**
 * Same-file resolution only: an exact qualified name wins, then a bare callee
 * that names exactly one symbol of the file.
 */
function resolveCallee(symbols: CodeSymbol[], edge: CallEdge): CodeSymbol | null {
  const exact = symbols.find((symbol) => symbol.qualifiedName === edge.calleeName);
  if (exact) {
    return exact;
  }
  if (!/^[A-Za-z_$][\w$]*$/.test(edge.calleeName)) {
    return null;
  }
  const byName = symbols.filter((symbol) => symbol.name === edge.calleeName && symbol.kind !== 'method');
  return byName.length === 1 ? byName[0] : null;
}

function addCallEdge(graph: CallGraph, source: string, target: string, attributes: CallAttributes): void {
  const key = [
    encodeKeyPart(source),
    encodeKeyPart(target),
    String(attributes.line),
  ].join('|');
  if (graph.hasEdge(key)) {
    return;
  }
  graph.addDirectedEdgeWithKey(key, source, target, attributes);
}

export function buildCallGraph(entries: CacheEntry[]): CallGraph {
  const graph: CallGraph = new MultiDirectedGraph<NodeAttributes, CallAttributes>();
  const sorted = [...entries].sort((a, b) => compareText(a.path, b.path));

  for (const entry of sorted) {
    const minimap = entry.minimap;
    if (!minimap || minimap.extractionStatus !== 'ok') {
      continue;
    }
    for (const symbol of minimap.symbols) {
      addSymbolNode(graph, entry.path, symbol);
    }
    for (const edge of minimap.edges) {
      const source =
        edge.callerSymbol === MODULE_SCOPE || !graph.hasNode(symbolNodeId(entry.path, edge.callerSymbol))
          ? ensureCallerNode(graph, entry.path, edge.callerSymbol)
          : symbolNodeId(entry.path, edge.callerSymbol);

      const resolved = resolveCallee(minimap.symbols, edge);
      let target: string;
      if (resolved) {
        target = symbolNodeId(entry.path, resolved.qualifiedName);
      } else {
        target = externalNodeId(edge.calleeName);
        if (!graph.hasNode(target)) {
          graph.addNode(target, { kind: 'external', name: edge.calleeName });
        }
      }

      addCallEdge(graph, source, target, {
        path: entry.path,
        line: edge.line,
        calleeName: edge.calleeName,
        resolved: resolved !== null,
      });
    }
  }

  return graph;
}

function nodeLabel(attributes: NodeAttributes): string {
  return attributes.kind === 'symbol' ? attributes.qualifiedName : attributes.name;
}

function matchesName(attributes: NodeAttributes, name: string): boolean {
  if (attributes.kind === 'external') {
    return attributes.name === name;
  }
  return attributes.symbolKind !== 'module' && (attributes.name === name || attributes.qualifiedName === name);
}

function compareSites(a: CallSite, b: CallSite): number {
  return compareText(a.path, b.path) || a.line - b.line || compareText(a.caller, b.caller) || compareText(a.callee, b.callee);
}

export function queryCalls(graph: CallGraph, name: string, limit: number): CallQueryResult {
  const definitions: SymbolDefinition[] = [];
  const callers: CallSite[] = [];
  const callees: CallSite[] = [];

  graph.forEachNode((node, attributes) => {
    if (!matchesName(attributes, name)) {
      return;
    }
    if (attributes.kind === 'symbol' && attributes.symbolKind !== 'module') {
      definitions.push({
        path: attributes.path,
        qualifiedName: attributes.qualifiedName,
        kind: attributes.symbolKind,
        line: attributes.line,
      });
    }

    graph.forEachInEdge(node, (_edge, edgeAttributes, _source, _target, sourceAttributes) => {
      callers.push({
        path: edgeAttributes.path,
        caller: nodeLabel(sourceAttributes),
        callee: edgeAttributes.calleeName,
        line: edgeAttributes.line,
        resolved: edgeAttributes.resolved,
      });
    });

    graph.forEachOutEdge(node, (_edge, edgeAttributes, _source, _target, _sourceAttributes, targetAttributes) => {
      callees.push({
        path: edgeAttributes.path,
        caller: nodeLabel(attributes),
        callee: nodeLabel(targetAttributes),
        line: edgeAttributes.line,
        resolved: edgeAttributes.resolved,
      });
    });
  });

  definitions.sort((a, b) => compareText(a.path, b.path) || a.line - b.line);
  callers.sort(compareSites);
  callees.sort(compareSites);

  return {
    name,
    definitions,
    callers: callers.slice(0, limit),
    callees: callees.slice(0, limit),
  };
}
