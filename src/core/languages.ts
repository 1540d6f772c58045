import { CallEdge, CodeSymbol, SymbolKind, ToolDefinition } from '../types';
import { compareText } from '../utils/compare';
import { ParsedTags, RawDefinition, TreeSitterLanguage, parseTags } from './parser';

export const MODULE_SCOPE = '(module)';

export type ExtractedStructure =
  | { ok: true; symbols: CodeSymbol[]; edges: CallEdge[] }
  | { ok: false; reason: string };

export interface LanguageCapability {
  language: string;
  extract(content: string): Promise<ExtractedStructure>;
  applicableTools(tools: ToolDefinition[]): ToolDefinition[];
}

export function toolsForLanguage(language: string, tools: ToolDefinition[]): ToolDefinition[] {
  return tools.filter((tool) => tool.languages.includes('*') || tool.languages.includes(language));
}

export function structureFromTags(
  parsed: ParsedTags,
  language: string,
): { symbols: CodeSymbol[]; edges: CallEdge[] } {
  const byKey = new Map<string, RawDefinition>(parsed.definitions.map((definition) => [definition.key, definition]));
  const qualified = new Map<string, string>();

  const parentOf = (definition: RawDefinition): RawDefinition | undefined =>
    definition.parentKey === null ? undefined : byKey.get(definition.parentKey);

  const qualify = (definition: RawDefinition): string => {
    const cached = qualified.get(definition.key);
    if (cached !== undefined) {
      return cached;
    }
    const parent = parentOf(definition);
    const name = parent ? `${qualify(parent)}.${definition.name}` : definition.name;
    qualified.set(definition.key, name);
    return name;
  };

  const kindOf = (definition: RawDefinition): SymbolKind => {
    if (definition.kind === 'function' && parentOf(definition)?.kind === 'class') {
      return 'method';
    }
    return definition.kind;
  };

  const enclosingClass = (definition: RawDefinition | undefined): RawDefinition | undefined => {
    let current = definition;
    while (current && current.kind !== 'class') {
      current = parentOf(current);
    }
    return current;
  };

  const symbols: CodeSymbol[] = parsed.definitions.map((definition) => ({
    name: definition.name,
    qualifiedName: qualify(definition),
    kind: kindOf(definition),
    declaredLine: definition.line,
    language,
  }));

  const edges: CallEdge[] = parsed.calls.map((call) => {
    const scope = call.scopeKey === null ? undefined : byKey.get(call.scopeKey);
    const owner = call.receiverMember === null ? undefined : enclosingClass(scope);
    return {
      callerSymbol: scope ? qualify(scope) : MODULE_SCOPE,
      calleeName: owner && call.receiverMember !== null ? `${qualify(owner)}.${call.receiverMember}` : call.callee,
      line: call.line,
    };
  });

  return { symbols, edges };
}

function treeSitterCapability(language: TreeSitterLanguage): LanguageCapability {
  return {
    language,
    async extract(content: string): Promise<ExtractedStructure> {
      const parsed = await parseTags(language, content);
      if (parsed.hasSyntaxErrors) {
        return { ok: false, reason: 'syntax error' };
      }
      return { ok: true, ...structureFromTags(parsed, language) };
    },
    applicableTools: (tools) => toolsForLanguage(language, tools),
  };
}

interface SignaturePattern {
  kind: SymbolKind;
  pattern: RegExp;
}

const FUNCTION_SIGNATURE: SignaturePattern = {
  kind: 'function',
  pattern: /^\s*(?:(?:pub(?:\([^)]*\))?|export|public|private|protected|internal|static|async|override|suspend|local)\s+)*(?:def|fn|func|fun|function)\s+(?:\([^)]*\)\s*)?(?:self\.)?([A-Za-z_][\w]*[?!]?)/,
};

const TYPE_SIGNATURE: SignaturePattern = {
  kind: 'class',
  pattern: /^\s*(?:(?:pub(?:\([^)]*\))?|export|public|private|internal|abstract|final|open|data|sealed)\s+)*(?:class|struct|trait|module|enum|object)\s+([A-Za-z_]\w*)/,
};

const SHELL_FUNCTION: SignaturePattern = {
  kind: 'function',
  pattern: /^\s*(?:function\s+([A-Za-z_][\w-]*)|([A-Za-z_][\w-]*)\s*\(\s*\))/,
};

/**
 * Line-oriented fallback for languages without a grammar: declarations only,
 * no call edges. It cannot fail to parse.
 */
function signatureCapability(language: string, patterns: SignaturePattern[]): LanguageCapability {
  return {
    language,
    async extract(content: string): Promise<ExtractedStructure> {
      const symbols: CodeSymbol[] = [];
      const lines = content.split('\n');
      for (let i = 0; i < lines.length; i += 1) {
        for (const { kind, pattern } of patterns) {
          const match = pattern.exec(lines[i]);
          const name = match?.slice(1).find((group) => group !== undefined);
          if (name) {
            symbols.push({ name, qualifiedName: name, kind, declaredLine: i + 1, language });
            break;
          }
        }
      }
      return { ok: true, symbols, edges: [] };
    },
    applicableTools: (tools) => toolsForLanguage(language, tools),
  };
}

const registry = new Map<string, LanguageCapability>();

export function registerLanguage(capability: LanguageCapability): void {
  registry.set(capability.language, capability);
}

export function capabilityFor(language: string): LanguageCapability | undefined {
  return registry.get(language);
}

export function applicableTools(language: string, tools: ToolDefinition[]): ToolDefinition[] {
  const capability = registry.get(language);
  return capability ? capability.applicableTools(tools) : toolsForLanguage(language, tools);
}

export function registeredLanguages(): string[] {
  return Array.from(registry.keys()).sort(compareText);
}

for (const language of ['python', 'javascript', 'typescript', 'tsx'] as const) {
  registerLanguage(treeSitterCapability(language));
}
for (const language of ['go', 'rust', 'ruby', 'php', 'kotlin', 'swift', 'lua']) {
  registerLanguage(signatureCapability(language, [FUNCTION_SIGNATURE, TYPE_SIGNATURE]));
}
registerLanguage(signatureCapability('shell', [SHELL_FUNCTION]));
