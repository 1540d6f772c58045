export type Severity = 'info' | 'warning' | 'error';

export type SymbolKind = 'class' | 'function' | 'method' | 'interface';

export type ExtractionStatus = 'ok' | 'unsupportedLanguage' | 'parseError';

export type RunStatus = 'ok' | 'timeout' | 'toolMissing' | 'toolError';

export interface FileIdentity {
  path: string;
  contentFingerprint: string;
  size: number;
  mtimeMs: number;
}

export interface CodeSymbol {
  name: string;
  qualifiedName: string;
  kind: SymbolKind;
  declaredLine: number;
  language: string;
}

export interface CallEdge {
  callerSymbol: string;
  calleeName: string;
  line: number;
}

export interface Minimap {
  fileIdentity: FileIdentity;
  symbols: CodeSymbol[];
  edges: CallEdge[];
  extractionStatus: ExtractionStatus;
}

export interface LintFinding {
  line: number;
  severity: Severity;
  message: string;
  sourceToolName: string;
  code?: string;
}

export interface ToolRun {
  tool: string;
  status: RunStatus;
  durationMs: number;
  exitCode?: number | null;
  detail?: string;
}

export interface HeatmapOverlay {
  fileIdentity: FileIdentity;
  lineSeverity: Record<string, Severity>;
  rawFindings: LintFinding[];
  runStatus: RunStatus;
  toolRuns: ToolRun[];
}

export interface CacheEntry {
  key: string;
  path: string;
  contentFingerprint: string;
  configVersion: string;
  minimap?: Minimap;
  heatmap?: HeatmapOverlay;
  writtenAt: string;
}

export type ToolInput = 'path' | 'stdin';

export type ToolFormat = 'ruff' | 'eslint' | 'shellcheck' | 'lines';

export interface ToolDefinition {
  name: string;
  command: string;
  args: string[];
  languages: string[];
  input: ToolInput;
  format: ToolFormat;
  timeoutMs?: number;
  okExitCodes?: number[];
}

export interface EngineConfig {
  rootDir: string;
  cacheDir: string;
  maxWorkers: number;
  toolTimeoutMs: number;
  maxFileBytes: number;
  contextLines: number;
  minimap: boolean;
  heatmap: boolean;
  tools: ToolDefinition[];
  /** Where each tool's executable was found at startup; null when it is not installed. */
  toolLocations: Record<string, string | null>;
  ignore: string[];
}

export type AnnotatedFileStatus = 'computed' | 'cached' | 'binary' | 'unreadable';

export interface AnnotatedFile {
  path: string;
  language: string;
  status: AnnotatedFileStatus;
  entry?: CacheEntry;
  detail?: string;
}

// Query commands must resolve the same config version the annotate run used.
export interface ArtifactSelection {
  tools: string[];
  lint?: boolean;
  minimap?: boolean;
}

export interface AnnotateOptions extends ArtifactSelection {
  rootDir: string;
  cacheDir?: string;
  maxWorkers?: number;
  toolTimeoutMs?: number;
  ignore: string[];
  outputPath?: string;
  verbose: boolean;
}

export interface SearchOptions extends ArtifactSelection {
  rootDir: string;
  cacheDir?: string;
  query: string;
  mode: 'text' | 'semantic';
  pattern: boolean;
  globs: string[];
  kinds: SymbolKind[];
  contextLines?: number;
  limit: number;
  snippets: boolean;
  ignore: string[];
  verbose: boolean;
}
