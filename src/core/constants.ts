import * as os from 'os';

export const CACHE_SUBDIR = '.repoglyph/cache';
export const CONFIG_FILE = '.repoglyph.json';
export const CACHE_DIR_ENV = 'REPOGLYPH_CACHE_DIR';

// Bump when extractor or parser output changes shape; it is folded into every cache key.
export const ENGINE_VERSION = 3;

export const DEFAULT_IGNORES = [
  '**/.git/**',
  '**/.repoglyph/**',
  '**/node_modules/**',
  '**/__pycache__/**',
  '**/.venv/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
];

export const DEFAULT_MAX_WORKERS = Math.max(1, os.availableParallelism());
export const DEFAULT_TOOL_TIMEOUT_MS = 20_000;
export const DEFAULT_MAX_FILE_BYTES = 512 * 1024;
export const DEFAULT_CONTEXT_LINES = 5;
export const DEFAULT_SEARCH_LIMIT = 50;
export const DEFAULT_MAX_QUEUED_TASKS = 10_000;
export const DEFAULT_EVICT_MAX_RUNS = 20;
export const MAX_RECORDED_RUNS = 100;
export const BINARY_SNIFF_BYTES = 8192;

export const SUPPORTED_EXTENSIONS: Record<string, string> = {
  '.py': 'python',
  '.pyi': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.go': 'go',
  '.rs': 'rust',
  '.rb': 'ruby',
  '.php': 'php',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.swift': 'swift',
  '.lua': 'lua',
  '.sh': 'shell',
  '.bash': 'shell',
  '.zsh': 'shell',
  '.java': 'java',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.md': 'markdown',
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.toml': 'toml',
  '.ini': 'ini',
  '.txt': 'text',
};

export const SPECIAL_FILENAMES: Record<string, string> = {
  dockerfile: 'dockerfile',
  makefile: 'makefile',
  'cmakelists.txt': 'cmake',
};
