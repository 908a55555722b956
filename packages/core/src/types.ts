/**
 * Core types for docgate
 */

// ============================================================================
// Configuration Types
// ============================================================================

export const EXTRA_RULE_IDS = ['docstring-summary-period', 'docstring-numpy-sections'] as const;

export type ExtraRuleId = (typeof EXTRA_RULE_IDS)[number];

export const REPORT_FORMATS = ['text', 'concise', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface CheckConfig {
  maxLineLength: number;
  skipMissingDocstrings: boolean;
  skipPrivate: boolean;
  rules: ExtraRuleId[];
  enableStyleCheck: boolean;
  styleCheckTimeoutMs: number;
  styleLineLength: number;
  /** Ruff rule codes or prefixes added to Ruff's default selection */
  styleSelect: string[];
  /** Ruff rule codes or prefixes to leave out */
  styleIgnore: string[];
  fix: boolean;
  include: string[];
  exclude: string[];
}

export const DEFAULT_EXCLUDE_PATTERNS: string[] = [
  '**/.git/**',
  '**/.hg/**',
  '**/.svn/**',
  '**/venv/**',
  '**/.venv/**',
  '**/env/**',
  '**/virtualenv/**',
  '**/__pycache__/**',
  '**/.pytest_cache/**',
  '**/.mypy_cache/**',
  '**/.ruff_cache/**',
  '**/.tox/**',
  '**/.eggs/**',
  '**/*.egg-info/**',
  '**/build/**',
  '**/dist/**',
  '**/node_modules/**',
];

export const DEFAULT_CONFIG: CheckConfig = {
  maxLineLength: 72,
  skipMissingDocstrings: true,
  skipPrivate: false,
  rules: [],
  enableStyleCheck: true,
  styleCheckTimeoutMs: 30000,
  styleLineLength: 79,
  styleSelect: ['E225', 'E226', 'E227', 'E228', 'E501', 'W', 'N', 'D'],
  styleIgnore: ['D203', 'D212'],
  fix: false,
  include: ['**/*.py'],
  exclude: DEFAULT_EXCLUDE_PATTERNS,
};

// ============================================================================
// Docstring Types
// ============================================================================

export type ScopeKind = 'module' | 'class' | 'function' | 'async_function';

/**
 * A scope that may carry a docstring. `rawText` is null when the first
 * statement of the scope is not a string literal; `startLine` then points
 * at the `def`/`class` keyword.
 */
export interface DocstringCandidate {
  readonly scopeKind: ScopeKind;
  readonly scopeName: string;
  readonly rawText: string | null;
  readonly startLine: number;
  readonly endLine: number;
  /**
   * Parameter names of a function, or of a class's `__init__`, without a
   * leading `self` or `cls`. Absent for modules.
   */
  readonly parameters?: readonly string[];
}

// ============================================================================
// Violation Types
// ============================================================================

export type ViolationSeverity = 'error' | 'warning';

export type DocstringRuleId = 'docstring-line-length' | 'docstring-missing' | ExtraRuleId;

export interface Violation {
  readonly filePath: string;
  readonly line: number;
  readonly column?: number;
  /** Docstring rule, `parse-error`, `input-error`, or a style checker code */
  readonly ruleId: string;
  readonly message: string;
  readonly severity: ViolationSeverity;
}

// ============================================================================
// Result Types
// ============================================================================

export interface CheckResult {
  filePath: string;
  violations: Violation[];
  /** false when the file could not be read, parsed, or fully validated */
  checked: boolean;
  internalError?: string;
}

export interface Diagnostic {
  severity: 'warning';
  source: 'style-check';
  message: string;
}

export type ExitStatus = 'success' | 'failure';

export interface RunSummary {
  results: CheckResult[];
  totalFiles: number;
  totalViolations: number;
  uncheckedFiles: number;
  exitStatus: ExitStatus;
  diagnostics: Diagnostic[];
  durationMs: number;
}

// ============================================================================
// Event Types for Progress Reporting
// ============================================================================

export interface DocGateEventMap {
  start: { paths: string[]; fileCount: number };
  'file-start': { filePath: string; current: number; total: number };
  'file-complete': { result: CheckResult; current: number; total: number };
  'internal-error': { filePath: string; error: Error };
  'style-check-start': { checker: string; fileCount: number };
  'style-check-warning': { diagnostic: Diagnostic };
  complete: { summary: RunSummary };
}

export type DocGateEventType = keyof DocGateEventMap;

export type EventCallback<K extends DocGateEventType> = (data: DocGateEventMap[K]) => void;
