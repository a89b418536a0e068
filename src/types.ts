import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Severity & Finding Types
// ─────────────────────────────────────────────────────────────

export const Severity = z.enum(['info', 'low', 'medium', 'high', 'critical']);
export type Severity = z.infer<typeof Severity>;

/** Ascending rank, used for sorting and for picking the stronger duplicate */
export const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export const Confidence = z.enum(['high', 'low']);
export type Confidence = z.infer<typeof Confidence>;

export const Finding = z.object({
  id: z.string(),
  tool: z.string(),
  severity: Severity,
  file: z.string(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  message: z.string(),
  ruleId: z.string().optional(),
  // Raw-text fallback for output that could not be parsed
  raw: z.boolean().default(false),
  confidence: Confidence.default('high'),
  // Other tools that reported the same issue
  corroboratedBy: z.array(z.string()).default([]),
});
export type Finding = z.infer<typeof Finding>;

// ─────────────────────────────────────────────────────────────
// Ecosystem & Analyzer Types
// ─────────────────────────────────────────────────────────────

export const EcosystemTag = z.enum([
  'python',
  'javascript',
  'java',
  'go',
  'ruby',
  'php',
  'dotnet',
  'docker',
  'terraform',
  'kubernetes',
  'github-actions',
]);
export type EcosystemTag = z.infer<typeof EcosystemTag>;

export const OutputFormat = z.enum([
  'sarif',
  'eslint-json',
  'ruff-json',
  'bandit-json',
  'semgrep-json',
  'pip-audit-json',
  'npm-audit-json',
  'trivy-json',
  'checkov-json',
  'rubocop-json',
  'generic-json',
  'line',
]);
export type OutputFormat = z.infer<typeof OutputFormat>;

export interface AnalyzerSpec {
  readonly id: string;
  readonly name: string;
  /** Ecosystem the tool is registered under; 'multi' for language-agnostic tools */
  readonly ecosystem: EcosystemTag | 'multi';
  readonly command: string;
  /** Argument template; {root}, {manifest} and {tmp} are substituted at scheduling */
  readonly args: readonly string[];
  readonly format: OutputFormat;
  readonly timeoutMs?: number;
  /** Exit codes meaning "ran to completion", with or without findings */
  readonly successExitCodes: readonly number[];
  /** Trailing args chosen by whether the ecosystem evidence matches pattern */
  readonly manifestArgs?: {
    readonly pattern: RegExp;
    readonly matched: readonly string[];
    readonly otherwise: readonly string[];
  };
}

export interface Invocation {
  id: string;
  spec: AnalyzerSpec;
  cwd: string;
  args: string[];
  /** Paths the invocation targets (changed files in PR mode) */
  files: string[];
  /** Manifest the ecosystem was detected from, when the tool reads one */
  manifest?: string;
  timeoutMs: number;
}

// ─────────────────────────────────────────────────────────────
// Repository Context
// ─────────────────────────────────────────────────────────────

export const RunMode = z.enum(['pr', 'manual']);
export type RunMode = z.infer<typeof RunMode>;

export const DetectedEcosystem = z.object({
  tag: EcosystemTag,
  evidence: z.string(),
});
export type DetectedEcosystem = z.infer<typeof DetectedEcosystem>;

export interface ContextSignals {
  ciChanged: boolean;
  manifestsChanged: boolean;
  testsPresent: boolean;
  diffLines: number;
}

export interface RepositoryContext {
  readonly root: string;
  readonly mode: RunMode;
  readonly files: readonly string[];
  readonly changedFiles: readonly string[];
  readonly ecosystems: readonly DetectedEcosystem[];
  readonly signals: Readonly<ContextSignals>;
  readonly warnings: readonly string[];
}

// ─────────────────────────────────────────────────────────────
// Execution Status Types
// ─────────────────────────────────────────────────────────────

export const ToolStatus = z.enum(['success', 'timeout', 'error', 'skipped']);
export type ToolStatus = z.infer<typeof ToolStatus>;

export const ToolErrorKind = z.enum(['ToolUnavailable', 'ToolTimeout', 'ToolCrash', 'ParseError']);
export type ToolErrorKind = z.infer<typeof ToolErrorKind>;

export const ToolRun = z.object({
  tool: z.string(),
  name: z.string(),
  ecosystem: z.string(),
  status: ToolStatus,
  errorKind: ToolErrorKind.optional(),
  exitCode: z.number().int().optional(),
  durationMs: z.number().nonnegative(),
  findingCount: z.number().int().nonnegative(),
  detail: z.string().optional(),
});
export type ToolRun = z.infer<typeof ToolRun>;

// ─────────────────────────────────────────────────────────────
// Scoring & Policy Types
// ─────────────────────────────────────────────────────────────

export const RiskLevel = z.enum(['low', 'medium', 'high']);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const BreakdownEntry = z.object({
  factor: z.string(),
  points: z.number(),
  count: z.number().int().optional(),
  weight: z.number().optional(),
});
export type BreakdownEntry = z.infer<typeof BreakdownEntry>;

export const PolicyViolation = z.object({
  tool: z.string(),
  issues: z.number().int(),
  threshold: z.number().int(),
});
export type PolicyViolation = z.infer<typeof PolicyViolation>;

export const PolicyEvaluation = z.object({
  status: z.enum(['PASS', 'FAIL']),
  violations: z.array(PolicyViolation),
  riskLevel: RiskLevel,
});
export type PolicyEvaluation = z.infer<typeof PolicyEvaluation>;

// ─────────────────────────────────────────────────────────────
// Run Result Types
// ─────────────────────────────────────────────────────────────

export const RunStatus = z.enum(['completed', 'completed_with_skips', 'aborted']);
export type RunStatus = z.infer<typeof RunStatus>;

export const PipelineStage = z.enum([
  'Detecting',
  'Scheduling',
  'Running',
  'Normalizing',
  'Aggregating',
  'Reporting',
  'Done',
  'Aborted',
]);
export type PipelineStage = z.infer<typeof PipelineStage>;

export interface AggregateResult {
  findings: Finding[];
  tools: ToolRun[];
  riskScore: number;
  riskLevel: RiskLevel;
  breakdown: BreakdownEntry[];
  policy: PolicyEvaluation;
  ecosystems: DetectedEcosystem[];
  mode: RunMode;
  generatedAt: string;
  durationMs: number;
}

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

export const SeverityWeights = z.object({
  critical: z.number().nonnegative().default(25),
  high: z.number().nonnegative().default(10),
  medium: z.number().nonnegative().default(3),
  low: z.number().nonnegative().default(1),
  info: z.number().nonnegative().default(0),
});
export type SeverityWeights = z.infer<typeof SeverityWeights>;

export const GuardianConfig = z.object({
  version: z.string().default('1'),

  // Runner settings
  runner: z.object({
    concurrency: z.number().int().min(1).max(32).default(4),
    timeoutMs: z.number().int().positive().default(120000),
    // Global deadline for the whole run; 0 disables it
    deadlineMs: z.number().int().nonnegative().default(900000),
  }).default({}),

  // Detection settings
  detection: z.object({
    maxDepth: z.number().int().min(1).default(4),
    exclude: z.array(z.string()).default([]),
  }).default({}),

  // Tool selection
  tools: z.object({
    disabled: z.array(z.string()).default([]),
    semgrep: z.boolean().default(true),
  }).default({}),

  // Deduplication policy
  dedupe: z.object({
    lineTolerance: z.number().int().nonnegative().default(2),
    similarityThreshold: z.number().min(0).max(1).default(0.6),
  }).default({}),

  // Risk scoring policy
  scoring: z.object({
    weights: SeverityWeights.default({}),
    modifiers: z.object({
      ciChanges: z.number().default(5),
      manifestChanges: z.number().default(5),
      largeDiff: z.number().default(5),
      cleanWithTests: z.number().default(-5),
    }).default({}),
    largeDiffLines: z.number().int().positive().default(500),
  }).default({}),

  // Per-tool finding thresholds; exceeding one fails the policy
  policies: z.record(z.string(), z.object({
    threshold: z.number().int().nonnegative(),
  })).default({}),

  // External summarizer command (stdin: prompt, stdout: summary)
  summarizer: z.object({
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
    timeoutMs: z.number().int().positive().default(300000),
  }).default({}),

  // Output settings
  output: z.object({
    dir: z.string().default('analysis_results'),
  }).default({}),
});
export type GuardianConfig = z.infer<typeof GuardianConfig>;
