// Core exports
export * from './types.js';
export { loadConfig, parseConfig, defaultConfig, applyEnvOverrides, renderDefaultConfig } from './core/config.js';
export { detectRepository, detectEcosystems, listRepositoryFiles } from './core/detector.js';
export type { DetectOptions } from './core/detector.js';
export { TOOL_REGISTRY, SEMGREP_SPEC, getAnalyzersFor, listRegisteredTools, resolveArgs } from './core/registry.js';
export type { RegistryEntry, RegistryOptions } from './core/registry.js';
export { isToolAvailable } from './core/tool-check.js';
export { ExecaCommandExecutor } from './core/executor.js';
export type { CommandExecutor, CommandOptions, CommandOutcome } from './core/executor.js';
export { planInvocations, runInvocations } from './core/runner.js';
export type { InvocationResult, RunOptions, PlanOptions } from './core/runner.js';
export { deduplicateFindings, sortFindings, messageSimilarity } from './core/aggregator.js';
export { computeRiskScore, riskLevelFor } from './core/risk-scorer.js';
export { evaluatePolicy } from './core/policy.js';
export { runPipeline, runGuardian } from './core/pipeline.js';
export type {
  PipelineInput,
  PipelineOptions,
  PipelineOutcome,
  PipelineProgress,
  GuardianCollaborators,
  GuardianOutcome,
} from './core/pipeline.js';
export { DetectionError, isDetectionError } from './core/errors.js';
export type { CollaboratorError } from './core/errors.js';
export { getPullRequestDiff } from './core/git.js';
export { parseChangedFiles, countChangedLines } from './core/diff.js';

// Normalizer
export { normalizeOutput, normalizeResult, parseOutput, PARSERS, mapSeverity } from './parsers/index.js';

// Output
export { buildReport } from './output/report-builder.js';
export type { Report, ReportSummary, ReportDetail } from './output/report-builder.js';
export { toPersistedReport, parsePersistedReport, serializeReport } from './output/persisted.js';
export { renderHealthComment, renderRiskComment, renderReportMarkdown } from './output/markdown.js';
export { compactResults } from './output/compact.js';

// Collaborators
export { CommandSummarizer, summarizeSafely, placeholderSummary } from './summarizers/index.js';
export type { Summarizer, Summary, SummaryPayload } from './summarizers/index.js';
export { FileSink, GitHubCommentSink, deliverSafely } from './sinks/index.js';
export type { ResultSink, SinkPayload, SinkReceipt } from './sinks/index.js';
