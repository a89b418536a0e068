/**
 * Pipeline - one run, start to finish
 *
 *   Detecting → Scheduling → Running → Normalizing → Aggregating → Reporting → Done
 *        └──→ Aborted (repository unreadable)
 *
 * Detection is the only stage that can abort. From Scheduling on, every
 * failure is contained in the ToolRun of the invocation it happened in, so
 * a run that gets past detection always produces a score and a report.
 */

import {
  AggregateResult,
  Finding,
  GuardianConfig,
  PipelineStage,
  RepositoryContext,
  RunMode,
  RunStatus,
  ToolRun,
} from '../types.js';
import { CompactedResult, compactResults } from '../output/compact.js';
import { Report, buildReport } from '../output/report-builder.js';
import { normalizeResult } from '../parsers/index.js';
import { ResultSink, SinkReceipt, deliverSafely } from '../sinks/index.js';
import { Summarizer, Summary, summarizeSafely } from '../summarizers/index.js';
import { deduplicateFindings } from './aggregator.js';
import { defaultConfig } from './config.js';
import { detectRepository } from './detector.js';
import { CollaboratorError, DetectionError, isDetectionError } from './errors.js';
import { CommandExecutor } from './executor.js';
import { evaluatePolicy } from './policy.js';
import { getAnalyzersFor } from './registry.js';
import { computeRiskScore } from './risk-scorer.js';
import { InvocationResult, planInvocations, runInvocations } from './runner.js';
import { debugLog } from './utils.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface PipelineInput {
  root: string;
  mode?: RunMode;
  /** PR mode: changed paths, when already known */
  changedFiles?: string[];
  /** PR mode: unified diff text */
  patch?: string;
}

export interface PipelineProgress {
  onStage?: (stage: PipelineStage) => void;
  onPlanned?: (toolIds: string[], unavailable: string[]) => void;
  onToolFinished?: (result: InvocationResult) => void;
}

export interface PipelineOptions {
  config?: GuardianConfig;
  executor?: CommandExecutor;
  isAvailable?: (command: string) => Promise<boolean>;
  signal?: AbortSignal;
  progress?: PipelineProgress;
  now?: () => Date;
}

export interface PipelineOutcome {
  status: RunStatus;
  /** Stages entered, in order */
  stages: PipelineStage[];
  context?: RepositoryContext;
  result: AggregateResult;
  report: Report;
  compacted: CompactedResult[];
  error?: DetectionError;
}

export interface GuardianCollaborators {
  summarizer?: Summarizer;
  sinks?: ResultSink[];
}

export interface GuardianOutcome extends PipelineOutcome {
  summary: Summary;
  receipts: SinkReceipt[];
  collaboratorErrors: CollaboratorError[];
}

// ─────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────

function aggregate(
  findings: readonly Finding[],
  runs: ToolRun[],
  context: Pick<RepositoryContext, 'ecosystems' | 'signals' | 'mode'>,
  config: GuardianConfig,
  startedAt: number,
  now: () => Date
): AggregateResult {
  const deduplicated = deduplicateFindings(findings, config.dedupe);
  const score = computeRiskScore(deduplicated, context, runs, config.scoring);
  const completedAt = now();

  return {
    findings: deduplicated,
    tools: runs,
    riskScore: score.score,
    riskLevel: score.level,
    breakdown: score.breakdown,
    policy: evaluatePolicy(deduplicated, config.policies, score.level),
    ecosystems: context.ecosystems.map((ecosystem) => ({ ...ecosystem })),
    mode: context.mode,
    generatedAt: completedAt.toISOString(),
    durationMs: Math.max(0, completedAt.getTime() - startedAt),
  };
}

export async function runPipeline(input: PipelineInput, options: PipelineOptions = {}): Promise<PipelineOutcome> {
  const config = options.config ?? defaultConfig();
  const now = options.now ?? (() => new Date());
  const startedAt = now().getTime();
  const stages: PipelineStage[] = [];
  const enter = (stage: PipelineStage) => {
    stages.push(stage);
    debugLog('Stage:', stage);
    options.progress?.onStage?.(stage);
  };

  // Detecting
  enter('Detecting');
  let context: RepositoryContext;
  try {
    context = await detectRepository(input.root, {
      mode: input.mode,
      changedFiles: input.changedFiles,
      patch: input.patch,
      maxDepth: config.detection.maxDepth,
      exclude: config.detection.exclude,
    });
  } catch (error) {
    if (!isDetectionError(error)) {
      throw error;
    }
    enter('Aborted');
    const empty = { ecosystems: [], signals: { ciChanged: false, manifestsChanged: false, testsPresent: false, diffLines: 0 }, mode: input.mode ?? 'manual' };
    const result = aggregate([], [], empty, config, startedAt, now);
    return {
      status: 'aborted',
      stages,
      result,
      report: buildReport(result, 'aborted', [error.message]),
      compacted: [],
      error,
    };
  }

  // Scheduling
  enter('Scheduling');
  const entries = getAnalyzersFor(context.ecosystems, {
    disabled: config.tools.disabled,
    semgrep: config.tools.semgrep,
  });
  const plan = await planInvocations(entries, context, {
    timeoutMs: config.runner.timeoutMs,
    isAvailable: options.isAvailable,
  });
  options.progress?.onPlanned?.(
    plan.invocations.map((invocation) => invocation.id),
    plan.unavailable.map((result) => result.invocation.id)
  );

  // Running
  enter('Running');
  const executed = await runInvocations(plan.invocations, {
    concurrency: config.runner.concurrency,
    deadlineMs: config.runner.deadlineMs,
    executor: options.executor,
    signal: options.signal,
    onResult: options.progress?.onToolFinished,
  });

  // Normalizing: registry order, unavailable tools included
  enter('Normalizing');
  const order = new Map(entries.map((entry, index) => [entry.spec.id, index]));
  const results = [...plan.unavailable, ...executed].sort(
    (a, b) => (order.get(a.invocation.id) ?? 0) - (order.get(b.invocation.id) ?? 0)
  );
  const normalized = results.map(normalizeResult);
  const runs = normalized.map(({ run }) => run);
  const findings = normalized.flatMap(({ findings }) => findings);

  // Aggregating
  enter('Aggregating');
  const result = aggregate(findings, runs, context, config, startedAt, now);
  const status: RunStatus = runs.every((run) => run.status === 'success') ? 'completed' : 'completed_with_skips';

  // Reporting
  enter('Reporting');
  const report = buildReport(result, status, context.warnings);
  const compacted = compactResults(results, runs);

  enter('Done');
  return { status, stages, context, result, report, compacted };
}

/**
 * Pipeline, then summarizer, then sinks. Each collaborator runs at most
 * once and its failure never changes the run status.
 */
export async function runGuardian(
  input: PipelineInput,
  collaborators: GuardianCollaborators = {},
  options: PipelineOptions = {}
): Promise<GuardianOutcome> {
  const outcome = await runPipeline(input, options);
  const collaboratorErrors: CollaboratorError[] = [];

  const { summary, error: summaryError } = await summarizeSafely(
    collaborators.summarizer,
    { report: outcome.report, compacted: outcome.compacted },
    outcome.result.mode
  );
  if (summaryError) {
    collaboratorErrors.push(summaryError);
  }

  const receipts: SinkReceipt[] = [];
  for (const sink of collaborators.sinks ?? []) {
    const delivery = await deliverSafely(sink, {
      status: outcome.status,
      result: outcome.result,
      report: outcome.report,
      summary,
      compacted: outcome.compacted,
    });
    if (delivery.receipt) {
      receipts.push(delivery.receipt);
    }
    if (delivery.error) {
      collaboratorErrors.push(delivery.error);
    }
  }

  return { ...outcome, summary, receipts, collaboratorErrors };
}
