/**
 * Report Builder - AggregateResult → { summary, detail }
 *
 * The summary is what a reader (or a summarizer) needs first: headline
 * risk, counts, and which tools did not run cleanly. The detail is the
 * complete record.
 */

import {
  AggregateResult,
  BreakdownEntry,
  EcosystemTag,
  Finding,
  PolicyEvaluation,
  RiskLevel,
  RunMode,
  RunStatus,
  Severity,
  ToolRun,
  ToolStatus,
} from '../types.js';

export interface ReportSummary {
  status: RunStatus;
  mode: RunMode;
  riskScore: number;
  riskLevel: RiskLevel;
  policyStatus: PolicyEvaluation['status'];
  ecosystems: EcosystemTag[];
  findingCount: number;
  severityCounts: Record<Severity, number>;
  toolCounts: Record<ToolStatus, number>;
  skippedTools: string[];
  timedOutTools: string[];
  failedTools: string[];
}

export interface ReportDetail {
  findings: Finding[];
  breakdown: BreakdownEntry[];
  tools: ToolRun[];
  policy: PolicyEvaluation;
  warnings: string[];
  generatedAt: string;
  durationMs: number;
}

export interface Report {
  summary: ReportSummary;
  detail: ReportDetail;
}

function toolsWith(runs: readonly ToolRun[], status: ToolStatus): string[] {
  return runs.filter((run) => run.status === status).map((run) => run.tool);
}

export function buildReport(
  result: AggregateResult,
  status: RunStatus,
  warnings: readonly string[] = []
): Report {
  const severityCounts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of result.findings) {
    severityCounts[finding.severity]++;
  }

  const toolCounts: Record<ToolStatus, number> = { success: 0, timeout: 0, error: 0, skipped: 0 };
  for (const run of result.tools) {
    toolCounts[run.status]++;
  }

  return {
    summary: {
      status,
      mode: result.mode,
      riskScore: result.riskScore,
      riskLevel: result.riskLevel,
      policyStatus: result.policy.status,
      ecosystems: result.ecosystems.map((ecosystem) => ecosystem.tag),
      findingCount: result.findings.length,
      severityCounts,
      toolCounts,
      skippedTools: toolsWith(result.tools, 'skipped'),
      timedOutTools: toolsWith(result.tools, 'timeout'),
      failedTools: toolsWith(result.tools, 'error'),
    },
    detail: {
      findings: result.findings,
      breakdown: result.breakdown,
      tools: result.tools,
      policy: result.policy,
      warnings: [...warnings],
      generatedAt: result.generatedAt,
      durationMs: result.durationMs,
    },
  };
}
