/**
 * genops_guardian.json - the persisted, snake_case form of a run
 */

import { z } from 'zod';
import {
  AggregateResult,
  Confidence,
  DetectedEcosystem,
  Finding,
  RiskLevel,
  RunMode,
  RunStatus,
  Severity,
  ToolErrorKind,
  ToolStatus,
} from '../types.js';
import { safeParseJson } from '../core/validation.js';

export const PERSISTED_VERSION = '1';

const PersistedFinding = z.object({
  id: z.string(),
  tool: z.string(),
  severity: Severity,
  file: z.string(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  message: z.string(),
  rule_id: z.string().optional(),
  raw: z.boolean().default(false),
  confidence: Confidence.default('high'),
  corroborated_by: z.array(z.string()).default([]),
});

const PersistedToolRun = z.object({
  tool: z.string(),
  name: z.string(),
  ecosystem: z.string(),
  status: ToolStatus,
  error_kind: ToolErrorKind.optional(),
  exit_code: z.number().int().optional(),
  duration_ms: z.number().nonnegative(),
  finding_count: z.number().int().nonnegative(),
  detail: z.string().optional(),
});

export const PersistedReportSchema = z.object({
  version: z.string().default(PERSISTED_VERSION),
  generated_at: z.string(),
  status: RunStatus,
  mode: RunMode,
  risk_score: z.number().int().min(0).max(100),
  risk_level: RiskLevel,
  ecosystems: z.array(DetectedEcosystem).default([]),
  findings: z.array(PersistedFinding),
  breakdown: z.array(z.object({
    factor: z.string(),
    points: z.number(),
    count: z.number().int().optional(),
    weight: z.number().optional(),
  })),
  tools: z.array(PersistedToolRun).default([]),
  policy: z.object({
    status: z.enum(['PASS', 'FAIL']),
    violations: z.array(z.object({
      tool: z.string(),
      issues: z.number().int(),
      threshold: z.number().int(),
    })),
    risk_level: RiskLevel,
  }),
  duration_ms: z.number().nonnegative().default(0),
});
export type PersistedReport = z.infer<typeof PersistedReportSchema>;

export function toPersistedReport(result: AggregateResult, status: RunStatus): PersistedReport {
  return {
    version: PERSISTED_VERSION,
    generated_at: result.generatedAt,
    status,
    mode: result.mode,
    risk_score: result.riskScore,
    risk_level: result.riskLevel,
    ecosystems: result.ecosystems,
    findings: result.findings.map((finding) => ({
      id: finding.id,
      tool: finding.tool,
      severity: finding.severity,
      file: finding.file,
      line: finding.line,
      column: finding.column,
      message: finding.message,
      rule_id: finding.ruleId,
      raw: finding.raw,
      confidence: finding.confidence,
      corroborated_by: finding.corroboratedBy,
    })),
    breakdown: result.breakdown,
    tools: result.tools.map((run) => ({
      tool: run.tool,
      name: run.name,
      ecosystem: run.ecosystem,
      status: run.status,
      error_kind: run.errorKind,
      exit_code: run.exitCode,
      duration_ms: run.durationMs,
      finding_count: run.findingCount,
      detail: run.detail,
    })),
    policy: {
      status: result.policy.status,
      violations: result.policy.violations,
      risk_level: result.policy.riskLevel,
    },
    duration_ms: result.durationMs,
  };
}

export function serializeReport(result: AggregateResult, status: RunStatus): string {
  return JSON.stringify(toPersistedReport(result, status), null, 2);
}

/**
 * Read genops_guardian.json back into an AggregateResult
 */
export function parsePersistedReport(
  json: string
): { success: true; data: { result: AggregateResult; status: RunStatus } } | { success: false; error: string } {
  const parsed = safeParseJson(json, PersistedReportSchema);
  if (!parsed.success) {
    return parsed;
  }
  const report = parsed.data;

  const findings: Finding[] = report.findings.map((finding) => ({
    id: finding.id,
    tool: finding.tool,
    severity: finding.severity,
    file: finding.file,
    line: finding.line,
    column: finding.column,
    message: finding.message,
    ruleId: finding.rule_id,
    raw: finding.raw,
    confidence: finding.confidence,
    corroboratedBy: finding.corroborated_by,
  }));

  return {
    success: true,
    data: {
      status: report.status,
      result: {
        findings,
        tools: report.tools.map((run) => ({
          tool: run.tool,
          name: run.name,
          ecosystem: run.ecosystem,
          status: run.status,
          errorKind: run.error_kind,
          exitCode: run.exit_code,
          durationMs: run.duration_ms,
          findingCount: run.finding_count,
          detail: run.detail,
        })),
        riskScore: report.risk_score,
        riskLevel: report.risk_level,
        breakdown: report.breakdown,
        policy: {
          status: report.policy.status,
          violations: report.policy.violations,
          riskLevel: report.policy.risk_level,
        },
        ecosystems: report.ecosystems,
        mode: report.mode,
        generatedAt: report.generated_at,
        durationMs: report.duration_ms,
      },
    },
  };
}
