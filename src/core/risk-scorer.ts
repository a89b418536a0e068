/**
 * Risk Scorer - findings + context → auditable 0..100 score
 *
 * Every point is accounted for in the breakdown: the entries always sum to
 * the final score, including the cap and clamp adjustments.
 */

import {
  BreakdownEntry,
  Finding,
  GuardianConfig,
  RepositoryContext,
  RiskLevel,
  Severity,
  ToolRun,
} from '../types.js';

export const MAX_SCORE = 100;

type ScoringPolicy = GuardianConfig['scoring'];

const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

export interface RiskScore {
  score: number;
  level: RiskLevel;
  breakdown: BreakdownEntry[];
}

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 60) return 'high';
  if (score >= 30) return 'medium';
  return 'low';
}

function clamp(value: number): number {
  return Math.min(MAX_SCORE, Math.max(0, value));
}

export function computeRiskScore(
  findings: readonly Finding[],
  context: Pick<RepositoryContext, 'ecosystems' | 'signals'>,
  runs: readonly ToolRun[],
  policy: ScoringPolicy
): RiskScore {
  const breakdown: BreakdownEntry[] = [];

  // Base: severity counts × weights
  let base = 0;
  for (const severity of SEVERITY_ORDER) {
    const count = findings.filter((finding) => finding.severity === severity).length;
    const weight = policy.weights[severity];
    const points = count * weight;
    base += points;
    breakdown.push({ factor: `severity:${severity}`, points, count, weight });
  }

  const capped = Math.min(base, MAX_SCORE);
  if (capped !== base) {
    breakdown.push({ factor: 'cap', points: capped - base });
  }

  // Context modifiers only mean something when something was analyzed
  let score = capped;
  if (context.ecosystems.length > 0) {
    const { signals } = context;
    const modifiers: Array<[string, boolean, number]> = [
      ['modifier:ci_changes', signals.ciChanged, policy.modifiers.ciChanges],
      ['modifier:dependency_changes', signals.manifestsChanged, policy.modifiers.manifestChanges],
      ['modifier:large_diff', signals.diffLines > policy.largeDiffLines, policy.modifiers.largeDiff],
      ['modifier:clean_with_tests', findings.length === 0 && signals.testsPresent, policy.modifiers.cleanWithTests],
    ];
    for (const [factor, applies, points] of modifiers) {
      if (applies && points !== 0) {
        score += points;
        breakdown.push({ factor, points });
      }
    }
  }

  const final = Math.round(clamp(score));
  if (final !== score) {
    breakdown.push({ factor: 'clamp', points: final - score });
  }

  for (const status of ['skipped', 'timeout', 'error'] as const) {
    breakdown.push({
      factor: `tools:${status}`,
      points: 0,
      count: runs.filter((run) => run.status === status).length,
    });
  }

  return { score: final, level: riskLevelFor(final), breakdown };
}
