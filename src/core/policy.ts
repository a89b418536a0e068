import { Finding, GuardianConfig, PolicyEvaluation, PolicyViolation, RiskLevel } from '../types.js';

/**
 * Per-tool finding thresholds. A tool exceeding its threshold fails the
 * policy; tools without a threshold never do.
 */
export function evaluatePolicy(
  findings: readonly Finding[],
  policies: GuardianConfig['policies'],
  riskLevel: RiskLevel
): PolicyEvaluation {
  const counts = new Map<string, number>();
  for (const finding of findings) {
    counts.set(finding.tool, (counts.get(finding.tool) ?? 0) + 1);
  }

  const violations: PolicyViolation[] = Object.entries(policies)
    .map(([tool, { threshold }]) => ({ tool, issues: counts.get(tool) ?? 0, threshold }))
    .filter(({ issues, threshold }) => issues > threshold)
    .sort((a, b) => a.tool.localeCompare(b.tool));

  return {
    status: violations.length > 0 ? 'FAIL' : 'PASS',
    violations,
    riskLevel,
  };
}
