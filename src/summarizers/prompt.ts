import { RunMode, Severity } from '../types.js';
import { SummaryPayload } from './types.js';

const PROMPT_FINDINGS = 50;

/**
 * Prompt for the health review. The reply is expected as JSON
 * `{ "summary": string, "detail": string }`; plain text is accepted too.
 */
export function buildSummaryPrompt(payload: SummaryPayload, mode: RunMode): string {
  const { summary, detail } = payload.report;
  const severities = [...Severity.options].reverse();
  const counts = severities.map((severity) => `${severity}: ${summary.severityCounts[severity]}`).join(', ');

  const findings = detail.findings.slice(0, PROMPT_FINDINGS).map((finding) => ({
    severity: finding.severity,
    tool: finding.tool,
    location: finding.line !== undefined ? `${finding.file}:${finding.line}` : finding.file,
    rule: finding.ruleId,
    message: finding.message,
  }));

  return `You are reviewing the static-analysis results of a ${mode === 'pr' ? 'pull request' : 'repository'}.

Write:
1) A repository health summary (a few sentences).
2) Prioritized actionable items (critical / high / medium / low).
3) Remediation guidance as short snippets, not full files.

Reply with JSON only: {"summary": "<health summary>", "detail": "<items and guidance, markdown>"}

Risk score: ${summary.riskScore}/100 (${summary.riskLevel})
Ecosystems: ${summary.ecosystems.join(', ') || 'none'}
Findings by severity: ${counts}
Tools not run cleanly: ${[...summary.skippedTools, ...summary.timedOutTools, ...summary.failedTools].join(', ') || 'none'}

Top findings:
${JSON.stringify(findings, null, 2)}

Analyzer output (excerpts):
${JSON.stringify(payload.compacted, null, 2)}
`;
}
