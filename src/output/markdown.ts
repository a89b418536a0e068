/**
 * Markdown for PR comments and for `genops-guardian report`
 */

import { AggregateResult, Finding, RunStatus, SEVERITY_RANK } from '../types.js';
import { Report } from './report-builder.js';

const TOP_ISSUES = 5;

function cell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

export function formatLocation(finding: Pick<Finding, 'file' | 'line'>): string {
  const file = finding.file || '(repository)';
  return finding.line !== undefined ? `${file}:${finding.line}` : file;
}

function issueLine(finding: Finding): string {
  const corroborated = finding.corroboratedBy.length > 0 ? `, also ${finding.corroboratedBy.join(', ')}` : '';
  return `- **${finding.severity}** \`${formatLocation(finding)}\` ${cell(finding.message)} (${finding.tool}${corroborated})`;
}

/**
 * Top findings by severity, ties in report order
 */
function topFindings(findings: readonly Finding[], limit: number): Finding[] {
  return findings
    .map((finding, index) => ({ finding, index }))
    .sort((a, b) => SEVERITY_RANK[b.finding.severity] - SEVERITY_RANK[a.finding.severity] || a.index - b.index)
    .slice(0, limit)
    .map(({ finding }) => finding);
}

/**
 * First comment: the summarizer's health review
 */
export function renderHealthComment(summary: string, detail: string): string {
  const lines = ['## Repository Health Summary', '', summary.trim()];
  if (detail.trim() && detail.trim() !== summary.trim()) {
    lines.push('', '<details>', '<summary>Full analysis</summary>', '', detail.trim(), '', '</details>');
  }
  return lines.join('\n');
}

/**
 * Second comment: score, top issues, tools that did not run
 */
export function renderRiskComment(report: Report): string {
  const { summary, detail } = report;
  const lines = [
    '## GenOps Guardian Risk Review',
    '',
    `**Risk Score:** ${summary.riskScore} (${summary.riskLevel}) · **Policy:** ${summary.policyStatus}`,
    '',
    '### Top Issues',
  ];

  const top = topFindings(detail.findings, TOP_ISSUES);
  lines.push(...(top.length > 0 ? top.map(issueLine) : ['- None']));

  const notRun = [
    ...summary.skippedTools.map((tool) => `${tool} (skipped)`),
    ...summary.timedOutTools.map((tool) => `${tool} (timeout)`),
    ...summary.failedTools.map((tool) => `${tool} (error)`),
  ];
  if (notRun.length > 0) {
    lines.push('', `**Incomplete coverage:** ${notRun.join(', ')}`);
  }

  for (const violation of detail.policy.violations) {
    lines.push(`- Policy: ${violation.tool} reported ${violation.issues} issues (threshold ${violation.threshold})`);
  }

  lines.push('', 'Full analysis is available in the run artifacts.');
  return lines.join('\n');
}

/**
 * Full persisted report as a standalone document
 */
export function renderReportMarkdown(result: AggregateResult, status: RunStatus): string {
  const lines = [
    '# GenOps Guardian Report',
    '',
    `**Generated:** ${result.generatedAt}  `,
    `**Status:** ${status}  `,
    `**Mode:** ${result.mode}  `,
    `**Risk Score:** ${result.riskScore} (${result.riskLevel})  `,
    `**Policy:** ${result.policy.status}`,
    '',
    '## Ecosystems',
    '',
  ];
  lines.push(
    ...(result.ecosystems.length > 0
      ? result.ecosystems.map((ecosystem) => `- ${ecosystem.tag} (\`${ecosystem.evidence}\`)`)
      : ['- None detected'])
  );

  lines.push('', '## Score Breakdown', '', '| Factor | Count | Points |', '|---|---|---|');
  for (const entry of result.breakdown) {
    lines.push(`| ${entry.factor} | ${entry.count ?? ''} | ${entry.points} |`);
  }

  lines.push('', '## Tools', '', '| Tool | Status | Findings | Detail |', '|---|---|---|---|');
  for (const run of result.tools) {
    const status = run.errorKind ? `${run.status} (${run.errorKind})` : run.status;
    lines.push(`| ${run.name} | ${status} | ${run.findingCount} | ${cell(run.detail ?? '')} |`);
  }

  lines.push('', `## Findings (${result.findings.length})`, '');
  if (result.findings.length === 0) {
    lines.push('No findings.');
  } else {
    lines.push('| Severity | Location | Tool | Rule | Message |', '|---|---|---|---|---|');
    for (const finding of result.findings) {
      const tools = [finding.tool, ...finding.corroboratedBy].join(', ');
      lines.push(
        `| ${finding.severity} | ${cell(formatLocation(finding))} | ${tools} | ${finding.ruleId ?? ''} | ${cell(finding.message)} |`
      );
    }
  }

  return lines.join('\n') + '\n';
}
