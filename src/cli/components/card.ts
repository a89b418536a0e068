/**
 * ASCII card renderer for run results
 */

import chalk from 'chalk';
import { RiskLevel, Severity } from '../../types.js';
import { ReportSummary } from '../../output/report-builder.js';

export interface CardMeta {
  repoName: string;
  durationMs: number;
  reportDir?: string;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeRight: '├',
  teeLeft: '┤',
};

const SEVERITY_COLORS: Record<Severity, (s: string) => string> = {
  critical: chalk.red,
  high: chalk.yellow,
  medium: chalk.blue,
  low: chalk.dim,
  info: chalk.gray,
};

const LEVEL_COLORS: Record<RiskLevel, (s: string) => string> = {
  high: chalk.bold.red,
  medium: chalk.bold.yellow,
  low: chalk.bold.green,
};

export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

function padRight(str: string, width: number): string {
  // eslint-disable-next-line no-control-regex
  const stripped = str.replace(/\u001b\[\d+(;\d+)*m/g, '');
  return str + ' '.repeat(Math.max(0, width - stripped.length));
}

function row(content: string, width: number): string {
  return BOX.vertical + '  ' + padRight(content, width - 4) + '  ' + BOX.vertical;
}

function divider(width: number): string {
  return BOX.teeRight + BOX.horizontal.repeat(width) + BOX.teeLeft;
}

/**
 * ┌─────────────────────────────────────────────────────────────┐
 * │  GENOPS GUARDIAN                                            │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Repository    my-service                                   │
 * │  Ecosystems    python, docker                               │
 * │  Duration      42s                                          │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Risk          37/100 MEDIUM        Policy  PASS            │
 * │  ● Critical    0                                            │
 * │  ...                                                        │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Tools         5 ok | 1 skipped | 0 timeout | 0 error       │
 * └─────────────────────────────────────────────────────────────┘
 */
export function renderRiskCard(summary: ReportSummary, meta: CardMeta): string {
  const width = 61;
  const lines: string[] = [];

  lines.push(BOX.topLeft + BOX.horizontal.repeat(width) + BOX.topRight);
  lines.push(row(chalk.bold.cyan('GENOPS GUARDIAN'), width));
  lines.push(divider(width));

  lines.push(row(`${chalk.dim('Repository')}    ${meta.repoName}`, width));
  lines.push(row(`${chalk.dim('Ecosystems')}    ${summary.ecosystems.join(', ') || 'none detected'}`, width));
  lines.push(row(`${chalk.dim('Duration')}      ${formatDuration(meta.durationMs)}`, width));
  lines.push(divider(width));

  const level = LEVEL_COLORS[summary.riskLevel](`${summary.riskScore}/100 ${summary.riskLevel.toUpperCase()}`);
  const policy = summary.policyStatus === 'PASS' ? chalk.green('PASS') : chalk.red('FAIL');
  lines.push(row(`${chalk.bold('Risk')}          ${padRight(level, 20)} ${chalk.bold('Policy')}  ${policy}`, width));

  const severities: Severity[] = ['critical', 'high', 'medium', 'low', 'info'];
  for (const severity of severities) {
    const label = (severity.charAt(0).toUpperCase() + severity.slice(1)).padEnd(9);
    lines.push(row(`${SEVERITY_COLORS[severity]('●')} ${label}    ${String(summary.severityCounts[severity]).padStart(3)}`, width));
  }
  lines.push(divider(width));

  const tools = summary.toolCounts;
  lines.push(
    row(`${chalk.dim('Tools')}         ${tools.success} ok | ${tools.skipped} skipped | ${tools.timeout} timeout | ${tools.error} error`, width)
  );
  if (meta.reportDir) {
    lines.push(row(`${chalk.dim('Reports:')} ${chalk.cyan(meta.reportDir)}`, width));
  }
  lines.push(BOX.bottomLeft + BOX.horizontal.repeat(width) + BOX.bottomRight);

  return lines.join('\n');
}
