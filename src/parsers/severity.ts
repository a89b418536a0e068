import { Severity } from '../types.js';

/**
 * Native level → Severity, per tool. Keys are lower-case.
 * '*' is the tool's default for findings reported without a level.
 */
type SeverityTable = Readonly<Record<string, Severity>>;

const SARIF: SeverityTable = { error: 'high', warning: 'medium', note: 'low', none: 'info', '*': 'medium' };

export const SEVERITY_TABLES: Readonly<Record<string, SeverityTable>> = {
  sarif: SARIF,
  gosec: SARIF,
  tfsec: { ...SARIF, error: 'high' },
  'kube-linter': { ...SARIF, error: 'medium' },

  eslint: { '2': 'medium', '1': 'low', fatal: 'high' },
  ruff: { '*': 'low' },
  bandit: { high: 'high', medium: 'medium', low: 'low', undefined: 'info' },
  semgrep: { error: 'high', warning: 'medium', info: 'low', inventory: 'info', experiment: 'info' },
  'pip-audit': { '*': 'high' },
  'npm-audit': { critical: 'critical', high: 'high', moderate: 'medium', low: 'low', info: 'info' },
  trivy: { critical: 'critical', high: 'high', medium: 'medium', low: 'low', unknown: 'info' },
  checkov: { critical: 'critical', high: 'high', medium: 'medium', low: 'low', info: 'info', '*': 'medium' },
  rubocop: { fatal: 'high', error: 'high', warning: 'medium', convention: 'low', refactor: 'low', info: 'info' },

  // generic-json tools
  pmd: { '1': 'high', '2': 'high', '3': 'medium', '4': 'low', '5': 'info' },
  phpcs: { error: 'medium', warning: 'low' },
  psalm: { error: 'medium', info: 'low' },
  hadolint: { error: 'high', warning: 'medium', info: 'low', style: 'info' },
  actionlint: { '*': 'medium' },

  // line tools
  checkstyle: { error: 'medium', warn: 'low', warning: 'low', info: 'info' },
  govet: { '*': 'medium' },
  staticcheck: { '*': 'low' },
  'dotnet-build': { error: 'high', warning: 'low' },
};

/**
 * Mapped severity, or undefined when the table has no entry for the level
 */
export function lookupSeverity(table: string, level: string | number): Severity | undefined {
  return SEVERITY_TABLES[table]?.[String(level).toLowerCase()];
}

/**
 * Severity for a native level. Missing level → the tool's default entry;
 * unmapped level → info.
 */
export function mapSeverity(table: string, level: string | number | null | undefined): Severity {
  if (level === undefined || level === null || level === '') {
    return SEVERITY_TABLES[table]?.['*'] ?? 'info';
  }
  return lookupSeverity(table, level) ?? 'info';
}
