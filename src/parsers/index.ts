/**
 * Normalizer - analyzer output → Finding[]
 *
 * One pure parser per OutputFormat. Output a parser rejects is kept as a
 * single low-confidence raw finding instead of being dropped.
 */

import { isAbsolute, relative } from 'path';
import { AnalyzerSpec, Finding, OutputFormat, ToolRun } from '../types.js';
import type { InvocationResult } from '../core/runner.js';
import { truncate } from '../core/utils.js';
import {
  parseBandit,
  parseCheckov,
  parseEslint,
  parseNpmAudit,
  parsePipAudit,
  parseRubocop,
  parseRuff,
  parseSemgrep,
  parseTrivy,
} from './json-tools.js';
import { parseGenericJson } from './generic-json.js';
import { parseLines } from './line.js';
import { parseSarif } from './sarif.js';
import { ParseContext, ParseResult, Parser, makeFinding } from './types.js';

export { mapSeverity, lookupSeverity, SEVERITY_TABLES } from './severity.js';
export type { ParseContext, ParseResult, Parser } from './types.js';

export const PARSERS: Readonly<Record<OutputFormat, Parser>> = {
  sarif: parseSarif,
  'eslint-json': parseEslint,
  'ruff-json': parseRuff,
  'bandit-json': parseBandit,
  'semgrep-json': parseSemgrep,
  'pip-audit-json': parsePipAudit,
  'npm-audit-json': parseNpmAudit,
  'trivy-json': parseTrivy,
  'checkov-json': parseCheckov,
  'rubocop-json': parseRubocop,
  'generic-json': parseGenericJson,
  line: parseLines,
};

const STDERR_EXCERPT = 500;

/**
 * Parse with the analyzer's declared format, without the raw fallback
 */
export function parseOutput(spec: AnalyzerSpec, output: string, manifest?: string): ParseResult {
  const context: ParseContext = { tool: spec.id, ...(manifest !== undefined ? { manifest } : {}) };
  return PARSERS[spec.format](output, context);
}

/**
 * The whole output, verbatim, as one info finding
 */
export function rawFinding(tool: string, output: string): Finding {
  const finding = makeFinding({ tool, severity: 'info', file: '', message: output, ruleId: 'raw' });
  return { ...finding, message: output, raw: true, confidence: 'low' };
}

/**
 * Findings for one tool's output. A parse failure yields a raw finding and
 * the parser's error.
 */
export function normalizeOutput(
  spec: AnalyzerSpec,
  stdout: string,
  manifest?: string
): { findings: Finding[]; error?: string } {
  const parsed = parseOutput(spec, stdout, manifest);
  if (parsed.ok) {
    return { findings: parsed.findings };
  }
  return { findings: [rawFinding(spec.id, stdout)], error: parsed.error };
}

function relativeTo(root: string, finding: Finding): Finding {
  if (!finding.file || !isAbsolute(finding.file)) {
    return finding;
  }
  const rel = relative(root, finding.file);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return finding;
  }
  return { ...finding, file: rel };
}

/**
 * Classify one execution into its ToolRun record and findings.
 *
 * Exit codes outside successExitCodes still count as a completed run when
 * the output parses; otherwise the tool crashed and its output is dropped.
 * A nonzero exit with no output is a crash whatever successExitCodes says.
 */
export function normalizeResult(result: InvocationResult): { run: ToolRun; findings: Finding[] } {
  const { invocation } = result;
  const { spec } = invocation;
  const run: ToolRun = {
    tool: spec.id,
    name: spec.name,
    ecosystem: spec.ecosystem,
    status: 'success',
    durationMs: result.durationMs,
    findingCount: 0,
    ...(result.exitCode !== undefined ? { exitCode: result.exitCode } : {}),
    ...(result.detail !== undefined ? { detail: result.detail } : {}),
  };

  switch (result.kind) {
    case 'unavailable':
      return { run: { ...run, status: 'skipped', errorKind: 'ToolUnavailable' }, findings: [] };
    case 'not-started':
      return { run: { ...run, status: 'skipped' }, findings: [] };
    case 'timeout':
      return { run: { ...run, status: 'timeout', errorKind: 'ToolTimeout' }, findings: [] };
    case 'failed':
    case 'crashed':
      return { run: { ...run, status: 'error', errorKind: 'ToolCrash' }, findings: [] };
    case 'exited':
      break;
  }

  // Line tools such as go vet report on stderr
  const output = spec.format === 'line'
    ? [result.stdout, result.stderr].filter((text) => text.trim() !== '').join('\n')
    : result.stdout;
  const exitCode = result.exitCode ?? 0;

  const crashed = (): { run: ToolRun; findings: Finding[] } => {
    const stderr = truncate(result.stderr.trim(), STDERR_EXCERPT);
    return {
      run: {
        ...run,
        status: 'error',
        errorKind: 'ToolCrash',
        detail: stderr ? `exit code ${exitCode}: ${stderr}` : `exit code ${exitCode}`,
      },
      findings: [],
    };
  };

  // A nonzero exit that printed nothing did not get as far as reporting
  if (exitCode !== 0 && output.trim() === '') {
    return crashed();
  }

  let findings: Finding[];
  if (spec.successExitCodes.includes(exitCode)) {
    const normalized = normalizeOutput(spec, output, invocation.manifest);
    findings = normalized.findings;
    if (normalized.error !== undefined) {
      run.errorKind = 'ParseError';
      run.detail = `unparseable ${spec.format} output: ${normalized.error}`;
    }
  } else {
    const parsed = parseOutput(spec, output, invocation.manifest);
    if (!parsed.ok) {
      return crashed();
    }
    findings = parsed.findings;
  }

  const located = findings.map((finding) => relativeTo(invocation.cwd, finding));
  return { run: { ...run, findingCount: located.length }, findings: located };
}
