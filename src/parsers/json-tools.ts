/**
 * Parsers for analyzers with a documented JSON report
 */

import { ZodType, ZodTypeDef } from 'zod';
import { Finding } from '../types.js';
import {
  BanditOutputSchema,
  CheckovOutputSchema,
  ESLintOutputSchema,
  NpmAuditOutputSchema,
  PipAuditOutputSchema,
  RuboCopOutputSchema,
  RuffOutputSchema,
  SemgrepOutputSchema,
  TrivyOutputSchema,
  safeParseJson,
} from '../core/validation.js';
import { mapSeverity } from './severity.js';
import { ParseContext, ParseResult, makeFinding } from './types.js';

/**
 * Validate against the tool schema, then map. Empty output is zero findings.
 */
function withSchema<T>(
  output: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  map: (data: T) => Finding[]
): ParseResult {
  if (output.trim() === '') {
    return { ok: true, findings: [] };
  }
  const parsed = safeParseJson(output, schema);
  if (!parsed.success) {
    return { ok: false, error: parsed.error };
  }
  return { ok: true, findings: map(parsed.data) };
}

export function parseEslint(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, ESLintOutputSchema, (files) =>
    files.flatMap((file) =>
      file.messages.map((message) =>
        makeFinding({
          tool,
          severity: mapSeverity(tool, message.fatal ? 'fatal' : message.severity),
          file: file.filePath,
          line: message.line,
          column: message.column,
          message: message.message,
          ruleId: message.ruleId ?? undefined,
        })
      )
    )
  );
}

export function parseRuff(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, RuffOutputSchema, (diagnostics) =>
    diagnostics.map((diagnostic) =>
      makeFinding({
        tool,
        severity: mapSeverity(tool, undefined),
        file: diagnostic.filename,
        line: diagnostic.location?.row,
        column: diagnostic.location?.column,
        message: diagnostic.message,
        ruleId: diagnostic.code ?? undefined,
      })
    )
  );
}

export function parseBandit(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, BanditOutputSchema, ({ results }) =>
    results.map((issue) =>
      makeFinding({
        tool,
        severity: mapSeverity(tool, issue.issue_severity),
        file: issue.filename,
        line: issue.line_number,
        column: issue.col_offset,
        message: issue.issue_text,
        ruleId: issue.test_id,
      })
    )
  );
}

export function parseSemgrep(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, SemgrepOutputSchema, ({ results }) =>
    results.map((result) =>
      makeFinding({
        tool,
        severity: mapSeverity(tool, result.extra.severity),
        file: result.path,
        line: result.start.line,
        column: result.start.col,
        message: result.extra.message,
        ruleId: result.check_id,
      })
    )
  );
}

export function parsePipAudit(output: string, { tool, manifest }: ParseContext): ParseResult {
  return withSchema(output, PipAuditOutputSchema, (data) => {
    const dependencies = Array.isArray(data) ? data : data.dependencies;
    return dependencies.flatMap((dependency) =>
      dependency.vulns.map((vuln) => {
        const version = dependency.version ? ` ${dependency.version}` : '';
        const fix = vuln.fix_versions.length > 0 ? ` (fixed in ${vuln.fix_versions.join(', ')})` : '';
        return makeFinding({
          tool,
          severity: mapSeverity(tool, undefined),
          file: manifest ?? 'requirements.txt',
          message: `${dependency.name}${version}: ${vuln.id}${fix}`,
          ruleId: vuln.id,
        });
      })
    );
  });
}

export function parseNpmAudit(output: string, { tool, manifest }: ParseContext): ParseResult {
  return withSchema(output, NpmAuditOutputSchema, ({ vulnerabilities }) =>
    Object.values(vulnerabilities).map((vulnerability) => {
      // `via` names either advisories or the vulnerable package pulled in
      const titles = vulnerability.via
        .map((via) => (typeof via === 'string' ? `via ${via}` : via.title))
        .filter((title): title is string => Boolean(title));
      const range = vulnerability.range ? ` (${vulnerability.range})` : '';
      return makeFinding({
        tool,
        severity: mapSeverity(tool, vulnerability.severity),
        file: manifest ?? 'package.json',
        message: `${vulnerability.name}${range}: ${titles.join('; ') || 'vulnerable dependency'}`,
        ruleId: `npm:${vulnerability.name}`,
      });
    })
  );
}

export function parseTrivy(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, TrivyOutputSchema, ({ Results }) =>
    (Results ?? []).flatMap((result) => [
      ...(result.Misconfigurations ?? []).map((misconfig) =>
        makeFinding({
          tool,
          severity: mapSeverity(tool, misconfig.Severity),
          file: result.Target,
          line: misconfig.CauseMetadata?.StartLine,
          message: misconfig.Title ?? misconfig.Message ?? misconfig.ID,
          ruleId: misconfig.ID,
        })
      ),
      ...(result.Vulnerabilities ?? []).map((vuln) =>
        makeFinding({
          tool,
          severity: mapSeverity(tool, vuln.Severity),
          file: result.Target,
          message: `${vuln.PkgName}${vuln.InstalledVersion ? ` ${vuln.InstalledVersion}` : ''}: ${vuln.Title ?? vuln.VulnerabilityID}`,
          ruleId: vuln.VulnerabilityID,
        })
      ),
    ])
  );
}

export function parseCheckov(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, CheckovOutputSchema, (data) => {
    const reports = Array.isArray(data) ? data : [data];
    return reports.flatMap((report) =>
      report.results.failed_checks.map((check) =>
        makeFinding({
          tool,
          severity: mapSeverity(tool, check.severity),
          // Checkov reports paths relative to -d with a leading slash
          file: check.file_path.replace(/^\//, ''),
          line: check.file_line_range?.[0],
          message: check.check_name,
          ruleId: check.check_id,
        })
      )
    );
  });
}

export function parseRubocop(output: string, { tool }: ParseContext): ParseResult {
  return withSchema(output, RuboCopOutputSchema, ({ files }) =>
    files.flatMap((file) =>
      file.offenses.map((offense) =>
        makeFinding({
          tool,
          severity: mapSeverity(tool, offense.severity),
          file: file.path,
          line: offense.location.start_line ?? offense.location.line,
          column: offense.location.start_column ?? offense.location.column,
          message: offense.message,
          ruleId: offense.cop_name,
        })
      )
    )
  );
}
