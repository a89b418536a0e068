import { describe, it, expect } from 'vitest';
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
} from '../../../src/parsers/json-tools.js';
import type { ParseResult } from '../../../src/parsers/types.js';

function findingsOf(result: ParseResult) {
  if (!result.ok) {
    throw new Error(`expected ok, got: ${result.error}`);
  }
  return result.findings;
}

describe('parsers/json-tools', () => {
  describe('parseEslint', () => {
    const output = JSON.stringify([
      {
        filePath: '/repo/src/a.js',
        messages: [
          { ruleId: 'no-unused-vars', severity: 2, message: "'x' is defined but never used.", line: 3, column: 7 },
          { ruleId: null, severity: 2, message: 'Parsing error: Unexpected token', fatal: true, line: 1 },
        ],
      },
      { filePath: '/repo/src/b.js', messages: [] },
    ]);

    it('should map each message to a finding', () => {
      const findings = findingsOf(parseEslint(output, { tool: 'eslint' }));

      expect(findings).toHaveLength(2);
      expect(findings[0]).toMatchObject({
        tool: 'eslint',
        severity: 'medium',
        file: '/repo/src/a.js',
        line: 3,
        column: 7,
        ruleId: 'no-unused-vars',
        raw: false,
        confidence: 'high',
      });
    });

    it('should treat fatal messages as high and omit a null rule', () => {
      const findings = findingsOf(parseEslint(output, { tool: 'eslint' }));

      expect(findings[1].severity).toBe('high');
      expect(findings[1].ruleId).toBeUndefined();
    });

    it('should return zero findings for empty output', () => {
      expect(parseEslint('', { tool: 'eslint' })).toEqual({ ok: true, findings: [] });
      expect(parseEslint('  \n', { tool: 'eslint' })).toEqual({ ok: true, findings: [] });
    });
  });

  describe('parseRuff', () => {
    it('should use the ruff default severity', () => {
      const output = JSON.stringify([
        { code: 'F401', message: '`os` imported but unused', filename: 'app.py', location: { row: 1, column: 8 } },
      ]);

      const [finding] = findingsOf(parseRuff(output, { tool: 'ruff' }));

      expect(finding).toMatchObject({ severity: 'low', file: 'app.py', line: 1, column: 8, ruleId: 'F401' });
    });
  });

  describe('parseBandit', () => {
    it('should map issue severity and strip a leading ./', () => {
      const output = JSON.stringify({
        results: [
          { filename: './app.py', issue_severity: 'HIGH', issue_text: 'Use of exec detected.', line_number: 10, test_id: 'B102' },
        ],
      });

      const [finding] = findingsOf(parseBandit(output, { tool: 'bandit' }));

      expect(finding).toMatchObject({
        severity: 'high',
        file: 'app.py',
        line: 10,
        message: 'Use of exec detected.',
        ruleId: 'B102',
      });
    });

    it('should fail on output that is not JSON', () => {
      expect(parseBandit('Traceback (most recent call last):', { tool: 'bandit' }).ok).toBe(false);
    });

    it('should fail on JSON of the wrong shape', () => {
      expect(parseBandit('{"foo": 1}', { tool: 'bandit' })).toEqual({ ok: false, error: 'results: Required' });
    });
  });

  describe('parseSemgrep', () => {
    it('should map ERROR to high', () => {
      const output = JSON.stringify({
        results: [
          {
            check_id: 'python.lang.security.audit.eval-detected',
            path: 'app.py',
            start: { line: 5, col: 1 },
            extra: { message: 'Detected the use of eval()', severity: 'ERROR' },
          },
        ],
      });

      const [finding] = findingsOf(parseSemgrep(output, { tool: 'semgrep' }));

      expect(finding).toMatchObject({
        severity: 'high',
        file: 'app.py',
        line: 5,
        column: 1,
        ruleId: 'python.lang.security.audit.eval-detected',
      });
    });
  });

  describe('parsePipAudit', () => {
    const report = {
      dependencies: [
        { name: 'flask', version: '0.5', vulns: [{ id: 'PYSEC-2019-179', fix_versions: ['1.0'] }] },
        { name: 'requests', version: '2.31.0', vulns: [] },
      ],
    };

    it('should emit one high finding per vulnerability against the manifest', () => {
      const findings = findingsOf(parsePipAudit(JSON.stringify(report), { tool: 'pip-audit', manifest: 'requirements.txt' }));

      expect(findings).toHaveLength(1);
      expect(findings[0]).toMatchObject({
        tool: 'pip-audit',
        severity: 'high',
        file: 'requirements.txt',
        message: 'flask 0.5: PYSEC-2019-179 (fixed in 1.0)',
        ruleId: 'PYSEC-2019-179',
      });
    });

    it('should accept the bare dependency list of older releases', () => {
      const findings = findingsOf(parsePipAudit(JSON.stringify(report.dependencies), { tool: 'pip-audit' }));

      expect(findings).toHaveLength(1);
      expect(findings[0].file).toBe('requirements.txt');
    });
  });

  describe('parseNpmAudit', () => {
    it('should summarize advisories and transitive paths', () => {
      const output = JSON.stringify({
        vulnerabilities: {
          lodash: {
            name: 'lodash',
            severity: 'moderate',
            range: '<4.17.21',
            via: [{ title: 'Prototype Pollution in lodash', url: 'https://example.com/advisory' }],
          },
          'dep-a': { name: 'dep-a', severity: 'high', via: ['lodash'] },
        },
      });

      const findings = findingsOf(parseNpmAudit(output, { tool: 'npm-audit' }));

      expect(findings.map((f) => [f.severity, f.file, f.message])).toEqual([
        ['medium', 'package.json', 'lodash (<4.17.21): Prototype Pollution in lodash'],
        ['high', 'package.json', 'dep-a: via lodash'],
      ]);
    });
  });

  describe('parseTrivy', () => {
    it('should map misconfigurations and vulnerabilities', () => {
      const output = JSON.stringify({
        Results: [
          {
            Target: 'Dockerfile',
            Misconfigurations: [
              { ID: 'DS002', Title: "Image user should not be 'root'", Severity: 'HIGH', CauseMetadata: { StartLine: 1 } },
            ],
          },
          {
            Target: 'alpine 3.18',
            Vulnerabilities: [
              { VulnerabilityID: 'CVE-2023-0001', PkgName: 'openssl', InstalledVersion: '3.1.0', Severity: 'CRITICAL', Title: 'openssl: example flaw' },
            ],
          },
        ],
      });

      const findings = findingsOf(parseTrivy(output, { tool: 'trivy' }));

      expect(findings).toHaveLength(2);
      expect(findings[0]).toMatchObject({ severity: 'high', file: 'Dockerfile', line: 1, ruleId: 'DS002' });
      expect(findings[1]).toMatchObject({
        severity: 'critical',
        file: 'alpine 3.18',
        message: 'openssl 3.1.0: openssl: example flaw',
        ruleId: 'CVE-2023-0001',
      });
    });

    it('should accept a null Results list', () => {
      expect(parseTrivy('{"Results": null}', { tool: 'trivy' })).toEqual({ ok: true, findings: [] });
    });
  });

  describe('parseCheckov', () => {
    it('should fall back to the checkov default when severity is null', () => {
      const output = JSON.stringify([
        {
          check_type: 'terraform',
          results: {
            failed_checks: [
              {
                check_id: 'CKV_AWS_20',
                check_name: 'S3 Bucket has an ACL defined which allows public READ access.',
                file_path: '/main.tf',
                file_line_range: [1, 8],
                severity: null,
              },
            ],
          },
        },
      ]);

      const [finding] = findingsOf(parseCheckov(output, { tool: 'checkov' }));

      expect(finding).toMatchObject({ severity: 'medium', file: 'main.tf', line: 1, ruleId: 'CKV_AWS_20' });
    });
  });

  describe('parseRubocop', () => {
    it('should map offense severities', () => {
      const output = JSON.stringify({
        files: [
          {
            path: 'app.rb',
            offenses: [
              {
                severity: 'convention',
                message: 'Prefer single-quoted strings',
                cop_name: 'Style/StringLiterals',
                location: { start_line: 2, start_column: 5 },
              },
            ],
          },
        ],
      });

      const [finding] = findingsOf(parseRubocop(output, { tool: 'rubocop' }));

      expect(finding).toMatchObject({ severity: 'low', line: 2, column: 5, ruleId: 'Style/StringLiterals' });
    });
  });
});
