import { describe, it, expect } from 'vitest';
import {
  formatLocation,
  renderHealthComment,
  renderReportMarkdown,
  renderRiskComment,
} from '../../../src/output/markdown.js';
import { buildReport } from '../../../src/output/report-builder.js';
import type { Finding } from '../../../src/types.js';
import { aggregateResult, finding, toolRun } from '../../helpers/fixtures.js';

describe('output/markdown', () => {
  describe('formatLocation', () => {
    it('should show file and line, or the repository for raw findings', () => {
      expect(formatLocation({ file: 'app.py', line: 3 })).toBe('app.py:3');
      expect(formatLocation({ file: 'requirements.txt' })).toBe('requirements.txt');
      expect(formatLocation({ file: '' })).toBe('(repository)');
    });
  });

  describe('renderHealthComment', () => {
    it('should fold a longer detail under the summary', () => {
      expect(renderHealthComment('Mostly healthy.\n', '1. Fix exec in app.py')).toBe(
        [
          '## Repository Health Summary',
          '',
          'Mostly healthy.',
          '',
          '<details>',
          '<summary>Full analysis</summary>',
          '',
          '1. Fix exec in app.py',
          '',
          '</details>',
        ].join('\n')
      );
    });

    it('should omit the details block when it repeats the summary', () => {
      expect(renderHealthComment('Clean.', 'Clean.')).toBe('## Repository Health Summary\n\nClean.');
    });
  });

  describe('renderRiskComment', () => {
    it('should list the top issues by severity and incomplete coverage', () => {
      const corroborated: Finding = {
        ...finding('bandit', 'high', 'app.py', 10, 'Use of exec detected.'),
        corroboratedBy: ['semgrep'],
      };
      const result = aggregateResult({
        findings: [finding('ruff', 'low', 'app.py', 1, 'unused | import'), corroborated],
        tools: [toolRun('ruff'), toolRun('bandit'), toolRun('pip-audit', 'skipped'), toolRun('pmd', 'error')],
        riskScore: 11,
        policy: { status: 'FAIL', violations: [{ tool: 'ruff', issues: 1, threshold: 0 }], riskLevel: 'low' },
      });

      const comment = renderRiskComment(buildReport(result, 'completed_with_skips'));

      expect(comment).toBe(
        [
          '## GenOps Guardian Risk Review',
          '',
          '**Risk Score:** 11 (low) · **Policy:** FAIL',
          '',
          '### Top Issues',
          '- **high** `app.py:10` Use of exec detected. (bandit, also semgrep)',
          '- **low** `app.py:1` unused \\| import (ruff)',
          '',
          '**Incomplete coverage:** pip-audit (skipped), pmd (error)',
          '- Policy: ruff reported 1 issues (threshold 0)',
          '',
          'Full analysis is available in the run artifacts.',
        ].join('\n')
      );
    });

    it('should keep only five issues', () => {
      const findings = Array.from({ length: 7 }, (_, i) => finding('ruff', 'low', 'a.py', i + 1, `issue ${i + 1}`));

      const comment = renderRiskComment(buildReport(aggregateResult({ findings }), 'completed'));

      expect(comment.split('\n').filter((line) => line.startsWith('- **'))).toHaveLength(5);
      expect(comment).not.toContain('issue 6');
    });

    it('should say None without findings', () => {
      const comment = renderRiskComment(buildReport(aggregateResult(), 'completed'));

      expect(comment.split('\n')[5]).toBe('- None');
    });
  });

  describe('renderReportMarkdown', () => {
    it('should render ecosystems, breakdown, tools and findings', () => {
      const result = aggregateResult({
        findings: [finding('pip-audit', 'high', 'requirements.txt', undefined, 'flask 0.5: PYSEC-2019-179', 'PYSEC-2019-179')],
        tools: [{ ...toolRun('pip-audit', 'success', 1), name: 'pip-audit' }, { ...toolRun('bandit', 'skipped'), errorKind: 'ToolUnavailable', detail: 'bandit not found on PATH' }],
        riskScore: 10,
        breakdown: [{ factor: 'severity:high', points: 10, count: 1, weight: 10 }],
        ecosystems: [{ tag: 'python', evidence: 'requirements.txt' }],
      });

      const markdown = renderReportMarkdown(result, 'completed_with_skips');
      const lines = markdown.split('\n');

      expect(lines[0]).toBe('# GenOps Guardian Report');
      expect(lines).toContain('**Status:** completed_with_skips  ');
      expect(lines).toContain('- python (`requirements.txt`)');
      expect(lines).toContain('| severity:high | 1 | 10 |');
      expect(lines).toContain('| bandit | skipped (ToolUnavailable) | 0 | bandit not found on PATH |');
      expect(lines).toContain('## Findings (1)');
      expect(lines).toContain('| high | requirements.txt | pip-audit | PYSEC-2019-179 | flask 0.5: PYSEC-2019-179 |');
      expect(markdown.endsWith('\n')).toBe(true);
    });

    it('should say when nothing was found', () => {
      const lines = renderReportMarkdown(aggregateResult(), 'completed').split('\n');

      expect(lines).toContain('- None detected');
      expect(lines).toContain('No findings.');
    });
  });
});
