import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ARTIFACTS, FileSink, deliverSafely } from '../../../src/sinks/index.js';
import type { ResultSink, SinkPayload } from '../../../src/sinks/index.js';
import { buildReport } from '../../../src/output/report-builder.js';
import { aggregateResult, finding, toolRun } from '../../helpers/fixtures.js';

function payload(): SinkPayload {
  const result = aggregateResult({
    findings: [finding('ruff', 'low', 'app.py', 1, '`os` imported but unused', 'F401')],
    tools: [toolRun('ruff', 'success', 1)],
    riskScore: 1,
    ecosystems: [{ tag: 'python', evidence: 'pyproject.toml' }],
  });
  return {
    status: 'completed',
    result,
    report: buildReport(result, 'completed'),
    summary: { summary: 'Mostly clean.', detail: 'Remove the unused import.' },
    compacted: [{ tool: 'ruff', status: 'success', exitCode: 1, stdout: '[...]', stderr: '' }],
  };
}

describe('sinks/FileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'genops-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write every artifact and list them in the receipt', async () => {
    const out = join(dir, 'analysis_results');

    const receipt = await new FileSink(out).deliver(payload());

    expect(receipt).toEqual({
      sink: 'file',
      locations: [
        join(out, ARTIFACTS.summary),
        join(out, ARTIFACTS.report),
        join(out, ARTIFACTS.markdown),
        join(out, ARTIFACTS.analyzers),
        join(out, ARTIFACTS.bundle),
      ],
    });
  });

  it('should write the summary text and the persisted report', async () => {
    await new FileSink(dir).deliver(payload());

    expect(await readFile(join(dir, 'universal_agent.txt'), 'utf-8')).toBe('Mostly clean.\n\nRemove the unused import.\n');

    const report = JSON.parse(await readFile(join(dir, 'genops_guardian.json'), 'utf-8'));
    expect(report.status).toBe('completed');
    expect(report.risk_score).toBe(1);
    expect(report.findings[0].rule_id).toBe('F401');
  });

  it('should key analyzer excerpts by tool', async () => {
    await new FileSink(dir).deliver(payload());

    const analyzers = JSON.parse(await readFile(join(dir, 'analyzer_results.json'), 'utf-8'));
    expect(analyzers).toEqual({ ruff: { status: 'success', exit_code: 1, stdout: '[...]', stderr: '' } });

    const bundle = JSON.parse(await readFile(join(dir, 'genops_bundle.json'), 'utf-8'));
    expect(Object.keys(bundle)).toEqual(['summary', 'report', 'analyzer_results']);
    expect(bundle.summary).toEqual({ summary: 'Mostly clean.', detail: 'Remove the unused import.' });
  });
});

describe('sinks/deliverSafely', () => {
  it('should turn a failing sink into a SinkError', async () => {
    const broken: ResultSink = {
      name: 'dashboard',
      deliver: async () => {
        throw new Error('HTTP 503');
      },
    };

    expect(await deliverSafely(broken, payload())).toEqual({
      error: { kind: 'SinkError', collaborator: 'dashboard', message: 'HTTP 503' },
    });
  });
});
