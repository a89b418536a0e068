import {
  AggregateResult,
  AnalyzerSpec,
  Finding,
  Invocation,
  Severity,
  ToolRun,
} from '../../src/types.js';
import { listRegisteredTools } from '../../src/core/registry.js';
import { makeFinding } from '../../src/parsers/types.js';

export function specById(id: string): AnalyzerSpec {
  const spec = listRegisteredTools().find((candidate) => candidate.id === id);
  if (!spec) {
    throw new Error(`no registered tool ${id}`);
  }
  return spec;
}

export function invocationFor(spec: AnalyzerSpec, overrides: Partial<Invocation> = {}): Invocation {
  return {
    id: spec.id,
    spec,
    cwd: '/repo',
    args: [...spec.args],
    files: [],
    timeoutMs: 1000,
    ...overrides,
  };
}

export function finding(
  tool: string,
  severity: Severity,
  file: string,
  line: number | undefined,
  message: string,
  ruleId?: string
): Finding {
  return makeFinding({ tool, severity, file, line, message, ruleId });
}

export function toolRun(tool: string, status: ToolRun['status'] = 'success', findingCount = 0): ToolRun {
  return { tool, name: tool, ecosystem: 'python', status, durationMs: 5, findingCount };
}

export function aggregateResult(overrides: Partial<AggregateResult> = {}): AggregateResult {
  return {
    findings: [],
    tools: [],
    riskScore: 0,
    riskLevel: 'low',
    breakdown: [],
    policy: { status: 'PASS', violations: [], riskLevel: 'low' },
    ecosystems: [],
    mode: 'manual',
    generatedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 1200,
    ...overrides,
  };
}
