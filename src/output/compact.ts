import type { InvocationResult } from '../core/runner.js';
import { ToolRun, ToolStatus } from '../types.js';
import { truncate } from '../core/utils.js';

export const COMPACT_LIMIT = 1500;

/**
 * Per-tool excerpt of what an analyzer printed, for prompts and for
 * analyzer_results.json
 */
export interface CompactedResult {
  tool: string;
  status: ToolStatus;
  exitCode?: number;
  stdout: string;
  stderr: string;
}

export function compactResults(
  results: readonly InvocationResult[],
  runs: readonly ToolRun[],
  limit = COMPACT_LIMIT
): CompactedResult[] {
  const statusOf = new Map(runs.map((run) => [run.tool, run.status]));
  return results.map((result) => ({
    tool: result.invocation.spec.id,
    status: statusOf.get(result.invocation.spec.id) ?? 'skipped',
    exitCode: result.exitCode,
    stdout: truncate(result.stdout, limit),
    stderr: truncate(result.stderr, limit),
  }));
}
