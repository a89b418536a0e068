import { RunMode } from '../types.js';
import { CollaboratorError } from '../core/errors.js';
import { errorMessage } from '../core/utils.js';
import { Report } from '../output/report-builder.js';
import { Summarizer, Summary, SummaryPayload } from './types.js';

export { CommandSummarizer, parseSummaryReply } from './command.js';
export type { CommandSummarizerOptions } from './command.js';
export { buildSummaryPrompt } from './prompt.js';
export type { Summarizer, Summary, SummaryPayload } from './types.js';

/**
 * Deterministic summary built from the report alone
 */
export function placeholderSummary(report: Report, reason?: string): Summary {
  const { summary } = report;
  const counts = (['critical', 'high', 'medium', 'low', 'info'] as const)
    .filter((severity) => summary.severityCounts[severity] > 0)
    .map((severity) => `${summary.severityCounts[severity]} ${severity}`);
  const text = [
    `Risk score ${summary.riskScore}/100 (${summary.riskLevel}).`,
    summary.findingCount > 0 ? `${summary.findingCount} findings: ${counts.join(', ')}.` : 'No findings.',
  ].join(' ');
  return {
    summary: text,
    detail: reason ? `Automated summary unavailable: ${reason}` : text,
  };
}

/**
 * Run the summarizer once. Any failure yields the placeholder summary and a
 * SummarizerUnavailable record instead of an exception.
 */
export async function summarizeSafely(
  summarizer: Summarizer | undefined,
  payload: SummaryPayload,
  mode: RunMode
): Promise<{ summary: Summary; error?: CollaboratorError }> {
  if (!summarizer) {
    return { summary: placeholderSummary(payload.report) };
  }
  try {
    return { summary: await summarizer.summarize(payload, mode) };
  } catch (error) {
    const message = errorMessage(error);
    return {
      summary: placeholderSummary(payload.report, message),
      error: { kind: 'SummarizerUnavailable', collaborator: summarizer.name, message },
    };
  }
}
