import { RunMode } from '../types.js';
import { CompactedResult } from '../output/compact.js';
import { Report } from '../output/report-builder.js';

export interface SummaryPayload {
  report: Report;
  compacted: CompactedResult[];
}

export interface Summary {
  summary: string;
  detail: string;
}

/**
 * Turns a structured report into prose. Implementations may call out to a
 * language model; the pipeline never depends on one being present.
 */
export interface Summarizer {
  name: string;
  summarize(payload: SummaryPayload, mode: RunMode): Promise<Summary>;
}
