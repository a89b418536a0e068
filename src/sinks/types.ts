import { AggregateResult, RunStatus } from '../types.js';
import { CompactedResult } from '../output/compact.js';
import { Report } from '../output/report-builder.js';
import { Summary } from '../summarizers/types.js';

export interface SinkPayload {
  status: RunStatus;
  result: AggregateResult;
  report: Report;
  summary: Summary;
  compacted: CompactedResult[];
}

export interface SinkReceipt {
  sink: string;
  /** Files written, comment URLs, ... */
  locations: string[];
}

/**
 * Delivers a finished run somewhere (disk, a PR, a dashboard)
 */
export interface ResultSink {
  name: string;
  deliver(payload: SinkPayload): Promise<SinkReceipt>;
}
