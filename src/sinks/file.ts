/**
 * File Sink - run artifacts on disk
 *
 * analysis_results/
 *   universal_agent.txt     summarizer output
 *   genops_guardian.json    persisted report
 *   genops_guardian.md      persisted report as markdown
 *   analyzer_results.json   per-tool output excerpts
 *   genops_bundle.json      all of the above in one document
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { CompactedResult } from '../output/compact.js';
import { renderReportMarkdown } from '../output/markdown.js';
import { toPersistedReport } from '../output/persisted.js';
import { ResultSink, SinkPayload, SinkReceipt } from './types.js';

export const ARTIFACTS = {
  summary: 'universal_agent.txt',
  report: 'genops_guardian.json',
  markdown: 'genops_guardian.md',
  analyzers: 'analyzer_results.json',
  bundle: 'genops_bundle.json',
} as const;

function analyzerResults(compacted: readonly CompactedResult[]) {
  return Object.fromEntries(
    compacted.map((result) => [
      result.tool,
      { status: result.status, exit_code: result.exitCode, stdout: result.stdout, stderr: result.stderr },
    ])
  );
}

export class FileSink implements ResultSink {
  name = 'file';
  private dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async deliver(payload: SinkPayload): Promise<SinkReceipt> {
    await mkdir(this.dir, { recursive: true });

    const persisted = toPersistedReport(payload.result, payload.status);
    const analyzers = analyzerResults(payload.compacted);
    const files: Array<[string, string]> = [
      [ARTIFACTS.summary, `${payload.summary.summary}\n\n${payload.summary.detail}\n`],
      [ARTIFACTS.report, JSON.stringify(persisted, null, 2)],
      [ARTIFACTS.markdown, renderReportMarkdown(payload.result, payload.status)],
      [ARTIFACTS.analyzers, JSON.stringify(analyzers, null, 2)],
      [
        ARTIFACTS.bundle,
        JSON.stringify({ summary: payload.summary, report: persisted, analyzer_results: analyzers }, null, 2),
      ],
    ];

    const locations: string[] = [];
    for (const [name, content] of files) {
      const path = join(this.dir, name);
      await writeFile(path, content, 'utf-8');
      locations.push(path);
    }

    return { sink: this.name, locations };
  }
}
