/**
 * Command Summarizer - pipes the prompt to any CLI that answers on stdout
 *
 * Works with local model runners and agent CLIs alike; the command and its
 * arguments come from config (summarizer.command / summarizer.args).
 */

import { execa } from 'execa';
import { RunMode } from '../types.js';
import { SummaryReplySchema, safeParseJson } from '../core/validation.js';
import { debugLog, truncate } from '../core/utils.js';
import { buildSummaryPrompt } from './prompt.js';
import { Summarizer, Summary, SummaryPayload } from './types.js';

const DEFAULT_TIMEOUT = 300000; // 5 minutes
const FALLBACK_SUMMARY_LINES = 8;

export interface CommandSummarizerOptions {
  command: string;
  args?: string[];
  cwd?: string;
  timeoutMs?: number;
}

/**
 * JSON `{summary, detail}` when the reply is JSON (optionally fenced);
 * otherwise the first lines are the summary and the whole reply the detail.
 */
export function parseSummaryReply(output: string): Summary {
  const text = output.trim();
  const unfenced = text.replace(/^```(?:json)?\s*\n([\s\S]*?)\n```$/, '$1');
  const reply = safeParseJson(unfenced, SummaryReplySchema);
  if (reply.success) {
    return { summary: reply.data.summary, detail: reply.data.detail ?? reply.data.summary };
  }
  return {
    summary: text.split(/\r?\n/).slice(0, FALLBACK_SUMMARY_LINES).join('\n'),
    detail: text,
  };
}

export class CommandSummarizer implements Summarizer {
  name: string;
  private options: CommandSummarizerOptions;

  constructor(options: CommandSummarizerOptions) {
    this.options = options;
    this.name = options.command;
  }

  async summarize(payload: SummaryPayload, mode: RunMode): Promise<Summary> {
    const prompt = buildSummaryPrompt(payload, mode);
    debugLog('Summarizer prompt length:', prompt.length);

    const { stdout, stderr, exitCode, timedOut } = await execa(this.options.command, this.options.args ?? [], {
      cwd: this.options.cwd,
      input: prompt,
      timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT,
      env: {
        ...process.env,
        NO_COLOR: '1',
      },
      reject: false,
    });

    if (timedOut) {
      throw new Error(`${this.name} timed out`);
    }
    if (exitCode !== 0) {
      const reason = stderr ? `: ${truncate(stderr.trim(), 200)}` : '';
      throw new Error(`${this.name} exited with code ${exitCode ?? 'unknown'}${reason}`);
    }
    if (!stdout || !stdout.trim()) {
      throw new Error(`${this.name} returned an empty reply`);
    }

    return parseSummaryReply(stdout);
  }
}
