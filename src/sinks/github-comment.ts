/**
 * GitHub Comment Sink - posts the health review and the risk review on a PR
 *
 * Uses the `gh` CLI, which picks up GH_TOKEN / GITHUB_TOKEN on its own.
 */

import { execa } from 'execa';
import { renderHealthComment, renderRiskComment } from '../output/markdown.js';
import { truncate } from '../core/utils.js';
import { ResultSink, SinkPayload, SinkReceipt } from './types.js';

export interface GitHubCommentSinkOptions {
  prNumber: number;
  /** owner/name; defaults to the repository gh resolves from cwd */
  repo?: string;
  cwd?: string;
}

export class GitHubCommentSink implements ResultSink {
  name = 'github-comment';
  private options: GitHubCommentSinkOptions;

  constructor(options: GitHubCommentSinkOptions) {
    this.options = options;
  }

  private async postComment(body: string): Promise<string> {
    const args = ['pr', 'comment', String(this.options.prNumber), '--body-file', '-'];
    if (this.options.repo) {
      args.push('--repo', this.options.repo);
    }

    const { stdout, stderr, exitCode } = await execa('gh', args, {
      cwd: this.options.cwd,
      input: body,
      env: {
        ...process.env,
        NO_COLOR: '1',
      },
      reject: false,
    });

    if (exitCode !== 0) {
      throw new Error(`gh pr comment failed (exit ${exitCode ?? 'unknown'}): ${truncate((stderr || stdout).trim(), 200)}`);
    }
    // gh prints the comment URL
    return stdout.trim();
  }

  async deliver(payload: SinkPayload): Promise<SinkReceipt> {
    const health = await this.postComment(renderHealthComment(payload.summary.summary, payload.summary.detail));
    const risk = await this.postComment(renderRiskComment(payload.report));
    return { sink: this.name, locations: [health, risk] };
  }
}
