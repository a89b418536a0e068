import { execa } from 'execa';
import { parseChangedFiles } from './diff.js';

export interface PullRequestDiff {
  changedFiles: string[];
  patch: string;
}

/**
 * Changed files and patch text between a base ref and HEAD.
 * Uses the merge base (`base...HEAD`), as a pull request diff does.
 */
export async function getPullRequestDiff(cwd: string, base: string): Promise<PullRequestDiff> {
  const range = `${base}...HEAD`;
  const { stdout: patch, exitCode, stderr } = await execa('git', ['diff', '--no-color', range], {
    cwd,
    reject: false,
    stdin: 'ignore',
  });

  if (exitCode !== 0) {
    throw new Error(`git diff ${range} failed: ${stderr.substring(0, 200)}`);
  }

  return { changedFiles: parseChangedFiles(patch), patch };
}
