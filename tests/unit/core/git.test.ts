import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { getPullRequestDiff } from '../../../src/core/git.js';

const PATCH = [
  'diff --git a/app.py b/app.py',
  '--- a/app.py',
  '+++ b/app.py',
  '@@ -1 +1 @@',
  '-import os',
  '+import sys',
].join('\n');

describe('core/git', () => {
  beforeEach(() => {
    vi.mocked(execa).mockReset();
  });

  it('should diff against the merge base and list changed files', async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: 0, stdout: PATCH, stderr: '' } as any);

    const diff = await getPullRequestDiff('/repo', 'origin/main');

    expect(diff).toEqual({ changedFiles: ['app.py'], patch: PATCH });
    expect(execa).toHaveBeenCalledWith(
      'git',
      ['diff', '--no-color', 'origin/main...HEAD'],
      expect.objectContaining({ cwd: '/repo', reject: false, stdin: 'ignore' })
    );
  });

  it('should return an empty diff when nothing changed', async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' } as any);

    expect(await getPullRequestDiff('/repo', 'main')).toEqual({ changedFiles: [], patch: '' });
  });

  it('should fail with git stderr on a nonzero exit', async () => {
    vi.mocked(execa).mockResolvedValue({
      exitCode: 128,
      stdout: '',
      stderr: "fatal: ambiguous argument 'nope...HEAD': unknown revision",
    } as any);

    await expect(getPullRequestDiff('/repo', 'nope')).rejects.toThrow(
      "git diff nope...HEAD failed: fatal: ambiguous argument 'nope...HEAD': unknown revision"
    );
  });
});
