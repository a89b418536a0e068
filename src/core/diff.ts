/**
 * Unified diff helpers for PR mode: changed paths and diff size.
 */

const DIFF_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;
const PLUS_HEADER = /^\+\+\+ (?:b\/)?(.+)$/;

/**
 * Changed file paths in the order the patch lists them.
 * Deleted files (`+++ /dev/null`) keep their old path.
 */
export function parseChangedFiles(patch: string): string[] {
  const files: string[] = [];
  const seen = new Set<string>();

  const add = (file: string) => {
    if (file !== '/dev/null' && !seen.has(file)) {
      seen.add(file);
      files.push(file);
    }
  };

  let sawGitHeaders = false;
  for (const line of patch.split('\n')) {
    const header = line.match(DIFF_HEADER);
    if (header) {
      sawGitHeaders = true;
      add(header[2]);
    }
  }

  // Plain unified diffs without `diff --git` lines
  if (!sawGitHeaders) {
    for (const line of patch.split('\n')) {
      const plus = line.match(PLUS_HEADER);
      if (plus) {
        add(plus[1].split('\t')[0]);
      }
    }
  }

  return files;
}

const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+\d+(?:,(\d+))? @@/;

/**
 * Added plus removed lines inside hunks. Hunk headers give the line counts,
 * so a removed line reading `-- comment` is not mistaken for a file header.
 */
export function countChangedLines(patch: string): number {
  let count = 0;
  let oldLeft = 0;
  let newLeft = 0;

  for (const line of patch.split('\n')) {
    const hunk = line.match(HUNK_HEADER);
    if (hunk) {
      oldLeft = hunk[1] !== undefined ? Number(hunk[1]) : 1;
      newLeft = hunk[2] !== undefined ? Number(hunk[2]) : 1;
      continue;
    }
    if (line.startsWith('diff --git ')) {
      oldLeft = 0;
      newLeft = 0;
      continue;
    }
    if (oldLeft <= 0 && newLeft <= 0) {
      continue;
    }

    if (line.startsWith('-')) {
      count++;
      oldLeft--;
    } else if (line.startsWith('+')) {
      count++;
      newLeft--;
    } else if (!line.startsWith('\\')) {
      oldLeft--;
      newLeft--;
    }
  }
  return count;
}
