/**
 * Aggregator - cross-tool deduplication and stable ordering
 *
 * Two findings from different tools are the same issue when they sit in the
 * same file, within a few lines of each other, and say roughly the same thing. The strongest
 * report survives and records which other tools agreed with it.
 */

import { Finding, SEVERITY_RANK } from '../types.js';

export interface DedupeOptions {
  lineTolerance: number;
  /** Minimum token Jaccard similarity of the messages, 0..1 */
  similarityThreshold: number;
}

export const DEFAULT_DEDUPE_OPTIONS: DedupeOptions = {
  lineTolerance: 2,
  similarityThreshold: 0.6,
};

function tokenize(message: string): Set<string> {
  return new Set(message.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 1));
}

/**
 * Token Jaccard similarity; identical empty messages count as equal
 */
export function messageSimilarity(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 && right.size === 0) {
    return a.trim() === b.trim() ? 1 : 0;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared++;
    }
  }
  return shared / (left.size + right.size - shared);
}

function isDuplicate(a: Finding, b: Finding, options: DedupeOptions): boolean {
  if (a.raw || b.raw || a.file !== b.file) {
    return false;
  }
  // One tool reporting twice is only a duplicate when it repeats itself exactly
  if (a.tool === b.tool) {
    return a.ruleId === b.ruleId && a.line === b.line && a.message === b.message;
  }
  if (a.line !== undefined && b.line !== undefined) {
    if (Math.abs(a.line - b.line) > options.lineTolerance) {
      return false;
    }
  } else if (a.line !== b.line) {
    return false;
  }
  return messageSimilarity(a.message, b.message) >= options.similarityThreshold;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Strongest first; ties broken by position, tool and message so the
 * representative of a duplicate group never depends on input order.
 */
function byStrength(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareText(a.file, b.file) ||
    (a.line ?? 0) - (b.line ?? 0) ||
    compareText(a.tool, b.tool) ||
    compareText(a.message, b.message)
  );
}

/**
 * Report order: file, line, severity (highest first), tool
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      compareText(a.file, b.file) ||
      (a.line ?? 0) - (b.line ?? 0) ||
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      compareText(a.tool, b.tool) ||
      compareText(a.message, b.message)
  );
}

/**
 * Merge duplicates across tools. Applying it to its own output changes
 * nothing.
 */
export function deduplicateFindings(
  findings: readonly Finding[],
  options: DedupeOptions = DEFAULT_DEDUPE_OPTIONS
): Finding[] {
  const kept: Finding[] = [];

  for (const finding of [...findings].sort(byStrength)) {
    const index = kept.findIndex((representative) => isDuplicate(representative, finding, options));
    if (index === -1) {
      kept.push(finding);
      continue;
    }

    const representative = kept[index];
    const others = [finding.tool, ...finding.corroboratedBy].filter((tool) => tool !== representative.tool);
    const corroboratedBy = [...new Set([...representative.corroboratedBy, ...others])].sort();
    kept[index] = { ...representative, corroboratedBy };
  }

  return sortFindings(kept);
}
