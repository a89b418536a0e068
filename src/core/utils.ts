import { createHash } from 'crypto';

/**
 * Print a debug line when GENOPS_DEBUG is set.
 * Core modules never log otherwise; the CLI owns user-facing output.
 */
export function debugLog(...parts: unknown[]): void {
  if (process.env.GENOPS_DEBUG) {
    console.error('[DEBUG]', ...parts);
  }
}

/**
 * Stable finding id derived from its identifying fields
 */
export function generateFindingId(
  tool: string,
  file: string,
  line: number | undefined,
  ruleId: string | undefined,
  message: string
): string {
  const hash = createHash('sha1')
    .update([tool, file, line ?? '', ruleId ?? '', message].join('\u0000'))
    .digest('hex');
  return `GG-${hash.slice(0, 12)}`;
}

/**
 * Truncate text to a character budget, marking the cut
 */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.substring(0, limit)}…`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
