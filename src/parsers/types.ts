import { Finding, Severity } from '../types.js';
import { generateFindingId } from '../core/utils.js';

export interface ParseContext {
  /** Tool id; selects the severity table */
  tool: string;
  /** Manifest the tool audited, for dependency findings without a path */
  manifest?: string;
}

export type ParseResult =
  | { ok: true; findings: Finding[] }
  | { ok: false; error: string };

export type Parser = (output: string, context: ParseContext) => ParseResult;

export interface FindingInput {
  tool: string;
  severity: Severity;
  file: string;
  line?: number;
  column?: number;
  message: string;
  ruleId?: string;
}

/**
 * Normalize a tool-reported path: no file:// scheme, no leading ./
 */
export function cleanPath(path: string): string {
  return path.replace(/^file:\/\//, '').replace(/^\.\//, '');
}

export function makeFinding(input: FindingInput): Finding {
  const file = cleanPath(input.file);
  const message = input.message.trim();
  return {
    id: generateFindingId(input.tool, file, input.line, input.ruleId, message),
    tool: input.tool,
    severity: input.severity,
    file,
    ...(input.line !== undefined ? { line: input.line } : {}),
    ...(input.column !== undefined ? { column: input.column } : {}),
    message,
    ...(input.ruleId ? { ruleId: input.ruleId } : {}),
    raw: false,
    confidence: 'high',
    corroboratedBy: [],
  };
}
