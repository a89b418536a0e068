/**
 * Schema-less JSON walker for tools without a dedicated parser
 * (PMD, PHP_CodeSniffer, Psalm, Hadolint, actionlint).
 *
 * Anything with a message and a file (its own, or inherited from an
 * enclosing group) is a finding. Only known container keys are descended,
 * so metadata such as PMD's processingErrors is not reported.
 */

import { Finding } from '../types.js';
import { errorMessage } from '../core/utils.js';
import { lookupSeverity, mapSeverity } from './severity.js';
import { ParseContext, ParseResult, makeFinding } from './types.js';

const CONTAINER_KEYS = ['violations', 'results', 'findings', 'issues', 'messages', 'diagnostics', 'errors', 'warnings', 'files'];
const FILE_KEYS = ['file', 'filename', 'filePath', 'file_path', 'filepath', 'file_name', 'path'];
const MESSAGE_KEYS = ['message', 'description', 'msg', 'text', 'title'];
const LINE_KEYS = ['line', 'beginline', 'line_from', 'start_line', 'startLine', 'row', 'lineNumber'];
const COLUMN_KEYS = ['column', 'begincolumn', 'column_from', 'start_column', 'startColumn', 'col'];
const RULE_KEYS = ['ruleId', 'rule_id', 'rule', 'code', 'check_id', 'source', 'type', 'kind'];
const LEVEL_KEYS = ['level', 'severity', 'type', 'priority'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(node: JsonObject, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return undefined;
}

function pickNumber(node: JsonObject, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * First level key the tool's table knows wins; a level nobody maps is info;
 * no level at all takes the tool default.
 */
function readSeverity(node: JsonObject, tool: string) {
  let sawLevel = false;
  for (const key of LEVEL_KEYS) {
    const value = node[key];
    if (typeof value !== 'string' && typeof value !== 'number') {
      continue;
    }
    sawLevel = true;
    const mapped = lookupSeverity(tool, value);
    if (mapped) {
      return mapped;
    }
  }
  return sawLevel ? 'info' : mapSeverity(tool, undefined);
}

function walk(node: unknown, inheritedFile: string | undefined, tool: string, out: Finding[]): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      walk(item, inheritedFile, tool, out);
    }
    return;
  }
  if (!isObject(node)) {
    return;
  }

  const file = pickString(node, FILE_KEYS) ?? inheritedFile;
  const message = pickString(node, MESSAGE_KEYS);

  if (message !== undefined && file !== undefined) {
    out.push(
      makeFinding({
        tool,
        severity: readSeverity(node, tool),
        file,
        line: pickNumber(node, LINE_KEYS),
        column: pickNumber(node, COLUMN_KEYS),
        message,
        ruleId: pickString(node, RULE_KEYS),
      })
    );
    return;
  }

  for (const key of CONTAINER_KEYS) {
    const child = node[key];
    if (Array.isArray(child)) {
      walk(child, file, tool, out);
    } else if (isObject(child)) {
      // Keyed by path, e.g. phpcs { files: { "src/a.php": { messages } } }
      for (const [path, group] of Object.entries(child)) {
        walk(group, path, tool, out);
      }
    }
  }
}

export function parseGenericJson(output: string, { tool }: ParseContext): ParseResult {
  if (output.trim() === '') {
    return { ok: true, findings: [] };
  }

  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const findings: Finding[] = [];
  walk(data, undefined, tool, findings);
  return { ok: true, findings };
}
