import { Finding } from '../types.js';
import { mapSeverity } from './severity.js';
import { ParseContext, ParseResult, makeFinding } from './types.js';

// [WARN] src/Main.java:12:5: Missing a Javadoc comment. [MissingJavadocMethod]
const CHECKSTYLE_LINE = /^\[(WARN|WARNING|ERROR|INFO)\]\s+(.+?):(\d+)(?::(\d+))?:\s*(.+?)(?:\s+\[(\w+)\])?$/;

// Program.cs(10,17): warning CS0168: The variable 'e' is declared but never used [/src/app.csproj]
const MSBUILD_LINE = /^(.+?)\((\d+),(\d+)\):\s+(error|warning)\s+([A-Za-z]+\d+):\s*(.+?)(?:\s+\[[^\]]+\])?$/;

// main.go:3:2: should not use dot imports (ST1001)
const COMPILER_LINE = /^([^\s:][^\s]*?):(\d+)(?::(\d+))?:\s*(.+)$/;
const TRAILING_RULE = /\s+\(([A-Z]+\d+)\)$/;

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

function parseLine(line: string, tool: string): Finding | undefined {
  const checkstyle = CHECKSTYLE_LINE.exec(line);
  if (checkstyle) {
    const [, level, file, lineNo, column, message, rule] = checkstyle;
    return makeFinding({
      tool,
      severity: mapSeverity(tool, level),
      file,
      line: optionalInt(lineNo),
      column: optionalInt(column),
      message,
      ruleId: rule,
    });
  }

  const msbuild = MSBUILD_LINE.exec(line);
  if (msbuild) {
    const [, file, lineNo, column, level, code, message] = msbuild;
    return makeFinding({
      tool,
      severity: mapSeverity(tool, level),
      file,
      line: optionalInt(lineNo),
      column: optionalInt(column),
      message,
      ruleId: code,
    });
  }

  const compiler = COMPILER_LINE.exec(line);
  if (compiler) {
    const [, file, lineNo, column, text] = compiler;
    const rule = TRAILING_RULE.exec(text);
    return makeFinding({
      tool,
      severity: mapSeverity(tool, undefined),
      file,
      line: optionalInt(lineNo),
      column: optionalInt(column),
      message: rule ? text.slice(0, rule.index) : text,
      ruleId: rule?.[1],
    });
  }

  return undefined;
}

/**
 * Line-oriented diagnostics (checkstyle, go vet, staticcheck, MSBuild).
 * Output with text but no recognizable diagnostic line is a parse error.
 */
export function parseLines(output: string, { tool }: ParseContext): ParseResult {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  if (lines.length === 0) {
    return { ok: true, findings: [] };
  }

  const seen = new Set<string>();
  const findings: Finding[] = [];
  for (const line of lines) {
    const finding = parseLine(line, tool);
    // MSBuild repeats every diagnostic in its summary
    if (finding && !seen.has(finding.id)) {
      seen.add(finding.id);
      findings.push(finding);
    }
  }

  // Checkstyle brackets its report with "Starting audit..." / "Audit done."
  const chatter = lines.every((line) => /^(Starting audit|Audit done|#\s)/.test(line));
  if (findings.length === 0 && !chatter) {
    return { ok: false, error: `no diagnostic lines in ${lines.length} line(s) of output` };
  }
  return { ok: true, findings };
}
