import { SarifLogSchema, safeParseJson } from '../core/validation.js';
import { Finding } from '../types.js';
import { mapSeverity } from './severity.js';
import { ParseContext, ParseResult, makeFinding } from './types.js';

/**
 * SARIF 2.1.0 (gosec, tfsec, kube-linter). One finding per result, located
 * at its first physical location.
 */
export function parseSarif(output: string, { tool }: ParseContext): ParseResult {
  if (output.trim() === '') {
    return { ok: true, findings: [] };
  }

  const parsed = safeParseJson(output, SarifLogSchema);
  if (!parsed.success) {
    return { ok: false, error: parsed.error };
  }

  const findings: Finding[] = [];
  for (const run of parsed.data.runs) {
    for (const result of run.results) {
      const location = result.locations?.[0]?.physicalLocation;
      findings.push(
        makeFinding({
          tool,
          severity: mapSeverity(tool, result.level),
          file: location?.artifactLocation?.uri ?? '',
          line: location?.region?.startLine,
          column: location?.region?.startColumn,
          message: result.message.text ?? result.message.markdown ?? result.ruleId ?? '',
          ruleId: result.ruleId,
        })
      );
    }
  }
  return { ok: true, findings };
}
