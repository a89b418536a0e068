/**
 * Validation utilities for safe JSON parsing with Zod schemas,
 * plus the output schemas of the analyzers we normalize.
 */

import { z, ZodError, ZodType, ZodTypeDef } from 'zod';
import { errorMessage } from './utils.js';

/**
 * Safe JSON parse with Zod validation
 */
export function safeParseJson<T>(
  json: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): { success: true; data: T } | { success: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { success: false, error: errorMessage(error) || 'Invalid JSON' };
  }
  const result = schema.safeParse(parsed);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error for logging
 */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    .join(', ');
}

// ─────────────────────────────────────────────────────────────
// Analyzer output schemas (only the fields we read)
// ─────────────────────────────────────────────────────────────

/**
 * SARIF 2.1.0, reduced to results and their primary location
 */
export const SarifLogSchema = z.object({
  version: z.string(),
  runs: z.array(z.object({
    tool: z.object({
      driver: z.object({
        name: z.string(),
      }),
    }),
    results: z.array(z.object({
      ruleId: z.string().optional(),
      level: z.enum(['none', 'note', 'warning', 'error']).optional(),
      message: z.object({
        text: z.string().optional(),
        markdown: z.string().optional(),
      }),
      locations: z.array(z.object({
        physicalLocation: z.object({
          artifactLocation: z.object({
            uri: z.string(),
          }).optional(),
          region: z.object({
            startLine: z.number().optional(),
            startColumn: z.number().optional(),
          }).optional(),
        }).optional(),
      })).optional(),
    })).optional().default([]),
  })),
});
export type SarifLog = z.infer<typeof SarifLogSchema>;

/**
 * ESLint `-f json` output
 */
export const ESLintOutputSchema = z.array(z.object({
  filePath: z.string(),
  messages: z.array(z.object({
    ruleId: z.string().nullable().optional(),
    severity: z.number(),
    message: z.string(),
    line: z.number().optional(),
    column: z.number().optional(),
    fatal: z.boolean().optional(),
  })),
}));
export type ESLintOutput = z.infer<typeof ESLintOutputSchema>;

/**
 * Ruff `--output-format json` output
 */
export const RuffOutputSchema = z.array(z.object({
  code: z.string().nullable(),
  message: z.string(),
  filename: z.string(),
  location: z.object({
    row: z.number(),
    column: z.number(),
  }).nullable().optional(),
}));
export type RuffOutput = z.infer<typeof RuffOutputSchema>;

/**
 * Bandit `-f json` output
 */
export const BanditOutputSchema = z.object({
  results: z.array(z.object({
    filename: z.string(),
    issue_severity: z.string(),
    issue_text: z.string(),
    line_number: z.number().optional(),
    col_offset: z.number().optional(),
    test_id: z.string().optional(),
  })),
});
export type BanditOutput = z.infer<typeof BanditOutputSchema>;

/**
 * Semgrep `--json` output
 */
export const SemgrepOutputSchema = z.object({
  results: z.array(z.object({
    check_id: z.string(),
    path: z.string(),
    start: z.object({
      line: z.number(),
      col: z.number().optional(),
    }),
    extra: z.object({
      message: z.string(),
      severity: z.string().optional(),
    }),
  })),
});
export type SemgrepOutput = z.infer<typeof SemgrepOutputSchema>;

const PipAuditDependency = z.object({
  name: z.string(),
  version: z.string().optional(),
  vulns: z.array(z.object({
    id: z.string(),
    fix_versions: z.array(z.string()).optional().default([]),
    description: z.string().optional(),
  })).optional().default([]),
});

/**
 * pip-audit `-f json` output; older releases emit the bare dependency list
 */
export const PipAuditOutputSchema = z.union([
  z.object({ dependencies: z.array(PipAuditDependency) }),
  z.array(PipAuditDependency),
]);
export type PipAuditOutput = z.infer<typeof PipAuditOutputSchema>;

/**
 * npm audit `--json` output (npm 7+)
 */
export const NpmAuditOutputSchema = z.object({
  vulnerabilities: z.record(z.string(), z.object({
    name: z.string(),
    severity: z.string(),
    range: z.string().optional(),
    via: z.array(z.union([
      z.string(),
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
        severity: z.string().optional(),
      }),
    ])).default([]),
  })),
});
export type NpmAuditOutput = z.infer<typeof NpmAuditOutputSchema>;

/**
 * Trivy `--format json` output (config and fs scans)
 */
export const TrivyOutputSchema = z.object({
  Results: z.array(z.object({
    Target: z.string(),
    Misconfigurations: z.array(z.object({
      ID: z.string(),
      Title: z.string().optional(),
      Message: z.string().optional(),
      Severity: z.string(),
      CauseMetadata: z.object({
        StartLine: z.number().optional(),
      }).optional(),
    })).nullable().optional(),
    Vulnerabilities: z.array(z.object({
      VulnerabilityID: z.string(),
      PkgName: z.string(),
      InstalledVersion: z.string().optional(),
      Severity: z.string(),
      Title: z.string().optional(),
    })).nullable().optional(),
  })).nullable().optional(),
});
export type TrivyOutput = z.infer<typeof TrivyOutputSchema>;

const CheckovReport = z.object({
  check_type: z.string().optional(),
  results: z.object({
    failed_checks: z.array(z.object({
      check_id: z.string(),
      check_name: z.string(),
      file_path: z.string(),
      file_line_range: z.array(z.number()).optional(),
      severity: z.string().nullable().optional(),
    })).default([]),
  }),
});

/**
 * Checkov `-o json` output: one report, or one per framework
 */
export const CheckovOutputSchema = z.union([CheckovReport, z.array(CheckovReport)]);
export type CheckovOutput = z.infer<typeof CheckovOutputSchema>;

/**
 * RuboCop `-f json` output
 */
export const RuboCopOutputSchema = z.object({
  files: z.array(z.object({
    path: z.string(),
    offenses: z.array(z.object({
      severity: z.string(),
      message: z.string(),
      cop_name: z.string(),
      location: z.object({
        start_line: z.number().optional(),
        line: z.number().optional(),
        start_column: z.number().optional(),
        column: z.number().optional(),
      }),
    })),
  })),
});
export type RuboCopOutput = z.infer<typeof RuboCopOutputSchema>;

/**
 * Summarizer reply, when the command answers with JSON
 */
export const SummaryReplySchema = z.object({
  summary: z.string(),
  detail: z.string().optional(),
});
export type SummaryReply = z.infer<typeof SummaryReplySchema>;
