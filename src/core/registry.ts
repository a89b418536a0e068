/**
 * Tool Registry - ecosystem tag → ordered analyzer specs
 *
 * Explicit table, no runtime discovery. Adding a tool means adding an entry
 * here and, when its output is new, a parser for its format.
 */

import { AnalyzerSpec, DetectedEcosystem, EcosystemTag, OutputFormat } from '../types.js';

const DEFAULT_SUCCESS_CODES = [0, 1] as const;

function tool(
  id: string,
  name: string,
  ecosystem: EcosystemTag | 'multi',
  command: string,
  args: string[],
  format: OutputFormat,
  extra: Partial<Pick<AnalyzerSpec, 'timeoutMs' | 'successExitCodes' | 'manifestArgs'>> = {}
): AnalyzerSpec {
  return Object.freeze({
    id,
    name,
    ecosystem,
    command,
    args: Object.freeze([...args]),
    format,
    successExitCodes: Object.freeze([...(extra.successExitCodes ?? DEFAULT_SUCCESS_CODES)]),
    ...(extra.timeoutMs !== undefined ? { timeoutMs: extra.timeoutMs } : {}),
    ...(extra.manifestArgs !== undefined ? { manifestArgs: extra.manifestArgs } : {}),
  });
}

const REQUIREMENTS_FILE = /(^|\/)requirements[^/]*\.txt$/;

export const TOOL_REGISTRY: Readonly<Record<EcosystemTag, readonly AnalyzerSpec[]>> = Object.freeze({
  python: [
    tool('ruff', 'Ruff', 'python', 'ruff', ['check', '--no-cache', '--output-format', 'json', '.'], 'ruff-json'),
    tool('bandit', 'Bandit', 'python', 'bandit', ['-r', '.', '-f', 'json', '-q'], 'bandit-json'),
    // -r only reads requirements files; other manifests are audited as a project
    tool('pip-audit', 'pip-audit', 'python', 'pip-audit', ['-f', 'json', '--progress-spinner', 'off'], 'pip-audit-json', {
      manifestArgs: { pattern: REQUIREMENTS_FILE, matched: ['-r', '{manifest}'], otherwise: ['.'] },
    }),
  ],
  javascript: [
    tool('eslint', 'ESLint', 'javascript', 'npx', ['--no-install', 'eslint', '.', '-f', 'json'], 'eslint-json'),
    tool('npm-audit', 'npm audit', 'javascript', 'npm', ['audit', '--json'], 'npm-audit-json'),
  ],
  java: [
    tool('pmd', 'PMD', 'java', 'pmd', ['check', '-d', 'src', '-R', 'rulesets/java/quickstart.xml', '-f', 'json'], 'generic-json', { successExitCodes: [0, 4] }),
    tool('checkstyle', 'Checkstyle', 'java', 'checkstyle', ['-c', '/google_checks.xml', 'src'], 'line'),
  ],
  go: [
    tool('govet', 'go vet', 'go', 'go', ['vet', './...'], 'line', { successExitCodes: [0, 1] }),
    tool('staticcheck', 'Staticcheck', 'go', 'staticcheck', ['./...'], 'line'),
    tool('gosec', 'gosec', 'go', 'gosec', ['-fmt', 'sarif', '-quiet', './...'], 'sarif'),
  ],
  ruby: [
    tool('rubocop', 'RuboCop', 'ruby', 'rubocop', ['-f', 'json'], 'rubocop-json'),
  ],
  php: [
    tool('phpcs', 'PHP_CodeSniffer', 'php', 'phpcs', ['--report=json', '.'], 'generic-json', { successExitCodes: [0, 1, 2] }),
    tool('psalm', 'Psalm', 'php', 'psalm', ['--output-format=json', '--no-progress'], 'generic-json', { successExitCodes: [0, 2] }),
  ],
  dotnet: [
    tool(
      'dotnet-build',
      'Roslyn analyzers',
      'dotnet',
      'dotnet',
      [
        'build',
        '-nologo',
        '-clp:NoSummary',
        '-o',
        '{tmp}/out',
        '-p:BaseIntermediateOutputPath={tmp}/obj/',
        '-p:MSBuildProjectExtensionsPath={tmp}/obj/',
      ],
      'line',
      { timeoutMs: 600000 }
    ),
  ],
  docker: [
    tool('hadolint', 'Hadolint', 'docker', 'hadolint', ['-f', 'json', '{manifest}'], 'generic-json'),
    tool('trivy', 'Trivy', 'docker', 'trivy', ['config', '--format', 'json', '--quiet', '{root}'], 'trivy-json'),
  ],
  terraform: [
    tool('checkov', 'Checkov', 'terraform', 'checkov', ['-d', '{root}', '-o', 'json', '--quiet', '--framework', 'terraform'], 'checkov-json'),
    tool('tfsec', 'tfsec', 'terraform', 'tfsec', ['--format', 'sarif', '--no-colour', '{root}'], 'sarif'),
  ],
  kubernetes: [
    tool('kube-linter', 'kube-linter', 'kubernetes', 'kube-linter', ['lint', '{root}', '--format', 'sarif'], 'sarif'),
  ],
  'github-actions': [
    tool('actionlint', 'actionlint', 'github-actions', 'actionlint', ['-format', '{{json .}}'], 'generic-json'),
  ],
});

export const SEMGREP_SPEC: AnalyzerSpec = tool(
  'semgrep',
  'Semgrep',
  'multi',
  'semgrep',
  ['scan', '--config', 'auto', '--json', '--quiet', '--metrics', 'off'],
  'semgrep-json',
  { timeoutMs: 600000 }
);

export interface RegistryOptions {
  /** Tool ids excluded by configuration */
  disabled?: readonly string[];
  /** Add the language-agnostic Semgrep pass */
  semgrep?: boolean;
}

export interface RegistryEntry {
  spec: AnalyzerSpec;
  /** Evidence of the ecosystem this analyzer was selected for */
  evidence?: string;
}

/**
 * Ordered analyzer specs for the detected ecosystems.
 * Tag order drives spec order; a tool listed twice is kept once.
 */
export function getAnalyzersFor(
  ecosystems: readonly DetectedEcosystem[],
  options: RegistryOptions = {}
): RegistryEntry[] {
  const disabled = new Set(options.disabled ?? []);
  const seen = new Set<string>();
  const entries: RegistryEntry[] = [];

  for (const ecosystem of ecosystems) {
    for (const spec of TOOL_REGISTRY[ecosystem.tag]) {
      if (disabled.has(spec.id) || seen.has(spec.id)) {
        continue;
      }
      seen.add(spec.id);
      entries.push({ spec, evidence: ecosystem.evidence });
    }
  }

  if (options.semgrep && ecosystems.length > 0 && !disabled.has(SEMGREP_SPEC.id)) {
    entries.push({ spec: SEMGREP_SPEC });
  }

  return entries;
}

/**
 * Every registered spec, for listing
 */
export function listRegisteredTools(): AnalyzerSpec[] {
  return [...Object.values(TOOL_REGISTRY).flat(), SEMGREP_SPEC];
}

/**
 * Argument template for one selection: the spec's args plus whichever
 * manifest variant the evidence calls for
 */
export function argsTemplateFor(spec: AnalyzerSpec, manifest?: string): string[] {
  if (!spec.manifestArgs) {
    return [...spec.args];
  }
  const { pattern, matched, otherwise } = spec.manifestArgs;
  const variant = manifest !== undefined && pattern.test(manifest) ? matched : otherwise;
  return [...spec.args, ...variant];
}

/**
 * Expand {root}, {manifest} and {tmp} in an argument template.
 * {tmp} is left in place until the runner has created the directory.
 */
export function resolveArgs(
  template: readonly string[],
  values: { root: string; manifest?: string; tmp?: string }
): string[] {
  return template.map((arg) =>
    arg
      .replaceAll('{root}', values.root)
      .replaceAll('{manifest}', values.manifest ?? '.')
      .replaceAll('{tmp}', values.tmp ?? '{tmp}')
  );
}
