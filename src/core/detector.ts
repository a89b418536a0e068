/**
 * Detector - which ecosystems does this repository contain?
 *
 * Presence is decided by characteristic manifest and config files only.
 * No file contents are executed and nothing leaves the machine.
 */

import { readdir, stat } from 'fs/promises';
import { resolve } from 'path';
import fg from 'fast-glob';
import {
  ContextSignals,
  DetectedEcosystem,
  EcosystemTag,
  RepositoryContext,
  RunMode,
} from '../types.js';
import { DetectionError } from './errors.js';
import { countChangedLines, parseChangedFiles } from './diff.js';
import { debugLog, errorMessage } from './utils.js';

// ─────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────

interface DetectionRule {
  tag: EcosystemTag;
  /** Tried in order; the first pattern with a match supplies the evidence */
  patterns: RegExp[];
}

export const DETECTION_RULES: readonly DetectionRule[] = [
  {
    tag: 'python',
    patterns: [/(^|\/)requirements[^/]*\.txt$/, /(^|\/)Pipfile$/, /(^|\/)pyproject\.toml$/, /(^|\/)setup\.(py|cfg)$/],
  },
  { tag: 'javascript', patterns: [/(^|\/)package\.json$/] },
  { tag: 'java', patterns: [/(^|\/)pom\.xml$/, /(^|\/)build\.gradle(\.kts)?$/] },
  { tag: 'go', patterns: [/(^|\/)go\.mod$/] },
  { tag: 'ruby', patterns: [/(^|\/)Gemfile$/, /\.gemspec$/] },
  { tag: 'php', patterns: [/(^|\/)composer\.json$/] },
  { tag: 'dotnet', patterns: [/\.sln$/, /\.(cs|fs|vb)proj$/] },
  {
    tag: 'docker',
    patterns: [/(^|\/)Dockerfile$/, /(^|\/)Dockerfile\.[^/]+$/, /\.dockerfile$/, /(^|\/)(docker-)?compose\.ya?ml$/],
  },
  { tag: 'terraform', patterns: [/\.tf$/] },
  {
    tag: 'kubernetes',
    patterns: [
      /(^|\/)kustomization\.ya?ml$/,
      /(^|\/)Chart\.yaml$/,
      /(^|\/)(k8s|kubernetes|manifests|deploy|helm|charts)\/(.+\/)?[^/]+\.ya?ml$/,
    ],
  },
  { tag: 'github-actions', patterns: [/^\.github\/workflows\/[^/]+\.ya?ml$/] },
];

const CI_PATTERNS: RegExp[] = [
  /^\.github\/workflows\//,
  /^\.github\/actions\//,
  /(^|\/)\.gitlab-ci\.ya?ml$/,
  /(^|\/)Jenkinsfile$/,
  /^\.circleci\//,
  /^\.buildkite\//,
  /(^|\/)azure-pipelines\.ya?ml$/,
  /(^|\/)\.travis\.ya?ml$/,
  /(^|\/)bitbucket-pipelines\.ya?ml$/,
];

const MANIFEST_PATTERNS: RegExp[] = [
  ...DETECTION_RULES.filter((rule) => rule.tag !== 'docker' && rule.tag !== 'kubernetes' && rule.tag !== 'github-actions' && rule.tag !== 'terraform')
    .flatMap((rule) => rule.patterns),
  /(^|\/)(package-lock\.json|npm-shrinkwrap\.json|yarn\.lock|pnpm-lock\.yaml)$/,
  /(^|\/)(poetry\.lock|Pipfile\.lock|uv\.lock)$/,
  /(^|\/)(go\.sum|Gemfile\.lock|composer\.lock|packages\.lock\.json|gradle\.lockfile)$/,
  /(^|\/)\.terraform\.lock\.hcl$/,
];

const TEST_PATTERNS: RegExp[] = [
  /(^|\/)(test|tests|__tests__|spec)\//,
  /\.(test|spec)\.[cm]?[jt]sx?$/,
  /_test\.go$/,
  /(^|\/)test_[^/]+\.py$/,
  /_spec\.rb$/,
  /Tests?\.(cs|java)$/,
];

export const DEFAULT_IGNORES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/vendor/**',
  '**/.venv/**',
  '**/venv/**',
  '**/target/**',
  '**/.terraform/**',
];

export function isCiFile(path: string): boolean {
  return CI_PATTERNS.some((pattern) => pattern.test(path));
}

export function isManifestFile(path: string): boolean {
  return MANIFEST_PATTERNS.some((pattern) => pattern.test(path));
}

export function isTestFile(path: string): boolean {
  return TEST_PATTERNS.some((pattern) => pattern.test(path));
}

// ─────────────────────────────────────────────────────────────
// Detection
// ─────────────────────────────────────────────────────────────

function depth(path: string): number {
  return path.split('/').length;
}

/**
 * Shallowest, then lexicographically first, match
 */
function pickEvidence(files: readonly string[], pattern: RegExp): string | undefined {
  let best: string | undefined;
  for (const file of files) {
    if (!pattern.test(file)) {
      continue;
    }
    if (
      best === undefined ||
      depth(file) < depth(best) ||
      (depth(file) === depth(best) && file < best)
    ) {
      best = file;
    }
  }
  return best;
}

/**
 * Ecosystem tags for a file listing, in rule order
 */
export function detectEcosystems(files: readonly string[]): DetectedEcosystem[] {
  const detected: DetectedEcosystem[] = [];

  for (const rule of DETECTION_RULES) {
    for (const pattern of rule.patterns) {
      const evidence = pickEvidence(files, pattern);
      if (evidence) {
        detected.push({ tag: rule.tag, evidence });
        break;
      }
    }
  }

  return detected;
}

export interface DetectOptions {
  mode?: RunMode;
  /** PR mode: changed paths; derived from `patch` when omitted */
  changedFiles?: string[];
  /** PR mode: unified diff text */
  patch?: string;
  maxDepth?: number;
  exclude?: string[];
}

async function assertReadableRoot(root: string): Promise<void> {
  const stats = await stat(root).catch((error: unknown) => {
    throw new DetectionError(root, errorMessage(error));
  });
  if (!stats.isDirectory()) {
    throw new DetectionError(root, 'not a directory');
  }
  try {
    await readdir(root);
  } catch (error) {
    throw new DetectionError(root, errorMessage(error));
  }
}

/**
 * List repository files relative to root.
 * An unreadable subtree is reported as a warning and skipped.
 */
export async function listRepositoryFiles(
  root: string,
  options: { maxDepth?: number; exclude?: string[] } = {}
): Promise<{ files: string[]; warnings: string[] }> {
  const globOptions = {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    deep: options.maxDepth ?? 4,
    ignore: [...DEFAULT_IGNORES, ...(options.exclude ?? [])],
  };
  const warnings: string[] = [];

  let files: string[];
  try {
    files = await fg('**/*', globOptions);
  } catch (error) {
    warnings.push(`Some paths could not be read and were skipped: ${errorMessage(error)}`);
    files = await fg('**/*', { ...globOptions, suppressErrors: true });
  }

  return { files: files.sort(), warnings };
}

/**
 * Build the immutable RepositoryContext for a run.
 * Throws DetectionError only when the root itself cannot be read.
 */
export async function detectRepository(rootPath: string, options: DetectOptions = {}): Promise<RepositoryContext> {
  const root = resolve(rootPath);
  await assertReadableRoot(root);

  const mode = options.mode ?? 'manual';
  const { files, warnings } = await listRepositoryFiles(root, options);

  const changedFiles = mode === 'pr'
    ? options.changedFiles ?? (options.patch ? parseChangedFiles(options.patch) : [])
    : [];

  const ecosystems = detectEcosystems(files);
  debugLog('Detected ecosystems:', ecosystems.map((e) => `${e.tag} (${e.evidence})`).join(', ') || 'none');

  const signals: ContextSignals = {
    ciChanged: changedFiles.some(isCiFile),
    manifestsChanged: changedFiles.some(isManifestFile),
    testsPresent: files.some(isTestFile),
    diffLines: mode === 'pr' && options.patch ? countChangedLines(options.patch) : 0,
  };

  return Object.freeze({
    root,
    mode,
    files: Object.freeze([...files]),
    changedFiles: Object.freeze([...changedFiles]),
    ecosystems: Object.freeze(ecosystems.map((e) => Object.freeze(e))),
    signals: Object.freeze(signals),
    warnings: Object.freeze(warnings),
  });
}
