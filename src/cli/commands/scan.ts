import * as p from '@clack/prompts';
import chalk from 'chalk';
import { basename, resolve } from 'path';
import { GuardianConfig, PipelineStage, RunMode } from '../../types.js';
import { loadConfig } from '../../core/config.js';
import { getPullRequestDiff } from '../../core/git.js';
import { runGuardian, PipelineInput } from '../../core/pipeline.js';
import { errorMessage } from '../../core/utils.js';
import { toPersistedReport } from '../../output/persisted.js';
import { formatLocation } from '../../output/markdown.js';
import { FileSink, GitHubCommentSink, ResultSink } from '../../sinks/index.js';
import { CommandSummarizer } from '../../summarizers/index.js';
import { renderRiskCard } from '../components/card.js';

interface ScanOptions {
  pr?: boolean;
  base: string;
  changed?: string[];
  json?: boolean;
  ci?: boolean; // CI mode: non-interactive, exit 1 on policy failure
  concurrency?: string;
  semgrep?: boolean; // --no-semgrep sets false
  output?: string;
  comment?: string; // PR number to comment on
  repo?: string;
  summarizer?: string;
}

const STAGE_MESSAGES: Partial<Record<PipelineStage, string>> = {
  Detecting: 'Detecting ecosystems...',
  Scheduling: 'Selecting analyzers...',
  Running: 'Running analyzers...',
  Normalizing: 'Normalizing findings...',
  Aggregating: 'Scoring...',
  Reporting: 'Building report...',
};

function withCliOverrides(config: GuardianConfig, options: ScanOptions): GuardianConfig {
  const next = { ...config, runner: { ...config.runner }, tools: { ...config.tools }, summarizer: { ...config.summarizer } };

  if (options.concurrency !== undefined) {
    const concurrency = Number.parseInt(options.concurrency, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`--concurrency must be a positive integer, got "${options.concurrency}"`);
    }
    next.runner.concurrency = concurrency;
  }
  if (options.semgrep === false) {
    next.tools.semgrep = false;
  }
  if (options.summarizer) {
    next.summarizer.command = options.summarizer;
    next.summarizer.args = [];
  }
  return next;
}

export async function scanCommand(path: string | undefined, options: ScanOptions): Promise<void> {
  const root = resolve(path ?? process.cwd());
  const isQuiet = Boolean(options.json || options.ci);
  const fail = (message: string, hint?: string): never => {
    if (isQuiet) {
      console.error(JSON.stringify({ error: message, ...(hint ? { hint } : {}) }));
    } else {
      p.log.error(message);
      if (hint) p.log.info(hint);
    }
    process.exit(1);
  };

  if (!isQuiet) {
    p.intro(chalk.cyan('genops-guardian') + chalk.dim(' - scan'));
  }

  // ─────────────────────────────────────────────────────────────
  // Config
  // ─────────────────────────────────────────────────────────────
  let config: GuardianConfig;
  try {
    config = withCliOverrides(await loadConfig(root), options);
  } catch (error) {
    return fail(errorMessage(error), 'Fix the config file or run "genops-guardian init --force" to regenerate it.');
  }

  // ─────────────────────────────────────────────────────────────
  // PR input
  // ─────────────────────────────────────────────────────────────
  const prNumber = options.comment ?? process.env.PR_NUMBER;
  const mode: RunMode = options.pr || prNumber ? 'pr' : 'manual';
  const input: PipelineInput = { root, mode };

  if (mode === 'pr') {
    if (options.changed && options.changed.length > 0) {
      input.changedFiles = options.changed;
    } else {
      try {
        const diff = await getPullRequestDiff(root, options.base);
        input.changedFiles = diff.changedFiles;
        input.patch = diff.patch;
      } catch (error) {
        if (!isQuiet) {
          p.log.warn(`Could not diff against ${options.base}: ${errorMessage(error)}`);
          p.log.info('Continuing without change signals.');
        }
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Collaborators
  // ─────────────────────────────────────────────────────────────
  const outputDir = resolve(options.output ?? config.output.dir);
  const sinks: ResultSink[] = [new FileSink(outputDir)];
  if (prNumber) {
    const number = Number.parseInt(prNumber, 10);
    if (!Number.isInteger(number) || number < 1) {
      return fail(`Invalid pull request number "${prNumber}"`);
    }
    sinks.push(new GitHubCommentSink({ prNumber: number, repo: options.repo ?? process.env.GITHUB_REPOSITORY, cwd: root }));
  }

  const summarizer = config.summarizer.command
    ? new CommandSummarizer({
        command: config.summarizer.command,
        args: config.summarizer.args,
        cwd: root,
        timeoutMs: config.summarizer.timeoutMs,
      })
    : undefined;

  // ─────────────────────────────────────────────────────────────
  // Run
  // ─────────────────────────────────────────────────────────────
  const spinner = isQuiet ? undefined : p.spinner();
  spinner?.start('Starting...');
  let finished = 0;
  let planned = 0;

  const outcome = await runGuardian(input, { summarizer, sinks }, {
    config,
    progress: {
      onStage: (stage) => {
        const message = STAGE_MESSAGES[stage];
        if (message) spinner?.message(message);
      },
      onPlanned: (toolIds) => {
        planned = toolIds.length;
      },
      onToolFinished: (result) => {
        finished++;
        spinner?.message(`Running analyzers... ${finished}/${planned} (${result.invocation.spec.name} done)`);
      },
    },
  });

  if (outcome.status === 'aborted') {
    spinner?.stop('Aborted');
    return fail(outcome.error?.message ?? 'Run aborted');
  }
  spinner?.stop(`Analysis complete: ${outcome.result.findings.length} findings`);

  // ─────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────
  if (options.json) {
    console.log(JSON.stringify(toPersistedReport(outcome.result, outcome.status), null, 2));
  } else if (!options.ci) {
    for (const warning of outcome.report.detail.warnings) {
      p.log.warn(warning);
    }
    for (const run of outcome.result.tools.filter((tool) => tool.status !== 'success')) {
      p.log.warn(`${run.name}: ${run.status}${run.detail ? chalk.dim(` (${run.detail})`) : ''}`);
    }

    console.log();
    console.log(
      renderRiskCard(outcome.report.summary, {
        repoName: basename(root),
        durationMs: outcome.result.durationMs,
        reportDir: outputDir,
      })
    );
    console.log();

    const top = outcome.result.findings.filter((finding) => finding.severity === 'critical' || finding.severity === 'high');
    for (const finding of top.slice(0, 10)) {
      p.log.message(`${chalk.red(finding.severity.toUpperCase())} ${chalk.cyan(formatLocation(finding))} ${finding.message} ${chalk.dim(`(${finding.tool})`)}`);
    }
    if (top.length > 10) {
      p.log.info(chalk.dim(`...and ${top.length - 10} more`));
    }
  }

  for (const error of outcome.collaboratorErrors) {
    const message = `${error.kind} (${error.collaborator}): ${error.message}`;
    if (isQuiet) {
      console.error(message);
    } else {
      p.log.warn(message);
    }
  }

  const policyFailed = outcome.result.policy.status === 'FAIL';
  if (!isQuiet) {
    if (policyFailed) {
      for (const violation of outcome.result.policy.violations) {
        p.log.error(`Policy: ${violation.tool} reported ${violation.issues} issues (threshold ${violation.threshold})`);
      }
      p.outro(chalk.red('Policy check failed.'));
    } else {
      p.outro(chalk.green(`Risk ${outcome.result.riskScore}/100 (${outcome.result.riskLevel}).`));
    }
  }

  if (options.ci && policyFailed) {
    process.exit(1);
  }
}
