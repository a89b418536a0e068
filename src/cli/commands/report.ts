import * as p from '@clack/prompts';
import chalk from 'chalk';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { loadConfig } from '../../core/config.js';
import { errorMessage } from '../../core/utils.js';
import { renderReportMarkdown } from '../../output/markdown.js';
import { parsePersistedReport } from '../../output/persisted.js';
import { ARTIFACTS } from '../../sinks/index.js';

interface ReportOptions {
  input?: string;
  output?: string;
}

/**
 * Render a persisted genops_guardian.json as markdown
 */
export async function reportCommand(options: ReportOptions): Promise<void> {
  const cwd = process.cwd();

  let inputPath: string;
  try {
    inputPath = options.input
      ? resolve(options.input)
      : join(resolve((await loadConfig(cwd)).output.dir), ARTIFACTS.report);
  } catch (error) {
    p.log.error(errorMessage(error));
    process.exit(1);
  }

  if (!existsSync(inputPath)) {
    p.log.error(`No report found at ${inputPath}`);
    p.log.info('Run "genops-guardian scan" first.');
    process.exit(1);
  }

  const parsed = parsePersistedReport(readFileSync(inputPath, 'utf-8'));
  if (!parsed.success) {
    p.log.error(`Invalid report ${inputPath}: ${parsed.error}`);
    process.exit(1);
  }

  const markdown = renderReportMarkdown(parsed.data.result, parsed.data.status);
  if (options.output) {
    writeFileSync(options.output, markdown, 'utf-8');
    p.log.success(`Report written to ${chalk.cyan(options.output)}`);
  } else {
    process.stdout.write(markdown);
  }
}
