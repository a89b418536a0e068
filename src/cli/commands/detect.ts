import * as p from '@clack/prompts';
import chalk from 'chalk';
import { resolve } from 'path';
import { loadConfig } from '../../core/config.js';
import { detectRepository } from '../../core/detector.js';
import { getAnalyzersFor } from '../../core/registry.js';
import { isToolAvailable } from '../../core/tool-check.js';
import { errorMessage } from '../../core/utils.js';

interface DetectOptions {
  json?: boolean;
}

/**
 * Show detected ecosystems and which analyzers would run
 */
export async function detectCommand(path: string | undefined, options: DetectOptions): Promise<void> {
  const root = resolve(path ?? process.cwd());

  try {
    const config = await loadConfig(root);
    const context = await detectRepository(root, {
      maxDepth: config.detection.maxDepth,
      exclude: config.detection.exclude,
    });
    const entries = getAnalyzersFor(context.ecosystems, {
      disabled: config.tools.disabled,
      semgrep: config.tools.semgrep,
    });
    const analyzers = await Promise.all(
      entries.map(async ({ spec }) => ({
        id: spec.id,
        name: spec.name,
        ecosystem: spec.ecosystem,
        command: spec.command,
        available: await isToolAvailable(spec.command),
      }))
    );

    if (options.json) {
      console.log(JSON.stringify({ root, ecosystems: context.ecosystems, signals: context.signals, analyzers }, null, 2));
      return;
    }

    p.intro(chalk.cyan('genops-guardian') + chalk.dim(' - detect'));
    if (context.ecosystems.length === 0) {
      p.log.warn('No known ecosystem found. A scan would run no analyzers.');
    }
    for (const ecosystem of context.ecosystems) {
      p.log.info(`${chalk.bold(ecosystem.tag)} ${chalk.dim(ecosystem.evidence)}`);
    }
    for (const warning of context.warnings) {
      p.log.warn(warning);
    }
    for (const analyzer of analyzers) {
      const mark = analyzer.available ? chalk.green('✓') : chalk.yellow('✗');
      const note = analyzer.available ? '' : chalk.dim(` (${analyzer.command} not installed, will be skipped)`);
      p.log.message(`${mark} ${analyzer.name} ${chalk.dim(`[${analyzer.ecosystem}]`)}${note}`);
    }
    p.outro(`${analyzers.filter((a) => a.available).length}/${analyzers.length} analyzers available`);
  } catch (error) {
    if (options.json) {
      console.error(JSON.stringify({ error: errorMessage(error) }));
    } else {
      p.log.error(errorMessage(error));
    }
    process.exit(1);
  }
}
