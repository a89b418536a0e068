import * as p from '@clack/prompts';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CONFIG_DIR, CONFIG_FILE, renderDefaultConfig } from '../../core/config.js';
import { detectRepository } from '../../core/detector.js';
import { errorMessage } from '../../core/utils.js';

interface InitOptions {
  force?: boolean;
}

/**
 * Write .genops/config.yml with every default spelled out
 */
export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  const configDir = join(cwd, CONFIG_DIR);
  const configPath = join(configDir, CONFIG_FILE);

  if (existsSync(configPath) && !options.force) {
    p.log.error(`${join(CONFIG_DIR, CONFIG_FILE)} already exists.`);
    p.log.info('Use --force to overwrite it.');
    process.exit(1);
  }

  p.intro(chalk.cyan('genops-guardian') + chalk.dim(' - initialization'));

  try {
    const context = await detectRepository(cwd);
    if (context.ecosystems.length > 0) {
      p.log.info(`Detected: ${context.ecosystems.map((e) => e.tag).join(', ')}`);
    } else {
      p.log.warn('No known ecosystem detected yet.');
    }
  } catch (error) {
    p.log.error(errorMessage(error));
    process.exit(1);
  }

  mkdirSync(configDir, { recursive: true });
  writeFileSync(configPath, renderDefaultConfig(), 'utf-8');

  p.log.success(`Created ${chalk.cyan(join(CONFIG_DIR, CONFIG_FILE))}`);
  p.outro('Run "genops-guardian scan" to analyze this repository.');
}
