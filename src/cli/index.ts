#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from './commands/init.js';
import { scanCommand } from './commands/scan.js';
import { detectCommand } from './commands/detect.js';
import { reportCommand } from './commands/report.js';

const BANNER = `
${chalk.cyan('  ┏━╸┏━╸┏┓╻┏━┓┏━┓┏━┓   ┏━╸╻ ╻┏━┓┏━┓╺┳┓╻┏━┓┏┓╻')}
${chalk.cyan('  ┃╺┓┣╸ ┃┗┫┃ ┃┣━┛┗━┓   ┃╺┓┃ ┃┣━┫┣┳┛ ┃┃┃┣━┫┃┗┫')}
${chalk.cyan('  ┗━┛┗━╸╹ ╹┗━┛╹  ┗━┛   ┗━┛┗━┛╹ ╹╹┗╸╺┻┛╹╹ ╹╹ ╹')}
`;

const program = new Command();

program
  .name('genops-guardian')
  .description('Runs the static analyzers your repository needs and scores the risk they find')
  .version('0.1.0')
  .hook('preAction', (_command, action) => {
    // Banner only for interactive output
    const quiet = action.opts().json || action.opts().ci;
    const args = process.argv.slice(2);
    if (!quiet && !args.includes('--help') && !args.includes('-h') && action.name() !== 'report') {
      console.log(BANNER);
    }
  });

// ─────────────────────────────────────────────────────────────
// init - Write a config file
// ─────────────────────────────────────────────────────────────
program
  .command('init')
  .description('Create .genops/config.yml with the default settings')
  .option('--force', 'Overwrite an existing config file')
  .action(initCommand);

// ─────────────────────────────────────────────────────────────
// detect - Show ecosystems and analyzers
// ─────────────────────────────────────────────────────────────
program
  .command('detect [path]')
  .description('Show detected ecosystems and the analyzers a scan would run')
  .option('--json', 'Output as JSON only')
  .action(detectCommand);

// ─────────────────────────────────────────────────────────────
// scan - Run the analyzers and score the result
// ─────────────────────────────────────────────────────────────
program
  .command('scan [path]')
  .description('Run every applicable analyzer and compute the risk score')
  .option('--pr', 'Pull request mode: score change signals against --base')
  .option('--base <ref>', 'Base ref for the pull request diff', 'origin/main')
  .option('--changed <files...>', 'Changed files (skips git diff)')
  .option('--json', 'Print genops_guardian.json to stdout')
  .option('--ci', 'Non-interactive; exit 1 when the policy fails')
  .option('--concurrency <n>', 'Analyzers run in parallel')
  .option('--no-semgrep', 'Skip the Semgrep pass')
  .option('-o, --output <dir>', 'Artifact directory (default: output.dir from config)')
  .option('--comment <pr>', 'Post the review as comments on this pull request (needs gh)')
  .option('--repo <owner/name>', 'Repository for --comment')
  .option('--summarizer <command>', 'Command that turns the prompt on stdin into a summary')
  .action(scanCommand);

// ─────────────────────────────────────────────────────────────
// report - Render the last run
// ─────────────────────────────────────────────────────────────
program
  .command('report')
  .description('Render genops_guardian.json as markdown')
  .option('-i, --input <path>', 'Report to render (default: <output.dir>/genops_guardian.json)')
  .option('-o, --output <path>', 'Write to a file instead of stdout')
  .action(reportCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
