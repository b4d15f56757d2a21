#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { analyzeCommand, parsePositiveInt, parseRiskLevel } from './commands/analyze.js';
import { rulesCommand } from './commands/rules.js';
import { describeFailure } from '../core/errors.js';

const program = new Command();

program
  .name('planwarden')
  .description('Risk analysis for infrastructure plan changes')
  .version('0.1.0');

// ─────────────────────────────────────────────────────────────
// analyze - Assess every resource change in a plan
// ─────────────────────────────────────────────────────────────
program
  .command('analyze <plan>')
  .description('Analyze a normalized plan file and report risky changes')
  .option('-c, --config <path>', 'Config file (defaults to .planwarden.yml in the current directory)')
  .option('--json', 'Output as JSON only', false)
  .option('--expand-all', 'Expand every detail, regardless of risk')
  .option('--group-threshold <n>', 'Group by provider from this many resources', parsePositiveInt)
  .option('--max-properties <n>', 'Maximum property changes per resource', parsePositiveInt)
  .option('--max-depth <n>', 'Maximum nesting depth to diff', parsePositiveInt)
  .option('--concurrency <n>', 'Number of resources analyzed in parallel', parsePositiveInt)
  .option('--fail-on <level>', 'Exit with code 2 if any change is at or above this risk level', parseRiskLevel)
  .action(analyzeCommand);

// ─────────────────────────────────────────────────────────────
// rules - Validate and list sensitivity rules
// ─────────────────────────────────────────────────────────────
program
  .command('rules')
  .description('Validate the sensitivity rules in the config file')
  .option('-c, --config <path>', 'Config file (defaults to .planwarden.yml in the current directory)')
  .option('--json', 'Output as JSON only', false)
  .action(rulesCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), describeFailure(error));
  process.exit(1);
});
