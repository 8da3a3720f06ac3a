#!/usr/bin/env node

import { Command } from 'commander';
import { runAnalyze, type AnalyzeOptions } from './cli/analyze.js';
import { withCommandHandler } from './cli/command-error-handler.js';
import { DEFAULT_CONFIG_FILE } from './config/loader.js';

const program = new Command();

program
  .name('pr-comment-insights')
  .description('Report human review comments on pull requests linked to Azure DevOps work items')
  .version('0.1.0');

// ─── analyze ──────────────────────────────────────────
program
  .command('analyze')
  .description('Collect, filter and classify review comments for the given work items')
  .requiredOption('-t, --tickets <ids...>', 'Work item ids to analyze')
  .option('-c, --config <path>', 'Path to the config file', DEFAULT_CONFIG_FILE)
  .option('--organization <name>', 'Override: Azure DevOps organization')
  .option('--project <name>', 'Override: Azure DevOps project')
  .option('-o, --output <dir>', 'Override: directory for the report files')
  .option('-d, --debug', 'Print run statistics and log to the console')
  .action(withCommandHandler(async (opts: AnalyzeOptions) => {
    process.exitCode = await runAnalyze(opts);
  }));

await program.parseAsync();
