import chalk from 'chalk';
import { createNoiseFilter } from '../analysis/noise-filter.js';
import { buildRoster } from '../analysis/team-classifier.js';
import { loadConfig } from '../config/loader.js';
import { CommentPipeline } from '../core/comment-pipeline.js';
import { ConfigurationError } from '../errors.js';
import { ResilientHttpClient } from '../http/resilient-client.js';
import { Logger } from '../logging/logger.js';
import { AzureDevOpsClient } from '../platform/azure-devops-client.js';
import { ReportWriter } from '../reporting/report-writer.js';
import { renderFailures, renderStats } from './stats-renderer.js';

export interface AnalyzeOptions {
  tickets: string[];
  config?: string;
  organization?: string;
  project?: string;
  output?: string;
  debug?: boolean;
}

/**
 * Parse ticket ids given as separate arguments or comma-separated lists.
 *
 * @throws ConfigurationError when no id is given or one is not a positive integer.
 */
export function parseTicketIds(values: readonly string[]): number[] {
  const ids = values
    .flatMap((v) => v.split(','))
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => {
      const id = /^\d+$/.test(s) ? Number(s) : NaN;
      if (!Number.isSafeInteger(id) || id <= 0) {
        throw new ConfigurationError(`Invalid ticket id "${s}": expected a positive integer`);
      }
      return id;
    });

  if (ids.length === 0) {
    throw new ConfigurationError('At least one ticket id is required');
  }
  return ids;
}

/**
 * Run the analysis end to end and return the process exit code: 0 for a
 * clean run, 1 when some tickets or pull requests could not be fetched.
 */
export async function runAnalyze(opts: AnalyzeOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const ticketIds = parseTicketIds(opts.tickets);
  const config = await loadConfig(
    opts.config,
    {
      organization: opts.organization,
      project: opts.project,
      outputDir: opts.output,
      logLevel: opts.debug ? 'debug' : undefined,
    },
    { env },
  );

  const logger = new Logger({
    source: 'pr-comment-insights',
    logDir: config.logDir,
    level: config.logLevel,
    console: opts.debug === true,
  });

  const http = new ResilientHttpClient(logger, config.http);
  const client = new AzureDevOpsClient(
    {
      organization: config.organization,
      project: config.project,
      apiVersion: config.apiVersion,
      auth: config.auth,
    },
    http,
    logger,
  );
  const pipeline = new CommentPipeline({
    source: client,
    noiseFilter: createNoiseFilter(config.noisePolicy),
    roster: buildRoster(config.teams),
    logger,
  });

  logger.event({
    type: 'run-started',
    ticketCount: ticketIds.length,
    organization: config.organization,
    project: config.project,
  });
  const result = await pipeline.run(ticketIds);

  if (opts.debug) {
    console.log('\n' + chalk.bold.cyan('Debug stats'));
    console.log(renderStats(result.stats));
  }

  if (result.failures.length > 0) {
    console.error(chalk.yellow(renderFailures(result.failures)));
  }

  const writer = new ReportWriter(config.outputDir, logger);
  const artifacts = await writer.write(result, {
    organization: config.organization,
    project: config.project,
    ticketIds,
    noisePolicyVersion: config.noisePolicy.version,
  });

  if (!artifacts) {
    console.log('No meaningful comments found.');
  } else {
    console.log(chalk.green(`Excel report generated: ${artifacts.workbook}`));
    console.log(`Charts generated: ${artifacts.pieChart}, ${artifacts.barChart}`);
    console.log(`Run report: ${artifacts.runReport}`);
  }

  return result.failures.length > 0 ? 1 : 0;
}
