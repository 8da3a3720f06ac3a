import type { NoiseFilter } from '../analysis/noise-filter.js';
import { classifyTeam, type TeamRoster } from '../analysis/team-classifier.js';
import type { Logger } from '../logging/logger.js';
import type { CommentSource, CommentThread } from '../platform/azure-devops-client.js';
import type { LinkedRequest } from '../platform/relations.js';
import { RunStatistics, type StatsSnapshot } from './run-statistics.js';

/**
 * One kept comment, attributed to a team.
 */
export interface ClassifiedRow {
  ticketId: number;
  repoId: string;
  requestId: string;
  author: string;
  team: string;
  comment: string;
  createdDate?: string;
}

/**
 * A ticket, or one of its pull requests, that could not be fetched.
 */
export interface FetchFailure {
  ticketId: number;
  repoId?: string;
  requestId?: string;
  error: string;
}

export interface RunResult {
  rows: ClassifiedRow[];
  stats: StatsSnapshot;
  failures: FetchFailure[];
}

export interface CommentPipelineDeps {
  source: CommentSource;
  noiseFilter: NoiseFilter;
  roster: TeamRoster;
  logger: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Walks tickets → linked pull requests → threads → comments, one request at
 * a time, and keeps the comments that are human feedback.
 */
export class CommentPipeline {
  constructor(private readonly deps: CommentPipelineDeps) {}

  async run(ticketIds: readonly number[]): Promise<RunResult> {
    const { logger, noiseFilter } = this.deps;
    const stats = new RunStatistics();
    const rows: ClassifiedRow[] = [];
    const failures: FetchFailure[] = [];

    logger.info(`Processing ${ticketIds.length} ticket(s) with noise policy v${noiseFilter.policy.version}`);

    for (const ticketId of ticketIds) {
      const ticketLogger = logger.child(ticketId);

      let linked: LinkedRequest[];
      try {
        linked = await this.deps.source.linkedRequests(ticketId);
      } catch (err) {
        stats.increment('fetch_failures');
        failures.push({ ticketId, error: errorMessage(err) });
        ticketLogger.event({ type: 'ticket-failed', ticketId, error: errorMessage(err) }, 'error');
        continue;
      }
      stats.increment('tickets_processed');
      ticketLogger.info(`Found ${linked.length} linked pull request(s)`);

      for (const { repoId, requestId } of linked) {
        let threads: CommentThread[];
        try {
          threads = await this.deps.source.fetchThreads(repoId, requestId);
        } catch (err) {
          stats.increment('fetch_failures');
          failures.push({ ticketId, repoId, requestId, error: errorMessage(err) });
          ticketLogger.event(
            { type: 'request-failed', ticketId, repoId, requestId, error: errorMessage(err) },
            'error',
          );
          continue;
        }
        stats.increment('requests_fetched');

        for (const thread of threads) {
          for (const comment of thread.comments ?? []) {
            stats.increment('comments_seen');

            const author = (comment.author?.uniqueName ?? '').toLowerCase();
            const text = comment.content ?? '';

            if (noiseFilter.isNoise(text, author)) {
              stats.increment('comments_filtered');
              continue;
            }

            stats.increment('comments_kept');
            rows.push({
              ticketId,
              repoId,
              requestId,
              author,
              team: classifyTeam(author, this.deps.roster),
              comment: text,
              ...(comment.createdDate != null ? { createdDate: comment.createdDate } : {}),
            });
          }
        }

        ticketLogger.debug(`Read ${threads.length} thread(s)`, { repoId, requestId });
      }
    }

    const result: RunResult = { rows, stats: stats.snapshot(), failures };
    logger.event({
      type: 'run-completed',
      rows: rows.length,
      failures: failures.length,
      stats: { ...result.stats },
    });
    return result;
  }
}
