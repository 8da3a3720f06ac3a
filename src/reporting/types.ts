import type { FetchFailure } from '../core/comment-pipeline.js';
import type { StatsSnapshot } from '../core/run-statistics.js';

export interface TeamSummary {
  team: string;
  commentCount: number;
}

/**
 * Context of a run that the report records next to its results.
 */
export interface RunMeta {
  organization: string;
  project: string;
  ticketIds: number[];
  noisePolicyVersion: string;
}

export interface RunReport extends RunMeta {
  generatedAt: string;
  stats: StatsSnapshot;
  summary: TeamSummary[];
  failures: FetchFailure[];
}

/** Paths of every file a report run produced. */
export interface ReportArtifacts {
  workbook: string;
  pieChart: string;
  barChart: string;
  runReport: string;
}
