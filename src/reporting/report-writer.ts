import { join } from 'node:path';
import { format } from 'date-fns';
import ExcelJS from 'exceljs';
import type { ClassifiedRow, RunResult } from '../core/comment-pipeline.js';
import type { LoggerLike } from '../logging/logger.js';
import { atomicWriteFile, atomicWriteJSON, ensureDir } from '../util/fs.js';
import { renderBarChart, renderPieChart } from './charts.js';
import type { ReportArtifacts, RunMeta, RunReport, TeamSummary } from './types.js';

export const WORKBOOK_FILE = 'pr_comment_report.xlsx';
export const PIE_CHART_FILE = 'comments_by_team_pie.svg';
export const BAR_CHART_FILE = 'comments_by_team_bar.svg';

export const DETAIL_SHEET = 'Detailed Comments';
export const SUMMARY_SHEET = 'Team Summary';

/**
 * Count kept comments per team, ordered by team label. Teams without
 * comments are left out.
 */
export function summarizeByTeam(rows: readonly ClassifiedRow[]): TeamSummary[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(row.team, (counts.get(row.team) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([team, commentCount]) => ({ team, commentCount }));
}

export class ReportWriter {
  constructor(
    private readonly outputDir: string,
    private readonly logger: LoggerLike,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Write the workbook, both charts and the JSON run report. Returns null,
   * writing nothing, when the run kept no comments.
   */
  async write(result: RunResult, meta: RunMeta): Promise<ReportArtifacts | null> {
    if (result.rows.length === 0) {
      this.logger.info('No comments kept; skipping report');
      return null;
    }

    await ensureDir(this.outputDir);
    const now = this.clock();
    const summary = summarizeByTeam(result.rows);

    const artifacts: ReportArtifacts = {
      workbook: join(this.outputDir, WORKBOOK_FILE),
      pieChart: join(this.outputDir, PIE_CHART_FILE),
      barChart: join(this.outputDir, BAR_CHART_FILE),
      runReport: join(this.outputDir, `run-report-${format(now, 'yyyyMMdd-HHmmss')}.json`),
    };

    await atomicWriteFile(artifacts.workbook, await this.buildWorkbook(result.rows, summary));
    await atomicWriteFile(artifacts.pieChart, renderPieChart(summary));
    await atomicWriteFile(artifacts.barChart, renderBarChart(summary));

    const report: RunReport = {
      ...meta,
      generatedAt: now.toISOString(),
      stats: result.stats,
      summary,
      failures: result.failures,
    };
    await atomicWriteJSON(artifacts.runReport, report);

    this.logger.info(`Report written to ${this.outputDir}`, { data: { ...artifacts } });
    return artifacts;
  }

  private async buildWorkbook(rows: readonly ClassifiedRow[], summary: TeamSummary[]): Promise<Uint8Array> {
    const workbook = new ExcelJS.Workbook();

    const details = workbook.addWorksheet(DETAIL_SHEET);
    details.columns = [
      { header: 'ticket_id', key: 'ticket_id', width: 12 },
      { header: 'repo_id', key: 'repo_id', width: 38 },
      { header: 'pr_id', key: 'pr_id', width: 10 },
      { header: 'author', key: 'author', width: 32 },
      { header: 'team', key: 'team', width: 12 },
      { header: 'comment', key: 'comment', width: 80 },
      { header: 'created_date', key: 'created_date', width: 28 },
    ];
    for (const row of rows) {
      details.addRow({
        ticket_id: row.ticketId,
        repo_id: row.repoId,
        pr_id: row.requestId,
        author: row.author,
        team: row.team,
        comment: row.comment,
        created_date: row.createdDate ?? null,
      });
    }

    const totals = workbook.addWorksheet(SUMMARY_SHEET);
    totals.columns = [
      { header: 'team', key: 'team', width: 12 },
      { header: 'comment_count', key: 'comment_count', width: 16 },
    ];
    for (const entry of summary) {
      totals.addRow({ team: entry.team, comment_count: entry.commentCount });
    }

    const buffer = await workbook.xlsx.writeBuffer();
    return new Uint8Array(buffer);
  }
}
