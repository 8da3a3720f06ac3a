import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseTicketIds, runAnalyze } from '../../src/cli/analyze.js';
import { ConfigurationError } from '../../src/errors.js';

vi.mock('chalk', () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: plain,
      yellow: plain,
      green: plain,
      bold: { cyan: plain },
    },
  };
});

const env = { AZURE_DEVOPS_PAT: 'test-pat' };

const workItems: Record<string, unknown> = {
  '123': {
    id: 123,
    relations: [
      {
        rel: 'ArtifactLink',
        url: 'vstfs:///Git/PullRequestId/proj%2Frepo-1%2F7',
        attributes: { name: 'Pull Request' },
      },
      { rel: 'System.LinkTypes.Hierarchy-Reverse', url: 'https://x/workItems/1', attributes: { name: 'Parent' } },
    ],
  },
  '5': { id: 5 },
};

const threads = {
  value: [
    {
      comments: [
        { author: { uniqueName: 'svc@example.com' }, content: 'voted 10' },
        {
          author: { uniqueName: 'user1@example.com' },
          content: 'Looks good to me',
          createdDate: '2024-05-01T11:00:00Z',
        },
      ],
    },
  ],
  count: 1,
};

function fakeAzureDevOps(url: string): Response {
  const workItem = /\/_apis\/wit\/workitems\/(\d+)\?/.exec(url);
  const body = workItem
    ? workItems[workItem[1] ?? '']
    : url.includes('/_apis/git/repositories/repo-1/pullRequests/7/threads?')
      ? threads
      : undefined;

  if (body === undefined) {
    return new Response('Not Found', { status: 404, statusText: 'Not Found' });
  }
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('parseTicketIds', () => {
  it('accepts separate and comma-separated ids', () => {
    expect(parseTicketIds(['123', '45,67', ' 8 '])).toEqual([123, 45, 67, 8]);
  });

  it.each(['0', '-3', 'abc', '1.5'])('rejects %s', (value) => {
    expect(() => parseTicketIds([value])).toThrow(`Invalid ticket id "${value}": expected a positive integer`);
  });

  it('requires at least one id', () => {
    expect(() => parseTicketIds([' , '])).toThrow(ConfigurationError);
    expect(() => parseTicketIds([])).toThrow('At least one ticket id is required');
  });
});

describe('runAnalyze', () => {
  let dir: string;
  let configPath: string;
  let fetchMock: ReturnType<typeof vi.fn>;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'insights-cli-'));
    configPath = join(dir, 'insights.json');
    await writeFile(
      configPath,
      JSON.stringify({
        organization: 'contoso',
        project: 'Platform',
        outputDir: join(dir, 'out'),
        logDir: join(dir, 'logs'),
      }),
      'utf-8',
    );

    fetchMock = vi.fn(async (input: string | URL) => fakeAzureDevOps(String(input)));
    vi.stubGlobal('fetch', fetchMock);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report for a ticket with human comments and exits 0', async () => {
    const code = await runAnalyze({ tickets: ['123'], config: configPath }, env);

    expect(code).toBe(0);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://dev.azure.com/contoso/Platform/_apis/wit/workitems/123?$expand=relations&api-version=7.1',
    );
    expect(fetchMock.mock.calls[1]?.[0]).toBe(
      'https://dev.azure.com/contoso/Platform/_apis/git/repositories/repo-1/pullRequests/7/threads?api-version=7.1',
    );
    expect(logSpy).toHaveBeenCalledWith(`Excel report generated: ${join(dir, 'out', 'pr_comment_report.xlsx')}`);
    const files = await readdir(join(dir, 'out'));
    expect(files).toContain('pr_comment_report.xlsx');
    expect(files).toContain('comments_by_team_pie.svg');
    expect(files).toContain('comments_by_team_bar.svg');
    expect(files.some((f) => /^run-report-\d{8}-\d{6}\.json$/.test(f))).toBe(true);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('reports when nothing survived filtering', async () => {
    const code = await runAnalyze({ tickets: ['5'], config: configPath }, env);

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('No meaningful comments found.');
    await expect(readdir(join(dir, 'out'))).rejects.toThrow();
  });

  it('keeps going past a ticket that cannot be fetched and exits 1', async () => {
    const code = await runAnalyze({ tickets: ['123,999'], config: configPath }, env);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('1 fetch failure(s):'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('| #999   |'));
    expect(fetchMock.mock.calls.filter(([url]) => String(url).includes('/workitems/999?'))).toHaveLength(1);
    expect(await readdir(join(dir, 'out'))).toContain('pr_comment_report.xlsx');
  });

  it('prints run statistics in debug mode', async () => {
    await runAnalyze({ tickets: ['123'], config: configPath, debug: true }, env);

    expect(logSpy).toHaveBeenCalledWith('\nDebug stats');
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('| comments_seen     | 2     |'));
  });

  it('applies command-line overrides to the config', async () => {
    await runAnalyze({ tickets: ['123'], config: configPath, project: 'Mobile' }, env);

    expect(String(fetchMock.mock.calls[0]?.[0])).toMatch(/^https:\/\/dev\.azure\.com\/contoso\/Mobile\//);
  });

  it('fails before any request when no PAT is configured', async () => {
    await expect(runAnalyze({ tickets: ['123'], config: configPath }, {})).rejects.toThrow(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
