import { z } from 'zod';
import { MalformedLinkError, UnexpectedResponseError } from '../errors.js';
import type { ResilientHttpClient } from '../http/resilient-client.js';
import type { LoggerLike } from '../logging/logger.js';
import { PULL_REQUEST_RELATION, parseLinkedRequest, type LinkedRequest } from './relations.js';

/**
 * Configuration for connecting to Azure DevOps.
 */
export interface AzureDevOpsConfig {
  /** Azure DevOps organization name. */
  organization: string;
  /** Azure DevOps project name. */
  project: string;
  /** Authentication. */
  auth: {
    /** Personal Access Token. */
    pat: string;
  };
  /** API version (defaults to "7.1"). */
  apiVersion?: string;
}

const RelationSchema = z
  .object({
    rel: z.string().optional(),
    url: z.string().optional(),
    attributes: z.object({ name: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const WorkItemSchema = z
  .object({
    id: z.number().optional(),
    relations: z.array(RelationSchema).nullish(),
  })
  .passthrough();

export const RawCommentSchema = z
  .object({
    author: z.object({ uniqueName: z.string().nullish() }).passthrough().nullish(),
    content: z.string().nullish(),
    createdDate: z.string().nullish(),
  })
  .passthrough();

export const CommentThreadSchema = z
  .object({
    comments: z.array(RawCommentSchema).nullish(),
  })
  .passthrough();

const ThreadListSchema = z
  .object({
    value: z.array(CommentThreadSchema).nullish(),
  })
  .passthrough();

export type RawComment = z.infer<typeof RawCommentSchema>;
export type CommentThread = z.infer<typeof CommentThreadSchema>;

/**
 * Where the pipeline reads tickets' pull requests and their discussion
 * threads from.
 */
export interface CommentSource {
  linkedRequests(ticketId: number): Promise<LinkedRequest[]>;
  fetchThreads(repoId: string, requestId: string): Promise<CommentThread[]>;
}

/**
 * Read-only Azure DevOps REST client for work item relations and pull
 * request threads.
 */
export class AzureDevOpsClient implements CommentSource {
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly adoConfig: AzureDevOpsConfig,
    private readonly http: Pick<ResilientHttpClient, 'request'>,
    private readonly logger: LoggerLike,
  ) {
    this.baseUrl =
      `https://dev.azure.com/${encodeURIComponent(adoConfig.organization)}/${encodeURIComponent(adoConfig.project)}`;
    this.apiVersion = adoConfig.apiVersion ?? '7.1';

    // Azure DevOps uses Basic auth with PAT: base64(":PAT")
    const token = Buffer.from(`:${adoConfig.auth.pat}`).toString('base64');
    this.headers = {
      Authorization: `Basic ${token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  // ── Work item relations ──

  async linkedRequests(ticketId: number): Promise<LinkedRequest[]> {
    const url =
      `${this.baseUrl}/_apis/wit/workitems/${ticketId}?$expand=relations&api-version=${this.apiVersion}`;
    const workItem = await this.getJson(url, WorkItemSchema);

    const linked: LinkedRequest[] = [];
    for (const relation of workItem.relations ?? []) {
      if (relation.attributes?.name !== PULL_REQUEST_RELATION) continue;

      try {
        linked.push(parseLinkedRequest(relation.url ?? ''));
      } catch (err) {
        if (!(err instanceof MalformedLinkError)) throw err;
        this.logger.debug(`Skipping pull request relation: ${err.message}`, {
          ticketId,
          data: { relationUrl: err.relationUrl },
        });
      }
    }

    this.logger.debug(`Work item ${ticketId} links ${linked.length} pull request(s)`, { ticketId });
    return linked;
  }

  // ── Pull request threads ──

  async fetchThreads(repoId: string, requestId: string): Promise<CommentThread[]> {
    const url =
      `${this.baseUrl}/_apis/git/repositories/${encodeURIComponent(repoId)}/pullRequests/${encodeURIComponent(requestId)}/threads?api-version=${this.apiVersion}`;
    const result = await this.getJson(url, ThreadListSchema);
    return result.value ?? [];
  }

  // ── Helpers ──

  /**
   * GET a JSON document and validate its shape.
   */
  private async getJson<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S>> {
    const response = await this.http.request('GET', url, this.headers);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new UnexpectedResponseError(
        `Azure DevOps returned a body that is not JSON: ${err instanceof Error ? err.message : String(err)}`,
        url,
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new UnexpectedResponseError(`Unexpected Azure DevOps response shape: ${issues}`, url);
    }
    return parsed.data;
  }
}
