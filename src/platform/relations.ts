import { MalformedLinkError } from '../errors.js';

/** Relation name Azure DevOps gives artifact links to pull requests. */
export const PULL_REQUEST_RELATION = 'Pull Request';

/**
 * A pull request linked to a work item.
 */
export interface LinkedRequest {
  readonly repoId: string;
  readonly requestId: string;
}

/**
 * Decompose a pull request artifact link such as
 * `vstfs:///Git/PullRequestId/<project>%2F<repo>%2F<id>` into its
 * repository and pull request ids.
 *
 * A segment with invalid percent-escapes is rejected rather than kept
 * literally, so no request is made for an id that cannot exist.
 *
 * @throws MalformedLinkError when the last segment cannot be decoded or does
 *   not decode to at least two `/`-separated components.
 */
export function parseLinkedRequest(relationUrl: string): LinkedRequest {
  const lastSegment = relationUrl.split('/').pop() ?? '';

  let decoded: string;
  try {
    decoded = decodeURIComponent(lastSegment);
  } catch (err) {
    throw new MalformedLinkError(
      `Relation URL has an undecodable final segment: ${err instanceof Error ? err.message : String(err)}`,
      relationUrl,
    );
  }

  const parts = decoded.split('/');
  if (parts.length < 2) {
    throw new MalformedLinkError(
      `Relation URL decodes to ${parts.length} component(s), expected at least 2`,
      relationUrl,
    );
  }

  return {
    repoId: parts[parts.length - 2],
    requestId: parts[parts.length - 1],
  };
}
