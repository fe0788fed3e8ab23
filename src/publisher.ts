import { InvalidRequestError, PublishError, RemoteApiError } from './errors.js';
import type { RateLimiters } from './rate-limiter.js';
import { reconcilePullRequest } from './reconciler.js';
import { PublishRequestSchema, describeIssue } from './schemas.js';
import { stripTrackingParams } from './url-cleaner.js';
import type {
  PublishRequest,
  PublishResult,
  RepoRef,
  RepositoryClient,
  StatusContext,
  VcsGateway,
} from './types.js';

/** Every pull request targets the repository's default branch */
export const BASE_BRANCH = 'master';

/** Status context CircleCI reports under */
export const DEFAULT_CI_CONTEXT = 'ci/circleci';

/** Progress of a single publish run. `failed` is terminal. */
export type PublishState =
  | 'start'
  | 'pushed'
  | 'reconciled'
  | 'assignee-ensured'
  | 'status-fetched'
  | 'done'
  | 'failed';

export interface PublishDeps {
  vcs: VcsGateway;
  client: RepositoryClient;
  limiters: RateLimiters;
  /** Status context whose target URL is reported as the CI build URL */
  ciContext?: string;
  onTransition?: (state: PublishState, detail: string) => void;
}

export type PublishOutcome =
  | { ok: true; result: PublishResult }
  | { ok: false; result: PublishResult; error: PublishError; lastState: PublishState };

export function failedResult(): PublishResult {
  return {
    success: false,
    commitSha: '',
    pullRequestNumber: 0,
    pullRequestUrl: '',
    pullRequestCombinedStatus: 'unknown',
    pullRequestAssignee: '',
    ciBuildUrl: '',
  };
}

/**
 * Split a commit message into PR title and body.
 * The title is everything before the first line break. The body is the
 * rest, unless `bodyOverride` is non-empty, which always wins.
 */
export function derivePullRequestText(
  commitMessage: string,
  bodyOverride?: string,
): { title: string; body: string } {
  const breakAt = commitMessage.indexOf('\n');
  const title = breakAt === -1 ? commitMessage : commitMessage.slice(0, breakAt);
  const remainder = breakAt === -1 ? '' : commitMessage.slice(breakAt + 1);
  return { title, body: bodyOverride ? bodyOverride : remainder };
}

/**
 * Target URL of the status reported under `ciContext`, minus tracking params.
 * When the context reports more than once, the last entry with a URL wins.
 */
export function findCiBuildUrl(statuses: StatusContext[], ciContext: string): string {
  for (let i = statuses.length - 1; i >= 0; i--) {
    const { context, targetUrl } = statuses[i];
    if (context === ciContext && targetUrl) {
      return stripTrackingParams(targetUrl);
    }
  }
  return '';
}

function toPublishError(error: unknown): PublishError {
  if (error instanceof PublishError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new RemoteApiError(message, null, { cause: error });
}

/**
 * Push the latest local commit and converge its branch to one open pull
 * request with the requested title, body and assignee, then report its
 * combined CI status.
 *
 * Steps run strictly in order and the first failure ends the run. Nothing
 * already done is rolled back: the push overwrites and the reconciler
 * tolerates an existing PR, so re-running is the recovery path.
 */
export async function publish(request: PublishRequest, deps: PublishDeps): Promise<PublishOutcome> {
  const { vcs, client, limiters } = deps;
  const ciContext = deps.ciContext ?? DEFAULT_CI_CONTEXT;
  let state: PublishState = 'start';
  const transition = (next: PublishState, detail: string): void => {
    state = next;
    deps.onTransition?.(next, detail);
  };

  try {
    const parsed = PublishRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidRequestError(describeIssue(parsed.error));
    }
    const req = parsed.data;
    const repo: RepoRef = { owner: req.repoOwner, repo: req.repoName };

    const localSha = await vcs.readLastCommitSha(req.repoDir);
    await vcs.forcePush(req.repoDir, req.branchName);
    transition('pushed', `${localSha} -> origin/${req.branchName}`);

    const { title, body } = derivePullRequestText(req.commitMessage, req.body);
    const pr = await reconcilePullRequest(
      client,
      repo,
      { title, body, head: `${req.repoOwner}:${req.branchName}`, base: BASE_BRANCH },
      limiters,
    );
    transition('reconciled', `#${pr.number} ${pr.htmlUrl}`);

    if (pr.assignee !== req.assignee) {
      await limiters.api.acquire();
      await client.addAssignees(repo, pr.number, [req.assignee]);
    }
    transition('assignee-ensured', req.assignee);

    await limiters.api.acquire();
    const status = await client.getCombinedStatus(repo, pr.headSha);
    transition('status-fetched', status.state);

    // Report the SHA the status belongs to, which can lag behind the push
    const result: PublishResult = {
      success: true,
      commitSha: pr.headSha,
      pullRequestNumber: pr.number,
      pullRequestUrl: pr.htmlUrl,
      pullRequestCombinedStatus: status.state,
      pullRequestAssignee: req.assignee,
      ciBuildUrl: findCiBuildUrl(status.statuses, ciContext),
    };
    transition('done', pr.htmlUrl);
    return { ok: true, result };
  } catch (error: unknown) {
    const lastState = state;
    const failure = toPublishError(error);
    transition('failed', failure.message);
    return { ok: false, result: failedResult(), error: failure, lastState };
  }
}
