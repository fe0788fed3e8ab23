/** Owner/name pair identifying a GitHub repository */
export interface RepoRef {
  owner: string;
  repo: string;
}

/** Input to a publish run */
export interface PublishRequest {
  repoOwner: string;
  repoName: string;
  branchName: string;
  /** First line becomes the PR title, the remainder the PR body */
  commitMessage: string;
  /** Replaces the body derived from the commit message when non-empty */
  body?: string;
  assignee: string;
  /** Local git working copy holding the commit to publish */
  repoDir: string;
}

/** Aggregate CI state of a commit, as reported by the combined-status API */
export type CombinedState = 'failure' | 'pending' | 'success' | 'unknown';

/** Outcome of a publish run. Zero-valued apart from `success` on failure. */
export interface PublishResult {
  success: boolean;
  commitSha: string;
  pullRequestNumber: number;
  pullRequestUrl: string;
  pullRequestCombinedStatus: CombinedState;
  pullRequestAssignee: string;
  ciBuildUrl: string;
}

/**
 * A pull request as the remote reports it.
 * `null` means the field is absent, which is not the same as an empty string.
 */
export interface PullRequestHandle {
  number: number;
  headSha: string;
  htmlUrl: string;
  title: string | null;
  body: string | null;
  assignee: string | null;
}

/** The state a pull request should converge to */
export interface DesiredPullRequest {
  title: string;
  body: string;
  /** `owner:branch` */
  head: string;
  base: string;
}

/** A single CI/check report attached to a commit */
export interface StatusContext {
  context: string;
  targetUrl: string | null;
}

export interface CombinedStatus {
  state: CombinedState;
  statuses: StatusContext[];
}

/** Remote operations the reconciler and orchestrator depend on */
export interface RepositoryClient {
  createPullRequest(repo: RepoRef, desired: DesiredPullRequest): Promise<PullRequestHandle>;
  listPullRequests(repo: RepoRef, head: string, base: string): Promise<PullRequestHandle[]>;
  editPullRequest(
    repo: RepoRef,
    pullNumber: number,
    changes: { title: string; body: string },
  ): Promise<PullRequestHandle>;
  addAssignees(repo: RepoRef, pullNumber: number, assignees: string[]): Promise<void>;
  getCombinedStatus(repo: RepoRef, sha: string): Promise<CombinedStatus>;
}

/** Local git operations, scoped to a working directory */
export interface VcsGateway {
  readLastCommitSha(repoDir: string): Promise<string>;
  forcePush(repoDir: string, branchName: string): Promise<void>;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
