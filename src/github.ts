import { execFileSync } from 'node:child_process';
import { Octokit } from '@octokit/rest';
import { PullRequestExistsError, RemoteApiError } from './errors.js';
import { OctokitErrorSchema, ValidationFailedBodySchema, parseCombinedState } from './schemas.js';
import type {
  CombinedStatus,
  DesiredPullRequest,
  PullRequestHandle,
  RepoRef,
  RepositoryClient,
} from './types.js';

/**
 * Get a GitHub auth token from the gh CLI.
 * Used only when no token is set in the environment.
 */
function getGhToken(): string {
  const token = execFileSync('gh', ['auth', 'token'], {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();

  if (!token) {
    throw new Error('gh auth token returned empty string');
  }

  return token;
}

/**
 * Create an authenticated Octokit instance.
 * Prefers the configured token and falls back to the gh CLI.
 */
export function createOctokit(token?: string): Octokit {
  return new Octokit({ auth: token ?? getGhToken() });
}

/** The subset of a REST pull request payload we read */
interface PullRequestPayload {
  number: number;
  html_url: string;
  title: string;
  body: string | null;
  head: { sha: string };
  assignee?: { login: string } | null;
}

function toHandle(pr: PullRequestPayload): PullRequestHandle {
  return {
    number: pr.number,
    headSha: pr.head.sha,
    htmlUrl: pr.html_url,
    title: pr.title,
    body: pr.body,
    assignee: pr.assignee?.login ?? null,
  };
}

/**
 * Decide whether a create-PR failure means "a PR for this head/base is already open".
 *
 * GitHub answers with a 422 whose validation errors say
 * "A pull request already exists for owner:branch." The structured errors
 * array is checked first; the message text only when the response body is
 * unavailable.
 */
export function isAlreadyExistsError(error: unknown): boolean {
  const parsed = OctokitErrorSchema.safeParse(error);
  if (!parsed.success || parsed.data.status !== 422) return false;

  const body = ValidationFailedBodySchema.safeParse(parsed.data.response?.data);
  if (body.success) {
    return body.data.errors.some((e) => {
      const message = typeof e === 'string' ? e : e.message;
      return message?.includes('already exists') ?? false;
    });
  }
  return parsed.data.message?.includes('already exists') ?? false;
}

function toRemoteError(operation: string, error: unknown): RemoteApiError {
  const parsed = OctokitErrorSchema.safeParse(error);
  const status = parsed.success ? parsed.data.status : null;
  const detail = error instanceof Error ? error.message : String(error);
  return new RemoteApiError(`${operation} failed: ${detail}`, status, { cause: error });
}

async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    throw toRemoteError(operation, error);
  }
}

/**
 * Repository client backed by the GitHub REST API.
 *
 * Every failure surfaces as a RemoteApiError; an "already exists" refusal on
 * create surfaces as the more specific PullRequestExistsError.
 */
export function createRepositoryClient(octokit: Octokit): RepositoryClient {
  return {
    async createPullRequest(repo: RepoRef, desired: DesiredPullRequest): Promise<PullRequestHandle> {
      try {
        const response = await octokit.pulls.create({
          owner: repo.owner,
          repo: repo.repo,
          title: desired.title,
          body: desired.body,
          head: desired.head,
          base: desired.base,
        });
        return toHandle(response.data);
      } catch (error: unknown) {
        if (isAlreadyExistsError(error)) {
          throw new PullRequestExistsError(`A pull request already exists for ${desired.head}`, { cause: error });
        }
        throw toRemoteError('Create pull request', error);
      }
    },

    listPullRequests: (repo, head, base) =>
      call('List pull requests', async () => {
        const response = await octokit.pulls.list({
          owner: repo.owner,
          repo: repo.repo,
          state: 'open',
          head,
          base,
        });
        return response.data.map(toHandle);
      }),

    editPullRequest: (repo, pullNumber, changes) =>
      call('Edit pull request', async () => {
        const response = await octokit.pulls.update({
          owner: repo.owner,
          repo: repo.repo,
          pull_number: pullNumber,
          title: changes.title,
          body: changes.body,
        });
        return toHandle(response.data);
      }),

    addAssignees: (repo, pullNumber, assignees) =>
      call('Add assignees', async () => {
        await octokit.issues.addAssignees({
          owner: repo.owner,
          repo: repo.repo,
          issue_number: pullNumber,
          assignees,
        });
      }),

    getCombinedStatus: (repo, sha): Promise<CombinedStatus> =>
      call('Get combined status', async () => {
        const response = await octokit.repos.getCombinedStatusForRef({
          owner: repo.owner,
          repo: repo.repo,
          ref: sha,
        });
        return {
          state: parseCombinedState(response.data.state),
          statuses: response.data.statuses.map((s) => ({
            context: s.context,
            targetUrl: s.target_url,
          })),
        };
      }),
  };
}
