import { PullRequestExistsError, UnexpectedStateError } from './errors.js';
import type { RateLimiters } from './rate-limiter.js';
import type { DesiredPullRequest, PullRequestHandle, RepoRef, RepositoryClient } from './types.js';

/**
 * True only when both values are present and unequal.
 * An absent value on either side never counts as drift.
 */
export function isDrifted(current: string | null, desired: string | null): boolean {
  return current !== null && desired !== null && current !== desired;
}

/**
 * Find the open pull request for `desired.head` against `desired.base`, or create it,
 * then bring its title and body in line with `desired`.
 *
 * Creation is attempted first; GitHub's "already exists" refusal is what
 * routes to the lookup path, so a second PR is never opened for the same
 * head/base pair. The lookup must find exactly one PR.
 *
 * Nothing is retried here. Re-running the whole call is safe.
 */
export async function reconcilePullRequest(
  client: RepositoryClient,
  repo: RepoRef,
  desired: DesiredPullRequest,
  limiters: RateLimiters,
): Promise<PullRequestHandle> {
  await limiters.push.acquire();
  await limiters.api.acquire();

  try {
    return await client.createPullRequest(repo, desired);
  } catch (error: unknown) {
    if (!(error instanceof PullRequestExistsError)) {
      throw error;
    }
  }

  await limiters.api.acquire();
  const matches = await client.listPullRequests(repo, desired.head, desired.base);
  if (matches.length !== 1) {
    throw new UnexpectedStateError(
      `Expected exactly one open pull request for ${desired.head} -> ${desired.base}, found ${matches.length}`,
    );
  }
  const [existing] = matches;

  if (!isDrifted(existing.title, desired.title) && !isDrifted(existing.body, desired.body)) {
    return existing;
  }

  await limiters.api.acquire();
  return client.editPullRequest(repo, existing.number, {
    title: desired.title,
    body: desired.body,
  });
}
