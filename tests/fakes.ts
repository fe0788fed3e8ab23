import { PullRequestExistsError } from '../src/errors.js';
import type { RateLimiter } from '../src/rate-limiter.js';
import type {
  CombinedStatus,
  DesiredPullRequest,
  PullRequestHandle,
  RepoRef,
  RepositoryClient,
  VcsGateway,
} from '../src/types.js';

type Operation = 'create' | 'list' | 'edit' | 'addAssignees' | 'getCombinedStatus';

interface StoredPull {
  handle: PullRequestHandle;
  head: string;
  base: string;
}

/**
 * In-memory GitHub stand-in. Enforces one open PR per head/base pair the way
 * GitHub does, and records every call in order.
 */
export class FakeRepositoryClient implements RepositoryClient {
  readonly calls: Operation[] = [];
  readonly pulls: StoredPull[] = [];
  readonly statusRequests: string[] = [];
  status: CombinedStatus = { state: 'pending', statuses: [] };
  headSha = 'abc123';
  /** Reject creation as "already exists" even when no stored PR matches */
  rejectCreateAsExisting = false;
  failures: Partial<Record<Operation, Error>> = {};
  private nextNumber = 1;

  /** Seed an open PR as if someone had created it earlier */
  seed(head: string, base: string, fields: Partial<PullRequestHandle> = {}): PullRequestHandle {
    const number = fields.number ?? this.nextNumber++;
    const handle: PullRequestHandle = {
      number,
      headSha: this.headSha,
      htmlUrl: `https://github.com/octo/widgets/pull/${number}`,
      title: null,
      body: null,
      assignee: null,
      ...fields,
    };
    this.pulls.push({ handle, head, base });
    return { ...handle };
  }

  private record(op: Operation): void {
    this.calls.push(op);
    const failure = this.failures[op];
    if (failure) throw failure;
  }

  private find(pullNumber: number): StoredPull {
    const pull = this.pulls.find((p) => p.handle.number === pullNumber);
    if (!pull) throw new Error(`no pull request #${pullNumber}`);
    return pull;
  }

  async createPullRequest(repo: RepoRef, desired: DesiredPullRequest): Promise<PullRequestHandle> {
    this.record('create');
    const exists = this.pulls.some((p) => p.head === desired.head && p.base === desired.base);
    if (exists || this.rejectCreateAsExisting) {
      throw new PullRequestExistsError(`A pull request already exists for ${desired.head}.`);
    }
    return this.seed(desired.head, desired.base, {
      htmlUrl: `https://github.com/${repo.owner}/${repo.repo}/pull/${this.nextNumber}`,
      title: desired.title,
      body: desired.body,
    });
  }

  async listPullRequests(_repo: RepoRef, head: string, base: string): Promise<PullRequestHandle[]> {
    this.record('list');
    return this.pulls.filter((p) => p.head === head && p.base === base).map((p) => ({ ...p.handle }));
  }

  async editPullRequest(
    _repo: RepoRef,
    pullNumber: number,
    changes: { title: string; body: string },
  ): Promise<PullRequestHandle> {
    this.record('edit');
    const pull = this.find(pullNumber);
    pull.handle = { ...pull.handle, ...changes };
    return { ...pull.handle };
  }

  async addAssignees(_repo: RepoRef, pullNumber: number, assignees: string[]): Promise<void> {
    this.record('addAssignees');
    const pull = this.find(pullNumber);
    pull.handle = { ...pull.handle, assignee: assignees[0] ?? null };
  }

  async getCombinedStatus(_repo: RepoRef, sha: string): Promise<CombinedStatus> {
    this.record('getCombinedStatus');
    this.statusRequests.push(sha);
    return this.status;
  }
}

export class FakeVcs implements VcsGateway {
  sha = 'abc123';
  readonly pushes: Array<{ repoDir: string; branchName: string }> = [];
  readError: Error | null = null;
  pushError: Error | null = null;

  async readLastCommitSha(_repoDir: string): Promise<string> {
    if (this.readError) throw this.readError;
    return this.sha;
  }

  async forcePush(repoDir: string, branchName: string): Promise<void> {
    if (this.pushError) throw this.pushError;
    this.pushes.push({ repoDir, branchName });
  }
}

/** Never blocks; logs each acquisition under its name */
export class RecordingLimiter implements RateLimiter {
  count = 0;

  constructor(
    private readonly name: string,
    private readonly log: string[],
  ) {}

  async acquire(): Promise<void> {
    this.count++;
    this.log.push(this.name);
  }
}

export function recordingLimiters(): { api: RecordingLimiter; push: RecordingLimiter; log: string[] } {
  const log: string[] = [];
  return { api: new RecordingLimiter('api', log), push: new RecordingLimiter('push', log), log };
}
