import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  formatFailureDetail,
  formatPublishResult,
  printPublishResult,
  printErrors,
  printDebug,
  formatDuration,
} from '../src/output.js';
import { LocalVcsError, RemoteApiError, UnexpectedStateError } from '../src/errors.js';
import type { PrereqFailure, PublishResult } from '../src/types.js';

const baseResult: PublishResult = {
  success: true,
  commitSha: 'abc123',
  pullRequestNumber: 7,
  pullRequestUrl: 'https://github.com/octo/widgets/pull/7',
  pullRequestCombinedStatus: 'success',
  pullRequestAssignee: 'hubot',
  ciBuildUrl: '',
};

describe('formatPublishResult', () => {
  it('renders a successful result with its CI build URL', () => {
    const line = formatPublishResult({ ...baseResult, ciBuildUrl: 'https://circleci.com/gh/octo/widgets/42' });
    expect(line).toBe(
      'status:✅  assignee:hubot https://github.com/octo/widgets/pull/7 https://circleci.com/gh/octo/widgets/42',
    );
  });

  it('omits the CI URL when there is none', () => {
    expect(formatPublishResult(baseResult)).toBe('status:✅  assignee:hubot https://github.com/octo/widgets/pull/7');
  });

  it('uses the clock glyph for pending', () => {
    const line = formatPublishResult({ ...baseResult, pullRequestCombinedStatus: 'pending' });
    expect(line.startsWith('status:\u{1F550}  ')).toBe(true);
  });

  it('uses the cross glyph for failure', () => {
    const line = formatPublishResult({ ...baseResult, pullRequestCombinedStatus: 'failure' });
    expect(line.startsWith('status:❌  ')).toBe(true);
  });

  it('uses a question mark for an unknown state', () => {
    const line = formatPublishResult({ ...baseResult, pullRequestCombinedStatus: 'unknown' });
    expect(line.startsWith('status:?  ')).toBe(true);
  });
});

describe('printPublishResult', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('prints the one-line rendering', () => {
    printPublishResult(baseResult);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toBe('status:✅  assignee:hubot https://github.com/octo/widgets/pull/7');
  });
});

describe('printErrors', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('prints each failure with X prefix and its help text', () => {
    const failures: PrereqFailure[] = [
      { name: 'git', message: 'git not found', help: 'Install it: https://git-scm.com/downloads' },
    ];
    printErrors(failures);
    const output = errorSpy.mock.calls.map((c) => c[0]).join('\n');
    expect(output).toContain('✖ git not found');
    expect(output).toContain('https://git-scm.com/downloads');
  });

  it('prints two lines per failure', () => {
    const failures: PrereqFailure[] = [
      { name: 'git', message: 'git not found', help: 'Install it' },
      { name: 'gh', message: 'No GitHub token set and gh CLI not found', help: 'Install it' },
    ];
    printErrors(failures);
    expect(errorSpy).toHaveBeenCalledTimes(4);
  });
});

describe('printDebug', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('prints message with [debug] prefix in a single call', () => {
    printDebug('0.4s pushed: abc123 -> origin/feature-x');
    expect(logSpy).toHaveBeenCalledTimes(1);
    const output = String(logSpy.mock.calls[0][0]);
    expect(output).toContain('[debug] 0.4s pushed: abc123 -> origin/feature-x');
  });
});

describe('formatDuration', () => {
  it('formats sub-60s as seconds with one decimal', () => {
    expect(formatDuration(1234)).toBe('1.2s');
  });

  it('formats exactly 0ms', () => {
    expect(formatDuration(0)).toBe('0.0s');
  });

  it('formats 60s+ as minutes and seconds', () => {
    expect(formatDuration(72_000)).toBe('1m 12s');
  });

  it('formats 60s exactly as minutes', () => {
    expect(formatDuration(60_000)).toBe('1m 0s');
  });
});

describe('formatFailureDetail', () => {
  it('names the git command behind a VCS failure', () => {
    const error = new LocalVcsError('git push -f origin HEAD:feature-x', 'error: failed to push some refs');
    expect(formatFailureDetail(error)).toBe('command: git push -f origin HEAD:feature-x');
  });

  it('gives the HTTP status of an API failure', () => {
    expect(formatFailureDetail(new RemoteApiError('Get combined status failed: Server Error', 502))).toBe(
      'HTTP status: 502',
    );
  });

  it('has nothing to add for an API failure without a response', () => {
    expect(formatFailureDetail(new RemoteApiError('socket hang up', null))).toBeNull();
  });

  it('has nothing to add for other failures', () => {
    expect(formatFailureDetail(new UnexpectedStateError('found 2'))).toBeNull();
  });
});
