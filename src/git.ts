import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import { InvalidRequestError, LocalVcsError } from './errors.js';
import { ExecFailureSchema } from './schemas.js';
import type { VcsGateway } from './types.js';

const execFile = promisify(execFileCb);

/** Push timeout: 2 minutes */
const PUSH_TIMEOUT_MS = 120_000;

/** Remote every branch is pushed to */
const REMOTE = 'origin';

/**
 * Validate a value is safe for use as a git argument. A rejected value is
 * bad input, not a git failure.
 * Rejects a leading dash (git flag injection), `..` (not a valid ref
 * component), null bytes and whitespace.
 */
export function validateGitArg(value: string, label: string): void {
  if (!value) {
    throw new InvalidRequestError(`${label} is empty.`);
  }
  if (value.startsWith('-')) {
    throw new InvalidRequestError(`${label} '${value}' starts with a dash.`);
  }
  if (value.includes('..')) {
    throw new InvalidRequestError(`${label} '${value}' contains '..'.`);
  }
  if (value.includes('\0') || /\s/.test(value)) {
    throw new InvalidRequestError(`${label} contains whitespace or a null byte.`);
  }
}

/** Stdout then stderr of a failed subprocess (not interleaved), or its message when neither was captured */
function combinedOutput(error: unknown): string {
  const parsed = ExecFailureSchema.safeParse(error);
  const output = parsed.success ? `${parsed.data.stdout ?? ''}${parsed.data.stderr ?? ''}` : '';
  if (output) return output;
  return error instanceof Error ? error.message : String(error);
}

async function git(args: string[], cwd: string, timeout?: number): Promise<string> {
  const command = `git ${args.join(' ')}`;
  try {
    const p = execFile('git', args, { cwd, encoding: 'utf-8', timeout });
    // Never wait on a credential prompt
    p.child.stdin?.end();
    const { stdout } = await p;
    return stdout;
  } catch (error: unknown) {
    throw new LocalVcsError(command, combinedOutput(error), { cause: error });
  }
}

/**
 * Read the SHA of the most recent commit in `repoDir`.
 */
export async function readLastCommitSha(repoDir: string): Promise<string> {
  const stdout = await git(['log', '-1', '--pretty=format:%H'], repoDir);
  return stdout.trim();
}

/**
 * Force-push HEAD to `origin/<branchName>`, overwriting whatever is there.
 * Re-running after a partial failure is safe.
 */
export async function forcePush(repoDir: string, branchName: string): Promise<void> {
  validateGitArg(branchName, 'Branch name');
  await git(['push', '-f', REMOTE, `HEAD:${branchName}`], repoDir, PUSH_TIMEOUT_MS);
}

/** VCS gateway backed by the git CLI */
export function createGitGateway(): VcsGateway {
  return { readLastCommitSha, forcePush };
}
