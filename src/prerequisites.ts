import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/**
 * Check all prerequisites and collect failures.
 *
 * Checks in order: git CLI existence, then GitHub credentials. When no token
 * is configured, the gh CLI must exist and be authenticated.
 * All failures are collected and returned at once (not fail-fast).
 */
export function checkPrerequisites(hasToken: boolean): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  // 1. Check git exists
  try {
    execFileSync(whichCmd, ['git'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'git',
      message: 'git not found',
      help: 'Install it: https://git-scm.com/downloads',
    });
  }

  if (hasToken) {
    return failures;
  }

  // 2. No token configured: fall back to gh
  let ghExists = false;
  try {
    execFileSync(whichCmd, ['gh'], { stdio: 'pipe' });
    ghExists = true;
  } catch {
    failures.push({
      name: 'gh',
      message: 'No GitHub token set and gh CLI not found',
      help: 'Set GITHUB_API_TOKEN, or install gh: https://cli.github.com',
    });
  }

  // 3. If gh exists, check authentication
  if (ghExists) {
    try {
      execFileSync('gh', ['auth', 'status'], { stdio: 'pipe' });
    } catch {
      failures.push({
        name: 'gh-auth',
        message: 'No GitHub token set and gh CLI is not authenticated',
        help: 'Set GITHUB_API_TOKEN, or run: gh auth login',
      });
    }
  }

  return failures;
}
