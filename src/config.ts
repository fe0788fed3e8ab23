import { InvalidRequestError } from './errors.js';
import { ConfigSchema, describeIssue, type Config } from './schemas.js';

/** CLI flags that override environment settings */
export interface ConfigOverrides {
  apiInterval?: string;
  pushInterval?: string;
  ciContext?: string;
}

/** Treat an empty variable the same as an unset one */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve settings from the environment, with CLI flags taking precedence.
 *
 * - GITHUB_API_TOKEN, then GITHUB_TOKEN: API token (gh CLI is the fallback when neither is set)
 * - PR_PUBLISH_API_INTERVAL_MS: minimum gap between GitHub API calls
 * - PR_PUBLISH_PUSH_INTERVAL_MS: minimum gap between pull request creations
 * - PR_PUBLISH_CI_CONTEXT: status context reported as the CI build
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): Config {
  const parsed = ConfigSchema.safeParse({
    token: envValue(env, 'GITHUB_API_TOKEN') ?? envValue(env, 'GITHUB_TOKEN'),
    apiIntervalMs: overrides.apiInterval ?? envValue(env, 'PR_PUBLISH_API_INTERVAL_MS'),
    pushIntervalMs: overrides.pushInterval ?? envValue(env, 'PR_PUBLISH_PUSH_INTERVAL_MS'),
    ciContext: overrides.ciContext ?? envValue(env, 'PR_PUBLISH_CI_CONTEXT'),
  });

  if (!parsed.success) {
    throw new InvalidRequestError(`Invalid configuration: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}
