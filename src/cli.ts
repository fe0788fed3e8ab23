#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import pc from 'picocolors';
import { loadConfig } from './config.js';
import { EXIT_INVALID_INPUT, EXIT_PREREQ, InvalidRequestError, exitCodeFor, sanitizeError, scrubSecrets } from './errors.js';
import { createGitGateway } from './git.js';
import { createOctokit, createRepositoryClient } from './github.js';
import {
  formatDuration,
  formatFailureDetail,
  printDebug,
  printErrors,
  printProgress,
  printProgressDone,
  printPublishResult,
} from './output.js';
import { checkPrerequisites } from './prerequisites.js';
import { publish, type PublishState } from './publisher.js';
import type { Config } from './schemas.js';
import type { RepositoryClient } from './types.js';
import { createRateLimiters, unlimitedRateLimiter, type RateLimiters } from './rate-limiter.js';

interface CliOptions {
  owner: string;
  repo: string;
  branch: string;
  assignee: string;
  message?: string;
  messageFile?: string;
  body?: string;
  bodyFile?: string;
  dir: string;
  ciContext?: string;
  apiInterval?: string;
  pushInterval?: string;
  rateLimit: boolean;
  json?: boolean;
  verbose?: boolean;
}

/** Inline text wins over a file; returns undefined when neither is given */
function readTextOption(inline: string | undefined, file: string | undefined): string | undefined {
  if (inline !== undefined) return inline;
  if (file === undefined) return undefined;
  return readFileSync(file, 'utf-8');
}

function fail(message: string, code: number): never {
  console.error(pc.red('\u2716 ' + message));
  process.exit(code);
}

/** Settings, commit message and body override; exits on invalid input */
function loadInputs(options: CliOptions): { config: Config; commitMessage: string; body?: string } {
  try {
    const config = loadConfig(process.env, {
      apiInterval: options.apiInterval,
      pushInterval: options.pushInterval,
      ciContext: options.ciContext,
    });
    const commitMessage = readTextOption(options.message, options.messageFile);
    if (commitMessage === undefined) {
      throw new InvalidRequestError('One of --message or --message-file is required');
    }
    return { config, commitMessage, body: readTextOption(options.body, options.bodyFile) };
  } catch (error: unknown) {
    fail(sanitizeError(error), EXIT_INVALID_INPUT);
  }
}

function createClient(token: string | undefined): RepositoryClient {
  try {
    return createRepositoryClient(createOctokit(token));
  } catch (error: unknown) {
    fail('Could not get a GitHub token: ' + sanitizeError(error), EXIT_PREREQ);
  }
}

const program = new Command();

program
  .name('pr-publish')
  .description('Push the latest commit and open or update its GitHub pull request')
  .version('0.1.0')
  .requiredOption('--owner <owner>', 'Repository owner')
  .requiredOption('--repo <name>', 'Repository name, without the owner')
  .requiredOption('--branch <branch>', 'Branch to push and open the pull request from')
  .requiredOption('--assignee <login>', 'User to assign the pull request to')
  .option('--message <text>', 'Commit message: first line is the PR title, the rest its body')
  .option('--message-file <path>', 'Read the commit message from a file')
  .option('--body <text>', 'PR body; replaces the body taken from the commit message')
  .option('--body-file <path>', 'Read the PR body from a file')
  .option('--dir <path>', 'Local git working copy', '.')
  .option('--ci-context <name>', 'Status context reported as the CI build (default: ci/circleci)')
  .option('--api-interval <ms>', 'Minimum milliseconds between GitHub API calls')
  .option('--push-interval <ms>', 'Minimum milliseconds between pull request creations')
  .option('--no-rate-limit', 'Disable both rate limiters')
  .option('--json', 'Print the result as JSON')
  .option('--verbose', 'Show debug info: state transitions and timing')
  .action(async (options: CliOptions) => {
    // 1. Configuration
    const { config, commitMessage, body } = loadInputs(options);

    // 2. Prerequisites (collect all failures, report at once)
    const failures = checkPrerequisites(config.token !== undefined);
    if (failures.length > 0) {
      printErrors(failures);
      process.exit(EXIT_PREREQ);
    }
    const client = createClient(config.token);

    const limiters: RateLimiters = options.rateLimit
      ? createRateLimiters(config.apiIntervalMs, config.pushIntervalMs)
      : { api: unlimitedRateLimiter, push: unlimitedRateLimiter };

    // 3. Publish
    const transitions: Array<{ state: PublishState; detail: string; at: number }> = [];
    const start = performance.now();
    if (!options.json) {
      printProgress(`Publishing ${options.branch}...`);
    }
    const outcome = await publish(
      {
        repoOwner: options.owner,
        repoName: options.repo,
        branchName: options.branch,
        commitMessage,
        body,
        assignee: options.assignee,
        repoDir: path.resolve(options.dir),
      },
      {
        vcs: createGitGateway(),
        client,
        limiters,
        ciContext: config.ciContext,
        onTransition: (state, detail) => {
          transitions.push({ state, detail, at: performance.now() - start });
        },
      },
    );

    if (!options.json) {
      if (outcome.ok) {
        printProgressDone();
      } else {
        console.log(); // newline after progress message
      }
    }

    if (options.verbose) {
      for (const t of transitions) {
        printDebug(`${formatDuration(t.at)} ${t.state}: ${scrubSecrets(t.detail)}`);
      }
    }

    // 4. Report
    if (options.json) {
      console.log(JSON.stringify(outcome.result, null, 2));
    } else if (outcome.ok) {
      printPublishResult(outcome.result);
    }

    if (!outcome.ok) {
      console.error(pc.red(`\u2716 Publish failed after state '${outcome.lastState}'`));
      console.error(pc.dim('  ' + sanitizeError(outcome.error)));
      const detail = formatFailureDetail(outcome.error);
      if (options.verbose && detail) {
        printDebug(scrubSecrets(detail));
      }
      process.exit(exitCodeFor(outcome.error));
    }
  });

await program.parseAsync();
