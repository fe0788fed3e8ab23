import { z } from 'zod';
import type { CombinedState } from './types.js';

/** Non-blank string, passed through exactly as given */
function required(message: string) {
  return z.string().refine((s) => s.trim().length > 0, message);
}

/** Schema for a publish request; identity fields must not be blank */
export const PublishRequestSchema = z.object({
  repoOwner: required('repository owner is required'),
  repoName: required('repository name is required'),
  branchName: required('branch name is required'),
  commitMessage: z.string().min(1, 'commit message is required'),
  body: z.string().optional(),
  assignee: required('assignee is required'),
  repoDir: z.string().min(1, 'repository directory is required'),
});

/** Environment-derived settings, before CLI flags are applied */
export const ConfigSchema = z.object({
  token: z.string().min(1).optional(),
  apiIntervalMs: z.coerce.number().int().nonnegative().default(500),
  pushIntervalMs: z.coerce.number().int().nonnegative().default(5000),
  ciContext: z.string().min(1).default('ci/circleci'),
});

/** Shape of an @octokit/request-error RequestError, as far as we read it */
export const OctokitErrorSchema = z.object({
  status: z.number(),
  message: z.string().optional(),
  response: z.object({ data: z.unknown() }).optional(),
});

/** Body of a 422 "Validation Failed" response */
export const ValidationFailedBodySchema = z.object({
  errors: z.array(z.union([z.string(), z.object({ message: z.string().optional() })])),
});

/** Output captured on a failed execFile call */
export const ExecFailureSchema = z.object({
  stdout: z.string().optional(),
  stderr: z.string().optional(),
});

const CombinedStateSchema = z.enum(['failure', 'pending', 'success']);

/** Normalize a remote combined-status state; anything unrecognized is 'unknown' */
export function parseCombinedState(state: unknown): CombinedState {
  const parsed = CombinedStateSchema.safeParse(state);
  return parsed.success ? parsed.data : 'unknown';
}

/** Format the first validation issue as "path: message" */
export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'invalid input';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export type Config = z.infer<typeof ConfigSchema>;
