/** Exit code for missing prerequisites (git CLI, GitHub token) */
export const EXIT_PREREQ = 1;

/** Exit code for invalid flags, environment values or publish requests */
export const EXIT_INVALID_INPUT = 2;

/** Exit code for git command failures */
export const EXIT_VCS_ERROR = 3;

/** Exit code for GitHub API failures */
export const EXIT_API_ERROR = 4;

/** Exit code for remote state that should be impossible (duplicate PRs, missing PR) */
export const EXIT_UNEXPECTED_STATE = 5;

export type PublishErrorKind = 'invalid-request' | 'local-vcs' | 'remote-api' | 'unexpected-state';

/** Base class for every failure a publish run can end with */
export class PublishError extends Error {
  readonly kind: PublishErrorKind;

  constructor(kind: PublishErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
    this.kind = kind;
  }
}

export class InvalidRequestError extends PublishError {
  constructor(message: string) {
    super('invalid-request', message);
    this.name = 'InvalidRequestError';
  }
}

/** A git subprocess exited non-zero. The message is its combined output. */
export class LocalVcsError extends PublishError {
  readonly command: string;

  constructor(command: string, output: string, options?: { cause?: unknown }) {
    super('local-vcs', output, options);
    this.name = 'LocalVcsError';
    this.command = command;
  }
}

export class RemoteApiError extends PublishError {
  /** HTTP status, when the failure came from a response */
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super('remote-api', message, options);
    this.name = 'RemoteApiError';
    this.status = status;
  }
}

/** GitHub refused to create a PR because one is already open for the head/base pair */
export class PullRequestExistsError extends RemoteApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, options);
    this.name = 'PullRequestExistsError';
  }
}

export class UnexpectedStateError extends PublishError {
  constructor(message: string) {
    super('unexpected-state', message);
    this.name = 'UnexpectedStateError';
  }
}

const EXIT_CODES: Record<PublishErrorKind, number> = {
  'invalid-request': EXIT_INVALID_INPUT,
  'local-vcs': EXIT_VCS_ERROR,
  'remote-api': EXIT_API_ERROR,
  'unexpected-state': EXIT_UNEXPECTED_STATE,
};

export function exitCodeFor(error: PublishError): number {
  return EXIT_CODES[error.kind];
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token patterns with [REDACTED].
 * Always scrubs -- no exceptions, even in --verbose mode.
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials (git push echoes remote URLs)
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
