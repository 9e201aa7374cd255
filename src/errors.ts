export type ErrorCategory = 'validation' | 'resolution' | 'auth' | 'client' | 'precondition' | 'git';

export type ResolutionErrorKind = 'UnrecognizedHost' | 'InvalidRemoteUrl';
export type AuthErrorKind = 'NotLoggedIn' | 'TokenExpired' | 'Forbidden';
export type ClientErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'RateLimited'
  | 'NetworkError'
  | 'MalformedResponse'
  | 'ServerError'
  | 'Unsupported';
export type PreconditionErrorKind = 'BranchNotPushed' | 'DirtyWorkingTree' | 'BehindRemote';
export type GitErrorKind = 'NotARepository' | 'DetachedHead' | 'NoRemote' | 'ProcessFailure';
export type ValidationErrorKind = 'InvalidInput';

/**
 * Base class for every error the CLI knows how to report.
 * `category` selects the exit code, `kind` the precise failure inside the category.
 */
export abstract class GitportError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends GitportError {
  readonly category = 'validation';
  readonly kind: ValidationErrorKind = 'InvalidInput';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ResolutionError extends GitportError {
  readonly category = 'resolution';

  constructor(
    readonly kind: ResolutionErrorKind,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }
}

export class AuthError extends GitportError {
  readonly category = 'auth';

  constructor(
    readonly kind: AuthErrorKind,
    message: string,
    readonly host?: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * A failure reported by (or while talking to) the hosting provider.
 * Only network failures and gateway errors are marked retryable.
 */
export class ClientError extends GitportError {
  readonly category = 'client';

  constructor(
    readonly kind: ClientErrorKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    Object.setPrototypeOf(this, ClientError.prototype);
  }

  get retryable(): boolean {
    if (this.kind === 'NetworkError') return true;
    return this.kind === 'ServerError' && this.status !== undefined && RETRYABLE_STATUSES.has(this.status);
  }
}

const RETRYABLE_STATUSES = new Set([502, 503, 504]);

export class PreconditionError extends GitportError {
  readonly category = 'precondition';

  constructor(
    readonly kind: PreconditionErrorKind,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }
}

export class GitError extends GitportError {
  readonly category = 'git';

  constructor(
    readonly kind: GitErrorKind,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

const EXIT_CODES: Record<ErrorCategory, number> = {
  validation: 2,
  resolution: 3,
  auth: 4,
  precondition: 5,
  client: 6,
  git: 7,
};

export function exitCodeFor(error: unknown): number {
  return error instanceof GitportError ? EXIT_CODES[error.category] : 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
