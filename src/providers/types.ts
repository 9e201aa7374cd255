export const PROVIDER_KINDS = [
  'github',
  'github-enterprise',
  'gitlab',
  'gitlab-self-hosted',
  'bitbucket',
  'gitea',
] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

/** A repository on a hosting service, as derived from the local remote URL. */
export interface Remote {
  host: string;
  /** May contain `/` for nested GitLab groups. */
  owner: string;
  repo: string;
  provider: ProviderKind;
}

export type CredentialSecret =
  | { kind: 'token'; token: string }
  | { kind: 'basic'; username: string; password: string };

export interface Credential {
  host: string;
  provider: ProviderKind;
  secret: CredentialSecret;
}

export type PullRequestState = 'open' | 'merged' | 'declined';

export interface PullRequest {
  id: number;
  title: string;
  description?: string;
  sourceBranch: string;
  targetBranch: string;
  state: PullRequestState;
  isApproved: boolean;
  reviewers: string[];
  url: string;
  author?: string;
  createdAt: string;
  updatedAt: string;
}

export interface RepositoryDescriptor {
  owner: string;
  name: string;
  fullName: string;
  isPrivate: boolean;
  defaultBranch: string;
  url: string;
  cloneUrl?: string;
  sshUrl?: string;
  description?: string;
  forkedFrom?: string;
}

export type PullRequestStateFilter = PullRequestState | 'all';

export interface PullRequestFilters {
  state?: PullRequestStateFilter;
  source?: string;
  target?: string;
  author?: string;
}

export interface CreatePullRequestParams {
  title: string;
  description?: string;
  source: string;
  target: string;
  /** GitLab and Bitbucket drop the source branch on merge; GitHub and Gitea have no such flag. */
  closeSourceBranch?: boolean;
}

export type MergeStrategy = 'merge' | 'squash' | 'rebase';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['merge', 'squash', 'rebase'];

export interface CreateRepositoryParams {
  name: string;
  isPrivate: boolean;
  organization?: string;
  description?: string;
  /** Create an initial commit so the default branch exists. */
  init?: boolean;
}

export interface ForkRepositoryParams {
  organization?: string;
  name?: string;
}

/**
 * The uniform surface every hosting backend implements.
 * Errors are always thrown as `AuthError` or `ClientError`.
 */
export interface HostingClient {
  readonly remote: Remote;

  /** Lazy and restartable: every iteration starts from the first page. */
  listPullRequests(filters?: PullRequestFilters): AsyncIterable<PullRequest>;
  /** Latest-updated open pull request for the branch pair, if any. */
  getPullRequest(source: string, target?: string): Promise<PullRequest | undefined>;
  createPullRequest(params: CreatePullRequestParams): Promise<PullRequest>;
  requestReviewers(id: number, usernames: string[]): Promise<void>;
  approvePullRequest(id: number): Promise<void>;
  mergePullRequest(id: number, strategy: MergeStrategy): Promise<void>;
  declinePullRequest(id: number): Promise<void>;

  createRepository(params: CreateRepositoryParams): Promise<RepositoryDescriptor>;
  forkRepository(owner: string, name: string, params?: ForkRepositoryParams): Promise<RepositoryDescriptor>;
  deleteRepository(owner: string, name: string): Promise<void>;
  getRepository(owner: string, name: string): Promise<RepositoryDescriptor>;

  currentUser(): Promise<string>;
  deleteBranch(branch: string): Promise<void>;
}

export interface HttpOptions {
  timeoutMs: number;
  retries: number;
  maxPages: number;
  /** Overrides the provider's default API base URL. */
  apiUrl?: string;
}

export const DEFAULT_HTTP_OPTIONS: HttpOptions = {
  timeoutMs: 30_000,
  retries: 2,
  maxPages: 50,
};
