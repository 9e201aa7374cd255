import { ClientError } from '../errors.js';
import { ProviderClient, filterPullRequests, tokenOf, type AdapterContext } from './base.js';
import { paginate, parseNextLink, restartable } from './pagination.js';
import type {
  CreatePullRequestParams,
  CreateRepositoryParams,
  ForkRepositoryParams,
  HostingClient,
  MergeStrategy,
  PullRequest,
  PullRequestFilters,
  RepositoryDescriptor,
} from './types.js';

interface GitHubPullRequest {
  number: number;
  title: string;
  body?: string | null;
  state: 'open' | 'closed';
  merged_at?: string | null;
  mergeable?: boolean | null;
  html_url: string;
  head: { ref: string };
  base: { ref: string };
  user?: { login: string } | null;
  requested_reviewers?: Array<{ login: string }>;
  created_at: string;
  updated_at: string;
}

interface GitHubReview {
  state: string;
  user?: { login: string } | null;
}

interface GitHubRepository {
  name: string;
  full_name: string;
  private: boolean;
  default_branch: string;
  html_url: string;
  clone_url?: string;
  ssh_url?: string;
  description?: string | null;
  owner: { login: string };
  parent?: { full_name: string };
}

const PAGE_SIZE = 100;

export function githubApiBase(host: string): string {
  return host === 'github.com' ? 'https://api.github.com' : `https://${host}/api/v3`;
}

/** GitHub.com and GitHub Enterprise Server (`/api/v3`). */
export class GitHubClient extends ProviderClient implements HostingClient {
  constructor(context: AdapterContext) {
    super('github', context, githubApiBase(context.remote.host), {
      Authorization: `Bearer ${tokenOf(context.credential)}`,
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    });
  }

  private get repoPath(): string {
    return `/repos/${this.remote.owner}/${this.remote.repo}`;
  }

  listPullRequests(filters: PullRequestFilters = {}): AsyncIterable<PullRequest> {
    const state = filters.state ?? 'open';
    const firstUrl = this.rest.url(`${this.repoPath}/pulls`, {
      state: state === 'open' ? 'open' : state === 'all' ? 'all' : 'closed',
      head: filters.source ? `${this.remote.owner}:${filters.source}` : undefined,
      base: filters.target,
      per_page: PAGE_SIZE,
    });
    return restartable(() =>
      filterPullRequests(
        paginate({
          firstUrl,
          origin: this.rest.origin,
          maxPages: this.rest.maxPages,
          logger: this.logger,
          fetchPage: async (url) => {
            const res = await this.rest.get(url);
            const items = this.parseList<GitHubPullRequest>('pull-request', res.data, 'list pull requests');
            return { items: items.map(toPullRequest), next: parseNextLink(res.headers.get('link')) };
          },
        }),
        filters,
      ),
    );
  }

  async getPullRequest(source: string, target?: string): Promise<PullRequest | undefined> {
    const pr = await super.getPullRequest(source, target);
    if (!pr) return undefined;
    return { ...pr, isApproved: await this.isApproved(pr.id) };
  }

  async createPullRequest(params: CreatePullRequestParams): Promise<PullRequest> {
    const res = await this.rest.post(`${this.repoPath}/pulls`, {
      title: params.title,
      body: params.description,
      head: params.source,
      base: params.target,
    });
    return toPullRequest(this.parse<GitHubPullRequest>('pull-request', res.data, 'create pull request'));
  }

  async requestReviewers(id: number, usernames: string[]): Promise<void> {
    await this.rest.post(`${this.repoPath}/pulls/${id}/requested_reviewers`, { reviewers: usernames });
  }

  async approvePullRequest(id: number): Promise<void> {
    await this.rest.post(`${this.repoPath}/pulls/${id}/reviews`, { event: 'APPROVE' });
  }

  async mergePullRequest(id: number, strategy: MergeStrategy): Promise<void> {
    const res = await this.rest.get(`${this.repoPath}/pulls/${id}`);
    const pr = this.parse<GitHubPullRequest>('pull-request', res.data, 'get pull request');
    if (pr.mergeable === false) {
      throw new ClientError('Conflict', `Pull request #${id} cannot be merged cleanly`);
    }
    await this.rest.put(`${this.repoPath}/pulls/${id}/merge`, { merge_method: strategy });
  }

  async declinePullRequest(id: number): Promise<void> {
    await this.rest.patch(`${this.repoPath}/pulls/${id}`, { state: 'closed' });
  }

  async createRepository(params: CreateRepositoryParams): Promise<RepositoryDescriptor> {
    const path = params.organization ? `/orgs/${params.organization}/repos` : '/user/repos';
    const res = await this.rest.post(path, {
      name: params.name,
      private: params.isPrivate,
      description: params.description,
      auto_init: params.init ?? false,
    });
    return toRepository(this.parse<GitHubRepository>('repository', res.data, 'create repository'));
  }

  async forkRepository(owner: string, name: string, params: ForkRepositoryParams = {}): Promise<RepositoryDescriptor> {
    const res = await this.rest.post(`/repos/${owner}/${name}/forks`, {
      organization: params.organization,
      name: params.name,
    });
    return toRepository(this.parse<GitHubRepository>('repository', res.data, 'fork repository'));
  }

  async deleteRepository(owner: string, name: string): Promise<void> {
    await this.rest.delete(`/repos/${owner}/${name}`);
  }

  async getRepository(owner: string, name: string): Promise<RepositoryDescriptor> {
    const res = await this.rest.get(`/repos/${owner}/${name}`);
    return toRepository(this.parse<GitHubRepository>('repository', res.data, 'get repository'));
  }

  async currentUser(): Promise<string> {
    const res = await this.rest.get('/user');
    return this.parse<{ login: string }>('user', res.data, 'get current user').login;
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.rest.delete(`${this.repoPath}/git/refs/heads/${encodeURIComponent(branch)}`);
  }

  /** Approved when some reviewer's latest verdict is an approval, across every page of reviews. */
  private async isApproved(id: number): Promise<boolean> {
    const reviews = paginate({
      firstUrl: this.rest.url(`${this.repoPath}/pulls/${id}/reviews`, { per_page: PAGE_SIZE }),
      origin: this.rest.origin,
      maxPages: this.rest.maxPages,
      logger: this.logger,
      fetchPage: async (url) => {
        const res = await this.rest.get(url);
        const items = this.parseList<GitHubReview>('review', res.data, 'list reviews');
        return { items, next: parseNextLink(res.headers.get('link')) };
      },
    });
    const latest = new Map<string, string>();
    for await (const review of reviews) {
      if (review.state === 'COMMENTED' || review.state === 'PENDING') continue;
      latest.set(review.user?.login ?? '', review.state);
    }
    return Array.from(latest.values()).includes('APPROVED');
  }
}

function toPullRequest(pr: GitHubPullRequest): PullRequest {
  return {
    id: pr.number,
    title: pr.title,
    description: pr.body ?? undefined,
    sourceBranch: pr.head.ref,
    targetBranch: pr.base.ref,
    state: pr.merged_at ? 'merged' : pr.state === 'open' ? 'open' : 'declined',
    isApproved: false,
    reviewers: (pr.requested_reviewers ?? []).map((r) => r.login),
    url: pr.html_url,
    author: pr.user?.login,
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
  };
}

function toRepository(repo: GitHubRepository): RepositoryDescriptor {
  return {
    owner: repo.owner.login,
    name: repo.name,
    fullName: repo.full_name,
    isPrivate: repo.private,
    defaultBranch: repo.default_branch,
    url: repo.html_url,
    cloneUrl: repo.clone_url,
    sshUrl: repo.ssh_url,
    description: repo.description ?? undefined,
    forkedFrom: repo.parent?.full_name,
  };
}
