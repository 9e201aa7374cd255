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

interface GiteaPullRequest {
  number: number;
  title: string;
  body?: string | null;
  state: 'open' | 'closed';
  merged?: boolean;
  mergeable?: boolean;
  html_url: string;
  head: { ref: string };
  base: { ref: string };
  user?: { login: string } | null;
  requested_reviewers?: Array<{ login: string }> | null;
  created_at: string;
  updated_at: string;
}

interface GiteaReview {
  state: string;
  stale?: boolean;
  dismissed?: boolean;
}

interface GiteaRepository {
  name: string;
  full_name: string;
  private: boolean;
  default_branch: string;
  html_url: string;
  clone_url?: string;
  ssh_url?: string;
  description?: string;
  owner: { login: string };
  parent?: { full_name: string } | null;
}

const PAGE_SIZE = 50;

/** Gitea and Forgejo instances (`/api/v1`). */
export class GiteaClient extends ProviderClient implements HostingClient {
  constructor(context: AdapterContext) {
    super('gitea', context, `https://${context.remote.host}/api/v1`, {
      Authorization: `token ${tokenOf(context.credential)}`,
    });
  }

  private get repoPath(): string {
    return `/repos/${this.remote.owner}/${this.remote.repo}`;
  }

  listPullRequests(filters: PullRequestFilters = {}): AsyncIterable<PullRequest> {
    const state = filters.state ?? 'open';
    const firstUrl = this.rest.url(`${this.repoPath}/pulls`, {
      state: state === 'open' ? 'open' : state === 'all' ? 'all' : 'closed',
      limit: PAGE_SIZE,
      page: 1,
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
            const items = this.parseList<GiteaPullRequest>('pull-request', res.data, 'list pull requests');
            const next = parseNextLink(res.headers.get('link')) ?? (items.length >= PAGE_SIZE ? followingPage(url) : undefined);
            return { items: items.map(toPullRequest), next };
          },
        }),
        filters,
      ),
    );
  }

  async getPullRequest(source: string, target?: string): Promise<PullRequest | undefined> {
    const pr = await super.getPullRequest(source, target);
    if (!pr) return undefined;
    const res = await this.rest.get(`${this.repoPath}/pulls/${pr.id}/reviews`);
    const reviews = this.parseList<GiteaReview>('review', res.data, 'list reviews');
    const isApproved = reviews.some((review) => review.state === 'APPROVED' && !review.stale && !review.dismissed);
    return { ...pr, isApproved };
  }

  async createPullRequest(params: CreatePullRequestParams): Promise<PullRequest> {
    const res = await this.rest.post(`${this.repoPath}/pulls`, {
      title: params.title,
      body: params.description,
      head: params.source,
      base: params.target,
    });
    return toPullRequest(this.parse<GiteaPullRequest>('pull-request', res.data, 'create pull request'));
  }

  async requestReviewers(id: number, usernames: string[]): Promise<void> {
    await this.rest.post(`${this.repoPath}/pulls/${id}/requested_reviewers`, { reviewers: usernames });
  }

  async approvePullRequest(id: number): Promise<void> {
    await this.rest.post(`${this.repoPath}/pulls/${id}/reviews`, { event: 'APPROVED' });
  }

  async mergePullRequest(id: number, strategy: MergeStrategy): Promise<void> {
    const res = await this.rest.get(`${this.repoPath}/pulls/${id}`);
    const pr = this.parse<GiteaPullRequest>('pull-request', res.data, 'get pull request');
    if (pr.mergeable === false) {
      throw new ClientError('Conflict', `Pull request #${id} cannot be merged cleanly`);
    }
    await this.rest.post(`${this.repoPath}/pulls/${id}/merge`, { Do: strategy });
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
    return toRepository(this.parse<GiteaRepository>('repository', res.data, 'create repository'));
  }

  async forkRepository(owner: string, name: string, params: ForkRepositoryParams = {}): Promise<RepositoryDescriptor> {
    const res = await this.rest.post(`/repos/${owner}/${name}/forks`, {
      organization: params.organization,
      name: params.name,
    });
    return toRepository(this.parse<GiteaRepository>('repository', res.data, 'fork repository'));
  }

  async deleteRepository(owner: string, name: string): Promise<void> {
    await this.rest.delete(`/repos/${owner}/${name}`);
  }

  async getRepository(owner: string, name: string): Promise<RepositoryDescriptor> {
    const res = await this.rest.get(`/repos/${owner}/${name}`);
    return toRepository(this.parse<GiteaRepository>('repository', res.data, 'get repository'));
  }

  async currentUser(): Promise<string> {
    const res = await this.rest.get('/user');
    return this.parse<{ login: string }>('user', res.data, 'get current user').login;
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.rest.delete(`${this.repoPath}/branches/${encodeURIComponent(branch)}`);
  }
}

function followingPage(current: string): string {
  const url = new URL(current);
  const page = Number.parseInt(url.searchParams.get('page') ?? '1', 10);
  url.searchParams.set('page', String((Number.isNaN(page) ? 1 : page) + 1));
  return url.toString();
}

function toPullRequest(pr: GiteaPullRequest): PullRequest {
  return {
    id: pr.number,
    title: pr.title,
    description: pr.body || undefined,
    sourceBranch: pr.head.ref,
    targetBranch: pr.base.ref,
    state: pr.merged ? 'merged' : pr.state === 'open' ? 'open' : 'declined',
    isApproved: false,
    reviewers: (pr.requested_reviewers ?? []).map((r) => r.login),
    url: pr.html_url,
    author: pr.user?.login,
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
  };
}

function toRepository(repo: GiteaRepository): RepositoryDescriptor {
  return {
    owner: repo.owner.login,
    name: repo.name,
    fullName: repo.full_name,
    isPrivate: repo.private,
    defaultBranch: repo.default_branch,
    url: repo.html_url,
    cloneUrl: repo.clone_url,
    sshUrl: repo.ssh_url,
    description: repo.description || undefined,
    forkedFrom: repo.parent?.full_name,
  };
}
