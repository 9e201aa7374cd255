import { ClientError } from '../errors.js';
import { ProviderClient, filterPullRequests, tokenOf, type AdapterContext } from './base.js';
import { basicAuth } from './http.js';
import { paginate, restartable, type Page } from './pagination.js';
import type {
  Credential,
  CreatePullRequestParams,
  CreateRepositoryParams,
  ForkRepositoryParams,
  HostingClient,
  MergeStrategy,
  PullRequest,
  PullRequestFilters,
  PullRequestState,
  RepositoryDescriptor,
} from './types.js';

interface BitbucketAccount {
  uuid?: string;
  nickname?: string;
  display_name?: string;
}

interface BitbucketPullRequest {
  id: number;
  title: string;
  description?: string;
  state: 'OPEN' | 'MERGED' | 'DECLINED' | 'SUPERSEDED';
  source: { branch: { name: string } };
  destination: { branch: { name: string } };
  links: { html: { href: string } };
  author?: BitbucketAccount;
  reviewers?: BitbucketAccount[];
  participants?: Array<{ approved: boolean; role?: string; user?: BitbucketAccount }>;
  created_on: string;
  updated_on: string;
}

interface BitbucketRepository {
  name: string;
  slug?: string;
  full_name: string;
  is_private: boolean;
  description?: string;
  mainbranch?: { name: string } | null;
  links: { html: { href: string }; clone?: Array<{ name: string; href: string }> };
  parent?: { full_name: string };
}

interface BitbucketPage {
  values: unknown[];
  next?: string;
}

interface BitbucketMember {
  user: { uuid: string; nickname?: string; display_name?: string };
}

const PAGE_SIZE = 50;
const STATE_QUERY: Record<PullRequestState, string> = { open: 'OPEN', merged: 'MERGED', declined: 'DECLINED' };
const MERGE_STRATEGY: Record<MergeStrategy, string> = {
  merge: 'merge_commit',
  squash: 'squash',
  rebase: 'fast_forward',
};

function authHeader(credential: Credential): string {
  const { secret } = credential;
  return secret.kind === 'basic' ? basicAuth(secret.username, secret.password) : `Bearer ${tokenOf(credential)}`;
}

/** Bitbucket Cloud (`api.bitbucket.org/2.0`), authenticated with an app password. */
export class BitbucketClient extends ProviderClient implements HostingClient {
  constructor(context: AdapterContext) {
    super('bitbucket', context, 'https://api.bitbucket.org/2.0', {
      Authorization: authHeader(context.credential),
    });
  }

  private get repoPath(): string {
    return `/repositories/${this.remote.owner}/${this.remote.repo}`;
  }

  listPullRequests(filters: PullRequestFilters = {}): AsyncIterable<PullRequest> {
    const state = filters.state ?? 'open';
    const clauses: string[] = [];
    if (state === 'all') {
      clauses.push(`(${Object.values(STATE_QUERY).map((s) => `state="${s}"`).join(' OR ')})`);
    } else {
      clauses.push(`state="${STATE_QUERY[state]}"`);
    }
    if (filters.source) clauses.push(`source.branch.name=${quoteQuery(filters.source)}`);
    if (filters.target) clauses.push(`destination.branch.name=${quoteQuery(filters.target)}`);
    const firstUrl = this.rest.url(`${this.repoPath}/pullrequests`, {
      q: clauses.join(' AND '),
      pagelen: PAGE_SIZE,
    });
    return restartable(() =>
      filterPullRequests(
        this.pages<BitbucketPullRequest, PullRequest>(firstUrl, 'pull-request', 'list pull requests', toPullRequest),
        filters,
      ),
    );
  }

  async createPullRequest(params: CreatePullRequestParams): Promise<PullRequest> {
    const res = await this.rest.post(`${this.repoPath}/pullrequests`, {
      title: params.title,
      description: params.description,
      source: { branch: { name: params.source } },
      destination: { branch: { name: params.target } },
      close_source_branch: params.closeSourceBranch ?? false,
    });
    return toPullRequest(this.parse<BitbucketPullRequest>('pull-request', res.data, 'create pull request'));
  }

  async requestReviewers(id: number, usernames: string[]): Promise<void> {
    const wanted = new Set(usernames);
    const found = new Map<string, string>();
    const members = this.pages<BitbucketMember, BitbucketMember>(
      this.rest.url(`/workspaces/${this.remote.owner}/members`, { pagelen: PAGE_SIZE }),
      'member',
      'list workspace members',
      (member) => member,
    );
    for await (const member of members) {
      const name = member.user.nickname ?? member.user.display_name;
      if (name && wanted.has(name)) found.set(name, member.user.uuid);
      if (found.size === wanted.size) break;
    }
    const missing = usernames.filter((name) => !found.has(name));
    if (missing.length > 0) {
      throw new ClientError('NotFound', `Not members of workspace ${this.remote.owner}: ${missing.join(', ')}`);
    }
    await this.rest.put(`${this.repoPath}/pullrequests/${id}`, {
      reviewers: usernames.map((name) => ({ uuid: found.get(name) })),
    });
  }

  async approvePullRequest(id: number): Promise<void> {
    await this.rest.post(`${this.repoPath}/pullrequests/${id}/approve`);
  }

  async mergePullRequest(id: number, strategy: MergeStrategy): Promise<void> {
    await this.rest.post(`${this.repoPath}/pullrequests/${id}/merge`, {
      merge_strategy: MERGE_STRATEGY[strategy],
      close_source_branch: false,
    });
  }

  async declinePullRequest(id: number): Promise<void> {
    await this.rest.post(`${this.repoPath}/pullrequests/${id}/decline`);
  }

  async createRepository(params: CreateRepositoryParams): Promise<RepositoryDescriptor> {
    if (params.init) {
      throw new ClientError('Unsupported', 'Bitbucket cannot create an initial commit for a new repository');
    }
    const workspace = params.organization ?? (await this.currentUser());
    const res = await this.rest.post(`/repositories/${workspace}/${params.name}`, {
      scm: 'git',
      is_private: params.isPrivate,
      description: params.description,
    });
    return toRepository(this.parse<BitbucketRepository>('repository', res.data, 'create repository'));
  }

  async forkRepository(owner: string, name: string, params: ForkRepositoryParams = {}): Promise<RepositoryDescriptor> {
    const res = await this.rest.post(`/repositories/${owner}/${name}/forks`, {
      name: params.name,
      workspace: params.organization ? { slug: params.organization } : undefined,
    });
    return toRepository(this.parse<BitbucketRepository>('repository', res.data, 'fork repository'));
  }

  async deleteRepository(owner: string, name: string): Promise<void> {
    await this.rest.delete(`/repositories/${owner}/${name}`);
  }

  async getRepository(owner: string, name: string): Promise<RepositoryDescriptor> {
    const res = await this.rest.get(`/repositories/${owner}/${name}`);
    return toRepository(this.parse<BitbucketRepository>('repository', res.data, 'get repository'));
  }

  async currentUser(): Promise<string> {
    const res = await this.rest.get('/user');
    return accountName(this.parse<BitbucketAccount>('user', res.data, 'get current user'));
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.rest.delete(`${this.repoPath}/refs/branches/${encodeURIComponent(branch)}`);
  }

  /** Bitbucket keeps the next-page cursor in the response body. */
  private pages<Raw, Item>(
    firstUrl: string,
    schema: string,
    context: string,
    map: (raw: Raw) => Item,
  ): AsyncGenerator<Item, void, undefined> {
    return paginate<Item>({
      firstUrl,
      origin: this.rest.origin,
      maxPages: this.rest.maxPages,
      logger: this.logger,
      fetchPage: async (url): Promise<Page<Item>> => {
        const res = await this.rest.get(url);
        const page = this.parse<BitbucketPage>('page', res.data, context);
        return { items: this.parseList<Raw>(schema, page.values, context).map(map), next: page.next };
      },
    });
  }
}

function accountName(account: BitbucketAccount): string {
  return account.nickname ?? account.display_name ?? account.uuid ?? '';
}

function toPullRequest(pr: BitbucketPullRequest): PullRequest {
  return {
    id: pr.id,
    title: pr.title,
    description: pr.description || undefined,
    sourceBranch: pr.source.branch.name,
    targetBranch: pr.destination.branch.name,
    state: pr.state === 'OPEN' ? 'open' : pr.state === 'MERGED' ? 'merged' : 'declined',
    isApproved: (pr.participants ?? []).some((p) => p.approved),
    reviewers: (pr.reviewers ?? []).map(accountName),
    url: pr.links.html.href,
    author: pr.author ? accountName(pr.author) : undefined,
    createdAt: pr.created_on,
    updatedAt: pr.updated_on,
  };
}

function toRepository(repo: BitbucketRepository): RepositoryDescriptor {
  const [owner = '', slug = repo.slug ?? repo.name] = repo.full_name.split('/');
  const clone = repo.links.clone ?? [];
  return {
    owner,
    name: slug,
    fullName: repo.full_name,
    isPrivate: repo.is_private,
    defaultBranch: repo.mainbranch?.name ?? 'main',
    url: repo.links.html.href,
    cloneUrl: clone.find((link) => link.name === 'https')?.href,
    sshUrl: clone.find((link) => link.name === 'ssh')?.href,
    description: repo.description || undefined,
    forkedFrom: repo.parent?.full_name,
  };
}

/** Quotes a value for a BBQL `q` expression. */
export function quoteQuery(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
