import { ClientError } from '../errors.js';
import { ProviderClient, filterPullRequests, tokenOf, type AdapterContext } from './base.js';
import { paginate, restartable } from './pagination.js';
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

interface GitLabMergeRequest {
  iid: number;
  title: string;
  description?: string | null;
  state: 'opened' | 'closed' | 'locked' | 'merged';
  source_branch: string;
  target_branch: string;
  web_url: string;
  has_conflicts?: boolean;
  merge_status?: string;
  author?: { username: string } | null;
  reviewers?: Array<{ username: string }>;
  created_at: string;
  updated_at: string;
}

interface GitLabProject {
  id?: number;
  path: string;
  path_with_namespace: string;
  visibility?: string;
  default_branch?: string | null;
  web_url: string;
  http_url_to_repo?: string;
  ssh_url_to_repo?: string;
  description?: string | null;
  namespace: { full_path: string };
  forked_from_project?: { path_with_namespace: string };
}

interface GitLabUser {
  id: number;
  username: string;
}

const PAGE_SIZE = 100;
const STATE_QUERY = { open: 'opened', merged: 'merged', declined: 'closed', all: 'all' } as const;

/** GitLab.com and self-managed instances (`/api/v4`). */
export class GitLabClient extends ProviderClient implements HostingClient {
  constructor(context: AdapterContext) {
    super('gitlab', context, `https://${context.remote.host}/api/v4`, {
      'PRIVATE-TOKEN': tokenOf(context.credential),
    });
  }

  private get projectPath(): string {
    return projectPath(this.remote.owner, this.remote.repo);
  }

  listPullRequests(filters: PullRequestFilters = {}): AsyncIterable<PullRequest> {
    const firstUrl = this.rest.url(`${this.projectPath}/merge_requests`, {
      state: STATE_QUERY[filters.state ?? 'open'],
      source_branch: filters.source,
      target_branch: filters.target,
      author_username: filters.author,
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
            const items = this.parseList<GitLabMergeRequest>('merge-request', res.data, 'list merge requests');
            return { items: items.map(toPullRequest), next: nextPageUrl(url, res.headers.get('x-next-page')) };
          },
        }),
        filters,
      ),
    );
  }

  async getPullRequest(source: string, target?: string): Promise<PullRequest | undefined> {
    const pr = await super.getPullRequest(source, target);
    if (!pr) return undefined;
    const res = await this.rest.get(`${this.projectPath}/merge_requests/${pr.id}/approvals`);
    const approvals = this.parse<{ approved: boolean }>('approvals', res.data, 'get approvals');
    return { ...pr, isApproved: approvals.approved };
  }

  async createPullRequest(params: CreatePullRequestParams): Promise<PullRequest> {
    const res = await this.rest.post(`${this.projectPath}/merge_requests`, {
      source_branch: params.source,
      target_branch: params.target,
      title: params.title,
      description: params.description,
      remove_source_branch: params.closeSourceBranch ?? false,
    });
    return toPullRequest(this.parse<GitLabMergeRequest>('merge-request', res.data, 'create merge request'));
  }

  async requestReviewers(id: number, usernames: string[]): Promise<void> {
    const reviewerIds: number[] = [];
    for (const username of usernames) {
      reviewerIds.push(await this.userId(username));
    }
    await this.rest.put(`${this.projectPath}/merge_requests/${id}`, { reviewer_ids: reviewerIds });
  }

  async approvePullRequest(id: number): Promise<void> {
    await this.rest.post(`${this.projectPath}/merge_requests/${id}/approve`);
  }

  async mergePullRequest(id: number, strategy: MergeStrategy): Promise<void> {
    if (strategy === 'rebase') {
      throw new ClientError('Unsupported', 'GitLab merges with the project merge method; rebase cannot be chosen per request');
    }
    const res = await this.rest.get(`${this.projectPath}/merge_requests/${id}`);
    const mr = this.parse<GitLabMergeRequest>('merge-request', res.data, 'get merge request');
    if (mr.has_conflicts || mr.merge_status === 'cannot_be_merged') {
      throw new ClientError('Conflict', `Merge request !${id} cannot be merged cleanly`);
    }
    await this.rest.put(`${this.projectPath}/merge_requests/${id}/merge`, { squash: strategy === 'squash' });
  }

  async declinePullRequest(id: number): Promise<void> {
    await this.rest.put(`${this.projectPath}/merge_requests/${id}`, { state_event: 'close' });
  }

  async createRepository(params: CreateRepositoryParams): Promise<RepositoryDescriptor> {
    const namespaceId = params.organization ? await this.namespaceId(params.organization) : undefined;
    const res = await this.rest.post('/projects', {
      name: params.name,
      path: params.name,
      namespace_id: namespaceId,
      visibility: params.isPrivate ? 'private' : 'public',
      description: params.description,
      initialize_with_readme: params.init ?? false,
    });
    return toRepository(this.parse<GitLabProject>('project', res.data, 'create project'));
  }

  async forkRepository(owner: string, name: string, params: ForkRepositoryParams = {}): Promise<RepositoryDescriptor> {
    const res = await this.rest.post(`${projectPath(owner, name)}/fork`, {
      namespace_path: params.organization,
      name: params.name,
      path: params.name,
    });
    return toRepository(this.parse<GitLabProject>('project', res.data, 'fork project'));
  }

  async deleteRepository(owner: string, name: string): Promise<void> {
    await this.rest.delete(projectPath(owner, name));
  }

  async getRepository(owner: string, name: string): Promise<RepositoryDescriptor> {
    const res = await this.rest.get(projectPath(owner, name));
    return toRepository(this.parse<GitLabProject>('project', res.data, 'get project'));
  }

  async currentUser(): Promise<string> {
    const res = await this.rest.get('/user');
    return this.parse<GitLabUser>('user', res.data, 'get current user').username;
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.rest.delete(`${this.projectPath}/repository/branches/${encodeURIComponent(branch)}`);
  }

  private async userId(username: string): Promise<number> {
    const res = await this.rest.get('/users', { username });
    const users = this.parseList<GitLabUser>('user', res.data, 'find user');
    const match = users.find((user) => user.username === username);
    if (!match) {
      throw new ClientError('NotFound', `GitLab user ${username} not found`);
    }
    return match.id;
  }

  private async namespaceId(fullPath: string): Promise<number> {
    const res = await this.rest.get(`/namespaces/${encodeURIComponent(fullPath)}`);
    return this.parse<{ id: number }>('namespace', res.data, 'get namespace').id;
  }
}

function projectPath(owner: string, name: string): string {
  return `/projects/${encodeURIComponent(`${owner}/${name}`)}`;
}

function nextPageUrl(current: string, nextPage: string | null): string | undefined {
  if (!nextPage || nextPage.trim() === '') return undefined;
  const url = new URL(current);
  url.searchParams.set('page', nextPage.trim());
  return url.toString();
}

function toPullRequest(mr: GitLabMergeRequest): PullRequest {
  return {
    id: mr.iid,
    title: mr.title,
    description: mr.description ?? undefined,
    sourceBranch: mr.source_branch,
    targetBranch: mr.target_branch,
    // `locked` is the transient state while a merge is in flight.
    state: mr.state === 'merged' ? 'merged' : mr.state === 'closed' ? 'declined' : 'open',
    isApproved: false,
    reviewers: (mr.reviewers ?? []).map((r) => r.username),
    url: mr.web_url,
    author: mr.author?.username,
    createdAt: mr.created_at,
    updatedAt: mr.updated_at,
  };
}

function toRepository(project: GitLabProject): RepositoryDescriptor {
  return {
    owner: project.namespace.full_path,
    name: project.path,
    fullName: project.path_with_namespace,
    isPrivate: project.visibility !== 'public',
    // Empty projects report no default branch yet.
    defaultBranch: project.default_branch ?? 'main',
    url: project.web_url,
    cloneUrl: project.http_url_to_repo,
    sshUrl: project.ssh_url_to_repo,
    description: project.description ?? undefined,
    forkedFrom: project.forked_from_project?.path_with_namespace,
  };
}
