import { describe, expect, it } from 'vitest';
import { GitHubClient, githubApiBase } from '../../src/providers/github.js';
import { collect } from '../../src/providers/selection.js';
import type { AdapterContext } from '../../src/providers/index.js';
import { FakeHost, TEST_HTTP } from '../helpers/fake-host.js';

const PULLS = '/repos/acme/tools/pulls';

function context(host: FakeHost, overrides: Partial<AdapterContext> = {}): AdapterContext {
  return {
    remote: { host: 'github.com', owner: 'acme', repo: 'tools', provider: 'github' },
    credential: { host: 'github.com', provider: 'github', secret: { kind: 'token', token: 'test-token' } },
    http: TEST_HTTP,
    fetch: host.fetch,
    retryDelayMs: 0,
    ...overrides,
  };
}

function ghPull(number: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number,
    title: `Change ${number}`,
    body: null,
    state: 'open',
    merged_at: null,
    html_url: `https://github.com/acme/tools/pull/${number}`,
    head: { ref: 'feature' },
    base: { ref: 'main' },
    user: { login: 'alice' },
    requested_reviewers: [],
    created_at: '2024-05-01T09:00:00Z',
    updated_at: '2024-05-01T09:00:00Z',
    ...overrides,
  };
}

const REPO = {
  name: 'tools',
  full_name: 'acme/tools',
  private: true,
  default_branch: 'develop',
  html_url: 'https://github.com/acme/tools',
  clone_url: 'https://github.com/acme/tools.git',
  ssh_url: 'git@github.com:acme/tools.git',
  description: null,
  owner: { login: 'acme' },
};

describe('GitHubClient', () => {
  it('resolves the API base for github.com and Enterprise hosts', () => {
    expect(githubApiBase('github.com')).toBe('https://api.github.com');
    expect(githubApiBase('github.acme.dev')).toBe('https://github.acme.dev/api/v3');
  });

  it('finds the latest-updated open pull request and its approval', async () => {
    const host = new FakeHost()
      .on('GET', PULLS, {
        body: [
          ghPull(7, { updated_at: '2024-05-01T09:00:00Z' }),
          ghPull(9, { updated_at: '2024-05-03T09:00:00Z', requested_reviewers: [{ login: 'bob' }] }),
        ],
      })
      .on('GET', `${PULLS}/9/reviews`, {
        body: [
          { state: 'APPROVED', user: { login: 'bob' } },
          { state: 'COMMENTED', user: { login: 'carol' } },
        ],
      });

    const pr = await new GitHubClient(context(host)).getPullRequest('feature');

    expect(pr).toMatchObject({ id: 9, state: 'open', isApproved: true, reviewers: ['bob'], author: 'alice' });
    const query = new URL(host.sent(PULLS)[0].url).searchParams;
    expect(query.get('head')).toBe('acme:feature');
    expect(query.get('state')).toBe('open');
    expect(host.sent(PULLS)[0].headers['authorization']).toBe('Bearer test-token');
  });

  it("uses each reviewer's latest verdict", async () => {
    const host = new FakeHost()
      .on('GET', PULLS, { body: [ghPull(3)] })
      .on('GET', `${PULLS}/3/reviews`, {
        body: [
          { state: 'APPROVED', user: { login: 'bob' } },
          { state: 'CHANGES_REQUESTED', user: { login: 'bob' } },
        ],
      });

    expect((await new GitHubClient(context(host)).getPullRequest('feature'))?.isApproved).toBe(false);
  });

  it('returns undefined when no open pull request matches', async () => {
    const host = new FakeHost().on('GET', PULLS, { body: [] });

    expect(await new GitHubClient(context(host)).getPullRequest('feature')).toBeUndefined();
    expect(host.requests).toHaveLength(1);
  });

  it('normalizes closed pull requests to merged or declined', async () => {
    const host = new FakeHost().on('GET', PULLS, {
      body: [
        ghPull(1, { state: 'closed', merged_at: '2024-05-02T00:00:00Z' }),
        ghPull(2, { state: 'closed' }),
        ghPull(3),
      ],
    });

    const prs = await collect(new GitHubClient(context(host)).listPullRequests({ state: 'all' }));

    expect(prs.map((pr) => [pr.id, pr.state])).toEqual([
      [1, 'merged'],
      [2, 'declined'],
      [3, 'open'],
    ]);
  });

  it('follows Link headers and stops on a repeated cursor', async () => {
    const next = 'https://api.github.com/repositories/42/pulls?page=2';
    const host = new FakeHost()
      .on('GET', PULLS, { body: [ghPull(1)], headers: { link: `<${next}>; rel="next"` } })
      .on('GET', '/repositories/42/pulls', { body: [ghPull(2)], headers: { link: `<${next}>; rel="next"` } });

    const prs = await collect(new GitHubClient(context(host)).listPullRequests());

    expect(prs.map((pr) => pr.id)).toEqual([1, 2]);
    expect(host.requests).toHaveLength(2);
  });

  it('ignores a next link on another origin', async () => {
    const host = new FakeHost().on('GET', PULLS, {
      body: [ghPull(1)],
      headers: { link: '<https://elsewhere.example.net/pulls?page=2>; rel="next"' },
    });

    const prs = await collect(new GitHubClient(context(host)).listPullRequests());

    expect(prs.map((pr) => pr.id)).toEqual([1]);
    expect(host.requests).toHaveLength(1);
  });

  it('creates a pull request', async () => {
    const host = new FakeHost().on('POST', PULLS, { status: 201, body: ghPull(12, { title: 'T' }) });

    const pr = await new GitHubClient(context(host)).createPullRequest({
      title: 'T',
      source: 'feature',
      target: 'main',
    });

    expect(pr).toMatchObject({ id: 12, title: 'T', state: 'open' });
    expect(host.requests[0].body).toEqual({ title: 'T', head: 'feature', base: 'main' });
  });

  it('refuses to merge a pull request with conflicts', async () => {
    const host = new FakeHost().on('GET', `${PULLS}/9`, { body: ghPull(9, { mergeable: false }) });

    await expect(new GitHubClient(context(host)).mergePullRequest(9, 'merge')).rejects.toMatchObject({
      kind: 'Conflict',
    });
    expect(host.sent(`${PULLS}/9/merge`)).toHaveLength(0);
  });

  it('merges with the requested method', async () => {
    const host = new FakeHost()
      .on('GET', `${PULLS}/9`, { body: ghPull(9, { mergeable: true }) })
      .on('PUT', `${PULLS}/9/merge`, { body: { merged: true } });

    await new GitHubClient(context(host)).mergePullRequest(9, 'squash');

    expect(host.sent(`${PULLS}/9/merge`, 'PUT')[0].body).toEqual({ merge_method: 'squash' });
  });

  it('creates organization repositories', async () => {
    const host = new FakeHost().on('POST', '/orgs/acme/repos', { status: 201, body: REPO });

    const repo = await new GitHubClient(context(host)).createRepository({
      name: 'tools',
      isPrivate: true,
      organization: 'acme',
    });

    expect(repo).toMatchObject({ fullName: 'acme/tools', defaultBranch: 'develop', isPrivate: true });
    expect(host.requests[0].body).toEqual({ name: 'tools', private: true, auto_init: false });
  });

  it('reports a missing repository as NotFound', async () => {
    const host = new FakeHost();

    await expect(new GitHubClient(context(host)).getRepository('acme', 'gone')).rejects.toMatchObject({
      kind: 'NotFound',
      status: 404,
    });
  });

  it('rejects responses that do not look like a pull request', async () => {
    const host = new FakeHost().on('GET', PULLS, { body: [{ number: 1 }] });

    await expect(collect(new GitHubClient(context(host)).listPullRequests())).rejects.toMatchObject({
      kind: 'MalformedResponse',
    });
  });

  it('talks to /api/v3 on Enterprise hosts', async () => {
    const host = new FakeHost().on('GET', '/api/v3/user', { body: { login: 'alice' } });
    const client = new GitHubClient(
      context(host, {
        remote: { host: 'github.acme.dev', owner: 'acme', repo: 'tools', provider: 'github-enterprise' },
      }),
    );

    expect(await client.currentUser()).toBe('alice');
    expect(host.requests[0].url).toBe('https://github.acme.dev/api/v3/user');
  });
});

describe('GitHubClient approvals', () => {
  it('reads reviews from every page before deciding', async () => {
    const next = 'https://api.github.com/repos/acme/tools/pulls/3/reviews?per_page=100&page=2';
    const host = new FakeHost()
      .on('GET', PULLS, { body: [ghPull(3)] })
      .on(
        'GET',
        `${PULLS}/3/reviews`,
        { body: [{ state: 'APPROVED', user: { login: 'bob' } }], headers: { link: `<${next}>; rel="next"` } },
        { body: [{ state: 'CHANGES_REQUESTED', user: { login: 'bob' } }] },
      );

    const pr = await new GitHubClient(context(host)).getPullRequest('feature');

    expect(pr?.isApproved).toBe(false);
    expect(host.sent(`${PULLS}/3/reviews`).map((req) => new URL(req.url).searchParams.get('page'))).toEqual([null, '2']);
  });
});
