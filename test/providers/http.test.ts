import { Response } from 'node-fetch';
import { describe, expect, it } from 'vitest';
import { AuthError, ClientError } from '../../src/errors.js';
import { RestClient, basicAuth, classifyStatus, type FetchLike } from '../../src/providers/http.js';
import { FakeHost, TEST_HTTP } from '../helpers/fake-host.js';

function client(fetch: FetchLike, retries = TEST_HTTP.retries): RestClient {
  return new RestClient({
    ...TEST_HTTP,
    retries,
    name: 'github',
    baseUrl: 'https://api.example.com/',
    headers: { Authorization: 'Bearer test-token' },
    fetch,
    retryDelayMs: 0,
  });
}

describe('RestClient', () => {
  it('retries a 503 a bounded number of times, then surfaces ServerError(503)', async () => {
    const host = new FakeHost().on('GET', '/repos', { status: 503, body: { message: 'unavailable' } });

    const error = await client(host.fetch)
      .get('/repos')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ClientError);
    expect(error).toMatchObject({
      kind: 'ServerError',
      status: 503,
      message: 'github: GET https://api.example.com/repos returned 503: unavailable',
    });
    expect(host.requests).toHaveLength(3);
  });

  it('recovers when a retry succeeds', async () => {
    const host = new FakeHost().on('GET', '/user', { status: 502 }, { body: { login: 'alice' } });

    const res = await client(host.fetch).get('/user');

    expect(res.data).toEqual({ login: 'alice' });
    expect(host.requests).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const host = new FakeHost().on('GET', '/user', { status: 401, body: { message: 'Bad credentials' } });

    await expect(client(host.fetch).get('/user')).rejects.toMatchObject({ kind: 'TokenExpired' });
    expect(host.requests).toHaveLength(1);
  });

  it('turns a request timeout into a retried NetworkError', async () => {
    let calls = 0;
    const hanging: FetchLike = (_url, init) => {
      calls++;
      return new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
      });
    };
    const slow = new RestClient({
      ...TEST_HTTP,
      timeoutMs: 20,
      name: 'github',
      baseUrl: 'https://api.example.com',
      headers: {},
      fetch: hanging,
      retryDelayMs: 0,
    });

    await expect(slow.get('/user')).rejects.toMatchObject({
      kind: 'NetworkError',
      message: 'github: GET https://api.example.com/user failed: timed out after 20ms',
    });
    expect(calls).toBe(TEST_HTTP.retries + 1);
  });

  it('retries network failures', async () => {
    let calls = 0;
    const failing: FetchLike = async () => {
      calls++;
      throw new Error('socket hang up');
    };

    await expect(client(failing, 1).get('/user')).rejects.toMatchObject({
      kind: 'NetworkError',
      message: 'github: GET https://api.example.com/user failed: socket hang up',
    });
    expect(calls).toBe(2);
  });

  it('rejects bodies that are not JSON', async () => {
    const html: FetchLike = async () => new Response('<html>maintenance</html>', { status: 200 });

    await expect(client(html).get('/user')).rejects.toMatchObject({
      kind: 'MalformedResponse',
      message: 'Response from https://api.example.com/user is not valid JSON',
    });
  });

  it('returns undefined data for empty responses', async () => {
    const host = new FakeHost().on('DELETE', '/repos/acme/tools', { status: 204 });

    const res = await client(host.fetch).delete('/repos/acme/tools');

    expect(res.status).toBe(204);
    expect(res.data).toBeUndefined();
  });

  it('sends JSON bodies with auth and content headers', async () => {
    const host = new FakeHost().on('POST', '/repos/acme/tools/pulls', { status: 201, body: { number: 1 } });

    await client(host.fetch).post('/repos/acme/tools/pulls', { title: 'T' });

    const [sent] = host.requests;
    expect(sent.body).toEqual({ title: 'T' });
    expect(sent.headers['authorization']).toBe('Bearer test-token');
    expect(sent.headers['content-type']).toBe('application/json');
    expect(sent.headers['user-agent']).toBe('gitport-cli');
  });

  it('builds URLs from paths and skips undefined query values', () => {
    const rest = client(new FakeHost().fetch);

    expect(rest.url('/search', { q: 'state=open', page: 2, author: undefined })).toBe(
      'https://api.example.com/search?q=state%3Dopen&page=2',
    );
    expect(rest.url('https://api.example.com/next?page=3')).toBe('https://api.example.com/next?page=3');
    expect(rest.origin).toBe('https://api.example.com');
  });
});

describe('classifyStatus', () => {
  const headers = (values: Record<string, string>) => ({ get: (name: string) => values[name] ?? null });

  it('maps statuses onto the error taxonomy', () => {
    expect(classifyStatus(401, headers({}), 'ctx')).toBeInstanceOf(AuthError);
    expect(classifyStatus(403, headers({}), 'ctx')).toMatchObject({ kind: 'Forbidden' });
    expect(classifyStatus(403, headers({ 'x-ratelimit-remaining': '0' }), 'ctx')).toMatchObject({ kind: 'RateLimited' });
    expect(classifyStatus(404, headers({}), 'ctx')).toMatchObject({ kind: 'NotFound', status: 404 });
    expect(classifyStatus(409, headers({}), 'ctx')).toMatchObject({ kind: 'Conflict', status: 409 });
    expect(classifyStatus(429, headers({}), 'ctx')).toMatchObject({ kind: 'RateLimited' });
    expect(classifyStatus(500, headers({}), 'ctx')).toMatchObject({ kind: 'ServerError', status: 500 });
  });

  it('includes the provider message in the error text', () => {
    expect(classifyStatus(422, headers({}), 'gitlab: POST /projects', '{"error":{"message":"name taken"}}').message).toBe(
      'gitlab: POST /projects returned 422: name taken',
    );
  });
});

describe('basicAuth', () => {
  it('encodes the pair as a Basic header', () => {
    expect(basicAuth('alice', 'test-secret')).toBe(`Basic ${Buffer.from('alice:test-secret').toString('base64')}`);
  });
});
