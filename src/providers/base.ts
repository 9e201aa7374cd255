import { ClientError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { getSchemaRegistry, type SchemaRegistry } from '../services/schema-registry.js';
import { RestClient, type FetchLike } from './http.js';
import { collect, pickPullRequest } from './selection.js';
import type { Credential, HttpOptions, PullRequest, PullRequestFilters, Remote } from './types.js';

export interface AdapterContext {
  remote: Remote;
  credential: Credential;
  http: HttpOptions;
  fetch?: FetchLike;
  schemas?: SchemaRegistry;
  retryDelayMs?: number;
}

export type ProviderFamily = 'github' | 'gitlab' | 'bitbucket' | 'gitea';

/** Plumbing shared by the four adapters: transport, schema checks and PR selection. */
export abstract class ProviderClient {
  readonly remote: Remote;
  protected readonly rest: RestClient;
  protected readonly logger: Logger;
  private readonly schemas: SchemaRegistry;

  protected constructor(
    protected readonly family: ProviderFamily,
    context: AdapterContext,
    defaultBaseUrl: string,
    authHeaders: Record<string, string>,
  ) {
    this.remote = context.remote;
    this.logger = createLogger(family);
    this.schemas = context.schemas ?? getSchemaRegistry();
    this.rest = new RestClient({
      ...context.http,
      name: family,
      baseUrl: context.http.apiUrl ?? defaultBaseUrl,
      headers: authHeaders,
      fetch: context.fetch,
      retryDelayMs: context.retryDelayMs,
      logger: this.logger,
    });
  }

  abstract listPullRequests(filters?: PullRequestFilters): AsyncIterable<PullRequest>;

  async getPullRequest(source: string, target?: string): Promise<PullRequest | undefined> {
    const candidates = await collect(this.listPullRequests({ state: 'open', source, target }));
    return pickPullRequest(candidates, source, target);
  }

  protected parse<T>(schema: string, data: unknown, context: string): T {
    return this.schemas.parse<T>(`providers/${this.family}/${schema}`, data, context);
  }

  protected parseList<T>(schema: string, data: unknown, context: string): T[] {
    if (!Array.isArray(data)) {
      throw new ClientError('MalformedResponse', `${context}: expected a list`);
    }
    return data.map((item) => this.parse<T>(schema, item, context));
  }
}

/** The password of a basic pair doubles as a token for token-only providers. */
export function tokenOf(credential: Credential): string {
  return credential.secret.kind === 'token' ? credential.secret.token : credential.secret.password;
}

export function matchesFilters(pr: PullRequest, filters: PullRequestFilters): boolean {
  const state = filters.state ?? 'open';
  if (state !== 'all' && pr.state !== state) return false;
  if (filters.source !== undefined && pr.sourceBranch !== filters.source) return false;
  if (filters.target !== undefined && pr.targetBranch !== filters.target) return false;
  if (filters.author !== undefined && pr.author !== filters.author) return false;
  return true;
}

export async function* filterPullRequests(
  source: AsyncIterable<PullRequest>,
  filters: PullRequestFilters,
): AsyncGenerator<PullRequest, void, undefined> {
  for await (const pr of source) {
    if (matchesFilters(pr, filters)) yield pr;
  }
}
