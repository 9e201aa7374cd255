import type { AdapterContext } from './base.js';
import { BitbucketClient } from './bitbucket.js';
import { GiteaClient } from './gitea.js';
import { GitHubClient } from './github.js';
import { GitLabClient } from './gitlab.js';
import type { HostingClient, ProviderKind } from './types.js';

export type { AdapterContext } from './base.js';
export type { FetchLike } from './http.js';

export function createHostingClient(context: AdapterContext): HostingClient {
  const provider: ProviderKind = context.remote.provider;
  switch (provider) {
    case 'github':
    case 'github-enterprise':
      return new GitHubClient(context);
    case 'gitlab':
    case 'gitlab-self-hosted':
      return new GitLabClient(context);
    case 'bitbucket':
      return new BitbucketClient(context);
    case 'gitea':
      return new GiteaClient(context);
    default:
      return assertNever(provider);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled provider: ${String(value)}`);
}
