import process from 'node:process';
import { AuthError } from '../errors.js';
import type { Credential, CredentialSecret, ProviderKind } from '../providers/types.js';
import { getSecret } from './secrets.js';

export interface CredentialProvider {
  credentialFor(host: string, provider: ProviderKind): Promise<Credential>;
}

export interface CredentialSources {
  /** Value of `--token`, when given. */
  tokenOverride?: string;
  env?: NodeJS.ProcessEnv;
  lookup?: (account: string) => Promise<string | undefined>;
}

/**
 * Looks up `--token`, then `GITPORT_TOKEN`, then the secret store entry for the host.
 * Never writes; `auth login` is the only writer.
 */
export class StoredCredentialProvider implements CredentialProvider {
  private readonly env: NodeJS.ProcessEnv;
  private readonly lookup: (account: string) => Promise<string | undefined>;

  constructor(private readonly sources: CredentialSources = {}) {
    this.env = sources.env ?? process.env;
    this.lookup = sources.lookup ?? getSecret;
  }

  async credentialFor(host: string, provider: ProviderKind): Promise<Credential> {
    const raw = this.sources.tokenOverride?.trim() || this.env.GITPORT_TOKEN?.trim() || (await this.lookup(host));
    if (!raw) {
      throw new AuthError('NotLoggedIn', `Not logged in to ${host}. Run: gitport auth login ${host}`, host);
    }
    return { host, provider, secret: toSecret(raw, provider) };
  }
}

/** Bitbucket app passwords are stored as `username:app-password`. */
export function toSecret(raw: string, provider: ProviderKind): CredentialSecret {
  const separator = raw.indexOf(':');
  if (provider === 'bitbucket' && separator > 0) {
    return { kind: 'basic', username: raw.slice(0, separator), password: raw.slice(separator + 1) };
  }
  return { kind: 'token', token: raw };
}
