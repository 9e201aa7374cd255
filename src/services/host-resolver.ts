import { ResolutionError } from '../errors.js';
import type { HostSettings } from '../config/config.js';
import type { ProviderKind, Remote } from '../providers/types.js';

export interface RemoteLocation {
  host: string;
  owner: string;
  repo: string;
}

export interface RepositoryReference {
  host?: string;
  owner?: string;
  repo: string;
}

type HostTable = Record<string, HostSettings> | undefined;

const URL_SCHEMES = new Set(['http:', 'https:', 'ssh:', 'git:', 'git+ssh:', 'ssh+git:']);
const SCP_LIKE = /^(?:[^@\s/]+@)?([^:\s/]+):(?!\/\/)(.+)$/;

/**
 * Splits a git remote URL into host, owner and repository name.
 * Accepts http(s), ssh and git URLs as well as scp-like `user@host:owner/repo`.
 */
export function parseRemoteUrl(remoteUrl: string): RemoteLocation {
  const raw = remoteUrl.trim();
  if (raw === '') {
    throw new ResolutionError('InvalidRemoteUrl', 'Remote URL is empty');
  }

  let host: string;
  let pathname: string;
  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(raw)?.[1]?.toLowerCase();
  if (scheme !== undefined) {
    if (!URL_SCHEMES.has(`${scheme}:`)) {
      throw new ResolutionError('InvalidRemoteUrl', `Unsupported remote URL scheme "${scheme}": ${raw}`);
    }
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      throw new ResolutionError('InvalidRemoteUrl', `Malformed remote URL: ${raw}`);
    }
    host = url.hostname;
    pathname = decodeURIComponent(url.pathname);
  } else {
    const match = SCP_LIKE.exec(raw);
    // A one-letter "host" is a Windows drive, i.e. a local path.
    if (!match || match[1].length === 1) {
      throw new ResolutionError('InvalidRemoteUrl', `Remote is not a hosted repository: ${raw}`);
    }
    host = match[1];
    pathname = match[2];
  }

  const segments = pathname
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/')
    .filter(Boolean);
  if (!host || segments.length < 2) {
    throw new ResolutionError('InvalidRemoteUrl', `Remote URL has no owner/repository path: ${raw}`);
  }
  const repo = segments[segments.length - 1];
  return { host: host.toLowerCase(), owner: segments.slice(0, -1).join('/'), repo };
}

/** Provider for a bare hostname: explicit configuration first, then hostname markers. */
export function classifyHost(host: string, hosts?: HostTable): ProviderKind {
  const normalized = host.trim().toLowerCase();
  const explicit = hosts?.[normalized]?.type;
  if (explicit) return explicit;

  if (normalized === 'bitbucket.org' || normalized.endsWith('.bitbucket.org')) return 'bitbucket';
  if (normalized.includes('github')) {
    return normalized === 'github.com' || normalized === 'www.github.com' ? 'github' : 'github-enterprise';
  }
  if (normalized.includes('gitlab')) {
    return normalized === 'gitlab.com' || normalized === 'www.gitlab.com' ? 'gitlab' : 'gitlab-self-hosted';
  }
  if (normalized.includes('gitea') || normalized === 'codeberg.org') return 'gitea';

  throw new ResolutionError(
    'UnrecognizedHost',
    `Cannot tell which provider hosts ${normalized}. Run: gitport auth login ${normalized} --type <provider>`,
  );
}

export function resolveRemote(remoteUrl: string, hosts?: HostTable): Remote {
  const location = parseRemoteUrl(remoteUrl);
  return { ...location, provider: classifyHost(location.host, hosts) };
}

/** Accepts `owner/name`, a bare `name`, or any remote URL form. */
export function parseRepositoryReference(reference: string): RepositoryReference {
  const raw = reference.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(raw) || SCP_LIKE.test(raw)) {
    return parseRemoteUrl(raw);
  }
  const segments = raw.replace(/\.git$/, '').split('/').filter(Boolean);
  if (segments.length === 0) {
    throw new ResolutionError('InvalidRemoteUrl', `Invalid repository reference: "${reference}"`);
  }
  const repo = segments[segments.length - 1];
  return segments.length === 1 ? { repo } : { owner: segments.slice(0, -1).join('/'), repo };
}
