import { Command, Option } from 'commander';
import { loadConfig, httpOptionsFor, setHostType, type UserConfig } from '../config/config.js';
import { AuthError, ResolutionError, ValidationError } from '../errors.js';
import { c } from '../lib/colors.js';
import { canPrompt, promptSecret, promptSelect, promptText, readStdin } from '../lib/interactive.js';
import { printOutput, renderBoxTable } from '../lib/printer.js';
import { createHostingClient } from '../providers/index.js';
import { PROVIDER_KINDS, isProviderKind, type Credential, type ProviderKind } from '../providers/types.js';
import { StoredCredentialProvider, toSecret } from '../services/credentials.js';
import { classifyHost } from '../services/host-resolver.js';
import { backendName, deleteSecret, listAccounts, setSecret } from '../services/secrets.js';
import { tokenOverride } from './context.js';

interface LoginOptions {
  type?: ProviderKind;
  username?: string;
  withToken?: boolean;
  validate?: boolean;
  json?: boolean;
}

interface HostStatus {
  host: string;
  provider: ProviderKind | null;
  stored: boolean;
}

export function registerAuthCommand(program: Command): void {
  const auth = program
    .command('auth')
    .description('Manage hosting service credentials (encrypted token storage)')
    .addHelpText(
      'after',
      `\nExamples:\n  $ gitport auth login github.com\n  $ echo "$TOKEN" | gitport auth login git.example.com --type gitea --with-token\n  $ gitport auth login bitbucket.org --username alice\n  $ gitport auth status\n  $ gitport auth test gitlab.com\n  $ gitport auth logout github.com\n`,
    );

  auth
    .command('login')
    .description('Store a token for a host (validated against the host unless --no-validate)')
    .argument('<host>', 'host name, e.g. github.com or git.example.com')
    .addOption(new Option('--type <type>', 'hosting service type for this host').choices(PROVIDER_KINDS))
    .option('--username <username>', 'Bitbucket username to pair with an app password')
    .option('--with-token', 'read the token from standard input')
    .option('--no-validate', 'skip the validation request')
    .option('-j, --json', 'output as JSON')
    .action(async (rawHost: string, opts: LoginOptions, command: Command) => {
      const host = normalizeHost(rawHost);
      const config = loadConfig();
      const provider = opts.type ?? (await providerFor(host, config));

      let token = opts.withToken ? await readStdin() : tokenOverride(command);
      if (!token) {
        if (!canPrompt()) {
          throw new ValidationError('No token given and not interactive; use --with-token or --token');
        }
        token = await promptSecret(provider === 'bitbucket' ? 'Bitbucket app password' : `Access token for ${host}`, {
          required: true,
        });
      }
      token = token.trim();
      if (!token) throw new ValidationError('The token is empty');

      let username = opts.username?.trim();
      if (provider === 'bitbucket' && !username && !token.includes(':') && canPrompt()) {
        username = (await promptText('Bitbucket username (leave empty for an access token)')).trim();
      }
      const stored = provider === 'bitbucket' && username ? `${username}:${token}` : token;

      let login: string | undefined;
      if (opts.validate !== false) {
        login = await whoAmI({ host, provider, secret: toSecret(stored, provider) }, config);
      }
      await setSecret(host, stored);
      if (opts.type || provider !== classifiedProvider(host, config)) {
        setHostType(host, provider);
      }
      const who = login ? ` as ${c.id(login)}` : '';
      printOutput(
        { host, provider, login: login ?? null, backend: backendName() },
        [c.ok(`Logged in to ${host}${who} (${provider}); token stored using ${backendName()}`)],
        opts,
      );
    });

  auth
    .command('logout')
    .description('Remove the stored token for a host')
    .argument('<host>', 'host name')
    .action((rawHost: string) => {
      const host = normalizeHost(rawHost);
      const removed = deleteSecret(host);
      printOutput(
        { host, removed },
        [removed ? c.ok(`Removed token for ${c.id(host)}`) : c.dim(`No token stored for ${host}`)],
      );
    });

  auth
    .command('status')
    .description('Show hosts with stored tokens or configured types')
    .option('-j, --json', 'output as JSON')
    .action((opts: { json?: boolean }) => {
      const config = loadConfig();
      const stored = new Set(listAccounts());
      const hosts = [...new Set([...stored, ...Object.keys(config.hosts ?? {})])].sort();
      const statuses: HostStatus[] = hosts.map((host) => ({
        host,
        provider: classifiedProvider(host, config) ?? null,
        stored: stored.has(host),
      }));
      const payload = { backend: backendName(), hosts: statuses };

      const lines = [c.heading('Auth Status'), `Backend: ${payload.backend}`];
      if (statuses.length === 0) {
        lines.push('', c.warn('No stored tokens. Run `gitport auth login <host>` to add one.'));
      } else {
        const rows = [[c.bold('Host'), c.bold('Type'), c.bold('Token')]];
        for (const status of statuses) {
          rows.push([c.id(status.host), status.provider ?? c.dim('unknown'), status.stored ? c.ok('stored') : c.dim('none')]);
        }
        lines.push('', ...renderBoxTable(rows));
      }
      printOutput(payload, lines, opts);
    });

  auth
    .command('test')
    .description('Check that the credential for a host is accepted (read-only)')
    .argument('<host>', 'host name')
    .option('-j, --json', 'output as JSON')
    .action(async (rawHost: string, opts: { json?: boolean }, command: Command) => {
      const host = normalizeHost(rawHost);
      const config = loadConfig();
      const provider = classifyHost(host, config.hosts);
      const credential = await new StoredCredentialProvider({ tokenOverride: tokenOverride(command) }).credentialFor(
        host,
        provider,
      );
      const login = await whoAmI(credential, config);
      printOutput({ host, provider, ok: true, login }, [c.ok(`Credential for ${host} is valid for ${c.id(login)}`)], opts);
    });
}

function normalizeHost(host: string): string {
  const normalized = host
    .trim()
    .replace(/^[a-z+]+:\/\//i, '')
    .replace(/\/.*$/, '')
    .toLowerCase();
  if (!normalized) throw new ValidationError('A host name is required');
  return normalized;
}

function classifiedProvider(host: string, config: UserConfig): ProviderKind | undefined {
  try {
    return classifyHost(host, config.hosts);
  } catch (error) {
    if (error instanceof ResolutionError) return undefined;
    throw error;
  }
}

async function providerFor(host: string, config: UserConfig): Promise<ProviderKind> {
  const known = classifiedProvider(host, config);
  if (known) return known;
  if (!canPrompt()) {
    throw new ResolutionError('UnrecognizedHost', `Cannot tell which service ${host} runs; pass --type`);
  }
  const picked = await promptSelect(
    `Which service does ${host} run?`,
    PROVIDER_KINDS.map((kind) => ({ label: kind, value: kind })),
  );
  if (!isProviderKind(picked)) throw new ValidationError(`Unknown service type "${picked}"`);
  return picked;
}

async function whoAmI(credential: Credential, config: UserConfig): Promise<string> {
  const client = createHostingClient({
    remote: { host: credential.host, owner: '', repo: '', provider: credential.provider },
    credential,
    http: httpOptionsFor(config, credential.host),
  });
  try {
    return await client.currentUser();
  } catch (error) {
    if (error instanceof AuthError) {
      throw new AuthError(error.kind, `${credential.host} rejected the credential: ${error.message}`, credential.host);
    }
    throw error;
  }
}
