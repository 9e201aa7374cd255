import {
  ClientError,
  GitError,
  GitportError,
  PreconditionError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  cachedDefaultBranch,
  httpOptionsFor,
  saveDefaultBranch,
  type UserConfig,
} from '../config/config.js';
import { createHostingClient, type AdapterContext } from '../providers/index.js';
import { collect } from '../providers/selection.js';
import type {
  HostingClient,
  MergeStrategy,
  PullRequest,
  PullRequestStateFilter,
  Remote,
  RepositoryDescriptor,
} from '../providers/types.js';
import type { CredentialProvider } from './credentials.js';
import { classifyHost, parseRepositoryReference, resolveRemote } from './host-resolver.js';
import { cloneRepository, type LocalBranchState, type LocalRepository } from './local-repo.js';

export type ActionState =
  | 'Start'
  | 'PreconditionsChecked'
  | 'RemoteCallIssued'
  | 'Succeeded'
  | 'Failed'
  | 'PostconditionsApplied';

export type ActionResult<T> =
  | { ok: true; value: T; warnings: string[]; state: ActionState }
  | { ok: false; error: Error; state: ActionState; remoteCallIssued: boolean };

export interface OrchestratorDeps {
  repository: LocalRepository;
  credentials: CredentialProvider;
  config: UserConfig;
  createClient?: (context: AdapterContext) => HostingClient;
  saveDefaultBranch?: (host: string, fullName: string, branch: string) => void;
  clone?: (url: string, directory?: string) => string;
  logger?: Logger;
}

export interface CreatePullRequestOptions {
  title?: string;
  description?: string;
  target?: string;
  reviewers?: string[];
  /** Merge right after creating, then switch to the target branch. */
  merge?: boolean;
  /** Ask the provider to drop the source branch on merge; with `merge`, also delete it locally. */
  deleteBranch?: boolean;
}

export interface GetPullRequestOptions {
  source?: string;
  target?: string;
}

export interface ListPullRequestsOptions {
  state?: PullRequestStateFilter;
  /** `me` stands for the authenticated user. */
  author?: string;
  source?: string;
  target?: string;
}

export interface MergeOptions {
  strategy?: MergeStrategy;
  deleteBranch?: boolean;
  force?: boolean;
}

export interface DeclineOptions {
  deleteBranch?: boolean;
}

export interface HostOption {
  /** Host to act on when the reference does not name one. */
  host?: string;
}

export interface CreateRepositoryOptions extends HostOption {
  name: string;
  isPrivate?: boolean;
  organization?: string;
  description?: string;
  init?: boolean;
  clone?: boolean;
  https?: boolean;
}

export interface ForkRepositoryOptions extends HostOption {
  /** `org` or `org/name`. */
  target?: string;
  clone?: boolean;
  https?: boolean;
}

export interface CloneRepositoryOptions extends HostOption {
  directory?: string;
  https?: boolean;
}

export interface RepositoryOutcome {
  repository: RepositoryDescriptor;
  clonedTo?: string;
}

const DEFAULT_HOST = 'github.com';

/** Tracks one action through the state machine. */
class ActionRun {
  state: ActionState = 'Start';
  remoteCallIssued = false;
  readonly warnings: string[] = [];

  constructor(
    private readonly action: string,
    private readonly logger: Logger,
  ) {}

  advance(next: ActionState): void {
    this.logger.debug(`${this.action}: ${this.state} -> ${next}`);
    this.state = next;
  }

  async remote<T>(call: () => Promise<T>): Promise<T> {
    if (this.state !== 'RemoteCallIssued') this.advance('RemoteCallIssued');
    this.remoteCallIssued = true;
    return call();
  }

  warn(message: string): void {
    this.logger.debug(`${this.action}: warning: ${message}`);
    this.warnings.push(message);
  }
}

/**
 * Runs each user-facing action against the local repository and the hosting
 * provider, enforcing push and working-tree preconditions before any remote call.
 */
export class ActionOrchestrator {
  private readonly repository: LocalRepository;
  private readonly credentials: CredentialProvider;
  private readonly config: UserConfig;
  private readonly createClient: (context: AdapterContext) => HostingClient;
  private readonly saveDefaultBranch: (host: string, fullName: string, branch: string) => void;
  private readonly clone: (url: string, directory?: string) => string;
  private readonly logger: Logger;

  constructor(deps: OrchestratorDeps) {
    this.repository = deps.repository;
    this.credentials = deps.credentials;
    this.config = deps.config;
    this.createClient = deps.createClient ?? createHostingClient;
    this.saveDefaultBranch = deps.saveDefaultBranch ?? ((host, fullName, branch) => saveDefaultBranch(host, fullName, branch));
    this.clone = deps.clone ?? ((url, directory) => cloneRepository(url, directory));
    this.logger = deps.logger ?? createLogger('orchestrator');
  }

  createPullRequest(options: CreatePullRequestOptions): Promise<ActionResult<PullRequest>> {
    return this.run('create', async (run) => {
      const title = options.title?.trim();
      if (!title) {
        throw new ValidationError('A pull request title is required (--title)');
      }
      let state = this.repository.currentState();
      const { client, remote } = await this.connect();

      if (!state.upstreamBranch) {
        this.logger.info(`Pushing ${state.currentBranch} to set its upstream`);
        this.repository.push(state.currentBranch, { force: false });
        state = this.repository.currentState();
      }
      run.advance('PreconditionsChecked');

      const target = options.target ?? (await this.defaultBranch(run, client, remote));
      const description = options.description?.trim() || this.synthesizeDescription(state, target);
      let created = await run.remote(() =>
        client.createPullRequest({
          title,
          description,
          source: state.upstreamBranch ?? state.currentBranch,
          target,
          closeSourceBranch: options.deleteBranch ?? false,
        }),
      );

      const reviewers = options.reviewers ?? [];
      if (reviewers.length > 0) {
        try {
          await client.requestReviewers(created.id, reviewers);
          created = { ...created, reviewers: Array.from(new Set([...created.reviewers, ...reviewers])) };
        } catch (error) {
          run.warn(`Pull request created, but reviewers could not be added: ${errorMessage(error)}`);
        }
      }

      if (!options.merge) {
        run.advance('Succeeded');
        return created;
      }
      const pr = created;
      this.logger.info(`Merging pull request #${pr.id}`);
      await run.remote(() => client.mergePullRequest(pr.id, 'merge'));
      run.advance('Succeeded');
      await this.afterMerge(run, client, pr, state.currentBranch, options.deleteBranch ?? false);
      return { ...pr, state: 'merged' };
    });
  }

  getPullRequest(options: GetPullRequestOptions = {}): Promise<ActionResult<PullRequest>> {
    return this.run('get', async (run) => {
      const source = options.source ?? this.sourceBranch(this.repository.currentState());
      const { client } = await this.connect();
      run.advance('PreconditionsChecked');
      const pr = await run.remote(() => client.getPullRequest(source, options.target));
      if (!pr) {
        throw new ClientError('NotFound', `No open pull request for branch ${source}`);
      }
      run.advance('Succeeded');
      return pr;
    });
  }

  listPullRequests(options: ListPullRequestsOptions = {}): Promise<ActionResult<PullRequest[]>> {
    return this.run('list', async (run) => {
      const { client } = await this.connect();
      run.advance('PreconditionsChecked');
      const author = options.author === 'me' ? await run.remote(() => client.currentUser()) : options.author;
      const prs = await run.remote(() =>
        collect(
          client.listPullRequests({
            state: options.state ?? 'open',
            author,
            source: options.source,
            target: options.target,
          }),
        ),
      );
      run.advance('Succeeded');
      return prs;
    });
  }

  approvePullRequest(): Promise<ActionResult<PullRequest>> {
    return this.run('approve', async (run) => {
      const { client, pr } = await this.prepareReview(run, 'approve', false);
      await run.remote(() => client.approvePullRequest(pr.id));
      run.advance('Succeeded');
      return { ...pr, isApproved: true };
    });
  }

  mergePullRequest(options: MergeOptions = {}): Promise<ActionResult<PullRequest>> {
    return this.run('merge', async (run) => {
      const { state, client, pr } = await this.prepareReview(run, 'merge', options.force ?? false);
      await run.remote(() => client.mergePullRequest(pr.id, options.strategy ?? 'merge'));
      run.advance('Succeeded');
      await this.afterMerge(run, client, pr, state.currentBranch, options.deleteBranch ?? false);
      return { ...pr, state: 'merged' };
    });
  }

  declinePullRequest(options: DeclineOptions = {}): Promise<ActionResult<PullRequest>> {
    return this.run('decline', async (run) => {
      const { state, client, pr } = await this.prepareReview(run, 'decline', false);
      await run.remote(() => client.declinePullRequest(pr.id));
      run.advance('Succeeded');
      if (options.deleteBranch) {
        this.cleanUpBranch(run, state.currentBranch, pr.targetBranch);
        run.advance('PostconditionsApplied');
      }
      return { ...pr, state: 'declined' };
    });
  }

  createRepository(options: CreateRepositoryOptions): Promise<ActionResult<RepositoryOutcome>> {
    return this.run('repo create', async (run) => {
      if (!options.name.trim()) {
        throw new ValidationError('A repository name is required');
      }
      const client = await this.clientForHost(this.hostFor(options.host));
      run.advance('PreconditionsChecked');
      const repository = await run.remote(() =>
        client.createRepository({
          name: options.name.trim(),
          isPrivate: options.isPrivate ?? false,
          organization: options.organization,
          description: options.description,
          init: options.init,
        }),
      );
      run.advance('Succeeded');
      return this.maybeClone(run, repository, options.clone ?? false, options.https ?? false);
    });
  }

  forkRepository(source: string, options: ForkRepositoryOptions = {}): Promise<ActionResult<RepositoryOutcome>> {
    return this.run('repo fork', async (run) => {
      const ref = parseRepositoryReference(source);
      if (!ref.owner) {
        throw new ValidationError(`Fork source must be owner/name or a URL, got "${source}"`);
      }
      const [organization, name] = splitForkTarget(options.target);
      const client = await this.clientForHost(ref.host ?? this.hostFor(options.host));
      run.advance('PreconditionsChecked');
      const owner = ref.owner;
      const repository = await run.remote(() => client.forkRepository(owner, ref.repo, { organization, name }));
      run.advance('Succeeded');
      return this.maybeClone(run, repository, options.clone ?? false, options.https ?? false);
    });
  }

  cloneRepository(reference: string, options: CloneRepositoryOptions = {}): Promise<ActionResult<RepositoryOutcome>> {
    return this.run('repo clone', async (run) => {
      const ref = parseRepositoryReference(reference);
      const client = await this.clientForHost(ref.host ?? this.hostFor(options.host));
      run.advance('PreconditionsChecked');
      const owner = ref.owner ?? (await run.remote(() => client.currentUser()));
      const repository = await run.remote(() => client.getRepository(owner, ref.repo));
      run.advance('Succeeded');
      const url = cloneUrlOf(repository, options.https ?? false);
      this.logger.info(`Cloning ${repository.fullName} from ${url}`);
      return { repository, clonedTo: this.clone(url, options.directory) };
    });
  }

  getRepository(reference?: string, options: HostOption = {}): Promise<ActionResult<RepositoryDescriptor>> {
    return this.run('repo get', async (run) => {
      const { client, owner, repo } = await this.repositoryTarget(reference, options);
      run.advance('PreconditionsChecked');
      const repository = await run.remote(() => client.getRepository(owner, repo));
      run.advance('Succeeded');
      return repository;
    });
  }

  /**
   * `confirm` receives the full repository name and must approve the deletion;
   * nothing is sent to the provider otherwise.
   */
  deleteRepository(
    reference: string | undefined,
    confirm: (fullName: string) => Promise<boolean>,
    options: HostOption = {},
  ): Promise<ActionResult<string>> {
    return this.run('repo delete', async (run) => {
      const { client, owner, repo } = await this.repositoryTarget(reference, options);
      const fullName = `${owner}/${repo}`;
      if (!(await confirm(fullName))) {
        throw new ValidationError(`Deletion of ${fullName} was not confirmed`);
      }
      run.advance('PreconditionsChecked');
      await run.remote(() => client.deleteRepository(owner, repo));
      run.advance('Succeeded');
      return fullName;
    });
  }

  private async run<T>(action: string, body: (run: ActionRun) => Promise<T>): Promise<ActionResult<T>> {
    const run = new ActionRun(action, this.logger);
    try {
      const value = await body(run);
      return { ok: true, value, warnings: run.warnings, state: run.state };
    } catch (error) {
      run.advance('Failed');
      const err = error instanceof Error ? error : new Error(String(error));
      return { ok: false, error: err, state: run.state, remoteCallIssued: run.remoteCallIssued };
    }
  }

  private async connect(): Promise<{ client: HostingClient; remote: Remote }> {
    const remote = resolveRemote(this.repository.remoteUrl(), this.config.hosts);
    this.logger.debug(`resolved ${remote.provider} ${remote.host} ${remote.owner}/${remote.repo}`);
    return { client: await this.clientFor(remote), remote };
  }

  private async clientFor(remote: Remote): Promise<HostingClient> {
    const credential = await this.credentials.credentialFor(remote.host, remote.provider);
    return this.createClient({ remote, credential, http: httpOptionsFor(this.config, remote.host) });
  }

  /** Client for account-level calls that do not target the current repository. */
  private clientForHost(host: string): Promise<HostingClient> {
    const normalized = host.toLowerCase();
    return this.clientFor({ host: normalized, owner: '', repo: '', provider: classifyHost(normalized, this.config.hosts) });
  }

  private hostFor(explicit?: string): string {
    if (explicit) return explicit;
    try {
      return resolveRemote(this.repository.remoteUrl(), this.config.hosts).host;
    } catch (error) {
      if (!(error instanceof GitportError)) throw error;
      this.logger.debug(`no usable remote (${error.message}); defaulting to ${DEFAULT_HOST}`);
      return DEFAULT_HOST;
    }
  }

  private async repositoryTarget(
    reference: string | undefined,
    options: HostOption,
  ): Promise<{ client: HostingClient; owner: string; repo: string }> {
    if (!reference) {
      const { client, remote } = await this.connect();
      return { client, owner: remote.owner, repo: remote.repo };
    }
    const ref = parseRepositoryReference(reference);
    const client = await this.clientForHost(ref.host ?? this.hostFor(options.host));
    const owner = ref.owner ?? (await client.currentUser());
    return { client, owner, repo: ref.repo };
  }

  /** Checks the branch is pushed (and, for merge, clean and current), then finds its PR. */
  private async prepareReview(
    run: ActionRun,
    action: 'approve' | 'merge' | 'decline',
    force: boolean,
  ): Promise<{ state: LocalBranchState; client: HostingClient; pr: PullRequest }> {
    const state = this.repository.currentState();
    const branch = state.currentBranch;
    if (!state.upstreamBranch) {
      throw new PreconditionError('BranchNotPushed', `Branch ${branch} has no upstream; push it before you ${action}`);
    }
    if (!force) {
      if (state.ahead > 0) {
        throw new PreconditionError(
          'BranchNotPushed',
          `Branch ${branch} has ${state.ahead} unpushed commit(s); push before you ${action}`,
        );
      }
      if (action === 'merge' && state.isDirty) {
        throw new PreconditionError('DirtyWorkingTree', 'The working tree has uncommitted changes; commit or stash them, or pass --force');
      }
      if (action === 'merge' && state.behind > 0) {
        throw new PreconditionError('BehindRemote', `Branch ${branch} is ${state.behind} commit(s) behind its upstream; pull first`);
      }
    }
    const { client } = await this.connect();
    run.advance('PreconditionsChecked');

    if (force) {
      this.logger.info(`Force-pushing ${branch} before ${action}`);
      this.repository.push(branch, { force: true, remote: state.upstreamRemote });
    }
    const source = this.sourceBranch(state);
    const pr = await run.remote(() => client.getPullRequest(source));
    if (!pr) {
      throw new ClientError('NotFound', `No open pull request for branch ${source}`);
    }
    return { state, client, pr };
  }

  private sourceBranch(state: LocalBranchState): string {
    return state.upstreamBranch ?? state.currentBranch;
  }

  private async defaultBranch(run: ActionRun, client: HostingClient, remote: Remote): Promise<string> {
    const fullName = `${remote.owner}/${remote.repo}`;
    const cached = cachedDefaultBranch(this.config, remote.host, fullName);
    if (cached) return cached;
    const repository = await run.remote(() => client.getRepository(remote.owner, remote.repo));
    try {
      this.saveDefaultBranch(remote.host, fullName, repository.defaultBranch);
    } catch (error) {
      this.logger.debug(`could not cache default branch: ${errorMessage(error)}`);
    }
    return repository.defaultBranch;
  }

  /** Bullet list of the branch's commit subjects; best-effort. */
  private synthesizeDescription(state: LocalBranchState, target: string): string | undefined {
    const base = `${state.upstreamRemote ?? 'origin'}/${target}`;
    try {
      const subjects = this.repository.commitSubjects(base);
      return subjects.length > 0 ? subjects.map((subject) => `- ${subject}`).join('\n') : undefined;
    } catch (error) {
      if (!(error instanceof GitError)) throw error;
      this.logger.debug(`no description synthesized: ${error.message}`);
      return undefined;
    }
  }

  /**
   * Switches to the merge target and pulls it; with `deleteBranch` the source
   * branch is then removed remotely and locally. Failures only warn.
   */
  private async afterMerge(
    run: ActionRun,
    client: HostingClient,
    pr: PullRequest,
    branch: string,
    deleteBranch: boolean,
  ): Promise<void> {
    if (deleteBranch) {
      await this.deleteRemoteBranch(run, client, pr.sourceBranch);
    }
    if (this.switchTo(run, pr.targetBranch) && deleteBranch) {
      this.deleteLocalBranch(run, branch);
    }
    run.advance('PostconditionsApplied');
  }

  /** Leaves the source branch for the target, then deletes it locally. */
  private cleanUpBranch(run: ActionRun, branch: string, target: string): void {
    if (this.switchTo(run, target)) {
      this.deleteLocalBranch(run, branch);
    }
  }

  private switchTo(run: ActionRun, target: string): boolean {
    try {
      this.logger.info(`Checking out ${target} and pulling`);
      this.repository.checkout(target);
      this.repository.pull();
      return true;
    } catch (error) {
      run.warn(`Could not switch to ${target}: ${errorMessage(error)}`);
      return false;
    }
  }

  private deleteLocalBranch(run: ActionRun, branch: string): void {
    try {
      this.repository.deleteLocalBranch(branch);
    } catch (error) {
      run.warn(`Could not delete local branch ${branch}: ${errorMessage(error)}`);
    }
  }

  private async deleteRemoteBranch(run: ActionRun, client: HostingClient, branch: string): Promise<void> {
    try {
      await client.deleteBranch(branch);
    } catch (error) {
      // Providers that close the source branch on merge have already removed it.
      if (error instanceof ClientError && error.kind === 'NotFound') {
        this.logger.debug(`remote branch ${branch} is already gone`);
        return;
      }
      run.warn(`Could not delete remote branch ${branch}: ${errorMessage(error)}`);
    }
  }

  private maybeClone(
    run: ActionRun,
    repository: RepositoryDescriptor,
    clone: boolean,
    https: boolean,
  ): RepositoryOutcome {
    if (!clone) return { repository };
    try {
      return { repository, clonedTo: this.clone(cloneUrlOf(repository, https)) };
    } catch (error) {
      run.warn(`Repository ${repository.fullName} is ready, but cloning failed: ${errorMessage(error)}`);
      return { repository };
    }
  }
}

function cloneUrlOf(repository: RepositoryDescriptor, https: boolean): string {
  const url = https ? repository.cloneUrl ?? repository.sshUrl : repository.sshUrl ?? repository.cloneUrl;
  if (!url) {
    throw new ClientError('MalformedResponse', `${repository.fullName} has no clone URL`);
  }
  return url;
}

function splitForkTarget(target?: string): [string | undefined, string | undefined] {
  if (!target) return [undefined, undefined];
  const slash = target.indexOf('/');
  if (slash < 0) return [target, undefined];
  const organization = target.slice(0, slash);
  const name = target.slice(slash + 1);
  return [organization || undefined, name || undefined];
}
