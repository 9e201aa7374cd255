import { spawnSync } from 'node:child_process';
import path from 'node:path';
import process from 'node:process';
import { GitError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('git');

export interface LocalBranchState {
  currentBranch: string;
  /** Remote branch name without the remote prefix. */
  upstreamBranch?: string;
  upstreamRemote?: string;
  ahead: number;
  behind: number;
  isDirty: boolean;
}

export interface PushOptions {
  force?: boolean;
  remote?: string;
}

/** The git facts and mutations the orchestrator depends on. */
export interface LocalRepository {
  currentState(): LocalBranchState;
  remoteUrl(name?: string): string;
  push(branch: string, options?: PushOptions): void;
  pull(): void;
  checkout(branch: string): void;
  deleteLocalBranch(branch: string): void;
  /** Subjects of commits reachable from HEAD but not from `base`, oldest first. */
  commitSubjects(base: string): string[];
}

interface RunResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

function runGit(args: string[], cwd: string): RunResult {
  logger.debug(`git ${args.join(' ')}`);
  const res = spawnSync('git', args, { cwd, encoding: 'utf8' });
  if (res.error) {
    throw new GitError('ProcessFailure', `Unable to run git: ${res.error.message}`);
  }
  return { status: res.status, stdout: res.stdout ?? '', stderr: res.stderr ?? '' };
}

function succeeded(res: RunResult): boolean {
  return (res.status ?? 1) === 0;
}

function failure(args: string[], res: RunResult): GitError {
  const detail = res.stderr.trim() || res.stdout.trim() || `exit code ${res.status ?? 'unknown'}`;
  return new GitError('ProcessFailure', `git ${args[0]} failed: ${detail}`);
}

function lines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/** `LocalRepository` backed by the git executable. Every call is synchronous. */
export class GitRepository implements LocalRepository {
  constructor(private readonly cwd: string = process.cwd()) {}

  currentState(): LocalBranchState {
    this.ensureRepository();
    const currentBranch = this.currentBranch();
    const state: LocalBranchState = {
      currentBranch,
      ahead: 0,
      behind: 0,
      isDirty: lines(this.run(['status', '--porcelain', '--untracked-files=no'])).length > 0,
    };

    const upstream = runGit(['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}'], this.cwd);
    if (!succeeded(upstream)) {
      return state;
    }
    const remote = this.config(`branch.${currentBranch}.remote`);
    // A branch tracking another local branch (remote ".") has not been pushed.
    if (!remote || remote === '.') {
      return state;
    }
    const merge = this.config(`branch.${currentBranch}.merge`);
    state.upstreamRemote = remote;
    state.upstreamBranch = merge?.replace(/^refs\/heads\//, '') ?? upstream.stdout.trim().replace(`${remote}/`, '');

    const counts = runGit(['rev-list', '--left-right', '--count', 'HEAD...@{u}'], this.cwd);
    if (succeeded(counts)) {
      const [ahead = '0', behind = '0'] = counts.stdout.trim().split(/\s+/);
      state.ahead = Number.parseInt(ahead, 10) || 0;
      state.behind = Number.parseInt(behind, 10) || 0;
    }
    return state;
  }

  remoteUrl(name?: string): string {
    this.ensureRepository();
    const remote = name ?? this.preferredRemote();
    if (!remote) {
      throw new GitError('NoRemote', 'This repository has no remotes configured');
    }
    const res = runGit(['remote', 'get-url', remote], this.cwd);
    if (!succeeded(res)) {
      throw new GitError('NoRemote', `No remote named "${remote}"`);
    }
    return res.stdout.trim();
  }

  push(branch: string, options: PushOptions = {}): void {
    const remote = options.remote ?? this.preferredRemote();
    if (!remote) {
      throw new GitError('NoRemote', 'Cannot push: this repository has no remotes configured');
    }
    const args = ['push', '--set-upstream'];
    if (options.force) args.push('--force-with-lease');
    args.push(remote, branch);
    this.run(args);
  }

  pull(): void {
    this.run(['pull']);
  }

  checkout(branch: string): void {
    this.run(['checkout', branch]);
  }

  deleteLocalBranch(branch: string): void {
    this.run(['branch', '-D', branch]);
  }

  commitSubjects(base: string): string[] {
    return lines(this.run(['log', '--reverse', '--no-merges', '--format=%s', `${base}..HEAD`]));
  }

  private ensureRepository(): void {
    const res = runGit(['rev-parse', '--git-dir'], this.cwd);
    if (!succeeded(res)) {
      throw new GitError('NotARepository', `Not a git repository: ${this.cwd}`);
    }
  }

  private currentBranch(): string {
    const res = runGit(['symbolic-ref', '--short', 'HEAD'], this.cwd);
    const branch = res.stdout.trim();
    if (!succeeded(res) || branch === '') {
      throw new GitError('DetachedHead', 'HEAD is detached; check out a branch first');
    }
    return branch;
  }

  /** Upstream remote of the current branch, then `origin`, then the first remote. */
  private preferredRemote(): string | undefined {
    const branch = runGit(['symbolic-ref', '--short', 'HEAD'], this.cwd);
    if (succeeded(branch)) {
      const upstreamRemote = this.config(`branch.${branch.stdout.trim()}.remote`);
      if (upstreamRemote && upstreamRemote !== '.') return upstreamRemote;
    }
    const remotes = lines(this.run(['remote']));
    return remotes.includes('origin') ? 'origin' : remotes[0];
  }

  private config(key: string): string | undefined {
    const res = runGit(['config', '--get', key], this.cwd);
    const value = res.stdout.trim();
    return succeeded(res) && value !== '' ? value : undefined;
  }

  private run(args: string[]): string {
    const res = runGit(args, this.cwd);
    if (!succeeded(res)) {
      throw failure(args, res);
    }
    return res.stdout;
  }
}

/** Clones `url` below `cwd` and returns the checkout directory. */
export function cloneRepository(url: string, directory?: string, cwd: string = process.cwd()): string {
  const target = directory ?? path.basename(url.replace(/\/+$/, '')).replace(/\.git$/, '');
  const args = ['clone', url, target];
  const res = runGit(args, cwd);
  if (!succeeded(res)) {
    throw failure(args, res);
  }
  return path.resolve(cwd, target);
}
