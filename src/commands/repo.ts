import { Command } from 'commander';
import { ValidationError } from '../errors.js';
import { c } from '../lib/colors.js';
import { canPrompt, promptText } from '../lib/interactive.js';
import { formatKeyValues, printOutput } from '../lib/printer.js';
import type { RepositoryDescriptor } from '../providers/types.js';
import type { RepositoryOutcome } from '../services/orchestrator.js';
import { createOrchestrator, unwrap } from './context.js';

interface NewOptions {
  host?: string;
  org?: string;
  private?: boolean;
  description?: string;
  init?: boolean;
  clone?: boolean;
  https?: boolean;
  json?: boolean;
}

interface ForkOptions {
  host?: string;
  clone?: boolean;
  https?: boolean;
  json?: boolean;
}

interface CloneOptions {
  host?: string;
  https?: boolean;
  json?: boolean;
}

interface GetOptions {
  host?: string;
  json?: boolean;
}

interface DeleteOptions {
  host?: string;
  yes?: boolean;
}

export function registerRepoCommand(program: Command): void {
  const repo = program
    .command('repo')
    .description('Create, fork, clone, inspect and delete hosted repositories')
    .addHelpText(
      'after',
      `\nReferences:\n  name                 a repository of the logged-in user\n  owner/name           a repository on the current remote's host (or --host)\n  https://host/o/name  a repository URL\n\nExamples:\n  $ gitport repo new tools --org acme --private --clone\n  $ gitport repo fork acme/tools me/tools-fork\n  $ gitport repo clone acme/tools --https\n  $ gitport repo get\n  $ gitport repo delete me/scratch --yes\n`,
    );

  repo
    .command('new')
    .description('Create a repository for you or an organization')
    .argument('<name>', 'repository name')
    .option('--host <host>', 'hosting service (default: host of the current remote, else github.com)')
    .option('--org <organization>', 'create under this organization, group or workspace')
    .option('--private', 'make the repository private')
    .option('--description <text>', 'repository description')
    .option('--init', 'create an initial commit with a README')
    .option('--clone', 'clone the new repository into the current directory')
    .option('--https', 'clone over HTTPS instead of SSH')
    .option('-j, --json', 'output as JSON')
    .action(async (name: string, opts: NewOptions, command: Command) => {
      const outcome = unwrap(
        await createOrchestrator(command).createRepository({
          name,
          host: opts.host,
          organization: opts.org,
          isPrivate: opts.private,
          description: opts.description,
          init: opts.init,
          clone: opts.clone,
          https: opts.https,
        }),
      );
      printOutput(outcome, outcomeLines('Created', outcome), opts);
    });

  repo
    .command('fork')
    .description('Fork a repository into your account or an organization')
    .argument('<source>', 'repository to fork (owner/name or URL)')
    .argument('[target]', 'organization, or organization/name, for the fork')
    .option('--host <host>', 'hosting service when <source> is not a URL')
    .option('--clone', 'clone the fork into the current directory')
    .option('--https', 'clone over HTTPS instead of SSH')
    .option('-j, --json', 'output as JSON')
    .action(async (source: string, target: string | undefined, opts: ForkOptions, command: Command) => {
      const outcome = unwrap(
        await createOrchestrator(command).forkRepository(source, {
          target,
          host: opts.host,
          clone: opts.clone,
          https: opts.https,
        }),
      );
      printOutput(outcome, outcomeLines('Forked', outcome), opts);
    });

  repo
    .command('clone')
    .description('Clone a hosted repository')
    .argument('<reference>', 'repository to clone (name, owner/name or URL)')
    .argument('[directory]', 'directory to clone into')
    .option('--host <host>', 'hosting service when <reference> is not a URL')
    .option('--https', 'clone over HTTPS instead of SSH')
    .option('-j, --json', 'output as JSON')
    .action(async (reference: string, directory: string | undefined, opts: CloneOptions, command: Command) => {
      const outcome = unwrap(
        await createOrchestrator(command).cloneRepository(reference, {
          directory,
          host: opts.host,
          https: opts.https,
        }),
      );
      printOutput(outcome, outcomeLines('Cloned', outcome), opts);
    });

  repo
    .command('get')
    .description('Show a repository (default: the current one)')
    .argument('[reference]', 'repository (name, owner/name or URL)')
    .option('--host <host>', 'hosting service when <reference> is not a URL')
    .option('-j, --json', 'output as JSON')
    .action(async (reference: string | undefined, opts: GetOptions, command: Command) => {
      const repository = unwrap(await createOrchestrator(command).getRepository(reference, { host: opts.host }));
      printOutput(repository, describeRepository(repository), opts);
    });

  repo
    .command('delete')
    .description('Delete a repository (default: the current one); this cannot be undone')
    .argument('[reference]', 'repository (name, owner/name or URL)')
    .option('--host <host>', 'hosting service when <reference> is not a URL')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (reference: string | undefined, opts: DeleteOptions, command: Command) => {
      const deleted = unwrap(
        await createOrchestrator(command).deleteRepository(
          reference,
          (fullName) => confirmDeletion(fullName, opts.yes ?? false),
          { host: opts.host },
        ),
      );
      printOutput({ deleted }, [c.ok(`Deleted ${c.id(deleted)}`)]);
    });
}

async function confirmDeletion(fullName: string, yes: boolean): Promise<boolean> {
  if (yes) return true;
  if (!canPrompt()) {
    throw new ValidationError(`Refusing to delete ${fullName} without confirmation; pass --yes`);
  }
  const typed = await promptText(`Type ${fullName} to confirm deletion`, { required: true });
  return typed.trim() === fullName;
}

function outcomeLines(verb: string, outcome: RepositoryOutcome): string[] {
  const lines = [c.ok(`${verb} ${c.id(outcome.repository.fullName)}: ${outcome.repository.url}`)];
  if (outcome.clonedTo) {
    lines.push(c.dim(`Cloned into ${outcome.clonedTo}`));
  }
  return lines;
}

export function describeRepository(repository: RepositoryDescriptor): string[] {
  const pairs: Array<[string, string]> = [
    ['Name', c.id(repository.fullName)],
    ['Visibility', repository.isPrivate ? 'private' : 'public'],
    ['Default branch', c.branch(repository.defaultBranch)],
    ['URL', repository.url],
  ];
  if (repository.description) pairs.push(['Description', repository.description]);
  if (repository.cloneUrl) pairs.push(['HTTPS clone', repository.cloneUrl]);
  if (repository.sshUrl) pairs.push(['SSH clone', repository.sshUrl]);
  if (repository.forkedFrom) pairs.push(['Forked from', repository.forkedFrom]);
  return formatKeyValues(pairs);
}
