import { Command, Option } from 'commander';
import { c } from '../lib/colors.js';
import { canPrompt, promptText, readStdin } from '../lib/interactive.js';
import { formatTable, printOutput, renderBoxTable } from '../lib/printer.js';
import { MERGE_STRATEGIES, type MergeStrategy, type PullRequest, type PullRequestStateFilter } from '../providers/types.js';
import { collectValues, createOrchestrator, unwrap } from './context.js';

interface CreateOptions {
  title?: string;
  description?: string;
  target?: string;
  reviewer: string[];
  merge?: boolean;
  delete?: boolean;
  json?: boolean;
}

interface GetOptions {
  source?: string;
  target?: string;
  json?: boolean;
}

interface ListOptions {
  state: PullRequestStateFilter;
  author?: string;
  source?: string;
  target?: string;
  json?: boolean;
}

interface MergeCommandOptions {
  strategy: MergeStrategy;
  delete?: boolean;
  force?: boolean;
  json?: boolean;
}

interface DeclineCommandOptions {
  delete?: boolean;
  json?: boolean;
}

export function registerPrCommand(program: Command): void {
  const pr = program
    .command('pr')
    .description('Create, inspect and act on pull requests for the current branch')
    .addHelpText(
      'after',
      `\nExamples:\n  $ gitport pr create -m "Fix login redirect" -r alice -r bob\n  $ gitport pr create -m "Bump deps" --merge --delete\n  $ gitport pr list --state all --author me\n  $ gitport pr get --json\n  $ gitport pr merge --strategy squash --delete\n  $ gitport pr decline\n`,
    );

  pr.command('create')
    .description('Open a pull request from the current branch (pushes it first if it has no upstream)')
    .option('-m, --title <title>', 'pull request title')
    .option('-d, --description <text>', 'description; "-" reads stdin (default: commit subjects)')
    .option('-t, --target <branch>', 'target branch (default: repository default branch)')
    .option('-r, --reviewer <username>', 'request a reviewer (repeatable or comma separated)', collectValues, [])
    .option('--merge', 'merge right away, then check out the target branch')
    .option('--delete', 'have the provider close the source branch on merge (with --merge, delete it now)')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: CreateOptions, command: Command) => {
      let title = opts.title;
      if (!title && canPrompt()) {
        title = await promptText('Pull request title', { required: true });
      }
      const description = opts.description === '-' ? await readStdin() : opts.description;
      const result = await createOrchestrator(command).createPullRequest({
        title,
        description,
        target: opts.target,
        reviewers: opts.reviewer,
        merge: opts.merge,
        deleteBranch: opts.delete,
      });
      const created = unwrap(result);
      const lines = [c.ok(`Created pull request ${c.id(`#${created.id}`)}: ${created.url}`)];
      if (created.state === 'merged') {
        lines.push(c.ok(`Merged pull request ${c.id(`#${created.id}`)} into ${c.branch(created.targetBranch)}`));
      }
      printOutput(created, lines, opts);
    });

  pr.command('get')
    .description('Show the open pull request for the current branch')
    .option('-s, --source <branch>', 'source branch (default: current branch)')
    .option('-t, --target <branch>', 'only match this target branch')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: GetOptions, command: Command) => {
      const found = unwrap(await createOrchestrator(command).getPullRequest({ source: opts.source, target: opts.target }));
      printOutput(found, describePullRequest(found), opts);
    });

  pr.command('list')
    .description('List pull requests of the current repository')
    .addOption(
      new Option('--state <state>', 'filter by state').choices(['open', 'merged', 'declined', 'all']).default('open'),
    )
    .option('-a, --author <username>', 'filter by author ("me" for yourself)')
    .option('-s, --source <branch>', 'filter by source branch')
    .option('-t, --target <branch>', 'filter by target branch')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: ListOptions, command: Command) => {
      const prs = unwrap(
        await createOrchestrator(command).listPullRequests({
          state: opts.state,
          author: opts.author,
          source: opts.source,
          target: opts.target,
        }),
      );
      const lines =
        prs.length === 0
          ? [c.dim('No pull requests found.')]
          : formatTable(prs, [
              { header: 'ID', value: (row) => c.id(`#${row.id}`) },
              { header: 'State', value: (row) => c.state(row.state) },
              { header: 'Branches', value: (row) => `${row.sourceBranch} -> ${row.targetBranch}` },
              { header: 'Author', value: (row) => row.author ?? '' },
              { header: 'Title', value: (row) => row.title },
            ]);
      printOutput(prs, lines, opts);
    });

  pr.command('approve')
    .description('Approve the open pull request for the current branch')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: { json?: boolean }, command: Command) => {
      const approved = unwrap(await createOrchestrator(command).approvePullRequest());
      printOutput(approved, [c.ok(`Approved pull request ${c.id(`#${approved.id}`)}`)], opts);
    });

  pr.command('merge')
    .description('Merge the open pull request for the current branch')
    .addOption(new Option('--strategy <strategy>', 'merge strategy').choices(MERGE_STRATEGIES).default('merge'))
    .option('--delete', 'delete the source branch locally and remotely afterwards')
    .option('-f, --force', 'skip local checks and force-push the branch before merging')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: MergeCommandOptions, command: Command) => {
      const merged = unwrap(
        await createOrchestrator(command).mergePullRequest({
          strategy: opts.strategy,
          deleteBranch: opts.delete,
          force: opts.force,
        }),
      );
      printOutput(merged, [c.ok(`Merged pull request ${c.id(`#${merged.id}`)} into ${c.branch(merged.targetBranch)}`)], opts);
    });

  pr.command('decline')
    .alias('close')
    .description('Decline (close without merging) the open pull request for the current branch')
    .option('--delete', 'delete the local source branch afterwards')
    .option('-j, --json', 'output as JSON')
    .action(async (opts: DeclineCommandOptions, command: Command) => {
      const declined = unwrap(await createOrchestrator(command).declinePullRequest({ deleteBranch: opts.delete }));
      printOutput(declined, [c.ok(`Declined pull request ${c.id(`#${declined.id}`)}`)], opts);
    });
}

export function describePullRequest(pr: PullRequest): string[] {
  const rows = [[c.bold('Field'), c.bold('Value')], ...formatPairs(pr)];
  const lines = [c.heading(`#${pr.id} ${pr.title}`), ...renderBoxTable(rows)];
  if (pr.description) {
    lines.push('', ...pr.description.split('\n'));
  }
  return lines;
}

function formatPairs(pr: PullRequest): Array<[string, string]> {
  const pairs: Array<[string, string]> = [
    ['State', c.state(pr.state)],
    ['Source', c.branch(pr.sourceBranch)],
    ['Target', c.branch(pr.targetBranch)],
    ['Approved', pr.isApproved ? c.ok('yes') : 'no'],
  ];
  if (pr.author) pairs.push(['Author', pr.author]);
  if (pr.reviewers.length > 0) pairs.push(['Reviewers', pr.reviewers.join(', ')]);
  pairs.push(['Updated', pr.updatedAt], ['URL', pr.url]);
  return pairs;
}
