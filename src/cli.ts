import fs from 'node:fs';
import process from 'node:process';
import { Command } from 'commander';
import { registerAuthCommand } from './commands/auth.js';
import { registerConfigCommand } from './commands/config.js';
import { registerPrCommand } from './commands/pr.js';
import { registerRepoCommand } from './commands/repo.js';
import { registerVersionCommand } from './commands/version.js';
import { exitCodeFor } from './errors.js';
import { setEnabled as setColorEnabled } from './lib/colors.js';
import { createLogger } from './logger.js';

const logger = createLogger();

export function packageVersion(): string {
  const manifest: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

export function buildProgram(version: string): Command {
  const program = new Command();

  program
    .name('gitport')
    .description('Pull requests and repositories on GitHub, GitLab, Bitbucket and Gitea from one CLI')
    .version(version, '--version', 'print the CLI version')
    .configureHelp({
      sortSubcommands: true,
      sortOptions: true,
    })
    .addHelpText(
      'after',
      `\nExamples:\n  $ gitport auth login github.com\n  $ gitport pr create -m "Add retry to uploads" -r alice\n  $ gitport pr list --state all --json\n  $ gitport pr merge --strategy squash --delete\n  $ gitport repo new tools --private --clone\n\nExit codes:\n  1 unexpected error   2 invalid input   3 unrecognized remote   4 authentication\n  5 branch precondition   6 hosting service error   7 git failure\n\nEnvironment:\n  GITPORT_LOG_LEVEL=debug|info|warn|error   Controls logging level\n  GITPORT_TOKEN                             Token used instead of the stored one\n  GITPORT_PASSPHRASE                        Unlocks the encrypted token store\n  GITPORT_CONFIG_PATH                       Overrides the config file location\n  GITPORT_NO_INTERACTIVE=1                  Disables prompts\n  NO_COLOR                                  Disables colored output\n`,
    )
    .option('-v, --verbose', 'enable verbose logging')
    .option('-q, --quiet', 'suppress non-error output')
    .option('--no-interactive', 'disable interactive prompts')
    .option('--no-color', 'disable colored output')
    .option('-C, --chdir <path>', 'change to directory before executing command')
    .option('--token <token>', 'token to use instead of the stored credential')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      if (opts.interactive === false) {
        process.env.GITPORT_NO_INTERACTIVE = '1';
      }
      const baseColor = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;
      setColorEnabled(opts.color !== false && baseColor);
      if (opts.verbose) {
        logger.setLevel('debug');
        logger.debug('Verbose mode enabled');
      } else if (opts.quiet) {
        logger.setLevel('warn');
      }
      if (typeof opts.chdir === 'string') {
        process.chdir(opts.chdir);
        logger.debug(`Changed working directory to ${process.cwd()}`);
      }
    });

  registerVersionCommand(program, version);
  registerConfigCommand(program);
  registerAuthCommand(program);
  registerPrCommand(program);
  registerRepoCommand(program);
  return program;
}

/** Parses `argv` and runs the matching command; failures set the exit code. */
export async function run(argv: string[]): Promise<void> {
  const program = buildProgram(packageVersion());
  try {
    await program.parseAsync(sanitizeArgv(argv));
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && logger.isVerbose()) {
      logger.error(error.stack ?? '');
    }
    process.exitCode = exitCodeFor(error);
  }
}

// `npm run start -- pr list` leaves a literal `--` ahead of the subcommand.
function sanitizeArgv(argv: string[]): string[] {
  if (argv[2] !== '--') return argv;
  return [argv[0], argv[1], ...argv.slice(3)];
}
