import { Command } from 'commander';
import process from 'node:process';

export function registerVersionCommand(program: Command, version: string): void {
  program
    .command('version')
    .description('Print the CLI version')
    .option('-j, --json', 'output as JSON')
    .action((opts: { json?: boolean }) => {
      const line = opts.json
        ? JSON.stringify({ version, node: process.versions.node })
        : `gitport ${version} (node ${process.versions.node})`;
      process.stdout.write(`${line}\n`);
    });
}
