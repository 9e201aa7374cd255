import fs from 'node:fs';
import { Command } from 'commander';
import YAML from 'yaml';
import { configPath, httpOptionsFor, loadConfig } from '../config/config.js';
import { c } from '../lib/colors.js';
import { printOutput, renderBoxTable } from '../lib/printer.js';
import { DEFAULT_HTTP_OPTIONS } from '../providers/types.js';

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the configuration file location and its resolved contents')
    .option('-j, --json', 'output as JSON')
    .addHelpText(
      'after',
      `\nExamples:\n  $ gitport config\n  $ gitport config --json\n\nNotes:\n  - The file lives at $GITPORT_CONFIG_PATH, else $XDG_CONFIG_HOME/gitport/config.yaml,\n    else ~/.config/gitport/config.yaml.\n  - Tokens are kept in the encrypted secret store, never in this file.\n`,
    )
    .action((opts: { json?: boolean }) => {
      const file = configPath();
      const config = loadConfig();
      const defaults = httpOptionsFor(config, '');
      const payload = {
        path: file,
        exists: fs.existsSync(file),
        config,
        http: { timeoutMs: defaults.timeoutMs, retries: defaults.retries, maxPages: defaults.maxPages },
      };

      const rows = [
        [c.bold('Field'), c.bold('Value')],
        ['Config file', payload.exists ? file : `${file} ${c.dim('(not created yet)')}`],
        ['Hosts', String(Object.keys(config.hosts ?? {}).length)],
        ['HTTP timeout', `${defaults.timeoutMs} ms${defaults.timeoutMs === DEFAULT_HTTP_OPTIONS.timeoutMs ? c.dim(' (default)') : ''}`],
        ['HTTP retries', `${defaults.retries}${defaults.retries === DEFAULT_HTTP_OPTIONS.retries ? c.dim(' (default)') : ''}`],
        ['Page cap', `${defaults.maxPages}${defaults.maxPages === DEFAULT_HTTP_OPTIONS.maxPages ? c.dim(' (default)') : ''}`],
      ];
      const lines = [c.heading('Configuration'), ...renderBoxTable(rows)];
      if (config.hosts && Object.keys(config.hosts).length > 0) {
        lines.push('', c.subheading('Hosts'), ...YAML.stringify(config.hosts).trimEnd().split('\n'));
      }
      printOutput(payload, lines, opts);
    });
}
