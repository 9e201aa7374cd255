import process from 'node:process';
import chalk from 'chalk';

let enabled = computeDefaultEnabled();

function computeDefaultEnabled(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  return Boolean(process.stdout.isTTY);
}

export function setEnabled(value: boolean): void {
  enabled = value;
}

function apply(style: (s: string) => string, text: string): string {
  return enabled ? style(text) : text;
}

const STATE_COLORS: Record<string, (s: string) => string> = {
  open: chalk.green,
  merged: chalk.magenta,
  declined: chalk.red,
};

export const c = {
  bold: (s: string) => apply(chalk.bold, s),
  dim: (s: string) => apply(chalk.dim, s),
  heading: (s: string) => apply(chalk.cyan.bold, s),
  subheading: (s: string) => apply(chalk.cyan, s),
  ok: (s: string) => apply(chalk.green, s),
  warn: (s: string) => apply(chalk.yellow, s),
  error: (s: string) => apply(chalk.red, s),
  id: (s: string) => apply(chalk.cyan, s),
  branch: (s: string) => apply(chalk.blue, s),
  state: (name: string) => apply(STATE_COLORS[name] ?? chalk.white, name),
};

export type Colors = typeof c;
