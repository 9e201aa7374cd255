import process from 'node:process';
import { table, getBorderCharacters, type TableUserConfig } from 'table';
import { c } from './colors.js';

export const BOX_TABLE_CONFIG: TableUserConfig = {
  border: getBorderCharacters('ramac'),
  columnDefault: {
    paddingLeft: 1,
    paddingRight: 1,
  },
};

export function renderBoxTable(rows: string[][], config: TableUserConfig = BOX_TABLE_CONFIG): string[] {
  if (rows.length === 0) {
    return [];
  }
  return table(rows, config).trimEnd().split('\n');
}

export interface OutputOptions {
  json?: boolean;
}

export interface TableColumn<T> {
  header: string;
  value: (row: T) => string;
}

/** Writes `data` as JSON with `--json`, otherwise the human-readable lines. */
export function printOutput<T>(data: T, lines: string[], options: OutputOptions = {}): void {
  if (options.json) {
    process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
    return;
  }
  for (const line of lines) {
    process.stdout.write(`${line}\n`);
  }
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/** Column-aligned list; widths ignore colour escape codes. */
export function formatTable<T>(rows: T[], columns: TableColumn<T>[]): string[] {
  if (rows.length === 0) {
    return [];
  }
  const widths = columns.map((col) => col.header.length);
  const cells = rows.map((row) =>
    columns.map((col, idx) => {
      const value = col.value(row);
      widths[idx] = Math.max(widths[idx], visibleLength(value));
      return value;
    }),
  );

  // The last column is left ragged so long titles do not pad every line.
  const last = columns.length - 1;
  const render = (values: string[]) =>
    values.map((value, idx) => (idx === last ? value : padRight(value, widths[idx]))).join('  ');

  const header = render(columns.map((col, idx) => c.bold(padRight(col.header, widths[idx]))));
  const separator = widths.map((width) => '-'.repeat(width)).join('  ');
  return [header, separator, ...cells.map(render)];
}

export function formatKeyValues(pairs: Array<[string, string]>): string[] {
  if (pairs.length === 0) {
    return [];
  }
  const width = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${c.dim(padRight(key, width))} : ${value}`);
}

function padRight(text: string, width: number): string {
  const length = visibleLength(text);
  return length >= width ? text : text + ' '.repeat(width - length);
}
