import process from 'node:process';
import { promptInput as rlInput, promptSelect as rlSelect } from './prompter.js';

type Clack = typeof import('@clack/prompts');

type TextOptions = {
  defaultValue?: string;
  required?: boolean;
  placeholder?: string;
  validate?: (value: string) => string | null;
};

type Choice = { label: string; value: string };

function attachedToTty(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export function canPrompt(): boolean {
  return (
    process.env.GITPORT_NO_INTERACTIVE !== '1' &&
    (attachedToTty() || process.env.GITPORT_FORCE_INTERACTIVE === '1')
  );
}

async function getClack(): Promise<Clack | null> {
  // Only use clack on a real TTY to avoid uv_tty_init errors in tests/CI.
  if (!attachedToTty()) {
    return null;
  }
  return import('@clack/prompts');
}

function bail(p: Clack): never {
  p.cancel('Aborted');
  process.exit(130);
}

export async function promptText(question: string, opts: TextOptions = {}): Promise<string> {
  const p = await getClack();
  if (!p || !canPrompt()) {
    return rlInput(question, {
      defaultValue: opts.defaultValue,
      required: opts.required,
      allowEmpty: !opts.required,
      validate: opts.validate,
    });
  }
  const res = await p.text({
    message: question,
    initialValue: opts.defaultValue,
    placeholder: opts.placeholder,
    validate: (value: string) => {
      if (opts.required && value.trim() === '') return 'A value is required.';
      return opts.validate?.(value) ?? undefined;
    },
  });
  if (p.isCancel(res)) bail(p);
  return res;
}

export async function promptSecret(question: string, opts: { required?: boolean } = {}): Promise<string> {
  const p = await getClack();
  if (!p || !canPrompt()) {
    // fallback to normal input without echo suppression
    return rlInput(question, { required: opts.required, allowEmpty: !opts.required });
  }
  const res = await p.password({ message: question });
  if (p.isCancel(res)) bail(p);
  return res;
}

export async function promptSelect(question: string, choices: Choice[], defaultValue?: string): Promise<string> {
  const p = await getClack();
  if (!p || !canPrompt()) {
    return rlSelect(question, choices, { defaultValue });
  }
  const res = await p.select({
    message: question,
    options: choices.map((c) => ({ label: c.label, value: c.value })),
    initialValue: defaultValue,
  });
  if (p.isCancel(res)) bail(p);
  return res;
}

/** Reads all of standard input, e.g. for `--description -`. */
export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}
