import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { vi, type MockInstance } from 'vitest';

const TRACKED_ENV = ['GITPORT_CONFIG_PATH', 'GITPORT_PASSPHRASE', 'GITPORT_NO_INTERACTIVE', 'GITPORT_TOKEN'] as const;

/** Isolated config directory plus captured stdout/stderr for command tests. */
export class CliEnv {
  readonly dir: string;
  readonly configFile: string;
  private readonly savedEnv = new Map<string, string | undefined>();
  private stdoutSpy?: MockInstance<typeof process.stdout.write>;
  private stderrSpy?: MockInstance<typeof process.stderr.write>;

  constructor() {
    this.dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitport-cli-'));
    this.configFile = path.join(this.dir, 'config.yaml');
    for (const key of TRACKED_ENV) {
      this.savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
    process.env.GITPORT_CONFIG_PATH = this.configFile;
    process.env.GITPORT_PASSPHRASE = 'test-secret';
  }

  capture(): void {
    this.stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    this.stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  }

  stdout(): string {
    return (this.stdoutSpy?.mock.calls ?? []).map((call) => String(call[0])).join('');
  }

  stderr(): string {
    return (this.stderrSpy?.mock.calls ?? []).map((call) => String(call[0])).join('');
  }

  /** Parses stdout as the JSON document of the last command. */
  json(): unknown {
    return JSON.parse(this.stdout());
  }

  resetOutput(): void {
    this.stdoutSpy?.mockClear();
    this.stderrSpy?.mockClear();
  }

  dispose(): void {
    this.stdoutSpy?.mockRestore();
    this.stderrSpy?.mockRestore();
    for (const [key, value] of this.savedEnv) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    fs.rmSync(this.dir, { recursive: true, force: true });
  }
}

export function argv(...args: string[]): string[] {
  return ['node', 'gitport', '--no-interactive', ...args];
}
