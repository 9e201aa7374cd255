import process from 'node:process';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildProgram } from '../../src/cli.js';
import { CliEnv, argv } from '../helpers/cli-env.js';

describe('version command', () => {
  let env: CliEnv;

  beforeEach(() => {
    env = new CliEnv();
    env.capture();
  });

  afterEach(() => {
    env.dispose();
  });

  it('prints the CLI and Node.js versions', async () => {
    await buildProgram('1.2.3').parseAsync(argv('version'));

    expect(env.stdout()).toBe(`gitport 1.2.3 (node ${process.versions.node})\n`);
  });

  it('emits JSON with --json', async () => {
    await buildProgram('1.2.3').parseAsync(argv('version', '--json'));

    expect(env.json()).toEqual({ version: '1.2.3', node: process.versions.node });
  });
});
