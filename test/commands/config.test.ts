import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildProgram } from '../../src/cli.js';
import { CliEnv, argv } from '../helpers/cli-env.js';

describe('config command', () => {
  let env: CliEnv;

  beforeEach(() => {
    env = new CliEnv();
    env.capture();
  });

  afterEach(() => {
    env.dispose();
  });

  it('reports a config file that does not exist yet', async () => {
    await buildProgram('0.1.0').parseAsync(argv('config'));

    const output = env.stdout();
    expect(output).toContain('Configuration');
    expect(output).toContain(`${env.configFile} (not created yet)`);
    expect(output).toContain('30000 ms (default)');
    expect(output).not.toContain('Hosts\n');
  });

  it('emits the resolved configuration as JSON', async () => {
    fs.writeFileSync(
      env.configFile,
      'hosts:\n  code.acme.dev:\n    type: gitea\nhttp:\n  timeout_ms: 5000\n',
    );

    await buildProgram('0.1.0').parseAsync(argv('config', '--json'));

    expect(env.json()).toEqual({
      path: env.configFile,
      exists: true,
      config: { hosts: { 'code.acme.dev': { type: 'gitea' } }, http: { timeout_ms: 5000 } },
      http: { timeoutMs: 5000, retries: 2, maxPages: 50 },
    });
  });

  it('lists configured hosts as YAML', async () => {
    fs.writeFileSync(env.configFile, 'hosts:\n  code.acme.dev:\n    type: gitea\n');

    await buildProgram('0.1.0').parseAsync(argv('config'));

    expect(env.stdout()).toContain('code.acme.dev:\n  type: gitea\n');
  });
});
