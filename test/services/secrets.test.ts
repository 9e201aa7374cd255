import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { canPrompt, promptSecret } from '../../src/lib/interactive.js';
import * as secrets from '../../src/services/secrets.js';

vi.mock('../../src/lib/interactive.js', () => ({
  canPrompt: vi.fn(() => false),
  promptSecret: vi.fn(),
}));

const canPromptMock = vi.mocked(canPrompt);
const promptSecretMock = vi.mocked(promptSecret);

describe('encrypted secret store', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitport-secrets-'));
    process.env.GITPORT_CONFIG_PATH = path.join(tempDir, 'config.yaml');
    process.env.GITPORT_PASSPHRASE = 'test-secret';
    secrets.resetPassphraseCache();
    canPromptMock.mockReturnValue(false);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    delete process.env.GITPORT_CONFIG_PATH;
    delete process.env.GITPORT_PASSPHRASE;
    vi.restoreAllMocks();
    promptSecretMock.mockReset();
  });

  it('stores tokens encrypted beside the config file', async () => {
    await secrets.setSecret('github.com', 'test-token-value');

    expect(secrets.secretsFile()).toBe(path.join(tempDir, 'secrets.json'));
    expect(fs.readFileSync(secrets.secretsFile(), 'utf8')).not.toContain('test-token-value');
    expect(await secrets.getSecret('github.com')).toBe('test-token-value');
    expect(await secrets.getSecret('gitlab.com')).toBeUndefined();
  });

  it('lists and deletes accounts', async () => {
    await secrets.setSecret('gitlab.com', 'one');
    await secrets.setSecret('bitbucket.org', 'alice:two');

    expect(secrets.listAccounts()).toEqual(['bitbucket.org', 'gitlab.com']);
    expect(secrets.deleteSecret('gitlab.com')).toBe(true);
    expect(secrets.deleteSecret('gitlab.com')).toBe(false);
    expect(secrets.listAccounts()).toEqual(['bitbucket.org']);
  });

  it('reports a wrong passphrase as NotLoggedIn', async () => {
    await secrets.setSecret('github.com', 'test-token-value');
    process.env.GITPORT_PASSPHRASE = 'another-secret';

    await expect(secrets.getSecret('github.com')).rejects.toMatchObject({
      kind: 'NotLoggedIn',
      message: 'Stored token for github.com could not be decrypted; wrong passphrase?',
    });
  });

  it('needs a passphrase when it cannot prompt', async () => {
    await secrets.setSecret('github.com', 'test-token-value');
    delete process.env.GITPORT_PASSPHRASE;

    await expect(secrets.getSecret('github.com')).rejects.toMatchObject({ kind: 'NotLoggedIn' });
  });

  it('asks for a new passphrase twice until both entries match', async () => {
    delete process.env.GITPORT_PASSPHRASE;
    canPromptMock.mockReturnValue(true);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    promptSecretMock
      .mockResolvedValueOnce('first-try')
      .mockResolvedValueOnce('typo')
      .mockResolvedValueOnce('test-secret')
      .mockResolvedValueOnce('test-secret');

    await secrets.setSecret('github.com', 'test-token-value');

    expect(promptSecretMock.mock.calls.map((call) => call[0])).toEqual([
      'Create a passphrase to protect tokens',
      'Confirm passphrase',
      'Create a passphrase to protect tokens',
      'Confirm passphrase',
    ]);
    expect(await secrets.getSecret('github.com')).toBe('test-token-value');
    expect(promptSecretMock).toHaveBeenCalledTimes(4);
  });
});

describe('encrypt / decrypt', () => {
  it('returns undefined for the wrong passphrase', () => {
    const entry = secrets.encrypt('test-secret', 'payload');

    expect(secrets.decrypt('test-secret', entry)).toBe('payload');
    expect(secrets.decrypt('not-the-secret', entry)).toBeUndefined();
  });
});
