import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import { SchemaRegistry, getSchemaRegistry } from '../../src/services/schema-registry.js';

describe('SchemaRegistry', () => {
  it('loads the bundled config and provider schemas by relative key', () => {
    const keys = getSchemaRegistry().listSchemas();

    expect(keys).toContain('config');
    expect(keys).toContain('providers/github/pull-request');
    expect(keys).toContain('providers/gitlab/merge-request');
    expect(keys).toContain('providers/bitbucket/page');
    expect(keys).toContain('providers/gitea/review');
  });

  it('narrows valid data and reports invalid data as MalformedResponse', () => {
    const registry = getSchemaRegistry();

    expect(registry.parse<{ login: string }>('providers/github/user', { login: 'alice' }, 'get user').login).toBe('alice');
    expect(() => registry.parse('providers/github/user', { id: 1 }, 'get user')).toThrow(
      expect.objectContaining({ kind: 'MalformedResponse' }),
    );
  });

  it('checks date-time formats', () => {
    const result = getSchemaRegistry().validate('providers/gitlab/merge-request', {
      iid: 1,
      title: 'T',
      state: 'opened',
      source_branch: 'a',
      target_branch: 'b',
      web_url: 'https://gitlab.com/a/b/-/merge_requests/1',
      created_at: 'yesterday',
      updated_at: '2024-05-01T09:00:00Z',
    });

    expect(result.valid).toBe(false);
    expect(result.errors?.[0]?.instancePath).toBe('/created_at');
  });

  it('lets callers choose the error raised for invalid data', () => {
    expect(() =>
      getSchemaRegistry().parse('config', { http: { retries: 99 } }, 'Invalid config', (message) => new ValidationError(message)),
    ).toThrow(ValidationError);
  });

  it('loads schemas from another directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitport-schemas-'));
    fs.mkdirSync(path.join(dir, 'nested'));
    fs.writeFileSync(
      path.join(dir, 'nested', 'thing.schema.json'),
      JSON.stringify({ type: 'object', required: ['name'], properties: { name: { type: 'string' } } }),
    );

    const registry = new SchemaRegistry(dir);

    expect(registry.listSchemas()).toEqual(['nested/thing']);
    expect(() => registry.parse('missing', {}, 'ctx')).toThrow('Unknown schema key: missing');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
