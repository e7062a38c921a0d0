/**
 * Unit Tests: Desired-State File and Token Resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadDesiredStateFile, validateDesiredStateDocument } from '../../src/config/desired-state.js';
import { resolveProToken } from '../../src/config/token.js';
import { resolveDesiredStateInput } from '../../src/config/resolve.js';
import { ConfigError } from '../../src/config/errors.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'pro-sync-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('validateDesiredStateDocument', () => {
  it('accepts the primary keys', () => {
    expect(
      validateDesiredStateDocument(
        { state: 'attached', token: 'test-token', enabled: ['esm-apps'], disabled: ['livepatch'] },
        '/etc/pro-sync/state.yaml'
      )
    ).toEqual({
      path: '/etc/pro-sync/state.yaml',
      attachment: 'attached',
      token: 'test-token',
      tokenFile: undefined,
      enable: ['esm-apps'],
      disable: ['livepatch'],
    });
  });

  it('accepts the orchestration aliases', () => {
    const file = validateDesiredStateDocument(
      { pro_token: 'test-token', pro_services_enable: ['esm-infra'], pro_services_disable: ['fips'] },
      '/tmp/state.yaml'
    );

    expect(file.token).toBe('test-token');
    expect(file.enable).toEqual(['esm-infra']);
    expect(file.disable).toEqual(['fips']);
  });

  it('resolves token_file against the file directory', () => {
    expect(validateDesiredStateDocument({ token_file: 'token' }, '/etc/pro-sync/state.yaml').tokenFile).toBe(
      '/etc/pro-sync/token'
    );
  });

  it('treats an empty document as no settings', () => {
    expect(validateDesiredStateDocument(null, '/tmp/empty.yaml')).toEqual({ path: '/tmp/empty.yaml' });
  });

  it('collects every problem', () => {
    const error = configError(() =>
      validateDesiredStateDocument(
        {
          state: 'present',
          token: 42,
          pro_token: 'test-token',
          enabled: 'esm-apps',
          disabled: ['fips', 3],
          extra: true,
        },
        '/tmp/state.yaml'
      )
    );

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.issues).toEqual([
      'unknown key: extra',
      'state must be "attached" or "detached" (got "present")',
      'token must be a string',
      'enabled must be a list of service names',
      'disabled[1] must be a string',
    ]);
  });

  it('rejects setting both a key and its alias', () => {
    const error = configError(() =>
      validateDesiredStateDocument({ enabled: ['a'], pro_services_enable: ['b'] }, '/tmp/state.yaml')
    );

    expect(error.issues).toEqual(['enabled and pro_services_enable are aliases; set only one']);
  });

  it('rejects a document that is not a mapping', () => {
    expect(configError(() => validateDesiredStateDocument(['a'], '/tmp/state.yaml')).code).toBe('CONFIG_INVALID');
  });
});

describe('loadDesiredStateFile', () => {
  it('loads YAML relative to the base path', async () => {
    write('state.yaml', 'state: attached\nenabled:\n  - esm-apps\n  - esm-infra\n');

    const file = await loadDesiredStateFile('state.yaml', dir);

    expect(file.path).toBe(join(dir, 'state.yaml'));
    expect(file.attachment).toBe('attached');
    expect(file.enable).toEqual(['esm-apps', 'esm-infra']);
  });

  it('reports a missing file', async () => {
    await expect(loadDesiredStateFile(join(dir, 'missing.yaml'))).rejects.toMatchObject({
      code: 'CONFIG_NOT_FOUND',
    });
  });

  it('reports unparsable YAML', async () => {
    const path = write('broken.yaml', 'enabled: [esm-apps\n');

    await expect(loadDesiredStateFile(path)).rejects.toMatchObject({ code: 'CONFIG_PARSE_ERROR' });
  });
});

describe('resolveProToken', () => {
  it('prefers the --token-file flag', () => {
    const path = write('cli-token', 'cli-token-value\n');

    expect(
      resolveProToken({ cliTokenFile: path, configToken: 'config-token', env: { PRO_TOKEN: 'env-token' } })
    ).toEqual({ token: 'cli-token-value', source: 'cli_file' });
  });

  it('then PRO_TOKEN, then PRO_TOKEN_FILE', () => {
    const path = write('env-token', 'env-file-token');

    expect(resolveProToken({ env: { PRO_TOKEN: ' env-token ', PRO_TOKEN_FILE: path } })).toEqual({
      token: 'env-token',
      source: 'env',
    });
    expect(resolveProToken({ env: { PRO_TOKEN: '', PRO_TOKEN_FILE: path }, configToken: 'config-token' })).toEqual({
      token: 'env-file-token',
      source: 'env_file',
    });
  });

  it('then the config token, then the config token file', () => {
    const path = write('config-token', 'config-file-token');

    expect(resolveProToken({ env: {}, configToken: 'config-token', configTokenFile: path })).toEqual({
      token: 'config-token',
      source: 'config',
    });
    expect(resolveProToken({ env: {}, configTokenFile: path })).toEqual({
      token: 'config-file-token',
      source: 'config_file',
    });
  });

  it('returns no token when nothing is set', () => {
    expect(resolveProToken({ env: {} })).toEqual({ token: null, source: null });
  });

  it('fails on an unreadable token file', () => {
    const error = configError(() => resolveProToken({ cliTokenFile: join(dir, 'missing'), env: {} }));
    expect(error.code).toBe('TOKEN_FILE_UNREADABLE');
  });
});

describe('resolveDesiredStateInput', () => {
  it('lets flags replace file lists and state', async () => {
    write('token', 'test-token\n');
    write('state.yaml', 'state: detached\ntoken_file: token\nenabled: [esm-apps]\ndisabled: [fips]\n');

    const resolved = await resolveDesiredStateInput({
      configPath: 'state.yaml',
      cwd: dir,
      env: {},
      flags: { state: 'attached', enable: ['esm-infra'] },
    });

    expect(resolved).toEqual({
      input: { attachment: 'attached', token: 'test-token', enable: ['esm-infra'], disable: ['fips'] },
      configPath: join(dir, 'state.yaml'),
      tokenSource: 'config_file',
    });
  });

  it('works without a config file', async () => {
    const resolved = await resolveDesiredStateInput({ env: { PRO_TOKEN: 'test-token' }, flags: { disable: ['livepatch'] } });

    expect(resolved).toEqual({
      input: { attachment: undefined, token: 'test-token', enable: undefined, disable: ['livepatch'] },
      configPath: undefined,
      tokenSource: 'env',
    });
  });

  it('rejects an unknown --state', async () => {
    await expect(resolveDesiredStateInput({ env: {}, flags: { state: 'gone' } })).rejects.toBeInstanceOf(ConfigError);
  });
});
