/**
 * Unit Tests: Process Execution and pro Discovery
 *
 * The runner is exercised with the current Node binary standing in for pro.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { execFileRunner, findProExecutable } from '../../src/pro/exec.js';
import { ProNotFoundError } from '../../src/pro/errors.js';

describe('execFileRunner', () => {
  it('captures stdout and a zero exit code', async () => {
    const result = await execFileRunner(process.execPath, ['-e', 'process.stdout.write("hello")']);

    expect(result).toEqual({ exitCode: 0, stdout: 'hello', stderr: '', timedOut: false });
  });

  it('resolves with a non-zero exit code and stderr', async () => {
    const result = await execFileRunner(process.execPath, [
      '-e',
      'process.stderr.write("boom"); process.exit(3)',
    ]);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('boom');
    expect(result.timedOut).toBe(false);
  });

  it('kills the process when the timeout expires', async () => {
    const result = await execFileRunner(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeoutMs: 200,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('rejects when the program cannot be started', async () => {
    await expect(execFileRunner('/nonexistent/pro', ['status'])).rejects.toThrow('Failed to run /nonexistent/pro');
  });
});

describe('findProExecutable', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pro-sync-exec-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds an executable on the search path', () => {
    const pro = join(dir, 'pro-sync-fake-pro');
    writeFileSync(pro, '#!/bin/sh\n');
    chmodSync(pro, 0o755);

    expect(findProExecutable({ searchPath: dir, name: 'pro-sync-fake-pro' })).toBe(pro);
  });

  it('skips files that are not executable', () => {
    const pro = join(dir, 'pro-sync-fake-pro');
    writeFileSync(pro, '#!/bin/sh\n');
    chmodSync(pro, 0o644);

    expect(() => findProExecutable({ searchPath: dir, name: 'pro-sync-fake-pro' })).toThrow(ProNotFoundError);
  });

  it('lists every searched path when nothing is found', () => {
    let caught: unknown;
    try {
      findProExecutable({ searchPath: dir, name: 'pro-sync-missing' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ProNotFoundError);
    if (caught instanceof ProNotFoundError) {
      expect(caught.searchedPaths).toEqual([
        join(dir, 'pro-sync-missing'),
        '/usr/local/sbin/pro-sync-missing',
        '/usr/sbin/pro-sync-missing',
        '/sbin/pro-sync-missing',
        '/usr/bin/pro-sync-missing',
      ]);
    }
  });

  it('accepts an executable custom path', () => {
    const pro = join(dir, 'pro');
    writeFileSync(pro, '#!/bin/sh\n');
    chmodSync(pro, 0o755);

    expect(findProExecutable({ customPath: pro })).toBe(pro);
  });

  it('rejects a custom path that is not a file', () => {
    expect(() => findProExecutable({ customPath: dir })).toThrow(ProNotFoundError);
  });
});
