/**
 * Process execution and executable discovery for the pro CLI
 *
 * Commands are run without a shell (execFile) so service names and tokens are
 * never interpreted by sh.
 */

import { execFile } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { CommandOutput, CommandRunner, RunOptions } from './types.js';
import { ProNotFoundError } from './errors.js';

/**
 * Directories searched after PATH, matching where distributions install `pro`
 */
const SBIN_PATHS = ['/usr/local/sbin', '/usr/sbin', '/sbin', '/usr/bin'];

/** 16 MiB; `pro status` is small but `--wait` output can include long messages */
const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Default CommandRunner backed by node:child_process execFile
 */
export const execFileRunner: CommandRunner = (file: string, args: string[], options: RunOptions = {}) => {
  return new Promise<CommandOutput>((resolve, reject) => {
    execFile(
      file,
      args,
      {
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER,
        timeout: options.timeoutMs ?? 0,
        env: { ...process.env, LANG: 'C.UTF-8' },
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }

        // Spawn failures (ENOENT, EACCES) carry a string code and no exit status
        if (typeof error.code === 'string') {
          reject(new Error(`Failed to run ${file}: ${error.message}`));
          return;
        }

        const timedOut = options.timeoutMs !== undefined && options.timeoutMs > 0 && error.killed === true;
        resolve({
          exitCode: typeof error.code === 'number' ? error.code : null,
          stdout,
          stderr,
          timedOut,
        });
      }
    );
  });
};

/**
 * Options for executable discovery
 */
export interface FindProOptions {
  /** Explicit path; bypasses the search */
  customPath?: string;
  /** PATH-style list of directories (default: process.env.PATH) */
  searchPath?: string;
  /** Executable name (default: pro) */
  name?: string;
}

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the pro executable on PATH or in the sbin directories
 *
 * @returns Absolute path to the executable
 * @throws ProNotFoundError if pro cannot be found
 */
export function findProExecutable(options: FindProOptions = {}): string {
  const name = options.name ?? 'pro';

  if (options.customPath) {
    if (isExecutableFile(options.customPath)) {
      return options.customPath;
    }
    throw new ProNotFoundError(
      [options.customPath],
      `Custom pro path is not an executable file: ${options.customPath}`
    );
  }

  const pathDirs = (options.searchPath ?? process.env.PATH ?? '')
    .split(delimiter)
    .filter((dir) => dir.length > 0);

  const searched: string[] = [];
  for (const dir of [...pathDirs, ...SBIN_PATHS]) {
    const candidate = join(dir, name);
    if (searched.includes(candidate)) continue;
    searched.push(candidate);

    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  throw new ProNotFoundError(searched);
}
