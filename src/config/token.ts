/**
 * Attach token resolution for pro-sync
 *
 * ## Resolution Order
 *
 * 1. `--token-file <path>` CLI flag
 * 2. PRO_TOKEN environment variable
 * 3. PRO_TOKEN_FILE environment variable (path to a file holding the token)
 * 4. `token` / `pro_token` in the desired-state file
 * 5. `token_file` in the desired-state file
 *
 * The token is only needed when the machine has to be attached; resolution
 * failing to find one is not an error here.
 */

import { readFileSync } from 'node:fs';
import { ConfigError } from './errors.js';

/**
 * Where the token came from
 */
export type TokenSource = 'cli_file' | 'env' | 'env_file' | 'config' | 'config_file';

export interface TokenResolveOptions {
  /** --token-file flag */
  cliTokenFile?: string;
  /** Token set inline in the desired-state file */
  configToken?: string;
  /** token_file from the desired-state file (absolute) */
  configTokenFile?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface TokenResolution {
  token: string | null;
  source: TokenSource | null;
}

/**
 * Read a token file, trimming surrounding whitespace
 *
 * @throws ConfigError if the file cannot be read
 */
export function readTokenFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (err) {
    throw new ConfigError(
      `Failed to read token file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'TOKEN_FILE_UNREADABLE',
      path
    );
  }
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
}

/**
 * Resolve the Ubuntu Pro attach token
 */
export function resolveProToken(options: TokenResolveOptions = {}): TokenResolution {
  const env = options.env ?? process.env;

  if (options.cliTokenFile) {
    return { token: nonEmpty(readTokenFile(options.cliTokenFile)), source: 'cli_file' };
  }

  const fromEnv = nonEmpty(env.PRO_TOKEN);
  if (fromEnv) return { token: fromEnv, source: 'env' };

  const envFile = nonEmpty(env.PRO_TOKEN_FILE);
  if (envFile) {
    return { token: nonEmpty(readTokenFile(envFile)), source: 'env_file' };
  }

  const fromConfig = nonEmpty(options.configToken);
  if (fromConfig) return { token: fromConfig, source: 'config' };

  if (options.configTokenFile) {
    return { token: nonEmpty(readTokenFile(options.configTokenFile)), source: 'config_file' };
  }

  return { token: null, source: null };
}
