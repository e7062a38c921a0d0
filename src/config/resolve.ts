/**
 * Desired-state resolution from CLI flags, environment and config file
 *
 * Priority (highest to lowest):
 * 1. CLI flags (--state, --enable, --disable, --token-file)
 * 2. Environment (PRO_TOKEN, PRO_TOKEN_FILE)
 * 3. Desired-state file (--config / PRO_SYNC_CONFIG)
 *
 * A list given on the command line replaces the file's list rather than
 * extending it.
 */

import type { DesiredStateInput } from '../reconcilers/pro/types.js';
import { ConfigError } from './errors.js';
import { loadDesiredStateFile, parseAttachmentState, type DesiredStateFile } from './desired-state.js';
import { resolveProToken, type TokenSource } from './token.js';

/**
 * Desired-state flags as parsed by commander
 */
export interface DesiredStateFlags {
  state?: string;
  enable?: string[];
  disable?: string[];
  tokenFile?: string;
}

export interface DesiredStateSources {
  /** Path to a desired-state file */
  configPath?: string;
  flags?: DesiredStateFlags;
  env?: NodeJS.ProcessEnv;
  /** Base for a relative configPath */
  cwd?: string;
}

export interface ResolvedDesiredStateInput {
  input: DesiredStateInput;
  /** Absolute path of the file that was loaded */
  configPath?: string;
  tokenSource: TokenSource | null;
}

/**
 * Merge all sources into a DesiredStateInput (not yet validated)
 *
 * @throws ConfigError if the file or a flag is invalid
 */
export async function resolveDesiredStateInput(
  sources: DesiredStateSources = {}
): Promise<ResolvedDesiredStateInput> {
  const flags = sources.flags ?? {};

  let file: DesiredStateFile | undefined;
  if (sources.configPath) {
    file = await loadDesiredStateFile(sources.configPath, sources.cwd);
  }

  let attachment = file?.attachment;
  if (flags.state !== undefined) {
    attachment = parseAttachmentState(flags.state);
    if (!attachment) {
      throw new ConfigError(
        `--state must be "attached" or "detached" (got "${flags.state}")`,
        'CONFIG_INVALID'
      );
    }
  }

  const { token, source } = resolveProToken({
    cliTokenFile: flags.tokenFile,
    configToken: file?.token,
    configTokenFile: file?.tokenFile,
    env: sources.env,
  });

  return {
    input: {
      attachment,
      token: token ?? undefined,
      enable: flags.enable ?? file?.enable,
      disable: flags.disable ?? file?.disable,
    },
    configPath: file?.path,
    tokenSource: source,
  };
}
