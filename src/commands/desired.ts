/**
 * Desired-state loading shared by the diff and sync commands
 */

import type { CommandContext } from '../types.js';
import type { DesiredState } from '../reconcilers/pro/types.js';
import { createDesiredState } from '../reconcilers/pro/desired.js';
import { resolveDesiredStateInput, type DesiredStateFlags } from '../config/resolve.js';
import { verbose } from '../utils/output.js';

/**
 * Resolve flags, environment and config file into a validated DesiredState
 *
 * @throws ConfigError if configuration cannot be loaded
 * @throws InvalidDesiredStateError if the merged state is invalid
 */
export async function loadDesiredState(ctx: CommandContext, flags: DesiredStateFlags): Promise<DesiredState> {
  const { options: globalOpts } = ctx;

  const resolved = await resolveDesiredStateInput({
    configPath: globalOpts.config,
    flags,
  });

  if (resolved.configPath) {
    verbose(`Loaded desired state from ${resolved.configPath}`, globalOpts.verbose);
  }
  verbose(`Token source: ${resolved.tokenSource ?? '(none)'}`, globalOpts.verbose);

  const desired = createDesiredState(resolved.input);
  ctx.logger.addSecret(desired.token);

  verbose(
    `Desired: state=${desired.attachment ?? '(unchanged)'} ` +
      `enable=[${[...desired.servicesToEnable].join(', ')}] ` +
      `disable=[${[...desired.servicesToDisable].join(', ')}]`,
    globalOpts.verbose
  );

  return desired;
}
