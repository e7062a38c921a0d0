/**
 * status command - Show current Ubuntu Pro attachment and service state
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ObservedState } from '../reconcilers/pro/types.js';
import { serviceStatuses } from '../pro/status.js';
import { reasonOf } from '../pro/errors.js';
import { createRecord, ownValue } from '../utils/records.js';
import { header, printObservedState, verbose, error as printError } from '../utils/output.js';

export interface StatusOptions {
  /** Only report these services */
  services?: string[];
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {}
): Promise<CommandResult<ObservedState>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing status command', globalOpts.verbose);

  let observed: ObservedState;
  try {
    const status = await ctx.createCli().status();
    const all = serviceStatuses(status);

    let services = all;
    if (options.services && options.services.length > 0) {
      services = createRecord();
      for (const name of options.services) {
        services[name] = ownValue(all, name) ?? 'not-entitled';
      }
    }
    observed = { attached: status.attached, services };
  } catch (err) {
    const message = `Failed to read Ubuntu Pro status: ${reasonOf(err)}`;
    if (outputFormat === 'human') {
      printError(message);
    }
    return { success: false, message, errors: [reasonOf(err)] };
  }

  if (outputFormat === 'human') {
    header('Ubuntu Pro Status');
    printObservedState(observed);
  }

  return {
    success: true,
    message: observed.attached ? 'Machine is attached to Ubuntu Pro' : 'Machine is not attached to Ubuntu Pro',
    data: observed,
  };
}
