/**
 * sync command - Converge Ubuntu Pro state to the desired state
 *
 * With --dry-run this behaves exactly like `diff`.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ReconciliationPreview, ReconciliationResult } from '../reconcilers/pro/types.js';
import { reconcile } from '../reconcilers/pro/reconcile.js';
import { failedServices, formatReconciliationResult, isSuccessful } from '../reconcilers/pro/report.js';
import { isReconcileError } from '../reconcilers/pro/errors.js';
import { ConfigError } from '../config/errors.js';
import type { DesiredStateFlags } from '../config/resolve.js';
import { loadDesiredState } from './desired.js';
import { diffCommand } from './diff.js';
import { errorDetails, formatError } from '../utils/errors.js';
import { header, info, verbose, error as printError } from '../utils/output.js';

export type SyncOptions = DesiredStateFlags;

function summarize(result: ReconciliationResult): string {
  if (result.error) {
    return result.error.message;
  }
  const failed = failedServices(result);
  if (failed.length > 0) {
    return `Failed to converge: ${failed.join(', ')}`;
  }
  return result.changed ? 'Ubuntu Pro state changed' : 'Ubuntu Pro state already as desired';
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions = {}
): Promise<CommandResult<ReconciliationResult | ReconciliationPreview>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing sync command', globalOpts.verbose);

  if (globalOpts.dryRun) {
    return diffCommand(ctx, options);
  }

  let result: ReconciliationResult;
  try {
    const desired = await loadDesiredState(ctx, options);

    if (outputFormat === 'human') {
      header('Ubuntu Pro Sync');
      info('Reconciling Ubuntu Pro state...');
    }

    result = await reconcile(ctx.createCli(), desired, { logger: ctx.logger });
  } catch (err) {
    // Contract violations and bad configuration; nothing was mutated
    if (!isReconcileError(err) && !(err instanceof ConfigError)) {
      throw err;
    }
    if (outputFormat === 'human') {
      printError(formatError(err));
    }
    return { success: false, message: err.message, errors: errorDetails(err) };
  }

  if (outputFormat === 'human') {
    console.log(formatReconciliationResult(result));
  }

  const failures = Object.entries(result.serviceOutcomes).flatMap(([service, outcome]) =>
    outcome.status === 'failed' ? [`${service}: ${outcome.reason}`] : []
  );

  return {
    success: isSuccessful(result),
    message: summarize(result),
    data: result,
    errors: result.error ? [result.error.reason, ...failures] : failures.length > 0 ? failures : undefined,
  };
}
