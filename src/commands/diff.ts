/**
 * diff command - Show what sync would change (check mode)
 *
 * Observes and plans without running any pro mutation.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ReconciliationPreview } from '../reconcilers/pro/types.js';
import { previewReconciliation } from '../reconcilers/pro/reconcile.js';
import { formatPreview } from '../reconcilers/pro/report.js';
import type { DesiredStateFlags } from '../config/resolve.js';
import { loadDesiredState } from './desired.js';
import { errorDetails, formatError } from '../utils/errors.js';
import { dryRunNotice, verbose, error as printError } from '../utils/output.js';

export type DiffOptions = DesiredStateFlags;

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions = {}
): Promise<CommandResult<ReconciliationPreview>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing diff command', globalOpts.verbose);

  let preview: ReconciliationPreview;
  try {
    const desired = await loadDesiredState(ctx, options);
    preview = await previewReconciliation(ctx.createCli(), desired);
  } catch (err) {
    if (outputFormat === 'human') {
      printError(formatError(err));
    }
    return {
      success: false,
      message: err instanceof Error ? err.message : String(err),
      errors: errorDetails(err),
    };
  }

  if (outputFormat === 'human') {
    dryRunNotice();
    console.log(formatPreview(preview));
  }

  return {
    success: true,
    message: preview.changed ? 'Changes needed' : 'No changes needed',
    data: preview,
  };
}
