/**
 * Apply operations for Pro state reconciliation
 *
 * Each operation runs one CLI mutation, then re-reads `pro status` to confirm
 * the effect. Failures are returned as data, never thrown.
 */

import type { ProCli } from '../../pro/types.js';
import { reasonOf } from '../../pro/errors.js';
import { ownValue } from '../../utils/records.js';
import type { Logger } from '../../utils/logger.js';
import type {
  AppliedAction,
  AttachmentAction,
  ObservedState,
  ServiceAction,
  ServiceOutcome,
} from './types.js';
import { AttachmentError, ObservationError, ServiceActionError } from './errors.js';
import { observeState } from './observe.js';

/**
 * Result of an attach or detach step
 */
export interface AttachmentStepResult {
  action: AppliedAction;
  /** The CLI reported success (state may still be unverified) */
  changed: boolean;
  /** Status read after the action, when it could be read */
  observed?: ObservedState;
  error?: AttachmentError | ObservationError;
}

/**
 * Result of a single service step
 */
export interface ServiceStepResult {
  action: AppliedAction;
  outcome: ServiceOutcome;
  /**
   * The CLI reported success and the machine may have changed. False only
   * when the command failed or the follow-up status shows the old state.
   */
  changed: boolean;
  observed?: ObservedState;
}

function observationReason(error: unknown): string {
  return error instanceof ObservationError ? error.reason : reasonOf(error);
}

async function reobserve(cli: ProCli, services: readonly string[]): Promise<ObservedState | ObservationError> {
  try {
    return await observeState(cli, services);
  } catch (error) {
    return error instanceof ObservationError ? error : new ObservationError(observationReason(error));
  }
}

/**
 * Attach or detach, then verify the new attachment state
 *
 * @param mutate - Runs the CLI command (attach with token, or detach)
 * @param services - Requested services, projected in the follow-up status
 */
export async function applyAttachment(
  cli: ProCli,
  kind: AttachmentAction,
  mutate: () => Promise<unknown>,
  services: readonly string[],
  log: Logger
): Promise<AttachmentStepResult> {
  log.info(`Running pro ${kind}`);

  try {
    await mutate();
  } catch (error) {
    const failure = new AttachmentError(kind, reasonOf(error));
    log.error(failure.message);
    return {
      action: { action: kind, ok: false, reason: failure.reason },
      changed: false,
      error: failure,
    };
  }

  const after = await reobserve(cli, services);
  if (after instanceof ObservationError) {
    log.error(`pro ${kind} succeeded but status could not be re-read`, after);
    return {
      action: { action: kind, ok: false, reason: after.reason },
      changed: true,
      error: after,
    };
  }

  const expected = kind === 'attach';
  if (after.attached !== expected) {
    const failure = new AttachmentError(
      kind,
      `pro ${kind} reported success but the machine is still ${after.attached ? 'attached' : 'detached'}`
    );
    log.error(failure.message);
    return {
      action: { action: kind, ok: false, reason: failure.reason },
      changed: false,
      observed: after,
      error: failure,
    };
  }

  log.info(`Machine is now ${kind === 'attach' ? 'attached' : 'detached'}`);
  return { action: { action: kind, ok: true }, changed: true, observed: after };
}

function failed(
  step: ServiceAction,
  reason: string,
  changed: boolean,
  log: Logger,
  observed?: ObservedState
): ServiceStepResult {
  const failure = new ServiceActionError(step.service, step.kind, reason);
  log.warn(failure.message);
  return {
    action: { action: step.kind, service: step.service, ok: false, reason },
    outcome: { status: 'failed', reason },
    changed,
    observed,
  };
}

/**
 * Enable or disable one service, then verify its new status
 */
export async function applyServiceAction(
  cli: ProCli,
  step: ServiceAction,
  services: readonly string[],
  log: Logger
): Promise<ServiceStepResult> {
  log.info(`Running pro ${step.kind} ${step.service}`);

  try {
    if (step.kind === 'enable') {
      await cli.enable(step.service);
    } else {
      await cli.disable(step.service);
    }
  } catch (error) {
    return failed(step, reasonOf(error), false, log);
  }

  const after = await reobserve(cli, services);
  if (after instanceof ObservationError) {
    return failed(step, `could not verify ${step.kind}: ${after.reason}`, true, log);
  }

  if (!after.attached) {
    return failed(step, 'machine is no longer attached', true, log, after);
  }

  const status = ownValue(after.services, step.service) ?? 'not-entitled';
  const verified = step.kind === 'enable' ? status === 'enabled' : status !== 'enabled';
  if (!verified) {
    return failed(step, `service still reported as ${status} after ${step.kind}`, false, log, after);
  }

  log.info(`Service ${step.service} ${step.kind}d`);
  return {
    action: { action: step.kind, service: step.service, ok: true },
    outcome: { status: 'changed', action: step.kind },
    changed: true,
    observed: after,
  };
}
