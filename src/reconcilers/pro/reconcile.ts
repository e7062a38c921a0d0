/**
 * Pro state reconciler
 *
 * start -> observed -> planned -> applying -> done
 *
 * Attachment changes run first; service changes run afterwards, one at a
 * time, each independent of the others. Expected failures end in `done` with
 * the failure described in the result. Only precondition violations throw.
 */

import type { ProCli } from '../../pro/types.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { createRecord } from '../../utils/records.js';
import type {
  AppliedAction,
  DesiredState,
  ObservedState,
  ReconcileOptions,
  ReconcilePhase,
  ReconciliationPreview,
  ReconciliationResult,
  ServiceOutcome,
} from './types.js';
import { requestedServices } from './desired.js';
import { AttachmentError, MissingTokenError, ObservationError } from './errors.js';
import { observeState } from './observe.js';
import { assertPreconditions, planHasChanges, planReconciliation } from './plan.js';
import { applyAttachment, applyServiceAction } from './apply.js';

export const BLOCKED_BY_ATTACHMENT = 'blocked by attachment failure';
export const BLOCKED_BY_OBSERVATION = 'blocked by observation failure';

function blockAll(services: readonly string[], reason: string): Record<string, ServiceOutcome> {
  const outcomes = createRecord<ServiceOutcome>();
  for (const service of services) {
    outcomes[service] = { status: 'failed', reason };
  }
  return outcomes;
}

function requireToken(desired: DesiredState): string {
  if (!desired.token) {
    throw new MissingTokenError();
  }
  return desired.token;
}

/**
 * Converge the machine to the desired state
 *
 * @param cli - Vendor CLI collaborator
 * @param desired - Validated desired state (see createDesiredState)
 * @throws PreconditionError when attaching is required and no token was given
 */
export async function reconcile(
  cli: ProCli,
  desired: DesiredState,
  options: ReconcileOptions = {}
): Promise<ReconciliationResult> {
  const log = (options.logger ?? defaultLogger).child({ component: 'reconciler' });
  log.addSecret(desired.token);

  const enter = (phase: ReconcilePhase): void => {
    log.debug(`Reconciliation phase: ${phase}`);
    options.onPhase?.(phase);
  };

  enter('start');
  const requested = requestedServices(desired);
  const actions: AppliedAction[] = [];

  // Observe
  let observed: ObservedState;
  try {
    observed = await observeState(cli, requested);
  } catch (error) {
    if (!(error instanceof ObservationError)) throw error;
    log.error(error.message);
    enter('done');
    return { changed: false, finalAttached: null, serviceOutcomes: createRecord(), error: error.toInfo(), actions };
  }
  enter('observed');

  // Plan
  assertPreconditions(desired, observed);
  let plan = planReconciliation(desired, observed);
  log.debug('Planned reconciliation', {
    attachment: plan.attachment,
    services: plan.services,
    deferred: plan.deferred,
  });
  enter('planned');

  // Apply
  enter('applying');
  let changed = false;

  if (plan.attachment) {
    const mutate =
      plan.attachment === 'attach' ? () => cli.attach(requireToken(desired)) : () => cli.detach();
    const step = await applyAttachment(cli, plan.attachment, mutate, requested, log);
    actions.push(step.action);

    if (step.error) {
      const blockedReason = step.error instanceof AttachmentError ? BLOCKED_BY_ATTACHMENT : BLOCKED_BY_OBSERVATION;
      enter('done');
      return {
        changed: step.changed,
        finalAttached: step.error instanceof ObservationError ? null : (step.observed ?? observed).attached,
        serviceOutcomes: blockAll(requested, blockedReason),
        error: step.error.toInfo(),
        observed: step.observed ?? observed,
        actions,
      };
    }

    changed = step.changed;
    if (step.observed) {
      observed = step.observed;
    }
    // Service statuses are only meaningful once the attach has been verified
    plan = planReconciliation(desired, observed);
  }

  const serviceOutcomes = Object.assign(createRecord<ServiceOutcome>(), plan.settled);
  for (const action of plan.services) {
    const step = await applyServiceAction(cli, action, requested, log);
    actions.push(step.action);
    serviceOutcomes[action.service] = step.outcome;
    if (step.observed) {
      observed = step.observed;
    }
    if (step.changed) {
      changed = true;
    }
  }

  enter('done');
  return {
    changed,
    finalAttached: observed.attached,
    serviceOutcomes,
    observed,
    actions,
  };
}

/**
 * Check mode: observe and plan without mutating anything
 *
 * @throws ObservationError if the status cannot be read
 * @throws PreconditionError when attaching would be required without a token
 */
export async function previewReconciliation(
  cli: ProCli,
  desired: DesiredState
): Promise<ReconciliationPreview> {
  const observed = await observeState(cli, requestedServices(desired));
  assertPreconditions(desired, observed);
  const plan = planReconciliation(desired, observed);
  return { observed, plan, changed: planHasChanges(plan) };
}
