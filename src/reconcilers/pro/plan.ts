/**
 * Pure reconciliation planning
 *
 * Maps (DesiredState, ObservedState) to the minimal list of CLI mutations.
 * Nothing here touches the CLI, so every branch is testable with plain data.
 */

import type {
  AttachmentAction,
  DesiredState,
  ObservedState,
  ReconciliationPlan,
  ServiceAction,
  ServiceOutcome,
} from './types.js';
import { effectiveAttachment, requestedServices } from './desired.js';
import { MissingTokenError } from './errors.js';
import { createRecord, ownValue } from '../../utils/records.js';

export const ALREADY: ServiceOutcome = Object.freeze({ status: 'already-in-desired-state' });

/**
 * Decide whether the attachment must change
 */
export function planAttachment(desired: DesiredState, observed: ObservedState): AttachmentAction | null {
  const target = effectiveAttachment(desired);
  if (target === 'attached' && !observed.attached) return 'attach';
  if (target === 'detached' && observed.attached) return 'detach';
  return null;
}

/**
 * Reject desired states that cannot be applied to the observed machine
 *
 * @throws MissingTokenError when an attach is needed and no token was given
 */
export function assertPreconditions(desired: DesiredState, observed: ObservedState): void {
  if (planAttachment(desired, observed) === 'attach' && !desired.token) {
    throw new MissingTokenError();
  }
}

export function notEntitledReason(service: string): string {
  return `service ${service} is not entitled for this subscription (or is not a known service)`;
}

/**
 * Plan service actions against an attached machine
 */
export function planServices(
  desired: DesiredState,
  observed: ObservedState
): Pick<ReconciliationPlan, 'services' | 'settled'> {
  const services: ServiceAction[] = [];
  const settled = createRecord<ServiceOutcome>();

  for (const service of desired.servicesToEnable) {
    const status = ownValue(observed.services, service) ?? 'not-entitled';
    if (status === 'enabled') {
      settled[service] = ALREADY;
    } else if (status === 'not-entitled') {
      settled[service] = { status: 'failed', reason: notEntitledReason(service) };
    } else {
      services.push({ kind: 'enable', service });
    }
  }

  for (const service of desired.servicesToDisable) {
    const status = ownValue(observed.services, service) ?? 'not-entitled';
    if (status === 'enabled') {
      services.push({ kind: 'disable', service });
    } else {
      settled[service] = ALREADY;
    }
  }

  return { services, settled };
}

/**
 * Build the full plan.
 *
 * When an attach is needed the service statuses are not known yet, so
 * service planning is deferred until after the attach has been verified.
 * A detach leaves nothing to plan for services (createDesiredState forbids
 * listing services with state=detached).
 */
export function planReconciliation(desired: DesiredState, observed: ObservedState): ReconciliationPlan {
  const attachment = planAttachment(desired, observed);

  if (attachment === 'attach') {
    return { attachment, services: [], settled: createRecord(), deferred: requestedServices(desired) };
  }

  if (attachment === 'detach' || !observed.attached) {
    return { attachment, services: [], settled: createRecord(), deferred: [] };
  }

  return { attachment, ...planServices(desired, observed), deferred: [] };
}

/**
 * True when applying the plan would issue at least one mutation
 */
export function planHasChanges(plan: ReconciliationPlan): boolean {
  return plan.attachment !== null || plan.services.length > 0;
}
