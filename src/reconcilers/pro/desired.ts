/**
 * Desired state construction and validation
 */

import type { AttachmentState, DesiredState, DesiredStateInput } from './types.js';
import { InvalidDesiredStateError } from './errors.js';

function normalizeServices(
  names: readonly string[] | undefined,
  listName: string,
  issues: string[]
): Set<string> {
  const result = new Set<string>();
  for (const name of names ?? []) {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      issues.push(`${listName} contains an empty service name`);
      continue;
    }
    result.add(trimmed);
  }
  return result;
}

/**
 * Validate caller input and build an immutable DesiredState
 *
 * - service names are trimmed and must be non-empty
 * - enable and disable lists must be disjoint
 * - services cannot be managed together with state=detached
 * - a blank token counts as absent
 *
 * @throws InvalidDesiredStateError listing every violated rule
 */
export function createDesiredState(input: DesiredStateInput): DesiredState {
  const issues: string[] = [];

  const servicesToEnable = normalizeServices(input.enable, 'enable list', issues);
  const servicesToDisable = normalizeServices(input.disable, 'disable list', issues);

  const overlap = [...servicesToEnable].filter((name) => servicesToDisable.has(name));
  if (overlap.length > 0) {
    issues.push(`services listed as both enabled and disabled: ${overlap.join(', ')}`);
  }

  if (input.attachment === 'detached' && (servicesToEnable.size > 0 || servicesToDisable.size > 0)) {
    issues.push('enabled/disabled services cannot be used with state=detached');
  }

  if (issues.length > 0) {
    throw new InvalidDesiredStateError(issues);
  }

  const token = input.token?.trim();

  return Object.freeze({
    attachment: input.attachment,
    token: token && token.length > 0 ? token : undefined,
    servicesToEnable,
    servicesToDisable,
  });
}

/**
 * All services named by the desired state, enable list first
 */
export function requestedServices(desired: DesiredState): string[] {
  return [...desired.servicesToEnable, ...desired.servicesToDisable];
}

/**
 * Attachment the reconciler converges to.
 *
 * Managing services requires an attached machine, so an omitted attachment
 * with services listed means "attached"; with nothing listed it means
 * "leave as is" (undefined).
 */
export function effectiveAttachment(desired: DesiredState): AttachmentState | undefined {
  if (desired.attachment) {
    return desired.attachment;
  }
  if (desired.servicesToEnable.size > 0 || desired.servicesToDisable.size > 0) {
    return 'attached';
  }
  return undefined;
}
