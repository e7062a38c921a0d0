/**
 * Plain-text summaries of plans and reconciliation results
 */

import type {
  ReconciliationPreview,
  ReconciliationResult,
  ServiceOutcome,
} from './types.js';

function describeOutcome(outcome: ServiceOutcome): string {
  switch (outcome.status) {
    case 'already-in-desired-state':
      return 'already in desired state';
    case 'changed':
      return `${outcome.action}d`;
    case 'failed':
      return `FAILED: ${outcome.reason}`;
  }
}

function outcomeIcon(outcome: ServiceOutcome): string {
  switch (outcome.status) {
    case 'already-in-desired-state':
      return '=';
    case 'changed':
      return '~';
    case 'failed':
      return '!';
  }
}

/**
 * Services whose outcome is failed
 */
export function failedServices(result: ReconciliationResult): string[] {
  return Object.entries(result.serviceOutcomes)
    .filter(([, outcome]) => outcome.status === 'failed')
    .map(([service]) => service);
}

/**
 * Whether a result represents full success
 */
export function isSuccessful(result: ReconciliationResult): boolean {
  return result.error === undefined && failedServices(result).length === 0;
}

/**
 * Format a check-mode preview as a human-readable summary
 */
export function formatPreview(preview: ReconciliationPreview): string {
  const { plan } = preview;
  const lines: string[] = [];

  lines.push('Ubuntu Pro Reconciliation Plan');
  lines.push('='.repeat(50));
  lines.push('');

  if (!preview.changed) {
    lines.push('Status: NO CHANGES');
    const settled = Object.keys(plan.settled).length;
    if (settled > 0) {
      lines.push(`Services checked: ${settled}`);
    }
    appendSettledFailures(lines, plan.settled);
    return lines.join('\n');
  }

  lines.push('Status: CHANGES NEEDED');
  lines.push('');

  if (plan.attachment) {
    lines.push(`Attachment: ${plan.attachment}`);
  }

  if (plan.services.length > 0) {
    lines.push('Service actions:');
    for (const action of plan.services) {
      lines.push(`  ${action.kind === 'enable' ? '+' : '-'} ${action.service}`);
    }
  }

  if (plan.deferred.length > 0) {
    lines.push(`Planned after attach: ${plan.deferred.join(', ')}`);
  }

  appendSettledFailures(lines, plan.settled);
  return lines.join('\n');
}

function appendSettledFailures(lines: string[], settled: Record<string, ServiceOutcome>): void {
  const failures = Object.entries(settled).filter(([, outcome]) => outcome.status === 'failed');
  if (failures.length === 0) return;

  lines.push('');
  lines.push('Cannot be applied:');
  for (const [service, outcome] of failures) {
    lines.push(`  ! ${service}: ${describeOutcome(outcome)}`);
  }
}

/**
 * Format a reconciliation result as a human-readable summary
 */
export function formatReconciliationResult(result: ReconciliationResult): string {
  const lines: string[] = [];

  lines.push('Ubuntu Pro Reconciliation Result');
  lines.push('='.repeat(50));
  lines.push('');

  if (result.error) {
    lines.push(`Status: FAILED (${result.error.code})`);
    lines.push(`Error: ${result.error.message}`);
  } else if (failedServices(result).length > 0) {
    lines.push(result.changed ? 'Status: PARTIALLY APPLIED' : 'Status: FAILED');
  } else {
    lines.push(result.changed ? 'Status: CHANGED' : 'Status: NO CHANGES');
  }

  const attached = result.finalAttached === null ? 'unknown' : result.finalAttached ? 'yes' : 'no';
  lines.push(`Attached: ${attached}`);

  const outcomes = Object.entries(result.serviceOutcomes);
  if (outcomes.length > 0) {
    lines.push('');
    lines.push('Services:');
    for (const [service, outcome] of outcomes) {
      lines.push(`  ${outcomeIcon(outcome)} ${service}: ${describeOutcome(outcome)}`);
    }
  }

  return lines.join('\n');
}
