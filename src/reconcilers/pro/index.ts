/**
 * Pro state reconciler exports
 *
 * Converges Ubuntu Pro attachment and per-service enablement toward a
 * declared DesiredState through the `pro` CLI.
 */

export type {
  AttachmentState,
  DesiredStateInput,
  DesiredState,
  ObservedState,
  AttachmentAction,
  ServiceActionKind,
  ServiceAction,
  ReconciliationPlan,
  ServiceOutcome,
  ReconcileErrorCode,
  ReconcileErrorInfo,
  AppliedAction,
  ReconciliationResult,
  ReconciliationPreview,
  ReconcilePhase,
  ReconcileOptions,
} from './types.js';

export {
  ReconcileError,
  PreconditionError,
  MissingTokenError,
  InvalidDesiredStateError,
  AttachmentError,
  ServiceActionError,
  ObservationError,
  isReconcileError,
} from './errors.js';

export { createDesiredState, requestedServices, effectiveAttachment } from './desired.js';
export { observeState } from './observe.js';
export {
  planAttachment,
  planServices,
  planReconciliation,
  planHasChanges,
  assertPreconditions,
  notEntitledReason,
} from './plan.js';
export { applyAttachment, applyServiceAction, type AttachmentStepResult, type ServiceStepResult } from './apply.js';
export { reconcile, previewReconciliation, BLOCKED_BY_ATTACHMENT, BLOCKED_BY_OBSERVATION } from './reconcile.js';
export {
  formatPreview,
  formatReconciliationResult,
  failedServices,
  isSuccessful,
} from './report.js';
