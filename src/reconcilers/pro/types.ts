/**
 * Types for Ubuntu Pro state reconciliation
 *
 * The reconciler compares a DesiredState with a freshly ObservedState,
 * plans the minimal set of pro CLI mutations and reports a
 * ReconciliationResult describing what changed.
 */

import type { ServiceStatus } from '../../pro/types.js';
import type { Logger } from '../../utils/logger.js';

export type { ServiceStatus };

// =============================================================================
// Desired State
// =============================================================================

export type AttachmentState = 'attached' | 'detached';

/**
 * Caller-supplied parameters before validation
 */
export interface DesiredStateInput {
  attachment?: AttachmentState;
  token?: string;
  enable?: readonly string[];
  disable?: readonly string[];
}

/**
 * Validated, immutable desired state (see createDesiredState)
 */
export interface DesiredState {
  /** Omitted = keep the current attachment unless services are requested */
  readonly attachment?: AttachmentState;
  readonly token?: string;
  readonly servicesToEnable: ReadonlySet<string>;
  readonly servicesToDisable: ReadonlySet<string>;
}

// =============================================================================
// Observed State
// =============================================================================

/**
 * Snapshot of the machine, read from `pro status`
 */
export interface ObservedState {
  attached: boolean;
  /** Requested services only; empty while detached */
  services: Record<string, ServiceStatus>;
}

// =============================================================================
// Plan
// =============================================================================

export type AttachmentAction = 'attach' | 'detach';

export type ServiceActionKind = 'enable' | 'disable';

export interface ServiceAction {
  kind: ServiceActionKind;
  service: string;
}

/**
 * Output of the pure planning step
 */
export interface ReconciliationPlan {
  /** Attachment change to make first, if any */
  attachment: AttachmentAction | null;
  /** Service mutations, in request order */
  services: ServiceAction[];
  /** Outcomes decided without any CLI call */
  settled: Record<string, ServiceOutcome>;
  /**
   * Services whose plan waits for the post-attach status.
   * Non-empty only when attachment === 'attach'.
   */
  deferred: string[];
}

// =============================================================================
// Result
// =============================================================================

export type ServiceOutcome =
  | { status: 'already-in-desired-state' }
  | { status: 'changed'; action: ServiceActionKind }
  | { status: 'failed'; reason: string };

export type ReconcileErrorCode =
  | 'MISSING_TOKEN'
  | 'INVALID_DESIRED_STATE'
  | 'ATTACH_FAILED'
  | 'DETACH_FAILED'
  | 'SERVICE_ACTION_FAILED'
  | 'OBSERVATION_FAILED';

/**
 * Serializable description of a fatal reconciliation error
 */
export interface ReconcileErrorInfo {
  code: ReconcileErrorCode;
  message: string;
  reason: string;
}

/**
 * One mutation attempted during apply
 */
export interface AppliedAction {
  action: AttachmentAction | ServiceActionKind;
  /** Service name for enable/disable */
  service?: string;
  /** CLI succeeded and the follow-up status confirmed the effect */
  ok: boolean;
  /** Failure reason when !ok */
  reason?: string;
}

export interface ReconciliationResult {
  /** At least one action succeeded and was not shown to leave the old state */
  changed: boolean;
  /** Attachment after reconciliation; null when it could not be observed */
  finalAttached: boolean | null;
  serviceOutcomes: Record<string, ServiceOutcome>;
  /** Fatal error (observation or attachment); service failures live in serviceOutcomes */
  error?: ReconcileErrorInfo;
  /** Last successfully observed state (requested services only) */
  observed?: ObservedState;
  actions: AppliedAction[];
}

/**
 * Check-mode result: what reconcile would do
 */
export interface ReconciliationPreview {
  observed: ObservedState;
  plan: ReconciliationPlan;
  /** reconcile would issue at least one mutation */
  changed: boolean;
}

// =============================================================================
// Options
// =============================================================================

export type ReconcilePhase = 'start' | 'observed' | 'planned' | 'applying' | 'done';

export interface ReconcileOptions {
  logger?: Logger;
  /** Called on every state-machine transition */
  onPhase?: (phase: ReconcilePhase) => void;
}
