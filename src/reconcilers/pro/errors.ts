/**
 * Error classes for Pro state reconciliation
 *
 * Precondition errors are thrown before any mutation. The other classes are
 * caught inside reconcile() and reported through the result.
 */

import type { ReconcileErrorCode, ReconcileErrorInfo, ServiceActionKind } from './types.js';

/**
 * Base error class for reconciliation errors
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly reason: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }

  toInfo(): ReconcileErrorInfo {
    return { code: this.code, message: this.message, reason: this.reason };
  }
}

/**
 * Contract violation by the caller
 */
export class PreconditionError extends ReconcileError {
  constructor(message: string, code: ReconcileErrorCode, reason: string, suggestion?: string) {
    super(message, code, reason, suggestion);
    this.name = 'PreconditionError';
  }
}

/**
 * Attaching is required but no token was supplied
 */
export class MissingTokenError extends PreconditionError {
  constructor() {
    super(
      'A token is required to attach this machine to Ubuntu Pro',
      'MISSING_TOKEN',
      'missing token',
      'Set PRO_TOKEN, pass --token-file, or add pro_token to the config file'
    );
    this.name = 'MissingTokenError';
  }
}

/**
 * The desired state violates one of its invariants
 */
export class InvalidDesiredStateError extends PreconditionError {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid desired state: ${issues.join('; ')}`,
      'INVALID_DESIRED_STATE',
      issues.join('; ')
    );
    this.name = 'InvalidDesiredStateError';
  }
}

/**
 * Attach or detach failed; dependent service actions are blocked
 */
export class AttachmentError extends ReconcileError {
  constructor(
    public readonly action: 'attach' | 'detach',
    reason: string
  ) {
    super(
      `Failed to ${action} Ubuntu Pro subscription: ${reason}`,
      action === 'attach' ? 'ATTACH_FAILED' : 'DETACH_FAILED',
      reason,
      action === 'attach' ? 'Check that the token is valid and the machine can reach the contract server' : undefined
    );
    this.name = 'AttachmentError';
  }
}

/**
 * A single service could not be changed
 */
export class ServiceActionError extends ReconcileError {
  constructor(
    public readonly service: string,
    public readonly action: ServiceActionKind,
    reason: string
  ) {
    super(`Failed to ${action} service ${service}: ${reason}`, 'SERVICE_ACTION_FAILED', reason);
    this.name = 'ServiceActionError';
  }
}

/**
 * Current state could not be read
 */
export class ObservationError extends ReconcileError {
  constructor(reason: string) {
    super(`Failed to read Ubuntu Pro status: ${reason}`, 'OBSERVATION_FAILED', reason);
    this.name = 'ObservationError';
  }
}

/**
 * Type guard to check if an error is a ReconcileError
 */
export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}
