/**
 * Error formatting for CLI output
 */

import { ConfigError } from '../config/errors.js';
import { ProNotFoundError } from '../pro/errors.js';
import { InvalidDesiredStateError, isReconcileError } from '../reconcilers/pro/errors.js';

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isReconcileError(error) || error instanceof ConfigError || error instanceof ProNotFoundError) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Individual problems carried by an error, for CommandResult.errors
 */
export function errorDetails(error: unknown): string[] {
  if (error instanceof InvalidDesiredStateError) {
    return error.issues;
  }
  if (error instanceof ConfigError && error.issues.length > 0) {
    return error.issues;
  }
  return [error instanceof Error ? error.message : String(error)];
}
