/**
 * Types for the Ubuntu Pro CLI client
 */

import type { Logger } from '../utils/logger.js';

// =============================================================================
// Service Status
// =============================================================================

/**
 * Status of a single Ubuntu Pro service as reported by `pro status`
 */
export type ServiceStatus = 'enabled' | 'disabled' | 'not-applicable' | 'not-entitled';

/**
 * A service entry from the `services` array of `pro status --format=json`.
 * Only the fields the classifier reads are typed; the CLI sends more.
 */
export interface ProServiceEntry {
  name: string;
  /** "yes" / "no" */
  entitled?: string;
  /** "yes" / "no" */
  available?: string;
  /** "enabled", "disabled", "n/a", "warning", ... */
  status?: string;
  /** Alternative spelling used by some releases */
  state?: string;
  /** Boolean flag used by some releases */
  enabled?: boolean;
  description?: string;
}

/**
 * Parsed `pro status --wait --format=json` payload
 */
export interface ProStatus {
  attached: boolean;
  services: ProServiceEntry[];
  /** The untouched JSON payload */
  raw: unknown;
}

// =============================================================================
// Process Execution
// =============================================================================

/**
 * Captured output of a finished process
 */
export interface CommandOutput {
  /** Exit code, null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** True when the caller-imposed timeout killed the process */
  timedOut: boolean;
}

export interface RunOptions {
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs a program with arguments (no shell) and resolves with its output.
 * Rejects only when the process cannot be started.
 */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<CommandOutput>;

// =============================================================================
// Client
// =============================================================================

/**
 * Operations the reconciler needs from the vendor CLI.
 *
 * Every method resolves with the parsed JSON payload on success and rejects
 * with a ProCommandError when the command reports failure.
 */
export interface ProCli {
  status(): Promise<ProStatus>;
  attach(token: string): Promise<unknown>;
  detach(): Promise<unknown>;
  enable(service: string): Promise<unknown>;
  disable(service: string): Promise<unknown>;
}

/**
 * Options for createProCli
 */
export interface ProCliOptions {
  /** Path to the pro executable (default: discovered on PATH) */
  proPath?: string;
  /** Kill each command after this many milliseconds (default: no limit) */
  timeoutMs?: number;
  /** Process runner (default: node:child_process execFile) */
  runner?: CommandRunner;
  logger?: Logger;
}
