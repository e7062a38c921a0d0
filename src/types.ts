/**
 * Shared types and interfaces for the pro-sync CLI
 */

import type { Logger } from './utils/logger.js';
import type { ProCli } from './pro/types.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Desired-state YAML file */
  config?: string;
  /** Path to the pro executable */
  proPath?: string;
  /** Kill each pro command after this many milliseconds */
  timeout?: number;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  logger: Logger;
  /** Builds the pro client; replaced in tests */
  createCli: () => ProCli;
}
