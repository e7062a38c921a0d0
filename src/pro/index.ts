/**
 * Ubuntu Pro CLI client exports
 */

export type {
  ServiceStatus,
  ProServiceEntry,
  ProStatus,
  CommandOutput,
  CommandRunner,
  RunOptions,
  ProCli,
  ProCliOptions,
} from './types.js';

export { ProNotFoundError, ProCommandError, ProOutputError, reasonOf } from './errors.js';
export { execFileRunner, findProExecutable, type FindProOptions } from './exec.js';
export { parseProStatus, classifyService, serviceStatuses } from './status.js';
export { createProCli, parseOutput, failureReason } from './client.js';
