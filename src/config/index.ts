/**
 * Configuration module exports
 */

export { ConfigError, type ConfigErrorCode } from './errors.js';
export {
  loadDesiredStateFile,
  validateDesiredStateDocument,
  parseAttachmentState,
  type DesiredStateFile,
} from './desired-state.js';
export {
  resolveProToken,
  readTokenFile,
  type TokenSource,
  type TokenResolveOptions,
  type TokenResolution,
} from './token.js';
export {
  resolveDesiredStateInput,
  type DesiredStateFlags,
  type DesiredStateSources,
  type ResolvedDesiredStateInput,
} from './resolve.js';
