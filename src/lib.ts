/**
 * pro-sync library entrypoint
 */

export * from './reconcilers/pro/index.js';
export * from './pro/index.js';
export * from './config/index.js';
export { Logger, createLogger, type LogLevel, type LoggerConfig } from './utils/logger.js';
