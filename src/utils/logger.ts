/**
 * Structured logging with secret redaction for pro-sync
 *
 * Security requirements:
 * - Never log attach tokens or other secrets in plaintext
 * - Redact registered secrets wherever they appear in a message or context
 * - Support structured JSON logging for CI/automation
 *
 * All output goes to stderr so `--json` results on stdout stay parseable.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Sink for formatted lines (default: console.error) */
  write?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Object keys that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'token',
  'pro_token',
  'protoken',
  'password',
  'secret',
  'authorization',
  'credentials',
]);

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const REDACTED = '[REDACTED]';

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Narrow an arbitrary string (e.g. from the environment) to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const lower = value.trim().toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Replace every occurrence of the given secrets in a string
 *
 * @example
 * redactSecrets('pro attach C1abc', ['C1abc']) // 'pro attach [REDACTED]'
 */
export function redactSecrets(value: string, secrets: Iterable<string>): string {
  let result = value;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    result = result.split(secret).join(REDACTED);
  }
  return result;
}

/**
 * Redact sensitive values in a plain value (deep clone with redaction)
 */
export function redactValue(value: unknown, secrets: Iterable<string>, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactSecrets(value, secrets);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, secrets, depth + 1));
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase()) && entry !== null && entry !== undefined) {
      result[key] = REDACTED;
    } else {
      result[key] = redactValue(entry, secrets, depth + 1);
    }
  }
  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private readonly secrets: Set<string>;
  private readonly baseContext: Record<string, unknown>;

  constructor(
    config: LoggerConfig = {},
    secrets: Set<string> = new Set(),
    baseContext: Record<string, unknown> = {}
  ) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      write: config.write ?? ((line) => console.error(line)),
    };
    this.secrets = secrets;
    this.baseContext = baseContext;
  }

  /**
   * Register a secret that must never be printed.
   * Child loggers share the registry with their parent.
   */
  addSecret(secret: string | undefined): void {
    if (secret && secret.length > 0) {
      this.secrets.add(secret);
    }
  }

  /**
   * Redact registered secrets from a string
   */
  redact(value: string): string {
    return redactSecrets(value, this.secrets);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redact(message),
    };

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      const redacted = redactValue(merged, this.secrets);
      if (redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)) {
        entry.context = { ...redacted };
      }
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: this.redact(error.message),
        stack: error.stack ? this.redact(error.stack) : undefined,
      };
    }

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.config.write(this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.config, this.secrets, { ...this.baseContext, ...context });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.PRO_SYNC_LOG_LEVEL) ?? 'warn',
  json: process.env.PRO_SYNC_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
