/**
 * Configuration error types
 */

export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'TOKEN_FILE_UNREADABLE';

/**
 * Error thrown when configuration cannot be loaded or is invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly path?: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.issues.length > 0) {
      msg += `\n\n${this.issues.map((issue) => `  - ${issue}`).join('\n')}`;
    }
    return msg;
  }
}
