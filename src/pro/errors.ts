/**
 * Errors raised by the pro CLI client
 */

/**
 * Error thrown when the pro executable cannot be found
 */
export class ProNotFoundError extends Error {
  constructor(
    public readonly searchedPaths: string[],
    public readonly suggestion: string = 'Install the ubuntu-advantage-tools (ubuntu-pro-client) package or pass --pro-path'
  ) {
    super('Ubuntu Pro executable `pro` not found');
    this.name = 'ProNotFoundError';
  }

  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.searchedPaths.length > 0) {
      msg += `\n\nSearched paths:\n${this.searchedPaths.map((p) => `  - ${p}`).join('\n')}`;
    }
    msg += `\n\nSuggestion: ${this.suggestion}`;
    return msg;
  }
}

/**
 * Error thrown when a pro command exits unsuccessfully
 */
export class ProCommandError extends Error {
  constructor(
    /** Command line with secrets already redacted */
    public readonly command: string,
    /** Human-readable failure reason ("timeout" when killed by the timeout) */
    public readonly reason: string,
    public readonly exitCode: number | null,
    public readonly stderr?: string
  ) {
    super(`pro command failed: ${command}: ${reason}`);
    this.name = 'ProCommandError';
  }
}

/**
 * Error thrown when `pro status` output cannot be interpreted
 */
export class ProOutputError extends Error {
  constructor(
    message: string,
    public readonly output: unknown
  ) {
    super(message);
    this.name = 'ProOutputError';
  }
}

/**
 * Extract a failure reason from any error the client can raise
 */
export function reasonOf(error: unknown): string {
  if (error instanceof ProCommandError) {
    return error.reason;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
