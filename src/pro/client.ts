/**
 * Ubuntu Pro CLI client
 *
 * Thin wrapper over the `pro` executable. Each call runs one command with
 * `--format=json`, parses its output and turns a failed exit into a
 * ProCommandError carrying the CLI's own reason.
 */

import type { CommandOutput, ProCli, ProCliOptions, ProStatus } from './types.js';
import { ProCommandError } from './errors.js';
import { execFileRunner, findProExecutable } from './exec.js';
import { parseProStatus } from './status.js';
import { logger as defaultLogger, REDACTED } from '../utils/logger.js';

/**
 * Parse command stdout as JSON; non-JSON output is kept as `{ raw }`
 */
export function parseOutput(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) {
    return null;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return { raw: stdout };
  }
}

function errorMessages(payload: unknown): string[] {
  if (payload === null || typeof payload !== 'object' || !('errors' in payload)) {
    return [];
  }
  const { errors } = payload;
  if (!Array.isArray(errors)) return [];

  const messages: string[] = [];
  for (const item of errors) {
    if (item !== null && typeof item === 'object' && 'message' in item && typeof item.message === 'string') {
      messages.push(item.message);
    }
  }
  return messages;
}

/**
 * Derive a human-readable failure reason from a finished command
 */
export function failureReason(output: CommandOutput): string {
  if (output.timedOut) {
    return 'timeout';
  }

  const messages = errorMessages(parseOutput(output.stdout));
  if (messages.length > 0) {
    return messages.join('; ');
  }

  const stderr = output.stderr.trim();
  if (stderr.length > 0) return stderr;

  const stdout = output.stdout.trim();
  if (stdout.length > 0) return stdout;

  return output.exitCode === null ? 'terminated by signal' : `exited with code ${output.exitCode}`;
}

/**
 * Some releases exit 0 but print `"result": "failure"`
 */
function reportsFailure(payload: unknown): boolean {
  return payload !== null && typeof payload === 'object' && 'result' in payload && payload.result === 'failure';
}

/**
 * Create a ProCli bound to a pro executable
 */
export function createProCli(options: ProCliOptions = {}): ProCli {
  const runner = options.runner ?? execFileRunner;
  const log = (options.logger ?? defaultLogger).child({ component: 'pro-cli' });
  let resolvedPath = options.proPath;

  function proPath(): string {
    resolvedPath ??= findProExecutable();
    return resolvedPath;
  }

  async function run(args: string[], secrets: string[] = []): Promise<unknown> {
    const file = proPath();
    const printable = [file, ...args.map((arg) => (secrets.includes(arg) ? REDACTED : arg))].join(' ');

    log.debug('Running pro command', { command: printable });
    const started = Date.now();
    const output = await runner(file, args, { timeoutMs: options.timeoutMs });
    const payload = parseOutput(output.stdout);
    log.debug('pro command finished', {
      command: printable,
      exitCode: output.exitCode,
      durationMs: Date.now() - started,
    });

    if (output.exitCode !== 0 || output.timedOut || reportsFailure(payload)) {
      const reason = failureReason(output);
      log.warn('pro command failed', { command: printable, reason });
      throw new ProCommandError(printable, reason, output.exitCode, output.stderr);
    }

    return payload;
  }

  return {
    async status(): Promise<ProStatus> {
      return parseProStatus(await run(['status', '--wait', '--format=json']));
    },

    attach(token: string): Promise<unknown> {
      log.addSecret(token);
      return run(['attach', '--format=json', token], [token]);
    },

    detach(): Promise<unknown> {
      return run(['detach', '--assume-yes', '--format=json']);
    },

    enable(service: string): Promise<unknown> {
      return run(['enable', '--assume-yes', '--format=json', service]);
    },

    disable(service: string): Promise<unknown> {
      return run(['disable', '--assume-yes', '--format=json', service]);
    },
  };
}
