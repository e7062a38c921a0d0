/**
 * pro-sync CLI - Converge Ubuntu Pro subscription state
 *
 * Commands:
 * - status: Show attachment and service state
 * - diff: Show what sync would change
 * - sync: Attach/detach and enable/disable services to match the desired state
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import type { DesiredStateFlags } from './config/resolve.js';
import { statusCommand, diffCommand, syncCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './utils/logger.js';
import { createProCli } from './pro/client.js';

const VERSION = '0.1.0';

function parseTimeout(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return parsed;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  if (options.json) {
    logger.setConfig({ json: true });
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
    createCli: () =>
      createProCli({
        proPath: options.proPath,
        timeoutMs: options.timeout,
        logger,
      }),
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('pro-sync')
  .description('Converge Ubuntu Pro attachment and service state')
  .version(VERSION)
  .addOption(
    new Option('--config <path>', 'Desired-state YAML file')
      .env('PRO_SYNC_CONFIG')
  )
  .addOption(
    new Option('--pro-path <path>', 'Path to the pro executable')
      .env('PRO_SYNC_PRO_PATH')
  )
  .addOption(
    new Option('--timeout <ms>', 'Kill each pro command after this many milliseconds')
      .argParser(parseTimeout)
  )
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * Add the desired-state flags shared by diff and sync
 */
function withDesiredStateOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--state <state>', 'Desired attachment state')
        .choices(['attached', 'detached'])
    )
    .option('--enable <services...>', 'Services that must be enabled (replaces the config list)')
    .option('--disable <services...>', 'Services that must be disabled (replaces the config list)')
    .option('--token-file <path>', 'File containing the Ubuntu Pro token');
}

/**
 * status command - Show current state
 */
program
  .command('status')
  .description('Show Ubuntu Pro attachment and service status')
  .option('--service <names...>', 'Only show these services')
  .action(async (cmdOpts: { service?: string[] }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await statusCommand(ctx, { services: cmdOpts.service });
      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }
      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Status failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * diff command - Show what would change
 */
withDesiredStateOptions(
  program
    .command('diff')
    .description('Show what sync would change without changing anything')
).action(async (cmdOpts: DesiredStateFlags) => {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = await diffCommand(ctx, cmdOpts);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`Diff failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
});

/**
 * sync command - Apply changes
 */
withDesiredStateOptions(
  program
    .command('sync')
    .description('Attach/detach and enable/disable services to match the desired state')
).action(async (cmdOpts: DesiredStateFlags) => {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = await syncCommand(ctx, cmdOpts);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`Sync failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
});

// Parse and execute
await program.parseAsync();
