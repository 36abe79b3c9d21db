#!/usr/bin/env node

/**
 * Command Line Interface for treekit
 */

import { Command } from 'commander';
import { setupGracefulShutdown } from './cli/setup';
import { CliContext, createCliContext } from './cli/context';
import { handleCommandError, logWarning } from './cli/output';
import { registerInspectCommand } from './cli/commands/inspect';
import { registerBackupCommand } from './cli/commands/backup';
import { registerCleanupCommand } from './cli/commands/cleanup';
import { registerProcessCommand } from './cli/commands/process';
import { registerMonitorCommand } from './cli/commands/monitor';
import { registerHelpCommand } from './cli/commands/help';
import { registerVersionCommand } from './cli/commands/version';
import { UsageError } from './core/errors';
import { DEFAULT_LOGGER_CONFIG, LogLevel } from './utils/logging/LogTransport';
import { defaultLogger } from './utils/logger';
import { VERSION } from './version';

export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Apply environment configuration and the global flags before an action runs.
 */
export function applyGlobalOptions(
  options: GlobalOptions,
  context: CliContext,
  env: NodeJS.ProcessEnv = process.env
): void {
  if (options.verbose && options.quiet) {
    throw new UsageError('--verbose and --quiet cannot be used together');
  }

  const rejected = context.configManager.loadFromEnvironment(env);
  const { logging } = context.configManager.getConfig();

  let level = logging.level;
  if (options.verbose) {
    level = LogLevel.DEBUG;
  } else if (options.quiet) {
    level = LogLevel.WARN;
  }

  defaultLogger.configure({
    level,
    logDir: logging.logDir ?? DEFAULT_LOGGER_CONFIG.logDir,
    enableFile: logging.logDir !== undefined,
    includeTimestamp: logging.timestamps
  });
  context.quiet = options.quiet === true;

  rejected.forEach(message => logWarning(`Ignoring ${message}`));
}

/**
 * Build the commander program. Each call gets its own command tree, so tests
 * can parse repeatedly.
 */
export function createProgram(
  context: CliContext = createCliContext(),
  env: NodeJS.ProcessEnv = process.env
): Command {
  const program = new Command();

  program
    .name('treekit')
    .description('Inspect, back up and clean directory trees; analyze text files; snapshot the host')
    .version(VERSION, '-v, --version', 'Output the version number')
    .option('--verbose', 'Debug logging on stderr')
    .option('--quiet', 'Only warnings and errors on stderr, no progress bar')
    .allowExcessArguments(false)
    .helpCommand(false);

  let startedAt = 0;
  program.hook('preAction', (_thisCommand, actionCommand) => {
    applyGlobalOptions(program.opts<GlobalOptions>(), context, env);
    defaultLogger.setContext({ command: actionCommand.name() });
    startedAt = Date.now();
  });
  program.hook('postAction', (_thisCommand, actionCommand) => {
    defaultLogger.performance(actionCommand.name(), Date.now() - startedAt);
  });

  registerInspectCommand(program, context);
  registerBackupCommand(program, context);
  registerCleanupCommand(program, context);
  registerProcessCommand(program, context);
  registerMonitorCommand(program, context);
  registerHelpCommand(program);
  registerVersionCommand(program);
  program.commands.forEach(command => command.allowExcessArguments(false));

  return program;
}

/**
 * Entry point: parse `argv`, with SIGINT/SIGTERM cancelling the running command.
 * No arguments prints the usage.
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const controller = new AbortController();
  const removeHandlers = setupGracefulShutdown(controller);
  const program = createProgram(createCliContext(controller.signal));

  try {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync(argv);
  } finally {
    removeHandlers();
    defaultLogger.close();
  }
}

if (require.main === module) {
  run().catch(handleCommandError);
}
