/**
 * Help command handler - usage for the program or one command.
 */

import { Command } from 'commander';
import { UsageError } from '../../core/errors';
import { handleCommandError } from '../output';

export function registerHelpCommand(program: Command): void {
  program
    .command('help')
    .description('Display help for a command')
    .argument('[command]', 'Command to describe')
    .action((commandName?: string) => {
      try {
        if (commandName === undefined) {
          program.outputHelp();
          return;
        }
        const command = program.commands.find(candidate => candidate.name() === commandName);
        if (!command) {
          throw new UsageError(`unknown command '${commandName}'`);
        }
        command.outputHelp();
      } catch (error) {
        handleCommandError(error);
      }
    });
}
