/**
 * Version command handler
 */

import { Command } from 'commander';
import { VERSION } from '../../version';

export function registerVersionCommand(program: Command): void {
  program
    .command('version')
    .description('Print the version')
    .action(() => {
      console.log(VERSION);
    });
}
