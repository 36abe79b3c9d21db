/**
 * Monitor command handler - one snapshot of the host.
 */

import { Command } from 'commander';
import { MetricsCollector, renderSnapshot } from '../../system/MetricsCollector';
import { defaultLogger } from '../../utils/logger';
import { CliContext, currentConfig } from '../context';
import { buildMonitorOptions } from '../options';
import { handleCommandError, printLines } from '../output';

export function registerMonitorCommand(program: Command, context: CliContext): void {
  program
    .command('monitor')
    .description('Print date, host, kernel, disk usage, largest directories and busiest processes')
    .action(async () => {
      try {
        const options = buildMonitorOptions(currentConfig(context));
        const collector = new MetricsCollector(defaultLogger.child({ component: 'monitor' }));

        const snapshot = await collector.collectSnapshot({
          directory: options.directory,
          limit: options.rows
        });
        printLines(renderSnapshot(snapshot));
      } catch (error) {
        handleCommandError(error);
      }
    });
}
