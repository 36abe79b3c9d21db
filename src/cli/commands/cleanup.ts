/**
 * Cleanup command handler - deletes temporary, log and backup files.
 */

import { Command } from 'commander';
import { DEFAULT_CLEANUP_RULES, clean } from '../../core/Cleaner';
import { assertDirectory } from '../../core/PathSetBuilder';
import { CliContext } from '../context';
import { RawCleanupOptions, buildCleanupOptions } from '../options';
import {
  handleCommandError,
  logInfo,
  logSuccess,
  printLines,
  reportWarnings
} from '../output';

export function registerCleanupCommand(program: Command, context: CliContext): void {
  const suffixes = DEFAULT_CLEANUP_RULES.map(rule => rule.suffix).join(', ');

  program
    .command('cleanup')
    .description(`Delete files ending in ${suffixes}`)
    .argument('<dir>', 'Directory to clean')
    .option('-n, --dry-run', 'List the files that would be deleted without deleting them')
    .action(async (dir: string, raw: RawCleanupOptions) => {
      try {
        const options = buildCleanupOptions(dir, raw);
        await assertDirectory(options.root);

        const report = await clean(options.root, DEFAULT_CLEANUP_RULES, options.dryRun, {
          signal: context.signal
        });
        reportWarnings(report.warnings);

        if (report.mode === 'dry-run') {
          printLines(report.matched.map(entry => `Would delete: ${entry.path}`));
          if (!context.quiet) {
            logInfo(`${report.matched.length} files would be deleted`);
          }
          return;
        }

        printLines(report.deleted.map(entry => `Deleted: ${entry.path}`));
        reportWarnings(report.failures);
        if (!context.quiet) {
          logSuccess(`Deleted ${report.deleted.length} of ${report.matched.length} files`);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
