/**
 * Backup command handler - archives a directory into one .tar.gz file.
 */

import { Command } from 'commander';
import { SingleBar } from 'cli-progress';
import { backupDirectory } from '../../core/Archiver';
import { formatSize } from '../../core/Reporter';
import { CliContext, currentConfig } from '../context';
import { RawBackupOptions, buildBackupOptions } from '../options';
import {
  createProgressBar,
  handleCommandError,
  logSuccess,
  reportWarnings
} from '../output';

export function registerBackupCommand(program: Command, context: CliContext): void {
  program
    .command('backup')
    .description('Archive the files of a directory into a gzip-compressed tar file')
    .argument('<dir>', 'Directory to back up')
    .requiredOption('-o, --output <file>', 'Archive to write')
    .option('-e, --ext <suffix>', 'Only archive files whose name ends with this suffix')
    .option('-l, --level <n>', 'gzip compression level, 0-9')
    .action(async (dir: string, raw: RawBackupOptions) => {
      let progressBar: SingleBar | undefined;
      try {
        const options = buildBackupOptions(dir, raw, currentConfig(context));
        const showProgress = !context.quiet && process.stderr.isTTY === true;

        const result = await backupDirectory(options.criteria, options.output, {
          compressionLevel: options.compressionLevel,
          signal: context.signal,
          onEntry: (_relativePath, index, total) => {
            if (!showProgress) return;
            if (!progressBar) {
              progressBar = createProgressBar('Archiving');
              progressBar.start(total, 0);
            }
            progressBar.update(index + 1);
          }
        });
        progressBar?.stop();
        progressBar = undefined;

        reportWarnings(result.warnings);
        if (!context.quiet) {
          logSuccess(`Archived ${result.entryCount} files to ${result.destination} (${formatSize(result.bytesWritten)})`);
        }
      } catch (error) {
        progressBar?.stop();
        handleCommandError(error);
      }
    });
}
