/**
 * Inspect command handler - directory summary, optionally with content matches.
 */

import { Command } from 'commander';
import { renderDirectorySummary, renderMatchSummary, summarizeDirectory } from '../../core/Reporter';
import { CliContext, currentConfig } from '../context';
import { RawInspectOptions, buildInspectOptions } from '../options';
import { handleCommandError, printLines, reportWarnings } from '../output';

export function registerInspectCommand(program: Command, context: CliContext): void {
  program
    .command('inspect')
    .description('Summarize a directory: total size, listing, largest or matching files')
    .argument('<dir>', 'Directory to inspect')
    .option('-p, --pattern <pattern>', 'Report lines whose content matches this regular expression')
    .option('-e, --ext <suffix>', 'Only consider files whose name ends with this suffix')
    .option('-F, --fixed-strings', 'Treat --pattern as a literal string')
    .action(async (dir: string, raw: RawInspectOptions) => {
      try {
        const options = buildInspectOptions(dir, raw, currentConfig(context));

        const summary = await summarizeDirectory(options.criteria, {
          patternMode: options.patternMode,
          listingLimit: options.listingLimit,
          topFiles: options.topFiles,
          signal: context.signal
        });

        printLines(renderDirectorySummary(summary));
        if (summary.content && summary.pattern !== undefined) {
          printLines(renderMatchSummary(summary.content, summary.pattern));
        }
        reportWarnings(summary.warnings);
      } catch (error) {
        handleCommandError(error);
      }
    });
}
