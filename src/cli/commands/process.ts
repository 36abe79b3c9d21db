/**
 * Process command handler - text statistics and most frequent tokens of a file.
 */

import { Command } from 'commander';
import { createReadStream } from 'fs';
import fs from 'fs/promises';
import { InvalidArgumentError, NotFoundError, errorCode } from '../../core/errors';
import { TextAnalysis, analyzeText } from '../../core/TokenCounter';
import { CliContext, currentConfig } from '../context';
import { RawProcessOptions, buildProcessOptions } from '../options';
import { handleCommandError, printLines } from '../output';

async function assertRegularFile(file: string): Promise<void> {
  let stats;
  try {
    stats = await fs.stat(file);
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError(file, 'file');
    }
    throw error;
  }
  if (!stats.isFile()) {
    throw new InvalidArgumentError(`'${file}' is not a regular file`);
  }
}

export function renderTextAnalysis(file: string, analysis: TextAnalysis): string[] {
  const { statistics, topTokens } = analysis;
  return [
    `File: ${file}`,
    `Lines: ${statistics.lines}`,
    `Words: ${statistics.words}`,
    `Bytes: ${statistics.bytes}`,
    `Distinct tokens: ${analysis.distinctTokens}`,
    `Top ${topTokens.length} tokens:`,
    ...topTokens.map(({ token, count }) => `  ${count}\t${token}`)
  ];
}

export function registerProcessCommand(program: Command, context: CliContext): void {
  program
    .command('process')
    .description('Count lines, words and bytes of a file and list its most frequent tokens')
    .argument('<file>', 'Text file to analyze')
    .option('-t, --top <n>', 'Number of tokens to show')
    .action(async (file: string, raw: RawProcessOptions) => {
      try {
        const options = buildProcessOptions(file, raw, currentConfig(context));
        await assertRegularFile(options.file);

        const analysis = await analyzeText(createReadStream(options.file, { signal: context.signal }), options.top);
        printLines(renderTextAnalysis(options.file, analysis));
      } catch (error) {
        handleCommandError(error);
      }
    });
}
