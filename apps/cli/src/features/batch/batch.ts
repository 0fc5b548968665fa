import type { BatchReport } from '@addrbridge/address-converter';
import type { AppConfig } from '@addrbridge/env';
import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { exitCodeForError } from '../shared/error-mapping.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { BatchCommandOptionsSchema } from '../shared/schemas.js';

import { BatchHandler } from './batch-handler.js';
import { formatConversionLine, formatFailureLine } from './batch-utils.js';

export type CommandOptions = z.infer<typeof BatchCommandOptionsSchema>;

/**
 * Register the batch command.
 */
export function registerBatchCommand(program: Command, config: AppConfig): void {
  program
    .command('batch [addresses...]')
    .description(`Convert up to ${String(config.maxBatchSize)} addresses; failures are reported per address`)
    .option('--file <path>', 'Read addresses from a file, one per line')
    .option('--json', 'Output results in JSON format')
    .action((addresses: string[], rawOptions: unknown) => {
      executeBatchCommand(addresses, rawOptions, config);
    });
}

function executeBatchCommand(addresses: string[], rawOptions: unknown, config: AppConfig): void {
  const parseResult = BatchCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error('batch', new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const handler = new BatchHandler({ maxBatchSize: config.maxBatchSize, targetPrefix: config.targetPrefix });
  const result = handler.execute({ addresses, file: options.file });

  if (result.isErr()) {
    output.error('batch', result.error, exitCodeForError(result.error));
    return;
  }

  if (output.isTextMode()) {
    displayTextOutput(output, result.value);
  }

  output.json('batch', result.value, {
    converted: result.value.total,
    failed: result.value.errors.length,
  });
}

function displayTextOutput(output: OutputManager, report: BatchReport): void {
  if (report.conversions.length > 0) {
    output.note(report.conversions.map(formatConversionLine).join('\n'), 'Converted');
  }

  for (const failure of report.errors) {
    output.warn(formatFailureLine(failure));
  }

  output.info(
    `${pc.green(String(report.total))} converted, ${pc.red(String(report.errors.length))} failed`
  );
}
