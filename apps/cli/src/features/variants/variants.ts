import type { AppConfig } from '@addrbridge/env';
import type { Command } from 'commander';
import type { z } from 'zod';

import { exitCodeForError } from '../shared/error-mapping.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ToPrefixCommandOptionsSchema, VariantsCommandOptionsSchema } from '../shared/schemas.js';

import { VariantsHandler } from './variants-handler.js';

export type ToPrefixCommandOptions = z.infer<typeof ToPrefixCommandOptionsSchema>;
export type VariantsCommandOptions = z.infer<typeof VariantsCommandOptionsSchema>;

/**
 * Register to-prefix and variants.
 */
export function registerVariantsCommands(program: Command, config: AppConfig): void {
  program
    .command('to-prefix <address>')
    .description(`Re-encode a ${config.targetPrefix}1... address under another Cosmos prefix`)
    .requiredOption('--prefix <prefix>', 'Target bech32 prefix, e.g. cosmos or osmo')
    .option('--json', 'Output results in JSON format')
    .action((address: string, rawOptions: unknown) => {
      executeToPrefixCommand(address, rawOptions, config);
    });

  program
    .command('variants <address>')
    .description('Show the same account under several bech32 prefixes')
    .option('--prefixes <list>', 'Comma-separated prefixes (default: every registered chain)')
    .option('--json', 'Output results in JSON format')
    .action((address: string, rawOptions: unknown) => {
      executeVariantsCommand(address, rawOptions, config);
    });
}

function executeToPrefixCommand(address: string, rawOptions: unknown, config: AppConfig): void {
  const parseResult = ToPrefixCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      'to-prefix',
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = new VariantsHandler(config.targetPrefix).toPrefix(address.trim(), options.prefix);
  if (result.isErr()) {
    output.error('to-prefix', result.error, exitCodeForError(result.error));
    return;
  }

  output.note(result.value.address, `${result.value.prefix} address`);
  output.json('to-prefix', result.value);
}

function executeVariantsCommand(address: string, rawOptions: unknown, config: AppConfig): void {
  const parseResult = VariantsCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      'variants',
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = new VariantsHandler(config.targetPrefix).variants(address.trim(), options.prefixes);
  if (result.isErr()) {
    output.error('variants', result.error, exitCodeForError(result.error));
    return;
  }

  output.note(result.value.variants.join('\n'), 'Address variants');
  output.json('variants', result.value, { count: result.value.variants.length });
}
