import type { AppConfig } from '@addrbridge/env';
import type { Command } from 'commander';
import type { z } from 'zod';

import { exitCodeForError } from '../shared/error-mapping.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { AddressArgumentSchema, ConvertCommandOptionsSchema } from '../shared/schemas.js';

import { ConvertHandler } from './convert-handler.js';
import { formatConversionLines, type ConvertMode } from './convert-utils.js';

export type CommandOptions = z.infer<typeof ConvertCommandOptionsSchema>;

interface ConvertCommandDefinition {
  name: string;
  description: string;
  mode: ConvertMode;
}

const CONVERT_COMMANDS: ConvertCommandDefinition[] = [
  {
    name: 'convert',
    description: 'Auto-detect an EVM, Injective or Cosmos address and print both Injective and EVM forms',
    mode: 'auto',
  },
  {
    name: 'evm-to-inj',
    description: 'Convert an EVM hex address (0x...) to Injective format',
    mode: 'evm',
  },
  {
    name: 'inj-to-evm',
    description: 'Convert an Injective address (inj1...) to EVM hex format',
    mode: 'injective',
  },
];

/**
 * Register convert, evm-to-inj and inj-to-evm.
 */
export function registerConvertCommands(program: Command, config: AppConfig): void {
  for (const definition of CONVERT_COMMANDS) {
    program
      .command(`${definition.name} <address>`)
      .description(definition.description)
      .option('--json', 'Output results in JSON format')
      .action((address: string, rawOptions: unknown) => {
        executeConvertCommand(definition, address, rawOptions, config);
      });
  }
}

function executeConvertCommand(
  definition: ConvertCommandDefinition,
  rawAddress: string,
  rawOptions: unknown,
  config: AppConfig
): void {
  const parseResult = ConvertCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      definition.name,
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const addressResult = AddressArgumentSchema.safeParse(rawAddress);
  if (!addressResult.success) {
    output.error(
      definition.name,
      new Error(addressResult.error.issues[0]?.message ?? 'Invalid address'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const handler = new ConvertHandler(config.targetPrefix);
  const result = handler.execute({ address: addressResult.data, mode: definition.mode });

  if (result.isErr()) {
    output.error(definition.name, result.error, exitCodeForError(result.error));
    return;
  }

  output.note(formatConversionLines(result.value).join('\n'), result.value.input);
  output.json(definition.name, result.value);
}
