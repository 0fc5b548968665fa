import type { AppConfig } from '@addrbridge/env';
import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ListChainsCommandOptionsSchema } from '../shared/schemas.js';

import { ListChainsHandler } from './list-chains-handler.js';
import type { ChainListEntry } from './list-chains-utils.js';

export type CommandOptions = z.infer<typeof ListChainsCommandOptionsSchema>;

/**
 * Register the list-chains command.
 */
export function registerListChainsCommand(program: Command, config: AppConfig): void {
  program
    .command('list-chains')
    .description('List well-known Cosmos chains and their bech32 prefixes')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      executeListChainsCommand(rawOptions, config);
    });
}

function executeListChainsCommand(rawOptions: unknown, config: AppConfig): void {
  const parseResult = ListChainsCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      'list-chains',
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const output = new OutputManager(parseResult.data.json ? 'json' : 'text');

  const result = new ListChainsHandler(config.targetPrefix).execute();
  if (result.isErr()) {
    output.error('list-chains', result.error, ExitCodes.GENERAL_ERROR);
    return;
  }

  if (output.isTextMode()) {
    output.note(formatChainLines(result.value.chains).join('\n'), `${String(result.value.total)} chains`);
  }

  output.json('list-chains', result.value);
}

function formatChainLines(chains: ChainListEntry[]): string[] {
  return chains.map((chain) => {
    const name = chain.isTarget ? pc.bold(chain.displayName) : chain.displayName;
    return `${name} (${chain.bech32Prefix})  ${pc.dim(chain.exampleAddress)}`;
  });
}
